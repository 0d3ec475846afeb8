/**
 * Basket Types
 *
 * Composition primitives for a basket-backed wrapper unit.
 *
 * Rules:
 * - All amounts are bigint base units (no floating point)
 * - Weights are integer basis points (1/10000th)
 * - A committed basket is replaced wholesale, never edited in place
 */

/**
 * Handle of an external fungible asset (e.g. a token contract address).
 */
export type TokenId = string;

/**
 * Holder or principal identifier (e.g. an account address).
 */
export type Address = string;

/**
 * One member of a basket.
 */
export interface AssetEntry {
  /** External token handle */
  readonly token: TokenId;

  /** Target weight in basis points (0–10000) */
  readonly weightBps: number;

  /** Inactive entries are ignored by allocation and valuation */
  readonly active: boolean;
}

/**
 * A versioned basket configuration.
 *
 * Invariant: over active entries, weights sum to exactly 10000
 * (except the empty genesis basket at version 0).
 */
export interface Basket {
  /** Monotonically increasing, 0 = never configured */
  readonly version: number;

  /** Ordered entries, in configuration order */
  readonly entries: readonly AssetEntry[];

  /** ISO 8601 timestamp of the transition that produced this basket */
  readonly configuredAt?: string | undefined;
}

/**
 * A per-asset quantity, e.g. one line of a mint or burn transfer plan.
 */
export interface AssetAmount {
  readonly token: TokenId;
  readonly amount: bigint;
}

/**
 * Parallel-array view of the active composition, as external consumers read it.
 */
export interface BasketComposition {
  readonly tokens: readonly TokenId[];
  readonly weights: readonly number[];
}
