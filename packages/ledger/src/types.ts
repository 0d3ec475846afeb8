/**
 * @basketwrap/ledger - Internal types for the supply ledger.
 *
 * Rules:
 * - All types are readonly
 * - Snapshots are JSON-safe (bigint as decimal strings)
 * - Fail-closed: invalid operations throw, never silently succeed
 */

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * One holder's wrapper balance.
 */
export interface HolderBalance {
  readonly holder: string;
  readonly balance: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger and arithmetic operations. */
export type LedgerErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_HOLDER"
  | "INSUFFICIENT_BALANCE"
  | "INVALID_SNAPSHOT"
  | "INVALID_DECIMALS"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the ledger package.
 * Always thrown - never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the wrapper supply.
 * Used for persistence, rehydration and operation rollback.
 */
export interface SupplySnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly {
    readonly holder: string;
    readonly balance: string;
  }[];
}
