/**
 * @basketwrap/wrapper - Types for the wrapper token.
 *
 * Rules:
 * - All types are readonly
 * - Amounts are bigint base units in memory
 * - Snapshots and event payloads carry amounts as decimal strings
 */

import type { Address, AssetAmount, Basket, TokenId } from "@basketwrap/types";
import type { SupplySnapshot } from "@basketwrap/ledger";

// =============================================================================
// Configuration
// =============================================================================

/**
 * What the recovery sweep may take.
 *
 * - "unrestricted": any token, including active basket assets
 * - "non-basket": only tokens outside the active basket
 */
export type RecoveryScope = "unrestricted" | "non-basket";

export interface WrapperConfig {
  /** Wrapper unit name, e.g. "Multi-Asset Wrapper" */
  readonly name: string;

  /** Wrapper unit symbol, e.g. "MAW" */
  readonly symbol: string;

  /** Initial administrative principal */
  readonly owner: Address;

  /** Address that holds basket custody and receives mint pulls */
  readonly custody: Address;

  /** Default: 100 */
  readonly slippageToleranceBps?: number;

  /** Default: "unrestricted" */
  readonly recoveryScope?: RecoveryScope;
}

// =============================================================================
// Price feeds & valuation
// =============================================================================

export interface PriceFeedBinding {
  readonly token: TokenId;

  /** Feed handle as resolved by the host */
  readonly feed: string;

  /** The feed's native decimal precision */
  readonly decimals: number;

  /** Inactive bindings make the asset unpriceable */
  readonly active: boolean;
}

export interface ValuationLine {
  readonly token: TokenId;

  /** Per-asset amount for the valued wrapper amount */
  readonly amount: bigint;

  /** Normalized price (18 decimals) */
  readonly price: bigint;

  /** floor(amount × price / 10^18) */
  readonly value: bigint;
}

export interface Valuation {
  readonly amount: bigint;
  readonly lines: readonly ValuationLine[];
  readonly total: bigint;
}

// =============================================================================
// Mint / burn
// =============================================================================

export type TransferDirection = "pull" | "payout";

/**
 * The per-asset transfers a mint or burn will execute.
 */
export interface TransferPlan {
  readonly direction: TransferDirection;
  readonly caller: Address;
  readonly amount: bigint;
  readonly lines: readonly AssetAmount[];
}

/**
 * Result of a successful mint or burn.
 */
export interface MintBurnReceipt extends TransferPlan {
  /** Caller's wrapper balance after the operation */
  readonly balanceAfter: bigint;

  /** Total supply after the operation */
  readonly totalSupplyAfter: bigint;

  /** Total value checked by the slippage guard, when one was requested */
  readonly checkedValue?: bigint | undefined;
}

/**
 * Side-effect-free mint preview.
 */
export interface MintPreview {
  readonly tokens: readonly TokenId[];
  readonly amounts: readonly bigint[];
}

// =============================================================================
// Reporting
// =============================================================================

export interface BackingLine {
  readonly token: TokenId;
  readonly weightBps: number;

  /** Custody balance of the asset */
  readonly held: bigint;

  /** floor(totalSupply × weight / 10000) */
  readonly required: bigint;

  /** held − required; retained rounding dust when positive */
  readonly surplus: bigint;
}

export interface BackingReport {
  readonly totalSupply: bigint;
  readonly basketVersion: number;
  readonly lines: readonly BackingLine[];

  /** True when every line has held ≥ required */
  readonly fullyBacked: boolean;
}

export interface WrapperInfo {
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly custody: Address;
  readonly totalSupply: bigint;
  readonly paused: boolean;
  readonly slippageToleranceBps: number;
  readonly recoveryScope: RecoveryScope;
  readonly basketVersion: number;
}

export interface RecoveryReceipt {
  readonly token: TokenId;
  readonly to: Address;
  readonly amount: bigint;
}

// =============================================================================
// Snapshot
// =============================================================================

/**
 * JSON-safe record of the full wrapper state.
 */
export interface WrapperSnapshot {
  readonly version: 1;
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly custody: Address;
  readonly paused: boolean;
  readonly slippageToleranceBps: number;
  readonly recoveryScope: RecoveryScope;
  readonly basket: Basket;
  readonly supply: SupplySnapshot;
  readonly priceFeeds: readonly PriceFeedBinding[];
  readonly savedAt: string;
}
