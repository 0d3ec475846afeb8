/**
 * @basketwrap/ledger - Wrapper supply ledger and fixed-point math.
 *
 * A pure TypeScript package with zero runtime dependencies.
 * - Total supply always equals the sum of holder balances
 * - All monetary arithmetic uses bigint (no floating point)
 * - Division floors; basis points are 1/10000th
 *
 * Design rules:
 * - All exported types are readonly
 * - Fail-closed: invalid operations throw, never silently succeed
 * - Zero runtime dependencies
 */

// Supply ledger
export { SupplyLedger } from "./supply-ledger.js";

// Fixed-point arithmetic
export {
  BPS_DENOMINATOR,
  PRICE_DECIMALS,
  PRICE_UNIT,
  mulDiv,
  assertBps,
  shareOfBps,
  addBps,
  subtractBps,
  scaleDecimals,
  assertDecimals,
  parseAmount,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  HolderBalance,
  LedgerErrorCode,
  SupplySnapshot,
} from "./types.js";

export { LedgerError } from "./types.js";
