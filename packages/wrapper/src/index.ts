/**
 * @basketwrap/wrapper - Basket-backed wrapper token.
 *
 * A fungible wrapper unit, fully collateralized by a fixed-proportion
 * basket of other fungible assets, with an optional price-oracle
 * slippage bound on mint and burn.
 *
 * Design rules:
 * - All-or-nothing: a failed operation leaves no asset or supply change
 * - Fail-closed: unpriceable, stale or malformed prices are refused
 * - One event per successful state change, none on failure
 *
 * @packageDocumentation
 */

// Coordinator
export { WrapperToken } from "./wrapper-token.js";

// Components
export { BasketRegistry } from "./basket-registry.js";
export { PriceOracleAdapter, STALENESS_WINDOW_SECONDS } from "./price-oracle.js";
export {
  SlippageGuard,
  DEFAULT_SLIPPAGE_TOLERANCE_BPS,
  assertTolerance,
} from "./slippage-guard.js";
export { MintBurnEngine } from "./mint-burn-engine.js";
export type { ExecutionHooks } from "./mint-burn-engine.js";
export { AccessControl, PauseSwitch } from "./access-control.js";
export { RecoveryPath } from "./recovery.js";
export { ReentrancyGuard } from "./reentrancy-guard.js";

// Errors
export { WrapperError, categoryOf } from "./errors.js";
export type { WrapperErrorCode, WrapperErrorCategory } from "./errors.js";

// Events
export { WRAPPER_EVENTS, EVENT_SOURCES } from "./events.js";
export type {
  WrapperEventType,
  WrapperEventPayloads,
  BasketConfiguredPayload,
  MintedPayload,
  BurnedPayload,
  PriceFeedConfiguredPayload,
  PriceFeedRemovedPayload,
  SlippageToleranceUpdatedPayload,
  TokenRecoveredPayload,
  OwnershipTransferredPayload,
} from "./events.js";

// Types
export type {
  RecoveryScope,
  WrapperConfig,
  PriceFeedBinding,
  ValuationLine,
  Valuation,
  TransferDirection,
  TransferPlan,
  MintBurnReceipt,
  MintPreview,
  BackingLine,
  BackingReport,
  WrapperInfo,
  RecoveryReceipt,
  WrapperSnapshot,
} from "./types.js";
