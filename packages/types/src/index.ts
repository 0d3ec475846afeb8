/**
 * @basketwrap/types - Shared domain types for the basketwrap stack.
 *
 * These types are used across all basketwrap packages:
 * - Basket composition (entries, weights, allocations)
 * - Collaborator capabilities (fungible assets, price feeds, host)
 * - Event architecture
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Basket types
export type {
  TokenId,
  Address,
  AssetEntry,
  Basket,
  AssetAmount,
  BasketComposition,
} from "./basket.js";

// Collaborator capabilities
export type {
  FungibleAsset,
  PriceReading,
  PriceFeed,
  AssetHost,
} from "./capability.js";

// Event types
export type {
  EventSource,
  DomainEvent,
  EventMetadata,
} from "./event.js";

// Runtime type guards
export {
  isAssetEntry,
  isBasket,
  isPriceReading,
  isEventMetadata,
  isDomainEvent,
} from "./guards.js";
