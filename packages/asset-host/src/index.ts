/**
 * @basketwrap/asset-host - In-process host environment.
 *
 * Provides:
 * - InMemoryAsset: balances, allowances, transfer failure injection and hooks
 * - ManualPriceFeed: hand-published price readings
 * - InMemoryAssetHost: asset and feed registry, block clock, atomic scope
 *
 * @packageDocumentation
 */

export { InMemoryAssetHost } from "./in-memory-host.js";
export type { InMemoryAssetHostOptions } from "./in-memory-host.js";
export { InMemoryAsset } from "./in-memory-asset.js";
export { ManualPriceFeed } from "./manual-price-feed.js";

export type {
  TransferFailureMode,
  TransferRequest,
  TransferHook,
  AssetState,
  HostErrorCode,
} from "./types.js";
export { HostError } from "./types.js";
