/**
 * @basketwrap/asset-host - Host types and errors.
 */

import type { Address } from "@basketwrap/types";

// =============================================================================
// Failure injection
// =============================================================================

/**
 * How an asset responds to transfer requests.
 *
 * - "none": transfers behave normally
 * - "return-false": every transfer resolves to `false`
 * - "throw": every transfer rejects with a HostError
 */
export type TransferFailureMode = "none" | "return-false" | "throw";

/**
 * A transfer about to be executed, as seen by a transfer hook.
 */
export interface TransferRequest {
  readonly kind: "transfer" | "transferFrom";
  readonly caller: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/**
 * Called before each transfer moves any balance. May call back into
 * whatever invoked the transfer, or reject to fail it.
 */
export type TransferHook = (request: TransferRequest) => Promise<void>;

// =============================================================================
// Snapshots
// =============================================================================

/** Balances and allowances of one asset, used to roll back an atomic scope. */
export interface AssetState {
  readonly balances: ReadonlyMap<Address, bigint>;
  readonly allowances: ReadonlyMap<string, bigint>;
}

// =============================================================================
// Errors
// =============================================================================

export type HostErrorCode =
  | "UNKNOWN_ASSET"
  | "DUPLICATE_ASSET"
  | "UNKNOWN_FEED"
  | "DUPLICATE_FEED"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_TIME"
  | "NO_PRICE_DATA"
  | "FEED_UNAVAILABLE"
  | "TRANSFER_REJECTED";

/**
 * Structured error from the in-memory host.
 */
export class HostError extends Error {
  public readonly code: HostErrorCode;

  constructor(code: HostErrorCode, message: string) {
    super(message);
    this.name = "HostError";
    this.code = code;
  }
}
