/**
 * Collaborator Capabilities
 *
 * What the wrapper consumes from its host environment. Every method
 * is an external call: it may suspend, fail, lie or call back in.
 * Consumers check every result.
 */

import type { Address, TokenId } from "./basket.js";

/**
 * Fungible asset capability for one basket member.
 *
 * `caller` is the principal on whose behalf the call is made
 * (the transaction sender). Transfers report failure either by
 * resolving to `false` or by rejecting.
 */
export interface FungibleAsset {
  readonly token: TokenId;

  balanceOf(holder: Address): Promise<bigint>;

  allowance(owner: Address, spender: Address): Promise<bigint>;

  /** Move `amount` from `caller` to `to`. */
  transfer(caller: Address, to: Address, amount: bigint): Promise<boolean>;

  /** Move `amount` from `from` to `to`, spending `caller`'s allowance. */
  transferFrom(
    caller: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<boolean>;
}

/**
 * The latest reading of a price feed.
 */
export interface PriceReading {
  /** Price in the feed's own decimal precision */
  readonly answer: bigint;

  /** Unix seconds of the last update */
  readonly updatedAt: number;
}

/**
 * Price feed capability (latest value, last-update time, precision).
 */
export interface PriceFeed {
  decimals(): Promise<number>;
  latestRoundData(): Promise<PriceReading>;
}

/**
 * The host environment a wrapper instance runs in.
 */
export interface AssetHost {
  /** Resolve a token handle, or undefined when unresolvable. */
  asset(token: TokenId): FungibleAsset | undefined;

  /** Resolve a price feed handle, or undefined when unresolvable. */
  priceFeed(handle: string): PriceFeed | undefined;

  /** Current host time in unix seconds. */
  now(): number;

  /**
   * Run `work` so that every asset effect inside it commits together,
   * or, if `work` rejects, none of them do.
   */
  atomic<T>(work: () => Promise<T>): Promise<T>;
}
