/**
 * @basketwrap/asset-host - ManualPriceFeed.
 *
 * A price feed whose readings are published by hand. Decimals are
 * reported as given, unchecked, so consumers can be tested against
 * feeds that misreport their precision.
 */

import type { PriceFeed, PriceReading } from "@basketwrap/types";
import { HostError } from "./types.js";

export class ManualPriceFeed implements PriceFeed {
  readonly handle: string;

  private readonly _decimals: number;
  private _latest: PriceReading | undefined;
  private _unavailable = false;

  constructor(handle: string, decimals: number, initial?: PriceReading) {
    this.handle = handle;
    this._decimals = decimals;
    this._latest = initial;
  }

  async decimals(): Promise<number> {
    return this._decimals;
  }

  async latestRoundData(): Promise<PriceReading> {
    if (this._unavailable) {
      throw new HostError("FEED_UNAVAILABLE", `Price feed "${this.handle}" is unavailable`);
    }
    if (this._latest === undefined) {
      throw new HostError("NO_PRICE_DATA", `Price feed "${this.handle}" has no readings`);
    }
    return this._latest;
  }

  /** Record a new reading. `answer` may be any value, including non-positive. */
  publish(answer: bigint, updatedAt: number): void {
    this._latest = { answer, updatedAt };
  }

  get latest(): PriceReading | undefined {
    return this._latest;
  }

  /** Make every subsequent read reject until cleared. */
  setUnavailable(unavailable: boolean): void {
    this._unavailable = unavailable;
  }
}
