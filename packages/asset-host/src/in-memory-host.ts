/**
 * @basketwrap/asset-host - InMemoryAssetHost.
 *
 * In-process stand-in for the environment a wrapper runs in:
 * an asset registry, price feeds and a block clock.
 *
 * `atomic(work)` captures every asset's balances and allowances and
 * restores them all if `work` rejects, so a failed operation leaves
 * no asset movement behind.
 */

import type {
  AssetHost,
  FungibleAsset,
  PriceFeed,
  PriceReading,
  TokenId,
} from "@basketwrap/types";
import { InMemoryAsset } from "./in-memory-asset.js";
import { ManualPriceFeed } from "./manual-price-feed.js";
import type { AssetState } from "./types.js";
import { HostError } from "./types.js";

export interface InMemoryAssetHostOptions {
  /** Initial clock, unix seconds. Default: the current wall-clock second. */
  readonly now?: number;
}

export class InMemoryAssetHost implements AssetHost {
  private readonly _assets = new Map<TokenId, InMemoryAsset>();
  private readonly _feeds = new Map<string, ManualPriceFeed>();
  private _now: number;

  constructor(options: InMemoryAssetHostOptions = {}) {
    const now = options.now ?? Math.floor(Date.now() / 1000);
    this._assertTime(now);
    this._now = now;
  }

  // ─── Assets ─────────────────────────────────────────────────────────

  createAsset(token: TokenId, decimals = 18): InMemoryAsset {
    if (token.length === 0) {
      throw new HostError("INVALID_ADDRESS", "Token handle must be non-empty");
    }
    if (this._assets.has(token)) {
      throw new HostError("DUPLICATE_ASSET", `Asset "${token}" already exists`);
    }
    const asset = new InMemoryAsset(token, decimals);
    this._assets.set(token, asset);
    return asset;
  }

  asset(token: TokenId): FungibleAsset | undefined {
    return this._assets.get(token);
  }

  getAsset(token: TokenId): InMemoryAsset {
    const asset = this._assets.get(token);
    if (asset === undefined) {
      throw new HostError("UNKNOWN_ASSET", `Asset "${token}" does not exist`);
    }
    return asset;
  }

  tokens(): readonly TokenId[] {
    return [...this._assets.keys()];
  }

  // ─── Price feeds ────────────────────────────────────────────────────

  createPriceFeed(handle: string, decimals: number, initial?: PriceReading): ManualPriceFeed {
    if (handle.length === 0) {
      throw new HostError("INVALID_ADDRESS", "Feed handle must be non-empty");
    }
    if (this._feeds.has(handle)) {
      throw new HostError("DUPLICATE_FEED", `Price feed "${handle}" already exists`);
    }
    const feed = new ManualPriceFeed(handle, decimals, initial);
    this._feeds.set(handle, feed);
    return feed;
  }

  priceFeed(handle: string): PriceFeed | undefined {
    return this._feeds.get(handle);
  }

  getPriceFeed(handle: string): ManualPriceFeed {
    const feed = this._feeds.get(handle);
    if (feed === undefined) {
      throw new HostError("UNKNOWN_FEED", `Price feed "${handle}" does not exist`);
    }
    return feed;
  }

  // ─── Clock ──────────────────────────────────────────────────────────

  now(): number {
    return this._now;
  }

  setTime(seconds: number): void {
    this._assertTime(seconds);
    this._now = seconds;
  }

  advanceTime(seconds: number): void {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new HostError("INVALID_TIME", `Cannot advance the clock by ${String(seconds)}`);
    }
    this.setTime(this._now + seconds);
  }

  // ─── Atomic scope ───────────────────────────────────────────────────

  async atomic<T>(work: () => Promise<T>): Promise<T> {
    const checkpoint = new Map<InMemoryAsset, AssetState>();
    for (const asset of this._assets.values()) {
      checkpoint.set(asset, asset.captureState());
    }

    try {
      return await work();
    } catch (err) {
      for (const [asset, state] of checkpoint) {
        asset.restoreState(state);
      }
      throw err;
    }
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _assertTime(seconds: number): void {
    if (!Number.isSafeInteger(seconds) || seconds < 0) {
      throw new HostError("INVALID_TIME", `Invalid host time ${String(seconds)}`);
    }
  }
}
