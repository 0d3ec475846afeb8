/**
 * PriceOracleAdapter - normalized, freshness-checked asset prices.
 *
 * Each basket asset may be bound to one price feed. Readings are
 * untrusted: a read that rejects, returns a malformed value, a
 * non-positive answer, a future timestamp or an update older than
 * the freshness window is refused. Accepted answers are rescaled
 * from the feed's precision to PRICE_DECIMALS.
 */

import type { AssetHost, PriceFeed, TokenId } from "@basketwrap/types";
import { isPriceReading } from "@basketwrap/types";
import {
  PRICE_DECIMALS,
  PRICE_UNIT,
  mulDiv,
  scaleDecimals,
} from "@basketwrap/ledger";
import type { BasketRegistry } from "./basket-registry.js";
import { WrapperError, describeError } from "./errors.js";
import type { PriceFeedBinding, ValuationLine, Valuation } from "./types.js";

/** Maximum age of an accepted reading, in seconds. */
export const STALENESS_WINDOW_SECONDS = 3600;

/** Largest feed precision accepted. */
const MAX_FEED_DECIMALS = 36;

interface ActiveBinding extends PriceFeedBinding {
  readonly source: PriceFeed;
}

export class PriceOracleAdapter {
  private readonly _host: AssetHost;
  private readonly _registry: BasketRegistry;
  private readonly _bindings = new Map<TokenId, ActiveBinding>();

  constructor(host: AssetHost, registry: BasketRegistry) {
    this._host = host;
    this._registry = registry;
  }

  // ─── Bindings ───────────────────────────────────────────────────────

  /**
   * Resolve `feedHandle`, read its precision and bind it to `token`,
   * replacing any earlier binding. Nothing changes if any step fails.
   */
  async bind(token: TokenId, feedHandle: string): Promise<PriceFeedBinding> {
    if (this._host.asset(token) === undefined) {
      throw new WrapperError("UNKNOWN_ASSET", `Token "${token}" does not resolve to an asset`);
    }

    const source = this._host.priceFeed(feedHandle);
    if (source === undefined) {
      throw new WrapperError(
        "PRICE_FEED_UNRESOLVABLE",
        `Price feed "${feedHandle}" cannot be resolved`,
      );
    }

    let decimals: number;
    try {
      decimals = await source.decimals();
    } catch (err) {
      throw new WrapperError(
        "PRICE_FEED_UNRESOLVABLE",
        `Price feed "${feedHandle}" did not report its decimals: ${describeError(err)}`,
        { cause: err },
      );
    }
    assertFeedDecimals(feedHandle, decimals);

    const binding: ActiveBinding = { token, feed: feedHandle, decimals, active: true, source };
    this._bindings.set(token, binding);
    return toPublic(binding);
  }

  /**
   * Mark the binding for `token` inactive. The asset becomes unpriceable.
   */
  unbind(token: TokenId): PriceFeedBinding {
    const binding = this._bindings.get(token);
    if (binding === undefined || !binding.active) {
      throw new WrapperError(
        "PRICE_FEED_NOT_CONFIGURED",
        `No active price feed for token "${token}"`,
      );
    }
    const inactive: ActiveBinding = { ...binding, active: false };
    this._bindings.set(token, inactive);
    return toPublic(inactive);
  }

  /**
   * Reinstate a binding recorded in a snapshot, without reading the feed.
   */
  restoreBinding(binding: PriceFeedBinding): void {
    const source = this._host.priceFeed(binding.feed);
    if (source === undefined) {
      throw new WrapperError(
        "PRICE_FEED_UNRESOLVABLE",
        `Price feed "${binding.feed}" cannot be resolved`,
      );
    }
    assertFeedDecimals(binding.feed, binding.decimals);
    this._bindings.set(binding.token, { ...binding, source });
  }

  /** Drop any binding for `token`, active or not. */
  clear(token: TokenId): void {
    this._bindings.delete(token);
  }

  binding(token: TokenId): PriceFeedBinding | undefined {
    const binding = this._bindings.get(token);
    return binding === undefined ? undefined : toPublic(binding);
  }

  bindings(): readonly PriceFeedBinding[] {
    return [...this._bindings.values()].map(toPublic);
  }

  // ─── Prices ─────────────────────────────────────────────────────────

  /**
   * Latest price of one whole unit of `token`, at PRICE_DECIMALS.
   */
  async price(token: TokenId): Promise<bigint> {
    const binding = this._bindings.get(token);
    if (binding === undefined || !binding.active) {
      throw new WrapperError(
        "PRICE_FEED_NOT_CONFIGURED",
        `No active price feed for token "${token}"`,
      );
    }

    let reading: unknown;
    try {
      reading = await binding.source.latestRoundData();
    } catch (err) {
      throw new WrapperError(
        "PRICE_READ_FAILED",
        `Reading price feed "${binding.feed}" failed: ${describeError(err)}`,
        { cause: err },
      );
    }

    if (!isPriceReading(reading)) {
      throw new WrapperError(
        "INVALID_PRICE",
        `Price feed "${binding.feed}" returned a malformed reading`,
      );
    }
    if (reading.answer <= 0n) {
      throw new WrapperError(
        "INVALID_PRICE",
        `Price feed "${binding.feed}" returned non-positive answer ${reading.answer.toString()}`,
      );
    }

    const now = this._host.now();
    if (reading.updatedAt > now) {
      throw new WrapperError(
        "INVALID_PRICE",
        `Price feed "${binding.feed}" reports an update in the future (${String(reading.updatedAt)} > ${String(now)})`,
      );
    }
    const age = now - reading.updatedAt;
    if (age > STALENESS_WINDOW_SECONDS) {
      throw new WrapperError(
        "STALE_PRICE",
        `Price for "${token}" is ${String(age)}s old, exceeding the ${String(STALENESS_WINDOW_SECONDS)}s window`,
      );
    }

    const price = scaleDecimals(reading.answer, binding.decimals, PRICE_DECIMALS);
    if (price <= 0n) {
      throw new WrapperError(
        "INVALID_PRICE",
        `Price feed "${binding.feed}" answer ${reading.answer.toString()} at ${String(binding.decimals)} decimals is below one unit of precision`,
      );
    }
    return price;
  }

  /**
   * Per-asset value lines and total value of `amount` wrapper units.
   * Recomputed on every call, never cached.
   */
  async valuation(amount: bigint): Promise<Valuation> {
    const lines: ValuationLine[] = [];
    let total = 0n;

    for (const { token, amount: assetAmount } of this._registry.allocate(amount)) {
      const price = await this.price(token);
      const value = mulDiv(assetAmount, price, PRICE_UNIT);
      lines.push({ token, amount: assetAmount, price, value });
      total += value;
    }

    return { amount, lines, total };
  }

  /**
   * Σ floor(perAssetAmount × price / PRICE_UNIT) over active assets.
   */
  async totalValue(amount: bigint): Promise<bigint> {
    return (await this.valuation(amount)).total;
  }
}

function assertFeedDecimals(feed: string, decimals: unknown): void {
  if (
    typeof decimals !== "number" ||
    !Number.isInteger(decimals) ||
    decimals < 0 ||
    decimals > MAX_FEED_DECIMALS
  ) {
    throw new WrapperError(
      "INVALID_FEED_DECIMALS",
      `Price feed "${feed}" reports invalid decimals ${String(decimals)}`,
    );
  }
}

function toPublic(binding: ActiveBinding): PriceFeedBinding {
  return {
    token: binding.token,
    feed: binding.feed,
    decimals: binding.decimals,
    active: binding.active,
  };
}
