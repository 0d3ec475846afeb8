/**
 * Tests for PriceOracleAdapter.
 *
 * Verifies:
 * - Binding: resolution, decimals validation, replacement, removal
 * - Reading: normalization, freshness, non-positive and future answers
 * - Valuation: per-asset lines and total
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryAssetHost, HostError } from "@basketwrap/asset-host";
import { BasketRegistry } from "../src/basket-registry.js";
import { PriceOracleAdapter, STALENESS_WINDOW_SECONDS } from "../src/price-oracle.js";
import { NOW, feedPrice, rejectsWith, throwsWith } from "./helpers.js";

const E18 = 10n ** 18n;

let host: InMemoryAssetHost;
let registry: BasketRegistry;
let oracle: PriceOracleAdapter;

beforeEach(() => {
  host = new InMemoryAssetHost({ now: NOW });
  host.createAsset("T1");
  host.createAsset("T2");
  host.createPriceFeed("feed-T1", 8, { answer: feedPrice(1n), updatedAt: NOW });
  host.createPriceFeed("feed-T2", 8, { answer: feedPrice(2n), updatedAt: NOW });

  registry = new BasketRegistry((token) => host.asset(token) !== undefined);
  registry.configure(["T1", "T2"], [6000, 4000]);
  oracle = new PriceOracleAdapter(host, registry);
});

// =============================================================================
// bind / unbind
// =============================================================================

describe("bind", () => {
  it("records the feed and its precision", async () => {
    const binding = await oracle.bind("T1", "feed-T1");

    expect(binding).toEqual({ token: "T1", feed: "feed-T1", decimals: 8, active: true });
    expect(oracle.bindings()).toEqual([binding]);
  });

  it("fails for an unresolvable feed handle", async () => {
    await rejectsWith(oracle.bind("T1", "feed-missing"), "PRICE_FEED_UNRESOLVABLE");
    expect(oracle.binding("T1")).toBeUndefined();
  });

  it("fails for an unknown asset", async () => {
    await rejectsWith(oracle.bind("T9", "feed-T1"), "UNKNOWN_ASSET");
  });

  it("fails for a feed reporting unusable decimals", async () => {
    host.createPriceFeed("feed-bad", 99);
    await rejectsWith(oracle.bind("T1", "feed-bad"), "INVALID_FEED_DECIMALS");
  });

  it("replaces an earlier binding", async () => {
    host.createPriceFeed("feed-T1-v2", 6, { answer: 3_000_000n, updatedAt: NOW });
    await oracle.bind("T1", "feed-T1");
    await oracle.bind("T1", "feed-T1-v2");

    expect(await oracle.price("T1")).toBe(3n * E18);
  });
});

describe("unbind", () => {
  it("makes the asset unpriceable", async () => {
    await oracle.bind("T1", "feed-T1");

    const binding = oracle.unbind("T1");

    expect(binding.active).toBe(false);
    await rejectsWith(oracle.price("T1"), "PRICE_FEED_NOT_CONFIGURED");
  });

  it("fails when nothing is bound", () => {
    throwsWith(() => oracle.unbind("T1"), "PRICE_FEED_NOT_CONFIGURED");
  });
});

// =============================================================================
// price
// =============================================================================

describe("price", () => {
  beforeEach(async () => {
    await oracle.bind("T1", "feed-T1");
  });

  it("normalizes 8-decimal answers to 18 decimals", async () => {
    host.getPriceFeed("feed-T1").publish(2_000_12345678n, NOW);
    expect(await oracle.price("T1")).toBe(2_000_123_456_780_000_000_000n);
  });

  it("truncates answers finer than 18 decimals", async () => {
    host.createPriceFeed("feed-fine", 20, { answer: 123_456n, updatedAt: NOW });
    await oracle.bind("T2", "feed-fine");

    expect(await oracle.price("T2")).toBe(1234n);
  });

  it("fails for an unbound asset", async () => {
    await rejectsWith(oracle.price("T2"), "PRICE_FEED_NOT_CONFIGURED");
  });

  it("accepts a reading exactly at the staleness window", async () => {
    host.getPriceFeed("feed-T1").publish(feedPrice(1n), NOW - STALENESS_WINDOW_SECONDS);
    expect(await oracle.price("T1")).toBe(E18);
  });

  it("rejects a reading two hours old", async () => {
    host.getPriceFeed("feed-T1").publish(feedPrice(1n), NOW - 7200);

    const err = await rejectsWith(oracle.price("T1"), "STALE_PRICE");
    expect(err.category).toBe("external");
    expect(err.message).toBe('Price for "T1" is 7200s old, exceeding the 3600s window');
  });

  it("rejects zero and negative answers", async () => {
    host.getPriceFeed("feed-T1").publish(0n, NOW);
    await rejectsWith(oracle.price("T1"), "INVALID_PRICE");

    host.getPriceFeed("feed-T1").publish(-5n, NOW);
    await rejectsWith(oracle.price("T1"), "INVALID_PRICE");
  });

  it("rejects an answer that normalizes to zero", async () => {
    host.createPriceFeed("feed-fine", 36, { answer: 1n, updatedAt: NOW });
    await oracle.bind("T1", "feed-fine");
    await oracle.bind("T2", "feed-T2");

    const err = await rejectsWith(oracle.price("T1"), "INVALID_PRICE");
    expect(err.message).toBe(
      'Price feed "feed-fine" answer 1 at 36 decimals is below one unit of precision',
    );
    await rejectsWith(oracle.valuation(1000n), "INVALID_PRICE");
  });

  it("rejects an update time in the future", async () => {
    host.getPriceFeed("feed-T1").publish(feedPrice(1n), NOW + 1);
    await rejectsWith(oracle.price("T1"), "INVALID_PRICE");
  });

  it("wraps a failing read with its cause", async () => {
    host.getPriceFeed("feed-T1").setUnavailable(true);

    const err = await rejectsWith(oracle.price("T1"), "PRICE_READ_FAILED");
    expect(err.cause).toBeInstanceOf(HostError);
  });

  it("reflects the clock on every call", async () => {
    expect(await oracle.price("T1")).toBe(E18);

    host.advanceTime(STALENESS_WINDOW_SECONDS + 1);
    await rejectsWith(oracle.price("T1"), "STALE_PRICE");
  });
});

// =============================================================================
// valuation
// =============================================================================

describe("valuation", () => {
  beforeEach(async () => {
    await oracle.bind("T1", "feed-T1");
    await oracle.bind("T2", "feed-T2");
  });

  it("values each allocated line and sums them", async () => {
    const valuation = await oracle.valuation(1000n);

    expect(valuation).toEqual({
      amount: 1000n,
      lines: [
        { token: "T1", amount: 600n, price: E18, value: 600n },
        { token: "T2", amount: 400n, price: 2n * E18, value: 800n },
      ],
      total: 1400n,
    });
    expect(await oracle.totalValue(1000n)).toBe(1400n);
  });

  it("fails closed when any asset is stale", async () => {
    host.getPriceFeed("feed-T2").publish(feedPrice(2n), NOW - 7200);
    await rejectsWith(oracle.totalValue(1000n), "STALE_PRICE");
  });

  it("fails closed when any asset is unbound", async () => {
    oracle.unbind("T2");
    await rejectsWith(oracle.totalValue(1000n), "PRICE_FEED_NOT_CONFIGURED");
  });

  it("is zero for an empty amount", async () => {
    expect(await oracle.totalValue(0n)).toBe(0n);
  });
});
