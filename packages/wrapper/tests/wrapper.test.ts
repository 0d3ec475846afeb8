/**
 * Integration tests for WrapperToken.
 *
 * Covers the end-to-end behaviour of a deployed wrapper:
 * - Basket scenarios (proportional mint, rejected reconfiguration)
 * - Price-gated mint/burn (staleness, slippage bounds)
 * - Pause, recovery and ownership administration
 * - Event history, backing report and snapshot/restore
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@basketwrap/types";
import { EventStoreError } from "@basketwrap/event-store";
import { WrapperToken } from "../src/wrapper-token.js";
import type { WrapperSnapshot } from "../src/types.js";
import {
  CUSTODY,
  NOW,
  OWNER,
  USER,
  deploy,
  deployConfigured,
  feedPrice,
  fund,
  rejectsWith,
  throwsWith,
} from "./helpers.js";

function eventTypes(wrapper: WrapperToken): string[] {
  return wrapper.events().map((e) => e.event.type);
}

function lastPayload(wrapper: WrapperToken): DomainEvent["payload"] | undefined {
  return wrapper.events().at(-1)?.event.payload;
}

// =============================================================================
// Deployment
// =============================================================================

describe("deployment", () => {
  it("starts empty, unpaused, at the default tolerance", () => {
    const { wrapper } = deploy();

    expect(wrapper.info()).toEqual({
      name: "Test Wrapper",
      symbol: "TW",
      owner: OWNER,
      custody: CUSTODY,
      totalSupply: 0n,
      paused: false,
      slippageToleranceBps: 100,
      recoveryScope: "unrestricted",
      basketVersion: 0,
    });
    expect(wrapper.getAssets()).toEqual({ tokens: [], weights: [] });
  });

  it("rejects a blank symbol or custody", () => {
    const { host } = deploy();
    throwsWith(
      () => new WrapperToken({ name: "X", symbol: " ", owner: OWNER, custody: CUSTODY }, host),
      "INVALID_CONFIGURATION",
    );
    throwsWith(
      () => new WrapperToken({ name: "X", symbol: "X", owner: OWNER, custody: "" }, host),
      "INVALID_ADDRESS",
    );
  });

  it("rejects mint and burn against an empty basket", async () => {
    const { wrapper } = deploy();

    await rejectsWith(wrapper.mint(USER, 1000n), "EMPTY_BASKET");
    await rejectsWith(wrapper.burn(USER, 1000n), "EMPTY_BASKET");
  });
});

// =============================================================================
// Basket
// =============================================================================

describe("basket configuration", () => {
  it("records a full-basket event stamped with host time", () => {
    const { wrapper } = deploy();

    wrapper.configureAssets(OWNER, ["T1", "T2"], [6000, 4000]);

    const [stored] = wrapper.events();
    expect(stored?.event.type).toBe("basket.configured");
    expect(stored?.event.payload).toEqual({ version: 1, tokens: ["T1", "T2"], weights: [6000, 4000] });
    expect(stored?.event.metadata.actor).toBe(OWNER);
    expect(stored?.event.metadata.source).toBe("basket");
    expect(stored?.event.metadata.timestamp).toBe("2023-11-14T22:13:20.000Z");
  });

  it("rejects weights [5000, 4999] and keeps the prior basket", () => {
    const { wrapper } = deploy();
    wrapper.configureAssets(OWNER, ["T1", "T2"], [6000, 4000]);

    throwsWith(() => wrapper.configureAssets(OWNER, ["T1", "T2"], [5000, 4999]), "INVALID_WEIGHTS");

    expect(wrapper.getAssets()).toEqual({ tokens: ["T1", "T2"], weights: [6000, 4000] });
    expect(eventTypes(wrapper)).toEqual(["basket.configured"]);
  });

  it("refuses non-owners", () => {
    const { wrapper } = deploy();

    throwsWith(() => wrapper.configureAssets(USER, ["T1"], [10_000]), "UNAUTHORIZED");
    expect(wrapper.basket().version).toBe(0);
    expect(wrapper.events()).toEqual([]);
  });

  it("previews mint amounts without side effects", async () => {
    const { wrapper } = await deployConfigured();

    const first = wrapper.calculateMintAmounts(1000n);

    expect(first).toEqual({ tokens: ["T1", "T2"], amounts: [600n, 400n] });
    expect(wrapper.calculateMintAmounts(1000n)).toEqual(first);
    expect(wrapper.totalSupply).toBe(0n);
  });
});

// =============================================================================
// Mint / burn
// =============================================================================

describe("mint and burn", () => {
  it("mints 1000 units against 600 T1 and 400 T2", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });

    await wrapper.mint(USER, 1000n);

    expect(wrapper.balanceOf(USER)).toBe(1000n);
    expect(host.getAsset("T1").balanceOfSync(CUSTODY)).toBe(600n);
    expect(host.getAsset("T2").balanceOfSync(CUSTODY)).toBe(400n);
    expect(lastPayload(wrapper)).toEqual({
      holder: USER,
      amount: "1000",
      pulled: [
        { token: "T1", amount: "600" },
        { token: "T2", amount: "400" },
      ],
    });
  });

  it("mint then burn returns the pulled amounts and restores supply", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });

    await wrapper.mint(USER, 1000n);
    const receipt = await wrapper.burn(USER, 1000n);

    expect(receipt.lines).toEqual([
      { token: "T1", amount: 600n },
      { token: "T2", amount: 400n },
    ]);
    expect(host.getAsset("T1").balanceOfSync(USER)).toBe(600n);
    expect(host.getAsset("T2").balanceOfSync(USER)).toBe(400n);
    expect(wrapper.totalSupply).toBe(0n);
    expect(wrapper.holders()).toEqual([]);
    expect(eventTypes(wrapper).slice(-2)).toEqual(["wrapper.minted", "wrapper.burned"]);
  });

  it("rejects zero amounts and over-burning", async () => {
    const { wrapper } = await deployConfigured();

    await rejectsWith(wrapper.mint(USER, 0n), "INVALID_AMOUNT");
    await rejectsWith(wrapper.burn(USER, 0n), "INVALID_AMOUNT");
    await rejectsWith(wrapper.burn(USER, 1n), "INSUFFICIENT_BALANCE");
  });

  it("emits nothing for a failed mint", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    host.getAsset("T2").setTransferFailure("return-false");

    await rejectsWith(wrapper.mint(USER, 1000n), "TRANSFER_FAILED");

    expect(eventTypes(wrapper)).not.toContain("wrapper.minted");
    expect(host.getAsset("T1").balanceOfSync(USER)).toBe(600n);
  });
});

// =============================================================================
// Price-gated operations
// =============================================================================

describe("price-gated operations", () => {
  it("fails valuation and gated mint when T1's reading is two hours old", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    host.getPriceFeed("feed-T1").publish(feedPrice(1n), NOW - 7200);

    await rejectsWith(wrapper.totalValue(1000n), "STALE_PRICE");
    await rejectsWith(wrapper.mint(USER, 1000n, 2000n), "STALE_PRICE");
    expect(wrapper.totalSupply).toBe(0n);

    await wrapper.mint(USER, 1000n);
    expect(wrapper.totalSupply).toBe(1000n);
  });

  it("fails a gated burn on a stale price and keeps the balance", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);
    host.advanceTime(7200);

    await rejectsWith(wrapper.burn(USER, 1000n, 1n), "STALE_PRICE");
    expect(wrapper.balanceOf(USER)).toBe(1000n);
  });

  it("rejects a mint whose maxValue is 2% under value and accepts 2% over", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });

    await rejectsWith(wrapper.mint(USER, 1000n, 1372n), "SLIPPAGE_EXCEEDED");
    expect(wrapper.totalSupply).toBe(0n);

    const receipt = await wrapper.mint(USER, 1000n, 1428n);
    expect(receipt.checkedValue).toBe(1400n);
    expect(lastPayload(wrapper)).toMatchObject({ maxValue: "1428", checkedValue: "1400" });
  });

  it("bounds burn value from below", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);

    await rejectsWith(wrapper.burn(USER, 1000n, 1428n), "SLIPPAGE_EXCEEDED");
    await wrapper.burn(USER, 1000n, 1372n);
    expect(wrapper.totalSupply).toBe(0n);
  });

  it("returns a valuation breakdown", async () => {
    const { wrapper } = await deployConfigured();

    const valuation = await wrapper.valuation(1000n);

    expect(valuation.lines.map((l) => l.value)).toEqual([600n, 800n]);
    expect(valuation.total).toBe(1400n);
  });

  it("removing a feed makes gated operations fail closed", async () => {
    const { wrapper } = await deployConfigured();

    wrapper.removePriceFeed(OWNER, "T2");

    await rejectsWith(wrapper.totalValue(1000n), "PRICE_FEED_NOT_CONFIGURED");
    expect(wrapper.priceFeeds().map((b) => b.active)).toEqual([true, false]);
    expect(lastPayload(wrapper)).toEqual({ token: "T2", feed: "feed-T2" });
  });

  it("restricts feed and tolerance changes to the owner", async () => {
    const { wrapper } = await deployConfigured();

    await rejectsWith(wrapper.configurePriceFeed(USER, "T1", "feed-T2"), "UNAUTHORIZED");
    throwsWith(() => wrapper.setSlippageTolerance(USER, 50), "UNAUTHORIZED");
    throwsWith(() => wrapper.setSlippageTolerance(OWNER, 10_001), "INVALID_TOLERANCE");

    wrapper.setSlippageTolerance(OWNER, 50);
    expect(wrapper.slippageToleranceBps).toBe(50);
    expect(lastPayload(wrapper)).toEqual({ previousBps: 100, bps: 50 });
  });
});

// =============================================================================
// Pause
// =============================================================================

describe("pause", () => {
  it("halts mint and burn but not administration", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);

    wrapper.pause(OWNER);

    await rejectsWith(wrapper.mint(USER, 1000n), "PAUSED");
    await rejectsWith(wrapper.burn(USER, 1000n), "PAUSED");
    wrapper.configureAssets(OWNER, ["T1", "T2"], [6000, 4000]);
    expect(wrapper.basket().version).toBe(2);
    wrapper.setSlippageTolerance(OWNER, 200);

    wrapper.unpause(OWNER);
    await wrapper.burn(USER, 1000n);
    expect(wrapper.totalSupply).toBe(0n);
  });

  it("refuses redundant transitions and non-owners", () => {
    const { wrapper } = deploy();

    throwsWith(() => wrapper.unpause(OWNER), "NOT_PAUSED");
    throwsWith(() => wrapper.pause(USER), "UNAUTHORIZED");
    wrapper.pause(OWNER);
    throwsWith(() => wrapper.pause(OWNER), "PAUSED");
    expect(eventTypes(wrapper)).toEqual(["wrapper.paused"]);
  });
});

// =============================================================================
// Recovery
// =============================================================================

describe("recovery", () => {
  it("sweeps a stray token to the owner, even while paused", async () => {
    const { host, wrapper } = await deployConfigured();
    host.createAsset("T3").mint(CUSTODY, 50n);
    wrapper.pause(OWNER);

    const receipt = await wrapper.recoverToken(OWNER, "T3");

    expect(receipt).toEqual({ token: "T3", to: OWNER, amount: 50n });
    expect(host.getAsset("T3").balanceOfSync(OWNER)).toBe(50n);
    expect(lastPayload(wrapper)).toEqual({ token: "T3", to: OWNER, amount: "50" });
  });

  it("fails when there is nothing to sweep", async () => {
    const { host, wrapper } = await deployConfigured();
    host.createAsset("T3");

    await rejectsWith(wrapper.recoverToken(OWNER, "T3"), "NOTHING_TO_RECOVER");
    await rejectsWith(wrapper.recoverToken(OWNER, "T9"), "UNKNOWN_ASSET");
    await rejectsWith(wrapper.recoverToken(USER, "T3"), "UNAUTHORIZED");
  });

  it("can drain basket custody under the unrestricted scope", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);

    await wrapper.recoverToken(OWNER, "T1");

    const report = await wrapper.getBackingReport();
    expect(report.lines[0]).toEqual({
      token: "T1",
      weightBps: 6000,
      held: 0n,
      required: 600n,
      surplus: -600n,
    });
    expect(report.fullyBacked).toBe(false);
  });

  it("refuses basket assets under the non-basket scope", async () => {
    const { host, wrapper } = await deployConfigured({ recoveryScope: "non-basket" });
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);
    host.createAsset("T3").mint(CUSTODY, 5n);

    await rejectsWith(wrapper.recoverToken(OWNER, "T1"), "RECOVERY_FORBIDDEN");
    await expect(wrapper.recoverToken(OWNER, "T3")).resolves.toMatchObject({ amount: 5n });
  });
});

// =============================================================================
// Ownership
// =============================================================================

describe("ownership", () => {
  it("moves every administrative right to the new owner", () => {
    const { wrapper } = deploy();

    wrapper.transferOwnership(OWNER, "0xnext");

    expect(wrapper.owner).toBe("0xnext");
    throwsWith(() => wrapper.pause(OWNER), "UNAUTHORIZED");
    wrapper.pause("0xnext");
    expect(eventTypes(wrapper)).toEqual(["ownership.transferred", "wrapper.paused"]);
  });
});

// =============================================================================
// Reporting
// =============================================================================

describe("backing report", () => {
  it("exposes rounding dust retained in custody", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);
    await wrapper.burn(USER, 999n);

    const report = await wrapper.getBackingReport();

    expect(report).toEqual({
      totalSupply: 1n,
      basketVersion: 1,
      lines: [
        { token: "T1", weightBps: 6000, held: 1n, required: 0n, surplus: 1n },
        { token: "T2", weightBps: 4000, held: 1n, required: 0n, surplus: 1n },
      ],
      fullyBacked: true,
    });
  });
});

// =============================================================================
// Atomicity & reentrancy
// =============================================================================

describe("atomicity", () => {
  it("refuses a reconfiguration attempted from inside a transfer", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    host.getAsset("T1").onTransfer(async () => {
      wrapper.configureAssets(OWNER, ["T2"], [10_000]);
    });

    await rejectsWith(wrapper.mint(USER, 1000n), "REENTRANT_CALL");

    expect(wrapper.getAssets().tokens).toEqual(["T1", "T2"]);
    expect(wrapper.totalSupply).toBe(0n);
  });

  it("undoes a change whose event cannot be appended", async () => {
    const { host, store, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    const [foreign] = wrapper.events();
    if (foreign === undefined) throw new Error("expected an event");
    store.append(wrapper.streamId, [foreign.event]);

    expect(() => wrapper.setSlippageTolerance(OWNER, 50)).toThrow(EventStoreError);
    expect(wrapper.slippageToleranceBps).toBe(100);

    await expect(wrapper.mint(USER, 1000n)).rejects.toThrow(EventStoreError);
    expect(wrapper.totalSupply).toBe(0n);
    expect(host.getAsset("T1").balanceOfSync(USER)).toBe(600n);
  });
});

// =============================================================================
// Snapshot
// =============================================================================

describe("snapshot", () => {
  it("survives a JSON round trip and rebuilds the same wrapper", async () => {
    const { host, wrapper } = await deployConfigured();
    fund(host, USER, { T1: 600n, T2: 400n });
    await wrapper.mint(USER, 1000n);
    wrapper.setSlippageTolerance(OWNER, 250);
    wrapper.pause(OWNER);

    const parsed: WrapperSnapshot = JSON.parse(JSON.stringify(wrapper.snapshot()));
    const restored = WrapperToken.fromSnapshot(parsed, host);

    expect(restored.info()).toEqual(wrapper.info());
    expect(restored.balanceOf(USER)).toBe(1000n);
    expect(restored.getAssets()).toEqual(wrapper.getAssets());
    expect(restored.priceFeeds()).toEqual(wrapper.priceFeeds());
    expect(await restored.totalValue(1000n)).toBe(1400n);
  });

  it("rejects an inconsistent supply record", () => {
    const { host, wrapper } = deploy();
    const snapshot = wrapper.snapshot();

    expect(() =>
      WrapperToken.fromSnapshot(
        { ...snapshot, supply: { version: 1, totalSupply: "5", balances: [] } },
        host,
      ),
    ).toThrow("Balances sum to 0 but total supply is 5");
  });
});
