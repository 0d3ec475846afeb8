/**
 * Tests for the in-memory host environment.
 *
 * Verifies:
 * - Transfers and allowances, including insufficient funds
 * - Failure injection and transfer hooks
 * - Price feed publishing and unavailability
 * - Clock control
 * - atomic() rollback of every asset
 */

import { describe, it, expect, beforeEach } from "vitest";
import { InMemoryAssetHost } from "../src/in-memory-host.js";
import { HostError } from "../src/types.js";
import type { TransferRequest } from "../src/types.js";

let host: InMemoryAssetHost;

beforeEach(() => {
  host = new InMemoryAssetHost({ now: 1_000_000 });
});

// =============================================================================
// Assets
// =============================================================================

describe("assets", () => {
  it("creates and resolves assets", () => {
    const usdc = host.createAsset("0xusdc", 6);

    expect(host.asset("0xusdc")).toBe(usdc);
    expect(host.asset("0xnope")).toBeUndefined();
    expect(usdc.decimals).toBe(6);
    expect(host.tokens()).toEqual(["0xusdc"]);
  });

  it("rejects duplicates and unknown lookups", () => {
    host.createAsset("0xusdc", 6);

    expect(() => host.createAsset("0xusdc", 6)).toThrow(HostError);
    expect(() => host.getAsset("0xnope")).toThrow('Asset "0xnope" does not exist');
  });

  it("moves balances with transfer", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 100n);

    expect(await asset.transfer("alice", "bob", 30n)).toBe(true);
    expect(await asset.balanceOf("alice")).toBe(70n);
    expect(await asset.balanceOf("bob")).toBe(30n);
  });

  it("returns false on insufficient balance without moving anything", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 10n);

    expect(await asset.transfer("alice", "bob", 11n)).toBe(false);
    expect(await asset.balanceOf("alice")).toBe(10n);
  });

  it("spends allowance on transferFrom", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 100n);
    asset.approve("alice", "vault", 60n);

    expect(await asset.transferFrom("vault", "alice", "vault", 50n)).toBe(true);
    expect(await asset.allowance("alice", "vault")).toBe(10n);
    expect(await asset.transferFrom("vault", "alice", "vault", 11n)).toBe(false);
    expect(await asset.balanceOf("vault")).toBe(50n);
  });

  it("rejects negative amounts", async () => {
    const asset = host.createAsset("t1");

    expect(() => asset.mint("alice", -1n)).toThrow(HostError);
    await expect(asset.transfer("alice", "bob", -1n)).rejects.toThrow(HostError);
  });
});

// =============================================================================
// Failure injection
// =============================================================================

describe("failure injection", () => {
  it("returns false in return-false mode", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 10n);
    asset.setTransferFailure("return-false");

    expect(await asset.transfer("alice", "bob", 1n)).toBe(false);
  });

  it("rejects in throw mode", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 10n);
    asset.setTransferFailure("throw");

    await expect(asset.transfer("alice", "bob", 1n)).rejects.toThrow("t1: transfers are rejected");
  });

  it("runs the transfer hook before moving balances", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 10n);
    const seen: { request: TransferRequest; balance: bigint }[] = [];

    asset.onTransfer(async (request) => {
      seen.push({ request, balance: await asset.balanceOf("bob") });
    });
    await asset.transfer("alice", "bob", 4n);

    expect(seen).toEqual([
      {
        request: { kind: "transfer", caller: "alice", from: "alice", to: "bob", amount: 4n },
        balance: 0n,
      },
    ]);
  });
});

// =============================================================================
// Price feeds
// =============================================================================

describe("price feeds", () => {
  it("serves published readings", async () => {
    const feed = host.createPriceFeed("feed-usdc", 8, { answer: 100_000_000n, updatedAt: 999_000 });

    expect(await host.priceFeed("feed-usdc")?.decimals()).toBe(8);
    expect(await feed.latestRoundData()).toEqual({ answer: 100_000_000n, updatedAt: 999_000 });

    feed.publish(99_000_000n, 1_000_000);
    expect(feed.latest).toEqual({ answer: 99_000_000n, updatedAt: 1_000_000 });
  });

  it("rejects reads with no data or while unavailable", async () => {
    const feed = host.createPriceFeed("feed", 8);

    await expect(feed.latestRoundData()).rejects.toThrow('Price feed "feed" has no readings');

    feed.publish(1n, 1);
    feed.setUnavailable(true);
    await expect(feed.latestRoundData()).rejects.toThrow('Price feed "feed" is unavailable');
  });

  it("returns undefined for unknown handles", () => {
    expect(host.priceFeed("missing")).toBeUndefined();
    expect(() => host.getPriceFeed("missing")).toThrow(HostError);
  });
});

// =============================================================================
// Clock
// =============================================================================

describe("clock", () => {
  it("sets and advances time", () => {
    host.advanceTime(3600);
    expect(host.now()).toBe(1_003_600);

    host.setTime(5);
    expect(host.now()).toBe(5);
  });

  it("rejects invalid time", () => {
    expect(() => host.setTime(-1)).toThrow(HostError);
    expect(() => host.advanceTime(1.5)).toThrow(HostError);
  });
});

// =============================================================================
// Atomic scope
// =============================================================================

describe("atomic", () => {
  it("commits effects when work resolves", async () => {
    const asset = host.createAsset("t1");
    asset.mint("alice", 10n);

    const result = await host.atomic(async () => {
      await asset.transfer("alice", "bob", 3n);
      return "ok";
    });

    expect(result).toBe("ok");
    expect(asset.balanceOfSync("bob")).toBe(3n);
  });

  it("restores every asset's balances and allowances when work rejects", async () => {
    const t1 = host.createAsset("t1");
    const t2 = host.createAsset("t2");
    t1.mint("alice", 10n);
    t2.mint("alice", 10n);
    t1.approve("alice", "vault", 10n);

    await expect(
      host.atomic(async () => {
        await t1.transferFrom("vault", "alice", "vault", 6n);
        await t2.transfer("alice", "bob", 4n);
        throw new Error("abort");
      }),
    ).rejects.toThrow("abort");

    expect(t1.balanceOfSync("alice")).toBe(10n);
    expect(t1.balanceOfSync("vault")).toBe(0n);
    expect(await t1.allowance("alice", "vault")).toBe(10n);
    expect(t2.balanceOfSync("bob")).toBe(0n);
  });
});
