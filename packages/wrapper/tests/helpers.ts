/**
 * Shared fixtures for wrapper tests.
 */

import { expect } from "vitest";
import { InMemoryAssetHost } from "@basketwrap/asset-host";
import { InMemoryEventStore } from "@basketwrap/event-store";
import { WrapperToken } from "../src/wrapper-token.js";
import { WrapperError } from "../src/errors.js";
import type { WrapperErrorCode } from "../src/errors.js";
import type { WrapperConfig } from "../src/types.js";

export const NOW = 1_700_000_000;
export const OWNER = "0xowner";
export const CUSTODY = "0xwrapper";
export const USER = "0xuser";

/** 8-decimal feed answer for a whole-unit price. */
export function feedPrice(units: bigint): bigint {
  return units * 100_000_000n;
}

export interface Deployment {
  readonly host: InMemoryAssetHost;
  readonly store: InMemoryEventStore;
  readonly wrapper: WrapperToken;
}

/**
 * A wrapper over assets T1 and T2 (18 decimals) with 8-decimal feeds
 * priced at 1 and 2 units, not yet configured.
 */
export function deploy(overrides: Partial<WrapperConfig> = {}): Deployment {
  const host = new InMemoryAssetHost({ now: NOW });
  const store = new InMemoryEventStore();
  host.createAsset("T1", 18);
  host.createAsset("T2", 18);
  host.createPriceFeed("feed-T1", 8, { answer: feedPrice(1n), updatedAt: NOW });
  host.createPriceFeed("feed-T2", 8, { answer: feedPrice(2n), updatedAt: NOW });

  const wrapper = new WrapperToken(
    { name: "Test Wrapper", symbol: "TW", owner: OWNER, custody: CUSTODY, ...overrides },
    host,
    store,
  );
  return { host, store, wrapper };
}

/**
 * deploy() plus a 6000/4000 basket and both price feeds bound.
 */
export async function deployConfigured(
  overrides: Partial<WrapperConfig> = {},
): Promise<Deployment> {
  const deployment = deploy(overrides);
  deployment.wrapper.configureAssets(OWNER, ["T1", "T2"], [6000, 4000]);
  await deployment.wrapper.configurePriceFeed(OWNER, "T1", "feed-T1");
  await deployment.wrapper.configurePriceFeed(OWNER, "T2", "feed-T2");
  return deployment;
}

/** Give `holder` `amount` of each token and approve custody for it. */
export function fund(
  host: InMemoryAssetHost,
  holder: string,
  amounts: Readonly<Record<string, bigint>>,
): void {
  for (const [token, amount] of Object.entries(amounts)) {
    const asset = host.getAsset(token);
    asset.mint(holder, amount);
    asset.approve(holder, CUSTODY, amount);
  }
}

export async function rejectsWith(
  promise: Promise<unknown>,
  code: WrapperErrorCode,
): Promise<WrapperError> {
  try {
    await promise;
  } catch (err) {
    expect(err).toBeInstanceOf(WrapperError);
    if (err instanceof WrapperError) {
      expect(err.code).toBe(code);
      return err;
    }
    throw err;
  }
  throw new Error(`Expected rejection with ${code}`);
}

export function throwsWith(fn: () => unknown, code: WrapperErrorCode): WrapperError {
  try {
    fn();
  } catch (err) {
    expect(err).toBeInstanceOf(WrapperError);
    if (err instanceof WrapperError) {
      expect(err.code).toBe(code);
      return err;
    }
    throw err;
  }
  throw new Error(`Expected throw with ${code}`);
}
