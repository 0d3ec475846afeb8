/**
 * BasketRegistry - owns the wrapper's basket composition.
 *
 * The basket is a versioned, frozen record. `configure` validates the
 * whole proposed composition first and only then swaps the record, so
 * a rejected proposal leaves the previous basket exactly as it was.
 */

import type {
  AssetAmount,
  AssetEntry,
  Basket,
  BasketComposition,
  TokenId,
} from "@basketwrap/types";
import { isBasket } from "@basketwrap/types";
import { BPS_DENOMINATOR, shareOfBps } from "@basketwrap/ledger";
import { WrapperError } from "./errors.js";

const GENESIS: Basket = Object.freeze({ version: 0, entries: Object.freeze([]) });

export class BasketRegistry {
  private _basket: Basket = GENESIS;
  private readonly _isKnownAsset: (token: TokenId) => boolean;

  /**
   * @param isKnownAsset - Whether a token handle resolves in the host
   */
  constructor(isKnownAsset: (token: TokenId) => boolean) {
    this._isKnownAsset = isKnownAsset;
  }

  // ─── Transition ─────────────────────────────────────────────────────

  /**
   * Replace the basket wholesale. Every new entry is active.
   */
  configure(
    tokens: readonly TokenId[],
    weights: readonly number[],
    configuredAt?: string,
  ): Basket {
    if (tokens.length !== weights.length) {
      throw new WrapperError(
        "INVALID_CONFIGURATION",
        `Got ${String(tokens.length)} tokens but ${String(weights.length)} weights`,
      );
    }
    if (tokens.length === 0) {
      throw new WrapperError("INVALID_CONFIGURATION", "A basket needs at least one asset");
    }

    const seen = new Set<TokenId>();
    for (const token of tokens) {
      if (token.length === 0) {
        throw new WrapperError("INVALID_ADDRESS", "Token handle must be non-empty");
      }
      if (seen.has(token)) {
        throw new WrapperError("DUPLICATE_ASSET", `Token "${token}" appears more than once`);
      }
      seen.add(token);
      if (!this._isKnownAsset(token)) {
        throw new WrapperError("UNKNOWN_ASSET", `Token "${token}" does not resolve to an asset`);
      }
    }

    let sum = 0;
    for (const weight of weights) {
      if (!Number.isInteger(weight) || weight < 0 || weight > BPS_DENOMINATOR) {
        throw new WrapperError(
          "INVALID_WEIGHTS",
          `Weight ${String(weight)} is not an integer between 0 and ${String(BPS_DENOMINATOR)}`,
        );
      }
      sum += weight;
    }
    if (sum !== BPS_DENOMINATOR) {
      throw new WrapperError(
        "INVALID_WEIGHTS",
        `Weights sum to ${String(sum)}, expected exactly ${String(BPS_DENOMINATOR)}`,
      );
    }

    const entries = tokens.map((token, i) =>
      Object.freeze({ token, weightBps: weights[i] ?? 0, active: true }),
    );

    this._basket = Object.freeze({
      version: this._basket.version + 1,
      entries: Object.freeze(entries),
      configuredAt,
    });
    return this._basket;
  }

  /**
   * Reinstate a previously committed basket (snapshot restore).
   */
  restore(basket: Basket): void {
    if (!isBasket(basket)) {
      throw new WrapperError("INVALID_CONFIGURATION", "Not a well-formed basket");
    }
    const active = basket.entries.filter((e) => e.active);
    const sum = active.reduce((acc, e) => acc + e.weightBps, 0);
    if (basket.version > 0 && sum !== BPS_DENOMINATOR) {
      throw new WrapperError(
        "INVALID_WEIGHTS",
        `Active weights sum to ${String(sum)}, expected exactly ${String(BPS_DENOMINATOR)}`,
      );
    }
    if (basket.version === 0 && basket.entries.length > 0) {
      throw new WrapperError("INVALID_CONFIGURATION", "Version 0 basket must be empty");
    }

    this._basket = Object.freeze({
      version: basket.version,
      entries: Object.freeze(basket.entries.map((e) => Object.freeze({ ...e }))),
      configuredAt: basket.configuredAt,
    });
  }

  // ─── Queries ────────────────────────────────────────────────────────

  current(): Basket {
    return this._basket;
  }

  get version(): number {
    return this._basket.version;
  }

  getActiveAssets(): readonly AssetEntry[] {
    return this._basket.entries.filter((e) => e.active);
  }

  /** Parallel-array view of the active entries. */
  composition(): BasketComposition {
    const active = this.getActiveAssets();
    return {
      tokens: active.map((e) => e.token),
      weights: active.map((e) => e.weightBps),
    };
  }

  isActive(token: TokenId): boolean {
    return this.getActiveAssets().some((e) => e.token === token);
  }

  isEmpty(): boolean {
    return this.getActiveAssets().length === 0;
  }

  /**
   * floor(amount × weight / 10000) for every active asset, in basket order.
   */
  allocate(amount: bigint): readonly AssetAmount[] {
    return this.getActiveAssets().map((e) => ({
      token: e.token,
      amount: shareOfBps(amount, e.weightBps),
    }));
  }
}
