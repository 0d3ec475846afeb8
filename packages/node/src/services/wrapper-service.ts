/**
 * WrapperService - composition root for one wrapper deployment.
 *
 * Route handlers delegate to this service; they never touch the wrapper
 * packages directly. The service owns the in-process asset host (the
 * sandbox), the event store and the WrapperToken, and serializes every
 * state-changing operation: one runs at a time, in arrival order. Reads
 * are not queued.
 */

import type { Logger } from "pino";
import type { Address, Basket, BasketComposition, TokenId } from "@basketwrap/types";
import { InMemoryAssetHost } from "@basketwrap/asset-host";
import { InMemoryEventStore } from "@basketwrap/event-store";
import type { IntegrityReport, StoredEvent } from "@basketwrap/event-store";
import { WrapperToken } from "@basketwrap/wrapper";
import type {
  BackingReport,
  MintBurnReceipt,
  MintPreview,
  PriceFeedBinding,
  RecoveryReceipt,
  RecoveryScope,
  Valuation,
  WrapperInfo,
} from "@basketwrap/wrapper";

// =============================================================================
// Configuration
// =============================================================================

export interface WrapperServiceConfig {
  readonly name: string;
  readonly symbol: string;
  readonly owner: Address;
  readonly custody: Address;
  readonly slippageToleranceBps?: number | undefined;
  readonly recoveryScope?: RecoveryScope | undefined;
  readonly logger: Logger;
  /** Initial host clock in unix seconds. Defaults to wall-clock time. */
  readonly now?: number | undefined;
}

export interface SandboxAsset {
  readonly token: TokenId;
  readonly decimals: number;
}

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return "INTERNAL_ERROR";
}

// =============================================================================
// Service
// =============================================================================

export class WrapperService {
  readonly host: InMemoryAssetHost;
  readonly eventStore: InMemoryEventStore;
  readonly wrapper: WrapperToken;

  private readonly _logger: Logger;
  private _tail: Promise<void> = Promise.resolve();

  constructor(config: WrapperServiceConfig) {
    this._logger = config.logger.child({ wrapper: config.symbol });
    this.host = new InMemoryAssetHost({ now: config.now ?? Math.floor(Date.now() / 1000) });
    this.eventStore = new InMemoryEventStore();
    this.wrapper = new WrapperToken(
      {
        name: config.name,
        symbol: config.symbol,
        owner: config.owner,
        custody: config.custody,
        slippageToleranceBps: config.slippageToleranceBps,
        recoveryScope: config.recoveryScope,
      },
      this.host,
      this.eventStore,
    );
  }

  // ─── Mint / Burn ───────────────────────────────────────────────────

  mint(caller: Address, amount: bigint, maxValue?: bigint): Promise<MintBurnReceipt> {
    return this._serialize("mint", caller, () => this.wrapper.mint(caller, amount, maxValue));
  }

  burn(caller: Address, amount: bigint, minValue?: bigint): Promise<MintBurnReceipt> {
    return this._serialize("burn", caller, () => this.wrapper.burn(caller, amount, minValue));
  }

  // ─── Administration ────────────────────────────────────────────────

  configureBasket(
    caller: Address,
    tokens: readonly TokenId[],
    weights: readonly number[],
  ): Promise<Basket> {
    return this._serialize("configureAssets", caller, () =>
      this.wrapper.configureAssets(caller, tokens, weights),
    );
  }

  configurePriceFeed(caller: Address, token: TokenId, feed: string): Promise<PriceFeedBinding> {
    return this._serialize("configurePriceFeed", caller, () =>
      this.wrapper.configurePriceFeed(caller, token, feed),
    );
  }

  removePriceFeed(caller: Address, token: TokenId): Promise<PriceFeedBinding> {
    return this._serialize("removePriceFeed", caller, () =>
      this.wrapper.removePriceFeed(caller, token),
    );
  }

  setSlippageTolerance(caller: Address, bps: number): Promise<void> {
    return this._serialize("setSlippageTolerance", caller, () =>
      this.wrapper.setSlippageTolerance(caller, bps),
    );
  }

  pause(caller: Address): Promise<void> {
    return this._serialize("pause", caller, () => this.wrapper.pause(caller));
  }

  unpause(caller: Address): Promise<void> {
    return this._serialize("unpause", caller, () => this.wrapper.unpause(caller));
  }

  recoverToken(caller: Address, token: TokenId): Promise<RecoveryReceipt> {
    return this._serialize("recoverToken", caller, () => this.wrapper.recoverToken(caller, token));
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<void> {
    return this._serialize("transferOwnership", caller, () =>
      this.wrapper.transferOwnership(caller, newOwner),
    );
  }

  // ─── Reads ─────────────────────────────────────────────────────────

  info(): WrapperInfo {
    return this.wrapper.info();
  }

  assets(): BasketComposition {
    return this.wrapper.getAssets();
  }

  previewMint(amount: bigint): MintPreview {
    return this.wrapper.calculateMintAmounts(amount);
  }

  valuation(amount: bigint): Promise<Valuation> {
    return this.wrapper.valuation(amount);
  }

  priceFeeds(): readonly PriceFeedBinding[] {
    return this.wrapper.priceFeeds();
  }

  balanceOf(holder: Address): bigint {
    return this.wrapper.balanceOf(holder);
  }

  backing(): Promise<BackingReport> {
    return this.wrapper.getBackingReport();
  }

  events(): readonly StoredEvent[] {
    return this.wrapper.events();
  }

  // ─── Sandbox host ──────────────────────────────────────────────────

  createAsset(caller: Address, token: TokenId, decimals: number): Promise<SandboxAsset> {
    return this._serialize("sandbox.createAsset", caller, () => {
      const asset = this.host.createAsset(token, decimals);
      return { token: asset.token, decimals: asset.decimals };
    });
  }

  faucet(caller: Address, token: TokenId, holder: Address, amount: bigint): Promise<bigint> {
    return this._serialize("sandbox.faucet", caller, () => {
      const asset = this.host.getAsset(token);
      asset.mint(holder, amount);
      return asset.balanceOfSync(holder);
    });
  }

  /** Approve the wrapper's custody to pull `amount` of `token` from `owner`. */
  approve(owner: Address, token: TokenId, amount: bigint): Promise<void> {
    return this._serialize("sandbox.approve", owner, () => {
      this.host.getAsset(token).approve(owner, this.wrapper.custody, amount);
    });
  }

  /**
   * Publish a reading to feed `handle`, creating the feed on first use.
   * `updatedAt` defaults to the host clock.
   */
  publishPrice(
    caller: Address,
    handle: string,
    decimals: number,
    answer: bigint,
    updatedAt?: number,
  ): Promise<void> {
    return this._serialize("sandbox.publishPrice", caller, () => {
      const reading = { answer, updatedAt: updatedAt ?? this.host.now() };
      if (this.host.priceFeed(handle) === undefined) {
        this.host.createPriceFeed(handle, decimals, reading);
      } else {
        this.host.getPriceFeed(handle).publish(reading.answer, reading.updatedAt);
      }
    });
  }

  advanceClock(caller: Address, seconds: number): Promise<number> {
    return this._serialize("sandbox.advanceClock", caller, () => {
      this.host.advanceTime(seconds);
      return this.host.now();
    });
  }

  sandboxBalances(holder: Address): Record<TokenId, bigint> {
    const balances: Record<TokenId, bigint> = {};
    for (const token of this.host.tokens()) {
      balances[token] = this.host.getAsset(token).balanceOfSync(holder);
    }
    return balances;
  }

  // ─── Health & Integrity ────────────────────────────────────────────

  verifyIntegrity(): IntegrityReport {
    return this.eventStore.verifyIntegrity();
  }

  /** Resolves once every queued operation has settled. */
  async drain(): Promise<void> {
    await this._tail;
  }

  // ─── Internal ──────────────────────────────────────────────────────

  /**
   * Queue `work` behind every earlier state-changing operation.
   */
  private _serialize<T>(
    operation: string,
    caller: Address,
    work: () => T | Promise<T>,
  ): Promise<T> {
    const run = this._tail.then(async () => {
      try {
        const result = await work();
        this._logger.info({ operation, caller }, `${operation} succeeded`);
        return result;
      } catch (err) {
        this._logger.warn(
          { operation, caller, code: errorCode(err), err },
          `${operation} rejected`,
        );
        throw err;
      }
    });

    // The queue advances whether `run` fulfils or rejects; the caller
    // still receives the rejection through `run`.
    this._tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
