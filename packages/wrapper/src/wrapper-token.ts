/**
 * WrapperToken - basket-backed wrapper top-level coordinator.
 *
 * Composes:
 * - BasketRegistry (composition)
 * - PriceOracleAdapter + SlippageGuard (valuation bounds)
 * - MintBurnEngine (atomic transfer sequences over SupplyLedger)
 * - AccessControl, PauseSwitch, RecoveryPath (administration)
 *
 * Every state-changing operation runs under one ReentrancyGuard and
 * records exactly one domain event on success. Events are appended
 * inside the operation, so a rejected append undoes the change.
 */

import { randomUUID } from "node:crypto";
import type {
  Address,
  AssetHost,
  Basket,
  BasketComposition,
  DomainEvent,
  TokenId,
} from "@basketwrap/types";
import { isBasket } from "@basketwrap/types";
import type { HolderBalance } from "@basketwrap/ledger";
import { SupplyLedger, shareOfBps } from "@basketwrap/ledger";
import type { EventStore, ReadOptions, StoredEvent } from "@basketwrap/event-store";
import { BasketRegistry } from "./basket-registry.js";
import { PriceOracleAdapter } from "./price-oracle.js";
import { SlippageGuard, DEFAULT_SLIPPAGE_TOLERANCE_BPS } from "./slippage-guard.js";
import { MintBurnEngine } from "./mint-burn-engine.js";
import { AccessControl, PauseSwitch, assertAddress } from "./access-control.js";
import { RecoveryPath } from "./recovery.js";
import { ReentrancyGuard } from "./reentrancy-guard.js";
import { WrapperError, describeError } from "./errors.js";
import { EVENT_SOURCES, WRAPPER_EVENTS } from "./events.js";
import type { WrapperEventPayloads, WrapperEventType } from "./events.js";
import type {
  BackingLine,
  BackingReport,
  MintBurnReceipt,
  MintPreview,
  PriceFeedBinding,
  RecoveryReceipt,
  RecoveryScope,
  Valuation,
  WrapperConfig,
  WrapperInfo,
  WrapperSnapshot,
} from "./types.js";

// =============================================================================
// WrapperToken
// =============================================================================

export class WrapperToken {
  readonly name: string;
  readonly symbol: string;
  readonly custody: Address;
  readonly streamId: string;

  private readonly _host: AssetHost;
  private readonly _eventStore: EventStore | undefined;
  private _streamVersion: number;

  private readonly _guard = new ReentrancyGuard();
  private readonly _supply: SupplyLedger;
  private readonly _registry: BasketRegistry;
  private readonly _oracle: PriceOracleAdapter;
  private readonly _slippage: SlippageGuard;
  private readonly _engine: MintBurnEngine;
  private readonly _access: AccessControl;
  private readonly _pause: PauseSwitch;
  private readonly _recovery: RecoveryPath;

  constructor(config: WrapperConfig, host: AssetHost, eventStore?: EventStore) {
    if (config.name.trim().length === 0 || config.symbol.trim().length === 0) {
      throw new WrapperError("INVALID_CONFIGURATION", "Wrapper name and symbol must be non-empty");
    }
    assertAddress(config.custody, "Custody");

    this.name = config.name;
    this.symbol = config.symbol;
    this.custody = config.custody;
    this.streamId = `wrapper:${config.symbol}`;

    this._host = host;
    this._eventStore = eventStore;
    this._streamVersion = eventStore?.streamVersion(this.streamId) ?? 0;

    this._supply = new SupplyLedger();
    this._registry = new BasketRegistry((token) => host.asset(token) !== undefined);
    this._oracle = new PriceOracleAdapter(host, this._registry);
    this._slippage = new SlippageGuard(
      this._oracle,
      config.slippageToleranceBps ?? DEFAULT_SLIPPAGE_TOLERANCE_BPS,
    );
    this._engine = new MintBurnEngine(this._registry, this._supply, host, this._guard, config.custody);
    this._access = new AccessControl(config.owner);
    this._pause = new PauseSwitch();
    this._recovery = new RecoveryPath(
      host,
      this._registry,
      config.custody,
      config.recoveryScope ?? "unrestricted",
    );
  }

  // ───────────────────────────────────────────────────────────────────────
  // Basket
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Replace the basket. Owner only.
   */
  configureAssets(caller: Address, tokens: readonly TokenId[], weights: readonly number[]): Basket {
    return this._guard.runSync("configureAssets", () => {
      this._access.assertOwner(caller, "configure the basket");

      const previous = this._registry.current();
      const basket = this._registry.configure(tokens, weights, this._timestamp());

      this._commit(
        () => this._registry.restore(previous),
        WRAPPER_EVENTS.BASKET_CONFIGURED,
        caller,
        {
          version: basket.version,
          tokens: basket.entries.map((e) => e.token),
          weights: basket.entries.map((e) => e.weightBps),
        },
      );
      return basket;
    });
  }

  getAssets(): BasketComposition {
    return this._registry.composition();
  }

  basket(): Basket {
    return this._registry.current();
  }

  /**
   * Per-asset amounts a mint of `amount` would pull. No side effects.
   */
  calculateMintAmounts(amount: bigint): MintPreview {
    const lines = this._engine.preview(amount);
    return {
      tokens: lines.map((l) => l.token),
      amounts: lines.map((l) => l.amount),
    };
  }

  // ───────────────────────────────────────────────────────────────────────
  // Mint / Burn
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Mint `amount` wrapper units to `caller`, pulling the basket from it.
   * With `maxValue`, the basket value is bounded by the slippage guard.
   */
  async mint(caller: Address, amount: bigint, maxValue?: bigint): Promise<MintBurnReceipt> {
    this._pause.assertNotPaused("mint");

    return this._engine.mint(caller, amount, {
      before:
        maxValue === undefined
          ? undefined
          : (plan) => this._slippage.checkMint(plan.amount, maxValue),
      after: (receipt) =>
        this._append(WRAPPER_EVENTS.MINTED, caller, {
          holder: caller,
          amount: amount.toString(),
          pulled: receipt.lines.map((l) => ({ token: l.token, amount: l.amount.toString() })),
          ...(maxValue !== undefined ? { maxValue: maxValue.toString() } : {}),
          ...(receipt.checkedValue !== undefined
            ? { checkedValue: receipt.checkedValue.toString() }
            : {}),
        }),
    });
  }

  /**
   * Burn `amount` of `caller`'s wrapper units, paying the basket out.
   * With `minValue`, the basket value is bounded by the slippage guard.
   */
  async burn(caller: Address, amount: bigint, minValue?: bigint): Promise<MintBurnReceipt> {
    this._pause.assertNotPaused("burn");

    return this._engine.burn(caller, amount, {
      before:
        minValue === undefined
          ? undefined
          : (plan) => this._slippage.checkBurn(plan.amount, minValue),
      after: (receipt) =>
        this._append(WRAPPER_EVENTS.BURNED, caller, {
          holder: caller,
          amount: amount.toString(),
          paidOut: receipt.lines.map((l) => ({ token: l.token, amount: l.amount.toString() })),
          ...(minValue !== undefined ? { minValue: minValue.toString() } : {}),
          ...(receipt.checkedValue !== undefined
            ? { checkedValue: receipt.checkedValue.toString() }
            : {}),
        }),
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Pricing
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Bind `token` to a price feed. Owner only.
   */
  async configurePriceFeed(caller: Address, token: TokenId, feed: string): Promise<PriceFeedBinding> {
    return this._guard.run("configurePriceFeed", async () => {
      this._access.assertOwner(caller, "configure price feeds");

      const previous = this._oracle.binding(token);
      const binding = await this._oracle.bind(token, feed);

      this._commit(
        () => {
          if (previous === undefined) this._oracle.clear(token);
          else this._oracle.restoreBinding(previous);
        },
        WRAPPER_EVENTS.PRICE_FEED_CONFIGURED,
        caller,
        { token, feed, decimals: binding.decimals },
      );
      return binding;
    });
  }

  /**
   * Deactivate the price feed for `token`. Owner only.
   */
  removePriceFeed(caller: Address, token: TokenId): PriceFeedBinding {
    return this._guard.runSync("removePriceFeed", () => {
      this._access.assertOwner(caller, "remove price feeds");

      const binding = this._oracle.unbind(token);
      this._commit(
        () => this._oracle.restoreBinding({ ...binding, active: true }),
        WRAPPER_EVENTS.PRICE_FEED_REMOVED,
        caller,
        { token, feed: binding.feed },
      );
      return binding;
    });
  }

  priceFeeds(): readonly PriceFeedBinding[] {
    return this._oracle.bindings();
  }

  async price(token: TokenId): Promise<bigint> {
    return this._oracle.price(token);
  }

  async totalValue(amount: bigint): Promise<bigint> {
    return this._oracle.totalValue(this._assertNonNegative(amount));
  }

  async valuation(amount: bigint): Promise<Valuation> {
    return this._oracle.valuation(this._assertNonNegative(amount));
  }

  // ───────────────────────────────────────────────────────────────────────
  // Administration
  // ───────────────────────────────────────────────────────────────────────

  setSlippageTolerance(caller: Address, bps: number): void {
    this._guard.runSync("setSlippageTolerance", () => {
      this._access.assertOwner(caller, "set the slippage tolerance");

      const previousBps = this._slippage.toleranceBps;
      this._slippage.setTolerance(bps);
      this._commit(
        () => this._slippage.setTolerance(previousBps),
        WRAPPER_EVENTS.SLIPPAGE_TOLERANCE_UPDATED,
        caller,
        { previousBps, bps },
      );
    });
  }

  pause(caller: Address): void {
    this._guard.runSync("pause", () => {
      this._access.assertOwner(caller, "pause");
      this._pause.pause();
      this._commit(() => this._pause.unpause(), WRAPPER_EVENTS.PAUSED, caller, {});
    });
  }

  unpause(caller: Address): void {
    this._guard.runSync("unpause", () => {
      this._access.assertOwner(caller, "unpause");
      this._pause.unpause();
      this._commit(() => this._pause.pause(), WRAPPER_EVENTS.UNPAUSED, caller, {});
    });
  }

  /**
   * Sweep custody's whole balance of `token` to the owner. Owner only,
   * and available while paused.
   */
  async recoverToken(caller: Address, token: TokenId): Promise<RecoveryReceipt> {
    return this._guard.run("recoverToken", async () => {
      this._access.assertOwner(caller, "recover tokens");

      return this._recovery.sweep(token, this._access.owner, (receipt) =>
        this._append(WRAPPER_EVENTS.TOKEN_RECOVERED, caller, {
          token: receipt.token,
          to: receipt.to,
          amount: receipt.amount.toString(),
        }),
      );
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this._guard.runSync("transferOwnership", () => {
      const previousOwner = this._access.transferOwnership(caller, newOwner);
      this._commit(
        () => this._access.transferOwnership(newOwner, previousOwner),
        WRAPPER_EVENTS.OWNERSHIP_TRANSFERRED,
        caller,
        { previousOwner, newOwner },
      );
    });
  }

  // ───────────────────────────────────────────────────────────────────────
  // Reads
  // ───────────────────────────────────────────────────────────────────────

  balanceOf(holder: Address): bigint {
    return this._supply.balanceOf(holder);
  }

  get totalSupply(): bigint {
    return this._supply.totalSupply;
  }

  holders(): readonly HolderBalance[] {
    return this._supply.holders();
  }

  get owner(): Address {
    return this._access.owner;
  }

  get paused(): boolean {
    return this._pause.paused;
  }

  get slippageToleranceBps(): number {
    return this._slippage.toleranceBps;
  }

  get recoveryScope(): RecoveryScope {
    return this._recovery.scope;
  }

  info(): WrapperInfo {
    return {
      name: this.name,
      symbol: this.symbol,
      owner: this._access.owner,
      custody: this.custody,
      totalSupply: this._supply.totalSupply,
      paused: this._pause.paused,
      slippageToleranceBps: this._slippage.toleranceBps,
      recoveryScope: this._recovery.scope,
      basketVersion: this._registry.version,
    };
  }

  /**
   * Custody held against what the current supply requires, per asset.
   * A positive surplus is retained rounding dust (or stray transfers).
   */
  async getBackingReport(): Promise<BackingReport> {
    const totalSupply = this._supply.totalSupply;
    const lines: BackingLine[] = [];

    for (const entry of this._registry.getActiveAssets()) {
      const asset = this._host.asset(entry.token);
      if (asset === undefined) {
        throw new WrapperError("UNKNOWN_ASSET", `Token "${entry.token}" does not resolve to an asset`);
      }

      let held: bigint;
      try {
        held = await asset.balanceOf(this.custody);
      } catch (err) {
        throw new WrapperError(
          "TRANSFER_FAILED",
          `Balance query on "${entry.token}" failed: ${describeError(err)}`,
          { cause: err },
        );
      }

      const required = shareOfBps(totalSupply, entry.weightBps);
      lines.push({
        token: entry.token,
        weightBps: entry.weightBps,
        held,
        required,
        surplus: held - required,
      });
    }

    return {
      totalSupply,
      basketVersion: this._registry.version,
      lines,
      fullyBacked: lines.every((l) => l.surplus >= 0n),
    };
  }

  /** This wrapper's event history (empty without an event store). */
  events(options?: ReadOptions): readonly StoredEvent[] {
    if (this._eventStore === undefined || !this._eventStore.streamExists(this.streamId)) {
      return [];
    }
    return this._eventStore.read(this.streamId, options);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Snapshot (persistence)
  // ───────────────────────────────────────────────────────────────────────

  snapshot(): WrapperSnapshot {
    return {
      version: 1,
      name: this.name,
      symbol: this.symbol,
      owner: this._access.owner,
      custody: this.custody,
      paused: this._pause.paused,
      slippageToleranceBps: this._slippage.toleranceBps,
      recoveryScope: this._recovery.scope,
      basket: this._registry.current(),
      supply: this._supply.snapshot(),
      priceFeeds: this._oracle.bindings(),
      savedAt: this._timestamp(),
    };
  }

  /**
   * Rebuild a wrapper from a snapshot against `host`.
   */
  static fromSnapshot(
    snapshot: WrapperSnapshot,
    host: AssetHost,
    eventStore?: EventStore,
  ): WrapperToken {
    if (snapshot.version !== 1) {
      throw new WrapperError(
        "INVALID_CONFIGURATION",
        `Unsupported wrapper snapshot version: ${String(snapshot.version)}`,
      );
    }
    if (!isBasket(snapshot.basket)) {
      throw new WrapperError("INVALID_CONFIGURATION", "Snapshot basket is malformed");
    }

    const wrapper = new WrapperToken(
      {
        name: snapshot.name,
        symbol: snapshot.symbol,
        owner: snapshot.owner,
        custody: snapshot.custody,
        slippageToleranceBps: snapshot.slippageToleranceBps,
        recoveryScope: snapshot.recoveryScope,
      },
      host,
      eventStore,
    );

    wrapper._registry.restore(snapshot.basket);
    wrapper._supply.restore(snapshot.supply);
    for (const binding of snapshot.priceFeeds) {
      wrapper._oracle.restoreBinding(binding);
    }
    if (snapshot.paused) {
      wrapper._pause.pause();
    }
    return wrapper;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Internal
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Append the event for a change already applied; undo the change if
   * the append fails.
   */
  private _commit<T extends WrapperEventType>(
    rollback: () => void,
    type: T,
    actor: Address,
    payload: WrapperEventPayloads[T],
  ): void {
    try {
      this._append(type, actor, payload);
    } catch (err) {
      rollback();
      throw err;
    }
  }

  private _append<T extends WrapperEventType>(
    type: T,
    actor: Address,
    payload: WrapperEventPayloads[T],
  ): void {
    if (this._eventStore === undefined) return;

    const event: DomainEvent = {
      type,
      metadata: {
        eventId: randomUUID(),
        timestamp: this._timestamp(),
        actor,
        correlationId: randomUUID(),
        source: EVENT_SOURCES[type],
      },
      payload,
    };

    const result = this._eventStore.append(this.streamId, [event], {
      expectedVersion: this._streamVersion === 0 ? "no_stream" : this._streamVersion,
    });
    this._streamVersion = result.lastVersion;
  }

  private _timestamp(): string {
    return new Date(this._host.now() * 1000).toISOString();
  }

  private _assertNonNegative(amount: bigint): bigint {
    if (amount < 0n) {
      throw new WrapperError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
    }
    return amount;
  }
}
