/**
 * MintBurnEngine - atomic per-asset transfer sequences.
 *
 * Mint: pull floor(amount × weight / 10000) of every active asset from
 * the caller into custody, then credit `amount` wrapper units once.
 * Burn: debit the caller first, then pay each asset out of custody.
 *
 * Both run under the reentrancy guard and inside the host's atomic
 * scope. A failure anywhere reverts every asset movement (host) and
 * the supply change (checkpoint), so no partial state is observable.
 */

import type { Address, AssetAmount, AssetHost, FungibleAsset } from "@basketwrap/types";
import type { SupplyLedger } from "@basketwrap/ledger";
import type { BasketRegistry } from "./basket-registry.js";
import type { ReentrancyGuard } from "./reentrancy-guard.js";
import { WrapperError, describeError } from "./errors.js";
import type { MintBurnReceipt, TransferDirection, TransferPlan } from "./types.js";

export interface ExecutionHooks {
  /**
   * Runs inside the guarded atomic scope after planning and before the
   * first transfer. Rejecting aborts the operation; a resolved bigint is
   * reported as the receipt's `checkedValue`.
   */
  readonly before?: ((plan: TransferPlan) => Promise<bigint | undefined>) | undefined;

  /**
   * Runs inside the same scope once every effect has been applied.
   * Throwing still reverts the whole operation.
   */
  readonly after?: ((receipt: MintBurnReceipt) => void) | undefined;
}

export class MintBurnEngine {
  private readonly _registry: BasketRegistry;
  private readonly _supply: SupplyLedger;
  private readonly _host: AssetHost;
  private readonly _guard: ReentrancyGuard;
  private readonly _custody: Address;

  constructor(
    registry: BasketRegistry,
    supply: SupplyLedger,
    host: AssetHost,
    guard: ReentrancyGuard,
    custody: Address,
  ) {
    this._registry = registry;
    this._supply = supply;
    this._host = host;
    this._guard = guard;
    this._custody = custody;
  }

  // ─── Planning ───────────────────────────────────────────────────────

  /**
   * Per-asset amounts for `amount` wrapper units, without any checks
   * beyond a non-negative amount.
   */
  preview(amount: bigint): readonly AssetAmount[] {
    if (amount < 0n) {
      throw new WrapperError("INVALID_AMOUNT", `Amount must be non-negative, got ${amount.toString()}`);
    }
    return this._registry.allocate(amount);
  }

  planMint(caller: Address, amount: bigint): TransferPlan {
    this._assertRequest(caller, amount);
    return this._allocate("pull", caller, amount);
  }

  /**
   * Balance is checked before allocation: a caller without the units
   * learns that first, whatever the basket would allocate.
   */
  planBurn(caller: Address, amount: bigint): TransferPlan {
    this._assertRequest(caller, amount);
    const balance = this._supply.balanceOf(caller);
    if (balance < amount) {
      throw new WrapperError(
        "INSUFFICIENT_BALANCE",
        `${caller} holds ${balance.toString()} wrapper units, cannot burn ${amount.toString()}`,
      );
    }
    return this._allocate("payout", caller, amount);
  }

  // ─── Execution ──────────────────────────────────────────────────────

  /**
   * Pull every line from the caller, then credit the supply once.
   */
  async mint(caller: Address, amount: bigint, hooks: ExecutionHooks = {}): Promise<MintBurnReceipt> {
    return this._execute(
      "mint",
      () => this.planMint(caller, amount),
      async (plan) => {
        for (const line of plan.lines) {
          if (line.amount === 0n) continue;
          await this._pull(caller, line);
        }
        this._supply.mint(caller, amount);
      },
      hooks,
    );
  }

  /**
   * Debit the supply, then pay out every line.
   */
  async burn(caller: Address, amount: bigint, hooks: ExecutionHooks = {}): Promise<MintBurnReceipt> {
    return this._execute(
      "burn",
      () => this.planBurn(caller, amount),
      async (plan) => {
        this._supply.burn(caller, amount);
        for (const line of plan.lines) {
          if (line.amount === 0n) continue;
          await this._payout(caller, line);
        }
      },
      hooks,
    );
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _execute(
    operation: string,
    plan: () => TransferPlan,
    apply: (plan: TransferPlan) => Promise<void>,
    hooks: ExecutionHooks,
  ): Promise<MintBurnReceipt> {
    return this._guard.run(operation, () =>
      this._host.atomic(async () => {
        const planned = plan();
        const checkedValue = await hooks.before?.(planned);

        const checkpoint = this._supply.snapshot();
        try {
          await apply(planned);
          const receipt = this._receipt(planned, checkedValue);
          hooks.after?.(receipt);
          return receipt;
        } catch (err) {
          this._supply.restore(checkpoint);
          throw err;
        }
      }),
    );
  }

  private _assertRequest(caller: Address, amount: bigint): void {
    if (caller.length === 0) {
      throw new WrapperError("INVALID_ADDRESS", "Caller must be a non-empty address");
    }
    if (caller === this._custody) {
      throw new WrapperError("INVALID_ADDRESS", "Custody cannot mint or burn wrapper units");
    }
    if (amount <= 0n) {
      throw new WrapperError("INVALID_AMOUNT", `Amount must be positive, got ${amount.toString()}`);
    }
  }

  private _allocate(direction: TransferDirection, caller: Address, amount: bigint): TransferPlan {
    if (this._registry.isEmpty()) {
      throw new WrapperError("EMPTY_BASKET", "The basket has no active assets");
    }

    const weights = new Map(this._registry.getActiveAssets().map((e) => [e.token, e.weightBps]));
    const lines = this._registry.allocate(amount);
    for (const line of lines) {
      if (line.amount === 0n && (weights.get(line.token) ?? 0) > 0) {
        throw new WrapperError(
          "BELOW_GRANULARITY",
          `Amount ${amount.toString()} allocates nothing of "${line.token}"`,
        );
      }
    }

    return { direction, caller, amount, lines };
  }

  private async _pull(caller: Address, line: AssetAmount): Promise<void> {
    const asset = this._resolve(line.token);

    const allowed = await this._call(line.token, () => asset.allowance(caller, this._custody));
    if (allowed < line.amount) {
      throw new WrapperError(
        "INSUFFICIENT_ALLOWANCE",
        `${caller} approved ${allowed.toString()} of "${line.token}", ${line.amount.toString()} required`,
      );
    }

    const ok = await this._call(line.token, () =>
      asset.transferFrom(this._custody, caller, this._custody, line.amount),
    );
    if (!ok) {
      throw new WrapperError(
        "TRANSFER_FAILED",
        `Pulling ${line.amount.toString()} of "${line.token}" from ${caller} was rejected`,
      );
    }
  }

  private async _payout(caller: Address, line: AssetAmount): Promise<void> {
    const asset = this._resolve(line.token);

    const ok = await this._call(line.token, () =>
      asset.transfer(this._custody, caller, line.amount),
    );
    if (!ok) {
      throw new WrapperError(
        "TRANSFER_FAILED",
        `Paying ${line.amount.toString()} of "${line.token}" to ${caller} was rejected`,
      );
    }
  }

  private _resolve(token: string): FungibleAsset {
    const asset = this._host.asset(token);
    if (asset === undefined) {
      throw new WrapperError("UNKNOWN_ASSET", `Token "${token}" does not resolve to an asset`);
    }
    return asset;
  }

  /**
   * Await an asset call. A WrapperError raised by a callback passes
   * through unchanged; anything else becomes TRANSFER_FAILED.
   */
  private async _call<T>(token: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (err instanceof WrapperError) throw err;
      throw new WrapperError(
        "TRANSFER_FAILED",
        `Call to "${token}" failed: ${describeError(err)}`,
        { cause: err },
      );
    }
  }

  private _receipt(plan: TransferPlan, checkedValue: bigint | undefined): MintBurnReceipt {
    return {
      ...plan,
      balanceAfter: this._supply.balanceOf(plan.caller),
      totalSupplyAfter: this._supply.totalSupply,
      checkedValue,
    };
  }
}
