/**
 * @basketwrap/asset-host - InMemoryAsset.
 *
 * A fungible asset with balances and allowances held in maps.
 * Transfers report insufficient funds or allowance by resolving to
 * `false`, never by partially moving balances.
 */

import type { Address, FungibleAsset, TokenId } from "@basketwrap/types";
import type {
  AssetState,
  TransferFailureMode,
  TransferHook,
  TransferRequest,
} from "./types.js";
import { HostError } from "./types.js";

function allowanceKey(owner: Address, spender: Address): string {
  return `${owner}\u0000${spender}`;
}

export class InMemoryAsset implements FungibleAsset {
  readonly token: TokenId;
  readonly decimals: number;

  private _balances = new Map<Address, bigint>();
  private _allowances = new Map<string, bigint>();
  private _failureMode: TransferFailureMode = "none";
  private _hook: TransferHook | undefined;

  constructor(token: TokenId, decimals: number) {
    this.token = token;
    this.decimals = decimals;
  }

  // ─── FungibleAsset ──────────────────────────────────────────────────

  async balanceOf(holder: Address): Promise<bigint> {
    return this.balanceOfSync(holder);
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    return this._allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  async transfer(caller: Address, to: Address, amount: bigint): Promise<boolean> {
    return this._execute({ kind: "transfer", caller, from: caller, to, amount });
  }

  async transferFrom(
    caller: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<boolean> {
    return this._execute({ kind: "transferFrom", caller, from, to, amount });
  }

  // ─── Administration (host-side, synchronous) ────────────────────────

  balanceOfSync(holder: Address): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  /** Create `amount` new units for `holder`. */
  mint(holder: Address, amount: bigint): void {
    this._assertAddress(holder);
    this._assertAmount(amount);
    this._credit(holder, amount);
  }

  approve(owner: Address, spender: Address, amount: bigint): void {
    this._assertAddress(owner);
    this._assertAddress(spender);
    this._assertAmount(amount);
    this._allowances.set(allowanceKey(owner, spender), amount);
  }

  setTransferFailure(mode: TransferFailureMode): void {
    this._failureMode = mode;
  }

  onTransfer(hook: TransferHook | undefined): void {
    this._hook = hook;
  }

  captureState(): AssetState {
    return {
      balances: new Map(this._balances),
      allowances: new Map(this._allowances),
    };
  }

  restoreState(state: AssetState): void {
    this._balances = new Map(state.balances);
    this._allowances = new Map(state.allowances);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private async _execute(request: TransferRequest): Promise<boolean> {
    this._assertAmount(request.amount);

    if (this._hook !== undefined) {
      await this._hook(request);
    }

    if (this._failureMode === "throw") {
      throw new HostError("TRANSFER_REJECTED", `${this.token}: transfers are rejected`);
    }
    if (this._failureMode === "return-false") {
      return false;
    }

    const { caller, from, to, amount } = request;
    if (this.balanceOfSync(from) < amount) {
      return false;
    }

    if (request.kind === "transferFrom") {
      const key = allowanceKey(from, caller);
      const allowed = this._allowances.get(key) ?? 0n;
      if (allowed < amount) {
        return false;
      }
      this._allowances.set(key, allowed - amount);
    }

    this._debit(from, amount);
    this._credit(to, amount);
    return true;
  }

  private _credit(holder: Address, amount: bigint): void {
    if (amount === 0n) return;
    this._balances.set(holder, this.balanceOfSync(holder) + amount);
  }

  private _debit(holder: Address, amount: bigint): void {
    if (amount === 0n) return;
    const remaining = this.balanceOfSync(holder) - amount;
    if (remaining === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, remaining);
    }
  }

  private _assertAmount(amount: bigint): void {
    if (amount < 0n) {
      throw new HostError(
        "INVALID_AMOUNT",
        `${this.token}: amount must be non-negative, got ${amount.toString()}`,
      );
    }
  }

  private _assertAddress(address: Address): void {
    if (address.length === 0) {
      throw new HostError("INVALID_ADDRESS", `${this.token}: address must be non-empty`);
    }
  }
}
