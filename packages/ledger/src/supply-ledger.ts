/**
 * @basketwrap/ledger - SupplyLedger.
 *
 * Per-holder wrapper balances plus the total-supply counter.
 *
 * API surface:
 * - mint() - Credit a holder and grow the supply
 * - burn() - Debit a holder and shrink the supply
 * - balanceOf() / totalSupply / holders()
 * - verify() - Check total supply == sum of balances
 * - snapshot() / restore() / fromSnapshot() - Persistence and rollback
 *
 * Invariant: totalSupply equals the sum of all balances after every
 * public method returns. Holders whose balance reaches zero are removed.
 */

import type { HolderBalance, SupplySnapshot } from "./types.js";
import { LedgerError } from "./types.js";

const DIGITS = /^\d+$/;

export class SupplyLedger {
  private readonly _balances = new Map<string, bigint>();
  private _totalSupply = 0n;

  // ─── Queries ─────────────────────────────────────────────────────────

  balanceOf(holder: string): bigint {
    return this._balances.get(holder) ?? 0n;
  }

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  /**
   * All holders with a non-zero balance, in first-credit order.
   */
  holders(): readonly HolderBalance[] {
    return [...this._balances].map(([holder, balance]) => ({ holder, balance }));
  }

  /**
   * Recompute the sum of balances and compare it to the counter.
   */
  verify(): boolean {
    let sum = 0n;
    for (const balance of this._balances.values()) {
      sum += balance;
    }
    return sum === this._totalSupply;
  }

  // ─── Mutations ───────────────────────────────────────────────────────

  mint(holder: string, amount: bigint): void {
    this._assertHolder(holder);
    this._assertPositive(amount);

    this._balances.set(holder, this.balanceOf(holder) + amount);
    this._totalSupply += amount;
  }

  burn(holder: string, amount: bigint): void {
    this._assertHolder(holder);
    this._assertPositive(amount);

    const balance = this.balanceOf(holder);
    if (balance < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Holder "${holder}" has ${balance.toString()}, cannot burn ${amount.toString()}`,
      );
    }

    const remaining = balance - amount;
    if (remaining === 0n) {
      this._balances.delete(holder);
    } else {
      this._balances.set(holder, remaining);
    }
    this._totalSupply -= amount;
  }

  // ─── Snapshot (Persistence and Rollback) ─────────────────────────────

  snapshot(): SupplySnapshot {
    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances: this.holders().map(({ holder, balance }) => ({
        holder,
        balance: balance.toString(),
      })),
    };
  }

  /**
   * Replace all state with a snapshot. Validates before touching anything,
   * so a rejected snapshot leaves the ledger as it was.
   */
  restore(snapshot: SupplySnapshot): void {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported supply snapshot version: ${String(snapshot.version)}`,
      );
    }
    if (!DIGITS.test(snapshot.totalSupply)) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Invalid total supply "${snapshot.totalSupply}"`,
      );
    }

    const balances = new Map<string, bigint>();
    let sum = 0n;
    for (const { holder, balance } of snapshot.balances) {
      if (holder.length === 0 || balances.has(holder)) {
        throw new LedgerError("INVALID_SNAPSHOT", `Invalid or duplicate holder "${holder}"`);
      }
      if (!DIGITS.test(balance) || BigInt(balance) === 0n) {
        throw new LedgerError(
          "INVALID_SNAPSHOT",
          `Invalid balance "${balance}" for holder "${holder}"`,
        );
      }
      balances.set(holder, BigInt(balance));
      sum += BigInt(balance);
    }

    const total = BigInt(snapshot.totalSupply);
    if (sum !== total) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Balances sum to ${sum.toString()} but total supply is ${total.toString()}`,
      );
    }

    this._balances.clear();
    for (const [holder, balance] of balances) {
      this._balances.set(holder, balance);
    }
    this._totalSupply = total;
  }

  static fromSnapshot(snapshot: SupplySnapshot): SupplyLedger {
    const ledger = new SupplyLedger();
    ledger.restore(snapshot);
    return ledger;
  }

  // ─── Internal ────────────────────────────────────────────────────────

  private _assertHolder(holder: string): void {
    if (holder.length === 0) {
      throw new LedgerError("INVALID_HOLDER", "Holder must be a non-empty string");
    }
  }

  private _assertPositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Amount must be positive, got ${amount.toString()}`,
      );
    }
  }
}
