/**
 * RecoveryPath - sweep a token balance out of custody.
 *
 * Under the "unrestricted" scope any token may be swept, basket
 * assets included. The "non-basket" scope refuses active basket assets.
 */

import type { Address, AssetHost, TokenId } from "@basketwrap/types";
import type { BasketRegistry } from "./basket-registry.js";
import { WrapperError, describeError } from "./errors.js";
import type { RecoveryReceipt, RecoveryScope } from "./types.js";

export class RecoveryPath {
  private readonly _host: AssetHost;
  private readonly _registry: BasketRegistry;
  private readonly _custody: Address;
  readonly scope: RecoveryScope;

  constructor(host: AssetHost, registry: BasketRegistry, custody: Address, scope: RecoveryScope) {
    this._host = host;
    this._registry = registry;
    this._custody = custody;
    this.scope = scope;
  }

  /**
   * Move custody's entire balance of `token` to `to`. `onSwept` runs
   * inside the atomic scope; throwing from it reverts the sweep.
   */
  async sweep(
    token: TokenId,
    to: Address,
    onSwept?: (receipt: RecoveryReceipt) => void,
  ): Promise<RecoveryReceipt> {
    if (this.scope === "non-basket" && this._registry.isActive(token)) {
      throw new WrapperError(
        "RECOVERY_FORBIDDEN",
        `"${token}" is an active basket asset and cannot be recovered`,
      );
    }

    const asset = this._host.asset(token);
    if (asset === undefined) {
      throw new WrapperError("UNKNOWN_ASSET", `Token "${token}" does not resolve to an asset`);
    }

    return this._host.atomic(async () => {
      let amount: bigint;
      let ok: boolean;
      try {
        amount = await asset.balanceOf(this._custody);
        if (amount === 0n) {
          throw new WrapperError("NOTHING_TO_RECOVER", `Custody holds no "${token}"`);
        }
        ok = await asset.transfer(this._custody, to, amount);
      } catch (err) {
        if (err instanceof WrapperError) throw err;
        throw new WrapperError(
          "TRANSFER_FAILED",
          `Recovering "${token}" failed: ${describeError(err)}`,
          { cause: err },
        );
      }

      if (!ok) {
        throw new WrapperError("TRANSFER_FAILED", `Recovering "${token}" was rejected`);
      }
      const receipt: RecoveryReceipt = { token, to, amount };
      onSwept?.(receipt);
      return receipt;
    });
  }
}
