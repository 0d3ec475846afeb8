/**
 * AccessControl & PauseSwitch.
 *
 * A single owner authorizes every administrative operation; each
 * gated operation checks explicitly at its entry point. The pause
 * flag gates mint and burn only.
 */

import type { Address } from "@basketwrap/types";
import { WrapperError } from "./errors.js";

// =============================================================================
// AccessControl
// =============================================================================

export class AccessControl {
  private _owner: Address;

  constructor(owner: Address) {
    assertAddress(owner, "Owner");
    this._owner = owner;
  }

  get owner(): Address {
    return this._owner;
  }

  isOwner(caller: Address): boolean {
    return caller === this._owner;
  }

  assertOwner(caller: Address, action: string): void {
    if (!this.isOwner(caller)) {
      throw new WrapperError("UNAUTHORIZED", `${caller} is not allowed to ${action}`);
    }
  }

  /**
   * Hand the administrative role to `newOwner`.
   * @returns the previous owner
   */
  transferOwnership(caller: Address, newOwner: Address): Address {
    this.assertOwner(caller, "transfer ownership");
    assertAddress(newOwner, "New owner");
    const previous = this._owner;
    this._owner = newOwner;
    return previous;
  }
}

// =============================================================================
// PauseSwitch
// =============================================================================

export class PauseSwitch {
  private _paused: boolean;

  constructor(paused = false) {
    this._paused = paused;
  }

  get paused(): boolean {
    return this._paused;
  }

  pause(): void {
    if (this._paused) {
      throw new WrapperError("PAUSED", "Wrapper is already paused");
    }
    this._paused = true;
  }

  unpause(): void {
    if (!this._paused) {
      throw new WrapperError("NOT_PAUSED", "Wrapper is not paused");
    }
    this._paused = false;
  }

  assertNotPaused(operation: string): void {
    if (this._paused) {
      throw new WrapperError("PAUSED", `Cannot ${operation} while paused`);
    }
  }
}

export function assertAddress(address: Address, label: string): void {
  if (address.length === 0) {
    throw new WrapperError("INVALID_ADDRESS", `${label} must be a non-empty address`);
  }
}
