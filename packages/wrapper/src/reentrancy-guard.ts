/**
 * ReentrancyGuard - per-instance busy flag.
 *
 * Held for the whole of a guarded operation, across every await.
 * Any guarded entry while the flag is set fails immediately; the
 * outer operation is unaffected and releases the flag when it settles.
 */

import { WrapperError } from "./errors.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    this._enter(operation);
    try {
      return await work();
    } finally {
      this._entered = false;
    }
  }

  runSync<T>(operation: string, work: () => T): T {
    this._enter(operation);
    try {
      return work();
    } finally {
      this._entered = false;
    }
  }

  private _enter(operation: string): void {
    if (this._entered) {
      throw new WrapperError(
        "REENTRANT_CALL",
        `${operation} called while another operation is in progress`,
      );
    }
    this._entered = true;
  }
}
