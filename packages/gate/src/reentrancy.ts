/**
 * Non-reentrant execution lock.
 *
 * `run()` wraps state-changing entry points and refuses to start while
 * any other call holds the lock. `view()` wraps read-only entry points:
 * it may nest inside a running call, and holds the lock when it is the
 * outermost call so collaborators cannot change state mid-read.
 */

import { GateError } from "./types.js";

export class ReentrancyGuard {
  private _entered = false;

  get entered(): boolean {
    return this._entered;
  }

  run<T>(name: string, fn: () => T): T {
    if (this._entered) {
      throw new GateError("REENTRANT_CALL", `Reentrant call to ${name}`);
    }
    return this.hold(fn);
  }

  view<T>(fn: () => T): T {
    if (this._entered) {
      return fn();
    }
    return this.hold(fn);
  }

  private hold<T>(fn: () => T): T {
    this._entered = true;
    try {
      return fn();
    } finally {
      this._entered = false;
    }
  }
}
