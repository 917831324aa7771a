/**
 * Wards — the authorized admin set.
 *
 * Any ward may add or remove any account, including itself. Every
 * privileged entry point calls `assertWard()` before touching state.
 */

import type { Address } from "viem";
import type { DenyEvent, RelyEvent } from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";
import { GateError } from "./types.js";

export class Wards {
  private readonly _wards = new Set<Address>();

  constructor(deployer: Address) {
    this._wards.add(normalizeAddress(deployer));
  }

  isWard(account: Address): boolean {
    return this._wards.has(normalizeAddress(account));
  }

  /**
   * Throw UNAUTHORIZED unless `caller` is a ward.
   */
  assertWard(caller: Address): void {
    if (!this.isWard(caller)) {
      throw new GateError("UNAUTHORIZED", `${caller} is not authorized`, caller);
    }
  }

  /** Grant ward rights to `account`. */
  rely(caller: Address, account: Address): RelyEvent {
    this.assertWard(caller);
    const normalized = normalizeAddress(account);
    this._wards.add(normalized);
    return { type: "Rely", account: normalized };
  }

  /** Revoke ward rights from `account`. */
  deny(caller: Address, account: Address): DenyEvent {
    this.assertWard(caller);
    const normalized = normalizeAddress(account);
    this._wards.delete(normalized);
    return { type: "Deny", account: normalized };
  }

  list(): readonly Address[] {
    return [...this._wards];
  }
}
