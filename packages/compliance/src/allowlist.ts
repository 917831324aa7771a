/**
 * In-memory allowlist store.
 *
 * A bare membership set. Who may add or remove members is the
 * owner's business; this store does not check.
 */

import type { Address } from "viem";
import type { AllowlistStore } from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";

export class InMemoryAllowlist implements AllowlistStore {
  private readonly _members = new Set<Address>();

  constructor(initial: readonly Address[] = []) {
    for (const account of initial) {
      this.add(account);
    }
  }

  add(account: Address): void {
    this._members.add(normalizeAddress(account));
  }

  remove(account: Address): void {
    this._members.delete(normalizeAddress(account));
  }

  isMember(account: Address): boolean {
    return this._members.has(normalizeAddress(account));
  }

  members(): readonly Address[] {
    return [...this._members];
  }
}
