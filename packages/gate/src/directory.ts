/**
 * Contract directory.
 *
 * Maps addresses to the objects deployed at them. Dependency slots hold
 * addresses; the policy resolves them here at evaluation time, so nothing
 * checks what sits behind an address until it is used.
 */

import type { Address } from "viem";
import { normalizeAddress } from "@wardwrap/ledger";

export class ContractDirectory {
  private readonly _contracts = new Map<Address, object>();

  /**
   * Place `instance` at `address`, replacing whatever was there.
   */
  deploy<T extends object>(address: Address, instance: T): T {
    this._contracts.set(normalizeAddress(address), instance);
    return instance;
  }

  resolve(address: Address): unknown {
    return this._contracts.get(normalizeAddress(address));
  }
}
