/**
 * Dependency registry.
 *
 * Three named slots (allowlist, attestation-authority,
 * attestation-indexer), each holding the address of a collaborator.
 * Only wards may replace a slot. A replacement applies to every
 * evaluation that starts after it.
 */

import { isAddress } from "viem";
import type { Address } from "viem";
import type {
  DependencyChangedEvent,
  DependencySlot,
  DependencySnapshot,
} from "@wardwrap/types";
import { isDependencySlot } from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";
import type { Wards } from "./wards.js";
import { GateError } from "./types.js";

export class DependencyRegistry {
  private _slots: DependencySnapshot;

  constructor(
    private readonly wards: Wards,
    initial: DependencySnapshot,
  ) {
    this._slots = Object.freeze({
      allowlist: normalizeAddress(initial.allowlist),
      "attestation-authority": normalizeAddress(initial["attestation-authority"]),
      "attestation-indexer": normalizeAddress(initial["attestation-indexer"]),
    });
  }

  /**
   * Replace the address held by `slot`.
   *
   * Checked in order: caller is a ward, slot is known, address is
   * well-formed. The event is returned even when the value is unchanged.
   */
  setDependency(caller: Address, slot: string, address: string): DependencyChangedEvent {
    this.wards.assertWard(caller);

    if (!isDependencySlot(slot)) {
      throw new GateError("UNRECOGNIZED_PARAMETER", `Unrecognized dependency slot: "${slot}"`);
    }
    if (!isAddress(address, { strict: false })) {
      throw new GateError("INVALID_ADDRESS", `Invalid address for ${slot}: "${address}"`);
    }

    const normalized = normalizeAddress(address);
    const next: Record<DependencySlot, Address> = { ...this._slots };
    next[slot] = normalized;
    this._slots = Object.freeze(next);
    return { type: "DependencyChanged", slot, address: normalized };
  }

  getDependency(slot: DependencySlot): Address {
    return this._slots[slot];
  }

  /**
   * The current value of every slot. The returned object is frozen and
   * never changes; later replacements produce a new snapshot.
   */
  snapshot(): DependencySnapshot {
    return this._slots;
  }
}
