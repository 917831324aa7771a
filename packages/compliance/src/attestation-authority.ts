/**
 * In-memory attestation authority.
 *
 * Issues and revokes attestation records keyed by a content-derived uid.
 * Records are never deleted; revocation stamps `revocationTime`.
 */

import { encodeAbiParameters, keccak256 } from "viem";
import type { AttestationAuthority, AttestationRecord, AttestationUid } from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";
import type { Clock } from "./clock.js";
import { systemClock } from "./clock.js";
import type { AttestInput } from "./types.js";
import { ComplianceError } from "./types.js";

const UID_PARAMS = [
  { type: "bytes32" },
  { type: "address" },
  { type: "bytes" },
  { type: "uint64" },
] as const;

export class InMemoryAttestationAuthority implements AttestationAuthority {
  private readonly _records = new Map<AttestationUid, AttestationRecord>();
  private _nonce = 0n;

  constructor(private readonly clock: Clock = systemClock) {}

  /**
   * Issue a new attestation and return its uid.
   */
  attest(input: AttestInput): AttestationUid {
    const recipient = normalizeAddress(input.recipient);
    this._nonce += 1n;

    const uid = keccak256(
      encodeAbiParameters(UID_PARAMS, [input.schema, recipient, input.payload, this._nonce]),
    );

    this._records.set(uid, {
      uid,
      schema: input.schema,
      recipient,
      payload: input.payload,
      expirationTime: input.expirationTime ?? 0n,
      revocationTime: 0n,
    });

    return uid;
  }

  /**
   * Revoke an attestation at the current clock time.
   */
  revoke(uid: AttestationUid): AttestationRecord {
    const record = this._records.get(uid);
    if (record === undefined) {
      throw new ComplianceError("ATTESTATION_NOT_FOUND", `Attestation '${uid}' not found`);
    }
    if (record.revocationTime !== 0n) {
      throw new ComplianceError("ALREADY_REVOKED", `Attestation '${uid}' is already revoked`);
    }

    const now = this.clock();
    const revoked: AttestationRecord = { ...record, revocationTime: now > 0n ? now : 1n };
    this._records.set(uid, revoked);
    return revoked;
  }

  getAttestation(uid: AttestationUid): AttestationRecord | undefined {
    return this._records.get(uid);
  }

  get size(): number {
    return this._records.size;
  }
}
