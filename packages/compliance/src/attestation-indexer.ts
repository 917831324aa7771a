/**
 * In-memory attestation indexer.
 *
 * Points each (account, schema) pair at the attestation uid that
 * currently represents it. Indexing a new uid replaces the old pointer.
 */

import type { Address } from "viem";
import type {
  AttestationIndexer,
  AttestationRecord,
  AttestationUid,
  SchemaId,
} from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";
import { ComplianceError } from "./types.js";

function key(account: Address, schema: SchemaId): string {
  return `${normalizeAddress(account)}:${schema.toLowerCase()}`;
}

export class InMemoryAttestationIndexer implements AttestationIndexer {
  private readonly _index = new Map<string, AttestationUid>();

  /**
   * Point (account, schema) at `uid`.
   */
  index(account: Address, schema: SchemaId, uid: AttestationUid): void {
    this._index.set(key(account, schema), uid);
  }

  /**
   * Index a record under its own recipient and schema, checking it
   * matches the expected pair when one is given.
   */
  indexRecord(record: AttestationRecord, expected?: { account: Address; schema: SchemaId }): void {
    if (expected !== undefined) {
      if (normalizeAddress(expected.account) !== normalizeAddress(record.recipient)) {
        throw new ComplianceError(
          "RECIPIENT_MISMATCH",
          `Attestation '${record.uid}' is for ${record.recipient}, not ${expected.account}`,
        );
      }
      if (expected.schema.toLowerCase() !== record.schema.toLowerCase()) {
        throw new ComplianceError(
          "SCHEMA_MISMATCH",
          `Attestation '${record.uid}' has schema ${record.schema}, not ${expected.schema}`,
        );
      }
    }
    this.index(record.recipient, record.schema, record.uid);
  }

  unindex(account: Address, schema: SchemaId): void {
    this._index.delete(key(account, schema));
  }

  getAttestationId(account: Address, schema: SchemaId): AttestationUid | undefined {
    return this._index.get(key(account, schema));
  }
}
