/**
 * @wardwrap/compliance — Types for the reference collaborators.
 */

import type { Address, Hex } from "viem";
import type { SchemaId } from "@wardwrap/types";

// =============================================================================
// Attestation input
// =============================================================================

/** What an issuer supplies to create an attestation. */
export interface AttestInput {
  readonly schema: SchemaId;
  readonly recipient: Address;
  readonly payload: Hex;
  /** Unix seconds; omitted or 0n means the attestation never expires. */
  readonly expirationTime?: bigint | undefined;
}

// =============================================================================
// Error
// =============================================================================

export type ComplianceErrorCode =
  | "ATTESTATION_NOT_FOUND"
  | "ALREADY_REVOKED"
  | "RECIPIENT_MISMATCH"
  | "SCHEMA_MISMATCH";

export class ComplianceError extends Error {
  public readonly code: ComplianceErrorCode;
  constructor(code: ComplianceErrorCode, message: string) {
    super(message);
    this.name = "ComplianceError";
    this.code = code;
  }
}
