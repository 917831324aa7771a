/**
 * Collaborator Types
 *
 * Interfaces of the external systems the wrapper consults.
 * The wrapper only ever reads through these; their own lifecycle
 * (membership admin, attestation issuance, token minting) is owned elsewhere.
 *
 * Rules:
 * - Every mutating call names its caller explicitly
 * - Amounts are bigint base units
 * - Attestation payloads are opaque hex, interpreted by the policy
 */

import type { Address, Hex } from "viem";

// =============================================================================
// Underlying asset
// =============================================================================

/**
 * The fungible asset locked 1:1 behind the wrapped asset.
 *
 * Failures (insufficient balance, insufficient allowance) are thrown
 * as the implementation's own errors and propagate unchanged.
 */
export interface UnderlyingAsset {
  readonly decimals: number;

  balanceOf(account: Address): bigint;

  /** Move `amount` from `caller` to `to`. */
  transfer(caller: Address, to: Address, amount: bigint): boolean;

  /** Move `amount` from `from` to `to`, spending `caller`'s allowance. */
  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean;
}

// =============================================================================
// Allowlist
// =============================================================================

/** A membership set; the wrapper only queries it. */
export interface AllowlistStore {
  isMember(account: Address): boolean;
}

// =============================================================================
// Attestations
// =============================================================================

/** Identifier of an attestation schema (bytes32). */
export type SchemaId = Hex;

/** Unique identifier of an attestation (bytes32). */
export type AttestationUid = Hex;

/**
 * A claim about an account, as returned by the attestation authority.
 *
 * `expirationTime` and `revocationTime` are unix seconds; 0n means
 * "never expires" and "not revoked" respectively.
 */
export interface AttestationRecord {
  readonly uid: AttestationUid;
  readonly schema: SchemaId;
  readonly recipient: Address;
  readonly payload: Hex;
  readonly expirationTime: bigint;
  readonly revocationTime: bigint;
}

/** Resolves the current attestation for an (account, schema) pair. */
export interface AttestationIndexer {
  /** Returns undefined (or the zero uid) when nothing is indexed. */
  getAttestationId(account: Address, schema: SchemaId): AttestationUid | undefined;
}

/** Holds attestation records by uid. */
export interface AttestationAuthority {
  getAttestation(uid: AttestationUid): AttestationRecord | undefined;
}

// =============================================================================
// Dependency slots
// =============================================================================

/** Names of the replaceable collaborator slots. */
export const DEPENDENCY_SLOTS = [
  "allowlist",
  "attestation-authority",
  "attestation-indexer",
] as const;

export type DependencySlot = (typeof DEPENDENCY_SLOTS)[number];

/** Current address held by each slot. */
export type DependencySnapshot = Readonly<Record<DependencySlot, Address>>;
