/**
 * @wardwrap/gate — Types for the permission gate.
 *
 * Rules:
 * - All types are readonly
 * - Fail-closed: a rejected call throws and changes nothing
 */

import type { Address } from "viem";
import type { DependencySnapshot, SchemaId, UnderlyingAsset } from "@wardwrap/types";
import type { Clock } from "@wardwrap/compliance";
import type { ContractDirectory } from "./directory.js";
import type { EventLog } from "./events.js";

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for gate operations. */
export type GateErrorCode =
  | "UNAUTHORIZED"
  | "UNRECOGNIZED_PARAMETER"
  | "NO_PERMISSION"
  | "MALFORMED_ATTESTATION_DATA"
  | "INVALID_TARGET"
  | "REENTRANT_CALL"
  | "INCOMPATIBLE_DEPENDENCY"
  | "INVALID_ADDRESS"
  | "UNDERLYING_TRANSFER_FAILED";

/**
 * Structured error from the gate.
 *
 * `account` is set for NO_PERMISSION (the first ineligible party)
 * and UNAUTHORIZED (the rejected caller).
 */
export class GateError extends Error {
  public readonly code: GateErrorCode;
  public readonly account: Address | undefined;

  constructor(code: GateErrorCode, message: string, account?: Address) {
    super(message);
    this.name = "GateError";
    this.code = code;
    this.account = account;
  }
}

// ─── Eligibility ─────────────────────────────────────────────────────────

/** Which rule of the policy made an account eligible. */
export type EligibilitySource = "exempt" | "allowlist" | "attestation";

/** Schema ids of the two attestations the policy reads. */
export interface AttestationSchemas {
  readonly verifiedAccount: SchemaId;
  readonly verifiedCountry: SchemaId;
}

// ─── Wrapper configuration ───────────────────────────────────────────────

export interface WrappedTokenConfig {
  /** Address of the wrapper itself; holds the underlying in custody. */
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  /** Defaults to the underlying asset's decimals. */
  readonly decimals?: number | undefined;
  readonly underlying: UnderlyingAsset;
  /** First ward. */
  readonly deployer: Address;
  /** Protocol accounts that are always eligible. */
  readonly lendingProtocol: Address;
  readonly bundler: Address;
  /** Initial address of each dependency slot. */
  readonly dependencies: DependencySnapshot;
  /** Resolves dependency addresses to collaborators. */
  readonly directory: ContractDirectory;
  readonly clock?: Clock | undefined;
  readonly schemas?: Partial<AttestationSchemas> | undefined;
  readonly events?: EventLog | undefined;
}

// ─── Reports ─────────────────────────────────────────────────────────────

/**
 * The 1:1 backing position. `totalSupply` and `custodyBalance` are equal
 * in every state reachable through the wrapper's own entry points.
 */
export interface BackingReport {
  readonly totalSupply: bigint;
  readonly custodyBalance: bigint;
  readonly balanced: boolean;
}
