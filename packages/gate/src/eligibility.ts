/**
 * Eligibility policy — who may hold, send or receive the wrapped asset.
 *
 * An account is eligible when the first matching rule says so:
 * 1. exempt      — zero address, lending protocol, bundler
 * 2. allowlist   — member of the allowlist store
 * 3. attestation — unexpired, unrevoked account verification equal to the
 *                  verified marker, and an unexpired, unrevoked jurisdiction
 *                  attestation whose code is not the excluded one
 *
 * Missing or invalid attestations make the attestation rule fail closed
 * (not eligible). A jurisdiction payload too short to decode is corrupt
 * upstream data and throws MALFORMED_ATTESTATION_DATA instead.
 *
 * Nothing is cached across evaluations. Within one evaluation scope the
 * dependency slots and the clock are read exactly once.
 */

import { zeroHash } from "viem";
import type { Address } from "viem";
import type {
  AllowlistStore,
  AttestationAuthority,
  AttestationIndexer,
  AttestationRecord,
  DependencySlot,
  DependencySnapshot,
  SchemaId,
} from "@wardwrap/types";
import {
  isAllowlistStore,
  isAttestationAuthority,
  isAttestationIndexer,
  isAttestationRecord,
} from "@wardwrap/types";
import { normalizeAddress } from "@wardwrap/ledger";
import {
  VERIFIED_MARKER,
  payloadEquals,
  readJurisdictionCode,
  systemClock,
} from "@wardwrap/compliance";
import type { Clock } from "@wardwrap/compliance";
import { DEFAULT_SCHEMAS, EXCLUDED_JURISDICTION } from "./constants.js";
import type { ContractDirectory } from "./directory.js";
import type { ExemptAccounts } from "./exemptions.js";
import type { DependencyRegistry } from "./registry.js";
import type { AttestationSchemas, EligibilitySource } from "./types.js";
import { GateError } from "./types.js";

// =============================================================================
// Rules
// =============================================================================

export interface EligibilityRule {
  readonly source: EligibilitySource;
  test(scope: EvaluationScope, account: Address): boolean;
}

/** Evaluated in order; the first rule that passes decides. */
export const ELIGIBILITY_RULES: readonly EligibilityRule[] = [
  { source: "exempt", test: (scope, account) => scope.exemptions.has(account) },
  { source: "allowlist", test: (scope, account) => scope.allowlist().isMember(account) },
  { source: "attestation", test: (scope, account) => scope.attested(account) },
];

// =============================================================================
// Evaluation scope
// =============================================================================

/**
 * One coherent view of the policy's inputs. Collaborators are resolved
 * lazily from the snapshot taken when the scope opened, then reused.
 */
export class EvaluationScope {
  private _allowlist: AllowlistStore | undefined;
  private _indexer: AttestationIndexer | undefined;
  private _authority: AttestationAuthority | undefined;

  constructor(
    readonly exemptions: ExemptAccounts,
    readonly dependencies: DependencySnapshot,
    readonly now: bigint,
    private readonly directory: ContractDirectory,
    private readonly schemas: AttestationSchemas,
  ) {}

  isEligible(account: Address): boolean {
    return this.explain(account) !== undefined;
  }

  explain(account: Address): EligibilitySource | undefined {
    const normalized = normalizeAddress(account);
    for (const rule of ELIGIBILITY_RULES) {
      if (rule.test(this, normalized)) {
        return rule.source;
      }
    }
    return undefined;
  }

  allowlist(): AllowlistStore {
    this._allowlist ??= this.resolve("allowlist", isAllowlistStore);
    return this._allowlist;
  }

  indexer(): AttestationIndexer {
    this._indexer ??= this.resolve("attestation-indexer", isAttestationIndexer);
    return this._indexer;
  }

  authority(): AttestationAuthority {
    this._authority ??= this.resolve("attestation-authority", isAttestationAuthority);
    return this._authority;
  }

  /**
   * The attestation rule.
   */
  attested(account: Address): boolean {
    const verified = this.validAttestation(account, this.schemas.verifiedAccount);
    if (verified === undefined) {
      return false;
    }

    const jurisdiction = this.validAttestation(account, this.schemas.verifiedCountry);
    if (jurisdiction === undefined) {
      return false;
    }

    const code = readJurisdictionCode(jurisdiction.payload);
    if (code === undefined) {
      throw new GateError(
        "MALFORMED_ATTESTATION_DATA",
        `Jurisdiction attestation ${jurisdiction.uid} for ${account} is too short to decode`,
        account,
      );
    }

    return payloadEquals(verified.payload, VERIFIED_MARKER) && code !== EXCLUDED_JURISDICTION;
  }

  /**
   * The attestation indexed for (account, schema), if it exists and is
   * neither expired nor revoked.
   */
  private validAttestation(account: Address, schema: SchemaId): AttestationRecord | undefined {
    const uid = this.indexer().getAttestationId(account, schema);
    if (uid === undefined || uid === zeroHash) {
      return undefined;
    }

    const record: unknown = this.authority().getAttestation(uid);
    if (record === undefined) {
      return undefined;
    }
    if (!isAttestationRecord(record)) {
      throw new GateError(
        "MALFORMED_ATTESTATION_DATA",
        `Attestation ${uid} for ${account} is not a well-formed record`,
        account,
      );
    }

    if (record.revocationTime !== 0n) {
      return undefined;
    }
    if (record.expirationTime !== 0n && record.expirationTime <= this.now) {
      return undefined;
    }
    return record;
  }

  private resolve<T>(slot: DependencySlot, guard: (value: unknown) => value is T): T {
    const address = this.dependencies[slot];
    const handle = this.directory.resolve(address);
    if (!guard(handle)) {
      throw new GateError(
        "INCOMPATIBLE_DEPENDENCY",
        `The ${slot} dependency at ${address} does not implement the expected interface`,
      );
    }
    return handle;
  }
}

// =============================================================================
// Policy
// =============================================================================

export interface EligibilityPolicyConfig {
  readonly exemptions: ExemptAccounts;
  readonly registry: DependencyRegistry;
  readonly directory: ContractDirectory;
  readonly clock?: Clock | undefined;
  readonly schemas?: Partial<AttestationSchemas> | undefined;
}

export class EligibilityPolicy {
  readonly schemas: AttestationSchemas;
  private readonly exemptions: ExemptAccounts;
  private readonly registry: DependencyRegistry;
  private readonly directory: ContractDirectory;
  private readonly clock: Clock;

  constructor(config: EligibilityPolicyConfig) {
    this.exemptions = config.exemptions;
    this.registry = config.registry;
    this.directory = config.directory;
    this.clock = config.clock ?? systemClock;
    this.schemas = { ...DEFAULT_SCHEMAS, ...config.schemas };
  }

  /**
   * Open a scope over the current registry snapshot and clock.
   * Use one scope for every check that makes up a single decision.
   */
  scope(): EvaluationScope {
    return new EvaluationScope(
      this.exemptions,
      this.registry.snapshot(),
      this.clock(),
      this.directory,
      this.schemas,
    );
  }

  isEligible(account: Address): boolean {
    return this.scope().isEligible(account);
  }

  explain(account: Address): EligibilitySource | undefined {
    return this.scope().explain(account);
  }
}
