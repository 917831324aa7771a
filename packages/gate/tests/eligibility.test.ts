/**
 * Tests for the eligibility policy.
 *
 * Covers:
 * - Rule order: exempt, allowlist, attestation
 * - Attestation path: marker, jurisdiction, expiry, revocation
 * - Fail-closed vs MALFORMED_ATTESTATION_DATA
 * - Slot resolution and INCOMPATIBLE_DEPENDENCY
 * - One snapshot per evaluation scope
 */

import { describe, it, expect, beforeEach } from "vitest";
import { zeroAddress, zeroHash } from "viem";
import type { Address } from "viem";
import type { AttestationRecord } from "@wardwrap/types";
import { ELIGIBILITY_RULES, EligibilityPolicy } from "../src/eligibility.js";
import { DependencyRegistry } from "../src/registry.js";
import { ExemptAccounts } from "../src/exemptions.js";
import { Wards } from "../src/wards.js";
import { DEFAULT_SCHEMAS } from "../src/constants.js";
import { GateError } from "../src/types.js";
import { ADDR, codeOf, createWorld } from "./world.js";
import type { World } from "./world.js";

const SPARE = "0x4040404040404040404040404040404040404040";

describe("EligibilityPolicy", () => {
  let world: World;
  let registry: DependencyRegistry;
  let policy: EligibilityPolicy;

  beforeEach(() => {
    world = createWorld();
    registry = new DependencyRegistry(new Wards(ADDR.deployer), {
      allowlist: ADDR.allowlist,
      "attestation-authority": ADDR.authority,
      "attestation-indexer": ADDR.indexer,
    });
    policy = new EligibilityPolicy({
      exemptions: new ExemptAccounts({ lendingProtocol: ADDR.lending, bundler: ADDR.bundler }),
      registry,
      directory: world.directory,
      clock: () => world.clock.now,
    });
  });

  it("evaluates rules in a fixed order", () => {
    expect(ELIGIBILITY_RULES.map((rule) => rule.source)).toEqual([
      "exempt",
      "allowlist",
      "attestation",
    ]);
  });

  it("uses the default schema ids", () => {
    expect(policy.schemas).toEqual(DEFAULT_SCHEMAS);
  });

  describe("exempt accounts", () => {
    it.each([zeroAddress, ADDR.lending, ADDR.bundler])("%s is eligible", (account) => {
      expect(policy.explain(account)).toBe("exempt");
    });

    it("wins over every other source", () => {
      world.allowlist.add(ADDR.lending);
      expect(policy.explain(ADDR.lending)).toBe("exempt");
    });
  });

  describe("allowlist", () => {
    it("members are eligible", () => {
      world.allowlist.add(ADDR.alice);
      expect(policy.isEligible(ADDR.alice)).toBe(true);
      expect(policy.explain(ADDR.alice)).toBe("allowlist");
    });

    it("removal takes effect on the next evaluation", () => {
      world.allowlist.add(ADDR.alice);
      world.allowlist.remove(ADDR.alice);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("a plain account with nothing indexed is not eligible", () => {
      expect(policy.isEligible(ADDR.bob)).toBe(false);
      expect(policy.explain(ADDR.bob)).toBeUndefined();
    });
  });

  describe("attestations", () => {
    it("a verified account in FR is eligible", () => {
      world.attest(ADDR.alice, "FR");
      expect(policy.explain(ADDR.alice)).toBe("attestation");
    });

    it("a verified account in US is not", () => {
      world.attest(ADDR.alice, "US");
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("a negative account verification is not eligible", () => {
      world.attest(ADDR.alice, "FR", { verified: false });
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("an account verification without a jurisdiction is not eligible", () => {
      world.attest(ADDR.alice, "FR");
      world.indexer.unindex(ADDR.alice, DEFAULT_SCHEMAS.verifiedCountry);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("the zero uid means nothing is indexed", () => {
      world.attest(ADDR.alice, "FR");
      world.indexer.index(ADDR.alice, DEFAULT_SCHEMAS.verifiedAccount, zeroHash);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("a uid unknown to the authority is not eligible", () => {
      world.attest(ADDR.alice, "FR");
      world.indexer.index(ADDR.alice, DEFAULT_SCHEMAS.verifiedCountry, `0x${"ab".repeat(32)}`);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("expires at the expiration time", () => {
      world.attest(ADDR.alice, "FR", { expirationTime: 2_000n });

      world.clock.now = 1_999n;
      expect(policy.isEligible(ADDR.alice)).toBe(true);

      world.clock.now = 2_000n;
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("a revoked account verification is not eligible", () => {
      const uids = world.attest(ADDR.alice, "FR");
      world.authority.revoke(uids.account);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("a revoked jurisdiction attestation is not eligible", () => {
      const uids = world.attest(ADDR.alice, "FR");
      world.authority.revoke(uids.country);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });
  });

  describe("malformed attestation data", () => {
    it("a jurisdiction payload shorter than 66 bytes throws", () => {
      world.attest(ADDR.alice, "FR", { jurisdictionPayload: `0x${"00".repeat(65)}` });

      try {
        policy.isEligible(ADDR.alice);
        expect.fail("should have thrown");
      } catch (e) {
        expect(e).toBeInstanceOf(GateError);
        expect((e as GateError).code).toBe("MALFORMED_ATTESTATION_DATA");
        expect((e as GateError).account).toBe(ADDR.alice);
      }
    });

    it("a 66-byte jurisdiction payload decodes", () => {
      const payload = `0x${"00".repeat(64)}4652` as const;
      world.attest(ADDR.alice, "FR", { jurisdictionPayload: payload });
      expect(policy.isEligible(ADDR.alice)).toBe(true);
    });

    it("is unreachable when the account verification is missing", () => {
      world.attest(ADDR.alice, "FR", { jurisdictionPayload: "0x00" });
      world.indexer.unindex(ADDR.alice, DEFAULT_SCHEMAS.verifiedAccount);
      expect(policy.isEligible(ADDR.alice)).toBe(false);
    });

    it("is unreachable for allowlisted accounts", () => {
      world.attest(ADDR.alice, "FR", { jurisdictionPayload: "0x00" });
      world.allowlist.add(ADDR.alice);
      expect(policy.isEligible(ADDR.alice)).toBe(true);
    });

    it("an authority returning something other than a record throws", () => {
      const uid = `0x${"cd".repeat(32)}` as const;
      world.directory.deploy(SPARE, { getAttestation: (): unknown => ({ uid, payload: 42 }) });
      world.indexer.index(ADDR.alice, DEFAULT_SCHEMAS.verifiedAccount, uid);
      registry.setDependency(ADDR.deployer, "attestation-authority", SPARE);

      expect(codeOf(() => policy.isEligible(ADDR.alice))).toBe("MALFORMED_ATTESTATION_DATA");
    });
  });

  describe("dependency resolution", () => {
    it("a slot pointing at nothing throws INCOMPATIBLE_DEPENDENCY", () => {
      registry.setDependency(ADDR.deployer, "allowlist", SPARE);
      expect(codeOf(() => policy.isEligible(ADDR.alice))).toBe("INCOMPATIBLE_DEPENDENCY");
    });

    it("a slot pointing at the wrong kind of collaborator throws", () => {
      registry.setDependency(ADDR.deployer, "attestation-indexer", ADDR.authority);
      expect(codeOf(() => policy.isEligible(ADDR.alice))).toBe("INCOMPATIBLE_DEPENDENCY");
    });

    it("exempt accounts never resolve a dependency", () => {
      registry.setDependency(ADDR.deployer, "allowlist", SPARE);
      expect(policy.isEligible(ADDR.bundler)).toBe(true);
    });

    it("a replacement applies to the next evaluation", () => {
      const other = world.directory.deploy(SPARE, {
        isMember: (account: Address) => account === ADDR.bob,
      });
      expect(other.isMember(ADDR.bob)).toBe(true);

      registry.setDependency(ADDR.deployer, "allowlist", SPARE);
      expect(policy.explain(ADDR.bob)).toBe("allowlist");
    });

    it("a scope keeps the slots it opened with", () => {
      world.allowlist.add(ADDR.alice);
      const scope = policy.scope();

      registry.setDependency(ADDR.deployer, "allowlist", SPARE);

      expect(scope.isEligible(ADDR.alice)).toBe(true);
      expect(codeOf(() => policy.isEligible(ADDR.alice))).toBe("INCOMPATIBLE_DEPENDENCY");
    });

    it("a scope reads the clock once", () => {
      world.attest(ADDR.alice, "FR", { expirationTime: 2_000n });
      const scope = policy.scope();

      world.clock.now = 5_000n;

      expect(scope.now).toBe(1_000n);
      expect(scope.isEligible(ADDR.alice)).toBe(true);
    });
  });

  it("accepts custom schema ids", () => {
    const custom = new EligibilityPolicy({
      exemptions: new ExemptAccounts({ lendingProtocol: ADDR.lending, bundler: ADDR.bundler }),
      registry,
      directory: world.directory,
      clock: () => world.clock.now,
      schemas: { verifiedAccount: `0x${"0a".repeat(32)}` },
    });
    world.attest(ADDR.alice, "FR");

    expect(custom.schemas.verifiedCountry).toBe(DEFAULT_SCHEMAS.verifiedCountry);
    expect(custom.isEligible(ADDR.alice)).toBe(false);
  });

  it("records read from the authority carry the recipient they were issued for", () => {
    const uids = world.attest(ADDR.alice, "FR");
    const record: AttestationRecord | undefined = world.authority.getAttestation(uids.account);
    expect(record?.recipient).toBe(ADDR.alice);
  });
});
