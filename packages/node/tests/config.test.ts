/**
 * Tests for config.ts — parseApiKeys, loadConfig, serviceConfigFrom.
 */

import { describe, it, expect } from "vitest";
import { parseApiKeys, loadConfig, serviceConfigFrom } from "../src/config.js";
import { ADDR } from "./setup.js";

const MIXED_CASE = "0x52908400098527886E0F7030069857D2E4169EE7";

// =============================================================================
// parseApiKeys
// =============================================================================

describe("parseApiKeys", () => {
  it("returns empty array for empty string", () => {
    expect(parseApiKeys("")).toEqual([]);
    expect(parseApiKeys("   ")).toEqual([]);
  });

  it("parses a single key entry", () => {
    expect(parseApiKeys(`abc123:${ADDR.alice}`)).toEqual([
      { key: "abc123", caller: ADDR.alice },
    ]);
  });

  it("parses multiple comma-separated entries and trims them", () => {
    const keys = parseApiKeys(`  k1:${ADDR.alice} , k2:${ADDR.deployer}  `);
    expect(keys).toEqual([
      { key: "k1", caller: ADDR.alice },
      { key: "k2", caller: ADDR.deployer },
    ]);
  });

  it("checksums caller addresses", () => {
    const keys = parseApiKeys(`k1:${MIXED_CASE.toLowerCase()}`);
    expect(keys[0]?.caller).toBe(MIXED_CASE);
  });

  it("throws on wrong number of parts", () => {
    expect(() => parseApiKeys("badentry")).toThrow("Invalid API_KEYS entry");
    expect(() => parseApiKeys(`a:b:${ADDR.alice}`)).toThrow("Invalid API_KEYS entry");
  });

  it("throws on empty key", () => {
    expect(() => parseApiKeys(`:${ADDR.alice}`)).toThrow("API key cannot be empty");
  });

  it("throws on a malformed caller", () => {
    expect(() => parseApiKeys("k1:0x1234")).toThrow('Invalid caller address "0x1234" in API_KEYS');
  });
});

// =============================================================================
// loadConfig
// =============================================================================

describe("loadConfig", () => {
  it("applies defaults", () => {
    const config = loadConfig({});

    expect(config.PORT).toBe(3000);
    expect(config.HOST).toBe("0.0.0.0");
    expect(config.LOG_LEVEL).toBe("info");
    expect(config.NODE_ENV).toBe("development");
    expect(config.TOKEN_SYMBOL).toBe("verUSDC");
    expect(config.TOKEN_DECIMALS).toBe(6);
    expect(config.WRAPPER_ADDRESS).toBe(ADDR.wrapper);
    expect(config.ENABLE_SANDBOX).toBe(true);
  });

  it("coerces numbers and flags", () => {
    const config = loadConfig({ PORT: "8080", TOKEN_DECIMALS: "18", ENABLE_SANDBOX: "false" });

    expect(config.PORT).toBe(8080);
    expect(config.TOKEN_DECIMALS).toBe(18);
    expect(config.ENABLE_SANDBOX).toBe(false);
  });

  it("checksums addresses", () => {
    const config = loadConfig({ DEPLOYER_ADDRESS: MIXED_CASE.toLowerCase() });
    expect(config.DEPLOYER_ADDRESS).toBe(MIXED_CASE);
  });

  it("rejects a malformed address", () => {
    expect(() => loadConfig({ WRAPPER_ADDRESS: "0xnope" })).toThrow();
  });

  it("rejects an out-of-range port", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow();
  });
});

// =============================================================================
// serviceConfigFrom
// =============================================================================

describe("serviceConfigFrom", () => {
  it("maps slots and metadata", () => {
    const service = serviceConfigFrom(loadConfig({ TOKEN_NAME: "Gated Dollar" }));

    expect(service.tokenName).toBe("Gated Dollar");
    expect(service.deployer).toBe(ADDR.deployer);
    expect(service.dependencies).toEqual({
      allowlist: ADDR.allowlist,
      "attestation-authority": ADDR.authority,
      "attestation-indexer": ADDR.indexer,
    });
  });
});
