/**
 * @wardwrap/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress } from "viem";
import type { Address } from "viem";
import { z } from "zod";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";

// =============================================================================
// Schema
// =============================================================================

const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "Expected a 20-byte hex address",
  })
  .transform((value): Address => getAddress(value));

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Deployment
  WRAPPER_ADDRESS: AddressSchema.default("0x4444444444444444444444444444444444444444"),
  UNDERLYING_ADDRESS: AddressSchema.default("0x5555555555555555555555555555555555555555"),
  DEPLOYER_ADDRESS: AddressSchema.default("0x9999999999999999999999999999999999999999"),
  LENDING_PROTOCOL_ADDRESS: AddressSchema.default("0x6666666666666666666666666666666666666666"),
  BUNDLER_ADDRESS: AddressSchema.default("0x7777777777777777777777777777777777777777"),

  // Dependency slots
  ALLOWLIST_ADDRESS: AddressSchema.default("0x1010101010101010101010101010101010101010"),
  ATTESTATION_AUTHORITY_ADDRESS: AddressSchema.default("0x2020202020202020202020202020202020202020"),
  ATTESTATION_INDEXER_ADDRESS: AddressSchema.default("0x3030303030303030303030303030303030303030"),

  // Token metadata
  TOKEN_NAME: z.string().min(1).default("Verified USD Coin"),
  TOKEN_SYMBOL: z.string().min(1).default("verUSDC"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(18).default(6),
  UNDERLYING_NAME: z.string().min(1).default("USD Coin"),
  UNDERLYING_SYMBOL: z.string().min(1).default("USDC"),

  // Reference collaborators over HTTP
  ENABLE_SANDBOX: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

export interface ParsedApiKey {
  readonly key: string;
  /** The caller address requests with this key act as. */
  readonly caller: Address;
}

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ParsedApiKey[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ParsedApiKey[] = [];

  for (const entry of raw.split(",")) {
    const parts = entry.trim().split(":");
    const [key, address] = parts;
    if (parts.length !== 2 || key === undefined || address === undefined) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }

    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(address, { strict: false })) {
      throw new Error(`Invalid caller address "${address}" in API_KEYS`);
    }

    keys.push({ key, caller: getAddress(address) });
  }

  return keys;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if required env vars are missing or invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * Map validated config onto the service's deployment parameters.
 */
export function serviceConfigFrom(config: AppConfig): WrapperServiceConfig {
  return {
    wrapperAddress: config.WRAPPER_ADDRESS,
    underlyingAddress: config.UNDERLYING_ADDRESS,
    deployer: config.DEPLOYER_ADDRESS,
    lendingProtocol: config.LENDING_PROTOCOL_ADDRESS,
    bundler: config.BUNDLER_ADDRESS,
    dependencies: {
      allowlist: config.ALLOWLIST_ADDRESS,
      "attestation-authority": config.ATTESTATION_AUTHORITY_ADDRESS,
      "attestation-indexer": config.ATTESTATION_INDEXER_ADDRESS,
    },
    tokenName: config.TOKEN_NAME,
    tokenSymbol: config.TOKEN_SYMBOL,
    decimals: config.TOKEN_DECIMALS,
    underlyingName: config.UNDERLYING_NAME,
    underlyingSymbol: config.UNDERLYING_SYMBOL,
  };
}
