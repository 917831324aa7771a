/**
 * Fixed policy parameters.
 */

import type { AttestationSchemas } from "./types.js";

/**
 * Default schema ids: the verified-account and verified-country
 * attestation schemas of the Coinbase Verifications indexer on Base.
 */
export const DEFAULT_SCHEMAS: AttestationSchemas = {
  verifiedAccount: "0xf8b05c79f090979bf4a80270aba232dff11a10d9ca55c4f88de95317970f0de9",
  verifiedCountry: "0x1801901fabd0e6189356b4fb52bb0ab855276d84f7ec140839fbd1f6801ca065",
};

/** Jurisdiction code whose holders are never eligible through attestations. */
export const EXCLUDED_JURISDICTION = "US";
