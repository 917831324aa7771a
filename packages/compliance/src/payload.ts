/**
 * Attestation payload codec.
 *
 * Payloads follow the ABI encodings used by on-chain verification
 * attestations:
 * - account verification: `abi.encode(bool)`
 * - jurisdiction: `abi.encode(string)`, i.e. a 32-byte offset word,
 *   a 32-byte length word, then the UTF-8 bytes
 *
 * The jurisdiction code is read as the two bytes right after the two
 * header words.
 */

import { bytesToString, encodeAbiParameters, hexToBytes } from "viem";
import type { Hex } from "viem";

/** Byte offset of the jurisdiction code inside its payload. */
export const JURISDICTION_CODE_OFFSET = 64;

/** Width of the jurisdiction code in bytes. */
export const JURISDICTION_CODE_LENGTH = 2;

export function encodeVerifiedPayload(verified: boolean): Hex {
  return encodeAbiParameters([{ type: "bool" }], [verified]);
}

/** The payload of a positive account verification. */
export const VERIFIED_MARKER: Hex = encodeVerifiedPayload(true);

export function encodeJurisdictionPayload(code: string): Hex {
  return encodeAbiParameters([{ type: "string" }], [code]);
}

/**
 * Read the jurisdiction code from a payload.
 * Returns undefined when the payload is too short to hold one.
 */
export function readJurisdictionCode(payload: Hex): string | undefined {
  const bytes = hexToBytes(payload);
  const end = JURISDICTION_CODE_OFFSET + JURISDICTION_CODE_LENGTH;
  if (bytes.length < end) {
    return undefined;
  }
  return bytesToString(bytes.slice(JURISDICTION_CODE_OFFSET, end));
}

/**
 * Compare two payloads byte-for-byte, ignoring hex letter case.
 */
export function payloadEquals(a: Hex, b: Hex): boolean {
  return a.toLowerCase() === b.toLowerCase();
}
