/**
 * @wardwrap/ledger — Deterministic amount arithmetic.
 *
 * All amounts are bigint base units. Display strings are converted
 * to/from base units via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts fit in a uint256
 * - Amounts are never negative
 */

import { maxUint256 } from "viem";
import { LedgerError } from "./types.js";

/**
 * Parse a decimal string into base units.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=6 → 100000000n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  const trimmed = amount.trim();

  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const parts = trimmed.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but the token allows ${String(decimals)}`,
    );
  }

  const value = BigInt(intPart + fracPart.padEnd(decimals, "0"));
  assertAmount(value);
  return value;
}

/**
 * Convert base units back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 100000000n with decimals=6 → "100.000000"
 */
export function formatAmount(value: bigint, decimals: number): string {
  if (decimals === 0) {
    return value.toString();
  }

  const str = value.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  return `${intPart}.${fracPart}`;
}

/**
 * Assert that a value is a valid uint256 amount.
 */
export function assertAmount(value: bigint): void {
  if (value < 0n || value > maxUint256) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount out of range: ${value.toString()}`,
    );
  }
}
