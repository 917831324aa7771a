/**
 * @wardwrap/ledger — Types for the fungible-asset ledger primitive.
 *
 * Rules:
 * - Amounts are bigint base units, never negative
 * - Addresses are stored checksummed
 * - Fail-closed: invalid operations throw, never silently succeed
 */

import type { Address } from "viem";

// ─── Movements ───────────────────────────────────────────────────────────

/**
 * A single balance movement. `from` is the zero address for a mint,
 * `to` is the zero address for a burn.
 */
export interface Movement {
  readonly from: Address;
  readonly to: Address;
  readonly value: bigint;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "INSUFFICIENT_BALANCE"
  | "INSUFFICIENT_ALLOWANCE"
  | "INVALID_AMOUNT"
  | "INVALID_ADDRESS"
  | "INVALID_SENDER"
  | "INVALID_RECEIVER"
  | "INVALID_APPROVER"
  | "INVALID_SPENDER"
  | "NOT_OWNER";

/**
 * Structured error from the ledger engine.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 * Amounts are decimal strings so the snapshot survives JSON.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly totalSupply: string;
  readonly balances: readonly (readonly [Address, string])[];
  readonly allowances: readonly (readonly [Address, Address, string])[];
}

// ─── Token metadata ──────────────────────────────────────────────────────

export interface TokenMetadata {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
}
