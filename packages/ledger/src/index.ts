/**
 * @wardwrap/ledger — Fungible-asset ledger primitive.
 *
 * A pure TypeScript token ledger. Enforces:
 * - sum(balances) == totalSupply after every operation
 * - No negative balances, no negative or overflowing amounts
 * - Allowances are consumed before a delegated transfer moves anything
 * - All arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - Fail-closed: invalid operations throw, never silently succeed
 * - No notion of callers or permissions; owners of a ledger decide that
 */

// Core engine
export { TokenLedger, normalizeAddress } from "./ledger.js";

// Reference underlying asset
export { UnderlyingToken } from "./underlying-token.js";
export type { UnderlyingTokenConfig } from "./underlying-token.js";

// Amount arithmetic
export { parseAmount, formatAmount, assertAmount } from "./money-math.js";

// Types
export type {
  Movement,
  LedgerErrorCode,
  LedgerSnapshot,
  TokenMetadata,
} from "./types.js";

export { LedgerError } from "./types.js";
