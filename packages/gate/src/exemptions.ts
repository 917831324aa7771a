/**
 * Exempt accounts.
 *
 * Fixed at construction: the zero address plus the lending protocol and
 * bundler integration accounts. Members are eligible whatever the
 * allowlist or attestation state.
 */

import { zeroAddress } from "viem";
import type { Address } from "viem";
import { normalizeAddress } from "@wardwrap/ledger";

export interface ExemptAccountsConfig {
  readonly lendingProtocol: Address;
  readonly bundler: Address;
}

export class ExemptAccounts {
  readonly lendingProtocol: Address;
  readonly bundler: Address;
  private readonly _members: ReadonlySet<Address>;

  constructor(config: ExemptAccountsConfig) {
    this.lendingProtocol = normalizeAddress(config.lendingProtocol);
    this.bundler = normalizeAddress(config.bundler);
    this._members = new Set([zeroAddress, this.lendingProtocol, this.bundler]);
  }

  has(account: Address): boolean {
    return this._members.has(normalizeAddress(account));
  }

  list(): readonly Address[] {
    return [...this._members];
  }
}
