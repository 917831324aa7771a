/**
 * @wardwrap/ledger — Plain fungible token.
 *
 * A permissionless ERC-20 style asset backed by a TokenLedger.
 * Serves as the underlying asset of a wrapper in tests, the demo and
 * the node service. Only the owner may mint.
 */

import { zeroAddress } from "viem";
import type { Address } from "viem";
import type { UnderlyingAsset } from "@wardwrap/types";
import { TokenLedger, normalizeAddress } from "./ledger.js";
import type { TokenMetadata } from "./types.js";
import { LedgerError } from "./types.js";

export interface UnderlyingTokenConfig extends TokenMetadata {
  /** Account allowed to mint new supply. */
  readonly owner: Address;
}

export class UnderlyingToken implements UnderlyingAsset {
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly owner: Address;
  private readonly ledger = new TokenLedger();

  constructor(config: UnderlyingTokenConfig) {
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals;
    this.owner = normalizeAddress(config.owner);
  }

  get totalSupply(): bigint {
    return this.ledger.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(owner, spender);
  }

  mint(caller: Address, to: Address, amount: bigint): boolean {
    if (normalizeAddress(caller) !== this.owner) {
      throw new LedgerError("NOT_OWNER", `${caller} is not the owner of ${this.symbol}`);
    }
    this.ledger.mint(to, amount);
    return true;
  }

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    this.ledger.transfer(caller, to, amount);
    return true;
  }

  approve(caller: Address, spender: Address, amount: bigint): boolean {
    this.ledger.approve(caller, spender, amount);
    return true;
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    // A rejected transfer must leave the allowance untouched.
    if (normalizeAddress(to) === zeroAddress) {
      throw new LedgerError("INVALID_RECEIVER", "Cannot transfer to the zero address");
    }
    if (this.ledger.balanceOf(from) < amount) {
      throw new LedgerError(
        "INSUFFICIENT_BALANCE",
        `Insufficient balance for ${normalizeAddress(from)}: has ${this.ledger.balanceOf(from).toString()}, needs ${amount.toString()}`,
      );
    }
    this.ledger.spendAllowance(from, caller, amount);
    this.ledger.transfer(from, to, amount);
    return true;
  }
}
