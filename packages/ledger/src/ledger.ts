/**
 * @wardwrap/ledger — Core TokenLedger class.
 *
 * Balance book of a fungible asset: per-account balances, a total
 * supply counter and spending allowances. Every balance change goes
 * through one primitive, `update()`, so sum(balances) == totalSupply
 * holds after every call.
 *
 * API surface:
 * - balanceOf() / totalSupply / holders() — Queries
 * - mint() / burn() / transfer() — Balance changes
 * - approve() / allowance() / spendAllowance() — Allowances
 * - snapshot() / restore() / fromSnapshot() — Persistence and rollback
 *
 * The ledger has no notion of callers or permissions. Whoever owns the
 * ledger instance decides who may call what.
 */

import { getAddress, isAddress, maxUint256, zeroAddress } from "viem";
import type { Address } from "viem";
import { assertAmount } from "./money-math.js";
import type { LedgerSnapshot, Movement } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * Normalize an address to its checksummed form.
 * Throws LedgerError on anything that is not a 20-byte hex address.
 */
export function normalizeAddress(value: string): Address {
  if (!isAddress(value, { strict: false })) {
    throw new LedgerError("INVALID_ADDRESS", `Invalid address: "${value}"`);
  }
  return getAddress(value);
}

export class TokenLedger {
  private readonly _balances = new Map<Address, bigint>();
  private readonly _allowances = new Map<Address, Map<Address, bigint>>();
  private _totalSupply = 0n;

  // ─── Queries ─────────────────────────────────────────────────────────

  get totalSupply(): bigint {
    return this._totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this._balances.get(normalizeAddress(account)) ?? 0n;
  }

  /**
   * Accounts holding a non-zero balance.
   */
  holders(): readonly Address[] {
    return [...this._balances.keys()];
  }

  allowance(owner: Address, spender: Address): bigint {
    return this._allowances.get(normalizeAddress(owner))?.get(normalizeAddress(spender)) ?? 0n;
  }

  // ─── Balance changes ─────────────────────────────────────────────────

  /**
   * Create `value` units for `to`.
   */
  mint(to: Address, value: bigint): Movement {
    if (normalizeAddress(to) === zeroAddress) {
      throw new LedgerError("INVALID_RECEIVER", "Cannot mint to the zero address");
    }
    return this.update(zeroAddress, to, value);
  }

  /**
   * Destroy `value` units held by `from`.
   */
  burn(from: Address, value: bigint): Movement {
    if (normalizeAddress(from) === zeroAddress) {
      throw new LedgerError("INVALID_SENDER", "Cannot burn from the zero address");
    }
    return this.update(from, zeroAddress, value);
  }

  /**
   * Move `value` units from `from` to `to`.
   */
  transfer(from: Address, to: Address, value: bigint): Movement {
    if (normalizeAddress(from) === zeroAddress) {
      throw new LedgerError("INVALID_SENDER", "Cannot transfer from the zero address");
    }
    if (normalizeAddress(to) === zeroAddress) {
      throw new LedgerError("INVALID_RECEIVER", "Cannot transfer to the zero address");
    }
    return this.update(from, to, value);
  }

  /**
   * The single balance primitive. The zero address on either side
   * stands for supply creation or destruction.
   *
   * Validation happens before any mutation.
   */
  update(fromRaw: Address, toRaw: Address, value: bigint): Movement {
    const from = normalizeAddress(fromRaw);
    const to = normalizeAddress(toRaw);
    assertAmount(value);

    if (from !== zeroAddress) {
      const balance = this._balances.get(from) ?? 0n;
      if (balance < value) {
        throw new LedgerError(
          "INSUFFICIENT_BALANCE",
          `Insufficient balance for ${from}: has ${balance.toString()}, needs ${value.toString()}`,
        );
      }
    } else if (this._totalSupply + value > maxUint256) {
      throw new LedgerError("INVALID_AMOUNT", "Total supply would overflow");
    }

    if (from === zeroAddress) {
      this._totalSupply += value;
    } else {
      this.setBalance(from, (this._balances.get(from) ?? 0n) - value);
    }

    if (to === zeroAddress) {
      this._totalSupply -= value;
    } else {
      this.setBalance(to, (this._balances.get(to) ?? 0n) + value);
    }

    return { from, to, value };
  }

  // ─── Allowances ──────────────────────────────────────────────────────

  approve(ownerRaw: Address, spenderRaw: Address, value: bigint): void {
    const owner = normalizeAddress(ownerRaw);
    const spender = normalizeAddress(spenderRaw);
    if (owner === zeroAddress) {
      throw new LedgerError("INVALID_APPROVER", "The zero address cannot approve");
    }
    if (spender === zeroAddress) {
      throw new LedgerError("INVALID_SPENDER", "Cannot approve the zero address");
    }
    assertAmount(value);

    let spenders = this._allowances.get(owner);
    if (spenders === undefined) {
      spenders = new Map();
      this._allowances.set(owner, spenders);
    }
    spenders.set(spender, value);
  }

  /**
   * Consume `value` of `spender`'s allowance over `owner`'s balance.
   * An allowance of maxUint256 is treated as unlimited and never decreases.
   */
  spendAllowance(owner: Address, spender: Address, value: bigint): void {
    const current = this.allowance(owner, spender);
    if (current === maxUint256) {
      return;
    }
    if (current < value) {
      throw new LedgerError(
        "INSUFFICIENT_ALLOWANCE",
        `Insufficient allowance for ${getAddress(spender)}: has ${current.toString()}, needs ${value.toString()}`,
      );
    }
    this.approve(owner, spender, current - value);
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  /**
   * Create a serializable snapshot of the ledger.
   */
  snapshot(): LedgerSnapshot {
    const allowances: (readonly [Address, Address, string])[] = [];
    for (const [owner, spenders] of this._allowances) {
      for (const [spender, value] of spenders) {
        allowances.push([owner, spender, value.toString()]);
      }
    }

    return {
      version: 1,
      totalSupply: this._totalSupply.toString(),
      balances: [...this._balances].map(([account, value]) => [account, value.toString()] as const),
      allowances,
    };
  }

  /**
   * Replace the ledger's state with a snapshot's.
   * Used to undo a call that failed half-way.
   */
  restore(snapshot: LedgerSnapshot): void {
    this._balances.clear();
    this._allowances.clear();
    this._totalSupply = BigInt(snapshot.totalSupply);

    for (const [account, value] of snapshot.balances) {
      this.setBalance(normalizeAddress(account), BigInt(value));
    }
    for (const [owner, spender, value] of snapshot.allowances) {
      this.approve(owner, spender, BigInt(value));
    }
  }

  static fromSnapshot(snapshot: LedgerSnapshot): TokenLedger {
    const ledger = new TokenLedger();
    ledger.restore(snapshot);
    return ledger;
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private setBalance(account: Address, value: bigint): void {
    if (value === 0n) {
      this._balances.delete(account);
    } else {
      this._balances.set(account, value);
    }
  }
}
