/**
 * @wardwrap/gate — WrappedToken.
 *
 * A fungible token minted 1:1 against an underlying asset held in the
 * wrapper's custody account. Only eligible accounts may send or receive
 * it; eligibility is re-evaluated on every balance change.
 *
 * API surface:
 * - name / symbol / decimals / totalSupply() / balanceOf() / allowance()
 * - transfer() / approve() / transferFrom()   — Token
 * - depositFor() / withdrawTo() / backing()  — Wrap / unwrap
 * - recover()                                — Ward-only seizure
 * - rely() / deny() / isWard() / wards()     — Admin set
 * - setDependency() / dependencies()         — Registry
 * - isEligible() / explain()                 — Policy queries
 *
 * Every mutating entry point runs inside `execute()`:
 * - one call at a time (REENTRANT_CALL otherwise)
 * - the ledger is restored if anything throws
 * - events are buffered and published only after success
 */

import { zeroAddress } from "viem";
import type { Address } from "viem";
import type {
  DependencySlot,
  DependencySnapshot,
  TransferEvent,
  UnderlyingAsset,
  WrapperEventBody,
} from "@wardwrap/types";
import { LedgerError, TokenLedger, assertAmount, normalizeAddress } from "@wardwrap/ledger";
import { EligibilityPolicy } from "./eligibility.js";
import { EventLog } from "./events.js";
import { ExemptAccounts } from "./exemptions.js";
import { ReentrancyGuard } from "./reentrancy.js";
import { DependencyRegistry } from "./registry.js";
import { Wards } from "./wards.js";
import type {
  AttestationSchemas,
  BackingReport,
  EligibilitySource,
  WrappedTokenConfig,
} from "./types.js";
import { GateError } from "./types.js";

type GatedOperation = "mint" | "burn" | "transfer";

type Emit = (event: WrapperEventBody) => void;

export class WrappedToken {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly underlying: UnderlyingAsset;
  readonly exemptions: ExemptAccounts;
  readonly events: EventLog;

  private readonly ledger = new TokenLedger();
  private readonly guard = new ReentrancyGuard();
  private readonly _wards: Wards;
  private readonly registry: DependencyRegistry;
  private readonly policy: EligibilityPolicy;

  constructor(config: WrappedTokenConfig) {
    this.address = normalizeAddress(config.address);
    this.name = config.name;
    this.symbol = config.symbol;
    this.decimals = config.decimals ?? config.underlying.decimals;
    this.underlying = config.underlying;
    this.events = config.events ?? new EventLog();

    this._wards = new Wards(config.deployer);
    this.registry = new DependencyRegistry(this._wards, config.dependencies);
    this.exemptions = new ExemptAccounts({
      lendingProtocol: config.lendingProtocol,
      bundler: config.bundler,
    });
    this.policy = new EligibilityPolicy({
      exemptions: this.exemptions,
      registry: this.registry,
      directory: config.directory,
      clock: config.clock,
      schemas: config.schemas,
    });
  }

  // ─── Token queries ───────────────────────────────────────────────────

  totalSupply(): bigint {
    return this.ledger.totalSupply;
  }

  balanceOf(account: Address): bigint {
    return this.ledger.balanceOf(account);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ledger.allowance(owner, spender);
  }

  // ─── Token operations ────────────────────────────────────────────────

  transfer(caller: Address, to: Address, amount: bigint): boolean {
    return this.execute(caller, "transfer", (emit) => {
      emit(this.gated("transfer", caller, to, amount));
      return true;
    });
  }

  /** Approvals are not gated; spending them is. */
  approve(caller: Address, spender: Address, amount: bigint): boolean {
    return this.execute(caller, "approve", (emit) => {
      this.ledger.approve(caller, spender, amount);
      emit({
        type: "Approval",
        owner: normalizeAddress(caller),
        spender: normalizeAddress(spender),
        value: amount,
      });
      return true;
    });
  }

  transferFrom(caller: Address, from: Address, to: Address, amount: bigint): boolean {
    return this.execute(caller, "transferFrom", (emit) => {
      this.ledger.spendAllowance(from, caller, amount);
      emit(this.gated("transfer", from, to, amount));
      return true;
    });
  }

  // ─── Wrap / unwrap ───────────────────────────────────────────────────

  /**
   * Mint `amount` to `beneficiary` and pull the same amount of the
   * underlying from `caller` into custody. `caller` must have approved
   * the wrapper on the underlying asset.
   *
   * The gated mint precedes the pull: nothing external runs between the
   * eligibility decision and the balance change. A refused pull rolls the
   * mint back with the rest of the call.
   */
  depositFor(caller: Address, beneficiary: Address, amount: bigint): boolean {
    return this.execute(caller, "depositFor", (emit) => {
      const from = normalizeAddress(caller);
      const to = normalizeAddress(beneficiary);
      assertAmount(amount);
      if (from === this.address) {
        throw new LedgerError("INVALID_SENDER", "The custody account cannot deposit");
      }
      if (to === this.address) {
        throw new LedgerError("INVALID_RECEIVER", "Cannot deposit for the custody account");
      }

      emit(this.gated("mint", zeroAddress, to, amount));
      this.pull(from, amount);
      return true;
    });
  }

  /**
   * Burn `amount` from `caller` and release the same amount of the
   * underlying to `beneficiary`. The beneficiary need not be eligible.
   */
  withdrawTo(caller: Address, beneficiary: Address, amount: bigint): boolean {
    return this.execute(caller, "withdrawTo", (emit) => {
      const to = normalizeAddress(beneficiary);
      if (to === this.address) {
        throw new LedgerError("INVALID_RECEIVER", "Cannot withdraw to the custody account");
      }

      emit(this.gated("burn", caller, zeroAddress, amount));
      this.release(to, amount);
      return true;
    });
  }

  /**
   * Supply against custody. Equal in every state the wrapper's own
   * entry points can reach.
   */
  backing(): BackingReport {
    return this.guard.view(() => {
      const totalSupply = this.ledger.totalSupply;
      const custodyBalance = this.underlying.balanceOf(this.address);
      return { totalSupply, custodyBalance, balanced: totalSupply === custodyBalance };
    });
  }

  // ─── Recovery ────────────────────────────────────────────────────────

  /**
   * Burn the whole wrapped balance of `account` and hand it the same
   * amount of the underlying. Skips the eligibility check on `account`.
   * Returns the amount recovered.
   */
  recover(caller: Address, account: Address): bigint {
    return this.execute(caller, "recover", (emit) => {
      this._wards.assertWard(caller);

      const target = normalizeAddress(account);
      if (target === this.address) {
        throw new GateError(
          "INVALID_TARGET",
          "Cannot recover from the wrapper's own custody account",
          target,
        );
      }

      const amount = this.ledger.balanceOf(target);
      if (amount > 0n) {
        emit({ type: "Transfer", ...this.ledger.burn(target, amount) });
        this.release(target, amount);
      }
      emit({ type: "Recovered", account: target, amount });
      return amount;
    });
  }

  // ─── Wards ───────────────────────────────────────────────────────────

  isWard(account: Address): boolean {
    return this._wards.isWard(account);
  }

  wards(): readonly Address[] {
    return this._wards.list();
  }

  rely(caller: Address, account: Address): void {
    this.execute(caller, "rely", (emit) => {
      emit(this._wards.rely(caller, account));
    });
  }

  deny(caller: Address, account: Address): void {
    this.execute(caller, "deny", (emit) => {
      emit(this._wards.deny(caller, account));
    });
  }

  // ─── Registry ────────────────────────────────────────────────────────

  /**
   * Point a dependency slot at a new address. The address is not checked
   * against the slot's interface here; an incompatible collaborator
   * fails the next evaluation that uses it.
   */
  setDependency(caller: Address, slot: string, address: string): void {
    this.execute(caller, "setDependency", (emit) => {
      emit(this.registry.setDependency(caller, slot, address));
    });
  }

  getDependency(slot: DependencySlot): Address {
    return this.registry.getDependency(slot);
  }

  dependencies(): DependencySnapshot {
    return this.registry.snapshot();
  }

  // ─── Policy ──────────────────────────────────────────────────────────

  /** Schema ids the attestation rule looks up. */
  get schemas(): AttestationSchemas {
    return this.policy.schemas;
  }

  isEligible(account: Address): boolean {
    return this.guard.view(() => this.policy.isEligible(account));
  }

  /** The rule that makes `account` eligible, or undefined. */
  explain(account: Address): EligibilitySource | undefined {
    return this.guard.view(() => this.policy.explain(account));
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private execute<T>(caller: Address, name: string, fn: (emit: Emit) => T): T {
    const origin = normalizeAddress(caller);
    const pending: WrapperEventBody[] = [];

    const result = this.guard.run(name, () => {
      const before = this.ledger.snapshot();
      try {
        return fn((event) => {
          pending.push(event);
        });
      } catch (error) {
        this.ledger.restore(before);
        throw error;
      }
    });

    this.events.publish(pending, origin);
    return result;
  }

  /**
   * Check both parties against one evaluation scope, sender first.
   */
  private assertPermitted(from: Address, to: Address): void {
    const scope = this.policy.scope();
    for (const party of [normalizeAddress(from), normalizeAddress(to)]) {
      if (!scope.isEligible(party)) {
        throw new GateError(
          "NO_PERMISSION",
          `${party} is not permitted to hold ${this.symbol}`,
          party,
        );
      }
    }
  }

  private gated(operation: GatedOperation, from: Address, to: Address, value: bigint): TransferEvent {
    this.assertPermitted(from, to);

    switch (operation) {
      case "mint":
        return { type: "Transfer", ...this.ledger.mint(to, value) };
      case "burn":
        return { type: "Transfer", ...this.ledger.burn(from, value) };
      case "transfer":
        return { type: "Transfer", ...this.ledger.transfer(from, to, value) };
    }
  }

  private pull(from: Address, amount: bigint): void {
    if (!this.underlying.transferFrom(this.address, from, this.address, amount)) {
      throw new GateError(
        "UNDERLYING_TRANSFER_FAILED",
        `Underlying transfer of ${amount.toString()} from ${from} was refused`,
        from,
      );
    }
  }

  private release(to: Address, amount: bigint): void {
    if (!this.underlying.transfer(this.address, to, amount)) {
      throw new GateError(
        "UNDERLYING_TRANSFER_FAILED",
        `Underlying transfer of ${amount.toString()} to ${to} was refused`,
        to,
      );
    }
  }
}
