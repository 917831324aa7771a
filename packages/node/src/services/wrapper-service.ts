/**
 * WrapperService — Composition root for the domain packages.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. The service deploys the wrapper and its reference
 * collaborators into one contract directory and converts between the
 * API's decimal strings and base units.
 */

import type { Address, Hex } from "viem";
import { UnderlyingToken, formatAmount, normalizeAddress, parseAmount } from "@wardwrap/ledger";
import {
  InMemoryAllowlist,
  InMemoryAttestationAuthority,
  InMemoryAttestationIndexer,
  encodeJurisdictionPayload,
  encodeVerifiedPayload,
} from "@wardwrap/compliance";
import type { Clock } from "@wardwrap/compliance";
import { ContractDirectory, GateError, WrappedToken } from "@wardwrap/gate";
import type { BackingReport, EligibilitySource, EventQuery } from "@wardwrap/gate";
import { isDependencySlot } from "@wardwrap/types";
import type { DependencySnapshot, WrapperEvent } from "@wardwrap/types";

// =============================================================================
// Configuration
// =============================================================================

export interface WrapperServiceConfig {
  readonly wrapperAddress: Address;
  readonly underlyingAddress: Address;
  readonly deployer: Address;
  readonly lendingProtocol: Address;
  readonly bundler: Address;
  readonly dependencies: DependencySnapshot;
  readonly tokenName: string;
  readonly tokenSymbol: string;
  readonly decimals: number;
  readonly underlyingName: string;
  readonly underlyingSymbol: string;
  readonly clock?: Clock | undefined;
}

// =============================================================================
// Views
// =============================================================================

export interface TokenInfo {
  readonly address: Address;
  readonly name: string;
  readonly symbol: string;
  readonly decimals: number;
  readonly totalSupply: string;
  readonly underlying: {
    readonly address: Address;
    readonly symbol: string;
  };
}

export interface BalanceView {
  readonly account: Address;
  readonly wrapped: string;
  readonly underlying: string;
}

export interface AllowanceView {
  readonly owner: Address;
  readonly spender: Address;
  readonly allowance: string;
}

export interface EligibilityView {
  readonly account: Address;
  readonly eligible: boolean;
  readonly source: EligibilitySource | null;
}

export interface BackingView {
  readonly totalSupply: string;
  readonly custodyBalance: string;
  readonly balanced: boolean;
}

export interface RecoveryView {
  readonly account: Address;
  readonly amount: string;
}

export interface AttestationView {
  readonly account: Hex;
  readonly country: Hex;
}

// =============================================================================
// Service
// =============================================================================

export class WrapperService {
  readonly directory: ContractDirectory;
  readonly token: WrappedToken;
  readonly underlying: UnderlyingToken;
  readonly allowlist: InMemoryAllowlist;
  readonly authority: InMemoryAttestationAuthority;
  readonly indexer: InMemoryAttestationIndexer;

  private readonly underlyingAddress: Address;

  constructor(config: WrapperServiceConfig) {
    this.directory = new ContractDirectory();
    this.underlyingAddress = normalizeAddress(config.underlyingAddress);

    this.underlying = this.directory.deploy(
      config.underlyingAddress,
      new UnderlyingToken({
        name: config.underlyingName,
        symbol: config.underlyingSymbol,
        decimals: config.decimals,
        owner: config.deployer,
      }),
    );
    this.allowlist = this.directory.deploy(
      config.dependencies.allowlist,
      new InMemoryAllowlist(),
    );
    this.authority = this.directory.deploy(
      config.dependencies["attestation-authority"],
      new InMemoryAttestationAuthority(config.clock),
    );
    this.indexer = this.directory.deploy(
      config.dependencies["attestation-indexer"],
      new InMemoryAttestationIndexer(),
    );

    this.token = this.directory.deploy(
      config.wrapperAddress,
      new WrappedToken({
        address: config.wrapperAddress,
        name: config.tokenName,
        symbol: config.tokenSymbol,
        decimals: config.decimals,
        underlying: this.underlying,
        deployer: config.deployer,
        lendingProtocol: config.lendingProtocol,
        bundler: config.bundler,
        dependencies: config.dependencies,
        directory: this.directory,
        clock: config.clock,
      }),
    );
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  tokenInfo(): TokenInfo {
    return {
      address: this.token.address,
      name: this.token.name,
      symbol: this.token.symbol,
      decimals: this.token.decimals,
      totalSupply: this.format(this.token.totalSupply()),
      underlying: { address: this.underlyingAddress, symbol: this.underlying.symbol },
    };
  }

  balance(account: string): BalanceView {
    const normalized = normalizeAddress(account);
    return {
      account: normalized,
      wrapped: this.format(this.token.balanceOf(normalized)),
      underlying: this.format(this.underlying.balanceOf(normalized)),
    };
  }

  eligibility(account: string): EligibilityView {
    const normalized = normalizeAddress(account);
    const source = this.token.explain(normalized);
    return { account: normalized, eligible: source !== undefined, source: source ?? null };
  }

  allowance(owner: string, spender: string): AllowanceView {
    const from = normalizeAddress(owner);
    const to = normalizeAddress(spender);
    return { owner: from, spender: to, allowance: this.format(this.token.allowance(from, to)) };
  }

  backing(): BackingView {
    const report: BackingReport = this.token.backing();
    return {
      totalSupply: this.format(report.totalSupply),
      custodyBalance: this.format(report.custodyBalance),
      balanced: report.balanced,
    };
  }

  events(query?: EventQuery): readonly WrapperEvent[] {
    return this.token.events.query(query);
  }

  // ─── Token operations ────────────────────────────────────────────────

  deposit(caller: Address, beneficiary: string, amount: string): void {
    this.token.depositFor(caller, normalizeAddress(beneficiary), this.parse(amount));
  }

  withdraw(caller: Address, beneficiary: string, amount: string): void {
    this.token.withdrawTo(caller, normalizeAddress(beneficiary), this.parse(amount));
  }

  transfer(caller: Address, to: string, amount: string): void {
    this.token.transfer(caller, normalizeAddress(to), this.parse(amount));
  }

  approve(caller: Address, spender: string, amount: string): void {
    this.token.approve(caller, normalizeAddress(spender), this.parse(amount));
  }

  transferFrom(caller: Address, from: string, to: string, amount: string): void {
    this.token.transferFrom(caller, normalizeAddress(from), normalizeAddress(to), this.parse(amount));
  }

  // ─── Admin ───────────────────────────────────────────────────────────

  dependencies(): DependencySnapshot {
    return this.token.dependencies();
  }

  setDependency(caller: Address, slot: string, address: string): DependencySnapshot {
    this.token.setDependency(caller, slot, address);
    return this.token.dependencies();
  }

  getDependency(slot: string): Address {
    if (!isDependencySlot(slot)) {
      throw new GateError("UNRECOGNIZED_PARAMETER", `Unrecognized dependency slot: "${slot}"`);
    }
    return this.token.getDependency(slot);
  }

  recover(caller: Address, account: string): RecoveryView {
    const target = normalizeAddress(account);
    return { account: target, amount: this.format(this.token.recover(caller, target)) };
  }

  wards(): readonly Address[] {
    return this.token.wards();
  }

  rely(caller: Address, account: string): void {
    this.token.rely(caller, normalizeAddress(account));
  }

  deny(caller: Address, account: string): void {
    this.token.deny(caller, normalizeAddress(account));
  }

  // ─── Sandbox (reference collaborators) ───────────────────────────────

  /** Mint underlying; only the underlying's owner (the deployer) may. */
  faucet(caller: Address, account: string, amount: string): void {
    this.underlying.mint(caller, normalizeAddress(account), this.parse(amount));
  }

  /** Let the wrapper pull `amount` of the caller's underlying. */
  approveUnderlying(caller: Address, amount: string): AllowanceView {
    this.underlying.approve(caller, this.token.address, this.parse(amount));
    return {
      owner: caller,
      spender: this.token.address,
      allowance: this.format(this.underlying.allowance(caller, this.token.address)),
    };
  }

  allow(account: string): void {
    this.allowlist.add(normalizeAddress(account));
  }

  disallow(account: string): void {
    this.allowlist.remove(normalizeAddress(account));
  }

  /**
   * Issue and index an account verification and a jurisdiction
   * attestation for `account`.
   */
  attest(account: string, country: string, verified: boolean, expirationTime?: bigint): AttestationView {
    const recipient = normalizeAddress(account);
    const schemas = this.token.schemas;

    const accountUid = this.authority.attest({
      schema: schemas.verifiedAccount,
      recipient,
      payload: encodeVerifiedPayload(verified),
      expirationTime,
    });
    const countryUid = this.authority.attest({
      schema: schemas.verifiedCountry,
      recipient,
      payload: encodeJurisdictionPayload(country),
      expirationTime,
    });

    this.indexer.index(recipient, schemas.verifiedAccount, accountUid);
    this.indexer.index(recipient, schemas.verifiedCountry, countryUid);
    return { account: accountUid, country: countryUid };
  }

  revokeAttestation(uid: Hex): void {
    this.authority.revoke(uid);
  }

  // ─── Private ─────────────────────────────────────────────────────────

  private parse(amount: string): bigint {
    return parseAmount(amount, this.token.decimals);
  }

  private format(value: bigint): string {
    return formatAmount(value, this.token.decimals);
  }
}
