#!/usr/bin/env node
/**
 * @wardwrap/demo — Terminal walkthrough.
 *
 * Deploys a wrapper against in-memory collaborators and walks through
 * the gate: deposit -> blocked transfer -> attestation by jurisdiction ->
 * allowed transfer -> ward recovery -> registry hygiene -> backing.
 *
 * Uses the domain packages directly (no HTTP server).
 */

import chalk from "chalk";
import type { Address } from "viem";
import { UnderlyingToken, formatAmount, parseAmount } from "@wardwrap/ledger";
import {
  InMemoryAllowlist,
  InMemoryAttestationAuthority,
  InMemoryAttestationIndexer,
  encodeJurisdictionPayload,
  encodeVerifiedPayload,
} from "@wardwrap/compliance";
import { ContractDirectory, DEFAULT_SCHEMAS, GateError, WrappedToken } from "@wardwrap/gate";

// =============================================================================
// Helpers
// =============================================================================

const DELAY_MS = 400;
const DECIMALS = 6;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     WARDWRAP DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("            Permission-gated wrapped token                ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

function ok(msg: string): void {
  console.log(chalk.green("    ✓ ") + chalk.white(msg));
}

function info(label: string, value: string): void {
  console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(18)) + chalk.white(value));
}

function rejected(msg: string): void {
  console.log(chalk.red("    ✗ ") + chalk.red(msg));
}

function warn(msg: string): void {
  console.log(chalk.yellow("    ! ") + chalk.yellow(msg));
}

function units(value: bigint): string {
  return formatAmount(value, DECIMALS);
}

function short(address: Address): string {
  return `${address.slice(0, 6)}…${address.slice(-4)}`;
}

/**
 * Run `fn`, expecting a GateError. Prints the code and returns it.
 */
function expectRejection(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    if (error instanceof GateError) {
      const who = error.account !== undefined ? ` (${short(error.account)})` : "";
      rejected(`${error.code}${who}: ${error.message}`);
      return error.code;
    }
    throw error;
  }
  warn("Call unexpectedly succeeded");
  return undefined;
}

const TOTAL_STEPS = 7;

const ACCOUNTS = {
  wrapper: "0x4444444444444444444444444444444444444444",
  underlying: "0x5555555555555555555555555555555555555555",
  deployer: "0x9999999999999999999999999999999999999999",
  lending: "0x6666666666666666666666666666666666666666",
  bundler: "0x7777777777777777777777777777777777777777",
  allowlist: "0x1010101010101010101010101010101010101010",
  authority: "0x2020202020202020202020202020202020202020",
  indexer: "0x3030303030303030303030303030303030303030",
  alice: "0x1111111111111111111111111111111111111111",
  bob: "0x2222222222222222222222222222222222222222",
  carol: "0x3333333333333333333333333333333333333333",
} as const satisfies Record<string, Address>;

// =============================================================================
// Demo
// =============================================================================

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Only eligible accounts may hold the wrapped token."));
  console.log(chalk.gray("  Every step uses the real domain packages.\n"));

  await sleep(DELAY_MS);

  // ─── Step 1: Deploy ─────────────────────────────────────────────────

  stepHeader(1, TOTAL_STEPS, "Deploy");

  const directory = new ContractDirectory();
  const underlying = directory.deploy(
    ACCOUNTS.underlying,
    new UnderlyingToken({ name: "USD Coin", symbol: "USDC", decimals: DECIMALS, owner: ACCOUNTS.deployer }),
  );
  const allowlist = directory.deploy(ACCOUNTS.allowlist, new InMemoryAllowlist());
  const authority = directory.deploy(ACCOUNTS.authority, new InMemoryAttestationAuthority());
  const indexer = directory.deploy(ACCOUNTS.indexer, new InMemoryAttestationIndexer());

  const token = directory.deploy(
    ACCOUNTS.wrapper,
    new WrappedToken({
      address: ACCOUNTS.wrapper,
      name: "Verified USD Coin",
      symbol: "verUSDC",
      underlying,
      deployer: ACCOUNTS.deployer,
      lendingProtocol: ACCOUNTS.lending,
      bundler: ACCOUNTS.bundler,
      dependencies: {
        allowlist: ACCOUNTS.allowlist,
        "attestation-authority": ACCOUNTS.authority,
        "attestation-indexer": ACCOUNTS.indexer,
      },
      directory,
    }),
  );

  const events: string[] = [];
  token.events.subscribe((event) => {
    events.push(`#${event.metadata.sequence} ${event.type}`);
  });

  ok(`${token.symbol} deployed at ${short(token.address)} over ${underlying.symbol}`);
  info("ward", short(ACCOUNTS.deployer));
  info("exempt", `${short(ACCOUNTS.lending)}, ${short(ACCOUNTS.bundler)}`);

  await sleep(DELAY_MS);

  // ─── Step 2: Deposit ────────────────────────────────────────────────

  stepHeader(2, TOTAL_STEPS, "Allowlisted deposit");

  const hundred = parseAmount("100", DECIMALS);
  allowlist.add(ACCOUNTS.alice);
  underlying.mint(ACCOUNTS.deployer, ACCOUNTS.alice, hundred);
  underlying.approve(ACCOUNTS.alice, token.address, hundred);
  token.depositFor(ACCOUNTS.alice, ACCOUNTS.alice, hundred);

  ok(`alice wrapped ${units(hundred)} ${underlying.symbol}`);
  info("alice balance", units(token.balanceOf(ACCOUNTS.alice)));
  info("eligible via", token.explain(ACCOUNTS.alice) ?? "none");

  await sleep(DELAY_MS);

  // ─── Step 3: Blocked transfer ───────────────────────────────────────

  stepHeader(3, TOTAL_STEPS, "Transfer to an ineligible account");

  expectRejection(() => token.transfer(ACCOUNTS.alice, ACCOUNTS.bob, parseAmount("50", DECIMALS)));
  info("alice balance", units(token.balanceOf(ACCOUNTS.alice)));
  info("bob balance", units(token.balanceOf(ACCOUNTS.bob)));

  await sleep(DELAY_MS);

  // ─── Step 4: Attestations ───────────────────────────────────────────

  stepHeader(4, TOTAL_STEPS, "Attestation by jurisdiction");

  const attest = (account: Address, country: string): void => {
    for (const [schema, payload] of [
      [DEFAULT_SCHEMAS.verifiedAccount, encodeVerifiedPayload(true)],
      [DEFAULT_SCHEMAS.verifiedCountry, encodeJurisdictionPayload(country)],
    ] as const) {
      const uid = authority.attest({ schema, recipient: account, payload });
      indexer.index(account, schema, uid);
    }
  };

  attest(ACCOUNTS.bob, "FR");
  attest(ACCOUNTS.carol, "US");
  info("bob (FR)", token.isEligible(ACCOUNTS.bob) ? chalk.green("eligible") : chalk.red("not eligible"));
  info("carol (US)", token.isEligible(ACCOUNTS.carol) ? chalk.green("eligible") : chalk.red("not eligible"));

  token.transfer(ACCOUNTS.alice, ACCOUNTS.bob, parseAmount("50", DECIMALS));
  ok("alice → bob 50 now succeeds");
  expectRejection(() => token.transfer(ACCOUNTS.bob, ACCOUNTS.carol, parseAmount("10", DECIMALS)));

  await sleep(DELAY_MS);

  // ─── Step 5: Recovery ───────────────────────────────────────────────

  stepHeader(5, TOTAL_STEPS, "Ward recovery");

  allowlist.remove(ACCOUNTS.alice);
  info("alice eligible", String(token.isEligible(ACCOUNTS.alice)));
  const supplyBefore = token.totalSupply();
  const recovered = token.recover(ACCOUNTS.deployer, ACCOUNTS.alice);
  ok(`recovered ${units(recovered)} from alice`);
  info("alice wrapped", units(token.balanceOf(ACCOUNTS.alice)));
  info("alice underlying", units(underlying.balanceOf(ACCOUNTS.alice)));
  info("supply", `${units(supplyBefore)} → ${units(token.totalSupply())}`);

  await sleep(DELAY_MS);

  // ─── Step 6: Registry ───────────────────────────────────────────────

  stepHeader(6, TOTAL_STEPS, "Dependency registry");

  expectRejection(() => token.setDependency(ACCOUNTS.deployer, "bogus", ACCOUNTS.carol));
  expectRejection(() => token.setDependency(ACCOUNTS.bob, "allowlist", ACCOUNTS.carol));
  info("allowlist slot", short(token.getDependency("allowlist")));

  await sleep(DELAY_MS);

  // ─── Step 7: Summary ────────────────────────────────────────────────

  stepHeader(7, TOTAL_STEPS, "Summary");

  const backing = token.backing();
  console.log();
  console.log(chalk.white("    Total supply:        ") + chalk.cyan.bold(units(backing.totalSupply)));
  console.log(chalk.white("    Custody balance:     ") + chalk.cyan.bold(units(backing.custodyBalance)));
  console.log(
    chalk.white("    Backing:             ") +
      (backing.balanced ? chalk.green.bold("1:1") : chalk.red.bold("DRIFT")),
  );
  console.log(chalk.white("    Events:              ") + chalk.cyan.bold(String(events.length)));
  for (const line of events) {
    console.log(chalk.gray("      ") + chalk.dim(line));
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
