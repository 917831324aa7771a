/**
 * Tests for the wrapped token routes.
 *
 * Verifies:
 * - Token metadata and balance queries
 * - Deposit / withdraw against the underlying
 * - Transfers are gated on both parties
 * - Allowances and transfer-from
 * - Input validation and domain error mapping
 */

import { describe, it, expect } from "vitest";
import {
  ADDR,
  as,
  createTestApp,
  jsonRequest,
  onboard,
  post,
} from "../setup.js";
import type { ErrorBody } from "../setup.js";

interface BalanceBody {
  data: { account: string; wrapped: string; underlying: string };
}

describe("GET /api/v1/token", () => {
  it("returns token metadata", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/token");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: unknown };
    expect(body.data).toEqual({
      address: ADDR.wrapper,
      name: "Verified USD Coin",
      symbol: "verUSDC",
      decimals: 6,
      totalSupply: "0.000000",
      underlying: { address: ADDR.underlying, symbol: "USDC" },
    });
  });

  it("does not need a caller for reads", async () => {
    const { app } = createTestApp();
    const res = await app.request(`/api/v1/balances/${ADDR.alice}`);

    expect(res.status).toBe(200);
  });
});

describe("POST /api/v1/deposit", () => {
  it("wraps underlying for an allowlisted beneficiary", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");

    const res = await app.request(`/api/v1/balances/${ADDR.alice}`);
    const body = (await res.json()) as BalanceBody;
    expect(body.data).toEqual({
      account: ADDR.alice,
      wrapped: "100.000000",
      underlying: "0.000000",
    });
  });

  it("keeps supply equal to custody", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");

    const res = await app.request("/ready");
    const body = (await res.json()) as { backing: unknown };
    expect(body.backing).toEqual({
      totalSupply: "100.000000",
      custodyBalance: "100.000000",
      balanced: true,
    });
  });

  it("rejects an ineligible beneficiary and leaves the underlying in place", async () => {
    const { app } = createTestApp();
    await app.request(post("/api/v1/sandbox/faucet", ADDR.deployer, { account: ADDR.alice, amount: "50" }));
    await app.request(post("/api/v1/sandbox/underlying/approve", ADDR.alice, { amount: "50" }));

    const res = await app.request(
      post("/api/v1/deposit", ADDR.alice, { beneficiary: ADDR.bob, amount: "50" }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "NO_PERMISSION",
      message: `${ADDR.bob} is not permitted to hold verUSDC`,
      details: { account: ADDR.bob },
    });

    const balance = await app.request(`/api/v1/balances/${ADDR.alice}`);
    expect(((await balance.json()) as BalanceBody).data.underlying).toBe("50.000000");
  });

  it("returns 422 without an underlying allowance", async () => {
    const { app } = createTestApp();
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.alice }));
    await app.request(post("/api/v1/sandbox/faucet", ADDR.deployer, { account: ADDR.alice, amount: "50" }));

    const res = await app.request(
      post("/api/v1/deposit", ADDR.alice, { beneficiary: ADDR.alice, amount: "50" }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_ALLOWANCE");
  });
});

describe("POST /api/v1/withdraw", () => {
  it("releases underlying to a beneficiary that is not eligible", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");

    const res = await app.request(
      post("/api/v1/withdraw", ADDR.alice, { beneficiary: ADDR.bob, amount: "30" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as BalanceBody;
    expect(body.data).toEqual({
      account: ADDR.alice,
      wrapped: "70.000000",
      underlying: "0.000000",
    });

    const bob = await app.request(`/api/v1/balances/${ADDR.bob}`);
    expect(((await bob.json()) as BalanceBody).data).toEqual({
      account: ADDR.bob,
      wrapped: "0.000000",
      underlying: "30.000000",
    });
  });

  it("refuses the custody account as beneficiary", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");

    const res = await app.request(
      post("/api/v1/withdraw", ADDR.alice, { beneficiary: ADDR.wrapper, amount: "1" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_RECEIVER");
  });
});

describe("POST /api/v1/transfer", () => {
  it("rejects a recipient that is not eligible", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "10" }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("NO_PERMISSION");
    expect(body.error.details).toEqual({ account: ADDR.bob });
  });

  it("moves balance once the recipient is allowlisted", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.bob }));

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "40" }),
    );

    expect(res.status).toBe(200);
    const body = (await res.json()) as BalanceBody;
    expect(body.data.wrapped).toBe("60.000000");

    const bob = await app.request(`/api/v1/balances/${ADDR.bob}`);
    expect(((await bob.json()) as BalanceBody).data.wrapped).toBe("40.000000");
  });

  it("rejects a sender removed from the allowlist", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.bob }));
    await app.request(
      jsonRequest(`/api/v1/sandbox/allowlist/${ADDR.alice}`, "DELETE", undefined, as(ADDR.deployer)),
    );

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "1" }),
    );

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.details).toEqual({ account: ADDR.alice });
  });

  it("returns 422 on insufficient balance", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.bob }));

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "200" }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_BALANCE");
  });

  it("returns 400 for a malformed amount", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "ten" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
    expect(body.error.message).toBe("Request body validation failed");
  });

  it("returns 400 for more decimals than the token has", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: ADDR.bob, amount: "1.1234567" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INVALID_AMOUNT");
  });

  it("returns 400 for a malformed recipient", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      post("/api/v1/transfer", ADDR.alice, { to: "0x12", amount: "1" }),
    );

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "INVALID_ADDRESS", message: 'Invalid address: "0x12"' });
  });

  it("returns 400 for a body that is not JSON", async () => {
    const { app } = createTestApp();

    const res = await app.request("/api/v1/transfer", {
      method: "POST",
      headers: { "Content-Type": "application/json", ...as(ADDR.alice) },
      body: "not json",
    });

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.message).toBe("Invalid JSON in request body");
  });

  it("returns 401 without X-Caller", async () => {
    const { app } = createTestApp();

    const res = await app.request(
      jsonRequest("/api/v1/transfer", "POST", { to: ADDR.bob, amount: "1" }),
    );

    expect(res.status).toBe(401);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({
      code: "UNAUTHENTICATED",
      message: "X-Caller header required",
    });
  });
});

describe("allowances", () => {
  it("lets an approved spender move an eligible balance", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.carol }));

    const approve = await app.request(
      post("/api/v1/approve", ADDR.alice, { spender: ADDR.bob, amount: "50" }),
    );
    expect(approve.status).toBe(200);
    expect(((await approve.json()) as { data: unknown }).data).toEqual({
      owner: ADDR.alice,
      spender: ADDR.bob,
      allowance: "50.000000",
    });

    // bob is only the spender; he need not be eligible
    const res = await app.request(
      post("/api/v1/transfer-from", ADDR.bob, { from: ADDR.alice, to: ADDR.carol, amount: "20" }),
    );
    expect(res.status).toBe(200);
    expect(((await res.json()) as BalanceBody).data.wrapped).toBe("80.000000");

    const allowance = await app.request(`/api/v1/allowances/${ADDR.alice}/${ADDR.bob}`);
    expect(((await allowance.json()) as { data: { allowance: string } }).data.allowance).toBe(
      "30.000000",
    );
  });

  it("returns 422 beyond the allowance", async () => {
    const { app } = createTestApp();
    await onboard(app, ADDR.alice, "100");
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.carol }));
    await app.request(post("/api/v1/approve", ADDR.alice, { spender: ADDR.bob, amount: "10" }));

    const res = await app.request(
      post("/api/v1/transfer-from", ADDR.bob, { from: ADDR.alice, to: ADDR.carol, amount: "20" }),
    );

    expect(res.status).toBe(422);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("INSUFFICIENT_ALLOWANCE");
  });
});

describe("GET /api/v1/eligibility/:account", () => {
  it("reports exempt protocol accounts", async () => {
    const { app } = createTestApp();
    const res = await app.request(`/api/v1/eligibility/${ADDR.lending}`);

    expect(((await res.json()) as { data: unknown }).data).toEqual({
      account: ADDR.lending,
      eligible: true,
      source: "exempt",
    });
  });

  it("reports allowlisted accounts", async () => {
    const { app } = createTestApp();
    await app.request(post("/api/v1/sandbox/allowlist", ADDR.deployer, { account: ADDR.alice }));

    const res = await app.request(`/api/v1/eligibility/${ADDR.alice}`);
    expect(((await res.json()) as { data: { source: string } }).data.source).toBe("allowlist");
  });

  it("reports attested accounts until the attestation expires", async () => {
    const { app, clock } = createTestApp();
    await app.request(
      post("/api/v1/sandbox/attestations", ADDR.deployer, {
        account: ADDR.carol,
        country: "DE",
        expirationTime: "2000",
      }),
    );

    const before = await app.request(`/api/v1/eligibility/${ADDR.carol}`);
    expect(((await before.json()) as { data: unknown }).data).toEqual({
      account: ADDR.carol,
      eligible: true,
      source: "attestation",
    });

    clock.now = 2_000n;
    const after = await app.request(`/api/v1/eligibility/${ADDR.carol}`);
    expect(((await after.json()) as { data: unknown }).data).toEqual({
      account: ADDR.carol,
      eligible: false,
      source: null,
    });
  });

  it("reports the excluded jurisdiction as not eligible", async () => {
    const { app } = createTestApp();
    await app.request(
      post("/api/v1/sandbox/attestations", ADDR.deployer, { account: ADDR.bob, country: "US" }),
    );

    const res = await app.request(`/api/v1/eligibility/${ADDR.bob}`);
    expect(((await res.json()) as { data: { eligible: boolean } }).data.eligible).toBe(false);
  });

  it("returns 400 for a malformed account", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/eligibility/not-an-address");

    expect(res.status).toBe(400);
  });
});
