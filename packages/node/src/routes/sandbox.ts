/**
 * Sandbox routes for the reference collaborators.
 *
 * The wrapper reads an allowlist and an attestation authority it does not
 * own. In a deployment those live elsewhere; this service runs in-memory
 * stand-ins and exposes them here so the gate can be exercised end to end.
 *
 * POST   /api/v1/sandbox/faucet              — Mint underlying (deployer only)
 * POST   /api/v1/sandbox/underlying/approve  — Approve the wrapper on the underlying
 * POST   /api/v1/sandbox/allowlist           — Add an account
 * DELETE /api/v1/sandbox/allowlist/:account  — Remove an account
 * POST   /api/v1/sandbox/attestations        — Issue both attestations for an account
 * DELETE /api/v1/sandbox/attestations/:uid   — Revoke one attestation
 */

import { Hono } from "hono";
import { isHex, size } from "viem";
import type { AppEnv } from "../types/api-contract.js";
import {
  AccountSchema,
  AttestSchema,
  FaucetSchema,
  UnderlyingApproveSchema,
} from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { validateBody } from "../middleware/validate.js";

export function createSandboxRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/faucet", validateBody(FaucetSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.faucet(c.get("caller"), body.account, body.amount);
    return c.json({ data: service.balance(body.account) });
  });

  routes.post("/underlying/approve", validateBody(UnderlyingApproveSchema), (c) => {
    const body = c.get("validatedBody");
    return c.json({ data: c.get("service").approveUnderlying(c.get("caller"), body.amount) });
  });

  // ─── Allowlist ───────────────────────────────────────────────────

  routes.post("/allowlist", validateBody(AccountSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.allow(body.account);
    return c.json({ data: service.eligibility(body.account) }, 201);
  });

  routes.delete("/allowlist/:account", (c) => {
    const service = c.get("service");
    const account = c.req.param("account");

    service.disallow(account);
    return c.json({ data: service.eligibility(account) });
  });

  // ─── Attestations ────────────────────────────────────────────────

  routes.post("/attestations", validateBody(AttestSchema), (c) => {
    const body = c.get("validatedBody");
    const expirationTime =
      body.expirationTime !== undefined ? BigInt(body.expirationTime) : undefined;

    const uids = c
      .get("service")
      .attest(body.account, body.country, body.verified, expirationTime);
    return c.json({ data: uids }, 201);
  });

  routes.delete("/attestations/:uid", (c) => {
    const uid = c.req.param("uid");
    if (!isHex(uid, { strict: true }) || size(uid) !== 32) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Attestation uid must be 32 bytes of hex"),
        400,
      );
    }

    c.get("service").revokeAttestation(uid);
    return c.json({ data: { uid, revoked: true } });
  });

  return routes;
}
