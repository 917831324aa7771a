/**
 * Wrapped token routes.
 *
 * GET  /api/v1/token                 — Token metadata and supply
 * GET  /api/v1/balances/:account     — Wrapped and underlying balance
 * GET  /api/v1/eligibility/:account  — Eligibility and the rule that grants it
 * GET  /api/v1/allowances/:owner/:spender
 * POST /api/v1/deposit               — Wrap underlying for a beneficiary
 * POST /api/v1/withdraw              — Unwrap to a beneficiary
 * POST /api/v1/transfer
 * POST /api/v1/approve
 * POST /api/v1/transfer-from
 *
 * Mutations act as the request's caller.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSchema,
  DepositSchema,
  TransferFromSchema,
  TransferSchema,
  WithdrawSchema,
} from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Queries ─────────────────────────────────────────────────────

  routes.get("/token", (c) => {
    return c.json({ data: c.get("service").tokenInfo() });
  });

  routes.get("/balances/:account", (c) => {
    return c.json({ data: c.get("service").balance(c.req.param("account")) });
  });

  routes.get("/eligibility/:account", (c) => {
    return c.json({ data: c.get("service").eligibility(c.req.param("account")) });
  });

  routes.get("/allowances/:owner/:spender", (c) => {
    const service = c.get("service");
    return c.json({ data: service.allowance(c.req.param("owner"), c.req.param("spender")) });
  });

  // ─── Mutations ───────────────────────────────────────────────────

  routes.post("/deposit", validateBody(DepositSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.deposit(c.get("caller"), body.beneficiary, body.amount);
    return c.json({ data: service.balance(body.beneficiary) });
  });

  routes.post("/withdraw", validateBody(WithdrawSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = c.get("validatedBody");

    service.withdraw(caller, body.beneficiary, body.amount);
    return c.json({ data: service.balance(caller) });
  });

  routes.post("/transfer", validateBody(TransferSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = c.get("validatedBody");

    service.transfer(caller, body.to, body.amount);
    return c.json({ data: service.balance(caller) });
  });

  routes.post("/approve", validateBody(ApproveSchema), (c) => {
    const service = c.get("service");
    const caller = c.get("caller");
    const body = c.get("validatedBody");

    service.approve(caller, body.spender, body.amount);
    return c.json({ data: service.allowance(caller, body.spender) });
  });

  routes.post("/transfer-from", validateBody(TransferFromSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.transferFrom(c.get("caller"), body.from, body.to, body.amount);
    return c.json({ data: service.balance(body.from) });
  });

  return routes;
}
