/**
 * Ward-only administration routes.
 *
 * GET    /api/v1/admin/dependencies        — Current dependency slots
 * GET    /api/v1/admin/dependencies/:slot
 * PUT    /api/v1/admin/dependencies/:slot  — Repoint a slot
 * POST   /api/v1/admin/recover             — Seize a balance back to the underlying
 * GET    /api/v1/admin/wards
 * POST   /api/v1/admin/wards               — Grant ward status
 * DELETE /api/v1/admin/wards/:account      — Revoke ward status
 *
 * Reads are open; the wrapper rejects writes from non-wards with UNAUTHORIZED.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AccountSchema, SetDependencySchema } from "../types/dto.js";
import { validateBody } from "../middleware/validate.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // ─── Dependencies ────────────────────────────────────────────────

  routes.get("/dependencies", (c) => {
    return c.json({ data: c.get("service").dependencies() });
  });

  routes.get("/dependencies/:slot", (c) => {
    const slot = c.req.param("slot");
    return c.json({ data: { slot, address: c.get("service").getDependency(slot) } });
  });

  routes.put("/dependencies/:slot", validateBody(SetDependencySchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    const dependencies = service.setDependency(c.get("caller"), c.req.param("slot"), body.address);
    return c.json({ data: dependencies });
  });

  // ─── Recovery ────────────────────────────────────────────────────

  routes.post("/recover", validateBody(AccountSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    return c.json({ data: service.recover(c.get("caller"), body.account) });
  });

  // ─── Wards ───────────────────────────────────────────────────────

  routes.get("/wards", (c) => {
    return c.json({ data: c.get("service").wards() });
  });

  routes.post("/wards", validateBody(AccountSchema), (c) => {
    const service = c.get("service");
    const body = c.get("validatedBody");

    service.rely(c.get("caller"), body.account);
    return c.json({ data: service.wards() }, 201);
  });

  routes.delete("/wards/:account", (c) => {
    const service = c.get("service");

    service.deny(c.get("caller"), c.req.param("account"));
    return c.json({ data: service.wards() });
  });

  return routes;
}
