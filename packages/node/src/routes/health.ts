/**
 * Health check routes.
 *
 * GET /health — Liveness probe (always 200 if server is running)
 * GET /ready  — Readiness probe: 200 while supply equals custody, 503 otherwise
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import type { WrapperService } from "../services/wrapper-service.js";

export function createHealthRoutes(service: WrapperService): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/health", (c) => {
    return c.json({
      status: "ok",
      timestamp: new Date().toISOString(),
    });
  });

  routes.get("/ready", (c) => {
    const backing = service.backing();
    const body = {
      status: backing.balanced ? "ready" : "not_ready",
      backing,
      timestamp: new Date().toISOString(),
    };

    if (!backing.balanced) {
      return c.json(body, 503);
    }
    return c.json(body);
  });

  return routes;
}
