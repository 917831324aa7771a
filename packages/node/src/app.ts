/**
 * Hono application factory.
 *
 * Creates the Hono app with middleware and routes. Does not listen;
 * main.ts serves it and tests call `app.request()` directly.
 */

import { Hono } from "hono";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { WrapperService } from "./services/wrapper-service.js";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import type { RejectionLogEntry } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createTokenRoutes } from "./routes/token.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createEventRoutes } from "./routes/events.js";
import { createSandboxRoutes } from "./routes/sandbox.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: WrapperServiceConfig;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Called for every error response, before it is sent. */
  readonly onRejected?: ((entry: RejectionLogEntry, error: Error) => void) | undefined;
  /** Auth configuration. When provided, every API request needs an X-Api-Key. */
  readonly auth?: AuthConfig | undefined;
  /** Mount the reference-collaborator routes. Default: true */
  readonly sandbox?: boolean | undefined;
}

// =============================================================================
// Factory
// =============================================================================

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WrapperService;
}

const MUTATING_METHODS = ["POST", "PUT", "PATCH", "DELETE"];

/**
 * Create the Hono application with all middleware and routes.
 */
export function createApp(options: CreateAppOptions): AppInstance {
  const service = new WrapperService(options.serviceConfig);
  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  // ─── Error Handling ─────────────────────────────────────────────
  app.onError(createErrorHandler(options.onRejected));
  app.notFound((c) =>
    c.json(
      createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
      404,
    ),
  );

  // ─── Health Routes (no auth required) ───────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API Routes ─────────────────────────────────────────────────
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  if (options.auth !== undefined) {
    // Secured mode: the API key decides the caller
    app.use("/api/*", authMiddleware(options.auth));
  } else {
    // Unsecured mode (tests, dev): mutations name their caller in X-Caller
    app.on(MUTATING_METHODS, "/api/*", callerHeaderMiddleware());
  }

  app.route("/api/v1", createTokenRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/events", createEventRoutes());

  if (options.sandbox !== false) {
    app.route("/api/v1/sandbox", createSandboxRoutes());
  }

  return { app, service };
}
