/**
 * @wardwrap/node — Entry point.
 *
 * Bootstraps the Hono app, loads config, starts the HTTP server,
 * and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import type { Address } from "viem";
import { loadConfig, parseApiKeys, serviceConfigFrom } from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import { toEventDto } from "./types/dto.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  // Build auth config from env vars
  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, Address>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k.caller);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode (X-Caller header)");
  }

  const { app, service } = createApp({
    serviceConfig: serviceConfigFrom(config),
    logFn: (entry) => {
      logger[entry.level](entry, `${entry.method} ${entry.path} ${entry.status}`);
    },
    onRejected: (entry, error) => {
      if (entry.status === 500) {
        logger.error({ ...entry, err: error }, "Unhandled error");
      } else {
        logger.debug(entry, `Rejected: ${entry.code}`);
      }
    },
    auth: authConfig,
    sandbox: config.ENABLE_SANDBOX,
  });

  const eventLogger = logger.child({ component: "events" });
  const subscription = service.token.events.subscribe((event) => {
    eventLogger.info(toEventDto(event), event.type);
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    {
      port: config.PORT,
      host: config.HOST,
      token: service.token.address,
      symbol: service.token.symbol,
      sandbox: config.ENABLE_SANDBOX,
    },
    "Wrapper node started",
  );

  // Graceful shutdown
  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    subscription.unsubscribe();
    server.close(() => {
      logger.info("Shutdown complete");
      process.exit(0);
    });
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
