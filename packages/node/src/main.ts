/**
 * @lapse/node — Entry point.
 *
 * Loads config, builds the token and the Hono app, starts the HTTP
 * server and handles graceful shutdown.
 */

import { serve } from "@hono/node-server";
import { pino } from "pino";
import { ExpirableToken } from "@lapse/token";
import {
  clockFromConfig,
  loadConfig,
  parseApiKeys,
  tokenConfigFromConfig,
} from "./config.js";
import { createApp } from "./app.js";
import type { AuthConfig } from "./middleware/auth.js";
import type { ApiKeyRecord } from "./types/auth.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = pino({
    level: config.LOG_LEVEL,
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });

  let authConfig: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const keyMap = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      keyMap.set(k.key, k);
    }
    authConfig = { apiKeys: keyMap };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured, running in unsecured mode");
  }

  const token = new ExpirableToken(
    {
      ...tokenConfigFromConfig(config),
      onListenerError: (err, event) => {
        logger.error({ err, sequence: event.sequence }, "Token event listener failed");
      },
    },
    clockFromConfig(config),
  );
  logger.info(
    {
      symbol: token.symbol,
      expiryType: token.expiryType,
      window: token.windowConfig,
      mintWindow: token.mintWindow,
    },
    "Token configured",
  );

  const { app } = createApp({
    token,
    logger,
    logFn: (entry) => {
      logger.info(entry, `${entry.method} ${entry.path} ${String(entry.status)}`);
    },
    idempotencyTtlMs: config.IDEMPOTENCY_TTL_MS,
    idempotencyMaxEntries: config.IDEMPOTENCY_MAX_ENTRIES,
    auth: authConfig,
    rateLimit: {
      rpm: config.RATE_LIMIT_RPM,
      burst: config.RATE_LIMIT_BURST,
      writeCost: config.RATE_LIMIT_WRITE_COST,
    },
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info({ port: config.PORT, host: config.HOST }, "Lapse node started");

  const shutdown = (signal: string): void => {
    logger.info({ signal }, "Shutdown signal received");
    server.close((err) => {
      if (err !== undefined) {
        logger.error({ err }, "Server close failed");
        process.exit(1);
      }
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
