/**
 * @basketwrap/node - Entry point.
 *
 * Loads config, builds the app, starts the HTTP server and handles
 * graceful shutdown.
 */

import { serve } from "@hono/node-server";
import pino from "pino";
import { loadConfig, parseApiKeys } from "./config.js";
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

  let auth: AuthConfig | undefined;
  const parsedKeys = parseApiKeys(config.API_KEYS);
  if (parsedKeys.length > 0) {
    const apiKeys = new Map<string, ApiKeyRecord>();
    for (const k of parsedKeys) {
      apiKeys.set(k.key, k);
    }
    auth = { apiKeys };
    logger.info({ apiKeyCount: parsedKeys.length }, "Auth configured");
  } else {
    logger.warn("No API keys configured; trusting the X-Caller header");
  }

  const { app, service } = createApp({
    serviceConfig: {
      name: config.WRAPPER_NAME,
      symbol: config.WRAPPER_SYMBOL,
      owner: config.OWNER_ADDRESS,
      custody: config.CUSTODY_ADDRESS,
      slippageToleranceBps: config.SLIPPAGE_TOLERANCE_BPS,
      recoveryScope: config.RECOVERY_SCOPE,
    },
    logger,
    auth,
  });

  const server = serve({
    fetch: app.fetch,
    port: config.PORT,
    hostname: config.HOST,
  });

  logger.info(
    { port: config.PORT, host: config.HOST, symbol: config.WRAPPER_SYMBOL },
    "Wrapper node started",
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Shutdown signal received");
    server.close();
    await service.drain();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  // eslint-disable-next-line no-console
  console.error("Fatal startup error:", err);
  process.exit(1);
});
