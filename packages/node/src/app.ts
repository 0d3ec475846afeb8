/**
 * Hono application factory.
 *
 * Creates the app with middleware and routes. Kept apart from main.ts so
 * tests can build the app without starting an HTTP server.
 */

import { Hono } from "hono";
import pino from "pino";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import { createErrorEnvelope } from "./types/error.js";
import { WrapperService } from "./services/wrapper-service.js";
import type { WrapperServiceConfig } from "./services/wrapper-service.js";
import { handleError } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import { authMiddleware, callerHeaderMiddleware, requirePermission } from "./middleware/auth.js";
import type { AuthConfig } from "./middleware/auth.js";
import { createHealthRoutes } from "./routes/health.js";
import { createWrapperRoutes } from "./routes/wrapper.js";
import { createOperationRoutes } from "./routes/operations.js";
import { createAdminRoutes } from "./routes/admin.js";
import { createSandboxRoutes } from "./routes/sandbox.js";
import { createEventRoutes } from "./routes/events.js";

// =============================================================================
// App Config
// =============================================================================

export interface CreateAppOptions {
  readonly serviceConfig: Omit<WrapperServiceConfig, "logger">;
  /** Root logger. Default: a silent pino logger. */
  readonly logger?: Logger;
  /** Log one line per request. Default: true */
  readonly logRequests?: boolean;
  /** When provided, API-key auth is enabled; otherwise X-Caller is trusted. */
  readonly auth?: AuthConfig;
}

export interface AppInstance {
  readonly app: Hono<AppEnv>;
  readonly service: WrapperService;
}

// =============================================================================
// Factory
// =============================================================================

export function createApp(options: CreateAppOptions): AppInstance {
  const logger = options.logger ?? pino({ level: "silent" });
  const service = new WrapperService({ ...options.serviceConfig, logger });

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logRequests !== false) {
    app.use("*", loggerMiddleware(logger.child({ component: "http" })));
  }

  app.onError(handleError);
  app.notFound((c) =>
    c.json(createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`), 404),
  );

  // ─── Health (no auth) ───────────────────────────────────────────
  app.route("/", createHealthRoutes(service));

  // ─── API ────────────────────────────────────────────────────────
  app.use("/api/*", options.auth !== undefined ? authMiddleware(options.auth) : callerHeaderMiddleware());
  app.use("/api/*", requirePermission("read"));
  app.use("/api/*", async (c, next) => {
    c.set("service", service);
    await next();
  });

  app.route("/api/v1", createWrapperRoutes());
  app.route("/api/v1", createOperationRoutes());
  app.route("/api/v1/admin", createAdminRoutes());
  app.route("/api/v1/sandbox", createSandboxRoutes());
  app.route("/api/v1/events", createEventRoutes());

  return { app, service };
}
