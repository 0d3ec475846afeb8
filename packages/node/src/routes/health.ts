/**
 * Health check routes.
 *
 * GET /health - Liveness probe (always 200 if the server is running)
 * GET /ready  - Readiness probe (event history hash chain intact)
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
    const integrity = service.verifyIntegrity();
    const body = {
      status: integrity.valid ? "ready" : "not_ready",
      wrapper: service.info().symbol,
      events: integrity.checked,
      errors: integrity.errors.map((e) => e.reason),
      timestamp: new Date().toISOString(),
    };
    return integrity.valid ? c.json(body, 200) : c.json(body, 503);
  });

  return routes;
}
