/**
 * Event history route.
 *
 * GET /api/v1/events?from=&limit= - The wrapper's event stream, by version
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { ListEventsQuerySchema } from "../types/dto.js";
import { paginate } from "../types/pagination.js";
import { readQuery } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/", (c) => {
    const query = readQuery(c, ListEventsQuerySchema);
    const events = c.get("service").events();
    return c.json(paginate(events, query, (e) => e.version));
  });

  return routes;
}
