/**
 * Mint and burn routes. The caller is the authenticated address.
 *
 * POST /api/v1/mint - { amount, maxValue? }
 * POST /api/v1/burn - { amount, minValue? }
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { BurnSchema, MintSchema } from "../types/dto.js";
import { toJson } from "../types/json.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/mint", requirePermission("write"), async (c) => {
    const body = await readBody(c, MintSchema);
    const receipt = await c
      .get("service")
      .mint(c.get("auth").address, body.amount, body.maxValue);
    return c.json({ data: toJson(receipt) });
  });

  routes.post("/burn", requirePermission("write"), async (c) => {
    const body = await readBody(c, BurnSchema);
    const receipt = await c
      .get("service")
      .burn(c.get("auth").address, body.amount, body.minValue);
    return c.json({ data: toJson(receipt) });
  });

  return routes;
}
