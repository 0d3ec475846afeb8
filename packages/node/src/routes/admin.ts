/**
 * Administrative routes. Require the admin role; the wrapper additionally
 * checks that the caller is its owner.
 *
 * POST   /api/v1/admin/basket             - Replace the basket
 * POST   /api/v1/admin/price-feeds        - Bind a price feed
 * DELETE /api/v1/admin/price-feeds/:token - Remove a price feed
 * PUT    /api/v1/admin/slippage           - Set the slippage tolerance
 * POST   /api/v1/admin/pause              - Halt mint and burn
 * POST   /api/v1/admin/unpause            - Resume mint and burn
 * POST   /api/v1/admin/recover            - Sweep a token to the owner
 * POST   /api/v1/admin/owner              - Transfer ownership
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ConfigureBasketSchema,
  ConfigurePriceFeedSchema,
  RecoverSchema,
  SlippageSchema,
  TransferOwnershipSchema,
} from "../types/dto.js";
import { toJson } from "../types/json.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createAdminRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.use("*", requirePermission("admin"));

  routes.post("/basket", async (c) => {
    const body = await readBody(c, ConfigureBasketSchema);
    const basket = await c
      .get("service")
      .configureBasket(c.get("auth").address, body.tokens, body.weights);
    return c.json({ data: toJson(basket) });
  });

  routes.post("/price-feeds", async (c) => {
    const body = await readBody(c, ConfigurePriceFeedSchema);
    const binding = await c
      .get("service")
      .configurePriceFeed(c.get("auth").address, body.token, body.feed);
    return c.json({ data: toJson(binding) }, 201);
  });

  routes.delete("/price-feeds/:token", async (c) => {
    const binding = await c
      .get("service")
      .removePriceFeed(c.get("auth").address, c.req.param("token"));
    return c.json({ data: toJson(binding) });
  });

  routes.put("/slippage", async (c) => {
    const body = await readBody(c, SlippageSchema);
    const service = c.get("service");
    await service.setSlippageTolerance(c.get("auth").address, body.bps);
    return c.json({ data: { slippageToleranceBps: service.info().slippageToleranceBps } });
  });

  routes.post("/pause", async (c) => {
    await c.get("service").pause(c.get("auth").address);
    return c.json({ data: { paused: true } });
  });

  routes.post("/unpause", async (c) => {
    await c.get("service").unpause(c.get("auth").address);
    return c.json({ data: { paused: false } });
  });

  routes.post("/recover", async (c) => {
    const body = await readBody(c, RecoverSchema);
    const receipt = await c.get("service").recoverToken(c.get("auth").address, body.token);
    return c.json({ data: toJson(receipt) });
  });

  routes.post("/owner", async (c) => {
    const body = await readBody(c, TransferOwnershipSchema);
    const service = c.get("service");
    await service.transferOwnership(c.get("auth").address, body.newOwner);
    return c.json({ data: { owner: service.info().owner } });
  });

  return routes;
}
