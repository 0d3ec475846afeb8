/**
 * Wrapper read routes.
 *
 * GET /api/v1/wrapper              - Deployment info
 * GET /api/v1/assets               - Basket composition
 * GET /api/v1/price-feeds          - Price feed bindings
 * GET /api/v1/mint-preview?amount= - Per-asset amounts a mint would pull
 * GET /api/v1/valuation?amount=    - Per-asset valuation and total
 * GET /api/v1/balances/:holder     - Wrapper balance of one holder
 * GET /api/v1/backing              - Custody held against supply
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AmountQuerySchema } from "../types/dto.js";
import { toJson } from "../types/json.js";
import { readQuery } from "../middleware/validate.js";

export function createWrapperRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/wrapper", (c) => {
    return c.json({ data: toJson(c.get("service").info()) });
  });

  routes.get("/assets", (c) => {
    return c.json({ data: toJson(c.get("service").assets()) });
  });

  routes.get("/price-feeds", (c) => {
    return c.json({ data: toJson(c.get("service").priceFeeds()) });
  });

  routes.get("/mint-preview", (c) => {
    const { amount } = readQuery(c, AmountQuerySchema);
    return c.json({ data: toJson(c.get("service").previewMint(amount)) });
  });

  routes.get("/valuation", async (c) => {
    const { amount } = readQuery(c, AmountQuerySchema);
    const valuation = await c.get("service").valuation(amount);
    return c.json({ data: toJson(valuation) });
  });

  routes.get("/balances/:holder", (c) => {
    const holder = c.req.param("holder");
    const balance = c.get("service").balanceOf(holder);
    return c.json({ data: { holder, balance: balance.toString() } });
  });

  routes.get("/backing", async (c) => {
    const report = await c.get("service").backing();
    return c.json({ data: toJson(report) });
  });

  return routes;
}
