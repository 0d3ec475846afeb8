/**
 * Sandbox host routes: drive the in-process asset host for local use.
 *
 * POST /api/v1/sandbox/assets           - Create an asset (admin)
 * POST /api/v1/sandbox/faucet           - Credit a holder (admin)
 * POST /api/v1/sandbox/approve          - Approve custody for the caller
 * POST /api/v1/sandbox/feeds            - Publish a price reading (admin)
 * POST /api/v1/sandbox/clock            - Advance the host clock (admin)
 * GET  /api/v1/sandbox/balances/:holder - Asset balances of a holder
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  AdvanceClockSchema,
  ApproveSchema,
  CreateAssetSchema,
  FaucetSchema,
  PublishPriceSchema,
} from "../types/dto.js";
import { toJson } from "../types/json.js";
import { readBody } from "../middleware/validate.js";
import { requirePermission } from "../middleware/auth.js";

export function createSandboxRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/assets", requirePermission("admin"), async (c) => {
    const body = await readBody(c, CreateAssetSchema);
    const asset = await c
      .get("service")
      .createAsset(c.get("auth").address, body.token, body.decimals);
    return c.json({ data: asset }, 201);
  });

  routes.post("/faucet", requirePermission("admin"), async (c) => {
    const body = await readBody(c, FaucetSchema);
    const balance = await c
      .get("service")
      .faucet(c.get("auth").address, body.token, body.holder, body.amount);
    return c.json({ data: { token: body.token, holder: body.holder, balance: balance.toString() } });
  });

  routes.post("/approve", requirePermission("write"), async (c) => {
    const body = await readBody(c, ApproveSchema);
    const service = c.get("service");
    const owner = c.get("auth").address;
    await service.approve(owner, body.token, body.amount);
    return c.json({
      data: {
        token: body.token,
        owner,
        spender: service.info().custody,
        amount: body.amount.toString(),
      },
    });
  });

  routes.post("/feeds", requirePermission("admin"), async (c) => {
    const body = await readBody(c, PublishPriceSchema);
    await c
      .get("service")
      .publishPrice(c.get("auth").address, body.handle, body.decimals, body.answer, body.updatedAt);
    return c.json({ data: { handle: body.handle } });
  });

  routes.post("/clock", requirePermission("admin"), async (c) => {
    const body = await readBody(c, AdvanceClockSchema);
    const now = await c.get("service").advanceClock(c.get("auth").address, body.advanceSeconds);
    return c.json({ data: { now } });
  });

  routes.get("/balances/:holder", (c) => {
    const holder = c.req.param("holder");
    return c.json({ data: toJson(c.get("service").sandboxBalances(holder)) });
  });

  return routes;
}
