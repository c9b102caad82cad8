/**
 * Native balances.
 *
 * GET  /api/v1/balances/:address — Ledger balance in wei
 * POST /api/v1/faucet            — Create value (only when enabled)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, FaucetSchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { parseInput, readBody } from "../middleware/validate.js";

export function createBalanceRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/balances/:address", (c) => {
    const address = parseInput(AddressSchema, c.req.param("address"), "Invalid address");
    const balance = c.get("service").balanceOf(address);
    return c.json({ data: { address, balance: balance.toString() } });
  });

  routes.post("/faucet", async (c) => {
    const service = c.get("service");
    if (!service.faucetEnabled) {
      return c.json(createErrorEnvelope("FAUCET_DISABLED", "Faucet is disabled"), 404);
    }

    const { address, amount } = await readBody(c, FaucetSchema);
    service.fund(address, amount);
    return c.json(
      { data: { address, balance: service.balanceOf(address).toString() } },
      201,
    );
  });

  return routes;
}
