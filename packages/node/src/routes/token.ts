/**
 * Ledger query routes.
 *
 * GET /api/v1/token                       — Metadata, supply and custody
 * GET /api/v1/accounts/:address           — Balance, permit nonce, native balance
 * GET /api/v1/allowances/:owner/:spender  — Allowance
 * GET /api/v1/events                      — Journal entries (?from=&limit=&type=)
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { AddressSchema, ListEventsQuerySchema, toEventDto } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors, validateQuery } from "../middleware/validate.js";

export function createTokenRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get("/token", (c) => {
    const info = c.get("service").info();

    return c.json({
      data: {
        name: info.name,
        symbol: info.symbol,
        decimals: info.decimals,
        address: info.address,
        chainId: info.chainId,
        totalSupply: info.totalSupply.toString(),
        custody: info.custody.toString(),
        domainSeparator: info.domainSeparator,
      },
    });
  });

  routes.get("/accounts/:address", (c) => {
    const parsed = AddressSchema.safeParse(c.req.param("address"));
    if (!parsed.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid account address", {
          issues: formatZodErrors(parsed.error),
        }),
        400,
      );
    }

    const account = c.get("service").account(parsed.data);
    return c.json({
      data: {
        address: account.address,
        balance: account.balance.toString(),
        nonce: account.nonce.toString(),
        nativeBalance: account.nativeBalance.toString(),
      },
    });
  });

  routes.get("/allowances/:owner/:spender", (c) => {
    const owner = AddressSchema.safeParse(c.req.param("owner"));
    const spender = AddressSchema.safeParse(c.req.param("spender"));
    if (!owner.success || !spender.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid owner or spender address"),
        400,
      );
    }

    const allowance = c.get("service").allowance(owner.data, spender.data);
    return c.json({
      data: {
        owner: owner.data,
        spender: spender.data,
        allowance: allowance.toString(),
      },
    });
  });

  routes.get("/events", validateQuery(ListEventsQuerySchema), (c) => {
    const query = c.req.valid("query");
    const entries = c.get("service").events(query);
    const last = entries.at(-1);

    return c.json({
      data: entries.map(toEventDto),
      next: entries.length === query.limit && last !== undefined ? last.sequence + 1 : null,
    });
  });

  return routes;
}
