/**
 * Ledger operation routes. Each acts for the authenticated caller and
 * answers with the journal entries it committed.
 *
 * POST /api/v1/deposit        — Escrow the native asset and mint
 * POST /api/v1/withdraw       — Burn and release the native asset
 * POST /api/v1/withdraw-from  — Burn an owner's units under allowance
 * POST /api/v1/transfer       — Move units
 * POST /api/v1/transfer-from  — Move an owner's units under allowance
 * POST /api/v1/approve        — Set an allowance
 * POST /api/v1/permit         — Set an allowance from an owner's signature
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import {
  ApproveSchema,
  DepositSchema,
  PermitSchema,
  TransferFromSchema,
  TransferSchema,
  WithdrawFromSchema,
  WithdrawSchema,
  toReceiptDto,
} from "../types/dto.js";
import { callerAccount } from "../middleware/auth.js";
import { validateBody } from "../middleware/validate.js";

export function createOperationRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.post("/deposit", validateBody(DepositSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c.get("service").deposit(callerAccount(c), body.amount, body.recipient);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  routes.post("/withdraw", validateBody(WithdrawSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c.get("service").withdraw(callerAccount(c), body.amount, body.recipient);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  routes.post("/withdraw-from", validateBody(WithdrawFromSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c
      .get("service")
      .withdrawFrom(callerAccount(c), body.owner, body.recipient, body.amount);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  routes.post("/transfer", validateBody(TransferSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c.get("service").transfer(callerAccount(c), body.to, body.amount);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  routes.post("/transfer-from", validateBody(TransferFromSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c
      .get("service")
      .transferFrom(callerAccount(c), body.from, body.to, body.amount);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  routes.post("/approve", validateBody(ApproveSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c.get("service").approve(callerAccount(c), body.spender, body.amount);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  // Anyone may relay a permit; the caller is only recorded in the log.
  routes.post("/permit", validateBody(PermitSchema), (c) => {
    const body = c.req.valid("json");
    const receipt = c.get("service").permit(c.get("caller")?.account, body);
    return c.json({ data: toReceiptDto(receipt.events) });
  });

  return routes;
}
