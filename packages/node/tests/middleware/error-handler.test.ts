/**
 * Tests for error handler middleware.
 *
 * Verifies ledger and rail errors are mapped to the documented HTTP
 * status codes and the error envelope format.
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import { HTTPException } from "hono/http-exception";
import { LedgerError, ValueTransferError } from "@wcam/ledger";
import type { LedgerErrorCode } from "@wcam/ledger";
import type { AppEnv } from "../../src/types/api-contract.js";
import { handleError } from "../../src/middleware/error-handler.js";
import type { ErrorBody } from "../setup.js";

function throwing(err: Error): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  app.onError(handleError);
  app.get("/boom", () => {
    throw err;
  });
  return app;
}

describe("error handler", () => {
  const cases: [LedgerErrorCode, number][] = [
    ["INVALID_AMOUNT", 400],
    ["INVALID_ADDRESS", 400],
    ["INVALID_SIGNATURE", 400],
    ["SIGNER_MISMATCH", 409],
    ["EXPIRED_AUTHORIZATION", 409],
    ["INSUFFICIENT_BALANCE", 422],
    ["INSUFFICIENT_ALLOWANCE", 422],
    ["SELF_TRANSFER_FORBIDDEN", 422],
    ["RELEASE_FAILED", 502],
  ];

  for (const [code, status] of cases) {
    it(`maps ${code} to ${status}`, async () => {
      const res = await throwing(new LedgerError(code, `${code} happened`)).request("/boom");

      expect(res.status).toBe(status);
      const body = (await res.json()) as ErrorBody;
      expect(body).toEqual({ error: { code, message: `${code} happened` } });
    });
  }

  it("passes ledger error details through", async () => {
    const err = new LedgerError("INSUFFICIENT_BALANCE", "short", { account: "a", balance: "1", needed: "2" });

    const res = await throwing(err).request("/boom");

    const body = (await res.json()) as ErrorBody;
    expect(body.error.details).toEqual({ account: "a", balance: "1", needed: "2" });
  });

  it("maps rail failures by reason", async () => {
    const short = await throwing(new ValueTransferError("INSUFFICIENT_FUNDS", "short")).request("/boom");
    const rejected = await throwing(new ValueTransferError("REJECTED", "refused")).request("/boom");

    expect(short.status).toBe(422);
    expect(rejected.status).toBe(502);
    expect(((await rejected.json()) as ErrorBody).error.code).toBe("REJECTED");
  });

  it("hides the message of internal errors", async () => {
    const res = await throwing(new Error("database password is test-secret")).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body).toEqual({ error: { code: "INTERNAL_ERROR", message: "Internal server error" } });
  });

  it("hides internal ledger failures", async () => {
    const res = await throwing(new LedgerError("ARITHMETIC_UNDERFLOW", "0 - 1", { a: "0" })).request("/boom");

    expect(res.status).toBe(500);
    const body = (await res.json()) as ErrorBody;
    expect(body).toEqual({ error: { code: "ARITHMETIC_UNDERFLOW", message: "Internal server error" } });
  });

  it("keeps the status of HTTP exceptions", async () => {
    const res = await throwing(new HTTPException(403, { message: "nope" })).request("/boom");

    expect(res.status).toBe(403);
    const body = (await res.json()) as ErrorBody;
    expect(body.error).toEqual({ code: "FORBIDDEN", message: "nope" });
  });
});
