/**
 * Tests for health check endpoints.
 *
 * Verifies:
 * - GET /health returns 200 with status "ok"
 * - GET /ready reports the backing invariant
 * - X-Request-Id is set on responses
 */

import { describe, it, expect } from "vitest";
import { ALICE, LEDGER, createTestApp, jsonRequest, postAs } from "./setup.js";

interface ReadyBody {
  status: string;
  backing: { totalSupply: string; balanceSum: string; custody: string; held: string; backed: boolean };
}

describe("GET /health", () => {
  it("returns 200 with status ok", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.status).toBe(200);

    const body = (await res.json()) as { status: string; timestamp: string };
    expect(body.status).toBe("ok");
    expect(typeof body.timestamp).toBe("string");
  });

  it("generates an X-Request-Id header", async () => {
    const { app } = createTestApp();
    const res = await app.request("/health");

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });

  it("preserves incoming X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "test-req-123" }),
    );

    expect(res.headers.get("X-Request-Id")).toBe("test-req-123");
  });

  it("replaces an unusable X-Request-Id", async () => {
    const { app } = createTestApp();
    const res = await app.request(
      jsonRequest("/health", "GET", undefined, { "X-Request-Id": "x".repeat(200) }),
    );

    expect(res.headers.get("X-Request-Id")).toMatch(/^[0-9a-f-]{36}$/);
  });
});

describe("GET /ready", () => {
  it("returns 200 ready for an empty ledger", async () => {
    const { app } = createTestApp();
    const res = await app.request("/ready");

    expect(res.status).toBe(200);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("ready");
    expect(body.backing).toEqual({
      totalSupply: "0",
      balanceSum: "0",
      custody: "0",
      held: "0",
      backed: true,
    });
  });

  it("reports the escrow after deposits", async () => {
    const { app } = createTestApp();
    await app.request(postAs(ALICE, "/api/v1/deposit", { amount: "250" }));

    const body = (await (await app.request("/ready")).json()) as ReadyBody;

    expect(body.backing.totalSupply).toBe("250");
    expect(body.backing.custody).toBe("250");
    expect(body.backing.held).toBe("250");
  });

  it("returns 503 when the ledger account holds less than custody", async () => {
    const { app, service } = createTestApp();
    await app.request(postAs(ALICE, "/api/v1/deposit", { amount: "250" }));
    // Simulate a rail that lost funds behind the ledger's back
    service.rail.send(LEDGER, ALICE, 1n);

    const res = await app.request("/ready");

    expect(res.status).toBe(503);
    const body = (await res.json()) as ReadyBody;
    expect(body.status).toBe("not_ready");
    expect(body.backing.held).toBe("249");
    expect(body.backing.backed).toBe(false);
  });
});

describe("unknown routes", () => {
  it("returns a NOT_FOUND envelope", async () => {
    const { app } = createTestApp();
    const res = await app.request("/api/v1/nonexistent");

    expect(res.status).toBe(404);
    const body = (await res.json()) as { error: { code: string; message: string } };
    expect(body.error).toEqual({ code: "NOT_FOUND", message: "No route for GET /api/v1/nonexistent" });
  });
});
