/**
 * Tests for logger middleware.
 */

import { describe, it, expect } from "vitest";
import type { RequestLogEntry } from "../../src/middleware/logger.js";
import { ALICE, createTestApp, postAs } from "../setup.js";

describe("loggerMiddleware", () => {
  it("calls logFn with request details", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request("/health");

    expect(entries).toHaveLength(1);
    expect(entries[0]!.method).toBe("GET");
    expect(entries[0]!.path).toBe("/health");
    expect(entries[0]!.status).toBe(200);
    expect(entries[0]!.durationMs).toBeGreaterThanOrEqual(0);
    expect(entries[0]!.requestId).toMatch(/^[0-9a-f-]{36}$/);
    expect(entries[0]!.caller).toBeUndefined();
  });

  it("records the caller and the error status of a rejected operation", async () => {
    const entries: RequestLogEntry[] = [];
    const { app } = createTestApp({ logFn: (entry) => entries.push(entry) });

    await app.request(postAs(ALICE, "/api/v1/withdraw", { amount: "1" }));

    expect(entries).toHaveLength(1);
    expect(entries[0]!.method).toBe("POST");
    expect(entries[0]!.status).toBe(422);
    expect(entries[0]!.caller).toBe(ALICE);
  });
});
