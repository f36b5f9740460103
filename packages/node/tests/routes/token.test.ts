/**
 * Tests for ledger query routes.
 *
 * Covers: token metadata, accounts, allowances, events.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { AppInstance } from "../../src/app.js";
import { ALICE, BOB, GENESIS_AMOUNT, LEDGER, createTestApp, postAs } from "../setup.js";
import type { ErrorBody, EventBody } from "../setup.js";

let instance: AppInstance;

beforeEach(() => {
  instance = createTestApp();
});

interface EventsBody {
  data: EventBody[];
  next: number | null;
}

describe("GET /api/v1/token", () => {
  it("returns metadata, supply and custody as strings", async () => {
    const { app, service } = instance;
    await app.request(postAs(ALICE, "/api/v1/deposit", { amount: "42" }));

    const res = await app.request("/api/v1/token");

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      name: "Wrapped CAM",
      symbol: "WCAM",
      decimals: 18,
      address: LEDGER,
      chainId: 500,
      totalSupply: "42",
      custody: "42",
      domainSeparator: service.token.domainSeparator(),
    });
  });
});

describe("GET /api/v1/accounts/:address", () => {
  it("returns balance, nonce and native balance", async () => {
    const { app } = instance;
    await app.request(postAs(ALICE, "/api/v1/deposit", { amount: "7" }));

    const res = await app.request(`/api/v1/accounts/${ALICE.toLowerCase()}`);

    expect(res.status).toBe(200);
    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({
      address: ALICE,
      balance: "7",
      nonce: "0",
      nativeBalance: (GENESIS_AMOUNT - 7n).toString(),
    });
  });

  it("returns 400 for an invalid address", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/accounts/alice");

    expect(res.status).toBe(400);
    const body = (await res.json()) as ErrorBody;
    expect(body.error.code).toBe("VALIDATION_ERROR");
  });
});

describe("GET /api/v1/allowances/:owner/:spender", () => {
  it("returns the allowance", async () => {
    const { app } = instance;
    await app.request(postAs(ALICE, "/api/v1/approve", { spender: BOB, amount: "9" }));

    const res = await app.request(`/api/v1/allowances/${ALICE}/${BOB}`);

    const body = (await res.json()) as { data: Record<string, unknown> };
    expect(body.data).toEqual({ owner: ALICE, spender: BOB, allowance: "9" });
  });

  it("returns 400 when either address is invalid", async () => {
    const { app } = instance;
    const res = await app.request(`/api/v1/allowances/${ALICE}/bob`);

    expect(res.status).toBe(400);
  });
});

describe("GET /api/v1/events", () => {
  beforeEach(async () => {
    const { app } = instance;
    await app.request(postAs(ALICE, "/api/v1/deposit", { amount: "5" }));
    await app.request(postAs(ALICE, "/api/v1/approve", { spender: BOB, amount: "1" }));
    await app.request(postAs(ALICE, "/api/v1/transfer", { to: BOB, amount: "2" }));
  });

  it("lists every committed event in order", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/events");

    const body = (await res.json()) as EventsBody;
    expect(body.data.map((e) => `${e.sequence}:${e.type}`)).toEqual([
      "1:Transfer",
      "2:Deposit",
      "3:Approval",
      "4:Transfer",
    ]);
    expect(body.next).toBeNull();
  });

  it("pages with from and limit", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/events?from=2&limit=2");

    const body = (await res.json()) as EventsBody;
    expect(body.data.map((e) => e.sequence)).toEqual([2, 3]);
    expect(body.next).toBe(4);
  });

  it("filters by type", async () => {
    const { app } = instance;
    const res = await app.request("/api/v1/events?type=Transfer");

    const body = (await res.json()) as EventsBody;
    expect(body.data).toEqual([
      { sequence: 1, type: "Transfer", from: "0x0000000000000000000000000000000000000000", to: ALICE, value: "5" },
      { sequence: 4, type: "Transfer", from: ALICE, to: BOB, value: "2" },
    ]);
  });

  it("returns 400 for invalid query parameters", async () => {
    const { app } = instance;

    expect((await app.request("/api/v1/events?from=0")).status).toBe(400);
    expect((await app.request("/api/v1/events?type=Mint")).status).toBe(400);
    expect((await app.request("/api/v1/events?limit=5000")).status).toBe(400);
  });
});
