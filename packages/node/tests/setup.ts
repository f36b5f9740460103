/**
 * Test helpers for @wcam/node.
 *
 * Provides a test app factory that creates a Hono app with
 * all middleware and routes, but no HTTP server.
 */

import pino from "pino";
import type { Address } from "viem";
import { createApp } from "../src/app.js";
import type { AppInstance, CreateAppOptions } from "../src/app.js";

export const LEDGER: Address = "0x5000000000000000000000000000000000000005";
export const ALICE: Address = "0x1111111111111111111111111111111111111111";
export const BOB: Address = "0x2222222222222222222222222222222222222222";
export const CAROL: Address = "0x3333333333333333333333333333333333333333";

/** Native balance every test account starts with. */
export const GENESIS_AMOUNT = 1_000_000n;

/** Fixed clock for permit deadlines, unix seconds. */
export const NOW = 1_700_000_000n;

/**
 * Create a test app with default configuration.
 *
 * Uses a silent logger, a fixed clock and funded test accounts.
 */
export function createTestApp(
  overrides?: Partial<Omit<CreateAppOptions, "serviceConfig">>,
  extraGenesis: readonly Address[] = [],
): AppInstance {
  return createApp({
    serviceConfig: {
      name: "Wrapped CAM",
      symbol: "WCAM",
      decimals: 18,
      version: "1",
      chainId: 500,
      ledgerAddress: LEDGER,
      genesis: [ALICE, BOB, CAROL, ...extraGenesis].map((account) => ({
        account,
        amount: GENESIS_AMOUNT,
      })),
      clock: () => NOW,
    },
    logger: pino({ level: "silent" }),
    ...overrides,
  });
}

/**
 * JSON request helper. `caller` becomes the X-Caller header.
 */
export function jsonRequest(
  path: string,
  method: string = "GET",
  body?: unknown,
  headers?: Record<string, string>,
): Request {
  const init: RequestInit = {
    method,
    headers: {
      "Content-Type": "application/json",
      ...headers,
    },
  };

  if (body !== undefined) {
    init.body = JSON.stringify(body);
  }

  return new Request(`http://localhost${path}`, init);
}

/**
 * POST helper acting as `caller` in unsecured mode.
 */
export function postAs(caller: Address, path: string, body: unknown): Request {
  return jsonRequest(path, "POST", body, { "X-Caller": caller });
}

export interface ErrorBody {
  error: { code: string; message: string; details?: Record<string, unknown> };
}

export interface EventBody {
  sequence: number;
  type: string;
  [field: string]: unknown;
}

export interface ReceiptBody {
  data: { events: EventBody[] };
}
