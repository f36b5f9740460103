/**
 * @wcam/node — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { getAddress, isAddress, type Address } from "viem";
import { z } from "zod";
import type { ApiKeyRecord } from "./types/auth.js";

// =============================================================================
// Schema
// =============================================================================

export const DEFAULT_LEDGER_ADDRESS: Address = "0x5000000000000000000000000000000000000005";

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Auth
  API_KEYS: z.string().default(""),

  // Token
  TOKEN_NAME: z.string().min(1).default("Wrapped CAM"),
  TOKEN_SYMBOL: z.string().min(1).default("WCAM"),
  TOKEN_DECIMALS: z.coerce.number().int().min(0).max(77).default(18),
  PERMIT_VERSION: z.string().min(1).default("1"),
  CHAIN_ID: z.coerce.number().int().min(1).default(500),
  LEDGER_ADDRESS: z
    .string()
    .refine((v) => isAddress(v, { strict: false }), "LEDGER_ADDRESS must be a 20-byte hex address")
    .transform((v) => getAddress(v))
    .default(DEFAULT_LEDGER_ADDRESS),

  // Native asset rail
  RAIL_GENESIS: z.string().default(""),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// API Key Parsing
// =============================================================================

/**
 * Parse the API_KEYS env var into structured records.
 *
 * Format: "key1:0xaddress1,key2:0xaddress2"
 */
export function parseApiKeys(raw: string): readonly ApiKeyRecord[] {
  if (raw.trim() === "") {
    return [];
  }

  const keys: ApiKeyRecord[] = [];

  for (const entry of raw.split(",")) {
    const [key, account, ...rest] = entry.trim().split(":");
    if (key === undefined || account === undefined || rest.length > 0) {
      throw new Error(
        `Invalid API_KEYS entry: "${entry.trim()}". Expected format: key:address`,
      );
    }
    if (key === "") {
      throw new Error("API key cannot be empty");
    }
    if (!isAddress(account, { strict: false })) {
      throw new Error(`Invalid address "${account}" in API_KEYS`);
    }

    keys.push({ key, account: getAddress(account) });
  }

  return keys;
}

// =============================================================================
// Genesis Parsing
// =============================================================================

export interface GenesisBalance {
  readonly account: Address;
  readonly amount: bigint;
}

/**
 * Parse the RAIL_GENESIS env var into native balances for the
 * in-memory rail.
 *
 * Format: "0xaddress1:amount1,0xaddress2:amount2" (base units)
 */
export function parseGenesis(raw: string): readonly GenesisBalance[] {
  if (raw.trim() === "") {
    return [];
  }

  const balances: GenesisBalance[] = [];

  for (const entry of raw.split(",")) {
    const [account, amount, ...rest] = entry.trim().split(":");
    if (account === undefined || amount === undefined || rest.length > 0) {
      throw new Error(
        `Invalid RAIL_GENESIS entry: "${entry.trim()}". Expected format: address:amount`,
      );
    }
    if (!isAddress(account, { strict: false })) {
      throw new Error(`Invalid address "${account}" in RAIL_GENESIS`);
    }
    if (!/^\d+$/.test(amount)) {
      throw new Error(`Invalid amount "${amount}" in RAIL_GENESIS. Expected base units`);
    }

    balances.push({ account: getAddress(account), amount: BigInt(amount) });
  }

  return balances;
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}
