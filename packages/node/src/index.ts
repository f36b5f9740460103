/**
 * @wcam/node — HTTP service for the Wrapped CAM escrow ledger.
 *
 * Package public API. The server itself starts from main.ts.
 */

export { TokenService } from "./services/token-service.js";
export type {
  TokenServiceConfig,
  TokenInfo,
  AccountInfo,
  EventQuery,
} from "./services/token-service.js";
export {
  loadConfig,
  parseApiKeys,
  parseGenesis,
  ConfigSchema,
  DEFAULT_LEDGER_ADDRESS,
} from "./config.js";
export type { AppConfig, GenesisBalance } from "./config.js";
export { createApp } from "./app.js";
export type { CreateAppOptions, AppInstance } from "./app.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
