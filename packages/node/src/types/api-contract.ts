/**
 * Hono application environment type.
 *
 * Defines the typed context variables available in all route handlers.
 * These are set by middleware and consumed by route handlers.
 */

import type { TokenService } from "../services/token-service.js";
import type { CallerIdentity } from "./auth.js";

/**
 * Middleware populates Variables; route handlers read them via c.get().
 */
export interface AppEnv {
  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** The ledger service (set by the service middleware) */
    service: TokenService;

    /** Acting account; undefined when the request names none */
    caller: CallerIdentity | undefined;
  };
}
