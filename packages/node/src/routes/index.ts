/**
 * Route barrel — re-exports all route modules.
 */

export { createHealthRoutes } from "./health.js";
export { createTokenRoutes } from "./token.js";
export { createOperationRoutes } from "./operations.js";
