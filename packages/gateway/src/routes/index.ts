/**
 * Route barrel: re-exports all route modules.
 */

export { createHealthRoutes, HEALTH_PATH } from "./health.js";
