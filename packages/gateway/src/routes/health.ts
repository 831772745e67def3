/**
 * Health check route.
 *
 * GET /healthz: liveness probe. Always 200 "OK", no auth, independent
 * of the service registry.
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const HEALTH_PATH = "/healthz";

export function createHealthRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  routes.get(HEALTH_PATH, (c) => c.text("OK", 200));

  return routes;
}
