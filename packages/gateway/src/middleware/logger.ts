/**
 * Request logging middleware.
 *
 * Emits one entry per request once the response is known, naming the
 * service that handled it when the request was forwarded. The sink is
 * injected; the entry point wires it to pino.
 */

import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export interface RequestLogEntry {
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
  /** Undefined for requests the gateway answered itself. */
  readonly service: string | undefined;
}

export function loggerMiddleware(
  log: (entry: RequestLogEntry) => void,
): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = Date.now();

    await next();

    log({
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: Date.now() - start,
      requestId: c.get("requestId"),
      service: c.get("service"),
    });
  };
}
