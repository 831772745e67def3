/**
 * Request ID middleware.
 *
 * Propagates the caller's X-Request-Id when it looks sane, otherwise
 * mints a UUID. The id is echoed on the response and forwarded to the
 * backend so one request can be followed across services.
 */

import { randomUUID } from "node:crypto";
import type { MiddlewareHandler } from "hono";
import type { AppEnv } from "../types/api-contract.js";

export const REQUEST_ID_HEADER = "X-Request-Id";

/** Printable ASCII without spaces, at most 128 characters. */
const ACCEPTED_ID = /^[\x21-\x7e]{1,128}$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header(REQUEST_ID_HEADER);
    const requestId =
      incoming !== undefined && ACCEPTED_ID.test(incoming)
        ? incoming
        : randomUUID();

    c.set("requestId", requestId);

    await next();

    c.header(REQUEST_ID_HEADER, requestId);
  };
}
