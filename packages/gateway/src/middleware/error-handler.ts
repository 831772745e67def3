/**
 * Global error handler.
 *
 * Last line of defence for anything a handler throws. HTTPExceptions
 * keep their own response; everything else is logged and answered with a
 * generic 500 envelope so no internal detail reaches the client. Other
 * in-flight requests are unaffected.
 */

import type { ErrorHandler } from "hono";
import { HTTPException } from "hono/http-exception";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

export function createErrorHandler(logger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    if (err instanceof HTTPException) {
      return err.getResponse();
    }

    logger.error(
      { err, requestId: c.get("requestId"), path: c.req.path },
      "unhandled error",
    );

    return c.json(
      createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
      500,
    );
  };
}
