/**
 * Identity middleware.
 *
 * Guards a route group with a bearer token. On success the verified
 * claims and the identity headers derived from them are stored on the
 * request context, replacing whatever the client sent, and the chain
 * continues. On failure the request stops here with a 401 and a fixed
 * plain-text body; the reason is logged, never returned.
 */

import type { MiddlewareHandler } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import { toIdentityHeaders } from "../types/auth.js";
import type { TokenVerifier } from "../services/token-verifier.js";

export const MISSING_HEADER_MESSAGE = "Missing Authorization Header";
export const INVALID_FORMAT_MESSAGE = "Invalid Authorization Header format";
export const INVALID_TOKEN_MESSAGE = "Invalid Token";

const BEARER_PREFIX = "Bearer ";

export interface IdentityMiddlewareOptions {
  readonly verifier: TokenVerifier;
  readonly logger: Logger;
}

export function identityMiddleware(
  options: IdentityMiddlewareOptions,
): MiddlewareHandler<AppEnv> {
  const log = options.logger.child({ component: "identity" });

  return async (c, next) => {
    const authHeader = c.req.header("Authorization");
    if (authHeader === undefined || authHeader === "") {
      return c.text(MISSING_HEADER_MESSAGE, 401);
    }
    if (!authHeader.startsWith(BEARER_PREFIX)) {
      return c.text(INVALID_FORMAT_MESSAGE, 401);
    }

    const result = options.verifier.verify(
      authHeader.slice(BEARER_PREFIX.length),
    );
    if (!result.ok) {
      log.warn(
        {
          requestId: c.get("requestId"),
          kind: result.error.kind,
          err: result.error.message,
        },
        "error parsing token",
      );
      return c.text(INVALID_TOKEN_MESSAGE, 401);
    }

    const identityHeaders = toIdentityHeaders(result.claims);
    c.set("claims", result.claims);
    c.set("identityHeaders", identityHeaders);

    log.debug(
      { requestId: c.get("requestId"), sub: result.claims.subject },
      "injecting user info headers",
    );

    await next();
  };
}
