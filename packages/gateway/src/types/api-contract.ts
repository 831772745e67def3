/**
 * Hono application environment type.
 *
 * Defines the typed context variables available to every handler in a
 * route chain. They live for one request and are never shared.
 */

import type { HttpBindings } from "@hono/node-server";
import type { ClaimSet, IdentityHeaders } from "./auth.js";

export interface AppEnv {
  /** Node request/response pair; absent under `app.request()`. */
  Bindings: Partial<HttpBindings>;

  Variables: {
    /** Unique request identifier (set by request-id middleware) */
    requestId: string;

    /** Verified claims (set by identity middleware on protected routes) */
    claims: ClaimSet | undefined;

    /** Identity headers derived from `claims`, re-applied by the forwarder */
    identityHeaders: IdentityHeaders | undefined;

    /** Name of the service the request was routed to (set by the forwarder) */
    service: string | undefined;
  };
}
