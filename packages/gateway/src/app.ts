/**
 * Gateway application factory.
 *
 * Builds the Hono router from a validated configuration: global
 * middleware, the liveness probe, and one forwarding chain per service.
 * main.ts serves it; tests drive it with `app.request()` without
 * starting the HTTP server.
 */

import { Hono } from "hono";
import type { Handler } from "hono";
import { cors } from "hono/cors";
import type { Logger } from "pino";
import type { AppEnv } from "./types/api-contract.js";
import type { GatewayConfig } from "./types/registry.js";
import { GatewayConfigError } from "./types/error.js";
import {
  USER_ID_HEADER,
  USER_ROLES_HEADER,
  USER_SUBJECT_HEADER,
} from "./types/auth.js";
import { createErrorHandler } from "./middleware/error-handler.js";
import { requestIdMiddleware } from "./middleware/request-id.js";
import { loggerMiddleware } from "./middleware/logger.js";
import type { RequestLogEntry } from "./middleware/logger.js";
import { identityMiddleware } from "./middleware/identity.js";
import { createTokenVerifier } from "./services/token-verifier.js";
import { createForwarder } from "./services/forwarder.js";
import type { FetchFn, ResponseObserver } from "./services/forwarder.js";
import { ServiceRegistry, routePatterns } from "./services/service-registry.js";
import { createHealthRoutes } from "./routes/health.js";

// =============================================================================
// Options
// =============================================================================

export type CorsOptions = NonNullable<Parameters<typeof cors>[0]>;

export const DEFAULT_CORS_OPTIONS: CorsOptions = {
  origin: "*",
  allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS"],
  allowHeaders: [
    "Accept",
    "Authorization",
    "Content-Type",
    "X-CSRF-Token",
    USER_SUBJECT_HEADER,
    USER_ID_HEADER,
    USER_ROLES_HEADER,
  ],
  exposeHeaders: ["Link"],
  credentials: true,
  maxAge: 300,
};

export interface CreateGatewayOptions {
  readonly config: GatewayConfig;
  readonly logger: Logger;
  readonly logFn?: ((entry: RequestLogEntry) => void) | undefined;
  /** Upstream call timeout in ms. Omit to wait for the client. */
  readonly upstreamTimeoutMs?: number | undefined;
  /** Seconds of clock skew tolerated on token time claims. */
  readonly clockToleranceSec?: number | undefined;
  readonly cors?: CorsOptions | undefined;
  readonly onResponse?: ResponseObserver | undefined;
  readonly fetchImpl?: FetchFn | undefined;
}

export interface RegisteredRoute {
  readonly name: string;
  readonly patterns: readonly string[];
  readonly targetUrl: string;
  readonly authRequired: boolean;
}

export interface GatewayInstance {
  readonly app: Hono<AppEnv>;
  readonly registry: ServiceRegistry;
  /** Routes in the order they were registered. */
  readonly routes: readonly RegisteredRoute[];
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create the gateway application.
 *
 * @throws {GatewayConfigError} if a route cannot be built; the gateway
 * must not start with a broken route.
 */
export function createGateway(options: CreateGatewayOptions): GatewayInstance {
  const { config, logger } = options;
  const registry = new ServiceRegistry(config.routes);

  const needsAuth = registry.routes.some((r) => r.authRequired);
  if (needsAuth && config.signingSecret === "") {
    throw new GatewayConfigError(
      "a signing secret is required when any service has auth_required",
    );
  }

  const app = new Hono<AppEnv>();

  // ─── Global Middleware ───────────────────────────────────────────
  app.use("*", requestIdMiddleware());

  if (options.logFn !== undefined) {
    app.use("*", loggerMiddleware(options.logFn));
  }

  app.use("*", cors(options.cors ?? DEFAULT_CORS_OPTIONS));

  // ─── Error Handler ──────────────────────────────────────────────
  app.onError(createErrorHandler(logger));

  // ─── Health (no auth required) ──────────────────────────────────
  app.route("/", createHealthRoutes());

  // ─── Services ───────────────────────────────────────────────────
  const auth = identityMiddleware({
    verifier: createTokenVerifier({
      secret: config.signingSecret,
      clockToleranceSec: options.clockToleranceSec,
    }),
    logger,
  });

  const routes: RegisteredRoute[] = [];

  for (const route of registry.registrationOrder()) {
    let forwarder: Handler<AppEnv>;
    try {
      forwarder = createForwarder({
        name: route.name,
        targetUrl: route.targetUrl,
        stripPrefix: route.stripPrefix,
        logger,
        timeoutMs: options.upstreamTimeoutMs,
        onResponse: options.onResponse,
        fetchImpl: options.fetchImpl,
      });
    } catch (err: unknown) {
      logger.error({ service: route.name, err }, "failed to create proxy");
      throw err;
    }

    const patterns = routePatterns(route.pathPrefix);
    for (const pattern of patterns) {
      if (route.authRequired) {
        app.all(pattern, auth, forwarder);
      } else {
        app.all(pattern, forwarder);
      }
    }

    routes.push({
      name: route.name,
      patterns,
      targetUrl: route.targetUrl,
      authRequired: route.authRequired,
    });
    logger.info(
      {
        name: route.name,
        prefix: route.pathPrefix,
        target: route.targetUrl,
        authRequired: route.authRequired,
      },
      "registered service",
    );
  }

  return { app, registry, routes };
}

/**
 * Build just the router for a configuration.
 */
export function buildRouter(
  config: GatewayConfig,
  deps: Omit<CreateGatewayOptions, "config">,
): Hono<AppEnv> {
  return createGateway({ ...deps, config }).app;
}
