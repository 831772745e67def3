/**
 * Service registry types.
 */

/**
 * Binds a path prefix to one backend.
 */
export interface RouteDescriptor {
  readonly name: string;
  /** Starts with "/". Matches the prefix itself and every path below it. */
  readonly pathPrefix: string;
  /** Absolute http(s) base URL of the backend. */
  readonly targetUrl: string;
  /** Removed once from the front of the request path; "" disables it. */
  readonly stripPrefix: string;
  readonly authRequired: boolean;
}

/**
 * Validated gateway configuration consumed by the dispatcher.
 */
export interface GatewayConfig {
  readonly listenPort: number;
  readonly signingSecret: string;
  readonly routes: readonly RouteDescriptor[];
}
