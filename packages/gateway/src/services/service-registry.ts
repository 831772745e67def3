/**
 * ServiceRegistry: the ordered set of path prefixes the gateway serves.
 *
 * Descriptors are copied and frozen on construction. Configuration order
 * is kept for reporting; registration order puts longer prefixes first so
 * that a first-match router behaves like a longest-prefix router.
 */

import type { RouteDescriptor } from "../types/registry.js";
import { GatewayConfigError } from "../types/error.js";

/**
 * Router patterns for a prefix: the prefix itself and everything below it.
 */
export function routePatterns(pathPrefix: string): readonly [string, string] {
  const base = pathPrefix.endsWith("/") ? pathPrefix.slice(0, -1) : pathPrefix;
  return [pathPrefix, `${base}/*`];
}

export class ServiceRegistry {
  private readonly _routes: readonly RouteDescriptor[];

  constructor(routes: readonly RouteDescriptor[]) {
    const issues: string[] = [];
    const names = new Set<string>();
    const prefixes = new Set<string>();

    for (const route of routes) {
      if (route.name === "") {
        issues.push("service name must not be empty");
      } else if (names.has(route.name)) {
        issues.push(`duplicate service name "${route.name}"`);
      }
      if (!route.pathPrefix.startsWith("/")) {
        issues.push(
          `service "${route.name}": path prefix "${route.pathPrefix}" must start with "/"`,
        );
      } else if (prefixes.has(route.pathPrefix)) {
        issues.push(`duplicate path prefix "${route.pathPrefix}"`);
      }
      names.add(route.name);
      prefixes.add(route.pathPrefix);
    }

    if (issues.length > 0) {
      throw new GatewayConfigError(
        `invalid service registry: ${issues.join("; ")}`,
        issues,
      );
    }

    this._routes = Object.freeze(routes.map((r) => Object.freeze({ ...r })));
  }

  /** Descriptors in configuration order. */
  get routes(): readonly RouteDescriptor[] {
    return this._routes;
  }

  get size(): number {
    return this._routes.length;
  }

  /**
   * Descriptors in the order they must be registered: longest prefix
   * first, configuration order among equals.
   */
  registrationOrder(): readonly RouteDescriptor[] {
    return [...this._routes].sort(
      (a, b) => b.pathPrefix.length - a.pathPrefix.length,
    );
  }

  find(name: string): RouteDescriptor | undefined {
    return this._routes.find((r) => r.name === name);
  }
}
