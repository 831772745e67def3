/**
 * Upstream forwarder.
 *
 * One forwarder per registered service. It rewrites the inbound request
 * onto the service's base URL, forwards it with fetch, and streams the
 * backend response back unchanged apart from hop-by-hop headers.
 *
 * Path rewrite: strip `stripPrefix` once from the front of the request
 * path, then join the rest onto the target's base path. Query strings of
 * the target and the request are merged.
 *
 * The client address is appended to X-Forwarded-For when the request
 * came in over a socket.
 *
 * Identity headers are captured before the header rewrite and applied
 * again afterwards, so they reach the backend exactly as the identity
 * middleware (or, on open routes, the caller) left them.
 */

import type { Context, Handler } from "hono";
import { getConnInfo } from "@hono/node-server/conninfo";
import type { Logger } from "pino";
import type { AppEnv } from "../types/api-contract.js";
import type { IdentityHeaders } from "../types/auth.js";
import {
  IDENTITY_HEADER_NAMES,
  USER_ID_HEADER,
  USER_ROLES_HEADER,
  USER_SUBJECT_HEADER,
} from "../types/auth.js";
import { createErrorEnvelope, GatewayConfigError } from "../types/error.js";
import { REQUEST_ID_HEADER } from "../middleware/request-id.js";

// =============================================================================
// Types
// =============================================================================

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>;

/** What the observation hook sees once a backend has answered. */
export interface UpstreamResponseInfo {
  readonly service: string;
  readonly target: string;
  readonly method: string;
  readonly path: string;
  readonly status: number;
  readonly durationMs: number;
  readonly requestId: string;
}

export type ResponseObserver = (info: UpstreamResponseInfo) => void;

export interface ForwarderOptions {
  readonly name: string;
  readonly targetUrl: string;
  readonly stripPrefix?: string | undefined;
  readonly logger: Logger;
  /** Upstream call timeout. Omit to wait until the client gives up. */
  readonly timeoutMs?: number | undefined;
  /** Replaces the default "response from downstream" log line. */
  readonly onResponse?: ResponseObserver | undefined;
  readonly fetchImpl?: FetchFn | undefined;
}

// =============================================================================
// Rewrite helpers
// =============================================================================

/** Connection-specific headers (RFC 9110 §7.6.1). */
const HOP_BY_HOP = [
  "connection",
  "keep-alive",
  "proxy-authenticate",
  "proxy-authorization",
  "proxy-connection",
  "te",
  "trailer",
  "transfer-encoding",
  "upgrade",
] as const;

/**
 * Parse a service base URL.
 *
 * @throws {GatewayConfigError} if the URL is not absolute http(s)
 */
export function parseTargetUrl(raw: string): URL {
  let target: URL;
  try {
    target = new URL(raw);
  } catch {
    throw new GatewayConfigError(`invalid target url: "${raw}"`);
  }
  if (target.protocol !== "http:" && target.protocol !== "https:") {
    throw new GatewayConfigError(
      `invalid target url: "${raw}" (expected http or https)`,
    );
  }
  return target;
}

/**
 * Remove one leading occurrence of `stripPrefix` from `path`.
 */
export function stripPathPrefix(path: string, stripPrefix: string): string {
  if (stripPrefix !== "" && path.startsWith(stripPrefix)) {
    return path.slice(stripPrefix.length);
  }
  return path;
}

/**
 * Join a request path onto a base path with exactly one slash between.
 */
export function joinPaths(basePath: string, path: string): string {
  if (path === "") {
    return basePath === "" ? "/" : basePath;
  }
  const baseSlash = basePath.endsWith("/");
  const pathSlash = path.startsWith("/");
  if (baseSlash && pathSlash) {
    return basePath + path.slice(1);
  }
  if (!baseSlash && !pathSlash) {
    return `${basePath}/${path}`;
  }
  return basePath + path;
}

/**
 * Build the backend URL for an inbound request URL.
 */
export function buildUpstreamUrl(
  target: URL,
  inbound: URL,
  stripPrefix: string,
): string {
  const path = joinPaths(
    target.pathname,
    stripPathPrefix(inbound.pathname, stripPrefix),
  );
  const targetQuery = target.search.slice(1);
  const inboundQuery = inbound.search.slice(1);
  const query =
    targetQuery !== "" && inboundQuery !== ""
      ? `${targetQuery}&${inboundQuery}`
      : targetQuery + inboundQuery;

  return `${target.origin}${path}${query === "" ? "" : `?${query}`}`;
}

function dropHopByHop(headers: Headers): void {
  const listed = headers.get("connection");
  if (listed !== null) {
    for (const name of listed.split(",")) {
      const trimmed = name.trim();
      if (trimmed !== "") {
        headers.delete(trimmed);
      }
    }
  }
  for (const name of HOP_BY_HOP) {
    headers.delete(name);
  }
}

/**
 * Remote address of the client socket, or undefined when the request did
 * not come through the Node server.
 */
function clientAddress(c: Context<AppEnv>): string | undefined {
  const bindings: AppEnv["Bindings"] | undefined = c.env;
  if (bindings?.incoming === undefined) {
    return undefined;
  }
  return getConnInfo(c).remote.address;
}

function appendForwardedFor(headers: Headers, address: string): void {
  const prior = headers.get("x-forwarded-for");
  headers.set(
    "X-Forwarded-For",
    prior === null || prior.trim() === "" ? address : `${prior}, ${address}`,
  );
}

function readIdentityHeaders(headers: Headers): IdentityHeaders {
  return {
    [USER_SUBJECT_HEADER]: headers.get(USER_SUBJECT_HEADER) ?? undefined,
    [USER_ID_HEADER]: headers.get(USER_ID_HEADER) ?? undefined,
    [USER_ROLES_HEADER]: headers.get(USER_ROLES_HEADER) ?? undefined,
  };
}

function applyIdentityHeaders(
  headers: Headers,
  identity: IdentityHeaders,
): void {
  for (const name of IDENTITY_HEADER_NAMES) {
    const value = identity[name];
    if (value === undefined) {
      headers.delete(name);
    } else {
      headers.set(name, value);
    }
  }
}

function isTimeout(err: unknown): boolean {
  return (
    typeof err === "object" &&
    err !== null &&
    "name" in err &&
    err.name === "TimeoutError"
  );
}

// =============================================================================
// Forwarder
// =============================================================================

/**
 * Create the proxy handler for one service.
 *
 * @throws {GatewayConfigError} if `targetUrl` does not parse
 */
export function createForwarder(options: ForwarderOptions): Handler<AppEnv> {
  const target = parseTargetUrl(options.targetUrl);
  const stripPrefix = options.stripPrefix ?? "";
  const fetchImpl: FetchFn =
    options.fetchImpl ?? ((input, init) => fetch(input, init));
  const log = options.logger.child({ service: options.name });

  const observe: ResponseObserver =
    options.onResponse ??
    ((info) => {
      log.info(
        {
          target: info.target,
          status: info.status,
          path: info.path,
          durationMs: info.durationMs,
          requestId: info.requestId,
        },
        "response from downstream",
      );
    });

  return async (c) => {
    const inbound = new URL(c.req.url);
    const requestId = c.get("requestId");
    c.set("service", options.name);

    // Captured first: the header rewrite below must not lose them.
    const identity =
      c.get("identityHeaders") ?? readIdentityHeaders(c.req.raw.headers);

    const headers = new Headers(c.req.raw.headers);
    dropHopByHop(headers);
    headers.delete("host");
    // undici rejects it; the Node server has already sent 100 Continue
    headers.delete("expect");
    headers.set("X-Forwarded-Host", inbound.host);
    headers.set("X-Forwarded-Proto", inbound.protocol.slice(0, -1));
    const address = clientAddress(c);
    if (address !== undefined) {
      appendForwardedFor(headers, address);
    }
    if (requestId !== undefined) {
      headers.set(REQUEST_ID_HEADER, requestId);
    }
    applyIdentityHeaders(headers, identity);

    const method = c.req.method;
    const upstreamUrl = buildUpstreamUrl(target, inbound, stripPrefix);
    const signal =
      options.timeoutMs === undefined
        ? c.req.raw.signal
        : AbortSignal.any([
            c.req.raw.signal,
            AbortSignal.timeout(options.timeoutMs),
          ]);

    const init: RequestInit = {
      method,
      headers,
      redirect: "manual",
      signal,
    };
    if (method !== "GET" && method !== "HEAD" && c.req.raw.body !== null) {
      init.body = c.req.raw.body;
      init.duplex = "half";
    }

    const start = Date.now();
    let upstream: Response;
    try {
      upstream = await fetchImpl(upstreamUrl, init);
    } catch (err: unknown) {
      if (c.req.raw.signal.aborted) {
        log.info(
          { requestId, path: inbound.pathname },
          "client went away, upstream call cancelled",
        );
        return c.json(createErrorEnvelope("BAD_GATEWAY", "Bad gateway"), 502);
      }
      if (isTimeout(err)) {
        log.error(
          { requestId, target: options.targetUrl, timeoutMs: options.timeoutMs },
          "upstream request timed out",
        );
        return c.json(
          createErrorEnvelope("GATEWAY_TIMEOUT", "Gateway timeout"),
          504,
        );
      }
      log.error(
        { requestId, target: options.targetUrl, err },
        "upstream request failed",
      );
      return c.json(createErrorEnvelope("BAD_GATEWAY", "Bad gateway"), 502);
    }

    try {
      observe({
        service: options.name,
        target: options.targetUrl,
        method,
        path: inbound.pathname,
        status: upstream.status,
        durationMs: Date.now() - start,
        requestId: requestId ?? "",
      });
    } catch (err: unknown) {
      log.warn({ requestId, err }, "response observer failed");
    }

    const responseHeaders = new Headers(upstream.headers);
    dropHopByHop(responseHeaders);
    // fetch has already decoded the body
    if (responseHeaders.has("content-encoding")) {
      responseHeaders.delete("content-encoding");
      responseHeaders.delete("content-length");
    }

    return new Response(upstream.body, {
      status: upstream.status,
      statusText: upstream.statusText,
      headers: responseHeaders,
    });
  };
}
