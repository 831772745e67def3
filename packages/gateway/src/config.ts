/**
 * Configuration.
 *
 * Two sources, both validated with Zod:
 * - the gateway file (YAML): listen port, signing secret, services;
 * - the process environment: runtime knobs plus overrides for the
 *   signing secret and each service's target URL.
 *
 * The result is a frozen GatewayConfig; the dispatcher never reads the
 * environment itself.
 */

import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { GatewayConfig, RouteDescriptor } from "./types/registry.js";
import { GatewayConfigError } from "./types/error.js";

// =============================================================================
// Runtime environment
// =============================================================================

export const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),
  CONFIG_PATH: z.string().default("config.yaml"),
  UPSTREAM_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
  SHUTDOWN_GRACE_MS: z.coerce.number().int().min(0).default(5000),
});

export type RuntimeConfig = z.infer<typeof EnvSchema>;

/**
 * Load and validate runtime settings from process.env.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadRuntimeConfig(
  env: Record<string, string | undefined> = process.env,
): RuntimeConfig {
  return EnvSchema.parse(env);
}

// =============================================================================
// Gateway file
// =============================================================================

/** Accepts 8080, "8080" and ":8080". */
const PortSchema = z
  .union([
    z.number(),
    z
      .string()
      .regex(/^:?\d+$/, "expected a port such as 8080 or \":8080\"")
      .transform((s) => Number(s.replace(/^:/, ""))),
  ])
  .pipe(z.number().int().min(1).max(65535));

const ServiceSchema = z.object({
  name: z.string().min(1),
  path_prefix: z.string().startsWith("/", "must start with \"/\""),
  target_url: z.string().default(""),
  strip_prefix: z.string().default(""),
  auth_required: z.boolean().default(false),
  env_var: z.string().optional(),
});

export const GatewayFileSchema = z.object({
  server: z.object({ port: PortSchema.default(8080) }).default({}),
  jwt_secret: z.string().default(""),
  services: z.array(ServiceSchema).default([]),
});

export type GatewayFile = z.infer<typeof GatewayFileSchema>;

/**
 * Parse a port given on the command line.
 *
 * @throws {GatewayConfigError} if the value is not a valid port
 */
export function parsePort(value: string): number {
  const result = PortSchema.safeParse(value);
  if (!result.success) {
    throw new GatewayConfigError(`invalid port "${value}"`);
  }
  return result.data;
}

// =============================================================================
// Overrides
// =============================================================================

export interface EnvOverride {
  /** Service name, or "jwt_secret" for the signing secret. */
  readonly target: string;
  readonly variable: string;
}

export interface LoadedConfig {
  readonly config: GatewayConfig;
  /** Settings that came from the environment instead of the file. */
  readonly overrides: readonly EnvOverride[];
}

/**
 * Default environment variable holding a service's URL:
 * "user-service" → "USER_SERVICE_SERVICE_URL".
 */
export function serviceUrlVariable(serviceName: string): string {
  return `${serviceName.toUpperCase().replace(/-/g, "_")}_SERVICE_URL`;
}

function isAbsoluteHttpUrl(raw: string): boolean {
  try {
    const url = new URL(raw);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Validate a parsed gateway file and apply environment overrides.
 *
 * @throws {GatewayConfigError} listing every problem found
 */
export function resolveGatewayConfig(
  raw: unknown,
  env: Record<string, string | undefined> = process.env,
): LoadedConfig {
  const parsed = GatewayFileSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (i) => `${i.path.join(".") || "(root)"}: ${i.message}`,
    );
    throw new GatewayConfigError(
      `invalid configuration: ${issues.join("; ")}`,
      issues,
    );
  }
  const file = parsed.data;
  const overrides: EnvOverride[] = [];
  const issues: string[] = [];

  let signingSecret = file.jwt_secret;
  const envSecret = env["JWT_SECRET"];
  if (envSecret !== undefined && envSecret !== "") {
    signingSecret = envSecret;
    overrides.push({ target: "jwt_secret", variable: "JWT_SECRET" });
  }

  const routes: RouteDescriptor[] = file.services.map((s) => {
    const variable =
      s.env_var !== undefined && s.env_var !== ""
        ? s.env_var
        : serviceUrlVariable(s.name);
    let targetUrl = s.target_url;
    const fromEnv = env[variable];
    if (fromEnv !== undefined && fromEnv !== "") {
      targetUrl = fromEnv;
      overrides.push({ target: s.name, variable });
    }
    if (!isAbsoluteHttpUrl(targetUrl)) {
      issues.push(
        `service "${s.name}": target url "${targetUrl}" is not an absolute http(s) URL`,
      );
    }
    return Object.freeze({
      name: s.name,
      pathPrefix: s.path_prefix,
      targetUrl,
      stripPrefix: s.strip_prefix,
      authRequired: s.auth_required,
    });
  });

  if (signingSecret === "" && routes.some((r) => r.authRequired)) {
    issues.push(
      "jwt_secret (or JWT_SECRET) is required when any service has auth_required",
    );
  }

  if (issues.length > 0) {
    throw new GatewayConfigError(
      `invalid configuration: ${issues.join("; ")}`,
      issues,
    );
  }

  const config: GatewayConfig = {
    listenPort: file.server.port,
    signingSecret,
    routes: Object.freeze(routes),
  };
  return { config: Object.freeze(config), overrides };
}

/**
 * Read the YAML gateway file at `path` and resolve it.
 *
 * @throws {GatewayConfigError} if the file cannot be read, parsed or validated
 */
export function loadGatewayConfig(
  path: string,
  env: Record<string, string | undefined> = process.env,
): LoadedConfig {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err: unknown) {
    throw new GatewayConfigError(
      `failed to read config file: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err: unknown) {
    throw new GatewayConfigError(
      `failed to parse config yaml: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return resolveGatewayConfig(raw, env);
}
