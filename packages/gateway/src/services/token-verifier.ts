/**
 * Token verifier.
 *
 * Verifies compact JWS bearer tokens signed with a shared secret.
 * Only the HMAC family (HS256/HS384/HS512) is accepted. A header naming
 * any other algorithm (`none`, RS256, ES256, ...) is rejected before the
 * signature is computed.
 *
 * Time claims (`exp`, `nbf`) are enforced when present.
 */

import { createHmac, timingSafeEqual } from "node:crypto";
import type { ClaimSet, HmacAlgorithm } from "../types/auth.js";
import { HMAC_DIGESTS, isHmacAlgorithm } from "../types/auth.js";
import { TokenVerificationError } from "../types/error.js";

// =============================================================================
// Types
// =============================================================================

export type VerifyResult =
  | { readonly ok: true; readonly claims: ClaimSet }
  | { readonly ok: false; readonly error: TokenVerificationError };

export interface VerifyOptions {
  /** Seconds of clock skew tolerated on `exp` and `nbf`. Default: 0 */
  readonly clockToleranceSec?: number | undefined;
  /** Current time in seconds since the epoch. Default: wall clock */
  readonly now?: (() => number) | undefined;
}

export interface TokenVerifierConfig extends VerifyOptions {
  readonly secret: string;
}

export interface TokenVerifier {
  verify(token: string): VerifyResult;
}

// =============================================================================
// Factory
// =============================================================================

/**
 * Create a verifier bound to one secret.
 *
 * The secret is captured here and never read from the environment later.
 */
export function createTokenVerifier(config: TokenVerifierConfig): TokenVerifier {
  const options: VerifyOptions = {
    clockToleranceSec: config.clockToleranceSec,
    now: config.now,
  };
  const secret = config.secret;

  return {
    verify: (token) => verifyToken(token, secret, options),
  };
}

// =============================================================================
// Verification
// =============================================================================

const SEGMENT = /^[A-Za-z0-9_-]*$/;

function fail(
  kind: TokenVerificationError["kind"],
  message: string,
): VerifyResult {
  return { ok: false, error: new TokenVerificationError(kind, message) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function decodeSegment(segment: string): Record<string, unknown> | undefined {
  if (segment === "" || !SEGMENT.test(segment)) {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(
      Buffer.from(segment, "base64url").toString("utf-8"),
    );
    return isRecord(parsed) ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function sign(input: string, secret: string, alg: HmacAlgorithm): Buffer {
  return createHmac(HMAC_DIGESTS[alg], secret).update(input).digest();
}

/**
 * Verify a token against a secret.
 *
 * Checks run in order: header, algorithm, payload, signature, claims,
 * time window.
 */
export function verifyToken(
  token: string,
  secret: string,
  options: VerifyOptions = {},
): VerifyResult {
  const parts = token.split(".");
  if (parts.length !== 3) {
    return fail("MalformedToken", `expected 3 segments, got ${parts.length}`);
  }
  const [headerB64 = "", payloadB64 = "", signatureB64 = ""] = parts;

  const header = decodeSegment(headerB64);
  if (header === undefined) {
    return fail("MalformedToken", "header is not a base64url JSON object");
  }

  const alg = header["alg"];
  if (!isHmacAlgorithm(alg)) {
    return fail(
      "UnsupportedAlgorithm",
      `unexpected signing method: ${String(alg)}`,
    );
  }

  const payload = decodeSegment(payloadB64);
  if (payload === undefined) {
    return fail("MalformedToken", "payload is not a base64url JSON object");
  }
  if (signatureB64 === "" || !SEGMENT.test(signatureB64)) {
    return fail("MalformedToken", "signature is not base64url");
  }

  const expected = sign(`${headerB64}.${payloadB64}`, secret, alg);
  const actual = Buffer.from(signatureB64, "base64url");
  if (actual.length !== expected.length || !timingSafeEqual(actual, expected)) {
    return fail("InvalidSignature", "signature is invalid");
  }

  const sub = payload["sub"];
  if (typeof sub !== "string") {
    return fail("InvalidClaims", "sub claim must be a string");
  }
  const exp = payload["exp"];
  if (exp !== undefined && typeof exp !== "number") {
    return fail("InvalidClaims", "exp claim must be a number");
  }
  const nbf = payload["nbf"];
  if (nbf !== undefined && typeof nbf !== "number") {
    return fail("InvalidClaims", "nbf claim must be a number");
  }

  const now = options.now?.() ?? Math.floor(Date.now() / 1000);
  const leeway = options.clockToleranceSec ?? 0;
  if (exp !== undefined && now - leeway > exp) {
    return fail("TokenExpired", "token is expired");
  }
  if (nbf !== undefined && now + leeway < nbf) {
    return fail("TokenNotYetValid", "token is not valid yet");
  }

  const rawRoles = payload["roles"];
  const roles = Array.isArray(rawRoles)
    ? rawRoles.map((role: unknown) => String(role))
    : [];

  const claims: ClaimSet = {
    subject: sub,
    roles: Object.freeze(roles),
    expiresAt: exp,
    notBefore: nbf,
    claims: Object.freeze({ ...payload }),
  };
  return { ok: true, claims: Object.freeze(claims) };
}

// =============================================================================
// Signing
// =============================================================================

/**
 * Create a signed token for testing/bootstrapping.
 *
 * `iat` defaults to the current time.
 */
export function signToken(
  claims: Record<string, unknown>,
  secret: string,
  alg: HmacAlgorithm = "HS256",
): string {
  const header = Buffer.from(
    JSON.stringify({ alg, typ: "JWT" }),
  ).toString("base64url");

  const payload = Buffer.from(
    JSON.stringify({
      iat: Math.floor(Date.now() / 1000),
      ...claims,
    }),
  ).toString("base64url");

  const signature = sign(`${header}.${payload}`, secret, alg).toString(
    "base64url",
  );

  return `${header}.${payload}.${signature}`;
}
