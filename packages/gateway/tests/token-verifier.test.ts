/**
 * Tests for the token verifier.
 *
 * Verifies:
 * - HS256/HS384/HS512 tokens verify and yield subject + roles
 * - Non-HMAC algorithms are rejected (including alg confusion)
 * - Shape, signature, claim and time-window failures map to their kinds
 */

import { createHmac } from "node:crypto";
import { describe, it, expect } from "vitest";
import {
  createTokenVerifier,
  signToken,
  verifyToken,
} from "../src/services/token-verifier.js";
import { TokenVerificationError } from "../src/types/error.js";

const SECRET = "test-secret";
const NOW = 1_700_000_000;
const at = (now: number) => ({ now: () => now });

function b64(value: unknown): string {
  return Buffer.from(JSON.stringify(value)).toString("base64url");
}

/** Build a token with an arbitrary header, HMAC-SHA256 signed. */
function craft(header: unknown, payload: unknown, secret = SECRET): string {
  const input = `${b64(header)}.${b64(payload)}`;
  const sig = createHmac("sha256", secret).update(input).digest("base64url");
  return `${input}.${sig}`;
}

function errorKind(token: string, options = at(NOW)): string | undefined {
  const result = verifyToken(token, SECRET, options);
  return result.ok ? undefined : result.error.kind;
}

// =============================================================================
// Success
// =============================================================================

describe("verifyToken: valid tokens", () => {
  it("returns subject and roles for an HS256 token", () => {
    const token = signToken(
      { sub: "user-1", roles: ["admin", "editor"], exp: NOW + 60 },
      SECRET,
    );

    const result = verifyToken(token, SECRET, at(NOW));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.claims.subject).toBe("user-1");
    expect(result.claims.roles).toEqual(["admin", "editor"]);
    expect(result.claims.expiresAt).toBe(NOW + 60);
    expect(result.claims.notBefore).toBeUndefined();
  });

  it.each(["HS256", "HS384", "HS512"] as const)("accepts %s", (alg) => {
    const token = signToken({ sub: "user-1" }, SECRET, alg);
    expect(verifyToken(token, SECRET, at(NOW)).ok).toBe(true);
  });

  it("defaults roles to an empty list when the claim is absent", () => {
    const result = verifyToken(signToken({ sub: "u" }, SECRET), SECRET, at(NOW));
    expect(result.ok && result.claims.roles).toEqual([]);
  });

  it("ignores a roles claim that is not an array", () => {
    const token = signToken({ sub: "u", roles: "admin" }, SECRET);
    const result = verifyToken(token, SECRET, at(NOW));
    expect(result.ok && result.claims.roles).toEqual([]);
  });

  it("stringifies non-string role entries", () => {
    const token = signToken({ sub: "u", roles: [1, "ops", true] }, SECRET);
    const result = verifyToken(token, SECRET, at(NOW));
    expect(result.ok && result.claims.roles).toEqual(["1", "ops", "true"]);
  });

  it("keeps unmodelled claims and freezes the claim set", () => {
    const token = signToken({ sub: "u", tenant: "acme" }, SECRET);
    const result = verifyToken(token, SECRET, at(NOW));

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.claims.claims["tenant"]).toBe("acme");
    expect(Object.isFrozen(result.claims)).toBe(true);
    expect(Object.isFrozen(result.claims.roles)).toBe(true);
    expect(Object.isFrozen(result.claims.claims)).toBe(true);
  });

  it("accepts a token whose exp equals the current time", () => {
    const token = signToken({ sub: "u", exp: NOW }, SECRET);
    expect(errorKind(token)).toBeUndefined();
  });
});

// =============================================================================
// Algorithm restriction
// =============================================================================

describe("verifyToken: algorithms", () => {
  it("rejects an RS256 header even when HMAC-signed with the secret", () => {
    const token = craft({ alg: "RS256", typ: "JWT" }, { sub: "u" });
    expect(errorKind(token)).toBe("UnsupportedAlgorithm");
  });

  it("rejects alg none with an empty signature", () => {
    const token = `${b64({ alg: "none" })}.${b64({ sub: "u" })}.`;
    expect(errorKind(token)).toBe("UnsupportedAlgorithm");
  });

  it("rejects a header without alg", () => {
    const token = craft({ typ: "JWT" }, { sub: "u" });
    expect(errorKind(token)).toBe("UnsupportedAlgorithm");
  });

  it("rejects an ES256 header", () => {
    const token = craft({ alg: "ES256" }, { sub: "u" });
    expect(errorKind(token)).toBe("UnsupportedAlgorithm");
  });
});

// =============================================================================
// Failures
// =============================================================================

describe("verifyToken: failures", () => {
  it("rejects tokens without three segments", () => {
    expect(errorKind("abc")).toBe("MalformedToken");
    expect(errorKind("a.b")).toBe("MalformedToken");
    expect(errorKind("a.b.c.d")).toBe("MalformedToken");
    expect(errorKind("")).toBe("MalformedToken");
  });

  it("rejects a header that is not base64url JSON", () => {
    expect(errorKind(`not-json.${b64({ sub: "u" })}.sig`)).toBe("MalformedToken");
    expect(errorKind(`${b64([1, 2])}.${b64({ sub: "u" })}.sig`)).toBe(
      "MalformedToken",
    );
  });

  it("rejects a payload that is not a JSON object", () => {
    const token = craft({ alg: "HS256" }, "just-a-string");
    expect(errorKind(token)).toBe("MalformedToken");
  });

  it("rejects a token signed with another secret", () => {
    const token = signToken({ sub: "u" }, "other-secret");
    expect(errorKind(token)).toBe("InvalidSignature");
  });

  it("rejects a tampered payload", () => {
    const token = signToken({ sub: "user-1" }, SECRET);
    const [header, , signature] = token.split(".");
    const forged = `${header}.${b64({ sub: "admin" })}.${signature}`;
    expect(errorKind(forged)).toBe("InvalidSignature");
  });

  it("rejects a token without a string sub", () => {
    expect(errorKind(signToken({ roles: ["a"] }, SECRET))).toBe("InvalidClaims");
    expect(errorKind(signToken({ sub: 42 }, SECRET))).toBe("InvalidClaims");
  });

  it("rejects non-numeric exp and nbf", () => {
    expect(errorKind(signToken({ sub: "u", exp: "soon" }, SECRET))).toBe(
      "InvalidClaims",
    );
    expect(errorKind(signToken({ sub: "u", nbf: "later" }, SECRET))).toBe(
      "InvalidClaims",
    );
  });

  it("rejects an expired token", () => {
    const token = signToken({ sub: "u", exp: NOW - 1 }, SECRET);
    expect(errorKind(token)).toBe("TokenExpired");
  });

  it("rejects a token that is not valid yet", () => {
    const token = signToken({ sub: "u", nbf: NOW + 10 }, SECRET);
    expect(errorKind(token)).toBe("TokenNotYetValid");
  });

  it("applies the clock tolerance to exp and nbf", () => {
    const expired = signToken({ sub: "u", exp: NOW - 5 }, SECRET);
    const early = signToken({ sub: "u", nbf: NOW + 5 }, SECRET);
    const options = { now: () => NOW, clockToleranceSec: 10 };

    expect(verifyToken(expired, SECRET, options).ok).toBe(true);
    expect(verifyToken(early, SECRET, options).ok).toBe(true);
  });

  it("returns a TokenVerificationError", () => {
    const result = verifyToken("abc", SECRET);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(TokenVerificationError);
    expect(result.error.name).toBe("TokenVerificationError");
  });
});

// =============================================================================
// Factory
// =============================================================================

describe("createTokenVerifier", () => {
  it("binds the secret at construction", () => {
    const verifier = createTokenVerifier({ secret: SECRET, now: () => NOW });

    expect(verifier.verify(signToken({ sub: "u" }, SECRET)).ok).toBe(true);
    expect(verifier.verify(signToken({ sub: "u" }, "nope")).ok).toBe(false);
  });

  it("passes the clock tolerance through", () => {
    const verifier = createTokenVerifier({
      secret: SECRET,
      now: () => NOW,
      clockToleranceSec: 30,
    });
    const token = signToken({ sub: "u", exp: NOW - 20 }, SECRET);

    expect(verifier.verify(token).ok).toBe(true);
  });
});
