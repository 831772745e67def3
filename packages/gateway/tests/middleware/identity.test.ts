/**
 * Tests for the identity middleware.
 *
 * Verifies:
 * - Missing / malformed / invalid Authorization → 401 with fixed bodies
 * - The wrapped handler is never reached on failure
 * - Claims and identity headers are set on the context on success
 * - Rejection reasons are logged but not returned
 */

import { describe, it, expect } from "vitest";
import { Hono } from "hono";
import type { Logger } from "pino";
import type { AppEnv } from "../../src/types/api-contract.js";
import {
  identityMiddleware,
  INVALID_FORMAT_MESSAGE,
  INVALID_TOKEN_MESSAGE,
  MISSING_HEADER_MESSAGE,
} from "../../src/middleware/identity.js";
import {
  createTokenVerifier,
  signToken,
} from "../../src/services/token-verifier.js";
import { capturingLogger, silentLogger, TEST_SECRET } from "../setup.js";

function makeApp(logger: Logger = silentLogger()) {
  let reached = 0;
  const app = new Hono<AppEnv>();
  app.use(
    "*",
    identityMiddleware({
      verifier: createTokenVerifier({ secret: TEST_SECRET }),
      logger,
    }),
  );
  app.get("/test", (c) => {
    reached += 1;
    return c.json({
      claims: c.get("claims"),
      identityHeaders: c.get("identityHeaders"),
    });
  });
  return { app, reached: () => reached };
}

describe("identityMiddleware: rejections", () => {
  it("returns 401 when the Authorization header is missing", async () => {
    const { app, reached } = makeApp();
    const res = await app.request("/test");

    expect(res.status).toBe(401);
    expect(await res.text()).toBe(MISSING_HEADER_MESSAGE);
    expect(reached()).toBe(0);
  });

  it("treats an empty Authorization header as missing", async () => {
    const { app } = makeApp();
    const res = await app.request("/test", {
      headers: { Authorization: "" },
    });

    expect(res.status).toBe(401);
    expect(await res.text()).toBe("Missing Authorization Header");
  });

  it("returns 401 for a non-Bearer scheme", async () => {
    const { app, reached } = makeApp();
    const res = await app.request("/test", {
      headers: { Authorization: "Basic dXNlcjpwYXNz" },
    });

    expect(res.status).toBe(401);
    expect(await res.text()).toBe(INVALID_FORMAT_MESSAGE);
    expect(reached()).toBe(0);
  });

  it("is case-sensitive about the Bearer prefix", async () => {
    const { app } = makeApp();
    const token = signToken({ sub: "u" }, TEST_SECRET);
    const res = await app.request("/test", {
      headers: { Authorization: `bearer ${token}` },
    });

    expect(await res.text()).toBe("Invalid Authorization Header format");
  });

  it("returns 401 Invalid Token for a bad token", async () => {
    const { app, reached } = makeApp();
    const res = await app.request("/test", {
      headers: { Authorization: "Bearer not.a.token" },
    });

    expect(res.status).toBe(401);
    expect(await res.text()).toBe(INVALID_TOKEN_MESSAGE);
    expect(reached()).toBe(0);
  });

  it("returns 401 Invalid Token for an expired token", async () => {
    const { app } = makeApp();
    const token = signToken(
      { sub: "u", exp: Math.floor(Date.now() / 1000) - 60 },
      TEST_SECRET,
    );
    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(401);
    expect(await res.text()).toBe("Invalid Token");
  });

  it("logs the rejection kind without putting it in the body", async () => {
    const { logger, lines } = capturingLogger();
    const { app } = makeApp(logger);
    const token = signToken({ sub: "u" }, "another-secret");

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(await res.text()).toBe("Invalid Token");
    const warning = lines.find((l) => l["msg"] === "error parsing token");
    expect(warning?.["kind"]).toBe("InvalidSignature");
    expect(warning?.["component"]).toBe("identity");
  });
});

describe("identityMiddleware: success", () => {
  it("sets claims and identity headers on the context", async () => {
    const { app, reached } = makeApp();
    const token = signToken({ sub: "user-7", roles: ["a", "b"] }, TEST_SECRET);

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    expect(res.status).toBe(200);
    expect(reached()).toBe(1);
    const body = (await res.json()) as {
      claims: { subject: string; roles: string[] };
      identityHeaders: Record<string, string>;
    };
    expect(body.claims.subject).toBe("user-7");
    expect(body.claims.roles).toEqual(["a", "b"]);
    expect(body.identityHeaders).toEqual({
      "X-User-Subject": "user-7",
      "X-User-Id": "user-7",
      "X-User-Roles": "a,b",
    });
  });

  it("leaves roles undefined when the token has none", async () => {
    const { app } = makeApp();
    const token = signToken({ sub: "user-7" }, TEST_SECRET);

    const res = await app.request("/test", {
      headers: { Authorization: `Bearer ${token}` },
    });

    const body = (await res.json()) as {
      identityHeaders: Record<string, string | undefined>;
    };
    // JSON drops undefined values
    expect(body.identityHeaders).toEqual({
      "X-User-Subject": "user-7",
      "X-User-Id": "user-7",
    });
  });
});
