/**
 * Token and identity types.
 *
 * Tokens are compact JWS strings signed with a shared secret. Only the
 * HMAC family is accepted; the verified claims are turned into the
 * identity headers that travel to the backends.
 */

// =============================================================================
// Algorithms
// =============================================================================

export type HmacAlgorithm = "HS256" | "HS384" | "HS512";

/** Node digest name for each supported `alg` value. */
export const HMAC_DIGESTS: Readonly<Record<HmacAlgorithm, string>> = {
  HS256: "sha256",
  HS384: "sha384",
  HS512: "sha512",
};

export function isHmacAlgorithm(alg: unknown): alg is HmacAlgorithm {
  return alg === "HS256" || alg === "HS384" || alg === "HS512";
}

// =============================================================================
// Claim Set
// =============================================================================

/**
 * Claims decoded from a verified token.
 *
 * Built once by the verifier and never mutated. `claims` keeps every
 * decoded claim so handlers can read fields the gateway does not model.
 */
export interface ClaimSet {
  readonly subject: string;
  readonly roles: readonly string[];
  readonly expiresAt?: number | undefined;
  readonly notBefore?: number | undefined;
  readonly claims: Readonly<Record<string, unknown>>;
}

// =============================================================================
// Identity Headers
// =============================================================================

export const USER_SUBJECT_HEADER = "X-User-Subject";
export const USER_ID_HEADER = "X-User-Id";
export const USER_ROLES_HEADER = "X-User-Roles";

export const IDENTITY_HEADER_NAMES = [
  USER_SUBJECT_HEADER,
  USER_ID_HEADER,
  USER_ROLES_HEADER,
] as const;

export type IdentityHeaderName = (typeof IDENTITY_HEADER_NAMES)[number];

/**
 * Identity header values for one request.
 *
 * An undefined value means the header must not reach the backend.
 */
export type IdentityHeaders = Readonly<
  Record<IdentityHeaderName, string | undefined>
>;

/**
 * Derive the outbound identity headers from a verified claim set.
 */
export function toIdentityHeaders(claims: ClaimSet): IdentityHeaders {
  return {
    [USER_SUBJECT_HEADER]: claims.subject,
    [USER_ID_HEADER]: claims.subject,
    [USER_ROLES_HEADER]:
      claims.roles.length > 0 ? claims.roles.join(",") : undefined,
  };
}
