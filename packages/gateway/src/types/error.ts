/**
 * Error envelope types for gateway-generated responses.
 *
 * All JSON error responses follow the shape:
 * { error: { code: string, message: string, details?: Record<string, unknown> } }
 *
 * Responses proxied from a backend are passed through untouched.
 */

// =============================================================================
// Error Codes
// =============================================================================

export type ApiErrorCode =
  | "BAD_GATEWAY"
  | "GATEWAY_TIMEOUT"
  | "INTERNAL_ERROR";

// =============================================================================
// Error Response
// =============================================================================

export interface ErrorDetail {
  readonly code: ApiErrorCode | string;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface ErrorEnvelope {
  readonly error: ErrorDetail;
}

// =============================================================================
// Factory
// =============================================================================

export function createErrorEnvelope(
  code: ApiErrorCode | string,
  message: string,
  details?: Record<string, unknown>,
): ErrorEnvelope {
  const error: ErrorDetail = { code, message };
  if (details !== undefined) {
    return { error: { ...error, details } };
  }
  return { error };
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Configuration or construction failure. Always fatal at startup.
 */
export class GatewayConfigError extends Error {
  public readonly code = "CONFIG_INVALID";

  constructor(
    message: string,
    public readonly issues: readonly string[] = [],
  ) {
    super(message);
    this.name = "GatewayConfigError";
  }
}

/** Reasons a bearer token can be rejected. */
export type VerificationErrorKind =
  | "MalformedToken"
  | "UnsupportedAlgorithm"
  | "InvalidSignature"
  | "InvalidClaims"
  | "TokenExpired"
  | "TokenNotYetValid";

/**
 * Token verification failure. The kind is for logs only and is never
 * sent to the client.
 */
export class TokenVerificationError extends Error {
  public readonly kind: VerificationErrorKind;

  constructor(kind: VerificationErrorKind, message: string) {
    super(message);
    this.name = "TokenVerificationError";
    this.kind = kind;
  }
}
