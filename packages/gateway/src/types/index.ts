/**
 * Type barrel: re-exports all public types.
 */

// Error
export {
  createErrorEnvelope,
  GatewayConfigError,
  TokenVerificationError,
} from "./error.js";
export type {
  ApiErrorCode,
  ErrorDetail,
  ErrorEnvelope,
  VerificationErrorKind,
} from "./error.js";

// Auth
export {
  HMAC_DIGESTS,
  IDENTITY_HEADER_NAMES,
  USER_ID_HEADER,
  USER_ROLES_HEADER,
  USER_SUBJECT_HEADER,
  isHmacAlgorithm,
  toIdentityHeaders,
} from "./auth.js";
export type {
  ClaimSet,
  HmacAlgorithm,
  IdentityHeaderName,
  IdentityHeaders,
} from "./auth.js";

// Registry
export type { GatewayConfig, RouteDescriptor } from "./registry.js";

// App env
export type { AppEnv } from "./api-contract.js";
