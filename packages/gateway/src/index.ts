/**
 * Public API.
 */

export { createGateway, buildRouter, DEFAULT_CORS_OPTIONS } from "./app.js";
export type {
  CorsOptions,
  CreateGatewayOptions,
  GatewayInstance,
  RegisteredRoute,
} from "./app.js";
export {
  EnvSchema,
  GatewayFileSchema,
  loadGatewayConfig,
  loadRuntimeConfig,
  parsePort,
  resolveGatewayConfig,
  serviceUrlVariable,
} from "./config.js";
export type {
  EnvOverride,
  GatewayFile,
  LoadedConfig,
  RuntimeConfig,
} from "./config.js";
export {
  createTokenVerifier,
  signToken,
  verifyToken,
} from "./services/token-verifier.js";
export type {
  TokenVerifier,
  TokenVerifierConfig,
  VerifyOptions,
  VerifyResult,
} from "./services/token-verifier.js";
export {
  buildUpstreamUrl,
  createForwarder,
  joinPaths,
  parseTargetUrl,
  stripPathPrefix,
} from "./services/forwarder.js";
export type {
  FetchFn,
  ForwarderOptions,
  ResponseObserver,
  UpstreamResponseInfo,
} from "./services/forwarder.js";
export { ServiceRegistry, routePatterns } from "./services/service-registry.js";
export * from "./middleware/index.js";
export * from "./routes/index.js";
export * from "./types/index.js";
