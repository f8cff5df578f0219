/**
 * @switchyard/gateway
 *
 * One HTTP endpoint that answers each call either immediately with JSON or
 * incrementally as an SSE stream, with sessions, resume and cancellation.
 */

// Main exports
export { Gateway, createGateway, type GatewayStatus } from "./gateway.js";
export { SessionStore, generateSessionId } from "./session-store.js";
export type {
  SessionStoreConfig,
  SessionRequest,
  ResolvedSession,
  RemovalReason,
} from "./session-store.js";
export { MethodRegistry, type MethodInfo, type MethodInvoker } from "./method-registry.js";
export {
  decideResponseMode,
  createNegotiationPolicy,
  paramsSize,
  DEFAULT_PARAMS_SIZE_THRESHOLD,
} from "./negotiator.js";
export {
  CallDispatcher,
  isAsyncIterable,
  DEFAULT_CALL_IDLE_TIMEOUT_MS,
  type InboundCall,
  type DispatchOutcome,
  type ImmediateOutcome,
  type StreamedOutcome,
  type CallSummary,
  type CallDispatcherOptions,
} from "./dispatcher.js";
export {
  ReplayRegistry,
  DEFAULT_REPLAY_CAPACITY,
  DEFAULT_REPLAY_GRACE_MS,
  type ReplayConfig,
} from "./replay-buffer.js";

// Transport layer
export {
  HTTPTransport,
  extractToken,
  type HTTPTransportConfig,
  type HttpRequest,
  type HttpResponse,
} from "./http-transport.js";
export {
  createSSEWriter,
  setSSEHeaders,
  type SSEWriter,
  type SSEWriterOptions,
  type SSEStream,
} from "./sse.js";

// Testing utilities live in "@switchyard/gateway/testing" and are not re-exported
// here to keep test doubles out of production bundles.

// Configuration
export {
  resolveGatewayConfig,
  loadConfigFromEnv,
  DEFAULT_PORT,
  DEFAULT_HOST,
  DEFAULT_PATH,
  DEFAULT_KEEPALIVE_MS,
  DEFAULT_SESSION_IDLE_TIMEOUT_MS,
  DEFAULT_SESSION_SWEEP_INTERVAL_MS,
  type ResolvedGatewayConfig,
  type EnvConfig,
} from "./config.js";

export {
  type GatewayConfig,
  type GatewayEvents,
  type Session,
  type SessionCapabilities,
  type CallState,
  type CallContext,
  type MethodClass,
  type NegotiationPolicy,
  type NegotiationPolicyInput,
  // Method types
  type MethodDefinition,
  type MethodDefinitionInput,
  type MethodNamespace,
  type MethodsConfig,
  type Method,
  type MethodHandler,
  type SimpleMethodHandler,
  type StreamingMethodHandler,
  // Method factory
  method,
  isMethodDefinition,
  METHOD_DEFINITION,
  // Schema type for Zod 3/4 compatibility
  type ZodLikeSchema,
} from "./types.js";
