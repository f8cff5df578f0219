/**
 * Gateway Types
 */

import type { CallId, MethodClass, ResponseMode } from "@switchyard/shared";
import type { HttpRequest } from "./http-transport.js";

/**
 * Schema type that works with both Zod 3 and Zod 4.
 * We only need parse() and type inference (_output).
 */
export interface ZodLikeSchema<T = unknown> {
  parse(data: unknown): T;
  _output: T;
}

// ============================================================================
// Gateway Configuration
// ============================================================================

export interface GatewayConfig {
  /**
   * Port to listen on (ignored in embedded mode)
   * @default 18790
   */
  port?: number;

  /**
   * Host to bind to (ignored in embedded mode)
   * @default "127.0.0.1"
   */
  host?: string;

  /**
   * Gateway ID (auto-generated if not provided)
   */
  id?: string;

  /**
   * Run in embedded mode (no standalone server).
   * Use handleRequest() to process requests from your framework.
   * @default false
   */
  embedded?: boolean;

  /**
   * Call endpoint path
   * @default "/rpc"
   */
  path?: string;

  /**
   * HTTP path prefix (e.g., "/api")
   * @default ""
   */
  httpPathPrefix?: string;

  /**
   * CORS origin for HTTP transport
   * @default "*"
   */
  httpCorsOrigin?: string;

  /**
   * Callable methods.
   *
   * Supports:
   * - Simple handlers: `async (params, ctx) => result`
   * - Streaming: `async function* (params, ctx) { yield fragment }`
   * - With config: `method({ schema, handler, mode })`
   * - Namespaces: `{ tools: { call, list } }` → "tools.call", "tools.list"
   */
  methods?: MethodsConfig;

  sessions?: {
    /**
     * Idle time after which a session is swept
     * @default 1_800_000 (30 minutes)
     */
    idleTimeoutMs?: number;
    /**
     * How often the expiry sweep runs
     * @default 60_000
     */
    sweepIntervalMs?: number;
  };

  calls?: {
    /**
     * A call that produces nothing for this long is failed with reason "timeout"
     * @default 300_000 (5 minutes)
     */
    idleTimeoutMs?: number;
  };

  replay?: {
    /**
     * Retain streamed events so clients can resume after a disconnect
     * @default true
     */
    enabled?: boolean;
    /**
     * Events retained per call; oldest dropped first
     * @default 1024
     */
    capacity?: number;
    /**
     * How long a finished call's events stay resumable
     * @default 30_000
     */
    gracePeriodMs?: number;
  };

  negotiation?: NegotiationPolicyInput;

  /**
   * Interval for keepalive comments on open streams; 0 disables them
   * @default 15_000
   */
  keepaliveMs?: number;

  /**
   * Extract the caller identity established by an outer layer (proxy,
   * framework middleware). The engine never inspects it; handlers receive it
   * as `ctx.identity`. Defaults to the bearer token, when present.
   */
  identify?: (req: HttpRequest) => unknown;
}

// ============================================================================
// Negotiation
// ============================================================================

/**
 * How a method is expected to behave.
 * - `simple` - answers quickly with one value
 * - `long-running` - produces multi-part or slow output
 */
export type { MethodClass };

export interface NegotiationPolicyInput {
  /**
   * Serialized params at or above this many characters are streamed when
   * the method has no classification
   * @default 256
   */
  paramsSizeThreshold?: number;

  /** Per-method classification; overrides `mode` hints on method definitions */
  methods?: Record<string, MethodClass>;
}

export interface NegotiationPolicy {
  paramsSizeThreshold: number;
  classify(method: string): MethodClass | undefined;
}

// ============================================================================
// Sessions
// ============================================================================

export interface SessionCapabilities {
  supportsStreaming: boolean;
  supportsResume: boolean;
}

export interface Session {
  readonly id: string;
  readonly createdAt: Date;
  lastActiveAt: Date;
  /** Fixed when the session is created */
  readonly capabilities: Readonly<SessionCapabilities>;
  /** Opaque identity of the caller that created the session */
  readonly identity: unknown;
}

// ============================================================================
// Calls
// ============================================================================

export type CallState = "received" | "negotiated" | "executing" | "completed" | "failed";

/**
 * Passed to every handler alongside its params.
 */
export interface CallContext {
  sessionId: string;
  callId: CallId;
  method: string;
  mode: ResponseMode;
  identity: unknown;
  /** Aborted when the call is cancelled or times out */
  signal: AbortSignal;
}

/**
 * Simple method handler - returns one value
 */
export type SimpleMethodHandler<TParams = Record<string, unknown>, TResult = unknown> = (
  params: TParams,
  ctx: CallContext,
) => Promise<TResult> | TResult;

/**
 * Streaming method handler - yields fragments in order
 */
export type StreamingMethodHandler<TParams = Record<string, unknown>, TYield = unknown> = (
  params: TParams,
  ctx: CallContext,
) => AsyncIterable<TYield>;

export type MethodHandler<TParams = Record<string, unknown>> =
  | SimpleMethodHandler<TParams>
  | StreamingMethodHandler<TParams>;

/** Symbol for detecting method definitions vs namespaces */
export const METHOD_DEFINITION = Symbol.for("switchyard:method-definition");

/**
 * Method definition input (what you pass to method())
 */
export interface MethodDefinitionInput<TSchema extends ZodLikeSchema = ZodLikeSchema> {
  /** Zod schema for params validation + TypeScript inference */
  schema?: TSchema;
  /** Handler function - receives validated & typed params */
  handler: MethodHandler<TSchema["_output"]>;
  /** Classification used when negotiating the response mode */
  mode?: MethodClass;
  /** Listed by the discovery route */
  description?: string;
}

/**
 * Method definition with symbol marker (returned by method())
 */
export interface MethodDefinition<TParams = unknown> {
  readonly [METHOD_DEFINITION]: true;
  schema?: ZodLikeSchema<TParams>;
  mode?: MethodClass;
  description?: string;
  handler(params: TParams, ctx: CallContext): unknown;
}

/**
 * Factory function to create a method definition.
 *
 * @example
 * methods: {
 *   echo: async (params) => params.msg,   // Simple - auto-wrapped
 *   generate: method({                    // With config
 *     schema: z.object({ prompt: z.string() }),
 *     mode: "long-running",
 *     handler: async function* (params) { yield* backend.stream(params.prompt) },
 *   }),
 * }
 */
export function method<TSchema extends ZodLikeSchema>(
  definition: MethodDefinitionInput<TSchema>,
): MethodDefinition<TSchema["_output"]> {
  const { handler, schema, mode, description } = definition;
  return {
    [METHOD_DEFINITION]: true,
    schema,
    mode,
    description,
    handler: (params, ctx) => handler(params, ctx),
  };
}

/**
 * Check if a value is a method definition (vs a namespace)
 */
export function isMethodDefinition(value: unknown): value is MethodDefinition {
  return typeof value === "object" && value !== null && METHOD_DEFINITION in value;
}

/**
 * Method can be:
 * - Simple function: async (params, ctx) => result
 * - Streaming function: async function* (params, ctx) { yield }
 * - Method definition: method({ schema, handler, mode })
 */
export type Method = MethodHandler | MethodDefinition;

/**
 * Method namespace - recursively nested, arbitrary depth
 */
export type MethodNamespace = {
  [key: string]: Method | MethodNamespace;
};

export type MethodsConfig = MethodNamespace;

// ============================================================================
// Events
// ============================================================================

export interface GatewayEvents {
  started: { port: number; host: string };
  stopped: Record<string, never>;
  "session:created": { sessionId: string };
  "session:expired": { sessionId: string };
  "session:closed": { sessionId: string };
  "call:completed": { sessionId: string; callId: CallId; method: string; mode: ResponseMode };
  "call:failed": {
    sessionId: string;
    callId: CallId;
    method: string;
    mode: ResponseMode;
    code: string;
    reason?: string;
  };
}
