/**
 * Wire Protocol Types - Shared between client and gateway
 *
 * These types define the contract for a single call endpoint that answers
 * either with one complete payload or with a framed event stream.
 * Both @switchyard/client and @switchyard/gateway MUST use these types.
 *
 * @module @switchyard/shared/protocol
 */

// ============================================================================
// Transport Metadata
// ============================================================================

/** Header carrying the session token in both directions */
export const SESSION_HEADER = "mcp-session-id";

/** Header a reconnecting reader uses to name the last event it processed */
export const LAST_EVENT_ID_HEADER = "last-event-id";

export const ContentTypes = {
  JSON: "application/json",
  EVENT_STREAM: "text/event-stream",
} as const;

/**
 * What the caller declared it can consume for one call.
 *
 * - `immediate-only` - a single complete payload
 * - `immediate-or-streamed` - either a payload or an event stream
 */
export type AcceptSet = "immediate-only" | "immediate-or-streamed";

export type ResponseMode = "immediate" | "streamed";

/**
 * Derive the accept set from an HTTP `Accept` header.
 * Streaming must be named explicitly; wildcards do not opt a caller in.
 */
export function parseAcceptHeader(header: string | string[] | undefined): AcceptSet {
  const value = Array.isArray(header) ? header.join(",") : (header ?? "");
  const types = value
    .split(",")
    .map((part) => part.split(";")[0].trim().toLowerCase())
    .filter((part) => part.length > 0);
  return types.includes(ContentTypes.EVENT_STREAM) ? "immediate-or-streamed" : "immediate-only";
}

export function formatAcceptHeader(accept: AcceptSet): string {
  return accept === "immediate-or-streamed"
    ? `${ContentTypes.JSON}, ${ContentTypes.EVENT_STREAM}`
    : ContentTypes.JSON;
}

// ============================================================================
// Call Envelope (client → gateway)
// ============================================================================

/** Caller-supplied correlation token, echoed on everything the call produces */
export type CallId = string | number;

export interface CallEnvelope {
  id: CallId;
  method: string;
  params: Record<string, unknown>;
}

/** Key used to index calls; `1` and `"1"` name the same call */
export function callKey(id: CallId): string {
  return String(id);
}

// ============================================================================
// Immediate Responses (gateway → client)
// ============================================================================

export interface ErrorPayload {
  code: string;
  message: string;
  data?: unknown;
}

export interface SuccessResponse {
  id: CallId;
  result: unknown;
}

export interface ErrorResponse {
  id: CallId | null;
  error: ErrorPayload;
}

export type ImmediateResponse = SuccessResponse | ErrorResponse;

export function isErrorResponse(response: ImmediateResponse): response is ErrorResponse {
  return "error" in response;
}

/**
 * Fold the content of one call into a single result. Used for a drained
 * streaming handler in immediate mode and by clients reading a stream, so a
 * call yields the same result in either mode.
 *
 * No fragments gives `null`, a single fragment is returned as is, all-string
 * fragments are joined, anything else comes back as the list.
 */
export function combineFragments(fragments: readonly unknown[]): unknown {
  if (fragments.length === 0) return null;
  if (fragments.length === 1) return fragments[0];
  if (fragments.every((fragment) => typeof fragment === "string")) {
    return fragments.join("");
  }
  return [...fragments];
}

// ============================================================================
// Stream Events (gateway → client)
// ============================================================================

export type StreamEventKind = "start" | "content" | "error" | "end";

export type TerminalEventKind = Extract<StreamEventKind, "error" | "end">;

export interface StartPayload {
  sessionId: string;
}

interface StreamEventBase<K extends StreamEventKind> {
  callId: CallId;
  /** Strictly increasing per call, starting at 0 */
  sequence: number;
  kind: K;
}

export interface StartEvent extends StreamEventBase<"start"> {
  payload: StartPayload;
}

export interface ContentEvent extends StreamEventBase<"content"> {
  payload: unknown;
}

export interface ErrorEvent extends StreamEventBase<"error"> {
  payload: ErrorPayload;
}

export type EndEvent = StreamEventBase<"end">;

export type StreamEvent = StartEvent | ContentEvent | ErrorEvent | EndEvent;

export type TerminalEvent = ErrorEvent | EndEvent;

export function isTerminalEvent(event: StreamEvent): event is TerminalEvent {
  return event.kind === "end" || event.kind === "error";
}

// ============================================================================
// Event IDs
// ============================================================================

/**
 * Event ids on the wire are `<callId>:<sequence>`. The call id may itself
 * contain colons, so the sequence is taken from the last segment.
 */
export function formatEventId(callId: CallId, sequence: number): string {
  return `${callKey(callId)}:${sequence}`;
}

export function parseEventId(eventId: string): { callId: string; sequence: number } | null {
  const separator = eventId.lastIndexOf(":");
  if (separator <= 0) return null;
  const sequence = Number(eventId.slice(separator + 1));
  if (!Number.isInteger(sequence) || sequence < 0) return null;
  return { callId: eventId.slice(0, separator), sequence };
}

// ============================================================================
// Control Requests
// ============================================================================

export interface CancelRequest {
  callId: CallId;
  reason?: string;
}

export interface CancelResponse {
  cancelled: boolean;
}

export interface CloseSessionResponse {
  closed: boolean;
}

// ============================================================================
// Discovery
// ============================================================================

export const PROTOCOL_VERSION = "1";

/** How a method is expected to behave, as declared by its definition */
export type MethodClass = "simple" | "long-running";

export interface MethodDescriptor {
  name: string;
  mode?: MethodClass;
  description?: string;
}

/** Body of `GET {path}/methods` */
export interface DiscoveryResponse {
  protocol: {
    version: string;
    modes: ResponseMode[];
    resume: boolean;
  };
  methods: MethodDescriptor[];
}
