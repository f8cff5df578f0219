/**
 * CallClient - HTTP client for a switchyard gateway.
 *
 * Provides:
 * - One `call()` that consumes either response mode from the same request
 * - Session token tracking across calls
 * - Automatic resume of an interrupted stream from the last processed event
 * - Cancellation and explicit session close
 * - Method discovery
 *
 * @module @switchyard/client
 */

import { Logger } from "@switchyard/kernel";
import {
  ContentTypes,
  EventDecoder,
  FramingError,
  SESSION_HEADER,
  callKey,
  combineFragments,
  formatAcceptHeader,
  isErrorResponse,
  isTerminalEvent,
  parseDiscoveryResponse,
  parseImmediateResponse,
  type AcceptSet,
  type CallId,
  type DiscoveryResponse,
  type ImmediateResponse,
  type StreamEvent,
} from "@switchyard/shared";
import { CallClientError } from "./errors.js";

const log = Logger.for("CallClient");

// ============================================================================
// Configuration
// ============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface CallClientConfig {
  /** Gateway origin, e.g. "http://127.0.0.1:18790" */
  baseUrl: string;

  /** Call endpoint path (default: "/rpc") */
  path?: string;

  /** Bearer token sent as Authorization */
  token?: string;

  /** Extra headers sent with every request */
  headers?: Record<string, string>;

  /** What calls accept unless overridden per call (default: "immediate-or-streamed") */
  accept?: AcceptSet;

  /** Session token to start from */
  sessionId?: string;

  /** Custom fetch implementation */
  fetch?: FetchLike;

  /** Resume settings for interrupted streams */
  reconnect?: {
    /** Enable automatic resume (default: true) */
    enabled?: boolean;
    /** Max consecutive resume attempts (default: 3) */
    maxAttempts?: number;
    /** Base delay between attempts in ms; grows linearly (default: 500) */
    delay?: number;
  };
}

export interface CallOptions {
  /** Call id; generated as "req-N" when omitted */
  id?: CallId;
  accept?: AcceptSet;
  signal?: AbortSignal;
}

export type CallResponse =
  | { mode: "immediate"; callId: CallId; status: number; response: ImmediateResponse }
  | { mode: "streamed"; callId: CallId; events: AsyncGenerator<StreamEvent, void, undefined> };

// ============================================================================
// Client
// ============================================================================

export class CallClient {
  private config: CallClientConfig;
  private fetchFn: FetchLike;
  private endpoint: string;
  private requestHeaders: Record<string, string>;
  private _sessionId?: string;
  private requestCounter = 0;

  constructor(config: CallClientConfig) {
    this.config = config;
    this.endpoint = `${config.baseUrl.replace(/\/$/, "")}${config.path ?? "/rpc"}`;
    this._sessionId = config.sessionId;

    this.requestHeaders = { "Content-Type": ContentTypes.JSON, ...config.headers };
    if (config.token && !this.requestHeaders["Authorization"]) {
      this.requestHeaders["Authorization"] = `Bearer ${config.token}`;
    }

    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
  }

  /** Session token last received from the gateway */
  get sessionId(): string | undefined {
    return this._sessionId;
  }

  /**
   * Issue one call. Resolves with the immediate response, or with the
   * stream's events once the gateway has started streaming.
   */
  async call(
    method: string,
    params: Record<string, unknown> = {},
    options: CallOptions = {},
  ): Promise<CallResponse> {
    const id = options.id ?? `req-${++this.requestCounter}`;
    const accept = options.accept ?? this.config.accept ?? "immediate-or-streamed";

    const response = await this.fetchFn(this.endpoint, {
      method: "POST",
      headers: { ...this.headers(), Accept: formatAcceptHeader(accept) },
      body: JSON.stringify({ id, method, params }),
      signal: options.signal,
    });
    this.captureSession(response);

    if (isEventStream(response)) {
      return { mode: "streamed", callId: id, events: this.follow(id, response, options.signal) };
    }

    const parsed = parseImmediateResponse(await readJson(response));
    if (!parsed) {
      throw new CallClientError(`Unexpected response to ${method} (${response.status})`, {
        status: response.status,
      });
    }
    return { mode: "immediate", callId: id, status: response.status, response: parsed };
  }

  /**
   * Issue one call and return its result, whichever mode it ran in.
   *
   * Streamed content is folded with `combineFragments`, the rule the
   * gateway applies in immediate mode. Error payloads are thrown as
   * CallClientError.
   */
  async request(
    method: string,
    params: Record<string, unknown> = {},
    options: CallOptions = {},
  ): Promise<unknown> {
    const outcome = await this.call(method, params, options);

    if (outcome.mode === "immediate") {
      if (isErrorResponse(outcome.response)) {
        throw CallClientError.fromPayload(outcome.response.error, outcome.status);
      }
      return outcome.response.result;
    }

    const fragments: unknown[] = [];
    for await (const event of outcome.events) {
      if (event.kind === "content") fragments.push(event.payload);
      if (event.kind === "error") throw CallClientError.fromPayload(event.payload);
    }
    return combineFragments(fragments);
  }

  /**
   * Read a call's events after `lastSeenSequence` (from the start when
   * omitted). Throws CallClientError with code RESUME_UNAVAILABLE when the
   * gateway no longer holds them.
   */
  async *resume(
    callId: CallId,
    lastSeenSequence?: number,
    options: { signal?: AbortSignal } = {},
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const response = await this.openResume(callId, lastSeenSequence, options.signal);
    yield* this.follow(callId, response, options.signal, lastSeenSequence);
  }

  /**
   * Ask the gateway to cancel an in-flight call. Resolves false when the
   * call was not running.
   */
  async cancel(callId: CallId, reason?: string): Promise<boolean> {
    const response = await this.fetchFn(`${this.endpoint}/cancel`, {
      method: "POST",
      headers: this.headers(),
      body: JSON.stringify(reason === undefined ? { callId } : { callId, reason }),
    });
    const body = await this.expectOk(response, "cancel");
    return typeof body === "object" && body !== null && "cancelled" in body && body.cancelled === true;
  }

  /**
   * Close the current session on the gateway and forget its token.
   */
  async closeSession(): Promise<boolean> {
    const sessionId = this._sessionId;
    if (!sessionId) return false;

    const response = await this.fetchFn(this.endpoint, {
      method: "DELETE",
      headers: this.headers(),
    });
    const body = await this.expectOk(response, "close session");
    this._sessionId = undefined;
    return typeof body === "object" && body !== null && "closed" in body && body.closed === true;
  }

  /**
   * Protocol info and the methods the gateway serves.
   */
  async methods(): Promise<DiscoveryResponse> {
    const response = await this.fetchFn(`${this.endpoint}/methods`, {
      method: "GET",
      headers: this.headers(),
    });
    const discovery = parseDiscoveryResponse(await this.expectOk(response, "list methods"));
    if (!discovery) {
      throw new CallClientError("Unexpected discovery response", { status: response.status });
    }
    return discovery;
  }

  // ==========================================================================
  // Streams
  // ==========================================================================

  /**
   * Yield events until the terminal one. If the body ends early or the
   * connection drops, resume from the last event seen.
   */
  private async *follow(
    callId: CallId,
    initial: Response,
    signal?: AbortSignal,
    lastSeenSequence?: number,
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const maxAttempts = this.config.reconnect?.maxAttempts ?? 3;
    const baseDelay = this.config.reconnect?.delay ?? 500;
    const reconnect = this.config.reconnect?.enabled !== false;

    let response = initial;
    let lastSequence = lastSeenSequence;
    let attempts = 0;

    for (;;) {
      let interruption: unknown;
      try {
        for await (const event of readEvents(response)) {
          if (event.kind === "start") {
            this._sessionId = event.payload.sessionId;
          }
          lastSequence = event.sequence;
          attempts = 0;
          yield event;
          if (isTerminalEvent(event)) return;
        }
        interruption = new CallClientError(`Stream for call ${callKey(callId)} ended early`);
      } catch (error) {
        if (error instanceof FramingError || signal?.aborted) throw error;
        interruption = error;
      }

      if (!reconnect || attempts >= maxAttempts) {
        throw interruption;
      }
      attempts++;
      log.warn(
        { callId, lastSequence, attempt: attempts, maxAttempts },
        "stream interrupted, resuming",
      );
      await sleep(baseDelay * attempts);
      response = await this.openResume(callId, lastSequence, signal);
    }
  }

  private async openResume(
    callId: CallId,
    lastSeenSequence: number | undefined,
    signal?: AbortSignal,
  ): Promise<Response> {
    const query = new URLSearchParams({ callId: callKey(callId) });
    if (lastSeenSequence !== undefined) {
      query.set("after", String(lastSeenSequence));
    }

    const response = await this.fetchFn(`${this.endpoint}/resume?${query.toString()}`, {
      method: "GET",
      headers: { ...this.headers(), Accept: ContentTypes.EVENT_STREAM },
      signal,
    });
    this.captureSession(response);

    if (isEventStream(response)) return response;

    const parsed = parseImmediateResponse(await readJson(response));
    if (parsed && isErrorResponse(parsed)) {
      throw CallClientError.fromPayload(parsed.error, response.status);
    }
    throw new CallClientError(`Unexpected resume response (${response.status})`, {
      status: response.status,
    });
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private headers(): Record<string, string> {
    return this._sessionId
      ? { ...this.requestHeaders, [SESSION_HEADER]: this._sessionId }
      : { ...this.requestHeaders };
  }

  private captureSession(response: Response): void {
    const sessionId = response.headers.get(SESSION_HEADER);
    if (sessionId) {
      this._sessionId = sessionId;
    }
  }

  private async expectOk(response: Response, action: string): Promise<unknown> {
    const body = await readJson(response);
    if (!response.ok) {
      const parsed = parseImmediateResponse(body);
      if (parsed && isErrorResponse(parsed)) {
        throw CallClientError.fromPayload(parsed.error, response.status);
      }
      throw new CallClientError(`Failed to ${action}: ${response.status}`, {
        status: response.status,
      });
    }
    return body;
  }
}

/**
 * Create a call client
 */
export function createClient(config: CallClientConfig): CallClient {
  return new CallClient(config);
}

// ============================================================================
// Utilities
// ============================================================================

function isEventStream(response: Response): boolean {
  return (response.headers.get("content-type") ?? "").startsWith(ContentTypes.EVENT_STREAM);
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text.length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new CallClientError(`Response is not JSON (${response.status})`, {
      status: response.status,
      cause: error,
    });
  }
}

/**
 * Decode events from a response body as bytes arrive. A trailing partial
 * unit is dropped when the body ends.
 */
async function* readEvents(response: Response): AsyncGenerator<StreamEvent, void, undefined> {
  if (!response.body) {
    throw new CallClientError("No response body for stream", { status: response.status });
  }

  const reader = response.body.getReader();
  const decoder = new EventDecoder();
  let drained = false;

  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        drained = true;
        return;
      }
      for (const event of decoder.feed(value)) {
        yield event;
      }
    }
  } finally {
    if (!drained) {
      await reader.cancel().catch((error: unknown) => {
        log.debug({ err: error }, "failed to cancel response body");
      });
    }
    reader.releaseLock();
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
