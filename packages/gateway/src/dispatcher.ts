/**
 * Call Dispatcher
 *
 * The single entry point for calls. One dispatch walks a call through
 *
 *   received → negotiated → executing → completed | failed
 *
 * and answers either with one immediate response or with a stream of
 * events that always opens with `start` and closes with exactly one of
 * `end` / `error`.
 *
 * Calls never wait on each other, within a session or across sessions.
 * Streamed calls run in the background; the HTTP writer is only one reader
 * of the call's event buffer and may go away without stopping the call.
 */

import { EventBuffer, Logger } from "@switchyard/kernel";
import {
  HandlerFailureError,
  ProtocolViolationError,
  callKey,
  combineFragments,
  parseCallEnvelope,
  type AcceptSet,
  type CallEnvelope,
  type CallId,
  type ErrorPayload,
  type ImmediateResponse,
  type ResponseMode,
  type StreamEvent,
} from "@switchyard/shared";
import type { MethodInvoker, MethodRegistry } from "./method-registry.js";
import { decideResponseMode } from "./negotiator.js";
import type { ReplayRegistry } from "./replay-buffer.js";
import type { SessionStore } from "./session-store.js";
import type { CallContext, CallState, NegotiationPolicy, Session } from "./types.js";

const log = Logger.for("CallDispatcher");

export const DEFAULT_CALL_IDLE_TIMEOUT_MS = 300_000;

// ============================================================================
// Types
// ============================================================================

/** One inbound call, with its out-of-band transport metadata */
export interface InboundCall {
  /** Raw request body, not yet validated */
  body: unknown;
  sessionId?: string;
  accept: AcceptSet;
  identity?: unknown;
}

export interface ImmediateOutcome {
  mode: "immediate";
  session: Session;
  /** True when the call was rejected before execution */
  rejected: boolean;
  response: ImmediateResponse;
}

export interface StreamedOutcome {
  mode: "streamed";
  session: Session;
  callId: CallId;
  /** Live events of the call, from `start` to its terminal event */
  events: AsyncGenerator<StreamEvent, void, undefined>;
}

export type DispatchOutcome = ImmediateOutcome | StreamedOutcome;

export interface CallSummary {
  sessionId: string;
  callId: CallId;
  method: string;
  mode: ResponseMode;
  state: "completed" | "failed";
  error?: ErrorPayload;
}

export interface CallDispatcherOptions {
  sessions: SessionStore;
  methods: MethodRegistry;
  replay: ReplayRegistry;
  policy: NegotiationPolicy;
  /** A call that produces nothing for this long fails with reason "timeout" */
  callIdleTimeoutMs?: number;
  /** Invoked once per admitted call, on its terminal transition */
  onCallSettled?: (summary: CallSummary) => void;
}

interface CallRecord {
  session: Session;
  envelope: CallEnvelope;
  key: string;
  mode: ResponseMode;
  state: CallState;
  controller: AbortController;
  idleTimer: ReturnType<typeof setTimeout> | null;
  /** Abort the call's signal with the failure it ends on */
  interrupt: (failure: HandlerFailureError) => void;
}

interface SessionLedger {
  active: Map<string, CallRecord>;
  /** Ids that reached a terminal state; never admitted again */
  finished: Set<string>;
}

type Production = { kind: "value"; value: unknown } | { kind: "fragments" };

// ============================================================================
// Dispatcher
// ============================================================================

export class CallDispatcher {
  private ledgers = new Map<string, SessionLedger>();
  private readonly callIdleTimeoutMs: number;

  constructor(private options: CallDispatcherOptions) {
    this.callIdleTimeoutMs = options.callIdleTimeoutMs ?? DEFAULT_CALL_IDLE_TIMEOUT_MS;
  }

  /**
   * Handle one call. Immediate outcomes resolve once the call is terminal;
   * streamed outcomes resolve as soon as `start` is queued.
   */
  async dispatch(inbound: InboundCall): Promise<DispatchOutcome> {
    const { session } = this.options.sessions.resolve(inbound.sessionId, {
      accept: inbound.accept,
      identity: inbound.identity,
    });

    const parsed = parseCallEnvelope(inbound.body);
    if (!parsed.ok) {
      return this.reject(
        session,
        parsed.id,
        new ProtocolViolationError("Malformed call envelope", parsed.issues),
      );
    }

    const envelope = parsed.envelope;
    const key = callKey(envelope.id);
    const ledger = this.ledgerFor(session.id);

    if (ledger.active.has(key) || ledger.finished.has(key)) {
      return this.reject(
        session,
        envelope.id,
        new ProtocolViolationError(`Call id "${key}" was already used in this session`),
      );
    }

    let invoker: MethodInvoker;
    try {
      invoker = this.options.methods.resolve(envelope.method).bind(envelope.params);
    } catch (error) {
      if (error instanceof ProtocolViolationError) {
        return this.reject(session, envelope.id, error);
      }
      throw error;
    }

    const record = this.admit(session, envelope, key, ledger);
    record.mode = decideResponseMode(session, envelope, inbound.accept, this.options.policy);
    this.transition(record, "negotiated");

    if (record.mode === "streamed") {
      return this.stream(record, invoker);
    }
    return this.respond(record, invoker);
  }

  /**
   * Cancel an in-flight call. Returns false when the call is not running.
   */
  cancel(sessionId: string, callId: CallId, reason?: string): boolean {
    const record = this.ledgers.get(sessionId)?.active.get(callKey(callId));
    if (!record) return false;
    log.info({ sessionId, callId, reason }, "cancelling call");
    record.interrupt(HandlerFailureError.cancelled(reason));
    return true;
  }

  /**
   * Forget everything about a session. In-flight calls are cancelled.
   */
  releaseSession(sessionId: string): void {
    const ledger = this.ledgers.get(sessionId);
    if (!ledger) {
      this.options.replay.releaseSession(sessionId);
      return;
    }

    this.ledgers.delete(sessionId);
    for (const key of ledger.finished) {
      this.options.replay.release(sessionId, key);
    }
    // Active streams release their buffers once their error event is queued
    for (const record of [...ledger.active.values()]) {
      record.interrupt(HandlerFailureError.cancelled("session closed"));
    }
  }

  /** Cancel every in-flight call */
  stop(): void {
    for (const sessionId of [...this.ledgers.keys()]) {
      this.releaseSession(sessionId);
    }
  }

  activeCalls(sessionId: string): string[] {
    return Array.from(this.ledgers.get(sessionId)?.active.keys() ?? []);
  }

  get activeCount(): number {
    let total = 0;
    for (const ledger of this.ledgers.values()) total += ledger.active.size;
    return total;
  }

  // ==========================================================================
  // Immediate mode
  // ==========================================================================

  private async respond(record: CallRecord, invoker: MethodInvoker): Promise<ImmediateOutcome> {
    const { session, envelope } = record;
    const fragments: unknown[] = [];

    try {
      const production = await this.execute(record, invoker, (fragment) => {
        fragments.push(fragment);
      });
      const result =
        production.kind === "value" ? (production.value ?? null) : combineFragments(fragments);
      assertSerializable(result);
      this.settle(record, "completed");
      return { mode: "immediate", session, rejected: false, response: { id: envelope.id, result } };
    } catch (error) {
      const failure = toHandlerFailure(error);
      this.settle(record, "failed", failure);
      return {
        mode: "immediate",
        session,
        rejected: false,
        response: { id: envelope.id, error: failure.toPayload() },
      };
    }
  }

  // ==========================================================================
  // Streamed mode
  // ==========================================================================

  private stream(record: CallRecord, invoker: MethodInvoker): StreamedOutcome {
    const { session, envelope } = record;
    const buffer = this.options.replay.open(session, record.key);
    const events = buffer.follow();

    buffer.push({
      callId: envelope.id,
      sequence: 0,
      kind: "start",
      payload: { sessionId: session.id },
    });

    this.pump(record, invoker, buffer).catch((error: unknown) => {
      log.error({ err: error, sessionId: session.id, callId: envelope.id }, "stream pump crashed");
    });

    return { mode: "streamed", session, callId: envelope.id, events };
  }

  private async pump(
    record: CallRecord,
    invoker: MethodInvoker,
    buffer: EventBuffer<StreamEvent>,
  ): Promise<void> {
    const callId = record.envelope.id;
    let sequence = 0;

    try {
      const production = await this.execute(record, invoker, (fragment) => {
        assertSerializable(fragment);
        buffer.push({ callId, sequence: ++sequence, kind: "content", payload: fragment });
      });
      if (production.kind === "value" && production.value !== undefined) {
        assertSerializable(production.value);
        buffer.push({ callId, sequence: ++sequence, kind: "content", payload: production.value });
      }
      buffer.push({ callId, sequence: ++sequence, kind: "end" });
      buffer.close();
      this.settle(record, "completed");
    } catch (error) {
      const failure = toHandlerFailure(error);
      buffer.push({ callId, sequence: ++sequence, kind: "error", payload: failure.toPayload() });
      buffer.close();
      this.settle(record, "failed", failure);
    }
  }

  // ==========================================================================
  // Execution
  // ==========================================================================

  /**
   * Run the handler. Fragments of a streaming handler go to `emit` in order;
   * a plain return value comes back as the production.
   */
  private async execute(
    record: CallRecord,
    invoker: MethodInvoker,
    emit: (fragment: unknown) => void,
  ): Promise<Production> {
    const ctx: CallContext = {
      sessionId: record.session.id,
      callId: record.envelope.id,
      method: record.envelope.method,
      mode: record.mode,
      identity: record.session.identity,
      signal: record.controller.signal,
    };

    this.transition(record, "executing");
    this.touch(record);

    const produced = await this.guard(
      record,
      Promise.resolve().then(() => invoker(ctx)),
    );
    if (!isAsyncIterable(produced)) {
      return { kind: "value", value: produced };
    }

    const iterator = produced[Symbol.asyncIterator]();
    for (;;) {
      const step = await this.guard(record, iterator.next(), iterator);
      if (step.done) return { kind: "fragments" };
      this.touch(record);
      try {
        emit(step.value);
      } catch (error) {
        this.closeIterator(record, iterator);
        throw error;
      }
    }
  }

  /**
   * Wait for handler work unless the call is interrupted first. On
   * interruption the handler's iterator is told to return. The abort
   * listener lives only as long as this one step.
   */
  private guard<T>(
    record: CallRecord,
    work: Promise<T>,
    iterator?: AsyncIterator<unknown>,
  ): Promise<T> {
    const { signal } = record.controller;

    return new Promise<T>((resolve, reject) => {
      const onAbort = (): void => {
        if (iterator) this.closeIterator(record, iterator);
        reject(interruptionOf(signal));
      };

      work.then(
        (value) => {
          signal.removeEventListener("abort", onAbort);
          resolve(value);
        },
        (error: unknown) => {
          signal.removeEventListener("abort", onAbort);
          reject(error);
        },
      );

      if (signal.aborted) {
        onAbort();
      } else {
        signal.addEventListener("abort", onAbort, { once: true });
      }
    });
  }

  private closeIterator(record: CallRecord, iterator: AsyncIterator<unknown>): void {
    if (!iterator.return) return;
    iterator.return().catch((error: unknown) => {
      log.debug({ err: error, callId: record.envelope.id }, "handler iterator failed to return");
    });
  }

  // ==========================================================================
  // Call records
  // ==========================================================================

  private admit(
    session: Session,
    envelope: CallEnvelope,
    key: string,
    ledger: SessionLedger,
  ): CallRecord {
    const record: CallRecord = {
      session,
      envelope,
      key,
      mode: "immediate",
      state: "received",
      controller: new AbortController(),
      idleTimer: null,
      interrupt: (failure) => {
        if (record.state === "completed" || record.state === "failed") return;
        if (!record.controller.signal.aborted) {
          record.controller.abort(failure);
        }
      },
    };

    ledger.active.set(key, record);
    log.debug({ sessionId: session.id, callId: envelope.id, method: envelope.method }, "call received");
    return record;
  }

  private transition(record: CallRecord, state: CallState): void {
    log.debug(
      { sessionId: record.session.id, callId: record.envelope.id, from: record.state, to: state },
      "call state",
    );
    record.state = state;
  }

  /** Restart the idle deadline; the session counts as active too */
  private touch(record: CallRecord): void {
    this.options.sessions.touch(record.session);
    if (record.idleTimer) clearTimeout(record.idleTimer);
    record.idleTimer = setTimeout(() => {
      log.warn(
        { sessionId: record.session.id, callId: record.envelope.id, timeoutMs: this.callIdleTimeoutMs },
        "call idle timeout",
      );
      record.interrupt(HandlerFailureError.timeout(this.callIdleTimeoutMs));
    }, this.callIdleTimeoutMs);
    record.idleTimer.unref();
  }

  private settle(
    record: CallRecord,
    state: "completed" | "failed",
    failure?: HandlerFailureError,
  ): void {
    if (record.idleTimer) {
      clearTimeout(record.idleTimer);
      record.idleTimer = null;
    }
    this.transition(record, state);

    const { session, envelope, key, mode } = record;
    this.options.sessions.touch(session);
    const ledger = this.ledgers.get(session.id);
    if (ledger) {
      ledger.active.delete(key);
      ledger.finished.add(key);
    }

    if (mode === "streamed") {
      if (!ledger || failure?.reason === "timeout") {
        this.options.replay.release(session.id, key);
      } else {
        this.options.replay.settle(session.id, key);
      }
    }

    const summary: CallSummary = {
      sessionId: session.id,
      callId: envelope.id,
      method: envelope.method,
      mode,
      state,
    };
    if (failure) {
      summary.error = failure.toPayload();
      log.warn({ ...summary, reason: failure.reason, err: failure }, "call failed");
    } else {
      log.info(summary, "call completed");
    }
    this.options.onCallSettled?.(summary);
  }

  private reject(
    session: Session,
    id: CallId | null,
    error: ProtocolViolationError,
  ): ImmediateOutcome {
    log.warn({ sessionId: session.id, callId: id, details: error.details }, error.message);
    return {
      mode: "immediate",
      session,
      rejected: true,
      response: { id, error: error.toPayload() },
    };
  }

  private ledgerFor(sessionId: string): SessionLedger {
    let ledger = this.ledgers.get(sessionId);
    if (!ledger) {
      ledger = { active: new Map(), finished: new Set() };
      this.ledgers.set(sessionId, ledger);
    }
    return ledger;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function isAsyncIterable(value: unknown): value is AsyncIterable<unknown> {
  return typeof value === "object" && value !== null && Symbol.asyncIterator in value;
}

/**
 * Output that cannot be written as JSON fails the call that produced it.
 */
function assertSerializable(value: unknown): void {
  try {
    JSON.stringify(value);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new HandlerFailureError(`Handler output cannot be serialized: ${detail}`, "error", {
      cause: error,
    });
  }
}

function interruptionOf(signal: AbortSignal): HandlerFailureError {
  const reason: unknown = signal.reason;
  return reason instanceof HandlerFailureError ? reason : HandlerFailureError.cancelled();
}

function toHandlerFailure(error: unknown): HandlerFailureError {
  if (error instanceof HandlerFailureError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new HandlerFailureError(message, "error", { cause: error });
}
