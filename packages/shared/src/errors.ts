/**
 * Error taxonomy for calls and streams.
 *
 * Every error here is call-scoped: none of them ends a session or affects
 * other calls. An unrecognized session id is not an error at all; the
 * gateway silently creates a new session instead.
 *
 * @module @switchyard/shared/errors
 */

import type { ErrorPayload } from "./protocol.js";

export const ErrorCodes = {
  PROTOCOL_VIOLATION: "PROTOCOL_VIOLATION",
  HANDLER_FAILURE: "HANDLER_FAILURE",
  RESUME_UNAVAILABLE: "RESUME_UNAVAILABLE",
  FRAMING_ERROR: "FRAMING_ERROR",
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

/**
 * Base class. `code` is stable and travels on the wire; `message` is for humans.
 */
export abstract class SwitchyardError extends Error {
  abstract readonly code: ErrorCode;

  toPayload(): ErrorPayload {
    return { code: this.code, message: this.message };
  }
}

/**
 * Malformed envelope, unknown method, invalid params, or a reused call id.
 * The call is rejected before it executes.
 */
export class ProtocolViolationError extends SwitchyardError {
  readonly code = ErrorCodes.PROTOCOL_VIOLATION;
  readonly name = "ProtocolViolationError";

  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
  }

  override toPayload(): ErrorPayload {
    return this.details === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.details };
  }
}

export type HandlerFailureReason = "error" | "timeout" | "cancelled";

/**
 * The external handler failed, or the call was cut short by a timeout or
 * a cancellation. Surfaced as the call's `Failed` terminal state.
 */
export class HandlerFailureError extends SwitchyardError {
  readonly code = ErrorCodes.HANDLER_FAILURE;
  readonly name = "HandlerFailureError";

  constructor(
    message: string,
    readonly reason: HandlerFailureReason = "error",
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static timeout(timeoutMs: number): HandlerFailureError {
    return new HandlerFailureError(`Call produced nothing for ${timeoutMs}ms`, "timeout");
  }

  static cancelled(reason?: string): HandlerFailureError {
    return new HandlerFailureError(
      reason ? `Call cancelled: ${reason}` : "Call cancelled",
      "cancelled",
    );
  }

  override toPayload(): ErrorPayload {
    return { code: this.code, message: this.message, data: { reason: this.reason } };
  }
}

/**
 * The replay state a reader asked for no longer exists. Callers must restart
 * the original call rather than assume continuity.
 */
export class ResumeUnavailableError extends SwitchyardError {
  readonly code = ErrorCodes.RESUME_UNAVAILABLE;
  readonly name = "ResumeUnavailableError";

  constructor(
    readonly callId: string,
    detail = "no replay buffer for call",
  ) {
    super(`Resume unavailable for call ${callId}: ${detail}`);
  }
}

/**
 * A complete wire unit did not hold a valid stream event.
 */
export class FramingError extends SwitchyardError {
  readonly code = ErrorCodes.FRAMING_ERROR;
  readonly name = "FramingError";

  constructor(
    message: string,
    readonly unit: string,
  ) {
    super(message);
  }
}

export function isSwitchyardError(error: unknown): error is SwitchyardError {
  return error instanceof SwitchyardError;
}

/**
 * Convert anything thrown into a wire error payload. Errors that are not
 * part of the taxonomy are treated as handler failures.
 */
export function toErrorPayload(error: unknown): ErrorPayload {
  if (isSwitchyardError(error)) {
    return error.toPayload();
  }
  const message = error instanceof Error ? error.message : String(error);
  return { code: ErrorCodes.HANDLER_FAILURE, message, data: { reason: "error" } };
}
