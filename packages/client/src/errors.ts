/**
 * Client-side errors.
 *
 * @module @switchyard/client/errors
 */

import type { ErrorPayload } from "@switchyard/shared";

export interface CallClientErrorOptions {
  /** HTTP status of the response that failed, when there was one */
  status?: number;
  /** Error payload sent by the gateway */
  payload?: ErrorPayload;
  cause?: unknown;
}

/**
 * A call could not be completed: the gateway answered with an error
 * payload, an unexpected status, or the stream could not be resumed.
 */
export class CallClientError extends Error {
  readonly name = "CallClientError";
  readonly status?: number;
  readonly payload?: ErrorPayload;

  constructor(message: string, options: CallClientErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.status = options.status;
    this.payload = options.payload;
  }

  static fromPayload(payload: ErrorPayload, status?: number): CallClientError {
    return new CallClientError(payload.message, { payload, status });
  }

  /** Wire error code, e.g. "HANDLER_FAILURE" */
  get code(): string | undefined {
    return this.payload?.code;
  }
}
