/**
 * SSE (Server-Sent Events) writing for streamed calls.
 *
 * Works with any response that has the writable surface below (Node.js
 * ServerResponse, Express response, the test mocks).
 */

import { Logger } from "@switchyard/kernel";
import {
  ContentTypes,
  ErrorCodes,
  encodeComment,
  encodeEvent,
  type StreamEvent,
} from "@switchyard/shared";

const log = Logger.for("SSE");

export interface SSEStream {
  write(chunk: string): boolean;
  end(): unknown;
  readonly writableEnded: boolean;
}

export interface SSEWriterOptions {
  /** Keepalive comment interval in ms; 0 disables (default: 15000) */
  keepaliveMs?: number;
}

export interface SSEWriter {
  /** Write one framed stream event */
  writeEvent(event: StreamEvent): void;
  /** Write a comment (keepalive) */
  writeComment(comment: string): void;
  /** End the response and stop the keepalive */
  close(): void;
  readonly closed: boolean;
}

/**
 * Create an SSE writer for a response stream.
 *
 * @example
 * ```typescript
 * setSSEHeaders(res);
 * const writer = createSSEWriter(res, { keepaliveMs: 15_000 });
 * writer.writeEvent({ callId: "1", sequence: 0, kind: "start", payload: { sessionId } });
 * writer.close();
 * ```
 */
export function createSSEWriter(stream: SSEStream, options: SSEWriterOptions = {}): SSEWriter {
  const keepaliveMs = options.keepaliveMs ?? 15_000;

  let closed = false;
  let keepaliveTimer: ReturnType<typeof setInterval> | undefined;

  const writable = () => !closed && !stream.writableEnded;

  if (keepaliveMs > 0) {
    keepaliveTimer = setInterval(() => {
      if (writable()) {
        stream.write(encodeComment("keepalive"));
      }
    }, keepaliveMs);
    keepaliveTimer.unref();
  }

  const close = (): void => {
    if (closed) return;
    closed = true;

    if (keepaliveTimer) {
      clearInterval(keepaliveTimer);
    }
    if (!stream.writableEnded) {
      stream.end();
    }
  };

  return {
    writeEvent(event: StreamEvent): void {
      if (!writable()) return;

      try {
        stream.write(encodeEvent(event));
      } catch (err) {
        // Circular references, BigInt and the like cannot be framed. The
        // error event becomes this reader's terminal event.
        log.error({ err, callId: event.callId, sequence: event.sequence }, "failed to serialize event");
        stream.write(encodeEvent({
          callId: event.callId,
          sequence: event.sequence,
          kind: "error",
          payload: {
            code: ErrorCodes.HANDLER_FAILURE,
            message: `Failed to serialize event: ${err instanceof Error ? err.message : String(err)}`,
            data: { reason: "error" },
          },
        }));
        close();
      }
    },

    writeComment(comment: string): void {
      if (!writable()) return;
      stream.write(encodeComment(comment));
    },

    close,

    get closed(): boolean {
      return closed;
    },
  };
}

/**
 * Set SSE headers on a response and flush them.
 */
export function setSSEHeaders(res: {
  setHeader: (name: string, value: string) => unknown;
  flushHeaders?: () => void;
}): void {
  res.setHeader("Content-Type", ContentTypes.EVENT_STREAM);
  res.setHeader("Cache-Control", "no-cache");
  res.setHeader("Connection", "keep-alive");
  res.setHeader("X-Accel-Buffering", "no"); // Disable nginx buffering

  if (res.flushHeaders) {
    res.flushHeaders();
  }
}
