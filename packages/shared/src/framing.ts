/**
 * Event Framer
 *
 * Encodes stream events as Server-Sent Event units and decodes them back.
 * One unit per event:
 *
 * ```
 * id: <callId>:<sequence>
 * event: <kind>
 * data: {"callId":...,"sequence":...,"kind":...,"payload":...}
 *
 * ```
 *
 * JSON.stringify escapes internal newlines, so a blank line is an
 * unambiguous unit delimiter. The decoder accumulates raw reads and only
 * yields a unit once its delimiter has arrived; anything after the last
 * delimiter stays buffered for the next read.
 *
 * @module @switchyard/shared/framing
 */

import { FramingError } from "./errors.js";
import { formatEventId, type StreamEvent } from "./protocol.js";
import { parseStreamEvent } from "./schemas.js";

export function encodeEvent(event: StreamEvent): string {
  const data = JSON.stringify(event);
  return `id: ${formatEventId(event.callId, event.sequence)}\nevent: ${event.kind}\ndata: ${data}\n\n`;
}

/** SSE comment unit. Decoders skip these; used for keepalives. */
export function encodeComment(comment: string): string {
  return `: ${comment}\n\n`;
}

export type DecodeResult = { type: "event"; event: StreamEvent } | { type: "need-more-data" };

export const NEED_MORE_DATA: DecodeResult = { type: "need-more-data" };

export class EventDecoder {
  private buffer = "";
  private readonly textDecoder = new TextDecoder("utf-8");

  /**
   * Append raw data. Bytes are decoded in streaming mode, so a multi-byte
   * character split across reads is held until its remaining bytes arrive.
   */
  push(chunk: string | Uint8Array): void {
    const text = typeof chunk === "string" ? chunk : this.textDecoder.decode(chunk, { stream: true });
    this.buffer += text;
  }

  /**
   * Take the next complete event off the buffer, or report that the buffer
   * holds only a partial unit. Comment-only units are consumed silently.
   */
  decode(): DecodeResult {
    for (;;) {
      const boundary = findBoundary(this.buffer);
      if (!boundary) return NEED_MORE_DATA;

      const unit = this.buffer.slice(0, boundary.start);
      this.buffer = this.buffer.slice(boundary.end);

      const event = parseUnit(unit);
      if (event) return { type: "event", event };
    }
  }

  /** Feed raw data, returns every event it completed */
  feed(chunk: string | Uint8Array): StreamEvent[] {
    this.push(chunk);
    const events: StreamEvent[] = [];
    for (let result = this.decode(); result.type === "event"; result = this.decode()) {
      events.push(result.event);
    }
    return events;
  }

  /** Characters held back waiting for the rest of a unit */
  get pending(): number {
    return this.buffer.length;
  }
}

/**
 * Locate the first blank-line delimiter, accepting LF and CRLF endings.
 * A trailing lone CR may be the first half of a CRLF, so it never closes a unit.
 */
function findBoundary(buffer: string): { start: number; end: number } | null {
  const match = /\r?\n\r?\n/.exec(buffer);
  if (!match) return null;
  return { start: match.index, end: match.index + match[0].length };
}

/**
 * Parse one unit. Returns null for units that carry no data (comments,
 * bare `retry:` hints); throws when the data is not a stream event.
 */
function parseUnit(unit: string): StreamEvent | null {
  const dataLines: string[] = [];

  for (const rawLine of unit.split(/\r?\n/)) {
    if (rawLine.length === 0 || rawLine.startsWith(":")) continue;

    const colon = rawLine.indexOf(":");
    const field = colon === -1 ? rawLine : rawLine.slice(0, colon);
    let value = colon === -1 ? "" : rawLine.slice(colon + 1);
    if (value.startsWith(" ")) value = value.slice(1);

    if (field === "data") dataLines.push(value);
  }

  if (dataLines.length === 0) return null;

  const data = dataLines.join("\n");
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (error) {
    throw new FramingError(
      `Event data is not JSON: ${error instanceof Error ? error.message : String(error)}`,
      unit,
    );
  }

  const event = parseStreamEvent(parsed);
  if (!event) {
    throw new FramingError("Event data is not a stream event", unit);
  }
  return event;
}
