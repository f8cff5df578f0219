import { EventDecoder, encodeComment, encodeEvent } from "../framing.js";
import { FramingError } from "../errors.js";
import type { StreamEvent } from "../protocol.js";

const start: StreamEvent = { callId: "c1", sequence: 0, kind: "start", payload: { sessionId: "s1" } };
const content: StreamEvent = { callId: "c1", sequence: 1, kind: "content", payload: "héllo\nworld" };
const end: StreamEvent = { callId: "c1", sequence: 2, kind: "end" };

describe("encodeEvent", () => {
  it("writes id, event and data lines followed by a blank line", () => {
    expect(encodeEvent(end)).toBe(
      'id: c1:2\nevent: end\ndata: {"callId":"c1","sequence":2,"kind":"end"}\n\n',
    );
  });

  it("keeps newlines in payloads inside the data line", () => {
    const encoded = encodeEvent(content);
    expect(encoded.split("\n")).toHaveLength(5);
    expect(encoded).toContain('"payload":"héllo\\nworld"');
  });
});

describe("encodeComment", () => {
  it("writes a comment unit", () => {
    expect(encodeComment("keepalive")).toBe(": keepalive\n\n");
  });
});

describe("EventDecoder", () => {
  it("decodes a sequence of units", () => {
    const decoder = new EventDecoder();
    expect(decoder.feed(encodeEvent(start) + encodeEvent(content) + encodeEvent(end))).toEqual([
      start,
      content,
      end,
    ]);
    expect(decoder.pending).toBe(0);
  });

  it("holds a partial unit until its delimiter arrives", () => {
    const decoder = new EventDecoder();
    const encoded = encodeEvent(start);

    expect(decoder.feed(encoded.slice(0, -1))).toEqual([]);
    expect(decoder.decode()).toEqual({ type: "need-more-data" });
    expect(decoder.feed(encoded.slice(-1))).toEqual([start]);
  });

  it("decodes input delivered one byte at a time", () => {
    const decoder = new EventDecoder();
    const bytes = new TextEncoder().encode(encodeEvent(content) + encodeEvent(end));

    const events: StreamEvent[] = [];
    for (const byte of bytes) {
      events.push(...decoder.feed(Uint8Array.of(byte)));
    }

    expect(events).toEqual([content, end]);
  });

  it("accepts CRLF line endings", () => {
    const decoder = new EventDecoder();
    const crlf = encodeEvent(end).replace(/\n/g, "\r\n");
    expect(decoder.feed(crlf)).toEqual([end]);
  });

  it("skips comment units", () => {
    const decoder = new EventDecoder();
    expect(decoder.feed(encodeComment("keepalive") + encodeEvent(end))).toEqual([end]);
  });

  it("joins multiple data lines", () => {
    const decoder = new EventDecoder();
    const unit = 'event: end\ndata: {"callId":"c1",\ndata: "sequence":2,"kind":"end"}\n\n';
    expect(decoder.feed(unit)).toEqual([end]);
  });

  it("throws FramingError for data that is not JSON", () => {
    const decoder = new EventDecoder();
    expect(() => decoder.feed("data: {oops\n\n")).toThrow(FramingError);
  });

  it("throws FramingError for JSON that is not a stream event", () => {
    const decoder = new EventDecoder();
    try {
      decoder.feed('data: {"kind":"bogus"}\n\n');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(FramingError);
      if (error instanceof FramingError) {
        expect(error.code).toBe("FRAMING_ERROR");
        expect(error.unit).toBe('data: {"kind":"bogus"}');
      }
    }
  });
});
