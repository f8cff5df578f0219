/**
 * SSE Writer Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import type { StreamEvent } from "@switchyard/shared";
import { createSSEWriter, setSSEHeaders } from "../sse.js";

function createMockStream() {
  const stream = {
    output: "",
    writableEnded: false,
    write: vi.fn((chunk: string) => {
      stream.output += chunk;
      return true;
    }),
    end: vi.fn(() => {
      stream.writableEnded = true;
    }),
  };
  return stream;
}

const end: StreamEvent = { callId: "c1", sequence: 1, kind: "end" };

describe("createSSEWriter", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("writes framed events", () => {
    const stream = createMockStream();
    const writer = createSSEWriter(stream, { keepaliveMs: 0 });

    writer.writeEvent(end);

    expect(stream.output).toBe('id: c1:1\nevent: end\ndata: {"callId":"c1","sequence":1,"kind":"end"}\n\n');
    writer.close();
  });

  it("sends keepalive comments on the interval", () => {
    const stream = createMockStream();
    const writer = createSSEWriter(stream, { keepaliveMs: 1000 });

    vi.advanceTimersByTime(2500);

    expect(stream.output).toBe(": keepalive\n\n: keepalive\n\n");
    writer.close();
    vi.advanceTimersByTime(1000);
    expect(stream.write).toHaveBeenCalledTimes(2);
  });

  it("ends the stream once and ignores later writes", () => {
    const stream = createMockStream();
    const writer = createSSEWriter(stream, { keepaliveMs: 0 });

    writer.close();
    writer.close();
    writer.writeEvent(end);
    writer.writeComment("late");

    expect(writer.closed).toBe(true);
    expect(stream.end).toHaveBeenCalledTimes(1);
    expect(stream.write).not.toHaveBeenCalled();
  });

  it("replaces an unserializable event with a terminal error event", () => {
    const stream = createMockStream();
    const writer = createSSEWriter(stream, { keepaliveMs: 0 });

    writer.writeEvent({ callId: "c1", sequence: 1, kind: "content", payload: { big: 1n } });

    expect(stream.output.startsWith("id: c1:1\nevent: error\n")).toBe(true);
    expect(stream.output).toContain('"code":"HANDLER_FAILURE"');
    expect(writer.closed).toBe(true);
  });
});

describe("setSSEHeaders", () => {
  it("sets event stream headers and flushes them", () => {
    const headers: Record<string, string> = {};
    const flushHeaders = vi.fn();

    setSSEHeaders({
      setHeader: (name, value) => {
        headers[name] = value;
      },
      flushHeaders,
    });

    expect(headers).toEqual({
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
      "X-Accel-Buffering": "no",
    });
    expect(flushHeaders).toHaveBeenCalledTimes(1);
  });
});
