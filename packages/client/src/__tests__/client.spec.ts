/**
 * CallClient Tests
 *
 * The client talks to an embedded gateway through an in-process fetch.
 */

import { describe, it, expect, afterEach } from "vitest";
import { createTestGateway, type TestGatewayResult } from "@switchyard/gateway/testing";
import { method, type MethodsConfig } from "@switchyard/gateway";
import type { StreamEvent } from "@switchyard/shared";
import { createClient, type CallClientConfig, type CallResponse, type FetchLike } from "../client.js";
import { CallClientError } from "../errors.js";

const methods: MethodsConfig = {
  echo: (params) => params.msg,
  whoami: (_params, ctx) => ctx.identity ?? null,
  fail: () => {
    throw new Error("backend unavailable");
  },
  words: method({
    mode: "long-running",
    handler: async function* () {
      yield "Hello, ";
      yield "world";
    },
  }),
  numbers: method({
    mode: "long-running",
    handler: async function* () {
      yield 1;
      yield 2;
    },
  }),
  single: method({
    mode: "long-running",
    handler: async function* () {
      yield { total: 3 };
    },
  }),
  empty: method({
    mode: "long-running",
    handler: async function* () {
      // yields nothing
    },
  }),
  broken: method({
    mode: "long-running",
    handler: async function* () {
      yield "partial";
      throw new Error("stream broke");
    },
  }),
  hang: method({
    mode: "long-running",
    handler: async function* () {
      await new Promise<never>(() => undefined);
    },
  }),
};

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const received: StreamEvent[] = [];
  for await (const event of events) received.push(event);
  return received;
}

function streamed(outcome: CallResponse): Extract<CallResponse, { mode: "streamed" }> {
  if (outcome.mode !== "streamed") throw new Error("expected a streamed response");
  return outcome;
}

/**
 * A fetch whose first streamed response is cut after its first chunk, as
 * if the connection dropped.
 */
function droppingFetch(inner: FetchLike): FetchLike {
  let dropped = false;
  return async (input, init) => {
    const response = await inner(input, init);
    const streaming = (response.headers.get("content-type") ?? "").startsWith("text/event-stream");
    if (dropped || !streaming || !response.body) return response;
    dropped = true;

    const reader = response.body.getReader();
    const first = await reader.read();
    await reader.cancel();
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        if (first.value) controller.enqueue(first.value);
        controller.close();
      },
    });
    return new Response(body, { status: response.status, headers: response.headers });
  };
}

describe("CallClient", () => {
  let gw: TestGatewayResult;

  function client(config: Partial<CallClientConfig> = {}) {
    return createClient({ baseUrl: gw.url, fetch: gw.fetch, ...config });
  }

  afterEach(async () => {
    await gw.cleanup();
  });

  describe("methods", () => {
    it("lists protocol info and the registered methods", async () => {
      gw = createTestGateway({
        methods: {
          ping: method({ mode: "simple", description: "Liveness check", handler: () => "pong" }),
          tools: { echo: (params) => params.msg },
        },
      });

      expect(await client().methods()).toEqual({
        protocol: { version: "1", modes: ["immediate", "streamed"], resume: true },
        methods: [
          { name: "ping", mode: "simple", description: "Liveness check" },
          { name: "tools.echo" },
        ],
      });
    });
  });

  describe("request", () => {
    it("returns an immediate result", async () => {
      gw = createTestGateway({ methods });
      expect(await client().request("echo", { msg: "hi" })).toBe("hi");
    });

    it("joins streamed string fragments", async () => {
      gw = createTestGateway({ methods });
      expect(await client().request("words")).toBe("Hello, world");
    });

    it("returns a single streamed fragment as is", async () => {
      gw = createTestGateway({ methods });
      expect(await client().request("single")).toEqual({ total: 3 });
    });

    it("returns mixed fragments as a list", async () => {
      gw = createTestGateway({ methods });
      expect(await client().request("numbers")).toEqual([1, 2]);
    });

    it("gets the same result when streaming is not accepted", async () => {
      gw = createTestGateway({ methods });
      expect(await client({ accept: "immediate-only" }).request("words")).toBe("Hello, world");
    });

    const folds: Array<{ name: string; expected: unknown }> = [
      { name: "words", expected: "Hello, world" },
      { name: "numbers", expected: [1, 2] },
      { name: "single", expected: { total: 3 } },
      { name: "empty", expected: null },
    ];

    it.each(folds)("folds $name to the same result in both modes", async ({ name, expected }) => {
      gw = createTestGateway({ methods });
      const c = client();

      const viaStream = await c.request(name, {}, { accept: "immediate-or-streamed" });
      const viaImmediate = await c.request(name, {}, { accept: "immediate-only" });

      expect(viaStream).toEqual(expected);
      expect(viaImmediate).toEqual(expected);
    });

    it("throws handler failures", async () => {
      gw = createTestGateway({ methods });
      const error = await client().request("fail").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CallClientError);
      if (error instanceof CallClientError) {
        expect(error.message).toBe("backend unavailable");
        expect(error.code).toBe("HANDLER_FAILURE");
        expect(error.status).toBe(200);
      }
    });

    it("throws protocol violations with their status", async () => {
      gw = createTestGateway({ methods });
      const error = await client().request("missing").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CallClientError);
      if (error instanceof CallClientError) {
        expect(error.code).toBe("PROTOCOL_VIOLATION");
        expect(error.status).toBe(400);
      }
    });

    it("throws a streamed error event", async () => {
      gw = createTestGateway({ methods });
      await expect(client().request("broken")).rejects.toThrow("stream broke");
    });

    it("sends the bearer token", async () => {
      gw = createTestGateway({ methods });
      expect(await client({ token: "test-token" }).request("whoami")).toBe("test-token");
    });
  });

  describe("sessions", () => {
    it("reuses the session the gateway assigned", async () => {
      gw = createTestGateway({ methods });
      const c = client();

      await c.request("echo", { msg: 1 });
      const sessionId = c.sessionId;
      await c.request("echo", { msg: 2 });

      expect(sessionId).toMatch(/^[0-9a-f]{32}$/);
      expect(c.sessionId).toBe(sessionId);
      expect(gw.gateway.sessions.size).toBe(1);
    });

    it("closes its session", async () => {
      gw = createTestGateway({ methods });
      const c = client();
      await c.request("echo");
      const sessionId = c.sessionId ?? "";

      expect(await c.closeSession()).toBe(true);
      expect(c.sessionId).toBeUndefined();
      expect(gw.gateway.sessions.has(sessionId)).toBe(false);
      expect(await c.closeSession()).toBe(false);
    });
  });

  describe("call", () => {
    it("exposes immediate responses", async () => {
      gw = createTestGateway({ methods });
      const outcome = await client().call("echo", { msg: "x" }, { id: "mine" });

      expect(outcome).toEqual({ mode: "immediate", callId: "mine", status: 200, response: { id: "mine", result: "x" } });
    });

    it("yields streamed events in order", async () => {
      gw = createTestGateway({ methods });
      const c = client();
      const outcome = streamed(await c.call("words"));

      const events = await collect(outcome.events);

      expect(outcome.callId).toBe("req-1");
      expect(events).toEqual([
        { callId: "req-1", sequence: 0, kind: "start", payload: { sessionId: c.sessionId } },
        { callId: "req-1", sequence: 1, kind: "content", payload: "Hello, " },
        { callId: "req-1", sequence: 2, kind: "content", payload: "world" },
        { callId: "req-1", sequence: 3, kind: "end" },
      ]);
    });

    it("cancels an in-flight call", async () => {
      gw = createTestGateway({ methods });
      const c = client();
      const outcome = streamed(await c.call("hang"));

      const first = await outcome.events.next();
      expect(first.value).toMatchObject({ kind: "start", sequence: 0 });

      expect(await c.cancel(outcome.callId, "stop")).toBe(true);
      expect(await collect(outcome.events)).toEqual([
        {
          callId: "req-1",
          sequence: 1,
          kind: "error",
          payload: { code: "HANDLER_FAILURE", message: "Call cancelled: stop", data: { reason: "cancelled" } },
        },
      ]);
      expect(await c.cancel(outcome.callId)).toBe(false);
    });
  });

  describe("resume", () => {
    it("reads retained events after a sequence", async () => {
      gw = createTestGateway({ methods });
      const c = client();
      await collect(streamed(await c.call("words")).events);

      expect(await collect(c.resume("req-1", 1))).toEqual([
        { callId: "req-1", sequence: 2, kind: "content", payload: "world" },
        { callId: "req-1", sequence: 3, kind: "end" },
      ]);
    });

    it("throws when nothing is retained", async () => {
      gw = createTestGateway({ methods });
      const c = client();
      await c.request("words");

      const error = await collect(c.resume("unknown")).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(CallClientError);
      if (error instanceof CallClientError) {
        expect(error.code).toBe("RESUME_UNAVAILABLE");
        expect(error.status).toBe(404);
      }
    });

    it("resumes automatically when the stream drops", async () => {
      gw = createTestGateway({ methods });
      const c = client({ fetch: droppingFetch(gw.fetch), reconnect: { delay: 0 } });

      expect(await c.request("words")).toBe("Hello, world");
    });

    it("gives up when automatic resume is disabled", async () => {
      gw = createTestGateway({ methods });
      const c = client({ fetch: droppingFetch(gw.fetch), reconnect: { enabled: false } });

      await expect(c.request("words")).rejects.toThrow("Stream for call req-1 ended early");
    });
  });
});
