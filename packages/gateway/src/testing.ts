/**
 * Gateway Testing Utilities
 *
 * In-process stand-ins for HTTP requests and responses, so gateway behavior
 * can be exercised without opening a socket.
 *
 * @example
 * ```typescript
 * import { createTestGateway } from '@switchyard/gateway/testing';
 *
 * test('echo answers immediately', async () => {
 *   const { gateway, send, cleanup } = createTestGateway({
 *     methods: { echo: async (params) => params.msg },
 *   });
 *
 *   try {
 *     const res = await send({
 *       method: 'POST',
 *       url: '/rpc',
 *       body: { id: '1', method: 'echo', params: { msg: 'hi' } },
 *     });
 *     expect(res.json()).toEqual({ id: '1', result: 'hi' });
 *   } finally {
 *     await cleanup();
 *   }
 * });
 * ```
 *
 * @module @switchyard/gateway/testing
 */

import { EventEmitter } from "events";
import type { IncomingHttpHeaders, OutgoingHttpHeaders } from "http";
import { Readable } from "stream";
import { EventDecoder, type StreamEvent } from "@switchyard/shared";
import { createGateway, type Gateway } from "./gateway.js";
import type { HttpRequest, HttpResponse } from "./http-transport.js";
import type { GatewayConfig, GatewayEvents } from "./types.js";

// ============================================================================
// Mock Request
// ============================================================================

export interface MockRequestOptions {
  method?: string;
  url?: string;
  /** Header names are lowercased */
  headers?: Record<string, string>;
  /** Objects are sent as JSON; strings as they are */
  body?: unknown;
}

export type MockRequest = Readable & HttpRequest;

export function createMockRequest(options: MockRequestOptions = {}): MockRequest {
  const headers: IncomingHttpHeaders = {};
  for (const [name, value] of Object.entries(options.headers ?? {})) {
    headers[name.toLowerCase()] = value;
  }

  const text =
    options.body === undefined
      ? ""
      : typeof options.body === "string"
        ? options.body
        : JSON.stringify(options.body);
  const stream = Readable.from(text.length > 0 ? [Buffer.from(text, "utf8")] : []);

  return Object.assign(stream, {
    method: options.method ?? "GET",
    url: options.url ?? "/",
    headers,
  });
}

// ============================================================================
// Mock Response
// ============================================================================

/**
 * Records everything written to it. Emits "headers" when the head is sent,
 * "chunk" per write, "finish" on end and "close" on end or disconnect.
 */
export class MockResponse extends EventEmitter implements HttpResponse {
  statusCode = 200;
  headersSent = false;
  writableEnded = false;
  readonly chunks: string[] = [];
  private headerMap = new Map<string, string>();
  private closeEmitted = false;

  setHeader(name: string, value: string | number | readonly string[]): this {
    this.headerMap.set(
      name.toLowerCase(),
      typeof value === "object" ? value.join(", ") : String(value),
    );
    return this;
  }

  getHeader(name: string): string | undefined {
    return this.headerMap.get(name.toLowerCase());
  }

  get headers(): Record<string, string> {
    return Object.fromEntries(this.headerMap);
  }

  writeHead(statusCode: number, headers: OutgoingHttpHeaders = {}): this {
    this.statusCode = statusCode;
    for (const [name, value] of Object.entries(headers)) {
      if (value !== undefined) this.setHeader(name, value);
    }
    this.sendHead();
    return this;
  }

  flushHeaders(): void {
    this.sendHead();
  }

  write(chunk: string): boolean {
    if (this.writableEnded) throw new Error("write after end");
    this.sendHead();
    this.chunks.push(chunk);
    this.emit("chunk", chunk);
    return true;
  }

  end(chunk?: string): this {
    if (this.writableEnded) return this;
    if (chunk !== undefined) this.write(chunk);
    this.sendHead();
    this.writableEnded = true;
    this.emit("finish");
    this.emitClose();
    return this;
  }

  /** Simulate the client going away mid-response */
  disconnect(): void {
    this.emitClose();
  }

  get body(): string {
    return this.chunks.join("");
  }

  json(): unknown {
    return JSON.parse(this.body);
  }

  /** Decode the body as a stream of events */
  events(): StreamEvent[] {
    return new EventDecoder().feed(this.body);
  }

  private sendHead(): void {
    if (this.headersSent) return;
    this.headersSent = true;
    this.emit("headers");
  }

  private emitClose(): void {
    if (this.closeEmitted) return;
    this.closeEmitted = true;
    this.emit("close");
  }
}

// ============================================================================
// Request helpers
// ============================================================================

/**
 * Run one request through the gateway and resolve once it is fully handled.
 */
export async function sendRequest(
  gateway: Pick<Gateway, "handleRequest">,
  options: MockRequestOptions,
): Promise<MockResponse> {
  const res = new MockResponse();
  await gateway.handleRequest(createMockRequest(options), res);
  return res;
}

export type FetchHandler = (input: string | URL | Request, init?: RequestInit) => Promise<Response>;

/**
 * A fetch implementation that routes into the gateway in-process. Streamed
 * bodies arrive chunk by chunk as the gateway writes them; cancelling the
 * body or aborting the request disconnects the mock response.
 */
export function createFetchHandler(gateway: Pick<Gateway, "handleRequest">): FetchHandler {
  return async (input, init) => {
    const request = new Request(input, init);
    const url = new URL(request.url);

    const headers: Record<string, string> = {};
    request.headers.forEach((value, name) => {
      headers[name] = value;
    });

    const req = createMockRequest({
      method: request.method,
      url: `${url.pathname}${url.search}`,
      headers,
      body: request.body ? await request.text() : undefined,
    });
    const res = new MockResponse();

    const encoder = new TextEncoder();
    let open = true;
    let fail: (error: unknown) => void = () => undefined;
    const body = new ReadableStream<Uint8Array>({
      start(controller) {
        res.on("chunk", (chunk: string) => {
          if (open) controller.enqueue(encoder.encode(chunk));
        });
        res.once("close", () => {
          if (!open) return;
          open = false;
          controller.close();
        });
        fail = (error) => {
          if (!open) return;
          open = false;
          controller.error(error);
        };
      },
      cancel() {
        open = false;
        res.disconnect();
      },
    });

    request.signal.addEventListener("abort", () => {
      fail(request.signal.reason);
      res.disconnect();
    });

    const headersSent = new Promise<void>((resolve) => {
      if (res.headersSent) resolve();
      else res.once("headers", () => resolve());
    });
    const handled = gateway.handleRequest(req, res);
    handled.catch((error: unknown) => fail(error));

    await Promise.race([headersSent, handled]);

    const status = res.statusCode;
    return new Response(status === 204 || status === 304 ? null : body, {
      status,
      headers: res.headers,
    });
  };
}

// ============================================================================
// Test Gateway Factory
// ============================================================================

export interface TestGatewayResult {
  gateway: Gateway;
  /** Run one request to completion */
  send(options: MockRequestOptions): Promise<MockResponse>;
  /** fetch routed into the gateway, for clients under test */
  fetch: FetchHandler;
  /** Base URL to hand to clients using `fetch` */
  url: string;
  cleanup: () => Promise<void>;
}

/**
 * Create an embedded gateway wired to in-process request helpers.
 */
export function createTestGateway(config: GatewayConfig = {}): TestGatewayResult {
  const gateway = createGateway({ ...config, embedded: true });

  return {
    gateway,
    send: (options) => sendRequest(gateway, options),
    fetch: createFetchHandler(gateway),
    url: "http://gateway.test",
    cleanup: () => gateway.stop(),
  };
}

// ============================================================================
// Event Helpers
// ============================================================================

/**
 * Wait for a specific gateway event.
 */
export function waitForGatewayEvent<K extends keyof GatewayEvents>(
  gateway: Gateway,
  event: K,
  timeout = 5000,
): Promise<GatewayEvents[K]> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new Error(`Timeout waiting for gateway event: ${event}`));
    }, timeout);

    gateway.once(event, (payload: GatewayEvents[K]) => {
      clearTimeout(timer);
      resolve(payload);
    });
  });
}
