/**
 * HTTP Transport
 *
 * Serves the call endpoint over plain HTTP. One POST answers with JSON or
 * with an SSE stream, decided per call; companion routes resume a stream,
 * cancel a call and close a session.
 *
 * | Request               | Meaning                                      |
 * | --------------------- | -------------------------------------------- |
 * | POST   {path}         | one call                                     |
 * | GET    {path}/resume  | resume by `callId`/`after` or Last-Event-ID  |
 * | POST   {path}/cancel  | cancel `{ callId, reason? }`                 |
 * | GET    {path}/methods | protocol info and registered methods         |
 * | DELETE {path}         | close the session                            |
 * | OPTIONS *             | CORS preflight                               |
 */

import {
  createServer,
  type IncomingHttpHeaders,
  type OutgoingHttpHeaders,
  type Server,
} from "http";
import type { AddressInfo } from "net";
import { Logger } from "@switchyard/kernel";
import {
  ContentTypes,
  ErrorCodes,
  LAST_EVENT_ID_HEADER,
  PROTOCOL_VERSION,
  ProtocolViolationError,
  ResumeUnavailableError,
  SESSION_HEADER,
  cancelRequestSchema,
  formatIssues,
  parseAcceptHeader,
  parseEventId,
  type CancelResponse,
  type CloseSessionResponse,
  type DiscoveryResponse,
  type StreamEvent,
} from "@switchyard/shared";
import type { CallDispatcher } from "./dispatcher.js";
import type { MethodRegistry } from "./method-registry.js";
import type { ReplayRegistry } from "./replay-buffer.js";
import type { SessionStore } from "./session-store.js";
import { createSSEWriter, setSSEHeaders, type SSEWriter } from "./sse.js";

const log = Logger.for("HTTPTransport");

// ============================================================================
// Request / Response surface
// ============================================================================

/**
 * What the transport needs from a request. Node's IncomingMessage and
 * Express's Request both satisfy it.
 */
export interface HttpRequest extends AsyncIterable<unknown> {
  method?: string;
  url?: string;
  headers: IncomingHttpHeaders;
  /** Body already parsed by framework middleware */
  body?: unknown;
}

/**
 * What the transport needs from a response. Node's ServerResponse and
 * Express's Response both satisfy it.
 */
export interface HttpResponse {
  statusCode: number;
  readonly headersSent: boolean;
  readonly writableEnded: boolean;
  setHeader(name: string, value: string | number | readonly string[]): unknown;
  writeHead(statusCode: number, headers?: OutgoingHttpHeaders): unknown;
  write(chunk: string): boolean;
  end(chunk?: string): unknown;
  once(event: "close", listener: () => void): unknown;
  flushHeaders?(): void;
}

export interface HTTPTransportConfig {
  sessions: SessionStore;
  dispatcher: CallDispatcher;
  replay: ReplayRegistry;
  methods: MethodRegistry;
  /** Call endpoint path, e.g. "/rpc" */
  path: string;
  /** Prefix stripped before routing, e.g. "/api" */
  pathPrefix?: string;
  corsOrigin?: string;
  keepaliveMs?: number;
  identify?: (req: HttpRequest) => unknown;
}

/**
 * Bearer token from the Authorization header, when present
 */
export function extractToken(req: { headers: IncomingHttpHeaders }): string | undefined {
  const auth = req.headers.authorization;
  if (typeof auth === "string" && auth.startsWith("Bearer ")) {
    return auth.slice(7);
  }
  return undefined;
}

function headerValue(value: string | string[] | undefined): string | undefined {
  const first = Array.isArray(value) ? value[0] : value;
  return first && first.length > 0 ? first : undefined;
}

// ============================================================================
// HTTP Transport
// ============================================================================

export class HTTPTransport {
  private server: Server | null = null;
  private writers = new Set<SSEWriter>();

  constructor(private config: HTTPTransportConfig) {}

  /**
   * Start a standalone server. Resolves with the bound address.
   */
  listen(port: number, host: string): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      const server = createServer((req, res) => {
        this.handle(req, res).catch((error: unknown) => {
          log.error({ err: error, method: req.method, url: req.url }, "request failed");
          if (!res.headersSent) {
            res.writeHead(500, { "Content-Type": ContentTypes.JSON });
            res.end(
              JSON.stringify({
                id: null,
                error: { code: ErrorCodes.INTERNAL_ERROR, message: "Internal server error" },
              }),
            );
          } else if (!res.writableEnded) {
            res.end();
          }
        });
      });

      server.once("error", reject);
      server.listen(port, host, () => {
        server.off("error", reject);
        server.on("error", (error) => {
          log.error({ err: error }, "server error");
        });
        this.server = server;

        const address = server.address();
        if (address && typeof address === "object") {
          resolve(address);
        } else {
          resolve({ address: host, family: "IPv4", port });
        }
      });
    });
  }

  /**
   * End open streams and stop the standalone server, if any.
   */
  close(): Promise<void> {
    for (const writer of [...this.writers]) {
      writer.close();
    }
    this.writers.clear();

    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = null;

    return new Promise((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error);
        else resolve();
      });
      server.closeAllConnections();
    });
  }

  get openStreams(): number {
    return this.writers.size;
  }

  /**
   * Route one request. Rejects only on unexpected faults.
   */
  async handle(req: HttpRequest, res: HttpResponse): Promise<void> {
    res.setHeader("Access-Control-Allow-Origin", this.config.corsOrigin ?? "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader(
      "Access-Control-Allow-Headers",
      "Content-Type, Authorization, Accept, Mcp-Session-Id, Last-Event-ID",
    );
    res.setHeader("Access-Control-Expose-Headers", "Mcp-Session-Id");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url ?? "/", "http://localhost");
    const route = this.routeOf(url.pathname);
    log.debug({ method: req.method, path: url.pathname, route }, "request");

    switch (route) {
      case "call":
        if (req.method === "POST") return this.handleCall(req, res);
        if (req.method === "DELETE") return this.handleClose(req, res);
        if (req.method === "GET" && headerValue(req.headers[LAST_EVENT_ID_HEADER])) {
          return this.handleResume(req, res, url);
        }
        return this.methodNotAllowed(res, "POST, DELETE");
      case "resume":
        if (req.method === "GET") return this.handleResume(req, res, url);
        return this.methodNotAllowed(res, "GET");
      case "cancel":
        if (req.method === "POST") return this.handleCancel(req, res);
        return this.methodNotAllowed(res, "POST");
      case "methods":
        if (req.method === "GET") return this.handleDiscovery(res);
        return this.methodNotAllowed(res, "GET");
    }

    sendJson(res, 404, { id: null, error: { code: "NOT_FOUND", message: "Not found" } });
  }

  private routeOf(pathname: string): "call" | "resume" | "cancel" | "methods" | null {
    const prefix = this.config.pathPrefix ?? "";
    let path = pathname;
    if (prefix && path.startsWith(prefix)) {
      path = path.slice(prefix.length);
    }
    path = path.replace(/\/+$/, "") || "/";

    const base = this.config.path;
    if (path === base) return "call";
    if (path === `${base}/resume`) return "resume";
    if (path === `${base}/cancel`) return "cancel";
    if (path === `${base}/methods`) return "methods";
    return null;
  }

  // ==========================================================================
  // Routes
  // ==========================================================================

  private async handleCall(req: HttpRequest, res: HttpResponse): Promise<void> {
    const body = await readJsonBody(req);
    const outcome = await this.config.dispatcher.dispatch({
      body,
      sessionId: headerValue(req.headers[SESSION_HEADER]),
      accept: parseAcceptHeader(req.headers.accept),
      identity: this.identify(req),
    });

    res.setHeader(SESSION_HEADER, outcome.session.id);

    if (outcome.mode === "immediate") {
      sendJson(res, outcome.rejected ? 400 : 200, outcome.response);
      return;
    }
    await this.stream(res, outcome.events);
  }

  private async handleResume(req: HttpRequest, res: HttpResponse, url: URL): Promise<void> {
    const { session } = this.config.sessions.resolve(headerValue(req.headers[SESSION_HEADER]), {
      accept: parseAcceptHeader(req.headers.accept),
      identity: this.identify(req),
    });
    res.setHeader(SESSION_HEADER, session.id);

    const target = resumeTarget(url, headerValue(req.headers[LAST_EVENT_ID_HEADER]));
    if (target instanceof ProtocolViolationError) {
      sendJson(res, 400, { id: null, error: target.toPayload() });
      return;
    }

    let events: AsyncGenerator<StreamEvent, void, undefined>;
    try {
      events = this.config.replay.resume(session, target.callId, target.after);
    } catch (error) {
      if (error instanceof ResumeUnavailableError) {
        log.info({ sessionId: session.id, callId: target.callId }, error.message);
        sendJson(res, 404, { id: target.callId, error: error.toPayload() });
        return;
      }
      throw error;
    }
    await this.stream(res, events);
  }

  private async handleCancel(req: HttpRequest, res: HttpResponse): Promise<void> {
    const parsed = cancelRequestSchema.safeParse(await readJsonBody(req));
    if (!parsed.success) {
      const error = new ProtocolViolationError("Malformed cancel request", formatIssues(parsed.error));
      sendJson(res, 400, { id: null, error: error.toPayload() });
      return;
    }

    const sessionId = headerValue(req.headers[SESSION_HEADER]);
    const session = sessionId ? this.config.sessions.get(sessionId) : undefined;
    const cancelled = session
      ? this.config.dispatcher.cancel(session.id, parsed.data.callId, parsed.data.reason)
      : false;

    const response: CancelResponse = { cancelled };
    sendJson(res, 200, response);
  }

  private async handleClose(req: HttpRequest, res: HttpResponse): Promise<void> {
    const sessionId = headerValue(req.headers[SESSION_HEADER]);
    const closed = sessionId ? this.config.sessions.close(sessionId) : false;
    if (closed) {
      log.info({ sessionId }, "session closed by client");
    }

    const response: CloseSessionResponse = { closed };
    sendJson(res, 200, response);
  }

  private handleDiscovery(res: HttpResponse): void {
    const response: DiscoveryResponse = {
      protocol: {
        version: PROTOCOL_VERSION,
        modes: ["immediate", "streamed"],
        resume: this.config.replay.enabled,
      },
      methods: this.config.methods.describe(),
    };
    sendJson(res, 200, response);
  }

  private methodNotAllowed(res: HttpResponse, allow: string): void {
    res.setHeader("Allow", allow);
    sendJson(res, 405, {
      id: null,
      error: { code: "METHOD_NOT_ALLOWED", message: `Use ${allow}` },
    });
  }

  // ==========================================================================
  // Streaming
  // ==========================================================================

  /**
   * Write events until the terminal one, or until the client goes away. A
   * disconnect only detaches this reader; the call keeps running.
   */
  private async stream(
    res: HttpResponse,
    events: AsyncGenerator<StreamEvent, void, undefined>,
  ): Promise<void> {
    res.statusCode = 200;
    setSSEHeaders(res);

    const writer = createSSEWriter(res, { keepaliveMs: this.config.keepaliveMs });
    this.writers.add(writer);

    const disconnected = new Promise<"disconnected">((resolve) => {
      res.once("close", () => resolve("disconnected"));
    });

    try {
      for (;;) {
        const next = await Promise.race([events.next(), disconnected]);
        if (next === "disconnected" || writer.closed) {
          log.debug("stream reader detached");
          events.return(undefined).catch((error: unknown) => {
            log.debug({ err: error }, "event iterator failed to return");
          });
          return;
        }
        if (next.done) return;
        writer.writeEvent(next.value);
      }
    } finally {
      this.writers.delete(writer);
      writer.close();
    }
  }

  private identify(req: HttpRequest): unknown {
    return this.config.identify ? this.config.identify(req) : extractToken(req);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function sendJson(res: HttpResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": ContentTypes.JSON });
  res.end(JSON.stringify(body));
}

/**
 * Parsed JSON body, or undefined when the body is empty or not JSON.
 * A body already parsed by framework middleware is used as is.
 */
async function readJsonBody(req: HttpRequest): Promise<unknown> {
  if (req.body !== undefined) return req.body;

  const decoder = new TextDecoder();
  let text = "";
  for await (const chunk of req) {
    if (typeof chunk === "string") {
      text += chunk;
    } else if (chunk instanceof Uint8Array) {
      text += decoder.decode(chunk, { stream: true });
    }
  }
  text += decoder.decode();

  if (text.trim().length === 0) return undefined;
  try {
    return JSON.parse(text);
  } catch (error) {
    log.debug({ err: error }, "request body is not JSON");
    return undefined;
  }
}

/**
 * Which call to resume and from where: `?callId=&after=` wins over a
 * Last-Event-ID header.
 */
function resumeTarget(
  url: URL,
  lastEventId: string | undefined,
): { callId: string; after?: number } | ProtocolViolationError {
  const callId = url.searchParams.get("callId");
  if (callId) {
    const afterParam = url.searchParams.get("after");
    if (afterParam === null || afterParam === "") return { callId };
    const after = Number(afterParam);
    if (!Number.isInteger(after) || after < 0) {
      return new ProtocolViolationError(`Invalid "after" sequence: ${afterParam}`);
    }
    return { callId, after };
  }

  if (lastEventId) {
    const parsed = parseEventId(lastEventId);
    if (!parsed) {
      return new ProtocolViolationError(`Invalid Last-Event-ID: ${lastEventId}`);
    }
    return { callId: parsed.callId, after: parsed.sequence };
  }

  return new ProtocolViolationError("Resume needs a callId or a Last-Event-ID header");
}
