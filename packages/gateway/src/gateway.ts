/**
 * Gateway
 *
 * Wires the session store, method registry, dispatcher, replay buffers and
 * HTTP transport together, and owns their lifecycle.
 *
 * Can run standalone or embedded in an external framework.
 */

import { EventEmitter } from "events";
import { Logger } from "@switchyard/kernel";
import { ErrorCodes, type CallId } from "@switchyard/shared";
import { resolveGatewayConfig, type ResolvedGatewayConfig } from "./config.js";
import { CallDispatcher, type CallSummary } from "./dispatcher.js";
import { HTTPTransport, type HttpRequest, type HttpResponse } from "./http-transport.js";
import { MethodRegistry } from "./method-registry.js";
import { createNegotiationPolicy } from "./negotiator.js";
import { ReplayRegistry } from "./replay-buffer.js";
import { SessionStore } from "./session-store.js";
import type { GatewayConfig, GatewayEvents, Method } from "./types.js";

const log = Logger.for("Gateway");

export interface GatewayStatus {
  id: string;
  /** Seconds since start() */
  uptime: number;
  sessions: number;
  activeCalls: number;
  openStreams: number;
  replayBuffers: number;
  methods: string[];
}

export class Gateway extends EventEmitter {
  private config: ResolvedGatewayConfig;
  private methods: MethodRegistry;
  private sessionStore: SessionStore;
  private replay: ReplayRegistry;
  private dispatcher: CallDispatcher;
  private transport: HTTPTransport;
  private startTime: Date | null = null;
  private isRunning = false;
  private boundPort: number | null = null;

  constructor(config: GatewayConfig = {}) {
    super();

    this.config = resolveGatewayConfig(config);
    this.methods = new MethodRegistry(config.methods);

    this.sessionStore = new SessionStore({
      idleTimeoutMs: this.config.sessions.idleTimeoutMs,
      sweepIntervalMs: this.config.sessions.sweepIntervalMs,
      replayEnabled: this.config.replay.enabled,
    });

    this.replay = new ReplayRegistry(this.config.replay);

    this.dispatcher = new CallDispatcher({
      sessions: this.sessionStore,
      methods: this.methods,
      replay: this.replay,
      policy: createNegotiationPolicy(this.config.negotiation, (name) =>
        this.methods.classify(name),
      ),
      callIdleTimeoutMs: this.config.calls.idleTimeoutMs,
      onCallSettled: (summary) => this.onCallSettled(summary),
    });

    this.transport = new HTTPTransport({
      sessions: this.sessionStore,
      dispatcher: this.dispatcher,
      replay: this.replay,
      methods: this.methods,
      path: this.config.path,
      pathPrefix: this.config.httpPathPrefix,
      corsOrigin: this.config.httpCorsOrigin,
      keepaliveMs: this.config.keepaliveMs,
      identify: this.config.identify,
    });

    this.sessionStore.onCreate((session) => {
      this.emitEvent("session:created", { sessionId: session.id });
    });
    this.sessionStore.onRemove((session, why) => {
      this.dispatcher.releaseSession(session.id);
      this.emitEvent(why === "expired" ? "session:expired" : "session:closed", {
        sessionId: session.id,
      });
    });
  }

  /**
   * Start the gateway. In embedded mode only the session sweep starts;
   * requests arrive through handleRequest().
   */
  async start(): Promise<void> {
    if (this.isRunning) {
      throw new Error("Gateway is already running");
    }

    this.sessionStore.start();

    if (!this.config.embedded) {
      const address = await this.transport.listen(this.config.port, this.config.host);
      this.boundPort = address.port;
      log.info({ host: this.config.host, port: address.port, path: this.config.path }, "listening");
    }

    this.startTime = new Date();
    this.isRunning = true;

    this.emitEvent("started", {
      port: this.boundPort ?? this.config.port,
      host: this.config.host,
    });
  }

  /**
   * Stop the gateway. In-flight calls are cancelled and every session dropped.
   */
  async stop(): Promise<void> {
    if (!this.isRunning && !this.config.embedded) return;

    this.dispatcher.stop();
    await this.transport.close();
    this.sessionStore.stop();
    this.replay.clear();

    this.isRunning = false;
    this.startTime = null;
    this.boundPort = null;

    this.emitEvent("stopped", {});
  }

  /**
   * Alias for stop() - useful for embedded mode cleanup
   */
  async close(): Promise<void> {
    return this.stop();
  }

  /**
   * Handle an HTTP request (embedded mode).
   *
   * @example
   * ```typescript
   * // Express middleware
   * app.use("/api", (req, res, next) => {
   *   gateway.handleRequest(req, res).catch(next);
   * });
   * ```
   */
  handleRequest(req: HttpRequest, res: HttpResponse): Promise<void> {
    return this.transport.handle(req, res);
  }

  /**
   * Add or replace a method after construction.
   */
  register(name: string, method: Method): this {
    this.methods.register(name, method);
    return this;
  }

  /**
   * Cancel an in-flight call. Returns false when it is not running.
   */
  cancel(sessionId: string, callId: CallId, reason?: string): boolean {
    return this.dispatcher.cancel(sessionId, callId, reason);
  }

  get status(): GatewayStatus {
    return {
      id: this.config.id,
      uptime: this.startTime ? Math.floor((Date.now() - this.startTime.getTime()) / 1000) : 0,
      sessions: this.sessionStore.size,
      activeCalls: this.dispatcher.activeCount,
      openStreams: this.transport.openStreams,
      replayBuffers: this.replay.size,
      methods: this.methods.names(),
    };
  }

  get running(): boolean {
    return this.isRunning;
  }

  get id(): string {
    return this.config.id;
  }

  /** Port actually bound by start(), in standalone mode */
  get port(): number | null {
    return this.boundPort;
  }

  get sessions(): SessionStore {
    return this.sessionStore;
  }

  private onCallSettled(summary: CallSummary): void {
    const { sessionId, callId, method, mode } = summary;
    if (summary.state === "completed") {
      this.emitEvent("call:completed", { sessionId, callId, method, mode });
      return;
    }

    const data = summary.error?.data;
    const reason =
      data && typeof data === "object" && "reason" in data && typeof data.reason === "string"
        ? data.reason
        : undefined;
    this.emitEvent("call:failed", {
      sessionId,
      callId,
      method,
      mode,
      code: summary.error?.code ?? ErrorCodes.HANDLER_FAILURE,
      reason,
    });
  }

  private emitEvent<K extends keyof GatewayEvents>(event: K, payload: GatewayEvents[K]): void {
    this.emit(event, payload);
  }
}

/**
 * Create a gateway instance
 */
export function createGateway(config: GatewayConfig = {}): Gateway {
  return new Gateway(config);
}
