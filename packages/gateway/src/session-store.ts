/**
 * Session Store
 *
 * Owns every session record. Resolving a missing, unknown or expired id
 * silently creates a fresh session; callers never see an "unknown session"
 * error. Expired sessions are removed by a periodic sweep.
 *
 * All operations are synchronous, so a resolve and a sweep can never
 * interleave mid-update on the event loop.
 */

import { randomUUID } from "node:crypto";
import { Logger } from "@switchyard/kernel";
import type { AcceptSet } from "@switchyard/shared";
import type { Session, SessionCapabilities } from "./types.js";

const log = Logger.for("SessionStore");

export interface SessionStoreConfig {
  /** Idle time after which a session expires */
  idleTimeoutMs: number;
  /** Sweep cadence for start(); 0 disables the timer */
  sweepIntervalMs: number;
  /** Whether streamed calls are retained for resume */
  replayEnabled: boolean;
  /** Clock, overridable in tests */
  now?: () => number;
}

/**
 * What the creating request declared. Only consulted when a session is
 * created; later calls cannot change capability membership.
 */
export interface SessionRequest {
  accept: AcceptSet;
  identity?: unknown;
}

export interface ResolvedSession {
  session: Session;
  /** True when the id was absent or not recognized */
  created: boolean;
}

export type RemovalReason = "expired" | "closed";

export type SessionListener = (session: Session) => void;

export type SessionRemovedListener = (session: Session, why: RemovalReason) => void;

export class SessionStore {
  private sessions = new Map<string, Session>();
  private sweepTimer: ReturnType<typeof setInterval> | null = null;
  private removeListeners = new Set<SessionRemovedListener>();
  private createListeners = new Set<SessionListener>();
  private readonly now: () => number;

  constructor(private config: SessionStoreConfig) {
    this.now = config.now ?? Date.now;
  }

  /**
   * Look up a session, or create one.
   *
   * A recognized, live id refreshes `lastActiveAt`. Anything else - absent,
   * unknown, or idle past the timeout but not yet swept - yields a new session
   * with a new id.
   */
  resolve(sessionId: string | undefined, request: SessionRequest): ResolvedSession {
    const now = this.now();

    if (sessionId) {
      const existing = this.sessions.get(sessionId);
      if (existing && !this.isExpired(existing, now)) {
        existing.lastActiveAt = new Date(now);
        return { session: existing, created: false };
      }
      if (existing) {
        this.remove(existing, "expired");
      }
      log.debug({ sessionId }, "unknown session id, creating a new session");
    }

    const session = this.create(request, now);
    return { session, created: true };
  }

  /** Get a live session without creating or refreshing it */
  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    if (!session) return undefined;
    if (this.isExpired(session, this.now())) {
      this.remove(session, "expired");
      return undefined;
    }
    return session;
  }

  /**
   * Record activity on a live session without resolving it. Running calls
   * use this so a session is never idle while it is producing output.
   */
  touch(session: Session): void {
    if (this.sessions.get(session.id) !== session) return;
    session.lastActiveAt = new Date(this.now());
  }

  has(sessionId: string): boolean {
    return this.get(sessionId) !== undefined;
  }

  /**
   * Remove sessions idle longer than the timeout.
   * Returns the removed sessions.
   */
  expire(now: number = this.now()): Session[] {
    const expired: Session[] = [];
    for (const session of [...this.sessions.values()]) {
      if (this.isExpired(session, now)) {
        this.remove(session, "expired");
        expired.push(session);
      }
    }
    if (expired.length > 0) {
      log.info({ count: expired.length, remaining: this.sessions.size }, "expired idle sessions");
    }
    return expired;
  }

  /** Close a session explicitly. Returns false if it did not exist. */
  close(sessionId: string): boolean {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.remove(session, "closed");
    return true;
  }

  /** Called whenever a session leaves the store, by expiry or close */
  onRemove(listener: SessionRemovedListener): () => void {
    this.removeListeners.add(listener);
    return () => {
      this.removeListeners.delete(listener);
    };
  }

  onCreate(listener: SessionListener): () => void {
    this.createListeners.add(listener);
    return () => {
      this.createListeners.delete(listener);
    };
  }

  all(): Session[] {
    return Array.from(this.sessions.values());
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Begin the periodic expiry sweep */
  start(): void {
    if (this.sweepTimer || this.config.sweepIntervalMs <= 0) return;
    this.sweepTimer = setInterval(() => {
      this.expire();
    }, this.config.sweepIntervalMs);
    this.sweepTimer.unref();
  }

  /** Stop sweeping and drop every session */
  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
    for (const session of [...this.sessions.values()]) {
      this.remove(session, "closed");
    }
  }

  private create(request: SessionRequest, now: number): Session {
    const supportsStreaming = request.accept === "immediate-or-streamed";
    const capabilities: SessionCapabilities = {
      supportsStreaming,
      supportsResume: supportsStreaming && this.config.replayEnabled,
    };

    const session: Session = {
      id: generateSessionId(),
      createdAt: new Date(now),
      lastActiveAt: new Date(now),
      capabilities: Object.freeze(capabilities),
      identity: request.identity,
    };
    this.sessions.set(session.id, session);

    log.info({ sessionId: session.id, capabilities }, "session created");
    for (const listener of [...this.createListeners]) {
      listener(session);
    }
    return session;
  }

  private remove(session: Session, why: RemovalReason): void {
    if (this.sessions.get(session.id) !== session) return;
    this.sessions.delete(session.id);

    log.debug({ sessionId: session.id, why }, "session removed");
    for (const listener of [...this.removeListeners]) {
      listener(session, why);
    }
  }

  private isExpired(session: Session, now: number): boolean {
    return now - session.lastActiveAt.getTime() > this.config.idleTimeoutMs;
  }
}

/** 32 lowercase hex characters */
export function generateSessionId(): string {
  return randomUUID().replace(/-/g, "");
}
