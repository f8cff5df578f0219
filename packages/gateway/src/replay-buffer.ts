/**
 * Replay Buffers
 *
 * Every streamed call appends its events to a per-call EventBuffer. The live
 * writer follows it; so does any reader that resumes after a disconnect.
 * Buffers of resumable sessions are bounded and kept until the call is
 * terminal plus a grace period, then released.
 */

import { EventBuffer, Logger } from "@switchyard/kernel";
import { ResumeUnavailableError, type StreamEvent } from "@switchyard/shared";
import type { Session } from "./types.js";

const log = Logger.for("ReplayRegistry");

export const DEFAULT_REPLAY_CAPACITY = 1024;
export const DEFAULT_REPLAY_GRACE_MS = 30_000;

export interface ReplayConfig {
  enabled: boolean;
  /** Events retained per call */
  capacity: number;
  /** How long a terminal call stays resumable */
  gracePeriodMs: number;
}

interface ReplayEntry {
  buffer: EventBuffer<StreamEvent>;
  evictTimer: ReturnType<typeof setTimeout> | null;
}

export class ReplayRegistry {
  private sessions = new Map<string, Map<string, ReplayEntry>>();

  constructor(private config: ReplayConfig) {}

  get enabled(): boolean {
    return this.config.enabled;
  }

  /**
   * Create the event buffer for a streamed call. Only calls of sessions that
   * support resume are retained; others get a buffer with no history.
   */
  open(session: Session, callKey: string): EventBuffer<StreamEvent> {
    if (!this.config.enabled || !session.capabilities.supportsResume) {
      return new EventBuffer<StreamEvent>({ capacity: 0 });
    }

    const buffer = new EventBuffer<StreamEvent>({ capacity: this.config.capacity });
    let calls = this.sessions.get(session.id);
    if (!calls) {
      calls = new Map();
      this.sessions.set(session.id, calls);
    }
    calls.set(callKey, { buffer, evictTimer: null });
    return buffer;
  }

  /**
   * The call reached its terminal event; keep its history for the grace period.
   */
  settle(sessionId: string, callKey: string): void {
    const entry = this.sessions.get(sessionId)?.get(callKey);
    if (!entry || entry.evictTimer) return;

    entry.evictTimer = setTimeout(() => {
      this.release(sessionId, callKey);
    }, this.config.gracePeriodMs);
    entry.evictTimer.unref();
  }

  /** Drop a call's history now */
  release(sessionId: string, callKey: string): void {
    const calls = this.sessions.get(sessionId);
    const entry = calls?.get(callKey);
    if (!calls || !entry) return;

    if (entry.evictTimer) clearTimeout(entry.evictTimer);
    entry.buffer.release();
    calls.delete(callKey);
    if (calls.size === 0) this.sessions.delete(sessionId);
    log.debug({ sessionId, callId: callKey }, "replay buffer released");
  }

  releaseSession(sessionId: string): void {
    const calls = this.sessions.get(sessionId);
    if (!calls) return;
    for (const callKey of [...calls.keys()]) {
      this.release(sessionId, callKey);
    }
  }

  clear(): void {
    for (const sessionId of [...this.sessions.keys()]) {
      this.releaseSession(sessionId);
    }
  }

  has(sessionId: string, callKey: string): boolean {
    return this.sessions.get(sessionId)?.has(callKey) ?? false;
  }

  /** Number of retained call buffers across all sessions */
  get size(): number {
    let total = 0;
    for (const calls of this.sessions.values()) total += calls.size;
    return total;
  }

  /**
   * Events of a call with `sequence > lastSeenSequence`: retained ones first,
   * then live ones until the terminal event. Omitting `lastSeenSequence`
   * replays from the start.
   *
   * Throws ResumeUnavailableError when the session cannot resume, the call is
   * unknown or released, or the requested events were already evicted.
   */
  resume(
    session: Session,
    callKey: string,
    lastSeenSequence?: number,
  ): AsyncGenerator<StreamEvent, void, undefined> {
    if (!session.capabilities.supportsResume) {
      throw new ResumeUnavailableError(callKey, "session does not support resume");
    }
    const entry = this.sessions.get(session.id)?.get(callKey);
    if (!entry) {
      throw new ResumeUnavailableError(callKey);
    }

    const nextNeeded = lastSeenSequence === undefined ? 0 : lastSeenSequence + 1;
    const oldest = entry.buffer.getBuffer()[0];
    if (oldest && oldest.sequence > nextNeeded) {
      throw new ResumeUnavailableError(
        callKey,
        `events before sequence ${oldest.sequence} were evicted`,
      );
    }

    log.debug({ sessionId: session.id, callId: callKey, lastSeenSequence }, "resuming call");
    return after(entry.buffer.follow(), nextNeeded - 1);
  }
}

async function* after(
  events: AsyncGenerator<StreamEvent, void, undefined>,
  lastSeenSequence: number,
): AsyncGenerator<StreamEvent, void, undefined> {
  for await (const event of events) {
    if (event.sequence > lastSeenSequence) yield event;
  }
}
