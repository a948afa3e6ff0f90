/**
 * SessionRegistry
 *
 * Per-caller admission control. A caller gets at most `maxInFlight` requests
 * running at once and, when `maxRequestsPerMinute` is set, at most that many
 * admissions per minute. Nothing is queued: over the limit is a
 * TooManyRequests with a retry hint.
 */

import { ChartError } from '../errors.js';
import type { Clock } from '../cache/keyed-cache.js';

export interface Session {
  callerId: string;
  createdAt: number;
  lastSeenAt: number;
  inFlight: number;
  windowStart: number;
  windowCount: number;
}

export interface SessionHandle {
  readonly callerId: string;
  readonly admittedAt: number;
}

export interface SessionRegistryOptions {
  maxInFlight: number;
  /** 0 disables the per-minute budget */
  maxRequestsPerMinute?: number;
  idleTimeoutMs?: number;
  now?: Clock;
}

const WINDOW_MS = 60_000;
const IN_FLIGHT_RETRY_MS = 1_000;

export class SessionRegistry {
  private sessions = new Map<string, Session>();
  // Handles not yet released; release() is a no-op for anything else
  private open = new WeakSet<SessionHandle>();
  private maxInFlight: number;
  private maxRequestsPerMinute: number;
  private idleTimeoutMs: number;
  private now: Clock;

  constructor(options: SessionRegistryOptions) {
    this.maxInFlight = Math.max(1, options.maxInFlight);
    this.maxRequestsPerMinute = options.maxRequestsPerMinute ?? 0;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 15 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  admit(callerId: string): SessionHandle {
    const now = this.now();
    this.sweep(now);

    let session = this.sessions.get(callerId);
    if (!session) {
      session = { callerId, createdAt: now, lastSeenAt: now, inFlight: 0, windowStart: now, windowCount: 0 };
      this.sessions.set(callerId, session);
    }
    session.lastSeenAt = now;

    if (session.inFlight >= this.maxInFlight) {
      throw new ChartError(
        'TooManyRequests',
        `Too many chart requests in progress (limit ${this.maxInFlight}). Please wait for one to finish.`,
        { retryAfterMs: IN_FLIGHT_RETRY_MS },
      );
    }

    if (this.maxRequestsPerMinute > 0) {
      if (now - session.windowStart >= WINDOW_MS) {
        session.windowStart = now;
        session.windowCount = 0;
      }
      if (session.windowCount >= this.maxRequestsPerMinute) {
        throw new ChartError(
          'TooManyRequests',
          `Request limit of ${this.maxRequestsPerMinute} per minute reached.`,
          { retryAfterMs: session.windowStart + WINDOW_MS - now },
        );
      }
      session.windowCount++;
    }

    session.inFlight++;
    const handle: SessionHandle = Object.freeze({ callerId, admittedAt: now });
    this.open.add(handle);
    return handle;
  }

  /** Idempotent: only the first release of a handle counts */
  release(handle: SessionHandle): void {
    if (!this.open.delete(handle)) return;
    const session = this.sessions.get(handle.callerId);
    if (!session) return;
    session.inFlight = Math.max(0, session.inFlight - 1);
    session.lastSeenAt = this.now();
  }

  inFlight(callerId: string): number {
    return this.sessions.get(callerId)?.inFlight ?? 0;
  }

  get size(): number {
    return this.sessions.size;
  }

  snapshot(): Session[] {
    return [...this.sessions.values()].map(session => ({ ...session }));
  }

  // Sessions with work in flight are never reclaimed
  private sweep(now: number): void {
    for (const [callerId, session] of this.sessions) {
      if (session.inFlight === 0 && now - session.lastSeenAt > this.idleTimeoutMs) {
        this.sessions.delete(callerId);
      }
    }
  }
}
