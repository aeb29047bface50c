import { QuizSession, TtlMode } from "../domain/session";
import { QuizError, sessionBusy, sessionExpired, sessionNotFound } from "../domain/errors";
import { isTimeoutError, withTimeout } from "../services/timeout";
import { KeyedMutex, LockWaitTimeoutError, Release } from "./keyedMutex";

export interface SessionStoreOptions {
  ttlMode?: TtlMode;
  lockWaitMs?: number;
  lockCeilingMs?: number;
  now?: () => Date;
}

export interface LockOptions {
  waitMs?: number;
  ceilingMs?: number;
}

/**
 * SessionStore keeps live quiz sessions in memory.
 *
 * Sessions expire after their TTL and are evicted lazily on read and by a
 * periodic sweep. All mutation goes through withLock(), which serializes
 * work per session and commits a private draft only when the work
 * finishes in time.
 */
export class SessionStore {
  private sessions = new Map<string, QuizSession>();
  private locks = new KeyedMutex();
  private sweeper?: NodeJS.Timeout;
  private ttlMode: TtlMode;
  private lockWaitMs: number;
  private lockCeilingMs: number;
  private clock: () => Date;

  constructor(options: SessionStoreOptions = {}) {
    this.ttlMode = options.ttlMode ?? "sliding";
    this.lockWaitMs = options.lockWaitMs ?? 5000;
    this.lockCeilingMs = options.lockCeilingMs ?? 45000;
    this.clock = options.now ?? (() => new Date());
  }

  now(): Date {
    return this.clock();
  }

  /**
   * Get a session by ID, evicting it if its TTL has passed
   */
  get(sessionId: string): QuizSession | undefined {
    return this.lookup(sessionId).session;
  }

  /**
   * Get a session or throw SESSION_NOT_FOUND / SESSION_EXPIRED
   */
  require(sessionId: string): QuizSession {
    const { session, expired } = this.lookup(sessionId);
    if (session) return session;
    throw expired ? sessionExpired(sessionId) : sessionNotFound(sessionId);
  }

  /**
   * Insert or replace a full session record
   */
  put(session: QuizSession): void {
    this.sessions.set(session.id, session);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  size(): number {
    return this.sessions.size;
  }

  /**
   * Run fn on a private copy of the session while holding its lock.
   * The copy replaces the stored session only if fn resolves before the
   * ceiling and the session was not deleted meanwhile. Past the ceiling
   * the signal handed to fn is aborted.
   */
  async withLock<T>(
    sessionId: string,
    fn: (draft: QuizSession, signal: AbortSignal) => T | Promise<T>,
    options: LockOptions = {}
  ): Promise<T> {
    const waitMs = options.waitMs ?? this.lockWaitMs;
    const ceilingMs = options.ceilingMs ?? this.lockCeilingMs;

    this.require(sessionId);

    const release = await this.acquire(sessionId, waitMs);

    try {
      const current = this.require(sessionId);
      const draft = structuredClone(current);
      const controller = new AbortController();

      let result: T;
      try {
        result = await withTimeout(
          Promise.resolve().then(() => fn(draft, controller.signal)),
          ceilingMs,
          `Session ${sessionId} operation`
        );
      } catch (error) {
        if (isTimeoutError(error)) {
          controller.abort(error);
          console.error(`[SessionStore] Operation on ${sessionId} exceeded ${ceilingMs}ms, draft discarded`);
          throw new QuizError("OPERATION_TIMEOUT", "Operation took too long and was abandoned", {
            sessionId,
            ceilingMs,
          });
        }
        throw error;
      }

      if (this.sessions.get(sessionId) === current) {
        this.touch(draft);
        this.sessions.set(sessionId, draft);
      }
      return result;
    } finally {
      release();
    }
  }

  /**
   * Set a new TTL counted from now, regardless of mode
   */
  applyTtl(session: QuizSession, ttlSeconds: number): void {
    session.ttlSeconds = ttlSeconds;
    session.expiresAt = new Date(this.now().getTime() + ttlSeconds * 1000).toISOString();
  }

  /**
   * Push the expiry to at least seconds from now. Never shortens it and
   * leaves the idle window (ttlSeconds) as it was.
   */
  extend(session: QuizSession, seconds: number): void {
    const requested = this.now().getTime() + seconds * 1000;
    session.expiresAt = new Date(Math.max(requested, Date.parse(session.expiresAt))).toISOString();
  }

  /**
   * Remove every expired session. Returns how many were evicted.
   */
  sweep(): number {
    const now = this.now().getTime();
    let evicted = 0;
    for (const [id, session] of this.sessions) {
      if (now >= new Date(session.expiresAt).getTime()) {
        this.sessions.delete(id);
        evicted++;
      }
    }
    if (evicted > 0) {
      console.log(`[SessionStore] Swept ${evicted} expired session(s)`);
    }
    return evicted;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  private async acquire(sessionId: string, waitMs: number): Promise<Release> {
    if (this.locks.isLocked(sessionId)) {
      console.log(`[SessionStore] ${sessionId} is busy, queueing behind ${this.locks.waiting(sessionId) + 1} request(s)`);
    }
    try {
      return await this.locks.acquire(sessionId, waitMs);
    } catch (error) {
      if (error instanceof LockWaitTimeoutError) {
        console.warn(`[SessionStore] Lock wait timed out for ${sessionId} after ${waitMs}ms`);
        throw sessionBusy(sessionId, waitMs);
      }
      throw error;
    }
  }

  private touch(session: QuizSession): void {
    const now = this.now();
    session.updatedAt = now.toISOString();
    if (this.ttlMode === "sliding") {
      // an explicit extension past the idle window is kept
      const slid = now.getTime() + session.ttlSeconds * 1000;
      session.expiresAt = new Date(Math.max(slid, Date.parse(session.expiresAt))).toISOString();
    }
  }

  private lookup(sessionId: string): { session?: QuizSession; expired: boolean } {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return { expired: false };
    }
    if (this.now().getTime() >= new Date(session.expiresAt).getTime()) {
      this.sessions.delete(sessionId);
      console.log(`[SessionStore] Session ${sessionId} expired`);
      return { expired: true };
    }
    return { session, expired: false };
  }
}
