import type { Session } from '@authgate/core';

/** session storage backend interface */
export abstract class SessionStore {
  /**
   * retrieves a session
   * @param sessionId session identifier read from the cookie
   * @returns session data or undefined if unknown or expired
   */
  public abstract get(sessionId: string): Promise<Session | undefined>;
  /**
   * stores a session, replacing any previous content
   * @param sessionId session identifier
   * @param session session data
   */
  public abstract set(sessionId: string, session: Session): Promise<void>;
  /**
   * deletes a session
   * @param sessionId session identifier
   */
  public abstract drop(sessionId: string): Promise<void>;
}

/** configuration options for in-memory session storage */
export interface MemorySessionStoreOptions {
  /** session inactivity timeout in milliseconds */
  sessionTimeout?: number;
  /** maximum number of sessions to maintain */
  maxSessions?: number;
  /** clock used for expiry (default: `Date.now`) */
  now?: () => number;
}

/** stored session with its last activity */
interface RecordedSession {
  session: Session;
  lastActivity: number;
}

/**
 * in-memory session storage implementation
 * stores session data in memory for fast access without persistence
 */
export class MemorySessionStore extends SessionStore {
  /** sessions in order of last activity, oldest first */
  readonly #sessions = new Map<string, RecordedSession>();
  readonly #maxSessions?: number;
  readonly #sessionTimeout?: number;
  readonly #now: () => number;

  /**
   * creates new memory session storage with optional configuration
   * @param options session storage configuration options
   */
  constructor(options?: MemorySessionStoreOptions) {
    super();

    this.#maxSessions = options?.maxSessions;
    this.#sessionTimeout = options?.sessionTimeout;
    this.#now = options?.now ?? Date.now;
  }

  /** number of sessions currently held */
  public get size(): number {
    return this.#sessions.size;
  }

  public async get(sessionId: string): Promise<Session | undefined> {
    const recorded = this.#sessions.get(sessionId);
    if (!recorded) {
      return undefined;
    }

    if (this.#isExpired(recorded, this.#now())) {
      this.#sessions.delete(sessionId);

      return undefined;
    }

    // re-insert to mark the session as the most recently active
    this.#sessions.delete(sessionId);
    this.#sessions.set(sessionId, { ...recorded, lastActivity: this.#now() });

    return structuredClone(recorded.session);
  }

  public async set(sessionId: string, session: Session): Promise<void> {
    this.#sessions.delete(sessionId);
    this.#sessions.set(sessionId, {
      session: structuredClone(session),
      lastActivity: this.#now(),
    });

    this.#cleanup();
  }

  public async drop(sessionId: string): Promise<void> {
    this.#sessions.delete(sessionId);
  }

  /**
   * tells whether a session outlived the inactivity timeout
   * @param recorded stored session
   * @param now current time
   * @returns true if the session must no longer be served
   */
  #isExpired(recorded: RecordedSession, now: number): boolean {
    return (
      this.#sessionTimeout !== undefined &&
      now - recorded.lastActivity > this.#sessionTimeout
    );
  }

  /**
   * removes expired sessions, then the oldest ones to keep count at or below
   * maxSessions
   */
  #cleanup(): void {
    const now = this.#now();

    // oldest first, so the sweep stops at the first live session
    for (const [sessionId, recorded] of this.#sessions) {
      if (!this.#isExpired(recorded, now)) {
        break;
      }

      this.#sessions.delete(sessionId);
    }

    if (this.#maxSessions === undefined) {
      return;
    }

    for (const sessionId of this.#sessions.keys()) {
      if (this.#sessions.size <= this.#maxSessions) {
        return;
      }

      this.#sessions.delete(sessionId);
    }
  }
}
