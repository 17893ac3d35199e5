import { Mutex } from "async-mutex";
import { DriverHandle } from "../drivers/types.js";
import { SessionSnapshot, SessionStatus } from "../types/session.js";

export interface LiveSession {
  id: string;
  owner: string;
  targetURL: string;
  resumeToken?: string;
  status: SessionStatus.Active;
  createdAt: number;
  lastActiveAt: number;
  handle: DriverHandle;
}

interface LockEntry {
  mutex: Mutex;
  users: number;
}

/**
 * The in-memory registry of sessions this process owns, plus the per-session
 * critical sections every component acquires before acting on an id.
 *
 * Only `Active` sessions with a live handle are registered.
 */
export class SessionRegistry {
  private sessions = new Map<string, LiveSession>();
  private locks = new Map<string, LockEntry>();

  /**
   * Runs `fn` exclusively with respect to every other `withLock` call for the
   * same id. Calls for different ids never wait on each other. Lock entries
   * are dropped once no caller holds or waits for them.
   */
  async withLock<T>(sessionId: string, fn: () => Promise<T>): Promise<T> {
    let entry = this.locks.get(sessionId);
    if (!entry) {
      entry = { mutex: new Mutex(), users: 0 };
      this.locks.set(sessionId, entry);
    }
    entry.users++;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        this.locks.delete(sessionId);
      }
    }
  }

  add(session: LiveSession): void {
    if (this.sessions.has(session.id)) {
      throw new Error(`Session ${session.id} is already registered`);
    }
    this.sessions.set(session.id, session);
  }

  get(sessionId: string): LiveSession | undefined {
    return this.sessions.get(sessionId);
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  remove(sessionId: string): LiveSession | undefined {
    const session = this.sessions.get(sessionId);
    this.sessions.delete(sessionId);
    return session;
  }

  list(): LiveSession[] {
    return Array.from(this.sessions.values());
  }

  size(): number {
    return this.sessions.size;
  }

  lockCount(): number {
    return this.locks.size;
  }
}

export function toSnapshot(session: LiveSession): SessionSnapshot {
  return {
    id: session.id,
    owner: session.owner,
    targetURL: session.targetURL,
    status: session.status,
    resumeToken: session.resumeToken,
    createdAt: session.createdAt,
    lastActiveAt: session.lastActiveAt,
  };
}
