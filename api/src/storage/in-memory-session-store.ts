import { SessionRecord, SessionStatus } from "../types/session.js";
import { DuplicateSessionError } from "../utils/errors.js";
import { SessionStore } from "./session-store.interface.js";

/**
 * Process-local session store for development and tests.
 * Each method reads and writes within one synchronous step, so compare-and-set
 * is atomic with respect to every other caller sharing the instance.
 */
export class InMemorySessionStore implements SessionStore {
  private records = new Map<string, SessionRecord>();

  async initialize(): Promise<void> {
    // No initialization needed
  }

  async create(record: SessionRecord): Promise<void> {
    if (this.records.has(record.id)) {
      throw new DuplicateSessionError(record.id);
    }
    this.records.set(record.id, { ...record });
  }

  async updateStatus(
    id: string,
    from: SessionStatus,
    to: SessionStatus,
    at: number,
  ): Promise<boolean> {
    const record = this.records.get(id);
    if (!record || record.status !== from) {
      return false;
    }
    this.records.set(id, { ...record, status: to, statusChangedAt: at });
    return true;
  }

  async touch(id: string, timestamp: number): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    this.records.set(id, { ...record, lastActiveAt: Math.max(record.lastActiveAt, timestamp) });
    return true;
  }

  async setResumeToken(id: string, token: string): Promise<boolean> {
    const record = this.records.get(id);
    if (!record) {
      return false;
    }
    this.records.set(id, { ...record, resumeToken: token });
    return true;
  }

  async queryByStatus(status: SessionStatus): Promise<SessionRecord[]> {
    return Array.from(this.records.values())
      .filter((record) => record.status === status)
      .map((record) => ({ ...record }));
  }

  async get(id: string): Promise<SessionRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async close(): Promise<void> {
    // Records outlive the components using them; a new manager can pick them up.
  }

  size(): number {
    return this.records.size;
  }
}
