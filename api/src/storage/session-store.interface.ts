import { SessionRecord, SessionStatus } from "../types/session.js";

/**
 * Durable storage for session records, keyed by session id.
 *
 * Every method touches a single record and either applies fully or not at all.
 * Unreachable backends reject with `StoreUnavailableError`.
 */
export interface SessionStore {
  initialize(): Promise<void>;

  /** Rejects with `DuplicateSessionError` when the id already exists. */
  create(record: SessionRecord): Promise<void>;

  /**
   * Compare-and-set on `status`. Applies `to` (and stamps `statusChangedAt`)
   * only when the current status equals `from`; otherwise returns false and
   * leaves the record untouched. Also false when the record does not exist.
   */
  updateStatus(id: string, from: SessionStatus, to: SessionStatus, at: number): Promise<boolean>;

  /** Advances `lastActiveAt` to `max(current, timestamp)`. False when the record is missing. */
  touch(id: string, timestamp: number): Promise<boolean>;

  /** False when the record is missing. */
  setResumeToken(id: string, token: string): Promise<boolean>;

  queryByStatus(status: SessionStatus): Promise<SessionRecord[]>;

  get(id: string): Promise<SessionRecord | null>;

  close(): Promise<void>;
}
