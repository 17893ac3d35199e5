export enum SessionStatus {
  Active = "Active",
  Resuming = "Resuming",
  Completed = "Completed",
  Failed = "Failed",
  Abandoned = "Abandoned",
}

export type TerminalStatus = SessionStatus.Completed | SessionStatus.Failed | SessionStatus.Abandoned;

/** Outcomes a client may report when it ends a session. */
export type TerminationOutcome = SessionStatus.Completed | SessionStatus.Failed;

/**
 * Durable view of a session. Timestamps are epoch milliseconds.
 */
export interface SessionRecord {
  id: string;
  owner: string;
  targetURL: string;
  resumeToken?: string;
  status: SessionStatus;
  createdAt: number;
  /** Never decreases; advanced by heartbeats and successful recovery. */
  lastActiveAt: number;
  /** Stamped by every successful status transition; not an activity signal. */
  statusChangedAt: number;
}

export enum SessionEventType {
  Created = "created",
  Heartbeat = "heartbeat",
  Resuming = "resuming",
  Resumed = "resumed",
  ResumeFailed = "resume-failed",
  Abandoned = "abandoned",
  Completed = "completed",
  Failed = "failed",
}

export interface SessionTransitionEvent {
  type: SessionEventType;
  sessionId: string;
  fromStatus: SessionStatus | null;
  toStatus: SessionStatus;
  timestamp: number;
}

export interface SessionSnapshot {
  id: string;
  owner: string;
  targetURL: string;
  status: SessionStatus;
  resumeToken?: string;
  createdAt: number;
  lastActiveAt: number;
}

export interface SessionStats {
  live: number;
  maxSessions: number;
  available: number;
}
