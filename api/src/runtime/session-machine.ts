import { SessionStore } from "../storage/session-store.interface.js";
import { SessionEventType, SessionStatus, TerminalStatus } from "../types/session.js";
import { ConcurrentClaimLostError, InvalidTransitionError } from "../utils/errors.js";

export type TransitionDriver = "SessionManager" | "HeartbeatMonitor" | "RecoveryCoordinator";

interface TransitionRule {
  from: SessionStatus;
  to: SessionStatus;
  driver: TransitionDriver;
  event: SessionEventType;
}

const TRANSITIONS: readonly TransitionRule[] = [
  {
    from: SessionStatus.Active,
    to: SessionStatus.Completed,
    driver: "SessionManager",
    event: SessionEventType.Completed,
  },
  {
    from: SessionStatus.Active,
    to: SessionStatus.Failed,
    driver: "SessionManager",
    event: SessionEventType.Failed,
  },
  {
    from: SessionStatus.Active,
    to: SessionStatus.Abandoned,
    driver: "HeartbeatMonitor",
    event: SessionEventType.Abandoned,
  },
  {
    from: SessionStatus.Active,
    to: SessionStatus.Resuming,
    driver: "RecoveryCoordinator",
    event: SessionEventType.Resuming,
  },
  {
    from: SessionStatus.Resuming,
    to: SessionStatus.Active,
    driver: "RecoveryCoordinator",
    event: SessionEventType.Resumed,
  },
  {
    from: SessionStatus.Resuming,
    to: SessionStatus.Failed,
    driver: "RecoveryCoordinator",
    event: SessionEventType.ResumeFailed,
  },
];

const TERMINAL_STATUSES: ReadonlySet<SessionStatus> = new Set([
  SessionStatus.Completed,
  SessionStatus.Failed,
  SessionStatus.Abandoned,
]);

export function isTerminal(status: SessionStatus): status is TerminalStatus {
  return TERMINAL_STATUSES.has(status);
}

export function findTransition(
  from: SessionStatus,
  to: SessionStatus,
  driver: TransitionDriver,
): TransitionRule | undefined {
  return TRANSITIONS.find((rule) => rule.from === from && rule.to === to && rule.driver === driver);
}

/**
 * Validates `from → to` against the transition table for `driver`, then applies
 * it with a single compare-and-set. Returns the event type describing the
 * transition. Throws `InvalidTransitionError` before touching the store when
 * the move is not in the table, and `ConcurrentClaimLostError` when the record
 * was no longer in `from`.
 */
export async function transition(
  store: SessionStore,
  sessionId: string,
  from: SessionStatus,
  to: SessionStatus,
  driver: TransitionDriver,
  at: number,
): Promise<SessionEventType> {
  const rule = findTransition(from, to, driver);
  if (!rule) {
    throw new InvalidTransitionError(from, to);
  }

  const applied = await store.updateStatus(sessionId, from, to, at);
  if (!applied) {
    throw new ConcurrentClaimLostError(sessionId, from);
  }
  return rule.event;
}
