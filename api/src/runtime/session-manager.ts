import { FastifyBaseLogger } from "fastify";
import { v4 as uuidv4 } from "uuid";
import { BrowserDriverAdapter, DriverHandle } from "../drivers/types.js";
import { SessionStore } from "../storage/session-store.interface.js";
import {
  SessionEventType,
  SessionRecord,
  SessionSnapshot,
  SessionStats,
  SessionStatus,
  TerminalStatus,
  TerminationOutcome,
} from "../types/session.js";
import {
  CapacityExceededError,
  ConcurrentClaimLostError,
  DriverSpinFailureError,
  InvalidTransitionError,
  SessionBusyError,
  SessionNotFoundError,
} from "../utils/errors.js";
import { RetryManager, RetryOptions } from "../utils/retry.js";
import { acquireHandle, DEFAULT_RELEASE_DEADLINE_MS, releaseQuietly } from "./driver-calls.js";
import { SessionEventBus } from "./session-events.js";
import { isTerminal, transition } from "./session-machine.js";
import { LiveSession, SessionRegistry, toSnapshot } from "./session-registry.js";
import { TaskScheduler } from "./task-scheduler.js";

export interface SessionManagerConfig {
  store: SessionStore;
  driver: BrowserDriverAdapter;
  registry: SessionRegistry;
  events: SessionEventBus;
  scheduler: TaskScheduler;
  logger: FastifyBaseLogger;
  maxSessions?: number;
  spinDeadlineMs?: number;
  releaseDeadlineMs?: number;
  /** Backoff for store writes that fail with a retryable error. */
  storeRetry?: Partial<RetryOptions>;
  clock?: () => number;
}

export type TerminateResult =
  | { type: "terminated"; status: TerminationOutcome }
  | { type: "already-terminated"; status: TerminalStatus };

/**
 * Client-facing entry point for session lifecycle operations. Every operation
 * that changes a session runs inside that session's critical section.
 */
export class SessionManager {
  private store: SessionStore;
  private driver: BrowserDriverAdapter;
  private registry: SessionRegistry;
  private events: SessionEventBus;
  private scheduler: TaskScheduler;
  private logger: FastifyBaseLogger;
  private retry: RetryManager;
  private clock: () => number;
  private readonly maxSessions: number;
  private readonly spinDeadlineMs: number;
  private readonly releaseDeadlineMs: number;
  private pendingStarts = 0;

  constructor(config: SessionManagerConfig) {
    this.store = config.store;
    this.driver = config.driver;
    this.registry = config.registry;
    this.events = config.events;
    this.scheduler = config.scheduler;
    this.logger = config.logger.child({ component: "SessionManager" });
    this.retry = new RetryManager(this.logger, config.storeRetry);
    this.clock = config.clock ?? Date.now;
    this.maxSessions = config.maxSessions ?? Number.POSITIVE_INFINITY;
    this.spinDeadlineMs = config.spinDeadlineMs ?? 60000;
    this.releaseDeadlineMs = config.releaseDeadlineMs ?? DEFAULT_RELEASE_DEADLINE_MS;
  }

  public async startSession(owner: string, targetURL: string): Promise<string> {
    if (this.registry.size() + this.pendingStarts >= this.maxSessions) {
      throw new CapacityExceededError(this.maxSessions);
    }

    this.pendingStarts++;
    try {
      const sessionId = uuidv4();

      let handle: DriverHandle;
      try {
        handle = await acquireHandle({
          driver: this.driver,
          scheduler: this.scheduler,
          logger: this.logger,
          label: `spin ${sessionId}`,
          timeoutMs: this.spinDeadlineMs,
          releaseTimeoutMs: this.releaseDeadlineMs,
          acquire: () => this.driver.spin(targetURL, { sessionId }),
        });
      } catch (error) {
        this.logger.error({ err: error, targetURL }, "[SessionManager] Driver spin failed");
        throw new DriverSpinFailureError(targetURL, error);
      }

      const now = this.clock();
      const record: SessionRecord = {
        id: sessionId,
        owner,
        targetURL,
        status: SessionStatus.Active,
        createdAt: now,
        lastActiveAt: now,
        statusChangedAt: now,
      };

      await this.registry.withLock(sessionId, async () => {
        try {
          await this.store.create(record);
        } catch (error) {
          this.logger.error(
            { err: error, sessionId },
            "[SessionManager] Failed to persist new session, releasing driver handle",
          );
          await releaseQuietly(this.driver, handle, this.logger, this.releaseDeadlineMs);
          throw error;
        }

        this.registry.add({
          id: sessionId,
          owner,
          targetURL,
          status: SessionStatus.Active,
          createdAt: now,
          lastActiveAt: now,
          handle,
        });
      });

      this.events.emitTransition(SessionEventType.Created, sessionId, null, SessionStatus.Active, now);
      return sessionId;
    } finally {
      this.pendingStarts--;
    }
  }

  /** Returns the session's `lastActiveAt` after the heartbeat. */
  public async heartbeat(sessionId: string): Promise<number> {
    return this.registry.withLock(sessionId, async () => {
      const session = this.requireLive(sessionId);
      session.lastActiveAt = Math.max(session.lastActiveAt, this.clock());
      const lastActiveAt = session.lastActiveAt;

      const { result: touched } = await this.retry.executeWithRetry(
        () => this.store.touch(sessionId, lastActiveAt),
        `touch ${sessionId}`,
      );
      if (!touched) {
        this.logger.warn({ sessionId }, "[SessionManager] Heartbeat for a session missing from the store");
      }

      this.events.emitTransition(
        SessionEventType.Heartbeat,
        sessionId,
        SessionStatus.Active,
        SessionStatus.Active,
        lastActiveAt,
      );
      return lastActiveAt;
    });
  }

  /**
   * Records the job's latest checkpoint. Persisting it is best effort: the
   * token only improves recovery, so a store failure is logged and dropped.
   */
  public async updateResumeToken(sessionId: string, token: string): Promise<void> {
    await this.registry.withLock(sessionId, async () => {
      const session = this.requireLive(sessionId);
      session.resumeToken = token;

      try {
        const persisted = await this.store.setResumeToken(sessionId, token);
        if (!persisted) {
          this.logger.warn({ sessionId }, "[SessionManager] Resume token for a session missing from the store");
        }
      } catch (error) {
        this.logger.warn({ err: error, sessionId }, "[SessionManager] Failed to persist resume token");
      }
    });
  }

  public async getStatus(sessionId: string): Promise<SessionStatus> {
    const live = this.registry.get(sessionId);
    if (live) {
      return live.status;
    }

    const record = await this.store.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return record.status;
  }

  public async getSession(sessionId: string): Promise<SessionSnapshot> {
    const live = this.registry.get(sessionId);
    if (live) {
      return toSnapshot(live);
    }

    const record = await this.store.get(sessionId);
    if (!record) {
      throw new SessionNotFoundError(sessionId);
    }
    return {
      id: record.id,
      owner: record.owner,
      targetURL: record.targetURL,
      status: record.status,
      resumeToken: record.resumeToken,
      createdAt: record.createdAt,
      lastActiveAt: record.lastActiveAt,
    };
  }

  public listSessions(owner?: string): SessionSnapshot[] {
    return this.registry
      .list()
      .filter((session) => owner === undefined || session.owner === owner)
      .map(toSnapshot);
  }

  public stats(): SessionStats {
    const live = this.registry.size();
    return {
      live,
      maxSessions: this.maxSessions,
      available: Math.max(0, this.maxSessions - live),
    };
  }

  public async terminate(sessionId: string, outcome: TerminationOutcome): Promise<TerminateResult> {
    if (outcome !== SessionStatus.Completed && outcome !== SessionStatus.Failed) {
      throw new InvalidTransitionError(SessionStatus.Active, outcome);
    }

    return this.registry.withLock(sessionId, async () => {
      const live = this.registry.get(sessionId);
      if (live) {
        return this.terminateLive(live, outcome);
      }

      const record = await this.store.get(sessionId);
      if (!record) {
        throw new SessionNotFoundError(sessionId);
      }
      if (isTerminal(record.status)) {
        return { type: "already-terminated", status: record.status };
      }
      if (record.status === SessionStatus.Resuming) {
        throw new SessionBusyError(sessionId, record.status);
      }

      // Active in the store but not owned here: nothing to release.
      return this.applyTermination(sessionId, outcome);
    });
  }

  /**
   * Releases every live handle without touching the store. The records stay
   * Active, so the next startup's recovery picks them up.
   */
  public async shutdown(): Promise<void> {
    const sessions = this.registry.list();
    await Promise.all(
      sessions.map((session) =>
        this.registry.withLock(session.id, async () => {
          if (this.registry.remove(session.id)) {
            await releaseQuietly(this.driver, session.handle, this.logger, this.releaseDeadlineMs);
          }
        }),
      ),
    );
    this.logger.info(`[SessionManager] Released ${sessions.length} live sessions on shutdown`);
  }

  private async terminateLive(
    live: LiveSession,
    outcome: TerminationOutcome,
  ): Promise<TerminateResult> {
    // Store first: if it is unreachable the session stays live and the caller can retry.
    let result: TerminateResult;
    try {
      result = await this.applyTermination(live.id, outcome);
    } catch (error) {
      if (!(error instanceof SessionBusyError)) {
        throw error;
      }
      // Another instance claimed the record; the handle here is no longer ours.
      this.registry.remove(live.id);
      await releaseQuietly(this.driver, live.handle, this.logger, this.releaseDeadlineMs);
      throw error;
    }

    this.registry.remove(live.id);
    await releaseQuietly(this.driver, live.handle, this.logger, this.releaseDeadlineMs);
    return result;
  }

  private async applyTermination(
    sessionId: string,
    outcome: TerminationOutcome,
  ): Promise<TerminateResult> {
    const at = this.clock();
    try {
      const { result: event } = await this.retry.executeWithRetry(
        () =>
          transition(this.store, sessionId, SessionStatus.Active, outcome, "SessionManager", at),
        `terminate ${sessionId}`,
      );
      this.events.emitTransition(event, sessionId, SessionStatus.Active, outcome, at);
      return { type: "terminated", status: outcome };
    } catch (error) {
      if (!(error instanceof ConcurrentClaimLostError)) {
        throw error;
      }
    }

    // Lost the compare-and-set; report whatever the record became.
    const current = await this.store.get(sessionId);
    if (!current) {
      throw new SessionNotFoundError(sessionId);
    }
    if (isTerminal(current.status)) {
      return { type: "already-terminated", status: current.status };
    }
    throw new SessionBusyError(sessionId, current.status);
  }

  private requireLive(sessionId: string): LiveSession {
    const session = this.registry.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }
}
