import { Semaphore } from "async-mutex";
import { FastifyBaseLogger } from "fastify";
import { BrowserDriverAdapter, DriverHandle } from "../drivers/types.js";
import { SessionStore } from "../storage/session-store.interface.js";
import { SessionRecord, SessionStatus } from "../types/session.js";
import { ConcurrentClaimLostError, ResumeFailureError } from "../utils/errors.js";
import { RetryManager, RetryOptions } from "../utils/retry.js";
import { acquireHandle, DEFAULT_RELEASE_DEADLINE_MS, releaseQuietly } from "./driver-calls.js";
import { invokeHook, SessionHooks } from "./hooks.js";
import { SessionEventBus } from "./session-events.js";
import { transition } from "./session-machine.js";
import { LiveSession, SessionRegistry, toSnapshot } from "./session-registry.js";
import { TaskScheduler } from "./task-scheduler.js";

export interface RecoveryCoordinatorConfig {
  store: SessionStore;
  driver: BrowserDriverAdapter;
  registry: SessionRegistry;
  events: SessionEventBus;
  scheduler: TaskScheduler;
  logger: FastifyBaseLogger;
  resumeDeadlineMs?: number;
  releaseDeadlineMs?: number;
  concurrency?: number;
  /** Records created longer ago than this are failed without a resume attempt. */
  maxAgeMs?: number;
  /** Periodic runs only consider records idle for longer than this. */
  orphanAfterMs?: number;
  intervalMs?: number;
  /** `Resuming` records untouched for longer than this are failed. Unset disables repair. */
  resumingStaleAfterMs?: number;
  /** Soft limit; exceeding it while recovering is logged, never enforced. */
  maxSessions?: number;
  hooks?: SessionHooks;
  storeRetry?: Partial<RetryOptions>;
  clock?: () => number;
}

export interface RecoveryRunOptions {
  /** Skip `Active` records whose `lastActiveAt` is more recent than this many ms. */
  minIdleMs?: number;
}

export interface RecoveryReport {
  scanned: number;
  claimed: number;
  resumed: number;
  failed: number;
  claimsLost: number;
  repaired: number;
}

type RecoveryOutcome = "resumed" | "failed" | "claim-lost" | "discarded" | "skipped";

/** Attempts for resolving a claim to `Failed` once the inline retries are spent. */
const BACKGROUND_FAIL_ATTEMPTS = 10;

function emptyReport(): RecoveryReport {
  return { scanned: 0, claimed: 0, resumed: 0, failed: 0, claimsLost: 0, repaired: 0 };
}

/**
 * Reconciles the durable store with this process after a restart: every
 * `Active` record not live here is claimed through `Resuming` and either
 * resumed from its checkpoint or resolved to `Failed`.
 */
export class RecoveryCoordinator {
  private store: SessionStore;
  private driver: BrowserDriverAdapter;
  private registry: SessionRegistry;
  private events: SessionEventBus;
  private scheduler: TaskScheduler;
  private logger: FastifyBaseLogger;
  private hooks?: SessionHooks;
  private retry: RetryManager;
  private clock: () => number;
  private semaphore: Semaphore;
  private readonly resumeDeadlineMs: number;
  private readonly releaseDeadlineMs: number;
  private readonly maxAgeMs?: number;
  private readonly orphanAfterMs?: number;
  private readonly intervalMs?: number;
  private readonly resumingStaleAfterMs?: number;
  private readonly maxSessions: number;
  private inFlight = new Set<string>();
  private currentRun: Promise<RecoveryReport> | null = null;
  private timer: NodeJS.Timeout | null = null;

  constructor(config: RecoveryCoordinatorConfig) {
    this.store = config.store;
    this.driver = config.driver;
    this.registry = config.registry;
    this.events = config.events;
    this.scheduler = config.scheduler;
    this.logger = config.logger.child({ component: "RecoveryCoordinator" });
    this.hooks = config.hooks;
    this.retry = new RetryManager(this.logger, config.storeRetry);
    this.clock = config.clock ?? Date.now;
    this.semaphore = new Semaphore(Math.max(1, config.concurrency ?? 4));
    this.resumeDeadlineMs = config.resumeDeadlineMs ?? 60000;
    this.releaseDeadlineMs = config.releaseDeadlineMs ?? DEFAULT_RELEASE_DEADLINE_MS;
    this.maxAgeMs = config.maxAgeMs;
    this.orphanAfterMs = config.orphanAfterMs;
    this.intervalMs = config.intervalMs;
    this.resumingStaleAfterMs = config.resumingStaleAfterMs;
    this.maxSessions = config.maxSessions ?? Number.POSITIVE_INFINITY;
  }

  /**
   * Runs one reconciliation pass. A call made while a pass is in progress
   * joins that pass instead of starting another.
   */
  run(options: RecoveryRunOptions = {}): Promise<RecoveryReport> {
    if (this.currentRun) {
      return this.currentRun;
    }

    const pass = this.reconcile(options).finally(() => {
      this.currentRun = null;
    });
    this.currentRun = pass;
    return pass;
  }

  start(): void {
    if (this.timer || this.intervalMs === undefined) return;

    this.timer = setInterval(() => {
      if (this.currentRun) return;
      this.scheduler.waitUntil(async () => {
        await this.run({ minIdleMs: this.orphanAfterMs });
      }, "periodic-recovery");
    }, this.intervalMs);
    this.timer.unref();

    this.logger.info(`[RecoveryCoordinator] Periodic recovery every ${this.intervalMs}ms`);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  private async reconcile(options: RecoveryRunOptions): Promise<RecoveryReport> {
    const report = emptyReport();
    const now = this.clock();

    const candidates = (await this.store.queryByStatus(SessionStatus.Active)).filter(
      (record) =>
        !this.registry.has(record.id) &&
        !this.inFlight.has(record.id) &&
        (options.minIdleMs === undefined || now - record.lastActiveAt > options.minIdleMs),
    );
    report.scanned = candidates.length;

    if (candidates.length > 0) {
      this.logger.info(`[RecoveryCoordinator] Found ${candidates.length} orphaned sessions`);
    }

    const outcomes = await Promise.all(candidates.map((record) => this.recoverOne(record)));
    for (const outcome of outcomes) {
      switch (outcome) {
        case "resumed":
          report.claimed++;
          report.resumed++;
          break;
        case "failed":
          report.claimed++;
          report.failed++;
          break;
        case "discarded":
          report.claimed++;
          break;
        case "claim-lost":
          report.claimsLost++;
          break;
        case "skipped":
          break;
      }
    }

    if (this.resumingStaleAfterMs !== undefined) {
      report.repaired = await this.repairStaleResuming(this.resumingStaleAfterMs);
    }

    if (this.registry.size() > this.maxSessions) {
      this.logger.warn(
        `[RecoveryCoordinator] ${this.registry.size()} live sessions after recovery exceed the limit of ${this.maxSessions}`,
      );
    }

    this.logger.info(report, "[RecoveryCoordinator] Recovery run finished");
    return report;
  }

  private async recoverOne(record: SessionRecord): Promise<RecoveryOutcome> {
    this.inFlight.add(record.id);
    try {
      return await this.semaphore.runExclusive(() =>
        this.registry.withLock(record.id, () => this.claimAndResume(record)),
      );
    } finally {
      this.inFlight.delete(record.id);
    }
  }

  private async claimAndResume(record: SessionRecord): Promise<RecoveryOutcome> {
    const sessionId = record.id;
    if (this.registry.has(sessionId)) {
      return "skipped";
    }

    const claimedAt = this.clock();
    try {
      const event = await transition(
        this.store,
        sessionId,
        SessionStatus.Active,
        SessionStatus.Resuming,
        "RecoveryCoordinator",
        claimedAt,
      );
      this.events.emitTransition(event, sessionId, SessionStatus.Active, SessionStatus.Resuming, claimedAt);
    } catch (error) {
      if (error instanceof ConcurrentClaimLostError) {
        this.logger.debug({ sessionId }, "[RecoveryCoordinator] Claim lost");
        return "claim-lost";
      }
      this.logger.warn({ err: error, sessionId }, "[RecoveryCoordinator] Claim failed");
      return "skipped";
    }

    if (this.maxAgeMs !== undefined && claimedAt - record.createdAt > this.maxAgeMs) {
      return this.fail(record, new ResumeFailureError(sessionId, "session exceeded the recovery age limit"));
    }

    const resumeToken = record.resumeToken;
    if (!resumeToken) {
      return this.fail(record, new ResumeFailureError(sessionId, "no resume token"));
    }

    let handle: DriverHandle;
    try {
      handle = await acquireHandle({
        driver: this.driver,
        scheduler: this.scheduler,
        logger: this.logger,
        label: `resume ${sessionId}`,
        timeoutMs: this.resumeDeadlineMs,
        releaseTimeoutMs: this.releaseDeadlineMs,
        acquire: () =>
          this.driver.resume(resumeToken, { sessionId, targetURL: record.targetURL }),
      });
    } catch (error) {
      return this.fail(record, new ResumeFailureError(sessionId, "driver resume failed", error));
    }

    const resumedAt = this.clock();
    try {
      const { result: event } = await this.retry.executeWithRetry(
        () =>
          transition(
            this.store,
            sessionId,
            SessionStatus.Resuming,
            SessionStatus.Active,
            "RecoveryCoordinator",
            resumedAt,
          ),
        `resume ${sessionId}`,
      );
      this.events.emitTransition(event, sessionId, SessionStatus.Resuming, SessionStatus.Active, resumedAt);
    } catch (error) {
      await releaseQuietly(this.driver, handle, this.logger, this.releaseDeadlineMs);
      if (error instanceof ConcurrentClaimLostError) {
        // The record moved on while the driver was resuming; the new handle is not ours.
        this.logger.warn({ sessionId }, "[RecoveryCoordinator] Discarded resumed handle");
        return "discarded";
      }
      return this.fail(
        record,
        new ResumeFailureError(sessionId, "could not record the resumed session", error),
      );
    }

    const live: LiveSession = {
      id: sessionId,
      owner: record.owner,
      targetURL: record.targetURL,
      resumeToken,
      status: SessionStatus.Active,
      createdAt: record.createdAt,
      lastActiveAt: Math.max(record.lastActiveAt, resumedAt),
      handle,
    };
    this.registry.add(live);

    try {
      await this.store.touch(sessionId, live.lastActiveAt);
    } catch (error) {
      this.logger.warn({ err: error, sessionId }, "[RecoveryCoordinator] Failed to touch resumed session");
    }

    this.logger.info({ sessionId }, "[RecoveryCoordinator] Session resumed");
    const snapshot = toSnapshot(live);
    this.scheduler.waitUntil(async () => {
      await invokeHook(this.hooks, this.logger, "onResumed", snapshot);
    }, `notify-resumed:${sessionId}`);
    return "resumed";
  }

  /**
   * Resolves a claimed record to `Failed`. When the store stays unreachable
   * past the inline retries, the write continues in the background with a
   * longer budget and the claim is reported as discarded.
   */
  private async fail(record: SessionRecord, reason: ResumeFailureError): Promise<RecoveryOutcome> {
    const sessionId = record.id;
    const at = this.clock();

    try {
      await this.markFailed(record, reason, at);
      return "failed";
    } catch (error) {
      if (error instanceof ConcurrentClaimLostError) {
        this.logger.info({ sessionId }, "[RecoveryCoordinator] Claimed session was resolved elsewhere");
        return "discarded";
      }
      this.logger.warn(
        { err: error, sessionId },
        "[RecoveryCoordinator] Could not resolve claimed session, retrying in the background",
      );
    }

    this.scheduler.waitUntil(async () => {
      try {
        await this.registry.withLock(sessionId, () =>
          this.markFailed(record, reason, at, { maxAttempts: BACKGROUND_FAIL_ATTEMPTS }),
        );
      } catch (error) {
        if (error instanceof ConcurrentClaimLostError) {
          this.logger.info({ sessionId }, "[RecoveryCoordinator] Claimed session was resolved elsewhere");
          return;
        }
        this.logger.error(
          { err: error, sessionId },
          "[RecoveryCoordinator] Claimed session left in Resuming after background retries",
        );
      }
    }, `resolve-claim:${sessionId}`);
    return "discarded";
  }

  private async markFailed(
    record: SessionRecord,
    reason: ResumeFailureError,
    at: number,
    retryOptions: Partial<RetryOptions> = {},
  ): Promise<void> {
    const sessionId = record.id;
    const { result: event } = await this.retry.executeWithRetry(
      () =>
        transition(
          this.store,
          sessionId,
          SessionStatus.Resuming,
          SessionStatus.Failed,
          "RecoveryCoordinator",
          at,
        ),
      `fail ${sessionId}`,
      retryOptions,
    );
    this.events.emitTransition(event, sessionId, SessionStatus.Resuming, SessionStatus.Failed, at);

    this.logger.warn({ err: reason, sessionId }, "[RecoveryCoordinator] Session could not be resumed");
    this.scheduler.waitUntil(async () => {
      await invokeHook(
        this.hooks,
        this.logger,
        "onResumeFailed",
        { ...record, status: SessionStatus.Failed, statusChangedAt: at },
        reason,
      );
    }, `notify-resume-failed:${sessionId}`);
  }

  private async repairStaleResuming(staleAfterMs: number): Promise<number> {
    const now = this.clock();
    const stale = (await this.store.queryByStatus(SessionStatus.Resuming)).filter(
      (record) => !this.inFlight.has(record.id) && now - record.statusChangedAt > staleAfterMs,
    );

    let repaired = 0;
    for (const record of stale) {
      const outcome = await this.registry.withLock(record.id, () =>
        this.fail(record, new ResumeFailureError(record.id, "resume attempt went stale")),
      );
      if (outcome === "failed") {
        repaired++;
      }
    }

    if (repaired > 0) {
      this.logger.info(`[RecoveryCoordinator] Repaired ${repaired} stale resuming sessions`);
    }
    return repaired;
  }
}
