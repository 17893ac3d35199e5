import { FastifyBaseLogger } from "fastify";
import { BrowserDriverAdapter } from "../drivers/types.js";
import { SessionStore } from "../storage/session-store.interface.js";
import { SessionStatus } from "../types/session.js";
import { ConcurrentClaimLostError, ConfigurationError } from "../utils/errors.js";
import { DEFAULT_RELEASE_DEADLINE_MS, releaseQuietly } from "./driver-calls.js";
import { invokeHook, SessionHooks } from "./hooks.js";
import { SessionEventBus } from "./session-events.js";
import { transition } from "./session-machine.js";
import { LiveSession, SessionRegistry, toSnapshot } from "./session-registry.js";
import { TaskScheduler } from "./task-scheduler.js";

export interface HeartbeatMonitorConfig {
  store: SessionStore;
  driver: BrowserDriverAdapter;
  registry: SessionRegistry;
  events: SessionEventBus;
  scheduler: TaskScheduler;
  logger: FastifyBaseLogger;
  timeoutMs: number;
  sweepIntervalMs: number;
  maxSessionAgeMs?: number;
  releaseDeadlineMs?: number;
  hooks?: SessionHooks;
  clock?: () => number;
}

/**
 * Reclaims sessions in this process whose owner stopped heartbeating. Only the
 * in-memory registry is swept; records owned by other instances are left to
 * their own monitors or to recovery.
 */
export class HeartbeatMonitor {
  private store: SessionStore;
  private driver: BrowserDriverAdapter;
  private registry: SessionRegistry;
  private events: SessionEventBus;
  private scheduler: TaskScheduler;
  private logger: FastifyBaseLogger;
  private hooks?: SessionHooks;
  private clock: () => number;
  private readonly timeoutMs: number;
  private readonly sweepIntervalMs: number;
  private readonly maxSessionAgeMs?: number;
  private readonly releaseDeadlineMs: number;
  private timer: NodeJS.Timeout | null = null;
  private sweeping = false;

  constructor(config: HeartbeatMonitorConfig) {
    if (config.sweepIntervalMs <= 0) {
      throw new ConfigurationError("Heartbeat sweep interval must be positive", "sweepIntervalMs");
    }
    if (config.sweepIntervalMs >= config.timeoutMs) {
      throw new ConfigurationError(
        `Heartbeat sweep interval (${config.sweepIntervalMs}ms) must be shorter than the timeout (${config.timeoutMs}ms)`,
        "sweepIntervalMs",
      );
    }

    this.store = config.store;
    this.driver = config.driver;
    this.registry = config.registry;
    this.events = config.events;
    this.scheduler = config.scheduler;
    this.logger = config.logger.child({ component: "HeartbeatMonitor" });
    this.hooks = config.hooks;
    this.clock = config.clock ?? Date.now;
    this.timeoutMs = config.timeoutMs;
    this.sweepIntervalMs = config.sweepIntervalMs;
    this.maxSessionAgeMs = config.maxSessionAgeMs;
    this.releaseDeadlineMs = config.releaseDeadlineMs ?? DEFAULT_RELEASE_DEADLINE_MS;
  }

  start(): void {
    if (this.timer) return;

    this.timer = setInterval(() => {
      if (this.sweeping) return;
      this.scheduler.waitUntil(async () => {
        await this.sweep();
      }, "heartbeat-sweep");
    }, this.sweepIntervalMs);
    this.timer.unref();

    this.logger.info(
      `[HeartbeatMonitor] Started (timeout: ${this.timeoutMs}ms, interval: ${this.sweepIntervalMs}ms)`,
    );
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("[HeartbeatMonitor] Stopped");
  }

  /** Runs one sweep and returns the ids abandoned by it. */
  async sweep(now: number = this.clock()): Promise<string[]> {
    if (this.sweeping) return [];
    this.sweeping = true;

    try {
      const candidates = this.registry.list().filter((session) => this.isExpired(session, now));
      const abandoned: string[] = [];

      for (const candidate of candidates) {
        if (await this.abandon(candidate.id, now)) {
          abandoned.push(candidate.id);
        }
      }

      if (abandoned.length > 0) {
        this.logger.info(`[HeartbeatMonitor] Abandoned ${abandoned.length} sessions`);
      }
      return abandoned;
    } finally {
      this.sweeping = false;
    }
  }

  private isExpired(session: LiveSession, now: number): boolean {
    if (now - session.lastActiveAt > this.timeoutMs) {
      return true;
    }
    return this.maxSessionAgeMs !== undefined && now - session.createdAt > this.maxSessionAgeMs;
  }

  private async abandon(sessionId: string, now: number): Promise<boolean> {
    const abandoned = await this.registry.withLock(sessionId, async () => {
      // A heartbeat or terminate may have landed while waiting for the lock.
      const session = this.registry.get(sessionId);
      if (!session || !this.isExpired(session, now)) {
        return null;
      }

      try {
        const event = await transition(
          this.store,
          sessionId,
          SessionStatus.Active,
          SessionStatus.Abandoned,
          "HeartbeatMonitor",
          now,
        );
        this.events.emitTransition(event, sessionId, SessionStatus.Active, SessionStatus.Abandoned, now);
      } catch (error) {
        if (!(error instanceof ConcurrentClaimLostError)) {
          // Keep the session live; the next sweep retries.
          this.logger.warn({ err: error, sessionId }, "[HeartbeatMonitor] Failed to mark session abandoned");
          return null;
        }
        this.logger.info(
          { sessionId },
          "[HeartbeatMonitor] Record changed by another instance, dropping local handle",
        );
        this.registry.remove(sessionId);
        await releaseQuietly(this.driver, session.handle, this.logger, this.releaseDeadlineMs);
        return null;
      }

      this.registry.remove(sessionId);
      await releaseQuietly(this.driver, session.handle, this.logger, this.releaseDeadlineMs);
      return { ...toSnapshot(session), status: SessionStatus.Abandoned };
    });

    if (!abandoned) {
      return false;
    }
    // The hook runs off the sweep so a slow handler cannot hold up later sessions.
    this.scheduler.waitUntil(async () => {
      await invokeHook(this.hooks, this.logger, "onAbandoned", abandoned);
    }, `notify-abandoned:${sessionId}`);
    return true;
  }
}
