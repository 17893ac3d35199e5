import pino from "pino";
import type { FastifyBaseLogger } from "fastify";
import { SimulatedDriverAdapter } from "../../drivers/simulated-driver.js";
import { BrowserDriverAdapter } from "../../drivers/types.js";
import { InMemorySessionStore } from "../../storage/in-memory-session-store.js";
import { SessionStore } from "../../storage/session-store.interface.js";
import { SessionRecord, SessionStatus, SessionTransitionEvent } from "../../types/session.js";
import { StoreUnavailableError } from "../../utils/errors.js";
import { HeartbeatMonitor } from "../heartbeat-monitor.js";
import { SessionHooks } from "../hooks.js";
import { RecoveryCoordinator, RecoveryCoordinatorConfig } from "../recovery-coordinator.js";
import { SessionEventBus } from "../session-events.js";
import { SessionManager } from "../session-manager.js";
import { SessionRegistry } from "../session-registry.js";
import { TaskScheduler } from "../task-scheduler.js";

export const silentLogger = (): FastifyBaseLogger => pino({ level: "silent" });

export class ManualClock {
  constructor(public current: number = 1_000_000) {}

  now = (): number => this.current;

  advance(ms: number): number {
    this.current += ms;
    return this.current;
  }
}

type StoreOperation = keyof Omit<SessionStore, "initialize" | "close">;

/**
 * Wraps a store and fails chosen operations with `StoreUnavailableError`,
 * the way an unreachable Redis would surface.
 */
export class FlakyStore implements SessionStore {
  private failures = new Map<StoreOperation, number>();
  public calls: StoreOperation[] = [];

  constructor(public readonly inner: SessionStore = new InMemorySessionStore()) {}

  /** Fail the next `count` calls of `operation`. Infinity fails until `heal`. */
  failNext(operation: StoreOperation, count: number = 1): void {
    this.failures.set(operation, count);
  }

  heal(): void {
    this.failures.clear();
  }

  private check(operation: StoreOperation): void {
    this.calls.push(operation);
    const remaining = this.failures.get(operation) ?? 0;
    if (remaining > 0) {
      this.failures.set(operation, remaining - 1);
      throw new StoreUnavailableError(operation, new Error("connection refused"));
    }
  }

  async initialize(): Promise<void> {
    await this.inner.initialize();
  }

  async create(record: SessionRecord): Promise<void> {
    this.check("create");
    await this.inner.create(record);
  }

  async updateStatus(id: string, from: SessionStatus, to: SessionStatus, at: number): Promise<boolean> {
    this.check("updateStatus");
    return this.inner.updateStatus(id, from, to, at);
  }

  async touch(id: string, timestamp: number): Promise<boolean> {
    this.check("touch");
    return this.inner.touch(id, timestamp);
  }

  async setResumeToken(id: string, token: string): Promise<boolean> {
    this.check("setResumeToken");
    return this.inner.setResumeToken(id, token);
  }

  async queryByStatus(status: SessionStatus): Promise<SessionRecord[]> {
    this.check("queryByStatus");
    return this.inner.queryByStatus(status);
  }

  async get(id: string): Promise<SessionRecord | null> {
    this.check("get");
    return this.inner.get(id);
  }

  async close(): Promise<void> {
    await this.inner.close();
  }
}

export function makeRecord(overrides: Partial<SessionRecord> & { id: string }): SessionRecord {
  return {
    owner: "owner-1",
    targetURL: "https://example.com/job",
    status: SessionStatus.Active,
    createdAt: 1_000_000,
    lastActiveAt: 1_000_000,
    statusChangedAt: 1_000_000,
    ...overrides,
  };
}

/** Fast backoff so retry paths finish within a test. */
export const fastRetry = { baseDelayMs: 1, maxDelayMs: 2, jitterMs: 0 };

export interface EngineFixtureOptions {
  store?: SessionStore;
  driver?: BrowserDriverAdapter;
  clock?: ManualClock;
  hooks?: SessionHooks;
  maxSessions?: number;
  spinDeadlineMs?: number;
  releaseDeadlineMs?: number;
  heartbeatTimeoutMs?: number;
  sweepIntervalMs?: number;
  maxSessionAgeMs?: number;
  recovery?: Partial<
    Pick<
      RecoveryCoordinatorConfig,
      | "resumeDeadlineMs"
      | "concurrency"
      | "maxAgeMs"
      | "resumingStaleAfterMs"
      | "orphanAfterMs"
      | "intervalMs"
    >
  >;
}

/**
 * One process's worth of engine components sharing a registry, bus and
 * scheduler. Two fixtures over the same store model two instances.
 */
export function createEngine(options: EngineFixtureOptions = {}) {
  const logger = silentLogger();
  const clock = options.clock ?? new ManualClock();
  const store = options.store ?? new InMemorySessionStore();
  const driver = options.driver ?? new SimulatedDriverAdapter();
  const registry = new SessionRegistry();
  const events = new SessionEventBus(logger);
  const scheduler = new TaskScheduler(logger);
  const shared = { store, driver, registry, events, scheduler, logger, clock: clock.now };

  const transitions: SessionTransitionEvent[] = [];
  events.onTransition((event) => transitions.push(event));

  const manager = new SessionManager({
    ...shared,
    maxSessions: options.maxSessions,
    spinDeadlineMs: options.spinDeadlineMs,
    releaseDeadlineMs: options.releaseDeadlineMs,
    storeRetry: fastRetry,
  });

  const monitor = new HeartbeatMonitor({
    ...shared,
    timeoutMs: options.heartbeatTimeoutMs ?? 60_000,
    sweepIntervalMs: options.sweepIntervalMs ?? 10_000,
    maxSessionAgeMs: options.maxSessionAgeMs,
    releaseDeadlineMs: options.releaseDeadlineMs,
    hooks: options.hooks,
  });

  const recovery = new RecoveryCoordinator({
    ...shared,
    ...options.recovery,
    releaseDeadlineMs: options.releaseDeadlineMs,
    hooks: options.hooks,
    storeRetry: fastRetry,
  });

  return { logger, clock, store, driver, registry, events, scheduler, manager, monitor, recovery, transitions };
}
