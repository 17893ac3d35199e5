import { FastifyBaseLogger, FastifyPluginAsync } from "fastify";
import fp from "fastify-plugin";
import { EngineConfig } from "../config.js";
import { PuppeteerDriverAdapter } from "../drivers/puppeteer-driver.js";
import { SimulatedDriverAdapter } from "../drivers/simulated-driver.js";
import { BrowserDriverAdapter } from "../drivers/types.js";
import { StateTransitionLogger } from "../logging/state-transition-logger.js";
import {
  HeartbeatMonitor,
  RecoveryCoordinator,
  SessionEventBus,
  SessionHooks,
  SessionManager,
  SessionRegistry,
  TaskScheduler,
} from "../runtime/index.js";
import { InMemorySessionStore } from "../storage/in-memory-session-store.js";
import { RedisSessionStore } from "../storage/redis-session-store.js";
import { SessionStore } from "../storage/session-store.interface.js";

export interface SessionEngineOptions {
  config: EngineConfig;
  /** Overrides the store described by `config.store`. */
  store?: SessionStore;
  /** Overrides the driver described by `config.driver`. */
  driver?: BrowserDriverAdapter;
  hooks?: SessionHooks;
  clock?: () => number;
  /** Run reconciliation before the server accepts requests. Defaults to true. */
  recoverOnStartup?: boolean;
}

function createStore(config: EngineConfig, logger: FastifyBaseLogger): SessionStore {
  if (config.store.kind === "redis") {
    return new RedisSessionStore({
      url: config.store.url,
      keyPrefix: config.store.keyPrefix,
      operationTimeoutMs: config.store.operationTimeoutMs,
      logger,
    });
  }
  return new InMemorySessionStore();
}

function createDriver(config: EngineConfig, logger: FastifyBaseLogger): BrowserDriverAdapter {
  if (config.driver.kind === "puppeteer") {
    return new PuppeteerDriverAdapter({
      logger,
      profilesDir: config.driver.profilesDir,
      executablePath: config.driver.executablePath,
      headless: config.driver.headless,
    });
  }
  return new SimulatedDriverAdapter();
}

const sessionEnginePlugin: FastifyPluginAsync<SessionEngineOptions> = async (fastify, opts) => {
  const { config } = opts;
  const logger = fastify.log;

  const store = opts.store ?? createStore(config, logger);
  const driver = opts.driver ?? createDriver(config, logger);
  const registry = new SessionRegistry();
  const events = new SessionEventBus(logger);
  const scheduler = new TaskScheduler(logger);

  const transitionLogger = new StateTransitionLogger({ baseLogger: logger });
  transitionLogger.attach(events);

  const shared = {
    store,
    driver,
    registry,
    events,
    scheduler,
    logger,
    clock: opts.clock,
    releaseDeadlineMs: config.releaseDeadlineMs,
  };

  const sessionManager = new SessionManager({
    ...shared,
    maxSessions: config.maxSessions,
    spinDeadlineMs: config.spinDeadlineMs,
  });

  const heartbeatMonitor = new HeartbeatMonitor({
    ...shared,
    timeoutMs: config.heartbeatTimeoutMs,
    sweepIntervalMs: config.heartbeatSweepIntervalMs,
    maxSessionAgeMs: config.maxSessionAgeMs,
    hooks: opts.hooks,
  });

  const recoveryCoordinator = new RecoveryCoordinator({
    ...shared,
    resumeDeadlineMs: config.resumeDeadlineMs,
    concurrency: config.recoveryConcurrency,
    maxAgeMs: config.recoveryMaxAgeMs,
    orphanAfterMs: config.heartbeatTimeoutMs,
    intervalMs: config.recoveryIntervalMs,
    resumingStaleAfterMs: config.resumingStaleAfterMs,
    maxSessions: config.maxSessions,
    hooks: opts.hooks,
  });

  await store.initialize();

  if (opts.recoverOnStartup ?? true) {
    const report = await recoveryCoordinator.run();
    logger.info(report, "[SessionEngine] Startup recovery complete");
  }

  heartbeatMonitor.start();
  recoveryCoordinator.start();

  fastify.addHook("onClose", async () => {
    heartbeatMonitor.stop();
    recoveryCoordinator.stop();
    await scheduler.drain();
    await sessionManager.shutdown();
    transitionLogger.detach();
    await store.close();
  });

  fastify.decorate("sessionManager", sessionManager);
  fastify.decorate("heartbeatMonitor", heartbeatMonitor);
  fastify.decorate("recoveryCoordinator", recoveryCoordinator);
  fastify.decorate("sessionEvents", events);
};

export default fp<SessionEngineOptions>(sessionEnginePlugin, {
  name: "session-engine",
  fastify: "5.x",
});
