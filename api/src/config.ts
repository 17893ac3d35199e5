import { FastifyServerOptions } from "fastify";
import type { Env } from "./env.js";

type LoggerOption = FastifyServerOptions["logger"];

export const loggingConfig: Record<Env["NODE_ENV"], LoggerOption> = {
  development: {
    transport: {
      target: "pino-pretty",
      options: {
        translateTime: "HH:MM:ss Z",
        ignore: "pid,hostname",
      },
    },
  },
  staging: true,
  preview: true,
  production: true,
  test: false,
};

export function serverLoggerOptions(env: Pick<Env, "NODE_ENV" | "LOG_LEVEL">): LoggerOption {
  const base = loggingConfig[env.NODE_ENV];
  if (base === false || base === undefined) {
    return false;
  }
  return base === true ? { level: env.LOG_LEVEL } : { ...base, level: env.LOG_LEVEL };
}

export type StoreConfig =
  | { kind: "memory" }
  | { kind: "redis"; url: string; keyPrefix: string; operationTimeoutMs: number };

export type DriverConfig =
  | { kind: "simulated" }
  | { kind: "puppeteer"; profilesDir: string; executablePath?: string; headless: boolean };

export interface EngineConfig {
  store: StoreConfig;
  driver: DriverConfig;
  maxSessions: number;
  heartbeatTimeoutMs: number;
  heartbeatSweepIntervalMs: number;
  maxSessionAgeMs?: number;
  spinDeadlineMs: number;
  resumeDeadlineMs: number;
  releaseDeadlineMs: number;
  recoveryConcurrency: number;
  recoveryIntervalMs?: number;
  recoveryMaxAgeMs?: number;
  resumingStaleAfterMs?: number;
}

export function redisUrlFromEnv(
  env: Pick<Env, "REDIS_URL" | "REDIS_HOST" | "REDIS_PORT" | "REDIS_PASSWORD" | "REDIS_DB">,
): string {
  if (env.REDIS_URL) {
    return env.REDIS_URL;
  }
  const auth = env.REDIS_PASSWORD ? `:${encodeURIComponent(env.REDIS_PASSWORD)}@` : "";
  return `redis://${auth}${env.REDIS_HOST}:${env.REDIS_PORT}/${env.REDIS_DB}`;
}

export function engineConfigFromEnv(env: Env): EngineConfig {
  const store: StoreConfig =
    env.SESSION_STORE === "redis"
      ? {
          kind: "redis",
          url: redisUrlFromEnv(env),
          keyPrefix: env.REDIS_KEY_PREFIX,
          operationTimeoutMs: env.STORE_DEADLINE_MS,
        }
      : { kind: "memory" };

  const driver: DriverConfig =
    env.SESSION_DRIVER === "simulated"
      ? { kind: "simulated" }
      : {
          kind: "puppeteer",
          profilesDir: env.SESSION_PROFILES_DIR,
          executablePath: env.CHROME_EXECUTABLE_PATH,
          headless: env.CHROME_HEADLESS,
        };

  return {
    store,
    driver,
    maxSessions: env.MAX_SESSIONS,
    heartbeatTimeoutMs: env.HEARTBEAT_TIMEOUT_MS,
    heartbeatSweepIntervalMs: env.HEARTBEAT_SWEEP_INTERVAL_MS,
    maxSessionAgeMs: env.MAX_SESSION_AGE_MS,
    spinDeadlineMs: env.SPIN_DEADLINE_MS,
    resumeDeadlineMs: env.RESUME_DEADLINE_MS,
    releaseDeadlineMs: env.RELEASE_DEADLINE_MS,
    recoveryConcurrency: env.RECOVERY_CONCURRENCY,
    recoveryIntervalMs: env.RECOVERY_INTERVAL_MS,
    recoveryMaxAgeMs: env.RECOVERY_MAX_AGE_MS,
    resumingStaleAfterMs: env.RESUMING_STALE_AFTER_MS,
  };
}
