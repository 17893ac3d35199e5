import { z } from "zod";
import { config } from "dotenv";

config();

const booleanFlag = (fallback: "true" | "false") =>
  z
    .string()
    .optional()
    .default(fallback)
    .transform((val) => val === "true" || val === "1");

const optionalInt = z.coerce.number().int().positive().optional();

export const envSchema = z.object({
  NODE_ENV: z
    .enum(["test", "development", "staging", "production", "preview"])
    .default("development"),
  HOST: z.string().optional().default("0.0.0.0"),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),

  SESSION_STORE: z.enum(["memory", "redis"]).default("memory"),
  REDIS_URL: z.string().optional(),
  REDIS_HOST: z.string().optional().default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: z.coerce.number().int().nonnegative().default(0),
  REDIS_KEY_PREFIX: z.string().optional().default("sessions"),

  SESSION_DRIVER: z.enum(["puppeteer", "simulated"]).default("puppeteer"),
  CHROME_EXECUTABLE_PATH: z.string().optional(),
  CHROME_HEADLESS: booleanFlag("true"),
  SESSION_PROFILES_DIR: z.string().optional().default("./.session-profiles"),

  MAX_SESSIONS: z.coerce.number().int().positive().default(10),
  HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
  HEARTBEAT_SWEEP_INTERVAL_MS: z.coerce.number().int().positive().default(30000),
  MAX_SESSION_AGE_MS: optionalInt,
  SPIN_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
  RESUME_DEADLINE_MS: z.coerce.number().int().positive().default(60000),
  RELEASE_DEADLINE_MS: z.coerce.number().int().positive().default(10000),
  STORE_DEADLINE_MS: z.coerce.number().int().positive().default(2000),
  RECOVERY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  RECOVERY_INTERVAL_MS: optionalInt,
  RECOVERY_MAX_AGE_MS: z.coerce.number().int().positive().default(24 * 60 * 60 * 1000),
  RESUMING_STALE_AFTER_MS: optionalInt,
});

export type Env = z.infer<typeof envSchema>;

export const env = envSchema.parse(process.env);
