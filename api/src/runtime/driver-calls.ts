import { FastifyBaseLogger } from "fastify";
import { BrowserDriverAdapter, DriverHandle } from "../drivers/types.js";
import { withDeadline } from "../utils/deadline.js";
import { DeadlineExceededError } from "../utils/errors.js";
import { TaskScheduler } from "./task-scheduler.js";

export const DEFAULT_RELEASE_DEADLINE_MS = 10000;

export interface AcquireHandleOptions {
  driver: BrowserDriverAdapter;
  scheduler: TaskScheduler;
  logger: FastifyBaseLogger;
  label: string;
  timeoutMs: number;
  /** Deadline for releasing a handle that arrives after `timeoutMs`. */
  releaseTimeoutMs?: number;
  acquire: () => Promise<DriverHandle>;
}

/**
 * Runs a spin or resume under a deadline. When the deadline wins, the driver
 * call keeps running; if it later produces a handle nobody is waiting for, that
 * handle is released in the background.
 */
export async function acquireHandle(options: AcquireHandleOptions): Promise<DriverHandle> {
  const { driver, scheduler, logger, label, timeoutMs } = options;
  const pending = options.acquire();

  try {
    return await scheduler.runCritical(() => pending, label, timeoutMs);
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      scheduler.waitUntil(async () => {
        let late: DriverHandle;
        try {
          late = await pending;
        } catch (lateError) {
          logger.debug({ err: lateError }, `[DriverCalls] Late driver call failed: ${label}`);
          return;
        }
        logger.warn(
          { sessionId: late.sessionId },
          `[DriverCalls] Releasing handle that arrived after the deadline: ${label}`,
        );
        await releaseQuietly(driver, late, logger, options.releaseTimeoutMs);
      }, `release-late:${label}`);
    }
    throw error;
  }
}

/**
 * Releases a handle under a deadline. Failures and overruns are logged; the
 * caller never waits longer than `timeoutMs` on a driver that hangs.
 */
export async function releaseQuietly(
  driver: BrowserDriverAdapter,
  handle: DriverHandle,
  logger: FastifyBaseLogger,
  timeoutMs: number = DEFAULT_RELEASE_DEADLINE_MS,
): Promise<void> {
  try {
    await withDeadline(driver.release(handle), timeoutMs, `release ${handle.sessionId}`);
  } catch (error) {
    if (error instanceof DeadlineExceededError) {
      logger.warn(
        { err: error, sessionId: handle.sessionId },
        "[DriverCalls] Driver release timed out, abandoning handle",
      );
      return;
    }
    logger.warn({ err: error, sessionId: handle.sessionId }, "[DriverCalls] Driver release failed");
  }
}
