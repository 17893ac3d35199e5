import { FastifyBaseLogger } from "fastify";
import { withDeadline } from "../utils/deadline.js";

export interface Task {
  id: string;
  label: string;
  promise: Promise<void>;
  startedAt: number;
}

/**
 * Runs deadline-bounded external calls and tracks background work (sweeps,
 * recovery runs) so shutdown can wait for it.
 */
export class TaskScheduler {
  private tasks: Map<string, Task>;
  private taskCounter: number;
  private logger: FastifyBaseLogger;

  constructor(logger: FastifyBaseLogger) {
    this.tasks = new Map();
    this.taskCounter = 0;
    this.logger = logger;
  }

  /** Rejects with `DeadlineExceededError` when `fn` does not settle within `timeoutMs`. */
  public async runCritical<T>(
    fn: () => Promise<T>,
    label: string,
    timeoutMs: number = 30000,
  ): Promise<T> {
    const taskId = `critical-${this.taskCounter++}`;
    this.logger.debug(`[TaskScheduler] Starting critical task: ${label} (${taskId})`);

    try {
      const result = await withDeadline(fn(), timeoutMs, label);
      this.logger.debug(`[TaskScheduler] Completed critical task: ${label} (${taskId})`);
      return result;
    } catch (error) {
      this.logger.warn(
        { err: error },
        `[TaskScheduler] Critical task failed: ${label} (${taskId})`,
      );
      throw error;
    }
  }

  public waitUntil(fn: () => Promise<void>, label?: string): void {
    const taskId = `background-${this.taskCounter++}`;
    const taskLabel = label || taskId;

    const promise = fn()
      .catch((error: unknown) => {
        this.logger.error(
          { err: error },
          `[TaskScheduler] Background task failed: ${taskLabel} (${taskId})`,
        );
      })
      .finally(() => {
        this.tasks.delete(taskId);
        this.logger.debug(`[TaskScheduler] Background task completed: ${taskLabel} (${taskId})`);
      });

    this.tasks.set(taskId, {
      id: taskId,
      label: taskLabel,
      promise,
      startedAt: Date.now(),
    });

    this.logger.debug(`[TaskScheduler] Scheduled background task: ${taskLabel} (${taskId})`);
  }

  public async drain(timeoutMs: number = 5000): Promise<void> {
    const pendingTasks = Array.from(this.tasks.values());
    if (pendingTasks.length === 0) {
      this.logger.debug("[TaskScheduler] No pending tasks to drain");
      return;
    }

    this.logger.info(
      `[TaskScheduler] Draining ${pendingTasks.length} pending tasks (timeout: ${timeoutMs}ms)`,
    );

    const allSettled = Promise.allSettled(pendingTasks.map((t) => t.promise)).then(() => undefined);

    try {
      await withDeadline(allSettled, timeoutMs, "drain");
      this.logger.info("[TaskScheduler] All pending tasks drained successfully");
    } catch {
      this.logger.warn(
        `[TaskScheduler] Drain timed out after ${timeoutMs}ms with ${this.tasks.size} tasks still pending`,
      );
    }
  }
}
