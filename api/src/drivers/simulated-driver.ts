import { v4 as uuidv4 } from "uuid";
import { sleep } from "../utils/deadline.js";
import { BrowserDriverAdapter, DriverHandle, ResumeContext, SpinContext } from "./types.js";

export interface SimulatedDriverOptions {
  launchDelayMs?: number;
  failureProbability?: number; // 0 to 1
  maxConcurrent?: number;
  random?: () => number;
}

/**
 * In-process driver that hands out fake handles. Used for local development
 * without Chrome and as the default driver in tests.
 */
export class SimulatedDriverAdapter implements BrowserDriverAdapter {
  private activeHandles = new Map<string, DriverHandle>();
  private metrics = {
    totalSpun: 0,
    totalResumed: 0,
    totalReleased: 0,
    totalFailed: 0,
  };
  private random: () => number;

  constructor(private options: SimulatedDriverOptions = {}) {
    this.random = options.random ?? Math.random;
  }

  async spin(targetURL: string, context: SpinContext): Promise<DriverHandle> {
    const handle = await this.open(context.sessionId, `spin ${targetURL}`);
    this.metrics.totalSpun++;
    return handle;
  }

  async resume(resumeToken: string, context: ResumeContext): Promise<DriverHandle> {
    if (!resumeToken) {
      this.metrics.totalFailed++;
      throw new Error("Simulated resume requires a checkpoint token");
    }
    const handle = await this.open(context.sessionId, `resume ${resumeToken}`);
    this.metrics.totalResumed++;
    return handle;
  }

  async release(handle: DriverHandle): Promise<void> {
    if (this.activeHandles.delete(handle.id)) {
      this.metrics.totalReleased++;
    }
  }

  isActive(handle: DriverHandle): boolean {
    return this.activeHandles.has(handle.id);
  }

  getActiveCount(): number {
    return this.activeHandles.size;
  }

  getMetrics() {
    return { ...this.metrics };
  }

  private async open(sessionId: string, operation: string): Promise<DriverHandle> {
    if (this.options.maxConcurrent && this.activeHandles.size >= this.options.maxConcurrent) {
      this.metrics.totalFailed++;
      throw new Error("Simulated capacity reached");
    }

    if (this.options.launchDelayMs) {
      await sleep(this.options.launchDelayMs);
    }

    if (this.options.failureProbability && this.random() < this.options.failureProbability) {
      this.metrics.totalFailed++;
      throw new Error(`Simulated failure: ${operation}`);
    }

    const id = uuidv4();
    const handle: DriverHandle = {
      id,
      sessionId,
      launchedAt: Date.now(),
      wsEndpoint: `ws://simulated-driver/${id}`,
    };
    this.activeHandles.set(id, handle);
    return handle;
  }
}
