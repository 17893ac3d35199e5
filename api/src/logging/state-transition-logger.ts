import { FastifyBaseLogger } from "fastify";
import { SessionEventBus } from "../runtime/session-events.js";
import { SessionEventType, SessionTransitionEvent } from "../types/session.js";

export interface StateTransitionLoggerOptions {
  baseLogger: FastifyBaseLogger;
  /** Heartbeats are frequent; they are logged at debug level unless this is set. */
  logHeartbeats?: boolean;
}

export class StateTransitionLogger {
  private logger: FastifyBaseLogger;
  private logHeartbeats: boolean;
  private lastTransitionTime = new Map<string, number>();
  private unsubscribe: (() => void) | null = null;

  constructor(options: StateTransitionLoggerOptions) {
    this.logger = options.baseLogger.child({ component: "StateTransitionLogger" });
    this.logHeartbeats = options.logHeartbeats ?? false;
  }

  attach(bus: SessionEventBus): void {
    this.detach();
    this.unsubscribe = bus.onTransition((event) => this.recordTransition(event));
  }

  /** Stops following the bus and forgets sessions that never reached a final event. */
  detach(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.lastTransitionTime.clear();
  }

  recordTransition(event: SessionTransitionEvent): void {
    const previous = this.lastTransitionTime.get(event.sessionId);
    const duration = previous === undefined ? 0 : event.timestamp - previous;

    if (isFinal(event.type)) {
      this.lastTransitionTime.delete(event.sessionId);
    } else {
      this.lastTransitionTime.set(event.sessionId, event.timestamp);
    }

    const fields = {
      sessionId: event.sessionId,
      from: event.fromStatus,
      to: event.toStatus,
      event: event.type,
      duration,
    };

    if (event.type === SessionEventType.Heartbeat && !this.logHeartbeats) {
      this.logger.debug(fields, "[StateMachine] Heartbeat");
    } else if (event.type === SessionEventType.ResumeFailed) {
      this.logger.warn(fields, "[StateMachine] State transition");
    } else {
      this.logger.info(fields, "[StateMachine] State transition");
    }
  }

  trackedSessions(): number {
    return this.lastTransitionTime.size;
  }
}

function isFinal(type: SessionEventType): boolean {
  return (
    type === SessionEventType.Completed ||
    type === SessionEventType.Failed ||
    type === SessionEventType.Abandoned ||
    type === SessionEventType.ResumeFailed
  );
}
