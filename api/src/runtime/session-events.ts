import { EventEmitter } from "events";
import { FastifyBaseLogger } from "fastify";
import { SessionEventType, SessionStatus, SessionTransitionEvent } from "../types/session.js";

export const SESSION_TRANSITION = "transition";

type TransitionListener = (event: SessionTransitionEvent) => void;

/**
 * Fan-out point for session transition events. A throwing listener is logged
 * and never propagates into the component that emitted the event.
 */
export class SessionEventBus extends EventEmitter {
  private logger: FastifyBaseLogger;

  constructor(logger: FastifyBaseLogger) {
    super();
    this.logger = logger.child({ component: "SessionEventBus" });
  }

  emitTransition(
    type: SessionEventType,
    sessionId: string,
    fromStatus: SessionStatus | null,
    toStatus: SessionStatus,
    timestamp: number,
  ): SessionTransitionEvent {
    const event: SessionTransitionEvent = { type, sessionId, fromStatus, toStatus, timestamp };

    for (const listener of this.listeners(SESSION_TRANSITION)) {
      try {
        Reflect.apply(listener, this, [event]);
      } catch (error) {
        this.logger.error({ err: error, sessionId }, "[SessionEventBus] Listener error");
      }
    }

    return event;
  }

  onTransition(listener: TransitionListener): () => void {
    this.on(SESSION_TRANSITION, listener);
    return () => {
      this.off(SESSION_TRANSITION, listener);
    };
  }
}
