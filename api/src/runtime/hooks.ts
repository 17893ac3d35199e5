import { FastifyBaseLogger } from "fastify";
import type { SessionRecord, SessionSnapshot } from "../types/session.js";

/**
 * Collaborator callbacks. Owner notification (email, UI push) lives behind
 * these; a transition is complete before its hook runs.
 */
export interface SessionHooks {
  onResumed?(session: SessionSnapshot): void | Promise<void>;
  onResumeFailed?(record: SessionRecord, error: Error): void | Promise<void>;
  onAbandoned?(session: SessionSnapshot): void | Promise<void>;
}

export async function invokeHook<K extends keyof SessionHooks>(
  hooks: SessionHooks | undefined,
  logger: FastifyBaseLogger,
  hookName: K,
  ...args: Parameters<NonNullable<SessionHooks[K]>>
): Promise<void> {
  if (!hooks) return;

  const hook = hooks[hookName];
  if (!hook) return;

  try {
    await Promise.resolve(Reflect.apply(hook, hooks, args));
  } catch (error) {
    logger.error({ err: error }, `[SessionHooks] Error in ${hookName}`);
  }
}
