import { SessionStatus } from "../types/session.js";

export function getErrors(e: unknown) {
  let error: string;
  if (typeof e === "string") {
    error = e;
  } else if (e instanceof Error) {
    error = e.message;
  } else {
    error = "Unknown error";
  }

  return error;
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

export enum SessionErrorType {
  NOT_FOUND = "NOT_FOUND",
  ALREADY_TERMINATED = "ALREADY_TERMINATED",
  DRIVER_SPIN_FAILURE = "DRIVER_SPIN_FAILURE",
  RESUME_FAILURE = "RESUME_FAILURE",
  STORE_UNAVAILABLE = "STORE_UNAVAILABLE",
  CONCURRENT_CLAIM_LOST = "CONCURRENT_CLAIM_LOST",
  CAPACITY_EXCEEDED = "CAPACITY_EXCEEDED",
  INVALID_TRANSITION = "INVALID_TRANSITION",
  SESSION_BUSY = "SESSION_BUSY",
  DEADLINE_EXCEEDED = "DEADLINE_EXCEEDED",
  CONFIGURATION = "CONFIGURATION",
  DUPLICATE_SESSION = "DUPLICATE_SESSION",
}

export abstract class SessionError extends Error {
  public readonly type: SessionErrorType;
  public readonly isRetryable: boolean;
  public readonly statusCode: number;
  public readonly context?: Record<string, unknown>;

  constructor(
    type: SessionErrorType,
    message: string,
    options: {
      isRetryable?: boolean;
      statusCode?: number;
      context?: Record<string, unknown>;
      cause?: unknown;
    } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = this.constructor.name;
    this.type = type;
    this.isRetryable = options.isRetryable ?? false;
    this.statusCode = options.statusCode ?? 500;
    this.context = options.context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

export class SessionNotFoundError extends SessionError {
  constructor(sessionId: string) {
    super(SessionErrorType.NOT_FOUND, `Session not found: ${sessionId}`, {
      statusCode: 404,
      context: { sessionId },
    });
  }
}

/**
 * Thrown when the automation driver could not start a session.
 * No record exists for the session when this is raised.
 */
export class DriverSpinFailureError extends SessionError {
  constructor(targetURL: string, cause?: unknown) {
    super(SessionErrorType.DRIVER_SPIN_FAILURE, `Driver failed to spin session: ${getErrors(cause)}`, {
      statusCode: 502,
      context: { targetURL },
      cause,
    });
  }
}

export class ResumeFailureError extends SessionError {
  constructor(sessionId: string, reason: string, cause?: unknown) {
    super(SessionErrorType.RESUME_FAILURE, `Resume failed for session ${sessionId}: ${reason}`, {
      statusCode: 502,
      context: { sessionId },
      cause,
    });
  }
}

/**
 * The durable store could not be reached. Retryable; never corrupts a record.
 */
export class StoreUnavailableError extends SessionError {
  constructor(operation: string, cause?: unknown) {
    super(
      SessionErrorType.STORE_UNAVAILABLE,
      `Session store unavailable during ${operation}: ${getErrors(cause)}`,
      { isRetryable: true, statusCode: 503, context: { operation }, cause },
    );
  }
}

/**
 * Lost compare-and-set. Internal to the recovery protocol and never returned to clients.
 */
export class ConcurrentClaimLostError extends SessionError {
  constructor(sessionId: string, expected: SessionStatus) {
    super(
      SessionErrorType.CONCURRENT_CLAIM_LOST,
      `Claim lost for session ${sessionId}: status was no longer ${expected}`,
      { statusCode: 409, context: { sessionId, expected } },
    );
  }
}

export class CapacityExceededError extends SessionError {
  constructor(maxSessions: number) {
    super(SessionErrorType.CAPACITY_EXCEEDED, `Maximum number of sessions reached (${maxSessions})`, {
      isRetryable: true,
      statusCode: 429,
      context: { maxSessions },
    });
  }
}

export class InvalidTransitionError extends SessionError {
  constructor(from: SessionStatus, to: SessionStatus) {
    super(SessionErrorType.INVALID_TRANSITION, `Invalid session transition: ${from} → ${to}`, {
      statusCode: 409,
      context: { from, to },
    });
  }
}

/** The record is being resumed by another process instance. */
export class SessionBusyError extends SessionError {
  constructor(sessionId: string, status: SessionStatus) {
    super(SessionErrorType.SESSION_BUSY, `Session ${sessionId} is ${status}, try again later`, {
      isRetryable: true,
      statusCode: 409,
      context: { sessionId, status },
    });
  }
}

export class DeadlineExceededError extends SessionError {
  constructor(label: string, timeoutMs: number) {
    super(SessionErrorType.DEADLINE_EXCEEDED, `Deadline exceeded after ${timeoutMs}ms: ${label}`, {
      statusCode: 504,
      context: { label, timeoutMs },
    });
  }
}

export class DuplicateSessionError extends SessionError {
  constructor(sessionId: string) {
    super(SessionErrorType.DUPLICATE_SESSION, `Session already exists: ${sessionId}`, {
      statusCode: 409,
      context: { sessionId },
    });
  }
}

export class ConfigurationError extends SessionError {
  constructor(message: string, field?: string) {
    super(SessionErrorType.CONFIGURATION, `Configuration error: ${message}`, {
      context: { field },
    });
  }
}

export function isSessionError(e: unknown): e is SessionError {
  return e instanceof SessionError;
}
