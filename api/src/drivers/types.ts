/**
 * Opaque reference to a running automation/view instance. Only the adapter
 * that produced a handle knows what it points at.
 */
export interface DriverHandle {
  id: string;
  sessionId: string;
  launchedAt: number;
  wsEndpoint?: string;
}

export interface SpinContext {
  sessionId: string;
}

export interface ResumeContext {
  sessionId: string;
  targetURL: string;
}

export interface BrowserDriverAdapter {
  spin(targetURL: string, context: SpinContext): Promise<DriverHandle>;
  /** Rebuilds a job from the checkpoint its resume token points at. */
  resume(resumeToken: string, context: ResumeContext): Promise<DriverHandle>;
  /** Best effort; resolves for handles that are unknown or already released. */
  release(handle: DriverHandle): Promise<void>;
}
