import { HeartbeatMonitor } from "../runtime/heartbeat-monitor.js";
import { RecoveryCoordinator } from "../runtime/recovery-coordinator.js";
import { SessionEventBus } from "../runtime/session-events.js";
import { SessionManager } from "../runtime/session-manager.js";

declare module "fastify" {
  interface FastifyInstance {
    sessionManager: SessionManager;
    heartbeatMonitor: HeartbeatMonitor;
    recoveryCoordinator: RecoveryCoordinator;
    sessionEvents: SessionEventBus;
  }
}
