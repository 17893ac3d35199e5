export { SessionManager, type SessionManagerConfig, type TerminateResult } from "./session-manager.js";
export { HeartbeatMonitor, type HeartbeatMonitorConfig } from "./heartbeat-monitor.js";
export {
  RecoveryCoordinator,
  type RecoveryCoordinatorConfig,
  type RecoveryReport,
  type RecoveryRunOptions,
} from "./recovery-coordinator.js";
export { SessionRegistry, type LiveSession } from "./session-registry.js";
export { SessionEventBus } from "./session-events.js";
export { TaskScheduler } from "./task-scheduler.js";
export * from "./session-machine.js";
export * from "./hooks.js";
