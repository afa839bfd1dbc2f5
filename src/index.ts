export {
  accessLog,
  formatAccessLog,
  formatDuration,
  wrap,
  type AccessLogEntry,
  type AccessLogOptions,
  type AccessLogWriter,
  type Middleware,
  type RequestHandler,
} from "./access-log"
export { ShutdownCoordinator } from "./daemon/coordinator"
export { listenWithSrvx } from "./daemon/listener"
export {
  subscribeToSignals,
  TERMINATION_SIGNALS,
  type SignalSubscription,
  type SignalTarget,
} from "./daemon/signals"
export type {
  CoordinatorOptions,
  LifecycleState,
  ListenFn,
  Listener,
  ListenOptions,
  ListenOutcome,
  ServeOptions,
  ShutdownHook,
  ShutdownReport,
  ShutdownTrigger,
} from "./daemon/types"
export {
  DEFAULT_PORT,
  DEFAULT_SHUTDOWN_TIMEOUT_MS,
  MAX_SHUTDOWN_TIMEOUT_MS,
  resolveServerConfig,
  type ServerConfig,
  type ServerConfigOptions,
} from "./lib/config"
export { serve } from "./serve"
