// Re-export everything from bus module
export * from "./bus";

export * from "./async";

export * from "./config";

export {
  ConsoleLogger,
  createLogger,
  createNoopLogger,
  isLogLevel,
  ServiceLifecycle,
  ServiceState,
} from "./service";
export type {
  LogFormat,
  Logger,
  LoggerOptions,
  LogLevel,
  ShutdownHandler,
  ShutdownPhase,
} from "./service";

// Version info
export const VERSION = "0.1.0";
