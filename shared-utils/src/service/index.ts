export { ServiceLifecycle } from "./lifecycle";
export {
  ConsoleLogger,
  createLogger,
  createNoopLogger,
  isLogLevel,
} from "./logger";
export { ServiceState } from "./types";
export type {
  LogFormat,
  Logger,
  LoggerOptions,
  LogLevel,
  ShutdownHandler,
  ShutdownPhase,
} from "./types";
