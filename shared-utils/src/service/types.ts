/**
 * Logging and lifecycle types shared by every service
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogFormat = "text" | "json";

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;

  /** Derive a logger tagged with a component name, e.g. `[monitor:scheduler]` */
  child(component: string): Logger;
}

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
}

/**
 * Service lifecycle states
 */
export enum ServiceState {
  INITIALIZING = "initializing",
  STARTING = "starting",
  RUNNING = "running",
  STOPPING = "stopping",
  STOPPED = "stopped",
  ERROR = "error",
}

export type ShutdownHandler = () => Promise<void>;

/** `drain` handlers settle before any `close` handler runs */
export type ShutdownPhase = "drain" | "close";
