import { LogFormat, Logger, LoggerOptions, LogLevel } from "./types";

const LEVELS: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  private level: LogLevel;
  private format: LogFormat;

  constructor(private serviceName: string, options: LoggerOptions = {}) {
    this.level = options.level ?? "info";
    this.format = options.format ?? "text";
  }

  debug(message: string, ...args: unknown[]): void {
    this.write("debug", message, args);
  }

  info(message: string, ...args: unknown[]): void {
    this.write("info", message, args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.write("warn", message, args);
  }

  error(message: string, ...args: unknown[]): void {
    this.write("error", message, args);
  }

  child(component: string): Logger {
    return new ConsoleLogger(`${this.serviceName}:${component}`, {
      level: this.level,
      format: this.format,
    });
  }

  private write(level: LogLevel, message: string, args: unknown[]): void {
    if (LEVELS[level] < LEVELS[this.level]) {
      return;
    }

    if (this.format === "json") {
      const entry = {
        timestamp: new Date().toISOString(),
        level,
        service: this.serviceName,
        message,
        ...(args.length > 0 && { context: args.map(toLoggable) }),
      };
      const line = JSON.stringify(entry);
      if (level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
      return;
    }

    const text = `[${this.serviceName}] ${message}`;
    switch (level) {
      case "debug":
        console.debug(text, ...args);
        break;
      case "info":
        console.log(text, ...args);
        break;
      case "warn":
        console.warn(text, ...args);
        break;
      case "error":
        console.error(text, ...args);
        break;
    }
  }
}

function toLoggable(value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

class NoopLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}

export function createLogger(
  serviceName: string,
  options: LoggerOptions = {}
): Logger {
  return new ConsoleLogger(serviceName, options);
}

/**
 * Logger that drops everything (tests, embedded use)
 */
export function createNoopLogger(): Logger {
  return new NoopLogger();
}
