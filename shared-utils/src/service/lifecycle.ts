import { createLogger } from "./logger";
import { Logger, ServiceState, ShutdownHandler, ShutdownPhase } from "./types";

interface RegisteredHandler {
  name: string;
  phase: ShutdownPhase;
  run: ShutdownHandler;
}

const PHASES: readonly ShutdownPhase[] = ["drain", "close"];

/**
 * Process state plus graceful shutdown. Handlers of the `drain` phase
 * (stop taking work, finish or cancel what is in flight) all settle before
 * the `close` phase releases connections. One deadline covers both.
 */
export class ServiceLifecycle {
  private state: ServiceState = ServiceState.INITIALIZING;
  private handlers: RegisteredHandler[] = [];
  private shuttingDown: Promise<void> | undefined;
  private logger: Logger;

  constructor(
    private shutdownTimeoutMs: number = 30000,
    logger?: Logger
  ) {
    this.logger = (logger ?? createLogger("service")).child("lifecycle");
  }

  getState(): ServiceState {
    return this.state;
  }

  setState(next: ServiceState): void {
    if (next === this.state) return;
    this.logger.info(`State changed: ${this.state} -> ${next}`);
    this.state = next;
  }

  addShutdownHandler(name: string, run: ShutdownHandler, phase: ShutdownPhase = "close"): void {
    this.handlers.push({ name, phase, run });
  }

  /** Idempotent; concurrent callers share the first shutdown */
  shutdown(reason: string): Promise<void> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.runShutdown(reason);
    }
    return this.shuttingDown;
  }

  /**
   * SIGTERM/SIGINT trigger shutdown and exit; uncaught errors are logged
   * and exit with status 1. Only entry points call this.
   */
  installProcessHandlers(): void {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];
    for (const signal of signals) {
      process.once(signal, () => {
        this.shutdown(signal)
          .then(() => process.exit(this.state === ServiceState.STOPPED ? 0 : 1))
          .catch((error: unknown) => {
            this.logger.error("Shutdown failed:", error);
            process.exit(1);
          });
      });
    }

    process.on("uncaughtException", (error) => this.fatal("uncaughtException", error));
    process.on("unhandledRejection", (reason) => this.fatal("unhandledRejection", reason));
  }

  private async runShutdown(reason: string): Promise<void> {
    const started = Date.now();
    this.logger.info(`Shutting down (${reason})`);
    this.setState(ServiceState.STOPPING);

    let timer: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new Error(`Shutdown timeout after ${this.shutdownTimeoutMs}ms`)),
        this.shutdownTimeoutMs
      );
    });

    try {
      await Promise.race([this.runPhases(), deadline]);
      this.logger.info(`Shutdown completed in ${Date.now() - started}ms`);
      this.setState(ServiceState.STOPPED);
    } catch (error) {
      this.logger.error("Shutdown incomplete:", error);
      this.setState(ServiceState.ERROR);
    } finally {
      clearTimeout(timer);
    }
  }

  private async runPhases(): Promise<void> {
    const failed: string[] = [];

    for (const phase of PHASES) {
      const handlers = this.handlers.filter((handler) => handler.phase === phase);
      const results = await Promise.allSettled(handlers.map((handler) => handler.run()));

      results.forEach((result, i) => {
        if (result.status === "rejected") {
          failed.push(handlers[i].name);
          this.logger.error(`Shutdown handler "${handlers[i].name}" failed:`, result.reason);
        }
      });
    }

    if (failed.length > 0) {
      throw new Error(`Shutdown handlers failed: ${failed.join(", ")}`);
    }
  }

  private fatal(context: string, reason: unknown): void {
    this.logger.error(`Fatal ${context}:`, reason);
    this.setState(ServiceState.ERROR);
    process.exit(1);
  }
}
