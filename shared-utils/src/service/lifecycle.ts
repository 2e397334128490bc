import { EventEmitter } from "events";
import { Logger } from "../logger";
import { ServiceState, ShutdownHandler } from "./types";

export interface LifecycleOptions {
  shutdownTimeoutMs?: number;
  /** Install SIGTERM/SIGINT handlers that shut down and exit */
  handleSignals?: boolean;
}

/**
 * Service lifecycle manager
 * Handles state transitions and graceful shutdown
 */
export class ServiceLifecycle extends EventEmitter {
  private state: ServiceState = ServiceState.INITIALIZING;
  private startTime: number = Date.now();
  private shutdownHandlers: ShutdownHandler[] = [];
  private shutdownTimeoutMs: number;
  private shutdownPromise?: Promise<void>;

  constructor(private logger: Logger, options: LifecycleOptions = {}) {
    super();
    this.shutdownTimeoutMs = options.shutdownTimeoutMs ?? 30000;
    if (options.handleSignals) {
      this.setupProcessHandlers();
    }
  }

  getState(): ServiceState {
    return this.state;
  }

  /**
   * Get service uptime in seconds
   */
  getUptimeSeconds(): number {
    return Math.floor((Date.now() - this.startTime) / 1000);
  }

  isHealthy(): boolean {
    return this.state === ServiceState.RUNNING;
  }

  setState(newState: ServiceState): void {
    const oldState = this.state;
    if (oldState === newState) return;
    this.state = newState;

    this.emit("state:changed", { from: oldState, to: newState });
    this.logger.info(`State changed: ${oldState} → ${newState}`);
  }

  addShutdownHandler(handler: ShutdownHandler): void {
    this.shutdownHandlers.push(handler);
  }

  /**
   * Start graceful shutdown process. Repeated calls share the first run.
   */
  shutdown(signal: string): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown(signal);
    }
    return this.shutdownPromise;
  }

  private async runShutdown(signal: string): Promise<void> {
    const shutdownStart = Date.now();
    this.logger.info(`Received ${signal}, starting graceful shutdown...`);
    this.setState(ServiceState.STOPPING);

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new Error(`Shutdown timeout after ${this.shutdownTimeoutMs}ms`));
      }, this.shutdownTimeoutMs);
    });

    try {
      await Promise.race([this.runShutdownHandlers(), timeout]);

      const durationMs = Date.now() - shutdownStart;
      this.logger.info(`Graceful shutdown completed in ${durationMs}ms`);
      this.setState(ServiceState.STOPPED);
      this.emit("shutdown:complete", { durationMs });
    } catch (error) {
      this.logger.error("Error during shutdown:", error);
      this.setState(ServiceState.ERROR);
      // EventEmitter throws on "error" without a listener
      if (this.listenerCount("error") > 0) {
        this.emit("error", {
          error: error instanceof Error ? error : new Error(String(error)),
          context: "shutdown",
        });
      }
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Run all shutdown handlers in parallel
   */
  private async runShutdownHandlers(): Promise<void> {
    if (this.shutdownHandlers.length === 0) {
      return;
    }

    this.logger.info(
      `Running ${this.shutdownHandlers.length} shutdown handlers...`
    );

    const results = await Promise.allSettled(
      this.shutdownHandlers.map((handler) => handler())
    );

    const failures = results.filter(
      (result): result is PromiseRejectedResult => result.status === "rejected"
    );

    if (failures.length > 0) {
      failures.forEach((failure) => {
        this.logger.error("Shutdown handler failed:", failure.reason);
      });
      throw new Error(`${failures.length} shutdown handlers failed`);
    }
  }

  private setupProcessHandlers(): void {
    const signals: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

    signals.forEach((signal) => {
      process.once(signal, () => {
        this.shutdown(signal)
          .then(() => process.exit(this.state === ServiceState.STOPPED ? 0 : 1))
          .catch(() => process.exit(1));
      });
    });
  }
}
