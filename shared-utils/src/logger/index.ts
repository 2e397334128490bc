import { LogLevel } from "../config";

/**
 * Logger interface
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/**
 * Default console logger implementation
 */
export class ConsoleLogger implements Logger {
  constructor(
    private serviceName: string,
    private level: LogLevel = "info"
  ) {}

  debug(message: string, ...args: unknown[]): void {
    if (this.enabled("debug")) {
      console.debug(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  info(message: string, ...args: unknown[]): void {
    if (this.enabled("info")) {
      console.log(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  warn(message: string, ...args: unknown[]): void {
    if (this.enabled("warn")) {
      console.warn(`[${this.serviceName}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    console.error(`[${this.serviceName}] ${message}`, ...args);
  }

  child(scope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.serviceName}:${scope}`, this.level);
  }

  private enabled(level: LogLevel): boolean {
    return RANK[level] >= RANK[this.level];
  }
}

export function createLogger(
  serviceName: string,
  level: LogLevel = "info"
): ConsoleLogger {
  return new ConsoleLogger(serviceName, level);
}
