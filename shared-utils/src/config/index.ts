/**
 * Shared configuration utilities for services
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface RedisConfig {
  url: string;
}

export interface ServiceConfig {
  mode: string;
  logLevel: LogLevel;
  port?: number;
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Create Redis configuration from environment variables
 */
export function createRedisConfig(): RedisConfig {
  return { url: process.env.REDIS_URL || "redis://localhost:6379" };
}

/**
 * Create service configuration from environment variables
 */
export function createServiceConfig(defaultPort?: number): ServiceConfig {
  return {
    mode: process.env.MODE ?? process.env.NODE_ENV ?? "development",
    logLevel: parseLogLevel(process.env.LOG_LEVEL),
    port: defaultPort ? Number(process.env.PORT ?? defaultPort) : undefined,
  };
}

export function parseLogLevel(value: string | undefined): LogLevel {
  const level = (value ?? "info").trim().toLowerCase();
  return LOG_LEVELS.find((l) => l === level) ?? "info";
}

/**
 * Parse a positive number from an environment variable
 */
export function parseEnvNumber(envVar: string, defaultValue: number): number {
  const value = process.env[envVar];
  if (value === undefined || value.trim() === "") return defaultValue;

  const num = Number(value);
  if (isNaN(num) || num < 0) {
    throw new Error(`Invalid number in ${envVar}: ${value}`);
  }
  return num;
}
