// Re-export all shared utilities
export * from "./cache";
export * from "./config";
export * from "./logger";

// Re-export service module with explicit naming to avoid conflicts
export { ServiceLifecycle, ServiceState } from "./service";
export type {
  LifecycleOptions,
  ShutdownHandler,
} from "./service";
