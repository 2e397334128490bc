export { ServiceLifecycle } from "./lifecycle";
export type { LifecycleOptions } from "./lifecycle";
export { ServiceState } from "./types";
export type { ShutdownHandler } from "./types";
