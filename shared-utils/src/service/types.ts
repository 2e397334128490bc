/**
 * Service lifecycle states
 */
export enum ServiceState {
  INITIALIZING = "initializing",
  RUNNING = "running",
  STOPPING = "stopping",
  STOPPED = "stopped",
  ERROR = "error",
}

export type ShutdownHandler = () => Promise<void>;
