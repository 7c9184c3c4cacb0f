// Settings for the worker runtime and for materializers

/**
 * Settings of the enclosing worker runtime
 */
export interface WorkerSystemSettings {
  /**
   * Name of the system, used as the root of every worker path
   */
  name: string;

  /**
   * How long a deferred worker creation may wait for the supervisor's reply
   * (default: 20000ms)
   */
  creationTimeoutMs: number;

  /**
   * Dispatcher used by workers whose spec names none
   * (default: "default-dispatcher")
   */
  defaultDispatcher: string;
}

/**
 * Settings of a single materializer
 */
export interface MaterializerSettings {
  /**
   * Number of elements a stage requests from upstream at a time
   * (default: 4)
   */
  initialInputBufferSize: number;

  /**
   * Upper bound for a stage's input buffer (default: 16)
   */
  maximumInputBufferSize: number;

  /**
   * Dispatcher that stage workers run on (default: "default-dispatcher")
   */
  dispatcher: string;

  /**
   * Prefix of every pipeline name (default: "flow")
   */
  namePrefix: string;
}

export const DEFAULT_DISPATCHER = "default-dispatcher";
export const IMMEDIATE_DISPATCHER = "immediate-dispatcher";

export const WORKER_SYSTEM_DEFAULTS: WorkerSystemSettings = {
  name: "flowline",
  creationTimeoutMs: 20000,
  defaultDispatcher: DEFAULT_DISPATCHER,
};

export const MATERIALIZER_DEFAULTS: MaterializerSettings = {
  initialInputBufferSize: 4,
  maximumInputBufferSize: 16,
  dispatcher: DEFAULT_DISPATCHER,
  namePrefix: "flow",
};
