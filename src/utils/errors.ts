// Error types for flowline

/**
 * Error codes for flowline errors
 */
export const FlowErrorCodes = {
  UNKNOWN_ENDPOINT_TYPE: "UNKNOWN_ENDPOINT_TYPE",
  UNSUPPORTED_STAGE: "UNSUPPORTED_STAGE",
  ILLEGAL_CONTAINER: "ILLEGAL_CONTAINER",
  CREATION_TIMEOUT: "CREATION_TIMEOUT",
  DUPLICATE_WORKER_NAME: "DUPLICATE_WORKER_NAME",
  INVALID_WORKER_NAME: "INVALID_WORKER_NAME",
  WORKER_TERMINATED: "WORKER_TERMINATED",
  INVALID_SETTINGS: "INVALID_SETTINGS",
  UNKNOWN_DISPATCHER: "UNKNOWN_DISPATCHER",
  SPEC_VIOLATION: "SPEC_VIOLATION",
  KEY_MISMATCH: "KEY_MISMATCH",
} as const;

export type FlowErrorCode = (typeof FlowErrorCodes)[keyof typeof FlowErrorCodes];

export const ErrorCategory = {
  CONFIGURATION: "configuration",
  MATERIALIZATION: "materialization",
  RUNTIME: "runtime",
  PROTOCOL: "protocol",
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Map error codes to categories
 */
export function getErrorCategory(code: FlowErrorCode): ErrorCategory {
  switch (code) {
    case FlowErrorCodes.INVALID_SETTINGS:
    case FlowErrorCodes.UNKNOWN_DISPATCHER:
      return ErrorCategory.CONFIGURATION;
    case FlowErrorCodes.CREATION_TIMEOUT:
    case FlowErrorCodes.WORKER_TERMINATED:
      return ErrorCategory.RUNTIME;
    case FlowErrorCodes.SPEC_VIOLATION:
      return ErrorCategory.PROTOCOL;
    case FlowErrorCodes.UNKNOWN_ENDPOINT_TYPE:
    case FlowErrorCodes.UNSUPPORTED_STAGE:
    case FlowErrorCodes.ILLEGAL_CONTAINER:
    case FlowErrorCodes.DUPLICATE_WORKER_NAME:
    case FlowErrorCodes.INVALID_WORKER_NAME:
    case FlowErrorCodes.KEY_MISMATCH:
    default:
      return ErrorCategory.MATERIALIZATION;
  }
}

/**
 * Context information for flowline errors
 */
export interface FlowErrorContext {
  /**
   * Error code for programmatic handling
   */
  code: FlowErrorCode;

  /**
   * Pipeline name the failing operation belonged to
   */
  flowName?: string;

  /**
   * Worker name or path involved in the failure
   */
  worker?: string;

  /**
   * Additional context data
   */
  metadata?: Record<string, unknown>;
}

/**
 * Error raised by the materializer and the worker runtime
 */
export class FlowError extends Error {
  /**
   * Error code for programmatic handling
   */
  readonly code: FlowErrorCode;

  readonly context: FlowErrorContext;

  /**
   * Timestamp when error occurred
   */
  readonly timestamp: number;

  constructor(message: string, context: FlowErrorContext) {
    super(message);
    this.name = "FlowError";
    this.code = context.code;
    this.context = context;
    this.timestamp = Date.now();

    // Maintain proper prototype chain
    Object.setPrototypeOf(this, FlowError.prototype);
  }

  get category(): ErrorCategory {
    return getErrorCategory(this.code);
  }

  /**
   * Create a descriptive string with context
   */
  toDetailedString(): string {
    const parts = [this.message];

    if (this.context.flowName !== undefined) {
      parts.push(`Flow: ${this.context.flowName}`);
    }
    if (this.context.worker !== undefined) {
      parts.push(`Worker: ${this.context.worker}`);
    }

    return parts.join(" | ");
  }

  /**
   * Serialize error for logging/transport
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      category: this.category,
      message: this.message,
      timestamp: this.timestamp,
      flowName: this.context.flowName,
      worker: this.context.worker,
      metadata: this.context.metadata,
    };
  }
}

/**
 * Type guard for FlowError
 */
export function isFlowError(error: unknown): error is FlowError {
  return error instanceof FlowError;
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(typeof value === "string" ? value : String(value));
}

/**
 * Readable type name of an arbitrary value, used in diagnostics
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor === "function" && ctor.name && ctor.name !== "Object") {
    return ctor.name;
  }
  if ("kind" in value && typeof value.kind === "string") {
    return `Object(kind=${value.kind})`;
  }
  return "Object";
}

export function unknownEndpointType(
  role: "Source" | "Sink",
  endpoint: unknown,
  flowName?: string,
): FlowError {
  return new FlowError(`unknown ${role} type ${describeType(endpoint)}`, {
    code: FlowErrorCodes.UNKNOWN_ENDPOINT_TYPE,
    flowName,
    metadata: { role },
  });
}

export function unsupportedStage(kind: string, name: string): FlowError {
  return new FlowError(`unsupported stage kind "${kind}" (stage "${name}")`, {
    code: FlowErrorCodes.UNSUPPORTED_STAGE,
    metadata: { kind, name },
  });
}

export function illegalContainer(locality: string, path: string): FlowError {
  return new FlowError(
    `Stream supervisor must be a local worker, was [${locality}] at ${path}`,
    {
      code: FlowErrorCodes.ILLEGAL_CONTAINER,
      worker: path,
      metadata: { locality },
    },
  );
}

export function creationTimeout(name: string, timeoutMs: number): FlowError {
  return new FlowError(
    `Creation of worker "${name}" timed out after ${timeoutMs}ms`,
    {
      code: FlowErrorCodes.CREATION_TIMEOUT,
      worker: name,
      metadata: { timeoutMs },
    },
  );
}
