/**
 * flowline Observability Event System
 *
 * Unified event types for materialization and worker lifecycle events.
 * All events include: type, ts (Unix ms), systemId (UUID v7), context
 * (user-provided context of the worker system)
 */

// ============================================================================
// Event Types
// ============================================================================

/** Materialization events */
export const MaterializeEvents = {
  MATERIALIZE_START: "MATERIALIZE_START",
  MATERIALIZE_END: "MATERIALIZE_END",
  MATERIALIZE_ERROR: "MATERIALIZE_ERROR",
  FLOW_NAMED: "FLOW_NAMED",
  WORKER_ACTIVATED: "WORKER_ACTIVATED",
  WORKER_SUBSCRIBED: "WORKER_SUBSCRIBED",
} as const;

/** Worker creation and lifecycle events */
export const WorkerEvents = {
  WORKER_CREATED: "WORKER_CREATED",
  CREATION_DEFERRED: "CREATION_DEFERRED",
  CREATION_COMPLETE: "CREATION_COMPLETE",
  WORKER_FAILED: "WORKER_FAILED",
  WORKER_STOPPED: "WORKER_STOPPED",
} as const;

export const EventType = {
  ...MaterializeEvents,
  ...WorkerEvents,
} as const;

export type EventType = (typeof EventType)[keyof typeof EventType];

// ============================================================================
// Event Shapes
// ============================================================================

export interface FlowEventBase {
  type: EventType;
  ts: number;
  systemId: string;
  context: Record<string, unknown>;
}

export interface MaterializeStartEvent extends FlowEventBase {
  type: typeof EventType.MATERIALIZE_START;
  flowName: string;
  stageCount: number;
}

export interface MaterializeEndEvent extends FlowEventBase {
  type: typeof EventType.MATERIALIZE_END;
  flowName: string;
  workerCount: number;
  durationMs: number;
}

export interface MaterializeErrorEvent extends FlowEventBase {
  type: typeof EventType.MATERIALIZE_ERROR;
  flowName: string;
  code?: string;
  message: string;
}

export interface FlowNamedEvent extends FlowEventBase {
  type: typeof EventType.FLOW_NAMED;
  flowName: string;
}

export interface WorkerActivatedEvent extends FlowEventBase {
  type: typeof EventType.WORKER_ACTIVATED;
  flowName: string;
  workerName: string;
  stageKind: string;
  index: number;
}

export interface WorkerSubscribedEvent extends FlowEventBase {
  type: typeof EventType.WORKER_SUBSCRIBED;
  flowName: string;
  upstream: string;
  downstream: string;
}

export interface WorkerCreatedEvent extends FlowEventBase {
  type: typeof EventType.WORKER_CREATED;
  path: string;
}

export interface CreationDeferredEvent extends FlowEventBase {
  type: typeof EventType.CREATION_DEFERRED;
  workerName: string;
  container: string;
  timeoutMs: number;
}

export interface CreationCompleteEvent extends FlowEventBase {
  type: typeof EventType.CREATION_COMPLETE;
  path: string;
  waitedMs: number;
}

export interface WorkerFailedEvent extends FlowEventBase {
  type: typeof EventType.WORKER_FAILED;
  path: string;
  message: string;
}

export interface WorkerStoppedEvent extends FlowEventBase {
  type: typeof EventType.WORKER_STOPPED;
  path: string;
}

export type FlowEvent =
  | MaterializeStartEvent
  | MaterializeEndEvent
  | MaterializeErrorEvent
  | FlowNamedEvent
  | WorkerActivatedEvent
  | WorkerSubscribedEvent
  | WorkerCreatedEvent
  | CreationDeferredEvent
  | CreationCompleteEvent
  | WorkerFailedEvent
  | WorkerStoppedEvent;

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
  ? Omit<T, K>
  : never;

/**
 * An event without the fields the dispatcher fills in
 */
export type FlowEventInput = DistributiveOmit<
  FlowEvent,
  "ts" | "systemId" | "context"
>;

export type FlowEventHandler = (event: FlowEvent) => void | Promise<void>;
