/**
 * Event Handler Utilities
 *
 * Helpers for combining and composing event handlers, plus a logging handler
 * that turns lifecycle events into log lines.
 */

import type { EventType, FlowEvent } from "../types/observability";

/**
 * Event handler function type
 */
export type EventHandler = (event: FlowEvent) => void;

/**
 * Minimal logger shape; `console` satisfies it
 */
export interface FlowLogger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Combine multiple event handlers into a single handler.
 *
 * @example
 * ```typescript
 * const system = new WorkerSystem({
 *   onEvent: combineEvents(
 *     createLoggingHandler(),
 *     (event) => metrics.increment(event.type),
 *   ),
 * });
 * ```
 */
export function combineEvents(...handlers: EventHandler[]): EventHandler {
  const validHandlers = handlers.filter(
    (h): h is EventHandler => typeof h === "function",
  );

  if (validHandlers.length === 0) {
    return () => {};
  }

  const [single] = validHandlers;
  if (validHandlers.length === 1 && single) {
    return single;
  }

  return (event: FlowEvent) => {
    for (const handler of validHandlers) {
      try {
        handler(event);
      } catch (error) {
        // Log but don't throw - one handler failing shouldn't break others
        console.error(
          `Event handler error for ${event.type}:`,
          error instanceof Error ? error.message : error,
        );
      }
    }
  };
}

/**
 * Create a filtered event handler that only receives specific event types.
 */
export function filterEvents(
  types: EventType[],
  handler: EventHandler,
): EventHandler {
  const typeSet = new Set<string>(types);
  return (event: FlowEvent) => {
    if (typeSet.has(event.type)) {
      handler(event);
    }
  };
}

/**
 * Create an event handler that excludes specific event types.
 *
 * Useful for filtering out noisy events like per-worker subscriptions.
 */
export function excludeEvents(
  types: EventType[],
  handler: EventHandler,
): EventHandler {
  const typeSet = new Set<string>(types);
  return (event: FlowEvent) => {
    if (!typeSet.has(event.type)) {
      handler(event);
    }
  };
}

/**
 * Log lifecycle events. Failures go to `error`, materialization milestones
 * to `info`, everything else to `debug`.
 */
export function createLoggingHandler(
  logger: FlowLogger = console,
): EventHandler {
  return (event: FlowEvent) => {
    switch (event.type) {
      case "MATERIALIZE_START":
        logger.info(`materializing ${event.flowName}`, {
          stageCount: event.stageCount,
        });
        break;
      case "MATERIALIZE_END":
        logger.info(`materialized ${event.flowName}`, {
          workerCount: event.workerCount,
          durationMs: event.durationMs,
        });
        break;
      case "MATERIALIZE_ERROR":
        logger.error(`materialization of ${event.flowName} failed`, {
          code: event.code,
          message: event.message,
        });
        break;
      case "WORKER_FAILED":
        logger.error(`worker ${event.path} failed`, {
          message: event.message,
        });
        break;
      case "CREATION_DEFERRED":
        logger.debug(
          `deferring creation of ${event.workerName} to ${event.container}`,
          { timeoutMs: event.timeoutMs },
        );
        break;
      case "WORKER_ACTIVATED":
        logger.debug(`activated ${event.workerName}`, {
          stageKind: event.stageKind,
          index: event.index,
        });
        break;
      case "WORKER_SUBSCRIBED":
        logger.debug(`${event.downstream} subscribed to ${event.upstream}`);
        break;
      default:
        logger.debug(event.type);
    }
  };
}
