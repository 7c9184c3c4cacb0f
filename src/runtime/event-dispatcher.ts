/**
 * flowline Event Dispatcher
 *
 * Centralized event emission for materialization and worker lifecycle events.
 * - Adds ts, systemId, context automatically to all events
 * - Calls handlers via microtasks (fire-and-forget)
 * - Never throws from handler failures
 */

import { v7 as uuidv7 } from "uuid";
import type {
  FlowEvent,
  FlowEventHandler,
  FlowEventInput,
} from "../types/observability";

/**
 * Deep clone and freeze an object to ensure complete immutability.
 * Handles nested objects and arrays.
 */
function deepCloneAndFreeze<T>(obj: T): T {
  if (obj === null || typeof obj !== "object") {
    return obj;
  }

  if (Array.isArray(obj)) {
    const cloned: unknown[] = obj.map((item: unknown) =>
      deepCloneAndFreeze(item),
    );
    return Object.freeze(cloned) as T;
  }

  const cloned: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    cloned[key] = deepCloneAndFreeze(value);
  }
  return Object.freeze(cloned) as T;
}

export class EventDispatcher {
  private handlers: FlowEventHandler[] = [];
  private readonly systemId: string;
  private readonly _context: Record<string, unknown>;

  constructor(context: Record<string, unknown> = {}) {
    this.systemId = uuidv7();
    this._context = deepCloneAndFreeze(context);
  }

  /**
   * Register an event handler
   */
  onEvent(handler: FlowEventHandler): void {
    this.handlers.push(handler);
  }

  /**
   * Remove an event handler
   */
  offEvent(handler: FlowEventHandler): void {
    const index = this.handlers.indexOf(handler);
    if (index !== -1) {
      this.handlers.splice(index, 1);
    }
  }

  private build(input: FlowEventInput): FlowEvent {
    return {
      ...input,
      ts: Date.now(),
      systemId: this.systemId,
      context: this._context,
    };
  }

  private invoke(handler: FlowEventHandler, event: FlowEvent): void {
    try {
      const result = handler(event);
      if (result instanceof Promise) {
        void result.catch(() => {
          // Async handler errors are fire and forget
        });
      }
    } catch {
      // Sync handler errors are fire and forget
    }
  }

  /**
   * Emit an event to all handlers
   * - Adds ts, systemId, context automatically
   * - Calls handlers via microtasks (fire-and-forget)
   */
  emit(input: FlowEventInput): void {
    // Zero overhead when observability is unused
    if (this.handlers.length === 0) return;

    const event = this.build(input);
    // Snapshot handlers in case one of them modifies the list
    for (const handler of [...this.handlers]) {
      queueMicrotask(() => this.invoke(handler, event));
    }
  }
}
