/**
 * Worker System
 *
 * The enclosing runtime every materializer works against: settings,
 * dispatchers, lifecycle events and the root container of top-level
 * workers.
 */

import type { WorkerSystemSettings } from "../types/settings";
import { DEFAULT_DISPATCHER, IMMEDIATE_DISPATCHER } from "../types/settings";
import type { FlowEventHandler } from "../types/observability";
import type { Dispatch, WorkerSpec } from "../types/worker";
import { resolveWorkerSystemSettings } from "../zod/settings";
import { FlowError, FlowErrorCodes } from "../utils/errors";
import { EventDispatcher } from "./event-dispatcher";
import { FlowNameCounter } from "./flow-namer";
import { LocalWorkerRef, WorkerCell } from "./worker";

export interface WorkerSystemOptions extends Partial<WorkerSystemSettings> {
  /**
   * User context attached to every event
   */
  context?: Record<string, unknown>;

  /**
   * Event handler registered at construction
   */
  onEvent?: FlowEventHandler;
}

const guardianSpec: WorkerSpec<never> = {
  create: () => ({
    receive: () => {},
  }),
};

export class WorkerSystem {
  readonly settings: WorkerSystemSettings;
  readonly events: EventDispatcher;
  private readonly dispatchers = new Map<string, Dispatch>([
    [DEFAULT_DISPATCHER, (task) => queueMicrotask(task)],
    [IMMEDIATE_DISPATCHER, (task) => void setImmediate(task)],
  ]);
  private readonly guardian: WorkerCell<never>;
  private readonly nameCounters = new Map<string, FlowNameCounter>();

  constructor(options: WorkerSystemOptions = {}) {
    const { context, onEvent, ...settings } = options;
    this.settings = resolveWorkerSystemSettings(settings);
    this.events = new EventDispatcher(context);
    if (onEvent) this.events.onEvent(onEvent);
    if (!this.dispatchers.has(this.settings.defaultDispatcher)) {
      throw unknownDispatcher(this.settings.defaultDispatcher);
    }
    this.guardian = new WorkerCell(
      this,
      guardianSpec,
      "user",
      `/${this.settings.name}`,
    );
    this.guardian.start();
  }

  get name(): string {
    return this.settings.name;
  }

  /**
   * Create a top-level worker. The handle is returned right away while the
   * worker starts asynchronously on its dispatcher.
   */
  workerOf<M>(spec: WorkerSpec<M>, name: string): LocalWorkerRef<M> {
    return this.guardian.attachChildDeferred(spec, name);
  }

  /**
   * Names of live top-level workers
   */
  topLevelWorkers(): string[] {
    return this.guardian.childNames();
  }

  /**
   * Name counter for `scope`, created on first use. Pipelines are counted
   * under "flow", supervisors under "supervisor".
   */
  nameCounter(scope: string = "flow"): FlowNameCounter {
    let counter = this.nameCounters.get(scope);
    if (!counter) {
      counter = new FlowNameCounter();
      this.nameCounters.set(scope, counter);
    }
    return counter;
  }

  registerDispatcher(id: string, dispatch: Dispatch): void {
    this.dispatchers.set(id, dispatch);
  }

  hasDispatcher(id: string): boolean {
    return this.dispatchers.has(id);
  }

  /**
   * Look up a dispatcher; no id means the system default
   */
  dispatcherFor(id: string = this.settings.defaultDispatcher): Dispatch {
    const dispatch = this.dispatchers.get(id);
    if (!dispatch) throw unknownDispatcher(id);
    return dispatch;
  }

  onEvent(handler: FlowEventHandler): void {
    this.events.onEvent(handler);
  }

  offEvent(handler: FlowEventHandler): void {
    this.events.offEvent(handler);
  }

  /**
   * Stop every top-level worker and its descendants
   */
  terminate(): void {
    this.guardian.stop();
  }

  isTerminated(): boolean {
    return this.guardian.lifecycle.isTerminal();
  }
}

function unknownDispatcher(id: string): FlowError {
  return new FlowError(`No dispatcher registered under "${id}"`, {
    code: FlowErrorCodes.UNKNOWN_DISPATCHER,
    metadata: { dispatcher: id },
  });
}
