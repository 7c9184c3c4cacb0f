/**
 * Worker cells and local worker handles
 *
 * A cell owns one worker behavior, its mailbox, its lifecycle and its
 * children. Messages sent while the worker is starting are queued and
 * delivered once it becomes ready.
 */

import type {
  Dispatch,
  Recipient,
  WorkerBehavior,
  WorkerContext,
  WorkerSpec,
} from "../types/worker";
import type { WorkerSystem } from "./system";
import { StateMachine, WorkerStates, type WorkerState } from "./state-machine";
import { FlowError, FlowErrorCodes, toError } from "../utils/errors";

/**
 * Messages processed per scheduled run before yielding the dispatcher
 */
const THROUGHPUT = 16;

interface Envelope<M> {
  message: M;
  sender: Recipient<unknown> | undefined;
}

/**
 * Untyped view of a cell, used by its parent
 */
interface ChildCell {
  readonly name: string;
  stop(): void;
}

interface ParentCell {
  removeChild(name: string): void;
}

export class WorkerCell<M> implements ChildCell, ParentCell {
  readonly lifecycle = new StateMachine();
  readonly ref: LocalWorkerRef<M>;
  readonly path: string;
  private readonly dispatch: Dispatch;
  private readonly children = new Map<string, ChildCell>();
  private mailbox: Envelope<M>[] = [];
  private scheduled = false;
  private behavior: WorkerBehavior<M> | undefined;

  constructor(
    readonly system: WorkerSystem,
    private readonly spec: WorkerSpec<M>,
    readonly name: string,
    parentPath: string,
    private readonly parent?: ParentCell,
  ) {
    this.path = `${parentPath}/${name}`;
    this.dispatch = system.dispatcherFor(spec.dispatcher);
    this.ref = new LocalWorkerRef(this);
  }

  /**
   * Build the behavior and run its preStart hook
   */
  start(): void {
    if (!this.lifecycle.is(WorkerStates.STARTING)) return;
    const context: WorkerContext<M> = {
      self: this.ref,
      system: this.system,
      spawn: (spec, name) => this.attachChild(spec, name),
      stop: () => this.stop(),
    };
    try {
      this.behavior = this.spec.create(context);
      const started = this.behavior.preStart?.();
      if (started instanceof Promise) {
        void started.then(
          () => this.becomeReady(),
          (error: unknown) => this.fail(toError(error)),
        );
      } else {
        this.becomeReady();
      }
    } catch (error) {
      this.fail(toError(error));
    }
  }

  /**
   * Start this cell on its dispatcher instead of the calling context
   */
  startDeferred(): void {
    this.dispatch(() => this.start());
  }

  private becomeReady(): void {
    if (!this.lifecycle.transition(WorkerStates.READY)) return;
    this.system.events.emit({ type: "WORKER_CREATED", path: this.path });
    if (this.mailbox.length > 0) this.schedule();
  }

  enqueue(message: M, sender: Recipient<unknown> | undefined): void {
    // Messages to stopped workers are dropped
    if (this.lifecycle.isTerminal()) return;
    this.mailbox.push({ message, sender });
    if (this.lifecycle.is(WorkerStates.READY)) this.schedule();
  }

  private schedule(): void {
    if (this.scheduled) return;
    this.scheduled = true;
    this.dispatch(() => this.run());
  }

  private run(): void {
    this.scheduled = false;
    let processed = 0;
    while (
      processed < THROUGHPUT &&
      this.mailbox.length > 0 &&
      this.lifecycle.is(WorkerStates.READY)
    ) {
      const envelope = this.mailbox.shift();
      if (!envelope || !this.behavior) break;
      processed++;
      try {
        this.behavior.receive(envelope.message, envelope.sender);
      } catch (error) {
        this.fail(toError(error));
        return;
      }
    }
    if (this.mailbox.length > 0 && this.lifecycle.is(WorkerStates.READY)) {
      this.schedule();
    }
  }

  attachChild<C>(spec: WorkerSpec<C>, name: string): LocalWorkerRef<C> {
    const child = this.newChild(spec, name);
    child.start();
    return child.ref;
  }

  /**
   * Top-level variant of attachChild: the child starts asynchronously, so
   * its handle is returned while it is still starting.
   */
  attachChildDeferred<C>(spec: WorkerSpec<C>, name: string): LocalWorkerRef<C> {
    const child = this.newChild(spec, name);
    child.startDeferred();
    return child.ref;
  }

  private newChild<C>(spec: WorkerSpec<C>, name: string): WorkerCell<C> {
    if (this.lifecycle.isTerminal()) {
      throw new FlowError(`Cannot create "${name}": ${this.path} is stopped`, {
        code: FlowErrorCodes.WORKER_TERMINATED,
        worker: this.path,
      });
    }
    if (name.length === 0 || name.includes("/")) {
      throw new FlowError(`Invalid worker name "${name}"`, {
        code: FlowErrorCodes.INVALID_WORKER_NAME,
        worker: this.path,
      });
    }
    if (this.children.has(name)) {
      throw new FlowError(
        `Worker name "${name}" is not unique under ${this.path}`,
        { code: FlowErrorCodes.DUPLICATE_WORKER_NAME, worker: this.path },
      );
    }
    const child = new WorkerCell(this.system, spec, name, this.path, this);
    this.children.set(name, child);
    return child;
  }

  childNames(): string[] {
    return [...this.children.keys()];
  }

  removeChild(name: string): void {
    this.children.delete(name);
  }

  stop(): void {
    if (this.lifecycle.isTerminal()) return;
    for (const child of [...this.children.values()]) {
      child.stop();
    }
    this.lifecycle.transition(WorkerStates.STOPPED);
    this.mailbox = [];
    try {
      this.behavior?.postStop?.();
    } catch (error) {
      this.system.events.emit({
        type: "WORKER_FAILED",
        path: this.path,
        message: toError(error).message,
      });
    }
    this.parent?.removeChild(this.name);
    this.system.events.emit({ type: "WORKER_STOPPED", path: this.path });
  }

  private fail(error: Error): void {
    this.system.events.emit({
      type: "WORKER_FAILED",
      path: this.path,
      message: error.message,
    });
    this.stop();
  }
}

/**
 * Handle to a worker in this process
 */
export class LocalWorkerRef<M> implements Recipient<M> {
  readonly locality = "local" as const;

  constructor(private readonly cell: WorkerCell<M>) {}

  get name(): string {
    return this.cell.name;
  }

  get path(): string {
    return this.cell.path;
  }

  tell(message: M, sender?: Recipient<unknown>): void {
    this.cell.enqueue(message, sender);
  }

  /**
   * Whether the worker finished starting and can take children directly
   */
  isStarted(): boolean {
    return this.cell.lifecycle.is(WorkerStates.READY);
  }

  isTerminated(): boolean {
    return this.cell.lifecycle.isTerminal();
  }

  state(): WorkerState {
    return this.cell.lifecycle.get();
  }

  /**
   * Create a child of this worker from outside of it. Only safe once the
   * worker is started.
   */
  attachChild<C>(spec: WorkerSpec<C>, name: string): LocalWorkerRef<C> {
    return this.cell.attachChild(spec, name);
  }

  /**
   * Names of live children
   */
  children(): string[] {
    return this.cell.childNames();
  }

  stop(): void {
    this.cell.stop();
  }

  toString(): string {
    return `LocalWorkerRef(${this.path})`;
  }
}
