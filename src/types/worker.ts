// Worker runtime types

import type { LocalWorkerRef } from "../runtime/worker";
import type { WorkerSystem } from "../runtime/system";

/**
 * Schedules a task on an execution context
 */
export type Dispatch = (task: () => void) => void;

/**
 * Anything that can receive messages: worker handles and ask reply targets
 */
export interface Recipient<M> {
  readonly path: string;
  tell(message: M, sender?: Recipient<unknown>): void;
}

/**
 * Handle to a worker living in another process. The runtime never creates
 * one, but containers of this kind can be handed to a materializer.
 */
export interface RemoteWorkerRef<M = unknown> extends Recipient<M> {
  readonly locality: "remote";
  readonly name: string;
}

/**
 * Handle to a running worker, distinguished by where it lives
 */
export type WorkerRef<M = unknown> = LocalWorkerRef<M> | RemoteWorkerRef<M>;

/**
 * What a worker sees of its own cell
 */
export interface WorkerContext<M> {
  readonly self: LocalWorkerRef<M>;
  readonly system: WorkerSystem;

  /**
   * Create a child worker under `name`
   */
  spawn<C>(spec: WorkerSpec<C>, name: string): LocalWorkerRef<C>;

  /**
   * Stop this worker and all its children
   */
  stop(): void;
}

/**
 * Message-driven behavior of a worker. Messages are delivered one at a time,
 * never concurrently.
 */
export interface WorkerBehavior<M> {
  /**
   * Runs before the first message. The worker stays in the starting state
   * until a returned promise resolves.
   */
  preStart?(): void | Promise<void>;

  receive(message: M, sender: Recipient<unknown> | undefined): void;

  postStop?(): void;
}

/**
 * Recipe for a worker: the behavior factory plus the dispatcher it runs on
 */
export interface WorkerSpec<M> {
  create(context: WorkerContext<M>): WorkerBehavior<M>;
  readonly dispatcher?: string;
}
