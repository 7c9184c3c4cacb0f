// Processor facade over a stage worker

import type {
  Processor,
  Subscriber,
  Subscription,
} from "../types/reactive";
import type { Recipient } from "../types/worker";

/**
 * Protocol signals, turned into messages so a worker processes them one at
 * a time
 */
export type ProcessorMessage =
  | { readonly type: "onSubscribe"; readonly subscription: Subscription }
  | { readonly type: "onNext"; readonly element: unknown }
  | { readonly type: "onError"; readonly error: Error }
  | { readonly type: "onComplete" }
  | { readonly type: "subscribe"; readonly subscriber: Subscriber<unknown> }
  | { readonly type: "request"; readonly n: number }
  | { readonly type: "cancel" };

/**
 * Exposes a stage worker as a Processor: upstream signals and downstream
 * subscriptions are forwarded to the worker's mailbox.
 */
export class WorkerProcessor<I, O> implements Processor<I, O> {
  constructor(readonly worker: Recipient<ProcessorMessage>) {}

  get path(): string {
    return this.worker.path;
  }

  onSubscribe(subscription: Subscription): void {
    this.worker.tell({ type: "onSubscribe", subscription });
  }

  onNext(element: I): void {
    this.worker.tell({ type: "onNext", element });
  }

  onError(error: Error): void {
    this.worker.tell({ type: "onError", error });
  }

  onComplete(): void {
    this.worker.tell({ type: "onComplete" });
  }

  subscribe(subscriber: Subscriber<O>): void {
    this.worker.tell({ type: "subscribe", subscriber });
  }

  toString(): string {
    return `WorkerProcessor(${this.path})`;
  }
}

/**
 * Subscription handed downstream by a stage worker
 */
export function workerSubscription(
  worker: Recipient<ProcessorMessage>,
): Subscription {
  return {
    request: (n) => worker.tell({ type: "request", n }),
    cancel: () => worker.tell({ type: "cancel" }),
  };
}
