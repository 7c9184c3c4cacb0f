// In-process subscribers that back the built-in sinks

import type { Subscriber, Subscription } from "../types/reactive";
import { deferred, type Deferred } from "../utils/timers";
import { toError } from "../utils/errors";

/**
 * Requests elements in batches of `batchSize` and re-requests whenever a
 * batch has been fully received
 */
abstract class BatchingSubscriber<T> implements Subscriber<T> {
  private subscription: Subscription | undefined;
  private outstanding = 0;
  private done = false;

  constructor(private readonly batchSize: number) {}

  onSubscribe(subscription: Subscription): void {
    if (this.subscription || this.done) {
      subscription.cancel();
      return;
    }
    this.subscription = subscription;
    this.requestBatch();
  }

  onNext(element: T): void {
    if (this.done) return;
    this.outstanding--;
    try {
      this.handleNext(element);
    } catch (error) {
      this.done = true;
      this.subscription?.cancel();
      this.handleError(toError(error));
      return;
    }
    if (this.outstanding === 0) this.requestBatch();
  }

  onError(error: Error): void {
    if (this.done) return;
    this.done = true;
    this.handleError(error);
  }

  onComplete(): void {
    if (this.done) return;
    this.done = true;
    this.handleComplete();
  }

  private requestBatch(): void {
    this.outstanding = this.batchSize;
    this.subscription?.request(this.batchSize);
  }

  protected abstract handleNext(element: T): void;
  protected abstract handleError(error: Error): void;
  protected abstract handleComplete(): void;
}

/**
 * Failures still reach whoever awaits `completion`. A materialized flow may
 * be dropped without anyone awaiting it, and that must not crash the process.
 */
function markHandled(promise: Promise<unknown>): void {
  void promise.catch(() => {
    // Observed through `completion`
  });
}

/**
 * Calls `fn` for every element; `completion` settles when the stream ends
 */
export class ForeachSubscriber<T> extends BatchingSubscriber<T> {
  private readonly result: Deferred<void> = deferred<void>();

  constructor(
    private readonly fn: (element: T) => void,
    batchSize: number,
  ) {
    super(batchSize);
    markHandled(this.result.promise);
  }

  get completion(): Promise<void> {
    return this.result.promise;
  }

  protected handleNext(element: T): void {
    this.fn(element);
  }

  protected handleError(error: Error): void {
    this.result.reject(error);
  }

  protected handleComplete(): void {
    this.result.resolve();
  }
}

/**
 * Folds every element into an accumulator; `completion` resolves with the
 * final value
 */
export class FoldSubscriber<T, U> extends BatchingSubscriber<T> {
  private readonly result: Deferred<U> = deferred<U>();
  private acc: U;

  constructor(
    zero: U,
    private readonly f: (acc: U, element: T) => U,
    batchSize: number,
  ) {
    super(batchSize);
    this.acc = zero;
    markHandled(this.result.promise);
  }

  get completion(): Promise<U> {
    return this.result.promise;
  }

  protected handleNext(element: T): void {
    this.acc = this.f(this.acc, element);
  }

  protected handleError(error: Error): void {
    this.result.reject(error);
  }

  protected handleComplete(): void {
    this.result.resolve(this.acc);
  }
}

/**
 * Consumes and discards every element
 */
export class BlackholeSubscriber<T> extends BatchingSubscriber<T> {
  protected handleNext(): void {}

  protected handleError(): void {}

  protected handleComplete(): void {}
}
