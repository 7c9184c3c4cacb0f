// In-process publishers that back the built-in sources

import type { Publisher, Subscriber, Subscription } from "../types/reactive";
import { CancelledSubscription } from "../types/reactive";
import { FlowError, FlowErrorCodes, toError } from "../utils/errors";

function invalidDemand(n: number): FlowError {
  return new FlowError(`Requested elements must be positive, was ${n}`, {
    code: FlowErrorCodes.SPEC_VIOLATION,
  });
}

class IterableSubscription<T> implements Subscription {
  private demand = 0;
  private emitting = false;
  private done = false;

  constructor(
    private readonly iterator: Iterator<T>,
    private readonly subscriber: Subscriber<T>,
  ) {}

  request(n: number): void {
    if (this.done) return;
    if (!Number.isInteger(n) || n <= 0) {
      this.finish();
      this.subscriber.onError(invalidDemand(n));
      return;
    }
    this.demand = Math.min(this.demand + n, Number.MAX_SAFE_INTEGER);
    // Re-entrant requests from onNext only raise demand; the outer loop
    // keeps emitting.
    if (this.emitting) return;
    this.emitting = true;
    try {
      while (this.demand > 0 && !this.done) {
        let next: IteratorResult<T>;
        try {
          next = this.iterator.next();
        } catch (error) {
          this.done = true;
          this.subscriber.onError(toError(error));
          return;
        }
        if (next.done) {
          this.done = true;
          this.subscriber.onComplete();
          return;
        }
        this.demand--;
        this.subscriber.onNext(next.value);
      }
    } finally {
      this.emitting = false;
    }
  }

  cancel(): void {
    this.finish();
  }

  private finish(): void {
    if (this.done) return;
    this.done = true;
    this.iterator.return?.();
  }
}

/**
 * Emits the elements of an iterable; every subscriber gets a fresh iterator
 */
export class IterablePublisher<T> implements Publisher<T> {
  constructor(private readonly iterable: Iterable<T>) {}

  subscribe(subscriber: Subscriber<T>): void {
    let iterator: Iterator<T>;
    try {
      iterator = this.iterable[Symbol.iterator]();
    } catch (error) {
      subscriber.onSubscribe(CancelledSubscription);
      subscriber.onError(toError(error));
      return;
    }
    subscriber.onSubscribe(new IterableSubscription(iterator, subscriber));
  }
}

/**
 * Emits the value of a promise once there is demand, then completes
 */
export class PromisePublisher<T> implements Publisher<T> {
  constructor(private readonly promise: Promise<T>) {}

  subscribe(subscriber: Subscriber<T>): void {
    let requested = false;
    let cancelled = false;
    subscriber.onSubscribe({
      request: (n) => {
        if (cancelled || requested) return;
        if (!Number.isInteger(n) || n <= 0) {
          cancelled = true;
          subscriber.onError(invalidDemand(n));
          return;
        }
        requested = true;
        void this.promise.then(
          (value) => {
            if (cancelled) return;
            subscriber.onNext(value);
            subscriber.onComplete();
          },
          (error: unknown) => {
            if (!cancelled) subscriber.onError(toError(error));
          },
        );
      },
      cancel: () => {
        cancelled = true;
      },
    });
  }
}
