// Demand-driven streaming protocol shared by every worker and endpoint

/**
 * Handle a subscriber uses to signal demand to its publisher.
 */
export interface Subscription {
  /**
   * Ask for up to `n` more elements. `n` must be positive.
   */
  request(n: number): void;

  /**
   * Stop the flow of elements. Idempotent.
   */
  cancel(): void;
}

/**
 * Receives elements only after it has requested them.
 */
export interface Subscriber<T> {
  onSubscribe(subscription: Subscription): void;
  onNext(element: T): void;
  onError(error: Error): void;
  onComplete(): void;
}

/**
 * Emits elements to subscribers that signal demand.
 */
export interface Publisher<T> {
  subscribe(subscriber: Subscriber<T>): void;
}

/**
 * A stage that is both a subscriber (upstream side) and a publisher
 * (downstream side).
 */
export interface Processor<I, O> extends Subscriber<I>, Publisher<O> {}

/**
 * Subscription that ignores every signal. Handed to subscribers that are
 * rejected before any element could flow.
 */
export const CancelledSubscription: Subscription = Object.freeze({
  request: () => {},
  cancel: () => {},
});
