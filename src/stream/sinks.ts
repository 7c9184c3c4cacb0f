/**
 * Built-in sinks
 *
 * Sinks that drive demand themselves are active: with no stages in between,
 * a passive source can feed their subscriber directly.
 */

import type {
  FlowMaterializer,
  SimpleSink,
  SinkWithKey,
} from "../types/endpoints";
import { EndpointKinds } from "../types/endpoints";
import type { Publisher, Subscriber } from "../types/reactive";
import {
  BlackholeSubscriber,
  FoldSubscriber,
  ForeachSubscriber,
} from "./subscribers";
import { identityStage } from "./transformers";

/**
 * Wraps an existing subscriber
 */
export class SubscriberSink<T> implements SimpleSink<T> {
  readonly kind = EndpointKinds.SIMPLE_SINK;
  readonly isActive = true;

  constructor(private readonly subscriber: Subscriber<T>) {}

  attach(flowPublisher: Publisher<T>): void {
    flowPublisher.subscribe(this.subscriber);
  }

  create(): Subscriber<T> {
    return this.subscriber;
  }
}

/**
 * Requests and discards everything
 */
export class BlackholeSink<T> implements SimpleSink<T> {
  readonly kind = EndpointKinds.SIMPLE_SINK;
  readonly isActive = false;

  attach(flowPublisher: Publisher<T>, materializer: FlowMaterializer): void {
    flowPublisher.subscribe(this.create(materializer));
  }

  create(materializer: FlowMaterializer): Subscriber<T> {
    return new BlackholeSubscriber<T>(
      materializer.settings.maximumInputBufferSize,
    );
  }
}

function isPromise(value: unknown): value is Promise<never> {
  return value instanceof Promise;
}

/**
 * Calls `fn` for every element. Materializes to a promise that settles when
 * the stream completes or fails.
 */
export class ForeachSink<T> implements SinkWithKey<T, Promise<void>> {
  readonly kind = EndpointKinds.SINK_WITH_KEY;
  readonly isActive = true;

  constructor(private readonly fn: (element: T) => void) {}

  attach(
    flowPublisher: Publisher<T>,
    materializer: FlowMaterializer,
  ): Promise<void> {
    const [subscriber, completion] = this.create(materializer);
    flowPublisher.subscribe(subscriber);
    return completion;
  }

  create(materializer: FlowMaterializer): [Subscriber<T>, Promise<void>] {
    const subscriber = new ForeachSubscriber(
      this.fn,
      materializer.settings.maximumInputBufferSize,
    );
    return [subscriber, subscriber.completion];
  }

  isMaterializedValue(value: unknown): value is Promise<void> {
    return isPromise(value);
  }
}

/**
 * Folds every element into an accumulator. Materializes to a promise of the
 * final value.
 */
export class FoldSink<T, U> implements SinkWithKey<T, Promise<U>> {
  readonly kind = EndpointKinds.SINK_WITH_KEY;
  readonly isActive = true;

  constructor(
    private readonly zero: U,
    private readonly f: (acc: U, element: T) => U,
  ) {}

  attach(
    flowPublisher: Publisher<T>,
    materializer: FlowMaterializer,
  ): Promise<U> {
    const [subscriber, result] = this.create(materializer);
    flowPublisher.subscribe(subscriber);
    return result;
  }

  create(materializer: FlowMaterializer): [Subscriber<T>, Promise<U>] {
    const subscriber = new FoldSubscriber(
      this.zero,
      this.f,
      materializer.settings.maximumInputBufferSize,
    );
    return [subscriber, subscriber.completion];
  }

  isMaterializedValue(value: unknown): value is Promise<U> {
    return isPromise(value);
  }
}

/**
 * Materializes to the pipeline's output publisher, for the caller to
 * subscribe to
 */
export class PublisherSink<T> implements SinkWithKey<T, Publisher<T>> {
  readonly kind = EndpointKinds.SINK_WITH_KEY;
  readonly isActive = false;

  attach(flowPublisher: Publisher<T>): Publisher<T> {
    return flowPublisher;
  }

  async create(
    materializer: FlowMaterializer,
  ): Promise<[Subscriber<T>, Publisher<T>]> {
    const identity = await materializer.materializeProcessor<T, T>(
      identityStage,
    );
    return [identity, identity];
  }

  isMaterializedValue(value: unknown): value is Publisher<T> {
    return (
      typeof value === "object" &&
      value !== null &&
      "subscribe" in value &&
      typeof value.subscribe === "function"
    );
  }
}
