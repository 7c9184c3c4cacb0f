/**
 * Built-in sources
 *
 * Passive sources need a chain (or an identity worker) in front of the sink;
 * active ones can hand their publisher straight to the sink.
 */

import type {
  FlowMaterializer,
  SimpleSource,
  SourceWithKey,
} from "../types/endpoints";
import { EndpointKinds } from "../types/endpoints";
import type { Publisher, Subscriber } from "../types/reactive";
import { IterablePublisher, PromisePublisher } from "./publishers";
import { identityStage } from "./transformers";

/**
 * Emits the elements of an iterable. Each materialization iterates afresh.
 */
export class IterableSource<T> implements SimpleSource<T> {
  readonly kind = EndpointKinds.SIMPLE_SOURCE;
  readonly isActive = false;

  constructor(private readonly iterable: Iterable<T>) {}

  attach(flowSubscriber: Subscriber<T>): void {
    this.create().subscribe(flowSubscriber);
  }

  create(): Publisher<T> {
    return new IterablePublisher(this.iterable);
  }
}

/**
 * Emits the value of a promise, or fails with its rejection
 */
export class PromiseSource<T> implements SimpleSource<T> {
  readonly kind = EndpointKinds.SIMPLE_SOURCE;
  readonly isActive = false;

  constructor(private readonly promise: Promise<T>) {}

  attach(flowSubscriber: Subscriber<T>): void {
    this.create().subscribe(flowSubscriber);
  }

  create(): Publisher<T> {
    return new PromisePublisher(this.promise);
  }
}

/**
 * Wraps an existing publisher, which already drives itself
 */
export class PublisherSource<T> implements SimpleSource<T> {
  readonly kind = EndpointKinds.SIMPLE_SOURCE;
  readonly isActive = true;

  constructor(private readonly publisher: Publisher<T>) {}

  attach(flowSubscriber: Subscriber<T>): void {
    this.publisher.subscribe(flowSubscriber);
  }

  create(): Publisher<T> {
    return this.publisher;
  }
}

/**
 * Materializes to the subscriber that feeds the pipeline; the caller
 * subscribes it to a publisher of its choosing.
 */
export class SubscriberSource<T>
  implements SourceWithKey<T, Subscriber<T>>
{
  readonly kind = EndpointKinds.SOURCE_WITH_KEY;
  readonly isActive = false;

  attach(flowSubscriber: Subscriber<T>): Subscriber<T> {
    return flowSubscriber;
  }

  async create(
    materializer: FlowMaterializer,
  ): Promise<[Publisher<T>, Subscriber<T>]> {
    const identity = await materializer.materializeProcessor<T, T>(
      identityStage,
    );
    return [identity, identity];
  }

  isMaterializedValue(value: unknown): value is Subscriber<T> {
    return (
      typeof value === "object" &&
      value !== null &&
      "onSubscribe" in value &&
      "onNext" in value &&
      "onError" in value &&
      "onComplete" in value
    );
  }
}
