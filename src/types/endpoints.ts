// Source and sink capabilities, and the materializer contract they use

import type { StageDescriptor } from "./ast";
import type { Processor, Publisher, Subscriber } from "./reactive";
import type { MaterializerSettings } from "./settings";
import type { MaterializedFlow } from "../runtime/materialized-flow";

export type Awaitable<T> = T | Promise<T>;

export const EndpointKinds = {
  SIMPLE_SOURCE: "simpleSource",
  SOURCE_WITH_KEY: "sourceWithKey",
  SIMPLE_SINK: "simpleSink",
  SINK_WITH_KEY: "sinkWithKey",
} as const;

export type EndpointKind = (typeof EndpointKinds)[keyof typeof EndpointKinds];

/**
 * What endpoints may call back into while being attached or created
 */
export interface FlowMaterializer {
  readonly settings: MaterializerSettings;

  /**
   * Wire `source`, the stages and `sink` into a running chain. `ops` comes
   * in reverse order: the first element is the stage nearest the sink.
   */
  materialize<In, Out>(
    source: Source<In>,
    sink: Sink<Out>,
    ops: readonly StageDescriptor[],
  ): Promise<MaterializedFlow>;

  /**
   * Turn a single stage into a standalone processor
   */
  materializeProcessor<I, O>(stage: StageDescriptor): Promise<Processor<I, O>>;

  /**
   * Copy of this materializer that names pipelines with another prefix
   */
  withNamePrefix(name: string): FlowMaterializer;
}

interface EndpointBase {
  /**
   * An active endpoint can stand on its own: `create` yields a ready
   * publisher or subscriber without any chain in front of it.
   */
  readonly isActive: boolean;
}

/**
 * Source without a materialized value
 */
export interface SimpleSource<Out> extends EndpointBase {
  readonly kind: typeof EndpointKinds.SIMPLE_SOURCE;

  /**
   * Feed `flowSubscriber`, the head of a chain
   */
  attach(
    flowSubscriber: Subscriber<Out>,
    materializer: FlowMaterializer,
    flowName: string,
  ): void;

  create(
    materializer: FlowMaterializer,
    flowName: string,
  ): Awaitable<Publisher<Out>>;
}

/**
 * Source that yields a value of type `V` to the caller when materialized
 */
export interface SourceWithKey<Out, V> extends EndpointBase {
  readonly kind: typeof EndpointKinds.SOURCE_WITH_KEY;

  /**
   * Feed `flowSubscriber` and return the value synchronously. `V` may itself
   * be a promise, which stays unresolved.
   */
  attach(
    flowSubscriber: Subscriber<Out>,
    materializer: FlowMaterializer,
    flowName: string,
  ): V;

  create(
    materializer: FlowMaterializer,
    flowName: string,
  ): Awaitable<[Publisher<Out>, V]>;

  /**
   * Recognizes this source's materialized values
   */
  isMaterializedValue(value: unknown): value is V;
}

/**
 * Sink without a materialized value
 */
export interface SimpleSink<In> extends EndpointBase {
  readonly kind: typeof EndpointKinds.SIMPLE_SINK;

  /**
   * Drain `flowPublisher`, the tail of a chain
   */
  attach(
    flowPublisher: Publisher<In>,
    materializer: FlowMaterializer,
    flowName: string,
  ): void;

  create(
    materializer: FlowMaterializer,
    flowName: string,
  ): Awaitable<Subscriber<In>>;
}

/**
 * Sink that yields a value of type `V` to the caller when materialized
 */
export interface SinkWithKey<In, V> extends EndpointBase {
  readonly kind: typeof EndpointKinds.SINK_WITH_KEY;

  /**
   * Drain `flowPublisher` and return the value synchronously
   */
  attach(
    flowPublisher: Publisher<In>,
    materializer: FlowMaterializer,
    flowName: string,
  ): V;

  create(
    materializer: FlowMaterializer,
    flowName: string,
  ): Awaitable<[Subscriber<In>, V]>;

  /**
   * Recognizes this sink's materialized values
   */
  isMaterializedValue(value: unknown): value is V;
}

export type Source<Out> = SimpleSource<Out> | SourceWithKey<Out, unknown>;

export type Sink<In> = SimpleSink<In> | SinkWithKey<In, unknown>;
