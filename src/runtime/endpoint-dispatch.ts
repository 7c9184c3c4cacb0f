/**
 * Endpoint Dispatcher
 *
 * Capability dispatch over the four endpoint kinds. Simple endpoints yield
 * `undefined` as their materialized value; keyed endpoints yield theirs.
 * Any other kind is an UNKNOWN_ENDPOINT_TYPE error.
 */

import {
  EndpointKinds,
  type FlowMaterializer,
  type Sink,
  type Source,
} from "../types/endpoints";
import type { Publisher, Subscriber } from "../types/reactive";
import { unknownEndpointType } from "../utils/errors";

export function isActiveSource(source: Source<unknown>): boolean {
  switch (source.kind) {
    case EndpointKinds.SIMPLE_SOURCE:
    case EndpointKinds.SOURCE_WITH_KEY:
      return source.isActive;
    default:
      throw unknownEndpointType("Source", source);
  }
}

export function isActiveSink(sink: Sink<unknown>): boolean {
  switch (sink.kind) {
    case EndpointKinds.SIMPLE_SINK:
    case EndpointKinds.SINK_WITH_KEY:
      return sink.isActive;
    default:
      throw unknownEndpointType("Sink", sink);
  }
}

/**
 * Feed `flowSubscriber` from `source`. Synchronous, so a keyed value that is
 * a promise reaches the caller unresolved.
 */
export function attachSource<Out>(
  source: Source<Out>,
  flowSubscriber: Subscriber<Out>,
  materializer: FlowMaterializer,
  flowName: string,
): unknown {
  switch (source.kind) {
    case EndpointKinds.SIMPLE_SOURCE:
      source.attach(flowSubscriber, materializer, flowName);
      return undefined;
    case EndpointKinds.SOURCE_WITH_KEY:
      return source.attach(flowSubscriber, materializer, flowName);
    default:
      throw unknownEndpointType("Source", source, flowName);
  }
}

/**
 * Drain `flowPublisher` into `sink`
 */
export function attachSink<In>(
  sink: Sink<In>,
  flowPublisher: Publisher<In>,
  materializer: FlowMaterializer,
  flowName: string,
): unknown {
  switch (sink.kind) {
    case EndpointKinds.SIMPLE_SINK:
      sink.attach(flowPublisher, materializer, flowName);
      return undefined;
    case EndpointKinds.SINK_WITH_KEY:
      return sink.attach(flowPublisher, materializer, flowName);
    default:
      throw unknownEndpointType("Sink", sink, flowName);
  }
}

/**
 * Let an active source produce its own publisher
 */
export async function createSource<Out>(
  source: Source<Out>,
  materializer: FlowMaterializer,
  flowName: string,
): Promise<[Publisher<Out>, unknown]> {
  switch (source.kind) {
    case EndpointKinds.SIMPLE_SOURCE:
      return [await source.create(materializer, flowName), undefined];
    case EndpointKinds.SOURCE_WITH_KEY:
      return source.create(materializer, flowName);
    default:
      throw unknownEndpointType("Source", source, flowName);
  }
}

/**
 * Let an active sink produce its own subscriber
 */
export async function createSink<In>(
  sink: Sink<In>,
  materializer: FlowMaterializer,
  flowName: string,
): Promise<[Subscriber<In>, unknown]> {
  switch (sink.kind) {
    case EndpointKinds.SIMPLE_SINK:
      return [await sink.create(materializer, flowName), undefined];
    case EndpointKinds.SINK_WITH_KEY:
      return sink.create(materializer, flowName);
    default:
      throw unknownEndpointType("Sink", sink, flowName);
  }
}
