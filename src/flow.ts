/**
 * Flow builder
 *
 * Immutable, typed description of a linear pipeline. Each operator returns a
 * new Flow; nothing runs until `runWith` hands the stages to a materializer.
 *
 * @example
 * ```typescript
 * const flow = Flow.create<number>()
 *   .map((n) => n * 2)
 *   .filter((n) => n > 2);
 *
 * const sum = new FoldSink(0, (acc: number, n: number) => acc + n);
 * const run = await flow.runWith(new IterableSource([1, 2, 3]), sum, materializer);
 * await run.getSinkFor(sum); // 10
 * ```
 */

import {
  transform,
  type StageDescriptor,
  type TransformerFactory,
} from "./types/ast";
import type { FlowMaterializer, Sink, Source } from "./types/endpoints";
import type { MaterializedFlow } from "./runtime/materialized-flow";
import {
  dropTransformer,
  filterTransformer,
  groupedTransformer,
  mapConcatTransformer,
  mapTransformer,
  scanTransformer,
  takeTransformer,
} from "./stream/transformers";

export class Flow<In, Out> {
  /**
   * Stages nearest the sink first
   */
  readonly ops: readonly StageDescriptor[];

  private constructor(ops: readonly StageDescriptor[]) {
    this.ops = Object.freeze([...ops]);
  }

  static create<T>(): Flow<T, T> {
    return new Flow<T, T>([]);
  }

  /**
   * Append a stage built from `mkTransformer`
   */
  transform<U>(
    name: string,
    mkTransformer: TransformerFactory<Out, U>,
  ): Flow<In, U> {
    return new Flow<In, U>([transform(name, mkTransformer), ...this.ops]);
  }

  map<U>(f: (element: Out) => U): Flow<In, U> {
    return this.transform("map", () => mapTransformer(f));
  }

  filter(predicate: (element: Out) => boolean): Flow<In, Out> {
    return this.transform("filter", () => filterTransformer(predicate));
  }

  mapConcat<U>(f: (element: Out) => Iterable<U>): Flow<In, U> {
    return this.transform("mapConcat", () => mapConcatTransformer(f));
  }

  /**
   * Pass the first `n` elements, then complete and cancel upstream
   */
  take(n: number): Flow<In, Out> {
    return this.transform("take", () => takeTransformer<Out>(n));
  }

  drop(n: number): Flow<In, Out> {
    return this.transform("drop", () => dropTransformer<Out>(n));
  }

  grouped(size: number): Flow<In, Out[]> {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`grouped size must be a positive integer, was ${size}`);
    }
    return this.transform("grouped", () => groupedTransformer<Out>(size));
  }

  scan<U>(zero: U, f: (acc: U, element: Out) => U): Flow<In, U> {
    return this.transform("scan", () => scanTransformer(zero, f));
  }

  runWith(
    source: Source<In>,
    sink: Sink<Out>,
    materializer: FlowMaterializer,
  ): Promise<MaterializedFlow> {
    return materializer.materialize(source, sink, this.ops);
  }
}
