// Result of materializing a pipeline

import type {
  Sink,
  SinkWithKey,
  Source,
  SourceWithKey,
} from "../types/endpoints";
import { FlowError, FlowErrorCodes } from "../utils/errors";

/**
 * Pairs the source and sink with the values they produced when the pipeline
 * was materialized. Simple endpoints produce `undefined`.
 *
 * Dropping this record has no effect on the running workers; their lifetime
 * is driven by completion, cancellation and errors.
 */
export class MaterializedFlow {
  constructor(
    readonly source: Source<unknown>,
    readonly sourceValue: unknown,
    readonly sink: Sink<unknown>,
    readonly sinkValue: unknown,
  ) {}

  /**
   * Materialized value of `source`, which must be this flow's source
   */
  getSourceFor<V>(source: SourceWithKey<unknown, V>): V {
    if (source !== this.source || !source.isMaterializedValue(this.sourceValue)) {
      throw keyMismatch("Source");
    }
    return this.sourceValue;
  }

  /**
   * Materialized value of `sink`, which must be this flow's sink
   */
  getSinkFor<V>(sink: SinkWithKey<unknown, V>): V {
    if (sink !== this.sink || !sink.isMaterializedValue(this.sinkValue)) {
      throw keyMismatch("Sink");
    }
    return this.sinkValue;
  }
}

function keyMismatch(role: "Source" | "Sink"): FlowError {
  return new FlowError(`${role} was not materialized in this flow`, {
    code: FlowErrorCodes.KEY_MISMATCH,
    metadata: { role },
  });
}
