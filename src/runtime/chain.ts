// Chain Builder

import type { StageDescriptor } from "../types/ast";
import type { Processor, Subscriber } from "../types/reactive";
import type { EventDispatcher } from "./event-dispatcher";
import type { Activate } from "./activator";

export interface BuildChainOptions {
  readonly flowName: string;
  /**
   * Index given to the first of `remaining`; counts down by one per stage
   */
  readonly startIndex: number;
  readonly activate: Activate;
  readonly events?: EventDispatcher;
}

/**
 * Activate `remaining` (nearest-to-sink first) and wire each new worker
 * upstream of the current tail. Returns the most upstream subscriber, which
 * is `last` itself when nothing remains.
 */
export async function buildChain(
  last: Processor<unknown, unknown>,
  remaining: readonly StageDescriptor[],
  { flowName, startIndex, activate, events }: BuildChainOptions,
): Promise<Subscriber<unknown>> {
  let tail = last;
  let index = startIndex;
  for (const stage of remaining) {
    const upstream = await activate<unknown, unknown>(stage, flowName, index);
    index--;
    upstream.subscribe(tail);
    events?.emit({
      type: "WORKER_SUBSCRIBED",
      flowName,
      upstream: label(upstream),
      downstream: label(tail),
    });
    tail = upstream;
  }
  return tail;
}

function label(processor: Processor<unknown, unknown>): string {
  return "path" in processor && typeof processor.path === "string"
    ? processor.path
    : String(processor);
}
