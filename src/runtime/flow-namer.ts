// Pipeline naming

/**
 * Monotonic counter. A worker system owns one per scope; every materializer
 * of that system draws pipeline names from the same one.
 */
export class FlowNameCounter {
  private value = 0;

  next(): number {
    return ++this.value;
  }

  current(): number {
    return this.value;
  }
}

export function createFlowName(
  prefix: string,
  counter: FlowNameCounter,
): string {
  return `${prefix}-${counter.next()}`;
}
