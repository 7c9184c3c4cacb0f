// Tests for the Flow builder

import { describe, it, expect, afterEach, beforeEach } from "vitest";
import { Flow } from "../src/flow";
import { WorkerSystem } from "../src/runtime/system";
import { WorkerFlowMaterializer } from "../src/runtime/materializer";
import { IterableSource } from "../src/stream/sources";
import { FoldSink } from "../src/stream/sinks";

function collect<T>(): FoldSink<T, T[]> {
  return new FoldSink<T, T[]>([], (acc, element) => [...acc, element]);
}

describe("Flow builder", () => {
  it("should start with no stages", () => {
    expect(Flow.create<number>().ops).toEqual([]);
  });

  it("should keep the stage nearest the sink first", () => {
    const flow = Flow.create<number>()
      .map((n) => n * 2)
      .filter((n) => n > 2)
      .take(3);
    expect(flow.ops.map((op) => op.name)).toEqual(["take", "filter", "map"]);
  });

  it("should leave the original flow untouched", () => {
    const base = Flow.create<number>().map((n) => n + 1);
    const longer = base.drop(1);

    expect(base.ops).toHaveLength(1);
    expect(longer.ops).toHaveLength(2);
    expect(longer.ops[1]).toBe(base.ops[0]);
    expect(Object.isFrozen(longer.ops)).toBe(true);
  });

  it("should name custom stages", () => {
    const flow = Flow.create<string>().transform("shout", () => ({
      onNext: (s: string) => [s.toUpperCase()],
    }));
    expect(flow.ops[0]?.name).toBe("shout");
  });

  it("should reject a non-positive group size", () => {
    expect(() => Flow.create<number>().grouped(0)).toThrow(RangeError);
    expect(() => Flow.create<number>().grouped(1.5)).toThrow(
      "grouped size must be a positive integer, was 1.5",
    );
  });
});

describe("Flow.runWith", () => {
  let system: WorkerSystem;
  let materializer: WorkerFlowMaterializer;

  beforeEach(() => {
    system = new WorkerSystem({ name: "flow-test" });
    materializer = WorkerFlowMaterializer.create(system);
  });

  afterEach(() => {
    system.terminate();
  });

  it("should run map, filter and take in order", async () => {
    const sink = collect<number>();
    const run = await Flow.create<number>()
      .map((n) => n * 10)
      .filter((n) => n > 15)
      .take(2)
      .runWith(new IterableSource([1, 2, 3, 4, 5]), sink, materializer);

    await expect(run.getSinkFor(sink)).resolves.toEqual([20, 30]);
  });

  it("should emit running totals with scan", async () => {
    const sink = collect<number>();
    const run = await Flow.create<number>()
      .scan(0, (acc, n) => acc + n)
      .runWith(new IterableSource([1, 2, 3]), sink, materializer);

    await expect(run.getSinkFor(sink)).resolves.toEqual([0, 1, 3, 6]);
  });

  it("should flush the last partial group on completion", async () => {
    const sink = collect<number[]>();
    const run = await Flow.create<number>()
      .grouped(2)
      .runWith(new IterableSource([1, 2, 3, 4, 5]), sink, materializer);

    await expect(run.getSinkFor(sink)).resolves.toEqual([[1, 2], [3, 4], [5]]);
  });

  it("should split and skip with mapConcat and drop", async () => {
    const sink = collect<string>();
    const run = await Flow.create<string>()
      .mapConcat((word) => word.split(""))
      .drop(1)
      .runWith(new IterableSource(["ab", "cd"]), sink, materializer);

    await expect(run.getSinkFor(sink)).resolves.toEqual(["b", "c", "d"]);
  });

  it("should run the same flow more than once", async () => {
    const flow = Flow.create<number>().map((n) => n + 1);
    const first = collect<number>();
    const second = collect<number>();

    const a = await flow.runWith(new IterableSource([1]), first, materializer);
    const b = await flow.runWith(new IterableSource([5]), second, materializer);

    await expect(a.getSinkFor(first)).resolves.toEqual([2]);
    await expect(b.getSinkFor(second)).resolves.toEqual([6]);
  });
});
