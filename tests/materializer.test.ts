// Tests for WorkerFlowMaterializer

import { describe, it, expect, vi, afterEach, beforeEach } from "vitest";
import { WorkerSystem } from "../src/runtime/system";
import { WorkerFlowMaterializer } from "../src/runtime/materializer";
import { FlowNameCounter, createFlowName } from "../src/runtime/flow-namer";
import { buildChain } from "../src/runtime/chain";
import {
  IterableSource,
  PromiseSource,
  PublisherSource,
  SubscriberSource,
} from "../src/stream/sources";
import {
  BlackholeSink,
  FoldSink,
  ForeachSink,
  PublisherSink,
  SubscriberSink,
} from "../src/stream/sinks";
import { WorkerProcessor } from "../src/stream/processor";
import { mapTransformer } from "../src/stream/transformers";
import {
  mergeNode,
  transform,
  type StageDescriptor,
  type Transformer,
} from "../src/types/ast";
import type { FlowEvent } from "../src/types/observability";
import type { Processor, Subscriber } from "../src/types/reactive";
import { FlowError } from "../src/utils/errors";
import { ManualPublisher, ProbeSubscriber, flush } from "./probes";

function append(letter: string): StageDescriptor {
  return transform(letter, () => mapTransformer((s: string) => s + letter));
}

const increment: StageDescriptor = transform("inc", () =>
  mapTransformer((n: number) => n + 1),
);

function failingNumbers(): Iterable<number> {
  return {
    [Symbol.iterator]: function* () {
      throw new Error("source failed");
    },
  };
}

/**
 * A source that subscribes but never emits or completes, so workers stay
 * alive for inspection
 */
function silentSource<T>(): PromiseSource<T> {
  return new PromiseSource(new Promise<T>(() => {}));
}

/**
 * Records who subscribes to it instead of running anything
 */
class FakeStage<I, O> implements Processor<I, O> {
  constructor(
    private readonly name: string,
    private readonly wiring: string[],
  ) {}

  onSubscribe(): void {}
  onNext(): void {}
  onError(): void {}
  onComplete(): void {}

  subscribe(subscriber: Subscriber<O>): void {
    this.wiring.push(`${String(subscriber)} <- ${this.name}`);
  }

  toString(): string {
    return this.name;
  }
}

async function rejection(promise: Promise<unknown>): Promise<FlowError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof FlowError) return error;
    throw error;
  }
  throw new Error("expected a rejection");
}

describe("flow namer", () => {
  it("should count monotonically", () => {
    const counter = new FlowNameCounter();
    expect(createFlowName("flow", counter)).toBe("flow-1");
    expect(createFlowName("other", counter)).toBe("other-2");
    expect(counter.current()).toBe(2);
  });

  it("should keep one counter per system and scope", () => {
    const a = new WorkerSystem();
    const b = new WorkerSystem();
    expect(a.nameCounter()).toBe(a.nameCounter("flow"));
    expect(a.nameCounter()).not.toBe(b.nameCounter());
    expect(a.nameCounter("supervisor")).not.toBe(a.nameCounter());
    a.terminate();
    b.terminate();
  });
});

describe("buildChain", () => {
  it("should return the last processor when nothing remains", async () => {
    const last = new WorkerProcessor<unknown, unknown>({
      path: "/s/last",
      tell: () => {},
    });
    const activate = vi.fn();
    const head = await buildChain(last, [], {
      flowName: "flow-1",
      startIndex: 0,
      activate,
    });
    expect(head).toBe(last);
    expect(activate).not.toHaveBeenCalled();
  });

  it("should activate downwards and subscribe each tail to the new worker", async () => {
    const wiring: string[] = [];
    const activated: string[] = [];
    const head = await buildChain(
      new FakeStage<unknown, unknown>("C", wiring),
      [append("B"), append("A")],
      {
        flowName: "flow-1",
        startIndex: 2,
        activate: async <I, O>(
          stage: StageDescriptor,
          flowName: string,
          index: number,
        ): Promise<Processor<I, O>> => {
          activated.push(`${flowName}-${index}-${stage.name}`);
          return new FakeStage<I, O>(stage.name, wiring);
        },
      },
    );

    expect(activated).toEqual(["flow-1-2-B", "flow-1-1-A"]);
    expect(wiring).toEqual(["C <- B", "B <- A"]);
    expect(String(head)).toBe("A");
  });
});

describe("WorkerFlowMaterializer", () => {
  let system: WorkerSystem;
  let events: FlowEvent[];
  let materializer: WorkerFlowMaterializer;

  beforeEach(() => {
    events = [];
    system = new WorkerSystem({
      name: "test-system",
      onEvent: (event) => {
        events.push(event);
      },
    });
    materializer = WorkerFlowMaterializer.create(system);
  });

  afterEach(() => {
    system.terminate();
  });

  describe("create", () => {
    it("should name its supervisor as a top-level worker", () => {
      expect(materializer.supervisor.path).toBe(
        "/test-system/user/flow-supervisor-1",
      );
    });

    it("should return while the supervisor is still starting", () => {
      const tasks: Array<() => void> = [];
      system.registerDispatcher("manual-dispatcher", (task) => {
        tasks.push(task);
      });
      const held = WorkerFlowMaterializer.create(system, {
        dispatcher: "manual-dispatcher",
      });
      expect(held.supervisor.state()).toBe("starting");

      for (const task of tasks.splice(0)) task();
      expect(held.supervisor.state()).toBe("ready");
    });

    it("should give each materializer its own supervisor", () => {
      const other = WorkerFlowMaterializer.create(system);
      expect(other.supervisor.name).toBe("flow-supervisor-2");
      expect(system.topLevelWorkers()).toEqual([
        "flow-supervisor-1",
        "flow-supervisor-2",
      ]);
    });

    it("should validate settings", () => {
      expect(() =>
        WorkerFlowMaterializer.create(system, { maximumInputBufferSize: 0 }),
      ).toThrow(FlowError);
    });

    it("should reject an unknown dispatcher", () => {
      expect(() =>
        WorkerFlowMaterializer.create(system, { dispatcher: "missing" }),
      ).toThrow('No dispatcher registered under "missing"');
    });

    it("should take the name prefix argument over the settings", () => {
      const named = WorkerFlowMaterializer.create(
        system,
        { namePrefix: "ignored" },
        "orders",
      );
      expect(named.settings.namePrefix).toBe("orders");
    });
  });

  describe("materialize with stages", () => {
    it("should activate stages from the sink towards the source", async () => {
      const order: string[] = [];
      const stage = (letter: string): StageDescriptor =>
        transform(letter, () => {
          order.push(letter);
          return mapTransformer((s: string) => s + letter);
        });

      await materializer.materialize(
        silentSource<string>(),
        new BlackholeSink<string>(),
        [stage("C"), stage("B"), stage("A")],
      );

      expect(order).toEqual(["C", "B", "A"]);
      expect(materializer.supervisor.children()).toEqual([
        "flow-1-3-C",
        "flow-1-2-B",
        "flow-1-1-A",
      ]);
    });

    it("should wire source, stages and sink in pipeline order", async () => {
      const sink = new FoldSink<string, string[]>([], (acc, s) => [...acc, s]);
      const flow = await materializer.materialize(
        new IterableSource(["x", "y"]),
        sink,
        [append("C"), append("B"), append("A")],
      );

      await expect(flow.getSinkFor(sink)).resolves.toEqual(["xABC", "yABC"]);
    });

    it("should report activation and wiring events", async () => {
      await materializer.materialize(
        silentSource<string>(),
        new BlackholeSink<string>(),
        [append("B"), append("A")],
      );
      await flush();

      const activated = events.flatMap((e) =>
        e.type === "WORKER_ACTIVATED" ? [e.workerName] : [],
      );
      const subscribed = events.flatMap((e) =>
        e.type === "WORKER_SUBSCRIBED" ? [`${e.downstream} <- ${e.upstream}`] : [],
      );
      const end = events.find((e) => e.type === "MATERIALIZE_END");

      expect(activated).toEqual(["flow-1-2-B", "flow-1-1-A"]);
      expect(subscribed).toEqual([
        "/test-system/user/flow-supervisor-1/flow-1-2-B <- /test-system/user/flow-supervisor-1/flow-1-1-A",
      ]);
      expect(end).toMatchObject({ flowName: "flow-1", workerCount: 2 });
    });

    it("should give every activation a fresh transformer", async () => {
      const factory = vi.fn((): Transformer<string, string> => {
        let count = 0;
        return { onNext: (s) => [`${s}:${++count}`] };
      });
      const counting = transform("count", factory);
      const first = new FoldSink<string, string[]>([], (acc, s) => [...acc, s]);
      const second = new FoldSink<string, string[]>([], (acc, s) => [...acc, s]);

      const a = await materializer.materialize(
        new IterableSource(["a", "b"]),
        first,
        [counting],
      );
      const b = await materializer.materialize(
        new IterableSource(["a", "b"]),
        second,
        [counting],
      );

      expect(factory).toHaveBeenCalledTimes(2);
      await expect(a.getSinkFor(first)).resolves.toEqual(["a:1", "b:2"]);
      await expect(b.getSinkFor(second)).resolves.toEqual(["a:1", "b:2"]);
    });

    it("should return keyed values of both endpoints", async () => {
      const source = new SubscriberSource<string>();
      const sink = new PublisherSink<string>();
      const flow = await materializer.materialize(source, sink, [append("!")]);

      const input = flow.getSourceFor(source);
      const output = flow.getSinkFor(sink);
      const upstream = new ManualPublisher<string>();
      const downstream = new ProbeSubscriber<string>();
      upstream.subscribe(input);
      output.subscribe(downstream);
      await flush();

      downstream.request(2);
      upstream.next("hi");
      upstream.complete();
      await downstream.terminated;

      expect(downstream.received).toEqual(["hi!"]);
      expect(downstream.completed).toBe(true);
    });

    it("should resolve while a never-ending stream is still running", async () => {
      const sink = new ForeachSink<number>(() => {});
      const flow = await materializer.materialize(silentSource<number>(), sink, [
        increment,
      ]);

      const completion = flow.getSinkFor(sink);
      let settled = false;
      void completion.then(() => {
        settled = true;
      });
      await flush();

      expect(settled).toBe(false);
      expect(materializer.supervisor.children()).toEqual(["flow-1-1-inc"]);
    });

    it("should keep a promise-valued sink value unresolved", async () => {
      const sink = new FoldSink(0, (acc: number, n: number) => acc + n);
      const flow = await materializer.materialize(
        new IterableSource([1, 2]),
        sink,
        [increment],
      );

      expect(flow.sinkValue).toBeInstanceOf(Promise);
      await expect(flow.getSinkFor(sink)).resolves.toBe(5);
    });

    it("should not leak stream failures of a dropped flow", async () => {
      const unhandled = vi.fn();
      process.on("unhandledRejection", unhandled);
      try {
        const failing = transform("fail", (): Transformer<number, number> => ({
          onNext: () => {
            throw new Error("stage failed");
          },
        }));
        await materializer.materialize(
          new IterableSource([1]),
          new ForeachSink<number>(() => {}),
          [failing],
        );
        await materializer.materialize(
          new IterableSource(failingNumbers()),
          new FoldSink(0, (acc: number, n: number) => acc + n),
          [],
        );
        await new Promise((resolve) => setTimeout(resolve, 20));

        expect(unhandled).not.toHaveBeenCalled();
      } finally {
        process.off("unhandledRejection", unhandled);
      }
    });

    it("should still reject the kept value of a failed flow", async () => {
      const sink = new FoldSink(0, (acc: number, n: number) => acc + n);
      const flow = await materializer.materialize(
        new IterableSource(failingNumbers()),
        sink,
        [increment],
      );
      await expect(flow.getSinkFor(sink)).rejects.toThrow("source failed");
    });

    it("should fail with UNSUPPORTED_STAGE for merge nodes", async () => {
      const error = await rejection(
        materializer.materialize(silentSource(), new BlackholeSink(), [
          mergeNode(),
        ]),
      );
      expect(error.code).toBe("UNSUPPORTED_STAGE");
      expect(error.message).toBe('unsupported stage kind "merge" (stage "merge")');

      await flush();
      expect(events.find((e) => e.type === "MATERIALIZE_ERROR")).toMatchObject({
        flowName: "flow-1",
        code: "UNSUPPORTED_STAGE",
      });
    });

    it("should leave already activated workers running after a failure", async () => {
      await rejection(
        materializer.materialize(silentSource(), new BlackholeSink(), [
          append("Z"),
          mergeNode(),
        ]),
      );
      expect(materializer.supervisor.children()).toEqual(["flow-1-2-Z"]);
    });

    it("should fail with UNKNOWN_ENDPOINT_TYPE for unknown sinks", async () => {
      const sink = new BlackholeSink<string>();
      Object.defineProperty(sink, "kind", { value: "legacySink" });

      const error = await rejection(
        materializer.materialize(silentSource<string>(), sink, [append("A")]),
      );
      expect(error.code).toBe("UNKNOWN_ENDPOINT_TYPE");
      expect(error.message).toBe("unknown Sink type BlackholeSink");
    });
  });

  describe("materialize without stages", () => {
    it("should connect a passive source to an active sink directly", async () => {
      const sink = new ForeachSink<number>(() => {});
      const flow = await materializer.materialize(silentSource<number>(), sink, []);
      await flush();

      expect(materializer.supervisor.children()).toEqual([]);
      expect(flow.sourceValue).toBeUndefined();
      expect(sink.isMaterializedValue(flow.sinkValue)).toBe(true);
    });

    it("should connect an active source to a passive sink directly", async () => {
      const publisher = new ManualPublisher<number>();
      await materializer.materialize(
        new PublisherSource(publisher),
        new BlackholeSink<number>(),
        [],
      );
      await flush();

      expect(materializer.supervisor.children()).toEqual([]);
      expect(publisher.requests).toEqual([16]);
    });

    it("should prefer the active sink when both endpoints are active", async () => {
      const publisher = new ManualPublisher<number>();
      const probe = new ProbeSubscriber<number>();
      await materializer.materialize(
        new PublisherSource(publisher),
        new SubscriberSink(probe),
        [],
      );

      expect(publisher.subscriber).toBe(probe);
    });

    it("should place one identity worker between passive endpoints", async () => {
      const flow = await materializer.materialize(
        silentSource<number>(),
        new BlackholeSink<number>(),
        [],
      );
      await flush();

      expect(materializer.supervisor.children()).toEqual(["flow-1-1-identity"]);
      expect(flow.sourceValue).toBeUndefined();
      expect(flow.sinkValue).toBeUndefined();
      expect(events.find((e) => e.type === "MATERIALIZE_END")).toMatchObject({
        workerCount: 1,
      });
    });

    it("should drain an iterable straight into an active sink", async () => {
      const sink = new FoldSink(0, (acc: number, n: number) => acc + n);
      const flow = await materializer.materialize(
        new IterableSource([1, 2, 3, 4, 5]),
        sink,
        [],
      );
      await expect(flow.getSinkFor(sink)).resolves.toBe(15);
    });

    it("should stream through the identity worker", async () => {
      const sink = new PublisherSink<number>();
      const flow = await materializer.materialize(
        new IterableSource([1, 2, 3]),
        sink,
        [],
      );
      const downstream = new ProbeSubscriber<number>();
      flow.getSinkFor(sink).subscribe(downstream);
      await flush();

      downstream.request(10);
      await downstream.terminated;
      expect(downstream.received).toEqual([1, 2, 3]);
      expect(downstream.completed).toBe(true);
    });
  });

  describe("naming", () => {
    it("should never hand out the same flow name twice", async () => {
      const flows = await Promise.all([
        materializer.materialize(silentSource(), new BlackholeSink(), [append("A")]),
        materializer.materialize(silentSource(), new BlackholeSink(), [append("A")]),
      ]);
      await flush();

      expect(flows).toHaveLength(2);
      const names = events.flatMap((e) =>
        e.type === "FLOW_NAMED" ? [e.flowName] : [],
      );
      expect(names).toEqual(["flow-1", "flow-2"]);
      expect([...materializer.supervisor.children()].sort()).toEqual([
        "flow-1-1-A",
        "flow-2-1-A",
      ]);
    });

    it("should share the counter and supervisor across name prefixes", async () => {
      const orders = materializer.withNamePrefix("orders");
      expect(orders.supervisor).toBe(materializer.supervisor);
      expect(orders.settings.namePrefix).toBe("orders");
      expect(materializer.settings.namePrefix).toBe("flow");

      expect(materializer.nextFlowName()).toBe("flow-1");
      expect(orders.nextFlowName()).toBe("orders-2");
      expect(materializer.nextFlowName()).toBe("flow-3");
    });

    it("should share the counter between materializers of one system", () => {
      const other = WorkerFlowMaterializer.create(system);
      expect(materializer.nextFlowName()).toBe("flow-1");
      expect(other.nextFlowName()).toBe("flow-2");
    });
  });

  describe("materializeProcessor", () => {
    it("should activate the stage at index 0 under a fresh name", async () => {
      const processor = await materializer.materializeProcessor<string, string>(
        append("!"),
      );
      expect(processor).toBeInstanceOf(WorkerProcessor);
      expect(materializer.supervisor.children()).toEqual(["flow-1-0-!"]);
    });

    it("should return distinct workers for the same descriptor", async () => {
      const stage = append("!");
      const first = await materializer.materializeProcessor(stage);
      const second = await materializer.materializeProcessor(stage);

      expect(first).not.toBe(second);
      expect(materializer.supervisor.children()).toEqual([
        "flow-1-0-!",
        "flow-2-0-!",
      ]);
    });

    it("should process elements like any stage", async () => {
      const processor = await materializer.materializeProcessor<string, string>(
        append("?"),
      );
      const upstream = new ManualPublisher<string>();
      const downstream = new ProbeSubscriber<string>();
      upstream.subscribe(processor);
      processor.subscribe(downstream);
      await flush();

      downstream.request(1);
      upstream.next("why");
      await flush();
      expect(downstream.received).toEqual(["why?"]);
    });
  });

  describe("creation timeout", () => {
    it("should fail when the supervisor never finishes starting", async () => {
      const slow = new WorkerSystem({ name: "slow", creationTimeoutMs: 20 });
      // Drops every task, so the supervisor never finishes starting
      slow.registerDispatcher("held-dispatcher", () => {});
      const held = WorkerFlowMaterializer.create(slow, {
        dispatcher: "held-dispatcher",
      });

      const error = await rejection(
        held.materialize(silentSource(), new BlackholeSink(), [append("A")]),
      );
      expect(error.code).toBe("CREATION_TIMEOUT");
      expect(error.message).toBe(
        'Creation of worker "flow-1-1-A" timed out after 20ms',
      );
      slow.terminate();
    });
  });
});
