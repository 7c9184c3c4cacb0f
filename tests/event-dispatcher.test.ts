// Tests for EventDispatcher

import { describe, it, expect, vi } from "vitest";
import { EventDispatcher } from "../src/runtime/event-dispatcher";
import type { FlowEvent } from "../src/types/observability";
import { flush } from "./probes";

async function firstEvent(dispatcher: EventDispatcher): Promise<FlowEvent> {
  const events: FlowEvent[] = [];
  dispatcher.onEvent((event) => {
    events.push(event);
  });
  dispatcher.emit({ type: "FLOW_NAMED", flowName: "flow-1" });
  await flush();
  const [event] = events;
  if (!event) throw new Error("no event delivered");
  return event;
}

describe("EventDispatcher", () => {
  it("should stamp a UUID v7 system id", async () => {
    const event = await firstEvent(new EventDispatcher());
    expect(event.systemId).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-7[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/,
    );
  });

  it("should keep one system id per dispatcher", async () => {
    const dispatcher = new EventDispatcher();
    const first = await firstEvent(dispatcher);
    const second = await firstEvent(dispatcher);
    expect(second.systemId).toBe(first.systemId);
  });

  it("should freeze a copy of the context", async () => {
    const context = { tenant: "t-1", tags: ["a"] };
    const dispatcher = new EventDispatcher(context);
    context.tenant = "t-2";

    const event = await firstEvent(dispatcher);
    expect(event.context).toEqual({ tenant: "t-1", tags: ["a"] });
    expect(Object.isFrozen(event.context)).toBe(true);
    expect(Object.isFrozen(event.context.tags)).toBe(true);
  });

  it("should deliver events asynchronously with base fields", async () => {
    const dispatcher = new EventDispatcher({ app: "test" });
    const events: FlowEvent[] = [];
    dispatcher.onEvent((event) => {
      events.push(event);
    });

    dispatcher.emit({ type: "FLOW_NAMED", flowName: "flow-1" });
    expect(events).toHaveLength(0);

    await flush();
    expect(events).toHaveLength(1);
    const [event] = events;
    expect(event?.type).toBe("FLOW_NAMED");
    expect(event?.context).toEqual({ app: "test" });
    expect(typeof event?.ts).toBe("number");
    if (event?.type === "FLOW_NAMED") {
      expect(event.flowName).toBe("flow-1");
    }
  });

  it("should isolate throwing handlers", async () => {
    const dispatcher = new EventDispatcher();
    const good = vi.fn();
    dispatcher.onEvent(() => {
      throw new Error("bad handler");
    });
    dispatcher.onEvent(() => Promise.reject(new Error("bad async handler")));
    dispatcher.onEvent(good);

    dispatcher.emit({ type: "WORKER_CREATED", path: "/s/user/w" });
    await flush();

    expect(good).toHaveBeenCalledTimes(1);
  });

  it("should stop delivering to removed handlers", async () => {
    const dispatcher = new EventDispatcher();
    const handler = vi.fn();
    dispatcher.onEvent(handler);

    dispatcher.offEvent(handler);
    dispatcher.emit({ type: "WORKER_CREATED", path: "/s/user/w" });
    await flush();

    expect(handler).not.toHaveBeenCalled();
  });
});
