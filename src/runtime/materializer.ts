/**
 * Worker Flow Materializer
 *
 * Compiles a source, a reverse-ordered list of stages and a sink into a
 * chain of stage workers owned by one stream supervisor.
 *
 * Activation runs from the sink towards the source, so every new worker can
 * subscribe the already existing downstream part of the chain. Failures are
 * surfaced as-is; workers activated before the failure are left running.
 */

import type { StageDescriptor } from "../types/ast";
import type { FlowMaterializer, Sink, Source } from "../types/endpoints";
import type { Processor } from "../types/reactive";
import type { MaterializerSettings } from "../types/settings";
import { identityStage } from "../stream/transformers";
import { resolveMaterializerSettings } from "../zod/settings";
import { isFlowError, toError } from "../utils/errors";
import { Timer } from "../utils/timers";
import { activate, type Activate } from "./activator";
import { buildChain } from "./chain";
import {
  attachSink,
  attachSource,
  createSink,
  createSource,
  isActiveSink,
  isActiveSource,
} from "./endpoint-dispatch";
import { createFlowName, type FlowNameCounter } from "./flow-namer";
import { MaterializedFlow } from "./materialized-flow";
import { streamSupervisorSpec, type SupervisorMessage } from "./supervisor";
import type { WorkerSystem } from "./system";
import type { LocalWorkerRef } from "./worker";

interface Materialized {
  flow: MaterializedFlow;
  workerCount: number;
}

export class WorkerFlowMaterializer implements FlowMaterializer {
  private readonly activateStage: Activate;

  private constructor(
    readonly system: WorkerSystem,
    readonly settings: MaterializerSettings,
    readonly supervisor: LocalWorkerRef<SupervisorMessage>,
    private readonly counter: FlowNameCounter,
  ) {
    this.activateStage = <I, O>(
      stage: StageDescriptor,
      flowName: string,
      index: number,
    ): Promise<Processor<I, O>> => activate<I, O>(stage, flowName, index, this);
  }

  /**
   * Create a materializer with its own stream supervisor, started as a
   * top-level worker of `system`. The supervisor is still starting when this
   * returns; the first activations go through it.
   */
  static create(
    system: WorkerSystem,
    settings: Partial<MaterializerSettings> = {},
    namePrefix?: string,
  ): WorkerFlowMaterializer {
    const resolved = resolveMaterializerSettings(
      namePrefix === undefined ? settings : { ...settings, namePrefix },
    );
    const supervisorName = `flow-supervisor-${system.nameCounter("supervisor").next()}`;
    const supervisor = system.workerOf(
      streamSupervisorSpec(resolved),
      supervisorName,
    );
    return new WorkerFlowMaterializer(
      system,
      resolved,
      supervisor,
      system.nameCounter(),
    );
  }

  withNamePrefix(name: string): WorkerFlowMaterializer {
    return new WorkerFlowMaterializer(
      this.system,
      resolveMaterializerSettings({ ...this.settings, namePrefix: name }),
      this.supervisor,
      this.counter,
    );
  }

  /**
   * Next pipeline name of this materializer family
   */
  nextFlowName(): string {
    const flowName = createFlowName(this.settings.namePrefix, this.counter);
    this.system.events.emit({ type: "FLOW_NAMED", flowName });
    return flowName;
  }

  async materialize<In, Out>(
    source: Source<In>,
    sink: Sink<Out>,
    ops: readonly StageDescriptor[],
  ): Promise<MaterializedFlow> {
    const flowName = this.nextFlowName();
    const timer = new Timer();
    timer.start();
    this.system.events.emit({
      type: "MATERIALIZE_START",
      flowName,
      stageCount: ops.length,
    });

    try {
      const { flow, workerCount } =
        ops.length === 0
          ? await this.materializeDirect(source, sink, flowName)
          : await this.materializeChain(source, sink, ops, flowName);
      timer.stop();
      this.system.events.emit({
        type: "MATERIALIZE_END",
        flowName,
        workerCount,
        durationMs: timer.elapsed(),
      });
      return flow;
    } catch (error) {
      this.system.events.emit({
        type: "MATERIALIZE_ERROR",
        flowName,
        code: isFlowError(error) ? error.code : undefined,
        message: toError(error).message,
      });
      throw error;
    }
  }

  async materializeProcessor<I, O>(
    stage: StageDescriptor,
  ): Promise<Processor<I, O>> {
    return this.activateStage<I, O>(stage, this.nextFlowName(), 0);
  }

  /**
   * No stages: connect the endpoints directly when one of them drives
   * itself, otherwise through one identity worker
   */
  private async materializeDirect<In, Out>(
    source: Source<In>,
    sink: Sink<Out>,
    flowName: string,
  ): Promise<Materialized> {
    if (isActiveSink(sink)) {
      const [subscriber, sinkValue] = await createSink<unknown>(
        sink,
        this,
        flowName,
      );
      const sourceValue = attachSource<unknown>(
        source,
        subscriber,
        this,
        flowName,
      );
      return {
        flow: new MaterializedFlow(source, sourceValue, sink, sinkValue),
        workerCount: 0,
      };
    }

    if (isActiveSource(source)) {
      const [publisher, sourceValue] = await createSource<unknown>(
        source,
        this,
        flowName,
      );
      const sinkValue = attachSink<unknown>(
        sink,
        publisher,
        this,
        flowName,
      );
      return {
        flow: new MaterializedFlow(source, sourceValue, sink, sinkValue),
        workerCount: 0,
      };
    }

    const identity = await this.activateStage<unknown, unknown>(
      identityStage,
      flowName,
      1,
    );
    const sourceValue = attachSource<unknown>(
      source,
      identity,
      this,
      flowName,
    );
    const sinkValue = attachSink<unknown>(sink, identity, this, flowName);
    return {
      flow: new MaterializedFlow(source, sourceValue, sink, sinkValue),
      workerCount: 1,
    };
  }

  private async materializeChain<In, Out>(
    source: Source<In>,
    sink: Sink<Out>,
    ops: readonly StageDescriptor[],
    flowName: string,
  ): Promise<Materialized> {
    const [last, ...remaining] = ops;
    if (!last) return this.materializeDirect(source, sink, flowName);

    const tail = await this.activateStage<unknown, unknown>(
      last,
      flowName,
      ops.length,
    );
    const head = await buildChain(tail, remaining, {
      flowName,
      startIndex: ops.length - 1,
      activate: this.activateStage,
      events: this.system.events,
    });
    const sourceValue = attachSource<unknown>(
      source,
      head,
      this,
      flowName,
    );
    const sinkValue = attachSink<unknown>(sink, tail, this, flowName);
    return {
      flow: new MaterializedFlow(source, sourceValue, sink, sinkValue),
      workerCount: ops.length,
    };
  }
}
