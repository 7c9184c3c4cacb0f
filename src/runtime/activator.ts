/**
 * Worker Activator
 *
 * Turns one stage descriptor into a running stage worker under the
 * materializer's supervisor and exposes it as a Processor.
 */

import { StageKinds, type StageDescriptor } from "../types/ast";
import type { Processor } from "../types/reactive";
import type { MaterializerSettings } from "../types/settings";
import type { WorkerRef } from "../types/worker";
import { unsupportedStage } from "../utils/errors";
import { WorkerProcessor } from "../stream/processor";
import { transformProcessorSpec } from "../stream/transform-processor";
import { createWorker } from "./creation";
import type { SupervisorMessage } from "./supervisor";
import type { WorkerSystem } from "./system";

export interface ActivationContext {
  readonly system: WorkerSystem;
  readonly settings: MaterializerSettings;
  readonly supervisor: WorkerRef<SupervisorMessage>;
}

export type Activate = <I, O>(
  stage: StageDescriptor,
  flowName: string,
  index: number,
) => Promise<Processor<I, O>>;

export function workerName(
  flowName: string,
  index: number,
  stage: StageDescriptor,
): string {
  return `${flowName}-${index}-${stage.name}`;
}

export async function activate<I, O>(
  stage: StageDescriptor,
  flowName: string,
  index: number,
  { system, settings, supervisor }: ActivationContext,
): Promise<Processor<I, O>> {
  switch (stage.kind) {
    case StageKinds.TRANSFORM: {
      // Fresh transformer per activation
      const spec = transformProcessorSpec(settings, stage.mkTransformer());
      const name = workerName(flowName, index, stage);
      const ref = await createWorker(spec, name, supervisor, {
        timeoutMs: system.settings.creationTimeoutMs,
        events: system.events,
      });
      system.events.emit({
        type: "WORKER_ACTIVATED",
        flowName,
        workerName: name,
        stageKind: stage.kind,
        index,
      });
      return new WorkerProcessor<I, O>(ref);
    }
    case StageKinds.MERGE:
      throw unsupportedStage(stage.kind, stage.name);
    default:
      throw unsupportedStage(describeKind(stage), describeName(stage));
  }
}

function describeKind(stage: unknown): string {
  return typeof stage === "object" && stage !== null && "kind" in stage
    ? String(stage.kind)
    : typeof stage;
}

function describeName(stage: unknown): string {
  return typeof stage === "object" && stage !== null && "name" in stage
    ? String(stage.name)
    : "?";
}
