/**
 * Stream Supervisor
 *
 * Long-lived worker that owns every stage worker of a materializer. When the
 * supervisor is still starting, the materializer cannot attach children to
 * it directly and sends a materialize request instead; the request is
 * handled once the supervisor is ready.
 */

import type { MaterializerSettings } from "../types/settings";
import type {
  Recipient,
  WorkerBehavior,
  WorkerContext,
  WorkerSpec,
} from "../types/worker";
import { toError } from "../utils/errors";
import { LocalWorkerRef } from "./worker";

/**
 * Ask the supervisor to create a child on the requester's behalf
 */
export interface MaterializeRequest {
  readonly type: "materialize";
  readonly spec: WorkerSpec<unknown>;
  readonly name: string;
}

export type SupervisorMessage = MaterializeRequest;

export type SupervisorReply =
  | { readonly type: "materialized"; readonly ref: LocalWorkerRef<unknown> }
  | { readonly type: "failed"; readonly error: Error };

export function isSupervisorReply(value: unknown): value is SupervisorReply {
  if (typeof value !== "object" || value === null || !("type" in value)) {
    return false;
  }
  if (value.type === "materialized") {
    return "ref" in value && value.ref instanceof LocalWorkerRef;
  }
  if (value.type === "failed") {
    return "error" in value && value.error instanceof Error;
  }
  return false;
}

class StreamSupervisor implements WorkerBehavior<SupervisorMessage> {
  constructor(private readonly context: WorkerContext<SupervisorMessage>) {}

  receive(
    message: SupervisorMessage,
    sender: Recipient<unknown> | undefined,
  ): void {
    switch (message.type) {
      case "materialize": {
        let reply: SupervisorReply;
        try {
          const ref = this.context.spawn(message.spec, message.name);
          reply = { type: "materialized", ref };
        } catch (error) {
          reply = { type: "failed", error: toError(error) };
        }
        sender?.tell(reply, this.context.self);
        break;
      }
    }
  }
}

/**
 * Spec of a stream supervisor. `settings.dispatcher` is the dispatcher the
 * supervisor itself runs on.
 */
export function streamSupervisorSpec(
  settings: MaterializerSettings,
): WorkerSpec<SupervisorMessage> {
  return {
    dispatcher: settings.dispatcher,
    create: (context) => new StreamSupervisor(context),
  };
}
