// Worker creation against a container that may still be starting

import type { WorkerRef, WorkerSpec } from "../types/worker";
import type { EventDispatcher } from "./event-dispatcher";
import type { LocalWorkerRef } from "./worker";
import { ask } from "./ask";
import { isSupervisorReply, type SupervisorMessage } from "./supervisor";
import {
  FlowError,
  FlowErrorCodes,
  creationTimeout,
  illegalContainer,
} from "../utils/errors";
import { Timer } from "../utils/timers";

export interface CreateWorkerOptions {
  /**
   * Bound on the supervisor handoff
   */
  timeoutMs: number;
  events?: EventDispatcher;
}

/**
 * Create a worker as a child of `container`.
 *
 * - Ready local container: the child is attached before this function
 *   returns, and the promise resolves without waiting.
 * - Starting local container: the request goes through the container's
 *   mailbox and is served by its supervisor behavior once it is ready.
 * - Anything else: ILLEGAL_CONTAINER.
 */
export function createWorker<M>(
  spec: WorkerSpec<M>,
  name: string,
  container: WorkerRef<SupervisorMessage>,
  options: CreateWorkerOptions,
): Promise<LocalWorkerRef<unknown>> {
  if (container.locality !== "local") {
    return Promise.reject(illegalContainer(container.locality, container.path));
  }

  switch (container.state()) {
    case "ready":
      try {
        return Promise.resolve(container.attachChild(spec, name));
      } catch (error) {
        return Promise.reject(error);
      }
    case "starting":
      return requestFromSupervisor(spec, name, container, options);
    case "stopped":
    default:
      return Promise.reject(
        new FlowError(
          `Cannot create "${name}": container ${container.path} is stopped`,
          { code: FlowErrorCodes.WORKER_TERMINATED, worker: container.path },
        ),
      );
  }
}

async function requestFromSupervisor<M>(
  spec: WorkerSpec<M>,
  name: string,
  container: LocalWorkerRef<SupervisorMessage>,
  { timeoutMs, events }: CreateWorkerOptions,
): Promise<LocalWorkerRef<unknown>> {
  const timer = new Timer();
  timer.start();
  events?.emit({
    type: "CREATION_DEFERRED",
    workerName: name,
    container: container.path,
    timeoutMs,
  });

  const reply = await ask(
    container,
    { type: "materialize", spec, name },
    timeoutMs,
    () => creationTimeout(name, timeoutMs),
  );

  if (!isSupervisorReply(reply)) {
    throw new FlowError(`Unexpected reply from ${container.path}`, {
      code: FlowErrorCodes.ILLEGAL_CONTAINER,
      worker: container.path,
    });
  }
  if (reply.type === "failed") throw reply.error;

  timer.stop();
  events?.emit({
    type: "CREATION_COMPLETE",
    path: reply.ref.path,
    waitedMs: timer.elapsed(),
  });
  return reply.ref;
}
