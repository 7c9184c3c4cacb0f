// Request/reply on top of fire-and-forget messaging

import type { Recipient } from "../types/worker";
import { deferred, withTimeout } from "../utils/timers";

let askCounter = 0;

/**
 * Send `message` to `target` with a temporary reply handle as sender and
 * resolve with the first reply. Rejects with `onTimeout()` when no reply
 * arrives within `timeoutMs`.
 */
export function ask<Req>(
  target: Recipient<Req>,
  message: Req,
  timeoutMs: number,
  onTimeout?: () => Error,
): Promise<unknown> {
  const reply = deferred<unknown>();
  const replyTo: Recipient<unknown> = {
    path: `${target.path}/$ask-${++askCounter}`,
    tell: (answer) => reply.resolve(answer),
  };
  target.tell(message, replyTo);
  return withTimeout(reply.promise, timeoutMs, onTimeout);
}
