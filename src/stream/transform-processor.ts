/**
 * Transform Processor
 *
 * Worker behavior that runs one Transformer between a single upstream and a
 * single downstream subscriber, honoring downstream demand.
 *
 * Input is requested in batches between `initialInputBufferSize` and
 * `maximumInputBufferSize`, depending on outstanding downstream demand.
 * Output produced ahead of demand is buffered.
 */

import type { Transformer } from "../types/ast";
import type { Subscriber, Subscription } from "../types/reactive";
import { CancelledSubscription } from "../types/reactive";
import type { MaterializerSettings } from "../types/settings";
import type {
  WorkerBehavior,
  WorkerContext,
  WorkerSpec,
} from "../types/worker";
import { FlowError, FlowErrorCodes, toError } from "../utils/errors";
import { workerSubscription, type ProcessorMessage } from "./processor";

class TransformProcessorWorker implements WorkerBehavior<ProcessorMessage> {
  private upstream: Subscription | undefined;
  private upstreamDone = false;
  private inFlight = 0;
  private readonly buffer: unknown[] = [];
  private downstream: Subscriber<unknown> | undefined;
  private demand = 0;
  private inputFinished = false;
  private failure: Error | undefined;
  private terminated = false;
  private cleanedUp = false;

  constructor(
    private readonly context: WorkerContext<ProcessorMessage>,
    private readonly settings: MaterializerSettings,
    private readonly transformer: Transformer<unknown, unknown>,
  ) {}

  receive(message: ProcessorMessage): void {
    switch (message.type) {
      case "onSubscribe":
        this.handleOnSubscribe(message.subscription);
        break;
      case "onNext":
        this.handleOnNext(message.element);
        break;
      case "onComplete":
        this.handleOnComplete();
        break;
      case "onError":
        this.handleOnError(message.error);
        break;
      case "subscribe":
        this.handleSubscribe(message.subscriber);
        break;
      case "request":
        this.handleRequest(message.n);
        break;
      case "cancel":
        this.cancelUpstream();
        this.terminated = true;
        this.context.stop();
        break;
    }
  }

  postStop(): void {
    this.cancelUpstream();
    if (this.cleanedUp) return;
    this.cleanedUp = true;
    this.transformer.cleanup?.();
  }

  // --------------------------------------------------------------------------
  // Upstream side
  // --------------------------------------------------------------------------

  private handleOnSubscribe(subscription: Subscription): void {
    if (this.upstream || this.upstreamDone) {
      subscription.cancel();
      return;
    }
    this.upstream = subscription;
    this.requestUpstream();
  }

  private handleOnNext(element: unknown): void {
    if (this.upstreamDone || this.inputFinished) return;
    this.inFlight = Math.max(0, this.inFlight - 1);
    try {
      for (const out of this.transformer.onNext(element)) {
        this.buffer.push(out);
      }
      if (this.transformer.isComplete?.()) {
        this.cancelUpstream();
        this.finishInput();
      }
    } catch (error) {
      this.fail(toError(error));
      return;
    }
    this.pump();
  }

  private handleOnComplete(): void {
    if (this.upstreamDone) return;
    this.upstreamDone = true;
    try {
      this.finishInput();
    } catch (error) {
      this.fail(toError(error));
      return;
    }
    this.pump();
  }

  private handleOnError(error: Error): void {
    if (this.upstreamDone) return;
    this.upstreamDone = true;
    try {
      this.transformer.onError?.(error);
    } finally {
      this.fail(error);
    }
  }

  private finishInput(): void {
    if (this.inputFinished) return;
    this.inputFinished = true;
    for (const out of this.transformer.onTermination?.() ?? []) {
      this.buffer.push(out);
    }
  }

  private requestUpstream(): void {
    if (!this.upstream || this.upstreamDone || this.inputFinished) return;
    const { initialInputBufferSize, maximumInputBufferSize } = this.settings;
    const target = Math.min(
      Math.max(initialInputBufferSize, this.demand),
      maximumInputBufferSize,
    );
    const capacity = target - this.inFlight - this.buffer.length;
    if (capacity > 0 && (this.inFlight === 0 || capacity * 2 >= target)) {
      this.inFlight += capacity;
      this.upstream.request(capacity);
    }
  }

  private cancelUpstream(): void {
    if (this.upstream && !this.upstreamDone) {
      this.upstream.cancel();
    }
    this.upstreamDone = true;
  }

  // --------------------------------------------------------------------------
  // Downstream side
  // --------------------------------------------------------------------------

  private handleSubscribe(subscriber: Subscriber<unknown>): void {
    if (this.downstream) {
      subscriber.onSubscribe(CancelledSubscription);
      subscriber.onError(
        new FlowError(`${this.context.self.path} supports only one subscriber`, {
          code: FlowErrorCodes.SPEC_VIOLATION,
          worker: this.context.self.path,
        }),
      );
      return;
    }
    this.downstream = subscriber;
    subscriber.onSubscribe(workerSubscription(this.context.self));
    this.pump();
  }

  private handleRequest(n: number): void {
    if (this.terminated) return;
    if (!Number.isInteger(n) || n <= 0) {
      this.fail(
        new FlowError(`Requested elements must be positive, was ${n}`, {
          code: FlowErrorCodes.SPEC_VIOLATION,
          worker: this.context.self.path,
        }),
      );
      return;
    }
    this.demand = Math.min(this.demand + n, Number.MAX_SAFE_INTEGER);
    this.pump();
  }

  /**
   * Emit as much buffered output as demand allows, then complete or ask
   * upstream for more
   */
  private pump(): void {
    const downstream = this.downstream;
    if (this.terminated) return;
    if (!downstream) {
      this.requestUpstream();
      return;
    }
    const failure = this.failure;
    if (failure) {
      this.terminate(() => downstream.onError(failure));
      return;
    }
    while (this.demand > 0 && this.buffer.length > 0) {
      this.demand--;
      downstream.onNext(this.buffer.shift());
    }
    if (this.inputFinished && this.buffer.length === 0) {
      this.terminate(() => downstream.onComplete());
      return;
    }
    this.requestUpstream();
  }

  private fail(error: Error): void {
    this.failure = error;
    this.buffer.length = 0;
    this.cancelUpstream();
    this.pump();
  }

  private terminate(signal: () => void): void {
    this.terminated = true;
    signal();
    this.context.stop();
  }
}

/**
 * Spec of a worker running `transformer`
 */
export function transformProcessorSpec(
  settings: MaterializerSettings,
  transformer: Transformer<unknown, unknown>,
): WorkerSpec<ProcessorMessage> {
  return {
    dispatcher: settings.dispatcher,
    create: (context) =>
      new TransformProcessorWorker(context, settings, transformer),
  };
}
