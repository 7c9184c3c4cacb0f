// Pipeline description model: immutable stage descriptors

/**
 * Runtime behavior of a transform stage. One instance is created per
 * activation, so implementations may keep mutable state.
 */
export interface Transformer<I, O> {
  /**
   * Called for each upstream element; the returned elements are emitted
   * downstream in order.
   */
  onNext(element: I): Iterable<O>;

  /**
   * Checked after every `onNext`. Returning true completes the stage and
   * cancels upstream.
   */
  isComplete?(): boolean;

  /**
   * Called once when upstream completes or `isComplete` turns true.
   * Elements returned here are emitted before completion.
   */
  onTermination?(): Iterable<O>;

  /**
   * Called when upstream signals an error. The error is passed downstream
   * afterwards and buffered elements are dropped.
   */
  onError?(error: Error): void;

  /**
   * Called exactly once when the worker running this transformer stops.
   */
  cleanup?(): void;
}

/**
 * Produces a fresh transformer for every activation.
 */
export type TransformerFactory<I = unknown, O = unknown> = () => Transformer<
  I,
  O
>;

export const StageKinds = {
  TRANSFORM: "transform",
  MERGE: "merge",
} as const;

export type StageKind = (typeof StageKinds)[keyof typeof StageKinds];

/**
 * A single transformation step
 */
export interface TransformStage {
  readonly kind: typeof StageKinds.TRANSFORM;
  readonly name: string;
  readonly mkTransformer: TransformerFactory;
}

/**
 * Multi-input join point. Declared so the model can describe fan-in, but no
 * activation exists for it yet.
 */
export interface MergeNode {
  readonly kind: typeof StageKinds.MERGE;
  readonly name: "merge";
}

export type StageDescriptor = TransformStage | MergeNode;

/**
 * Describe a transform stage. Nothing is spawned until activation.
 */
export function transform<I, O>(
  name: string,
  mkTransformer: TransformerFactory<I, O>,
): TransformStage {
  return Object.freeze({
    kind: StageKinds.TRANSFORM,
    name,
    mkTransformer,
  });
}

export function mergeNode(): MergeNode {
  return Object.freeze({ kind: StageKinds.MERGE, name: "merge" });
}
