// Stateful transformers behind the Flow operators

import { transform, type Transformer, type TransformStage } from "../types/ast";

export function identityTransformer<T>(): Transformer<T, T> {
  return { onNext: (element) => [element] };
}

/**
 * Pass-through stage, used where a pipeline needs a worker but has no stages
 */
export const identityStage: TransformStage = transform("identity", () =>
  identityTransformer(),
);

export function mapTransformer<I, O>(f: (element: I) => O): Transformer<I, O> {
  return { onNext: (element) => [f(element)] };
}

export function filterTransformer<T>(
  predicate: (element: T) => boolean,
): Transformer<T, T> {
  return { onNext: (element) => (predicate(element) ? [element] : []) };
}

export function mapConcatTransformer<I, O>(
  f: (element: I) => Iterable<O>,
): Transformer<I, O> {
  return { onNext: (element) => f(element) };
}

export function takeTransformer<T>(n: number): Transformer<T, T> {
  let remaining = n;
  return {
    onNext: (element) => {
      if (remaining <= 0) return [];
      remaining--;
      return [element];
    },
    isComplete: () => remaining <= 0,
  };
}

export function dropTransformer<T>(n: number): Transformer<T, T> {
  let toDrop = n;
  return {
    onNext: (element) => {
      if (toDrop > 0) {
        toDrop--;
        return [];
      }
      return [element];
    },
  };
}

/**
 * Chunks elements into arrays of `size`; a trailing partial chunk is
 * emitted on completion
 */
export function groupedTransformer<T>(size: number): Transformer<T, T[]> {
  let group: T[] = [];
  return {
    onNext: (element) => {
      group.push(element);
      if (group.length < size) return [];
      const full = group;
      group = [];
      return [full];
    },
    onTermination: () => (group.length > 0 ? [group] : []),
    cleanup: () => {
      group = [];
    },
  };
}

/**
 * Emits `zero` followed by every intermediate accumulator
 */
export function scanTransformer<T, U>(
  zero: U,
  f: (acc: U, element: T) => U,
): Transformer<T, U> {
  let acc = zero;
  let emittedZero = false;
  return {
    onNext: (element) => {
      const out: U[] = emittedZero ? [] : [acc];
      emittedZero = true;
      acc = f(acc, element);
      out.push(acc);
      return out;
    },
    onTermination: () => (emittedZero ? [] : [acc]),
  };
}
