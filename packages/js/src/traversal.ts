import { Matrix } from "./matrix";

export type FoldFn<V, A> = (index: number, value: V, acc: A) => A;

export type MapFn<V> = (index: number, value: V) => V;

/** Result of one step of an early-exit fold. */
export type Step<A> =
  | { readonly kind: "continue"; readonly acc: A }
  | { readonly kind: "stop"; readonly acc: A };

export type StepFn<V, A> = (index: number, value: V, acc: A) => Step<A>;

export function proceed<A>(acc: A): Step<A> {
  return { kind: "continue", acc };
}

export function stop<A>(acc: A): Step<A> {
  return { kind: "stop", acc };
}

export function foldLeft<V, A>(matrix: Matrix<V>, fn: FoldFn<V, A>, init: A): A {
  const { store } = matrix;
  let acc = init;
  for (let index = 0; index < matrix.size; index += 1) {
    acc = fn(index, store.get(index), acc);
  }
  return acc;
}

export function foldRight<V, A>(matrix: Matrix<V>, fn: FoldFn<V, A>, init: A): A {
  const { store } = matrix;
  let acc = init;
  for (let index = matrix.size - 1; index >= 0; index -= 1) {
    acc = fn(index, store.get(index), acc);
  }
  return acc;
}

/**
 * Visits only indices below the sparse extent; every index at or beyond it
 * holds the default and is skipped.
 */
export function sparseFoldLeft<V, A>(matrix: Matrix<V>, fn: FoldFn<V, A>, init: A): A {
  const { store } = matrix;
  let acc = init;
  for (let index = 0; index < store.sparseExtent; index += 1) {
    acc = fn(index, store.get(index), acc);
  }
  return acc;
}

export function sparseFoldRight<V, A>(matrix: Matrix<V>, fn: FoldFn<V, A>, init: A): A {
  const { store } = matrix;
  let acc = init;
  for (let index = store.sparseExtent - 1; index >= 0; index -= 1) {
    acc = fn(index, store.get(index), acc);
  }
  return acc;
}

function foldWhileUntil<V, A>(matrix: Matrix<V>, end: number, fn: StepFn<V, A>, init: A): A {
  const { store } = matrix;
  let acc = init;
  for (let index = 0; index < end; index += 1) {
    const step = fn(index, store.get(index), acc);
    if (step.kind === "stop") {
      return step.acc;
    }
    acc = step.acc;
  }
  return acc;
}

export function foldLeftWhile<V, A>(matrix: Matrix<V>, fn: StepFn<V, A>, init: A): A {
  return foldWhileUntil(matrix, matrix.size, fn, init);
}

export function sparseFoldLeftWhile<V, A>(matrix: Matrix<V>, fn: StepFn<V, A>, init: A): A {
  return foldWhileUntil(matrix, matrix.sparseExtent, fn, init);
}

/** Dense rewrite of every cell; the result's extent is the full size. */
export function map<V>(matrix: Matrix<V>, fn: MapFn<V>): Matrix<V> {
  const { store } = matrix;
  const next = store.update((writer) => {
    for (let index = 0; index < matrix.size; index += 1) {
      writer.set(index, fn(index, store.get(index)));
    }
  });
  return Matrix.fromStore(next, matrix.rows, matrix.columns);
}

export function sparseMap<V>(matrix: Matrix<V>, fn: MapFn<V>): Matrix<V> {
  const { store } = matrix;
  const next = store.update((writer) => {
    for (let index = 0; index < store.sparseExtent; index += 1) {
      writer.set(index, fn(index, store.get(index)));
    }
  });
  return Matrix.fromStore(next, matrix.rows, matrix.columns);
}
