import { member } from "./aggregate";
import { MatrixError } from "./errors";
import type { Matrix } from "./matrix";

/** Instruction returned by a reducer, or passed in to start or resume one. */
export type Signal<A> =
  | { readonly kind: "continue"; readonly acc: A }
  | { readonly kind: "suspend"; readonly acc: A }
  | { readonly kind: "halt"; readonly acc: A };

export type Reducer<V, A> = (value: V, acc: A) => Signal<A>;

export type Continuation<A> = (signal: Signal<A>) => ReduceResult<A>;

export type ReduceResult<A> =
  | { readonly kind: "done"; readonly acc: A }
  | { readonly kind: "halted"; readonly acc: A }
  | { readonly kind: "suspended"; readonly acc: A; readonly resume: Continuation<A> };

/**
 * Pull-based view over a sequence of values. Consumers drive it with
 * {@link Sequence.reduce}; a suspended reduction picks up exactly where it
 * stopped when its continuation is called.
 */
export interface Sequence<V> {
  count(): number;
  contains(term: V): boolean;
  slice(start: number, length: number): V[];
  reduce<A>(signal: Signal<A>, reducer: Reducer<V, A>): ReduceResult<A>;
}

export function next<A>(acc: A): Signal<A> {
  return { kind: "continue", acc };
}

export function suspend<A>(acc: A): Signal<A> {
  return { kind: "suspend", acc };
}

export function halt<A>(acc: A): Signal<A> {
  return { kind: "halt", acc };
}

export class MatrixSequence<V> implements Sequence<V> {
  private readonly matrix: Matrix<V>;

  constructor(matrix: Matrix<V>) {
    this.matrix = matrix;
  }

  count(): number {
    return this.matrix.size;
  }

  contains(term: V): boolean {
    return member(this.matrix, term);
  }

  slice(start: number, length: number): V[] {
    if (!Number.isInteger(start) || start < 0 || !Number.isInteger(length) || length < 0) {
      throw new MatrixError(
        "E_INDEX_OUT_OF_RANGE",
        `slice: start (${start}) and length (${length}) must be non-negative integers`
      );
    }
    const end = Math.min(start + length, this.matrix.size);
    const out: V[] = [];
    for (let index = start; index < end; index += 1) {
      out.push(this.matrix.getIndex(index));
    }
    return out;
  }

  reduce<A>(signal: Signal<A>, reducer: Reducer<V, A>): ReduceResult<A> {
    return this.drive(0, signal, reducer);
  }

  private drive<A>(from: number, signal: Signal<A>, reducer: Reducer<V, A>): ReduceResult<A> {
    const { matrix } = this;
    let current = signal;
    let index = from;
    for (;;) {
      switch (current.kind) {
        case "halt":
          return { kind: "halted", acc: current.acc };
        case "suspend": {
          const at = index;
          return {
            kind: "suspended",
            acc: current.acc,
            resume: (resumed) => this.drive(at, resumed, reducer),
          };
        }
        case "continue":
          if (index >= matrix.size) {
            return { kind: "done", acc: current.acc };
          }
          current = reducer(matrix.getIndex(index), current.acc);
          index += 1;
          break;
      }
    }
  }
}

/** Runs a reduction to the end, resuming through every suspension. */
export function collect<V, A>(
  sequence: Sequence<V>,
  init: A,
  reducer: Reducer<V, A>
): A {
  let result = sequence.reduce(next(init), reducer);
  while (result.kind === "suspended") {
    result = result.resume(next(result.acc));
  }
  return result.acc;
}

type Slot<V> = { value: V } | null;

function open<V>(sequence: Sequence<V>): Continuation<Slot<V>> | null {
  const result = sequence.reduce<Slot<V>>(suspend(null), (value) => suspend({ value }));
  return result.kind === "suspended" ? result.resume : null;
}

function pull<V>(cursor: Continuation<Slot<V>>): { value: V; rest: Continuation<Slot<V>> } | null {
  const result = cursor(next(null));
  if (result.kind !== "suspended" || result.acc === null) {
    return null;
  }
  return { value: result.acc.value, rest: result.resume };
}

/**
 * Pairs values from two sequences in order, one element at a time from each,
 * stopping at the shorter one.
 */
export function zip<L, R>(left: Sequence<L>, right: Sequence<R>): Array<[L, R]> {
  const pairs: Array<[L, R]> = [];
  let leftCursor = open(left);
  let rightCursor = open(right);
  while (leftCursor !== null && rightCursor !== null) {
    const l = pull(leftCursor);
    if (l === null) {
      rightCursor(halt(null));
      break;
    }
    const r = pull(rightCursor);
    if (r === null) {
      l.rest(halt(null));
      break;
    }
    pairs.push([l.value, r.value]);
    leftCursor = l.rest;
    rightCursor = r.rest;
  }
  return pairs;
}
