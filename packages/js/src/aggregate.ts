import {
  naturalOrder,
  numberArithmetic,
  sameValue,
  type Arithmetic,
  type Compare,
} from "./arithmetic";
import { MatrixError } from "./errors";
import type { Matrix, Position } from "./matrix";
import { diagonal } from "./transform";
import { proceed, sparseFoldLeft, sparseFoldLeftWhile, stop } from "./traversal";

type Candidate<V> = { index: number; value: V };

/**
 * Best cell under `better`, ties going to the lowest index. The default only
 * competes when some cell is guaranteed to hold it, and it sits at the sparse
 * extent, after every visited index.
 */
function extreme<V>(
  matrix: Matrix<V>,
  compare: Compare<V>,
  better: (order: number) => boolean
): Candidate<V> {
  const visited = sparseFoldLeft<V, Candidate<V> | null>(
    matrix,
    (index, value, best) =>
      best === null || better(compare(value, best.value)) ? { index, value } : best,
    null
  );
  const extent = matrix.sparseExtent;
  if (
    visited !== null &&
    (extent >= matrix.size || !better(compare(matrix.defaultValue, visited.value)))
  ) {
    return visited;
  }
  return { index: extent, value: matrix.defaultValue };
}

const lower = (order: number): boolean => order < 0;
const higher = (order: number): boolean => order > 0;

export function min<V>(matrix: Matrix<V>, compare: Compare<V> = naturalOrder): V {
  return extreme(matrix, compare, lower).value;
}

export function max<V>(matrix: Matrix<V>, compare: Compare<V> = naturalOrder): V {
  return extreme(matrix, compare, higher).value;
}

export function argmin<V>(matrix: Matrix<V>, compare: Compare<V> = naturalOrder): Position {
  return matrix.indexToPosition(extreme(matrix, compare, lower).index);
}

export function argmax<V>(matrix: Matrix<V>, compare: Compare<V> = naturalOrder): Position {
  return matrix.indexToPosition(extreme(matrix, compare, higher).index);
}

function holdsDefault<V>(matrix: Matrix<V>, term: V): boolean {
  return matrix.sparseExtent < matrix.size && sameValue(term, matrix.defaultValue);
}

export function member<V>(matrix: Matrix<V>, term: V): boolean {
  if (holdsDefault(matrix, term)) {
    return true;
  }
  return sparseFoldLeftWhile<V, boolean>(
    matrix,
    (_index, value, found) => (sameValue(value, term) ? stop(true) : proceed(found)),
    false
  );
}

/** Lowest-index position holding `term`, or null. */
export function find<V>(matrix: Matrix<V>, term: V): Position | null {
  const index = sparseFoldLeftWhile<V, number | null>(
    matrix,
    (current, value, acc) => (sameValue(value, term) ? stop(current) : proceed(acc)),
    null
  );
  if (index !== null) {
    return matrix.indexToPosition(index);
  }
  if (holdsDefault(matrix, term)) {
    return matrix.indexToPosition(matrix.sparseExtent);
  }
  return null;
}

export function locate<V>(matrix: Matrix<V>, term: V): Position {
  const position = find(matrix, term);
  if (position === null) {
    throw new MatrixError("E_NOT_FOUND", `locate: ${String(term)} is not in the matrix`);
  }
  return position;
}

/**
 * Folds the cells below the sparse extent, then accounts for the elided tail
 * as `(size - visited) * default`.
 */
export function sumWith<V>(matrix: Matrix<V>, arithmetic: Arithmetic<V>): V {
  const [visited, total] = sparseFoldLeft<V, [number, V]>(
    matrix,
    (_index, value, [count, acc]) => [count + 1, arithmetic.add(acc, value)],
    [0, arithmetic.zero]
  );
  return arithmetic.add(total, arithmetic.repeat(matrix.defaultValue, matrix.size - visited));
}

export function sum(matrix: Matrix<number>): number {
  return sumWith(matrix, numberArithmetic);
}

export function traceWith<V>(matrix: Matrix<V>, arithmetic: Arithmetic<V>): V {
  return sumWith(diagonal(matrix), arithmetic);
}

export function trace(matrix: Matrix<number>): number {
  return traceWith(matrix, numberArithmetic);
}
