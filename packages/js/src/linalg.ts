import type { Arithmetic } from "./arithmetic";
import { numberArithmetic } from "./arithmetic";
import { sumWith } from "./aggregate";
import { MatrixError } from "./errors";
import { Matrix } from "./matrix";
import { PackedStore } from "./store";
import { column, row, transpose } from "./transform";
import { map } from "./traversal";

function ensureSameShape<V>(a: Matrix<V>, b: Matrix<V>, context: string): void {
  if (a.rows !== b.rows || a.columns !== b.columns) {
    throw new MatrixError(
      "E_SHAPE_MISMATCH",
      `${context}: shape mismatch (${a.rows} x ${a.columns}) vs (${b.rows} x ${b.columns})`
    );
  }
}

export function addWith<V>(a: Matrix<V>, b: Matrix<V>, arithmetic: Arithmetic<V>): Matrix<V> {
  ensureSameShape(a, b, "add");
  return map(a, (index, value) => arithmetic.add(value, b.getIndex(index)));
}

export function add(a: Matrix<number>, b: Matrix<number>): Matrix<number> {
  return addWith(a, b, numberArithmetic);
}

export function multiplyElementwiseWith<V>(
  a: Matrix<V>,
  b: Matrix<V>,
  arithmetic: Arithmetic<V>
): Matrix<V> {
  ensureSameShape(a, b, "multiplyElementwise");
  return map(a, (index, value) => arithmetic.multiply(value, b.getIndex(index)));
}

export function multiplyElementwise(a: Matrix<number>, b: Matrix<number>): Matrix<number> {
  return multiplyElementwiseWith(a, b, numberArithmetic);
}

/**
 * Naive matrix product. Rows of `a` (as column vectors) and columns of `b`
 * are extracted once up front; cell (i, j) is the sum of their elementwise
 * product.
 */
export function dotWith<V>(a: Matrix<V>, b: Matrix<V>, arithmetic: Arithmetic<V>): Matrix<V> {
  if (a.columns !== b.rows) {
    throw new MatrixError(
      "E_SHAPE_MISMATCH",
      `dot: inner dimensions differ (${a.rows} x ${a.columns}) . (${b.rows} x ${b.columns})`
    );
  }
  const rowVectors = Array.from({ length: a.rows }, (_, i) => transpose(row(a, i)));
  const columnVectors = Array.from({ length: b.columns }, (_, j) => column(b, j));
  const columns = b.columns;
  const store = PackedStore.build(a.rows * columns, arithmetic.zero, (writer) => {
    for (let i = 0; i < a.rows; i += 1) {
      for (let j = 0; j < columns; j += 1) {
        const products = multiplyElementwiseWith(rowVectors[i], columnVectors[j], arithmetic);
        writer.set(i * columns + j, sumWith(products, arithmetic));
      }
    }
  });
  return Matrix.fromStore(store, a.rows, columns);
}

export function dot(a: Matrix<number>, b: Matrix<number>): Matrix<number> {
  return dotWith(a, b, numberArithmetic);
}
