import type { Arithmetic } from "./arithmetic";
import { numberArithmetic } from "./arithmetic";
import { MatrixError } from "./errors";
import { ensureDimension, Matrix, type MatrixOptions } from "./matrix";
import { PackedStore } from "./store";
import { sparseFoldLeft } from "./traversal";

export type Axis = "rows" | "columns";

function resolveDefault<V>(options: Partial<MatrixOptions<V>> | undefined, fallback: V): V {
  return options !== undefined && options.default !== undefined ? options.default : fallback;
}

export function row<V>(matrix: Matrix<V>, index: number): Matrix<V> {
  const values = matrix.rowToArray(index);
  const offset = index * matrix.columns;
  const stored = Math.min(Math.max(matrix.sparseExtent - offset, 0), matrix.columns);
  const store = PackedStore.fromValues(values.slice(0, stored), matrix.columns, matrix.defaultValue);
  return Matrix.fromStore(store, 1, matrix.columns);
}

export function column<V>(matrix: Matrix<V>, index: number): Matrix<V> {
  const values = matrix.columnToArray(index);
  const extent = matrix.sparseExtent;
  const stored =
    extent > index ? Math.min(Math.ceil((extent - index) / matrix.columns), matrix.rows) : 0;
  const store = PackedStore.fromValues(values.slice(0, stored), matrix.rows, matrix.defaultValue);
  return Matrix.fromStore(store, matrix.rows, 1);
}

/** 1 x n row of the cells (i, i); n is the shorter dimension. */
export function diagonal<V>(matrix: Matrix<V>): Matrix<V> {
  const length = Math.min(matrix.rows, matrix.columns);
  const store = PackedStore.build(length, matrix.defaultValue, (writer) => {
    for (let i = 0; i < length; i += 1) {
      const index = i * matrix.columns + i;
      if (index < matrix.sparseExtent) {
        writer.set(i, matrix.getIndex(index));
      }
    }
  });
  return Matrix.fromStore(store, 1, length);
}

export function identityWith<V>(
  size: number,
  arithmetic: Arithmetic<V>,
  options?: Partial<MatrixOptions<V>>
): Matrix<V> {
  ensureDimension(size, "size", "identity");
  const defaultValue = resolveDefault(options, arithmetic.zero);
  const store = PackedStore.build(size * size, defaultValue, (writer) => {
    for (let i = 0; i < size; i += 1) {
      writer.set(i * size + i, arithmetic.one);
    }
  });
  return Matrix.fromStore(store, size, size);
}

export function identity(size: number, options?: Partial<MatrixOptions<number>>): Matrix<number> {
  return identityWith(size, numberArithmetic, options);
}

/**
 * Rewrites every cell below the sparse extent to `target(row, col)` in a
 * default-filled store of the given shape.
 */
function relocate<V>(
  matrix: Matrix<V>,
  rows: number,
  columns: number,
  target: (row: number, col: number) => number
): Matrix<V> {
  const store = PackedStore.build(rows * columns, matrix.defaultValue, (writer) => {
    sparseFoldLeft(
      matrix,
      (index, value, acc: null) => {
        const { row: r, col: c } = matrix.indexToPosition(index);
        writer.set(target(r, c), value);
        return acc;
      },
      null
    );
  });
  return Matrix.fromStore(store, rows, columns);
}

export function transpose<V>(matrix: Matrix<V>): Matrix<V> {
  const rows = matrix.columns;
  const columns = matrix.rows;
  return relocate(matrix, rows, columns, (r, c) => c * columns + r);
}

export function flipLR<V>(matrix: Matrix<V>): Matrix<V> {
  const { rows, columns } = matrix;
  return relocate(matrix, rows, columns, (r, c) => r * columns + (columns - 1 - c));
}

export function flipUD<V>(matrix: Matrix<V>): Matrix<V> {
  const { rows, columns } = matrix;
  return relocate(matrix, rows, columns, (r, c) => (rows - 1 - r) * columns + c);
}

function ensureDroppable(count: number, index: number, name: string, context: string): void {
  if (count <= 1) {
    throw new MatrixError(
      "E_INVALID_DIMENSION",
      `${context}: cannot drop the only ${name} of the matrix`
    );
  }
  if (!Number.isInteger(index) || index < 0 || index >= count) {
    throw new MatrixError(
      "E_INVALID_DIMENSION",
      `${context}: ${name} ${index} is outside 0..${count - 1}`
    );
  }
}

export function dropRow<V>(matrix: Matrix<V>, index: number): Matrix<V> {
  ensureDroppable(matrix.rows, index, "row", "dropRow");
  const { columns } = matrix;
  const first = index * columns;
  const last = first + columns - 1;
  const store = PackedStore.build((matrix.rows - 1) * columns, matrix.defaultValue, (writer) => {
    sparseFoldLeft(
      matrix,
      (source, value, acc: null) => {
        if (source < first) {
          writer.set(source, value);
        } else if (source > last) {
          writer.set(source - columns, value);
        }
        return acc;
      },
      null
    );
  });
  return Matrix.fromStore(store, matrix.rows - 1, columns);
}

export function dropColumn<V>(matrix: Matrix<V>, index: number): Matrix<V> {
  ensureDroppable(matrix.columns, index, "column", "dropColumn");
  const columns = matrix.columns - 1;
  const store = PackedStore.build(matrix.rows * columns, matrix.defaultValue, (writer) => {
    sparseFoldLeft(
      matrix,
      (source, value, acc: null) => {
        const { row: r, col: c } = matrix.indexToPosition(source);
        if (c !== index) {
          writer.set(r * columns + (c < index ? c : c - 1), value);
        }
        return acc;
      },
      null
    );
  });
  return Matrix.fromStore(store, matrix.rows, columns);
}

/**
 * Stacks matrices along `axis`: whole rows one after another for "rows",
 * whole columns side by side for "columns".
 */
export function concat<V>(
  matrices: readonly Matrix<V>[],
  axis: Axis,
  options?: Partial<MatrixOptions<V>>
): Matrix<V> {
  if (matrices.length === 0) {
    throw new MatrixError("E_SHAPE_MISMATCH", "concat: at least one matrix is required");
  }
  const [first] = matrices;
  const defaultValue = resolveDefault(options, first.defaultValue);
  if (axis === "rows") {
    const columns = first.columns;
    for (const matrix of matrices) {
      if (matrix.columns !== columns) {
        throw new MatrixError(
          "E_SHAPE_MISMATCH",
          `concat: expected ${columns} columns, received ${matrix.rows} x ${matrix.columns}`
        );
      }
    }
    const rows = matrices.reduce((total, matrix) => total + matrix.size, 0) / columns;
    const store = PackedStore.build(rows * columns, defaultValue, (writer) => {
      let cursor = 0;
      for (const matrix of matrices) {
        for (let r = 0; r < matrix.rows; r += 1) {
          for (const value of row(matrix, r)) {
            writer.set(cursor, value);
            cursor += 1;
          }
        }
      }
    });
    return Matrix.fromStore(store, rows, columns);
  }
  const rows = first.rows;
  for (const matrix of matrices) {
    if (matrix.rows !== rows) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `concat: expected ${rows} rows, received ${matrix.rows} x ${matrix.columns}`
      );
    }
  }
  const columns = matrices.reduce((total, matrix) => total + matrix.size, 0) / rows;
  const store = PackedStore.build(rows * columns, defaultValue, (writer) => {
    let cursor = 0;
    for (const matrix of matrices) {
      for (let c = 0; c < matrix.columns; c += 1) {
        let r = 0;
        for (const value of column(matrix, c)) {
          writer.set(r * columns + cursor, value);
          r += 1;
        }
        cursor += 1;
      }
    }
  });
  return Matrix.fromStore(store, rows, columns);
}
