import type { Arithmetic, Compare } from "./arithmetic";
import { sameValue } from "./arithmetic";
import {
  argmax,
  argmin,
  find,
  locate,
  max,
  member,
  min,
  sum,
  sumWith,
  trace,
  traceWith,
} from "./aggregate";
import { MatrixError } from "./errors";
import { formatMatrix, type OutputFormat } from "./format";
import { add, dot, multiplyElementwise } from "./linalg";
import { MatrixSequence } from "./sequence";
import { PackedStore } from "./store";
import {
  column,
  concat,
  diagonal,
  dropColumn,
  dropRow,
  flipLR,
  flipUD,
  row,
  transpose,
  type Axis,
} from "./transform";
import {
  foldLeft,
  foldRight,
  map,
  sparseFoldLeft,
  sparseFoldRight,
  sparseMap,
  type FoldFn,
  type MapFn,
} from "./traversal";

export type Position = { row: number; col: number };

export type MatrixOptions<V> = { default: V };

export function ensureDimension(value: number, name: string, context: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new MatrixError(
      "E_INVALID_DIMENSION",
      `${context}: ${name} (${value}) must be a positive integer`
    );
  }
}

function resolveDefault<V>(options: Partial<MatrixOptions<V>> | undefined): V | number {
  return options !== undefined && options.default !== undefined ? options.default : 0;
}

export class Matrix<V> implements Iterable<V> {
  readonly store: PackedStore<V>;
  readonly rows: number;
  readonly columns: number;

  private constructor(store: PackedStore<V>, rows: number, columns: number) {
    this.store = store;
    this.rows = rows;
    this.columns = columns;
  }

  static create(rows: number, columns: number): Matrix<number>;
  static create<V>(rows: number, columns: number, options: MatrixOptions<V>): Matrix<V>;
  static create<V>(
    rows: number,
    columns: number,
    options?: Partial<MatrixOptions<V>>
  ): Matrix<V | number> {
    ensureDimension(rows, "rows", "Matrix.create");
    ensureDimension(columns, "columns", "Matrix.create");
    const store = PackedStore.create<V | number>(rows * columns, resolveDefault(options));
    return new Matrix(store, rows, columns);
  }

  /**
   * Row-major fill. Fewer values than cells leaves the tail at the default
   * and the sparse extent at `values.length`.
   */
  static fromFlat(
    values: readonly number[],
    rows: number,
    columns: number,
    options?: Partial<MatrixOptions<number>>
  ): Matrix<number>;
  static fromFlat<V>(
    values: readonly V[],
    rows: number,
    columns: number,
    options: MatrixOptions<V>
  ): Matrix<V>;
  static fromFlat<V>(
    values: readonly V[],
    rows: number,
    columns: number,
    options?: Partial<MatrixOptions<V>>
  ): Matrix<V | number> {
    ensureDimension(rows, "rows", "Matrix.fromFlat");
    ensureDimension(columns, "columns", "Matrix.fromFlat");
    if (values.length === 0) {
      throw new MatrixError("E_SHAPE_MISMATCH", "Matrix.fromFlat: values must not be empty");
    }
    const size = rows * columns;
    if (values.length > size) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `Matrix.fromFlat: ${values.length} values do not fit shape (${rows} x ${columns})`
      );
    }
    const store = PackedStore.fromValues<V | number>(values, size, resolveDefault(options));
    return new Matrix(store, rows, columns);
  }

  static fromNested(
    rows: readonly (readonly number[])[],
    options?: Partial<MatrixOptions<number>>
  ): Matrix<number>;
  static fromNested<V>(rows: readonly (readonly V[])[], options: MatrixOptions<V>): Matrix<V>;
  static fromNested<V>(
    rows: readonly (readonly V[])[],
    options?: Partial<MatrixOptions<V>>
  ): Matrix<V | number> {
    if (rows.length === 0 || rows[0].length === 0) {
      throw new MatrixError("E_SHAPE_MISMATCH", "Matrix.fromNested: rows must not be empty");
    }
    const columns = rows[0].length;
    const values: V[] = [];
    rows.forEach((entries, index) => {
      if (entries.length !== columns) {
        throw new MatrixError(
          "E_SHAPE_MISMATCH",
          `Matrix.fromNested: row ${index} has ${entries.length} values, expected ${columns}`
        );
      }
      for (const value of entries) {
        values.push(value);
      }
    });
    const store = PackedStore.fromValues<V | number>(
      values,
      rows.length * columns,
      resolveDefault(options)
    );
    return new Matrix(store, rows.length, columns);
  }

  static fromStore<V>(store: PackedStore<V>, rows: number, columns: number): Matrix<V> {
    ensureDimension(rows, "rows", "Matrix.fromStore");
    ensureDimension(columns, "columns", "Matrix.fromStore");
    if (store.length !== rows * columns) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `Matrix.fromStore: store length (${store.length}) does not match shape (${rows} x ${columns})`
      );
    }
    return new Matrix(store, rows, columns);
  }

  get size(): number {
    return this.rows * this.columns;
  }

  get defaultValue(): V {
    return this.store.defaultValue;
  }

  get sparseExtent(): number {
    return this.store.sparseExtent;
  }

  count(): number {
    return this.size;
  }

  positionToIndex(position: Position, context = "positionToIndex"): number {
    const { row, col } = position;
    if (
      !Number.isInteger(row) ||
      !Number.isInteger(col) ||
      row < 0 ||
      row >= this.rows ||
      col < 0 ||
      col >= this.columns
    ) {
      throw new MatrixError(
        "E_POSITION_OUT_OF_BOUNDS",
        `${context}: position (${row}, ${col}) is outside shape (${this.rows} x ${this.columns})`
      );
    }
    return row * this.columns + col;
  }

  indexToPosition(index: number): Position {
    if (!Number.isInteger(index) || index < 0 || index >= this.size) {
      throw new MatrixError(
        "E_INDEX_OUT_OF_RANGE",
        `indexToPosition: index ${index} is outside 0..${this.size - 1}`
      );
    }
    const row = Math.floor(index / this.columns);
    return { row, col: index - row * this.columns };
  }

  get(position: Position): V {
    return this.store.get(this.positionToIndex(position, "get"));
  }

  getIndex(index: number): V {
    return this.store.get(index);
  }

  set(position: Position, value: V): Matrix<V> {
    const index = this.positionToIndex(position, "set");
    return new Matrix(this.store.set(index, value), this.rows, this.columns);
  }

  reset(position: Position): Matrix<V> {
    const index = this.positionToIndex(position, "reset");
    return new Matrix(this.store.reset(index), this.rows, this.columns);
  }

  setRow(rowIndex: number, source: Matrix<V>): Matrix<V> {
    if (source.rows !== 1 || source.columns !== this.columns) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `setRow: expected a 1 x ${this.columns} matrix, received ${source.rows} x ${source.columns}`
      );
    }
    const offset = this.positionToIndex({ row: rowIndex, col: 0 }, "setRow");
    const store = this.store.update((writer) => {
      for (let col = 0; col < this.columns; col += 1) {
        writer.set(offset + col, source.getIndex(col));
      }
    });
    return new Matrix(store, this.rows, this.columns);
  }

  setColumn(colIndex: number, source: Matrix<V>): Matrix<V> {
    if (source.columns !== 1 || source.rows !== this.rows) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `setColumn: expected a ${this.rows} x 1 matrix, received ${source.rows} x ${source.columns}`
      );
    }
    this.positionToIndex({ row: 0, col: colIndex }, "setColumn");
    const store = this.store.update((writer) => {
      for (let row = 0; row < this.rows; row += 1) {
        writer.set(row * this.columns + colIndex, source.getIndex(row));
      }
    });
    return new Matrix(store, this.rows, this.columns);
  }

  reshape(rows: number, columns: number): Matrix<V> {
    ensureDimension(rows, "rows", "reshape");
    ensureDimension(columns, "columns", "reshape");
    if (rows * columns !== this.size) {
      throw new MatrixError(
        "E_SHAPE_MISMATCH",
        `reshape: cannot view ${this.rows} x ${this.columns} as ${rows} x ${columns}`
      );
    }
    return new Matrix(this.store, rows, columns);
  }

  toArray(): V[] {
    return this.store.toArray();
  }

  toNested(): V[][] {
    const flat = this.toArray();
    const out: V[][] = [];
    for (let r = 0; r < this.rows; r += 1) {
      out.push(flat.slice(r * this.columns, (r + 1) * this.columns));
    }
    return out;
  }

  rowToArray(index: number): V[] {
    const offset = this.positionToIndex({ row: index, col: 0 }, "rowToArray");
    const out: V[] = [];
    for (let col = 0; col < this.columns; col += 1) {
      out.push(this.store.get(offset + col));
    }
    return out;
  }

  columnToArray(index: number): V[] {
    this.positionToIndex({ row: 0, col: index }, "columnToArray");
    const out: V[] = [];
    for (let r = 0; r < this.rows; r += 1) {
      out.push(this.store.get(r * this.columns + index));
    }
    return out;
  }

  /** Same shape and same cell values; defaults and extents are not compared. */
  equals(other: Matrix<V>): boolean {
    if (this.rows !== other.rows || this.columns !== other.columns) {
      return false;
    }
    for (let index = 0; index < this.size; index += 1) {
      if (!sameValue(this.store.get(index), other.store.get(index))) {
        return false;
      }
    }
    return true;
  }

  *[Symbol.iterator](): Iterator<V> {
    for (let index = 0; index < this.size; index += 1) {
      yield this.store.get(index);
    }
  }

  sequence(): MatrixSequence<V> {
    return new MatrixSequence(this);
  }

  foldLeft<A>(fn: FoldFn<V, A>, init: A): A {
    return foldLeft(this, fn, init);
  }

  foldRight<A>(fn: FoldFn<V, A>, init: A): A {
    return foldRight(this, fn, init);
  }

  sparseFoldLeft<A>(fn: FoldFn<V, A>, init: A): A {
    return sparseFoldLeft(this, fn, init);
  }

  sparseFoldRight<A>(fn: FoldFn<V, A>, init: A): A {
    return sparseFoldRight(this, fn, init);
  }

  map(fn: MapFn<V>): Matrix<V> {
    return map(this, fn);
  }

  sparseMap(fn: MapFn<V>): Matrix<V> {
    return sparseMap(this, fn);
  }

  min(compare?: Compare<V>): V {
    return min(this, compare);
  }

  max(compare?: Compare<V>): V {
    return max(this, compare);
  }

  argmin(compare?: Compare<V>): Position {
    return argmin(this, compare);
  }

  argmax(compare?: Compare<V>): Position {
    return argmax(this, compare);
  }

  member(term: V): boolean {
    return member(this, term);
  }

  find(term: V): Position | null {
    return find(this, term);
  }

  locate(term: V): Position {
    return locate(this, term);
  }

  sum(this: Matrix<number>): number {
    return sum(this);
  }

  sumWith(arithmetic: Arithmetic<V>): V {
    return sumWith(this, arithmetic);
  }

  trace(this: Matrix<number>): number {
    return trace(this);
  }

  traceWith(arithmetic: Arithmetic<V>): V {
    return traceWith(this, arithmetic);
  }

  row(index: number): Matrix<V> {
    return row(this, index);
  }

  column(index: number): Matrix<V> {
    return column(this, index);
  }

  diagonal(): Matrix<V> {
    return diagonal(this);
  }

  transpose(): Matrix<V> {
    return transpose(this);
  }

  flipLR(): Matrix<V> {
    return flipLR(this);
  }

  flipUD(): Matrix<V> {
    return flipUD(this);
  }

  dropRow(index: number): Matrix<V> {
    return dropRow(this, index);
  }

  dropColumn(index: number): Matrix<V> {
    return dropColumn(this, index);
  }

  concat(others: readonly Matrix<V>[], axis: Axis = "rows"): Matrix<V> {
    return concat([this, ...others], axis, { default: this.defaultValue });
  }

  add(this: Matrix<number>, other: Matrix<number>): Matrix<number> {
    return add(this, other);
  }

  multiplyElementwise(this: Matrix<number>, other: Matrix<number>): Matrix<number> {
    return multiplyElementwise(this, other);
  }

  dot(this: Matrix<number>, other: Matrix<number>): Matrix<number> {
    return dot(this, other);
  }

  toJSON(): { rows: number; columns: number; default: V; data: V[][] } {
    return {
      rows: this.rows,
      columns: this.columns,
      default: this.defaultValue,
      data: this.toNested(),
    };
  }

  toString(options?: Partial<OutputFormat>): string {
    return formatMatrix(this, options);
  }
}
