import { describe, expect, it } from "vitest";
import { Matrix, MatrixError, isMatrixError, type MatrixErrorCode } from "../src";

function codeOf(fn: () => unknown): MatrixErrorCode | null {
  try {
    fn();
  } catch (error) {
    return isMatrixError(error) ? error.code : null;
  }
  return null;
}

describe("Matrix construction", () => {
  it("fills a new matrix with the default", () => {
    const matrix = Matrix.create(5, 5, { default: 2 }).set({ row: 0, col: 0 }, 8);
    expect(matrix.get({ row: 0, col: 0 })).toBe(8);
    const nested = matrix.toNested();
    expect(nested).toHaveLength(5);
    expect(nested[0]).toEqual([8, 2, 2, 2, 2]);
    for (const values of nested.slice(1)) {
      expect(values).toEqual([2, 2, 2, 2, 2]);
    }
  });

  it("defaults to 0 when no default is given", () => {
    const matrix = Matrix.create(2, 3);
    expect(matrix.defaultValue).toBe(0);
    expect(matrix.size).toBe(6);
    expect(matrix.count()).toBe(6);
    expect(matrix.sparseExtent).toBe(0);
  });

  it("round-trips nested rows", () => {
    const rows = [
      [1, 2, 3],
      [4, 5, 6],
    ];
    const matrix = Matrix.fromNested(rows);
    expect(matrix.rows).toBe(2);
    expect(matrix.columns).toBe(3);
    expect(matrix.toNested()).toEqual(rows);
    expect(matrix.sparseExtent).toBe(6);
  });

  it("keeps non-numeric cell types", () => {
    const matrix = Matrix.fromNested([["a", "b"], ["c", "d"]], { default: "" });
    expect(matrix.get({ row: 1, col: 0 })).toBe("c");
    expect(matrix.toArray()).toEqual(["a", "b", "c", "d"]);
  });

  it("rejects ragged nested rows", () => {
    expect(() => Matrix.fromNested([[1, 2], [3]])).toThrow(
      "Matrix.fromNested: row 1 has 1 values, expected 2"
    );
    expect(codeOf(() => Matrix.fromNested([]))).toBe("E_SHAPE_MISMATCH");
    expect(codeOf(() => Matrix.fromNested([[]]))).toBe("E_SHAPE_MISMATCH");
  });

  it("fills from a flat list in row-major order", () => {
    const matrix = Matrix.fromFlat([1, 2, 3, 4, 5, 6], 3, 2);
    expect(matrix.toNested()).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
  });

  it("pads a short flat list with the default", () => {
    const matrix = Matrix.fromFlat([1, 2, 3], 2, 3, { default: -1 });
    expect(matrix.toArray()).toEqual([1, 2, 3, -1, -1, -1]);
    expect(matrix.sparseExtent).toBe(3);
  });

  it("rejects empty or oversized flat lists", () => {
    expect(codeOf(() => Matrix.fromFlat([], 1, 1))).toBe("E_SHAPE_MISMATCH");
    expect(codeOf(() => Matrix.fromFlat([1, 2, 3], 1, 2))).toBe("E_SHAPE_MISMATCH");
  });

  it("rejects non-positive dimensions", () => {
    expect(codeOf(() => Matrix.create(0, 3))).toBe("E_INVALID_DIMENSION");
    expect(codeOf(() => Matrix.create(2, 1.5))).toBe("E_INVALID_DIMENSION");
  });
});

describe("Matrix access", () => {
  const matrix = Matrix.fromNested([
    [1, 2, 3],
    [4, 5, 6],
  ]);

  it("maps positions to indices and back", () => {
    for (let row = 0; row < matrix.rows; row += 1) {
      for (let col = 0; col < matrix.columns; col += 1) {
        const index = matrix.positionToIndex({ row, col });
        expect(index).toBe(row * 3 + col);
        expect(matrix.indexToPosition(index)).toEqual({ row, col });
      }
    }
  });

  it("fails with E_POSITION_OUT_OF_BOUNDS outside the shape", () => {
    expect(codeOf(() => matrix.get({ row: 2, col: 0 }))).toBe("E_POSITION_OUT_OF_BOUNDS");
    expect(codeOf(() => matrix.set({ row: 0, col: -1 }, 1))).toBe("E_POSITION_OUT_OF_BOUNDS");
    expect(codeOf(() => matrix.reset({ row: 0, col: 3 }))).toBe("E_POSITION_OUT_OF_BOUNDS");
    expect(() => matrix.get({ row: 0, col: 3 })).toThrow(MatrixError);
  });

  it("names the failing operation in position errors", () => {
    expect(() => matrix.get({ row: 2, col: 0 })).toThrow(
      "get: position (2, 0) is outside shape (2 x 3)"
    );
    expect(() => matrix.set({ row: 0, col: -1 }, 1)).toThrow(
      "set: position (0, -1) is outside shape (2 x 3)"
    );
    expect(() => matrix.positionToIndex({ row: 5, col: 5 })).toThrow(
      "positionToIndex: position (5, 5) is outside shape (2 x 3)"
    );
    expect(() => matrix.rowToArray(2)).toThrow(
      "rowToArray: position (2, 0) is outside shape (2 x 3)"
    );
  });

  it("fails with E_INDEX_OUT_OF_RANGE on raw indices", () => {
    expect(codeOf(() => matrix.getIndex(6))).toBe("E_INDEX_OUT_OF_RANGE");
    expect(codeOf(() => matrix.indexToPosition(-1))).toBe("E_INDEX_OUT_OF_RANGE");
  });

  it("never mutates the matrix it was derived from", () => {
    const updated = matrix.set({ row: 1, col: 1 }, 50);
    expect(updated.get({ row: 1, col: 1 })).toBe(50);
    expect(matrix.get({ row: 1, col: 1 })).toBe(5);
  });

  it("restores the default on reset without lowering the extent", () => {
    const sparse = Matrix.create(3, 3, { default: 7 }).set({ row: 1, col: 2 }, 1);
    const reset = sparse.reset({ row: 1, col: 2 });
    expect(reset.get({ row: 1, col: 2 })).toBe(7);
    expect(reset.sparseExtent).toBe(6);
  });

  it("reads rows and columns as arrays", () => {
    expect(matrix.rowToArray(1)).toEqual([4, 5, 6]);
    expect(matrix.columnToArray(2)).toEqual([3, 6]);
  });

  it("iterates values in row-major order", () => {
    expect([...matrix]).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it("compares shape and values in equals", () => {
    expect(matrix.equals(Matrix.fromFlat([1, 2, 3, 4, 5, 6], 2, 3))).toBe(true);
    expect(matrix.equals(Matrix.fromFlat([1, 2, 3, 4, 5, 6], 3, 2))).toBe(false);
    expect(matrix.equals(matrix.set({ row: 0, col: 0 }, 0))).toBe(false);
  });
});

describe("setRow / setColumn", () => {
  const base = Matrix.create(3, 2);

  it("overwrites a whole row", () => {
    const updated = base.setRow(1, Matrix.fromNested([[8, 9]]));
    expect(updated.toNested()).toEqual([
      [0, 0],
      [8, 9],
      [0, 0],
    ]);
    expect(updated.sparseExtent).toBe(4);
  });

  it("overwrites a whole column", () => {
    const updated = base.setColumn(0, Matrix.fromNested([[1], [2], [3]]));
    expect(updated.toNested()).toEqual([
      [1, 0],
      [2, 0],
      [3, 0],
    ]);
  });

  it("requires a matching one-row or one-column source", () => {
    expect(codeOf(() => base.setRow(0, Matrix.fromNested([[1, 2, 3]])))).toBe("E_SHAPE_MISMATCH");
    expect(codeOf(() => base.setRow(0, Matrix.create(2, 2)))).toBe("E_SHAPE_MISMATCH");
    expect(codeOf(() => base.setColumn(0, Matrix.fromNested([[1], [2]])))).toBe(
      "E_SHAPE_MISMATCH"
    );
    expect(codeOf(() => base.setRow(3, Matrix.fromNested([[1, 2]])))).toBe(
      "E_POSITION_OUT_OF_BOUNDS"
    );
  });
});

describe("reshape", () => {
  it("reinterprets the same cells under a new shape", () => {
    const matrix = Matrix.fromFlat([1, 2, 3, 4, 5, 6], 2, 3).reshape(3, 2);
    expect(matrix.toNested()).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
  });

  it("refuses to change the element count", () => {
    expect(codeOf(() => Matrix.create(2, 3).reshape(4, 2))).toBe("E_SHAPE_MISMATCH");
  });
});

describe("serialisation helpers", () => {
  it("produces a JSON-friendly shape", () => {
    const matrix = Matrix.fromFlat([1, 2], 1, 2, { default: 0 });
    expect(JSON.parse(JSON.stringify(matrix))).toEqual({
      rows: 1,
      columns: 2,
      default: 0,
      data: [[1, 2]],
    });
  });
});
