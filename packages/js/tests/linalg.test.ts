import { describe, expect, it } from "vitest";
import {
  Matrix,
  add,
  bigintArithmetic,
  dot,
  dotWith,
  identity,
  isMatrixError,
  multiplyElementwise,
} from "../src";

describe("elementwise operators", () => {
  const a = Matrix.fromNested([
    [1, 2],
    [3, 4],
  ]);
  const b = Matrix.fromNested([
    [10, 20],
    [30, 40],
  ]);

  it("adds cell by cell", () => {
    expect(add(a, b).toNested()).toEqual([
      [11, 22],
      [33, 44],
    ]);
    expect(a.add(b).equals(add(a, b))).toBe(true);
  });

  it("multiplies cell by cell", () => {
    expect(multiplyElementwise(a, b).toNested()).toEqual([
      [10, 40],
      [90, 160],
    ]);
  });

  it("reads elided defaults on both sides", () => {
    const left = Matrix.create(2, 2, { default: 1 }).set({ row: 0, col: 0 }, 5);
    const right = Matrix.create(2, 2, { default: 2 });
    expect(add(left, right).toArray()).toEqual([7, 3, 3, 3]);
  });

  it("fails with E_SHAPE_MISMATCH on different shapes", () => {
    let caught: unknown;
    try {
      add(a, Matrix.create(2, 3));
    } catch (error) {
      caught = error;
    }
    expect(isMatrixError(caught, "E_SHAPE_MISMATCH")).toBe(true);
    expect(() => multiplyElementwise(a, Matrix.create(1, 2))).toThrow(
      "multiplyElementwise: shape mismatch (2 x 2) vs (1 x 2)"
    );
  });
});

describe("dot", () => {
  it("computes the matrix product", () => {
    const a = Matrix.fromNested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    const b = Matrix.fromNested([
      [7, 8],
      [9, 10],
      [11, 12],
    ]);
    const product = a.dot(b);
    expect([product.rows, product.columns]).toEqual([2, 2]);
    expect(product.toNested()).toEqual([
      [58, 64],
      [139, 154],
    ]);
  });

  it("leaves a matrix unchanged under the identity", () => {
    const a = Matrix.fromNested([
      [2, 0, 1],
      [3, 5, 7],
    ]);
    expect(dot(a, identity(3)).equals(a)).toBe(true);
    expect(dot(identity(2), a).equals(a)).toBe(true);
  });

  it("treats elided defaults as real values", () => {
    const a = Matrix.create(2, 2, { default: 1 });
    expect(dot(a, a).toArray()).toEqual([2, 2, 2, 2]);
  });

  it("works over bigint arithmetic", () => {
    const a = Matrix.fromNested([[1n, 2n]], { default: 0n });
    const b = Matrix.fromNested([[3n], [4n]], { default: 0n });
    expect(dotWith(a, b, bigintArithmetic).toArray()).toEqual([11n]);
  });

  it("requires matching inner dimensions", () => {
    expect(() => dot(Matrix.create(2, 3), Matrix.create(2, 3))).toThrow(
      "dot: inner dimensions differ (2 x 3) . (2 x 3)"
    );
  });
});
