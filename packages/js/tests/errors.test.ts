import { describe, expect, it } from "vitest";
import { MatrixError, isMatrixError, normalizeError, parseErrorString } from "../src";

describe("parseErrorString", () => {
  it("splits a known code from its detail", () => {
    expect(parseErrorString("E_SHAPE_MISMATCH: 2 x 2 vs 3 x 3")).toEqual({
      code: "E_SHAPE_MISMATCH",
      message: "2 x 2 vs 3 x 3",
    });
  });

  it("ignores unknown prefixes", () => {
    expect(parseErrorString("E_UNKNOWN: nope")).toBeNull();
    expect(parseErrorString("plain message")).toBeNull();
  });
});

describe("normalizeError", () => {
  it("returns a MatrixError unchanged", () => {
    const error = new MatrixError("E_NOT_FOUND", "missing");
    expect(normalizeError(error)).toBe(error);
  });

  it("lifts coded strings and errors into MatrixError", () => {
    const fromString = normalizeError("E_INVALID_DIMENSION: rows must be positive");
    expect(isMatrixError(fromString, "E_INVALID_DIMENSION")).toBe(true);
    expect(fromString.message).toBe("rows must be positive");

    const cause = new Error("E_INDEX_OUT_OF_RANGE: index 9");
    const fromError = normalizeError(cause);
    expect(isMatrixError(fromError, "E_INDEX_OUT_OF_RANGE")).toBe(true);
    expect(fromError.cause).toBe(cause);
  });

  it("wraps everything else in a plain Error", () => {
    const plain = new TypeError("bad");
    expect(normalizeError(plain)).toBe(plain);
    const coerced = normalizeError(42);
    expect(coerced).toBeInstanceOf(Error);
    expect(isMatrixError(coerced)).toBe(false);
    expect(coerced.message).toBe("42");
  });
});

describe("MatrixError", () => {
  it("carries its code and name", () => {
    const error = new MatrixError("E_SHAPE_MISMATCH", "dot: inner dimensions differ");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("MatrixError");
    expect(error.code).toBe("E_SHAPE_MISMATCH");
    expect(isMatrixError(error, "E_NOT_FOUND")).toBe(false);
    expect(isMatrixError(new Error("x"))).toBe(false);
  });
});
