export type Compare<V> = (left: V, right: V) => number;

/** Element algebra for the numeric operators. */
export interface Arithmetic<V> {
  readonly zero: V;
  readonly one: V;
  add(left: V, right: V): V;
  multiply(left: V, right: V): V;
  /** `value` added to itself `count` times; `zero` when count is 0. */
  repeat(value: V, count: number): V;
}

export const numberArithmetic: Arithmetic<number> = {
  zero: 0,
  one: 1,
  add: (left, right) => left + right,
  multiply: (left, right) => left * right,
  repeat: (value, count) => (count === 0 ? 0 : value * count),
};

export const bigintArithmetic: Arithmetic<bigint> = {
  zero: 0n,
  one: 1n,
  add: (left, right) => left + right,
  multiply: (left, right) => left * right,
  repeat: (value, count) => value * BigInt(count),
};

function typeRank(value: unknown): number {
  switch (typeof value) {
    case "number":
    case "bigint":
      return 0;
    case "boolean":
      return 1;
    case "string":
      return 2;
    case "symbol":
      return 3;
    case "object":
      return value === null ? 6 : 4;
    case "function":
      return 5;
    default:
      return 7;
  }
}

/**
 * Total-ish order over arbitrary cell values. Numbers and bigints compare by
 * magnitude, strings by code unit, booleans false < true; values of different
 * kinds are ordered by kind. Anything else compares equal.
 */
export function naturalOrder(left: unknown, right: unknown): number {
  const leftRank = typeRank(left);
  const rightRank = typeRank(right);
  if (leftRank !== rightRank) {
    return leftRank - rightRank;
  }
  if (
    (typeof left === "number" || typeof left === "bigint") &&
    (typeof right === "number" || typeof right === "bigint")
  ) {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === "string" && typeof right === "string") {
    return left < right ? -1 : left > right ? 1 : 0;
  }
  if (typeof left === "boolean" && typeof right === "boolean") {
    return Number(left) - Number(right);
  }
  return 0;
}

/** SameValueZero, as used by `Array.prototype.includes`. */
export function sameValue(left: unknown, right: unknown): boolean {
  return left === right || (left !== left && right !== right);
}
