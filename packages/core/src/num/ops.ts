/**
 * Arithmetic operators
 *
 * Every operator (+ - * / %) comes in two forms: a pure form returning a new
 * vector and an assign form mutating its target. Both accept either a vector
 * (componentwise) or a scalar of the component kind (broadcast). All ten
 * functions are built by the same two builders, parameterised only by the
 * scalar operation.
 */

import type { Arithmetic, Signed } from "./scalar.js";
import type { Vector2 } from "./vec2.js";

export const BINARY_OPERATORS = [`add`, `sub`, `mul`, `div`, `rem`] as const;

export type BinaryOperator = (typeof BINARY_OPERATORS)[number];

/** Right-hand side of an operator: a vector or a broadcast scalar */
export type Operand<T> = Vector2<T> | T;

export type BinaryFn<T> = (lhs: Vector2<T>, rhs: Operand<T>) => Vector2<T>;
export type AssignFn<T> = (target: Vector2<T>, rhs: Operand<T>) => Vector2<T>;

export type Operators<T> = { readonly [K in BinaryOperator]: BinaryFn<T> } & {
  readonly [K in BinaryOperator as `${K}Assign`]: AssignFn<T>;
};

export interface SignedOperators<T> {
  /** (-x, -y) */
  readonly neg: (v: Vector2<T>) => Vector2<T>;
  /** Perpendicular vector, rotated 90 degrees counter-clockwise, same length: (y, -x) */
  readonly orthogonal: (v: Vector2<T>) => Vector2<T>;
}

/**
 * Tell a vector operand from a scalar by shape. Scalars of the built-in kinds
 * are primitives, so any object with x and y is a vector.
 */
export function isVector<T>(operand: Operand<T>): operand is Vector2<T> {
  return typeof operand === `object` && operand !== null && `x` in operand && `y` in operand;
}

function binary<T>(kind: Arithmetic<T>, op: (a: T, b: T) => T): BinaryFn<T> {
  return (lhs, rhs) => {
    if (isVector(rhs)) {
      return { x: op(lhs.x, rhs.x), y: op(lhs.y, rhs.y) };
    }
    const s = kind.coerce(rhs);
    return { x: op(lhs.x, s), y: op(lhs.y, s) };
  };
}

function assign<T>(kind: Arithmetic<T>, op: (a: T, b: T) => T): AssignFn<T> {
  return (target, rhs) => {
    // Read rhs before writing: target and rhs may be the same vector
    const [rx, ry] = isVector(rhs) ? [rhs.x, rhs.y] : [kind.coerce(rhs), kind.coerce(rhs)];
    target.x = op(target.x, rx);
    target.y = op(target.y, ry);
    return target;
  };
}

/**
 * Build the operator set for a component kind
 */
export function operators<T>(kind: Arithmetic<T>): Operators<T> {
  return {
    add: binary(kind, kind.add),
    sub: binary(kind, kind.sub),
    mul: binary(kind, kind.mul),
    div: binary(kind, kind.div),
    rem: binary(kind, kind.rem),
    addAssign: assign(kind, kind.add),
    subAssign: assign(kind, kind.sub),
    mulAssign: assign(kind, kind.mul),
    divAssign: assign(kind, kind.div),
    remAssign: assign(kind, kind.rem),
  };
}

/**
 * Negation-based operators for signed kinds
 */
export function signedOperators<T>(kind: Signed<T>): SignedOperators<T> {
  return {
    neg: (v) => ({ x: kind.neg(v.x), y: kind.neg(v.y) }),
    orthogonal: (v) => ({ x: v.y, y: kind.neg(v.x) }),
  };
}
