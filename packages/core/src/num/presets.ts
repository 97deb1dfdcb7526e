/**
 * Kind-bound vector namespaces
 *
 * Each namespace gathers every operation its component kind supports:
 *
 * ```ts
 * const v = Vec2.mul(Vec2.create(5, 7), 2); // (10, 14)
 * Vec2.mulAssign(v, 2);                     // (20, 28)
 * Vec2.length(Vec2.normalized(v));          // 1
 * ```
 *
 * The builders are exported so custom component kinds get the same surface.
 */

import { comparisons } from "./compare.js";
import { geometry, roundingOperators } from "./geometry.js";
import { layout } from "./layout.js";
import { operators, signedOperators } from "./ops.js";
import { success, type Result } from "../result.js";
import {
  f32,
  f64,
  i32,
  i64,
  u32,
  type Arithmetic,
  type FloatKind,
  type IntegerKind,
  type Signed,
} from "./scalar.js";
import { vectorKinda } from "./tolerance.js";
import {
  clone,
  format,
  splat,
  toTuple,
  tryFromSlice,
  vector2,
  type Vector2,
} from "./vec2.js";

export interface Construction<T> {
  readonly create: (x: T, y: T) => Vector2<T>;
  readonly splat: (value: T) => Vector2<T>;
  /** Generic single-value conversion: a scalar splats, a tuple converts */
  readonly from: (value: T | readonly [T, T]) => Vector2<T>;
  readonly fromTuple: (values: readonly [T, T]) => Vector2<T>;
  readonly fromArray: (values: readonly [T, T]) => Vector2<T>;
  readonly toTuple: (v: Vector2<T>) => [T, T];
  readonly tryFromSlice: (values: ArrayLike<T>) => Result<Vector2<T>>;
  readonly clone: (v: Vector2<T>) => Vector2<T>;
  readonly format: (v: Vector2<T>) => string;
}

function isPair<T>(value: T | readonly [T, T]): value is readonly [T, T] {
  return Array.isArray(value);
}

/**
 * Constructors bound to a kind. Every component is coerced on the way in, so
 * an f32 vector only ever holds single-precision values.
 */
export function construction<T>(kind: Arithmetic<T>): Construction<T> {
  const { coerce } = kind;
  const create = (x: T, y: T): Vector2<T> => vector2(coerce(x), coerce(y));
  const fromPair = ([x, y]: readonly [T, T]): Vector2<T> => create(x, y);

  return {
    create,
    splat: (value) => splat(coerce(value)),
    from: (value) => (isPair(value) ? fromPair(value) : splat(coerce(value))),
    fromTuple: fromPair,
    fromArray: fromPair,
    toTuple,
    tryFromSlice: (values) => {
      const result = tryFromSlice(values);
      return result.ok ? success(create(result.value.x, result.value.y)) : result;
    },
    clone,
    format,
  };
}

/**
 * Everything available to a floating-point kind. The direction constants are
 * fresh on every access, so one can be used as an assign target.
 */
export function floatVectors(kind: FloatKind) {
  return {
    kind,
    ...construction(kind),
    ...operators(kind),
    ...signedOperators(kind),
    ...comparisons(kind),
    ...geometry(kind),
    ...roundingOperators(kind),
    ...layout(kind),
    kindaEq: vectorKinda.kindaEq,
    approxEq: vectorKinda.approxEq,
    /** (0, 0) */
    get ZERO(): Vector2<number> {
      return vector2(0, 0);
    },
    /** (1, 0) */
    get RIGHT(): Vector2<number> {
      return vector2(1, 0);
    },
    /** (-1, 0) */
    get LEFT(): Vector2<number> {
      return vector2(-1, 0);
    },
    /** Y-down, so points -Y: (0, -1) */
    get UP(): Vector2<number> {
      return vector2(0, -1);
    },
    /** Y-down, so points +Y: (0, 1) */
    get DOWN(): Vector2<number> {
      return vector2(0, 1);
    },
  };
}

/**
 * Everything available to an unsigned integer kind
 */
export function integerVectors<T>(kind: IntegerKind<T>) {
  return {
    kind,
    ...construction(kind),
    ...operators(kind),
    ...comparisons(kind),
    ...layout(kind),
  };
}

/**
 * Everything available to a signed integer kind
 */
export function signedIntegerVectors<T>(kind: IntegerKind<T> & Signed<T>) {
  return {
    ...integerVectors(kind),
    ...signedOperators(kind),
  };
}

/** Vector2 over single-precision floats */
export type Vec2 = Vector2<number>;
export const Vec2 = floatVectors(f32);

/** Vector2 over double-precision floats */
export type DVec2 = Vector2<number>;
export const DVec2 = floatVectors(f64);

/** Vector2 over wrapping signed 32-bit integers */
export type IVec2 = Vector2<number>;
export const IVec2 = signedIntegerVectors(i32);

/** Vector2 over wrapping unsigned 32-bit integers */
export type UVec2 = Vector2<number>;
export const UVec2 = integerVectors(u32);

/** Vector2 over wrapping signed 64-bit integers */
export type I64Vec2 = Vector2<bigint>;
export const I64Vec2 = signedIntegerVectors(i64);
