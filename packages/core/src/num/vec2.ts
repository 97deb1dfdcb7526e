/**
 * 2D vector data model
 *
 * A Vector2 is a plain `{ x, y }` aggregate over any component type. The
 * functions here need nothing from the component type, so they are shared by
 * every kind; operations that do need arithmetic live in ops.ts, compare.ts
 * and geometry.ts.
 */

import { createConversionError, failure, success, type Result } from "../result.js";

export interface Vector2<T = number> {
  /** The vector's X component */
  x: T;
  /** The vector's Y component */
  y: T;
}

/**
 * Create a 2D vector
 */
export function vector2<T>(x: T, y: T): Vector2<T> {
  return { x, y };
}

/**
 * Create a vector with both components set to `value`
 */
export function splat<T>(value: T): Vector2<T> {
  return { x: value, y: value };
}

/**
 * Copy a vector
 */
export function clone<T>(v: Vector2<T>): Vector2<T> {
  return { x: v.x, y: v.y };
}

/**
 * Build a vector from an `[x, y]` tuple
 */
export function fromTuple<T>([x, y]: readonly [T, T]): Vector2<T> {
  return { x, y };
}

/**
 * Build a vector from a fixed two-element array. Same as fromTuple.
 */
export const fromArray: <T>(values: readonly [T, T]) => Vector2<T> = fromTuple;

/**
 * Tuplify the vector: `[x, y]`
 */
export function toTuple<T>(v: Vector2<T>): [T, T] {
  return [v.x, v.y];
}

/**
 * Build a vector from a sequence of exactly two components
 */
export function tryFromSlice<T>(values: ArrayLike<T>): Result<Vector2<T>> {
  if (values.length !== 2) {
    return failure(createConversionError(`invalid_length`, `expected exactly 2 components`));
  }
  return success({ x: values[0], y: values[1] });
}

/**
 * Debug formatting: `(x, y)`
 */
export function format<T>(v: Vector2<T>): string {
  return `(${String(v.x)}, ${String(v.y)})`;
}
