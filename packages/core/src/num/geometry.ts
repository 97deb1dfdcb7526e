/**
 * Floating-point geometry
 *
 * Only available for kinds with the Float capability. ceil/floor need just
 * the Rounding capability and are built separately.
 */

import type { Float, Rounding } from "./scalar.js";
import { clone, type Vector2 } from "./vec2.js";

export interface Geometry<T> {
  /** Unit vector at `angle` radians: (cos a, sin a) */
  readonly fromAngle: (angle: T) => Vector2<T>;
  /** Componentwise absolute value */
  readonly abs: (v: Vector2<T>) => Vector2<T>;
  /** Signed angle from the positive X axis, in radians */
  readonly angle: (v: Vector2<T>) => T;
  /** 2D cross product (z of the 3D cross product) */
  readonly cross: (a: Vector2<T>, b: Vector2<T>) => T;
  readonly dot: (a: Vector2<T>, b: Vector2<T>) => T;
  readonly distanceTo: (from: Vector2<T>, to: Vector2<T>) => T;
  readonly length: (v: Vector2<T>) => T;
  /** Squared length, avoids the square root */
  readonly lengthSquared: (v: Vector2<T>) => T;
  /** Clamp the magnitude to `max`, keeping the direction */
  readonly limitLength: (v: Vector2<T>, max: T) => Vector2<T>;
  /** Scale to unit length. Zero vectors are returned unchanged. */
  readonly normalized: (v: Vector2<T>) => Vector2<T>;
  /** Rotate by `angle` radians */
  readonly rotated: (v: Vector2<T>, angle: T) => Vector2<T>;
}

export interface RoundingOperators<T> {
  /** Componentwise round toward positive infinity */
  readonly ceil: (v: Vector2<T>) => Vector2<T>;
  /** Componentwise round toward negative infinity */
  readonly floor: (v: Vector2<T>) => Vector2<T>;
}

export function geometry<T>(kind: Float<T>): Geometry<T> {
  const { add, sub, mul, div, zero } = kind;

  const lengthSquared = (v: Vector2<T>): T => add(mul(v.x, v.x), mul(v.y, v.y));
  const length = (v: Vector2<T>): T => kind.sqrt(lengthSquared(v));

  return {
    fromAngle: (angle) => ({ x: kind.cos(angle), y: kind.sin(angle) }),
    abs: (v) => ({ x: kind.abs(v.x), y: kind.abs(v.y) }),
    angle: (v) => kind.atan2(v.y, v.x),
    cross: (a, b) => sub(mul(a.x, b.y), mul(a.y, b.x)),
    dot: (a, b) => add(mul(a.x, b.x), mul(a.y, b.y)),
    distanceTo: (from, to) => {
      const dx = sub(from.x, to.x);
      const dy = sub(from.y, to.y);
      return kind.sqrt(add(mul(dx, dx), mul(dy, dy)));
    },
    length,
    lengthSquared,
    limitLength: (v, max) => {
      const l = length(v);
      if (kind.compare(l, zero) === 1 && kind.compare(max, l) === -1) {
        return { x: mul(div(v.x, l), max), y: mul(div(v.y, l), max) };
      }
      return clone(v);
    },
    normalized: (v) => {
      // Note: may struggle with denormal components, whose square underflows to zero
      const l = lengthSquared(v);
      if (!kind.eq(l, zero)) {
        const len = kind.sqrt(l);
        return { x: div(v.x, len), y: div(v.y, len) };
      }
      return clone(v);
    },
    rotated: (v, angle) => {
      const cos = kind.cos(angle);
      const sin = kind.sin(angle);
      return {
        x: sub(mul(v.x, cos), mul(v.y, sin)),
        y: add(mul(v.x, sin), mul(v.y, cos)),
      };
    },
  };
}

export function roundingOperators<T>(kind: Rounding<T>): RoundingOperators<T> {
  return {
    ceil: (v) => ({ x: kind.ceil(v.x), y: kind.ceil(v.y) }),
    floor: (v) => ({ x: kind.floor(v.x), y: kind.floor(v.y) }),
  };
}
