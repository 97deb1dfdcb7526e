/**
 * Tolerance model and approximate equality
 *
 * Floating-point results are rarely bit-exact, so comparisons of computed
 * values should go through these helpers rather than `===`.
 */

import type { Vector2 } from "./vec2.js";

/**
 * Tolerance values
 */
export interface Tolerances {
  /** Absolute difference below which two components are approximately equal */
  approx: number;
}

/**
 * Numeric context containing tolerance information
 */
export interface NumericContext {
  tol: Tolerances;
}

/**
 * Default tolerances
 */
export const DEFAULT_TOLERANCES: Tolerances = {
  approx: 0.00001,
};

/**
 * Create a numeric context, filling missing tolerances from the defaults
 */
export function createNumericContext(tol?: Partial<Tolerances>): NumericContext {
  return {
    tol: {
      approx: tol?.approx ?? DEFAULT_TOLERANCES.approx,
    },
  };
}

/**
 * Approximate equality capability
 */
export interface Kinda<T> {
  /** True if a === b, or they differ by less than `tolerance` */
  kindaEq(a: T, b: T, tolerance: number): boolean;
  /** kindaEq with the context tolerance */
  approxEq(a: T, b: T): boolean;
}

/**
 * Scalar predicate. The exact check comes first so equal infinities compare equal.
 */
export function kindaEq(a: number, b: number, tolerance: number): boolean {
  if (a === b) {
    return true;
  }
  return Math.abs(a - b) < tolerance;
}

/**
 * Vector predicate: both components must be within the same tolerance
 */
export function kindaEq2(a: Vector2<number>, b: Vector2<number>, tolerance: number): boolean {
  return kindaEq(a.x, b.x, tolerance) && kindaEq(a.y, b.y, tolerance);
}

/**
 * Build scalar and vector Kinda implementations bound to a context
 */
export function createKinda(ctx: NumericContext = createNumericContext()): {
  scalar: Kinda<number>;
  vector: Kinda<Vector2<number>>;
} {
  return {
    scalar: {
      kindaEq,
      approxEq: (a, b) => kindaEq(a, b, ctx.tol.approx),
    },
    vector: {
      kindaEq: kindaEq2,
      approxEq: (a, b) => kindaEq2(a, b, ctx.tol.approx),
    },
  };
}

const defaults = createKinda();

export const scalarKinda: Kinda<number> = defaults.scalar;
export const vectorKinda: Kinda<Vector2<number>> = defaults.vector;

/**
 * kindaEq with the default tolerance
 */
export function approxEq(a: number, b: number): boolean {
  return scalarKinda.approxEq(a, b);
}

/**
 * kindaEq2 with the default tolerance
 */
export function approxEq2(a: Vector2<number>, b: Vector2<number>): boolean {
  return vectorKinda.approxEq(a, b);
}
