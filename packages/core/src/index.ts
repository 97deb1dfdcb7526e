/**
 * @planar/core - generic 2D vectors
 *
 * ## Primary API
 * - Vec2, DVec2: float vectors (f32 / f64 components) with geometry
 * - IVec2, UVec2, I64Vec2: integer vectors (arithmetic, ordering, layout)
 *
 * ## Building blocks (for custom component kinds)
 * - num/scalar: capability interfaces and built-in kinds
 * - num/ops, num/compare, num/geometry, num/layout: kind-parameterised builders
 * - num/tolerance: approximate equality
 */

// =============================================================================
// Primary API
// =============================================================================
export {
  Vec2,
  DVec2,
  IVec2,
  UVec2,
  I64Vec2,
  construction,
  floatVectors,
  integerVectors,
  signedIntegerVectors,
  type Construction,
} from './num/presets.js';

// =============================================================================
// Data model and conversions
// =============================================================================
export {
  vector2,
  splat,
  clone,
  fromTuple,
  fromArray,
  toTuple,
  tryFromSlice,
  format,
  type Vector2,
} from './num/vec2.js';

export {
  success,
  failure,
  createConversionError,
  type Result,
  type ConversionError,
  type ConversionErrorCategory,
} from './result.js';

// =============================================================================
// Component kinds and builders
// =============================================================================
export {
  f32,
  f64,
  i32,
  u32,
  i64,
  type Arithmetic,
  type Signed,
  type Ordered,
  type Ordering,
  type Rounding,
  type Float,
  type Packed,
  type FlatArray,
  type FloatKind,
  type IntegerKind,
} from './num/scalar.js';

export {
  BINARY_OPERATORS,
  isVector,
  operators,
  signedOperators,
  type BinaryOperator,
  type Operand,
  type Operators,
  type SignedOperators,
} from './num/ops.js';

export { comparisons, type Comparisons } from './num/compare.js';
export { geometry, roundingOperators, type Geometry, type RoundingOperators } from './num/geometry.js';
export { layout, type Layout } from './num/layout.js';

// =============================================================================
// Approximate equality
// =============================================================================
export {
  DEFAULT_TOLERANCES,
  createNumericContext,
  createKinda,
  kindaEq,
  kindaEq2,
  approxEq,
  approxEq2,
  scalarKinda,
  vectorKinda,
  type Kinda,
  type NumericContext,
  type Tolerances,
} from './num/tolerance.js';
