/**
 * Component kinds
 *
 * A vector's component type is described at runtime by a "kind": a small
 * dictionary of the operations that type supports. Capabilities are split
 * into separate interfaces so that an integer kind can provide arithmetic
 * and ordering without having to provide trigonometry or rounding.
 *
 * All kind operations are plain arrow functions and can be passed around
 * unbound.
 */

/**
 * Result of a three-way comparison
 */
export type Ordering = -1 | 0 | 1;

/**
 * Indexed storage for a flat run of components (typed arrays satisfy this)
 */
export interface FlatArray<T> {
  readonly length: number;
  [index: number]: T;
}

/**
 * The five binary operations every component kind supports
 */
export interface Arithmetic<T> {
  /** Short kind name, e.g. `f32` */
  readonly name: string;
  /** Additive identity, also the default component value */
  readonly zero: T;
  /** Convert a value into this kind's range: rounds, truncates or wraps */
  readonly coerce: (a: T) => T;
  readonly add: (a: T, b: T) => T;
  readonly sub: (a: T, b: T) => T;
  readonly mul: (a: T, b: T) => T;
  readonly div: (a: T, b: T) => T;
  readonly rem: (a: T, b: T) => T;
}

/**
 * Kinds with a negation
 */
export interface Signed<T> extends Arithmetic<T> {
  readonly neg: (a: T) => T;
}

/**
 * Equality, partial ordering and hash keys
 */
export interface Ordered<T> {
  readonly eq: (a: T, b: T) => boolean;
  /** Returns undefined when the pair is unordered (NaN) */
  readonly compare: (a: T, b: T) => Ordering | undefined;
  /** String key such that eq(a, b) implies key(a) === key(b) */
  readonly key: (a: T) => string;
}

/**
 * Rounding toward +∞ / −∞
 */
export interface Rounding<T> {
  readonly ceil: (a: T) => T;
  readonly floor: (a: T) => T;
}

/**
 * Floating-point capability: trigonometry, square root and absolute value
 */
export interface Float<T> extends Signed<T>, Ordered<T> {
  readonly cos: (a: T) => T;
  readonly sin: (a: T) => T;
  /** atan2(y, x), argument order as Math.atan2 */
  readonly atan2: (y: T, x: T) => T;
  readonly sqrt: (a: T) => T;
  readonly abs: (a: T) => T;
}

/**
 * Kinds that can be stored in a typed array
 */
export interface Packed<T> {
  readonly alloc: (length: number) => FlatArray<T>;
}

export type FloatKind = Float<number> & Rounding<number> & Packed<number>;
export type IntegerKind<T> = Arithmetic<T> & Ordered<T> & Packed<T>;

function compareNumbers(a: number, b: number): Ordering | undefined {
  if (a < b) return -1;
  if (a > b) return 1;
  if (a === b) return 0;
  return undefined;
}

function compareBigInts(a: bigint, b: bigint): Ordering {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

// -0 and 0 compare equal, so they must share a key
function numberKey(a: number): string {
  return a === 0 ? `0` : String(a);
}

// Integer division by zero is a programming error; throw the same error
// native bigint division does.
function nonZero(divisor: number): number {
  if (divisor === 0) {
    throw new RangeError(`Division by zero`);
  }
  return divisor;
}

/**
 * IEEE double precision
 */
export const f64: FloatKind = {
  name: `f64`,
  zero: 0,
  coerce: (a) => a,
  add: (a, b) => a + b,
  sub: (a, b) => a - b,
  mul: (a, b) => a * b,
  div: (a, b) => a / b,
  rem: (a, b) => a % b,
  neg: (a) => -a,
  eq: (a, b) => a === b,
  compare: compareNumbers,
  key: numberKey,
  cos: Math.cos,
  sin: Math.sin,
  atan2: Math.atan2,
  sqrt: Math.sqrt,
  abs: Math.abs,
  ceil: Math.ceil,
  floor: Math.floor,
  alloc: (length) => new Float64Array(length),
};

const fround = Math.fround;

/**
 * Single precision: every result is rounded with Math.fround
 */
export const f32: FloatKind = {
  name: `f32`,
  zero: 0,
  coerce: fround,
  add: (a, b) => fround(a + b),
  sub: (a, b) => fround(a - b),
  mul: (a, b) => fround(a * b),
  div: (a, b) => fround(a / b),
  rem: (a, b) => fround(a % b),
  neg: (a) => fround(-a),
  eq: (a, b) => a === b,
  compare: compareNumbers,
  key: numberKey,
  cos: (a) => fround(Math.cos(a)),
  sin: (a) => fround(Math.sin(a)),
  atan2: (y, x) => fround(Math.atan2(y, x)),
  sqrt: (a) => fround(Math.sqrt(a)),
  abs: (a) => fround(Math.abs(a)),
  ceil: (a) => fround(Math.ceil(a)),
  floor: (a) => fround(Math.floor(a)),
  alloc: (length) => new Float32Array(length),
};

/**
 * Wrapping signed 32-bit integers. Division truncates toward zero.
 */
export const i32: IntegerKind<number> & Signed<number> = {
  name: `i32`,
  zero: 0,
  coerce: (a) => a | 0,
  add: (a, b) => (a + b) | 0,
  sub: (a, b) => (a - b) | 0,
  mul: (a, b) => Math.imul(a, b),
  div: (a, b) => (a / nonZero(b)) | 0,
  rem: (a, b) => (a % nonZero(b)) | 0,
  neg: (a) => -a | 0,
  eq: (a, b) => a === b,
  compare: compareNumbers,
  key: numberKey,
  alloc: (length) => new Int32Array(length),
};

/**
 * Wrapping unsigned 32-bit integers. Not signed, so no negation.
 */
export const u32: IntegerKind<number> = {
  name: `u32`,
  zero: 0,
  coerce: (a) => a >>> 0,
  add: (a, b) => (a + b) >>> 0,
  sub: (a, b) => (a - b) >>> 0,
  mul: (a, b) => Math.imul(a, b) >>> 0,
  div: (a, b) => (a / nonZero(b)) >>> 0,
  rem: (a, b) => (a % nonZero(b)) >>> 0,
  eq: (a, b) => a === b,
  compare: compareNumbers,
  key: numberKey,
  alloc: (length) => new Uint32Array(length),
};

const wrap64 = (a: bigint): bigint => BigInt.asIntN(64, a);

/**
 * Wrapping signed 64-bit integers backed by bigint
 */
export const i64: IntegerKind<bigint> & Signed<bigint> = {
  name: `i64`,
  zero: 0n,
  coerce: wrap64,
  add: (a, b) => wrap64(a + b),
  sub: (a, b) => wrap64(a - b),
  mul: (a, b) => wrap64(a * b),
  div: (a, b) => wrap64(a / b),
  rem: (a, b) => a % b,
  neg: (a) => wrap64(-a),
  eq: (a, b) => a === b,
  compare: compareBigInts,
  key: (a) => a.toString(),
  alloc: (length) => new BigInt64Array(length),
};
