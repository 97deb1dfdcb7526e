/**
 * Equality, ordering and hashing
 *
 * Ordering is lexicographic on (x, y). It is partial: if either compared
 * component pair is unordered (NaN), the vectors are unordered.
 */

import type { Arithmetic, Ordered, Ordering } from "./scalar.js";
import type { Vector2 } from "./vec2.js";

export interface Comparisons<T> {
  readonly eq: (a: Vector2<T>, b: Vector2<T>) => boolean;
  readonly compare: (a: Vector2<T>, b: Vector2<T>) => Ordering | undefined;
  readonly lt: (a: Vector2<T>, b: Vector2<T>) => boolean;
  readonly le: (a: Vector2<T>, b: Vector2<T>) => boolean;
  readonly gt: (a: Vector2<T>, b: Vector2<T>) => boolean;
  readonly ge: (a: Vector2<T>, b: Vector2<T>) => boolean;
  /** Key usable in a Map or Set; equal vectors share a key */
  readonly hashKey: (v: Vector2<T>) => string;
  /** (zero, zero) */
  readonly defaultValue: () => Vector2<T>;
}

export function comparisons<T>(kind: Arithmetic<T> & Ordered<T>): Comparisons<T> {
  const compare = (a: Vector2<T>, b: Vector2<T>): Ordering | undefined => {
    const cx = kind.compare(a.x, b.x);
    if (cx !== 0) return cx;
    return kind.compare(a.y, b.y);
  };

  return {
    eq: (a, b) => kind.eq(a.x, b.x) && kind.eq(a.y, b.y),
    compare,
    lt: (a, b) => compare(a, b) === -1,
    le: (a, b) => {
      const c = compare(a, b);
      return c === -1 || c === 0;
    },
    gt: (a, b) => compare(a, b) === 1,
    ge: (a, b) => {
      const c = compare(a, b);
      return c === 1 || c === 0;
    },
    hashKey: (v) => `${kind.key(v.x)},${kind.key(v.y)}`,
    defaultValue: () => ({ x: kind.zero, y: kind.zero }),
  };
}
