/**
 * Flat layout
 *
 * Vectors pack as two consecutive components, x then y, with no padding:
 * `[x0, y0, x1, y1, ...]`. This is the layout GPU buffers and typed-array
 * views expect.
 */

import { createConversionError, failure, success, type Result } from "../result.js";
import type { Arithmetic, FlatArray, Packed } from "./scalar.js";
import type { Vector2 } from "./vec2.js";

export interface Layout<T> {
  readonly pack: (vectors: readonly Vector2<T>[]) => FlatArray<T>;
  readonly unpack: (flat: ArrayLike<T>) => Result<Vector2<T>[]>;
}

export function layout<T>(kind: Packed<T> & Arithmetic<T>): Layout<T> {
  return {
    pack: (vectors) => {
      const flat = kind.alloc(vectors.length * 2);
      vectors.forEach((v, i) => {
        flat[i * 2] = v.x;
        flat[i * 2 + 1] = v.y;
      });
      return flat;
    },
    unpack: (flat) => {
      if (flat.length % 2 !== 0) {
        return failure(createConversionError(`invalid_length`, `expected an even number of components`));
      }
      const vectors: Vector2<T>[] = [];
      for (let i = 0; i < flat.length; i += 2) {
        vectors.push({ x: kind.coerce(flat[i]), y: kind.coerce(flat[i + 1]) });
      }
      return success(vectors);
    },
  };
}
