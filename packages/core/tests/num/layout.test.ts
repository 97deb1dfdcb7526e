import { describe, it, expect } from "vitest";
import { DVec2, Vec2, IVec2, I64Vec2 } from "../../src/num/presets.js";

describe(`layout`, () => {
  describe(`pack`, () => {
    it(`should interleave x then y`, () => {
      const flat = DVec2.pack([DVec2.create(1, 2), DVec2.create(3, 4)]);
      expect(flat).toBeInstanceOf(Float64Array);
      expect(Array.from(flat)).toEqual([1, 2, 3, 4]);
    });

    it(`should use the kind's typed array`, () => {
      expect(Vec2.pack([Vec2.create(0.1, 0)])).toBeInstanceOf(Float32Array);
      expect(IVec2.pack([IVec2.create(-1, 1)])).toBeInstanceOf(Int32Array);
      expect(Array.from(I64Vec2.pack([I64Vec2.create(1n, 2n)]))).toEqual([1n, 2n]);
    });

    it(`should store single-precision values`, () => {
      expect(Array.from(Vec2.pack([Vec2.create(0.1, 0)]))).toEqual([Math.fround(0.1), 0]);
    });
  });

  describe(`unpack`, () => {
    it(`should split pairs into vectors`, () => {
      expect(DVec2.unpack([1, 2, 3, 4])).toEqual({
        ok: true,
        value: [
          { x: 1, y: 2 },
          { x: 3, y: 4 },
        ],
      });
    });

    it(`should accept an empty array`, () => {
      expect(DVec2.unpack([])).toEqual({ ok: true, value: [] });
    });

    it(`should reject an odd number of components`, () => {
      expect(DVec2.unpack([1, 2, 3])).toEqual({
        ok: false,
        error: { category: `invalid_length`, message: `expected an even number of components` },
      });
    });

    it(`should coerce components into the kind's range`, () => {
      expect(IVec2.unpack([1.5, -2.5])).toEqual({ ok: true, value: [{ x: 1, y: -2 }] });
      expect(Vec2.unpack([0.1, 0])).toEqual({ ok: true, value: [{ x: Math.fround(0.1), y: 0 }] });
    });

    it(`should invert pack`, () => {
      const vectors = [IVec2.create(5, -6), IVec2.create(7, 8)];
      expect(IVec2.unpack(IVec2.pack(vectors))).toEqual({ ok: true, value: vectors });
    });
  });
});
