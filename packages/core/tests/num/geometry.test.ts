import { describe, it, expect } from "vitest";
import { DVec2, Vec2 } from "../../src/num/presets.js";

const TAU = Math.PI * 2;

describe(`geometry`, () => {
  describe(`angles`, () => {
    it(`should build RIGHT from angle 0`, () => {
      expect(DVec2.fromAngle(0)).toEqual(DVec2.RIGHT);
      expect(DVec2.fromAngle(0)).toEqual({ x: 1, y: 0 });
      expect(Vec2.fromAngle(0)).toEqual(Vec2.RIGHT);
    });

    it(`should build a unit vector pointing down at PI / 2`, () => {
      expect(DVec2.approxEq(DVec2.fromAngle(Math.PI / 2), DVec2.create(0, 1))).toBe(true);
    });

    it(`should measure angles from the positive X axis`, () => {
      expect(DVec2.angle(DVec2.RIGHT)).toBe(0);
      expect(DVec2.angle(DVec2.DOWN)).toBe(Math.PI / 2);
      expect(DVec2.angle(DVec2.create(1, -1))).toBeCloseTo(-Math.PI / 4, 12);
    });

    it(`should use a Y-down convention for UP and DOWN`, () => {
      expect(DVec2.UP).toEqual({ x: 0, y: -1 });
      expect(DVec2.DOWN).toEqual({ x: 0, y: 1 });
      expect(DVec2.LEFT).toEqual({ x: -1, y: 0 });
    });

    it(`should hand out a fresh constant on every access`, () => {
      expect(DVec2.ZERO).not.toBe(DVec2.ZERO);
      const v = DVec2.addAssign(DVec2.ZERO, 1);
      expect(v).toEqual({ x: 1, y: 1 });
      expect(DVec2.ZERO).toEqual({ x: 0, y: 0 });
      expect(Vec2.subAssign(Vec2.RIGHT, 1)).toEqual({ x: 0, y: -1 });
      expect(Vec2.RIGHT).toEqual({ x: 1, y: 0 });
    });
  });

  describe(`products`, () => {
    it(`should compute the 2D cross product`, () => {
      expect(DVec2.cross(DVec2.RIGHT, DVec2.DOWN)).toBe(1);
      expect(DVec2.cross(DVec2.DOWN, DVec2.RIGHT)).toBe(-1);
    });

    it(`should compute the dot product`, () => {
      expect(DVec2.dot(DVec2.create(1, 2), DVec2.create(3, 4))).toBe(11);
    });
  });

  describe(`lengths`, () => {
    it(`should compute length and squared length`, () => {
      expect(DVec2.length(DVec2.create(3, 4))).toBe(5);
      expect(DVec2.length(DVec2.splat(10))).toBeCloseTo(10 * Math.SQRT2, 12);
      expect(DVec2.lengthSquared(DVec2.splat(10))).toBe(200);
    });

    it(`should compute length in single precision`, () => {
      expect(Vec2.length(Vec2.splat(10))).toBe(Math.fround(Math.sqrt(200)));
    });

    it(`should compute the distance between points`, () => {
      expect(DVec2.distanceTo(DVec2.create(1, 1), DVec2.create(4, 5))).toBe(5);
    });

    it(`should take componentwise absolute values`, () => {
      expect(DVec2.abs(DVec2.create(-1.5, 2))).toEqual({ x: 1.5, y: 2 });
    });
  });

  describe(`normalized`, () => {
    it(`should scale to unit length`, () => {
      const n = DVec2.normalized(DVec2.create(3, 4));
      expect(n.x).toBeCloseTo(0.6, 12);
      expect(n.y).toBeCloseTo(0.8, 12);
      expect(DVec2.approxEq(DVec2.normalized(DVec2.RIGHT), DVec2.RIGHT)).toBe(true);
      expect(DVec2.approxEq(DVec2.normalized(DVec2.splat(1)), DVec2.splat(Math.sqrt(0.5)))).toBe(true);
    });

    it(`should pass the zero vector through unchanged`, () => {
      const n = DVec2.normalized(DVec2.ZERO);
      expect(n).toEqual({ x: 0, y: 0 });
      expect(n).not.toBe(DVec2.ZERO);
      expect(Vec2.normalized(Vec2.ZERO)).toEqual(Vec2.ZERO);
    });
  });

  describe(`limitLength`, () => {
    it(`should clamp the magnitude and keep the direction`, () => {
      expect(DVec2.approxEq(DVec2.limitLength(DVec2.splat(10), 1), DVec2.splat(1 / Math.SQRT2))).toBe(true);
      expect(DVec2.approxEq(DVec2.limitLength(DVec2.splat(10), 5), DVec2.splat(5 / Math.SQRT2))).toBe(true);
    });

    it(`should leave shorter vectors unchanged`, () => {
      expect(DVec2.limitLength(DVec2.create(3, 4), 10)).toEqual({ x: 3, y: 4 });
    });

    it(`should pass the zero vector through unchanged`, () => {
      expect(DVec2.limitLength(DVec2.ZERO, 5)).toEqual(DVec2.ZERO);
      expect(DVec2.limitLength(DVec2.ZERO, 0)).toEqual(DVec2.ZERO);
      expect(Vec2.limitLength(Vec2.ZERO, 1)).toEqual(Vec2.ZERO);
    });
  });

  describe(`rotated`, () => {
    const v = DVec2.create(1.2, 3.4);

    it(`should return the original vector after a full turn`, () => {
      expect(DVec2.approxEq(DVec2.rotated(v, TAU), v)).toBe(true);
    });

    it(`should rotate a quarter turn`, () => {
      expect(DVec2.approxEq(DVec2.rotated(v, TAU / 4), DVec2.create(-3.4, 1.2))).toBe(true);
    });

    it(`should rotate a third of a turn`, () => {
      expect(DVec2.approxEq(DVec2.rotated(v, TAU / 3), DVec2.create(-3.5444863, -0.6607695))).toBe(true);
    });

    it(`should agree on half turns in either direction`, () => {
      expect(DVec2.approxEq(DVec2.rotated(v, TAU / 2), DVec2.rotated(v, TAU / -2))).toBe(true);
    });
  });

  describe(`rounding`, () => {
    it(`should round toward positive infinity`, () => {
      expect(DVec2.ceil(DVec2.create(1.2, -1.2))).toEqual({ x: 2, y: -1 });
    });

    it(`should round toward negative infinity`, () => {
      expect(DVec2.floor(DVec2.create(1.2, -1.2))).toEqual({ x: 1, y: -2 });
    });
  });
});
