/**
 * Tests for phyllotaxis arrangements and vector helpers.
 */

import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  GOLDEN_ANGLE,
  GOLDEN_ANGLE_DEGREES,
  customSpaced,
  evenlySpaced,
  fibonacciAngle,
  fibonacciSpiral3d,
  goldenSpiral,
  radiusFactor,
  vogelSpiral,
  whorledPositions,
} from "../../src/math/Phyllotaxis.js";
import {
  TAU,
  anyPerpendicular,
  clamp,
  degToRad,
  fromSpherical,
  normalizeAngle,
  smoothstep,
  toCylindrical,
} from "../../src/math/Vector.js";

describe("Phyllotaxis", () => {
  it("defines the golden angle as about 137.5 degrees", () => {
    expect(GOLDEN_ANGLE_DEGREES).toBeCloseTo(137.5077, 4);
  });

  describe("evenlySpaced", () => {
    it("leaves equal gaps of 2π / n", () => {
      const angles = evenlySpaced(5, 0.3);
      expect(angles[0]).toBeCloseTo(0.3);
      for (let i = 1; i < angles.length; i++) {
        expect(angles[i] - angles[i - 1]).toBeCloseTo(TAU / 5);
      }
    });

    it("returns nothing for a count of zero", () => {
      expect(evenlySpaced(0)).toEqual([]);
    });

    it("rejects fractional counts", () => {
      expect(() => evenlySpaced(2.5)).toThrow(
        "Arrangement count must be a non-negative integer, got 2.5",
      );
    });
  });

  it("goldenSpiral steps by the golden angle", () => {
    const angles = goldenSpiral(3, 1);
    expect(angles[1] - angles[0]).toBeCloseTo(GOLDEN_ANGLE);
    expect(angles[2] - angles[1]).toBeCloseTo(GOLDEN_ANGLE);
  });

  it("customSpaced steps by the given increment", () => {
    expect(customSpaced(3, 0.5, 1)).toEqual([1, 1.5, 2]);
  });

  it("fibonacciAngle wraps to one revolution", () => {
    const angle = fibonacciAngle(7);
    expect(angle).toBeGreaterThanOrEqual(0);
    expect(angle).toBeLessThan(TAU);
    expect(angle).toBeCloseTo((7 * GOLDEN_ANGLE) % TAU);
  });

  it("vogelSpiral grows the radius with √(i / (n − 1))", () => {
    expect(vogelSpiral(0, 10, 2).length()).toBeCloseTo(0);
    expect(vogelSpiral(9, 10, 2).length()).toBeCloseTo(2);
    expect(vogelSpiral(0, 1, 2).length()).toBe(0);
  });

  it("whorledPositions sits on a circle at the given height", () => {
    const positions = whorledPositions(4, 2, 1.5);
    expect(positions[0]).toBeCloseToVector({ x: 2, y: 1.5, z: 0 });
    expect(positions[1]).toBeCloseToVector({ x: 0, y: 1.5, z: 2 });
  });

  it("fibonacciSpiral3d climbs to the full height with a shrinking radius", () => {
    const points = fibonacciSpiral3d(5, 1, 4, "linear");
    expect(points[0].y).toBe(0);
    expect(points[4].y).toBeCloseTo(4);
    expect(Math.hypot(points[0].x, points[0].z)).toBeCloseTo(1);
    expect(Math.hypot(points[4].x, points[4].z)).toBeCloseTo(0);
  });

  it("radiusFactor peaks mid-way for the bulge law", () => {
    expect(radiusFactor("bulge", 0.5)).toBeCloseTo(1);
    expect(radiusFactor("quadratic", 0.5)).toBeCloseTo(0.25);
  });
});

describe("Vector helpers", () => {
  it("clamps and smooths", () => {
    expect(clamp(5, 0, 1)).toBe(1);
    expect(smoothstep(0, 1, 0.5)).toBeCloseTo(0.5);
    expect(smoothstep(0, 1, 2)).toBe(1);
  });

  it("wraps negative angles into [0, 2π)", () => {
    expect(normalizeAngle(-Math.PI / 2)).toBeCloseTo((3 * Math.PI) / 2);
    expect(normalizeAngle(TAU + 1)).toBeCloseTo(1);
  });

  it("converts spherical coordinates with +Y as the pole", () => {
    expect(fromSpherical(2, 0, 1)).toBeCloseToVector({ x: 0, y: 2, z: 0 });
    expect(fromSpherical(1, Math.PI / 2, 0)).toBeCloseToVector({ x: 1, y: 0, z: 0 });
  });

  it("reads cylindrical coordinates about Y", () => {
    const cyl = toCylindrical(new THREE.Vector3(0, 3, 2));
    expect(cyl.radius).toBeCloseTo(2);
    expect(cyl.angle).toBeCloseTo(Math.PI / 2);
    expect(cyl.height).toBe(3);
  });

  it("anyPerpendicular returns a unit vector orthogonal to its input", () => {
    for (const v of [
      new THREE.Vector3(0, 1, 0),
      new THREE.Vector3(1, 0, 0),
      new THREE.Vector3(1, 2, 3).normalize(),
    ]) {
      const p = anyPerpendicular(v);
      expect(p.length()).toBeCloseTo(1);
      expect(p.dot(v)).toBeCloseTo(0);
    }
  });

  it("degToRad converts degrees", () => {
    expect(degToRad(180)).toBeCloseTo(Math.PI);
  });
});
