/**
 * Tests for Catmull-Rom splines and axis curves.
 */

import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  catmullRomPoint,
  catmullRomTangent,
  sampleCatmullRomCurve,
} from "../../src/math/CatmullRom.js";
import { AxisCurve } from "../../src/math/AxisCurve.js";

describe("Catmull-Rom", () => {
  const points = [
    new THREE.Vector3(-1, 0, 0),
    new THREE.Vector3(0, 0, 0),
    new THREE.Vector3(1, 1, 0),
    new THREE.Vector3(2, 1, 0),
  ];

  it("interpolates the inner control points", () => {
    const [p0, p1, p2, p3] = points;
    expect(catmullRomPoint(p0, p1, p2, p3, 0)).toBeCloseToVector({ x: 0, y: 0, z: 0 });
    expect(catmullRomPoint(p0, p1, p2, p3, 1)).toBeCloseToVector({ x: 1, y: 1, z: 0 });
  });

  it("uses half the neighbour chord as the end tangent", () => {
    const [p0, p1, p2, p3] = points;
    // 0.5 * (P2 - P0) at the start of the segment
    expect(catmullRomTangent(p0, p1, p2, p3, 0)).toBeCloseToVector({ x: 1, y: 0.5, z: 0 });
  });

  it("samples (n - 3) * samples + 1 points ending on points[n - 2]", () => {
    const five = [...points, new THREE.Vector3(3, 0, 0)];
    const samples = sampleCatmullRomCurve(five, 4);
    expect(samples).toHaveLength(9);
    expect(samples[0]).toBeCloseToVector({ x: 0, y: 0, z: 0 });
    expect(samples[8]).toBeCloseToVector({ x: 2, y: 1, z: 0 });
  });

  it("needs four control points", () => {
    expect(() => sampleCatmullRomCurve(points.slice(0, 3), 4)).toThrow(
      "Catmull-Rom curve needs at least 4 control points, got 3",
    );
  });
});

describe("AxisCurve", () => {
  const straight = new AxisCurve([new THREE.Vector3(0, 0, 0), new THREE.Vector3(0, 10, 0)]);

  it("measures arc length", () => {
    const bent = new AxisCurve([
      new THREE.Vector3(0, 0, 0),
      new THREE.Vector3(0, 3, 0),
      new THREE.Vector3(4, 3, 0),
    ]);
    expect(bent.length).toBeCloseTo(7);
    expect(bent.arcLengths).toEqual([0, 3, 7]);
  });

  it("samples positions by normalized arc length", () => {
    expect(straight.sampleAtT(0.25).position).toBeCloseToVector({ x: 0, y: 2.5, z: 0 });
    expect(straight.sampleAtT(2).position).toBeCloseToVector({ x: 0, y: 10, z: 0 });
  });

  it("gives a vertical axis the frame T = +Y, N = +X, B = -Z", () => {
    const sample = straight.sampleAtT(0.5);
    expect(sample.tangent).toBeCloseToVector({ x: 0, y: 1, z: 0 });
    expect(sample.normal).toBeCloseToVector({ x: 1, y: 0, z: 0 });
    expect(sample.binormal).toBeCloseToVector({ x: 0, y: 0, z: -1 });
  });

  it("points the normal toward the bend", () => {
    const arc = new AxisCurve([
      new THREE.Vector3(0, 0, 0),
      new THREE.Vector3(0.5, 1, 0),
      new THREE.Vector3(2, 2, 0),
    ]);
    const sample = arc.sampleAtT(0.5);
    expect(sample.normal.x).toBeGreaterThan(0);
    expect(sample.normal.dot(sample.tangent)).toBeCloseTo(0);
    expect(sample.binormal.length()).toBeCloseTo(1);
  });

  it("samples uniformly with both ends included", () => {
    const samples = straight.sampleUniform(5);
    expect(samples.map((s) => s.position.y)).toEqual([0, 2.5, 5, 7.5, 10]);
  });

  it("needs two points", () => {
    expect(() => new AxisCurve([new THREE.Vector3()])).toThrow(
      "Axis curve needs at least 2 points, got 1",
    );
  });
});
