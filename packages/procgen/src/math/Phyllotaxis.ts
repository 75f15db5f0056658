/**
 * Phyllotaxis
 *
 * Angular and radial layout laws for organs arranged around a center:
 * evenly spaced whorls, golden-angle spirals and Vogel disc packing.
 * All functions are pure; the same inputs always give the same sequence.
 */

import * as THREE from "three";
import { TAU } from "./Vector.js";

/** π(3 − √5) ≈ 137.5077° */
export const GOLDEN_ANGLE = Math.PI * (3 - Math.sqrt(5));
export const GOLDEN_ANGLE_DEGREES = (GOLDEN_ANGLE * 180) / Math.PI;

/** Common divergence angles (opposite, decussate, tristichous, pentastichous) */
export const ANGLE_180 = Math.PI;
export const ANGLE_90 = Math.PI / 2;
export const ANGLE_120 = (2 * Math.PI) / 3;
export const ANGLE_144 = (4 * Math.PI) / 5;

/**
 * Radius falloff along a spiral, t ∈ [0, 1] from first to last element.
 */
export type RadiusLaw = "constant" | "linear" | "quadratic" | "bulge";

export function radiusFactor(law: RadiusLaw, t: number): number {
  switch (law) {
    case "constant":
      return 1;
    case "linear":
      return 1 - t;
    case "quadratic":
      return (1 - t) * (1 - t);
    case "bulge":
      return Math.sin(Math.PI * t);
  }
}

/**
 * Angle of the i-th element on a golden spiral, wrapped to [0, 2π).
 */
export function fibonacciAngle(index: number): number {
  return (index * GOLDEN_ANGLE) % TAU;
}

/**
 * `count` angles covering one revolution with equal gaps of 2π/count.
 */
export function evenlySpaced(count: number, offset = 0): number[] {
  assertCount(count);
  const step = count > 0 ? TAU / count : 0;
  return Array.from({ length: count }, (_, i) => offset + i * step);
}

/**
 * Successive golden-angle increments starting at `offset`.
 */
export function goldenSpiral(count: number, offset = 0): number[] {
  assertCount(count);
  return Array.from({ length: count }, (_, i) => offset + i * GOLDEN_ANGLE);
}

/**
 * Successive fixed increments of `step` radians starting at `offset`.
 */
export function customSpaced(count: number, step: number, offset = 0): number[] {
  assertCount(count);
  return Array.from({ length: count }, (_, i) => offset + i * step);
}

/**
 * Vogel's model: element i of `count` on a disc of `maxRadius`,
 * r = R·√(i / (count − 1)), θ = i·golden angle. Returned in the XZ plane.
 */
export function vogelSpiral(
  index: number,
  count: number,
  maxRadius: number,
): THREE.Vector2 {
  const r = count <= 1 ? 0 : maxRadius * Math.sqrt(index / (count - 1));
  const angle = index * GOLDEN_ANGLE;
  return new THREE.Vector2(r * Math.cos(angle), r * Math.sin(angle));
}

/**
 * Evenly spaced points on a circle in the XZ plane at y = 0.
 */
export function radialPositions(
  count: number,
  radius: number,
  offset = 0,
): THREE.Vector3[] {
  return whorledPositions(count, radius, 0, offset);
}

/**
 * Evenly spaced points on a circle at height `height`.
 */
export function whorledPositions(
  count: number,
  radius: number,
  height: number,
  offset = 0,
): THREE.Vector3[] {
  return evenlySpaced(count, offset).map(
    (angle) =>
      new THREE.Vector3(
        radius * Math.cos(angle),
        height,
        radius * Math.sin(angle),
      ),
  );
}

/**
 * Golden-angle spiral climbing from y = 0 to y = height, with the radius
 * shaped by `law` (t = i / (count − 1)).
 */
export function fibonacciSpiral3d(
  count: number,
  baseRadius: number,
  height: number,
  law: RadiusLaw = "constant",
): THREE.Vector3[] {
  assertCount(count);
  return Array.from({ length: count }, (_, i) => {
    const t = count > 1 ? i / (count - 1) : 0;
    const r = baseRadius * radiusFactor(law, t);
    const angle = fibonacciAngle(i);
    return new THREE.Vector3(r * Math.cos(angle), t * height, r * Math.sin(angle));
  });
}

function assertCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Arrangement count must be a non-negative integer, got ${count}`);
  }
}
