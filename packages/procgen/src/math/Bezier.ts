/**
 * Bezier Curve Utilities
 *
 * Quadratic and cubic Bezier evaluation in 2D and 3D, used for receptacle
 * profiles and the bowed axes of inflorescences. Every evaluator works on
 * Bernstein weights so the 2D and 3D variants share one formula.
 */

import * as THREE from "three";

function assertOffset(t: number): void {
  if (t < 0 || t > 1) {
    throw new Error(`Bezier offset out of range: ${t} not between 0 and 1`);
  }
}

/** (1-t)², 2(1-t)t, t² */
function quadraticWeights(t: number): number[] {
  assertOffset(t);
  const mt = 1 - t;
  return [mt * mt, 2 * mt * t, t * t];
}

/** d/dt of the quadratic weights */
function quadraticDerivativeWeights(t: number): number[] {
  assertOffset(t);
  const mt = 1 - t;
  return [-2 * mt, 2 * mt - 2 * t, 2 * t];
}

/** (1-t)³, 3(1-t)²t, 3(1-t)t², t³ */
function cubicWeights(t: number): number[] {
  assertOffset(t);
  const mt = 1 - t;
  return [mt * mt * mt, 3 * mt * mt * t, 3 * mt * t * t, t * t * t];
}

/**
 * d/dt of the cubic weights, i.e.
 * B'(t) = 3(1-t)²(P1-P0) + 6(1-t)t(P2-P1) + 3t²(P3-P2)
 */
function cubicDerivativeWeights(t: number): number[] {
  assertOffset(t);
  const mt = 1 - t;
  const a = 3 * mt * mt;
  const b = 6 * mt * t;
  const c = 3 * t * t;
  return [-a, a - b, b - c, c];
}

function weighted2(points: THREE.Vector2[], weights: number[]): THREE.Vector2 {
  const result = new THREE.Vector2();
  points.forEach((p, i) => result.addScaledVector(p, weights[i]));
  return result;
}

function weighted3(points: THREE.Vector3[], weights: number[]): THREE.Vector3 {
  const result = new THREE.Vector3();
  points.forEach((p, i) => result.addScaledVector(p, weights[i]));
  return result;
}

function sampleParameters(count: number): number[] {
  if (!Number.isInteger(count) || count < 2) {
    throw new Error(`Bezier sampling needs at least 2 samples, got ${count}`);
  }
  return Array.from({ length: count }, (_, i) => i / (count - 1));
}

// =============================================================================
// QUADRATIC
// =============================================================================

export function quadraticBezier2D(
  p0: THREE.Vector2,
  p1: THREE.Vector2,
  p2: THREE.Vector2,
  t: number,
): THREE.Vector2 {
  return weighted2([p0, p1, p2], quadraticWeights(t));
}

export function quadraticBezier3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  return weighted3([p0, p1, p2], quadraticWeights(t));
}

export function quadraticBezierDerivative2D(
  p0: THREE.Vector2,
  p1: THREE.Vector2,
  p2: THREE.Vector2,
  t: number,
): THREE.Vector2 {
  return weighted2([p0, p1, p2], quadraticDerivativeWeights(t));
}

export function quadraticBezierDerivative3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  return weighted3([p0, p1, p2], quadraticDerivativeWeights(t));
}

// =============================================================================
// CUBIC
// =============================================================================

export function cubicBezier2D(
  p0: THREE.Vector2,
  p1: THREE.Vector2,
  p2: THREE.Vector2,
  p3: THREE.Vector2,
  t: number,
): THREE.Vector2 {
  return weighted2([p0, p1, p2, p3], cubicWeights(t));
}

export function cubicBezier3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  p3: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  return weighted3([p0, p1, p2, p3], cubicWeights(t));
}

export function cubicBezierDerivative2D(
  p0: THREE.Vector2,
  p1: THREE.Vector2,
  p2: THREE.Vector2,
  p3: THREE.Vector2,
  t: number,
): THREE.Vector2 {
  return weighted2([p0, p1, p2, p3], cubicDerivativeWeights(t));
}

export function cubicBezierDerivative3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  p3: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  return weighted3([p0, p1, p2, p3], cubicDerivativeWeights(t));
}

// =============================================================================
// SAMPLING
// =============================================================================

/**
 * Sample a 2D cubic at `count` evenly spaced parameters, ends included.
 */
export function sampleCubicBezier2D(
  p0: THREE.Vector2,
  p1: THREE.Vector2,
  p2: THREE.Vector2,
  p3: THREE.Vector2,
  count: number,
): THREE.Vector2[] {
  return sampleParameters(count).map((t) => cubicBezier2D(p0, p1, p2, p3, t));
}

export function sampleCubicBezier3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  p3: THREE.Vector3,
  count: number,
): THREE.Vector3[] {
  return sampleParameters(count).map((t) => cubicBezier3D(p0, p1, p2, p3, t));
}

export function sampleQuadraticBezier3D(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  count: number,
): THREE.Vector3[] {
  return sampleParameters(count).map((t) => quadraticBezier3D(p0, p1, p2, t));
}
