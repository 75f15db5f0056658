/**
 * Catmull-Rom Splines
 *
 * Uniform Catmull-Rom interpolation (tension 0.5). A segment between P1 and
 * P2 uses P0 and P3 only to shape its tangents, so a sampled curve runs from
 * points[1] to points[n-2].
 */

import * as THREE from "three";

/**
 * Point on the segment P1→P2 at t ∈ [0, 1].
 */
export function catmullRomPoint(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  p3: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  const t2 = t * t;
  const t3 = t2 * t;
  return new THREE.Vector3()
    .addScaledVector(p0, -t + 2 * t2 - t3)
    .addScaledVector(p1, 2 - 5 * t2 + 3 * t3)
    .addScaledVector(p2, t + 4 * t2 - 3 * t3)
    .addScaledVector(p3, -t2 + t3)
    .multiplyScalar(0.5);
}

/**
 * First derivative of the segment P1→P2 at t (not normalized).
 */
export function catmullRomTangent(
  p0: THREE.Vector3,
  p1: THREE.Vector3,
  p2: THREE.Vector3,
  p3: THREE.Vector3,
  t: number,
): THREE.Vector3 {
  const t2 = t * t;
  return new THREE.Vector3()
    .addScaledVector(p0, -1 + 4 * t - 3 * t2)
    .addScaledVector(p1, -10 * t + 9 * t2)
    .addScaledVector(p2, 1 + 8 * t - 9 * t2)
    .addScaledVector(p3, -2 * t + 3 * t2)
    .multiplyScalar(0.5);
}

/**
 * Sample every interior segment of a control polyline.
 *
 * Produces `(n - 3) * samplesPerSegment + 1` points, starting at points[1]
 * and ending exactly at points[n - 2].
 */
export function sampleCatmullRomCurve(
  points: readonly THREE.Vector3[],
  samplesPerSegment: number,
): THREE.Vector3[] {
  if (points.length < 4) {
    throw new Error(
      `Catmull-Rom curve needs at least 4 control points, got ${points.length}`,
    );
  }
  if (!Number.isInteger(samplesPerSegment) || samplesPerSegment < 2) {
    throw new Error(
      `Catmull-Rom sampling needs at least 2 samples per segment, got ${samplesPerSegment}`,
    );
  }

  const result: THREE.Vector3[] = [];
  for (let seg = 0; seg + 3 < points.length; seg++) {
    const [p0, p1, p2, p3] = points.slice(seg, seg + 4);
    for (let i = 0; i < samplesPerSegment; i++) {
      result.push(catmullRomPoint(p0, p1, p2, p3, i / samplesPerSegment));
    }
  }
  result.push(points[points.length - 2].clone());
  return result;
}
