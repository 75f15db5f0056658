/**
 * Inflorescence Axis
 *
 * Polylines for the main axis and the pedicels: straight segments, or a
 * quadratic Bezier bowed toward a direction.
 */

import * as THREE from "three";
import { sampleQuadraticBezier3D } from "../math/Bezier.js";
import { reconstructCurve3d } from "../math/CurveReconstruction.js";
import type { EngineConfig } from "../config.js";
import type { InflorescenceParams } from "./types.js";

/** Curve amounts below this draw a straight line */
export const MIN_CURVE_AMOUNT = 0.01;
/** Resolution of an axis lifted from a 2D profile */
const PROFILE_SAMPLES = 32;

/**
 * Points from `start` to `end` bowed toward `direction`. The control point
 * sits `amount · length / 2` off the midpoint. Straight input gives just
 * the two endpoints.
 */
export function generateCurvedPoints(
  start: THREE.Vector3,
  end: THREE.Vector3,
  amount: number,
  direction: THREE.Vector3,
  count: number,
): THREE.Vector3[] {
  if (!Number.isInteger(count) || count < 2) {
    throw new Error(`Curved line needs at least 2 points, got ${count}`);
  }
  if (amount < MIN_CURVE_AMOUNT) {
    return [start.clone(), end.clone()];
  }

  const control = start
    .clone()
    .add(end)
    .multiplyScalar(0.5)
    .addScaledVector(direction.clone().normalize(), amount * start.distanceTo(end) * 0.5);
  return sampleQuadraticBezier3D(start, control, end, count);
}

/**
 * Main axis from the origin up +Y for `axisLength`.
 */
export function generateAxisPoints(
  params: InflorescenceParams,
  config: EngineConfig,
): THREE.Vector3[] {
  if (params.axisProfile !== undefined && params.axisProfile.length >= 3) {
    return liftAxisProfile(params.axisProfile, params.axisLength);
  }

  const start = new THREE.Vector3();
  const end = new THREE.Vector3(0, params.axisLength, 0);
  const direction = new THREE.Vector3(...params.axisCurveDirection);
  const curved = params.axisCurveAmount >= MIN_CURVE_AMOUNT;

  if (curved && direction.lengthSq() < 1e-12) {
    console.warn("[Inflorescence] Axis curve direction is zero, using a straight axis");
    return [start, end];
  }

  return generateCurvedPoints(
    start,
    end,
    params.axisCurveAmount,
    direction,
    curved ? config.axisCurveSamples : 2,
  );
}

/**
 * Lift a (lateral, vertical) profile to 3D, start it at the origin and
 * scale it so its vertical extent equals `axisLength`.
 */
function liftAxisProfile(
  profile: readonly (readonly [number, number])[],
  axisLength: number,
): THREE.Vector3[] {
  const lifted = reconstructCurve3d(
    profile.map(([x, y]) => new THREE.Vector2(x, y)),
    PROFILE_SAMPLES,
  );
  const origin = lifted[0].clone();
  const extent = lifted[lifted.length - 1].y - origin.y;
  const scale = axisLength / extent;
  return lifted.map((p) => p.sub(origin).multiplyScalar(scale));
}
