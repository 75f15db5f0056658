/**
 * Bend Curves
 *
 * Turns two sliders (sideways bend, vertical droop) into Catmull-Rom control
 * points for curved styles and filaments. The curve starts at the origin and
 * ends at height `length`; the outer two points only shape the end tangents.
 */

import * as THREE from "three";
import { sampleCatmullRomCurve } from "../math/CatmullRom.js";
import type { Vec3Tuple } from "./types.js";

const NEGLIGIBLE = 0.01;

/** Samples per Catmull-Rom segment when tessellating a bend curve */
export const BEND_SAMPLES_PER_SEGMENT = 20;

/**
 * Five control points [p0, start, middle, end, p4], or null when both bend
 * and droop are negligible.
 *
 * @param bend - Sideways displacement (0-1, peak 50% of length)
 * @param droop - Vertical droop (-1 droops, 1 lifts)
 * @param direction - +1 bends toward +X, -1 toward -X
 */
export function generateBendCurve(
  length: number,
  bend: number,
  droop = 0,
  direction = 1,
): THREE.Vector3[] | null {
  if (bend < NEGLIGIBLE && Math.abs(droop) < NEGLIGIBLE) return null;

  const maxDisplacement = length * 0.5 * bend;
  const droopScale = length * 0.4;

  const start = new THREE.Vector3(0, 0, 0);
  const middle = new THREE.Vector3(
    maxDisplacement * 0.7 * direction,
    length * 0.5 - droop * droopScale * 0.5,
    0,
  );
  const end = new THREE.Vector3(maxDisplacement * 0.4 * direction, length, 0);

  const p0 = start.clone().addScaledVector(middle.clone().sub(start), -0.5);
  const p4 = end.clone().addScaledVector(end.clone().sub(middle), 0.5);

  return [p0, start, middle, end, p4];
}

export function tuplesToVectors(points: readonly Vec3Tuple[]): THREE.Vector3[] {
  return points.map(([x, y, z]) => new THREE.Vector3(x, y, z));
}

/**
 * Dense polyline for an organ axis: the explicit curve when given, else the
 * bend/droop curve, else null for a straight organ.
 */
export function resolveOrganCurve(
  length: number,
  bend: number,
  droop: number,
  explicit: readonly Vec3Tuple[] | undefined,
): THREE.Vector3[] | null {
  let control: THREE.Vector3[] | null = null;
  if (explicit !== undefined) {
    if (explicit.length < 4) {
      throw new Error(
        `Organ curve needs at least 4 control points, got ${explicit.length}`,
      );
    }
    control = tuplesToVectors(explicit);
  } else {
    control = generateBendCurve(length, bend, droop);
  }
  return control === null
    ? null
    : sampleCatmullRomCurve(control, BEND_SAMPLES_PER_SEGMENT);
}
