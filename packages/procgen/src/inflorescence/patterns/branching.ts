/**
 * Shared branch geometry for the pattern generators.
 */

import * as THREE from "three";
import { degToRad } from "../../math/Vector.js";
import type { AxisSample } from "../../math/AxisCurve.js";

const _spin = new THREE.Quaternion();

/**
 * Unit direction leaving the axis at `sample`: tipped `droopDegrees` away
 * from the tangent toward the normal, then spun `spinDegrees` about the
 * tangent.
 */
export function branchDirection(
  sample: AxisSample,
  droopDegrees: number,
  spinDegrees: number,
): THREE.Vector3 {
  const droop = degToRad(droopDegrees);
  const direction = sample.tangent
    .clone()
    .multiplyScalar(Math.cos(droop))
    .addScaledVector(sample.normal, Math.sin(droop));
  _spin.setFromAxisAngle(sample.tangent, degToRad(spinDegrees));
  return direction.applyQuaternion(_spin).normalize();
}

/**
 * Normalized position of branch `index` among `count` (0.5 for a single branch).
 */
export function branchFraction(index: number, count: number): number {
  return count > 1 ? index / (count - 1) : 0.5;
}

export function assertBranchCount(count: number): void {
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`Branch count must be a non-negative integer, got ${count}`);
  }
}
