/**
 * Drepanium: a chain of single-child branches, each turned by the
 * rotation angle and bent slightly down, curling to one side like a
 * scorpion's tail.
 */

import * as THREE from "three";
import { anyPerpendicular, degToRad } from "../../math/Vector.js";
import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";
import { branchDirection } from "./branching.js";

/** Downward bend added at every level */
const LEVEL_TILT = degToRad(15);

export function generateDrepanium(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  const maxDepth = params.recursionDepth;
  const tip = axis.sampleAtT(1);
  const turn = new THREE.Quaternion().setFromAxisAngle(
    tip.tangent,
    degToRad(params.rotationAngle),
  );
  const tilt = new THREE.Quaternion();

  const branches: BranchPoint[] = [];
  let start = tip.position.clone();
  let direction = branchDirection(tip, params.angleTop, 0);
  let length = params.branchLengthTop;

  for (let depth = 0; depth <= maxDepth; depth++) {
    const end = start.clone().addScaledVector(direction, length);
    const t = depth / Math.max(1, maxDepth);
    branches.push({
      position: end,
      direction,
      length,
      flowerScale: params.flowerSizeTop * (1 - t * 0.3),
      age: applyAgeDistribution(maxDepth > 0 ? 1 - depth / maxDepth : 1, params.ageDistribution),
      axisPosition: 1,
    });

    const turned = direction.clone().applyQuaternion(turn);
    const bendAxis = new THREE.Vector3().crossVectors(tip.tangent, turned);
    if (bendAxis.lengthSq() < 1e-12) {
      bendAxis.copy(anyPerpendicular(tip.tangent));
    }
    tilt.setFromAxisAngle(bendAxis.normalize(), LEVEL_TILT);

    start = end;
    direction = turned.applyQuaternion(tilt).normalize();
    length *= params.branchRatio;
  }

  return branches;
}
