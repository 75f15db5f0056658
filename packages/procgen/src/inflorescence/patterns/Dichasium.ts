/**
 * Dichasium: a terminal flower whose stalk forks into two children at
 * ± the divergence angle, level after level. The central flower is the
 * oldest (determinate).
 */

import * as THREE from "three";
import { degToRad } from "../../math/Vector.js";
import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";

interface CymeNode {
  start: THREE.Vector3;
  direction: THREE.Vector3;
  length: number;
  depth: number;
}

export function generateDichasium(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  const maxDepth = params.recursionDepth;
  const tip = axis.sampleAtT(1);
  const divergence = degToRad(params.angleDivergence);
  const left = new THREE.Quaternion().setFromAxisAngle(tip.binormal, divergence);
  const right = new THREE.Quaternion().setFromAxisAngle(tip.binormal, -divergence);

  const branches: BranchPoint[] = [];
  const visit = (node: CymeNode): void => {
    const end = node.start.clone().addScaledVector(node.direction, node.length);
    const t = node.depth / Math.max(1, maxDepth);
    branches.push({
      position: end,
      direction: node.direction,
      length: node.length,
      flowerScale: params.flowerSizeTop * (1 - t * 0.4),
      age: applyAgeDistribution(maxDepth > 0 ? 1 - node.depth / maxDepth : 1, params.ageDistribution),
      axisPosition: 1,
    });

    if (node.depth >= maxDepth) return;
    const childLength = node.length * params.branchRatio;
    for (const rotation of [left, right]) {
      visit({
        start: end,
        direction: node.direction.clone().applyQuaternion(rotation).normalize(),
        length: childLength,
        depth: node.depth + 1,
      });
    }
  };

  visit({
    start: tip.position,
    direction: tip.tangent.clone(),
    length: params.branchLengthTop,
    depth: 0,
  });
  return branches;
}
