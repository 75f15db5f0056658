/**
 * Corymb: a raceme whose pedicels are sized so every flower ends at the
 * height of the axis tip, giving a flat top.
 */

import { lerp } from "../../math/Vector.js";
import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";
import { assertBranchCount, branchDirection, branchFraction } from "./branching.js";

/** Below this vertical component a branch cannot reach the target height */
const MIN_RISE = 0.01;

export function generateCorymb(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  assertBranchCount(params.branchCount);
  const targetHeight = axis.sampleAtT(1).position.y;
  const branches: BranchPoint[] = [];

  for (let i = 0; i < params.branchCount; i++) {
    const t = branchFraction(i, params.branchCount);
    const sample = axis.sampleAtT(t);

    const angle = lerp(params.angleBottom, params.angleTop, t);
    const direction = branchDirection(sample, angle, params.rotationAngle * i);
    const length =
      direction.y > MIN_RISE
        ? Math.max(0, (targetHeight - sample.position.y) / direction.y)
        : lerp(params.branchLengthBottom, params.branchLengthTop, t);

    branches.push({
      position: sample.position.clone().addScaledVector(direction, length),
      direction,
      length,
      flowerScale: lerp(params.flowerSizeBottom, params.flowerSizeTop, t),
      age: applyAgeDistribution(1 - t, params.ageDistribution),
      axisPosition: t,
    });
  }

  return branches;
}
