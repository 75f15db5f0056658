/**
 * Umbel: every ray leaves the axis tip, fanning out by the rotation
 * increment. All flowers open together.
 */

import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";
import { assertBranchCount, branchDirection } from "./branching.js";

export function generateUmbel(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  assertBranchCount(params.branchCount);
  const tip = axis.sampleAtT(1);
  const age = applyAgeDistribution(1, params.ageDistribution);
  const length = params.branchLengthTop;

  return Array.from({ length: params.branchCount }, (_, i) => {
    const direction = branchDirection(tip, params.angleTop, params.rotationAngle * i);
    return {
      position: tip.position.clone().addScaledVector(direction, length),
      direction,
      length,
      flowerScale: params.flowerSizeTop,
      age,
      axisPosition: 1,
    };
  });
}
