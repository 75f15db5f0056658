/**
 * Raceme: stalked flowers spread evenly along an unbranched axis. The
 * lowest flowers open first (indeterminate).
 */

import { lerp } from "../../math/Vector.js";
import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";
import { assertBranchCount, branchDirection, branchFraction } from "./branching.js";

export function generateRaceme(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  assertBranchCount(params.branchCount);
  const branches: BranchPoint[] = [];

  for (let i = 0; i < params.branchCount; i++) {
    const t = branchFraction(i, params.branchCount);
    const sample = axis.sampleAtT(t);

    const angle = lerp(params.angleBottom, params.angleTop, t);
    const length = lerp(params.branchLengthBottom, params.branchLengthTop, t);
    const direction = branchDirection(sample, angle, params.rotationAngle * i);

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
