/**
 * Spike: a raceme whose flowers sit directly on the axis.
 */

import { lerp } from "../../math/Vector.js";
import type { AxisCurve } from "../../math/AxisCurve.js";
import { applyAgeDistribution } from "../aging.js";
import type { BranchPoint, InflorescenceParams } from "../types.js";
import { assertBranchCount, branchDirection, branchFraction } from "./branching.js";

export function generateSpike(params: InflorescenceParams, axis: AxisCurve): BranchPoint[] {
  assertBranchCount(params.branchCount);
  const branches: BranchPoint[] = [];

  for (let i = 0; i < params.branchCount; i++) {
    const t = branchFraction(i, params.branchCount);
    const sample = axis.sampleAtT(t);
    const angle = lerp(params.angleBottom, params.angleTop, t);

    branches.push({
      position: sample.position.clone(),
      direction: branchDirection(sample, angle, params.rotationAngle * i),
      length: 0,
      flowerScale: lerp(params.flowerSizeBottom, params.flowerSizeTop, t),
      age: applyAgeDistribution(1 - t, params.ageDistribution),
      axisPosition: t,
    });
  }

  return branches;
}
