/**
 * Pattern dispatch for single-level inflorescences.
 */

import type { AxisCurve } from "../../math/AxisCurve.js";
import type { BranchPoint, InflorescenceParams, PatternType } from "../types.js";
import { generateRaceme } from "./Raceme.js";
import { generateSpike } from "./Spike.js";
import { generateUmbel } from "./Umbel.js";
import { generateCorymb } from "./Corymb.js";
import { generateDichasium } from "./Dichasium.js";
import { generateDrepanium } from "./Drepanium.js";

export type SimplePattern = Exclude<PatternType, "CompoundRaceme" | "CompoundUmbel">;

/**
 * Branch points of a single-level pattern.
 */
export function generateBranchPoints(
  pattern: SimplePattern,
  params: InflorescenceParams,
  axis: AxisCurve,
): BranchPoint[] {
  switch (pattern) {
    case "Raceme":
      return generateRaceme(params, axis);
    case "Spike":
      return generateSpike(params, axis);
    case "Umbel":
      return generateUmbel(params, axis);
    case "Corymb":
      return generateCorymb(params, axis);
    case "Dichasium":
      return generateDichasium(params, axis);
    case "Drepanium":
      return generateDrepanium(params, axis);
  }
}

export { branchDirection, branchFraction } from "./branching.js";
export {
  generateRaceme,
  generateSpike,
  generateUmbel,
  generateCorymb,
  generateDichasium,
  generateDrepanium,
};
