/**
 * Multi-flower structures: patterns, layout, assembly and aging.
 */

export {
  PATTERN_TYPES,
  DEFAULT_INFLORESCENCE_PARAMS,
  DEFAULT_STEM_COLOR,
  mergeInflorescenceParams,
  isRecursivePattern,
  isCompoundPattern,
  getRecursiveDefaults,
  type PatternType,
  type CurveMode,
  type InflorescenceParams,
  type RecursiveDefaults,
  type BranchPoint,
} from "./types.js";
export {
  AGING_THRESHOLDS,
  agingStage,
  selectAgingMesh,
  applyAgeDistribution,
  type AgingStage,
  type FlowerAging,
} from "./aging.js";
export { generateCurvedPoints, generateAxisPoints, MIN_CURVE_AMOUNT } from "./Axis.js";
export {
  generateBranchPoints,
  generateRaceme,
  generateSpike,
  generateUmbel,
  generateCorymb,
  generateDichasium,
  generateDrepanium,
  branchDirection,
  branchFraction,
  type SimplePattern,
} from "./patterns/index.js";
export {
  layoutInflorescence,
  assembleInflorescence,
  countFlowers,
  subInstanceParams,
  effectiveCurveAmount,
  generatePedicelCurve,
  type FlowerInstance,
  type StemSegment,
  type InflorescenceLayout,
} from "./InflorescenceAssembly.js";
