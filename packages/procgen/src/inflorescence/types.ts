/**
 * Inflorescence Types
 *
 * Parameters for multi-flower structures and the branch points pattern
 * generators produce. Angles in parameters are in degrees.
 *
 * @module InflorescenceTypes
 */

import type * as THREE from "three";
import type { Color3 } from "../mesh/Mesh.js";
import type { Vec3Tuple } from "../components/types.js";

/**
 * Closed set of branching topologies.
 */
export type PatternType =
  | "Raceme"
  | "Spike"
  | "Umbel"
  | "Corymb"
  | "Dichasium"
  | "Drepanium"
  | "CompoundRaceme"
  | "CompoundUmbel";

export const PATTERN_TYPES: readonly PatternType[] = [
  "Raceme",
  "Spike",
  "Umbel",
  "Corymb",
  "Dichasium",
  "Drepanium",
  "CompoundRaceme",
  "CompoundUmbel",
];

/**
 * How pedicel curvature varies with position along the axis.
 */
export type CurveMode = "Uniform" | "GradientUp" | "GradientDown";

export interface InflorescenceParams {
  pattern: PatternType;
  /** Length of the main axis */
  axisLength: number;
  /** Number of branches (rays for umbels) */
  branchCount: number;
  /** Droop from the axis at the top, degrees */
  angleTop: number;
  /** Droop from the axis at the bottom, degrees */
  angleBottom: number;
  /** Pedicel length at the top */
  branchLengthTop: number;
  /** Pedicel length at the bottom */
  branchLengthBottom: number;
  /** Azimuth increment between consecutive branches, degrees */
  rotationAngle: number;
  flowerSizeTop: number;
  flowerSizeBottom: number;
  /** Levels for recursive patterns (≥ 1) */
  recursionDepth: number;
  /** Size ratio between a level and its parent */
  branchRatio: number;
  /** Split angle for dichasia, degrees */
  angleDivergence: number;
  /** 0 = all buds, 0.5 = natural gradient, 1 = all blooms */
  ageDistribution: number;
  /** Bow of the main axis (0 = straight) */
  axisCurveAmount: number;
  /** Direction the axis bows toward */
  axisCurveDirection: Vec3Tuple;
  /** Arch of each pedicel (0 = straight) */
  branchCurveAmount: number;
  branchCurveMode: CurveMode;
  /** Branches per sub-instance of a compound pattern; derived when omitted */
  subBranchCount?: number;
  /**
   * Axis drawn as a 2D (lateral, vertical) profile; lifted to 3D and
   * scaled to `axisLength`. Replaces the axis bow when present.
   */
  axisProfile?: readonly (readonly [number, number])[];
  stemColor: Color3;
}

export const DEFAULT_STEM_COLOR: Color3 = [0.3, 0.5, 0.2];

export const DEFAULT_INFLORESCENCE_PARAMS: InflorescenceParams = {
  pattern: "Raceme",
  axisLength: 10.0,
  branchCount: 12,
  angleTop: 45.0,
  angleBottom: 60.0,
  branchLengthTop: 0.5,
  branchLengthBottom: 1.5,
  rotationAngle: 137.5,
  flowerSizeTop: 0.8,
  flowerSizeBottom: 1.0,
  recursionDepth: 1,
  branchRatio: 0.7,
  angleDivergence: 0.0,
  ageDistribution: 0.5,
  axisCurveAmount: 0.0,
  axisCurveDirection: [0, 0, 1],
  branchCurveAmount: 0.0,
  branchCurveMode: "Uniform",
  stemColor: DEFAULT_STEM_COLOR,
};

/**
 * Defaults, then the recursive defaults of the chosen pattern, then `partial`.
 */
export function mergeInflorescenceParams(
  partial: Partial<InflorescenceParams> = {},
): InflorescenceParams {
  const pattern = partial.pattern ?? DEFAULT_INFLORESCENCE_PARAMS.pattern;
  return { ...DEFAULT_INFLORESCENCE_PARAMS, ...getRecursiveDefaults(pattern), ...partial };
}

export function isRecursivePattern(pattern: PatternType): boolean {
  return (
    pattern === "Dichasium" ||
    pattern === "Drepanium" ||
    pattern === "CompoundRaceme" ||
    pattern === "CompoundUmbel"
  );
}

export function isCompoundPattern(
  pattern: PatternType,
): pattern is "CompoundRaceme" | "CompoundUmbel" {
  return pattern === "CompoundRaceme" || pattern === "CompoundUmbel";
}

export interface RecursiveDefaults {
  recursionDepth: number;
  branchRatio: number;
  angleDivergence: number;
}

/**
 * Suggested recursion settings when switching to a pattern.
 */
export function getRecursiveDefaults(pattern: PatternType): RecursiveDefaults {
  switch (pattern) {
    case "Dichasium":
      return { recursionDepth: 1, branchRatio: 0.7, angleDivergence: 30.0 };
    case "Drepanium":
      return { recursionDepth: 1, branchRatio: 0.8, angleDivergence: 137.5 };
    case "CompoundRaceme":
    case "CompoundUmbel":
      return { recursionDepth: 1, branchRatio: 0.5, angleDivergence: 0.0 };
    default:
      return { recursionDepth: 1, branchRatio: 0.7, angleDivergence: 0.0 };
  }
}

/**
 * Where a flower attaches and how it is oriented.
 */
export interface BranchPoint {
  /** Flower position (end of the pedicel) */
  position: THREE.Vector3;
  /** Unit direction from pedicel base to flower */
  direction: THREE.Vector3;
  /** Pedicel length; the pedicel starts at position − direction·length */
  length: number;
  flowerScale: number;
  /** 0 = youngest, 1 = oldest */
  age: number;
  /** Normalized position along the parent axis (0 = base, 1 = tip) */
  axisPosition: number;
}
