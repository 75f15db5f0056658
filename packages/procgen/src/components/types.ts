/**
 * Flower Component Types
 *
 * Shape parameters, defaults and presets for the individual flower organs:
 * receptacle, pistil, stamen, petal and sepal.
 *
 * @module ComponentTypes
 */

import type { Color3 } from "../mesh/Mesh.js";

/** Point as a JSON-friendly tuple */
export type Vec3Tuple = readonly [number, number, number];

// ============================================================================
// RECEPTACLE
// ============================================================================

/**
 * Receptacle profile: a cubic Bezier from the base radius through the
 * bulge to the top radius, revolved about Y.
 */
export interface ReceptacleParams {
  /** Height of the receptacle */
  height: number;
  /** Radius at the bottom */
  baseRadius: number;
  /** Radius at the widest point */
  bulgeRadius: number;
  /** Radius at the top */
  topRadius: number;
  /** Height fraction of the bulge (0-1) */
  bulgePosition: number;
  /** Angular segments */
  segments: number;
  /** Points sampled along the profile */
  profileSamples: number;
  color: Color3;
}

export const DEFAULT_RECEPTACLE_PARAMS: ReceptacleParams = {
  height: 1.0,
  baseRadius: 0.25,
  bulgeRadius: 0.35,
  topRadius: 0.15,
  bulgePosition: 0.5,
  segments: 16,
  profileSamples: 8,
  color: [1, 1, 1],
};

export const RECEPTACLE_PRESETS: Record<string, ReceptacleParams> = {
  flat: {
    ...DEFAULT_RECEPTACLE_PARAMS,
    height: 0.2,
    baseRadius: 0.5,
    bulgeRadius: 0.5,
    topRadius: 0.5,
    bulgePosition: 0.5,
    segments: 16,
    profileSamples: 4,
  },
  convex: {
    ...DEFAULT_RECEPTACLE_PARAMS,
    height: 1.2,
    baseRadius: 0.2,
    bulgeRadius: 0.6,
    topRadius: 0.25,
    bulgePosition: 0.6,
    segments: 20,
    profileSamples: 10,
  },
  concave: {
    ...DEFAULT_RECEPTACLE_PARAMS,
    height: 0.8,
    baseRadius: 0.4,
    bulgeRadius: 0.3,
    topRadius: 0.5,
    bulgePosition: 0.3,
    segments: 16,
    profileSamples: 8,
  },
};

// ============================================================================
// PISTIL
// ============================================================================

export interface PistilParams {
  /** Style length */
  length: number;
  /** Style radius at the base */
  baseRadius: number;
  /** Style radius below the stigma */
  tipRadius: number;
  /** Radius of the spherical stigma */
  stigmaRadius: number;
  segments: number;
  color: Color3;
  /** Sideways bend (0 = straight, 1 = strong arc) */
  bend: number;
  /** Vertical droop (-1 droops, 1 lifts) */
  droop: number;
  /** Explicit Catmull-Rom control points for the style; overrides bend/droop */
  styleCurve?: readonly Vec3Tuple[];
}

export const DEFAULT_PISTIL_PARAMS: PistilParams = {
  length: 2.0,
  baseRadius: 0.08,
  tipRadius: 0.06,
  stigmaRadius: 0.12,
  segments: 12,
  color: [1, 1, 1],
  bend: 0,
  droop: 0,
};

export const PISTIL_PRESETS: Record<string, PistilParams> = {
  short: {
    ...DEFAULT_PISTIL_PARAMS,
    length: 1.0,
    baseRadius: 0.15,
    tipRadius: 0.12,
    stigmaRadius: 0.2,
  },
  slender: {
    ...DEFAULT_PISTIL_PARAMS,
    length: 3.0,
    baseRadius: 0.05,
    tipRadius: 0.04,
    stigmaRadius: 0.08,
    segments: 10,
  },
};

// ============================================================================
// STAMEN
// ============================================================================

export interface StamenParams {
  filamentLength: number;
  filamentRadius: number;
  /** Anther extent along the filament direction */
  antherLength: number;
  antherWidth: number;
  antherHeight: number;
  segments: number;
  color: Color3;
  /** Sideways bend of the filament */
  bend: number;
  /** Vertical droop of the filament */
  droop: number;
  /** Explicit Catmull-Rom control points (≥ 4); overrides bend/droop */
  filamentCurve?: readonly Vec3Tuple[];
}

export const DEFAULT_STAMEN_PARAMS: StamenParams = {
  filamentLength: 1.5,
  filamentRadius: 0.04,
  antherLength: 0.25,
  antherWidth: 0.07,
  antherHeight: 0.07,
  segments: 10,
  color: [1, 1, 1],
  bend: 0,
  droop: 0,
};

export const STAMEN_PRESETS: Record<string, StamenParams> = {
  short: {
    ...DEFAULT_STAMEN_PARAMS,
    filamentLength: 0.8,
    filamentRadius: 0.05,
    antherLength: 0.2,
    antherWidth: 0.1,
    antherHeight: 0.1,
  },
  slender: {
    ...DEFAULT_STAMEN_PARAMS,
    filamentLength: 2.5,
    filamentRadius: 0.03,
    antherLength: 0.3,
    antherWidth: 0.05,
    antherHeight: 0.05,
    segments: 8,
  },
  elongatedAnther: {
    ...DEFAULT_STAMEN_PARAMS,
    filamentLength: 1.5,
    filamentRadius: 0.04,
    antherLength: 0.4,
    antherWidth: 0.06,
    antherHeight: 0.06,
  },
};

// ============================================================================
// PETAL / SEPAL
// ============================================================================

/**
 * Petal blade shape. Sepals share this shape model with their own defaults.
 */
export interface PetalParams {
  length: number;
  /** Maximum width, reached at 60% of the length */
  width: number;
  /** Tip width as a fraction of the maximum width (0 = pointed) */
  tipSharpness: number;
  /** Width at the attachment point */
  baseWidth: number;
  /** Curl toward the face (+) or back (-), strongest at the tip */
  curl: number;
  /** Twist about the midrib at the tip, in degrees */
  twist: number;
  /** Ruffle waves along the edge */
  ruffleFreq: number;
  /** Ruffle amplitude */
  ruffleAmp: number;
  /** Sideways bend of the blade */
  lateralCurve: number;
  /** Tessellation steps per parametric axis */
  resolution: number;
  color: Color3;
}

export const DEFAULT_PETAL_PARAMS: PetalParams = {
  length: 3.0,
  width: 1.2,
  tipSharpness: 0.4,
  baseWidth: 0.4,
  curl: 0,
  twist: 0,
  ruffleFreq: 0,
  ruffleAmp: 0,
  lateralCurve: 0,
  resolution: 16,
  color: [1, 1, 1],
};

export const PETAL_PRESETS: Record<string, PetalParams> = {
  wide: {
    ...DEFAULT_PETAL_PARAMS,
    length: 2.5,
    width: 2.0,
    tipSharpness: 0.2,
    baseWidth: 0.8,
    resolution: 20,
  },
  narrow: {
    ...DEFAULT_PETAL_PARAMS,
    length: 4.0,
    width: 1.0,
    tipSharpness: 0.7,
    baseWidth: 0.3,
    resolution: 16,
  },
  short: {
    ...DEFAULT_PETAL_PARAMS,
    length: 1.5,
    width: 1.2,
    tipSharpness: 0.1,
    baseWidth: 0.6,
    resolution: 12,
  },
};

export const SEPAL_GREEN: Color3 = [0.2, 0.6, 0.2];

export const DEFAULT_SEPAL_PARAMS: PetalParams = {
  ...DEFAULT_PETAL_PARAMS,
  length: 3.0,
  width: 1.0,
  tipSharpness: 0.5,
  baseWidth: 0.4,
  curl: -0.2,
  resolution: 16,
  color: SEPAL_GREEN,
};

export const SEPAL_PRESETS: Record<string, PetalParams> = {
  narrow: {
    ...DEFAULT_SEPAL_PARAMS,
    length: 3.5,
    width: 0.7,
    tipSharpness: 0.7,
    baseWidth: 0.3,
    curl: -0.3,
    resolution: 14,
  },
  wide: {
    ...DEFAULT_SEPAL_PARAMS,
    length: 2.5,
    width: 1.5,
    tipSharpness: 0.3,
    baseWidth: 0.6,
    curl: -0.1,
    resolution: 18,
  },
  recurved: {
    ...DEFAULT_SEPAL_PARAMS,
    length: 3.0,
    width: 1.2,
    tipSharpness: 0.4,
    baseWidth: 0.5,
    curl: -0.6,
    twist: 5,
    resolution: 16,
  },
};

// ============================================================================
// MERGING
// ============================================================================

export function mergeReceptacleParams(
  partial: Partial<ReceptacleParams> = {},
): ReceptacleParams {
  return { ...DEFAULT_RECEPTACLE_PARAMS, ...partial };
}

export function mergePistilParams(partial: Partial<PistilParams> = {}): PistilParams {
  return { ...DEFAULT_PISTIL_PARAMS, ...partial };
}

export function mergeStamenParams(partial: Partial<StamenParams> = {}): StamenParams {
  return { ...DEFAULT_STAMEN_PARAMS, ...partial };
}

export function mergePetalParams(partial: Partial<PetalParams> = {}): PetalParams {
  return { ...DEFAULT_PETAL_PARAMS, ...partial };
}

export function mergeSepalParams(partial: Partial<PetalParams> = {}): PetalParams {
  return { ...DEFAULT_SEPAL_PARAMS, ...partial };
}

/**
 * Throw unless `value` is an integer ≥ `min`.
 */
export function assertCount(name: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer ≥ ${min}, got ${value}`);
  }
}

/**
 * Throw unless `value` is finite and > 0.
 */
export function assertPositive(name: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new Error(`${name} must be a positive number, got ${value}`);
  }
}
