/**
 * Inflorescence Assembly
 *
 * Lays out an inflorescence (stems plus one transform per flower) and
 * turns the layout into a mesh. Compound patterns nest scaled copies of
 * themselves on every primary branch, with depth bounded by the caller's
 * configured maximum.
 *
 * @module InflorescenceAssembly
 */

import * as THREE from "three";
import { Mesh } from "../mesh/Mesh.js";
import { AxisCurve } from "../math/AxisCurve.js";
import { sweepAlongCurve } from "../geometry/Sweep.js";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config.js";
import { RecursionDepthError } from "../errors.js";
import { selectAgingMesh, type FlowerAging } from "./aging.js";
import { MIN_CURVE_AMOUNT, generateAxisPoints, generateCurvedPoints } from "./Axis.js";
import { generateBranchPoints } from "./patterns/index.js";
import {
  isCompoundPattern,
  isRecursivePattern,
  type BranchPoint,
  type InflorescenceParams,
} from "./types.js";

// ============================================================================
// LAYOUT TYPES
// ============================================================================

export interface FlowerInstance {
  position: THREE.Vector3;
  /** Unit direction the flower faces (its local +Y) */
  direction: THREE.Vector3;
  scale: number;
  age: number;
  /** Flower-local to inflorescence space */
  matrix: THREE.Matrix4;
}

export interface StemSegment {
  kind: "axis" | "pedicel";
  points: THREE.Vector3[];
  radius: number;
}

export interface InflorescenceLayout {
  flowers: FlowerInstance[];
  stems: StemSegment[];
  /** Branch points of the outermost level */
  branches: BranchPoint[];
}

/** Pedicels shorter than this are not drawn */
const MIN_PEDICEL_LENGTH = 0.01;

const _up = new THREE.Vector3(0, 1, 0);

// ============================================================================
// VALIDATION
// ============================================================================

function validateParams(params: InflorescenceParams, config: EngineConfig): void {
  if (!Number.isFinite(params.axisLength) || params.axisLength <= 0) {
    throw new Error(`Axis length must be positive, got ${params.axisLength}`);
  }
  if (!Number.isInteger(params.branchCount) || params.branchCount < 0) {
    throw new Error(`Branch count must be a non-negative integer, got ${params.branchCount}`);
  }
  if (
    params.subBranchCount !== undefined &&
    (!Number.isInteger(params.subBranchCount) || params.subBranchCount < 0)
  ) {
    throw new Error(
      `Sub-branch count must be a non-negative integer, got ${params.subBranchCount}`,
    );
  }
  if (isRecursivePattern(params.pattern)) {
    if (!Number.isInteger(params.recursionDepth) || params.recursionDepth < 1) {
      throw new Error(`Recursion depth must be an integer ≥ 1, got ${params.recursionDepth}`);
    }
    if (params.recursionDepth > config.maxRecursionDepth) {
      throw new RecursionDepthError(params.recursionDepth, config.maxRecursionDepth);
    }
  }
}

// ============================================================================
// LAYOUT
// ============================================================================

/**
 * Stems and flower transforms for an inflorescence, without geometry.
 */
export function layoutInflorescence(
  params: InflorescenceParams,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): InflorescenceLayout {
  validateParams(params, config);
  return layoutLevel(params, config);
}

function layoutLevel(params: InflorescenceParams, config: EngineConfig): InflorescenceLayout {
  const axisPoints = generateAxisPoints(params, config);
  const axis = new AxisCurve(axisPoints);
  const pedicelRadius = config.stemRadius * config.pedicelRadiusFactor;

  const layout: InflorescenceLayout = {
    flowers: [],
    stems: [{ kind: "axis", points: axisPoints, radius: config.stemRadius }],
    branches: [],
  };

  const pattern = params.pattern;
  const nested = isCompoundPattern(pattern) && params.recursionDepth > 1;
  const simple =
    pattern === "CompoundRaceme" ? "Raceme" : pattern === "CompoundUmbel" ? "Umbel" : pattern;

  layout.branches = generateBranchPoints(simple, params, axis);

  for (const branch of layout.branches) {
    if (branch.length > MIN_PEDICEL_LENGTH) {
      layout.stems.push({
        kind: "pedicel",
        points: generatePedicelCurve(branch, params, config),
        radius: pedicelRadius,
      });
    }

    if (!nested) {
      layout.flowers.push(flowerAt(branch));
      continue;
    }

    // Primary branch hosts a smaller copy of the whole pattern
    const sub = layoutLevel(subInstanceParams(params), config);
    const host = new THREE.Matrix4().compose(
      branch.position,
      new THREE.Quaternion().setFromUnitVectors(_up, branch.direction),
      new THREE.Vector3().setScalar(params.branchRatio),
    );
    for (const flower of sub.flowers) {
      layout.flowers.push(transformFlower(flower, host, params.branchRatio));
    }
    for (const stem of sub.stems) {
      layout.stems.push({
        kind: stem.kind,
        points: stem.points.map((p) => p.clone().applyMatrix4(host)),
        radius: stem.radius * params.branchRatio,
      });
    }
  }

  return layout;
}

/**
 * Parameters of the sub-instance hosted on each primary branch.
 */
export function subInstanceParams(params: InflorescenceParams): InflorescenceParams {
  const umbel = params.pattern === "CompoundUmbel";
  const derivedCount = umbel
    ? Math.max(4, Math.floor((params.branchCount * 3) / 4))
    : Math.max(3, Math.floor(params.branchCount / 2));

  return {
    ...params,
    axisLength: params.axisLength * (umbel ? 0.3 : 0.4),
    branchCount: params.subBranchCount ?? derivedCount,
    branchLengthTop: params.branchLengthTop * 0.6,
    branchLengthBottom: params.branchLengthBottom * 0.6,
    flowerSizeTop: params.flowerSizeTop * 0.7,
    flowerSizeBottom: params.flowerSizeBottom * 0.7,
    recursionDepth: params.recursionDepth - 1,
  };
}

function flowerAt(branch: BranchPoint): FlowerInstance {
  const rotation = new THREE.Quaternion().setFromUnitVectors(_up, branch.direction);
  return {
    position: branch.position.clone(),
    direction: branch.direction.clone(),
    scale: branch.flowerScale,
    age: branch.age,
    matrix: new THREE.Matrix4().compose(
      branch.position,
      rotation,
      new THREE.Vector3().setScalar(branch.flowerScale),
    ),
  };
}

function transformFlower(
  flower: FlowerInstance,
  host: THREE.Matrix4,
  hostScale: number,
): FlowerInstance {
  return {
    position: flower.position.clone().applyMatrix4(host),
    direction: flower.direction.clone().transformDirection(host),
    scale: flower.scale * hostScale,
    age: flower.age,
    matrix: host.clone().multiply(flower.matrix),
  };
}

// ============================================================================
// PEDICELS
// ============================================================================

/**
 * Pedicel curvature for a branch, shaped by the curve mode.
 */
export function effectiveCurveAmount(params: InflorescenceParams, axisPosition: number): number {
  const amount = params.branchCurveAmount;
  switch (params.branchCurveMode) {
    case "Uniform":
      return amount;
    case "GradientUp":
      return amount * axisPosition * axisPosition;
    case "GradientDown":
      return amount * (1 - axisPosition) * (1 - axisPosition);
  }
}

/**
 * Pedicel polyline from the branch base to the flower, arching sideways
 * and down.
 */
export function generatePedicelCurve(
  branch: BranchPoint,
  params: InflorescenceParams,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): THREE.Vector3[] {
  const tip = branch.position;
  const base = tip.clone().addScaledVector(branch.direction, -branch.length);
  const amount = effectiveCurveAmount(params, branch.axisPosition);

  const side = new THREE.Vector3().crossVectors(branch.direction, _up);
  if (side.length() > 0.1) {
    side.normalize();
  } else {
    side.set(1, 0, 0);
  }
  const arch = side.add(new THREE.Vector3(0, -0.5, 0)).normalize();

  return generateCurvedPoints(
    base,
    tip,
    amount,
    arch,
    amount >= MIN_CURVE_AMOUNT ? config.pedicelCurveSamples : 2,
  );
}

// ============================================================================
// MESH ASSEMBLY
// ============================================================================

/**
 * Inflorescence mesh: swept stems plus one flower per branch, each picked
 * from `aging` by its age.
 */
export function assembleInflorescence(
  params: InflorescenceParams,
  aging: FlowerAging,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG,
): Mesh {
  const layout = layoutInflorescence(params, config);
  const mesh = new Mesh();

  for (const stem of layout.stems) {
    mesh.merge(
      sweepAlongCurve(stem.points, {
        radius: stem.radius,
        segments: stem.kind === "axis" ? config.stemSegments : config.pedicelSegments,
        color: params.stemColor,
      }),
    );
  }

  for (const flower of layout.flowers) {
    const instance = selectAgingMesh(aging, flower.age).clone();
    instance.transform(flower.matrix);
    mesh.merge(instance);
  }

  return mesh;
}

// ============================================================================
// COUNTING
// ============================================================================

/**
 * Number of flowers `params` produces, without laying anything out.
 */
export function countFlowers(params: InflorescenceParams): number {
  switch (params.pattern) {
    case "Raceme":
    case "Spike":
    case "Umbel":
    case "Corymb":
      return params.branchCount;
    case "Dichasium":
      return 2 ** (params.recursionDepth + 1) - 1;
    case "Drepanium":
      return params.recursionDepth + 1;
    case "CompoundRaceme":
    case "CompoundUmbel":
      if (params.recursionDepth <= 1) return params.branchCount;
      return params.branchCount * countFlowers(subInstanceParams(params));
  }
}
