/**
 * Flower Engine
 *
 * Entry point for generation requests: validates the parameter document,
 * builds the flower (or inflorescence) and returns flat buffers. Either the
 * whole request succeeds or it throws; partial buffers are never returned.
 *
 * @module FlowerEngine
 */

import { validateMesh, type Color3, type Mesh, type MeshBuffers } from "../mesh/Mesh.js";
import { lerp } from "../math/Vector.js";
import { DEFAULT_SEPAL_PARAMS, type PetalParams } from "../components/types.js";
import { generateFlower, type FlowerParams } from "../diagram/FlowerAssembly.js";
import type { ComponentWhorl } from "../diagram/FloralDiagram.js";
import { assembleInflorescence, countFlowers } from "../inflorescence/InflorescenceAssembly.js";
import type { FlowerAging } from "../inflorescence/aging.js";
import { mergeEngineConfig, type EngineConfig } from "../config.js";
import { GenerationError } from "../errors.js";
import {
  GenerationRequestSchema,
  formatIssues,
  type GenerationRequest,
} from "./schema.js";

export interface GenerationStats {
  vertexCount: number;
  triangleCount: number;
  /** 1 for a single flower */
  flowerCount: number;
}

export interface GenerationResult {
  buffers: MeshBuffers;
  stats: GenerationStats;
}

// ============================================================================
// VARIANTS
// ============================================================================

/** Petal tilt added to close a bud */
const BUD_CLOSE_TILT = 0.6;
const WILT_COLOR: Color3 = [0.45, 0.35, 0.2];
const WILT_COLOR_MIX = 0.5;

/**
 * Closed bud: no stamens or pistils, petals shortened, narrowed and curled
 * shut, sepals shortened.
 */
export function budVariant(params: FlowerParams): FlowerParams {
  const closePetals = (whorl: ComponentWhorl): ComponentWhorl => ({
    ...whorl,
    tiltAngle: whorl.tiltAngle + BUD_CLOSE_TILT,
  });
  const shrink = (blade: PetalParams): PetalParams => ({
    ...blade,
    length: blade.length * 0.6,
    width: blade.width * 0.7,
  });

  return {
    ...params,
    diagram: {
      ...params.diagram,
      stamenWhorls: [],
      pistilWhorls: [],
      petalWhorls: params.diagram.petalWhorls.map(closePetals),
    },
    petal: {
      ...shrink(params.petal),
      curl: 1.0,
      twist: 0,
      ruffleAmp: 0,
      ruffleFreq: 0,
    },
    sepal: shrink(params.sepal ?? DEFAULT_SEPAL_PARAMS),
  };
}

/**
 * Wilted flower: petals curl backward and fade toward brown.
 */
export function wiltVariant(params: FlowerParams): FlowerParams {
  const [r, g, b] = params.petal.color;
  return {
    ...params,
    petal: {
      ...params.petal,
      curl: -0.6,
      color: [
        lerp(r, WILT_COLOR[0], WILT_COLOR_MIX),
        lerp(g, WILT_COLOR[1], WILT_COLOR_MIX),
        lerp(b, WILT_COLOR[2], WILT_COLOR_MIX),
      ],
    },
  };
}

// ============================================================================
// GENERATION
// ============================================================================

/**
 * Validate a request document, filling in defaults.
 */
export function parseRequest(request: unknown): GenerationRequest {
  const parsed = GenerationRequestSchema.safeParse(request);
  if (!parsed.success) {
    throw new GenerationError("Invalid generation request", formatIssues(parsed.error));
  }
  return parsed.data;
}

export function toFlowerParams(request: GenerationRequest): FlowerParams {
  return {
    diagram: request.diagram,
    receptacle: request.receptacle,
    pistil: request.pistil,
    stamen: request.stamen,
    petal: request.petal,
    sepal: request.sepal,
  };
}

function engineConfigFor(request: GenerationRequest): EngineConfig {
  return request.maxRecursionDepth === undefined
    ? mergeEngineConfig()
    : mergeEngineConfig({ maxRecursionDepth: request.maxRecursionDepth });
}

/**
 * Bud, bloom and optional wilt meshes for one flower.
 */
export function buildAgingMeshes(
  params: FlowerParams,
  options: { includeWilt: boolean },
): FlowerAging {
  return {
    bud: generateFlower(budVariant(params)),
    bloom: generateFlower(params),
    wilt: options.includeWilt ? generateFlower(wiltVariant(params)) : undefined,
  };
}

/**
 * Generate the mesh for a validated request.
 */
export function generateMesh(request: GenerationRequest): { mesh: Mesh; flowerCount: number } {
  const flower = toFlowerParams(request);
  const inflorescence = request.inflorescence;

  if (!inflorescence?.enabled) {
    return { mesh: generateFlower(flower), flowerCount: 1 };
  }

  let aging: FlowerAging;
  if (request.aging.enabled) {
    aging = buildAgingMeshes(flower, { includeWilt: request.aging.includeWilt });
  } else {
    const bloom = generateFlower(flower);
    aging = { bud: bloom, bloom };
  }

  return {
    mesh: assembleInflorescence(inflorescence, aging, engineConfigFor(request)),
    flowerCount: countFlowers(inflorescence),
  };
}

/**
 * Validate `request`, generate, and return flat buffers.
 *
 * @throws GenerationError when the document is malformed or the result fails
 * mesh validation
 * @throws RecursionDepthError when a recursive pattern exceeds the maximum depth
 */
export function generate(request: unknown): GenerationResult {
  const parsed = parseRequest(request);
  const { mesh, flowerCount } = generateMesh(parsed);

  const problems = validateMesh(mesh);
  if (problems.length > 0) {
    throw new GenerationError("Generated mesh failed validation", problems);
  }

  return {
    buffers: mesh.toBuffers(),
    stats: {
      vertexCount: mesh.vertexCount,
      triangleCount: mesh.triangleCount,
      flowerCount,
    },
  };
}
