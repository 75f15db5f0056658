/**
 * Flower Assembly
 *
 * Builds a complete flower mesh from a floral diagram and per-organ shape
 * parameters. Each organ type is generated once as a template, then cloned,
 * transformed and merged at every placement.
 *
 * @module FlowerAssembly
 */

import { Mesh } from "../mesh/Mesh.js";
import { generateReceptacle } from "../components/Receptacle.js";
import { generatePistil } from "../components/Pistil.js";
import { generateStamen } from "../components/Stamen.js";
import { generatePetal } from "../components/Petal.js";
import {
  DEFAULT_PETAL_PARAMS,
  DEFAULT_PISTIL_PARAMS,
  DEFAULT_RECEPTACLE_PARAMS,
  DEFAULT_SEPAL_PARAMS,
  DEFAULT_STAMEN_PARAMS,
  PETAL_PRESETS,
  PISTIL_PRESETS,
  RECEPTACLE_PRESETS,
  STAMEN_PRESETS,
  type PetalParams,
  type PistilParams,
  type ReceptacleParams,
  type StamenParams,
} from "../components/types.js";
import { DIAGRAM_PRESETS, type FloralDiagram } from "./FloralDiagram.js";
import { generatePlacements, type ComponentType } from "./Placement.js";
import { ReceptacleMapper, transformToMatrix } from "./ReceptacleMapper.js";

// ============================================================================
// PARAMETERS
// ============================================================================

export interface FlowerParams {
  diagram: FloralDiagram;
  receptacle: ReceptacleParams;
  pistil: PistilParams;
  stamen: StamenParams;
  petal: PetalParams;
  /** Sepal blade; sepal defaults when omitted */
  sepal?: PetalParams;
}

export const FLOWER_PRESETS = {
  lily: {
    diagram: DIAGRAM_PRESETS.lily,
    receptacle: DEFAULT_RECEPTACLE_PARAMS,
    pistil: DEFAULT_PISTIL_PARAMS,
    stamen: DEFAULT_STAMEN_PARAMS,
    petal: {
      ...DEFAULT_PETAL_PARAMS,
      length: 3.0,
      width: 1.2,
      tipSharpness: 0.4,
      baseWidth: 0.4,
      curl: 0.4,
      twist: 15,
      resolution: 20,
    },
  },
  fivePetal: {
    diagram: DIAGRAM_PRESETS.fivePetal,
    receptacle: DEFAULT_RECEPTACLE_PARAMS,
    pistil: DEFAULT_PISTIL_PARAMS,
    stamen: STAMEN_PRESETS.slender,
    petal: {
      ...DEFAULT_PETAL_PARAMS,
      length: 2.5,
      width: 2.0,
      tipSharpness: 0.2,
      baseWidth: 0.8,
      curl: 0.2,
      twist: 5,
      ruffleFreq: 3,
      ruffleAmp: 0.15,
      resolution: 24,
    },
  },
  daisy: {
    diagram: DIAGRAM_PRESETS.daisy,
    receptacle: RECEPTACLE_PRESETS.flat,
    pistil: PISTIL_PRESETS.short,
    stamen: STAMEN_PRESETS.short,
    petal: PETAL_PRESETS.narrow,
  },
} satisfies Record<string, FlowerParams>;

/**
 * Receptacle shape with the diagram's dimensions applied, so organ layout
 * and receptacle geometry share one profile.
 */
export function effectiveReceptacle(params: FlowerParams): ReceptacleParams {
  return {
    ...params.receptacle,
    height: params.diagram.receptacleHeight,
    baseRadius: params.diagram.receptacleRadius,
  };
}

// ============================================================================
// ASSEMBLY
// ============================================================================

export function generateFlower(params: FlowerParams): Mesh {
  const receptacle = effectiveReceptacle(params);
  const flower = new Mesh();
  flower.merge(generateReceptacle(receptacle));

  const mapper = new ReceptacleMapper(receptacle);
  const placements = generatePlacements(params.diagram);

  // Templates are built on first use only
  const templates = new Map<ComponentType, Mesh>();
  const templateFor = (type: ComponentType): Mesh | null => {
    const cached = templates.get(type);
    if (cached) return cached;
    const built = buildTemplate(type, params);
    if (built) templates.set(type, built);
    return built;
  };

  for (const placement of placements) {
    const template = templateFor(placement.type);
    if (!template) continue;

    const instance = template.clone();
    instance.transform(transformToMatrix(mapper.mapToSurface(placement)));
    flower.merge(instance);
  }

  return flower;
}

function buildTemplate(type: ComponentType, params: FlowerParams): Mesh | null {
  switch (type) {
    case "receptacle":
      return null;
    case "pistil":
      return generatePistil(params.pistil);
    case "stamen":
      return generateStamen(params.stamen);
    case "petal":
      return generatePetal(params.petal);
    case "sepal":
      return generatePetal(params.sepal ?? DEFAULT_SEPAL_PARAMS);
  }
}
