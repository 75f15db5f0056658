/**
 * Floral diagrams and flower assembly.
 */

export {
  DEFAULT_WHORL,
  DEFAULT_DIAGRAM,
  DIAGRAM_PRESETS,
  createWhorl,
  mergeDiagram,
  whorlAngles,
  totalPetalCount,
  totalStamenCount,
  totalPistilCount,
  totalSepalCount,
  type Arrangement,
  type ComponentWhorl,
  type FloralDiagram,
  type DiagramPresetName,
} from "./FloralDiagram.js";
export {
  generatePlacements,
  hasJitter,
  type ComponentType,
  type ComponentPlacement,
} from "./Placement.js";
export {
  ReceptacleMapper,
  transformToMatrix,
  AXIS_RADIUS_EPSILON,
  type Transform3D,
} from "./ReceptacleMapper.js";
export {
  generateFlower,
  effectiveReceptacle,
  FLOWER_PRESETS,
  type FlowerParams,
} from "./FlowerAssembly.js";
