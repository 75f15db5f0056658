/**
 * Flower organ generators.
 */

export type {
  Vec3Tuple,
  ReceptacleParams,
  PistilParams,
  StamenParams,
  PetalParams,
} from "./types.js";
export {
  DEFAULT_RECEPTACLE_PARAMS,
  DEFAULT_PISTIL_PARAMS,
  DEFAULT_STAMEN_PARAMS,
  DEFAULT_PETAL_PARAMS,
  DEFAULT_SEPAL_PARAMS,
  RECEPTACLE_PRESETS,
  PISTIL_PRESETS,
  STAMEN_PRESETS,
  PETAL_PRESETS,
  SEPAL_PRESETS,
  SEPAL_GREEN,
  mergeReceptacleParams,
  mergePistilParams,
  mergeStamenParams,
  mergePetalParams,
  mergeSepalParams,
} from "./types.js";
export { generateReceptacle, receptacleControlPoints } from "./Receptacle.js";
export { generatePistil } from "./Pistil.js";
export { generateStamen } from "./Stamen.js";
export {
  generatePetal,
  createPetalSurface,
  petalControlGrid,
  petalWidthAt,
} from "./Petal.js";
export { generateSepal } from "./Sepal.js";
export {
  generateBendCurve,
  resolveOrganCurve,
  tuplesToVectors,
  BEND_SAMPLES_PER_SEGMENT,
} from "./BendCurve.js";
