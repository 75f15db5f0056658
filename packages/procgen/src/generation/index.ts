/**
 * Generation boundary: request validation, engine entry, presets and the
 * request manager.
 */

export {
  generate,
  generateMesh,
  parseRequest,
  toFlowerParams,
  buildAgingMeshes,
  budVariant,
  wiltVariant,
  type GenerationResult,
  type GenerationStats,
} from "./FlowerEngine.js";
export {
  GenerationRequestSchema,
  DiagramSchema,
  WhorlSchema,
  ArrangementSchema,
  ReceptacleSchema,
  PistilSchema,
  StamenSchema,
  PetalSchema,
  SepalSchema,
  InflorescenceSchema,
  AxisProfileSchema,
  AgingSchema,
  PatternSchema,
  ColorSchema,
  Vec3Schema,
  formatIssues,
  type GenerationRequest,
  type GenerationRequestInput,
  type InflorescenceRequest,
} from "./schema.js";
export { listPresets, getPreset, type Preset, type PresetSummary } from "./presets.js";
export { GenerationManager, type GenerateFn } from "./GenerationManager.js";
