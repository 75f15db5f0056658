/**
 * Engine Configuration
 *
 * Limits and tessellation settings shared by the inflorescence engine and
 * the generation entry point. Requests override individual fields.
 */

export interface EngineConfig {
  /** Deepest recursion a recursive pattern may request */
  maxRecursionDepth: number;
  /** Radius of the main axis stem */
  stemRadius: number;
  /** Pedicel radius as a fraction of the stem radius */
  pedicelRadiusFactor: number;
  /** Vertices per axis stem ring */
  stemSegments: number;
  /** Vertices per pedicel ring */
  pedicelSegments: number;
  /** Points along a curved axis */
  axisCurveSamples: number;
  /** Points along a curved pedicel */
  pedicelCurveSamples: number;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  maxRecursionDepth: 4,
  stemRadius: 0.05,
  pedicelRadiusFactor: 0.6,
  stemSegments: 8,
  pedicelSegments: 6,
  axisCurveSamples: 8,
  pedicelCurveSamples: 6,
};

export function mergeEngineConfig(partial: Partial<EngineConfig> = {}): EngineConfig {
  return { ...DEFAULT_ENGINE_CONFIG, ...partial };
}
