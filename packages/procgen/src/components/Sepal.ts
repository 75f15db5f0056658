/**
 * Sepal Generator
 *
 * Sepals use the petal blade model with their own defaults (green, slightly
 * recurved).
 */

import type { Mesh } from "../mesh/Mesh.js";
import { generatePetal } from "./Petal.js";
import { mergeSepalParams, type PetalParams } from "./types.js";

export function generateSepal(params: Partial<PetalParams> = {}): Mesh {
  return generatePetal(mergeSepalParams(params));
}
