/**
 * Flower Aging
 *
 * Each flower of an inflorescence picks a bud, bloom or wilt mesh from its
 * age. The age distribution rescales every age before selection.
 */

import type { Mesh } from "../mesh/Mesh.js";
import { clamp } from "../math/Vector.js";

export interface FlowerAging {
  bud: Mesh;
  bloom: Mesh;
  /** Used at the oldest ages; bloom stands in when absent */
  wilt?: Mesh;
}

export type AgingStage = "bud" | "bloom" | "wilt";

/** bud < `bud` ≤ bloom < `wilt` ≤ wilt */
export const AGING_THRESHOLDS = {
  bud: 0.3,
  wilt: 0.8,
} as const;

export function agingStage(age: number): AgingStage {
  if (age < AGING_THRESHOLDS.bud) return "bud";
  if (age < AGING_THRESHOLDS.wilt) return "bloom";
  return "wilt";
}

export function selectAgingMesh(aging: FlowerAging, age: number): Mesh {
  switch (agingStage(age)) {
    case "bud":
      return aging.bud;
    case "bloom":
      return aging.bloom;
    case "wilt":
      return aging.wilt ?? aging.bloom;
  }
}

/**
 * Rescale an age by the distribution control: 0 maps every age to 0,
 * 0.5 leaves it unchanged, 1 maps every age to 1, linear in between.
 */
export function applyAgeDistribution(age: number, distribution: number): number {
  const a = clamp(age, 0, 1);
  const d = clamp(distribution, 0, 1);
  if (d <= 0.5) {
    return a * (d / 0.5);
  }
  return a + (1 - a) * ((d - 0.5) / 0.5);
}
