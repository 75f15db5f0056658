/**
 * Tests for flower aging.
 */

import { describe, it, expect } from "vitest";
import * as THREE from "three";
import { Mesh } from "../../src/mesh/Mesh.js";
import {
  AGING_THRESHOLDS,
  agingStage,
  applyAgeDistribution,
  selectAgingMesh,
} from "../../src/inflorescence/aging.js";

function marker(x: number): Mesh {
  const mesh = new Mesh();
  mesh.addVertex(new THREE.Vector3(x, 0, 0), new THREE.Vector3(0, 1, 0), new THREE.Vector2(), [1, 1, 1]);
  return mesh;
}

describe("agingStage", () => {
  it("splits ages at the bud and wilt thresholds", () => {
    expect(agingStage(0)).toBe("bud");
    expect(agingStage(AGING_THRESHOLDS.bud - 0.01)).toBe("bud");
    expect(agingStage(AGING_THRESHOLDS.bud)).toBe("bloom");
    expect(agingStage(0.79)).toBe("bloom");
    expect(agingStage(AGING_THRESHOLDS.wilt)).toBe("wilt");
    expect(agingStage(1)).toBe("wilt");
  });
});

describe("selectAgingMesh", () => {
  const bud = marker(1);
  const bloom = marker(2);
  const wilt = marker(3);

  it("picks the mesh for the stage", () => {
    expect(selectAgingMesh({ bud, bloom, wilt }, 0.1)).toBe(bud);
    expect(selectAgingMesh({ bud, bloom, wilt }, 0.5)).toBe(bloom);
    expect(selectAgingMesh({ bud, bloom, wilt }, 0.9)).toBe(wilt);
  });

  it("falls back to bloom without a wilt mesh", () => {
    expect(selectAgingMesh({ bud, bloom }, 0.9)).toBe(bloom);
  });
});

describe("applyAgeDistribution", () => {
  it("leaves ages unchanged at 0.5", () => {
    expect(applyAgeDistribution(0.37, 0.5)).toBeCloseTo(0.37);
  });

  it("maps every age to 0 at 0 and to 1 at 1", () => {
    for (const age of [0, 0.2, 0.6, 1]) {
      expect(applyAgeDistribution(age, 0)).toBe(0);
      expect(applyAgeDistribution(age, 1)).toBeCloseTo(1, 12);
    }
  });

  it("interpolates linearly on either side of 0.5", () => {
    expect(applyAgeDistribution(0.4, 0.25)).toBeCloseTo(0.2);
    expect(applyAgeDistribution(0.4, 0.75)).toBeCloseTo(0.7);
  });

  it("is monotonic in both the age and the distribution", () => {
    const ages = [0, 0.25, 0.5, 0.75, 1];
    const distributions = [0, 0.2, 0.5, 0.8, 1];
    for (const d of distributions) {
      for (let i = 1; i < ages.length; i++) {
        expect(applyAgeDistribution(ages[i], d)).toBeGreaterThanOrEqual(
          applyAgeDistribution(ages[i - 1], d),
        );
      }
    }
    for (let i = 1; i < distributions.length; i++) {
      expect(applyAgeDistribution(0.4, distributions[i])).toBeGreaterThanOrEqual(
        applyAgeDistribution(0.4, distributions[i - 1]),
      );
    }
  });

  it("clamps out-of-range input", () => {
    expect(applyAgeDistribution(2, 0.5)).toBe(1);
    expect(applyAgeDistribution(-1, 0.5)).toBe(0);
    expect(applyAgeDistribution(0.5, 3)).toBe(1);
  });
});
