/**
 * Tests for floral diagrams and organ placement.
 */

import { describe, it, expect } from "vitest";
import {
  DIAGRAM_PRESETS,
  createWhorl,
  mergeDiagram,
  totalPetalCount,
  totalPistilCount,
  totalSepalCount,
  totalStamenCount,
  whorlAngles,
} from "../../src/diagram/FloralDiagram.js";
import { generatePlacements, hasJitter } from "../../src/diagram/Placement.js";
import { GOLDEN_ANGLE } from "../../src/math/Phyllotaxis.js";

describe("FloralDiagram", () => {
  it("counts the organs of each type across whorls", () => {
    const diagram = DIAGRAM_PRESETS.fivePetal;
    expect(totalPetalCount(diagram)).toBe(5);
    expect(totalStamenCount(diagram)).toBe(10);
    expect(totalPistilCount(diagram)).toBe(1);
    expect(totalSepalCount(diagram)).toBe(0);
  });

  describe("whorlAngles", () => {
    it("spaces evenly from the rotation offset", () => {
      const angles = whorlAngles(createWhorl({ count: 4, rotationOffset: 0.1 }));
      expect(angles[0]).toBeCloseTo(0.1);
      expect(angles[2]).toBeCloseTo(0.1 + Math.PI);
    });

    it("follows the golden angle", () => {
      const angles = whorlAngles(createWhorl({ count: 3, arrangement: { kind: "goldenSpiral" } }));
      expect(angles[2]).toBeCloseTo(2 * GOLDEN_ANGLE);
    });

    it("uses a custom step", () => {
      const angles = whorlAngles(
        createWhorl({ count: 3, arrangement: { kind: "customOffset", step: 0.25 } }),
      );
      expect(angles).toEqual([0, 0.25, 0.5]);
    });
  });

  it("fills whorl defaults", () => {
    const whorl = createWhorl({ count: 3 });
    expect(whorl).toEqual({
      count: 3,
      radius: 1,
      height: 0.5,
      arrangement: { kind: "evenlySpaced" },
      rotationOffset: 0,
      tiltAngle: 0,
    });
  });
});

describe("generatePlacements", () => {
  it("places every organ of the lily in pistil, stamen, petal order", () => {
    const placements = generatePlacements(DIAGRAM_PRESETS.lily);
    expect(placements).toHaveLength(13);
    expect(placements.map((p) => p.type)).toEqual([
      "pistil",
      ...Array<string>(6).fill("stamen"),
      ...Array<string>(6).fill("petal"),
    ]);
  });

  it("copies whorl geometry when there is no jitter", () => {
    const placements = generatePlacements(DIAGRAM_PRESETS.lily);
    const stamen = placements[1];
    expect(stamen.radius).toBe(0.6);
    expect(stamen.height).toBe(0.6);
    expect(stamen.angle).toBeCloseTo(Math.PI / 6);
    expect(stamen.scale).toBe(1);
  });

  it("orders sepals last", () => {
    const diagram = mergeDiagram({
      ...DIAGRAM_PRESETS.fourPetal,
      sepalWhorls: [createWhorl({ count: 4, height: 0.2 })],
    });
    const placements = generatePlacements(diagram);
    expect(placements.slice(-4).every((p) => p.type === "sepal")).toBe(true);
  });

  describe("jitter", () => {
    const jittered = mergeDiagram({
      ...DIAGRAM_PRESETS.lily,
      positionJitter: 0.1,
      angleJitter: 10,
      sizeJitter: 0.2,
      jitterSeed: 42,
    });

    it("is detected from any non-zero amount", () => {
      expect(hasJitter(DIAGRAM_PRESETS.lily)).toBe(false);
      expect(hasJitter(jittered)).toBe(true);
    });

    it("is reproducible for the same seed", () => {
      expect(generatePlacements(jittered)).toEqual(generatePlacements(jittered));
    });

    it("changes with the seed", () => {
      const other = generatePlacements({ ...jittered, jitterSeed: 43 });
      expect(other).not.toEqual(generatePlacements(jittered));
    });

    it("stays inside the configured bounds", () => {
      const base = generatePlacements(DIAGRAM_PRESETS.lily);
      const placements = generatePlacements(jittered);
      placements.forEach((placement, i) => {
        expect(Math.abs(placement.radius - base[i].radius)).toBeLessThanOrEqual(0.1);
        expect(Math.abs(placement.angle - base[i].angle)).toBeLessThanOrEqual(
          (10 * Math.PI) / 180,
        );
        expect(placement.scale).toBeGreaterThanOrEqual(0.8);
        expect(placement.scale).toBeLessThanOrEqual(1.2);
        expect(placement.radius).toBeGreaterThanOrEqual(0);
      });
    });

    it("leaves other organ types untouched when one whorl changes", () => {
      const before = generatePlacements(jittered).filter((p) => p.type === "stamen");
      const changed = generatePlacements({
        ...jittered,
        petalWhorls: [createWhorl({ count: 9, radius: 1.0, height: 0.8 })],
      }).filter((p) => p.type === "stamen");
      expect(changed).toEqual(before);
    });

    it("never shrinks an organ below a tenth of its size", () => {
      const placements = generatePlacements({ ...jittered, sizeJitter: 5 });
      for (const placement of placements) {
        expect(placement.scale).toBeGreaterThanOrEqual(0.1);
      }
    });
  });
});
