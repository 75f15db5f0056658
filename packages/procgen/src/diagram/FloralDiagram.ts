/**
 * Floral Diagram
 *
 * A flower's layout: rings (whorls) of identical organs, each described by
 * a count, a radius fraction, a height fraction on the receptacle and an
 * angular arrangement. The diagram carries no geometry; FlowerAssembly turns
 * it into placements and meshes.
 *
 * @module FloralDiagram
 */

import { evenlySpaced, goldenSpiral, customSpaced } from "../math/Phyllotaxis.js";

// ============================================================================
// TYPES
// ============================================================================

/**
 * How the organs of a whorl are spread around the axis.
 */
export type Arrangement =
  | { kind: "evenlySpaced" }
  | { kind: "goldenSpiral" }
  | { kind: "customOffset"; /** Radians between consecutive organs */ step: number };

export interface ComponentWhorl {
  /** Number of organs in the ring */
  count: number;
  /**
   * Fraction of the receptacle radius at the whorl's height.
   * Below 0.001 the organ sits on the central axis.
   */
  radius: number;
  /** Height fraction along the receptacle (0 = base, 1 = top) */
  height: number;
  arrangement: Arrangement;
  /** Angle of the first organ, radians */
  rotationOffset: number;
  /** Tilt away from the attachment direction, radians */
  tiltAngle: number;
}

export interface FloralDiagram {
  receptacleHeight: number;
  receptacleRadius: number;
  petalWhorls: ComponentWhorl[];
  stamenWhorls: ComponentWhorl[];
  pistilWhorls: ComponentWhorl[];
  sepalWhorls: ComponentWhorl[];
  /** Maximum radial offset per organ (fraction units) */
  positionJitter: number;
  /** Maximum angular offset per organ, degrees */
  angleJitter: number;
  /** Maximum relative scale change per organ */
  sizeJitter: number;
  jitterSeed: number;
}

export const DEFAULT_WHORL: ComponentWhorl = {
  count: 0,
  radius: 1.0,
  height: 0.5,
  arrangement: { kind: "evenlySpaced" },
  rotationOffset: 0,
  tiltAngle: 0,
};

// ============================================================================
// ANGLES
// ============================================================================

/**
 * Angular positions of every organ in a whorl.
 */
export function whorlAngles(whorl: ComponentWhorl): number[] {
  const { count, rotationOffset, arrangement } = whorl;
  switch (arrangement.kind) {
    case "evenlySpaced":
      return evenlySpaced(count, rotationOffset);
    case "goldenSpiral":
      return goldenSpiral(count, rotationOffset);
    case "customOffset":
      return customSpaced(count, arrangement.step, rotationOffset);
  }
}

/**
 * Build a whorl from a partial description.
 */
export function createWhorl(partial: Partial<ComponentWhorl> = {}): ComponentWhorl {
  return { ...DEFAULT_WHORL, ...partial };
}

function sumCounts(whorls: readonly ComponentWhorl[]): number {
  return whorls.reduce((total, whorl) => total + whorl.count, 0);
}

export function totalPetalCount(diagram: FloralDiagram): number {
  return sumCounts(diagram.petalWhorls);
}

export function totalStamenCount(diagram: FloralDiagram): number {
  return sumCounts(diagram.stamenWhorls);
}

export function totalPistilCount(diagram: FloralDiagram): number {
  return sumCounts(diagram.pistilWhorls);
}

export function totalSepalCount(diagram: FloralDiagram): number {
  return sumCounts(diagram.sepalWhorls);
}

// ============================================================================
// PRESETS
// ============================================================================

const NO_JITTER = {
  positionJitter: 0,
  angleJitter: 0,
  sizeJitter: 0,
  jitterSeed: 0,
};

const GOLDEN: Arrangement = { kind: "goldenSpiral" };

export const DIAGRAM_PRESETS = {
  /** Six tepals around six alternating stamens and a central pistil */
  lily: {
    receptacleHeight: 1.0,
    receptacleRadius: 0.3,
    petalWhorls: [createWhorl({ count: 6, radius: 1.0, height: 0.8 })],
    stamenWhorls: [
      createWhorl({ count: 6, radius: 0.6, height: 0.6, rotationOffset: Math.PI / 6 }),
    ],
    pistilWhorls: [createWhorl({ count: 1, radius: 0, height: 0.5 })],
    sepalWhorls: [],
    ...NO_JITTER,
  },
  /** Rose-like: five petals, two stamen rings */
  fivePetal: {
    receptacleHeight: 0.8,
    receptacleRadius: 0.4,
    petalWhorls: [createWhorl({ count: 5, radius: 1.2, height: 0.6 })],
    stamenWhorls: [
      createWhorl({ count: 5, radius: 0.7, height: 0.5 }),
      createWhorl({ count: 5, radius: 0.5, height: 0.4, rotationOffset: Math.PI / 5 }),
    ],
    pistilWhorls: [createWhorl({ count: 1, radius: 0, height: 0.3 })],
    sepalWhorls: [],
    ...NO_JITTER,
  },
  /** Composite head packed on golden-angle spirals */
  daisy: {
    receptacleHeight: 0.5,
    receptacleRadius: 0.8,
    petalWhorls: [createWhorl({ count: 21, radius: 1.5, height: 0.4, arrangement: GOLDEN })],
    stamenWhorls: [
      createWhorl({
        count: 34,
        radius: 0.7,
        height: 0.3,
        arrangement: GOLDEN,
        rotationOffset: 0.5,
      }),
    ],
    pistilWhorls: [
      createWhorl({
        count: 13,
        radius: 0.4,
        height: 0.2,
        arrangement: GOLDEN,
        rotationOffset: 1.0,
      }),
    ],
    sepalWhorls: [],
    ...NO_JITTER,
  },
  /** Cross-shaped, four petals at 45° */
  fourPetal: {
    receptacleHeight: 0.6,
    receptacleRadius: 0.3,
    petalWhorls: [
      createWhorl({ count: 4, radius: 1.0, height: 0.5, rotationOffset: Math.PI / 4 }),
    ],
    stamenWhorls: [createWhorl({ count: 4, radius: 0.5, height: 0.4 })],
    pistilWhorls: [createWhorl({ count: 1, radius: 0, height: 0.3 })],
    sepalWhorls: [],
    ...NO_JITTER,
  },
} satisfies Record<string, FloralDiagram>;

export type DiagramPresetName = keyof typeof DIAGRAM_PRESETS;

export const DEFAULT_DIAGRAM: FloralDiagram = DIAGRAM_PRESETS.lily;

export function mergeDiagram(partial: Partial<FloralDiagram> = {}): FloralDiagram {
  return { ...DEFAULT_DIAGRAM, ...partial };
}
