/**
 * Component Placement
 *
 * Expands a floral diagram into one placement per organ. Jitter is drawn
 * from a generator keyed by (seed, organ type, index within type), so the
 * same diagram always yields the same placements and changing one whorl
 * leaves the other organ types untouched.
 */

import { hashSeed, keyedRandom } from "../math/Random.js";
import { degToRad } from "../math/Vector.js";
import { whorlAngles, type ComponentWhorl, type FloralDiagram } from "./FloralDiagram.js";

export type ComponentType = "receptacle" | "pistil" | "stamen" | "petal" | "sepal";

export interface ComponentPlacement {
  type: ComponentType;
  /** Radius fraction after jitter */
  radius: number;
  /** Azimuth in radians after jitter */
  angle: number;
  /** Height fraction on the receptacle */
  height: number;
  /** Uniform scale after jitter */
  scale: number;
  tiltAngle: number;
}

/** Smallest scale jitter may produce */
const MIN_JITTER_SCALE = 0.1;

const TYPE_SALTS = {
  pistil: hashSeed("pistil"),
  stamen: hashSeed("stamen"),
  petal: hashSeed("petal"),
  sepal: hashSeed("sepal"),
};

type PlacedType = keyof typeof TYPE_SALTS;

export function hasJitter(diagram: FloralDiagram): boolean {
  return diagram.positionJitter > 0 || diagram.angleJitter > 0 || diagram.sizeJitter > 0;
}

/**
 * Placements for every organ, ordered pistils, stamens, petals, sepals.
 */
export function generatePlacements(diagram: FloralDiagram): ComponentPlacement[] {
  const placements: ComponentPlacement[] = [];
  const jitter = hasJitter(diagram);

  const groups: [PlacedType, ComponentWhorl[]][] = [
    ["pistil", diagram.pistilWhorls],
    ["stamen", diagram.stamenWhorls],
    ["petal", diagram.petalWhorls],
    ["sepal", diagram.sepalWhorls],
  ];

  for (const [type, whorls] of groups) {
    let index = 0;
    for (const whorl of whorls) {
      for (const angle of whorlAngles(whorl)) {
        const placement: ComponentPlacement = {
          type,
          radius: whorl.radius,
          angle,
          height: whorl.height,
          scale: 1,
          tiltAngle: whorl.tiltAngle,
        };
        if (jitter) applyJitter(placement, diagram, TYPE_SALTS[type], index);
        placements.push(placement);
        index++;
      }
    }
  }

  return placements;
}

function applyJitter(
  placement: ComponentPlacement,
  diagram: FloralDiagram,
  salt: number,
  index: number,
): void {
  const rng = keyedRandom(diagram.jitterSeed, salt, index);
  // Fixed draw order: radius, angle, scale
  const radiusOffset = rng.signed() * diagram.positionJitter;
  const angleOffset = rng.signed() * degToRad(diagram.angleJitter);
  const scaleOffset = rng.signed() * diagram.sizeJitter;

  placement.radius = Math.max(0, placement.radius + radiusOffset);
  placement.angle += angleOffset;
  placement.scale = Math.max(MIN_JITTER_SCALE, 1 + scaleOffset);
}
