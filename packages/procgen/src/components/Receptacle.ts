/**
 * Receptacle Generator
 *
 * The receptacle is the base every other organ attaches to: a cubic Bezier
 * profile revolved about Y.
 */

import * as THREE from "three";
import type { Mesh } from "../mesh/Mesh.js";
import { sampleCubicBezier2D } from "../math/Bezier.js";
import { surfaceOfRevolution } from "../geometry/Revolution.js";
import { assertCount, assertPositive, type ReceptacleParams } from "./types.js";

/**
 * Control points of the receptacle profile (x = radius, y = height).
 */
export function receptacleControlPoints(
  params: ReceptacleParams,
): [THREE.Vector2, THREE.Vector2, THREE.Vector2, THREE.Vector2] {
  const { height, baseRadius, bulgeRadius, topRadius, bulgePosition } = params;
  return [
    new THREE.Vector2(baseRadius, 0),
    new THREE.Vector2(baseRadius + (bulgeRadius - baseRadius) * 0.3, height * 0.2),
    new THREE.Vector2(bulgeRadius, height * bulgePosition),
    new THREE.Vector2(topRadius, height),
  ];
}

export function generateReceptacle(params: ReceptacleParams): Mesh {
  assertPositive("Receptacle height", params.height);
  assertCount("Receptacle segments", params.segments, 3);
  assertCount("Receptacle profile samples", params.profileSamples, 2);

  const [p0, p1, p2, p3] = receptacleControlPoints(params);
  const profile = sampleCubicBezier2D(p0, p1, p2, p3, params.profileSamples).map(
    (p) => new THREE.Vector2(Math.max(0, p.x), p.y),
  );
  return surfaceOfRevolution(profile, params.segments, params.color);
}
