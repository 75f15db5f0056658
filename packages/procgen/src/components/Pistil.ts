/**
 * Pistil Generator
 *
 * A style (tapered tube) topped by a spherical stigma. Straight styles are
 * revolved; bent styles are swept along a Catmull-Rom curve so the stigma
 * follows the curve's tip.
 */

import * as THREE from "three";
import type { Mesh } from "../mesh/Mesh.js";
import { lerp } from "../math/Vector.js";
import { surfaceOfRevolution, createUvSphere } from "../geometry/Revolution.js";
import { sweepAlongCurve } from "../geometry/Sweep.js";
import { resolveOrganCurve } from "./BendCurve.js";
import { assertCount, assertPositive, type PistilParams } from "./types.js";

const STIGMA_RINGS = 6;

export function generatePistil(params: PistilParams): Mesh {
  assertPositive("Pistil length", params.length);
  assertCount("Pistil segments", params.segments, 3);

  const curve = resolveOrganCurve(
    params.length,
    params.bend,
    params.droop,
    params.styleCurve,
  );

  let style: Mesh;
  let tip: THREE.Vector3;
  if (curve === null) {
    style = surfaceOfRevolution(
      [
        new THREE.Vector2(params.baseRadius, 0),
        new THREE.Vector2(params.tipRadius, params.length),
      ],
      params.segments,
      params.color,
    );
    tip = new THREE.Vector3(0, params.length, 0);
  } else {
    style = sweepAlongCurve(curve, {
      radius: (t) => lerp(params.baseRadius, params.tipRadius, t),
      segments: params.segments,
      color: params.color,
    });
    tip = curve[curve.length - 1].clone();
  }

  if (params.stigmaRadius > 0) {
    const stigma = createUvSphere(
      params.stigmaRadius,
      STIGMA_RINGS,
      params.segments,
      params.color,
    );
    stigma.transform(new THREE.Matrix4().makeTranslation(tip.x, tip.y, tip.z));
    style.merge(stigma);
  }

  return style;
}
