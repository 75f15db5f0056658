/**
 * Stamen Generator
 *
 * A thin filament carrying an ellipsoidal anther. The anther sits on the
 * filament tip, aligned with the filament's end direction.
 */

import * as THREE from "three";
import type { Mesh } from "../mesh/Mesh.js";
import { createCylinder, createUvSphere } from "../geometry/Revolution.js";
import { sweepAlongCurve } from "../geometry/Sweep.js";
import { resolveOrganCurve } from "./BendCurve.js";
import { assertCount, assertPositive, type StamenParams } from "./types.js";

const ANTHER_RINGS = 6;
const _up = new THREE.Vector3(0, 1, 0);

export function generateStamen(params: StamenParams): Mesh {
  assertPositive("Filament length", params.filamentLength);
  assertCount("Stamen segments", params.segments, 3);

  const curve = resolveOrganCurve(
    params.filamentLength,
    params.bend,
    params.droop,
    params.filamentCurve,
  );

  let filament: Mesh;
  let tip: THREE.Vector3;
  let direction: THREE.Vector3;
  if (curve === null) {
    filament = createCylinder(
      params.filamentRadius,
      params.filamentLength,
      params.segments,
      params.color,
    );
    tip = new THREE.Vector3(0, params.filamentLength, 0);
    direction = _up.clone();
  } else {
    filament = sweepAlongCurve(curve, {
      radius: params.filamentRadius,
      segments: params.segments,
      color: params.color,
    });
    tip = curve[curve.length - 1].clone();
    direction = tip.clone().sub(curve[curve.length - 2]);
    if (direction.lengthSq() < 1e-12) direction.copy(_up);
    direction.normalize();
  }

  const { antherLength, antherWidth, antherHeight } = params;
  if (antherLength > 0 && antherWidth > 0 && antherHeight > 0) {
    // Unit-diameter sphere scaled to the anther's full extents
    const anther = createUvSphere(0.5, ANTHER_RINGS, params.segments, params.color);
    const rotation = new THREE.Quaternion().setFromUnitVectors(_up, direction);
    const center = tip.clone().addScaledVector(direction, antherLength * 0.5);
    anther.transform(
      new THREE.Matrix4().compose(
        center,
        rotation,
        new THREE.Vector3(antherWidth, antherLength, antherHeight),
      ),
    );
    filament.merge(anther);
  }

  return filament;
}
