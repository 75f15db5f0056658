/**
 * Receptacle Mapper
 *
 * Maps a placement (radius fraction, angle, height fraction) onto the
 * receptacle's revolved Bezier profile and returns the organ's transform.
 *
 * Organ templates are modeled upright along +Y with the attachment at the
 * origin. Stamens and pistils keep +Y roughly vertical, leaning outward by
 * the tilt angle. Petals and sepals point +Y along the outward profile
 * normal with their face (+Z) toward the binormal, then lift by the tilt.
 */

import * as THREE from "three";
import { cubicBezier2D, cubicBezierDerivative2D } from "../math/Bezier.js";
import { clamp } from "../math/Vector.js";
import { receptacleControlPoints } from "../components/Receptacle.js";
import type { ReceptacleParams } from "../components/types.js";
import type { ComponentPlacement } from "./Placement.js";

/** Placements with a smaller radius fraction sit on the central axis */
export const AXIS_RADIUS_EPSILON = 0.001;

export interface Transform3D {
  position: THREE.Vector3;
  rotation: THREE.Quaternion;
  scale: THREE.Vector3;
}

export function transformToMatrix(transform: Transform3D): THREE.Matrix4 {
  return new THREE.Matrix4().compose(transform.position, transform.rotation, transform.scale);
}

const _up = new THREE.Vector3(0, 1, 0);
const _basis = new THREE.Matrix4();
const _tilt = new THREE.Quaternion();

export class ReceptacleMapper {
  private readonly controlPoints: [THREE.Vector2, THREE.Vector2, THREE.Vector2, THREE.Vector2];

  constructor(params: ReceptacleParams) {
    this.controlPoints = receptacleControlPoints(params);
  }

  /**
   * Profile point (x = radius, y = height) at a height fraction.
   */
  profileAt(heightFraction: number): THREE.Vector2 {
    const [p0, p1, p2, p3] = this.controlPoints;
    return cubicBezier2D(p0, p1, p2, p3, clamp(heightFraction, 0, 1));
  }

  radiusAt(heightFraction: number): number {
    return this.profileAt(heightFraction).x;
  }

  /**
   * Profile tangent (d radius, d height) at a height fraction, unnormalized.
   */
  tangentAt(heightFraction: number): THREE.Vector2 {
    const [p0, p1, p2, p3] = this.controlPoints;
    return cubicBezierDerivative2D(p0, p1, p2, p3, clamp(heightFraction, 0, 1));
  }

  /**
   * Outward unit normal of the profile in the (radius, height) plane.
   */
  profileNormalAt(heightFraction: number): THREE.Vector2 {
    const d = this.tangentAt(heightFraction);
    const normal = new THREE.Vector2(d.y, -d.x);
    if (normal.lengthSq() < 1e-12) return new THREE.Vector2(1, 0);
    return normal.normalize();
  }

  mapToSurface(placement: ComponentPlacement): Transform3D {
    const profile = this.profileAt(placement.height);
    const scale = new THREE.Vector3().setScalar(placement.scale);

    if (placement.type === "pistil" && placement.radius < AXIS_RADIUS_EPSILON) {
      return {
        position: new THREE.Vector3(0, profile.y, 0),
        rotation: new THREE.Quaternion(),
        scale,
      };
    }

    const { angle } = placement;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const r = placement.radius * profile.x;
    const position = new THREE.Vector3(r * cos, profile.y, r * sin);
    const azimuthal = new THREE.Vector3(-sin, 0, cos);

    if (placement.type === "stamen" || placement.type === "pistil") {
      return {
        position,
        rotation: this.uprightRotation(azimuthal, placement.tiltAngle),
        scale,
      };
    }

    return {
      position,
      rotation: this.bladeRotation(placement.height, azimuthal, cos, sin, placement.tiltAngle),
      scale,
    };
  }

  /**
   * +Y leaning outward by `tilt` about the azimuthal tangent.
   */
  private uprightRotation(azimuthal: THREE.Vector3, tilt: number): THREE.Quaternion {
    _tilt.setFromAxisAngle(azimuthal, -tilt);
    const localY = _up.clone().applyQuaternion(_tilt);
    const localX = azimuthal.clone();
    const localZ = new THREE.Vector3().crossVectors(localX, localY).normalize();
    localY.crossVectors(localZ, localX).normalize();

    _basis.makeBasis(localX, localY, localZ);
    return new THREE.Quaternion().setFromRotationMatrix(_basis);
  }

  /**
   * +Y along the outward profile normal, +Z toward the binormal, then
   * lifted by `tilt` about the azimuthal tangent.
   */
  private bladeRotation(
    heightFraction: number,
    azimuthal: THREE.Vector3,
    cos: number,
    sin: number,
    tilt: number,
  ): THREE.Quaternion {
    const n = this.profileNormalAt(heightFraction);
    const normal = new THREE.Vector3(n.x * cos, n.y, n.x * sin).normalize();
    const binormal = new THREE.Vector3().crossVectors(azimuthal, normal).normalize();
    const tangent = new THREE.Vector3().crossVectors(normal, binormal).normalize();

    _basis.makeBasis(tangent, normal, binormal);
    const rotation = new THREE.Quaternion().setFromRotationMatrix(_basis);
    if (tilt !== 0) {
      rotation.premultiply(_tilt.setFromAxisAngle(azimuthal, tilt));
    }
    return rotation;
  }
}
