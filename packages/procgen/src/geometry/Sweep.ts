/**
 * Sweep Along Curve
 *
 * Tubes for stems, pedicels, filaments and styles: a circular cross-section
 * swept along a 3D polyline. Frames are carried from one sample to the next
 * by parallel transport (the minimal rotation between consecutive tangents),
 * so the tube never twists or shears at its seam.
 */

import * as THREE from "three";
import { Mesh, type Color3 } from "../mesh/Mesh.js";
import { TAU, anyPerpendicular } from "../math/Vector.js";

/**
 * Radius along the curve, t = normalized arc length in [0, 1].
 */
export type RadiusFunction = (t: number) => number;

export interface SweepOptions {
  /** Constant radius or radius as a function of arc length */
  radius: number | RadiusFunction;
  /** Vertices per cross-section ring (≥ 3) */
  segments: number;
  color: Color3;
  /** Close the start with a fan facing backwards */
  capStart?: boolean;
  /** Close the end with a fan facing forwards */
  capEnd?: boolean;
}

/**
 * Parallel-transport frame at a curve sample.
 */
export interface CurveFrame {
  position: THREE.Vector3;
  tangent: THREE.Vector3;
  normal: THREE.Vector3;
  binormal: THREE.Vector3;
  /** Normalized arc length */
  t: number;
}

const DUPLICATE_DISTANCE = 1e-9;

/**
 * Compute rotation-minimizing frames for a polyline. Consecutive duplicate
 * points are dropped first; returns fewer than 2 frames when the curve
 * collapses to a point.
 */
export function computeTransportFrames(curve: readonly THREE.Vector3[]): CurveFrame[] {
  const points: THREE.Vector3[] = [];
  for (const point of curve) {
    const previous = points[points.length - 1];
    if (previous === undefined || previous.distanceTo(point) > DUPLICATE_DISTANCE) {
      points.push(point.clone());
    }
  }
  if (points.length < 2) return [];

  const arc = [0];
  for (let i = 1; i < points.length; i++) {
    arc.push(arc[i - 1] + points[i].distanceTo(points[i - 1]));
  }
  const total = arc[arc.length - 1];

  const last = points.length - 1;
  const tangents = points.map((_, i) => {
    const prev = points[Math.max(0, i - 1)];
    const next = points[Math.min(last, i + 1)];
    return next.clone().sub(prev);
  });
  for (let i = 0; i < tangents.length; i++) {
    if (tangents[i].lengthSq() < 1e-18) {
      // Curve doubles back on itself: keep the previous direction
      tangents[i].copy(i > 0 ? tangents[i - 1] : points[1].clone().sub(points[0]));
    }
    tangents[i].normalize();
  }

  const frames: CurveFrame[] = [];
  const rotation = new THREE.Quaternion();
  let normal = anyPerpendicular(tangents[0]);

  for (let i = 0; i < points.length; i++) {
    const tangent = tangents[i];
    if (i > 0) {
      rotation.setFromUnitVectors(tangents[i - 1], tangent);
      normal = normal.clone().applyQuaternion(rotation);
      normal.addScaledVector(tangent, -normal.dot(tangent));
      if (normal.lengthSq() < 1e-12) {
        normal = anyPerpendicular(tangent);
      }
      normal.normalize();
    }
    const binormal = new THREE.Vector3().crossVectors(tangent, normal).normalize();
    frames.push({
      position: points[i],
      tangent,
      normal,
      binormal,
      t: total > 0 ? arc[i] / total : 0,
    });
  }
  return frames;
}

/**
 * Sweep a circle along `curve`.
 *
 * Produces one ring of `segments` vertices per distinct curve point with
 * uv = (segment / segments, arc length fraction). Normals are radial,
 * tilted by the local radius slope.
 */
export function sweepAlongCurve(
  curve: readonly THREE.Vector3[],
  options: SweepOptions,
): Mesh {
  const { segments, color } = options;
  if (curve.length < 2) {
    throw new Error(`Sweep needs at least 2 curve points, got ${curve.length}`);
  }
  if (!Number.isInteger(segments) || segments < 3) {
    throw new Error(`Sweep needs at least 3 segments, got ${segments}`);
  }

  const mesh = new Mesh();
  const frames = computeTransportFrames(curve);
  if (frames.length < 2) return mesh;

  const radiusOption = options.radius;
  const radiusAt: RadiusFunction =
    typeof radiusOption === "number" ? () => radiusOption : radiusOption;
  const radii = frames.map((frame) => Math.max(0, radiusAt(frame.t)));

  let totalLength = 0;
  for (let i = 1; i < frames.length; i++) {
    totalLength += frames[i].position.distanceTo(frames[i - 1].position);
  }

  const direction = new THREE.Vector3();
  const position = new THREE.Vector3();
  const normal = new THREE.Vector3();
  const uv = new THREE.Vector2();
  const last = frames.length - 1;

  frames.forEach((frame, i) => {
    // dr/ds from neighbouring rings tilts the normal on tapered tubes
    const prev = Math.max(0, i - 1);
    const next = Math.min(last, i + 1);
    const ds = (frames[next].t - frames[prev].t) * totalLength;
    const slope = ds > 0 ? (radii[next] - radii[prev]) / ds : 0;

    for (let s = 0; s < segments; s++) {
      const angle = (TAU * s) / segments;
      direction
        .copy(frame.normal)
        .multiplyScalar(Math.cos(angle))
        .addScaledVector(frame.binormal, Math.sin(angle));
      position.copy(frame.position).addScaledVector(direction, radii[i]);
      normal.copy(direction).addScaledVector(frame.tangent, -slope).normalize();
      uv.set(s / segments, frame.t);
      mesh.addVertex(position, normal, uv, color);
    }
  });

  for (let ring = 0; ring < last; ring++) {
    for (let s = 0; s < segments; s++) {
      const next = (s + 1) % segments;
      const i0 = ring * segments + s;
      const i1 = ring * segments + next;
      const i2 = (ring + 1) * segments + s;
      const i3 = (ring + 1) * segments + next;
      mesh.addTriangle(i0, i1, i2);
      mesh.addTriangle(i1, i3, i2);
    }
  }

  if (options.capStart && radii[0] > 0) {
    addCap(mesh, frames[0], 0, segments, color, false);
  }
  if (options.capEnd && radii[last] > 0) {
    addCap(mesh, frames[last], last * segments, segments, color, true);
  }

  return mesh;
}

function addCap(
  mesh: Mesh,
  frame: CurveFrame,
  ringStart: number,
  segments: number,
  color: Color3,
  facingForward: boolean,
): void {
  const normal = frame.tangent.clone();
  if (!facingForward) normal.negate();

  // Cap rim gets its own vertices so the flat normal does not bleed into the tube
  const center = mesh.addVertex(frame.position, normal, new THREE.Vector2(0.5, 0.5), color);
  const rim: number[] = [];
  const position = new THREE.Vector3();
  for (let s = 0; s < segments; s++) {
    mesh.getPosition(ringStart + s, position);
    const angle = (TAU * s) / segments;
    rim.push(
      mesh.addVertex(
        position,
        normal,
        new THREE.Vector2(0.5 + 0.5 * Math.cos(angle), 0.5 + 0.5 * Math.sin(angle)),
        color,
      ),
    );
  }
  for (let s = 0; s < segments; s++) {
    const a = rim[s];
    const b = rim[(s + 1) % segments];
    if (facingForward) {
      mesh.addTriangle(center, a, b);
    } else {
      mesh.addTriangle(center, b, a);
    }
  }
}
