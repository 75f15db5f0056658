/**
 * Axis Curve
 *
 * Arc-length parameterized polyline used as the main axis of an
 * inflorescence. Sampling returns a position plus an orthonormal frame
 * (tangent, normal, binormal) that pattern generators branch from.
 */

import * as THREE from "three";
import { anyPerpendicular } from "./Vector.js";

/**
 * Position and frame at a point on the curve.
 */
export interface AxisSample {
  position: THREE.Vector3;
  /** Unit direction of travel */
  tangent: THREE.Vector3;
  /** Unit vector perpendicular to the tangent, toward the curve's bend */
  normal: THREE.Vector3;
  /** tangent × normal */
  binormal: THREE.Vector3;
}

const MIN_BEND = 1e-4;

export class AxisCurve {
  readonly points: readonly THREE.Vector3[];
  /** Cumulative arc length at each point, starting at 0 */
  readonly arcLengths: readonly number[];

  constructor(points: readonly THREE.Vector3[]) {
    if (points.length < 2) {
      throw new Error(`Axis curve needs at least 2 points, got ${points.length}`);
    }
    this.points = points.map((p) => p.clone());

    const lengths = [0];
    for (let i = 1; i < points.length; i++) {
      lengths.push(lengths[i - 1] + points[i].distanceTo(points[i - 1]));
    }
    this.arcLengths = lengths;
  }

  get length(): number {
    return this.arcLengths[this.arcLengths.length - 1];
  }

  /**
   * Sample at normalized arc length t ∈ [0, 1] (clamped).
   */
  sampleAtT(t: number): AxisSample {
    const clamped = Math.min(1, Math.max(0, t));
    const last = this.points.length - 1;
    const total = this.length;

    let segment = 0;
    let local = 0;
    if (total > 0) {
      const target = clamped * total;
      while (segment < last - 1 && this.arcLengths[segment + 1] < target) {
        segment++;
      }
      const segLength = this.arcLengths[segment + 1] - this.arcLengths[segment];
      local = segLength > 0 ? (target - this.arcLengths[segment]) / segLength : 0;
    } else {
      segment = Math.min(last - 1, Math.floor(clamped * last));
    }
    local = Math.min(1, Math.max(0, local));

    const position = this.points[segment]
      .clone()
      .lerp(this.points[segment + 1], local);

    // Frame from the nearest vertex
    const index = local < 0.5 ? segment : segment + 1;
    const tangent = this.tangentAt(index);
    const normal = this.normalAt(index, tangent);
    const binormal = new THREE.Vector3().crossVectors(tangent, normal).normalize();
    normal.crossVectors(binormal, tangent).normalize();

    return { position, tangent, normal, binormal };
  }

  /**
   * `count` samples at evenly spaced arc lengths, ends included.
   */
  sampleUniform(count: number): AxisSample[] {
    if (!Number.isInteger(count) || count < 1) {
      throw new Error(`Axis sampling needs at least 1 sample, got ${count}`);
    }
    if (count === 1) return [this.sampleAtT(0)];
    return Array.from({ length: count }, (_, i) => this.sampleAtT(i / (count - 1)));
  }

  private tangentAt(index: number): THREE.Vector3 {
    const last = this.points.length - 1;
    const prev = this.points[Math.max(0, index - 1)];
    const next = this.points[Math.min(last, index + 1)];
    const tangent = next.clone().sub(prev);
    if (tangent.lengthSq() < 1e-12) return new THREE.Vector3(0, 1, 0);
    return tangent.normalize();
  }

  /**
   * Second difference projected off the tangent; an arbitrary perpendicular
   * where the curve is locally straight.
   */
  private normalAt(index: number, tangent: THREE.Vector3): THREE.Vector3 {
    const last = this.points.length - 1;
    if (last >= 2) {
      const c = Math.min(last - 1, Math.max(1, index));
      const bend = this.points[c + 1]
        .clone()
        .sub(this.points[c].clone().multiplyScalar(2))
        .add(this.points[c - 1]);
      bend.addScaledVector(tangent, -bend.dot(tangent));
      if (bend.length() >= MIN_BEND) return bend.normalize();
    }
    return anyPerpendicular(tangent);
  }
}
