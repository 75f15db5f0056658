/**
 * Surface of Revolution
 *
 * Rotates a 2D profile (x = radius, y = height) about the Y axis. Rows with
 * zero radius are poles: they are triangulated as fans instead of quads, and
 * two neighbouring pole rows produce no faces at all.
 *
 * Profiles must run bottom to top for outward-facing normals.
 */

import * as THREE from "three";
import { Mesh, type Color3 } from "../mesh/Mesh.js";
import { TAU } from "../math/Vector.js";

const POLE_RADIUS = 1e-6;

function assertSegments(segments: number): void {
  if (!Number.isInteger(segments) || segments < 3) {
    throw new Error(`Surface of revolution needs at least 3 segments, got ${segments}`);
  }
}

/**
 * Revolve `profile` into a closed shell.
 *
 * Each profile row becomes a ring of `segments` vertices with
 * uv = (segment / segments, row / (rows - 1)).
 */
export function surfaceOfRevolution(
  profile: readonly THREE.Vector2[],
  segments: number,
  color: Color3,
): Mesh {
  assertSegments(segments);
  if (profile.length < 2) {
    throw new Error(`Surface of revolution needs at least 2 profile points, got ${profile.length}`);
  }
  for (const point of profile) {
    if (!Number.isFinite(point.x) || !Number.isFinite(point.y) || point.x < 0) {
      throw new Error(`Invalid profile point (${point.x}, ${point.y})`);
    }
  }

  const mesh = new Mesh();
  const rows = profile.length;
  const position = new THREE.Vector3();
  const up = new THREE.Vector3(0, 1, 0);
  const uv = new THREE.Vector2();

  for (let row = 0; row < rows; row++) {
    const { x: radius, y: height } = profile[row];
    for (let s = 0; s < segments; s++) {
      const angle = (TAU * s) / segments;
      position.set(radius * Math.cos(angle), height, radius * Math.sin(angle));
      uv.set(s / segments, row / (rows - 1));
      mesh.addVertex(position, up, uv, color);
    }
  }

  for (let row = 0; row < rows - 1; row++) {
    const bottomPole = profile[row].x < POLE_RADIUS;
    const topPole = profile[row + 1].x < POLE_RADIUS;
    if (bottomPole && topPole) continue;

    for (let s = 0; s < segments; s++) {
      const next = (s + 1) % segments;
      const i0 = row * segments + s;
      const i1 = row * segments + next;
      const i2 = (row + 1) * segments + next;
      const i3 = (row + 1) * segments + s;

      if (bottomPole) {
        mesh.addTriangle(i0, i3, i2);
      } else if (topPole) {
        mesh.addTriangle(i0, i2, i1);
      } else {
        mesh.addQuad(i0, i3, i2, i1);
      }
    }
  }

  return mesh.computeNormals();
}

// =============================================================================
// PRIMITIVES
// =============================================================================

/**
 * Cylinder from y = 0 to y = height, optionally closed with pole fans.
 */
export function createCylinder(
  radius: number,
  height: number,
  segments: number,
  color: Color3,
  capped = false,
): Mesh {
  const side = [new THREE.Vector2(radius, 0), new THREE.Vector2(radius, height)];
  const profile = capped
    ? [new THREE.Vector2(0, 0), ...side, new THREE.Vector2(0, height)]
    : side;
  return surfaceOfRevolution(profile, segments, color);
}

/**
 * Cone with its base at y = 0 and apex at y = height.
 */
export function createCone(
  baseRadius: number,
  height: number,
  segments: number,
  color: Color3,
  capped = false,
): Mesh {
  const side = [new THREE.Vector2(baseRadius, 0), new THREE.Vector2(0, height)];
  const profile = capped ? [new THREE.Vector2(0, 0), ...side] : side;
  return surfaceOfRevolution(profile, segments, color);
}

/**
 * UV sphere centered at the origin, built bottom pole to top pole.
 *
 * @param rings - Latitude bands (≥ 2)
 */
export function createUvSphere(
  radius: number,
  rings: number,
  segments: number,
  color: Color3,
): Mesh {
  if (!Number.isInteger(rings) || rings < 2) {
    throw new Error(`UV sphere needs at least 2 rings, got ${rings}`);
  }
  const profile: THREE.Vector2[] = [];
  for (let i = 0; i <= rings; i++) {
    const theta = (i * Math.PI) / rings;
    const r = i === 0 || i === rings ? 0 : radius * Math.sin(theta);
    profile.push(new THREE.Vector2(r, -radius * Math.cos(theta)));
  }
  return surfaceOfRevolution(profile, segments, color);
}
