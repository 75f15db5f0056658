/**
 * Vector Utilities
 *
 * Scalar helpers and coordinate conversions shared by the generators.
 * The engine is Y-up: cylindrical coordinates rotate about +Y and
 * height runs along Y.
 */

import * as THREE from "three";

export const TAU = Math.PI * 2;

/**
 * Linear interpolation
 */
export function lerp(a: number, b: number, t: number): number {
  return a + (b - a) * t;
}

/**
 * Clamp value to range
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

/**
 * Hermite smoothstep, clamped to [0, 1]
 */
export function smoothstep(edge0: number, edge1: number, x: number): number {
  const t = clamp((x - edge0) / (edge1 - edge0), 0, 1);
  return t * t * (3 - 2 * t);
}

/**
 * Map value from one range to another (unclamped)
 */
export function remap(
  value: number,
  fromMin: number,
  fromMax: number,
  toMin: number,
  toMax: number,
): number {
  return toMin + ((value - fromMin) / (fromMax - fromMin)) * (toMax - toMin);
}

export function degToRad(degrees: number): number {
  return (degrees * Math.PI) / 180;
}

export function radToDeg(radians: number): number {
  return (radians * 180) / Math.PI;
}

/**
 * Wrap an angle into [0, 2π)
 */
export function normalizeAngle(angle: number): number {
  const wrapped = angle % TAU;
  return wrapped < 0 ? wrapped + TAU : wrapped;
}

// =============================================================================
// CYLINDRICAL / SPHERICAL
// =============================================================================

/**
 * Cylindrical to Cartesian: radius in the XZ plane, height along Y.
 */
export function fromCylindrical(
  radius: number,
  angle: number,
  height: number,
): THREE.Vector3 {
  return new THREE.Vector3(
    radius * Math.cos(angle),
    height,
    radius * Math.sin(angle),
  );
}

export interface Cylindrical {
  radius: number;
  /** Angle in [0, 2π) */
  angle: number;
  height: number;
}

export function toCylindrical(v: THREE.Vector3): Cylindrical {
  return {
    radius: Math.hypot(v.x, v.z),
    angle: normalizeAngle(Math.atan2(v.z, v.x)),
    height: v.y,
  };
}

/**
 * Spherical to Cartesian.
 *
 * @param radius - Distance from origin
 * @param polar - Angle from +Y in [0, π]
 * @param azimuth - Angle around Y measured from +X toward +Z
 */
export function fromSpherical(
  radius: number,
  polar: number,
  azimuth: number,
): THREE.Vector3 {
  const sinPolar = Math.sin(polar);
  return new THREE.Vector3(
    radius * sinPolar * Math.cos(azimuth),
    radius * Math.cos(polar),
    radius * sinPolar * Math.sin(azimuth),
  );
}

export interface Spherical {
  radius: number;
  polar: number;
  /** Azimuth in [0, 2π) */
  azimuth: number;
}

export function toSpherical(v: THREE.Vector3): Spherical {
  const radius = v.length();
  if (radius === 0) return { radius: 0, polar: 0, azimuth: 0 };
  return {
    radius,
    polar: Math.acos(clamp(v.y / radius, -1, 1)),
    azimuth: normalizeAngle(Math.atan2(v.z, v.x)),
  };
}

// =============================================================================
// 2D HELPERS
// =============================================================================

export function rotate2D(p: THREE.Vector2, angle: number): THREE.Vector2 {
  const cos = Math.cos(angle);
  const sin = Math.sin(angle);
  return new THREE.Vector2(p.x * cos - p.y * sin, p.x * sin + p.y * cos);
}

export function fromPolar2D(radius: number, angle: number): THREE.Vector2 {
  return new THREE.Vector2(radius * Math.cos(angle), radius * Math.sin(angle));
}

export function toPolar2D(p: THREE.Vector2): { radius: number; angle: number } {
  return {
    radius: p.length(),
    angle: normalizeAngle(Math.atan2(p.y, p.x)),
  };
}

/**
 * Unit vector perpendicular to `v`. Picks +Y as the reference axis unless
 * `v` is nearly parallel to it, then +X.
 */
export function anyPerpendicular(v: THREE.Vector3): THREE.Vector3 {
  const reference =
    Math.abs(v.y) < 0.9
      ? new THREE.Vector3(0, 1, 0)
      : new THREE.Vector3(1, 0, 0);
  return reference.addScaledVector(v, -reference.dot(v)).normalize();
}
