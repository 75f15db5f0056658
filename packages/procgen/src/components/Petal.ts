/**
 * Petal Generator
 *
 * Petals are degree-3 B-spline surfaces built from a 9×5 control grid:
 * 9 rows along the length (v) and 5 columns across the width (u). The blade
 * lies in the XY plane with its face toward +Z, attached at the origin and
 * extending along +Y. Shape deformations act on the control points, so the
 * tessellated surface stays smooth.
 *
 * Both faces are emitted (front toward +Z, back toward -Z) so the blade
 * renders from either side without double-sided materials.
 */

import * as THREE from "three";
import { Mesh } from "../mesh/Mesh.js";
import { BSplineSurface } from "../math/BSpline.js";
import { degToRad } from "../math/Vector.js";
import { assertCount, assertPositive, type PetalParams } from "./types.js";

const ROWS = 9;
const COLUMNS = 5;
const DEGREE = 3;
/** Width peaks at this fraction of the length */
const WIDEST_AT = 0.6;
const NEGLIGIBLE = 0.001;

/**
 * Blade width at normalized length v.
 */
export function petalWidthAt(params: PetalParams, v: number): number {
  const { width, baseWidth, tipSharpness } = params;
  if (v < WIDEST_AT) {
    return baseWidth + (width - baseWidth) * (v / WIDEST_AT);
  }
  const tipWidth = width * tipSharpness;
  return width + (tipWidth - width) * ((v - WIDEST_AT) / (1 - WIDEST_AT));
}

/**
 * Control grid indexed [row along v][column along u], deformations applied.
 */
export function petalControlGrid(params: PetalParams): THREE.Vector3[][] {
  const grid: THREE.Vector3[][] = [];

  for (let row = 0; row < ROWS; row++) {
    const v = row / (ROWS - 1);
    const widthAtV = petalWidthAt(params, v);
    const points: THREE.Vector3[] = [];

    for (let col = 0; col < COLUMNS; col++) {
      const u = col / (COLUMNS - 1);
      const point = new THREE.Vector3((u - 0.5) * widthAtV, v * params.length, 0);
      deformPoint(point, u, v, params);
      points.push(point);
    }
    grid.push(points);
  }
  return grid;
}

/**
 * Apply curl, twist, lateral curve and ruffle, in that order.
 */
function deformPoint(point: THREE.Vector3, u: number, v: number, params: PetalParams): void {
  if (Math.abs(params.curl) > NEGLIGIBLE) {
    // Curl: rotate in the YZ plane, strongest toward the tip
    const angle = params.curl * v * v * (Math.PI / 2);
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const { y, z } = point;
    point.y = y * cos - z * sin;
    point.z = y * sin + z * cos;
  }

  if (Math.abs(params.twist) > NEGLIGIBLE) {
    // Twist: rotate in the XZ plane, linear along the length
    const angle = degToRad(params.twist) * v;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const { x, z } = point;
    point.x = x * cos - z * sin;
    point.z = x * sin + z * cos;
  }

  if (Math.abs(params.lateralCurve) > NEGLIGIBLE) {
    // Lateral curve: rotate in the XY plane
    const angle = params.lateralCurve * v * v * Math.PI * 0.3;
    const cos = Math.cos(angle);
    const sin = Math.sin(angle);
    const { x, y } = point;
    point.x = x * cos - y * sin;
    point.y = x * sin + y * cos;
  }

  if (params.ruffleFreq > NEGLIGIBLE && Math.abs(params.ruffleAmp) > NEGLIGIBLE) {
    // Edges only
    const edgeWeight = u < 0.5 ? 1 - 2 * u : (u - 0.5) * 2;
    if (edgeWeight > 0.3) {
      point.z +=
        Math.sin(v * params.ruffleFreq * Math.PI * 2) * params.ruffleAmp * edgeWeight;
    }
  }
}

/**
 * B-spline surface for a petal, parameterized u across, v along.
 */
export function createPetalSurface(params: PetalParams): BSplineSurface {
  const grid = petalControlGrid(params);
  // Transpose to [u][v]
  const byU = Array.from({ length: COLUMNS }, (_, col) => grid.map((row) => row[col]));
  return BSplineSurface.uniform(byU, DEGREE, DEGREE);
}

export function generatePetal(params: PetalParams): Mesh {
  assertPositive("Petal length", params.length);
  assertCount("Petal resolution", params.resolution, 1);
  if (!(params.width >= 0) || !(params.baseWidth >= 0)) {
    throw new Error(
      `Petal widths must be non-negative, got width ${params.width}, base ${params.baseWidth}`,
    );
  }

  const surface = createPetalSurface(params);
  const res = params.resolution;
  const stride = res + 1;
  const mesh = new Mesh();
  const uv = new THREE.Vector2();

  const positions: THREE.Vector3[] = [];
  const normals: THREE.Vector3[] = [];
  for (let i = 0; i <= res; i++) {
    const u = i / res;
    for (let j = 0; j <= res; j++) {
      const v = j / res;
      positions.push(surface.evaluate(u, v));
      normals.push(surface.normal(u, v));
    }
  }

  // Front face
  for (let k = 0; k < positions.length; k++) {
    uv.set(Math.floor(k / stride) / res, (k % stride) / res);
    mesh.addVertex(positions[k], normals[k], uv, params.color);
  }
  // Back face: same points, flipped normals
  const back = positions.length;
  for (let k = 0; k < positions.length; k++) {
    uv.set(Math.floor(k / stride) / res, (k % stride) / res);
    mesh.addVertex(positions[k], normals[k].clone().negate(), uv, params.color);
  }

  for (let i = 0; i < res; i++) {
    for (let j = 0; j < res; j++) {
      const i0 = i * stride + j;
      const i1 = i0 + 1;
      const i2 = i0 + stride;
      const i3 = i2 + 1;

      mesh.addTriangle(i0, i2, i1);
      mesh.addTriangle(i1, i2, i3);

      mesh.addTriangle(back + i0, back + i1, back + i2);
      mesh.addTriangle(back + i1, back + i3, back + i2);
    }
  }

  return mesh;
}
