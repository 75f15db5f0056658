/**
 * Mesh
 *
 * Indexed triangle mesh used by every generator in the engine. Attributes are
 * stored as flat number arrays (3 floats per position/normal/color, 2 per uv)
 * so merging and buffer export stay cheap. Templates are cloned per placement
 * and transformed in place.
 *
 * @module Mesh
 */

import * as THREE from "three";

/** RGB color with channels in 0-1 */
export type Color3 = readonly [number, number, number];

/**
 * Flat buffers handed to renderers and exporters.
 */
export interface MeshBuffers {
  /** 3 floats per vertex */
  positions: Float32Array;
  /** 3 floats per vertex, unit length */
  normals: Float32Array;
  /** 2 floats per vertex */
  uvs: Float32Array;
  /** 3 floats per vertex, 0-1 range */
  colors: Float32Array;
  /** 3 indices per triangle */
  indices: Uint32Array;
}

const DEGENERATE_AREA_SQ = 1e-20;
const MIN_NORMAL_LENGTH = 1e-6;

const _a = new THREE.Vector3();
const _b = new THREE.Vector3();
const _c = new THREE.Vector3();
const _ab = new THREE.Vector3();
const _ac = new THREE.Vector3();
const _n = new THREE.Vector3();
const _normalMatrix = new THREE.Matrix3();

export class Mesh {
  positions: number[] = [];
  normals: number[] = [];
  uvs: number[] = [];
  colors: number[] = [];
  indices: number[] = [];

  get vertexCount(): number {
    return this.positions.length / 3;
  }

  get triangleCount(): number {
    return this.indices.length / 3;
  }

  get isEmpty(): boolean {
    return this.positions.length === 0;
  }

  /**
   * Append a vertex and return its index.
   */
  addVertex(
    position: THREE.Vector3,
    normal: THREE.Vector3,
    uv: THREE.Vector2,
    color: Color3,
  ): number {
    const index = this.vertexCount;
    this.positions.push(position.x, position.y, position.z);
    this.normals.push(normal.x, normal.y, normal.z);
    this.uvs.push(uv.x, uv.y);
    this.colors.push(color[0], color[1], color[2]);
    return index;
  }

  addTriangle(i0: number, i1: number, i2: number): void {
    this.indices.push(i0, i1, i2);
  }

  /**
   * Add a quad as two triangles: (i0, i1, i2) and (i0, i2, i3).
   */
  addQuad(i0: number, i1: number, i2: number, i3: number): void {
    this.indices.push(i0, i1, i2, i0, i2, i3);
  }

  getPosition(index: number, target = new THREE.Vector3()): THREE.Vector3 {
    return target.fromArray(this.positions, index * 3);
  }

  getNormal(index: number, target = new THREE.Vector3()): THREE.Vector3 {
    return target.fromArray(this.normals, index * 3);
  }

  /**
   * Append another mesh, offsetting its indices by this mesh's vertex count.
   */
  merge(other: Mesh): this {
    const offset = this.vertexCount;
    for (const value of other.positions) this.positions.push(value);
    for (const value of other.normals) this.normals.push(value);
    for (const value of other.uvs) this.uvs.push(value);
    for (const value of other.colors) this.colors.push(value);
    for (const index of other.indices) this.indices.push(index + offset);
    return this;
  }

  /**
   * Apply an affine transform. Normals go through the inverse-transpose so
   * non-uniform scale keeps them perpendicular to the surface.
   */
  transform(matrix: THREE.Matrix4): this {
    _normalMatrix.getNormalMatrix(matrix);

    for (let i = 0; i < this.positions.length; i += 3) {
      _a.fromArray(this.positions, i).applyMatrix4(matrix);
      _a.toArray(this.positions, i);

      _n.fromArray(this.normals, i).applyMatrix3(_normalMatrix);
      if (_n.length() > MIN_NORMAL_LENGTH) {
        _n.normalize();
      }
      _n.toArray(this.normals, i);
    }
    return this;
  }

  /**
   * Recompute smooth vertex normals from face geometry.
   *
   * Face normals are accumulated unnormalized so larger faces weigh more.
   * Zero-area faces contribute nothing; vertices without any contribution
   * fall back to +Y.
   */
  computeNormals(): this {
    const accum = new Float64Array(this.positions.length);

    for (let t = 0; t < this.indices.length; t += 3) {
      const i0 = this.indices[t];
      const i1 = this.indices[t + 1];
      const i2 = this.indices[t + 2];

      this.getPosition(i0, _a);
      this.getPosition(i1, _b);
      this.getPosition(i2, _c);
      _ab.subVectors(_b, _a);
      _ac.subVectors(_c, _a);
      _n.crossVectors(_ab, _ac);

      if (_n.lengthSq() < DEGENERATE_AREA_SQ) continue;

      for (const index of [i0, i1, i2]) {
        accum[index * 3] += _n.x;
        accum[index * 3 + 1] += _n.y;
        accum[index * 3 + 2] += _n.z;
      }
    }

    for (let i = 0; i < accum.length; i += 3) {
      _n.set(accum[i], accum[i + 1], accum[i + 2]);
      if (_n.length() > MIN_NORMAL_LENGTH) {
        _n.normalize();
      } else {
        _n.set(0, 1, 0);
      }
      _n.toArray(this.normals, i);
    }
    return this;
  }

  /**
   * Overwrite every vertex color.
   */
  setColor(color: Color3): this {
    for (let i = 0; i < this.colors.length; i += 3) {
      this.colors[i] = color[0];
      this.colors[i + 1] = color[1];
      this.colors[i + 2] = color[2];
    }
    return this;
  }

  clone(): Mesh {
    const copy = new Mesh();
    copy.positions = this.positions.slice();
    copy.normals = this.normals.slice();
    copy.uvs = this.uvs.slice();
    copy.colors = this.colors.slice();
    copy.indices = this.indices.slice();
    return copy;
  }

  clear(): void {
    this.positions.length = 0;
    this.normals.length = 0;
    this.uvs.length = 0;
    this.colors.length = 0;
    this.indices.length = 0;
  }

  toBuffers(): MeshBuffers {
    return {
      positions: new Float32Array(this.positions),
      normals: new Float32Array(this.normals),
      uvs: new Float32Array(this.uvs),
      colors: new Float32Array(this.colors),
      indices: new Uint32Array(this.indices),
    };
  }

  /**
   * Build a three.js geometry with position, normal, uv and color attributes.
   */
  toBufferGeometry(): THREE.BufferGeometry {
    const buffers = this.toBuffers();
    const geometry = new THREE.BufferGeometry();
    geometry.setAttribute(
      "position",
      new THREE.BufferAttribute(buffers.positions, 3),
    );
    geometry.setAttribute("normal", new THREE.BufferAttribute(buffers.normals, 3));
    geometry.setAttribute("uv", new THREE.BufferAttribute(buffers.uvs, 2));
    geometry.setAttribute("color", new THREE.BufferAttribute(buffers.colors, 3));
    geometry.setIndex(new THREE.BufferAttribute(buffers.indices, 1));
    geometry.computeBoundingSphere();
    return geometry;
  }
}

/**
 * Check that every index references an existing vertex and every attribute
 * array has the length the vertex count implies. Returns a list of problems
 * (empty when the mesh is consistent).
 */
export function validateMesh(mesh: Mesh): string[] {
  const problems: string[] = [];
  const count = mesh.vertexCount;

  if (!Number.isInteger(count)) {
    problems.push(`position array length ${mesh.positions.length} is not a multiple of 3`);
  }
  if (mesh.normals.length !== mesh.positions.length) {
    problems.push(`normal count ${mesh.normals.length / 3} != vertex count ${count}`);
  }
  if (mesh.colors.length !== mesh.positions.length) {
    problems.push(`color count ${mesh.colors.length / 3} != vertex count ${count}`);
  }
  if (mesh.uvs.length / 2 !== count) {
    problems.push(`uv count ${mesh.uvs.length / 2} != vertex count ${count}`);
  }
  if (mesh.indices.length % 3 !== 0) {
    problems.push(`index count ${mesh.indices.length} is not a multiple of 3`);
  }
  for (const index of mesh.indices) {
    if (!Number.isInteger(index) || index < 0 || index >= count) {
      problems.push(`index ${index} out of range for ${count} vertices`);
      break;
    }
  }
  for (const value of mesh.positions) {
    if (!Number.isFinite(value)) {
      problems.push("non-finite position component");
      break;
    }
  }
  for (const value of mesh.normals) {
    if (!Number.isFinite(value)) {
      problems.push("non-finite normal component");
      break;
    }
  }
  return problems;
}
