/**
 * Tests for surfaces of revolution and the primitives built on them.
 */

import { describe, it, expect } from "vitest";
import * as THREE from "three";
import {
  createCone,
  createCylinder,
  createUvSphere,
  surfaceOfRevolution,
} from "../../src/geometry/Revolution.js";
import { validateMesh, type Color3 } from "../../src/mesh/Mesh.js";

const GREEN: Color3 = [0.2, 0.6, 0.2];

describe("surfaceOfRevolution", () => {
  it("creates one ring per profile point and a quad band between rings", () => {
    const mesh = surfaceOfRevolution(
      [new THREE.Vector2(1, 0), new THREE.Vector2(1, 1), new THREE.Vector2(0.5, 2)],
      8,
      GREEN,
    );
    expect(mesh.vertexCount).toBe(24);
    expect(mesh.triangleCount).toBe(32);
    expect(validateMesh(mesh)).toEqual([]);
  });

  it("places the first vertex of each ring on +X", () => {
    const mesh = surfaceOfRevolution(
      [new THREE.Vector2(1, 0), new THREE.Vector2(2, 3)],
      4,
      GREEN,
    );
    expect(mesh.getPosition(0)).toBeCloseToVector({ x: 1, y: 0, z: 0 });
    expect(mesh.getPosition(5)).toBeCloseToVector({ x: 0, y: 3, z: 2 });
  });

  it("orients normals outward", () => {
    const mesh = createCylinder(1, 2, 12, GREEN);
    for (let i = 0; i < mesh.vertexCount; i++) {
      const position = mesh.getPosition(i);
      const normal = mesh.getNormal(i);
      const radial = new THREE.Vector3(position.x, 0, position.z).normalize();
      expect(normal.dot(radial)).toBeGreaterThan(0.98);
    }
  });

  it("triangulates pole rows as fans", () => {
    // Pole, ring, pole: two fans of `segments` triangles
    const mesh = surfaceOfRevolution(
      [new THREE.Vector2(0, 0), new THREE.Vector2(1, 1), new THREE.Vector2(0, 2)],
      6,
      GREEN,
    );
    expect(mesh.triangleCount).toBe(12);
  });

  it("emits no faces between two pole rows", () => {
    const mesh = surfaceOfRevolution(
      [new THREE.Vector2(0, 0), new THREE.Vector2(0, 1), new THREE.Vector2(1, 2)],
      5,
      GREEN,
    );
    expect(mesh.triangleCount).toBe(5);
  });

  it("applies uv = (segment / segments, row / (rows - 1))", () => {
    const mesh = surfaceOfRevolution(
      [new THREE.Vector2(1, 0), new THREE.Vector2(1, 1)],
      4,
      GREEN,
    );
    // vertex 6: row 1, segment 2
    expect(mesh.uvs[12]).toBeCloseTo(0.5);
    expect(mesh.uvs[13]).toBeCloseTo(1);
  });

  it("rejects fewer than three segments", () => {
    expect(() =>
      surfaceOfRevolution([new THREE.Vector2(1, 0), new THREE.Vector2(1, 1)], 2, GREEN),
    ).toThrow("Surface of revolution needs at least 3 segments, got 2");
  });

  it("rejects negative radii", () => {
    expect(() =>
      surfaceOfRevolution([new THREE.Vector2(-1, 0), new THREE.Vector2(1, 1)], 4, GREEN),
    ).toThrow("Invalid profile point (-1, 0)");
  });

  it("rejects a single-point profile", () => {
    expect(() => surfaceOfRevolution([new THREE.Vector2(1, 0)], 4, GREEN)).toThrow(
      "Surface of revolution needs at least 2 profile points, got 1",
    );
  });
});

describe("primitives", () => {
  it("caps a cylinder with pole fans", () => {
    const open = createCylinder(0.5, 1, 8, GREEN);
    const capped = createCylinder(0.5, 1, 8, GREEN, true);
    expect(open.triangleCount).toBe(16);
    expect(capped.triangleCount).toBe(32);
  });

  it("builds a cone that closes at its apex", () => {
    const cone = createCone(1, 2, 10, GREEN);
    expect(cone.triangleCount).toBe(10);
    expect(cone.getPosition(10)).toBeCloseToVector({ x: 0, y: 2, z: 0 });
  });

  it("builds a sphere whose vertices sit on the radius", () => {
    const sphere = createUvSphere(2, 6, 8, GREEN);
    expect(sphere.vertexCount).toBe(7 * 8);
    // Two pole fans plus four quad bands
    expect(sphere.triangleCount).toBe(2 * 8 + 4 * 16);
    for (let i = 0; i < sphere.vertexCount; i++) {
      expect(sphere.getPosition(i).length()).toBeCloseTo(2);
    }
    expect(validateMesh(sphere)).toEqual([]);
  });

  it("needs at least two sphere rings", () => {
    expect(() => createUvSphere(1, 1, 8, GREEN)).toThrow(
      "UV sphere needs at least 2 rings, got 1",
    );
  });
});
