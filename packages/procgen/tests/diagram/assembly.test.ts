/**
 * Tests for mapping placements onto the receptacle and assembling flowers.
 */

import { describe, it, expect } from "vitest";
import * as THREE from "three";
import { ReceptacleMapper, transformToMatrix } from "../../src/diagram/ReceptacleMapper.js";
import {
  FLOWER_PRESETS,
  effectiveReceptacle,
  generateFlower,
  type FlowerParams,
} from "../../src/diagram/FlowerAssembly.js";
import { DIAGRAM_PRESETS, createWhorl } from "../../src/diagram/FloralDiagram.js";
import type { ComponentPlacement } from "../../src/diagram/Placement.js";
import { mergeReceptacleParams } from "../../src/components/types.js";
import { generateReceptacle } from "../../src/components/Receptacle.js";
import { generatePistil } from "../../src/components/Pistil.js";
import { generateStamen } from "../../src/components/Stamen.js";
import { generatePetal } from "../../src/components/Petal.js";
import { validateMesh } from "../../src/mesh/Mesh.js";

const receptacle = mergeReceptacleParams({ height: 1, baseRadius: 0.3 });

function placement(partial: Partial<ComponentPlacement>): ComponentPlacement {
  return {
    type: "stamen",
    radius: 1,
    angle: 0,
    height: 0.5,
    scale: 1,
    tiltAngle: 0,
    ...partial,
  };
}

function localUp(rotation: THREE.Quaternion): THREE.Vector3 {
  return new THREE.Vector3(0, 1, 0).applyQuaternion(rotation);
}

describe("ReceptacleMapper", () => {
  const mapper = new ReceptacleMapper(receptacle);

  it("reads the profile height from the Bezier at the height fraction", () => {
    // Bernstein weights at 0.5 on heights 0, 0.2, 0.5, 1
    expect(mapper.profileAt(0.5).y).toBeCloseTo(0.3875);
    expect(mapper.profileAt(0).x).toBeCloseTo(0.3);
    expect(mapper.profileAt(1).x).toBeCloseTo(0.15);
  });

  it("clamps height fractions to the receptacle", () => {
    expect(mapper.profileAt(1.5).y).toBeCloseTo(1);
    expect(mapper.radiusAt(-1)).toBeCloseTo(0.3);
  });

  it("puts a central pistil on the axis, upright", () => {
    const transform = mapper.mapToSurface(placement({ type: "pistil", radius: 0 }));
    expect(transform.position).toBeCloseToVector({ x: 0, y: 0.3875, z: 0 });
    expect(localUp(transform.rotation)).toBeCloseToVector({ x: 0, y: 1, z: 0 });
  });

  it("places organs at radius fraction × profile radius", () => {
    const r = mapper.radiusAt(0.5);
    const transform = mapper.mapToSurface(placement({ radius: 0.5, angle: Math.PI / 2 }));
    expect(transform.position).toBeCloseToVector({ x: 0, y: 0.3875, z: 0.5 * r });
  });

  it("keeps an untilted stamen upright", () => {
    const transform = mapper.mapToSurface(placement({ angle: 1.2 }));
    expect(localUp(transform.rotation)).toBeCloseToVector({ x: 0, y: 1, z: 0 });
  });

  it("leans a tilted stamen outward", () => {
    const transform = mapper.mapToSurface(placement({ tiltAngle: Math.PI / 4 }));
    expect(localUp(transform.rotation)).toBeCloseToVector({
      x: Math.SQRT1_2,
      y: Math.SQRT1_2,
      z: 0,
    });
  });

  it("points a petal along the outward profile normal", () => {
    const transform = mapper.mapToSurface(placement({ type: "petal", height: 0.8 }));
    const n = mapper.profileNormalAt(0.8);
    expect(n.x).toBeGreaterThan(0);
    expect(localUp(transform.rotation)).toBeCloseToVector({ x: n.x, y: n.y, z: 0 });
  });

  it("turns the petal face toward the binormal", () => {
    const transform = mapper.mapToSurface(placement({ type: "petal", height: 0.8 }));
    const n = mapper.profileNormalAt(0.8);
    const face = new THREE.Vector3(0, 0, 1).applyQuaternion(transform.rotation);
    // azimuthal (0, 0, 1) × normal
    expect(face).toBeCloseToVector({ x: -n.y, y: n.x, z: 0 });
  });

  it("lifts a tilted petal about the azimuthal tangent", () => {
    const tilt = 0.3;
    const flat = mapper.mapToSurface(placement({ type: "petal", height: 0.8 }));
    const lifted = mapper.mapToSurface(placement({ type: "petal", height: 0.8, tiltAngle: tilt }));
    const expected = localUp(flat.rotation).applyAxisAngle(new THREE.Vector3(0, 0, 1), tilt);
    expect(localUp(lifted.rotation)).toBeCloseToVector(expected);
  });

  it("applies the placement scale uniformly", () => {
    const transform = mapper.mapToSurface(placement({ scale: 1.3 }));
    expect(transform.scale).toBeCloseToVector({ x: 1.3, y: 1.3, z: 1.3 });
  });

  it("composes a transform into a matrix", () => {
    const matrix = transformToMatrix({
      position: new THREE.Vector3(1, 2, 3),
      rotation: new THREE.Quaternion(),
      scale: new THREE.Vector3(2, 2, 2),
    });
    expect(new THREE.Vector3(1, 0, 0).applyMatrix4(matrix)).toBeCloseToVector({
      x: 3,
      y: 2,
      z: 3,
    });
  });
});

describe("generateFlower", () => {
  it("overrides receptacle height and base radius from the diagram", () => {
    const params: FlowerParams = FLOWER_PRESETS.daisy;
    const effective = effectiveReceptacle(params);
    expect(effective.height).toBe(0.5);
    expect(effective.baseRadius).toBe(0.8);
    expect(effective.topRadius).toBe(params.receptacle.topRadius);
  });

  it("merges one organ instance per placement", () => {
    const params: FlowerParams = FLOWER_PRESETS.lily;
    const flower = generateFlower(params);
    const expected =
      generateReceptacle(effectiveReceptacle(params)).vertexCount +
      generatePistil(params.pistil).vertexCount +
      6 * generateStamen(params.stamen).vertexCount +
      6 * generatePetal(params.petal).vertexCount;
    expect(flower.vertexCount).toBe(expected);
    expect(validateMesh(flower)).toEqual([]);
  });

  it("uses sepal defaults when no sepal shape is given", () => {
    const base: FlowerParams = FLOWER_PRESETS.lily;
    const params: FlowerParams = {
      ...base,
      diagram: {
        ...DIAGRAM_PRESETS.lily,
        sepalWhorls: [createWhorl({ count: 3, height: 0.1 })],
      },
    };
    const withSepals = generateFlower(params);
    const without = generateFlower(base);
    // Default sepal resolution 16: 2 · 17² vertices each
    expect(withSepals.vertexCount - without.vertexCount).toBe(3 * 2 * 17 * 17);
  });

  it("is deterministic with jitter", () => {
    const params: FlowerParams = {
      ...FLOWER_PRESETS.lily,
      diagram: { ...DIAGRAM_PRESETS.lily, positionJitter: 0.1, angleJitter: 8, jitterSeed: 7 },
    };
    expect(generateFlower(params).positions).toEqual(generateFlower(params).positions);
  });
});
