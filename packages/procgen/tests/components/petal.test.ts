/**
 * Tests for the petal and sepal blade generators.
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_PETAL_PARAMS,
  SEPAL_GREEN,
  mergePetalParams,
} from "../../src/components/types.js";
import {
  createPetalSurface,
  generatePetal,
  petalControlGrid,
  petalWidthAt,
} from "../../src/components/Petal.js";
import { generateSepal } from "../../src/components/Sepal.js";
import { validateMesh } from "../../src/mesh/Mesh.js";

describe("petalWidthAt", () => {
  it("widens from the base to the maximum at 60% of the length", () => {
    expect(petalWidthAt(DEFAULT_PETAL_PARAMS, 0)).toBeCloseTo(0.4);
    expect(petalWidthAt(DEFAULT_PETAL_PARAMS, 0.3)).toBeCloseTo(0.8);
    expect(petalWidthAt(DEFAULT_PETAL_PARAMS, 0.6)).toBeCloseTo(1.2);
  });

  it("narrows to width × tipSharpness at the tip", () => {
    expect(petalWidthAt(DEFAULT_PETAL_PARAMS, 1)).toBeCloseTo(0.48);
  });
});

describe("petalControlGrid", () => {
  it("has 9 rows of 5 points", () => {
    const grid = petalControlGrid(DEFAULT_PETAL_PARAMS);
    expect(grid).toHaveLength(9);
    for (const row of grid) expect(row).toHaveLength(5);
  });

  it("lays a flat blade in the XY plane", () => {
    const grid = petalControlGrid(DEFAULT_PETAL_PARAMS);
    expect(grid[0][0]).toBeCloseToVector({ x: -0.2, y: 0, z: 0 });
    expect(grid[8][4]).toBeCloseToVector({ x: 0.24, y: 3, z: 0 });
    for (const row of grid) {
      for (const point of row) expect(point.z).toBe(0);
    }
  });

  it("curls the tip toward +Z for positive curl", () => {
    const grid = petalControlGrid(mergePetalParams({ curl: 1 }));
    // Full curl turns the tip row a quarter turn: y → z
    expect(grid[8][2]).toBeCloseToVector({ x: 0, y: 0, z: 3 });
    expect(grid[0][2]).toBeCloseToVector({ x: 0, y: 0, z: 0 });
  });

  it("ruffles only the edges", () => {
    const grid = petalControlGrid(mergePetalParams({ ruffleFreq: 1, ruffleAmp: 0.2 }));
    // Row 2: v = 0.25, sin(π/2) = 1
    expect(grid[2][0].z).toBeCloseTo(0.2);
    expect(grid[2][4].z).toBeCloseTo(0.2);
    expect(grid[2][2].z).toBe(0);
  });
});

describe("generatePetal", () => {
  it("emits both faces of a (res + 1)² grid", () => {
    const mesh = generatePetal(DEFAULT_PETAL_PARAMS);
    expect(mesh.vertexCount).toBe(2 * 17 * 17);
    expect(mesh.triangleCount).toBe(4 * 16 * 16);
    expect(validateMesh(mesh)).toEqual([]);
  });

  it("attaches at the origin and reaches its length along +Y", () => {
    const mesh = generatePetal(mergePetalParams({ resolution: 4 }));
    // u = 0.5 column: vertex index 2 * 5 + j
    expect(mesh.getPosition(10)).toBeCloseToVector({ x: 0, y: 0, z: 0 });
    expect(mesh.getPosition(14)).toBeCloseToVector({ x: 0, y: 3, z: 0 });
  });

  it("faces the front +Z and the back -Z", () => {
    const mesh = generatePetal(mergePetalParams({ resolution: 4 }));
    expect(mesh.getNormal(12)).toBeCloseToVector({ x: 0, y: 0, z: 1 });
    expect(mesh.getNormal(25 + 12)).toBeCloseToVector({ x: 0, y: 0, z: -1 });
  });

  it("maps uv as (u, v) over the grid", () => {
    const mesh = generatePetal(mergePetalParams({ resolution: 4 }));
    // Vertex 7: i = 1, j = 2
    expect(mesh.uvs[14]).toBeCloseTo(0.25);
    expect(mesh.uvs[15]).toBeCloseTo(0.5);
  });

  it("stays within half the maximum width", () => {
    const mesh = generatePetal(DEFAULT_PETAL_PARAMS);
    for (let i = 0; i < mesh.vertexCount; i++) {
      expect(Math.abs(mesh.getPosition(i).x)).toBeLessThanOrEqual(0.6 + 1e-9);
    }
  });

  it("evaluates to the same points as its B-spline surface", () => {
    const params = mergePetalParams({ resolution: 4, twist: 20, curl: 0.3 });
    const surface = createPetalSurface(params);
    const mesh = generatePetal(params);
    const expected = surface.evaluate(0.75, 0.25);
    // i = 3, j = 1
    expect(mesh.getPosition(16)).toBeCloseToVector(expected);
  });

  it("rejects a resolution below one", () => {
    expect(() => generatePetal(mergePetalParams({ resolution: 0 }))).toThrow(
      "Petal resolution must be an integer ≥ 1, got 0",
    );
  });

  it("rejects negative widths", () => {
    expect(() => generatePetal(mergePetalParams({ width: -1 }))).toThrow(
      "Petal widths must be non-negative, got width -1, base 0.4",
    );
  });
});

describe("generateSepal", () => {
  it("uses the green, back-curled sepal defaults", () => {
    const mesh = generateSepal({ resolution: 4 });
    expect(mesh.colors.slice(0, 3)).toEqual([...SEPAL_GREEN]);
    // Tip of the midrib curls toward -Z
    expect(mesh.getPosition(14).z).toBeLessThan(0);
  });

  it("accepts overrides", () => {
    const mesh = generateSepal({ resolution: 2 });
    expect(mesh.vertexCount).toBe(2 * 3 * 3);
  });
});
