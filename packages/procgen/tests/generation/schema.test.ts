/**
 * Tests for request validation.
 */

import { describe, it, expect } from "vitest";
import { GenerationRequestSchema } from "../../src/generation/schema.js";
import { parseRequest } from "../../src/generation/FlowerEngine.js";
import { GenerationError } from "../../src/errors.js";
import { layoutInflorescence } from "../../src/inflorescence/InflorescenceAssembly.js";
import {
  DEFAULT_PETAL_PARAMS,
  DEFAULT_RECEPTACLE_PARAMS,
} from "../../src/components/types.js";

const minimal = { diagram: { receptacleHeight: 1, receptacleRadius: 0.3 } };

describe("GenerationRequestSchema", () => {
  it("fills every default", () => {
    const request = GenerationRequestSchema.parse(minimal);
    expect(request.diagram.petalWhorls).toEqual([]);
    expect(request.diagram.jitterSeed).toBe(0);
    expect(request.receptacle.segments).toBe(DEFAULT_RECEPTACLE_PARAMS.segments);
    expect(request.petal.length).toBe(DEFAULT_PETAL_PARAMS.length);
    expect(request.sepal).toBeUndefined();
    expect(request.inflorescence).toBeUndefined();
    expect(request.aging).toEqual({ enabled: true, includeWilt: true });
  });

  it("fills whorl defaults", () => {
    const request = GenerationRequestSchema.parse({
      diagram: { ...minimal.diagram, petalWhorls: [{ count: 5, radius: 1, height: 0.8 }] },
    });
    expect(request.diagram.petalWhorls[0]).toEqual({
      count: 5,
      radius: 1,
      height: 0.8,
      arrangement: { kind: "evenlySpaced" },
      rotationOffset: 0,
      tiltAngle: 0,
    });
  });

  it("keeps inflorescences disabled unless asked", () => {
    const request = GenerationRequestSchema.parse({ ...minimal, inflorescence: {} });
    expect(request.inflorescence?.enabled).toBe(false);
    expect(request.inflorescence?.pattern).toBe("Raceme");
    expect(request.inflorescence?.branchCount).toBe(12);
  });
});

describe("recursive pattern defaults", () => {
  it("applies the pattern's defaults to omitted recursion fields", () => {
    const request = GenerationRequestSchema.parse({
      ...minimal,
      inflorescence: { enabled: true, pattern: "Drepanium" },
    });
    expect(request.inflorescence?.branchRatio).toBe(0.8);
    expect(request.inflorescence?.angleDivergence).toBe(137.5);
    expect(request.inflorescence?.recursionDepth).toBe(1);
  });

  it("keeps values the caller gave", () => {
    const request = GenerationRequestSchema.parse({
      ...minimal,
      inflorescence: { pattern: "Dichasium", angleDivergence: 10, branchRatio: 0.6 },
    });
    expect(request.inflorescence?.angleDivergence).toBe(10);
    expect(request.inflorescence?.branchRatio).toBe(0.6);
  });

  it("forks a default dichasium into distinct flowers", () => {
    const request = parseRequest({
      ...minimal,
      inflorescence: { enabled: true, pattern: "Dichasium", recursionDepth: 2 },
    });
    if (!request.inflorescence) throw new Error("inflorescence missing");
    expect(request.inflorescence.angleDivergence).toBe(30);

    const flowers = layoutInflorescence(request.inflorescence).flowers;
    const keys = new Set(
      flowers.map((f) => f.position.toArray().map((c) => c.toFixed(6)).join(",")),
    );
    expect(flowers).toHaveLength(7);
    expect(keys.size).toBe(7);
  });
});

describe("axis profile", () => {
  it("rejects a profile whose height falls", () => {
    try {
      parseRequest({
        ...minimal,
        inflorescence: {
          axisProfile: [
            [0, 0],
            [0.1, 2],
            [0, 1],
          ],
        },
      });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GenerationError);
      if (!(error instanceof GenerationError)) return;
      expect(error.issues).toEqual([
        "inflorescence.axisProfile.2: Height must not decrease: point 2 is below point 1",
      ]);
    }
  });

  it("rejects a flat profile", () => {
    expect(() =>
      parseRequest({
        ...minimal,
        inflorescence: {
          axisProfile: [
            [0, 1],
            [1, 1],
            [2, 1],
          ],
        },
      }),
    ).toThrow("inflorescence.axisProfile: Profile has no vertical extent");
  });

  it("accepts a rising profile", () => {
    const request = parseRequest({
      ...minimal,
      inflorescence: {
        axisProfile: [
          [0, 0],
          [0.2, 1],
          [0.1, 2],
        ],
      },
    });
    expect(request.inflorescence?.axisProfile).toHaveLength(3);
  });
});

describe("parseRequest", () => {
  it("reports each problem as a path and a message", () => {
    try {
      parseRequest({ diagram: { receptacleHeight: -1, receptacleRadius: 0.3 } });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GenerationError);
      if (!(error instanceof GenerationError)) return;
      expect(error.issues).toEqual(["diagram.receptacleHeight: Number must be greater than 0"]);
      expect(error.message).toBe(
        "Invalid generation request:\n  - diagram.receptacleHeight: Number must be greater than 0",
      );
    }
  });

  it("names the root when the document is not an object", () => {
    try {
      parseRequest(null);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(GenerationError);
      if (!(error instanceof GenerationError)) return;
      expect(error.issues).toEqual(["(root): Expected object, received null"]);
    }
  });

  it("rejects unknown patterns and fractional counts", () => {
    expect(() =>
      parseRequest({ ...minimal, inflorescence: { pattern: "Panicle" } }),
    ).toThrow(GenerationError);
    expect(() =>
      parseRequest({ ...minimal, inflorescence: { branchCount: 2.5 } }),
    ).toThrow("inflorescence.branchCount");
  });

  it("rejects colors outside 0-1", () => {
    expect(() => parseRequest({ ...minimal, petal: { color: [1.5, 0, 0] } })).toThrow(
      "petal.color.0",
    );
  });
});
