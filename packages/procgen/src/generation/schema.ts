/**
 * Generation Request Schema
 *
 * Zod description of the parameter document accepted by `generate`. Every
 * field that has an engine default may be omitted.
 */

import { z } from "zod";
import {
  DEFAULT_PETAL_PARAMS,
  DEFAULT_PISTIL_PARAMS,
  DEFAULT_RECEPTACLE_PARAMS,
  DEFAULT_SEPAL_PARAMS,
  DEFAULT_STAMEN_PARAMS,
} from "../components/types.js";
import {
  DEFAULT_INFLORESCENCE_PARAMS,
  getRecursiveDefaults,
} from "../inflorescence/types.js";

// ============================================================================
// PRIMITIVES
// ============================================================================

const finite = z.number().finite();
const positive = finite.positive();
const nonNegative = finite.min(0);
const count = z.number().int().min(0);
const segments = z.number().int().min(3);

export const ColorSchema = z.tuple([
  finite.min(0).max(1),
  finite.min(0).max(1),
  finite.min(0).max(1),
]);

export const Vec3Schema = z.tuple([finite, finite, finite]);

// ============================================================================
// DIAGRAM
// ============================================================================

export const ArrangementSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("evenlySpaced") }),
  z.object({ kind: z.literal("goldenSpiral") }),
  z.object({ kind: z.literal("customOffset"), step: finite }),
]);

export const WhorlSchema = z.object({
  count,
  radius: nonNegative,
  height: finite.min(0).max(1),
  arrangement: ArrangementSchema.default({ kind: "evenlySpaced" }),
  rotationOffset: finite.default(0),
  tiltAngle: finite.default(0),
});

export const DiagramSchema = z.object({
  receptacleHeight: positive,
  receptacleRadius: nonNegative,
  petalWhorls: z.array(WhorlSchema).default([]),
  stamenWhorls: z.array(WhorlSchema).default([]),
  pistilWhorls: z.array(WhorlSchema).default([]),
  sepalWhorls: z.array(WhorlSchema).default([]),
  positionJitter: nonNegative.default(0),
  angleJitter: nonNegative.default(0),
  sizeJitter: nonNegative.default(0),
  jitterSeed: z.number().int().min(0).max(0xffffffff).default(0),
});

// ============================================================================
// COMPONENTS
// ============================================================================

export const ReceptacleSchema = z.object({
  height: positive.default(DEFAULT_RECEPTACLE_PARAMS.height),
  baseRadius: nonNegative.default(DEFAULT_RECEPTACLE_PARAMS.baseRadius),
  bulgeRadius: nonNegative.default(DEFAULT_RECEPTACLE_PARAMS.bulgeRadius),
  topRadius: nonNegative.default(DEFAULT_RECEPTACLE_PARAMS.topRadius),
  bulgePosition: finite.min(0).max(1).default(DEFAULT_RECEPTACLE_PARAMS.bulgePosition),
  segments: segments.default(DEFAULT_RECEPTACLE_PARAMS.segments),
  profileSamples: z.number().int().min(2).default(DEFAULT_RECEPTACLE_PARAMS.profileSamples),
  color: ColorSchema.default([...DEFAULT_RECEPTACLE_PARAMS.color]),
});

const curvePoints = z.array(Vec3Schema).min(4);

export const PistilSchema = z.object({
  length: positive.default(DEFAULT_PISTIL_PARAMS.length),
  baseRadius: nonNegative.default(DEFAULT_PISTIL_PARAMS.baseRadius),
  tipRadius: nonNegative.default(DEFAULT_PISTIL_PARAMS.tipRadius),
  stigmaRadius: nonNegative.default(DEFAULT_PISTIL_PARAMS.stigmaRadius),
  segments: segments.default(DEFAULT_PISTIL_PARAMS.segments),
  color: ColorSchema.default([...DEFAULT_PISTIL_PARAMS.color]),
  bend: nonNegative.default(DEFAULT_PISTIL_PARAMS.bend),
  droop: finite.min(-1).max(1).default(DEFAULT_PISTIL_PARAMS.droop),
  styleCurve: curvePoints.optional(),
});

export const StamenSchema = z.object({
  filamentLength: positive.default(DEFAULT_STAMEN_PARAMS.filamentLength),
  filamentRadius: nonNegative.default(DEFAULT_STAMEN_PARAMS.filamentRadius),
  antherLength: nonNegative.default(DEFAULT_STAMEN_PARAMS.antherLength),
  antherWidth: nonNegative.default(DEFAULT_STAMEN_PARAMS.antherWidth),
  antherHeight: nonNegative.default(DEFAULT_STAMEN_PARAMS.antherHeight),
  segments: segments.default(DEFAULT_STAMEN_PARAMS.segments),
  color: ColorSchema.default([...DEFAULT_STAMEN_PARAMS.color]),
  bend: nonNegative.default(DEFAULT_STAMEN_PARAMS.bend),
  droop: finite.min(-1).max(1).default(DEFAULT_STAMEN_PARAMS.droop),
  filamentCurve: curvePoints.optional(),
});

function bladeSchema(defaults: typeof DEFAULT_PETAL_PARAMS) {
  return z.object({
    length: positive.default(defaults.length),
    width: nonNegative.default(defaults.width),
    tipSharpness: nonNegative.default(defaults.tipSharpness),
    baseWidth: nonNegative.default(defaults.baseWidth),
    curl: finite.default(defaults.curl),
    twist: finite.default(defaults.twist),
    ruffleFreq: nonNegative.default(defaults.ruffleFreq),
    ruffleAmp: finite.default(defaults.ruffleAmp),
    lateralCurve: finite.default(defaults.lateralCurve),
    resolution: z.number().int().min(1).default(defaults.resolution),
    color: ColorSchema.default([...defaults.color]),
  });
}

export const PetalSchema = bladeSchema(DEFAULT_PETAL_PARAMS);
export const SepalSchema = bladeSchema(DEFAULT_SEPAL_PARAMS);

// ============================================================================
// INFLORESCENCE
// ============================================================================

const inflorescenceDefaults = DEFAULT_INFLORESCENCE_PARAMS;

export const PatternSchema = z.enum([
  "Raceme",
  "Spike",
  "Umbel",
  "Corymb",
  "Dichasium",
  "Drepanium",
  "CompoundRaceme",
  "CompoundUmbel",
]);

/** (lateral, vertical) sketch; heights must rise overall and never fall */
export const AxisProfileSchema = z
  .array(z.tuple([finite, finite]))
  .min(3)
  .superRefine((profile, ctx) => {
    if (profile.length < 2) return;
    for (let i = 1; i < profile.length; i++) {
      if (profile[i][1] < profile[i - 1][1]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [i],
          message: `Height must not decrease: point ${i} is below point ${i - 1}`,
        });
      }
    }
    if (profile[profile.length - 1][1] <= profile[0][1]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "Profile has no vertical extent",
      });
    }
  });

export const InflorescenceSchema = z.object({
  enabled: z.boolean().default(false),
  pattern: PatternSchema.default(inflorescenceDefaults.pattern),
  axisLength: positive.default(inflorescenceDefaults.axisLength),
  branchCount: count.default(inflorescenceDefaults.branchCount),
  angleTop: finite.default(inflorescenceDefaults.angleTop),
  angleBottom: finite.default(inflorescenceDefaults.angleBottom),
  branchLengthTop: nonNegative.default(inflorescenceDefaults.branchLengthTop),
  branchLengthBottom: nonNegative.default(inflorescenceDefaults.branchLengthBottom),
  rotationAngle: finite.default(inflorescenceDefaults.rotationAngle),
  flowerSizeTop: positive.default(inflorescenceDefaults.flowerSizeTop),
  flowerSizeBottom: positive.default(inflorescenceDefaults.flowerSizeBottom),
  /** Omitted recursion fields take the pattern's recursive defaults */
  recursionDepth: z.number().int().min(1).optional(),
  branchRatio: positive.optional(),
  angleDivergence: finite.optional(),
  ageDistribution: finite.min(0).max(1).default(inflorescenceDefaults.ageDistribution),
  axisCurveAmount: nonNegative.default(inflorescenceDefaults.axisCurveAmount),
  axisCurveDirection: Vec3Schema.default([...inflorescenceDefaults.axisCurveDirection]),
  branchCurveAmount: nonNegative.default(inflorescenceDefaults.branchCurveAmount),
  branchCurveMode: z
    .enum(["Uniform", "GradientUp", "GradientDown"])
    .default(inflorescenceDefaults.branchCurveMode),
  subBranchCount: count.optional(),
  axisProfile: AxisProfileSchema.optional(),
  stemColor: ColorSchema.default([...inflorescenceDefaults.stemColor]),
}).transform((inflorescence) => {
  const recursive = getRecursiveDefaults(inflorescence.pattern);
  return {
    ...inflorescence,
    recursionDepth: inflorescence.recursionDepth ?? recursive.recursionDepth,
    branchRatio: inflorescence.branchRatio ?? recursive.branchRatio,
    angleDivergence: inflorescence.angleDivergence ?? recursive.angleDivergence,
  };
});

export const AgingSchema = z.object({
  /** Use bud and wilt variants; bloom everywhere when false */
  enabled: z.boolean().default(true),
  includeWilt: z.boolean().default(true),
});

// ============================================================================
// REQUEST
// ============================================================================

export const GenerationRequestSchema = z.object({
  diagram: DiagramSchema,
  receptacle: ReceptacleSchema.default({}),
  pistil: PistilSchema.default({}),
  stamen: StamenSchema.default({}),
  petal: PetalSchema.default({}),
  sepal: SepalSchema.optional(),
  inflorescence: InflorescenceSchema.optional(),
  maxRecursionDepth: z.number().int().min(1).optional(),
  aging: AgingSchema.default({}),
});

/** Request as written by a caller */
export type GenerationRequestInput = z.input<typeof GenerationRequestSchema>;
/** Request with every default filled in */
export type GenerationRequest = z.output<typeof GenerationRequestSchema>;
export type InflorescenceRequest = z.output<typeof InflorescenceSchema>;

/**
 * Zod issues as `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${path}: ${issue.message}`;
  });
}
