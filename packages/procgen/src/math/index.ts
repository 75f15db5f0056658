/**
 * Math utilities for flower and inflorescence generation.
 */

export {
  TAU,
  lerp,
  clamp,
  smoothstep,
  remap,
  degToRad,
  radToDeg,
  normalizeAngle,
  fromCylindrical,
  toCylindrical,
  fromSpherical,
  toSpherical,
  rotate2D,
  fromPolar2D,
  toPolar2D,
  anyPerpendicular,
  type Cylindrical,
  type Spherical,
} from "./Vector.js";
export {
  quadraticBezier2D,
  quadraticBezier3D,
  quadraticBezierDerivative2D,
  quadraticBezierDerivative3D,
  cubicBezier2D,
  cubicBezier3D,
  cubicBezierDerivative2D,
  cubicBezierDerivative3D,
  sampleCubicBezier2D,
  sampleCubicBezier3D,
  sampleQuadraticBezier3D,
} from "./Bezier.js";
export {
  catmullRomPoint,
  catmullRomTangent,
  sampleCatmullRomCurve,
} from "./CatmullRom.js";
export {
  basisFunction,
  generateKnotVector,
  validateKnotVector,
  BSplineSurface,
} from "./BSpline.js";
export {
  GOLDEN_ANGLE,
  GOLDEN_ANGLE_DEGREES,
  ANGLE_180,
  ANGLE_90,
  ANGLE_120,
  ANGLE_144,
  radiusFactor,
  fibonacciAngle,
  evenlySpaced,
  goldenSpiral,
  customSpaced,
  vogelSpiral,
  radialPositions,
  whorledPositions,
  fibonacciSpiral3d,
  type RadiusLaw,
} from "./Phyllotaxis.js";
export {
  resampleUniformY,
  computeSecondDerivativesX,
  determineDepthSigns,
  integrateTwice,
  reconstructCurve3d,
  type UniformSamples,
} from "./CurveReconstruction.js";
export { AxisCurve, type AxisSample } from "./AxisCurve.js";
export {
  hashSeed,
  hashWords,
  createRng,
  keyedRandom,
  type RNG,
} from "./Random.js";
