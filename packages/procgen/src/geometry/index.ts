/**
 * Shell and tube geometry shared by the component generators.
 */

export {
  surfaceOfRevolution,
  createCylinder,
  createCone,
  createUvSphere,
} from "./Revolution.js";
export {
  sweepAlongCurve,
  computeTransportFrames,
  type SweepOptions,
  type RadiusFunction,
  type CurveFrame,
} from "./Sweep.js";
