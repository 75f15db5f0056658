/**
 * Procedural flower and inflorescence geometry.
 *
 * @example
 * ```ts
 * import { generate, getPreset } from "@petalforge/procgen";
 *
 * const { buffers, stats } = generate(getPreset("lily-raceme"));
 * console.log(stats.flowerCount, buffers.positions.length / 3);
 * ```
 */

export * from "./mesh/index.js";
export * from "./math/index.js";
export * from "./geometry/index.js";
export * from "./components/index.js";
export * from "./diagram/index.js";
export * from "./inflorescence/index.js";
export * from "./generation/index.js";
export { DEFAULT_ENGINE_CONFIG, mergeEngineConfig, type EngineConfig } from "./config.js";
export { GenerationError, RecursionDepthError, SupersededRequestError } from "./errors.js";
