/**
 * Named Presets
 *
 * Complete generation requests for well-known flowers and inflorescences,
 * read from `presets/flowers.json` and validated with the request schema on
 * first use.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { GenerationError } from "../errors.js";
import { GenerationRequestSchema, formatIssues, type GenerationRequest } from "./schema.js";

const PRESET_FILE = new URL("../presets/flowers.json", import.meta.url);

const PresetSchema = z.object({
  label: z.string().min(1),
  description: z.string(),
  request: GenerationRequestSchema,
});

const PresetFileSchema = z.record(PresetSchema);

export type Preset = z.output<typeof PresetSchema>;

export interface PresetSummary {
  name: string;
  label: string;
  description: string;
  /** Whether the preset builds an inflorescence */
  inflorescence: boolean;
}

let cache: Record<string, Preset> | null = null;

function loadPresets(): Record<string, Preset> {
  if (cache) return cache;

  const raw: unknown = JSON.parse(readFileSync(PRESET_FILE, "utf8"));
  const parsed = PresetFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new GenerationError("Preset file is invalid", formatIssues(parsed.error));
  }
  cache = parsed.data;
  return cache;
}

export function listPresets(): PresetSummary[] {
  return Object.entries(loadPresets()).map(([name, preset]) => ({
    name,
    label: preset.label,
    description: preset.description,
    inflorescence: preset.request.inflorescence?.enabled ?? false,
  }));
}

/**
 * Request for a named preset, or undefined when no preset has that name.
 */
export function getPreset(name: string): GenerationRequest | undefined {
  const preset = loadPresets()[name];
  if (!preset) {
    console.warn(`[Presets] Unknown preset "${name}"`);
    return undefined;
  }
  return structuredClone(preset.request);
}
