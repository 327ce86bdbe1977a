// src/openqa/config.ts
import { z } from "zod";

export type AppConfig = {
  port: number;
  rainfallPath: string;
  cropPath: string;
  taxonomyPath?: string;
  concurrency: number;
  fuzzyThreshold: number;
};

const Env = z.object({
  PORT: z.coerce.number().int().positive().default(8788),
  AGRI_RAINFALL_JSON: z.string().min(1).default("sample/rainfall.json"),
  AGRI_CROP_JSON: z.string().min(1).default("sample/crop_production.json"),
  AGRI_TAXONOMY_JSON: z.string().min(1).optional(),
  AGRI_QA_CONCURRENCY: z.coerce.number().int().min(1).max(32).default(4),
  AGRI_FUZZY_THRESHOLD: z.coerce.number().gt(0).max(1).default(0.75),
});

// Blank variables count as unset
function present(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(env)) if (v !== undefined && v.trim() !== "") out[k] = v.trim();
  return out;
}

/**
 * Dataset paths are absolute, or relative to `data/`.
 * `AGRI_TAXONOMY_JSON` unset means the bundled `data/taxonomy.json`.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const e = Env.parse(present(env));
  return {
    port: e.PORT,
    rainfallPath: e.AGRI_RAINFALL_JSON,
    cropPath: e.AGRI_CROP_JSON,
    ...(e.AGRI_TAXONOMY_JSON ? { taxonomyPath: e.AGRI_TAXONOMY_JSON } : {}),
    concurrency: e.AGRI_QA_CONCURRENCY,
    fuzzyThreshold: e.AGRI_FUZZY_THRESHOLD,
  };
}
