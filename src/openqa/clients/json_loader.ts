// src/openqa/clients/json_loader.ts
// Reads the gridded rainfall and district crop tables from JSON exports.
// Rainfall file: RainfallGrid[] (JSON has no NaN; missing cells are null or the sentinel).
// Crop file: CropTableRow[] with the production columns keyed by crop name.

import { z } from "zod";
import { CropTableRowSchema, RainfallGridSchema } from "../schemas.js";
import type { CropTableRow, RainfallGrid } from "../schemas.js";
import type { RawDatasetLoader, SourceMeta } from "../types.js";
import { readJsonFile, resolveDataPath } from "../data_files.js";

export const DEFAULT_SOURCES: RawDatasetLoader["sources"] = {
  rainfall: {
    dataset: "IMD Rainfall Data",
    source: "India Meteorological Department",
    resolution: "0.25° gridded daily",
  },
  crops: {
    dataset: "Agriculture Production Data",
    source: "Directorate of Economics and Statistics",
    resolution: "district, crop year",
  },
};

export interface JsonLoaderArgs {
  rainfallPath: string;   // absolute, or relative to data/
  cropPath: string;
  /** fixed citation metadata; without it the rainfall resolution is read off the grid */
  sources?: { rainfall: SourceMeta; crops: SourceMeta };
}

/** "1° gridded daily" for a grid whose latitudes step by 1; null when the step can't be read. */
export function gridResolution(grids: RainfallGrid[]): string | null {
  const grid = grids.find(g => g.lats.length > 1);
  if (!grid) return null;
  const step = Math.abs(grid.lats[1] - grid.lats[0]);
  return step > 0 ? `${Number(step.toFixed(3))}° gridded daily` : null;
}

async function readArray<T extends z.ZodTypeAny>(path: string, schema: T, what: string): Promise<z.infer<T>[]> {
  const file = resolveDataPath(path);
  const parsed = z.array(schema).safeParse(await readJsonFile(file));
  if (!parsed.success) {
    const issues = parsed.error.issues.slice(0, 5).map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`${what} file ${file} is malformed: ${issues}`);
  }
  console.log(`[loader] ${what}: ${parsed.data.length} entries from ${file}`);
  return parsed.data;
}

export class JsonFileLoader implements RawDatasetLoader {
  sources: { rainfall: SourceMeta; crops: SourceMeta };

  constructor(private readonly args: JsonLoaderArgs) {
    this.sources = args.sources ?? DEFAULT_SOURCES;
  }

  async loadRainfall(): Promise<RainfallGrid[]> {
    const grids = await readArray(this.args.rainfallPath, RainfallGridSchema, "rainfall");
    const resolution = gridResolution(grids);
    if (!this.args.sources && resolution) {
      this.sources = { ...this.sources, rainfall: { ...this.sources.rainfall, resolution } };
    }
    return grids;
  }

  loadCropTable(): Promise<CropTableRow[]> {
    return readArray(this.args.cropPath, CropTableRowSchema, "crop table");
  }
}
