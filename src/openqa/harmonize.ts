// src/openqa/harmonize.ts
import { z } from "zod";
import { CropTableRowSchema, RainfallGridSchema } from "./schemas.js";
import type { Bounds, Crop, CropTableRow, HarmonizedRecord, MetricKind, RainfallGrid, Region } from "./schemas.js";
import type { RawDatasetLoader, SourceMeta } from "./types.js";
import type { Taxonomy } from "./taxonomy.js";
import { DatasetBuildError, errorMessage } from "./errors.js";

const DEFAULT_MISSING_VALUE = -999;
const NUMBERED_PREFIX = /^\s*\d+\s*[.)]\s*/;
const CROP_YEAR = /\b((?:19|20)\d{2})\b/;

export interface BuildReport {
  records: Record<MetricKind, number>;
  droppedRows: number;
  unresolvedNames: string[];
  droppedCrops: string[];
  collisions: number;
  rainfallRegions: string[];
}

export type DatasetSources = { rainfall: SourceMeta; crops: SourceMeta };

export type ProductionFilter = { region: Region; crop?: Crop; years?: number[] };

function keyOf(metric: MetricKind, region: Region, year: number, crop: Crop | null): string {
  return `${metric}|${region.id}|${year}|${crop?.name ?? ""}`;
}

function compareRecords(a: HarmonizedRecord, b: HarmonizedRecord): number {
  return a.metric.localeCompare(b.metric)
    || a.region.id.localeCompare(b.region.id)
    || a.year - b.year
    || (a.crop?.name ?? "").localeCompare(b.crop?.name ?? "");
}

/** Read-only (region, year, crop, metric) table. */
export class HarmonizedDataset {
  readonly records: readonly HarmonizedRecord[];
  private readonly byKey: Map<string, HarmonizedRecord>;
  private readonly yearsByMetric: Record<MetricKind, number[]>;

  constructor(records: HarmonizedRecord[], readonly report: BuildReport, readonly sources: DatasetSources) {
    this.records = [...records].sort(compareRecords);
    this.byKey = new Map(this.records.map(r => [keyOf(r.metric, r.region, r.year, r.crop), r]));
    const yearsOf = (metric: MetricKind) =>
      [...new Set(this.records.filter(r => r.metric === metric).map(r => r.year))].sort((a, b) => a - b);
    this.yearsByMetric = { rainfall_mm: yearsOf("rainfall_mm"), production_tonnes: yearsOf("production_tonnes") };
  }

  years(metric: MetricKind): number[] {
    return [...this.yearsByMetric[metric]];
  }

  rainfall(region: Region, year: number): number | null {
    return this.byKey.get(keyOf("rainfall_mm", region, year, null))?.value ?? null;
  }

  /** District records; a state filter matches every district of that state. */
  production(filter: ProductionFilter): HarmonizedRecord[] {
    const years = filter.years ? new Set(filter.years) : null;
    return this.records.filter(r =>
      r.metric === "production_tonnes"
      && (r.region.id === filter.region.id || (filter.region.kind === "state" && r.region.parent === filter.region.name))
      && (!filter.crop || r.crop?.name === filter.crop.name)
      && (!years || years.has(r.year)));
  }
}

// ---------- Rainfall ----------
/** Per-cell annual sum of valid daily values; null where no day is valid. */
export function annualCellTotals(grid: RainfallGrid): Array<Array<number | null>> {
  const sentinel = grid.missingValue ?? DEFAULT_MISSING_VALUE;
  const totals = grid.lats.map(() => grid.lons.map((): number | null => null));
  for (const day of grid.values) {
    day.forEach((row, i) => row.forEach((v, j) => {
      if (v === null || !Number.isFinite(v) || v === sentinel) return;
      totals[i][j] = (totals[i][j] ?? 0) + v;
    }));
  }
  return totals;
}

/** cos(latitude)-weighted mean of the valid cells inside `bounds`. */
export function regionalMean(grid: RainfallGrid, totals: Array<Array<number | null>>, bounds: Bounds): number | null {
  const [lonMin, lonMax, latMin, latMax] = bounds;
  let weighted = 0, weights = 0;
  grid.lats.forEach((lat, i) => {
    if (lat < latMin || lat > latMax) return;
    const w = Math.cos((lat * Math.PI) / 180);
    grid.lons.forEach((lon, j) => {
      const t = totals[i][j];
      if (lon < lonMin || lon > lonMax || t === null) return;
      weighted += w * t;
      weights += w;
    });
  });
  return weights > 0 ? weighted / weights : null;
}

// ---------- Crop table ----------
/** "3. Punjab" → "Punjab" */
export function cleanName(s: string): string {
  return s.replace(NUMBERED_PREFIX, "").trim();
}

/** 2019, "2019", "2019 - 2020" → 2019 */
export function parseCropYear(y: number | string): number | null {
  if (typeof y === "number") return Number.isInteger(y) ? y : null;
  const m = CROP_YEAR.exec(y);
  return m ? Number(m[1]) : null;
}

/** 1200, "1,200", " 1 200.5 " → number; empty, "NA", "-" → null */
export function parseQuantity(v: number | string | null | undefined): number | null {
  if (v === null || v === undefined) return null;
  if (typeof v === "number") return Number.isFinite(v) ? v : null;
  const s = v.replace(/[,\s]/g, "");
  return /^-?\d+(?:\.\d+)?$/.test(s) ? Number(s) : null;
}

// ---------- Build ----------
export function harmonize(
  grids: RainfallGrid[],
  rows: CropTableRow[],
  taxonomy: Taxonomy,
  sources: DatasetSources,
): HarmonizedDataset {
  const table = new Map<string, HarmonizedRecord>();
  let collisions = 0;
  const put = (rec: HarmonizedRecord) => {
    const k = keyOf(rec.metric, rec.region, rec.year, rec.crop);
    if (table.has(k)) {
      collisions++;
      console.warn(`[harmonize] duplicate ${k}; keeping the last loaded value`);
    }
    table.set(k, rec);
  };

  const boxed = [...taxonomy.states, ...taxonomy.districts].filter(
    (r): r is Region & { bounds: Bounds } => r.bounds !== undefined,
  );
  const covered = new Set<string>();
  for (const grid of grids) {
    const totals = annualCellTotals(grid);
    for (const region of boxed) {
      const value = regionalMean(grid, totals, region.bounds);
      if (value === null) continue;
      covered.add(region.name);
      put({ region, year: grid.year, crop: null, metric: "rainfall_mm", value });
    }
  }

  let droppedRows = 0;
  const unresolvedNames = new Set<string>();
  const droppedCrops = new Set<string>();
  const cropByColumn = new Map<string, Crop | null>();
  const cropFor = (column: string): Crop | null => {
    if (!cropByColumn.has(column)) {
      const r = taxonomy.resolveCrop(cleanName(column));
      cropByColumn.set(column, r.ok ? r.value : null);
      if (!r.ok) droppedCrops.add(column);
    }
    return cropByColumn.get(column) ?? null;
  };

  for (const row of rows) {
    const stateName = cleanName(row.state);
    const districtName = cleanName(row.district);
    const year = parseCropYear(row.year);
    const state = taxonomy.resolveRegion(stateName, { kind: "state" });
    if (!state.ok) {
      droppedRows++;
      unresolvedNames.add(stateName);
      continue;
    }
    const district = taxonomy.resolveRegion(districtName, { kind: "district", parentState: state.value.name });
    if (!district.ok) {
      droppedRows++;
      unresolvedNames.add(`${districtName} (${state.value.name})`);
      continue;
    }
    if (year === null) {
      droppedRows++;
      continue;
    }
    for (const [column, raw] of Object.entries(row.production)) {
      const crop = cropFor(column);
      const value = parseQuantity(raw);
      if (!crop || value === null) continue;
      put({ region: district.value, year, crop, metric: "production_tonnes", value });
    }
  }

  const records = [...table.values()];
  const count = (m: MetricKind) => records.filter(r => r.metric === m).length;
  const report: BuildReport = {
    records: { rainfall_mm: count("rainfall_mm"), production_tonnes: count("production_tonnes") },
    droppedRows,
    unresolvedNames: [...unresolvedNames],
    droppedCrops: [...droppedCrops],
    collisions,
    rainfallRegions: [...covered].sort(),
  };
  console.log(
    `[harmonize] ${report.records.rainfall_mm} rainfall + ${report.records.production_tonnes} production records; ` +
    `dropped ${droppedRows} rows and ${droppedCrops.size} crop columns; ${collisions} collisions`,
  );
  return new HarmonizedDataset(records, report, sources);
}

export async function buildHarmonizedDataset(loader: RawDatasetLoader, taxonomy: Taxonomy): Promise<HarmonizedDataset> {
  let grids: RainfallGrid[];
  let rows: CropTableRow[];
  try {
    const [rawGrids, rawRows] = await Promise.all([loader.loadRainfall(), loader.loadCropTable()]);
    grids = z.array(RainfallGridSchema).parse(rawGrids);
    rows = z.array(CropTableRowSchema).parse(rawRows);
  } catch (e: unknown) {
    throw new DatasetBuildError(`could not load raw datasets: ${errorMessage(e)}`, { cause: e });
  }
  const dataset = harmonize(grids, rows, taxonomy, loader.sources);
  if (!dataset.records.length) throw new DatasetBuildError("harmonized table is empty");
  return dataset;
}
