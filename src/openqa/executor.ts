// src/openqa/executor.ts
import type {
  AnswerFragment, Citation, CorrelationResult, CropRankResult, CrossStateCompareResult, Crop,
  DistrictExtremeResult, Failure, IntentResult, MetricKind, PolicyArgument, PolicyArgumentResult,
  RainfallAggregateResult, RainfallCompareResult, Region, TrendResult,
} from "./schemas.js";
import type { QueryIntent, YearScope } from "./types.js";
import type { HarmonizedDataset } from "./harmonize.js";
import { describeYears, productionCitation, rainfallCitation } from "./citations.js";
import { mean, ols, pearsonR } from "./stats.js";

type Outcome<T> =
  | { ok: true; result: T; citations: Citation[] }
  | { ok: false; failure: Failure; citations: Citation[]; partial?: DistrictExtremeResult };

type Point = { year: number; value: number };

const MAX_POLICY_ARGUMENTS = 3;
const FLAT_BAND = 0.01;

// ---------- Year scopes ----------
export function resolveYears(scope: YearScope, available: number[]): number[] {
  const avail = [...new Set(available)].sort((a, b) => a - b);
  switch (scope.kind) {
    case "all": return avail;
    case "years": return [...scope.years].sort((a, b) => a - b);
    case "range": {
      const { from, to } = scope;
      return avail.filter(y => (from === undefined || y >= from) && (to === undefined || y <= to));
    }
    case "last": return avail.slice(-scope.count);
    case "latest": return avail.length ? [avail[avail.length - 1]] : [];
  }
}

export function describeScope(scope: YearScope, resolved: number[]): string {
  if (resolved.length) return describeYears(resolved);
  switch (scope.kind) {
    case "all": return "any year";
    case "years": return describeYears(scope.years);
    case "range":
      if (scope.from !== undefined && scope.to !== undefined) return `${scope.from}-${scope.to}`;
      return scope.from !== undefined ? `${scope.from} onwards` : `years up to ${scope.to}`;
    case "last": return `the last ${scope.count} years`;
    case "latest": return "the latest year";
  }
}

// ---------- Failures ----------
function noData(metric: MetricKind, region: Region, when: string, subject?: string, years?: number[]): Failure {
  return {
    code: "NoDataForScope",
    message: `No ${metric} data for ${subject ? `${subject} in ` : ""}${region.name} for ${when}`,
    scope: { metric, region: region.name, ...(subject ? { crop: subject } : {}), ...(years ? { years } : {}) },
  };
}

function insufficient(message: string, region: Region, crop: Crop, years: number[]): Failure {
  return { code: "InsufficientSeries", message, scope: { region: region.name, crop: crop.name, years } };
}

type Failed = Extract<Outcome<never>, { ok: false }>;

function failed(failure: Failure, citations: Citation[] = []): Failed {
  return { ok: false, failure, citations };
}

// ---------- Shared computations ----------
function productionSeries(ds: HarmonizedDataset, region: Region, crop: Crop, years: number[]): Point[] {
  const byYear = new Map<number, number>();
  for (const r of ds.production({ region, crop, years })) byYear.set(r.year, (byYear.get(r.year) ?? 0) + r.value);
  return [...byYear.entries()].map(([year, value]) => ({ year, value })).sort((a, b) => a.year - b.year);
}

function rainfallPairs(ds: HarmonizedDataset, region: Region, series: Point[]) {
  return series.flatMap(p => {
    const mm = ds.rainfall(region, p.year);
    return mm === null ? [] : [{ year: p.year, rainfallMm: mm, productionTonnes: p.value }];
  });
}

function sharedYears(ds: HarmonizedDataset): number[] {
  const rain = new Set(ds.years("rainfall_mm"));
  return ds.years("production_tonnes").filter(y => rain.has(y));
}

function fmtTonnes(v: number): string {
  return `${Math.round(v).toLocaleString("en-US")} t`;
}

function signed(v: number, digits = 1): string {
  return `${v >= 0 ? "+" : ""}${v.toFixed(digits)}`;
}

// ---------- Rainfall ----------
function meanRainfall(ds: HarmonizedDataset, region: Region, scope: YearScope): Outcome<RainfallAggregateResult> {
  const years = resolveYears(scope, ds.years("rainfall_mm"));
  const perYear = years.flatMap(year => {
    const mm = ds.rainfall(region, year);
    return mm === null ? [] : [{ year, mm }];
  });
  if (!perYear.length) return failed(noData("rainfall_mm", region, describeScope(scope, years), undefined, years));
  const used = perYear.map(p => p.year);
  return {
    ok: true,
    result: { type: "rainfall_aggregate", region: region.name, years: used, meanAnnualMm: mean(perYear.map(p => p.mm)), perYear },
    citations: [rainfallCitation(ds.sources, region, used)],
  };
}

function compareRainfall(ds: HarmonizedDataset, regions: Region[], scope: YearScope): Outcome<RainfallCompareResult> {
  const rows: RainfallCompareResult["regions"] = [];
  const citations: Citation[] = [];
  for (const region of regions) {
    const one = meanRainfall(ds, region, scope);
    if (!one.ok) return failed(one.failure, citations);
    rows.push({ region: one.result.region, years: one.result.years, meanAnnualMm: one.result.meanAnnualMm });
    citations.push(...one.citations);
  }
  return {
    ok: true,
    result: { type: "rainfall_compare", regions: rows, differenceMm: rows[0].meanAnnualMm - rows[1].meanAnnualMm },
    citations,
  };
}

// ---------- Crops ----------
function rankCrops(ds: HarmonizedDataset, intent: Extract<QueryIntent, { type: "crop_rank" }>): Outcome<CropRankResult> {
  const years = resolveYears(intent.years, ds.years("production_tonnes"));
  const rankings: CropRankResult["rankings"] = [];
  const citations: Citation[] = [];
  for (const region of intent.regions) {
    const recs = ds.production({ region, years }).filter(r => !intent.category || r.crop?.category === intent.category);
    if (!recs.length) {
      return failed(noData("production_tonnes", region, describeScope(intent.years, years), intent.category, years), citations);
    }
    const totals = new Map<string, { crop: Crop; total: number }>();
    for (const r of recs) {
      if (!r.crop) continue;
      const t = totals.get(r.crop.name) ?? { crop: r.crop, total: 0 };
      t.total += r.value;
      totals.set(r.crop.name, t);
    }
    const crops = [...totals.values()]
      .sort((a, b) => b.total - a.total || a.crop.name.localeCompare(b.crop.name))
      .slice(0, intent.topN)
      .map(t => ({ crop: t.crop.name, category: t.crop.category, productionTonnes: t.total }));
    rankings.push({ region: region.name, crops });
    citations.push(productionCitation(ds.sources, region, [...new Set(recs.map(r => r.year))].sort((a, b) => a - b)));
  }
  return {
    ok: true,
    result: { type: "crop_rank", years, topN: intent.topN, ...(intent.category ? { category: intent.category } : {}), rankings },
    citations,
  };
}

function districtExtreme(
  ds: HarmonizedDataset, state: Region, crop: Crop, extreme: "highest" | "lowest", scope: YearScope,
): Outcome<DistrictExtremeResult> {
  const years = resolveYears(scope, ds.years("production_tonnes"));
  const recs = ds.production({ region: state, crop, years });
  if (!recs.length) return failed(noData("production_tonnes", state, describeScope(scope, years), crop.name, years));
  const totals = new Map<string, number>();
  for (const r of recs) totals.set(r.region.name, (totals.get(r.region.name) ?? 0) + r.value);
  const sign = extreme === "highest" ? -1 : 1;
  const [district, value] = [...totals.entries()].sort((a, b) => sign * (a[1] - b[1]) || a[0].localeCompare(b[0]))[0];
  const used = [...new Set(recs.map(r => r.year))].sort((a, b) => a - b);
  return {
    ok: true,
    result: { type: "district_extreme", state: state.name, crop: crop.name, extreme, years: used, district, productionTonnes: value },
    citations: [productionCitation(ds.sources, state, used, crop)],
  };
}

// ---------- Series ----------
function trend(ds: HarmonizedDataset, region: Region, crop: Crop, scope: YearScope): Outcome<TrendResult> {
  const years = resolveYears(scope, ds.years("production_tonnes"));
  const series = productionSeries(ds, region, crop, years);
  if (!series.length) return failed(noData("production_tonnes", region, describeScope(scope, years), crop.name, years));
  const used = series.map(p => p.year);
  const citations = [productionCitation(ds.sources, region, used, crop)];
  if (series.length < 2) {
    return failed(insufficient(
      `Need at least 2 years of production_tonnes data for ${crop.name} in ${region.name}; found only ${describeYears(used)}`,
      region, crop, used,
    ), citations);
  }
  const values = series.map(p => p.value);
  const fit = ols(used, values);
  const band = FLAT_BAND * Math.abs(mean(values));
  const first = values[0], last = values[values.length - 1];
  return {
    ok: true,
    result: {
      type: "trend", region: region.name, crop: crop.name,
      series: series.map(p => ({ year: p.year, productionTonnes: p.value })),
      slope: fit.slope, intercept: fit.intercept, r2: fit.r2,
      percentChange: first !== 0 ? ((last - first) / first) * 100 : null,
      direction: fit.slope > band ? "increasing" : fit.slope < -band ? "decreasing" : "flat",
    },
    citations,
  };
}

function correlate(ds: HarmonizedDataset, region: Region, crop: Crop, scope: YearScope): Outcome<CorrelationResult> {
  const years = resolveYears(scope, sharedYears(ds));
  const series = productionSeries(ds, region, crop, years);
  if (!series.length) return failed(noData("production_tonnes", region, describeScope(scope, years), crop.name, years));
  const pairs = rainfallPairs(ds, region, series);
  if (!pairs.length) return failed(noData("rainfall_mm", region, describeYears(series.map(p => p.year)), undefined, years));
  const used = pairs.map(p => p.year);
  const citations = [rainfallCitation(ds.sources, region, used), productionCitation(ds.sources, region, used, crop)];
  if (pairs.length < 2) {
    return failed(insufficient(
      `Need at least 2 years with both rainfall and ${crop.name} production in ${region.name}; found only ${describeYears(used)}`,
      region, crop, used,
    ), citations);
  }
  const { r, undefinedVariance } = pearsonR(pairs.map(p => p.rainfallMm), pairs.map(p => p.productionTonnes));
  if (undefinedVariance) {
    return failed(insufficient(
      `Rainfall or ${crop.name} production in ${region.name} does not vary over ${describeYears(used)}`,
      region, crop, used,
    ), citations);
  }
  const a = Math.abs(r);
  return {
    ok: true,
    result: {
      type: "correlation", region: region.name, crop: crop.name, pairs, r,
      strength: a < 0.3 ? "weak" : a < 0.7 ? "moderate" : "strong",
      direction: a < 0.1 ? "none" : r > 0 ? "positive" : "negative",
    },
    citations,
  };
}

// ---------- Policy ----------
function growthPerYear(series: Point[]): number | null {
  if (series.length < 2) return null;
  const m = mean(series.map(p => p.value));
  if (m === 0) return null;
  return (ols(series.map(p => p.year), series.map(p => p.value)).slope / m) * 100;
}

function rainfallR(ds: HarmonizedDataset, region: Region, series: Point[]): number | null {
  const pairs = rainfallPairs(ds, region, series);
  if (pairs.length < 2) return null;
  const { r, undefinedVariance } = pearsonR(pairs.map(p => p.rainfallMm), pairs.map(p => p.productionTonnes));
  return undefinedVariance ? null : r;
}

function districtCount(ds: HarmonizedDataset, region: Region, crop: Crop, year: number): number {
  return new Set(ds.production({ region, crop, years: [year] }).filter(r => r.value > 0).map(r => r.region.id)).size;
}

function policyArguments(
  ds: HarmonizedDataset, intent: Extract<QueryIntent, { type: "policy_argument" }>,
): Outcome<PolicyArgumentResult> {
  const { region, promote, over } = intent;
  const years = resolveYears(intent.years, ds.years("production_tonnes"));
  const a = productionSeries(ds, region, promote, years);
  const b = productionSeries(ds, region, over, years);
  const args: PolicyArgument[] = [];
  const citations: Citation[] = [];
  const favour = (promoteWins: boolean) => (promoteWins ? promote.name : over.name);

  const bByYear = new Map(b.map(p => [p.year, p.value]));
  const both = a.filter(p => bByYear.has(p.year));
  if (both.length) {
    const { year, value: va } = both[both.length - 1];
    const vb = bByYear.get(year) ?? 0;
    if (va !== vb) {
      args.push({
        basis: "recent_production",
        favours: favour(va > vb),
        margin: Math.abs(va - vb) / Math.max(va, vb),
        statement: `In ${year}, ${region.name} produced ${fmtTonnes(va)} of ${promote.name} against ${fmtTonnes(vb)} of ${over.name}.`,
      });
    }
  }

  const ga = growthPerYear(a), gb = growthPerYear(b);
  if (ga !== null && gb !== null && ga !== gb) {
    args.push({
      basis: "trend",
      favours: favour(ga > gb),
      margin: Math.abs(ga - gb) / (Math.abs(ga) + Math.abs(gb)),
      statement: `${promote.name} output changed by ${signed(ga)}% a year over ${describeYears(a.map(p => p.year))}, against ${signed(gb)}% a year for ${over.name}.`,
    });
  }

  const ra = rainfallR(ds, region, a), rb = rainfallR(ds, region, b);
  if (ra !== null && rb !== null) {
    citations.push(rainfallCitation(ds.sources, region, [...new Set([...a, ...b].map(p => p.year))].sort((x, y) => x - y)));
    if (Math.abs(ra) !== Math.abs(rb)) {
      const promoteWins = Math.abs(ra) < Math.abs(rb);
      const [steady, exposed] = promoteWins ? [[promote, ra], [over, rb]] as const : [[over, rb], [promote, ra]] as const;
      args.push({
        basis: "rainfall_correlation",
        favours: favour(promoteWins),
        margin: Math.abs(Math.abs(ra) - Math.abs(rb)),
        statement: `${steady[0].name} output is less tied to rainfall in ${region.name} (r = ${steady[1].toFixed(2)}) than ${exposed[0].name} (r = ${exposed[1].toFixed(2)}).`,
      });
    }
  }

  const latest = Math.max(...a.map(p => p.year), ...b.map(p => p.year));
  if (Number.isFinite(latest)) {
    const da = districtCount(ds, region, promote, latest), db = districtCount(ds, region, over, latest);
    if (da !== db) {
      args.push({
        basis: "district_spread",
        favours: favour(da > db),
        margin: Math.abs(da - db) / Math.max(da, db),
        statement: `In ${latest}, ${promote.name} was grown in ${da} district(s) of ${region.name} and ${over.name} in ${db}.`,
      });
    }
  }

  if (!args.length) {
    return failed(noData("production_tonnes", region, describeScope(intent.years, years), `${promote.name} and ${over.name}`, years));
  }
  const ranked = args
    .sort((x, y) => Number(y.favours === promote.name) - Number(x.favours === promote.name) || y.margin - x.margin)
    .slice(0, MAX_POLICY_ARGUMENTS);
  if (a.length) citations.push(productionCitation(ds.sources, region, a.map(p => p.year), promote));
  if (b.length) citations.push(productionCitation(ds.sources, region, b.map(p => p.year), over));
  return {
    ok: true,
    result: {
      type: "policy_argument", region: region.name, promote: promote.name, over: over.name,
      years: [...new Set([...a, ...b].map(p => p.year))].sort((x, y) => x - y),
      arguments: ranked,
    },
    citations,
  };
}

function compareAcrossStates(
  ds: HarmonizedDataset, intent: Extract<QueryIntent, { type: "cross_state_district_compare" }>,
): Outcome<CrossStateCompareResult> {
  const hi = districtExtreme(ds, intent.highest, intent.crop, "highest", intent.years);
  const lo = districtExtreme(ds, intent.lowest, intent.crop, "lowest", intent.years);
  if (!hi.ok && !lo.ok) {
    return failed({ ...hi.failure, message: `${hi.failure.message}; ${lo.failure.message}` });
  }
  if (!lo.ok) return { ok: false, failure: lo.failure, citations: hi.citations, partial: hi.ok ? hi.result : undefined };
  if (!hi.ok) return { ok: false, failure: hi.failure, citations: lo.citations, partial: lo.result };
  return {
    ok: true,
    result: { type: "cross_state_district_compare", crop: intent.crop.name, highest: hi.result, lowest: lo.result },
    citations: [...hi.citations, ...lo.citations],
  };
}

// ---------- Dispatch ----------
function run(intent: QueryIntent, ds: HarmonizedDataset): Outcome<IntentResult> {
  switch (intent.type) {
    case "rainfall_aggregate": return meanRainfall(ds, intent.region, intent.years);
    case "rainfall_compare": return compareRainfall(ds, intent.regions, intent.years);
    case "crop_rank": return rankCrops(ds, intent);
    case "district_extreme": return districtExtreme(ds, intent.state, intent.crop, intent.extreme, intent.years);
    case "cross_state_district_compare": return compareAcrossStates(ds, intent);
    case "trend": return trend(ds, intent.region, intent.crop, intent.years);
    case "correlation": return correlate(ds, intent.region, intent.crop, intent.years);
    case "policy_argument": return policyArguments(ds, intent);
  }
}

/** Run one bound intent against the harmonized dataset. */
export function execute(intent: QueryIntent, ds: HarmonizedDataset): AnswerFragment {
  const out = run(intent, ds);
  if (out.ok) return { ok: true, intent: intent.type, question: intent.question, result: out.result, citations: out.citations };
  return {
    ok: false,
    intent: intent.type,
    question: intent.question,
    failure: out.failure,
    ...(out.partial ? { partial: out.partial } : {}),
    citations: out.citations,
  };
}
