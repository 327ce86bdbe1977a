import { z } from "zod";
import type { IntentType } from "./types.js";

export type MetricKind = "rainfall_mm" | "production_tonnes";
export type RegionKind = "state" | "district";

/** `[lonMin, lonMax, latMin, latMax]`, inclusive. */
export type Bounds = [number, number, number, number];

export interface Region {
  id: string;
  name: string;
  kind: RegionKind;
  parent?: string;
  aliases: string[];
  bounds?: Bounds;
}

export interface Crop {
  name: string;
  category: string;
  aliases: string[];
}

export interface HarmonizedRecord {
  region: Region;
  year: number;
  crop: Crop | null;
  metric: MetricKind;
  value: number;
}

// ---------- Raw loader payloads ----------
const Cell = z.union([z.number(), z.nan()]).nullable();

export const RainfallGridSchema = z.object({
  year: z.number().int(),
  lats: z.array(z.number()).min(1),
  lons: z.array(z.number()).min(1),
  values: z.array(z.array(z.array(Cell))),
  missingValue: z.number().optional(),
}).superRefine((g, ctx) => {
  g.values.forEach((day, d) => {
    if (day.length !== g.lats.length) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `day ${d}: expected ${g.lats.length} latitude rows, got ${day.length}` });
      return;
    }
    day.forEach((row, i) => {
      if (row.length !== g.lons.length) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `day ${d}, row ${i}: expected ${g.lons.length} longitude cells, got ${row.length}` });
      }
    });
  });
});
export type RainfallGrid = z.infer<typeof RainfallGridSchema>;

export const CropTableRowSchema = z.object({
  state: z.string(),
  district: z.string(),
  year: z.union([z.number().int(), z.string()]),
  production: z.record(z.union([z.number(), z.string(), z.null()])),
});
export type CropTableRow = z.infer<typeof CropTableRowSchema>;

// ---------- Taxonomy file ----------
const BoundsSchema = z.tuple([z.number(), z.number(), z.number(), z.number()]);

export const TaxonomyFileSchema = z.object({
  states: z.array(z.object({
    name: z.string().min(1),
    aliases: z.array(z.string()).default([]),
    bounds: BoundsSchema.optional(),
    districts: z.array(z.object({
      name: z.string().min(1),
      aliases: z.array(z.string()).default([]),
      bounds: BoundsSchema.optional(),
    })).default([]),
  })),
  crops: z.array(z.object({
    name: z.string().min(1),
    category: z.string().min(1),
    aliases: z.array(z.string()).default([]),
  })),
});
export type TaxonomyFile = z.infer<typeof TaxonomyFileSchema>;

// ---------- Citations ----------
export interface Citation {
  dataset: string;
  metric: MetricKind;
  region: string;
  years: number[];
  crop?: string;
  source: string;
}

// ---------- Result payloads ----------
export interface RainfallAggregateResult {
  type: "rainfall_aggregate";
  region: string;
  years: number[];
  meanAnnualMm: number;
  perYear: Array<{ year: number; mm: number }>;
}

export interface RainfallCompareResult {
  type: "rainfall_compare";
  regions: Array<{ region: string; years: number[]; meanAnnualMm: number }>;
  /** first region minus second */
  differenceMm: number;
}

export interface CropRanking {
  region: string;
  crops: Array<{ crop: string; category: string; productionTonnes: number }>;
}

export interface CropRankResult {
  type: "crop_rank";
  years: number[];
  topN: number;
  category?: string;
  rankings: CropRanking[];
}

export interface DistrictExtremeResult {
  type: "district_extreme";
  state: string;
  crop: string;
  extreme: "highest" | "lowest";
  years: number[];
  district: string;
  productionTonnes: number;
}

export interface CrossStateCompareResult {
  type: "cross_state_district_compare";
  crop: string;
  highest: DistrictExtremeResult;
  lowest: DistrictExtremeResult;
}

export type TrendDirection = "increasing" | "decreasing" | "flat";

export interface TrendResult {
  type: "trend";
  region: string;
  crop: string;
  series: Array<{ year: number; productionTonnes: number }>;
  slope: number;
  intercept: number;
  r2: number;
  percentChange: number | null;
  direction: TrendDirection;
}

export interface CorrelationResult {
  type: "correlation";
  region: string;
  crop: string;
  pairs: Array<{ year: number; rainfallMm: number; productionTonnes: number }>;
  r: number;
  strength: "weak" | "moderate" | "strong";
  direction: "positive" | "negative" | "none";
}

export type PolicyBasis = "recent_production" | "trend" | "rainfall_correlation" | "district_spread";

export interface PolicyArgument {
  basis: PolicyBasis;
  favours: string;
  margin: number;
  statement: string;
}

export interface PolicyArgumentResult {
  type: "policy_argument";
  region: string;
  promote: string;
  over: string;
  years: number[];
  arguments: PolicyArgument[];
}

export type IntentResult =
  | RainfallAggregateResult | RainfallCompareResult | CropRankResult | DistrictExtremeResult
  | CrossStateCompareResult | TrendResult | CorrelationResult | PolicyArgumentResult;

// ---------- Fragments ----------
export type FailureCode =
  | "UnrecognizedIntent" | "UnresolvedEntity" | "NoDataForScope" | "InsufficientSeries" | "ExecutionError";

export interface FailureScope {
  metric?: MetricKind;
  region?: string;
  crop?: string;
  years?: number[];
  span?: string;
  role?: "region" | "crop";
}

export interface Failure {
  code: FailureCode;
  message: string;
  scope?: FailureScope;
}

export type AnswerFragment =
  | { ok: true; intent: IntentType; question: string; result: IntentResult; citations: Citation[] }
  | {
      ok: false;
      intent: IntentType | null;
      question: string;
      failure: Failure;
      /** the half of a cross-state comparison that did resolve */
      partial?: DistrictExtremeResult;
      citations: Citation[];
    };

export type AnswerStatus = "complete" | "partial" | "failed";

export interface ComposedAnswer {
  question: string;
  status: AnswerStatus;
  fragments: AnswerFragment[];
  highlights: Array<{ text: string; fragment: number }>;
  citations: Citation[];
  citationsMarkdown: string;
  segmentsRun: Array<{ fragment: number; intent: IntentType | null; ok: boolean; ms: number }>;
}
