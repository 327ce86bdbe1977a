// src/openqa/types.ts
import type { Crop, CropTableRow, FailureScope, RainfallGrid, Region } from "./schemas.js";

export type IntentType =
  | "rainfall_aggregate"
  | "rainfall_compare"
  | "crop_rank"
  | "district_extreme"
  | "cross_state_district_compare"
  | "trend"
  | "correlation"
  | "policy_argument";

export type YearScope =
  | { kind: "all" }
  | { kind: "years"; years: number[] }
  | { kind: "range"; from?: number; to?: number }
  | { kind: "last"; count: number }
  | { kind: "latest" };

type IntentBase = { question: string; years: YearScope };

export type QueryIntent =
  | IntentBase & { type: "rainfall_aggregate"; region: Region }
  | IntentBase & { type: "rainfall_compare"; regions: Region[] }
  | IntentBase & { type: "crop_rank"; regions: Region[]; topN: number; category?: string }
  | IntentBase & { type: "district_extreme"; state: Region; crop: Crop; extreme: "highest" | "lowest" }
  | IntentBase & { type: "cross_state_district_compare"; crop: Crop; highest: Region; lowest: Region }
  | IntentBase & { type: "trend"; region: Region; crop: Crop }
  | IntentBase & { type: "correlation"; region: Region; crop: Crop }
  | IntentBase & { type: "policy_argument"; region: Region; promote: Crop; over: Crop };

export type ParseFailure = {
  code: "UnrecognizedIntent" | "UnresolvedEntity";
  message: string;
  scope?: FailureScope;
};

export type PlannedSegment =
  | { ok: true; text: string; intent: QueryIntent }
  | { ok: false; text: string; intentType: IntentType | null; failure: ParseFailure };

export type QueryPlan = {
  rationale: string;
  segments: PlannedSegment[];
};

export type SourceMeta = {
  dataset: string;
  source: string;
  resolution?: string;
};

export interface RawDatasetLoader {
  sources: { rainfall: SourceMeta; crops: SourceMeta };
  loadRainfall(): Promise<RainfallGrid[]>;
  loadCropTable(): Promise<CropTableRow[]>;
}
