// src/openqa/answer_open_question.ts
import { planFromQuery } from "./planner.js";
import { runPlan } from "./runner.js";
import { composeAnswer } from "./answer_card.js";
import { DatasetCache } from "./dataset_cache.js";
import { buildHarmonizedDataset } from "./harmonize.js";
import type { BuildReport, DatasetSources } from "./harmonize.js";
import { loadTaxonomy } from "./taxonomy.js";
import type { Taxonomy } from "./taxonomy.js";
import { JsonFileLoader } from "./clients/json_loader.js";
import { resolveDataPath } from "./data_files.js";
import type { AppConfig } from "./config.js";
import type { ComposedAnswer, MetricKind } from "./schemas.js";
import type { QueryPlan, RawDatasetLoader } from "./types.js";

export interface QaDeps {
  taxonomy: Taxonomy;
  dataset: DatasetCache;
  concurrency?: number;
}

/**
 * Answer a free-text question: build (or reuse) the harmonized dataset, plan the
 * sub-questions, run them, and compose one answer with fragments in question order.
 * A dataset that cannot be built rejects with DatasetBuildError.
 */
export async function answerQuestion(question: string, deps: QaDeps): Promise<ComposedAnswer> {
  const dataset = await deps.dataset.get();
  const plan = planFromQuery(question, deps.taxonomy);
  const runs = await runPlan(plan, dataset, { concurrency: deps.concurrency ?? 4 });
  const answer = composeAnswer(question, runs);
  const okCount = answer.fragments.filter(f => f.ok).length;
  console.log(`[qa] ${answer.status}: ${okCount}/${answer.fragments.length} fragments answered [${plan.rationale}]`);
  return answer;
}

export type DatasetSummary = {
  buildCount: number;
  years: Record<MetricKind, number[]>;
  report: BuildReport;
  sources: DatasetSources;
};

export interface QaService {
  taxonomy: Taxonomy;
  dataset: DatasetCache;
  answer(question: string): Promise<ComposedAnswer>;
  parse(question: string): QueryPlan;
  summary(): Promise<DatasetSummary>;
  /** Drop the cached dataset and build it again from the loader. */
  reload(): Promise<DatasetSummary>;
}

export function makeQaService(args: { taxonomy: Taxonomy; loader: RawDatasetLoader; concurrency?: number }): QaService {
  const { taxonomy, loader, concurrency } = args;
  const dataset = new DatasetCache(() => buildHarmonizedDataset(loader, taxonomy));
  const deps: QaDeps = { taxonomy, dataset, concurrency };

  const summary = async (): Promise<DatasetSummary> => {
    const ds = await dataset.get();
    return {
      buildCount: dataset.buildCount,
      years: { rainfall_mm: ds.years("rainfall_mm"), production_tonnes: ds.years("production_tonnes") },
      report: ds.report,
      sources: ds.sources,
    };
  };

  return {
    taxonomy,
    dataset,
    answer: question => answerQuestion(question, deps),
    parse: question => planFromQuery(question, taxonomy),
    summary,
    reload: () => {
      dataset.invalidate();
      return summary();
    },
  };
}

export async function createQaService(config: AppConfig): Promise<QaService> {
  const taxonomy = await loadTaxonomy(
    config.taxonomyPath ? resolveDataPath(config.taxonomyPath) : undefined,
    { fuzzyThreshold: config.fuzzyThreshold },
  );
  const loader = new JsonFileLoader({ rainfallPath: config.rainfallPath, cropPath: config.cropPath });
  return makeQaService({ taxonomy, loader, concurrency: config.concurrency });
}
