import type { AnswerFragment } from "./schemas.js";
import type { PlannedSegment, QueryPlan } from "./types.js";
import type { HarmonizedDataset } from "./harmonize.js";
import { execute } from "./executor.js";
import { errorMessage } from "./errors.js";

type RunOpts = { concurrency?: number };
export type SegmentRun = { segment: PlannedSegment; fragment: AnswerFragment; elapsedMs: number };

/** Bounded-concurrency map; results keep input order. */
export async function mapWithConcurrency<I, O>(
  items: I[],
  limit: number,
  fn: (item: I, index: number) => Promise<O>
): Promise<O[]> {
  const results = new Array<O>(items.length);
  let next = 0;
  const worker = async () => {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  };
  await Promise.all(Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, worker));
  return results;
}

function runSegment(segment: PlannedSegment, dataset: HarmonizedDataset): AnswerFragment {
  if (!segment.ok) {
    return { ok: false, intent: segment.intentType, question: segment.text, failure: segment.failure, citations: [] };
  }
  try {
    return execute(segment.intent, dataset);
  } catch (err: unknown) {
    console.error(`[runner] ${segment.intent.type} failed: ${errorMessage(err)}`);
    return {
      ok: false,
      intent: segment.intent.type,
      question: segment.text,
      failure: { code: "ExecutionError", message: `Could not compute ${segment.intent.type}: ${errorMessage(err)}` },
      citations: [],
    };
  }
}

export async function runPlan(
  plan: QueryPlan,
  dataset: HarmonizedDataset,
  { concurrency = 4 }: RunOpts = {}
): Promise<SegmentRun[]> {
  return mapWithConcurrency(plan.segments, concurrency, async (segment) => {
    const t0 = Date.now();
    const fragment = runSegment(segment, dataset);
    return { segment, fragment, elapsedMs: Date.now() - t0 };
  });
}
