// src/openqa/answer_card.ts
import type { AnswerFragment, AnswerStatus, ComposedAnswer, IntentResult } from "./schemas.js";
import type { SegmentRun } from "./runner.js";
import { dedupeCitations, describeYears, formatCitations } from "./citations.js";

const mm = (v: number) => `${v.toFixed(1)} mm`;
const tonnes = (v: number) => `${Math.round(v).toLocaleString("en-US")} t`;

// ---------- Highlights ----------
function highlightFor(result: IntentResult): string {
  switch (result.type) {
    case "rainfall_aggregate":
      return `${result.region}: mean annual rainfall ${mm(result.meanAnnualMm)} (${describeYears(result.years)})`;
    case "rainfall_compare": {
      const [a, b] = result.regions;
      const sign = result.differenceMm >= 0 ? "+" : "";
      return `${a.region} ${mm(a.meanAnnualMm)} vs ${b.region} ${mm(b.meanAnnualMm)} (difference ${sign}${mm(result.differenceMm)})`;
    }
    case "crop_rank":
      return result.rankings
        .map(r => (r.crops[0] ? `${r.region}: top crop ${r.crops[0].crop} (${tonnes(r.crops[0].productionTonnes)})` : `${r.region}: no crops`))
        .join("; ");
    case "district_extreme":
      return `${result.extreme === "highest" ? "Highest" : "Lowest"} ${result.crop} production in ${result.state}: ` +
        `${result.district} (${tonnes(result.productionTonnes)}, ${describeYears(result.years)})`;
    case "cross_state_district_compare":
      return `${result.crop}: highest ${result.highest.district} (${result.highest.state}, ${tonnes(result.highest.productionTonnes)}); ` +
        `lowest ${result.lowest.district} (${result.lowest.state}, ${tonnes(result.lowest.productionTonnes)})`;
    case "trend":
      return `${result.crop} in ${result.region} is ${result.direction} (slope ${result.slope.toFixed(1)} t/yr, r² ${result.r2.toFixed(2)})`;
    case "correlation":
      return `Rainfall vs ${result.crop} in ${result.region}: r = ${result.r.toFixed(2)} (${result.strength} ${result.direction})`;
    case "policy_argument":
      return `${result.arguments.length} argument(s) for ${result.promote} over ${result.over} in ${result.region}`;
  }
}

function highlightOf(f: AnswerFragment): string {
  return f.ok ? highlightFor(f.result) : `${f.failure.code}: ${f.failure.message}`;
}

export function statusOf(fragments: AnswerFragment[]): AnswerStatus {
  const okCount = fragments.filter(f => f.ok).length;
  if (okCount === fragments.length) return "complete";
  return okCount === 0 ? "failed" : "partial";
}

// ---------- Compose ----------
export function composeAnswer(question: string, runs: SegmentRun[]): ComposedAnswer {
  const fragments = runs.map(r => r.fragment);
  const citations = dedupeCitations(fragments.flatMap(f => f.citations));
  return {
    question,
    status: statusOf(fragments),
    fragments,
    highlights: fragments.map((f, i) => ({ text: highlightOf(f), fragment: i })),
    citations,
    citationsMarkdown: formatCitations(citations),
    segmentsRun: runs.map((r, i) => ({
      fragment: i,
      intent: r.fragment.intent,
      ok: r.fragment.ok,
      ms: r.elapsedMs,
    })),
  };
}
