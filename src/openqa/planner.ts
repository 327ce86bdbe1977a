// src/openqa/planner.ts
import type { Crop, Region } from "./schemas.js";
import type { IntentType, ParseFailure, PlannedSegment, QueryIntent, QueryPlan, YearScope } from "./types.js";
import type { Taxonomy } from "./taxonomy.js";
import type { Role, Slots } from "./slot_filler.js";
import { fillSlots } from "./slot_filler.js";
import { segmentQuestion } from "./segmenter.js";

const RAIN = /\b(?:rain\w*|precipitation|monsoon)\b/;
const DISTRICT = /\bdistricts?\b/;
const HIGH = /\b(?:highest|maximum|largest|biggest|top|most(?!\s+recent))\b/;
const HIGH_STRICT = /\b(?:highest|maximum|largest|biggest)\b/;
const LOW = /\b(?:lowest|minimum|least|smallest|bottom)\b/;
const POLICY = /\b(?:arguments?|promot\w*|polic(?:y|ies)|justif\w*|case\s+for|persuade|recommend\w*)\b/;
const CORRELATION = /\b(?:correlat\w*|relationship|relation\s+between|associat\w*|impact\s+of\s+rain\w*|affect\w*|influence\w*)\b/;
const TREND = /\b(?:trends?|trajectory|decadal|over\s+time|grown|grew|declined|changed|evolved)\b/;
const DECADE = /\bdecade\b/;
const RANKING = /\b(?:top|leading|rank\w*|major|biggest|largest|most\s+(?:produced|grown|cultivated)|highest[-\s]producing)\b/;
const CROPS = /\bcrops?\b/;
const COMPARE = /\b(?:compar\w*|versus|vs\.?|difference|contrast|differ\w*)\b/;
const OVER = /\b(?:over|instead\s+of|rather\s+than|versus|vs\.?|against|compared\s+to)\b/gi;

type Features = { text: string; lower: string; slots: Slots };

export type IntentRule = {
  type: IntentType;
  test: (f: Features) => boolean;
  specificity: (f: Features) => number;
};

/** Ordered; earlier rules win specificity ties. */
export const INTENT_RULES: IntentRule[] = [
  {
    type: "cross_state_district_compare",
    test: f => DISTRICT.test(f.lower) && HIGH_STRICT.test(f.lower) && LOW.test(f.lower),
    specificity: () => 5,
  },
  { type: "policy_argument", test: f => POLICY.test(f.lower), specificity: () => 4 },
  { type: "correlation", test: f => CORRELATION.test(f.lower), specificity: () => 4 },
  {
    type: "trend",
    test: f => TREND.test(f.lower) || (DECADE.test(f.lower) && !RAIN.test(f.lower)),
    specificity: () => 3,
  },
  {
    type: "district_extreme",
    test: f => DISTRICT.test(f.lower) && (HIGH.test(f.lower) || LOW.test(f.lower)),
    // a single named crop makes "which district tops X" beat a crop ranking
    specificity: f => (f.slots.crops.length === 1 ? 4 : 2),
  },
  {
    type: "crop_rank",
    test: f => RANKING.test(f.lower) && (CROPS.test(f.lower) || f.slots.category !== null),
    specificity: () => 3,
  },
  { type: "rainfall_compare", test: f => RAIN.test(f.lower) && COMPARE.test(f.lower), specificity: () => 3 },
  { type: "rainfall_aggregate", test: f => RAIN.test(f.lower), specificity: () => 1 },
];

export type RuleMatch = { type: IntentType; specificity: number; order: number };

export function compareRuleMatches(a: RuleMatch, b: RuleMatch): number {
  return b.specificity - a.specificity || a.order - b.order;
}

export function matchRules(text: string, slots: Slots): RuleMatch[] {
  const f: Features = { text, lower: text.toLowerCase(), slots };
  return INTENT_RULES
    .map((rule, order) => ({ rule, order }))
    .filter(({ rule }) => rule.test(f))
    .map(({ rule, order }) => ({ type: rule.type, specificity: rule.specificity(f), order }))
    .sort(compareRuleMatches);
}

// ---------- Binding ----------
type Context = { regions: Region[]; crops: Crop[]; years: YearScope };

type Bound = { ok: true; intent: QueryIntent } | { ok: false; failure: ParseFailure };

function unresolved(slots: Slots, role: Role, missing: string, text: string): ParseFailure {
  const span = slots.unresolved.find(u => u.role === role) ?? slots.unresolved.find(u => u.role === null);
  if (span) {
    return {
      code: "UnresolvedEntity",
      message: `Could not resolve '${span.text}' as a ${role === "crop" ? "crop" : "state or district"}`,
      scope: { span: span.text, role },
    };
  }
  return { code: "UnresolvedEntity", message: `No recognizable ${missing} in "${text}"`, scope: { role } };
}

function pickRegion(regions: Region[], slots: Slots, text: string): Region | ParseFailure {
  const states = regions.filter(r => r.kind === "state");
  const district = regions.find(r => r.kind === "district");
  if (district) {
    if (states.length && !states.some(s => s.name === district.parent)) {
      return {
        code: "UnresolvedEntity",
        message: `District '${district.name}' does not belong to ${states.map(s => s.name).join(" or ")}`,
        scope: { span: district.name, role: "region" },
      };
    }
    return district;
  }
  return states[0] ?? unresolved(slots, "region", "state name", text);
}

function isFailure(x: Region | Crop | ParseFailure): x is ParseFailure {
  return "code" in x;
}

function orderPolicyCrops(crops: Crop[], slots: Slots, text: string): [Crop, Crop] {
  const cropMentions = slots.mentions.flatMap(m => (m.mention.kind === "crop" ? [{ start: m.start, name: m.mention.crop.name }] : []));
  for (const marker of text.matchAll(OVER)) {
    const at = marker.index ?? 0;
    const before = cropMentions.find(m => m.start < at);
    const after = cropMentions.find(m => m.start > at);
    if (!before || !after) continue;
    const over = crops.find(c => c.name === after.name);
    const promote = crops.find(c => c !== over);
    if (over && promote) return [promote, over];
  }
  return [crops[0], crops[1]];
}

function bind(type: IntentType, text: string, slots: Slots, ctx: Context | null): Bound {
  // "correlate this trend ... for the same period" names neither region nor crop
  const follow = ctx && (slots.refersBack || slots.sameYears) ? ctx : null;
  const regions = slots.backRef.regions && ctx
    ? [...ctx.regions, ...slots.regions.filter(r => !ctx.regions.some(c => c.id === r.id))]
    : !slots.regions.length && follow ? follow.regions : slots.regions;
  const crops = slots.backRef.crops && ctx
    ? [...ctx.crops, ...slots.crops.filter(c => !ctx.crops.some(p => p.name === c.name))]
    : !slots.crops.length && follow ? follow.crops : slots.crops;
  const years: YearScope = slots.sameYears && ctx ? ctx.years : slots.years;
  const states = regions.filter(r => r.kind === "state");
  const lower = text.toLowerCase();
  const fail = (failure: ParseFailure): Bound => ({ ok: false, failure });
  const needCrop = (): Crop | ParseFailure => crops[0] ?? unresolved(slots, "crop", "crop name", text);
  const defaultLatest = (): YearScope => (years.kind === "all" && !slots.sameYears ? { kind: "latest" } : years);

  switch (type) {
    case "rainfall_aggregate": {
      const region = pickRegion(regions, slots, text);
      if (isFailure(region)) return fail(region);
      return { ok: true, intent: { type, question: text, years, region } };
    }
    case "rainfall_compare": {
      if (regions.length < 2) {
        return fail(regions.length
          ? unresolved(slots, "region", `second region to compare with ${regions[0].name}`, text)
          : unresolved(slots, "region", "state name", text));
      }
      return { ok: true, intent: { type, question: text, years, regions } };
    }
    case "crop_rank": {
      if (!regions.length) return fail(unresolved(slots, "region", "state name", text));
      return {
        ok: true,
        intent: { type, question: text, years, regions, topN: slots.topN ?? 10, ...(slots.category ? { category: slots.category } : {}) },
      };
    }
    case "district_extreme": {
      const state = states[0];
      if (!state) return fail(unresolved(slots, "region", "state name", text));
      const crop = needCrop();
      if (isFailure(crop)) return fail(crop);
      const hi = lower.search(HIGH), lo = lower.search(LOW);
      const extreme = lo >= 0 && (hi < 0 || lo < hi) ? "lowest" : "highest";
      return { ok: true, intent: { type, question: text, years: defaultLatest(), state, crop, extreme } };
    }
    case "cross_state_district_compare": {
      if (!states.length) return fail(unresolved(slots, "region", "state name", text));
      const crop = needCrop();
      if (isFailure(crop)) return fail(crop);
      const [first, second = first] = states;
      const highFirst = lower.search(HIGH_STRICT) <= lower.search(LOW);
      return {
        ok: true,
        intent: {
          type, question: text, years: defaultLatest(), crop,
          highest: highFirst ? first : second,
          lowest: highFirst ? second : first,
        },
      };
    }
    case "trend":
    case "correlation": {
      const region = pickRegion(regions, slots, text);
      if (isFailure(region)) return fail(region);
      const crop = needCrop();
      if (isFailure(crop)) return fail(crop);
      return { ok: true, intent: { type, question: text, years, region, crop } };
    }
    case "policy_argument": {
      const region = pickRegion(regions, slots, text);
      if (isFailure(region)) return fail(region);
      if (crops.length < 2) {
        return fail(unresolved(slots, "crop", crops.length ? `alternative crop to weigh against ${crops[0].name}` : "crop name", text));
      }
      const [promote, over] = orderPolicyCrops(crops, slots, text);
      return { ok: true, intent: { type, question: text, years, region, promote, over } };
    }
  }
}

function contextOf(intent: QueryIntent): Context {
  switch (intent.type) {
    case "rainfall_aggregate": return { regions: [intent.region], crops: [], years: intent.years };
    case "rainfall_compare": return { regions: intent.regions, crops: [], years: intent.years };
    case "crop_rank": return { regions: intent.regions, crops: [], years: intent.years };
    case "district_extreme": return { regions: [intent.state], crops: [intent.crop], years: intent.years };
    case "cross_state_district_compare": {
      const regions = intent.highest.id === intent.lowest.id ? [intent.highest] : [intent.highest, intent.lowest];
      return { regions, crops: [intent.crop], years: intent.years };
    }
    case "trend":
    case "correlation": return { regions: [intent.region], crops: [intent.crop], years: intent.years };
    case "policy_argument": return { regions: [intent.region], crops: [intent.promote, intent.over], years: intent.years };
  }
}

type Draft = { text: string; slots: Slots; best: RuleMatch | null };

function draft(text: string, taxonomy: Taxonomy): Draft {
  const slots = fillSlots(text, taxonomy);
  return { text, slots, best: matchRules(text, slots)[0] ?? null };
}

function namesNothing(s: Slots): boolean {
  return !s.mentions.length && !s.unresolved.length && !s.backRef.regions && !s.backRef.crops && !s.sameYears;
}

/**
 * Segment, classify and bind a question. A segment that names nothing and asks for
 * the same kind of answer as the one before it (or for nothing recognizable)
 * continues that segment rather than standing alone.
 */
export function planFromQuery(question: string, taxonomy: Taxonomy): QueryPlan {
  const drafts: Draft[] = [];
  for (const text of segmentQuestion(question)) {
    const d = draft(text, taxonomy);
    const prev = drafts[drafts.length - 1];
    if (prev && namesNothing(d.slots) && (d.best === null || d.best.type === prev.best?.type)) {
      drafts[drafts.length - 1] = draft(`${prev.text} ${text}`, taxonomy);
      continue;
    }
    drafts.push(d);
  }

  const segments: PlannedSegment[] = [];
  let ctx: Context | null = null;
  for (const d of drafts) {
    if (!d.best) {
      segments.push({
        ok: false, text: d.text, intentType: null,
        failure: { code: "UnrecognizedIntent", message: `Could not tell what kind of answer "${d.text}" asks for` },
      });
      continue;
    }
    const bound = bind(d.best.type, d.text, d.slots, ctx);
    if (bound.ok) {
      segments.push({ ok: true, text: d.text, intent: bound.intent });
      ctx = contextOf(bound.intent);
    } else {
      segments.push({ ok: false, text: d.text, intentType: d.best.type, failure: bound.failure });
    }
  }

  return {
    rationale: drafts.map(d => (d.best ? `${d.best.type}(${d.best.specificity})` : "unrecognized")).join("; "),
    segments,
  };
}
