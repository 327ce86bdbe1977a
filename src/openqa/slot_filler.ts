// src/openqa/slot_filler.ts
import type { Crop, Region } from "./schemas.js";
import type { YearScope } from "./types.js";
import type { Mention, Taxonomy } from "./taxonomy.js";
import { lexicon } from "./lexicon.js";
import { extractTopN, extractYearScope } from "./extractors/year_scope.js";

export type Role = "region" | "crop";

export type Token = { text: string; start: number; end: number };

export type FoundMention = { text: string; start: number; mention: Mention; fuzzy: boolean };

export type UnresolvedSpan = { text: string; start: number; role: Role | null };

export interface Slots {
  /** states and districts in order of first appearance */
  regions: Region[];
  crops: Crop[];
  mentions: FoundMention[];
  unresolved: UnresolvedSpan[];
  years: YearScope;
  sameYears: boolean;
  topN: number | null;
  category: string | null;
  backRef: { regions: boolean; crops: boolean };
  /** points at the previous answer without naming what it was about ("this trend", "it") */
  refersBack: boolean;
}

const WORD = /[\p{L}\p{N}&]+(?:[-/][\p{L}\p{N}&]+)*/gu;
const MAX_NGRAM = 4;

const REGION_BACK_REF =
  /\b(?:those|these|both|the\s+same|each\s+of\s+(?:those|these|the))\s+(?:states?|regions?|districts?)\b|\b(?:there|them)\b/i;
const CROP_BACK_REF = /\b(?:that|this|those|these|the\s+same)\s+crops?\b/i;
const ANSWER_BACK_REF =
  /\b(?:that|this|those|these|the\s+same|the)\s+(?:trends?|series|patterns?|results?|figures?)\b|\b(?:it|its)\b/i;

export function tokenize(text: string): Token[] {
  return [...text.matchAll(WORD)].map(m => {
    const start = m.index ?? 0;
    return { text: m[0], start, end: start + m[0].length };
  });
}

function isCapitalized(t: string) { return /^\p{Lu}/u.test(t); }

// short state aliases (TN, MP, ...) only count when written in capitals
function acceptMention(phrase: string, m: Mention): boolean {
  if (m.kind === "region" && phrase.length <= 3) return phrase === phrase.toUpperCase();
  return true;
}

function startsSentence(text: string, tokens: Token[], i: number): boolean {
  return i === 0 || /[.?!:;]/.test(text.slice(tokens[i - 1].end, tokens[i].start));
}

function roleHint(tokens: Token[], i: number, j: number): Role | null {
  const next = tokens[j]?.text.toLowerCase();
  if (next && lexicon.cropRoleAfter.has(next)) return "crop";
  if (next && lexicon.regionRoleAfter.has(next)) return "region";
  const prev = i > 0 ? tokens[i - 1].text.toLowerCase() : undefined;
  if (prev && lexicon.cropRoleBefore.has(prev)) return "crop";
  if (prev && lexicon.regionRoleBefore.has(prev)) return "region";
  return null;
}

function resolveSpan(span: string, role: Role | null, taxonomy: Taxonomy): Mention | null {
  if (role !== "crop") {
    const r = taxonomy.resolveRegion(span);
    if (r.ok) return { kind: "region", region: r.value };
  }
  if (role !== "region") {
    const c = taxonomy.resolveCrop(span);
    if (c.ok) return { kind: "crop", crop: c.value };
  }
  return null;
}

export function fillSlots(text: string, taxonomy: Taxonomy): Slots {
  const tokens = tokenize(text);
  const mentions: FoundMention[] = [];
  const unresolved: UnresolvedSpan[] = [];
  const covered = new Array<boolean>(tokens.length).fill(false);

  // 1) taxonomy mentions, longest n-gram first
  for (let i = 0; i < tokens.length;) {
    let advanced = false;
    for (let n = Math.min(MAX_NGRAM, tokens.length - i); n >= 1; n--) {
      const phrase = tokens.slice(i, i + n).map(t => t.text).join(" ");
      const m = taxonomy.lookupPhrase(phrase);
      if (m && acceptMention(phrase, m)) {
        mentions.push({ text: text.slice(tokens[i].start, tokens[i + n - 1].end), start: tokens[i].start, mention: m, fuzzy: false });
        for (let k = i; k < i + n; k++) covered[k] = true;
        i += n;
        advanced = true;
        break;
      }
    }
    if (!advanced) i++;
  }

  // 2) capitalized spans the registries don't know verbatim
  for (let i = 0; i < tokens.length;) {
    const usable = (k: number) =>
      k < tokens.length && !covered[k] && isCapitalized(tokens[k].text)
      && !lexicon.commonWords.has(tokens[k].text.toLowerCase()) && !/^\d+$/.test(tokens[k].text);
    if (!usable(i)) { i++; continue; }
    let j = i;
    while (usable(j)) j++;
    const span = text.slice(tokens[i].start, tokens[j - 1].end);
    const role = roleHint(tokens, i, j);
    const m = resolveSpan(span, role, taxonomy);
    if (m) mentions.push({ text: span, start: tokens[i].start, mention: m, fuzzy: true });
    // a capital that only marks the start of a sentence names nothing
    else if (role !== null || !startsSentence(text, tokens, i)) unresolved.push({ text: span, start: tokens[i].start, role });
    i = j;
  }

  mentions.sort((a, b) => a.start - b.start);

  const regions: Region[] = [];
  const crops: Crop[] = [];
  for (const { mention } of mentions) {
    if (mention.kind === "region") {
      if (!regions.some(r => r.id === mention.region.id)) regions.push(mention.region);
    } else if (!crops.some(c => c.name === mention.crop.name)) {
      crops.push(mention.crop);
    }
  }

  const lowerTokens = tokens.map(t => t.text.toLowerCase());
  const categoryWord = lowerTokens.find(t => lexicon.categoryWords.has(t));
  const { scope, inherited } = extractYearScope(text);

  return {
    regions,
    crops,
    mentions,
    unresolved,
    years: scope,
    sameYears: inherited,
    topN: extractTopN(text),
    category: categoryWord ? lexicon.categoryWords.get(categoryWord) ?? null : null,
    backRef: { regions: REGION_BACK_REF.test(text), crops: CROP_BACK_REF.test(text) },
    refersBack: ANSWER_BACK_REF.test(text),
  };
}
