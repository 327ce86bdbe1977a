// src/openqa/extractors/year_scope.ts
import type { YearScope } from "../types.js";
import { lexicon } from "../lexicon.js";

const YEAR = "((?:19|20)\\d{2})";

const RANGE_PATTERNS = [
  new RegExp(`\\b(?:from|between)\\s+${YEAR}\\s*(?:to|and|through|till|until|-|–)\\s*${YEAR}\\b`, "i"),
  new RegExp(`\\b${YEAR}\\s*(?:-|–|to|through)\\s*${YEAR}\\b`, "i"),
];
const SINCE = new RegExp(`\\b(since|from|after)\\s+${YEAR}\\b`, "i");
const UNTIL = new RegExp(`\\b(until|till|up\\s+to|before)\\s+${YEAR}\\b`, "i");
const LAST_N =
  /\b(?:last|past|previous|preceding|recent)\s+(\d{1,2}|[a-z]+)\s+(?:(?:available|recent|complete|full)\s+)?(?:years?|seasons?)\b/gi;
const DECADE = /\b(?:last|past|previous|recent)\s+decade\b|\bdecadal\b/i;
const LATEST = /\b(?:most\s+recent|latest|last\s+available)\s+(?:available\s+)?(?:year|season|data)\b|\blast\s+year\b/i;
const EXPLICIT = /\b(?:19|20)\d{2}\b/g;
const SAME = /\b(?:same|that|this|those)\s+(?:period|years?|time\s*frame|timeframe|duration|span)\b/i;

const TOP_N = /\btop\s+(\d{1,3}|[a-z]+)\b/gi;
const N_MOST = /\b(\d{1,3}|[a-z]+)\s+(?:most|highest|largest|leading|major|biggest)\b/gi;

/** "5" or "five" → 5; anything else → null. */
export function parseCount(tok: string): number | null {
  if (/^\d+$/.test(tok)) {
    const n = Number(tok);
    return n > 0 ? n : null;
  }
  return lexicon.numberWords.get(tok.toLowerCase()) ?? null;
}

export type YearScopeMatch = { scope: YearScope; inherited: boolean };

export function extractYearScope(text: string): YearScopeMatch {
  for (const re of RANGE_PATTERNS) {
    const m = re.exec(text);
    if (m) {
      const a = Number(m[1]), b = Number(m[2]);
      return { scope: { kind: "range", from: Math.min(a, b), to: Math.max(a, b) }, inherited: false };
    }
  }

  const since = SINCE.exec(text);
  if (since) {
    const y = Number(since[2]);
    return { scope: { kind: "range", from: since[1].toLowerCase() === "after" ? y + 1 : y }, inherited: false };
  }
  const until = UNTIL.exec(text);
  if (until) {
    const y = Number(until[2]);
    return { scope: { kind: "range", to: until[1].toLowerCase() === "before" ? y - 1 : y }, inherited: false };
  }

  for (const m of text.matchAll(LAST_N)) {
    const n = parseCount(m[1]);
    if (n) return { scope: { kind: "last", count: n }, inherited: false };
  }
  if (DECADE.test(text)) return { scope: { kind: "last", count: 10 }, inherited: false };
  if (LATEST.test(text)) return { scope: { kind: "latest" }, inherited: false };

  const years = [...new Set((text.match(EXPLICIT) ?? []).map(Number))].sort((a, b) => a - b);
  if (years.length) return { scope: { kind: "years", years }, inherited: false };

  if (SAME.test(text)) return { scope: { kind: "all" }, inherited: true };
  return { scope: { kind: "all" }, inherited: false };
}

export function extractTopN(text: string): number | null {
  for (const re of [TOP_N, N_MOST]) {
    for (const m of text.matchAll(re)) {
      const n = parseCount(m[1]);
      if (n) return n;
    }
  }
  return null;
}
