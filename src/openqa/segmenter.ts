// src/openqa/segmenter.ts

const SENTENCE_BOUNDARY = /(?<=[.?!;])\s+/;
const MARKER = /(?:,\s*)?\b(?:and\s+also|and\s+then|in\s+parallel|also|and|then)\b,?\s*/gi;
const LEADING_MARKER = /^(?:(?:and\s+also|and\s+then|in\s+parallel|also|and|then)\b[,\s]*)+/i;

// clause starts with its own request verb
const VERB_CUE =
  /^(?:please\s+)?(?:list|identify|compare|analy[sz]e|show|find|what|what's|which|give|provide|rank|name|correlate|tell|calculate|compute|determine|how|describe|summari[sz]e|estimate|report|present|explain|plot|check)\b/i;
// verb whose object points back at the previous clause ("compare that with ...")
const BACK_REFERENCE = /^(?:please\s+)?\w+\s+(?:that|it|this|them|those|these)\b(?!\s+(?:states?|districts?|crops?|regions?|years?|periods?))/i;

function splitClauses(sentence: string): string[] {
  const cuts: Array<{ start: number; end: number }> = [];
  for (const m of sentence.matchAll(MARKER)) {
    const start = m.index ?? 0;
    const end = start + m[0].length;
    const rest = sentence.slice(end);
    if (start > 0 && VERB_CUE.test(rest) && !BACK_REFERENCE.test(rest)) cuts.push({ start, end });
  }
  const out: string[] = [];
  let from = 0;
  for (const c of cuts) {
    out.push(sentence.slice(from, c.start));
    from = c.end;
  }
  out.push(sentence.slice(from));
  return out;
}

function clean(s: string): string {
  return s.trim().replace(LEADING_MARKER, "").replace(/[\s,;]+$/, "").trim();
}

/**
 * Split a question into sub-questions: sentence boundaries first, then conjunction
 * markers that introduce a clause with its own verb.
 */
export function segmentQuestion(question: string): string[] {
  const segments = question
    .split(SENTENCE_BOUNDARY)
    .flatMap(splitClauses)
    .map(clean)
    .filter(s => /[a-z0-9]/i.test(s));
  return segments.length ? segments : [question.trim()];
}
