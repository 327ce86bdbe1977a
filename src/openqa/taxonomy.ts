// src/openqa/taxonomy.ts
import { TaxonomyFileSchema } from "./schemas.js";
import type { Crop, Region, RegionKind, TaxonomyFile } from "./schemas.js";
import { dataFilePath, readJsonFile } from "./data_files.js";

export type ResolveFailure = "not_found" | "ambiguous" | "parent_mismatch";

export type Resolution<T> =
  | { ok: true; value: T; match: "exact" | "normalized" | "fuzzy"; score: number }
  | { ok: false; reason: ResolveFailure; text: string; candidates: string[] };

export type Mention =
  | { kind: "region"; region: Region }
  | { kind: "crop"; crop: Crop };

export type TaxonomyOptions = {
  fuzzyThreshold?: number;
  ambiguityMargin?: number;
};

type Entry<T> = { entity: T; key: string; names: string[] };

/**
 * Lowercase, strip diacritics and punctuation, spell out `&`, collapse whitespace.
 * "Jammu & Kashmir" and "jammu and kashmir" normalize to the same key.
 */
export function normalizeName(s: string): string {
  return s
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, " ")
    .trim()
    .replace(/\s+/g, " ");
}

function bigrams(s: string): string[] {
  const c = normalizeName(s).replace(/ /g, "");
  const out: string[] = [];
  for (let i = 0; i < c.length - 1; i++) out.push(c.slice(i, i + 2));
  return out;
}

/** Sørensen–Dice coefficient over character bigrams (multiset) of the space-free normalized form. */
export function diceSimilarity(a: string, b: string): number {
  if (normalizeName(a).replace(/ /g, "") === normalizeName(b).replace(/ /g, "")) return 1;
  const A = bigrams(a), B = bigrams(b);
  if (!A.length || !B.length) return 0;
  const counts = new Map<string, number>();
  for (const g of B) counts.set(g, (counts.get(g) ?? 0) + 1);
  let hits = 0;
  for (const g of A) {
    const c = counts.get(g) ?? 0;
    if (c > 0) { hits++; counts.set(g, c - 1); }
  }
  return (2 * hits) / (A.length + B.length);
}

function uniqueEntities<T>(hits: Entry<T>[]): Entry<T>[] {
  const seen = new Map<string, Entry<T>>();
  for (const h of hits) if (!seen.has(h.key)) seen.set(h.key, h);
  return [...seen.values()];
}

export class Taxonomy {
  readonly states: Region[] = [];
  readonly districts: Region[] = [];
  readonly crops: Crop[] = [];

  private readonly fuzzyThreshold: number;
  private readonly ambiguityMargin: number;
  private readonly stateEntries: Entry<Region>[] = [];
  private readonly districtEntries: Entry<Region>[] = [];
  private readonly cropEntries: Entry<Crop>[] = [];
  private readonly phrases = new Map<string, Mention>();

  constructor(file: TaxonomyFile, opts: TaxonomyOptions = {}) {
    this.fuzzyThreshold = opts.fuzzyThreshold ?? 0.75;
    this.ambiguityMargin = opts.ambiguityMargin ?? 0.1;

    for (const s of file.states) {
      const state: Region = { id: `state:${s.name}`, name: s.name, kind: "state", aliases: s.aliases, bounds: s.bounds };
      this.states.push(state);
      this.stateEntries.push({ entity: state, key: state.id, names: [s.name, ...s.aliases] });
      for (const d of s.districts) {
        const district: Region = {
          id: `district:${s.name}/${d.name}`, name: d.name, kind: "district", parent: s.name, aliases: d.aliases, bounds: d.bounds,
        };
        this.districts.push(district);
        this.districtEntries.push({ entity: district, key: district.id, names: [d.name, ...d.aliases] });
      }
    }
    for (const c of file.crops) {
      const crop: Crop = { name: c.name, category: c.category, aliases: c.aliases };
      this.crops.push(crop);
      this.cropEntries.push({ entity: crop, key: c.name, names: [c.name, ...c.aliases] });
    }

    // first registration wins: states, then districts, then crops
    for (const e of this.stateEntries) this.registerPhrases(e.names, { kind: "region", region: e.entity });
    for (const e of this.districtEntries) this.registerPhrases(e.names, { kind: "region", region: e.entity });
    for (const e of this.cropEntries) this.registerPhrases(e.names, { kind: "crop", crop: e.entity });
  }

  static fromJson(raw: unknown, opts?: TaxonomyOptions): Taxonomy {
    return new Taxonomy(TaxonomyFileSchema.parse(raw), opts);
  }

  private registerPhrases(names: string[], m: Mention) {
    for (const n of names) {
      const k = normalizeName(n);
      if (k && !this.phrases.has(k)) this.phrases.set(k, m);
    }
  }

  /** Exact or normalized lookup across every registry; no fuzzy matching. */
  lookupPhrase(phrase: string): Mention | null {
    return this.phrases.get(normalizeName(phrase)) ?? null;
  }

  state(name: string): Region | undefined {
    const k = normalizeName(name);
    return this.states.find(s => normalizeName(s.name) === k);
  }

  districtsOf(state: string): Region[] {
    const k = normalizeName(state);
    return this.districts.filter(d => normalizeName(d.parent ?? "") === k);
  }

  resolveCrop(text: string): Resolution<Crop> {
    return this.match(text, this.cropEntries);
  }

  resolveRegion(text: string, opts: { kind?: RegionKind; parentState?: string } = {}): Resolution<Region> {
    if (opts.kind === "state") return this.match(text, this.stateEntries);
    if (opts.kind === "district") return this.resolveDistrict(text, opts.parentState);

    const s = this.match(text, this.stateEntries);
    if (s.ok && s.match !== "fuzzy") return s;
    const d = this.resolveDistrict(text, opts.parentState);
    if (d.ok && d.match !== "fuzzy") return d;
    if (s.ok) return s;
    if (d.ok) return d;
    if (s.reason === "ambiguous") return s;
    return d.reason === "not_found" ? s : d;
  }

  private resolveDistrict(text: string, parentState?: string): Resolution<Region> {
    if (parentState) {
      const k = normalizeName(parentState);
      const within = this.districtEntries.filter(e => normalizeName(e.entity.parent ?? "") === k);
      const r = this.match(text, within);
      if (r.ok || r.reason === "ambiguous") return r;
      const anywhere = this.match(text, this.districtEntries);
      if (anywhere.ok) {
        return { ok: false, reason: "parent_mismatch", text, candidates: [`${anywhere.value.name} (${anywhere.value.parent})`] };
      }
      return r;
    }
    return this.match(text, this.districtEntries);
  }

  private match<T>(text: string, pool: Entry<T>[]): Resolution<T> {
    const lower = text.trim().toLowerCase();
    const exact = uniqueEntities(pool.filter(e => e.names.some(n => n.trim().toLowerCase() === lower)));
    if (exact.length === 1) return { ok: true, value: exact[0].entity, match: "exact", score: 1 };
    if (exact.length > 1) return { ok: false, reason: "ambiguous", text, candidates: exact.map(e => e.names[0]) };

    const norm = normalizeName(text);
    if (!norm) return { ok: false, reason: "not_found", text, candidates: [] };
    const normalized = uniqueEntities(pool.filter(e => e.names.some(n => normalizeName(n) === norm)));
    if (normalized.length === 1) return { ok: true, value: normalized[0].entity, match: "normalized", score: 1 };
    if (normalized.length > 1) return { ok: false, reason: "ambiguous", text, candidates: normalized.map(e => e.names[0]) };

    const scored = pool
      .map(e => ({ e, score: Math.max(...e.names.map(n => diceSimilarity(text, n))) }))
      .sort((a, b) => b.score - a.score);
    const [best, second] = scored;
    if (!best || best.score < this.fuzzyThreshold) {
      return { ok: false, reason: "not_found", text, candidates: best && best.score > 0 ? [best.e.names[0]] : [] };
    }
    if (second && second.score >= this.fuzzyThreshold && best.score - second.score < this.ambiguityMargin) {
      return { ok: false, reason: "ambiguous", text, candidates: [best.e.names[0], second.e.names[0]] };
    }
    return { ok: true, value: best.e.entity, match: "fuzzy", score: best.score };
  }
}

export async function loadTaxonomy(path?: string, opts?: TaxonomyOptions): Promise<Taxonomy> {
  const file = path ?? dataFilePath("taxonomy.json");
  const raw = await readJsonFile(file);
  const taxonomy = Taxonomy.fromJson(raw, opts);
  console.log(`[taxonomy] loaded ${taxonomy.states.length} states, ${taxonomy.districts.length} districts, ${taxonomy.crops.length} crops`);
  return taxonomy;
}
