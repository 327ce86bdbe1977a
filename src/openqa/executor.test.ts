import { beforeAll, describe, expect, it } from "vitest";
import { describeScope, execute, resolveYears } from "./executor.js";
import { buildHarmonizedDataset } from "./harmonize.js";
import type { HarmonizedDataset } from "./harmonize.js";
import type { AnswerFragment, Crop, IntentResult, Region } from "./schemas.js";
import type { QueryIntent, YearScope } from "./types.js";
import { fixtureGrids, fixtureTaxonomy, MemoryLoader } from "./testing/fixtures.js";

const tx = fixtureTaxonomy();
const ALL: YearScope = { kind: "all" };
const LATEST: YearScope = { kind: "latest" };

function state(name: string): Region {
  const s = tx.state(name);
  if (!s) throw new Error(`no state ${name}`);
  return s;
}

function crop(name: string): Crop {
  const c = tx.resolveCrop(name);
  if (!c.ok) throw new Error(`no crop ${name}`);
  return c.value;
}

function isResult<T extends IntentResult["type"]>(r: IntentResult, type: T): r is Extract<IntentResult, { type: T }> {
  return r.type === type;
}

function resultOf<T extends IntentResult["type"]>(f: AnswerFragment, type: T): Extract<IntentResult, { type: T }> {
  if (!f.ok) throw new Error(`${f.failure.code}: ${f.failure.message}`);
  if (!isResult(f.result, type)) throw new Error(`expected ${type}, got ${f.result.type}`);
  return f.result;
}

let ds: HarmonizedDataset;
beforeAll(async () => {
  ds = await buildHarmonizedDataset(new MemoryLoader(), tx);
});

const run = (intent: QueryIntent) => execute(intent, ds);

describe("resolveYears", () => {
  const avail = [2020, 2018, 2019, 2019];

  it("resolves each scope kind against the available years", () => {
    expect(resolveYears(ALL, avail)).toEqual([2018, 2019, 2020]);
    expect(resolveYears({ kind: "last", count: 2 }, avail)).toEqual([2019, 2020]);
    expect(resolveYears(LATEST, avail)).toEqual([2020]);
    expect(resolveYears(LATEST, [])).toEqual([]);
    expect(resolveYears({ kind: "range", from: 2019 }, avail)).toEqual([2019, 2020]);
    expect(resolveYears({ kind: "years", years: [2020, 2015] }, avail)).toEqual([2015, 2020]);
  });

  it("describes scopes that resolved to nothing", () => {
    expect(describeScope(LATEST, [])).toBe("the latest year");
    expect(describeScope({ kind: "range", from: 2021 }, [])).toBe("2021 onwards");
    expect(describeScope({ kind: "last", count: 3 }, [2019, 2020])).toBe("2019-2020");
  });
});

describe("rainfall", () => {
  it("averages annual totals over the resolved years", () => {
    const r = resultOf(run({ type: "rainfall_aggregate", question: "q", years: ALL, region: state("Punjab") }), "rainfall_aggregate");
    expect(r.years).toEqual([2018, 2019, 2020]);
    expect(r.meanAnnualMm).toBeCloseTo(400, 8);
    expect(r.perYear.map(p => Math.round(p.mm))).toEqual([300, 400, 500]);
  });

  it("cites the rainfall dataset for the years used", () => {
    const f = run({ type: "rainfall_aggregate", question: "q", years: { kind: "years", years: [2019] }, region: state("Tamil Nadu") });
    expect(f.citations).toEqual([
      {
        dataset: "IMD Rainfall Data", metric: "rainfall_mm", region: "Tamil Nadu", years: [2019],
        source: "India Meteorological Department (0.25° gridded daily)",
      },
    ]);
  });

  it("reports a region without rainfall cells", () => {
    const f = run({ type: "rainfall_aggregate", question: "q", years: ALL, region: state("Karnataka") });
    expect(f).toMatchObject({
      ok: false,
      failure: {
        code: "NoDataForScope",
        message: "No rainfall_mm data for Karnataka for 2018-2020",
        scope: { metric: "rainfall_mm", region: "Karnataka", years: [2018, 2019, 2020] },
      },
    });
  });

  it("subtracts the second region from the first", () => {
    const r = resultOf(
      run({ type: "rainfall_compare", question: "q", years: ALL, regions: [state("Punjab"), state("Haryana")] }),
      "rainfall_compare",
    );
    expect(r.regions.map(x => x.region)).toEqual(["Punjab", "Haryana"]);
    expect(r.regions[1].meanAnnualMm).toBeCloseTo(980 / 3, 8);
    expect(r.differenceMm).toBeCloseTo(400 - 980 / 3, 8);
  });
});

describe("crop_rank", () => {
  it("ranks crops by total production", () => {
    const intent: QueryIntent = { type: "crop_rank", question: "q", years: ALL, regions: [state("Punjab"), state("Haryana")], topN: 3 };
    const r = resultOf(run(intent), "crop_rank");
    expect(r.rankings).toEqual([
      {
        region: "Punjab",
        crops: [
          { crop: "Wheat", category: "cereals", productionTonnes: 16200 },
          { crop: "Rice", category: "cereals", productionTonnes: 9900 },
          { crop: "Maize", category: "cereals", productionTonnes: 270 },
        ],
      },
      {
        region: "Haryana",
        crops: [
          { crop: "Wheat", category: "cereals", productionTonnes: 6100 },
          { crop: "Rice", category: "cereals", productionTonnes: 1950 },
          { crop: "Bajra", category: "cereals", productionTonnes: 1700 },
        ],
      },
    ]);
    expect(run(intent)).toEqual(run(intent));
  });

  it("filters by category", () => {
    const r = resultOf(
      run({ type: "crop_rank", question: "q", years: ALL, regions: [state("Punjab")], topN: 10, category: "pulses" }),
      "crop_rank",
    );
    expect(r.rankings[0].crops).toEqual([{ crop: "Gram", category: "pulses", productionTonnes: 30 }]);
  });

  it("reports a region with no production in scope", () => {
    const f = run({ type: "crop_rank", question: "q", years: { kind: "years", years: [2018] }, regions: [state("Karnataka")], topN: 5 });
    expect(f).toMatchObject({ ok: false, failure: { code: "NoDataForScope", message: "No production_tonnes data for Karnataka for 2018" } });
  });
});

describe("district extremes", () => {
  it("finds the highest and lowest district in the latest year", () => {
    const hi = resultOf(
      run({ type: "district_extreme", question: "q", years: LATEST, state: state("Punjab"), crop: crop("Rice"), extreme: "highest" }),
      "district_extreme",
    );
    expect(hi).toMatchObject({ district: "Sangrur", productionTonnes: 1400, years: [2020] });
    const lo = resultOf(
      run({ type: "district_extreme", question: "q", years: LATEST, state: state("Punjab"), crop: crop("Rice"), extreme: "lowest" }),
      "district_extreme",
    );
    expect(lo).toMatchObject({ district: "Amritsar", productionTonnes: 1000 });
  });

  it("compares districts across two states", () => {
    const r = resultOf(
      run({
        type: "cross_state_district_compare", question: "q", years: LATEST, crop: crop("Wheat"),
        highest: state("Punjab"), lowest: state("Haryana"),
      }),
      "cross_state_district_compare",
    );
    expect(r.highest).toMatchObject({ state: "Punjab", district: "Ludhiana", productionTonnes: 2200 });
    expect(r.lowest).toMatchObject({ state: "Haryana", district: "Hisar", productionTonnes: 1000 });
  });

  it("keeps the half that resolved when the other has no data", () => {
    const f = run({
      type: "cross_state_district_compare", question: "q", years: LATEST, crop: crop("Wheat"),
      highest: state("Karnataka"), lowest: state("Haryana"),
    });
    if (f.ok) throw new Error("expected a failure");
    expect(f.failure.message).toBe("No production_tonnes data for Wheat in Karnataka for 2020");
    expect(f.partial).toMatchObject({ state: "Haryana", district: "Hisar", extreme: "lowest" });
  });
});

describe("trend", () => {
  it("fits a rising series", () => {
    const r = resultOf(run({ type: "trend", question: "q", years: ALL, region: state("Punjab"), crop: crop("Rice") }), "trend");
    expect(r.series).toEqual([
      { year: 2018, productionTonnes: 3000 },
      { year: 2019, productionTonnes: 3300 },
      { year: 2020, productionTonnes: 3600 },
    ]);
    expect(r.slope).toBeCloseTo(300, 8);
    expect(r.percentChange).toBeCloseTo(20, 8);
    expect(r.direction).toBe("increasing");
  });

  it("labels falling and flat series", () => {
    const falling = resultOf(run({ type: "trend", question: "q", years: ALL, region: state("Rajasthan"), crop: crop("Wheat") }), "trend");
    expect(falling.slope).toBeCloseTo(-10, 8);
    expect(falling.direction).toBe("decreasing");
    expect(falling.percentChange).toBeCloseTo(-4, 8);

    const flat = resultOf(
      run({ type: "trend", question: "q", years: { kind: "range", from: 2019 }, region: state("Rajasthan"), crop: crop("Wheat") }),
      "trend",
    );
    expect(flat.direction).toBe("flat");
  });

  it("needs two years", () => {
    const f = run({ type: "trend", question: "q", years: ALL, region: state("Punjab"), crop: crop("Gram") });
    expect(f).toMatchObject({
      ok: false,
      failure: { code: "InsufficientSeries", message: "Need at least 2 years of production_tonnes data for Gram in Punjab; found only 2020" },
    });
    expect(f.citations).toHaveLength(1);
  });

  it("reports a crop never grown in the region", () => {
    const f = run({ type: "trend", question: "q", years: ALL, region: state("Punjab"), crop: crop("Banana") });
    expect(f).toMatchObject({
      ok: false,
      failure: { code: "NoDataForScope", message: "No production_tonnes data for Banana in Punjab for 2018-2020" },
    });
  });
});

describe("correlation", () => {
  it("pairs rainfall and production year by year", () => {
    const r = resultOf(run({ type: "correlation", question: "q", years: ALL, region: state("Punjab"), crop: crop("Rice") }), "correlation");
    expect(r.pairs.map(p => p.year)).toEqual([2018, 2019, 2020]);
    expect(r.r).toBeCloseTo(1, 8);
    expect(r.strength).toBe("strong");
    expect(r.direction).toBe("positive");
  });

  it("uses only years present in both datasets", async () => {
    const partial = await buildHarmonizedDataset(new MemoryLoader(fixtureGrids.slice(0, 2)), tx);
    const f = execute({ type: "correlation", question: "q", years: ALL, region: state("Punjab"), crop: crop("Rice") }, partial);
    expect(resultOf(f, "correlation").pairs.map(p => p.year)).toEqual([2018, 2019]);
  });

  it("needs two shared years", () => {
    const f = run({ type: "correlation", question: "q", years: ALL, region: state("Punjab"), crop: crop("Gram") });
    expect(f).toMatchObject({
      ok: false,
      failure: { code: "InsufficientSeries", message: "Need at least 2 years with both rainfall and Gram production in Punjab; found only 2020" },
    });
  });

  it("reports missing rainfall for the production years", () => {
    const f = run({ type: "correlation", question: "q", years: ALL, region: state("Karnataka"), crop: crop("Rice") });
    expect(f).toMatchObject({ ok: false, failure: { code: "NoDataForScope", message: "No rainfall_mm data for Karnataka for 2019-2020" } });
  });
});

describe("policy arguments", () => {
  it("ranks arguments for the promoted crop by margin", () => {
    const f = run({
      type: "policy_argument", question: "q", years: ALL, region: state("Rajasthan"), promote: crop("Bajra"), over: crop("Wheat"),
    });
    const r = resultOf(f, "policy_argument");
    expect(r.arguments.map(a => a.basis)).toEqual(["trend", "recent_production", "rainfall_correlation"]);
    expect(r.arguments.every(a => a.favours === "Bajra")).toBe(true);
    expect(r.arguments[0].margin).toBeCloseTo(1, 8);
    expect(r.arguments[1]).toEqual({
      basis: "recent_production",
      favours: "Bajra",
      margin: 1320 / 1800,
      statement: "In 2020, Rajasthan produced 1,800 t of Bajra against 480 t of Wheat.",
    });
    expect(r.arguments[0].statement).toBe(
      "Bajra output changed by +5.9% a year over 2018-2020, against -2.1% a year for Wheat.",
    );
    expect(r.arguments[2].statement).toBe(
      "Bajra output is less tied to rainfall in Rajasthan (r = 0.95) than Wheat (r = -0.98).",
    );
    expect(r.arguments[2].margin).toBeCloseTo(0.0205, 4);
    expect(f.citations.map(c => `${c.metric}:${c.crop ?? ""}`)).toEqual([
      "rainfall_mm:", "production_tonnes:Bajra", "production_tonnes:Wheat",
    ]);
  });

  it("argues from district spread when the series are too short", () => {
    const r = resultOf(
      run({ type: "policy_argument", question: "q", years: ALL, region: state("Punjab"), promote: crop("Gram"), over: crop("Maize") }),
      "policy_argument",
    );
    expect(r.arguments).toEqual([
      { basis: "district_spread", favours: "Gram", margin: 1, statement: "In 2020, Gram was grown in 1 district(s) of Punjab and Maize in 0." },
    ]);
  });

  it("reports crops with no production", () => {
    const f = run({
      type: "policy_argument", question: "q", years: ALL, region: state("Punjab"), promote: crop("Banana"), over: crop("Cotton"),
    });
    expect(f).toMatchObject({
      ok: false,
      failure: { code: "NoDataForScope", message: "No production_tonnes data for Banana and Cotton in Punjab for 2018-2020" },
    });
  });
});
