import { describe, expect, it } from "vitest";
import {
  annualCellTotals, buildHarmonizedDataset, cleanName, harmonize, parseCropYear, parseQuantity, regionalMean,
} from "./harmonize.js";
import { DatasetBuildError } from "./errors.js";
import { fixtureCropRows, fixtureGrids, fixtureTaxonomy, MemoryLoader } from "./testing/fixtures.js";
import type { RainfallGrid } from "./schemas.js";

const tx = fixtureTaxonomy();
const sources = new MemoryLoader().sources;

function must<T>(v: T | undefined, what: string): T {
  if (v === undefined) throw new Error(`missing ${what}`);
  return v;
}

describe("raw value cleaning", () => {
  it("strips numbering from names", () => {
    expect(cleanName("3. Punjab ")).toBe("Punjab");
    expect(cleanName("12) Tamil Nadu")).toBe("Tamil Nadu");
    expect(cleanName("Haryana")).toBe("Haryana");
  });

  it("keys crop years by their first calendar year", () => {
    expect(parseCropYear("2018 - 2019")).toBe(2018);
    expect(parseCropYear(2020)).toBe(2020);
    expect(parseCropYear("unknown")).toBeNull();
  });

  it("parses quantities with separators", () => {
    expect(parseQuantity("1,200")).toBe(1200);
    expect(parseQuantity(" 1 200.5 ")).toBe(1200.5);
    expect(parseQuantity("")).toBeNull();
    expect(parseQuantity("NA")).toBeNull();
    expect(parseQuantity(null)).toBeNull();
    expect(parseQuantity(Number.NaN)).toBeNull();
  });
});

describe("rainfall aggregation", () => {
  const grid2020 = must(fixtureGrids[2], "2020 grid");

  it("sums valid days and skips null, NaN and the sentinel", () => {
    expect(annualCellTotals(grid2020)).toEqual([
      [null, 200],
      [500, 260],
      [500, 260],
    ]);
  });

  it("averages only the cells inside the bounds", () => {
    const totals = annualCellTotals(grid2020);
    expect(regionalMean(grid2020, totals, [73.5, 77.0, 29.5, 32.5])).toBeCloseTo(500, 10);
    expect(regionalMean(grid2020, totals, [74.0, 78.0, 28.0, 31.0])).toBeCloseTo(380, 10);
    expect(regionalMean(grid2020, totals, [74.0, 78.5, 11.5, 18.5])).toBeNull();
  });

  it("weights cells by the cosine of their latitude", () => {
    const grid: RainfallGrid = { year: 2000, lats: [0, 60], lons: [80], values: [[[100], [400]]] };
    // weights 1 and 0.5
    expect(regionalMean(grid, annualCellTotals(grid), [70, 90, -10, 70])).toBeCloseTo(200, 10);
  });
});

describe("harmonize", () => {
  const ds = harmonize(fixtureGrids, fixtureCropRows, tx, sources);

  it("reports what was kept and dropped", () => {
    expect(ds.report).toEqual({
      records: { rainfall_mm: 12, production_tonnes: 67 },
      droppedRows: 1,
      unresolvedNames: ["Atlantis (Punjab)"],
      droppedCrops: ["Dragonfruit"],
      collisions: 1,
      rainfallRegions: ["Haryana", "Punjab", "Rajasthan", "Tamil Nadu"],
    });
  });

  it("lists the years each metric covers", () => {
    expect(ds.years("rainfall_mm")).toEqual([2018, 2019, 2020]);
    expect(ds.years("production_tonnes")).toEqual([2018, 2019, 2020]);
  });

  it("keeps the last value on a key collision", () => {
    const ludhiana = must(tx.districtsOf("Punjab").find(d => d.name === "Ludhiana"), "Ludhiana");
    const rice = tx.resolveCrop("Rice");
    if (!rice.ok) throw new Error("Rice");
    expect(ds.production({ region: ludhiana, crop: rice.value, years: [2020] }).map(r => r.value)).toEqual([1200]);
  });

  it("folds alias spellings into canonical districts", () => {
    const tn = must(tx.state("Tamil Nadu"), "Tamil Nadu");
    const recs = ds.production({ region: tn, years: [2020] });
    expect(recs.map(r => `${r.region.name}:${r.crop?.name}:${r.value}`)).toEqual(["Madurai:Rice:310", "Thanjavur:Rice:1000"]);
  });

  it("stores one rainfall value per state and year", () => {
    const punjab = must(tx.state("Punjab"), "Punjab");
    expect(ds.rainfall(punjab, 2019)).toBeCloseTo(400, 10);
    expect(ds.rainfall(must(tx.state("Karnataka"), "Karnataka"), 2019)).toBeNull();
  });
});

describe("buildHarmonizedDataset", () => {
  it("builds from a loader", async () => {
    const ds = await buildHarmonizedDataset(new MemoryLoader(), tx);
    expect(ds.records).toHaveLength(79);
    expect(ds.sources.rainfall.dataset).toBe("IMD Rainfall Data");
  });

  it("rejects malformed grids", async () => {
    const bad: RainfallGrid = { year: 2018, lats: [10, 30], lons: [75], values: [[[1]]] };
    await expect(buildHarmonizedDataset(new MemoryLoader([bad]), tx)).rejects.toThrow(
      "could not load raw datasets",
    );
  });

  it("rejects an empty table", async () => {
    await expect(buildHarmonizedDataset(new MemoryLoader([], []), tx)).rejects.toBeInstanceOf(DatasetBuildError);
  });
});
