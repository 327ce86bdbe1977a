// In-memory taxonomy, rainfall grids and crop table shared by the test suites.
import { Taxonomy } from "../taxonomy.js";
import type { CropTableRow, RainfallGrid } from "../schemas.js";
import type { RawDatasetLoader } from "../types.js";

export const fixtureTaxonomyFile = {
  states: [
    { name: "Punjab", bounds: [73.5, 77.0, 29.5, 32.5], districts: [{ name: "Ludhiana" }, { name: "Amritsar" }, { name: "Sangrur" }] },
    { name: "Haryana", bounds: [74.0, 78.0, 28.0, 31.0], districts: [{ name: "Karnal" }, { name: "Hisar", aliases: ["Hissar"] }] },
    {
      name: "Tamil Nadu", aliases: ["Tamilnadu"], bounds: [76.0, 80.5, 8.0, 13.5],
      districts: [{ name: "Thanjavur", aliases: ["Tanjore"] }, { name: "Madurai" }],
    },
    { name: "Karnataka", bounds: [74.0, 78.5, 11.5, 18.5], districts: [{ name: "Mysuru", aliases: ["Mysore"] }, { name: "Mandya" }] },
    { name: "Rajasthan", bounds: [69.0, 78.5, 23.0, 30.5], districts: [{ name: "Jaipur" }, { name: "Barmer" }] },
    { name: "Jammu and Kashmir", aliases: ["J&K"] },
  ],
  crops: [
    { name: "Rice", category: "cereals", aliases: ["Paddy"] },
    { name: "Wheat", category: "cereals" },
    { name: "Maize", category: "cereals", aliases: ["Corn"] },
    { name: "Bajra", category: "cereals", aliases: ["Pearl Millet"] },
    { name: "Gram", category: "pulses", aliases: ["Chickpea"] },
    { name: "Moong", category: "pulses", aliases: ["Green Gram"] },
    { name: "Tur", category: "pulses", aliases: ["Arhar", "Arhar/Tur"] },
    { name: "Sugarcane", category: "cash crops" },
    { name: "Cotton", category: "fibres", aliases: ["Cotton(lint)"] },
    { name: "Banana", category: "fruits" },
  ],
};

export function fixtureTaxonomy(): Taxonomy {
  return Taxonomy.fromJson(fixtureTaxonomyFile);
}

// lats [10, 30, 31] x lons [75, 77.5]
// annual cell totals:
//   2018: (10,77.5)=100  (30,75)=300 (30,77.5)=200 (31,75)=300 (31,77.5)=200
//   2019: (10,77.5)=150  (30,75)=400 (30,77.5)=300 (31,75)=400 (31,77.5)=300
//   2020: (10,77.5)=200  (30,75)=500 (30,77.5)=260 (31,75)=500 (31,77.5)=260, (10,75) has no valid day
export const fixtureGrids: RainfallGrid[] = [
  {
    year: 2018, lats: [10, 30, 31], lons: [75, 77.5],
    values: [
      [[5, 40], [100, 50], [100, 50]],
      [[5, 60], [200, 150], [200, 150]],
    ],
  },
  {
    year: 2019, lats: [10, 30, 31], lons: [75, 77.5],
    values: [
      [[5, 50], [150, 100], [150, 100]],
      [[5, 100], [250, 200], [250, 200]],
    ],
  },
  {
    year: 2020, lats: [10, 30, 31], lons: [75, 77.5], missingValue: -999,
    values: [
      [[null, 80], [250, -999], [250, 120]],
      [[NaN, 120], [250, 260], [250, 140]],
    ],
  },
];

export const fixtureCropRows: CropTableRow[] = [
  { state: "1. Punjab", district: "Ludhiana", year: "2018 - 2019", production: { Rice: "1,000", Wheat: 2000, Maize: 100, "Cotton(lint)": null, Banana: "" } },
  { state: "Punjab", district: "Amritsar", year: 2018, production: { Rice: 800, Wheat: 1500, Maize: 50 } },
  { state: "Punjab", district: "Sangrur", year: 2018, production: { Rice: 1200, Wheat: 1800 } },
  { state: "Punjab", district: "Ludhiana", year: 2019, production: { Rice: 1100, Wheat: 2100, Maize: 120 } },
  { state: "Punjab", district: "Amritsar", year: 2019, production: { Rice: 900, Wheat: 1600 } },
  { state: "Punjab", district: "Sangrur", year: 2019, production: { Rice: 1300, Wheat: 1700 } },
  { state: "Punjab", district: "Ludhiana", year: 2020, production: { Rice: 1150 } },
  { state: "Punjab", district: "Ludhiana", year: 2020, production: { Rice: 1200, Wheat: 2200 } },
  { state: "Punjab", district: "Amritsar", year: 2020, production: { Rice: 1000, Wheat: 1700 } },
  { state: "Punjab", district: "Sangrur", year: 2020, production: { Rice: 1400, Wheat: 1600, Gram: 30, Dragonfruit: 5 } },
  { state: "Punjab", district: "Atlantis", year: 2020, production: { Rice: 10 } },

  { state: "Haryana", district: "Karnal", year: 2018, production: { Rice: 600, Wheat: 1000, Bajra: 200 } },
  { state: "Haryana", district: "Hisar", year: 2018, production: { Wheat: 900, Bajra: 400, "Cotton(lint)": 300 } },
  { state: "Haryana", district: "Karnal", year: 2019, production: { Rice: 650, Wheat: 1100, Bajra: 150 } },
  { state: "Haryana", district: "Hisar", year: 2019, production: { Wheat: 950, Bajra: 450, "Cotton(lint)": 320 } },
  { state: "Haryana", district: "Karnal", year: 2020, production: { Rice: 700, Wheat: 1150 } },
  { state: "Haryana", district: "Hissar", year: 2020, production: { Wheat: 1000, Bajra: 500, "Cotton(lint)": 350 } },

  { state: "Tamil Nadu", district: "Thanjavur", year: 2018, production: { Rice: 900, Sugarcane: 500 } },
  { state: "Tamil Nadu", district: "Madurai", year: 2018, production: { Rice: 300, Sugarcane: 200 } },
  { state: "Tamil Nadu", district: "Thanjavur", year: 2019, production: { Rice: 950, Sugarcane: 550 } },
  { state: "Tamil Nadu", district: "Madurai", year: 2019, production: { Rice: 320, Sugarcane: 250 } },
  { state: "Tamilnadu", district: "Tanjore", year: 2020, production: { Rice: 1000 } },
  { state: "Tamil Nadu", district: "Madurai", year: 2020, production: { Rice: 310 } },

  { state: "Karnataka", district: "Mysuru", year: 2019, production: { Rice: 400, Sugarcane: 900 } },
  { state: "Karnataka", district: "Mandya", year: 2019, production: { Rice: 300, Sugarcane: 1200 } },
  { state: "Karnataka", district: "Mysore", year: 2020, production: { Rice: 420, Sugarcane: 950 } },
  { state: "Karnataka", district: "Mandya", year: 2020, production: { Rice: 280, Sugarcane: 1250 } },

  { state: "Rajasthan", district: "Jaipur", year: 2018, production: { Bajra: 700, Wheat: 500 } },
  { state: "Rajasthan", district: "Barmer", year: 2018, production: { Bajra: 900 } },
  { state: "Rajasthan", district: "Jaipur", year: 2019, production: { Bajra: 750, Wheat: 480 } },
  { state: "Rajasthan", district: "Barmer", year: 2019, production: { Bajra: 950 } },
  { state: "Rajasthan", district: "Jaipur", year: 2020, production: { Bajra: 800, Wheat: 460 } },
  { state: "Rajasthan", district: "Barmer", year: 2020, production: { Bajra: 1000, Wheat: 20 } },
];

export class MemoryLoader implements RawDatasetLoader {
  calls = 0;
  sources = {
    rainfall: { dataset: "IMD Rainfall Data", source: "India Meteorological Department", resolution: "0.25° gridded daily" },
    crops: { dataset: "Agriculture Production Data", source: "Directorate of Economics and Statistics", resolution: "district, crop year" },
  };

  constructor(
    private readonly grids: RainfallGrid[] = fixtureGrids,
    private readonly rows: CropTableRow[] = fixtureCropRows,
  ) {}

  async loadRainfall(): Promise<RainfallGrid[]> {
    this.calls++;
    return this.grids;
  }

  async loadCropTable(): Promise<CropTableRow[]> {
    return this.rows;
  }
}
