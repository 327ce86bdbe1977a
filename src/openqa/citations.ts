// src/openqa/citations.ts
import type { Citation, Crop, Region } from "./schemas.js";
import type { DatasetSources } from "./harmonize.js";
import type { SourceMeta } from "./types.js";

function sourceLine(s: SourceMeta): string {
  return s.resolution ? `${s.source} (${s.resolution})` : s.source;
}

export function rainfallCitation(sources: DatasetSources, region: Region, years: number[]): Citation {
  return {
    dataset: sources.rainfall.dataset,
    metric: "rainfall_mm",
    region: region.name,
    years: [...years],
    source: sourceLine(sources.rainfall),
  };
}

export function productionCitation(sources: DatasetSources, region: Region, years: number[], crop?: Crop): Citation {
  return {
    dataset: sources.crops.dataset,
    metric: "production_tonnes",
    region: region.name,
    years: [...years],
    ...(crop ? { crop: crop.name } : {}),
    source: sourceLine(sources.crops),
  };
}

/** "2018", "2018-2020" for consecutive years, otherwise a comma list. */
export function describeYears(years: number[]): string {
  if (!years.length) return "no years";
  const ys = [...years].sort((a, b) => a - b);
  if (ys.length === 1) return String(ys[0]);
  const consecutive = ys.every((y, i) => i === 0 || y === ys[i - 1] + 1);
  return consecutive ? `${ys[0]}-${ys[ys.length - 1]}` : ys.join(", ");
}

function citationKey(c: Citation): string {
  return [c.dataset, c.metric, c.region, c.crop ?? "", c.years.join(",")].join("|");
}

export function dedupeCitations(list: Citation[]): Citation[] {
  const seen = new Map<string, Citation>();
  for (const c of list) if (!seen.has(citationKey(c))) seen.set(citationKey(c), c);
  return [...seen.values()];
}

export function formatCitations(list: Citation[]): string {
  return list
    .map((c, i) => {
      const scope = [c.crop, c.region, describeYears(c.years)].filter(Boolean).join(", ");
      return `${i + 1}. **${c.dataset}** (${c.metric}): ${scope}. Source: ${c.source}`;
    })
    .join("\n");
}
