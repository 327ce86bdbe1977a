// src/openqa/lexicon.ts
import { z } from "zod";
import { readDataJsonSync } from "./data_files.js";

const LexiconSchema = z.object({
  numberWords: z.record(z.number().int().positive()),
  categoryWords: z.record(z.string()),
  commonWords: z.array(z.string()),
  cropRoleBefore: z.array(z.string()),
  regionRoleBefore: z.array(z.string()),
  cropRoleAfter: z.array(z.string()),
  regionRoleAfter: z.array(z.string()),
});

const raw = LexiconSchema.parse(readDataJsonSync("lexicon.json"));

export const lexicon = {
  numberWords: new Map(Object.entries(raw.numberWords)),
  categoryWords: new Map(Object.entries(raw.categoryWords)),
  commonWords: new Set(raw.commonWords.map(w => w.toLowerCase())),
  cropRoleBefore: new Set(raw.cropRoleBefore),
  regionRoleBefore: new Set(raw.regionRoleBefore),
  cropRoleAfter: new Set(raw.cropRoleAfter),
  regionRoleAfter: new Set(raw.regionRoleAfter),
};
