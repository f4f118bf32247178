import { readFileSync } from "node:fs";
import { z } from "zod";

const languageOverrideSchema = z.object({
  text2imageArgs: z.array(z.string()).optional(),
  exposures: z.array(z.number().int()).optional(),
  leading: z.number().int().positive().optional()
});

const languageTableSchema = z.object({
  validLanguageCodes: z.array(z.string()),
  rightToLeft: z.array(z.string()),
  complexScript: z.array(z.string()),
  verticalFonts: z.array(z.string()),
  overrides: z.record(languageOverrideSchema)
});

type LanguageTable = z.infer<typeof languageTableSchema>;

export interface LanguageProfile {
  langCode: string;
  langIsRtl: boolean;
  normMode: 1 | 2;
  leading: number;
  exposures: number[];
  text2imageArgs: string[];
}

const DEFAULT_LEADING = 32;

let table: LanguageTable | undefined;

function loadTable(): LanguageTable {
  if (!table) {
    const raw = readFileSync(new URL("../data/language-profiles.json", import.meta.url), "utf-8");
    table = languageTableSchema.parse(JSON.parse(raw));
  }
  return table;
}

export function isKnownLanguage(langCode: string): boolean {
  return loadTable().validLanguageCodes.includes(langCode);
}

export function verticalFonts(): readonly string[] {
  return loadTable().verticalFonts;
}

export function languageProfile(langCode: string): LanguageProfile {
  const t = loadTable();
  const override = t.overrides[langCode] ?? {};
  const langIsRtl = t.rightToLeft.includes(langCode);
  return {
    langCode,
    langIsRtl,
    normMode: langIsRtl || t.complexScript.includes(langCode) ? 2 : 1,
    leading: override.leading ?? DEFAULT_LEADING,
    exposures: override.exposures ?? [0],
    text2imageArgs: override.text2imageArgs ?? []
  };
}
