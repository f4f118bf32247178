import { basename, extname, join, resolve } from "node:path";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { isKnownLanguage, languageProfile, verticalFonts } from "./language.js";

const MODEL_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_.-]*$/;

export const trainingDocumentSchema = z.object({
  id: z.string().regex(MODEL_NAME_PATTERN, "document id may only contain letters, digits, '_', '.' and '-'"),
  font: z.string().trim().min(1, "font is required"),
  text: z.string().min(1, "ground-truth text path is required"),
  exposure: z.number().int().optional()
});

export const trainingParamsSchema = z.object({
  netSpec: z.string().min(1).optional(),
  continueFrom: z.string().min(1).optional(),
  oldTraineddata: z.string().min(1).optional(),
  maxIterations: z.number().int().positive().default(10_000),
  learningRate: z.number().positive().optional(),
  targetErrorRate: z.number().positive().optional()
});

export const trainingConfigSchema = z
  .object({
    langCode: z.string().min(1),
    modelName: z.string().min(1),
    documents: z.array(trainingDocumentSchema).min(1, "at least one training document is required"),
    outputDir: z.string().min(1),
    workDir: z.string().min(1).optional(),
    langdataDir: z.string().min(1),
    tessdataDir: z.string().min(1),
    fontsDir: z.string().min(1).optional(),
    toolDir: z.string().min(1).optional(),
    psm: z.number().int().min(0).max(13).default(13),
    ptsize: z.number().positive().default(12),
    maxPages: z.number().int().min(0).default(0),
    leading: z.number().int().positive().optional(),
    charSpacing: z.number().default(0),
    distortImage: z.boolean().default(false),
    text2imageExtraArgs: z.array(z.string()).default([]),
    verticalFonts: z.array(z.string()).optional(),
    normMode: z.union([z.literal(1), z.literal(2), z.literal(3)]).optional(),
    langIsRtl: z.boolean().optional(),
    linedataOnly: z.boolean().default(false),
    saveBoxTiff: z.boolean().default(false),
    training: trainingParamsSchema.default({})
  })
  .superRefine((cfg, ctx) => {
    if (!cfg.linedataOnly && !cfg.training.netSpec && !cfg.training.continueFrom) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["training"],
        message: "netSpec or continueFrom is required unless linedataOnly is set"
      });
    }
  });

export type TrainingConfigInput = z.input<typeof trainingConfigSchema>;
export type TrainingDocumentInput = z.input<typeof trainingDocumentSchema>;

export interface TrainingDocument {
  id: string;
  font: string;
  text: string;
  exposure: number;
}

export interface TrainingParams {
  netSpec?: string;
  continueFrom?: string;
  oldTraineddata?: string;
  maxIterations: number;
  learningRate?: number;
  targetErrorRate?: number;
}

/** Fully resolved configuration: absolute paths, language profile applied. */
export interface TrainingConfig {
  langCode: string;
  modelName: string;
  documents: TrainingDocument[];
  outputDir: string;
  workDir: string;
  langdataDir: string;
  tessdataDir: string;
  fontsDir?: string;
  toolDir?: string;
  psm: number;
  ptsize: number;
  maxPages: number;
  leading: number;
  charSpacing: number;
  distortImage: boolean;
  text2imageExtraArgs: string[];
  verticalFonts: string[];
  normMode: number;
  langIsRtl: boolean;
  linedataOnly: boolean;
  saveBoxTiff: boolean;
  training: TrainingParams;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

/** Validates anything (a typed input, a parsed JSON file) into a resolved configuration. */
export function resolveConfig(input: TrainingConfigInput | unknown, cwd: string = process.cwd()): TrainingConfig {
  const parsed = trainingConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid training configuration: ${formatIssues(parsed.error)}`, "INVALID_CONFIG");
  }
  const cfg = parsed.data;

  if (!MODEL_NAME_PATTERN.test(cfg.modelName)) {
    throw new ConfigurationError(`Malformed model name: ${cfg.modelName}`, "MALFORMED_MODEL_NAME");
  }
  if (!isKnownLanguage(cfg.langCode)) {
    throw new ConfigurationError(`${cfg.langCode} is not a valid language code`, "UNKNOWN_LANGUAGE");
  }

  const seen = new Set<string>();
  for (const doc of cfg.documents) {
    if (seen.has(doc.id)) {
      throw new ConfigurationError(`Duplicate training document id: ${doc.id}`, "DUPLICATE_DOCUMENT");
    }
    seen.add(doc.id);
  }

  const profile = languageProfile(cfg.langCode);
  const abs = (p: string) => resolve(cwd, p);
  const outputDir = abs(cfg.outputDir);
  const optionalAbs = (p: string | undefined) => (p === undefined ? undefined : abs(p));

  return {
    langCode: cfg.langCode,
    modelName: cfg.modelName,
    documents: cfg.documents.map(doc => ({
      id: doc.id,
      font: doc.font,
      text: abs(doc.text),
      exposure: doc.exposure ?? 0
    })),
    outputDir,
    workDir: cfg.workDir ? abs(cfg.workDir) : join(outputDir, ".work"),
    langdataDir: abs(cfg.langdataDir),
    tessdataDir: abs(cfg.tessdataDir),
    fontsDir: optionalAbs(cfg.fontsDir),
    toolDir: optionalAbs(cfg.toolDir),
    psm: cfg.psm,
    ptsize: cfg.ptsize,
    maxPages: cfg.maxPages,
    leading: cfg.leading ?? profile.leading,
    charSpacing: cfg.charSpacing,
    distortImage: cfg.distortImage,
    text2imageExtraArgs: [...profile.text2imageArgs, ...cfg.text2imageExtraArgs],
    verticalFonts: cfg.verticalFonts ?? [...verticalFonts()],
    normMode: cfg.normMode ?? profile.normMode,
    langIsRtl: cfg.langIsRtl ?? profile.langIsRtl,
    linedataOnly: cfg.linedataOnly,
    saveBoxTiff: cfg.saveBoxTiff,
    training: {
      ...cfg.training,
      continueFrom: optionalAbs(cfg.training.continueFrom),
      oldTraineddata: optionalAbs(cfg.training.oldTraineddata)
    }
  };
}

/** Font name without spaces or commas, as used in artifact file names. */
export function makeFontName(font: string): string {
  return font.replace(/ /g, "_").replace(/,/g, "");
}

export interface FontMatrix {
  corpus: string[];
  fonts: string[];
  exposures: number[];
}

/**
 * One document per corpus file, font and exposure. Ids are `<font>.exp<n>`,
 * prefixed with the corpus file stem when more than one corpus file is given;
 * characters outside `[A-Za-z0-9_.-]` become `_`.
 */
export function documentsFromFonts(matrix: FontMatrix): TrainingDocumentInput[] {
  const docs: TrainingDocumentInput[] = [];
  for (const text of matrix.corpus) {
    const stem = basename(text, extname(text)).replace(/[^A-Za-z0-9_.-]/g, "_");
    for (const exposure of matrix.exposures) {
      for (const font of matrix.fonts) {
        const base = `${makeFontName(font)}.exp${exposure}`.replace(/[^A-Za-z0-9_.-]/g, "_");
        docs.push({ id: matrix.corpus.length > 1 ? `${stem}.${base}` : base, font, text, exposure });
      }
    }
  }
  return docs;
}

export function defaultExposures(langCode: string): number[] {
  return isKnownLanguage(langCode) ? languageProfile(langCode).exposures : [0];
}

export interface EnvDefaults {
  toolDir?: string;
  tessdataDir?: string;
  langdataDir?: string;
  fontsDir?: string;
  maxParallel?: number;
  stepTimeoutMs?: number;
}

function positiveNumber(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") return undefined;
  const n = Number(raw);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

export function envDefaults(env: NodeJS.ProcessEnv = process.env): EnvDefaults {
  const timeoutS = positiveNumber(env.TRAINFLOW_TIMEOUT_S);
  const jobs = positiveNumber(env.TRAINFLOW_JOBS);
  return {
    toolDir: env.TRAINFLOW_TOOL_DIR || undefined,
    tessdataDir: env.TESSDATA_PREFIX || undefined,
    langdataDir: env.TRAINFLOW_LANGDATA_DIR || undefined,
    fontsDir: env.TRAINFLOW_FONTS_DIR || undefined,
    maxParallel: jobs === undefined ? undefined : Math.floor(jobs),
    stepTimeoutMs: timeoutS === undefined ? undefined : timeoutS * 1000
  };
}
