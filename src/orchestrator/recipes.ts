// Strategy table: one recipe per artifact kind, mapping it to the command that
// produces it and the nodes it depends on.
import { join } from "node:path";
import type { TrainingConfig, TrainingDocument } from "../config.js";
import type { ArtifactKind, ArtifactNode, NodeName, StepAction, StepParams } from "../types/contracts.js";

export type RecipeScope = "document" | "language" | "model";

export interface RecipeContext {
  config: TrainingConfig;
  /** Optional `<langdata>/<lang>/<lang>.config`, when present on disk. */
  langConfig?: string;
  /** Present only for document-scoped recipes. */
  doc?: TrainingDocument;
}

export interface Recipe {
  readonly scope: RecipeScope;
  /** Tool to resolve on the host, or null when the orchestrator writes the file itself. */
  readonly program: string | null;
  build(ctx: RecipeContext): ArtifactNode;
}

/** Subdirectory of the work directory that survives cleanup. */
export const CHECKPOINT_DIR = "checkpoints";

export function nodeName(kind: ArtifactKind, key: string): NodeName {
  return `${kind}(${key})`;
}

export function artifactPaths(config: TrainingConfig) {
  const { workDir, outputDir, langCode: lang, modelName: model } = config;
  return {
    groundtruthText: (doc: TrainingDocument) => join(workDir, `${lang}.${doc.id}.gt.txt`),
    docBase: (doc: TrainingDocument) => join(workDir, `${lang}.${doc.id}`),
    tif: (doc: TrainingDocument) => join(workDir, `${lang}.${doc.id}.tif`),
    box: (doc: TrainingDocument) => join(workDir, `${lang}.${doc.id}.box`),
    lstmfBase: (doc: TrainingDocument) => join(outputDir, `${lang}.${doc.id}`),
    lstmf: (doc: TrainingDocument) => join(outputDir, `${lang}.${doc.id}.lstmf`),
    unicharset: join(workDir, `${lang}.unicharset`),
    propsUnicharset: join(workDir, `${lang}.props.unicharset`),
    xheights: join(workDir, `${lang}.xheights`),
    fontconfigBase: join(workDir, `${lang}.fontconfig`),
    starter: join(outputDir, lang, `${lang}.traineddata`),
    lstmfList: join(outputDir, `${lang}.training_files.txt`),
    checkpointPrefix: join(workDir, CHECKPOINT_DIR, model),
    checkpoint: join(workDir, CHECKPOINT_DIR, `${model}_checkpoint`),
    traineddata: join(outputDir, `${model}.traineddata`),
    langdataPrefix: join(config.langdataDir, lang, lang)
  };
}

function requireDoc(ctx: RecipeContext, kind: ArtifactKind): TrainingDocument {
  if (!ctx.doc) throw new Error(`${kind} recipe needs a training document`);
  return ctx.doc;
}

function command(program: string, args: string[], env?: Record<string, string>): StepAction {
  return env ? { type: "command", program, args, env } : { type: "command", program, args };
}

function node(
  kind: ArtifactKind,
  key: string,
  outputs: string[],
  dependencies: NodeName[],
  action: StepAction,
  params: StepParams,
  sources: string[] = []
): ArtifactNode {
  return { name: nodeName(kind, key), kind, outputs, dependencies, sources, action, params };
}

const groundtruth: Recipe = {
  scope: "document",
  program: null,
  build(ctx) {
    const { config } = ctx;
    const doc = requireDoc(ctx, "groundtruth");
    return node(
      "groundtruth",
      doc.id,
      [artifactPaths(config).groundtruthText(doc)],
      [],
      { type: "copy", from: doc.text },
      { font: doc.font, exposure: doc.exposure, langCode: config.langCode },
      [doc.text]
    );
  }
};

function fontArgs(config: TrainingConfig): string[] {
  const args = [`--fontconfig_tmpdir=${config.workDir}`];
  if (config.fontsDir) args.push(`--fonts_dir=${config.fontsDir}`);
  return args;
}

// Renders one page with the first font so the font cache exists before the
// box steps share it.
const fontconfig: Recipe = {
  scope: "language",
  program: "text2image",
  build({ config }) {
    const paths = artifactPaths(config);
    const first = config.documents[0];
    if (!first) throw new Error("fontconfig recipe needs at least one training document");
    const args = [
      ...fontArgs(config),
      `--font=${first.font}`,
      `--text=${paths.groundtruthText(first)}`,
      `--outputbase=${paths.fontconfigBase}`,
      `--ptsize=${config.ptsize}`,
      "--max_pages=1"
    ];
    return node(
      "fontconfig",
      config.langCode,
      [`${paths.fontconfigBase}.tif`],
      [nodeName("groundtruth", first.id)],
      command("text2image", args),
      { font: first.font }
    );
  }
};

// text2image writes the page image and the box file for the source text together.
const box: Recipe = {
  scope: "document",
  program: "text2image",
  build(ctx) {
    const { config } = ctx;
    const doc = requireDoc(ctx, "box");
    const paths = artifactPaths(config);
    const args = fontArgs(config);
    args.push(
      "--strip_unrenderable_words",
      `--leading=${config.leading}`,
      `--char_spacing=${config.charSpacing}`,
      `--exposure=${doc.exposure}`,
      `--outputbase=${paths.docBase(doc)}`,
      `--max_pages=${config.maxPages}`
    );
    if (config.distortImage) args.push("--distort_image");
    if (config.verticalFonts.includes(doc.font)) args.push("--writing_mode=vertical-upright");
    args.push(
      `--font=${doc.font}`,
      `--text=${paths.groundtruthText(doc)}`,
      `--ptsize=${config.ptsize}`,
      ...config.text2imageExtraArgs
    );
    return node(
      "box",
      doc.id,
      [paths.box(doc), paths.tif(doc)],
      [nodeName("groundtruth", doc.id), nodeName("fontconfig", config.langCode)],
      command("text2image", args),
      { font: doc.font, exposure: doc.exposure, langCode: config.langCode }
    );
  }
};

const lstmf: Recipe = {
  scope: "document",
  program: "tesseract",
  build(ctx) {
    const { config, langConfig } = ctx;
    const doc = requireDoc(ctx, "lstmf");
    const paths = artifactPaths(config);
    const args = [paths.tif(doc), paths.lstmfBase(doc), "--psm", String(config.psm), "lstm.train"];
    if (langConfig) args.push(langConfig);
    return node(
      "lstmf",
      doc.id,
      [paths.lstmf(doc)],
      [nodeName("box", doc.id)],
      command("tesseract", args, { TESSDATA_PREFIX: config.tessdataDir }),
      { psm: config.psm, langCode: config.langCode },
      langConfig ? [langConfig] : []
    );
  }
};

const unicharset: Recipe = {
  scope: "language",
  program: "unicharset_extractor",
  build({ config }) {
    const paths = artifactPaths(config);
    return node(
      "unicharset",
      config.langCode,
      [paths.unicharset],
      config.documents.map(doc => nodeName("box", doc.id)),
      command("unicharset_extractor", [
        "--output_unicharset",
        paths.unicharset,
        "--norm_mode",
        String(config.normMode),
        ...config.documents.map(doc => paths.box(doc))
      ]),
      { normMode: config.normMode }
    );
  }
};

const properties: Recipe = {
  scope: "language",
  program: "set_unicharset_properties",
  build({ config }) {
    const paths = artifactPaths(config);
    return node(
      "properties",
      config.langCode,
      [paths.propsUnicharset, paths.xheights],
      [nodeName("unicharset", config.langCode)],
      command("set_unicharset_properties", [
        "-U",
        paths.unicharset,
        "-O",
        paths.propsUnicharset,
        "-X",
        paths.xheights,
        `--script_dir=${config.langdataDir}`
      ]),
      { langCode: config.langCode }
    );
  }
};

const starter: Recipe = {
  scope: "language",
  program: "combine_lang_model",
  build({ config }) {
    const paths = artifactPaths(config);
    const prefix = paths.langdataPrefix;
    const args = [
      "--input_unicharset", paths.propsUnicharset,
      "--script_dir", config.langdataDir,
      "--words", `${prefix}.wordlist`,
      "--numbers", `${prefix}.numbers`,
      "--puncs", `${prefix}.punc`,
      "--output_dir", config.outputDir,
      "--lang", config.langCode
    ];
    if (config.langIsRtl) args.push("--lang_is_rtl");
    if (config.normMode >= 2) args.push("--pass_through_recoder");
    return node(
      "starter",
      config.langCode,
      [paths.starter],
      [nodeName("properties", config.langCode)],
      command("combine_lang_model", args),
      { langCode: config.langCode, langIsRtl: config.langIsRtl, normMode: config.normMode },
      [`${prefix}.wordlist`, `${prefix}.numbers`, `${prefix}.punc`]
    );
  }
};

const lstmflist: Recipe = {
  scope: "language",
  program: null,
  build({ config }) {
    const paths = artifactPaths(config);
    return node(
      "lstmflist",
      config.langCode,
      [paths.lstmfList],
      config.documents.map(doc => nodeName("lstmf", doc.id)),
      { type: "write", contents: config.documents.map(doc => paths.lstmf(doc)).join("\n") },
      { langCode: config.langCode }
    );
  }
};

const checkpoint: Recipe = {
  scope: "model",
  program: "lstmtraining",
  build({ config }) {
    const paths = artifactPaths(config);
    const t = config.training;
    const args = [
      "--traineddata", paths.starter,
      "--train_listfile", paths.lstmfList,
      "--model_output", paths.checkpointPrefix,
      "--max_iterations", String(t.maxIterations)
    ];
    const sources: string[] = [];
    if (t.continueFrom) {
      args.push("--continue_from", t.continueFrom);
      sources.push(t.continueFrom);
    } else if (t.netSpec) {
      args.push("--net_spec", t.netSpec);
    }
    if (t.oldTraineddata) {
      args.push("--old_traineddata", t.oldTraineddata);
      sources.push(t.oldTraineddata);
    }
    if (t.learningRate !== undefined) args.push("--learning_rate", String(t.learningRate));
    if (t.targetErrorRate !== undefined) args.push("--target_error_rate", String(t.targetErrorRate));
    return node(
      "checkpoint",
      config.modelName,
      [paths.checkpoint],
      [nodeName("starter", config.langCode), nodeName("lstmflist", config.langCode)],
      command("lstmtraining", args),
      { modelName: config.modelName, maxIterations: t.maxIterations },
      sources
    );
  }
};

const traineddata: Recipe = {
  scope: "model",
  program: "lstmtraining",
  build({ config }) {
    const paths = artifactPaths(config);
    return node(
      "traineddata",
      config.modelName,
      [paths.traineddata],
      [nodeName("checkpoint", config.modelName), nodeName("starter", config.langCode)],
      command("lstmtraining", [
        "--stop_training",
        "--continue_from", paths.checkpoint,
        "--traineddata", paths.starter,
        "--model_output", paths.traineddata
      ]),
      { modelName: config.modelName }
    );
  }
};

export const RECIPES = {
  groundtruth,
  fontconfig,
  box,
  lstmf,
  unicharset,
  properties,
  starter,
  lstmflist,
  checkpoint,
  traineddata
} satisfies Record<ArtifactKind, Recipe>;

/** Kinds in declaration order. */
export const ARTIFACT_KINDS: readonly ArtifactKind[] = [
  "groundtruth",
  "fontconfig",
  "box",
  "lstmf",
  "unicharset",
  "properties",
  "starter",
  "lstmflist",
  "checkpoint",
  "traineddata"
];

/** Kinds that only exist when a model is actually trained. */
export function isTrainingKind(kind: ArtifactKind): boolean {
  switch (kind) {
    case "checkpoint":
    case "traineddata":
      return true;
    case "groundtruth":
    case "fontconfig":
    case "box":
    case "lstmf":
    case "unicharset":
    case "properties":
    case "starter":
    case "lstmflist":
      return false;
  }
}
