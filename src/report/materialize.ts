import type { TrainingReport } from "../types/contracts.js";
import { saveRunFile } from "./fsStore.js";

export function writeJson(logRoot: string, runId: string, name: string, obj: unknown) {
  return saveRunFile(logRoot, runId, name, JSON.stringify(obj, null, 2));
}

/** Node names such as `box(doc1)` become `box_doc1_.log`. */
export function logFileName(node: string): string {
  return `${node.replace(/[^A-Za-z0-9_.-]/g, "_")}.log`;
}

/** One log per executed step plus report.json; returns the report path. */
export function writeReport(logRoot: string, runId: string, report: TrainingReport): string {
  for (const step of report.steps) {
    saveRunFile(logRoot, runId, logFileName(step.node), step.output);
  }
  const steps = report.steps.map(({ error, ...rest }) => ({
    ...rest,
    error: error ? { name: error.name, message: error.message } : undefined
  }));
  return writeJson(logRoot, runId, "report.json", { ...report, steps });
}
