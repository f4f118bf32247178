import type { EnvironmentError, StepExecutionError } from "../errors.js";

export type NodeName = string;

export type ArtifactKind =
  | "groundtruth"
  | "fontconfig"
  | "box"
  | "lstmf"
  | "unicharset"
  | "properties"
  | "starter"
  | "lstmflist"
  | "checkpoint"
  | "traineddata";

export type StepAction =
  | {
      readonly type: "command";
      readonly program: string;
      readonly args: readonly string[];
      readonly env?: Readonly<Record<string, string>>;
    }
  | {
      // Produced in-process (e.g. the lstmf list file).
      readonly type: "write";
      readonly contents: string;
    }
  | {
      readonly type: "copy";
      readonly from: string;
    };

export type StepParams = Readonly<Record<string, string | number | boolean>>;

export interface ArtifactNode {
  readonly name: NodeName;
  readonly kind: ArtifactKind;
  /** Absolute paths; the first entry is the node's primary artifact. */
  readonly outputs: readonly string[];
  readonly dependencies: readonly NodeName[];
  /** External input files that no node produces. */
  readonly sources: readonly string[];
  readonly action: StepAction;
  readonly params: StepParams;
}

export interface ArtifactGraph {
  readonly nodes: ReadonlyMap<NodeName, ArtifactNode>;
  /** Declaration order, used to break ties between independent nodes. */
  readonly order: readonly NodeName[];
}

export interface BuildPlan {
  readonly targets: readonly NodeName[];
  readonly steps: readonly ArtifactNode[];
}

export interface StepResult {
  node: NodeName;
  ok: boolean;
  exitCode: number | null;
  output: string;
  durationMs: number;
  error?: StepExecutionError | EnvironmentError;
}

export interface TrainingReport {
  success: boolean;
  steps: StepResult[];
  plannedSteps: number;
  artifactPath: string | null;
  failedStep: NodeName | null;
  startedAt: string; // ISO timestamp
  durationMs: number;
}
