export type ConfigurationErrorCode =
  | "INVALID_CONFIG"
  | "MISSING_DOCUMENT"
  | "DUPLICATE_DOCUMENT"
  | "UNKNOWN_LANGUAGE"
  | "MALFORMED_MODEL_NAME"
  | "TOOL_NOT_FOUND"
  | "INVALID_GRAPH"
  | "UNKNOWN_TARGET";

export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly code: ConfigurationErrorCode
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export type StepFailureReason = "exit-code" | "missing-output" | "timeout";

export class StepExecutionError extends Error {
  readonly reason: StepFailureReason;
  readonly exitCode: number | null;

  constructor(node: string, reason: StepFailureReason, detail: string, exitCode: number | null = null, cause?: unknown) {
    super(`Step ${node} failed (${reason}): ${detail}`);
    this.name = "StepExecutionError";
    this.reason = reason;
    this.exitCode = exitCode;
    this.cause = cause;
  }
}

export class EnvironmentError extends Error {
  readonly code: string;

  constructor(node: string, program: string, code: string, cause?: unknown) {
    super(`Cannot start ${program} for step ${node} (${code})`);
    this.name = "EnvironmentError";
    this.code = code;
    this.cause = cause;
  }
}
