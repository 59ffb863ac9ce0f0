export type PipelineErrorCode =
  | "UNITS_INVALID"
  | "UNKNOWN_UNITS"
  | "BASELINE_OPT_IN_REQUIRED"
  | "SUBMISSION_ABORTED"
  | "NO_COMPLETIONS"
  | "RETRY_FAILED"
  | "REGISTRATION_THRESHOLD"
  | "STATE_CORRUPT";

/**
 * A failure that ends a run. `detail` carries the per-unit information the
 * operator needs; it is persisted in run state and printed by the CLI.
 */
export class PipelineError extends Error {
  readonly code: PipelineErrorCode;
  readonly detail: unknown;

  constructor(code: PipelineErrorCode, message: string, detail?: unknown) {
    super(message);
    this.name = "PipelineError";
    this.code = code;
    this.detail = detail ?? null;
  }
}

export function isPipelineError(e: unknown): e is PipelineError {
  return e instanceof PipelineError;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
