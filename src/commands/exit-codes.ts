/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  RUN_FAILED: 1,
  SELECTION_REJECTED: 2,
  INVALID_ARGS: 3,
  COMPLETED_WITH_ERRORS: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

const SELECTION_CODES = new Set(["UNKNOWN_UNITS", "BASELINE_OPT_IN_REQUIRED"]);
const INPUT_CODES = new Set(["INVALID_ARGS", "UNITS_INVALID", "CONFIG_INVALID", "STATE_CORRUPT"]);

export function exitCodeForError(code: string): ExitCode {
  if (SELECTION_CODES.has(code)) return EXIT.SELECTION_REJECTED;
  if (INPUT_CODES.has(code)) return EXIT.INVALID_ARGS;
  return EXIT.RUN_FAILED;
}
