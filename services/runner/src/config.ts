export const RUNNER_CONFIG = {
  /** Wall-clock budget (ms) for all code units of one submission. */
  EXECUTION_TIMEOUT_MS: 60_000,
  /** Per-assertion time limit (ms). Only truly slow or infinite code should hit this. */
  ASSERTION_TIMEOUT_MS: 5_000,
  /** Time limit (ms) for reading a single binding back out of a namespace. */
  LOOKUP_TIMEOUT_MS: 1_000,
  /** Characters of a failing unit's source kept in its diagnostic. */
  SNIPPET_CHARS: 80,
  /** Max length of an error message carried on an outcome. */
  MAX_ERROR_CHARS: 500,
  /** Max captured console output (bytes). */
  MAX_OUTPUT_BYTES: 64 * 1024,
  /** Max code length (bytes). */
  MAX_CODE_BYTES: 512 * 1024
};

/** Bindings starting with this prefix are internal and never reported. */
export const RESERVED_PREFIX = "__";

export const INPUT_IGNORED_WARNING = "[Warning] input() called during evaluation, ignored.";
