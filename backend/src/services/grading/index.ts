/**
 * Grading service: question extraction, execution + comparison (via the runner), best-N scoring.
 */

export {
  runEvaluation,
  gradeSubmissions,
  gradeFromPaths,
  resolveEvaluationOptions,
  defaultEvaluationOptions,
  identityKey
} from "./runEvaluation";
export type { EvaluationOptions, EvaluationResult, SubmissionSource } from "./runEvaluation";
export { extractSolution } from "./solutionExtractor";
export type { SolutionRegistry, SolutionMetadata } from "./solutionExtractor";
export { aggregate, scoreAttempts, pickStudentBest, rescale, selectBestN, perQuestionTotals } from "./scoring";
export type { ScoringOptions, AggregateResult } from "./scoring";
export { buildReportRows, toCsv, REPORT_COLUMNS } from "./report";
export { NotFoundError, FormatError, UnsupportedFormatError, ConfigError } from "./errors";
