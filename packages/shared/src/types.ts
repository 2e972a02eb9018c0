/**
 * Shared types for grading runs (documents, questions, outcomes, scores).
 * Used by the runner service and the backend; field names match the report wire format.
 */

export type CellType = "markdown" | "code";

export interface Cell {
  type: CellType;
  source: string;
}

/** Ordered cells of an instructor or student document. Frozen once loaded. */
export interface GradingDocument {
  readonly cells: readonly Cell[];
}

/** One question block extracted from the instructor document. */
export interface QuestionSpec {
  name: string;
  description: string;
  reference_body: string;
  context_code: string;
  /** Assertion statements in source order; this order is the grading order. */
  assertions: string[];
}

export interface StudentIdentity {
  name: string;
  roll_number: string;
}

export type ContextScope = "question" | "shared";

export type OutcomeStatus = "passed" | "failed";

/** Failure classes surfaced as data on outcomes; none of them is thrown across components. */
export type ErrorKind = "ContextSetupError" | "AssertionFailure" | "ExecutionError" | "TimeoutError";

export interface Outcome {
  question: string;
  description: string;
  assertion: string;
  status: OutcomeStatus;
  score: 0 | 1;
  error: string | null;
  error_kind: ErrorKind | null;
}

export interface ExecutionSummary {
  success: boolean;
  diagnostics: string[];
  timed_out: boolean;
  runtime_ms: number;
  /** Console output of the submission, capped by the runner. */
  output: string;
}

export interface SubmissionExecution extends ExecutionSummary {
  submission_id: string;
}

export interface AttemptRecord {
  submission_id: string;
  student: StudentIdentity;
  identity_key: string;
  outcomes: Outcome[];
  execution: ExecutionSummary;
}

export interface QuestionTotal {
  question: string;
  total: number;
}

export interface ScoreSummary {
  submission_id: string;
  identity_key: string;
  raw_total: number;
  per_question_totals: QuestionTotal[];
  /** Questions counted in best_n_total, highest first. */
  selected_questions: string[];
  best_n_total: number;
  scaled_score: number;
}

/** Highest best-N attempt of one student across all of their attempts. */
export interface StudentBest {
  identity_key: string;
  student: StudentIdentity;
  submission_id: string;
  best_n_total: number;
  scaled_score: number;
  attempts: number;
}

export type IngestionErrorKind = "NotFound" | "FormatError" | "UnsupportedFormat";

export interface ExcludedSubmission {
  submission_id: string;
  error_kind: IngestionErrorKind;
  message: string;
}

/** Flat row consumed by report sinks (CSV export, HTML renderers). */
export interface ReportRow {
  submission_id: string;
  student: string;
  roll_number: string;
  identity_key: string;
  question: string | null;
  description: string;
  assertion_text: string;
  status: OutcomeStatus;
  score: number;
  error: string | null;
  best_n_total: number;
  scaled_score: number;
}

export interface EvaluationSummary {
  total_submissions: number;
  graded_submissions: number;
  average_scaled_score: number | null;
}

export interface EvaluationRequestSubmission {
  id?: string;
  filename: string;
  content: string;
}

export interface EvaluationRequest {
  /** nbformat v4 notebook JSON of the instructor solution. */
  solution: unknown;
  submissions: EvaluationRequestSubmission[];
  best_n?: number;
  scaled_range?: [number, number];
  context_scope?: ContextScope;
}

export interface EvaluationResponse {
  questions: string[];
  summary: EvaluationSummary;
  attempts: ScoreSummary[];
  students: StudentBest[];
  excluded: ExcludedSubmission[];
  executions: SubmissionExecution[];
  rows: ReportRow[];
}
