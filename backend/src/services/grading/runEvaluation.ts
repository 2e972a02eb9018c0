/**
 * Full grading run: extract questions once, then execute and compare each submission,
 * then aggregate the whole population. A submission that cannot be loaded is excluded
 * on its own; nothing else a submission does can stop the run.
 */

import path from "node:path";
import type {
  AttemptRecord,
  ContextScope,
  EvaluationSummary,
  ExcludedSubmission,
  GradingDocument,
  ReportRow,
  ScoreSummary,
  StudentBest,
  StudentIdentity
} from "../../../../packages/shared/src/types";
import { runSubmission, validateCodeSize, type ExecutionResult } from "../../../../services/runner/src/index";
import { env } from "../../config/env";
import { createLogger, type Logger, type LogLevel } from "../../utils/logger";
import { loadDocument } from "../../loaders/notebook";
import { executableUnits, listSubmissions, loadSubmission, type LoadedSubmission } from "../../loaders/submissions";
import { FormatError, isIngestionError } from "./errors";
import { extractSolution, scanDocumentIdentity, type SolutionMetadata, type SolutionRegistry } from "./solutionExtractor";
import { aggregate, validateScoringOptions, type ScoringOptions } from "./scoring";
import { buildReportRows } from "./report";

export const UNKNOWN_ROLL_NUMBER = "N/A";

export interface SubmissionSource {
  submission_id: string;
  /** Loads the submission; ingestion errors thrown here exclude only this submission. */
  read: () => LoadedSubmission;
}

export interface EvaluationOptions extends ScoringOptions {
  timeout_ms: number;
  assertion_timeout_ms: number;
  context_scope: ContextScope;
  log_level: LogLevel;
}

export interface EvaluationResult {
  registry: SolutionRegistry;
  records: AttemptRecord[];
  attempts: ScoreSummary[];
  students: StudentBest[];
  excluded: ExcludedSubmission[];
  rows: ReportRow[];
  summary: EvaluationSummary;
}

export function defaultEvaluationOptions(): EvaluationOptions {
  return {
    best_n: env.GRADER_BEST_N,
    scaled_min: env.GRADER_SCALED_MIN,
    scaled_max: env.GRADER_SCALED_MAX,
    timeout_ms: env.EXECUTION_TIMEOUT_MS,
    assertion_timeout_ms: env.ASSERTION_TIMEOUT_MS,
    context_scope: env.GRADER_CONTEXT_SCOPE,
    log_level: env.LOG_LEVEL
  };
}

export function resolveEvaluationOptions(overrides: Partial<EvaluationOptions> = {}): EvaluationOptions {
  const options = { ...defaultEvaluationOptions(), ...overrides };
  validateScoringOptions(options);
  return options;
}

function stringBinding(value: unknown): string | undefined {
  return typeof value === "string" && value.trim() ? value.trim() : undefined;
}

/** Document metadata first, then namespace bindings, then the file name. */
export function resolveIdentity(
  submissionId: string,
  metadata: SolutionMetadata,
  execution: ExecutionResult
): StudentIdentity {
  const name =
    stringBinding(metadata.name) ??
    stringBinding(execution.namespace.lookup("name")) ??
    path.parse(submissionId).name;
  const roll_number =
    stringBinding(metadata.roll_number) ??
    stringBinding(execution.namespace.lookup("roll_number")) ??
    UNKNOWN_ROLL_NUMBER;
  return { name, roll_number };
}

export function identityKey(student: StudentIdentity): string {
  return `${student.name}::${student.roll_number}`;
}

function gradeSubmission(
  submission: LoadedSubmission,
  submissionId: string,
  registry: SolutionRegistry,
  options: EvaluationOptions
): AttemptRecord {
  const units = executableUnits(submission);
  try {
    validateCodeSize(units.join("\n"));
  } catch (err) {
    throw new FormatError(submission.source, err instanceof Error ? err.message : String(err));
  }
  const metadata = submission.kind === "document" ? scanDocumentIdentity(submission.document) : {};
  let student: StudentIdentity = { name: path.parse(submissionId).name, roll_number: UNKNOWN_ROLL_NUMBER };
  const { execution, outcomes } = runSubmission({
    units,
    questions: registry.questions,
    timeoutMs: options.timeout_ms,
    assertionTimeoutMs: options.assertion_timeout_ms,
    contextScope: options.context_scope,
    beforeCompare: (result) => {
      student = resolveIdentity(submissionId, metadata, result);
    }
  });
  return {
    submission_id: submissionId,
    student,
    identity_key: identityKey(student),
    outcomes,
    execution: {
      success: execution.success,
      diagnostics: execution.diagnostics,
      timed_out: execution.timed_out,
      runtime_ms: execution.runtime_ms,
      output: execution.output
    }
  };
}

export function runEvaluation(
  solution: GradingDocument,
  submissions: readonly SubmissionSource[],
  overrides: Partial<EvaluationOptions> = {},
  logger?: Logger
): EvaluationResult {
  const options = resolveEvaluationOptions(overrides);
  const log = logger ?? createLogger(options.log_level, "grading");
  const registry = extractSolution(solution, { logger: log.child("extractor") });
  return gradeSubmissions(registry, submissions, options, log);
}

/** Grade every submission against an already extracted registry, then aggregate. */
export function gradeSubmissions(
  registry: SolutionRegistry,
  submissions: readonly SubmissionSource[],
  options: EvaluationOptions,
  log: Logger
): EvaluationResult {
  const records: AttemptRecord[] = [];
  const excluded: ExcludedSubmission[] = [];
  for (const source of submissions) {
    let record: AttemptRecord;
    try {
      record = gradeSubmission(source.read(), source.submission_id, registry, options);
    } catch (err) {
      if (!isIngestionError(err)) throw err;
      log.warn(`Excluded ${source.submission_id}: ${err.message}`);
      excluded.push({ submission_id: source.submission_id, error_kind: err.kind, message: err.message });
      continue;
    }
    const passed = record.outcomes.filter((o) => o.status === "passed").length;
    log.info(`Graded ${source.submission_id}: ${passed}/${record.outcomes.length} assertions passed`);
    for (const diagnostic of record.execution.diagnostics) {
      log.debug(`${source.submission_id}: ${diagnostic}`);
    }
    if (record.execution.output) {
      log.debug(`${source.submission_id} output:\n${record.execution.output.trimEnd()}`);
    }
    records.push(record);
  }

  const { attempts, students } = aggregate(records, options);
  const rows = buildReportRows(records, attempts);
  const summary: EvaluationSummary = {
    total_submissions: submissions.length,
    graded_submissions: records.length,
    average_scaled_score:
      attempts.length > 0 ? attempts.reduce((sum, a) => sum + a.scaled_score, 0) / attempts.length : null
  };
  return { registry, records, attempts, students, excluded, rows, summary };
}

/** Grade every submission in `submissionsDir` whose extension matches the solution's. */
export function gradeFromPaths(
  solutionPath: string,
  submissionsDir: string,
  overrides: Partial<EvaluationOptions> = {},
  logger?: Logger
): EvaluationResult {
  const solution = loadDocument(solutionPath);
  const sources: SubmissionSource[] = listSubmissions(submissionsDir, solutionPath).map((filePath) => ({
    submission_id: path.basename(filePath),
    read: () => loadSubmission(filePath)
  }));
  return runEvaluation(solution, sources, overrides, logger);
}
