import type { ContextScope, Outcome, QuestionSpec } from "../../../packages/shared/src/types";
import { executeSubmission, type ExecutionResult } from "./executor";
import { compareQuestions } from "./harness";
import { RUNNER_CONFIG } from "./config";

export type { ExecutionResult, ExecuteOptions } from "./executor";
export type { CompareOptions } from "./harness";
export type { NamespaceScope } from "./namespace";
export { executeSubmission } from "./executor";
export { compareQuestions, runQuestion, CONTEXT_SETUP_LABEL } from "./harness";
export { Namespace, isParsable } from "./namespace";
export { RUNNER_CONFIG } from "./config";

export interface RunOptions {
  units: readonly string[];
  questions: readonly QuestionSpec[];
  timeoutMs?: number;
  assertionTimeoutMs?: number;
  contextScope?: ContextScope;
  /** Called with the namespace after execution and before any question runs. */
  beforeCompare?: (execution: ExecutionResult) => void;
}

export interface RunResult {
  execution: ExecutionResult;
  outcomes: Outcome[];
  summary: { passed: number; total: number };
}

export function validateCodeSize(code: string): void {
  if (Buffer.byteLength(code, "utf8") > RUNNER_CONFIG.MAX_CODE_BYTES) {
    throw new Error(`Code exceeds maximum size of ${RUNNER_CONFIG.MAX_CODE_BYTES / 1024}KB`);
  }
}

/** Execute one submission and grade it against every question. */
export function runSubmission(options: RunOptions): RunResult {
  const { units, questions, timeoutMs, assertionTimeoutMs, contextScope } = options;
  validateCodeSize(units.join("\n"));
  const execution = executeSubmission(units, { timeoutMs });
  options.beforeCompare?.(execution);
  const outcomes = compareQuestions(questions, execution.namespace, { assertionTimeoutMs, contextScope });
  const passed = outcomes.filter((o) => o.status === "passed").length;
  return { execution, outcomes, summary: { passed, total: outcomes.length } };
}
