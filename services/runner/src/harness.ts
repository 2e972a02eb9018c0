import type { ContextScope, ErrorKind, Outcome, QuestionSpec } from "../../../packages/shared/src/types";
import type { Namespace, NamespaceScope } from "./namespace";
import { describeError, isAssertionFailure, isTimeoutError, sanitizeMessage } from "./namespace";
import { RUNNER_CONFIG } from "./config";

export const CONTEXT_SETUP_LABEL = "[context setup]";

export interface CompareOptions {
  contextScope?: ContextScope;
  assertionTimeoutMs?: number;
}

interface Diagnostic {
  kind: ErrorKind;
  message: string;
}

function outcome(question: QuestionSpec, assertion: string, failure: Diagnostic | null): Outcome {
  return {
    question: question.name,
    description: question.description,
    assertion,
    status: failure ? "failed" : "passed",
    score: failure ? 0 : 1,
    error: failure ? failure.message : null,
    error_kind: failure ? failure.kind : null
  };
}

function diagnoseContextFailure(err: unknown, timeoutMs: number): Diagnostic {
  if (isTimeoutError(err)) {
    return { kind: "ContextSetupError", message: `TimeoutError: context setup exceeded ${timeoutMs} ms` };
  }
  const { kind, message } = describeError(err);
  return { kind: "ContextSetupError", message: `${kind}: ${message}` };
}

export function diagnoseAssertionFailure(err: unknown, assertion: string, timeoutMs: number): Diagnostic {
  if (isTimeoutError(err)) {
    return { kind: "TimeoutError", message: `TimeoutError: assertion exceeded ${timeoutMs} ms` };
  }
  if (isAssertionFailure(err)) {
    const { message } = describeError(err);
    const detail = message ? `: ${message}` : "";
    return { kind: "AssertionFailure", message: `AssertionError: ${sanitizeMessage(assertion)}${detail}` };
  }
  const { kind, message } = describeError(err);
  return { kind: "ExecutionError", message: `${kind}: ${message}` };
}

/**
 * Run one question's context once, then each assertion on its own.
 * A failing context yields a single "[context setup]" outcome and no assertion runs.
 */
export function runQuestion(question: QuestionSpec, namespace: Namespace, options: CompareOptions = {}): Outcome[] {
  const timeoutMs = options.assertionTimeoutMs ?? RUNNER_CONFIG.ASSERTION_TIMEOUT_MS;
  let scope: NamespaceScope;
  try {
    scope = namespace.openScope(question.context_code, timeoutMs, options.contextScope ?? "question");
  } catch (err) {
    return [outcome(question, CONTEXT_SETUP_LABEL, diagnoseContextFailure(err, timeoutMs))];
  }

  const results: Outcome[] = [];
  try {
    for (const assertion of question.assertions) {
      try {
        scope.execute(assertion, timeoutMs);
        results.push(outcome(question, assertion, null));
      } catch (err) {
        results.push(outcome(question, assertion, diagnoseAssertionFailure(err, assertion, timeoutMs)));
      }
    }
  } finally {
    scope.dispose();
  }
  return results;
}

/** Grade every question, in registry order, against one submission's namespace. */
export function compareQuestions(
  questions: readonly QuestionSpec[],
  namespace: Namespace,
  options: CompareOptions = {}
): Outcome[] {
  return questions.flatMap((question) => runQuestion(question, namespace, options));
}
