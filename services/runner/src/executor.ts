import assert from "node:assert";
import { format } from "node:util";
import { Namespace, describeError, isTimeoutError } from "./namespace";
import { INPUT_IGNORED_WARNING, RUNNER_CONFIG } from "./config";

export interface ExecutionResult {
  namespace: Namespace;
  diagnostics: string[];
  success: boolean;
  timed_out: boolean;
  /** Captured console output of the submission, capped at MAX_OUTPUT_BYTES. */
  output: string;
  runtime_ms: number;
}

export interface ExecuteOptions {
  /** Wall-clock budget for all units together. */
  timeoutMs?: number;
}

function snippet(source: string): string {
  return source.trim().slice(0, RUNNER_CONFIG.SNIPPET_CHARS);
}

type AssertFunction = (value: unknown, message?: string | Error) => void;

const ASSERT_CLASSES = new Set(["AssertionError", "CallTracker"]);

function assertOk(value: unknown, message?: string | Error): void {
  if (value) return;
  if (message !== undefined && typeof message !== "string") throw message;
  throw new assert.AssertionError({
    message: message ?? "The expression evaluated to a falsy value",
    actual: value,
    expected: true,
    operator: "=="
  });
}

/**
 * A frozen `assert` built for one attempt. Each member is a new function delegating to the
 * host module, so reassigning `assert.strictEqual` has no effect on other attempts or the grader.
 */
function isolatedAssert(source: object): AssertFunction {
  const copy: AssertFunction = (value, message) => assertOk(value, message);
  for (const key of Object.keys(source)) {
    if (ASSERT_CLASSES.has(key) || key === "strict") continue;
    const member: unknown = Reflect.get(source, key);
    if (typeof member !== "function") continue;
    const delegate = key === "ok" ? assertOk : (...args: unknown[]): unknown => Reflect.apply(member, source, args);
    Object.defineProperty(copy, key, { value: Object.freeze(delegate), enumerable: true });
  }
  return copy;
}

function createAssert(): AssertFunction {
  const loose = isolatedAssert(assert);
  const strict = isolatedAssert(assert.strict);
  Object.defineProperty(strict, "strict", { value: strict, enumerable: true });
  Object.defineProperty(loose, "strict", { value: Object.freeze(strict), enumerable: true });
  return Object.freeze(loose);
}

function createOutputSink(): { console: Record<string, (...args: unknown[]) => void>; read: () => string } {
  let captured = "";
  let truncated = false;
  const cap = RUNNER_CONFIG.MAX_OUTPUT_BYTES;
  const write = (...args: unknown[]) => {
    if (truncated) return;
    captured += format(...args) + "\n";
    if (Buffer.byteLength(captured, "utf8") > cap) {
      captured = captured.slice(0, cap) + "\n...[truncated]";
      truncated = true;
    }
  };
  return {
    console: { log: write, info: write, warn: write, error: write, debug: write },
    read: () => captured
  };
}

/**
 * Run every code unit of one submission, in order, against a fresh namespace.
 * A unit that throws is recorded and the next unit still runs; only the
 * overall time budget stops the run early.
 */
export function executeSubmission(units: readonly string[], options: ExecuteOptions = {}): ExecutionResult {
  const timeoutMs = options.timeoutMs ?? RUNNER_CONFIG.EXECUTION_TIMEOUT_MS;
  const diagnostics: string[] = [];
  const sink = createOutputSink();
  const inputStandIn = (): string => {
    diagnostics.push(INPUT_IGNORED_WARNING);
    return "";
  };

  const namespace = new Namespace({
    assert: createAssert(),
    console: sink.console,
    input: inputStandIn,
    prompt: inputStandIn
  });

  const start = Date.now();
  const deadline = start + timeoutMs;
  let timed_out = false;
  for (const source of units) {
    if (!source.trim()) continue;
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      timed_out = true;
      break;
    }
    try {
      namespace.execute(source, remaining);
    } catch (err) {
      if (isTimeoutError(err)) {
        timed_out = true;
        break;
      }
      const { kind, message } = describeError(err);
      diagnostics.push(`In cell: ${snippet(source)} -> ${kind}: ${message}`);
    }
  }
  if (timed_out) {
    diagnostics.push(`Execution timed out after ${timeoutMs} ms`);
  }

  const result = [...diagnostics];
  return {
    namespace,
    diagnostics: result,
    success: result.length === 0,
    timed_out,
    output: sink.read(),
    runtime_ms: Date.now() - start
  };
}
