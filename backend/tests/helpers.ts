import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { AttemptRecord, Cell, GradingDocument, Outcome } from "../../packages/shared/src/types";
import { documentFromCells } from "../src/loaders/notebook";
import type { Logger } from "../src/utils/logger";

export function md(source: string): Cell {
  return { type: "markdown", source };
}

export function code(source: string): Cell {
  return { type: "code", source };
}

export function doc(...cells: Cell[]): GradingDocument {
  return documentFromCells(cells);
}

/** nbformat v4 JSON for the given cells, with sources split into lines the way Jupyter writes them. */
export function notebookJson(...cells: Cell[]): Record<string, unknown> {
  return {
    nbformat: 4,
    nbformat_minor: 5,
    metadata: {},
    cells: cells.map((c) => ({
      cell_type: c.type,
      metadata: {},
      source: c.source.split(/(?<=\n)/),
      ...(c.type === "code" ? { outputs: [], execution_count: null } : {})
    }))
  };
}

/** Two questions: add (2 assertions) and greet (1 assertion, with context). */
export const SOLUTION_CELLS: Cell[] = [
  md("# Week 1 exercises"),
  md("## Add\nReturn the sum of two numbers."),
  code("function add(a, b) {\n  return a + b;\n}"),
  code("assert.strictEqual(add(1, 2), 3);\nassert.strictEqual(add(-1, 1), 0);"),
  md("## Greet\nBuild a greeting."),
  code("const greet = (who) => 'Hello, ' + who + '!';"),
  code("const who = 'Ada';\nassert.strictEqual(greet(who), 'Hello, Ada!');")
];

export const PASSING_SCRIPT = [
  "function add(a, b) { return a + b; }",
  "function greet(who) { return 'Hello, ' + who + '!'; }"
].join("\n");

export const HALF_SCRIPT = [
  "function add(a, b) { return a + b + 1; }",
  "function greet(who) { return 'Hello, ' + who + '!'; }"
].join("\n");

export function outcome(question: string, score: 0 | 1, assertion = `assert-${question}`): Outcome {
  return {
    question,
    description: "",
    assertion,
    status: score === 1 ? "passed" : "failed",
    score,
    error: score === 1 ? null : "AssertionError: " + assertion,
    error_kind: score === 1 ? null : "AssertionFailure"
  };
}

export function attempt(submission_id: string, outcomes: Outcome[], identity_key = submission_id): AttemptRecord {
  return {
    submission_id,
    student: { name: identity_key, roll_number: "N/A" },
    identity_key,
    outcomes,
    execution: { success: true, diagnostics: [], timed_out: false, runtime_ms: 0, output: "" }
  };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "grader-test-"));
}

export function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  const logger: Logger & { warnings: string[] } = {
    warnings,
    debug: () => undefined,
    info: () => undefined,
    warn: (message) => {
      warnings.push(message);
    },
    error: () => undefined,
    child: () => logger
  };
  return logger;
}
