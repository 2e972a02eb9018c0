/**
 * grade <solution.ipynb> <submissionsDir> [--out report.csv] [--best-n N] [--scaled-range MIN,MAX]
 * Prints per-student best scores; writes the full row set as CSV when --out is given.
 */

import fs from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { gradeFromPaths, toCsv, type EvaluationOptions } from "../services/grading";
import { ConfigError } from "../services/grading/errors";

function parseScaledRange(value: string): [number, number] {
  const parts = value.split(",").map((p) => Number(p.trim()));
  if (parts.length !== 2 || parts.some((n) => !Number.isFinite(n))) {
    throw new ConfigError(`--scaled-range expects MIN,MAX, got "${value}"`);
  }
  return [parts[0], parts[1]];
}

function main(): void {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      out: { type: "string", short: "o" },
      "best-n": { type: "string" },
      "scaled-range": { type: "string" },
      "shared-context": { type: "boolean" }
    }
  });
  const [solutionPath, submissionsDir] = positionals;
  if (!solutionPath || !submissionsDir) {
    throw new ConfigError("usage: grade <solution.ipynb> <submissionsDir> [--out report.csv]");
  }

  const overrides: Partial<EvaluationOptions> = {};
  if (values["best-n"] !== undefined) overrides.best_n = Number(values["best-n"]);
  if (values["scaled-range"] !== undefined) {
    [overrides.scaled_min, overrides.scaled_max] = parseScaledRange(values["scaled-range"]);
  }
  if (values["shared-context"]) overrides.context_scope = "shared";

  const result = gradeFromPaths(solutionPath, submissionsDir, overrides);

  console.log(`Questions: ${result.registry.questions.map((q) => q.name).join(", ") || "(none)"}`);
  console.log(`Graded ${result.summary.graded_submissions}/${result.summary.total_submissions} submission(s)`);
  for (const student of result.students) {
    console.log(
      `${student.student.name} (${student.student.roll_number}): best-N ${student.best_n_total}, ` +
        `scaled ${student.scaled_score.toFixed(2)} [${student.submission_id}]`
    );
  }
  for (const ex of result.excluded) {
    console.log(`Excluded ${ex.submission_id} (${ex.error_kind}): ${ex.message}`);
  }

  if (values.out) {
    const outPath = path.resolve(values.out);
    fs.mkdirSync(path.dirname(outPath), { recursive: true });
    fs.writeFileSync(outPath, toCsv(result.rows), "utf8");
    console.log(`Saved report to: ${outPath}`);
  }
}

try {
  main();
} catch (error) {
  console.error("Grading failed:", error instanceof Error ? error.message : error);
  process.exitCode = 1;
}
