/**
 * Flat report rows (one per outcome) and their CSV export.
 */

import type { AttemptRecord, ReportRow, ScoreSummary } from "../../../../packages/shared/src/types";

export const NO_OUTCOMES_LABEL = "[no outcomes]";

export const REPORT_COLUMNS: readonly (keyof ReportRow)[] = [
  "submission_id",
  "student",
  "roll_number",
  "identity_key",
  "question",
  "description",
  "assertion_text",
  "status",
  "score",
  "error",
  "best_n_total",
  "scaled_score"
];

export function buildReportRows(attempts: readonly AttemptRecord[], summaries: readonly ScoreSummary[]): ReportRow[] {
  const rows: ReportRow[] = [];
  attempts.forEach((attempt, idx) => {
    const { best_n_total, scaled_score } = summaries[idx];
    const base = {
      submission_id: attempt.submission_id,
      student: attempt.student.name,
      roll_number: attempt.student.roll_number,
      identity_key: attempt.identity_key,
      best_n_total,
      scaled_score
    };
    if (attempt.outcomes.length === 0) {
      rows.push({
        ...base,
        question: null,
        description: "",
        assertion_text: NO_OUTCOMES_LABEL,
        status: "failed",
        score: 0,
        error: attempt.execution.diagnostics.join("; ") || null
      });
      return;
    }
    for (const o of attempt.outcomes) {
      rows.push({
        ...base,
        question: o.question,
        description: o.description,
        assertion_text: o.assertion,
        status: o.status,
        score: o.score,
        error: o.error
      });
    }
  });
  return rows;
}

function csvField(value: string | number | null): string {
  if (value === null) return "";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(rows: readonly ReportRow[]): string {
  const lines = [REPORT_COLUMNS.join(",")];
  for (const row of rows) {
    lines.push(REPORT_COLUMNS.map((col) => csvField(row[col])).join(","));
  }
  return lines.join("\n") + "\n";
}
