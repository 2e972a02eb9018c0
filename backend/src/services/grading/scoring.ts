/**
 * Best-N scoring and population rescaling.
 *
 * Each attempt counts its N highest question totals. Scaled scores map the run's
 * lowest best-N total to scaled_min and its highest to scaled_max, so every attempt
 * must be scored before any scaled value is final.
 */

import type {
  AttemptRecord,
  Outcome,
  QuestionTotal,
  ScoreSummary,
  StudentBest
} from "../../../../packages/shared/src/types";
import { ConfigError } from "./errors";

export interface ScoringOptions {
  best_n: number;
  scaled_min: number;
  scaled_max: number;
}

export interface AggregateResult {
  attempts: ScoreSummary[];
  students: StudentBest[];
}

export function validateScoringOptions(options: ScoringOptions): ScoringOptions {
  const { best_n, scaled_min, scaled_max } = options;
  if (!Number.isInteger(best_n) || best_n < 1) {
    throw new ConfigError(`best_n must be a positive integer, got ${best_n}`);
  }
  if (!Number.isFinite(scaled_min) || !Number.isFinite(scaled_max) || scaled_min > scaled_max) {
    throw new ConfigError(`scaled range must satisfy min <= max, got (${scaled_min}, ${scaled_max})`);
  }
  return options;
}

/** Sum of outcome scores per question, in the order questions first appear. */
export function perQuestionTotals(outcomes: readonly Outcome[]): QuestionTotal[] {
  const totals = new Map<string, number>();
  for (const o of outcomes) {
    totals.set(o.question, (totals.get(o.question) ?? 0) + o.score);
  }
  return Array.from(totals, ([question, total]) => ({ question, total }));
}

/**
 * Top `bestN` totals, highest first. Array.prototype.sort is stable, so equal
 * totals keep their original question order.
 */
export function selectBestN(
  totals: readonly QuestionTotal[],
  bestN: number
): { selected: QuestionTotal[]; best_n_total: number } {
  const selected = [...totals].sort((a, b) => b.total - a.total).slice(0, bestN);
  const best_n_total = selected.reduce((sum, t) => sum + t.total, 0);
  return { selected, best_n_total };
}

/** Linear map of `values` onto [min, max]; a flat population maps entirely to `min`. */
export function rescale(values: readonly number[], min: number, max: number): number[] {
  if (values.length === 0) return [];
  const lo = Math.min(...values);
  const hi = Math.max(...values);
  if (lo === hi) return values.map(() => min);
  const span = max - min;
  return values.map((v) => {
    const scaled = min + ((v - lo) * span) / (hi - lo);
    return Math.min(max, Math.max(min, scaled));
  });
}

export function scoreAttempts(attempts: readonly AttemptRecord[], options: ScoringOptions): ScoreSummary[] {
  const { best_n, scaled_min, scaled_max } = validateScoringOptions(options);
  const partial = attempts.map((attempt) => {
    const totals = perQuestionTotals(attempt.outcomes);
    const { selected, best_n_total } = selectBestN(totals, best_n);
    return {
      submission_id: attempt.submission_id,
      identity_key: attempt.identity_key,
      raw_total: totals.reduce((sum, t) => sum + t.total, 0),
      per_question_totals: totals,
      selected_questions: selected.map((t) => t.question),
      best_n_total
    };
  });
  const scaled = rescale(
    partial.map((p) => p.best_n_total),
    scaled_min,
    scaled_max
  );
  return partial.map((p, idx) => ({ ...p, scaled_score: scaled[idx] }));
}

/** Best attempt per identity; a tie keeps the attempt seen first. */
export function pickStudentBest(attempts: readonly AttemptRecord[], summaries: readonly ScoreSummary[]): StudentBest[] {
  const best = new Map<string, StudentBest>();
  attempts.forEach((attempt, idx) => {
    const summary = summaries[idx];
    const current = best.get(attempt.identity_key);
    if (!current) {
      best.set(attempt.identity_key, {
        identity_key: attempt.identity_key,
        student: attempt.student,
        submission_id: attempt.submission_id,
        best_n_total: summary.best_n_total,
        scaled_score: summary.scaled_score,
        attempts: 1
      });
      return;
    }
    current.attempts += 1;
    if (summary.best_n_total > current.best_n_total) {
      current.student = attempt.student;
      current.submission_id = attempt.submission_id;
      current.best_n_total = summary.best_n_total;
      current.scaled_score = summary.scaled_score;
    }
  });
  return Array.from(best.values());
}

export function aggregate(attempts: readonly AttemptRecord[], options: ScoringOptions): AggregateResult {
  const summaries = scoreAttempts(attempts, options);
  return { attempts: summaries, students: pickStudentBest(attempts, summaries) };
}
