/**
 * Evaluation API: grade uploaded submissions against an uploaded solution notebook.
 * Nothing is stored; every request is a complete, independent grading run.
 */

import { Router } from "express";
import { z } from "zod";
import type { EvaluationResponse, GradingDocument } from "../../../packages/shared/src/types";
import { HttpError } from "../utils/httpError";
import { validateBody } from "../middlewares/validate";
import { documentFromNotebook } from "../loaders/notebook";
import { parseSubmission } from "../loaders/submissions";
import { FormatError } from "../services/grading/errors";
import { createLogger } from "../utils/logger";
import {
  extractSolution,
  gradeSubmissions,
  resolveEvaluationOptions,
  type EvaluationOptions,
  type SubmissionSource
} from "../services/grading";

const evaluationsRouter = Router();

const evaluationSchema = z.object({
  solution: z.unknown(),
  submissions: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        filename: z.string().min(1),
        content: z.string()
      })
    )
    .min(1, "at least one submission is required"),
  best_n: z.number().int().positive().optional(),
  scaled_range: z
    .tuple([z.number(), z.number()])
    .refine(([min, max]) => min <= max, "scaled_range must be [min, max] with min <= max")
    .optional(),
  context_scope: z.enum(["question", "shared"]).optional()
});

type EvaluationBody = z.infer<typeof evaluationSchema>;

function toOverrides(body: EvaluationBody): Partial<EvaluationOptions> {
  const overrides: Partial<EvaluationOptions> = {};
  if (body.best_n !== undefined) overrides.best_n = body.best_n;
  if (body.scaled_range) [overrides.scaled_min, overrides.scaled_max] = body.scaled_range;
  if (body.context_scope) overrides.context_scope = body.context_scope;
  return overrides;
}

// POST /api/evaluations
evaluationsRouter.post("/", validateBody(evaluationSchema), (req, res, next) => {
  try {
    const body = req.body as EvaluationBody;
    let solution: GradingDocument;
    try {
      solution = documentFromNotebook(body.solution, "solution");
    } catch (err) {
      if (err instanceof FormatError) throw new HttpError(400, err.message);
      throw err;
    }

    const sources: SubmissionSource[] = body.submissions.map((s) => ({
      submission_id: s.id ?? s.filename,
      read: () => parseSubmission(s.filename, s.content)
    }));
    const options = resolveEvaluationOptions(toOverrides(body));
    const log = createLogger(options.log_level, "grading");
    const registry = extractSolution(solution, { logger: log.child("extractor") });
    if (registry.questions.length === 0) {
      throw new HttpError(422, "Solution notebook contains no gradable questions");
    }
    const result = gradeSubmissions(registry, sources, options, log);

    const response: EvaluationResponse = {
      questions: result.registry.questions.map((q) => q.name),
      summary: result.summary,
      attempts: result.attempts,
      students: result.students,
      excluded: result.excluded,
      executions: result.records.map((r) => ({ submission_id: r.submission_id, ...r.execution })),
      rows: result.rows
    };
    res.json(response);
  } catch (e) {
    next(e);
  }
});

export { evaluationsRouter };
