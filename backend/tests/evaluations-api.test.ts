import request from "supertest";
import { describe, expect, test } from "vitest";
import { createApp } from "../src/app";
import { HALF_SCRIPT, PASSING_SCRIPT, SOLUTION_CELLS, md, notebookJson } from "./helpers";

const solution = notebookJson(...SOLUTION_CELLS);

describe("evaluations api", () => {
  test("GET /health responds ok", async () => {
    const res = await request(createApp()).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  test("POST /api/evaluations grades every submission", async () => {
    const res = await request(createApp())
      .post("/api/evaluations")
      .send({
        solution,
        submissions: [
          { filename: "ada.js", content: PASSING_SCRIPT },
          { id: "bob-attempt", filename: "bob.js", content: HALF_SCRIPT },
          { filename: "notes.txt", content: "nothing to run" }
        ],
        best_n: 1,
        scaled_range: [0, 100]
      });

    expect(res.status).toBe(200);
    expect(res.body.questions).toEqual(["add", "greet"]);
    expect(res.body.summary).toEqual({ total_submissions: 3, graded_submissions: 2, average_scaled_score: 50 });
    expect(res.body.attempts.map((a: { submission_id: string; best_n_total: number; scaled_score: number }) => [
      a.submission_id,
      a.best_n_total,
      a.scaled_score
    ])).toEqual([
      ["ada.js", 2, 100],
      ["bob-attempt", 1, 0]
    ]);
    expect(res.body.excluded).toEqual([
      { submission_id: "notes.txt", error_kind: "UnsupportedFormat", message: "Unsupported submission format: .txt (notes.txt)" }
    ]);
    expect(res.body.executions).toEqual([
      { submission_id: "ada.js", success: true, diagnostics: [], timed_out: false, runtime_ms: expect.any(Number), output: "" },
      { submission_id: "bob-attempt", success: true, diagnostics: [], timed_out: false, runtime_ms: expect.any(Number), output: "" }
    ]);
    expect(res.body.rows).toHaveLength(6);
    expect(res.body.students).toHaveLength(2);
  });

  test("POST /api/evaluations returns 400 for an invalid body", async () => {
    const res = await request(createApp()).post("/api/evaluations").send({ solution, submissions: [] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("submissions: at least one submission is required");
  });

  test("POST /api/evaluations rejects an inverted scaled range", async () => {
    const res = await request(createApp())
      .post("/api/evaluations")
      .send({ solution, submissions: [{ filename: "a.js", content: "" }], scaled_range: [20, 10] });
    expect(res.status).toBe(400);
    expect(res.body.error).toBe("scaled_range: scaled_range must be [min, max] with min <= max");
  });

  test("POST /api/evaluations returns 400 when the solution is not a notebook", async () => {
    const res = await request(createApp())
      .post("/api/evaluations")
      .send({ solution: { worksheets: [] }, submissions: [{ filename: "a.js", content: "" }] });
    expect(res.status).toBe(400);
    expect(res.body.error).toMatch(/^Cannot read solution: not a notebook/);
  });

  test("POST /api/evaluations returns 422 when the solution has no questions", async () => {
    const res = await request(createApp())
      .post("/api/evaluations")
      .send({ solution: notebookJson(md("# Only notes")), submissions: [{ filename: "a.js", content: "" }] });
    expect(res.status).toBe(422);
    expect(res.body.error).toBe("Solution notebook contains no gradable questions");
  });

  test("unknown routes return 404", async () => {
    const res = await request(createApp()).get("/api/nope");
    expect(res.status).toBe(404);
    expect(res.body.error).toBe("Route not found");
  });
});
