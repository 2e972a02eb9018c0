/**
 * Submission loading: detects the kind of a file from its extension and reads it.
 * Only notebooks and scripts can be executed; the other kinds are recognised so
 * the pipeline can exclude them with a clear reason.
 */

import fs from "node:fs";
import path from "node:path";
import type { GradingDocument } from "../../../packages/shared/src/types";
import { FormatError, NotFoundError, UnsupportedFormatError } from "../services/grading/errors";
import { parseNotebookText, readTextFile } from "./notebook";

export type SubmissionKind = "document" | "script" | "tabular" | "structured-data";

export type LoadedSubmission =
  | { kind: "document"; source: string; document: GradingDocument }
  | { kind: "script"; source: string; code: string }
  | { kind: "tabular"; source: string; text: string }
  | { kind: "structured-data"; source: string; data: unknown };

const SCRIPT_EXTENSIONS = new Set([".js", ".mjs", ".cjs"]);

export function fileExtension(filePath: string): string {
  return path.extname(filePath).toLowerCase();
}

export function detectKind(filename: string): SubmissionKind {
  const ext = fileExtension(filename);
  if (ext === ".ipynb") return "document";
  if (SCRIPT_EXTENSIONS.has(ext)) return "script";
  if (ext === ".csv") return "tabular";
  if (ext === ".json") return "structured-data";
  throw new UnsupportedFormatError(filename, ext);
}

/** Parse already-read content; `filename` only drives kind detection and messages. */
export function parseSubmission(filename: string, content: string): LoadedSubmission {
  const kind = detectKind(filename);
  switch (kind) {
    case "document":
      return { kind, source: filename, document: parseNotebookText(content, filename) };
    case "script":
      return { kind, source: filename, code: content };
    case "tabular":
      return { kind, source: filename, text: content };
    case "structured-data": {
      try {
        return { kind, source: filename, data: JSON.parse(content) };
      } catch (e) {
        throw new FormatError(filename, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
      }
    }
  }
}

export function loadSubmission(filePath: string): LoadedSubmission {
  detectKind(filePath);
  return parseSubmission(filePath, readTextFile(filePath));
}

/** Code units in execution order. Throws FormatError for kinds that hold no code. */
export function executableUnits(submission: LoadedSubmission): string[] {
  switch (submission.kind) {
    case "document":
      return submission.document.cells.filter((c) => c.type === "code").map((c) => c.source);
    case "script":
      return [submission.code];
    default:
      throw new FormatError(submission.source, `a ${submission.kind} submission has no code to execute`);
  }
}

/** Files in `dir` with the solution's extension, sorted by name. */
export function listSubmissions(dir: string, solutionPath: string): string[] {
  if (!fs.existsSync(dir) || !fs.statSync(dir).isDirectory()) {
    throw new NotFoundError(dir);
  }
  const expected = fileExtension(solutionPath);
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && fileExtension(entry.name) === expected)
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}
