/**
 * Reads nbformat v4 notebooks into the cell model the grader walks.
 * Raw cells are dropped; list-of-lines sources are joined.
 */

import fs from "node:fs";
import { z } from "zod";
import type { Cell, GradingDocument } from "../../../packages/shared/src/types";
import { FormatError, NotFoundError } from "../services/grading/errors";

const sourceSchema = z.union([z.string(), z.array(z.string())]);

export const notebookCellSchema = z
  .object({
    cell_type: z.string(),
    source: sourceSchema.default("")
  })
  .passthrough();

export const notebookSchema = z
  .object({
    cells: z.array(notebookCellSchema)
  })
  .passthrough();

export function documentFromCells(cells: Cell[]): GradingDocument {
  return Object.freeze({ cells: Object.freeze(cells.map((c) => Object.freeze({ ...c }))) });
}

export function documentFromNotebook(json: unknown, source: string): GradingDocument {
  const parsed = notebookSchema.safeParse(json);
  if (!parsed.success) {
    const issueText = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new FormatError(source, `not a notebook (${issueText})`);
  }
  const cells: Cell[] = [];
  for (const cell of parsed.data.cells) {
    if (cell.cell_type !== "markdown" && cell.cell_type !== "code") continue;
    const text = Array.isArray(cell.source) ? cell.source.join("") : cell.source;
    cells.push({ type: cell.cell_type, source: text });
  }
  return documentFromCells(cells);
}

export function parseNotebookText(text: string, source: string): GradingDocument {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (e) {
    throw new FormatError(source, `invalid JSON (${e instanceof Error ? e.message : String(e)})`);
  }
  return documentFromNotebook(json, source);
}

export function readTextFile(filePath: string): string {
  if (!fs.existsSync(filePath) || !fs.statSync(filePath).isFile()) {
    throw new NotFoundError(filePath);
  }
  return fs.readFileSync(filePath, "utf8");
}

export function loadDocument(filePath: string): GradingDocument {
  return parseNotebookText(readTextFile(filePath), filePath);
}
