/**
 * Builds the question registry from an instructor document.
 *
 * The document is read as repeating triplets:
 *   [markdown "## ..." description] → [code: one function] → [code: assert lines + setup lines]
 * Every heading consumes exactly three cells, matched or not, so a malformed block
 * never shifts the blocks after it. Code cells outside triplets are scanned for the
 * identity fields `name` and `roll_number`.
 */

import type { Cell, GradingDocument, QuestionSpec } from "../../../../packages/shared/src/types";
import { isParsable } from "../../../../services/runner/src/index";
import { silentLogger, type Logger } from "../../utils/logger";

export const TRIPLET_STRIDE = 3;
export const HEADING_MARKER = "##";

const ASSERTION_LINE_RE = /^assert(?=[\s(.]|$)/;
const FUNCTION_DECL_RE = /^[ \t]*(?:async[ \t]+)?function[ \t]*\*?[ \t]*([A-Za-z_$][\w$]*)[ \t]*\(/m;
const FUNCTION_EXPR_RE =
  /^[ \t]*(?:const|let|var)[ \t]+([A-Za-z_$][\w$]*)[ \t]*=[ \t]*(?:async[ \t]+)?(?:function\b|\([^)]*\)[ \t]*=>|[A-Za-z_$][\w$]*[ \t]*=>)/m;
const IDENTITY_RE = /^[ \t]*(?:(?:const|let|var)[ \t]+)?(name|roll_number)[ \t]*=[ \t]*(["'`])(.*?)\2[ \t]*;?[ \t]*$/gm;

export interface SolutionMetadata {
  name?: string;
  roll_number?: string;
}

export interface SolutionRegistry {
  /** Ordered by first appearance of each question name. */
  questions: QuestionSpec[];
  metadata: SolutionMetadata;
}

export interface ExtractOptions {
  logger?: Logger;
}

type WalkState =
  | { kind: "ExpectHeading" }
  | { kind: "ExpectReferenceBody"; start: number; description: string }
  | { kind: "ExpectAssertions"; start: number; description: string; name: string; referenceBody: string };

export function isHeading(cell: Cell): boolean {
  return cell.type === "markdown" && cell.source.trim().startsWith(HEADING_MARKER);
}

/** Text after the heading line; a single-line heading is its own description. */
export function headingDescription(source: string): string {
  const trimmed = source.trim();
  const newline = trimmed.indexOf("\n");
  return newline === -1 ? trimmed : trimmed.slice(newline + 1).trim();
}

export function isAssertionLine(line: string): boolean {
  return ASSERTION_LINE_RE.test(line.trim());
}

/** Name of the first function the cell defines, or null when it defines none or does not parse. */
export function extractFunctionName(code: string): string | null {
  if (!isParsable(code)) return null;
  const decl = FUNCTION_DECL_RE.exec(code);
  const expr = FUNCTION_EXPR_RE.exec(code);
  if (decl && expr) return decl.index <= expr.index ? decl[1] : expr[1];
  return decl?.[1] ?? expr?.[1] ?? null;
}

export function splitAssertionCell(source: string): { assertions: string[]; contextCode: string } {
  const assertions: string[] = [];
  const setup: string[] = [];
  for (const line of source.split(/\r?\n/)) {
    if (isAssertionLine(line)) assertions.push(line.trim());
    else setup.push(line);
  }
  return { assertions, contextCode: setup.join("\n") };
}

/** Best-effort read of `name` / `roll_number` string assignments; anything else is ignored. */
export function scanIdentity(source: string, into: SolutionMetadata = {}): SolutionMetadata {
  if (!source.includes("name") || !source.includes("roll_number")) return into;
  for (const match of source.matchAll(IDENTITY_RE)) {
    const [, field, , value] = match;
    if (field === "name") into.name = value;
    else into.roll_number = value;
  }
  return into;
}

/** Identity fields from every code cell of a student document. */
export function scanDocumentIdentity(document: GradingDocument): SolutionMetadata {
  const metadata: SolutionMetadata = {};
  for (const cell of document.cells) {
    if (cell.type === "code") scanIdentity(cell.source, metadata);
  }
  return metadata;
}

export function extractSolution(document: GradingDocument, options: ExtractOptions = {}): SolutionRegistry {
  const log = options.logger ?? silentLogger;
  const cells = document.cells;
  const questions = new Map<string, QuestionSpec>();
  const metadata: SolutionMetadata = {};

  const resync = (start: number, reason: string): number => {
    log.debug(`heading at cell ${start} skipped: ${reason}`);
    return start + TRIPLET_STRIDE;
  };

  let state: WalkState = { kind: "ExpectHeading" };
  let i = 0;
  while (i < cells.length) {
    const cell = cells[i];
    switch (state.kind) {
      case "ExpectHeading": {
        if (isHeading(cell)) {
          state = { kind: "ExpectReferenceBody", start: i, description: headingDescription(cell.source) };
        } else if (cell.type === "code") {
          scanIdentity(cell.source, metadata);
        }
        i++;
        break;
      }
      case "ExpectReferenceBody": {
        const name = cell.type === "code" ? extractFunctionName(cell.source) : null;
        if (name) {
          const current: Extract<WalkState, { kind: "ExpectReferenceBody" }> = state;
          state = { ...current, kind: "ExpectAssertions", name, referenceBody: cell.source.trim() };
          i++;
        } else {
          i = resync(state.start, cell.type === "code" ? "no function definition" : "function cell is not code");
          state = { kind: "ExpectHeading" };
        }
        break;
      }
      case "ExpectAssertions": {
        if (cell.type === "code") {
          const { assertions, contextCode } = splitAssertionCell(cell.source);
          if (questions.has(state.name)) {
            log.warn(`question "${state.name}" is defined more than once; the later definition wins`);
          }
          questions.set(state.name, {
            name: state.name,
            description: state.description,
            reference_body: state.referenceBody,
            context_code: contextCode,
            assertions
          });
          i = state.start + TRIPLET_STRIDE;
        } else {
          i = resync(state.start, "assertion cell is not code");
        }
        state = { kind: "ExpectHeading" };
        break;
      }
    }
  }
  if (state.kind !== "ExpectHeading") {
    log.debug(`heading at cell ${state.start} skipped: document ended inside the block`);
  }

  const registry = { questions: Array.from(questions.values()), metadata };
  log.info(`Extracted ${registry.questions.length} question(s)`);
  return registry;
}
