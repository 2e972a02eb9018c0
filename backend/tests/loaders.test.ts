import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, test } from "vitest";
import { documentFromNotebook, loadDocument, parseNotebookText } from "../src/loaders/notebook";
import { detectKind, executableUnits, listSubmissions, loadSubmission, parseSubmission } from "../src/loaders/submissions";
import { FormatError, NotFoundError, UnsupportedFormatError } from "../src/services/grading/errors";
import { code, makeTempDir, md, notebookJson } from "./helpers";

const dirs: string[] = [];

function tempDir(): string {
  const dir = makeTempDir();
  dirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
});

describe("notebook loader", () => {
  test("joins line sources and keeps cell order", () => {
    const document = documentFromNotebook(notebookJson(md("## Add\nSum."), code("function add(a, b) {\n  return a + b;\n}")), "nb");
    expect(document.cells).toEqual([
      { type: "markdown", source: "## Add\nSum." },
      { type: "code", source: "function add(a, b) {\n  return a + b;\n}" }
    ]);
    expect(Object.isFrozen(document.cells)).toBe(true);
  });

  test("drops raw cells", () => {
    const document = documentFromNotebook(
      { cells: [{ cell_type: "raw", source: "x" }, { cell_type: "code", source: "var y = 1;" }] },
      "nb"
    );
    expect(document.cells).toEqual([{ type: "code", source: "var y = 1;" }]);
  });

  test("rejects invalid JSON and non-notebook shapes", () => {
    expect(() => parseNotebookText("{not json", "broken.ipynb")).toThrow(FormatError);
    expect(() => documentFromNotebook({ worksheets: [] }, "old.ipynb")).toThrow(FormatError);
  });

  test("a missing file is NotFound", () => {
    expect(() => loadDocument(path.join(tempDir(), "absent.ipynb"))).toThrow(NotFoundError);
  });

  test("reads a notebook from disk", () => {
    const file = path.join(tempDir(), "solution.ipynb");
    fs.writeFileSync(file, JSON.stringify(notebookJson(md("## Q"), code("function q() {}"))), "utf8");
    expect(loadDocument(file).cells).toHaveLength(2);
  });
});

describe("submission loader", () => {
  test("detects kinds from the extension", () => {
    expect(detectKind("a.ipynb")).toBe("document");
    expect(detectKind("a.JS")).toBe("script");
    expect(detectKind("a.mjs")).toBe("script");
    expect(detectKind("a.csv")).toBe("tabular");
    expect(detectKind("a.json")).toBe("structured-data");
    expect(() => detectKind("a.py")).toThrow(UnsupportedFormatError);
  });

  test("scripts are one code unit; notebooks contribute their code cells", () => {
    expect(executableUnits(parseSubmission("s.js", "var a = 1;"))).toEqual(["var a = 1;"]);
    const nb = parseSubmission("s.ipynb", JSON.stringify(notebookJson(md("# Notes"), code("var a = 1;"), code("var b = 2;"))));
    expect(executableUnits(nb)).toEqual(["var a = 1;", "var b = 2;"]);
  });

  test("tabular and structured-data submissions have nothing to execute", () => {
    expect(() => executableUnits(parseSubmission("s.csv", "a,b\n1,2\n"))).toThrow(FormatError);
    expect(() => executableUnits(parseSubmission("s.json", '{"a": 1}'))).toThrow(FormatError);
    expect(() => parseSubmission("s.json", "{oops")).toThrow(FormatError);
  });

  test("loadSubmission reports missing files and unsupported formats", () => {
    const dir = tempDir();
    expect(() => loadSubmission(path.join(dir, "gone.js"))).toThrow(NotFoundError);
    expect(() => loadSubmission(path.join(dir, "notes.txt"))).toThrow(UnsupportedFormatError);
  });

  test("lists files with the solution's extension, sorted", () => {
    const dir = tempDir();
    for (const name of ["b.ipynb", "a.ipynb", "notes.txt", "c.js"]) {
      fs.writeFileSync(path.join(dir, name), "{}", "utf8");
    }
    fs.mkdirSync(path.join(dir, "nested.ipynb"));
    expect(listSubmissions(dir, "/somewhere/solution.ipynb")).toEqual([path.join(dir, "a.ipynb"), path.join(dir, "b.ipynb")]);
    expect(() => listSubmissions(path.join(dir, "missing"), "solution.ipynb")).toThrow(NotFoundError);
  });
});
