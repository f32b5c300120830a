import { describe, it, expect } from "vitest";
import { parsePatch, parseUnifiedDiff, getAddedLines } from "../../src/utils/diff-parser.js";
import { SIMPLE_PATCH, MULTI_HUNK_PATCH, MULTI_FILE_DIFF } from "../fixtures/sample-patch.js";

describe("parsePatch", () => {
  it("parses a simple patch with additions and deletions", () => {
    const result = parsePatch("test.ts", SIMPLE_PATCH, "modified");

    expect(result.filename).toBe("test.ts");
    expect(result.status).toBe("modified");
    expect(result.additions).toBe(5);
    expect(result.deletions).toBe(1);
    expect(result.hunks).toHaveLength(1);
  });

  it("numbers added lines on the new side", () => {
    const result = parsePatch("test.ts", SIMPLE_PATCH, "modified");

    expect(getAddedLines(result).map((l) => l.line)).toEqual([3, 4, 6, 8, 9]);
    expect(getAddedLines(result)[0].content).toBe('const API_KEY = "test-secret-value";');
  });

  it("parses multi-hunk patches", () => {
    const result = parsePatch("utils.ts", MULTI_HUNK_PATCH, "modified");

    expect(result.hunks).toHaveLength(2);
    expect(result.hunks[1].newStart).toBe(25);
    expect(getAddedLines(result).map((l) => l.line)).toEqual([11, 27, 28, 29, 30, 31]);
  });

  it("handles empty patch", () => {
    const result = parsePatch("empty.ts", undefined, "added");

    expect(result.filename).toBe("empty.ts");
    expect(result.status).toBe("added");
    expect(result.hunks).toHaveLength(0);
    expect(result.additions).toBe(0);
    expect(result.deletions).toBe(0);
  });

  it("normalizes file status", () => {
    expect(parsePatch("a.ts", "", "added").status).toBe("added");
    expect(parsePatch("b.ts", "", "removed").status).toBe("removed");
    expect(parsePatch("c.ts", "", "renamed").status).toBe("renamed");
    expect(parsePatch("d.ts", "", "modified").status).toBe("modified");
    expect(parsePatch("e.ts", "", "changed").status).toBe("modified");
  });

  it("skips no-newline markers", () => {
    const result = parsePatch("a.ts", "@@ -1 +1 @@\n-a\n\\ No newline at end of file\n+b", "modified");

    expect(result.hunks[0].lines.map((l) => l.type)).toEqual(["del", "add"]);
    expect(getAddedLines(result)).toEqual([{ line: 1, content: "b" }]);
  });
});

describe("parseUnifiedDiff", () => {
  it("splits a multi-file git diff", () => {
    const files = parseUnifiedDiff(MULTI_FILE_DIFF);

    expect(files.map((f) => [f.filename, f.status, f.additions, f.deletions])).toEqual([
      ["src/db.ts", "modified", 2, 1],
      ["src/flags.ts", "added", 2, 0],
    ]);
    expect(getAddedLines(files[0])).toEqual([
      { line: 2, content: '  const sql = "SELECT * FROM users WHERE id = " + id;' },
      { line: 3, content: "  return db.query(sql);" },
    ]);
  });

  it("detects renamed and removed files", () => {
    const diff = [
      "diff --git a/old.ts b/new.ts",
      "--- a/old.ts",
      "+++ b/new.ts",
      "@@ -1 +1 @@",
      "-a",
      "+b",
      "--- a/gone.ts",
      "+++ /dev/null",
      "@@ -1,1 +0,0 @@",
      "-x",
    ].join("\n");

    const files = parseUnifiedDiff(diff);

    expect(files.map((f) => [f.filename, f.status])).toEqual([
      ["new.ts", "renamed"],
      ["gone.ts", "removed"],
    ]);
  });

  it("treats a headerless diff as a patch for the first path", () => {
    const files = parseUnifiedDiff(SIMPLE_PATCH, ["src/server.ts"]);

    expect(files).toHaveLength(1);
    expect(files[0].filename).toBe("src/server.ts");
    expect(files[0].additions).toBe(5);
  });

  it("falls back to a placeholder name without paths", () => {
    expect(parseUnifiedDiff("@@ -1 +1 @@\n+x")[0].filename).toBe("unknown");
  });

  it("returns no files for an empty diff", () => {
    expect(parseUnifiedDiff("")).toEqual([]);
    expect(parseUnifiedDiff("  \n")).toEqual([]);
  });

  it("reads header-like lines inside a hunk as content", () => {
    const diff = [
      "diff --git a/notes.md b/notes.md",
      "--- a/notes.md",
      "+++ b/notes.md",
      "@@ -1,2 +1,2 @@",
      "--- old rule",
      "+++ new rule",
      " keep",
    ].join("\n");

    const files = parseUnifiedDiff(diff);

    expect(files.map((f) => [f.filename, f.additions, f.deletions])).toEqual([["notes.md", 1, 1]]);
    expect(getAddedLines(files[0])).toEqual([{ line: 1, content: "++ new rule" }]);
    expect(files[0].hunks[0].lines[0]).toEqual({
      type: "del",
      content: "-- old rule",
      oldLineNumber: 1,
      newLineNumber: null,
    });
  });

  it("picks up the next file header once a hunk is complete", () => {
    const diff = [
      "--- a/one.ts",
      "+++ b/one.ts",
      "@@ -1 +1 @@",
      "-a",
      "+b",
      "--- a/two.ts",
      "+++ b/two.ts",
      "@@ -0,0 +1 @@",
      "+c",
    ].join("\n");

    expect(parseUnifiedDiff(diff).map((f) => [f.filename, f.additions])).toEqual([
      ["one.ts", 1],
      ["two.ts", 1],
    ]);
  });

  it("normalizes CRLF line endings", () => {
    const [file] = parseUnifiedDiff("@@ -1 +1 @@\r\n-a\r\n+b", ["a.ts"]);

    expect(getAddedLines(file)).toEqual([{ line: 1, content: "b" }]);
  });
});
