import type { Pattern } from "../types.js";
import type { ParsedFile } from "../../utils/diff-parser.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const SOURCE_EXTENSIONS = new Set([".ts", ".tsx", ".js", ".jsx", ".py", ".go", ".rs", ".java"]);
const TEST_PATTERNS = [/\.test\./, /\.spec\./, /__tests__/, /(^|\/)test_/, /_test\./];

/**
 * Single finding when source files change without test changes.
 * Only emitted on the first changed source file, not per file.
 */
export const missingTests: Pattern = {
  id: "missing-tests",
  name: "Missing Tests",
  description: "Warns when source files are modified without corresponding test changes",
  kind: "builtin",
  category: "testing",
  severity: "medium",
  baseWeight: 0.5,
  active: true,
  evaluate({ file, allFiles }) {
    const sources = allFiles.filter(isReviewableSource);
    if (sources.length === 0 || sources[0].filename !== file.filename) return [];

    if (allFiles.some((f) => isTestFile(f.filename))) return [];

    const listed = sources
      .slice(0, 5)
      .map((f) => `\`${f.filename}\``)
      .join(", ");
    const more = sources.length > 5 ? ` and ${sources.length - 5} more` : "";
    const [first] = getAddedLines(file);

    return [
      {
        line: first?.line ?? 1,
        message: `${sources.length} source file(s) modified without test changes: ${listed}${more}. Consider adding or updating tests.`,
      },
    ];
  },
};

function isReviewableSource(file: ParsedFile): boolean {
  return (
    SOURCE_EXTENSIONS.has(getExtension(file.filename)) &&
    !isTestFile(file.filename) &&
    file.status !== "removed"
  );
}

function getExtension(filename: string): string {
  const parts = filename.split(".");
  return parts.length > 1 ? `.${parts[parts.length - 1]}` : "";
}

function isTestFile(filename: string): boolean {
  return TEST_PATTERNS.some((p) => p.test(filename));
}
