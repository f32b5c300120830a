import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const INLINE_EMPTY_CATCH = /\bcatch\s*(?:\([^)]*\))?\s*\{\s*\}/;
const CATCH_OPEN = /\bcatch\s*(?:\([^)]*\))?\s*\{\s*$/;
const BLOCK_CLOSE = /^\s*\}/;
const EXCEPT_OPEN = /^\s*except\b[^:]*:\s*$/;
const PASS_ONLY = /^\s*pass\s*$/;

export const emptyCatch: Pattern = {
  id: "empty-catch",
  name: "Empty Catch",
  description: "Flags exception handlers that discard the error",
  kind: "builtin",
  category: "error-handling",
  severity: "medium",
  baseWeight: 0.8,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];
    const added = getAddedLines(file);

    for (let i = 0; i < added.length; i++) {
      const { line, content } = added[i];
      const next = added[i + 1];
      const followsDirectly = next !== undefined && next.line === line + 1;

      const empty =
        INLINE_EMPTY_CATCH.test(content) ||
        (followsDirectly && CATCH_OPEN.test(content) && BLOCK_CLOSE.test(next.content)) ||
        (followsDirectly && EXCEPT_OPEN.test(content) && PASS_ONLY.test(next.content));

      if (empty) {
        matches.push({
          line,
          message: "Empty exception handler swallows the error. Handle it, log it, or rethrow.",
        });
      }
    }
    return matches;
  },
};
