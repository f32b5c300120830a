import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const MAGIC_NUMBER = /(?<![\w.#])\d{3,}(?![\w.])/;
const EXEMPT_LINE = /^\s*(?:const|let|var|final|static|export\s+const)\b|^\s*[A-Z][A-Z0-9_]*\s*=|^\s*(?:\/\/|#|\*)/;

export const magicNumber: Pattern = {
  id: "magic-number",
  name: "Magic Number",
  description: "Flags unexplained numeric literals of three or more digits",
  kind: "builtin",
  category: "maintainability",
  severity: "low",
  baseWeight: 0.5,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];
    for (const { line, content } of getAddedLines(file)) {
      if (EXEMPT_LINE.test(content)) continue;
      if (MAGIC_NUMBER.test(content)) {
        matches.push({
          line,
          message: "Numeric literal without a name. Extract it into a named constant.",
        });
      }
    }
    return matches;
  },
};
