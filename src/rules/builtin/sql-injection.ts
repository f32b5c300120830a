import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const SQL_KEYWORD = "(?:SELECT|INSERT|UPDATE|DELETE|DROP)\\b";

const INJECTION_SHAPES = [
  // "SELECT ... " + value
  new RegExp(`["'][^"']*\\b${SQL_KEYWORD}[^"']*["']\\s*\\+`, "i"),
  // `SELECT ... ${value}`
  new RegExp("`[^`]*\\b" + SQL_KEYWORD + "[^`]*\\$\\{", "i"),
  // f"SELECT ... {value}"
  new RegExp(`\\bf["'][^"']*\\b${SQL_KEYWORD}[^"']*\\{`, "i"),
  // "SELECT ... %s" % value
  new RegExp(`["'][^"']*\\b${SQL_KEYWORD}[^"']*["']\\s*%\\s*\\w`, "i"),
];

export const sqlInjection: Pattern = {
  id: "sql-injection",
  name: "SQL Injection",
  description: "Flags SQL statements assembled from strings and runtime values",
  kind: "builtin",
  category: "security",
  severity: "critical",
  baseWeight: 0.8,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];
    for (const { line, content } of getAddedLines(file)) {
      if (INJECTION_SHAPES.some((shape) => shape.test(content))) {
        matches.push({
          line,
          message: "Possible SQL injection: query text is built by string concatenation or interpolation. Use parameterized queries.",
        });
      }
    }
    return matches;
  },
};
