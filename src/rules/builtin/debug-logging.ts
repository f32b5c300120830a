import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const DEBUG_OUTPUT = /\bconsole\.(log|debug|info|warn|error)\b|^\s*print\(|\bdebugger\b/;

export const debugLogging: Pattern = {
  id: "debug-logging",
  name: "Debug Logging",
  description: "Flags console/print debugging statements in added lines",
  kind: "builtin",
  category: "maintainability",
  severity: "low",
  baseWeight: 0.6,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];
    for (const { line, content } of getAddedLines(file)) {
      if (DEBUG_OUTPUT.test(content)) {
        matches.push({
          line,
          message: "Debug output statement detected. Remove it or route it through the application logger.",
        });
      }
    }
    return matches;
  },
};
