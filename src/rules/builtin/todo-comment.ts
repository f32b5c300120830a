import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const TODO_PATTERN = /\b(TODO|FIXME|HACK|XXX)\b/;

export const todoComment: Pattern = {
  id: "todo-comment",
  name: "TODO Comment",
  description: "Flags TODO/FIXME/HACK comments in added lines",
  kind: "builtin",
  category: "maintainability",
  severity: "low",
  baseWeight: 0.5,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];
    for (const { line, content } of getAddedLines(file)) {
      const match = content.match(TODO_PATTERN);
      if (match) {
        matches.push({
          line,
          message: `\`${match[1]}\` comment added. Track the follow-up in an issue instead.`,
        });
      }
    }
    return matches;
  },
};
