import type { Pattern } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

export const MAX_ADDED_LINES = 500;

export const oversizedChange: Pattern = {
  id: "oversized-change",
  name: "Oversized Change",
  description: "Warns when a single file adds too many lines",
  kind: "builtin",
  category: "maintainability",
  severity: "medium",
  baseWeight: 0.6,
  active: true,
  evaluate({ file }) {
    if (file.additions <= MAX_ADDED_LINES) return [];

    // Attach to the first added line
    const [first] = getAddedLines(file);
    if (!first) return [];

    return [
      {
        line: first.line,
        message: `This file adds ${file.additions} lines (threshold: ${MAX_ADDED_LINES}). Large changes are harder to review; consider splitting.`,
      },
    ];
  },
};
