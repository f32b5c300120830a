import type { ParsedFile } from "../utils/diff-parser.js";
import type { QueryChunk } from "./types.js";

// Declarations that open a new logical block
const BLOCK_START = new RegExp(
  [
    String.raw`^\s*(?:export\s+)?(?:default\s+)?(?:abstract\s+)?(?:async\s+)?(?:function\b|class\b|interface\b|enum\b|type\s+\w+\s*=)`,
    String.raw`^\s*(?:export\s+)?(?:const|let|var)\s+\w+\s*=\s*(?:async\s*)?(?:\([^)]*\)|\w+)\s*=>`,
    String.raw`^\s*(?:async\s+)?def\s+\w+`,
    String.raw`^\s*func\s+`,
    String.raw`^\s*(?:pub\s+)?fn\s+\w+`,
    String.raw`^\s*impl\b`,
    String.raw`^\s+(?:(?:public|private|protected|static|async|readonly)\s+)*(?!if\b|for\b|while\b|switch\b|catch\b|return\b)\w+\s*\([^)]*\)\s*(?::\s*[\w<>\[\]|, ]+)?\s*\{\s*$`,
  ].join("|")
);

interface PendingChunk {
  startLine: number;
  endLine: number;
  lines: string[];
  hasAddition: boolean;
}

/**
 * Split the new side of each hunk into query chunks aligned to logical
 * code blocks. A chunk closes before a declaration, at a blank line once it
 * is half full, or when it reaches `maxLines`. Chunks without an added line
 * are dropped.
 */
export function chunkDiff(files: ParsedFile[], maxLines: number): QueryChunk[] {
  const chunks: QueryChunk[] = [];

  for (const file of files) {
    for (const hunk of file.hunks) {
      let current: PendingChunk | null = null;

      const close = () => {
        if (current && current.hasAddition && current.lines.join("").trim()) {
          chunks.push({
            path: file.filename,
            startLine: current.startLine,
            endLine: current.endLine,
            text: current.lines.join("\n"),
          });
        }
        current = null;
      };

      for (const line of hunk.lines) {
        if (line.newLineNumber === null) continue;

        if (current && BLOCK_START.test(line.content)) close();

        if (!current) {
          current = { startLine: line.newLineNumber, endLine: line.newLineNumber, lines: [], hasAddition: false };
        }
        current.lines.push(line.content);
        current.endLine = line.newLineNumber;
        if (line.type === "add") current.hasAddition = true;

        const blank = line.content.trim() === "";
        if (current.lines.length >= maxLines || (blank && current.lines.length >= maxLines / 2)) {
          close();
        }
      }
      close();
    }
  }

  return chunks;
}
