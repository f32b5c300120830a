import type { ParsedFile } from "../utils/diff-parser.js";
import { CHARS_PER_TOKEN } from "./types.js";

export interface FittedDiff {
  files: ParsedFile[];
  estimatedTokens: number;
  /** Files left out entirely because the budget ran out */
  omitted: string[];
  truncated: string[];
}

const FILE_PRIORITY: Record<string, number> = {
  // Source code - highest priority
  ".ts": 10, ".tsx": 10, ".js": 10, ".jsx": 10,
  ".py": 10, ".go": 10, ".rs": 10, ".java": 10,
  ".rb": 10, ".kt": 10, ".swift": 10, ".cs": 10,
  // Config
  ".json": 5, ".yml": 5, ".yaml": 5, ".toml": 5,
  ".env": 5, ".ini": 5,
  // Docs - lowest
  ".md": 2, ".txt": 2, ".rst": 2,
};

/**
 * Fit a diff into a prompt token budget. Files are taken by priority
 * (source, then config, then tests, then docs) and size; a file that would
 * take more than 80% of the budget on its own is truncated.
 */
export function fitToBudget(files: ParsedFile[], maxTokens: number): FittedDiff {
  const sorted = [...files].sort((a, b) => {
    const pa = getFilePriority(a.filename);
    const pb = getFilePriority(b.filename);
    if (pa !== pb) return pb - pa;
    return estimateFileTokens(a) - estimateFileTokens(b) || a.filename.localeCompare(b.filename);
  });

  const result: FittedDiff = { files: [], estimatedTokens: 0, omitted: [], truncated: [] };

  for (const file of sorted) {
    let candidate = file;
    let tokens = estimateFileTokens(file);

    if (tokens > maxTokens * 0.8) {
      candidate = truncateFile(file, Math.floor(maxTokens * 0.7));
      tokens = estimateFileTokens(candidate);
      result.truncated.push(file.filename);
    }

    if (candidate.hunks.length === 0 || result.estimatedTokens + tokens > maxTokens) {
      result.omitted.push(file.filename);
      continue;
    }

    result.files.push(candidate);
    result.estimatedTokens += tokens;
  }

  return result;
}

export function getFilePriority(filename: string): number {
  if (/\.(test|spec)\.(ts|js|tsx|jsx)$/.test(filename) || /(^|\/)test_[^/]+\.py$/.test(filename)) return 4;

  const ext = "." + filename.split(".").pop();
  return FILE_PRIORITY[ext] ?? 3;
}

export function estimateFileTokens(file: ParsedFile): number {
  let chars = file.filename.length + 20; // header overhead
  for (const hunk of file.hunks) {
    for (const line of hunk.lines) {
      chars += line.content.length + 5; // line prefix overhead
    }
  }
  return Math.ceil(chars / CHARS_PER_TOKEN);
}

function truncateFile(file: ParsedFile, maxTokens: number): ParsedFile {
  const truncated: ParsedFile = { ...file, hunks: [], additions: 0, deletions: 0 };
  let tokens = Math.ceil(file.filename.length / CHARS_PER_TOKEN) + 20;

  for (const hunk of file.hunks) {
    let kept = 0;
    let hunkTokens = 0;

    for (const line of hunk.lines) {
      const lineTokens = Math.ceil((line.content.length + 5) / CHARS_PER_TOKEN);
      if (tokens + hunkTokens + lineTokens > maxTokens) break;
      hunkTokens += lineTokens;
      kept++;
    }

    if (kept > 0) {
      const lines = hunk.lines.slice(0, kept);
      truncated.hunks.push({ ...hunk, lines });
      truncated.additions += lines.filter((l) => l.type === "add").length;
      truncated.deletions += lines.filter((l) => l.type === "del").length;
      tokens += hunkTokens;
    }

    if (kept < hunk.lines.length || tokens >= maxTokens) break;
  }

  return truncated;
}
