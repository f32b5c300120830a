export interface DiffHunk {
  oldStart: number;
  oldCount: number;
  newStart: number;
  newCount: number;
  lines: DiffLine[];
}

export interface DiffLine {
  type: "add" | "del" | "context";
  content: string;
  oldLineNumber: number | null;
  newLineNumber: number | null;
}

export interface ParsedFile {
  filename: string;
  status: "added" | "removed" | "modified" | "renamed";
  hunks: DiffHunk[];
  additions: number;
  deletions: number;
}

export interface AddedLine {
  line: number;
  content: string;
}

const HUNK_HEADER = /^@@\s+-(\d+)(?:,(\d+))?\s+\+(\d+)(?:,(\d+))?\s+@@/;
const GIT_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;

export function parsePatch(filename: string, patch: string | undefined, status: string): ParsedFile {
  const parsed: ParsedFile = {
    filename,
    status: normalizeStatus(status),
    hunks: [],
    additions: 0,
    deletions: 0,
  };

  if (!patch) return parsed;

  const lines = patch.split("\n");
  let currentHunk: DiffHunk | null = null;
  let oldLine = 0;
  let newLine = 0;

  for (const line of lines) {
    const hunkMatch = line.match(HUNK_HEADER);
    if (hunkMatch) {
      currentHunk = {
        oldStart: parseInt(hunkMatch[1], 10),
        oldCount: parseInt(hunkMatch[2] ?? "1", 10),
        newStart: parseInt(hunkMatch[3], 10),
        newCount: parseInt(hunkMatch[4] ?? "1", 10),
        lines: [],
      };
      parsed.hunks.push(currentHunk);
      oldLine = currentHunk.oldStart;
      newLine = currentHunk.newStart;
      continue;
    }

    if (!currentHunk) continue;

    if (line.startsWith("+")) {
      currentHunk.lines.push({
        type: "add",
        content: line.slice(1),
        oldLineNumber: null,
        newLineNumber: newLine,
      });
      newLine++;
      parsed.additions++;
    } else if (line.startsWith("-")) {
      currentHunk.lines.push({
        type: "del",
        content: line.slice(1),
        oldLineNumber: oldLine,
        newLineNumber: null,
      });
      oldLine++;
      parsed.deletions++;
    } else if (line.startsWith("\\")) {
      // "No newline at end of file" - skip
    } else {
      currentHunk.lines.push({
        type: "context",
        content: line.startsWith(" ") ? line.slice(1) : line,
        oldLineNumber: oldLine,
        newLineNumber: newLine,
      });
      oldLine++;
      newLine++;
    }
  }

  return parsed;
}

/**
 * Split a multi-file unified diff into parsed files. A diff without file
 * headers is treated as a single patch for the first of `filePaths`.
 */
export function parseUnifiedDiff(diff: string, filePaths: string[] = []): ParsedFile[] {
  const normalized = diff.replace(/\r\n/g, "\n");
  const lines = normalized.split("\n");
  const hasHeaders = lines.some((l) => GIT_HEADER.test(l) || l.startsWith("+++ "));

  if (!hasHeaders) {
    if (!normalized.trim()) return [];
    return [parsePatch(filePaths[0] ?? "unknown", normalized, "modified")];
  }

  const files: ParsedFile[] = [];
  let section: { oldPath: string | null; newPath: string | null; body: string[] } | null = null;

  const flush = () => {
    if (!section) return;
    const filename = section.newPath ?? section.oldPath;
    if (filename) {
      const status =
        section.oldPath === null
          ? "added"
          : section.newPath === null
            ? "removed"
            : section.oldPath !== section.newPath
              ? "renamed"
              : "modified";
      files.push(parsePatch(filename, section.body.join("\n"), status));
    }
    section = null;
  };

  // lines still owed to the open hunk; header detection is off until both reach 0
  let oldLeft = 0;
  let newLeft = 0;

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (section && (oldLeft > 0 || newLeft > 0)) {
      section.body.push(line);
      if (line.startsWith("-")) oldLeft--;
      else if (line.startsWith("+")) newLeft--;
      else if (!line.startsWith("\\")) {
        oldLeft--;
        newLeft--;
      }
      continue;
    }

    const hunk = line.match(HUNK_HEADER);
    if (hunk && section) {
      section.body.push(line);
      oldLeft = parseInt(hunk[2] ?? "1", 10);
      newLeft = parseInt(hunk[4] ?? "1", 10);
      continue;
    }

    const git = line.match(GIT_HEADER);
    if (git) {
      flush();
      section = { oldPath: git[1], newPath: git[2], body: [] };
      continue;
    }

    const next = lines[i + 1] ?? "";
    if (line.startsWith("--- ") && next.startsWith("+++ ")) {
      if (!section || hasHunks(section.body)) {
        flush();
        section = { oldPath: null, newPath: null, body: [] };
      }
      section.oldPath = headerPath(line.slice(4), "a/");
      section.newPath = headerPath(next.slice(4), "b/");
      i++;
      continue;
    }

    if (section) section.body.push(line);
  }
  flush();

  return files;
}

/** Added lines of a parsed file, in diff order */
export function getAddedLines(file: ParsedFile): AddedLine[] {
  const added: AddedLine[] = [];
  for (const hunk of file.hunks) {
    for (const line of hunk.lines) {
      if (line.type === "add" && line.newLineNumber !== null) {
        added.push({ line: line.newLineNumber, content: line.content });
      }
    }
  }
  return added;
}

function hasHunks(body: string[]): boolean {
  return body.some((l) => HUNK_HEADER.test(l));
}

function headerPath(raw: string, prefix: string): string | null {
  const path = raw.split("\t")[0].trim();
  if (path === "/dev/null") return null;
  return path.startsWith(prefix) ? path.slice(prefix.length) : path;
}

function normalizeStatus(status: string): ParsedFile["status"] {
  switch (status) {
    case "added":
      return "added";
    case "removed":
      return "removed";
    case "renamed":
      return "renamed";
    default:
      return "modified";
  }
}
