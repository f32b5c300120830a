import type { ParsedFile } from "../utils/diff-parser.js";
import type { ContextChunk } from "../review/types.js";

/** Bumped whenever prompt wording or output format changes; part of the cache key */
export const PROMPT_TEMPLATE_VERSION = "2";

const CATEGORIES = "security|bugs|error-handling|performance|maintainability|testing";

export function buildTriagePrompt(): string {
  return `You are a code reviewer performing a fast triage of a change set.

## Task
Decide whether the diff contains issues worth a detailed review. Look for:
1. **Bugs & correctness**: logic errors, off-by-one, null safety, unhandled edge cases
2. **Security**: hardcoded secrets, injection risks, auth issues
3. **Error handling**: swallowed errors, missing cleanup
4. **Performance**: needless allocation, N+1 patterns

Style nits, TODO comments and debug logging are handled by rules; ignore them.

## Output Format
Return only a JSON object, optionally inside a \`\`\`json code block:
{"hasIssues": true, "categories": ["${CATEGORIES.split("|").slice(0, 2).join('", "')}"]}

Use {"hasIssues": false, "categories": []} when the change looks clean.`;
}

export function buildDetailedPrompt(triageCategories: string[]): string {
  const focus = triageCategories.length > 0 ? triageCategories.join(", ") : "all categories";

  return `You are an expert code reviewer.

## Task
Review the diff and report concrete issues. A triage pass flagged: ${focus}.

## Guidelines
- Be concise and specific. Reference line numbers.
- Only comment on issues that matter. For each finding, explain why it is a problem.
- Only report issues with confidence >= 0.5. Prefer fewer, higher-quality findings.
- Repository context, when given, is for understanding only; do not report issues in it.

## Output Format
Return only a JSON object, optionally inside a \`\`\`json code block:
{
  "findings": [
    {
      "path": "relative/file/path.ts",
      "line": 42,
      "category": "${CATEGORIES}",
      "severity": "critical|high|medium|low",
      "message": "Clear description of the issue and suggested fix",
      "confidence": 0.85
    }
  ]
}

Rules:
- "line" must be a line number from the NEW version of the file (right side of diff)
- Only comment on ADDED or MODIFIED lines
- If no issues found, return {"findings": []}`;
}

export function buildUserPrompt(files: ParsedFile[], context: readonly ContextChunk[]): string {
  const parts: string[] = [];

  if (context.length > 0) {
    parts.push("## Repository Context\n");
    for (const chunk of context) {
      parts.push(`### ${chunk.path}:${chunk.startLine}-${chunk.endLine} (${chunk.origin})`);
      parts.push("```");
      parts.push(chunk.text);
      parts.push("```\n");
    }
  }

  parts.push("## Changes\n");
  for (const file of files) {
    parts.push(`### ${file.filename} (${file.status})`);
    parts.push("```diff");

    for (const hunk of file.hunks) {
      parts.push(`@@ -${hunk.oldStart},${hunk.oldCount} +${hunk.newStart},${hunk.newCount} @@`);
      for (const line of hunk.lines) {
        const prefix = line.type === "add" ? "+" : line.type === "del" ? "-" : " ";
        const lineNum = line.type === "del" ? `L${line.oldLineNumber}` : `L${line.newLineNumber}`;
        parts.push(`${prefix}${lineNum}: ${line.content}`);
      }
    }

    parts.push("```\n");
  }

  return parts.join("\n");
}
