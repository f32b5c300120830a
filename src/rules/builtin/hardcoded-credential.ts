import type { Pattern, PatternMatch } from "../types.js";
import { getAddedLines } from "../../utils/diff-parser.js";

const SECRET_PATTERNS = [
  { pattern: /(?:api[_-]?key|apikey)\s*[:=]\s*["'][^"']{8,}["']/i, label: "API key" },
  { pattern: /(?:secret|password|passwd|pwd)\s*[:=]\s*["'][^"']{6,}["']/i, label: "Secret/password" },
  { pattern: /(?:token)\s*[:=]\s*["'][^"']{10,}["']/i, label: "Token" },
  { pattern: /-----BEGIN (?:RSA |EC |DSA )?PRIVATE KEY-----/, label: "Private key" },
  { pattern: /(?:AKIA|ABIA|ACCA|ASIA)[0-9A-Z]{16}/, label: "AWS access key" },
  { pattern: /ghp_[A-Za-z0-9_]{36}/, label: "GitHub personal access token" },
  { pattern: /sk-[A-Za-z0-9]{20,}/, label: "API secret key" },
];

export const hardcodedCredential: Pattern = {
  id: "hardcoded-credential",
  name: "Hardcoded Credential",
  description: "Detects credentials and keys committed in added lines",
  kind: "builtin",
  category: "security",
  severity: "critical",
  baseWeight: 0.9,
  active: true,
  evaluate({ file }) {
    const matches: PatternMatch[] = [];

    for (const { line, content } of getAddedLines(file)) {
      const hit = SECRET_PATTERNS.find(({ pattern }) => pattern.test(content));
      if (hit) {
        matches.push({
          line,
          message: `Hardcoded credential: potential ${hit.label} in source. Load secrets from the environment or a secrets manager.`,
        });
      }
    }
    return matches;
  },
};
