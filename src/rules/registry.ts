import type { EngineConfig, CustomPatternConfig, PatternOverride } from "../config-loader/schema.js";
import type { Pattern, PatternMatch } from "./types.js";
import { ConfigError } from "../errors.js";
import { getAddedLines } from "../utils/diff-parser.js";
import { hardcodedCredential } from "./builtin/hardcoded-credential.js";
import { sqlInjection } from "./builtin/sql-injection.js";
import { emptyCatch } from "./builtin/empty-catch.js";
import { debugLogging } from "./builtin/debug-logging.js";
import { todoComment } from "./builtin/todo-comment.js";
import { magicNumber } from "./builtin/magic-number.js";
import { oversizedChange } from "./builtin/oversized-change.js";
import { missingTests } from "./builtin/missing-tests.js";
import { createChildLogger } from "../utils/logger.js";

const log = createChildLogger({ module: "pattern-registry" });

export const BUILTIN_PATTERNS: readonly Pattern[] = [
  hardcodedCredential,
  sqlInjection,
  emptyCatch,
  debugLogging,
  todoComment,
  magicNumber,
  oversizedChange,
  missingTests,
];

/**
 * Patterns keyed by id. Entries are replaced whole, never edited in place,
 * so concurrent readers always see a consistent pattern.
 */
export class PatternRegistry {
  private readonly patterns = new Map<string, Pattern>();

  register(pattern: Pattern): void {
    if (this.patterns.has(pattern.id)) {
      throw new ConfigError(`Duplicate pattern id: ${pattern.id}`, { patternId: pattern.id });
    }
    this.patterns.set(pattern.id, pattern);
  }

  get(id: string): Pattern | undefined {
    return this.patterns.get(id);
  }

  /** All patterns, ordered by id */
  list(): Pattern[] {
    return [...this.patterns.values()].sort((a, b) => a.id.localeCompare(b.id));
  }

  active(): Pattern[] {
    return this.list().filter((p) => p.active);
  }

  /** Soft-deactivate: the pattern stays registered for historical attribution */
  deactivate(id: string): boolean {
    const pattern = this.patterns.get(id);
    if (!pattern) return false;
    this.patterns.set(id, { ...pattern, active: false });
    log.info({ patternId: id }, "Pattern deactivated");
    return true;
  }
}

export function createRegexPattern(def: CustomPatternConfig): Pattern {
  let expression: RegExp;
  try {
    expression = new RegExp(def.expression, def.flags);
  } catch (err) {
    throw new ConfigError(`Invalid expression for pattern ${def.id}`, {
      patternId: def.id,
      expression: def.expression,
      reason: err instanceof Error ? err.message : String(err),
    });
  }

  return {
    id: def.id,
    name: def.name,
    description: def.description,
    kind: "regex",
    category: def.category,
    severity: def.severity,
    baseWeight: def.baseWeight,
    active: def.active,
    evaluate({ file }) {
      const matches: PatternMatch[] = [];
      for (const { line, content } of getAddedLines(file)) {
        if (expression.test(content)) {
          matches.push({ line, message: def.message });
        }
      }
      return matches;
    },
  };
}

export function buildPatternRegistry(config: EngineConfig): PatternRegistry {
  const registry = new PatternRegistry();
  const all = [...BUILTIN_PATTERNS, ...config.customPatterns.map(createRegexPattern)];

  for (const pattern of all) {
    registry.register(applyOverride(pattern, config.patterns[pattern.id]));
  }

  for (const id of Object.keys(config.patterns)) {
    if (!registry.get(id)) log.warn({ patternId: id }, "Override for unknown pattern ignored");
  }

  log.info(
    { total: registry.list().length, active: registry.active().length },
    "Pattern registry built"
  );
  return registry;
}

function applyOverride(pattern: Pattern, override: PatternOverride | undefined): Pattern {
  if (!override) return pattern;
  return {
    ...pattern,
    active: override.active ?? pattern.active,
    baseWeight: override.baseWeight ?? pattern.baseWeight,
    severity: override.severity ?? pattern.severity,
  };
}
