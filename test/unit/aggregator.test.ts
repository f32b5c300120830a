import { describe, it, expect } from "vitest";
import { aggregate, combineConfidence, messageSimilarity } from "../../src/review/aggregator.js";
import type { Finding } from "../../src/review/types.js";

function ruleFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: "rule_a",
    origin: "rule",
    category: "security",
    severity: "critical",
    location: { path: "src/a.ts", line: 10 },
    message: "Hardcoded API key in source",
    confidence: 0.9,
    patternId: "hardcoded-credential",
    ...overrides,
  };
}

function modelFinding(overrides: Partial<Finding> = {}): Finding {
  return {
    id: "model_a",
    origin: "model",
    category: "security",
    severity: "high",
    location: { path: "src/a.ts", line: 11 },
    message: "API key hardcoded in source file",
    confidence: 0.8,
    modelId: "fake-model",
    ...overrides,
  };
}

function sequentialIds() {
  let n = 0;
  return () => `s${++n}`;
}

const opts = { maxConfidence: 0.95, similarityThreshold: 0.2, lineTolerance: 2 };

describe("aggregate", () => {
  it("merges corroborating rule and model findings", () => {
    const [suggestion, ...rest] = aggregate([modelFinding(), ruleFinding()], { ...opts, maxConfidence: 1, newId: sequentialIds() });

    expect(rest).toEqual([]);
    expect(suggestion).toMatchObject({
      id: "s1",
      category: "security",
      severity: "critical",
      location: { path: "src/a.ts", line: 10 },
      message: "Hardcoded API key in source",
      findingIds: ["rule_a", "model_a"],
      patternIds: ["hardcoded-credential"],
      modelIds: ["fake-model"],
    });
    expect(suggestion.confidence).toBeCloseTo(0.98);
    expect(suggestion.contributions).toEqual([
      { findingId: "rule_a", origin: "rule", confidence: 0.9, patternId: "hardcoded-credential" },
      { findingId: "model_a", origin: "model", confidence: 0.8, modelId: "fake-model" },
    ]);
  });

  it("caps combined confidence", () => {
    const [merged] = aggregate([ruleFinding(), modelFinding()], opts);
    const [single] = aggregate([ruleFinding({ confidence: 0.99 })], opts);

    expect(merged.confidence).toBe(0.95);
    expect(single.confidence).toBe(0.95);
  });

  it("never scores a group below its strongest member", () => {
    const [suggestion] = aggregate([ruleFinding({ confidence: 0.3 }), modelFinding({ confidence: 0.6 })], opts);

    expect(suggestion.confidence).toBeGreaterThanOrEqual(0.6);
    expect(suggestion.message).toBe("API key hardcoded in source file");
  });

  it("keeps findings apart across categories, distance and wording", () => {
    expect(aggregate([ruleFinding(), modelFinding({ category: "bugs" })], opts)).toHaveLength(2);
    expect(aggregate([ruleFinding(), modelFinding({ location: { path: "src/a.ts", line: 13 } })], opts)).toHaveLength(2);
    expect(aggregate([ruleFinding(), modelFinding({ message: "Unused variable declared here" })], opts)).toHaveLength(2);
    expect(aggregate([ruleFinding(), modelFinding({ location: { path: "src/b.ts", line: 10 } })], opts)).toHaveLength(2);
  });

  it("never groups two findings from the same pattern", () => {
    const suggestions = aggregate(
      [ruleFinding(), ruleFinding({ id: "rule_b", location: { path: "src/a.ts", line: 11 } })],
      opts
    );

    expect(suggestions).toHaveLength(2);
  });

  it("orders by confidence, then severity, then location", () => {
    const suggestions = aggregate(
      [
        ruleFinding({ id: "r1", patternId: "p1", category: "style", severity: "low", confidence: 0.5, location: { path: "a.ts", line: 1 }, message: "one" }),
        ruleFinding({ id: "r2", patternId: "p2", category: "bugs", severity: "high", confidence: 0.5, location: { path: "b.ts", line: 1 }, message: "two" }),
        ruleFinding({ id: "r3", patternId: "p3", category: "bugs", severity: "low", confidence: 0.7, location: { path: "c.ts", line: 1 }, message: "three" }),
        ruleFinding({ id: "r4", patternId: "p4", category: "bugs", severity: "low", confidence: 0.5, location: { path: "a.ts", line: 9 }, message: "four" }),
      ],
      opts
    );

    expect(suggestions.map((s) => s.findingIds[0])).toEqual(["r3", "r2", "r1", "r4"]);
  });

  it("returns nothing for no findings", () => {
    expect(aggregate([], opts)).toEqual([]);
  });
});

describe("combineConfidence", () => {
  it("combines independent evidence", () => {
    expect(combineConfidence([0.5, 0.5], 1)).toBeCloseTo(0.75);
    expect(combineConfidence([], 1)).toBe(0);
  });

  it("ignores values outside [0, 1]", () => {
    expect(combineConfidence([Number.NaN, 0.4], 1)).toBeCloseTo(0.4);
    expect(combineConfidence([1.7], 0.95)).toBe(0.95);
  });
});

describe("messageSimilarity", () => {
  it("measures token overlap", () => {
    expect(messageSimilarity("alpha beta", "beta gamma")).toBeCloseTo(1 / 3);
    expect(messageSimilarity("Same words", "same WORDS")).toBe(1);
    expect(messageSimilarity("alpha", "gamma")).toBe(0);
  });
});
