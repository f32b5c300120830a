import { describe, it, expect } from "vitest";
import { parsePatch } from "../../src/utils/diff-parser.js";
import { chunkDiff } from "../../src/retrieval/chunker.js";
import { ContextRetriever, rankHits } from "../../src/retrieval/retriever.js";
import { embedText } from "../../src/retrieval/embedding.js";
import type { IndexHit } from "../../src/retrieval/types.js";
import { RetrievalUnavailable } from "../../src/errors.js";
import { MULTI_HUNK_PATCH, CREDENTIAL_DIFF } from "../fixtures/sample-patch.js";
import { FakeIndex, hangingSearch, unavailableSearch } from "../fixtures/fake-index.js";

function hit(path: string, startLine: number, score: number): IndexHit {
  return { path, startLine, endLine: startLine + 5, text: `${path}:${startLine}`, score, origin: "code" };
}

describe("chunkDiff", () => {
  it("aligns chunks to declarations and drops unchanged ones", () => {
    const file = parsePatch("utils.ts", MULTI_HUNK_PATCH, "modified");

    expect(chunkDiff([file], 40)).toEqual([
      {
        path: "utils.ts",
        startLine: 10,
        endLine: 13,
        text: "function processData(input: string) {\n  return input.trim().toLowerCase();\n}\n",
      },
      { path: "utils.ts", startLine: 25, endLine: 27, text: "  return true;\n}\n" },
      {
        path: "utils.ts",
        startLine: 28,
        endLine: 31,
        text: 'function newHelper() {\n  console.log("debug");\n  return 42;\n}',
      },
    ]);
  });

  it("splits long runs at the line limit", () => {
    const lines = Array.from({ length: 10 }, (_, i) => `+const v${i} = ${i};`);
    const file = parsePatch("long.ts", `@@ -0,0 +1,10 @@\n${lines.join("\n")}`, "added");

    expect(chunkDiff([file], 4).map((c) => [c.startLine, c.endLine])).toEqual([
      [1, 4],
      [5, 8],
      [9, 10],
    ]);
  });

  it("produces nothing for deletion-only hunks", () => {
    const file = parsePatch("gone.ts", "@@ -1,2 +0,0 @@\n-a\n-b", "removed");

    expect(chunkDiff([file], 40)).toEqual([]);
  });
});

describe("rankHits", () => {
  it("clamps, dedupes, orders and truncates", () => {
    const ranked = rankHits(
      [hit("b.ts", 1, 0.4), hit("a.ts", 1, 1.3), hit("b.ts", 1, 0.7), hit("c.ts", 1, -0.2), hit("d.ts", 1, Number.NaN)],
      3
    );

    expect(ranked.map((c) => [c.path, c.relevance])).toEqual([
      ["a.ts", 1],
      ["b.ts", 0.7],
      ["c.ts", 0],
    ]);
  });

  it("breaks ties by path then line", () => {
    const ranked = rankHits([hit("b.ts", 1, 0.5), hit("a.ts", 9, 0.5), hit("a.ts", 2, 0.5)], 10);

    expect(ranked.map((c) => `${c.path}:${c.startLine}`)).toEqual(["a.ts:2", "a.ts:9", "b.ts:1"]);
  });
});

describe("ContextRetriever", () => {
  const opts = { timeoutMs: 30, maxChunkLines: 40 };

  it("returns nothing without an index", async () => {
    const retriever = new ContextRetriever(null, opts);

    expect(retriever.enabled).toBe(false);
    await expect(retriever.retrieve(CREDENTIAL_DIFF, ["src/config.ts"], "repo", 5)).resolves.toEqual([]);
  });

  it("queries the index with diff chunks and ranks hits", async () => {
    const index = new FakeIndex(async () => ({ status: "ok", hits: [hit("a.ts", 1, 0.2), hit("b.ts", 3, 0.8)] }));
    const retriever = new ContextRetriever(index, opts);

    const chunks = await retriever.retrieve(CREDENTIAL_DIFF, ["src/config.ts"], "repo", 1);

    expect(chunks.map((c) => c.path)).toEqual(["b.ts"]);
    expect(index.calls[0]).toEqual([
      { path: "src/config.ts", startLine: 1, endLine: 3, text: 'export const config = {\n  password: "test-secret",\n};' },
    ]);
  });

  it("skips the index when the diff adds nothing", async () => {
    const index = new FakeIndex(async () => ({ status: "ok", hits: [] }));
    const retriever = new ContextRetriever(index, opts);

    await expect(retriever.retrieve("@@ -1 +0,0 @@\n-x", ["a.ts"], "repo", 5)).resolves.toEqual([]);
    expect(index.calls).toHaveLength(0);
  });

  it("reports an unavailable index", async () => {
    const retriever = new ContextRetriever(new FakeIndex(unavailableSearch), opts);

    await expect(retriever.retrieve(CREDENTIAL_DIFF, ["a.ts"], "repo", 5)).rejects.toThrow(
      "Similarity index unavailable: connection refused"
    );
  });

  it("times out a slow index", async () => {
    const retriever = new ContextRetriever(new FakeIndex(hangingSearch), opts);

    await expect(retriever.retrieve(CREDENTIAL_DIFF, ["a.ts"], "repo", 5)).rejects.toBeInstanceOf(RetrievalUnavailable);
  });

  it("wraps an index that throws", async () => {
    const retriever = new ContextRetriever(
      new FakeIndex(async () => {
        throw new Error("socket closed");
      }),
      opts
    );

    await expect(retriever.retrieve(CREDENTIAL_DIFF, ["a.ts"], "repo", 5)).rejects.toBeInstanceOf(RetrievalUnavailable);
  });

  it("propagates cancellation", async () => {
    const controller = new AbortController();
    const retriever = new ContextRetriever(new FakeIndex(hangingSearch), { ...opts, timeoutMs: 5_000 });
    const pending = retriever.retrieve(CREDENTIAL_DIFF, ["a.ts"], "repo", 5, controller.signal);
    controller.abort(new Error("cancelled by caller"));

    await expect(pending).rejects.toThrow("cancelled by caller");
  });
});

describe("embedText", () => {
  const dot = (a: number[], b: number[]) => a.reduce((sum, v, i) => sum + v * b[i], 0);

  it("is deterministic and unit length", () => {
    const a = embedText("const token = readSecret();");
    const b = embedText("const token = readSecret();");

    expect(a).toEqual(b);
    expect(Math.sqrt(dot(a, a))).toBeCloseTo(1);
  });

  it("places related text closer than unrelated text", () => {
    const base = embedText("function parseConfig(path) { return load(path); }");
    const near = embedText("function parseConfig(file) { return load(file); }");
    const far = embedText("SELECT name FROM accounts");

    expect(dot(base, near)).toBeGreaterThan(dot(base, far));
  });

  it("embeds text shorter than a trigram as the zero vector", () => {
    expect(embedText("ab").every((v) => v === 0)).toBe(true);
  });
});
