import { afterEach, describe, expect, it, vi } from "vitest";
import { createRetrievalEngine, rankChunks } from "@/lib/retrieval";
import type { ChunkStore } from "@/lib/stores/chunk-store";
import { InvalidRequestError, RateLimitedError } from "@/lib/errors";
import type { ScoredChunk } from "@/types/engine";
import { MemoryChunkStore } from "./support/memory-stores";
import { keywordEmbedder, seedChunk, testConfig } from "./support/fakes";

// query "photosynthesis light" against three matching vocabulary words
const PARTIAL_MATCH = 2 / (Math.sqrt(2) * Math.sqrt(3));

function seededStore() {
  const store = new MemoryChunkStore();
  store.seedClass([
    seedChunk({ chunkId: "c1-0", classId: "c1", ordinal: 0, text: "Photosynthesis uses light and chlorophyll." }),
    seedChunk({ chunkId: "c1-1", classId: "c1", ordinal: 1, text: "Mitochondria release energy in the cell." }),
  ]);
  store.seedClass([
    seedChunk({
      chunkId: "c2-0",
      classId: "c2",
      ordinal: 0,
      text: "Light gives photosynthesis its energy.",
      classHeldAt: "2024-04-01T09:00:00.000Z",
    }),
  ]);
  store.seedClass([
    seedChunk({ chunkId: "c3-0", classId: "c3", ordinal: 0, subjectId: "physics", text: "Gravity holds an orbit." }),
  ]);
  store.seedClass([
    seedChunk({
      chunkId: "c4-0",
      classId: "c4",
      ordinal: 0,
      text: "Photosynthesis needs light.",
      embedded: false,
      embedding: null,
    }),
  ]);
  return store;
}

const biology = (...classIds: string[]) => ({ subjectId: "biology", allowedClassIds: new Set(classIds) });

describe("rankChunks", () => {
  const scored = (classId: string, ordinal: number, score: number, classHeldAt = "2024-03-01T09:00:00.000Z") => ({
    chunk: { ...seedChunk({ chunkId: `${classId}-${ordinal}`, classId, ordinal, text: "x", classHeldAt }), indexVersion: "v1" },
    score,
  });

  it("breaks score ties by recency, then class id, then ordinal", () => {
    const ranked = rankChunks([
      scored("a", 1, 0.5),
      scored("a", 0, 0.5),
      scored("b", 0, 0.5),
      scored("old", 0, 0.5, "2023-01-01T00:00:00.000Z"),
      scored("z", 0, 0.9, "2020-01-01T00:00:00.000Z"),
    ]);
    expect(ranked.map((entry) => entry.chunk.chunkId)).toEqual(["z-0", "b-0", "a-0", "a-1", "old-0"]);
  });
});

describe("createRetrievalEngine", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns confident chunks in rank order, newest class first on ties", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });

    const result = await engine.retrieve("photosynthesis light", biology("c1", "c2"));

    expect(result.reason).toBe("grounded");
    expect(result.grounded).toBe(true);
    expect(result.chunks.map((entry) => entry.chunk.chunkId)).toEqual(["c2-0", "c1-0"]);
    expect(result.topScore).toBeCloseTo(0.8165, 4);
  });

  it("honours k", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });
    const result = await engine.retrieve("photosynthesis light", biology("c1", "c2"), 1);
    expect(result.chunks.map((entry) => entry.chunk.chunkId)).toEqual(["c2-0"]);
  });

  it("only searches the classes in scope", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });
    const result = await engine.retrieve("photosynthesis light", biology("c1"));
    expect(result.chunks.map((entry) => entry.chunk.chunkId)).toEqual(["c1-0"]);
  });

  it("keeps a chunk scoring exactly at the confidence floor", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({
      chunks: seededStore(),
      embedder: backend,
      config: testConfig({ retrieval: { minSimilarity: PARTIAL_MATCH } }),
    });
    const result = await engine.retrieve("photosynthesis light", biology("c1"));
    expect(result.reason).toBe("grounded");
    expect(result.chunks).toHaveLength(1);
  });

  it("reports below_confidence when nothing clears the floor", async () => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });

    const result = await engine.retrieve("volcano", biology("c1", "c2"));

    expect(result).toEqual({ grounded: false, chunks: [], topScore: 0, reason: "below_confidence" });
  });

  it("short-circuits an empty entitlement scope without embedding", async () => {
    const { backend, calls } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });

    const result = await engine.retrieve("photosynthesis", biology());

    expect(result).toEqual({ grounded: false, chunks: [], topScore: null, reason: "no_entitled_content" });
    expect(calls).toEqual([]);
  });

  it("reports no_content for classes of another subject or without embeddings", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });

    expect((await engine.retrieve("gravity orbit", biology("c3"))).reason).toBe("no_content");
    expect((await engine.retrieve("photosynthesis light", biology("c4"))).reason).toBe("no_content");
  });

  it("drops anything a store returns outside the scope", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const inner = seededStore();
    const leaky: ChunkStore = {
      insertChunks: inner.insertChunks.bind(inner),
      getActiveVersion: inner.getActiveVersion.bind(inner),
      activateVersion: inner.activateVersion.bind(inner),
      deleteVersion: inner.deleteVersion.bind(inner),
      deleteClass: inner.deleteClass.bind(inner),
      listActiveChunks: inner.listActiveChunks.bind(inner),
      async matchChunks(query) {
        return inner.matchChunks({ ...query, classIds: ["c1", "c2"] });
      },
    };
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: leaky, embedder: backend, config: testConfig() });

    const result = await engine.retrieve("photosynthesis light", biology("c1"));

    expect(result.chunks.map((entry: ScoredChunk) => entry.chunk.classId)).toEqual(["c1"]);
    expect(warn).toHaveBeenCalledWith("[retrieval] store returned chunks outside the requested scope", {
      subjectId: "biology",
      dropped: 1,
    });
  });

  it("rejects empty queries and bad k", async () => {
    const { backend } = keywordEmbedder();
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });
    await expect(engine.retrieve("   ", biology("c1"))).rejects.toBeInstanceOf(InvalidRequestError);
    await expect(engine.retrieve("light", biology("c1"), 0)).rejects.toBeInstanceOf(InvalidRequestError);
  });

  it("surfaces a rate limit once the attempts run out", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const { backend, calls } = keywordEmbedder(() => ({ status: 429, message: "slow down" }));
    const engine = createRetrievalEngine({ chunks: seededStore(), embedder: backend, config: testConfig() });

    await expect(engine.retrieve("photosynthesis", biology("c1"))).rejects.toBeInstanceOf(RateLimitedError);
    expect(calls).toHaveLength(3);
  });
});
