import type { EngineConfig } from "./config";
import type { EmbeddingBackend } from "./embeddings";
import type { ChunkStore } from "./stores/chunk-store";
import type { ScoredChunk } from "@/types/engine";
import { InvalidRequestError } from "./errors";
import { callBackend } from "./retry";
import { previewForLog } from "./log-format";

export type RetrievalScope = {
  subjectId: string;
  allowedClassIds: ReadonlySet<string>;
};

export type RetrievalReason = "grounded" | "below_confidence" | "no_entitled_content" | "no_content";

export type RetrievalResult = {
  /** true when at least one chunk cleared the confidence floor */
  grounded: boolean;
  chunks: ScoredChunk[];
  /** best similarity seen in scope, even when it fell below the floor */
  topScore: number | null;
  reason: RetrievalReason;
};

export type RetrievalEngine = {
  retrieve(queryText: string, scope: RetrievalScope, k?: number): Promise<RetrievalResult>;
};

type RetrievalEngineDeps = {
  chunks: ChunkStore;
  embedder: EmbeddingBackend;
  config: EngineConfig;
};

function heldAtMs(value: string): number {
  const ms = Date.parse(value);
  return Number.isFinite(ms) ? ms : 0;
}

/**
 * Score descending; ties go to the more recent class (held-at, then class id,
 * both descending), then to the earlier chunk within a class.
 */
export function rankChunks(chunks: readonly ScoredChunk[]): ScoredChunk[] {
  return [...chunks].sort((a, b) => {
    if (b.score !== a.score) return b.score - a.score;
    const held = heldAtMs(b.chunk.classHeldAt) - heldAtMs(a.chunk.classHeldAt);
    if (held !== 0) return held;
    if (a.chunk.classId !== b.chunk.classId) return a.chunk.classId < b.chunk.classId ? 1 : -1;
    return a.chunk.ordinal - b.chunk.ordinal;
  });
}

export function createRetrievalEngine(deps: RetrievalEngineDeps): RetrievalEngine {
  const { chunks: store, embedder, config } = deps;

  return {
    async retrieve(queryText, scope, k = config.retrieval.k) {
      const query = queryText.trim();
      if (!query) throw new InvalidRequestError("Query text is empty");
      if (!Number.isInteger(k) || k < 1) throw new InvalidRequestError(`k must be a positive integer, got ${k}`);

      if (scope.allowedClassIds.size === 0) {
        return { grounded: false, chunks: [], topScore: null, reason: "no_entitled_content" };
      }

      const embedding = await callBackend(() => embedder.embed(query), config.backend, "embed query");
      const matches = await store.matchChunks({
        embedding,
        subjectId: scope.subjectId,
        classIds: [...scope.allowedClassIds],
        limit: k,
      });

      // the store is asked for the scope already; anything outside it is dropped here too
      const inScope = matches.filter(
        ({ chunk }) =>
          chunk.embedded && chunk.subjectId === scope.subjectId && scope.allowedClassIds.has(chunk.classId)
      );
      if (inScope.length < matches.length) {
        console.warn("[retrieval] store returned chunks outside the requested scope", {
          subjectId: scope.subjectId,
          dropped: matches.length - inScope.length,
        });
      }

      const ranked = rankChunks(inScope);
      const topScore = ranked[0]?.score ?? null;
      if (topScore === null) {
        return { grounded: false, chunks: [], topScore, reason: "no_content" };
      }

      const confident = ranked.filter((match) => match.score >= config.retrieval.minSimilarity).slice(0, k);
      if (!confident.length) {
        console.info("[retrieval] RetrievalBelowConfidence", {
          subjectId: scope.subjectId,
          topScore,
          minSimilarity: config.retrieval.minSimilarity,
          query: previewForLog(query, 80),
        });
        return { grounded: false, chunks: [], topScore, reason: "below_confidence" };
      }

      return { grounded: true, chunks: confident, topScore, reason: "grounded" };
    },
  };
}
