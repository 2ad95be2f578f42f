import { createHash, randomUUID } from "node:crypto";
import type { EngineConfig } from "./config";
import type { EmbeddingBackend } from "./embeddings";
import type { LockProvider } from "./db-lock";
import type { ChunkStore } from "./stores/chunk-store";
import type { StoredChunk, TranscriptChunk } from "@/types/engine";
import { chunkTranscript } from "./chunking";
import {
  IndexingFailedError,
  IndexingInProgressError,
  InvalidRequestError,
  InvalidTranscriptError,
  LockBusyError,
  isTransientBackendError,
} from "./errors";
import { toBackendError } from "./backend-errors";
import { backoffDelay, delay, withTimeout } from "./retry";
import { safeErrorForLog } from "./log-format";

export const INDEX_LOCK_SCOPE = "class-index";

export type IndexOptions = {
  /** When the class took place; defaults to the active index's value, then the indexing time. */
  classHeldAt?: string;
};

export type IndexStatus = "complete" | "partial";

export type IndexResult = {
  classId: string;
  indexVersion: string;
  chunks: TranscriptChunk[];
  embeddedCount: number;
  unembeddedOrdinals: number[];
  status: IndexStatus;
};

export type IndexStats = {
  classId: string;
  indexVersion: string | null;
  totalChunks: number;
  embeddedChunks: number;
  unembeddedChunks: number;
  coveragePct: number;
  isReady: boolean;
};

export type TranscriptIndexer = {
  index(classId: string, subjectId: string, transcriptText: string, options?: IndexOptions): Promise<IndexResult>;
  indexStats(classId: string): Promise<IndexStats>;
  removeClass(classId: string): Promise<{ classId: string; removedChunks: number }>;
};

type TranscriptIndexerDeps = {
  chunks: ChunkStore;
  embedder: EmbeddingBackend;
  locks: LockProvider;
  config: EngineConfig;
  now?: () => Date;
  newIndexVersion?: () => string;
};

/** Stable id: identical (class, ordinal, text) always maps to the same chunk id. */
export function chunkIdFor(classId: string, ordinal: number, text: string): string {
  return createHash("sha256").update(`${classId}\u0000${ordinal}\u0000${text}`).digest("hex").slice(0, 32);
}

type PendingChunk = { ordinal: number; text: string };

function toTranscriptChunk(chunk: StoredChunk): TranscriptChunk {
  return {
    chunkId: chunk.chunkId,
    classId: chunk.classId,
    subjectId: chunk.subjectId,
    text: chunk.text,
    ordinal: chunk.ordinal,
    embedded: chunk.embedded,
    indexVersion: chunk.indexVersion,
    classHeldAt: chunk.classHeldAt,
  };
}

export function createTranscriptIndexer(deps: TranscriptIndexerDeps): TranscriptIndexer {
  const { chunks: store, embedder, locks, config } = deps;
  const now = deps.now ?? (() => new Date());
  const newIndexVersion = deps.newIndexVersion ?? randomUUID;

  async function embedOne(text: string): Promise<number[]> {
    try {
      return await withTimeout(() => embedder.embed(text), config.backend.timeoutMs, "embed chunk");
    } catch (error) {
      throw toBackendError(error, "embed chunk");
    }
  }

  /**
   * Embed every chunk in batches of `embedConcurrency`. Chunks that fail with a
   * transient error are retried as a subset on the next round.
   */
  async function embedAll(classId: string, pieces: PendingChunk[]) {
    const vectors = new Map<number, number[]>();
    let pending = pieces;
    let lastError: unknown = null;

    for (let round = 1; round <= config.backend.maxAttempts && pending.length; round++) {
      const retryable: PendingChunk[] = [];
      for (let start = 0; start < pending.length; start += config.indexing.embedConcurrency) {
        const batch = pending.slice(start, start + config.indexing.embedConcurrency);
        const settled = await Promise.allSettled(batch.map((piece) => embedOne(piece.text)));
        for (const [idx, outcome] of settled.entries()) {
          const piece = batch[idx];
          if (outcome.status === "fulfilled") {
            vectors.set(piece.ordinal, outcome.value);
            continue;
          }
          lastError = outcome.reason;
          if (isTransientBackendError(outcome.reason)) {
            retryable.push(piece);
          } else {
            console.warn("[indexer] chunk embedding failed permanently", {
              classId,
              ordinal: piece.ordinal,
              error: safeErrorForLog(outcome.reason),
            });
          }
        }
      }
      pending = retryable;
      if (pending.length && round < config.backend.maxAttempts) {
        const wait = backoffDelay(round, config.backend.baseDelayMs, config.backend.maxDelayMs);
        console.warn("[indexer] retrying failed chunk embeddings", {
          classId,
          round,
          pending: pending.length,
          waitMs: wait,
        });
        if (wait > 0) await delay(wait);
      }
    }

    return { vectors, lastError };
  }

  async function stageAndActivate(
    classId: string,
    subjectId: string,
    indexVersion: string,
    staged: StoredChunk[]
  ) {
    const previous = await store.getActiveVersion(classId);
    try {
      await store.insertChunks(staged);
      await store.activateVersion({ classId, subjectId, indexVersion });
    } catch (error) {
      await store.deleteVersion(classId, indexVersion).catch((cleanupError: unknown) => {
        console.error("[indexer] failed to discard staged chunks", {
          classId,
          indexVersion,
          error: safeErrorForLog(cleanupError),
        });
      });
      throw error;
    }
    if (previous && previous !== indexVersion) {
      try {
        await store.deleteVersion(classId, previous);
      } catch (error) {
        // superseded rows are no longer read; the next re-index or removeClass clears them
        console.warn("[indexer] failed to discard superseded index version", {
          classId,
          previous,
          error: safeErrorForLog(error),
        });
      }
    }
  }

  // a re-index keeps the class's place in recency order unless told otherwise
  async function activeClassHeldAt(classId: string): Promise<string | null> {
    const [first] = await store.listActiveChunks(classId);
    return first?.classHeldAt ?? null;
  }

  async function withClassLock<T>(classId: string, task: () => Promise<T>): Promise<T> {
    try {
      return await locks.withLock(INDEX_LOCK_SCOPE, classId, task);
    } catch (error) {
      if (error instanceof LockBusyError) throw new IndexingInProgressError(classId);
      throw error;
    }
  }

  return {
    async index(classId, subjectId, transcriptText, options = {}) {
      if (!classId.trim() || !subjectId.trim()) {
        throw new InvalidRequestError("classId and subjectId are required");
      }
      if (!transcriptText || !transcriptText.trim()) {
        throw new InvalidTranscriptError(`Transcript for class ${classId} is empty`);
      }
      const pieces = chunkTranscript(transcriptText, config.chunking);
      if (!pieces.length) {
        throw new InvalidTranscriptError(`Transcript for class ${classId} has no indexable sentences`);
      }

      return withClassLock(classId, async () => {
        const startedAt = Date.now();
        const indexVersion = newIndexVersion();
        const classHeldAt = options.classHeldAt ?? (await activeClassHeldAt(classId)) ?? now().toISOString();

        const { vectors, lastError } = await embedAll(classId, pieces);
        if (vectors.size === 0) {
          console.error("[indexer] no chunk could be embedded", {
            classId,
            chunks: pieces.length,
            error: safeErrorForLog(lastError),
          });
          throw new IndexingFailedError(
            classId,
            `${pieces.length} chunk(s) failed to embed`,
            lastError ?? undefined
          );
        }

        const staged: StoredChunk[] = pieces.map((piece) => {
          const embedding = vectors.get(piece.ordinal) ?? null;
          return {
            chunkId: chunkIdFor(classId, piece.ordinal, piece.text),
            classId,
            subjectId,
            text: piece.text,
            ordinal: piece.ordinal,
            embedded: embedding !== null,
            embedding,
            indexVersion,
            classHeldAt,
          };
        });

        await stageAndActivate(classId, subjectId, indexVersion, staged);

        const unembeddedOrdinals = staged.filter((chunk) => !chunk.embedded).map((chunk) => chunk.ordinal);
        const status: IndexStatus = unembeddedOrdinals.length ? "partial" : "complete";
        if (status === "partial") {
          console.warn("[indexer] IndexingPartialFailure", {
            classId,
            indexVersion,
            unembeddedOrdinals,
            error: safeErrorForLog(lastError),
          });
        }
        console.info("[indexer] class indexed", {
          classId,
          indexVersion,
          chunks: staged.length,
          embedded: vectors.size,
          status,
          durationMs: Date.now() - startedAt,
        });

        return {
          classId,
          indexVersion,
          chunks: staged.map(toTranscriptChunk),
          embeddedCount: vectors.size,
          unembeddedOrdinals,
          status,
        };
      });
    },

    async indexStats(classId) {
      const [indexVersion, active] = await Promise.all([
        store.getActiveVersion(classId),
        store.listActiveChunks(classId),
      ]);
      const totalChunks = active.length;
      const embeddedChunks = active.filter((chunk) => chunk.embedded).length;
      const coveragePct = totalChunks ? Math.round((embeddedChunks / totalChunks) * 1000) / 10 : 0;
      return {
        classId,
        indexVersion,
        totalChunks,
        embeddedChunks,
        unembeddedChunks: totalChunks - embeddedChunks,
        coveragePct,
        isReady: embeddedChunks > 0,
      };
    },

    async removeClass(classId) {
      return withClassLock(classId, async () => {
        const removedChunks = await store.deleteClass(classId);
        console.info("[indexer] class removed", { classId, removedChunks });
        return { classId, removedChunks };
      });
    },
  };
}
