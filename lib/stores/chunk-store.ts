import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { ScoredChunk, StoredChunk, TranscriptChunk } from "@/types/engine";
import { parseRow, parseRows, storeFailure, toVectorLiteral } from "./shared";

export type ChunkMatchQuery = {
  embedding: number[];
  subjectId: string;
  classIds: string[];
  limit: number;
};

export type ClassIndexHead = {
  classId: string;
  subjectId: string;
  indexVersion: string;
};

export interface ChunkStore {
  insertChunks(chunks: StoredChunk[]): Promise<void>;
  getActiveVersion(classId: string): Promise<string | null>;
  /** Point the class at `indexVersion`; readers switch over in one step. */
  activateVersion(head: ClassIndexHead): Promise<void>;
  deleteVersion(classId: string, indexVersion: string): Promise<void>;
  /** Drop the head and every chunk of the class. Returns the number of chunks removed. */
  deleteClass(classId: string): Promise<number>;
  listActiveChunks(classId: string): Promise<TranscriptChunk[]>;
  /**
   * Nearest active, embedded chunks for the given classes, best first. Scores are
   * cosine similarity in [-1, 1].
   */
  matchChunks(query: ChunkMatchQuery): Promise<ScoredChunk[]>;
}

const CHUNK_COLUMNS = "chunk_id, class_id, subject_id, index_version, ordinal, text, embedded, class_held_at";

const ChunkRowSchema = z.object({
  chunk_id: z.string(),
  class_id: z.string(),
  subject_id: z.string(),
  index_version: z.string(),
  ordinal: z.number().int(),
  text: z.string(),
  embedded: z.boolean(),
  class_held_at: z.string(),
});

const MatchRowSchema = ChunkRowSchema.extend({
  similarity: z.number(),
});

const HeadRowSchema = z.object({ index_version: z.string() });

function toChunk(row: z.infer<typeof ChunkRowSchema>): TranscriptChunk {
  return {
    chunkId: row.chunk_id,
    classId: row.class_id,
    subjectId: row.subject_id,
    indexVersion: row.index_version,
    ordinal: row.ordinal,
    text: row.text,
    embedded: row.embedded,
    classHeldAt: row.class_held_at,
  };
}

export function createSupabaseChunkStore(sb: SupabaseClient): ChunkStore {
  return {
    async insertChunks(chunks) {
      if (!chunks.length) return;
      const rows = chunks.map((chunk) => ({
        chunk_id: chunk.chunkId,
        class_id: chunk.classId,
        subject_id: chunk.subjectId,
        index_version: chunk.indexVersion,
        ordinal: chunk.ordinal,
        text: chunk.text,
        embedded: chunk.embedded,
        embedding: chunk.embedding ? toVectorLiteral(chunk.embedding) : null,
        class_held_at: chunk.classHeldAt,
      }));
      const { error } = await sb.from("transcript_chunks").insert(rows);
      if (error) throw storeFailure("insertChunks", error);
    },

    async getActiveVersion(classId) {
      const { data, error } = await sb
        .from("class_index_heads")
        .select("index_version")
        .eq("class_id", classId)
        .maybeSingle();
      if (error) throw storeFailure("getActiveVersion", error);
      return parseRow(HeadRowSchema, data, "getActiveVersion")?.index_version ?? null;
    },

    async activateVersion(head) {
      const { error } = await sb.from("class_index_heads").upsert(
        {
          class_id: head.classId,
          subject_id: head.subjectId,
          index_version: head.indexVersion,
          updated_at: new Date().toISOString(),
        },
        { onConflict: "class_id" }
      );
      if (error) throw storeFailure("activateVersion", error);
    },

    async deleteVersion(classId, indexVersion) {
      const { error } = await sb
        .from("transcript_chunks")
        .delete()
        .eq("class_id", classId)
        .eq("index_version", indexVersion);
      if (error) throw storeFailure("deleteVersion", error);
    },

    async deleteClass(classId) {
      const head = await sb.from("class_index_heads").delete().eq("class_id", classId);
      if (head.error) throw storeFailure("deleteClass", head.error);
      const { error, count } = await sb
        .from("transcript_chunks")
        .delete({ count: "exact" })
        .eq("class_id", classId);
      if (error) throw storeFailure("deleteClass", error);
      return count ?? 0;
    },

    async listActiveChunks(classId) {
      const version = await this.getActiveVersion(classId);
      if (!version) return [];
      const { data, error } = await sb
        .from("transcript_chunks")
        .select(CHUNK_COLUMNS)
        .eq("class_id", classId)
        .eq("index_version", version)
        .order("ordinal", { ascending: true });
      if (error) throw storeFailure("listActiveChunks", error);
      return parseRows(ChunkRowSchema, data, "listActiveChunks").map(toChunk);
    },

    async matchChunks(query) {
      if (!query.classIds.length) return [];
      const { data, error } = await sb.rpc("match_transcript_chunks", {
        query_embedding: toVectorLiteral(query.embedding),
        p_subject_id: query.subjectId,
        p_class_ids: query.classIds,
        match_count: query.limit,
      });
      if (error) throw storeFailure("matchChunks", error);
      return parseRows(MatchRowSchema, data, "matchChunks").map((row) => ({
        chunk: toChunk(row),
        score: row.similarity,
      }));
    },
  };
}
