import type { EmbeddingBackend } from "@/lib/embeddings";
import type { TextGenerator } from "@/lib/generation";
import type { EntitlementProvider } from "@/lib/entitlements";
import type { StoredChunk } from "@/types/engine";
import { resolveEngineConfig, type EngineConfig, type EngineConfigOverrides } from "@/lib/config";

export const VOCABULARY = [
  "photosynthesis",
  "chlorophyll",
  "light",
  "energy",
  "mitochondria",
  "cell",
  "gravity",
  "orbit",
  "volcano",
] as const;

/** Engine config with no backoff waits and small chunks. */
export const TEST_CONFIG: EngineConfig = resolveEngineConfig({
  chunking: { targetChars: 120, overlapChars: 0 },
  backend: { timeoutMs: 1_000, maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0 },
});

export function testConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  return resolveEngineConfig(overrides, TEST_CONFIG);
}

export function embedText(text: string): number[] {
  const tokens = text.toLowerCase().match(/[a-z]+/g) ?? [];
  return VOCABULARY.map((word) => tokens.filter((token) => token === word).length);
}

/**
 * Bag-of-words embedder over VOCABULARY. `failWith` may return an error to
 * throw for a given text and call number (1-based, per text).
 */
export function keywordEmbedder(failWith?: (text: string, call: number) => unknown) {
  const calls: string[] = [];
  const perText = new Map<string, number>();
  const backend: EmbeddingBackend = {
    async embed(text) {
      calls.push(text);
      const call = (perText.get(text) ?? 0) + 1;
      perText.set(text, call);
      const failure = failWith?.(text, call);
      if (failure) throw failure;
      return embedText(text);
    },
  };
  return { backend, calls };
}

export type GeneratorCall = { prompt: string; context: readonly string[] };
export type ScriptedReply = string | Error | ((call: GeneratorCall) => string);

/** Replies in order; the last reply repeats once the script runs out. */
export function scriptedGenerator(replies: ScriptedReply[]) {
  const calls: GeneratorCall[] = [];
  const generator: TextGenerator = {
    async generate(prompt, context) {
      const call = { prompt, context: [...context] };
      calls.push(call);
      const reply = replies[Math.min(calls.length, replies.length) - 1];
      if (reply === undefined) throw new Error("scripted generator has no replies");
      if (reply instanceof Error) throw reply;
      return typeof reply === "function" ? reply(call) : reply;
    },
  };
  return { generator, calls };
}

/** Grants by "studentId:subjectId" → class ids. */
export function staticEntitlements(grants: Record<string, string[]>): EntitlementProvider {
  return {
    async entitledClassIds(studentId, subjectId) {
      return new Set(grants[`${studentId}:${subjectId}`] ?? []);
    },
  };
}

export function seedChunk(
  fields: Pick<StoredChunk, "chunkId" | "classId" | "text" | "ordinal"> & Partial<StoredChunk>
): Omit<StoredChunk, "indexVersion"> {
  const embedding = fields.embedding === undefined ? embedText(fields.text) : fields.embedding;
  return {
    chunkId: fields.chunkId,
    classId: fields.classId,
    subjectId: fields.subjectId ?? "biology",
    text: fields.text,
    ordinal: fields.ordinal,
    embedded: fields.embedded ?? embedding !== null,
    embedding,
    classHeldAt: fields.classHeldAt ?? "2024-03-01T09:00:00.000Z",
  };
}
