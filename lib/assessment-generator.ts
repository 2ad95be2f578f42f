import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { EngineConfig } from "./config";
import type { TextGenerator } from "./generation";
import type { AssessmentItem, DifficultyTier, MasteryLevel, TranscriptChunk } from "@/types/engine";
import { DIFFICULTY_TIERS, MAX_ITEMS, MIN_ITEMS, apportionTiers, tierLevels, type TierCounts } from "./assessment-tiers";
import { buildAssessmentPrompt, sampleExcerpts, type LabeledExcerpt, type TierRequest } from "./assessment-prompts";
import { tryParseJson } from "./json-reply";
import { normalizeTopic } from "./weak-areas";
import { normalizeAnswer } from "./assessment-scoring";
import { callBackend } from "./retry";
import { AssessmentGenerationError, GenerationBackendFailure, InvalidRequestError, TutoringError } from "./errors";
import { previewForLog } from "./log-format";

const GeneratedItemSchema = z.object({
  tier: z.enum(["below", "at", "above"]),
  topic: z.string().trim().min(1).max(80),
  question: z.string().trim().min(8).max(600),
  answer: z.string().trim().min(1).max(200),
  explanation: z.string().trim().max(800).optional().nullable(),
  citations: z.array(z.string()).min(1),
});

const GeneratedReplySchema = z.object({
  items: z.array(z.unknown()),
});

type GeneratedItem = z.infer<typeof GeneratedItemSchema>;

type AcceptedItem = GeneratedItem & { sourceChunkIds: string[] };

export type GenerateOptions = {
  itemCount?: number;
};

export type AssessmentGenerator = {
  generate(
    classId: string,
    transcriptChunks: readonly TranscriptChunk[],
    studentLevel: MasteryLevel,
    options?: GenerateOptions
  ): Promise<AssessmentItem[]>;
};

type AssessmentGeneratorDeps = {
  generator: TextGenerator;
  config: EngineConfig;
  newItemId?: () => string;
};

const CITATION_PATTERN = /^\[?\s*c\s*(\d+)\s*\]?$/i;

/** Map "C3", "[C3]" or "c3" back to chunk ids; null when any citation is not a supplied excerpt. */
export function resolveCitations(citations: readonly string[], excerpts: readonly LabeledExcerpt[]): string[] | null {
  const byLabel = new Map(excerpts.map((excerpt) => [excerpt.label, excerpt.chunkId]));
  const resolved: string[] = [];
  for (const citation of citations) {
    const match = CITATION_PATTERN.exec(citation.trim());
    const chunkId = match ? byLabel.get(`C${Number(match[1])}`) : undefined;
    if (!chunkId) return null;
    if (!resolved.includes(chunkId)) resolved.push(chunkId);
  }
  return resolved.length ? resolved : null;
}

/** Parse a reply and keep the items that validate and cite supplied excerpts. */
export function parseGeneratedItems(reply: string, excerpts: readonly LabeledExcerpt[]): AcceptedItem[] {
  const parsed = GeneratedReplySchema.safeParse(tryParseJson(reply));
  if (!parsed.success) {
    console.warn("[assessment] reply is not an items object", { reply: previewForLog(reply) });
    return [];
  }
  const accepted: AcceptedItem[] = [];
  let rejected = 0;
  for (const raw of parsed.data.items) {
    const item = GeneratedItemSchema.safeParse(raw);
    if (!item.success) {
      rejected += 1;
      continue;
    }
    const sourceChunkIds = resolveCitations(item.data.citations, excerpts);
    if (!sourceChunkIds) {
      rejected += 1;
      continue;
    }
    accepted.push({ ...item.data, sourceChunkIds });
  }
  if (rejected) console.warn("[assessment] dropped invalid generated items", { rejected, accepted: accepted.length });
  return accepted;
}

function emptyBuckets(): Record<DifficultyTier, AcceptedItem[]> {
  return { below: [], at: [], above: [] };
}

function missingCounts(need: TierCounts, buckets: Record<DifficultyTier, AcceptedItem[]>): TierCounts {
  return {
    below: Math.max(0, need.below - buckets.below.length),
    at: Math.max(0, need.at - buckets.at.length),
    above: Math.max(0, need.above - buckets.above.length),
  };
}

const totalOf = (counts: TierCounts) => counts.below + counts.at + counts.above;

export function createAssessmentGenerator(deps: AssessmentGeneratorDeps): AssessmentGenerator {
  const { generator, config } = deps;
  const newItemId = deps.newItemId ?? randomUUID;

  async function requestItems(prompt: string, context: string[]): Promise<string> {
    try {
      return await callBackend(() => generator.generate(prompt, context), config.backend, "assessment generation");
    } catch (error) {
      if (error instanceof TutoringError) {
        throw new GenerationBackendFailure(`Assessment generation backend failed: ${error.message}`, error);
      }
      throw error;
    }
  }

  return {
    async generate(classId, transcriptChunks, studentLevel, options = {}) {
      const itemCount = options.itemCount ?? config.assessment.itemCount;
      if (!Number.isInteger(itemCount) || itemCount < MIN_ITEMS || itemCount > MAX_ITEMS) {
        throw new InvalidRequestError(`itemCount must be between ${MIN_ITEMS} and ${MAX_ITEMS}, got ${itemCount}`);
      }
      const excerpts = sampleExcerpts(transcriptChunks.filter((chunk) => chunk.text.trim()));
      if (!excerpts.length) {
        throw new AssessmentGenerationError(`Class ${classId} has no transcript content to assess`);
      }

      const need = apportionTiers(itemCount);
      const levels = tierLevels(studentLevel);
      const buckets = emptyBuckets();
      const seenQuestions = new Set<string>();

      for (let attempt = 1; attempt <= config.assessment.maxGenerationAttempts; attempt++) {
        const missing = missingCounts(need, buckets);
        if (totalOf(missing) === 0) break;

        const requests: TierRequest[] = DIFFICULTY_TIERS.map((tier) => ({
          tier,
          level: levels[tier],
          count: missing[tier],
        }));
        const { prompt, context } = buildAssessmentPrompt({
          classId,
          studentLevel,
          excerpts,
          requests,
          existingQuestions: DIFFICULTY_TIERS.flatMap((tier) => buckets[tier].map((item) => item.question)),
        });

        const reply = await requestItems(prompt, context);
        for (const item of parseGeneratedItems(reply, excerpts)) {
          const key = normalizeAnswer(item.question);
          if (seenQuestions.has(key)) continue;
          if (buckets[item.tier].length >= need[item.tier]) continue;
          seenQuestions.add(key);
          buckets[item.tier].push(item);
        }

        const stillMissing = missingCounts(need, buckets);
        if (totalOf(stillMissing) > 0) {
          console.warn("[assessment] tier plan not yet filled", { classId, attempt, missing: stillMissing });
        }
      }

      const missing = missingCounts(need, buckets);
      if (totalOf(missing) > 0) {
        const detail = `missing below=${missing.below} at=${missing.at} above=${missing.above}`;
        console.error("[assessment] could not fill tier plan", {
          classId,
          attempts: config.assessment.maxGenerationAttempts,
          detail,
        });
        throw new AssessmentGenerationError(`Could not generate a complete assessment for class ${classId}`, detail);
      }

      let position = 0;
      return DIFFICULTY_TIERS.flatMap((tier) =>
        buckets[tier].map((item): AssessmentItem => {
          position += 1;
          return {
            itemId: newItemId(),
            classId,
            position,
            difficultyTier: tier,
            targetLevel: levels[tier],
            topic: normalizeTopic(item.topic),
            questionText: item.question,
            correctAnswer: item.answer,
            explanation: item.explanation ?? null,
            sourceChunkIds: item.sourceChunkIds,
          };
        })
      );
    },
  };
}
