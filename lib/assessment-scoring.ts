import { z } from "zod";
import type { TierWeights } from "./config";
import type { AssessmentItem, ItemResult } from "@/types/engine";
import { InvalidSubmissionError } from "./errors";

export const SubmittedAnswerSchema = z.object({
  itemId: z.string().min(1),
  answer: z.string().max(2_000),
});

export type SubmittedAnswer = z.infer<typeof SubmittedAnswerSchema>;

export type ScoreResult = {
  rawScore: number;
  perItemResults: ItemResult[];
};

const EQUAL_WEIGHTS: TierWeights = { below: 1, at: 1, above: 1 };

export function normalizeAnswer(value: string): string {
  return value.trim().toLowerCase().replace(/\s+/g, " ");
}

/**
 * Each item counts with its tier's weight; with the default weights every item
 * counts the same. Unanswered items are wrong.
 */
export function scoreSubmission(
  items: readonly AssessmentItem[],
  answers: readonly SubmittedAnswer[],
  tierWeights: TierWeights = EQUAL_WEIGHTS
): ScoreResult {
  if (!items.length) throw new InvalidSubmissionError("Assessment has no items to score");

  const known = new Set(items.map((item) => item.itemId));
  const byItem = new Map<string, string>();
  for (const { itemId, answer } of answers) {
    if (!known.has(itemId)) throw new InvalidSubmissionError(`Answer references unknown item ${itemId}`);
    if (byItem.has(itemId)) throw new InvalidSubmissionError(`Item ${itemId} was answered more than once`);
    byItem.set(itemId, answer);
  }

  let earned = 0;
  let possible = 0;
  const perItemResults = [...items]
    .sort((a, b) => a.position - b.position)
    .map((item): ItemResult => {
      const answer = byItem.get(item.itemId) ?? null;
      const correct =
        answer !== null && normalizeAnswer(answer) !== "" && normalizeAnswer(answer) === normalizeAnswer(item.correctAnswer);
      const weight = tierWeights[item.difficultyTier];
      possible += weight;
      if (correct) earned += weight;
      return { itemId: item.itemId, difficultyTier: item.difficultyTier, topic: item.topic, answer, correct };
    });

  return { rawScore: possible > 0 ? earned / possible : 0, perItemResults };
}
