import type { DifficultyTier, MasteryLevel, TranscriptChunk } from "@/types/engine";
import { levelLabel } from "./level-engine";

export const MAX_PROMPT_EXCERPTS = 24;

export type LabeledExcerpt = {
  label: string;
  chunkId: string;
  text: string;
};

export type TierRequest = {
  tier: DifficultyTier;
  level: MasteryLevel;
  count: number;
};

type AssessmentPromptParams = {
  classId: string;
  studentLevel: MasteryLevel;
  excerpts: LabeledExcerpt[];
  requests: TierRequest[];
  /** questions already accepted; the model must not repeat them */
  existingQuestions?: string[];
};

/** Evenly spread sample across the class, keeping transcript order. */
export function sampleExcerpts(chunks: readonly TranscriptChunk[], max = MAX_PROMPT_EXCERPTS): LabeledExcerpt[] {
  const ordered = [...chunks].sort((a, b) => a.ordinal - b.ordinal);
  const picked =
    ordered.length <= max
      ? ordered
      : Array.from({ length: max }, (_, i) => ordered[Math.floor((i * ordered.length) / max)]);
  return picked.map((chunk, idx) => ({ label: `C${idx + 1}`, chunkId: chunk.chunkId, text: chunk.text }));
}

export function formatExcerpts(excerpts: readonly LabeledExcerpt[]): string[] {
  return excerpts.map((excerpt) => `[${excerpt.label}] ${excerpt.text}`);
}

function describeRequest(request: TierRequest): string {
  return `- ${request.count} "${request.tier}" item(s) written for a level ${request.level} (${levelLabel(request.level)}) student`;
}

export function buildAssessmentPrompt(params: AssessmentPromptParams) {
  const { classId, studentLevel, excerpts, requests, existingQuestions = [] } = params;

  const lines = [
    `Write short-answer assessment questions for class ${classId}.`,
    `The student is at level ${studentLevel} (${levelLabel(studentLevel)}) on a 1-5 scale.`,
    `Use ONLY the numbered class excerpts supplied as context. Every question must be answerable from them.`,
    ``,
    `Items needed:`,
    ...requests.filter((request) => request.count > 0).map(describeRequest),
    ``,
    `Rules:`,
    `- Each answer is a short phrase (1-6 words) that can be checked by exact comparison.`,
    `- "citations" lists the excerpt labels (for example "C2") the item is drawn from; at least one.`,
    `- "topic" names the concept in 1-4 words.`,
    `- No multiple choice, no yes/no questions, no two items asking the same thing.`,
  ];

  if (existingQuestions.length) {
    lines.push(``, `Already written (do not repeat):`);
    for (const question of existingQuestions) lines.push(`- ${question}`);
  }

  lines.push(
    ``,
    `JSON Schema: { items: [{ tier: "below"|"at"|"above", topic: string, question: string, answer: string, explanation: string, citations: string[] }] }`,
    `Respond with a valid JSON object matching the schema and nothing else.`
  );

  return {
    prompt: lines.join("\n"),
    context: formatExcerpts(excerpts),
  };
}
