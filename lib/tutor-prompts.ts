import type { MasteryLevel, ScoredChunk, TutorTurn } from "@/types/engine";
import { levelLabel } from "./level-engine";

/** Explanation style per mastery level, from most scaffolded to most rigorous. */
export const LEVEL_PERSONAS: Record<MasteryLevel, string> = {
  1: "Be patient and encouraging. Use everyday analogies and concrete examples before any terminology, define every technical word you use, and keep to one idea per short paragraph.",
  2: "Explain step by step with a worked example. Introduce the correct terms alongside plain-language restatements and point out the most common mistake.",
  3: "Give a clear, structured explanation using the subject's standard terminology. Connect the idea to related concepts from class and close with a short check-your-understanding question.",
  4: "Be concise and precise. Emphasise reasoning, edge cases and why the method works, and compare alternative approaches where the class material allows.",
  5: "Speak as a peer. Favour formal definitions, derivations or proofs, state assumptions explicitly, and suggest an extension the student could explore next.",
};

export const NOT_ENOUGH_CONTENT_NOTICE =
  "I couldn't find enough in your class material to answer this confidently. Try rephrasing the question, or ask your teacher about it in the next class.";

export const NO_ACCESS_NOTICE =
  "You don't have access to any class material for this subject yet, so I can't answer from your classes.";

export const GENERAL_ANSWER_DISCLOSURE =
  "Note: this answer is general knowledge, not taken from your class material.";

export const DEGRADED_NOTICE =
  "The tutor is temporarily unavailable, so no answer was generated. Please try again in a moment.";

export const FILTERED_NOTICE = "I can't help with that request.";

export function excerptLabel(index: number): string {
  return `S${index + 1}`;
}

export function formatTutorExcerpts(chunks: readonly ScoredChunk[]): string[] {
  return chunks.map(({ chunk }, idx) => `[${excerptLabel(idx)}] ${chunk.text}`);
}

function formatHistory(history: readonly TutorTurn[]): string[] {
  if (!history.length) return [];
  const lines = ["Recent conversation:"];
  for (const turn of history) {
    lines.push(`Student: ${turn.queryText}`);
    lines.push(`Tutor: ${turn.responseText}`);
  }
  lines.push("");
  return lines;
}

type TutorPromptParams = {
  level: MasteryLevel;
  question: string;
  chunks: readonly ScoredChunk[];
  history?: readonly TutorTurn[];
};

export function buildTutorPrompt(params: TutorPromptParams) {
  const { level, question, chunks, history = [] } = params;
  const lines = [
    `You are a tutor for a level ${level} (${levelLabel(level)}) student.`,
    LEVEL_PERSONAS[level],
    "",
    "Answer ONLY from the numbered class excerpts supplied as context. Cite the excerpts you use inline, like [S1].",
    "If the excerpts do not contain the answer, say so plainly instead of guessing.",
    "",
    ...formatHistory(history),
    `Question: ${question.trim()}`,
  ];
  return { prompt: lines.join("\n"), context: formatTutorExcerpts(chunks) };
}

type GeneralPromptParams = {
  level: MasteryLevel;
  question: string;
  history?: readonly TutorTurn[];
};

export function buildGeneralAnswerPrompt(params: GeneralPromptParams) {
  const { level, question, history = [] } = params;
  const lines = [
    `You are a tutor for a level ${level} (${levelLabel(level)}) student.`,
    LEVEL_PERSONAS[level],
    "",
    "No class material covers this question. Give a brief general answer and do not claim it comes from the student's classes.",
    "",
    ...formatHistory(history),
    `Question: ${question.trim()}`,
  ];
  return { prompt: lines.join("\n"), context: [] };
}
