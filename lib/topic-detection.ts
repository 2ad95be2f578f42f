import { GENERAL_TOPIC } from "./weak-areas";

const STOP_WORDS = new Set([
  "about",
  "after",
  "again",
  "also",
  "because",
  "been",
  "before",
  "being",
  "between",
  "could",
  "does",
  "doing",
  "explain",
  "from",
  "have",
  "into",
  "mean",
  "means",
  "please",
  "should",
  "some",
  "than",
  "that",
  "their",
  "them",
  "then",
  "there",
  "these",
  "they",
  "this",
  "what",
  "when",
  "where",
  "which",
  "while",
  "with",
  "would",
  "your",
]);

const MIN_KEYWORD_LENGTH = 4;
const MAX_TOPIC_WORDS = 3;

export function extractKeywords(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length >= MIN_KEYWORD_LENGTH && !STOP_WORDS.has(word));
}

/** First few distinct significant words of the question, or "general". */
export function deriveTopic(question: string): string {
  const distinct = Array.from(new Set(extractKeywords(question))).slice(0, MAX_TOPIC_WORDS);
  return distinct.length ? distinct.join(" ") : GENERAL_TOPIC;
}
