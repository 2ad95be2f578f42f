import { describe, expect, it } from "vitest";
import { normalizeAnswer, scoreSubmission } from "@/lib/assessment-scoring";
import { InvalidSubmissionError } from "@/lib/errors";
import type { AssessmentItem, DifficultyTier } from "@/types/engine";

const item = (itemId: string, position: number, difficultyTier: DifficultyTier, correctAnswer: string): AssessmentItem => ({
  itemId,
  classId: "c1",
  position,
  difficultyTier,
  targetLevel: 3,
  topic: `topic ${itemId}`,
  questionText: `What is ${itemId}?`,
  correctAnswer,
  explanation: null,
  sourceChunkIds: ["ch-0"],
});

const ITEMS = [
  item("i4", 4, "above", "calvin cycle"),
  item("i1", 1, "below", "Photosynthesis"),
  item("i2", 2, "below", "chlorophyll"),
  item("i3", 3, "at", "light energy"),
];

describe("normalizeAnswer", () => {
  it("ignores case and surrounding or repeated whitespace", () => {
    expect(normalizeAnswer("  Light \n Energy ")).toBe("light energy");
  });
});

describe("scoreSubmission", () => {
  it("weights each item by its tier", () => {
    const result = scoreSubmission(
      ITEMS,
      [
        { itemId: "i1", answer: "  PHOTOSYNTHESIS " },
        { itemId: "i2", answer: "chlorophyll" },
        { itemId: "i3", answer: "Light   energy" },
        { itemId: "i4", answer: "krebs cycle" },
      ],
      { below: 1, at: 2, above: 1 }
    );
    expect(result.rawScore).toBe(0.8);
  });

  it("counts every item the same by default and returns results in position order", () => {
    const result = scoreSubmission(ITEMS, [
      { itemId: "i3", answer: "light energy" },
      { itemId: "i2", answer: "" },
    ]);
    expect(result.rawScore).toBe(0.25);
    expect(result.perItemResults).toEqual([
      { itemId: "i1", difficultyTier: "below", topic: "topic i1", answer: null, correct: false },
      { itemId: "i2", difficultyTier: "below", topic: "topic i2", answer: "", correct: false },
      { itemId: "i3", difficultyTier: "at", topic: "topic i3", answer: "light energy", correct: true },
      { itemId: "i4", difficultyTier: "above", topic: "topic i4", answer: null, correct: false },
    ]);
  });

  it("rejects answers to unknown items and repeated answers", () => {
    expect(() => scoreSubmission(ITEMS, [{ itemId: "nope", answer: "x" }])).toThrow(InvalidSubmissionError);
    expect(() =>
      scoreSubmission(ITEMS, [
        { itemId: "i1", answer: "a" },
        { itemId: "i1", answer: "b" },
      ])
    ).toThrow(InvalidSubmissionError);
  });

  it("rejects an empty item set", () => {
    expect(() => scoreSubmission([], [])).toThrow(InvalidSubmissionError);
  });
});
