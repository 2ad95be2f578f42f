// @/types/engine.ts
export type MasteryLevel = 1 | 2 | 3 | 4 | 5;

export type DifficultyTier = "below" | "at" | "above";

export type TranscriptChunk = {
  chunkId: string;
  classId: string;
  subjectId: string;
  text: string;
  ordinal: number;
  /** false when the embedding backend never produced a vector; such chunks are never retrieved */
  embedded: boolean;
  indexVersion: string;
  /** When the class took place; newer classes win similarity ties. */
  classHeldAt: string;
};

export type StoredChunk = TranscriptChunk & {
  embedding: number[] | null;
};

export type ScoredChunk = {
  chunk: TranscriptChunk;
  score: number;
};

export type UnderstandingProfile = {
  studentId: string;
  subjectId: string;
  level: MasteryLevel;
  previousLevel: MasteryLevel | null;
  evaluationWindowCount: number;
  /** Raw scores recorded since the last evaluation, oldest first. */
  windowScores: number[];
  rollingScore: number | null;
  totalSubmissions: number;
  lastEvaluatedAt: string | null;
  version: number;
  createdAt: string;
  updatedAt: string;
};

export type WeakArea = {
  studentId: string;
  subjectId: string;
  topic: string;
  missCount: number;
  correctStreak: number;
  lastSeenAt: string;
};

export type AssessmentItem = {
  itemId: string;
  classId: string;
  position: number;
  difficultyTier: DifficultyTier;
  targetLevel: MasteryLevel;
  topic: string;
  questionText: string;
  correctAnswer: string;
  explanation: string | null;
  sourceChunkIds: string[];
};

export type StudentAssessmentItem = Omit<AssessmentItem, "correctAnswer" | "explanation">;

export type ItemResult = {
  itemId: string;
  difficultyTier: DifficultyTier;
  topic: string;
  answer: string | null;
  correct: boolean;
};

export type AssessmentSubmission = {
  submissionId: string;
  studentId: string;
  classId: string;
  subjectId: string;
  perItemResults: ItemResult[];
  rawScore: number;
  submittedAt: string;
};

export type TutorSession = {
  sessionId: string;
  studentId: string;
  subjectId: string;
  createdAt: string;
};

export type TurnOutcome = "grounded" | "fallback" | "degraded";

export type TutorTurn = {
  sessionId: string;
  turnIndex: number;
  queryText: string;
  topic: string;
  retrievedChunkIds: string[];
  grounded: boolean;
  outcome: TurnOutcome;
  responseText: string;
  levelAtTurn: MasteryLevel;
  createdAt: string;
};
