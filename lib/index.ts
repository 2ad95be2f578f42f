export * from "@/types/engine";
export * from "./errors";
export {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  FALLBACK_MODES,
  loadEngineConfig,
  resolveEngineConfig,
  type BackendCallConfig,
  type EngineConfig,
  type EngineConfigOverrides,
  type FallbackMode,
  type TierWeights,
} from "./config";
export { getModelConfig, createModelClient, type ModelConfig, type ModelProvider, type ModelRole } from "./model-config";
export { createOpenAIEmbeddingBackend, type EmbeddingBackend } from "./embeddings";
export { createOpenAITextGenerator, type TextGenerator } from "./generation";
export { chunkTranscript, type ChunkingOptions, type TextChunk } from "./chunking";
export { KeyedMutex } from "./keyed-lock";
export { createInProcessLocks, createRowLockProvider, type LockProvider } from "./db-lock";
export type { ChunkStore, ChunkMatchQuery, ClassIndexHead } from "./stores/chunk-store";
export type { ProfileStore } from "./stores/profile-store";
export type { WeakAreaStore } from "./stores/weak-area-store";
export type { AssessmentStore } from "./stores/assessment-store";
export type { TutorSessionStore } from "./stores/tutor-session-store";
export { createSupabaseEntitlements, type EntitlementProvider } from "./entitlements";
export {
  chunkIdFor,
  createTranscriptIndexer,
  type IndexOptions,
  type IndexResult,
  type IndexStats,
  type TranscriptIndexer,
} from "./transcript-indexer";
export {
  createRetrievalEngine,
  rankChunks,
  type RetrievalEngine,
  type RetrievalReason,
  type RetrievalResult,
  type RetrievalScope,
} from "./retrieval";
export {
  DEFAULT_LEVEL,
  EVALUATION_WINDOW,
  LEVEL_LABELS,
  applyOutcome,
  clampLevel,
  createLevelEngine,
  levelLabel,
  nextLevel,
  type LevelEngine,
  type LevelOutcome,
} from "./level-engine";
export { createWeakAreaTracker, normalizeTopic, type WeakAreaTracker } from "./weak-areas";
export { apportionTiers, tierLevels, type TierCounts } from "./assessment-tiers";
export { createAssessmentGenerator, type AssessmentGenerator } from "./assessment-generator";
export { normalizeAnswer, scoreSubmission, type ScoreResult, type SubmittedAnswer } from "./assessment-scoring";
export {
  createAssessmentService,
  type AssessmentService,
  type IssueOptions,
  type StudentAccess,
  type SubmissionOutcome,
  type SubmissionPayload,
} from "./assessments";
export { deriveTopic } from "./topic-detection";
export {
  createTutorSessionManager,
  type AskRequest,
  type Citation,
  type TutorAnswer,
  type TutorSessionManager,
} from "./tutor-session";
export {
  createSupabaseStores,
  createSupabaseTutoringEngine,
  createTutoringEngine,
  type EngineStores,
  type TutoringEngine,
  type TutoringEngineDeps,
} from "./engine";
