import type { SupabaseClient } from "@supabase/supabase-js";
import type { EngineConfig } from "./config";
import type { EmbeddingBackend } from "./embeddings";
import type { TextGenerator } from "./generation";
import type { EntitlementProvider } from "./entitlements";
import type { LockProvider } from "./db-lock";
import type { ChunkStore } from "./stores/chunk-store";
import type { ProfileStore } from "./stores/profile-store";
import type { WeakAreaStore } from "./stores/weak-area-store";
import type { AssessmentStore } from "./stores/assessment-store";
import type { TutorSessionStore } from "./stores/tutor-session-store";
import { loadEngineConfig } from "./config";
import { createOpenAIEmbeddingBackend } from "./embeddings";
import { createOpenAITextGenerator } from "./generation";
import { createModelClient } from "./model-config";
import { createSupabaseEntitlements } from "./entitlements";
import { createInProcessLocks, createRowLockProvider } from "./db-lock";
import { createSupabaseChunkStore } from "./stores/chunk-store";
import { createSupabaseProfileStore } from "./stores/profile-store";
import { createSupabaseWeakAreaStore } from "./stores/weak-area-store";
import { createSupabaseAssessmentStore } from "./stores/assessment-store";
import { createSupabaseTutorSessionStore } from "./stores/tutor-session-store";
import { supabaseAdmin } from "./supabase-admin";
import { KeyedMutex } from "./keyed-lock";
import { createTranscriptIndexer, type TranscriptIndexer } from "./transcript-indexer";
import { createRetrievalEngine, type RetrievalEngine } from "./retrieval";
import { createLevelEngine, levelLabel, type LevelEngine } from "./level-engine";
import { createWeakAreaTracker, type WeakAreaTracker } from "./weak-areas";
import { createAssessmentGenerator, type AssessmentGenerator } from "./assessment-generator";
import { createAssessmentService, type AssessmentService } from "./assessments";
import { createTutorSessionManager, type TutorSessionManager } from "./tutor-session";

export type EngineStores = {
  chunks: ChunkStore;
  profiles: ProfileStore;
  weakAreas: WeakAreaStore;
  assessments: AssessmentStore;
  sessions: TutorSessionStore;
};

export type TutoringEngineDeps = {
  config: EngineConfig;
  stores: EngineStores;
  embedder: EmbeddingBackend;
  generator: TextGenerator;
  entitlements: EntitlementProvider;
  /** defaults to in-process locks */
  locks?: LockProvider;
  now?: () => Date;
};

export type TutoringEngine = {
  config: EngineConfig;
  indexer: TranscriptIndexer;
  retrieval: RetrievalEngine;
  levels: LevelEngine & { levelLabel: typeof levelLabel };
  weakAreas: WeakAreaTracker;
  assessmentGenerator: AssessmentGenerator;
  assessments: AssessmentService;
  tutor: TutorSessionManager;
};

/**
 * Composition root. Every component shares one keyed mutex, so the in-process
 * locks belong to this engine instance rather than to module state.
 */
export function createTutoringEngine(deps: TutoringEngineDeps): TutoringEngine {
  const { config, stores, embedder, generator, entitlements, now } = deps;
  const mutex = new KeyedMutex();
  const locks = deps.locks ?? createInProcessLocks(mutex);

  const indexer = createTranscriptIndexer({ chunks: stores.chunks, embedder, locks, config, now });
  const retrieval = createRetrievalEngine({ chunks: stores.chunks, embedder, config });
  const levels = createLevelEngine({ profiles: stores.profiles, config, mutex, now });
  const weakAreas = createWeakAreaTracker({ store: stores.weakAreas, config, mutex, now });
  const assessmentGenerator = createAssessmentGenerator({ generator, config });
  const assessments = createAssessmentService({
    chunks: stores.chunks,
    assessments: stores.assessments,
    generator: assessmentGenerator,
    levels,
    weakAreas,
    entitlements,
    locks,
    config,
    now,
  });
  const tutor = createTutorSessionManager({
    sessions: stores.sessions,
    retrieval,
    generator,
    levels,
    weakAreas,
    entitlements,
    config,
    mutex,
    now,
  });

  return {
    config,
    indexer,
    retrieval,
    levels: { ...levels, levelLabel },
    weakAreas,
    assessmentGenerator,
    assessments,
    tutor,
  };
}

export function createSupabaseStores(sb: SupabaseClient): EngineStores {
  return {
    chunks: createSupabaseChunkStore(sb),
    profiles: createSupabaseProfileStore(sb),
    weakAreas: createSupabaseWeakAreaStore(sb),
    assessments: createSupabaseAssessmentStore(sb),
    sessions: createSupabaseTutorSessionStore(sb),
  };
}

/**
 * Wire the engine from the environment: TUTOR_* settings, the model provider
 * variables, and SUPABASE_URL / SUPABASE_SERVICE_ROLE_KEY.
 */
export function createSupabaseTutoringEngine(
  options: { env?: NodeJS.ProcessEnv; supabase?: SupabaseClient; config?: EngineConfig } = {}
): TutoringEngine {
  const env = options.env ?? process.env;
  const config = options.config ?? loadEngineConfig(env);
  const sb = options.supabase ?? supabaseAdmin(env);

  const embedding = createModelClient("embedding", env);
  const generation = createModelClient("generation", env);

  return createTutoringEngine({
    config,
    stores: createSupabaseStores(sb),
    embedder: createOpenAIEmbeddingBackend({
      client: embedding.client,
      model: embedding.model,
      timeoutMs: config.backend.timeoutMs,
    }),
    generator: createOpenAITextGenerator({
      client: generation.client,
      model: generation.model,
      timeoutMs: config.backend.timeoutMs,
    }),
    entitlements: createSupabaseEntitlements(sb),
    locks: createRowLockProvider(sb, { ttlMs: config.indexing.lockTtlMs }),
  });
}
