import { z } from "zod";
import { ConfigError } from "./errors";

const resolveNumericEnv = (value: string | undefined, fallback: number) => {
  if (value == null || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
};

function normalizeChoiceEnv<T extends string>(value: string | undefined, choices: readonly T[], fallback: T): T {
  if (!value) return fallback;
  const trimmed = value.trim().toLowerCase();
  return choices.find((choice) => choice === trimmed) ?? fallback;
}

const TierWeightsSchema = z.object({
  below: z.number().positive(),
  at: z.number().positive(),
  above: z.number().positive(),
});

export const FALLBACK_MODES = ["refuse", "general"] as const;
export type FallbackMode = (typeof FALLBACK_MODES)[number];

export const EngineConfigSchema = z.object({
  retrieval: z.object({
    /** number of chunks handed to the prompt */
    k: z.number().int().min(1).max(50),
    /** τ: minimum cosine similarity a chunk needs to count as grounding */
    minSimilarity: z.number().min(-1).max(1),
  }),
  chunking: z
    .object({
      targetChars: z.number().int().min(120),
      overlapChars: z.number().int().min(0),
    })
    .refine((value) => value.overlapChars < value.targetChars, {
      message: "overlapChars must be smaller than targetChars",
      path: ["overlapChars"],
    }),
  indexing: z.object({
    embedConcurrency: z.number().int().min(1).max(64),
    lockTtlMs: z.number().int().min(1_000),
  }),
  level: z
    .object({
      advanceThreshold: z.number().min(0).max(1),
      regressThreshold: z.number().min(0).max(1),
    })
    .refine((value) => value.regressThreshold < value.advanceThreshold, {
      message: "regressThreshold must be below advanceThreshold",
      path: ["regressThreshold"],
    }),
  assessment: z.object({
    itemCount: z.number().int().min(8).max(10),
    maxGenerationAttempts: z.number().int().min(1).max(5),
    tierWeights: TierWeightsSchema,
  }),
  weakAreas: z.object({
    decayAfter: z.number().int().min(1),
  }),
  backend: z.object({
    timeoutMs: z.number().int().min(1),
    maxAttempts: z.number().int().min(1).max(8),
    baseDelayMs: z.number().int().min(0),
    maxDelayMs: z.number().int().min(0),
  }),
  tutor: z.object({
    fallbackMode: z.enum(FALLBACK_MODES),
    historyTurns: z.number().int().min(0).max(20),
  }),
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type BackendCallConfig = EngineConfig["backend"];
export type TierWeights = z.infer<typeof TierWeightsSchema>;

export type EngineConfigOverrides = {
  [Section in keyof EngineConfig]?: Partial<EngineConfig[Section]>;
};

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  retrieval: { k: 5, minSimilarity: 0.4 },
  chunking: { targetChars: 1200, overlapChars: 200 },
  indexing: { embedConcurrency: 4, lockTtlMs: 10 * 60_000 },
  level: { advanceThreshold: 0.8, regressThreshold: 0.4 },
  assessment: {
    itemCount: 10,
    maxGenerationAttempts: 2,
    tierWeights: { below: 1, at: 1, above: 1 },
  },
  weakAreas: { decayAfter: 3 },
  backend: { timeoutMs: 20_000, maxAttempts: 3, baseDelayMs: 500, maxDelayMs: 4_000 },
  tutor: { fallbackMode: "refuse", historyTurns: 6 },
};

function validateConfig(candidate: EngineConfig): EngineConfig {
  const parsed = EngineConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError("Invalid tutoring engine configuration", detail);
  }
  return parsed.data;
}

/**
 * Merge per-section overrides onto the defaults and validate the result.
 */
export function resolveEngineConfig(
  overrides: EngineConfigOverrides = {},
  base: EngineConfig = DEFAULT_ENGINE_CONFIG
): EngineConfig {
  return validateConfig({
    retrieval: { ...base.retrieval, ...overrides.retrieval },
    chunking: { ...base.chunking, ...overrides.chunking },
    indexing: { ...base.indexing, ...overrides.indexing },
    level: { ...base.level, ...overrides.level },
    assessment: { ...base.assessment, ...overrides.assessment },
    weakAreas: { ...base.weakAreas, ...overrides.weakAreas },
    backend: { ...base.backend, ...overrides.backend },
    tutor: { ...base.tutor, ...overrides.tutor },
  });
}

/**
 * Read the engine configuration from TUTOR_* environment variables.
 * Unset or non-numeric values fall back to the defaults.
 */
export function loadEngineConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const d = DEFAULT_ENGINE_CONFIG;
  return validateConfig({
    retrieval: {
      k: resolveNumericEnv(env.TUTOR_RETRIEVAL_K, d.retrieval.k),
      minSimilarity: resolveNumericEnv(env.TUTOR_MIN_SIMILARITY, d.retrieval.minSimilarity),
    },
    chunking: {
      targetChars: resolveNumericEnv(env.TUTOR_CHUNK_TARGET_CHARS, d.chunking.targetChars),
      overlapChars: resolveNumericEnv(env.TUTOR_CHUNK_OVERLAP_CHARS, d.chunking.overlapChars),
    },
    indexing: {
      embedConcurrency: resolveNumericEnv(env.TUTOR_EMBED_CONCURRENCY, d.indexing.embedConcurrency),
      lockTtlMs: resolveNumericEnv(env.TUTOR_INDEX_LOCK_TTL_MS, d.indexing.lockTtlMs),
    },
    level: {
      advanceThreshold: resolveNumericEnv(env.TUTOR_LEVEL_ADVANCE_THRESHOLD, d.level.advanceThreshold),
      regressThreshold: resolveNumericEnv(env.TUTOR_LEVEL_REGRESS_THRESHOLD, d.level.regressThreshold),
    },
    assessment: {
      itemCount: resolveNumericEnv(env.TUTOR_ASSESSMENT_ITEMS, d.assessment.itemCount),
      maxGenerationAttempts: resolveNumericEnv(
        env.TUTOR_ASSESSMENT_ATTEMPTS,
        d.assessment.maxGenerationAttempts
      ),
      tierWeights: {
        below: resolveNumericEnv(env.TUTOR_WEIGHT_BELOW, d.assessment.tierWeights.below),
        at: resolveNumericEnv(env.TUTOR_WEIGHT_AT, d.assessment.tierWeights.at),
        above: resolveNumericEnv(env.TUTOR_WEIGHT_ABOVE, d.assessment.tierWeights.above),
      },
    },
    weakAreas: {
      decayAfter: resolveNumericEnv(env.TUTOR_WEAK_AREA_DECAY_AFTER, d.weakAreas.decayAfter),
    },
    backend: {
      timeoutMs: resolveNumericEnv(env.TUTOR_BACKEND_TIMEOUT_MS, d.backend.timeoutMs),
      maxAttempts: resolveNumericEnv(env.TUTOR_BACKEND_MAX_ATTEMPTS, d.backend.maxAttempts),
      baseDelayMs: resolveNumericEnv(env.TUTOR_BACKEND_BASE_DELAY_MS, d.backend.baseDelayMs),
      maxDelayMs: resolveNumericEnv(env.TUTOR_BACKEND_MAX_DELAY_MS, d.backend.maxDelayMs),
    },
    tutor: {
      fallbackMode: normalizeChoiceEnv(env.TUTOR_FALLBACK_MODE, FALLBACK_MODES, d.tutor.fallbackMode),
      historyTurns: resolveNumericEnv(env.TUTOR_HISTORY_TURNS, d.tutor.historyTurns),
    },
  });
}
