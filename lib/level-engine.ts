import type { EngineConfig } from "./config";
import type { ProfileStore } from "./stores/profile-store";
import type { MasteryLevel, UnderstandingProfile } from "@/types/engine";
import { InvalidRequestError, LevelEvaluationRaceDetected, StoreError } from "./errors";
import { KeyedMutex } from "./keyed-lock";
import { withRetry } from "./retry";

export const EVALUATION_WINDOW = 3;
export const DEFAULT_LEVEL: MasteryLevel = 3;
export const MIN_LEVEL: MasteryLevel = 1;
export const MAX_LEVEL: MasteryLevel = 5;

const LEVELS: readonly MasteryLevel[] = [1, 2, 3, 4, 5];

export const LEVEL_LABELS: Record<MasteryLevel, string> = {
  1: "beginner",
  2: "developing",
  3: "proficient",
  4: "advanced",
  5: "expert",
};

// CAS retries after a lost version race
const RACE_RETRY = { maxAttempts: 5, baseDelayMs: 10, maxDelayMs: 80 };

export type LevelThresholds = EngineConfig["level"];

export function clampLevel(value: number): MasteryLevel {
  const bounded = Math.min(MAX_LEVEL, Math.max(MIN_LEVEL, Math.round(value)));
  return LEVELS.find((level) => level === bounded) ?? DEFAULT_LEVEL;
}

export function levelLabel(level: MasteryLevel): string {
  return LEVEL_LABELS[level];
}

/** One step per evaluation at most; both thresholds are strict. */
export function nextLevel(level: MasteryLevel, rollingScore: number, thresholds: LevelThresholds): MasteryLevel {
  if (rollingScore > thresholds.advanceThreshold) return clampLevel(level + 1);
  if (rollingScore < thresholds.regressThreshold) return clampLevel(level - 1);
  return level;
}

export function rollingScoreOf(scores: readonly number[]): number {
  if (!scores.length) return 0;
  return scores.reduce((sum, score) => sum + score, 0) / scores.length;
}

export function newProfile(studentId: string, subjectId: string, at: Date): UnderstandingProfile {
  const stamp = at.toISOString();
  return {
    studentId,
    subjectId,
    level: DEFAULT_LEVEL,
    previousLevel: null,
    evaluationWindowCount: 0,
    windowScores: [],
    rollingScore: null,
    totalSubmissions: 0,
    lastEvaluatedAt: null,
    version: 0,
    createdAt: stamp,
    updatedAt: stamp,
  };
}

export type OutcomeApplication = {
  next: UnderstandingProfile;
  evaluated: boolean;
};

/**
 * Fold one assessment score into the profile. Every third score closes the
 * window: the plain mean decides the move and the window starts over.
 */
export function applyOutcome(
  profile: UnderstandingProfile,
  rawScore: number,
  thresholds: LevelThresholds,
  at: Date
): OutcomeApplication {
  const windowScores = [...profile.windowScores, rawScore];
  const base = {
    ...profile,
    totalSubmissions: profile.totalSubmissions + 1,
    version: profile.version + 1,
    updatedAt: at.toISOString(),
  };

  if (windowScores.length < EVALUATION_WINDOW) {
    return {
      next: { ...base, windowScores, evaluationWindowCount: windowScores.length },
      evaluated: false,
    };
  }

  const rollingScore = rollingScoreOf(windowScores);
  return {
    next: {
      ...base,
      level: nextLevel(profile.level, rollingScore, thresholds),
      previousLevel: profile.level,
      rollingScore,
      windowScores: [],
      evaluationWindowCount: 0,
      lastEvaluatedAt: at.toISOString(),
    },
    evaluated: true,
  };
}

export type LevelOutcome = {
  profile: UnderstandingProfile;
  evaluated: boolean;
  levelBefore: MasteryLevel;
  levelAfter: MasteryLevel;
};

export type LevelEngine = {
  getOrCreateProfile(studentId: string, subjectId: string): Promise<UnderstandingProfile>;
  recordOutcome(studentId: string, subjectId: string, rawScore: number): Promise<LevelOutcome>;
};

type LevelEngineDeps = {
  profiles: ProfileStore;
  config: EngineConfig;
  mutex?: KeyedMutex;
  now?: () => Date;
};

export function createLevelEngine(deps: LevelEngineDeps): LevelEngine {
  const { profiles, config } = deps;
  const mutex = deps.mutex ?? new KeyedMutex();
  const now = deps.now ?? (() => new Date());

  async function getOrCreateProfile(studentId: string, subjectId: string) {
    const existing = await profiles.getProfile(studentId, subjectId);
    if (existing) return existing;
    return profiles.createProfile(newProfile(studentId, subjectId, now()));
  }

  async function applyOnce(studentId: string, subjectId: string, rawScore: number): Promise<LevelOutcome> {
    const current = await getOrCreateProfile(studentId, subjectId);
    const { next, evaluated } = applyOutcome(current, rawScore, config.level, now());
    const written = await profiles.updateProfile(next, current.version);
    if (!written) throw new LevelEvaluationRaceDetected(studentId, subjectId, current.version);
    return { profile: next, evaluated, levelBefore: current.level, levelAfter: next.level };
  }

  return {
    getOrCreateProfile,

    async recordOutcome(studentId, subjectId, rawScore) {
      if (!Number.isFinite(rawScore) || rawScore < 0 || rawScore > 1) {
        throw new InvalidRequestError(`rawScore must be within [0, 1], got ${rawScore}`);
      }

      return mutex.run(`level:${studentId}:${subjectId}`, async () => {
        try {
          const outcome = await withRetry(() => applyOnce(studentId, subjectId, rawScore), {
            ...RACE_RETRY,
            label: "level evaluation",
            isRetryable: (error) => error instanceof LevelEvaluationRaceDetected,
          });
          if (outcome.evaluated) {
            console.info("[level-engine] level evaluated", {
              studentId,
              subjectId,
              rollingScore: outcome.profile.rollingScore,
              from: outcome.levelBefore,
              to: outcome.levelAfter,
            });
          }
          return outcome;
        } catch (error) {
          if (error instanceof LevelEvaluationRaceDetected) {
            throw new StoreError(
              "recordOutcome",
              `profile ${studentId}/${subjectId} kept changing across ${RACE_RETRY.maxAttempts} attempts`,
              null,
              error
            );
          }
          throw error;
        }
      });
    },
  };
}
