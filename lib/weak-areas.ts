import type { EngineConfig } from "./config";
import type { WeakAreaStore } from "./stores/weak-area-store";
import type { WeakArea } from "@/types/engine";
import { KeyedMutex } from "./keyed-lock";

export const GENERAL_TOPIC = "general";

export function normalizeTopic(topic: string | null | undefined): string {
  const normalized = (topic ?? "").trim().toLowerCase().replace(/\s+/g, " ");
  return normalized || GENERAL_TOPIC;
}

/** Most misses first, then the most recently seen. */
export function orderWeakAreas(areas: readonly WeakArea[]): WeakArea[] {
  return [...areas].sort((a, b) => {
    if (b.missCount !== a.missCount) return b.missCount - a.missCount;
    return Date.parse(b.lastSeenAt) - Date.parse(a.lastSeenAt);
  });
}

export type WeakAreaTracker = {
  recordMiss(studentId: string, subjectId: string, topic: string): Promise<WeakArea>;
  /** Counts toward decay only when the topic is already weak; returns null when it is not (or no longer) weak. */
  recordSuccess(studentId: string, subjectId: string, topic: string): Promise<WeakArea | null>;
  listWeakAreas(studentId: string, subjectId: string): Promise<WeakArea[]>;
};

type WeakAreaTrackerDeps = {
  store: WeakAreaStore;
  config: EngineConfig;
  mutex?: KeyedMutex;
  now?: () => Date;
};

export function createWeakAreaTracker(deps: WeakAreaTrackerDeps): WeakAreaTracker {
  const { store, config } = deps;
  const mutex = deps.mutex ?? new KeyedMutex();
  const now = deps.now ?? (() => new Date());

  const lockKey = (studentId: string, subjectId: string, topic: string) =>
    `weak:${studentId}:${subjectId}:${topic}`;

  return {
    async recordMiss(studentId, subjectId, rawTopic) {
      const topic = normalizeTopic(rawTopic);
      return mutex.run(lockKey(studentId, subjectId, topic), async () => {
        const existing = await store.getWeakArea(studentId, subjectId, topic);
        const next: WeakArea = {
          studentId,
          subjectId,
          topic,
          missCount: (existing?.missCount ?? 0) + 1,
          correctStreak: 0,
          lastSeenAt: now().toISOString(),
        };
        await store.upsertWeakArea(next);
        return next;
      });
    },

    async recordSuccess(studentId, subjectId, rawTopic) {
      const topic = normalizeTopic(rawTopic);
      return mutex.run(lockKey(studentId, subjectId, topic), async () => {
        const existing = await store.getWeakArea(studentId, subjectId, topic);
        if (!existing) return null;

        let missCount = existing.missCount;
        let correctStreak = existing.correctStreak + 1;
        if (correctStreak >= config.weakAreas.decayAfter) {
          missCount -= 1;
          correctStreak = 0;
        }
        if (missCount <= 0) {
          await store.deleteWeakArea(studentId, subjectId, topic);
          console.info("[weak-areas] weak area cleared", { studentId, subjectId, topic });
          return null;
        }
        const next: WeakArea = { ...existing, missCount, correctStreak, lastSeenAt: now().toISOString() };
        await store.upsertWeakArea(next);
        return next;
      });
    },

    async listWeakAreas(studentId, subjectId) {
      return orderWeakAreas(await store.listWeakAreas(studentId, subjectId));
    },
  };
}
