import type { SupabaseClient } from "@supabase/supabase-js";
import { LockBusyError } from "./errors";
import { KeyedMutex } from "./keyed-lock";
import { getErrorCode, getErrorMessage } from "./backend-errors";
import { safeErrorForLog } from "./log-format";

export type LockResult = { acquired: boolean; supported: boolean; reason?: "busy" | "error" };

export interface LockProvider {
  /**
   * Run `task` while holding the lock for scope+key. Fails with LockBusyError when
   * another worker holds it.
   */
  withLock<T>(scope: string, key: string, task: () => Promise<T>): Promise<T>;
}

const LOCK_TABLE = "engine_locks";

function isMissingTable(code: string, message: string) {
  return code === "42P01" || /relation .* does not exist/i.test(message);
}

// Attempts to acquire a cross-instance lock using a DB row in table
// `engine_locks` with PRIMARY KEY(scope, lock_key).
// If the table does not exist, returns supported: false so callers can fall back.
export async function acquireRowLock(
  sb: SupabaseClient,
  scope: string,
  key: string,
  ttlMs = 3 * 60_000
): Promise<LockResult> {
  const now = Date.now();
  try {
    const insert = await sb
      .from(LOCK_TABLE)
      .insert({ scope, lock_key: key, created_at: new Date(now).toISOString() });
    if (insert.error) {
      // Duplicate key likely means busy; try TTL takeover
      const code = insert.error.code ?? "";
      if (isMissingTable(code, insert.error.message)) {
        return { acquired: false, supported: false };
      }
      if (code === "23505" || /duplicate key/i.test(insert.error.message)) {
        const { data: existing } = await sb
          .from(LOCK_TABLE)
          .select("created_at")
          .eq("scope", scope)
          .eq("lock_key", key)
          .maybeSingle();
        const rawCreatedAt: unknown = existing?.created_at;
        const createdAt = typeof rawCreatedAt === "string" ? Date.parse(rawCreatedAt) : NaN;
        if (Number.isFinite(createdAt) && now - createdAt > ttlMs) {
          // Stale lock; try to steal
          await sb.from(LOCK_TABLE).delete().eq("scope", scope).eq("lock_key", key);
          const retry = await sb
            .from(LOCK_TABLE)
            .insert({ scope, lock_key: key, created_at: new Date(now).toISOString() });
          if (!retry.error) return { acquired: true, supported: true };
        }
        return { acquired: false, supported: true, reason: "busy" };
      }
      return { acquired: false, supported: true, reason: "error" };
    }
    return { acquired: true, supported: true };
  } catch (e: unknown) {
    if (isMissingTable(getErrorCode(e) ?? "", getErrorMessage(e))) return { acquired: false, supported: false };
    return { acquired: false, supported: true, reason: "error" };
  }
}

export async function releaseRowLock(sb: SupabaseClient, scope: string, key: string) {
  const { error } = await sb.from(LOCK_TABLE).delete().eq("scope", scope).eq("lock_key", key);
  if (error) {
    // the TTL takeover in acquireRowLock reclaims it eventually
    console.warn("[db-lock] release failed", { scope, key, error: safeErrorForLog(error) });
  }
}

/** Single-process lock provider. */
export function createInProcessLocks(mutex = new KeyedMutex()): LockProvider {
  return {
    withLock(scope, key, task) {
      return mutex.run(`${scope}:${key}`, task);
    },
  };
}

/**
 * Cross-instance lock provider: serializes in-process first, then claims the
 * `engine_locks` row. Without the table it degrades to in-process locking.
 */
export function createRowLockProvider(
  sb: SupabaseClient,
  options: { ttlMs: number; mutex?: KeyedMutex }
): LockProvider {
  const mutex = options.mutex ?? new KeyedMutex();
  return {
    withLock(scope, key, task) {
      return mutex.run(`${scope}:${key}`, async () => {
        const lock = await acquireRowLock(sb, scope, key, options.ttlMs);
        if (!lock.supported) {
          console.warn("[db-lock] engine_locks table missing; using in-process lock only", { scope });
          return task();
        }
        if (!lock.acquired) {
          throw new LockBusyError(scope, key);
        }
        try {
          return await task();
        } finally {
          await releaseRowLock(sb, scope, key);
        }
      });
    },
  };
}

// SQL for the locks table lives in supabase/migrations/0001_tutoring_engine.sql:
// create table if not exists engine_locks (
//   scope text not null,
//   lock_key text not null,
//   created_at timestamptz not null default now(),
//   primary key (scope, lock_key)
// );
