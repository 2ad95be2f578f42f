import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import { parseRows, storeFailure } from "./stores/shared";

export interface EntitlementProvider {
  /** Classes of the subject the student may read. Empty when they have no access. */
  entitledClassIds(studentId: string, subjectId: string): Promise<Set<string>>;
}

export const ACTIVE_SUBSCRIPTION_STATUSES = ["active", "trialing"] as const;

const SubscriptionRowSchema = z.object({
  subject_id: z.string().nullable(),
  status: z.string(),
  current_period_end: z.string().nullable(),
});

const ClassRowSchema = z.object({ class_id: z.string() });

type SubscriptionRow = z.infer<typeof SubscriptionRowSchema>;

export function isActiveSubscription(row: SubscriptionRow, subjectId: string, at: Date): boolean {
  const status = row.status.trim().toLowerCase();
  if (!ACTIVE_SUBSCRIPTION_STATUSES.some((active) => active === status)) return false;
  if (row.subject_id !== null && row.subject_id !== subjectId) return false;
  if (row.current_period_end) {
    const end = Date.parse(row.current_period_end);
    if (Number.isFinite(end) && end <= at.getTime()) return false;
  }
  return true;
}

/**
 * A student with an active subscription (for the subject, or for every subject
 * when `subject_id` is null) may read every class of that subject.
 */
export function createSupabaseEntitlements(
  sb: SupabaseClient,
  options: { now?: () => Date } = {}
): EntitlementProvider {
  const now = options.now ?? (() => new Date());
  return {
    async entitledClassIds(studentId, subjectId) {
      const subscriptions = await sb
        .from("subscriptions")
        .select("subject_id, status, current_period_end")
        .eq("student_id", studentId);
      if (subscriptions.error) throw storeFailure("entitledClassIds", subscriptions.error);

      const rows = parseRows(SubscriptionRowSchema, subscriptions.data, "entitledClassIds");
      const at = now();
      if (!rows.some((row) => isActiveSubscription(row, subjectId, at))) return new Set();

      const { data, error } = await sb.from("classes").select("class_id").eq("subject_id", subjectId);
      if (error) throw storeFailure("entitledClassIds", error);
      return new Set(parseRows(ClassRowSchema, data, "entitledClassIds").map((row) => row.class_id));
    },
  };
}
