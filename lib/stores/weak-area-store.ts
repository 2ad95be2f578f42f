import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { WeakArea } from "@/types/engine";
import { parseRow, parseRows, storeFailure } from "./shared";

export interface WeakAreaStore {
  getWeakArea(studentId: string, subjectId: string, topic: string): Promise<WeakArea | null>;
  upsertWeakArea(area: WeakArea): Promise<void>;
  deleteWeakArea(studentId: string, subjectId: string, topic: string): Promise<void>;
  listWeakAreas(studentId: string, subjectId: string): Promise<WeakArea[]>;
}

const WEAK_AREA_COLUMNS = "student_id, subject_id, topic, miss_count, correct_streak, last_seen_at";

const WeakAreaRowSchema = z.object({
  student_id: z.string(),
  subject_id: z.string(),
  topic: z.string(),
  miss_count: z.number().int().min(0),
  correct_streak: z.number().int().min(0),
  last_seen_at: z.string(),
});

function toWeakArea(row: z.infer<typeof WeakAreaRowSchema>): WeakArea {
  return {
    studentId: row.student_id,
    subjectId: row.subject_id,
    topic: row.topic,
    missCount: row.miss_count,
    correctStreak: row.correct_streak,
    lastSeenAt: row.last_seen_at,
  };
}

export function createSupabaseWeakAreaStore(sb: SupabaseClient): WeakAreaStore {
  return {
    async getWeakArea(studentId, subjectId, topic) {
      const { data, error } = await sb
        .from("weak_areas")
        .select(WEAK_AREA_COLUMNS)
        .eq("student_id", studentId)
        .eq("subject_id", subjectId)
        .eq("topic", topic)
        .maybeSingle();
      if (error) throw storeFailure("getWeakArea", error);
      const row = parseRow(WeakAreaRowSchema, data, "getWeakArea");
      return row ? toWeakArea(row) : null;
    },

    async upsertWeakArea(area) {
      const { error } = await sb.from("weak_areas").upsert(
        {
          student_id: area.studentId,
          subject_id: area.subjectId,
          topic: area.topic,
          miss_count: area.missCount,
          correct_streak: area.correctStreak,
          last_seen_at: area.lastSeenAt,
        },
        { onConflict: "student_id,subject_id,topic" }
      );
      if (error) throw storeFailure("upsertWeakArea", error);
    },

    async deleteWeakArea(studentId, subjectId, topic) {
      const { error } = await sb
        .from("weak_areas")
        .delete()
        .eq("student_id", studentId)
        .eq("subject_id", subjectId)
        .eq("topic", topic);
      if (error) throw storeFailure("deleteWeakArea", error);
    },

    async listWeakAreas(studentId, subjectId) {
      const { data, error } = await sb
        .from("weak_areas")
        .select(WEAK_AREA_COLUMNS)
        .eq("student_id", studentId)
        .eq("subject_id", subjectId);
      if (error) throw storeFailure("listWeakAreas", error);
      return parseRows(WeakAreaRowSchema, data, "listWeakAreas").map(toWeakArea);
    },
  };
}
