import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { UnderstandingProfile } from "@/types/engine";
import { MasteryLevelSchema, isUniqueViolation, parseRow, parseRows, storeFailure } from "./shared";

export interface ProfileStore {
  getProfile(studentId: string, subjectId: string): Promise<UnderstandingProfile | null>;
  /** Insert a fresh profile. When one already exists, the stored profile is returned instead. */
  createProfile(profile: UnderstandingProfile): Promise<UnderstandingProfile>;
  /**
   * Compare-and-swap on `version`: writes `next` only while the stored version
   * still equals `expectedVersion`. Returns false when another writer got there first.
   */
  updateProfile(next: UnderstandingProfile, expectedVersion: number): Promise<boolean>;
}

const PROFILE_COLUMNS =
  "student_id, subject_id, level, previous_level, evaluation_window_count, window_scores, rolling_score, total_submissions, last_evaluated_at, version, created_at, updated_at";

const ProfileRowSchema = z.object({
  student_id: z.string(),
  subject_id: z.string(),
  level: MasteryLevelSchema,
  previous_level: MasteryLevelSchema.nullable(),
  evaluation_window_count: z.number().int().min(0),
  window_scores: z.array(z.number()).nullable(),
  rolling_score: z.number().nullable(),
  total_submissions: z.number().int().min(0),
  last_evaluated_at: z.string().nullable(),
  version: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

function toProfile(row: z.infer<typeof ProfileRowSchema>): UnderstandingProfile {
  return {
    studentId: row.student_id,
    subjectId: row.subject_id,
    level: row.level,
    previousLevel: row.previous_level,
    evaluationWindowCount: row.evaluation_window_count,
    windowScores: row.window_scores ?? [],
    rollingScore: row.rolling_score,
    totalSubmissions: row.total_submissions,
    lastEvaluatedAt: row.last_evaluated_at,
    version: row.version,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function mutableColumns(profile: UnderstandingProfile) {
  return {
    level: profile.level,
    previous_level: profile.previousLevel,
    evaluation_window_count: profile.evaluationWindowCount,
    window_scores: profile.windowScores,
    rolling_score: profile.rollingScore,
    total_submissions: profile.totalSubmissions,
    last_evaluated_at: profile.lastEvaluatedAt,
    version: profile.version,
    updated_at: profile.updatedAt,
  };
}

function toRow(profile: UnderstandingProfile) {
  return {
    student_id: profile.studentId,
    subject_id: profile.subjectId,
    ...mutableColumns(profile),
    created_at: profile.createdAt,
  };
}

export function createSupabaseProfileStore(sb: SupabaseClient): ProfileStore {
  const getProfile = async (studentId: string, subjectId: string) => {
    const { data, error } = await sb
      .from("understanding_profiles")
      .select(PROFILE_COLUMNS)
      .eq("student_id", studentId)
      .eq("subject_id", subjectId)
      .maybeSingle();
    if (error) throw storeFailure("getProfile", error);
    const row = parseRow(ProfileRowSchema, data, "getProfile");
    return row ? toProfile(row) : null;
  };

  return {
    getProfile,

    async createProfile(profile) {
      const { data, error } = await sb
        .from("understanding_profiles")
        .insert(toRow(profile))
        .select(PROFILE_COLUMNS)
        .single();
      if (error) {
        if (isUniqueViolation(error)) {
          const existing = await getProfile(profile.studentId, profile.subjectId);
          if (existing) return existing;
        }
        throw storeFailure("createProfile", error);
      }
      const row = parseRow(ProfileRowSchema, data, "createProfile");
      return row ? toProfile(row) : profile;
    },

    async updateProfile(next, expectedVersion) {
      const { data, error } = await sb
        .from("understanding_profiles")
        .update(mutableColumns(next))
        .eq("student_id", next.studentId)
        .eq("subject_id", next.subjectId)
        .eq("version", expectedVersion)
        .select("version");
      if (error) throw storeFailure("updateProfile", error);
      return parseRows(z.object({ version: z.number() }), data, "updateProfile").length > 0;
    },
  };
}
