import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { AssessmentItem, AssessmentSubmission } from "@/types/engine";
import { AssessmentAlreadyIssuedError, SubmissionAlreadyRecordedError } from "../errors";
import {
  DifficultyTierSchema,
  MasteryLevelSchema,
  isUniqueViolation,
  parseRow,
  parseRows,
  storeFailure,
} from "./shared";

export interface AssessmentStore {
  /** Items issued for the class in position order, or null when nothing was issued yet. */
  getIssuedItems(classId: string): Promise<AssessmentItem[] | null>;
  /** Issue the full set in one transaction. Fails with AssessmentAlreadyIssuedError on a second issue. */
  issueItems(classId: string, subjectId: string, items: AssessmentItem[]): Promise<void>;
  /** Fails with SubmissionAlreadyRecordedError when the student already submitted for the class. */
  insertSubmission(submission: AssessmentSubmission): Promise<void>;
  /** Withdraws a submission whose score never reached the student's profile. */
  deleteSubmission(submissionId: string): Promise<void>;
  getSubmission(studentId: string, classId: string): Promise<AssessmentSubmission | null>;
  /** Newest first. */
  listSubmissions(studentId: string): Promise<AssessmentSubmission[]>;
}

const ITEM_COLUMNS =
  "item_id, class_id, position, difficulty_tier, target_level, topic, question_text, correct_answer, explanation, source_chunk_ids";
const SUBMISSION_COLUMNS = "submission_id, student_id, class_id, subject_id, per_item_results, raw_score, submitted_at";

const ItemRowSchema = z.object({
  item_id: z.string(),
  class_id: z.string(),
  position: z.number().int(),
  difficulty_tier: DifficultyTierSchema,
  target_level: MasteryLevelSchema,
  topic: z.string(),
  question_text: z.string(),
  correct_answer: z.string(),
  explanation: z.string().nullable(),
  source_chunk_ids: z.array(z.string()),
});

const ItemResultSchema = z.object({
  itemId: z.string(),
  difficultyTier: DifficultyTierSchema,
  topic: z.string(),
  answer: z.string().nullable(),
  correct: z.boolean(),
});

const SubmissionRowSchema = z.object({
  submission_id: z.string(),
  student_id: z.string(),
  class_id: z.string(),
  subject_id: z.string(),
  per_item_results: z.array(ItemResultSchema),
  raw_score: z.number().min(0).max(1),
  submitted_at: z.string(),
});

function toItem(row: z.infer<typeof ItemRowSchema>): AssessmentItem {
  return {
    itemId: row.item_id,
    classId: row.class_id,
    position: row.position,
    difficultyTier: row.difficulty_tier,
    targetLevel: row.target_level,
    topic: row.topic,
    questionText: row.question_text,
    correctAnswer: row.correct_answer,
    explanation: row.explanation,
    sourceChunkIds: row.source_chunk_ids,
  };
}

function toSubmission(row: z.infer<typeof SubmissionRowSchema>): AssessmentSubmission {
  return {
    submissionId: row.submission_id,
    studentId: row.student_id,
    classId: row.class_id,
    subjectId: row.subject_id,
    perItemResults: row.per_item_results,
    rawScore: row.raw_score,
    submittedAt: row.submitted_at,
  };
}

export function createSupabaseAssessmentStore(sb: SupabaseClient): AssessmentStore {
  return {
    async getIssuedItems(classId) {
      const set = await sb.from("assessment_sets").select("class_id").eq("class_id", classId).maybeSingle();
      if (set.error) throw storeFailure("getIssuedItems", set.error);
      if (!set.data) return null;
      const { data, error } = await sb
        .from("assessment_items")
        .select(ITEM_COLUMNS)
        .eq("class_id", classId)
        .order("position", { ascending: true });
      if (error) throw storeFailure("getIssuedItems", error);
      return parseRows(ItemRowSchema, data, "getIssuedItems").map(toItem);
    },

    async issueItems(classId, subjectId, items) {
      const { error } = await sb.rpc("issue_assessment", {
        p_class_id: classId,
        p_subject_id: subjectId,
        p_items: items.map((item) => ({
          item_id: item.itemId,
          position: item.position,
          difficulty_tier: item.difficultyTier,
          target_level: item.targetLevel,
          topic: item.topic,
          question_text: item.questionText,
          correct_answer: item.correctAnswer,
          explanation: item.explanation,
          source_chunk_ids: item.sourceChunkIds,
        })),
      });
      if (error) {
        if (isUniqueViolation(error)) throw new AssessmentAlreadyIssuedError(classId);
        throw storeFailure("issueItems", error);
      }
    },

    async insertSubmission(submission) {
      const { error } = await sb.from("assessment_submissions").insert({
        submission_id: submission.submissionId,
        student_id: submission.studentId,
        class_id: submission.classId,
        subject_id: submission.subjectId,
        per_item_results: submission.perItemResults,
        raw_score: submission.rawScore,
        submitted_at: submission.submittedAt,
      });
      if (error) {
        if (isUniqueViolation(error)) {
          throw new SubmissionAlreadyRecordedError(submission.studentId, submission.classId);
        }
        throw storeFailure("insertSubmission", error);
      }
    },

    async deleteSubmission(submissionId) {
      const { error } = await sb.from("assessment_submissions").delete().eq("submission_id", submissionId);
      if (error) throw storeFailure("deleteSubmission", error);
    },

    async getSubmission(studentId, classId) {
      const { data, error } = await sb
        .from("assessment_submissions")
        .select(SUBMISSION_COLUMNS)
        .eq("student_id", studentId)
        .eq("class_id", classId)
        .maybeSingle();
      if (error) throw storeFailure("getSubmission", error);
      const row = parseRow(SubmissionRowSchema, data, "getSubmission");
      return row ? toSubmission(row) : null;
    },

    async listSubmissions(studentId) {
      const { data, error } = await sb
        .from("assessment_submissions")
        .select(SUBMISSION_COLUMNS)
        .eq("student_id", studentId)
        .order("submitted_at", { ascending: false });
      if (error) throw storeFailure("listSubmissions", error);
      return parseRows(SubmissionRowSchema, data, "listSubmissions").map(toSubmission);
    },
  };
}
