import { randomUUID } from "node:crypto";
import { z } from "zod";
import type { EngineConfig } from "./config";
import type { LockProvider } from "./db-lock";
import type { ChunkStore } from "./stores/chunk-store";
import type { AssessmentStore } from "./stores/assessment-store";
import type { EntitlementProvider } from "./entitlements";
import type { AssessmentGenerator } from "./assessment-generator";
import type { LevelEngine } from "./level-engine";
import type { WeakAreaTracker } from "./weak-areas";
import type {
  AssessmentItem,
  AssessmentSubmission,
  MasteryLevel,
  StudentAssessmentItem,
  UnderstandingProfile,
} from "@/types/engine";
import { DEFAULT_LEVEL } from "./level-engine";
import { SubmittedAnswerSchema, scoreSubmission } from "./assessment-scoring";
import {
  AssessmentAlreadyIssuedError,
  AssessmentGenerationError,
  AssessmentNotFoundError,
  InvalidSubmissionError,
  NotEntitledError,
  SubmissionAlreadyRecordedError,
} from "./errors";
import { safeErrorForLog } from "./log-format";

export const ASSESSMENT_LOCK_SCOPE = "class-assessment";

export const SubmissionPayloadSchema = z.object({
  studentId: z.string().trim().min(1),
  classId: z.string().trim().min(1),
  subjectId: z.string().trim().min(1),
  answers: z.array(SubmittedAnswerSchema).max(50),
});

export type SubmissionPayload = z.infer<typeof SubmissionPayloadSchema>;

export type IssueOptions = {
  /** Level the set is pitched at; the set is shared by the whole class. */
  studentLevel?: MasteryLevel;
  itemCount?: number;
};

export type StudentAccess = {
  studentId: string;
  subjectId: string;
  classId: string;
};

export type SubmissionOutcome = {
  submission: AssessmentSubmission;
  profile: UnderstandingProfile;
  levelBefore: MasteryLevel;
  levelAfter: MasteryLevel;
  evaluated: boolean;
};

export type AssessmentService = {
  issueAssessment(classId: string, options?: IssueOptions): Promise<AssessmentItem[]>;
  getAssessmentForStudent(access: StudentAccess): Promise<StudentAssessmentItem[]>;
  submitAssessment(payload: SubmissionPayload): Promise<SubmissionOutcome>;
  getSubmissionHistory(studentId: string): Promise<AssessmentSubmission[]>;
};

type AssessmentServiceDeps = {
  chunks: ChunkStore;
  assessments: AssessmentStore;
  generator: AssessmentGenerator;
  levels: LevelEngine;
  weakAreas: WeakAreaTracker;
  entitlements: EntitlementProvider;
  locks: LockProvider;
  config: EngineConfig;
  now?: () => Date;
  newSubmissionId?: () => string;
};

function withoutAnswer(item: AssessmentItem): StudentAssessmentItem {
  return {
    itemId: item.itemId,
    classId: item.classId,
    position: item.position,
    difficultyTier: item.difficultyTier,
    targetLevel: item.targetLevel,
    topic: item.topic,
    questionText: item.questionText,
    sourceChunkIds: item.sourceChunkIds,
  };
}

export function createAssessmentService(deps: AssessmentServiceDeps): AssessmentService {
  const { chunks, assessments, generator, levels, weakAreas, entitlements, locks, config } = deps;
  const now = deps.now ?? (() => new Date());
  const newSubmissionId = deps.newSubmissionId ?? randomUUID;

  async function requireEntitlement(access: StudentAccess) {
    const allowed = await entitlements.entitledClassIds(access.studentId, access.subjectId);
    if (!allowed.has(access.classId)) throw new NotEntitledError(access.studentId, access.classId);
  }

  async function requireIssuedItems(classId: string) {
    const items = await assessments.getIssuedItems(classId);
    if (!items || !items.length) throw new AssessmentNotFoundError(classId);
    return items;
  }

  /**
   * The insert above claims the (student, class) slot. If the score cannot be
   * applied to the profile the row is removed again so the student can resubmit.
   */
  async function recordLevelOrWithdraw(submission: AssessmentSubmission) {
    try {
      return await levels.recordOutcome(submission.studentId, submission.subjectId, submission.rawScore);
    } catch (error) {
      console.error("[assessment] level update failed, withdrawing submission", {
        studentId: submission.studentId,
        classId: submission.classId,
        submissionId: submission.submissionId,
        error: safeErrorForLog(error),
      });
      await assessments.deleteSubmission(submission.submissionId).catch((cleanupError: unknown) => {
        console.error("[assessment] failed to withdraw submission", {
          submissionId: submission.submissionId,
          error: safeErrorForLog(cleanupError),
        });
      });
      throw error;
    }
  }

  return {
    async issueAssessment(classId, options = {}) {
      return locks.withLock(ASSESSMENT_LOCK_SCOPE, classId, async () => {
        if (await assessments.getIssuedItems(classId)) {
          throw new AssessmentAlreadyIssuedError(classId);
        }
        const classChunks = await chunks.listActiveChunks(classId);
        const subjectId = classChunks[0]?.subjectId;
        if (!subjectId) {
          throw new AssessmentGenerationError(`Class ${classId} has no indexed transcript`);
        }

        const studentLevel = options.studentLevel ?? DEFAULT_LEVEL;
        const items = await generator.generate(classId, classChunks, studentLevel, {
          itemCount: options.itemCount,
        });
        await assessments.issueItems(classId, subjectId, items);
        console.info("[assessment] issued", {
          classId,
          subjectId,
          studentLevel,
          items: items.length,
        });
        return items;
      });
    },

    async getAssessmentForStudent(access) {
      await requireEntitlement(access);
      const items = await requireIssuedItems(access.classId);
      return items.map(withoutAnswer);
    },

    async submitAssessment(payload) {
      const parsed = SubmissionPayloadSchema.safeParse(payload);
      if (!parsed.success) {
        const detail = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
        throw new InvalidSubmissionError(`Invalid submission: ${detail}`);
      }
      const { studentId, classId, subjectId, answers } = parsed.data;

      await requireEntitlement({ studentId, subjectId, classId });
      const items = await requireIssuedItems(classId);
      if (await assessments.getSubmission(studentId, classId)) {
        throw new SubmissionAlreadyRecordedError(studentId, classId);
      }

      const { rawScore, perItemResults } = scoreSubmission(items, answers, config.assessment.tierWeights);
      const submission: AssessmentSubmission = {
        submissionId: newSubmissionId(),
        studentId,
        classId,
        subjectId,
        perItemResults,
        rawScore,
        submittedAt: now().toISOString(),
      };
      await assessments.insertSubmission(submission);

      const outcome = await recordLevelOrWithdraw(submission);
      for (const result of perItemResults) {
        if (result.correct) await weakAreas.recordSuccess(studentId, subjectId, result.topic);
        else await weakAreas.recordMiss(studentId, subjectId, result.topic);
      }

      console.info("[assessment] submission recorded", {
        studentId,
        classId,
        rawScore,
        evaluated: outcome.evaluated,
        levelBefore: outcome.levelBefore,
        levelAfter: outcome.levelAfter,
      });

      return {
        submission,
        profile: outcome.profile,
        levelBefore: outcome.levelBefore,
        levelAfter: outcome.levelAfter,
        evaluated: outcome.evaluated,
      };
    },

    async getSubmissionHistory(studentId) {
      return assessments.listSubmissions(studentId);
    },
  };
}
