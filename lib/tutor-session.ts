import { randomUUID } from "node:crypto";
import type { EngineConfig, FallbackMode } from "./config";
import type { TextGenerator } from "./generation";
import type { EntitlementProvider } from "./entitlements";
import type { LevelEngine } from "./level-engine";
import type { RetrievalEngine, RetrievalReason, RetrievalResult } from "./retrieval";
import type { TutorSessionStore } from "./stores/tutor-session-store";
import type { WeakAreaTracker } from "./weak-areas";
import type { MasteryLevel, ScoredChunk, TutorSession, TutorTurn, TurnOutcome } from "@/types/engine";
import { KeyedMutex } from "./keyed-lock";
import { callBackend } from "./retry";
import { normalizeTopic } from "./weak-areas";
import { deriveTopic } from "./topic-detection";
import {
  DEGRADED_NOTICE,
  FILTERED_NOTICE,
  GENERAL_ANSWER_DISCLOSURE,
  NOT_ENOUGH_CONTENT_NOTICE,
  NO_ACCESS_NOTICE,
  buildGeneralAnswerPrompt,
  buildTutorPrompt,
} from "./tutor-prompts";
import {
  BackendUnavailableError,
  ContentFilteredError,
  GenerationBackendFailure,
  InvalidRequestError,
  SessionNotFoundError,
  StoreError,
  isTransientBackendError,
} from "./errors";
import { previewForLog, safeErrorForLog } from "./log-format";

const MAX_QUESTION_CHARS = 4_000;
const TURN_APPEND_ATTEMPTS = 3;

export type AskRequest = {
  studentId: string;
  subjectId: string;
  question: string;
  sessionId?: string;
  /** Topic for weak-area bookkeeping; derived from the question when absent. */
  topic?: string;
};

export type Citation = {
  chunkId: string;
  classId: string;
  ordinal: number;
  score: number;
};

export type FallbackReason = Exclude<RetrievalReason, "grounded">;
export type DegradedReason = "backend_unavailable" | "content_filtered";

type AnswerBase = {
  sessionId: string;
  turnIndex: number;
  text: string;
  level: MasteryLevel;
  topic: string;
};

export type TutorAnswer =
  | (AnswerBase & { kind: "grounded"; citations: Citation[] })
  | (AnswerBase & { kind: "fallback"; reason: FallbackReason; mode: FallbackMode })
  | (AnswerBase & { kind: "degraded"; reason: DegradedReason });

export type TutorSessionManager = {
  ask(request: AskRequest): Promise<TutorAnswer>;
  startSession(studentId: string, subjectId: string): Promise<TutorSession>;
  listSessions(studentId: string): Promise<TutorSession[]>;
  getSessionTurns(sessionId: string, studentId: string): Promise<TutorTurn[]>;
};

type TutorSessionDeps = {
  sessions: TutorSessionStore;
  retrieval: RetrievalEngine;
  generator: TextGenerator;
  levels: LevelEngine;
  weakAreas: WeakAreaTracker;
  entitlements: EntitlementProvider;
  config: EngineConfig;
  mutex?: KeyedMutex;
  now?: () => Date;
  newSessionId?: () => string;
};

type TurnDraft = {
  text: string;
  outcome: TurnOutcome;
  grounded: boolean;
  retrievedChunkIds: string[];
};

/** Which backend failures end a turn as degraded; anything else propagates. */
export function degradedReason(error: unknown): DegradedReason | null {
  if (error instanceof ContentFilteredError) return "content_filtered";
  if (
    isTransientBackendError(error) ||
    error instanceof BackendUnavailableError ||
    error instanceof GenerationBackendFailure
  ) {
    return "backend_unavailable";
  }
  return null;
}

function toCitation({ chunk, score }: ScoredChunk): Citation {
  return { chunkId: chunk.chunkId, classId: chunk.classId, ordinal: chunk.ordinal, score };
}

export function createTutorSessionManager(deps: TutorSessionDeps): TutorSessionManager {
  const { sessions, retrieval, generator, levels, weakAreas, entitlements, config } = deps;
  const mutex = deps.mutex ?? new KeyedMutex();
  const now = deps.now ?? (() => new Date());
  const newSessionId = deps.newSessionId ?? randomUUID;

  async function startSession(studentId: string, subjectId: string): Promise<TutorSession> {
    if (!studentId.trim() || !subjectId.trim()) {
      throw new InvalidRequestError("studentId and subjectId are required");
    }
    const session: TutorSession = {
      sessionId: newSessionId(),
      studentId,
      subjectId,
      createdAt: now().toISOString(),
    };
    await sessions.createSession(session);
    return session;
  }

  async function ownedSession(sessionId: string, studentId: string): Promise<TutorSession> {
    const session = await sessions.getSession(sessionId);
    // another student's session is reported as missing
    if (!session || session.studentId !== studentId) throw new SessionNotFoundError(sessionId);
    return session;
  }

  async function generateText(prompt: string, context: string[], label: string): Promise<string> {
    return callBackend(() => generator.generate(prompt, context), config.backend, label);
  }

  /** Append the turn at the next free index; a concurrent writer on another instance bumps us along. */
  async function appendTurn(
    sessionId: string,
    fields: Omit<TutorTurn, "sessionId" | "turnIndex" | "createdAt">
  ): Promise<TutorTurn> {
    return mutex.run(`turn:${sessionId}`, async () => {
      for (let attempt = 1; attempt <= TURN_APPEND_ATTEMPTS; attempt++) {
        const [last] = await sessions.listTurns(sessionId, 1);
        const turn: TutorTurn = {
          ...fields,
          sessionId,
          turnIndex: last ? last.turnIndex + 1 : 0,
          createdAt: now().toISOString(),
        };
        if (await sessions.insertTurn(turn)) return turn;
        console.warn("[tutor] turn index taken; retrying", { sessionId, turnIndex: turn.turnIndex, attempt });
      }
      throw new StoreError("appendTurn", `could not claim a turn index in session ${sessionId}`);
    });
  }

  async function fallbackDraft(
    result: RetrievalResult,
    reason: FallbackReason,
    level: MasteryLevel,
    question: string,
    history: TutorTurn[]
  ): Promise<TurnDraft> {
    const base = { grounded: false, retrievedChunkIds: [] };
    if (reason === "no_entitled_content") {
      return { ...base, outcome: "fallback", text: NO_ACCESS_NOTICE };
    }
    if (config.tutor.fallbackMode === "refuse") {
      return { ...base, outcome: "fallback", text: NOT_ENOUGH_CONTENT_NOTICE };
    }
    const { prompt, context } = buildGeneralAnswerPrompt({ level, question, history });
    const answer = await generateText(prompt, context, "tutor general answer");
    console.info("[tutor] general fallback answer", { topScore: result.topScore });
    return { ...base, outcome: "fallback", text: `${GENERAL_ANSWER_DISCLOSURE}\n\n${answer}` };
  }

  return {
    startSession,

    async ask(request) {
      const { studentId, subjectId } = request;
      const question = request.question.trim();
      if (!studentId.trim() || !subjectId.trim()) {
        throw new InvalidRequestError("studentId and subjectId are required");
      }
      if (!question) throw new InvalidRequestError("Question is empty");
      if (question.length > MAX_QUESTION_CHARS) {
        throw new InvalidRequestError(`Question exceeds ${MAX_QUESTION_CHARS} characters`);
      }

      let session: TutorSession;
      if (request.sessionId) {
        session = await ownedSession(request.sessionId, studentId);
        if (session.subjectId !== subjectId) {
          throw new InvalidRequestError(`Session ${session.sessionId} belongs to another subject`);
        }
      } else {
        session = await startSession(studentId, subjectId);
      }

      const profile = await levels.getOrCreateProfile(studentId, subjectId);
      const level = profile.level;
      const topic = normalizeTopic(request.topic ?? deriveTopic(question));
      const allowedClassIds = await entitlements.entitledClassIds(studentId, subjectId);
      const history = config.tutor.historyTurns > 0 ? await sessions.listTurns(session.sessionId, config.tutor.historyTurns) : [];

      let draft: TurnDraft;
      let answerMeta:
        | { kind: "grounded"; citations: Citation[] }
        | { kind: "fallback"; reason: FallbackReason; mode: FallbackMode }
        | { kind: "degraded"; reason: DegradedReason };
      let retrievalReason: RetrievalReason | null = null;

      try {
        const result = await retrieval.retrieve(question, { subjectId, allowedClassIds });
        retrievalReason = result.reason;
        if (result.reason === "grounded") {
          const { prompt, context } = buildTutorPrompt({ level, question, chunks: result.chunks, history });
          const text = await generateText(prompt, context, "tutor answer");
          draft = {
            text,
            outcome: "grounded",
            grounded: true,
            retrievedChunkIds: result.chunks.map(({ chunk }) => chunk.chunkId),
          };
          answerMeta = { kind: "grounded", citations: result.chunks.map(toCitation) };
        } else {
          draft = await fallbackDraft(result, result.reason, level, question, history);
          answerMeta = { kind: "fallback", reason: result.reason, mode: config.tutor.fallbackMode };
        }
      } catch (error) {
        const reason = degradedReason(error);
        if (!reason) throw error;
        console.error("[tutor] turn degraded", {
          studentId,
          sessionId: session.sessionId,
          reason,
          question: previewForLog(question, 80),
          error: safeErrorForLog(error),
        });
        draft = {
          text: reason === "content_filtered" ? FILTERED_NOTICE : DEGRADED_NOTICE,
          outcome: "degraded",
          grounded: false,
          retrievedChunkIds: [],
        };
        answerMeta = { kind: "degraded", reason };
      }

      const turn = await appendTurn(session.sessionId, {
        queryText: question,
        topic,
        retrievedChunkIds: draft.retrievedChunkIds,
        grounded: draft.grounded,
        outcome: draft.outcome,
        responseText: draft.text,
        levelAtTurn: level,
      });

      if (draft.outcome === "grounded") {
        await weakAreas.recordSuccess(studentId, subjectId, topic);
      } else if (
        draft.outcome === "fallback" &&
        (retrievalReason === "below_confidence" || retrievalReason === "no_content")
      ) {
        await weakAreas.recordMiss(studentId, subjectId, topic);
      }

      console.info("[tutor] turn answered", {
        studentId,
        sessionId: session.sessionId,
        turnIndex: turn.turnIndex,
        outcome: draft.outcome,
        level,
        topic,
        citations: draft.retrievedChunkIds.length,
      });

      const base: AnswerBase = {
        sessionId: session.sessionId,
        turnIndex: turn.turnIndex,
        text: draft.text,
        level,
        topic,
      };
      return { ...base, ...answerMeta };
    },

    async listSessions(studentId) {
      return sessions.listSessions(studentId);
    },

    async getSessionTurns(sessionId, studentId) {
      await ownedSession(sessionId, studentId);
      return sessions.listTurns(sessionId);
    },
  };
}
