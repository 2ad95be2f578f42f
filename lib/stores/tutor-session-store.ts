import type { SupabaseClient } from "@supabase/supabase-js";
import { z } from "zod";
import type { TutorSession, TutorTurn } from "@/types/engine";
import { MasteryLevelSchema, isUniqueViolation, parseRow, parseRows, storeFailure } from "./shared";

export interface TutorSessionStore {
  createSession(session: TutorSession): Promise<void>;
  getSession(sessionId: string): Promise<TutorSession | null>;
  /** Newest first. */
  listSessions(studentId: string): Promise<TutorSession[]>;
  /** Returns false when `turnIndex` is already taken in the session. */
  insertTurn(turn: TutorTurn): Promise<boolean>;
  /** Oldest first; with `limit`, the most recent `limit` turns, still oldest first. */
  listTurns(sessionId: string, limit?: number): Promise<TutorTurn[]>;
}

const SESSION_COLUMNS = "session_id, student_id, subject_id, created_at";
const TURN_COLUMNS =
  "session_id, turn_index, query_text, topic, retrieved_chunk_ids, grounded, outcome, response_text, level_at_turn, created_at";

const SessionRowSchema = z.object({
  session_id: z.string(),
  student_id: z.string(),
  subject_id: z.string(),
  created_at: z.string(),
});

const TurnRowSchema = z.object({
  session_id: z.string(),
  turn_index: z.number().int().min(0),
  query_text: z.string(),
  topic: z.string(),
  retrieved_chunk_ids: z.array(z.string()),
  grounded: z.boolean(),
  outcome: z.enum(["grounded", "fallback", "degraded"]),
  response_text: z.string(),
  level_at_turn: MasteryLevelSchema,
  created_at: z.string(),
});

function toSession(row: z.infer<typeof SessionRowSchema>): TutorSession {
  return {
    sessionId: row.session_id,
    studentId: row.student_id,
    subjectId: row.subject_id,
    createdAt: row.created_at,
  };
}

function toTurn(row: z.infer<typeof TurnRowSchema>): TutorTurn {
  return {
    sessionId: row.session_id,
    turnIndex: row.turn_index,
    queryText: row.query_text,
    topic: row.topic,
    retrievedChunkIds: row.retrieved_chunk_ids,
    grounded: row.grounded,
    outcome: row.outcome,
    responseText: row.response_text,
    levelAtTurn: row.level_at_turn,
    createdAt: row.created_at,
  };
}

export function createSupabaseTutorSessionStore(sb: SupabaseClient): TutorSessionStore {
  return {
    async createSession(session) {
      const { error } = await sb.from("tutor_sessions").insert({
        session_id: session.sessionId,
        student_id: session.studentId,
        subject_id: session.subjectId,
        created_at: session.createdAt,
      });
      if (error) throw storeFailure("createSession", error);
    },

    async getSession(sessionId) {
      const { data, error } = await sb
        .from("tutor_sessions")
        .select(SESSION_COLUMNS)
        .eq("session_id", sessionId)
        .maybeSingle();
      if (error) throw storeFailure("getSession", error);
      const row = parseRow(SessionRowSchema, data, "getSession");
      return row ? toSession(row) : null;
    },

    async listSessions(studentId) {
      const { data, error } = await sb
        .from("tutor_sessions")
        .select(SESSION_COLUMNS)
        .eq("student_id", studentId)
        .order("created_at", { ascending: false });
      if (error) throw storeFailure("listSessions", error);
      return parseRows(SessionRowSchema, data, "listSessions").map(toSession);
    },

    async insertTurn(turn) {
      const { error } = await sb.from("tutor_turns").insert({
        session_id: turn.sessionId,
        turn_index: turn.turnIndex,
        query_text: turn.queryText,
        topic: turn.topic,
        retrieved_chunk_ids: turn.retrievedChunkIds,
        grounded: turn.grounded,
        outcome: turn.outcome,
        response_text: turn.responseText,
        level_at_turn: turn.levelAtTurn,
        created_at: turn.createdAt,
      });
      if (error) {
        if (isUniqueViolation(error)) return false;
        throw storeFailure("insertTurn", error);
      }
      return true;
    },

    async listTurns(sessionId, limit) {
      let query = sb
        .from("tutor_turns")
        .select(TURN_COLUMNS)
        .eq("session_id", sessionId)
        .order("turn_index", { ascending: false });
      if (limit != null) query = query.limit(limit);
      const { data, error } = await query;
      if (error) throw storeFailure("listTurns", error);
      return parseRows(TurnRowSchema, data, "listTurns").map(toTurn).reverse();
    },
  };
}
