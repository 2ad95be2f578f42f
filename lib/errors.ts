export type TutoringErrorCode =
  | "invalid_transcript"
  | "indexing_failed"
  | "indexing_in_progress"
  | "backend_unavailable"
  | "rate_limited"
  | "backend_timeout"
  | "content_filtered"
  | "generation_failed"
  | "level_race"
  | "assessment_already_issued"
  | "assessment_generation_failed"
  | "assessment_not_found"
  | "submission_already_recorded"
  | "invalid_submission"
  | "invalid_request"
  | "not_entitled"
  | "session_not_found"
  | "lock_busy"
  | "store_error"
  | "config_error";

type TutoringErrorOptions = {
  status?: number;
  detail?: string;
  cause?: unknown;
};

export class TutoringError extends Error {
  readonly code: TutoringErrorCode;
  readonly status: number;
  readonly detail?: string;

  constructor(code: TutoringErrorCode, message: string, options: TutoringErrorOptions = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "TutoringError";
    this.code = code;
    this.status = options.status ?? 500;
    this.detail = options.detail;
  }
}

// ── Backend failures ─────────────────────────────────────────────────────────

export class BackendUnavailableError extends TutoringError {
  /** false for failures a retry cannot fix (bad credentials, malformed request) */
  readonly retryable: boolean;

  constructor(message = "Model backend is unavailable", cause?: unknown, retryable = true) {
    super("backend_unavailable", message, { status: 503, cause });
    this.name = "BackendUnavailableError";
    this.retryable = retryable;
  }
}

export class RateLimitedError extends TutoringError {
  readonly retryAfterMs: number | null;

  constructor(message = "Model backend rate limit reached", retryAfterMs: number | null = null, cause?: unknown) {
    super("rate_limited", message, { status: 429, cause });
    this.name = "RateLimitedError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class BackendTimeoutError extends TutoringError {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super("backend_timeout", `${label} timed out after ${timeoutMs}ms`, { status: 504 });
    this.name = "BackendTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class ContentFilteredError extends TutoringError {
  constructor(message = "The model backend filtered this content", cause?: unknown) {
    super("content_filtered", message, { status: 422, cause });
    this.name = "ContentFilteredError";
  }
}

export class GenerationBackendFailure extends TutoringError {
  constructor(message: string, cause?: unknown) {
    super("generation_failed", message, { status: 502, cause });
    this.name = "GenerationBackendFailure";
  }
}

export function isTransientBackendError(error: unknown): boolean {
  return (
    (error instanceof BackendUnavailableError && error.retryable) ||
    error instanceof RateLimitedError ||
    error instanceof BackendTimeoutError
  );
}

// ── Indexing ─────────────────────────────────────────────────────────────────

export class InvalidTranscriptError extends TutoringError {
  constructor(message: string) {
    super("invalid_transcript", message, { status: 400 });
    this.name = "InvalidTranscriptError";
  }
}

export class IndexingFailedError extends TutoringError {
  readonly classId: string;

  constructor(classId: string, detail?: string, cause?: unknown) {
    super("indexing_failed", `No transcript chunk could be embedded for class ${classId}`, {
      status: 502,
      detail,
      cause,
    });
    this.name = "IndexingFailedError";
    this.classId = classId;
  }
}

export class IndexingInProgressError extends TutoringError {
  readonly classId: string;

  constructor(classId: string) {
    super("indexing_in_progress", `Class ${classId} is already being indexed`, { status: 409 });
    this.name = "IndexingInProgressError";
    this.classId = classId;
  }
}

// ── Level engine ─────────────────────────────────────────────────────────────

export class LevelEvaluationRaceDetected extends TutoringError {
  constructor(studentId: string, subjectId: string, expectedVersion: number) {
    super(
      "level_race",
      `Profile ${studentId}/${subjectId} changed underneath version ${expectedVersion}`,
      { status: 409 }
    );
    this.name = "LevelEvaluationRaceDetected";
  }
}

// ── Assessments ──────────────────────────────────────────────────────────────

export class AssessmentAlreadyIssuedError extends TutoringError {
  readonly classId: string;

  constructor(classId: string) {
    super("assessment_already_issued", `An assessment was already issued for class ${classId}`, {
      status: 409,
    });
    this.name = "AssessmentAlreadyIssuedError";
    this.classId = classId;
  }
}

export class AssessmentGenerationError extends TutoringError {
  constructor(message: string, detail?: string, cause?: unknown) {
    super("assessment_generation_failed", message, { status: 502, detail, cause });
    this.name = "AssessmentGenerationError";
  }
}

export class AssessmentNotFoundError extends TutoringError {
  constructor(classId: string) {
    super("assessment_not_found", `No assessment has been issued for class ${classId}`, { status: 404 });
    this.name = "AssessmentNotFoundError";
  }
}

export class SubmissionAlreadyRecordedError extends TutoringError {
  constructor(studentId: string, classId: string) {
    super(
      "submission_already_recorded",
      `Student ${studentId} already submitted the assessment for class ${classId}`,
      { status: 409 }
    );
    this.name = "SubmissionAlreadyRecordedError";
  }
}

export class InvalidSubmissionError extends TutoringError {
  constructor(message: string) {
    super("invalid_submission", message, { status: 400 });
    this.name = "InvalidSubmissionError";
  }
}

// ── Access, sessions, infrastructure ─────────────────────────────────────────

export class InvalidRequestError extends TutoringError {
  constructor(message: string) {
    super("invalid_request", message, { status: 400 });
    this.name = "InvalidRequestError";
  }
}

export class NotEntitledError extends TutoringError {
  constructor(studentId: string, classId: string) {
    super("not_entitled", `Student ${studentId} has no access to class ${classId}`, { status: 403 });
    this.name = "NotEntitledError";
  }
}

export class SessionNotFoundError extends TutoringError {
  constructor(sessionId: string) {
    super("session_not_found", `Tutor session ${sessionId} was not found`, { status: 404 });
    this.name = "SessionNotFoundError";
  }
}

export class LockBusyError extends TutoringError {
  readonly scope: string;
  readonly key: string;

  constructor(scope: string, key: string) {
    super("lock_busy", `Lock ${scope}:${key} is held by another worker`, { status: 409 });
    this.name = "LockBusyError";
    this.scope = scope;
    this.key = key;
  }
}

export class StoreError extends TutoringError {
  readonly dbCode: string | null;

  constructor(operation: string, message: string, dbCode: string | null = null, cause?: unknown) {
    super("store_error", `${operation} failed: ${message}`, { status: 500, cause });
    this.name = "StoreError";
    this.dbCode = dbCode;
  }
}

export class ConfigError extends TutoringError {
  constructor(message: string, detail?: string) {
    super("config_error", message, { status: 500, detail });
    this.name = "ConfigError";
  }
}
