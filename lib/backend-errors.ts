import {
  BackendUnavailableError,
  ContentFilteredError,
  RateLimitedError,
  TutoringError,
  isTransientBackendError,
} from "./errors";

const RETRYABLE_STATUS_CODES = new Set([408, 409, 425, 429, 500, 502, 503, 504]);
const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "ECONNABORTED",
]);
const RETRYABLE_ERROR_PATTERN =
  /(timeout|timed out|503|502|bad gateway|service unavailable|temporary unavailable|socket hang up|connection reset|connection error|fetch failed|ECONNRESET|ECONNREFUSED)/i;
const CONTENT_FILTER_PATTERN = /(content[_\s-]?filter|content management policy|safety system)/i;

export function getErrorStatus(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = (error as { status?: unknown }).status;
  if (typeof status === "number") return status;
  const statusCode = (error as { statusCode?: unknown }).statusCode;
  if (typeof statusCode === "number") return statusCode;
  const responseStatus = (error as { response?: { status?: unknown } }).response?.status;
  if (typeof responseStatus === "number") return responseStatus;
  const nestedStatus = (error as { error?: { status?: unknown } }).error?.status;
  if (typeof nestedStatus === "number") return nestedStatus;
  return null;
}

export function getErrorCode(error: unknown): string | null {
  if (!error || typeof error !== "object") return null;
  const code = (error as { code?: unknown }).code;
  return typeof code === "string" ? code : null;
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  if (error && typeof error === "object") {
    const message = (error as { message?: unknown }).message;
    if (typeof message === "string") return message;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function getRetryAfterMs(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const headers = (error as { headers?: unknown }).headers;
  if (!headers || typeof headers !== "object") return null;
  const raw = (headers as Record<string, unknown>)["retry-after"];
  const seconds = typeof raw === "string" ? Number(raw) : NaN;
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : null;
}

export function isRetryableBackendError(error: unknown): boolean {
  if (isTransientBackendError(error)) return true;
  if (error instanceof TutoringError) return false;
  const status = getErrorStatus(error);
  if (status != null && RETRYABLE_STATUS_CODES.has(status)) return true;
  const code = getErrorCode(error);
  if (code && RETRYABLE_ERROR_CODES.has(code)) return true;
  const message = getErrorMessage(error);
  return RETRYABLE_ERROR_PATTERN.test(message);
}

/**
 * Map whatever the provider SDK threw onto the engine's backend taxonomy:
 * RateLimited, ContentFiltered, or BackendUnavailable for everything else.
 */
export function toBackendError(error: unknown, label: string): TutoringError {
  if (error instanceof TutoringError) return error;
  const status = getErrorStatus(error);
  const message = getErrorMessage(error);
  if (status === 429) {
    return new RateLimitedError(`${label}: ${message}`, getRetryAfterMs(error), error);
  }
  if (status === 400 && CONTENT_FILTER_PATTERN.test(message)) {
    return new ContentFilteredError(`${label}: ${message}`, error);
  }
  return new BackendUnavailableError(`${label}: ${message}`, error, isRetryableBackendError(error));
}
