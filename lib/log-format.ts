export function previewForLog(value: string | null | undefined, max = 180): string | null {
  if (!value) return null;
  const trimmed = value.trim();
  if (!trimmed) return null;
  if (trimmed.length <= max) return trimmed;
  const overflow = trimmed.length - max;
  return `${trimmed.slice(0, max)}...(+${overflow} chars)`;
}

const STACK_TRIM_PATTERN = /\bat\s+/;

export function safeErrorForLog(error: unknown) {
  if (!error) return { message: null, name: null, code: null, stack: null, type: typeof error };
  if (error instanceof Error) {
    const code = (error as { code?: unknown }).code;
    return {
      message: error.message,
      name: error.name,
      code: typeof code === "string" ? code : null,
      stack: typeof error.stack === "string"
        ? error.stack.split("\n").slice(0, 6).map((line) => line.trim()).filter((line) => STACK_TRIM_PATTERN.test(line)).join(" | ")
        : null,
      type: "Error",
    };
  }
  if (typeof error === "object") {
    try {
      return { message: JSON.stringify(error), name: null, code: null, stack: null, type: "object" };
    } catch {
      return { message: "[unserializable object]", name: null, code: null, stack: null, type: "object" };
    }
  }
  return { message: String(error), name: null, code: null, stack: null, type: typeof error };
}
