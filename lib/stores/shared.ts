import type { PostgrestError } from "@supabase/supabase-js";
import { z } from "zod";
import { StoreError } from "../errors";

export const UNIQUE_VIOLATION_CODE = "23505";

export const MasteryLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
]);

export const DifficultyTierSchema = z.enum(["below", "at", "above"]);

export function isUniqueViolation(error: PostgrestError | null): boolean {
  if (!error) return false;
  if (error.code === UNIQUE_VIOLATION_CODE) return true;
  return /duplicate key/i.test(error.message ?? "");
}

export function storeFailure(operation: string, error: PostgrestError): StoreError {
  console.error(`[store] ${operation} failed`, {
    code: error.code,
    message: error.message,
    details: error.details,
  });
  return new StoreError(operation, error.message, error.code ?? null, error);
}

/** Parse PostgREST rows; a row of the wrong shape raises StoreError. */
export function parseRows<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, rows: unknown, operation: string): T[] {
  const list: unknown[] = Array.isArray(rows) ? rows : [];
  return list.map((row, idx) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new StoreError(operation, `row ${idx} has an unexpected shape (${detail})`);
    }
    return parsed.data;
  });
}

export function parseRow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, row: unknown, operation: string): T | null {
  if (row == null) return null;
  const [parsed] = parseRows(schema, [row], operation);
  return parsed ?? null;
}

/** pgvector accepts the bracketed text form over PostgREST. */
export function toVectorLiteral(vector: readonly number[]): string {
  return `[${vector.join(",")}]`;
}
