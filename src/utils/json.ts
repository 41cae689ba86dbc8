/**
 * JSON Utilities
 *
 * Safe JSON parsing with fallback for corrupted data. Callers validate the
 * parsed value with a zod schema; nothing here asserts a shape.
 */

/**
 * Safely parse a JSON string with fallback on error.
 *
 * Use this when parsing JSON from external sources (database, files, APIs)
 * where corruption is possible.
 *
 * @param json - The JSON string to parse (can be null/undefined)
 * @param fallback - Value to return if parsing fails
 *
 * @example
 * ```typescript
 * const parsed = QuestionsSchema.safeParse(safeJsonParse(row.questions_json, []));
 * ```
 */
export function safeJsonParse(json: string | null | undefined, fallback: unknown): unknown {
  if (json === null || json === undefined) {
    return fallback;
  }

  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch {
    return fallback;
  }
}

const FENCE_PATTERN = /```(?:json|JSON)?\s*\n?([\s\S]*?)```/;

/**
 * Pull the JSON payload out of a model response.
 *
 * Models often wrap JSON in a Markdown code fence, sometimes with prose
 * around it. Returns the fenced body when there is one, otherwise the
 * trimmed text.
 */
export function extractJsonPayload(text: string): string {
  const fenced = FENCE_PATTERN.exec(text);
  if (fenced?.[1] !== undefined) {
    return fenced[1].trim();
  }
  return text.trim();
}
