/**
 * JSON Utilities
 *
 * Parsing helpers for payloads we do not control: model replies, SSE
 * event lines, REST bodies. Callers validate the result with a zod schema.
 */

/**
 * Parse a JSON string, returning undefined instead of throwing.
 *
 * @param onError - Optional callback for logging parse errors
 */
export function parseJson(
  json: string | null | undefined,
  onError?: (error: Error, rawValue: string) => void
): unknown {
  if (json === null || json === undefined) {
    return undefined;
  }

  try {
    const parsed: unknown = JSON.parse(json);
    return parsed;
  } catch (error) {
    if (onError && error instanceof Error) {
      onError(error, json);
    }
    return undefined;
  }
}

/**
 * Pull the first `{...}` block out of a model reply and parse it.
 *
 * Models often wrap JSON in prose or code fences, so the reply is scanned
 * for the outermost braces rather than parsed whole.
 *
 * @example
 * ```typescript
 * extractJsonObject('Sure! {"source": "aws_docs"} Hope that helps');
 * // => { source: 'aws_docs' }
 * ```
 */
export function extractJsonObject(text: string): unknown {
  const match = text.match(/\{[\s\S]*\}/);
  if (!match) {
    return undefined;
  }
  return parseJson(match[0]);
}

/**
 * Narrow an unknown value to a plain object record.
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
