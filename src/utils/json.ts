export type JsonParseResult = { ok: true; value: unknown } | { ok: false; error: string };

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function parseJson(value: string): JsonParseResult {
  try {
    return { ok: true, value: JSON.parse(value) as unknown };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/**
 * Strict parse first; otherwise the outermost `{ ... }` slice, for completions that wrap the
 * object in prose or a code fence.
 */
export function extractFirstJsonObject(text: string): JsonParseResult {
  const direct = parseJson(text.trim());
  if (direct.ok) {
    return direct;
  }

  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    return direct;
  }

  const sliced = parseJson(text.slice(start, end + 1));
  return sliced.ok ? sliced : direct;
}
