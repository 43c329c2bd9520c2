// pattern: Functional Core

/**
 * Presence-checked readers for loosely typed provider documents.
 * Provider responses are treated as opaque JSON; every field is read through
 * one of these and an absent or mistyped field comes back as undefined.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readRecord(
  source: Record<string, unknown>,
  key: string,
): Record<string, unknown> | undefined {
  const value = source[key];
  return isRecord(value) ? value : undefined;
}

export function readArray(
  source: Record<string, unknown>,
  key: string,
): ReadonlyArray<unknown> | undefined {
  const value = source[key];
  return Array.isArray(value) ? value : undefined;
}

/**
 * Parse a JSON-encoded argument object.
 * Blank input is an empty object (no-argument calls send nothing);
 * invalid JSON or a non-object value yields undefined.
 */
export function parseJsonObject(text: string): Record<string, unknown> | undefined {
  if (text.trim() === '') {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return undefined;
  }

  return isRecord(parsed) ? parsed : undefined;
}
