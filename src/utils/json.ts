// This utility module keeps structural JSON checks and content rendering explicit.

// This guard accepts plain mappings and rejects arrays, null, and class instances such as Date.
export function isRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }

  const prototype = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}

// This helper renders arbitrary handler output as stable, human-readable JSON text.
export function stringifyForContent(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }

  return JSON.stringify(value, null, 2) ?? String(value);
}
