/**
 * Narrowing helpers for loosely typed vendor payloads
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function readField(source: unknown, key: string): unknown {
  return isRecord(source) ? source[key] : undefined;
}

export function readString(source: unknown, key: string): string | undefined {
  const value = readField(source, key);
  return typeof value === 'string' ? value : undefined;
}

export function readBoolean(source: unknown, key: string): boolean | undefined {
  const value = readField(source, key);
  return typeof value === 'boolean' ? value : undefined;
}

export function readArray(source: unknown, key: string): unknown[] {
  const value = readField(source, key);
  return Array.isArray(value) ? value : [];
}

export function readNumber(source: unknown, key: string): number | undefined {
  const value = readField(source, key);
  return typeof value === 'number' ? value : undefined;
}
