import { parseCount, toCount } from '../core/counts.js';

// Tolerant accessors over an untyped key/value tree. Every read has a default.

export type JsonRecord = Record<string, unknown>;

function isRecord(value: unknown): value is JsonRecord {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function asRecord(value: unknown): JsonRecord | null {
  return isRecord(value) ? value : null;
}

export function asArray(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

// Dotted path lookup; numeric segments index arrays ("actors.0.name")
export function readPath(value: unknown, path: string): unknown {
  let current: unknown = value;
  for (const segment of path.split('.')) {
    if (Array.isArray(current)) {
      const index = Number(segment);
      if (!Number.isInteger(index)) return undefined;
      current = current[index];
      continue;
    }
    const record = asRecord(current);
    if (!record) return undefined;
    current = record[segment];
  }
  return current;
}

// First path that resolves to something other than null/undefined/""
export function firstOf(value: unknown, paths: string[]): unknown {
  for (const path of paths) {
    const found = readPath(value, path);
    if (found !== undefined && found !== null && found !== '') return found;
  }
  return undefined;
}

export function asString(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  const record = asRecord(value);
  if (record && typeof record.text === 'string') return record.text;
  return '';
}

// Numbers, "1.2K" strings, or wrappers such as { count } / { total_count }
export function asCount(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? toCount(value) : null;
  if (typeof value === 'string') {
    const parsed = parseCount(value);
    return parsed === null ? null : toCount(parsed);
  }
  const record = asRecord(value);
  if (record) {
    for (const key of ['count', 'total_count', 'totalCount', 'value']) {
      const nested = asCount(record[key]);
      if (nested !== null) return nested;
    }
  }
  return null;
}

export function countOf(value: unknown, paths: string[]): number {
  for (const path of paths) {
    const count = asCount(readPath(value, path));
    if (count !== null) return count;
  }
  return 0;
}

// First path that yields a non-empty string
export function stringOf(value: unknown, paths: string[]): string {
  for (const path of paths) {
    const text = asString(readPath(value, path));
    if (text) return text;
  }
  return '';
}
