import { CollectorDecodeError } from '../../types/errors.js';

/**
 * Small decoding helpers shared by the collector adapters. Collector
 * output is untrusted JSON; everything is narrowed from `unknown`.
 */

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Parse the raw item value; the top level must be a JSON object. */
export function parseReportObject(value: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(value);
  } catch (err) {
    throw new CollectorDecodeError('collector value is not valid JSON', { cause: err });
  }
  if (!isObject(parsed)) {
    throw new CollectorDecodeError('collector value is not a JSON object');
  }
  return parsed;
}

/**
 * A list field. Missing/null → []. A bare object → [object] (PowerShell's
 * ConvertTo-Json collapses single-element arrays). Anything else → [].
 */
export function listField(obj: JsonObject, key: string): unknown[] {
  const v = obj[key];
  if (Array.isArray(v)) return v;
  if (isObject(v)) return [v];
  return [];
}

/** First present key among the aliases. */
export function pick(obj: JsonObject, keys: readonly string[]): unknown {
  for (const k of keys) {
    if (obj[k] !== undefined && obj[k] !== null) return obj[k];
  }
  return undefined;
}

export function asIp(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const ip = value.trim();
  return ip === '' ? null : ip;
}

export function asPort(value: unknown): number | null {
  if (typeof value === 'string' && value.trim() === '') return null;
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof n !== 'number' || !Number.isInteger(n) || n < 0 || n > 65535) return null;
  return n;
}

/** Connection count; missing or invalid counts as a single connection. */
export function asCount(value: unknown): number {
  const n = typeof value === 'string' ? Number(value.trim()) : value;
  return typeof n === 'number' && Number.isInteger(n) && n > 0 ? n : 1;
}
