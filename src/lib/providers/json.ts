import { ProviderError } from './errors';

export type JsonRecord = Record<string, unknown>;

export function isJsonRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse a JSON API body, expecting an object at the top level
 *
 * @throws ProviderError when the body is not a JSON object
 */
export function decodeJsonObject(body: string, provider: string): JsonRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new ProviderError(`${provider} decode failed: ${cause.message}`, provider, cause);
  }

  if (!isJsonRecord(parsed)) {
    throw new ProviderError(`${provider} decode failed: expected a JSON object`, provider);
  }

  return parsed;
}

/**
 * String field, or '' when absent, null or not a string
 */
export function readString(value: unknown): string {
  return typeof value === 'string' ? value : '';
}

/**
 * Non-negative integer field. Accepts numbers and numeric strings;
 * anything else reads as 0.
 */
export function readCount(value: unknown): number {
  const count = typeof value === 'number' ? value : typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(count) && count > 0 ? Math.trunc(count) : 0;
}

/**
 * Object entries of an array field; a missing list or non-object entries are skipped
 */
export function readRecords(value: unknown): JsonRecord[] {
  return Array.isArray(value) ? value.filter(isJsonRecord) : [];
}
