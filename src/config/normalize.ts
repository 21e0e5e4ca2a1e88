/**
 * Config Normalization
 *
 * Reads typed fields out of loosely-typed scenario mappings. Each field is
 * declared as an ordered list of [candidateKey, parser] pairs; the first key
 * that is present and parses wins, otherwise the fallback applies. Precedence
 * lives in the candidate lists, not in branching code.
 *
 * Normalization never throws: absent, null or unparsable values fall through.
 *
 * @module config/normalize
 */

import type { RawConfigMap } from './schema/index.js';

// =============================================================================
// Types
// =============================================================================

/** Returns the parsed value, or undefined to fall through */
export type FieldParser<T> = (value: unknown) => T | undefined;

export type FieldCandidate<T> = readonly [key: string, parse: FieldParser<T>];

// =============================================================================
// Parsers
// =============================================================================

function toFiniteNumber(value: unknown): number | undefined {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (typeof value === 'boolean') {
    return value ? 1 : 0;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
  }
  return undefined;
}

/** Integer cast: truncates toward zero */
export const asInteger: FieldParser<number> = (value) => {
  const parsed = toFiniteNumber(value);
  return parsed === undefined ? undefined : Math.trunc(parsed);
};

export const asNumber: FieldParser<number> = (value) => toFiniteNumber(value);

export const asString: FieldParser<string> = (value) => {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
};

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolve a field against its ordered candidates.
 */
export function resolveField<T>(
  raw: RawConfigMap,
  candidates: readonly FieldCandidate<T>[],
  fallback: T
): T {
  for (const [key, parse] of candidates) {
    if (!Object.prototype.hasOwnProperty.call(raw, key)) continue;
    const value = raw[key];
    if (value === null || value === undefined) continue;
    const parsed = parse(value);
    if (parsed !== undefined) return parsed;
  }
  return fallback;
}

/**
 * Like resolveField, but returns undefined when no candidate matches.
 */
export function resolveOptionalField<T>(
  raw: RawConfigMap,
  candidates: readonly FieldCandidate<T>[]
): T | undefined {
  return resolveField<T | undefined>(raw, candidates, undefined);
}
