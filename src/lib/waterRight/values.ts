import type { LandRecord, OrFallback, Quantity, SingleOrPair } from '../../types/waterRight';

const FLOAT_RE = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const UNSIGNED_INT_RE = /^\d+$/;
const LAND_RECORD_RE = /^(?<district>\D+)\s*(?<field>\d+)$/;
const MAX_FIELD_NUMBER = 0xffffffff;

export function parseStrictFloat(text: string): number | null {
  if (!FLOAT_RE.test(text)) return null;
  return Number(text);
}

export function parseUnsignedInt(text: string): number | null {
  if (!UNSIGNED_INT_RE.test(text)) return null;
  const value = Number(text);
  return Number.isSafeInteger(value) ? value : null;
}

export function expected<T>(value: T): OrFallback<T> {
  return { kind: 'expected', value };
}

export function fallback<T>(raw: string): OrFallback<T> {
  return { kind: 'fallback', raw };
}

export function single<A, B = A>(value: A): SingleOrPair<A, B> {
  return { kind: 'single', value };
}

export function pair<A, B = A>(first: A, second: B): SingleOrPair<A, B> {
  return { kind: 'pair', first, second };
}

export function quantity(value: number, unit: string): Quantity {
  return { value, unit };
}

/**
 * `"Hannover 12"` → `{ district: 'Hannover', field: 12 }`. Spaces are removed
 * before matching; text that does not match is kept verbatim as a fallback.
 */
export function parseLandRecord(text: string): OrFallback<LandRecord> {
  const match = LAND_RECORD_RE.exec(text.replace(/ /g, ''));
  if (match?.groups) {
    const field = parseUnsignedInt(match.groups.field);
    if (field !== null && field <= MAX_FIELD_NUMBER) {
      return expected({ district: match.groups.district, field });
    }
  }
  return fallback(text);
}
