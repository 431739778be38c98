import type { Duration, DurationUnit, OrFallback, Rate, RateRecord } from '../../types/waterRight';
import { parseStrictFloat } from './values';

const SECONDS_PER_UNIT: Record<DurationUnit, number> = {
  seconds: 1,
  minutes: 60,
  hours: 60 * 60,
  days: 24 * 60 * 60,
  weeks: 7 * 24 * 60 * 60,
  months: 30 * 24 * 60 * 60,
  years: 365 * 24 * 60 * 60,
};

const TIME_CODES: Record<string, DurationUnit> = {
  s: 'seconds',
  m: 'minutes',
  min: 'minutes',
  h: 'hours',
  d: 'days',
  w: 'weeks',
  wo: 'weeks',
  M: 'months',
  mo: 'months',
  a: 'years',
  y: 'years',
};

const UNIT_CODE: Record<DurationUnit, string> = {
  seconds: 's',
  minutes: 'm',
  hours: 'h',
  days: 'd',
  weeks: 'w',
  months: 'mo',
  years: 'a',
};

const FACTOR_UNIT_CODE: Record<DurationUnit, string> = {
  ...UNIT_CODE,
  weeks: 'wo',
};

const RATE_UNIT_RE = /^(?<measurement>[^/]+)\/(?<factor>[\d.,]*)(?<time>\w+)$/;
const DURATION_CODE_RE = /^(\d*(?:\.\d+)?)([A-Za-z]+)$/;

export function durationSeconds(duration: Duration): number {
  return duration.factor * SECONDS_PER_UNIT[duration.unit];
}

export function compareDurations(a: Duration, b: Duration): number {
  return durationSeconds(a) - durationSeconds(b);
}

export function timeCodeToUnit(code: string): DurationUnit | null {
  return Object.prototype.hasOwnProperty.call(TIME_CODES, code) ? TIME_CODES[code] : null;
}

/** `{ years, 1 }` → `a`, `{ weeks, 2 }` → `2wo`. */
export function serializeDuration(duration: Duration): string {
  if (duration.factor === 1) return UNIT_CODE[duration.unit];
  return `${duration.factor}${FACTOR_UNIT_CODE[duration.unit]}`;
}

export function parseDuration(code: string): Duration | null {
  const match = DURATION_CODE_RE.exec(code.trim());
  if (!match) return null;
  const unit = timeCodeToUnit(match[2]);
  if (!unit) return null;
  const factor = match[1] === '' ? 1 : parseStrictFloat(match[1]);
  if (factor === null) return null;
  return { unit, factor };
}

/**
 * Parses `"<value> <measurement>/[factor]<time-code>"`, e.g. `12 m³/2a`.
 * Returns null when the text does not follow that grammar.
 */
export function parseRate(text: string): Rate | null {
  const space = text.indexOf(' ');
  if (space < 0) return null;

  const value = parseStrictFloat(text.slice(0, space));
  if (value === null) return null;

  const match = RATE_UNIT_RE.exec(text.slice(space + 1));
  if (!match?.groups) return null;

  const unit = timeCodeToUnit(match.groups.time);
  if (!unit) return null;

  const factor = parseStrictFloat(match.groups.factor) ?? 1;
  return {
    value,
    measurement: match.groups.measurement,
    per: { unit, factor },
  };
}

export function rateOrFallback(text: string): OrFallback<Rate> {
  const rate = parseRate(text);
  return rate ? { kind: 'expected', value: rate } : { kind: 'fallback', raw: text };
}

export function compareRateEntries(a: OrFallback<Rate>, b: OrFallback<Rate>): number {
  if (a.kind === 'expected' && b.kind === 'expected') return compareDurations(a.value.per, b.value.per);
  if (a.kind === 'fallback' && b.kind === 'fallback') {
    if (a.raw === b.raw) return 0;
    return a.raw < b.raw ? -1 : 1;
  }
  return a.kind === 'expected' ? -1 : 1;
}

/**
 * Inserts into a sorted rate record. An entry comparing equal to one already
 * present is dropped. Returns whether the record changed.
 */
export function insertRate(record: RateRecord, entry: OrFallback<Rate>): boolean {
  let index = 0;
  while (index < record.length) {
    const order = compareRateEntries(record[index], entry);
    if (order === 0) return false;
    if (order > 0) break;
    index++;
  }
  record.splice(index, 0, entry);
  return true;
}
