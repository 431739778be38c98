import { describe, it, expect } from 'vitest';
import { parseLandRecord, parseStrictFloat, parseUnsignedInt } from '../values';
import { orFallbackToJson } from '../serialize';

describe('parseStrictFloat', () => {
  it('accepts plain decimal notation only', () => {
    expect(parseStrictFloat('12')).toBe(12);
    expect(parseStrictFloat('-0.25')).toBe(-0.25);
    expect(parseStrictFloat('.5')).toBe(0.5);
    expect(parseStrictFloat('1e3')).toBe(1000);
    expect(parseStrictFloat('1,5')).toBeNull();
    expect(parseStrictFloat('12 m')).toBeNull();
    expect(parseStrictFloat('')).toBeNull();
  });
});

describe('parseUnsignedInt', () => {
  it('accepts digit strings', () => {
    expect(parseUnsignedInt('007')).toBe(7);
    expect(parseUnsignedInt('-1')).toBeNull();
    expect(parseUnsignedInt('1.0')).toBeNull();
    expect(parseUnsignedInt('99999999999999999999')).toBeNull();
  });
});

describe('parseLandRecord', () => {
  it('splits district and field', () => {
    expect(parseLandRecord('Foo12')).toEqual({ kind: 'expected', value: { district: 'Foo', field: 12 } });
    expect(parseLandRecord('Groß Buchholz 3')).toEqual({
      kind: 'expected',
      value: { district: 'GroßBuchholz', field: 3 },
    });
  });

  it('keeps text that is no land record verbatim', () => {
    const texts = ['12Foo', 'Flur 3a', '', 'Am Bach', '7 Flur 12x', 'Flur 99999999999'];
    for (const text of texts) {
      const record = parseLandRecord(text);
      expect(record).toEqual({ kind: 'fallback', raw: text });
      expect(orFallbackToJson(record, (value) => value.field)).toBe(text);
    }
  });
});
