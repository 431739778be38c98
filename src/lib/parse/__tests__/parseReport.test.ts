import { describe, it, expect } from 'vitest';
import { extractWaterRight, groupReport } from '../parseReport';
import { normalizeWaterRight } from '../normalize';
import { loadConfig } from '../../config';
import { createUsageLocation } from '../../waterRight/model';
import { pageFromPairs, textBlockEvents, LABEL_FONT, VALUE_FONT } from '../../__tests__/helpers/reportEvents';
import type { PairSpec } from '../../__tests__/helpers/reportEvents';

const settings = loadConfig({}, {});

const HEADER: PairSpec[] = [
  ['Wasserbuchbehörde', ['Region Test']],
  ['Kennziffer', ['4711 (aktiv)']],
];

function extract(pairs: PairSpec[]) {
  return extractWaterRight(1, [pageFromPairs(pairs)], settings);
}

describe('extractWaterRight', () => {
  it('reads a report with one department and one usage location', () => {
    const { waterRight, warnings } = extract([
      ...HEADER,
      ['Abteilung:', ['A Entnahme von Wasser']],
      ['Nutzungsort Lfd. Nr.:', ['1 (aktiv, real)']],
      ['Bezeichnung:', ['Brunnen 1']],
    ]);

    expect(warnings).toEqual([]);
    expect(waterRight).toEqual({
      no: 1,
      waterAuthority: 'Region Test',
      externalIdentifier: '4711',
      status: 'aktiv',
      legalDepartments: {
        A: {
          abbreviation: 'A',
          description: 'Entnahme von Wasser',
          usageLocations: [{ ...createUsageLocation(), serial: '1', active: true, real: true, name: 'Brunnen 1' }],
        },
      },
    });
  });

  it('parses a withdrawal allowance into a rate', () => {
    const { waterRight } = extract([
      ['Abteilung:', ['A Entnahme']],
      ['Nutzungsort Lfd. Nr.:', ['1 (aktiv, real)']],
      ['Erlaubniswert:', ['Entnahmemenge: 12 m³/2a']],
    ]);

    expect(waterRight.legalDepartments.A?.usageLocations[0].withdrawalRates).toEqual([
      { kind: 'expected', value: { value: 12, measurement: 'm³', per: { unit: 'years', factor: 2 } } },
    ]);
  });

  it('keeps land records it cannot split as text', () => {
    const { waterRight } = extract([
      ['Abteilung:', ['E Grundwasser']],
      ['Nutzungsort Lfd. Nr.:', ['1 (aktiv, real)']],
      ['Gemarkung, Flur:', ['Foo12']],
      ['Nutzungsort Lfd. Nr.:', ['2 (aktiv, real)']],
      ['Gemarkung, Flur:', ['12Foo']],
    ]);

    expect(waterRight.legalDepartments.E?.usageLocations.map((location) => location.landRecord)).toEqual([
      { kind: 'expected', value: { district: 'Foo', field: 12 } },
      { kind: 'fallback', raw: '12Foo' },
    ]);
  });

  it('collects the trailing remark as annotation', () => {
    const { waterRight } = extract([...HEADER, ['Bemerkung:', []], ['wichtig', []]]);

    expect(waterRight.annotation).toBe('Bemerkung: wichtig');
    expect(normalizeWaterRight(waterRight)).toEqual([]);
    expect(waterRight.annotation).toBe('wichtig');
  });

  it('joins value fragments drawn in one block', () => {
    const page = pageFromPairs(HEADER);
    page.events.push(
      ...textBlockEvents(LABEL_FONT, 'Betreff:'),
      ...textBlockEvents(VALUE_FONT, ['Entnahme von Grund-', 'wasser für', 'Beregnung'], 200)
    );

    const { waterRight } = extractWaterRight(1, [page], settings);
    expect(waterRight.subject).toBe('Entnahme von Grund-wasser für Beregnung');
  });

  it('throws on keys outside the vocabulary', () => {
    expect(() => extract([['Unbekannt:', ['x']]])).toThrow('invalid entry for the root, key: "Unbekannt:", values: ["x"]');
  });
});

describe('groupReport', () => {
  it('passes through the warnings of the drawing stages', () => {
    const page = pageFromPairs(HEADER);
    page.events.unshift(...textBlockEvents(VALUE_FONT, 'verwaist'), { kind: 'endText' });

    const { record, warnings } = groupReport([page], settings, 3);

    expect(record.root).toEqual([
      { key: 'Wasserbuchbehörde', values: ['Region Test'] },
      { key: 'Kennziffer', values: ['4711 (aktiv)'] },
    ]);
    expect(warnings).toEqual([
      { type: 'unexpected-drawing-state', waterRightNo: 3, page: 1, event: 'endText', message: 'no text block opened' },
      { type: 'dropped-value-block', waterRightNo: 3, page: 1, content: 'verwaist' },
    ]);
  });
});
