import { describe, it, expect } from 'vitest';
import { orFallbackFromJson, rateFromJson, rateToJson, waterRightToJson } from '../serialize';
import { createLegalDepartment, createUsageLocation, createWaterRight } from '../model';
import { insertRate, parseRate, rateOrFallback } from '../rate';
import { pair, parseLandRecord, quantity } from '../values';

describe('rate JSON', () => {
  it('writes value, measurement and duration code', () => {
    const rate = parseRate('12 m³/2a');
    expect(rate && rateToJson(rate)).toEqual([12, 'm³', '2a']);
  });

  it('reads expected and fallback encodings', () => {
    expect(orFallbackFromJson([12, 'm³', '2a'], rateFromJson)).toEqual({
      kind: 'expected',
      value: { value: 12, measurement: 'm³', per: { unit: 'years', factor: 2 } },
    });
    expect(orFallbackFromJson('ca. 12 m³', rateFromJson)).toEqual({ kind: 'fallback', raw: 'ca. 12 m³' });
    expect(orFallbackFromJson([12, 'm³', 'x'], rateFromJson)).toBeNull();
    expect(orFallbackFromJson(42, rateFromJson)).toBeNull();
  });
});

describe('waterRightToJson', () => {
  it('omits absent fields and empty collections', () => {
    const waterRight = createWaterRight(7);
    waterRight.holder = 'Test GmbH';

    const location = createUsageLocation();
    location.name = 'Brunnen 1';
    location.mapExcerpt = pair(3524, 'Hannover');
    location.landRecord = parseLandRecord('12Foo');
    location.damTargetLevels.max = quantity(12.5, 'm');
    insertRate(location.withdrawalRates, rateOrFallback('12 m³/2a'));
    insertRate(location.withdrawalRates, rateOrFallback('viel'));

    const department = createLegalDepartment('A', 'Entnahme');
    department.usageLocations.push(location);
    waterRight.legalDepartments.A = department;

    expect(waterRightToJson(waterRight)).toEqual({
      no: 7,
      holder: 'Test GmbH',
      legalDepartments: {
        A: {
          abbreviation: 'A',
          description: 'Entnahme',
          usageLocations: [
            {
              name: 'Brunnen 1',
              mapExcerpt: [3524, 'Hannover'],
              landRecord: '12Foo',
              withdrawalRates: [[12, 'm³', '2a'], 'viel'],
              damTargetLevels: { max: [12.5, 'm'] },
            },
          ],
        },
      },
    });
  });

  it('writes a parsed land record as an object', () => {
    const waterRight = createWaterRight(8);
    const location = createUsageLocation();
    location.landRecord = parseLandRecord('Linden 4');
    const department = createLegalDepartment('E', 'Grundwasser');
    department.usageLocations.push(location);
    waterRight.legalDepartments.E = department;

    expect(waterRightToJson(waterRight)).toEqual({
      no: 8,
      legalDepartments: {
        E: {
          abbreviation: 'E',
          description: 'Grundwasser',
          usageLocations: [{ landRecord: { district: 'Linden', field: 4 } }],
        },
      },
    });
  });
});
