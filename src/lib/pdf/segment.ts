import { StructuralError } from '../errors';
import type { DepartmentGroup, GroupedRecord, KeyValuePair } from '../../types/report';

export const DEPARTMENT_SENTINEL = 'Abteilung:';
export const USAGE_LOCATION_SENTINEL = 'Nutzungsort Lfd. Nr.:';

export interface SegmentOptions {
  /** Keep the final usage-location group of a department even when it is empty. */
  emitTrailingEmptyUsageLocation?: boolean;
}

/** Trailing labels without values are the free-text remark at the end of a report. */
function takeAnnotation(pairs: KeyValuePair[]): { body: KeyValuePair[]; annotation?: string } {
  let end = pairs.length;
  while (end > 0 && pairs[end - 1].values.length === 0) end--;

  if (end === pairs.length) return { body: pairs };
  const annotation = pairs
    .slice(end)
    .map((pair) => pair.key)
    .join(' ');
  return { body: pairs.slice(0, end), annotation };
}

function groupUsageLocations(pairs: KeyValuePair[], start: number, emitTrailingEmpty: boolean) {
  const usageLocations: KeyValuePair[][] = [];
  let current: KeyValuePair[] = [];
  let index = start;

  while (index < pairs.length && pairs[index].key !== DEPARTMENT_SENTINEL) {
    const pair = pairs[index];
    if (pair.key === USAGE_LOCATION_SENTINEL && current.length > 0) {
      usageLocations.push(current);
      current = [];
    }
    current.push(pair);
    index++;
  }

  if (current.length > 0 || emitTrailingEmpty) usageLocations.push(current);
  return { usageLocations, next: index };
}

/**
 * Splits the pair stream into the root section, one group per `Abteilung:`
 * and, inside each, one group per `Nutzungsort Lfd. Nr.:`.
 */
export function segmentPairs(pairs: KeyValuePair[], options: SegmentOptions = {}): GroupedRecord {
  const emitTrailingEmpty = options.emitTrailingEmptyUsageLocation ?? true;
  const { body, annotation } = takeAnnotation(pairs);

  let index = 0;
  while (index < body.length && body[index].key !== DEPARTMENT_SENTINEL) index++;
  const root = body.slice(0, index);

  const departments: DepartmentGroup[] = [];
  while (index < body.length) {
    const sentinel = body[index];
    if (sentinel.key !== DEPARTMENT_SENTINEL) {
      throw new StructuralError(`expected '${DEPARTMENT_SENTINEL}', got '${sentinel.key}'`);
    }

    const { usageLocations, next } = groupUsageLocations(body, index + 1, emitTrailingEmpty);
    departments.push({ label: sentinel.values.join(''), usageLocations });
    index = next;
  }

  const record: GroupedRecord = { root, departments };
  if (annotation !== undefined) record.annotation = annotation;
  return record;
}

/** Turns a grouped record back into the pair stream it was segmented from. */
export function flattenGroupedRecord(record: GroupedRecord): KeyValuePair[] {
  const pairs: KeyValuePair[] = [...record.root];
  for (const department of record.departments) {
    pairs.push({ key: DEPARTMENT_SENTINEL, values: [department.label] });
    for (const usageLocation of department.usageLocations) pairs.push(...usageLocation);
  }
  if (record.annotation !== undefined) pairs.push({ key: record.annotation, values: [] });
  return pairs;
}
