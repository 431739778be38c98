import type { ReportWarning } from '../../types/report';
import type { WaterRight } from '../../types/waterRight';

const ANNOTATION_PREFIX = 'Bemerkung:';
const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

const DATE_FIELDS = ['validUntil', 'validFrom', 'initiallyGranted', 'lastChange'] as const;

export function stripAnnotationPrefix(annotation: string | undefined): string | undefined {
  if (annotation === undefined || annotation === ANNOTATION_PREFIX) return undefined;
  if (annotation.startsWith(`${ANNOTATION_PREFIX} `)) return annotation.slice(ANNOTATION_PREFIX.length + 1);
  return annotation;
}

/** `31.12.2030` → `2030-12-31`; null when the value is not made of three dot-separated parts. */
export function toIsoDate(value: string): string | null {
  const parts = value.split('.');
  if (parts.length !== 3) return null;
  const [day, month, year] = parts;
  return `${year}-${month}-${day}`;
}

/** Final clean-up once the report and the spreadsheet rows have been merged. */
export function normalizeWaterRight(waterRight: WaterRight): ReportWarning[] {
  const warnings: ReportWarning[] = [];

  const annotation = stripAnnotationPrefix(waterRight.annotation);
  if (annotation === undefined) delete waterRight.annotation;
  else waterRight.annotation = annotation;

  if (waterRight.registeringAuthority !== undefined && waterRight.grantingAuthority === undefined) {
    waterRight.grantingAuthority = waterRight.registeringAuthority;
  }

  for (const field of DATE_FIELDS) {
    const value = waterRight[field];
    if (value === undefined || ISO_DATE_RE.test(value)) continue;

    const iso = toIsoDate(value);
    if (iso === null) {
      warnings.push({ type: 'invalid-date-format', waterRightNo: waterRight.no, field, value });
    } else {
      waterRight[field] = iso;
    }
  }

  return warnings;
}
