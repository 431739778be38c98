import type { ExtractorConfig } from '../config';
import { groupKeyValues } from '../pdf/keyValue';
import { segmentPairs } from '../pdf/segment';
import { assembleTextBlocks } from '../pdf/textBlocks';
import { createWaterRight } from '../waterRight/model';
import type { GroupedRecord, PageEvents, ReportWarning } from '../../types/report';
import type { WaterRight, WaterRightNo } from '../../types/waterRight';
import { parseDepartments } from './departments';
import { parseRoot } from './root';

export type ExtractionSettings = Pick<
  ExtractorConfig,
  'fontRoles' | 'textEncoding' | 'columnContinuation' | 'emitTrailingEmptyUsageLocation'
>;

export interface GroupedReport {
  record: GroupedRecord;
  warnings: ReportWarning[];
}

export interface ExtractedReport {
  waterRight: WaterRight;
  warnings: ReportWarning[];
}

/** Drawing events → text blocks → key-value pairs → sections. */
export function groupReport(
  pages: PageEvents[],
  settings: ExtractionSettings,
  waterRightNo?: WaterRightNo
): GroupedReport {
  const assembled = assembleTextBlocks(pages, { textEncoding: settings.textEncoding, waterRightNo });
  const grouped = groupKeyValues(assembled.blocks, {
    fontRoles: settings.fontRoles,
    columnContinuation: settings.columnContinuation,
    waterRightNo,
  });
  const record = segmentPairs(grouped.pairs, {
    emitTrailingEmptyUsageLocation: settings.emitTrailingEmptyUsageLocation,
  });

  return { record, warnings: [...assembled.warnings, ...grouped.warnings] };
}

export function parseGroupedRecord(waterRightNo: WaterRightNo, record: GroupedRecord): WaterRight {
  const waterRight = createWaterRight(waterRightNo);
  parseRoot(record.root, waterRight);
  parseDepartments(record.departments, waterRight);
  if (record.annotation !== undefined) waterRight.annotation = record.annotation;
  return waterRight;
}

/** Runs every stage on one report. Throws an `ExtractionError` on malformed reports. */
export function extractWaterRight(
  waterRightNo: WaterRightNo,
  pages: PageEvents[],
  settings: ExtractionSettings
): ExtractedReport {
  const { record, warnings } = groupReport(pages, settings, waterRightNo);
  return { waterRight: parseGroupedRecord(waterRightNo, record), warnings };
}
