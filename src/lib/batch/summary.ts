import type { ReportWarning } from '../../types/report';
import type { WaterRightNo } from '../../types/waterRight';
import type { BatchResult, ReportFailure } from './runBatch';

export interface BatchSummary {
  /** Parsed without a single warning. */
  complete: WaterRightNo[];
  /** Parsed, with warnings. */
  partial: WaterRightNo[];
  failed: WaterRightNo[];
  warningsByWaterRight: Map<WaterRightNo, ReportWarning[]>;
  failuresByWaterRight: Map<WaterRightNo, ReportFailure>;
  /** Warnings not tied to a water right, e.g. unreadable file names. */
  unassignedWarnings: ReportWarning[];
}

function warningWaterRightNo(warning: ReportWarning): WaterRightNo | undefined {
  return warning.type === 'unknown-file-name' ? undefined : warning.waterRightNo;
}

export function summarizeBatch(result: BatchResult): BatchSummary {
  const warningsByWaterRight = new Map<WaterRightNo, ReportWarning[]>();
  const unassignedWarnings: ReportWarning[] = [];

  for (const warning of result.warnings) {
    const no = warningWaterRightNo(warning);
    if (no === undefined) {
      unassignedWarnings.push(warning);
      continue;
    }
    const list = warningsByWaterRight.get(no);
    if (list) list.push(warning);
    else warningsByWaterRight.set(no, [warning]);
  }

  const complete: WaterRightNo[] = [];
  const partial: WaterRightNo[] = [];
  for (const waterRight of [...result.enriched, ...result.pdfOnly]) {
    (warningsByWaterRight.has(waterRight.no) ? partial : complete).push(waterRight.no);
  }

  const failuresByWaterRight = new Map<WaterRightNo, ReportFailure>();
  for (const failure of result.failures) failuresByWaterRight.set(failure.waterRightNo, failure);

  const byNumber = (a: WaterRightNo, b: WaterRightNo) => a - b;
  return {
    complete: complete.sort(byNumber),
    partial: partial.sort(byNumber),
    failed: [...failuresByWaterRight.keys()].sort(byNumber),
    warningsByWaterRight,
    failuresByWaterRight,
    unassignedWarnings,
  };
}
