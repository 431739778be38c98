import { loadConfig } from '../config';
import type { ExtractorConfig } from '../config';
import { toExtractionError } from '../errors';
import type { ExtractionError } from '../errors';
import { enrichWaterRight } from '../enrichment/enrich';
import { EnrichmentTable } from '../enrichment/table';
import { normalizeWaterRight } from '../parse/normalize';
import { groupReport, parseGroupedRecord } from '../parse/parseReport';
import type { ReportSource } from '../pdf/loadReport';
import { reportSourcesFromFiles } from './fileName';
import type { ReportFile } from './fileName';
import { Err, Ok } from '../result';
import type { Result } from '../result';
import type { ReportWarning } from '../../types/report';
import type { WaterRight, WaterRightNo } from '../../types/waterRight';

export interface ParsedReport {
  waterRight: WaterRight;
  enriched: boolean;
  warnings: ReportWarning[];
}

export interface ReportFailure {
  waterRightNo: WaterRightNo;
  error: ExtractionError;
  /** Warnings collected before the report failed. */
  warnings: ReportWarning[];
}

export type ReportOutcome = Result<ParsedReport, ReportFailure>;

export interface BatchOptions {
  table?: EnrichmentTable;
  config?: ExtractorConfig;
  quiet?: boolean;
}

export interface BatchResult {
  enriched: WaterRight[];
  pdfOnly: WaterRight[];
  failures: ReportFailure[];
  warnings: ReportWarning[];
}

/** Reads, parses, enriches and normalizes one report. Never rejects. */
export async function processReport(
  source: ReportSource,
  table: EnrichmentTable,
  config: ExtractorConfig
): Promise<ReportOutcome> {
  const { waterRightNo } = source;
  const warnings: ReportWarning[] = [];

  try {
    const pages = await source.readPages();
    const grouped = groupReport(pages, config, waterRightNo);
    warnings.push(...grouped.warnings);

    const waterRight = parseGroupedRecord(waterRightNo, grouped.record);
    const enrichment = enrichWaterRight(waterRight, table);
    warnings.push(...enrichment.warnings, ...normalizeWaterRight(waterRight));

    return Ok({ waterRight, enriched: enrichment.enriched, warnings });
  } catch (err) {
    return Err({ waterRightNo, error: toExtractionError(err), warnings });
  }
}

/**
 * Parses reports with `config.concurrency` workers sharing one queue. A
 * failing report is recorded and does not stop the others.
 */
export async function parseReports(reports: Iterable<ReportSource>, options: BatchOptions = {}): Promise<BatchResult> {
  const config = options.config ?? loadConfig();
  const table = options.table ?? EnrichmentTable.empty();
  const queue = reports[Symbol.iterator]();
  const result: BatchResult = { enriched: [], pdfOnly: [], failures: [], warnings: [] };

  const worker = async () => {
    for (let next = queue.next(); !next.done; next = queue.next()) {
      const outcome = await processReport(next.value, table, config);
      if (outcome.ok) {
        const { waterRight, enriched, warnings } = outcome.value;
        (enriched ? result.enriched : result.pdfOnly).push(waterRight);
        result.warnings.push(...warnings);
      } else {
        const failure = outcome.error;
        result.failures.push(failure);
        result.warnings.push(...failure.warnings);
        if (!options.quiet) {
          console.warn(`[report-batch] Report ${failure.waterRightNo} failed (${failure.error.code}):`, failure.error.message);
        }
      }
    }
  };

  await Promise.all(Array.from({ length: config.concurrency }, () => worker()));

  if (!options.quiet) {
    console.log(
      `[report-batch] ${result.enriched.length} enriched, ${result.pdfOnly.length} pdf only, ` +
        `${result.failures.length} failed, ${result.warnings.length} warning(s)`
    );
  }

  return result;
}

/** Like `parseReports`, for PDF files named `rep<no>.pdf`. */
export async function parseReportFiles(files: Iterable<ReportFile>, options: BatchOptions = {}): Promise<BatchResult> {
  const { sources, warnings } = reportSourcesFromFiles(files);
  if (!options.quiet) {
    for (const warning of warnings) {
      if (warning.type === 'unknown-file-name') console.warn('[report-batch] Skipping file:', warning.fileName);
    }
  }

  const result = await parseReports(sources, options);
  result.warnings.unshift(...warnings);
  return result;
}
