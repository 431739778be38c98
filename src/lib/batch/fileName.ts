import { pdfReportSource } from '../pdf/loadReport';
import type { ReportSource } from '../pdf/loadReport';
import type { ReportWarning } from '../../types/report';
import type { WaterRightNo } from '../../types/waterRight';

const REPORT_FILE_RE = /^rep(\d+)\.pdf$/;

export interface ReportFile {
  fileName: string;
  bytes: Uint8Array;
}

/** `rep12345.pdf` → 12345. */
export function waterRightNoFromFileName(fileName: string): WaterRightNo | undefined {
  const base = fileName.split(/[\\/]/).pop() ?? fileName;
  const match = REPORT_FILE_RE.exec(base);
  if (!match) return undefined;
  const no = Number(match[1]);
  return Number.isSafeInteger(no) ? no : undefined;
}

/** Files not named like a report are skipped with an `unknown-file-name` warning. */
export function reportSourcesFromFiles(files: Iterable<ReportFile>): {
  sources: ReportSource[];
  warnings: ReportWarning[];
} {
  const sources: ReportSource[] = [];
  const warnings: ReportWarning[] = [];

  for (const { fileName, bytes } of files) {
    const no = waterRightNoFromFileName(fileName);
    if (no === undefined) warnings.push({ type: 'unknown-file-name', fileName });
    else sources.push(pdfReportSource(no, bytes));
  }

  return { sources, warnings };
}
