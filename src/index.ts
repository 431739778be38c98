export * from './lib/pdf';
export { loadConfig, extractorConfigSchema, DEFAULT_FONT_ROLES } from './lib/config';
export type { ExtractorConfig, ExtractorConfigInput } from './lib/config';
export {
  ExtractionError,
  StructuralError,
  UnknownFieldError,
  FieldFormatError,
  DocumentLoadError,
  TableRowError,
  ConfigError,
  toExtractionError,
} from './lib/errors';
export type { ExtractionErrorCode, ErrorDetail, SerializedExtractionError } from './lib/errors';
export { Ok, Err, map, unwrap } from './lib/result';
export type { Result } from './lib/result';

export { extractWaterRight, groupReport, parseGroupedRecord } from './lib/parse/parseReport';
export { parseRoot, parseKennziffer } from './lib/parse/root';
export { parseDepartments, parseDepartmentLabel } from './lib/parse/departments';
export { parseUsageLocation, parseUsageLocationHeader } from './lib/parse/usageLocation';
export { applyAllowance, splitAllowance } from './lib/parse/allowance';
export { normalizeWaterRight, toIsoDate } from './lib/parse/normalize';

export {
  parseRate,
  rateOrFallback,
  parseDuration,
  serializeDuration,
  durationSeconds,
  compareDurations,
  insertRate,
} from './lib/waterRight/rate';
export { parseLandRecord } from './lib/waterRight/values';
export { createWaterRight, createUsageLocation, legalDepartmentsOf } from './lib/waterRight/model';
export {
  waterRightToJson,
  usageLocationToJson,
  orFallbackFromJson,
  rateFromJson,
} from './lib/waterRight/serialize';
export type { JsonValue, JsonObject } from './lib/waterRight/serialize';

export { EnrichmentTable, enrichmentRowSchema } from './lib/enrichment/table';
export type { EnrichmentRow, EnrichmentRowInput } from './lib/enrichment/table';
export { enrichWaterRight } from './lib/enrichment/enrich';

export { parseReports, parseReportFiles, processReport } from './lib/batch/runBatch';
export type { BatchOptions, BatchResult, ParsedReport, ReportFailure, ReportOutcome } from './lib/batch/runBatch';
export { summarizeBatch } from './lib/batch/summary';
export type { BatchSummary } from './lib/batch/summary';
export { waterRightNoFromFileName, reportSourcesFromFiles } from './lib/batch/fileName';
export type { ReportFile } from './lib/batch/fileName';

export type * from './types/report';
export type * from './types/waterRight';
export { LEGAL_DEPARTMENT_ABBREVIATIONS } from './types/waterRight';
