export { loadReportDocument, readDrawingEvents, pdfReportSource } from './loadReport';
export type { ReportSource } from './loadReport';
export { drawingEventsFromOperatorList, commonObjsFontResolver, stripSubsetPrefix } from './operatorList';
export type { FontNameResolver } from './operatorList';
export { assembleTextBlocks, joinFragment } from './textBlocks';
export { ColumnIndex } from './columnIndex';
export { groupKeyValues, fontRole } from './keyValue';
export {
  segmentPairs,
  flattenGroupedRecord,
  DEPARTMENT_SENTINEL,
  USAGE_LOCATION_SENTINEL,
} from './segment';
