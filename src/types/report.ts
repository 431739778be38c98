import type { WaterRightNo } from './waterRight';

export type RgbColor = [r: number, g: number, b: number];

/** Decoded text, or raw single-byte text that still needs the document encoding applied. */
export type TextSegment = string | Uint8Array;

export type DrawingEvent =
  | { kind: 'beginText' }
  | { kind: 'setPosition'; x: number; y: number }
  | { kind: 'setFont'; family: string; size: number }
  | { kind: 'setFillColor'; color: RgbColor }
  | { kind: 'showText'; segments: TextSegment[] }
  | { kind: 'endText' };

export type DrawingEventKind = DrawingEvent['kind'];

export interface PageEvents {
  page: number;
  events: DrawingEvent[];
}

export interface TextBlock {
  page: number;
  x?: number;
  y?: number;
  fontFamily?: string;
  fontSize?: number;
  fillColor?: RgbColor;
  content?: string;
}

export interface KeyValuePair {
  key: string;
  values: string[];
}

export interface DepartmentGroup {
  label: string;
  usageLocations: KeyValuePair[][];
}

export interface GroupedRecord {
  root: KeyValuePair[];
  departments: DepartmentGroup[];
  annotation?: string;
}

export type FontRole = 'label' | 'value';

export type ReportWarning =
  | {
      type: 'unexpected-drawing-state';
      waterRightNo?: WaterRightNo;
      page: number;
      event: DrawingEventKind;
      message: string;
    }
  | { type: 'dropped-value-block'; waterRightNo?: WaterRightNo; page: number; content: string }
  | { type: 'invalid-date-format'; waterRightNo: WaterRightNo; field: string; value: string }
  | { type: 'usage-location-not-found'; waterRightNo: WaterRightNo; usageLocation?: string }
  | { type: 'missing-usage-locations'; waterRightNo: WaterRightNo; missingLocations: number[] }
  | { type: 'unknown-file-name'; fileName: string };
