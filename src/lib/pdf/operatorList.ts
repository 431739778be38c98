import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { DrawingEvent, RgbColor, TextSegment } from '../../types/report';
import type { PdfObjectStoreLike, PdfOperatorListLike } from '../../types/pdf';

const SUBSET_PREFIX_RE = /^[A-Z]{6}\+/;
const HEX_COLOR_RE = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

export type FontNameResolver = (loadedName: string) => string;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}

export function stripSubsetPrefix(fontName: string): string {
  return fontName.replace(SUBSET_PREFIX_RE, '');
}

/**
 * pdfjs renames fonts (`g_d0_f1`) and parks the parsed font in `commonObjs`.
 * Maps the loaded name back to the base font name, e.g. `Helvetica-Bold`.
 */
export function commonObjsFontResolver(objs: PdfObjectStoreLike): FontNameResolver {
  return (loadedName) => {
    if (!objs.has(loadedName)) return loadedName;
    const font = objs.get(loadedName);
    if (isRecord(font) && typeof font.name === 'string' && font.name.length > 0) {
      return stripSubsetPrefix(font.name);
    }
    return loadedName;
  };
}

function numericArray(value: unknown): number[] | null {
  if (value instanceof Float32Array || value instanceof Float64Array || value instanceof Uint8ClampedArray) {
    return Array.from(value);
  }
  return null;
}

/** Operands arrive either spread out or packed into one (typed) array. */
function operands(args: unknown[]): unknown[] {
  if (args.length !== 1) return args;
  const [packed] = args;
  if (Array.isArray(packed)) return packed;
  return numericArray(packed) ?? args;
}

function textMatrixPosition(args: unknown[]): { x: number; y: number } | null {
  const matrix = operands(args);
  const x = asNumber(matrix[4]);
  const y = asNumber(matrix[5]);
  return x === null || y === null ? null : { x, y };
}

function fillColor(args: unknown[]): RgbColor | null {
  const [hexColor] = args;
  if (typeof hexColor === 'string') {
    const hex = HEX_COLOR_RE.exec(hexColor);
    if (!hex) return null;
    return [parseInt(hex[1], 16) / 255, parseInt(hex[2], 16) / 255, parseInt(hex[3], 16) / 255];
  }

  const channels = operands(args);
  const r = asNumber(channels[0]);
  const g = asNumber(channels[1]);
  const b = asNumber(channels[2]);
  if (r === null || g === null || b === null) return null;
  return [r / 255, g / 255, b / 255];
}

/**
 * Glyphs with a unicode mapping become text. Glyphs without one keep their
 * character code, which is decoded later with the document's text encoding.
 */
function glyphSegments(glyphs: unknown): TextSegment[] {
  if (!Array.isArray(glyphs)) return [];
  const segments: TextSegment[] = [];
  let text = '';
  let bytes: number[] = [];

  const flushText = () => {
    if (text.length > 0) segments.push(text);
    text = '';
  };
  const flushBytes = () => {
    if (bytes.length > 0) segments.push(Uint8Array.from(bytes));
    bytes = [];
  };

  for (const glyph of glyphs) {
    if (!isRecord(glyph)) continue;
    if (typeof glyph.unicode === 'string' && glyph.unicode.length > 0) {
      flushBytes();
      text += glyph.unicode;
      continue;
    }
    const code = asNumber(glyph.originalCharCode);
    if (code !== null && Number.isInteger(code) && code >= 0 && code <= 0xff) {
      flushText();
      bytes.push(code);
    }
  }

  flushText();
  flushBytes();
  return segments;
}

function argsAt(list: PdfOperatorListLike, index: number): unknown[] {
  const args = list.argsArray[index];
  if (Array.isArray(args)) return args;
  return numericArray(args) ?? [];
}

/**
 * Keeps the text-related operators of a page's operator list, in order.
 * Operators with malformed arguments are skipped.
 */
export function drawingEventsFromOperatorList(list: PdfOperatorListLike, resolveFont: FontNameResolver): DrawingEvent[] {
  const events: DrawingEvent[] = [];

  for (let i = 0; i < list.fnArray.length; i++) {
    const args = argsAt(list, i);

    switch (list.fnArray[i]) {
      case OPS.beginText:
        events.push({ kind: 'beginText' });
        break;
      case OPS.endText:
        events.push({ kind: 'endText' });
        break;
      case OPS.setTextMatrix: {
        const position = textMatrixPosition(args);
        if (position) events.push({ kind: 'setPosition', ...position });
        break;
      }
      case OPS.setFont: {
        const [loadedName, fontSize] = args;
        const size = asNumber(fontSize);
        if (typeof loadedName === 'string' && size !== null) {
          events.push({ kind: 'setFont', family: resolveFont(loadedName), size });
        }
        break;
      }
      case OPS.setFillRGBColor: {
        const color = fillColor(args);
        if (color) events.push({ kind: 'setFillColor', color });
        break;
      }
      case OPS.showText:
      case OPS.showSpacedText:
        events.push({ kind: 'showText', segments: glyphSegments(args[0]) });
        break;
      default:
        break;
    }
  }

  return events;
}
