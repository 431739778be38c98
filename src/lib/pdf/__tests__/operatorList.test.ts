import { describe, it, expect } from 'vitest';
import { OPS } from 'pdfjs-dist/legacy/build/pdf.mjs';
import { commonObjsFontResolver, drawingEventsFromOperatorList, stripSubsetPrefix } from '../operatorList';
import { assembleTextBlocks } from '../textBlocks';
import type { PdfObjectStoreLike } from '../../../types/pdf';

function fontStore(fonts: Record<string, unknown>): PdfObjectStoreLike {
  return {
    has: (id) => Object.prototype.hasOwnProperty.call(fonts, id),
    get: (id) => fonts[id],
  };
}

const resolveFont = commonObjsFontResolver(
  fontStore({ g_d0_f1: { name: 'ABCDEF+Helvetica-Bold' }, g_d0_f2: { name: 'Helvetica' } })
);

describe('stripSubsetPrefix', () => {
  it('removes the six-letter subset tag', () => {
    expect(stripSubsetPrefix('ABCDEF+Helvetica-Bold')).toBe('Helvetica-Bold');
    expect(stripSubsetPrefix('Helvetica')).toBe('Helvetica');
    expect(stripSubsetPrefix('abcdef+Helvetica')).toBe('abcdef+Helvetica');
  });
});

describe('commonObjsFontResolver', () => {
  it('maps loaded names to base font names', () => {
    expect(resolveFont('g_d0_f1')).toBe('Helvetica-Bold');
    expect(resolveFont('g_d0_f2')).toBe('Helvetica');
  });

  it('falls back to the loaded name', () => {
    const resolve = commonObjsFontResolver(fontStore({ g_d0_f3: { name: '' }, g_d0_f4: null }));
    expect(resolve('g_d0_f3')).toBe('g_d0_f3');
    expect(resolve('g_d0_f4')).toBe('g_d0_f4');
    expect(resolve('g_d0_f9')).toBe('g_d0_f9');
  });
});

describe('drawingEventsFromOperatorList', () => {
  it('keeps the text operators in order', () => {
    const events = drawingEventsFromOperatorList(
      {
        fnArray: [
          OPS.save,
          OPS.beginText,
          OPS.setFont,
          OPS.setTextMatrix,
          OPS.setFillRGBColor,
          OPS.showText,
          OPS.endText,
          OPS.restore,
        ],
        argsArray: [
          null,
          null,
          ['g_d0_f1', 9],
          [1, 0, 0, 1, 56.7, 700.2],
          ['#ff0000'],
          [[{ unicode: 'B' }, { unicode: 'e' }, -120, { unicode: 't' }, { unicode: 'r' }]],
          null,
          null,
        ],
      },
      resolveFont
    );

    expect(events).toEqual([
      { kind: 'beginText' },
      { kind: 'setFont', family: 'Helvetica-Bold', size: 9 },
      { kind: 'setPosition', x: 56.7, y: 700.2 },
      { kind: 'setFillColor', color: [1, 0, 0] },
      { kind: 'showText', segments: ['Betr'] },
      { kind: 'endText' },
    ]);
  });

  it('accepts packed operands', () => {
    const events = drawingEventsFromOperatorList(
      {
        fnArray: [OPS.setTextMatrix, OPS.setFillRGBColor, OPS.showSpacedText],
        argsArray: [
          [new Float32Array([1, 0, 0, 1, 10, 20])],
          new Uint8ClampedArray([0, 255, 0]),
          [[{ unicode: 'x' }]],
        ],
      },
      resolveFont
    );

    expect(events).toEqual([
      { kind: 'setPosition', x: 10, y: 20 },
      { kind: 'setFillColor', color: [0, 1, 0] },
      { kind: 'showText', segments: ['x'] },
    ]);
  });

  it('skips operators with malformed arguments', () => {
    const events = drawingEventsFromOperatorList(
      {
        fnArray: [OPS.setFont, OPS.setTextMatrix, OPS.setFillRGBColor, OPS.showText],
        argsArray: [[42, 9], [1, 0, 0, 1], ['rot'], ['kein Glyph']],
      },
      resolveFont
    );

    expect(events).toEqual([{ kind: 'showText', segments: [] }]);
  });

  it('keeps the character code of glyphs without unicode for the text encoding', () => {
    const events = drawingEventsFromOperatorList(
      {
        fnArray: [OPS.beginText, OPS.showText, OPS.endText],
        argsArray: [
          null,
          [
            [
              { unicode: 'M' },
              { unicode: 'a' },
              { unicode: '', originalCharCode: 0xdf },
              -50,
              { unicode: 'n' },
              { unicode: 'a' },
              { unicode: 'hme' },
              { unicode: '', originalCharCode: 300 },
            ],
          ],
          null,
        ],
      },
      resolveFont
    );

    expect(events[1]).toEqual({ kind: 'showText', segments: ['Ma', new Uint8Array([0xdf]), 'nahme'] });
    expect(assembleTextBlocks([{ page: 1, events }]).blocks[0].content).toBe('Maßnahme');
    expect(assembleTextBlocks([{ page: 1, events }], { textEncoding: 'utf-8' }).blocks[0].content).toBe('Ma\uFFFDnahme');
  });
});
