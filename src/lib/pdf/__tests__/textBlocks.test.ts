import { describe, it, expect } from 'vitest';
import { assembleTextBlocks, joinFragment } from '../textBlocks';
import type { DrawingEvent, PageEvents } from '../../../types/report';

function page(events: DrawingEvent[], pageNo = 1): PageEvents {
  return { page: pageNo, events };
}

function contentOf(fragments: string[]): string | undefined {
  const events: DrawingEvent[] = [
    { kind: 'beginText' },
    ...fragments.map((fragment): DrawingEvent => ({ kind: 'showText', segments: [fragment] })),
    { kind: 'endText' },
  ];
  return assembleTextBlocks([page(events)]).blocks[0].content;
}

describe('joinFragment', () => {
  it('concatenates after a hyphen or slash', () => {
    expect(joinFragment('Gemeinde-', 'gebiet')).toBe('Gemeinde-gebiet');
    expect(joinFragment('m³/', 'a')).toBe('m³/a');
  });

  it('starts a new line after a period or semicolon', () => {
    expect(joinFragment('Zeile eins.', 'Zeile zwei')).toBe('Zeile eins.\nZeile zwei');
    expect(joinFragment('erstens;', 'zweitens')).toBe('erstens;\nzweitens');
  });

  it('separates other fragments with a space', () => {
    expect(joinFragment('Brunnen', '1')).toBe('Brunnen 1');
  });

  it('ignores empty fragments', () => {
    expect(joinFragment(undefined, '')).toBeUndefined();
    expect(joinFragment('Brunnen', '')).toBe('Brunnen');
  });
});

describe('assembleTextBlocks', () => {
  it('joins the fragments of one block', () => {
    expect(contentOf(['Entnahme von Grund-', 'wasser'])).toBe('Entnahme von Grund-wasser');
    expect(contentOf(['Brunnen', 'Nord.', 'Zweite Zeile'])).toBe('Brunnen Nord.\nZweite Zeile');
    expect(contentOf([''])).toBeUndefined();
  });

  it('keeps the first position, font and fill colour of a block', () => {
    const { blocks, warnings } = assembleTextBlocks([
      page([
        { kind: 'beginText' },
        { kind: 'setPosition', x: 56.7, y: 700.2 },
        { kind: 'setFont', family: 'Helvetica-Bold', size: 9 },
        { kind: 'setFillColor', color: [1, 0, 0] },
        { kind: 'setPosition', x: 300, y: 10 },
        { kind: 'setFont', family: 'Helvetica', size: 12 },
        { kind: 'setFillColor', color: [0, 0, 0] },
        { kind: 'showText', segments: ['Betreff:'] },
        { kind: 'endText' },
      ]),
    ]);

    expect(warnings).toEqual([]);
    expect(blocks).toEqual([
      {
        page: 1,
        x: 56.7,
        y: 700.2,
        fontFamily: 'Helvetica-Bold',
        fontSize: 9,
        fillColor: [1, 0, 0],
        content: 'Betreff:',
      },
    ]);
  });

  it('decodes raw segments with the configured encoding', () => {
    const events: DrawingEvent[] = [
      { kind: 'beginText' },
      { kind: 'showText', segments: ['Ma', new Uint8Array([0xdf]), new Uint8Array([0x6e, 0x61, 0x68, 0x6d, 0x65])] },
      { kind: 'endText' },
    ];
    expect(assembleTextBlocks([page(events)]).blocks[0].content).toBe('Maßnahme');
    expect(assembleTextBlocks([page(events)], { textEncoding: 'utf-8' }).blocks[0].content).toBe('Ma\uFFFDnahme');
  });

  it('produces the same blocks for the same events', () => {
    const pages = [
      page([
        { kind: 'beginText' },
        { kind: 'setFont', family: 'Helvetica', size: 9 },
        { kind: 'showText', segments: ['a-'] },
        { kind: 'showText', segments: ['b'] },
        { kind: 'endText' },
      ]),
    ];
    expect(assembleTextBlocks(pages)).toEqual(assembleTextBlocks(pages));
  });

  it('reports events outside of a text block and keeps going', () => {
    const { blocks, warnings } = assembleTextBlocks(
      [
        page([
          { kind: 'showText', segments: ['verloren'] },
          { kind: 'setFillColor', color: [0, 0, 0] },
          { kind: 'beginText' },
          { kind: 'beginText' },
          { kind: 'showText', segments: ['Betreff:'] },
          { kind: 'endText' },
          { kind: 'endText' },
        ]),
      ],
      { waterRightNo: 42 }
    );

    expect(blocks).toEqual([{ page: 1, content: 'Betreff:' }]);
    expect(warnings).toEqual([
      {
        type: 'unexpected-drawing-state',
        waterRightNo: 42,
        page: 1,
        event: 'showText',
        message: 'no text block opened',
      },
      {
        type: 'unexpected-drawing-state',
        waterRightNo: 42,
        page: 1,
        event: 'beginText',
        message: 'text block did already begin',
      },
      {
        type: 'unexpected-drawing-state',
        waterRightNo: 42,
        page: 1,
        event: 'endText',
        message: 'no text block opened',
      },
    ]);
  });

  it('continues a block across a page break', () => {
    const { blocks, warnings } = assembleTextBlocks([
      page([{ kind: 'beginText' }, { kind: 'showText', segments: ['Seite eins'] }], 1),
      page([{ kind: 'showText', segments: ['und zwei'] }, { kind: 'endText' }], 2),
    ]);

    expect(warnings).toEqual([]);
    expect(blocks).toEqual([{ page: 1, content: 'Seite eins und zwei' }]);
  });
});
