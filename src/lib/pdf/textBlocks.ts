import type { DrawingEvent, PageEvents, ReportWarning, TextBlock, TextSegment } from '../../types/report';
import type { WaterRightNo } from '../../types/waterRight';

export interface AssembleOptions {
  textEncoding?: string;
  waterRightNo?: WaterRightNo;
}

export interface AssembledBlocks {
  blocks: TextBlock[];
  warnings: ReportWarning[];
}

/**
 * Joins a text fragment onto the block content. A trailing `-` or `/` is a
 * broken word, `.` or `;` ends a displayed line.
 */
export function joinFragment(previous: string | undefined, fragment: string): string | undefined {
  if (fragment.length === 0) return previous;
  if (previous === undefined) return fragment;

  switch (previous.charAt(previous.length - 1)) {
    case '-':
    case '/':
      return previous + fragment;
    case '.':
    case ';':
      return `${previous}\n${fragment}`;
    default:
      return `${previous} ${fragment}`;
  }
}

function decodeSegments(segments: TextSegment[], decoder: TextDecoder): string {
  return segments.map((segment) => (typeof segment === 'string' ? segment : decoder.decode(segment))).join('');
}

/**
 * Rebuilds one text block per BT/ET region. Position, font and fill colour
 * are taken from their first occurrence inside the block. A block left open
 * at the end of a page continues on the next one.
 */
export function assembleTextBlocks(pages: PageEvents[], options: AssembleOptions = {}): AssembledBlocks {
  const decoder = new TextDecoder(options.textEncoding ?? 'windows-1252');
  const blocks: TextBlock[] = [];
  const warnings: ReportWarning[] = [];
  let open: TextBlock | null = null;

  const unexpected = (page: number, event: DrawingEvent, message: string) => {
    warnings.push({
      type: 'unexpected-drawing-state',
      waterRightNo: options.waterRightNo,
      page,
      event: event.kind,
      message,
    });
  };

  for (const { page, events } of pages) {
    for (const event of events) {
      if (event.kind === 'beginText') {
        if (open) unexpected(page, event, 'text block did already begin');
        else open = { page };
        continue;
      }

      if (!open) {
        if (event.kind !== 'setFillColor') unexpected(page, event, 'no text block opened');
        continue;
      }

      switch (event.kind) {
        case 'setPosition':
          if (open.x === undefined && open.y === undefined) {
            open.x = event.x;
            open.y = event.y;
          }
          break;
        case 'setFont':
          if (open.fontFamily === undefined && open.fontSize === undefined) {
            open.fontFamily = event.family;
            open.fontSize = event.size;
          }
          break;
        case 'setFillColor':
          if (open.fillColor === undefined) open.fillColor = event.color;
          break;
        case 'showText': {
          const content = joinFragment(open.content, decodeSegments(event.segments, decoder));
          if (content !== undefined) open.content = content;
          break;
        }
        case 'endText':
          blocks.push(open);
          open = null;
          break;
      }
    }
  }

  return { blocks, warnings };
}
