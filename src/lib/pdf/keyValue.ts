import type { FontRole, KeyValuePair, ReportWarning, TextBlock } from '../../types/report';
import type { WaterRightNo } from '../../types/waterRight';
import { ColumnIndex } from './columnIndex';

export interface GroupOptions {
  fontRoles: Record<string, FontRole>;
  /**
   * At a page change, close a pair that already has values and resolve the
   * following value blocks through their column. A label still waiting for
   * its value stays open.
   */
  columnContinuation?: boolean;
  waterRightNo?: WaterRightNo;
}

export interface GroupedPairs {
  pairs: KeyValuePair[];
  warnings: ReportWarning[];
}

export function fontRole(fontRoles: Record<string, FontRole>, family: string): FontRole | null {
  return Object.prototype.hasOwnProperty.call(fontRoles, family) ? fontRoles[family] : null;
}

function appendContinuation(pair: KeyValuePair, content: string): void {
  const last = pair.values.length - 1;
  if (last < 0) pair.values.push(content);
  else pair.values[last] = `${pair.values[last]} ${content}`;
}

/**
 * Pairs label blocks with the value blocks that follow them. Only the font
 * tells the two apart; blocks in fonts without a role are skipped.
 */
export function groupKeyValues(blocks: TextBlock[], options: GroupOptions): GroupedPairs {
  const pairs: KeyValuePair[] = [];
  const warnings: ReportWarning[] = [];
  const columns = new ColumnIndex<KeyValuePair>();
  const continuation = options.columnContinuation ?? true;
  let current: KeyValuePair | null = null;
  let lastPage: number | null = null;

  for (const block of blocks) {
    if (block.content === undefined || block.fontFamily === undefined) continue;
    const role = fontRole(options.fontRoles, block.fontFamily);
    if (!role) continue;

    if (continuation && lastPage !== null && block.page !== lastPage && current && current.values.length > 0) {
      pairs.push(current);
      current = null;
    }
    lastPage = block.page;

    if (role === 'label') {
      if (current) pairs.push(current);
      current = { key: block.content, values: [] };
      columns.register(block.x, current);
      continue;
    }

    if (current) {
      current.values.push(block.content);
      columns.register(block.x, current);
      continue;
    }

    const previous = continuation ? columns.lookup(block.x) : undefined;
    if (previous) {
      appendContinuation(previous, block.content);
    } else {
      warnings.push({
        type: 'dropped-value-block',
        waterRightNo: options.waterRightNo,
        page: block.page,
        content: block.content,
      });
    }
  }

  if (current) pairs.push(current);
  return { pairs, warnings };
}
