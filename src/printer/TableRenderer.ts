import Table from 'cli-table3';
import type { Column } from './api';
import { extractRows } from './columns';
import { isInteger } from './util';

type HorizontalAlignment = Table.HorizontalAlignment;

const asciiChars = {
  top: '-',
  'top-mid': '+',
  'top-left': '+',
  'top-right': '+',
  bottom: '-',
  'bottom-mid': '+',
  'bottom-left': '+',
  'bottom-right': '+',
  left: '|',
  'left-mid': '+',
  mid: '-',
  'mid-mid': '+',
  right: '|',
  'right-mid': '+',
  middle: '|',
};

export class TableRenderer<T> {
  public constructor(private readonly columns: readonly Column<T>[], private readonly padding: number) {}

  public render(rows: readonly T[]): string {
    const cells = extractRows(this.columns, rows);
    const alignments = this.columns.map((column, index) =>
      column.align === 'auto' ? getColumnAlignment(cells.map((row) => row[index])) : 'left'
    );
    const table = new Table({
      head: this.columns.map((column) => column.header),
      // applies to the header only; body cells carry their own alignment
      colAligns: this.columns.map((): HorizontalAlignment => 'center'),
      chars: asciiChars,
      style: {
        head: [],
        border: [],
        compact: true,
        'padding-left': this.padding,
        'padding-right': this.padding,
      },
    });
    for (const row of cells) {
      table.push(row.map((content, index) => ({ content, hAlign: alignments[index] })));
    }
    return table.toString();
  }
}

export function getColumnAlignment(values: readonly string[]): HorizontalAlignment {
  return values.length > 0 && values.every(isInteger) ? 'right' : 'left';
}
