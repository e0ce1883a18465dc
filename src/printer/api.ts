import type { SchemaGraph } from '../graph';

export interface OutputSink {
  write(text: string): unknown;
}

export interface PrinterOptions {
  // inserted after every newline of a type block
  indent: string;
  // spaces on each side of a cell
  padding: number;
}

export const defaultPrinterOptions: Readonly<PrinterOptions> = {
  indent: '\t',
  padding: 1,
};

export interface GraphPrinter {
  readonly options: PrinterOptions;

  print(graph: SchemaGraph): void;
}

export type ColumnAlignment = 'auto' | 'left';

export interface Column<T> {
  readonly header: string;
  // 'auto' right-aligns the column when every body cell is an integer
  readonly align: ColumnAlignment;
  value(row: T): string;
}
