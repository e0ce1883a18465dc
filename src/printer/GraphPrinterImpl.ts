import { getFieldRows } from '../graph';
import type { SchemaEdge, SchemaField, SchemaGraph, SchemaType } from '../graph';
import { defaultPrinterOptions } from './api';
import type { GraphPrinter, OutputSink, PrinterOptions } from './api';
import { edgeColumns, fieldColumns } from './columns';
import { PrintError } from './errors';
import type { PrintStage } from './errors';
import { debug } from './internal';
import { StringSink } from './sinks';
import { TableRenderer } from './TableRenderer';
import { indentLines } from './util';

class GraphPrinterImpl implements GraphPrinter {
  private readonly fieldTable: TableRenderer<SchemaField>;
  private readonly edgeTable: TableRenderer<SchemaEdge>;

  public constructor(private readonly sink: OutputSink, public readonly options: PrinterOptions) {
    this.fieldTable = new TableRenderer(fieldColumns, options.padding);
    this.edgeTable = new TableRenderer(edgeColumns, options.padding);
  }

  public print(graph: SchemaGraph): void {
    debug('Printing %d types', graph.types.length);
    const failures: PrintError[] = [];
    for (const type of graph.types) {
      const error = this.printType(type);
      if (error) {
        debug('%s', error.message);
        failures.push(error);
      }
    }
    if (failures.length > 0) {
      const [first] = failures;
      first.failures.splice(0, first.failures.length, ...failures);
      throw first;
    }
  }

  // Type:
  //   <Fields Table>
  //   <Edges Table>
  private printType(type: SchemaType): PrintError | undefined {
    let block = type.name + ':\n';
    let stage: PrintStage = 'fields';
    try {
      block += this.fieldTable.render(getFieldRows(type)) + '\n';
      if (type.edges.length > 0) {
        stage = 'edges';
        block += this.edgeTable.render(type.edges) + '\n';
      }
      const text = indentLines(block, this.options.indent) + '\n';
      debug('Rendered %s (%d characters)', type.name, text.length);
      stage = 'write';
      this.sink.write(text);
    } catch (err) {
      return new PrintError(type.name, stage, err);
    }
  }
}

export function resolveOptions(options: Partial<PrinterOptions> = {}): PrinterOptions {
  return {
    indent: options.indent ?? defaultPrinterOptions.indent,
    padding: options.padding ?? defaultPrinterOptions.padding,
  };
}

export function createPrinter(sink: OutputSink, options?: Partial<PrinterOptions>): GraphPrinter {
  return new GraphPrinterImpl(sink, resolveOptions(options));
}

export function fprintGraph(sink: OutputSink, graph: SchemaGraph, options?: Partial<PrinterOptions>): void {
  createPrinter(sink, options).print(graph);
}

export function sprintGraph(graph: SchemaGraph, options?: Partial<PrinterOptions>): string {
  const sink = new StringSink();
  fprintGraph(sink, graph, options);
  return sink.toString();
}
