export * from './api';
export { edgeColumns, fieldColumns } from './columns';
export { PrintError } from './errors';
export type { PrintStage } from './errors';
export { createPrinter, fprintGraph, resolveOptions, sprintGraph } from './GraphPrinterImpl';
export { StringSink } from './sinks';
export { getColumnAlignment, TableRenderer } from './TableRenderer';
