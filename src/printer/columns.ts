import type { SchemaEdge, SchemaField } from '../graph';
import type { Column } from './api';
import { formatBool, formatList } from './util';

export const fieldColumns: readonly Column<SchemaField>[] = [
  { header: 'Field', align: 'auto', value: (f) => f.name },
  { header: 'Type', align: 'auto', value: (f) => f.type },
  { header: 'Unique', align: 'auto', value: (f) => formatBool(f.unique) },
  { header: 'Optional', align: 'auto', value: (f) => formatBool(f.optional) },
  { header: 'Nillable', align: 'auto', value: (f) => formatBool(f.nillable) },
  { header: 'Default', align: 'auto', value: (f) => formatBool(f.default) },
  { header: 'UpdateDefault', align: 'auto', value: (f) => formatBool(f.updateDefault) },
  { header: 'Immutable', align: 'auto', value: (f) => formatBool(f.immutable) },
  { header: 'StructTag', align: 'auto', value: (f) => f.structTag },
  { header: 'Validators', align: 'auto', value: (f) => formatList(f.validators) },
  { header: 'Comment', align: 'left', value: (f) => f.comment() },
];

export const edgeColumns: readonly Column<SchemaEdge>[] = [
  { header: 'Edge', align: 'left', value: (e) => e.name },
  { header: 'Type', align: 'left', value: (e) => e.type.name },
  { header: 'Inverse', align: 'left', value: (e) => formatBool(e.isInverse()) },
  { header: 'BackRef', align: 'left', value: (e) => e.inverse },
  { header: 'Relation', align: 'left', value: (e) => e.relation },
  { header: 'Unique', align: 'left', value: (e) => formatBool(e.unique) },
  { header: 'Optional', align: 'left', value: (e) => formatBool(e.optional) },
  { header: 'Comment', align: 'left', value: (e) => e.comment() },
];

export function extractRows<T>(columns: readonly Column<T>[], rows: readonly T[]): string[][] {
  return rows.map((row) => columns.map((column) => column.value(row)));
}
