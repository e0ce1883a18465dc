import type { RelationType, SchemaEdge, SchemaField, SchemaType, SchemaTypeRef } from './graph';

export interface FieldOptions {
  unique?: boolean;
  optional?: boolean;
  nillable?: boolean;
  default?: boolean;
  updateDefault?: boolean;
  immutable?: boolean;
  structTag?: string;
  validators?: string[];
  comment?: string;
}

export interface EdgeOptions {
  inverse?: string;
  unique?: boolean;
  optional?: boolean;
  comment?: string;
}

export interface TypeDefinition {
  id?: SchemaField;
  fields?: SchemaField[];
  edges?: SchemaEdge[];
}

export function field(name: string, type: string, options: FieldOptions = {}): SchemaField {
  const comment = options.comment ?? '';
  return {
    name,
    type,
    unique: options.unique ?? false,
    optional: options.optional ?? false,
    nillable: options.nillable ?? false,
    default: options.default ?? false,
    updateDefault: options.updateDefault ?? false,
    immutable: options.immutable ?? false,
    structTag: options.structTag ?? '',
    validators: options.validators ?? [],
    comment: () => comment,
  };
}

export function edge(
  name: string,
  target: SchemaTypeRef | string,
  relation: RelationType,
  options: EdgeOptions = {}
): SchemaEdge {
  const inverse = options.inverse ?? '';
  const comment = options.comment ?? '';
  return {
    name,
    type: typeof target === 'string' ? { name: target } : target,
    inverse,
    relation,
    unique: options.unique ?? false,
    optional: options.optional ?? false,
    isInverse: () => inverse !== '',
    comment: () => comment,
  };
}

export function type(name: string, definition: TypeDefinition = {}): SchemaType {
  return {
    name,
    id: definition.id,
    fields: definition.fields ?? [],
    edges: definition.edges ?? [],
  };
}
