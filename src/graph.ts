// one to one, one to many, many to one, many to many
export type RelationType = 'O2O' | 'O2M' | 'M2O' | 'M2M';

export interface SchemaField {
  readonly name: string;
  readonly type: string;
  readonly unique: boolean;
  readonly optional: boolean;
  readonly nillable: boolean;
  readonly default: boolean;
  readonly updateDefault: boolean;
  readonly immutable: boolean;
  readonly structTag: string;
  readonly validators: readonly string[];
  comment(): string;
}

export interface SchemaTypeRef {
  readonly name: string;
}

export interface SchemaEdge {
  readonly name: string;
  readonly type: SchemaTypeRef;
  // name of the edge this one is a back-reference of; empty for assoc edges
  readonly inverse: string;
  readonly relation: RelationType;
  readonly unique: boolean;
  readonly optional: boolean;
  isInverse(): boolean;
  comment(): string;
}

export interface SchemaType extends SchemaTypeRef {
  readonly id?: SchemaField;
  readonly fields: readonly SchemaField[];
  readonly edges: readonly SchemaEdge[];
}

export interface SchemaGraph {
  readonly types: readonly SchemaType[];
}

// identifier first, then declared fields
export function getFieldRows(type: SchemaType): SchemaField[] {
  return type.id ? [type.id, ...type.fields] : [...type.fields];
}
