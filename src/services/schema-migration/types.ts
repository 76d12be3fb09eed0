export interface TableRef {
  schemaName: string;
  tableName: string;
}

export type IdentityKind = 'none' | 'always' | 'byDefault';

export interface ColumnInfo {
  name: string;
  formattedType: string;
  notNull: boolean;
  /** Default expression, or the generation expression when `generated` is set. */
  defaultExpression: string | null;
  identityKind: IdentityKind;
  generated: boolean;
}

export type ConstraintKind = 'p' | 'u' | 'x' | 'c' | 'f';

export interface ConstraintInfo {
  name: string;
  kind: ConstraintKind;
  definition: string;
}

export interface IndexInfo {
  name: string;
  definition: string;
}

export interface TableDefinition {
  ref: TableRef;
  columns: ColumnInfo[];
  constraints: ConstraintInfo[];
  indexes: IndexInfo[];
}

export interface SequenceReference {
  sequenceSchema: string;
  sequenceName: string;
  ownerTableSchema: string;
  ownerTableName: string;
  ownerColumnName: string;
}

/** Numeric bounds stay strings: int8 values exceed Number precision. */
export interface SequenceOptions {
  dataType: string;
  startValue: string;
  minValue: string;
  maxValue: string;
  incrementBy: string;
  cycle: boolean;
}

export interface SequenceDefinition {
  reference: SequenceReference;
  options: SequenceOptions | null;
}

export interface SchemaSnapshot {
  tables: TableDefinition[];
  sequences: SequenceDefinition[];
}

export interface SchemaScripts {
  pre: string;
  post: string;
}
