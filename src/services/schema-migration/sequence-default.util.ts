import type { ColumnInfo, SequenceReference, TableDefinition, TableRef } from './types';

const NEXTVAL = /nextval\('((?:[^']|'')+)'::regclass\)/i;

export interface SequenceName {
  schema: string | null;
  name: string;
}

/**
 * Splits a regclass literal on dots outside double quotes. Quoted segments keep
 * their case and unescape `""`; unquoted characters fold to lower case.
 */
export function splitQualifiedIdentifier(text: string): string[] {
  const parts: string[] = [];
  let current = '';
  let inQuotes = false;
  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (char === '"') {
      if (inQuotes && text[i + 1] === '"') {
        current += '"';
        i += 1;
      } else {
        inQuotes = !inQuotes;
      }
      continue;
    }
    if (char === '.' && !inQuotes) {
      parts.push(current);
      current = '';
      continue;
    }
    current += inQuotes ? char : char.toLowerCase();
  }
  parts.push(current);
  return parts;
}

export function parseNextvalDefault(expression: string | null | undefined): SequenceName | null {
  if (!expression) return null;
  const match = NEXTVAL.exec(expression);
  if (!match) return null;
  const literal = match[1].replace(/''/g, "'");
  const parts = splitQualifiedIdentifier(literal);
  if (parts.some((p) => p === '')) return null;
  if (parts.length === 1) return { schema: null, name: parts[0] };
  // database.schema.name is accepted; the database part is ignored
  if (parts.length === 2 || parts.length === 3) {
    return { schema: parts[parts.length - 2], name: parts[parts.length - 1] };
  }
  return null;
}

/** Identity and generated columns own no default-driven sequence. */
export function extractSequenceReference(table: TableRef, column: ColumnInfo): SequenceReference | null {
  if (column.identityKind !== 'none' || column.generated) return null;
  const parsed = parseNextvalDefault(column.defaultExpression);
  if (!parsed) return null;
  return {
    sequenceSchema: parsed.schema ?? table.schemaName,
    sequenceName: parsed.name,
    ownerTableSchema: table.schemaName,
    ownerTableName: table.tableName,
    ownerColumnName: column.name,
  };
}

export function sequenceKey(schema: string, name: string): string {
  return `${schema}\u0000${name}`;
}

/** Distinct sequences in first-seen order; the first referencing column owns the sequence. */
export function collectSequenceReferences(tables: TableDefinition[]): SequenceReference[] {
  const seen = new Map<string, SequenceReference>();
  for (const table of tables) {
    for (const column of table.columns) {
      const ref = extractSequenceReference(table.ref, column);
      if (!ref) continue;
      const key = sequenceKey(ref.sequenceSchema, ref.sequenceName);
      if (!seen.has(key)) seen.set(key, ref);
    }
  }
  return [...seen.values()];
}
