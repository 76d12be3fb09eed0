import { qualifiedName, quoteIdent, quoteLiteral } from '../../adapters/db/fqn.utils';
import { logger } from '../../utils/logger';
import type {
  ColumnInfo,
  ConstraintInfo,
  SchemaScripts,
  SchemaSnapshot,
  SequenceDefinition,
  SequenceOptions,
  TableDefinition,
} from './types';

function tableName(table: TableDefinition): string {
  return qualifiedName(table.ref.schemaName, table.ref.tableName);
}

function setSearchPath(schema: string): string {
  return `SET search_path TO ${quoteIdent(schema)};`;
}

function distinctSchemas(snapshot: SchemaSnapshot): string[] {
  const schemas = new Set<string>();
  for (const table of snapshot.tables) schemas.add(table.ref.schemaName);
  for (const sequence of snapshot.sequences) schemas.add(sequence.reference.sequenceSchema);
  return [...schemas];
}

function sequenceOptionsClause(options: SequenceOptions): string {
  return [
    ` AS ${options.dataType}`,
    ` INCREMENT BY ${options.incrementBy}`,
    ` MINVALUE ${options.minValue}`,
    ` MAXVALUE ${options.maxValue}`,
    ` START WITH ${options.startValue}`,
    options.cycle ? ' CYCLE' : ' NO CYCLE',
  ].join('');
}

export function renderCreateSequence(sequence: SequenceDefinition): string {
  const { sequenceSchema, sequenceName } = sequence.reference;
  const options = sequence.options ? sequenceOptionsClause(sequence.options) : '';
  return `CREATE SEQUENCE IF NOT EXISTS ${qualifiedName(sequenceSchema, sequenceName)}${options};`;
}

/** Identity wins over a default: a column never carries both clauses. */
export function renderColumn(column: ColumnInfo): string {
  let clause = '';
  if (column.identityKind === 'always') {
    clause = ' GENERATED ALWAYS AS IDENTITY';
  } else if (column.identityKind === 'byDefault') {
    clause = ' GENERATED BY DEFAULT AS IDENTITY';
  } else if (column.generated && column.defaultExpression) {
    clause = ` GENERATED ALWAYS AS (${column.defaultExpression}) STORED`;
  } else if (column.defaultExpression) {
    clause = ` DEFAULT ${column.defaultExpression}`;
  }
  return `${quoteIdent(column.name)} ${column.formattedType}${clause}${column.notNull ? ' NOT NULL' : ''}`;
}

export function renderCreateTable(table: TableDefinition): string {
  const lines = table.columns.map((column) => `    ${renderColumn(column)}`);
  const body = lines.length > 0 ? `\n${lines.join(',\n')}\n` : '\n';
  return `CREATE TABLE IF NOT EXISTS ${tableName(table)} (${body});`;
}

export function emitPreDataScript(snapshot: SchemaSnapshot): string {
  const statements: string[] = [];
  for (const schema of distinctSchemas(snapshot)) {
    statements.push(`CREATE SCHEMA IF NOT EXISTS ${quoteIdent(schema)};`);
  }
  for (const sequence of snapshot.sequences) {
    statements.push(renderCreateSequence(sequence));
  }
  for (const table of snapshot.tables) {
    statements.push(`${setSearchPath(table.ref.schemaName)}\n${renderCreateTable(table)}`);
  }
  return `${statements.join('\n\n')}\n`;
}

function renderAddConstraint(table: TableDefinition, constraint: ConstraintInfo): string {
  return `ALTER TABLE ${tableName(table)} ADD CONSTRAINT ${quoteIdent(constraint.name)} ${constraint.definition};`;
}

export function renderIndex(definition: string): string {
  const guarded = definition.replace(/^CREATE (UNIQUE )?INDEX (?!IF NOT EXISTS )/, 'CREATE $1INDEX IF NOT EXISTS ');
  return guarded.endsWith(';') ? guarded : `${guarded};`;
}

function renderTableSection(table: TableDefinition): string | null {
  const lines: string[] = [];
  for (const constraint of table.constraints) {
    if (constraint.kind !== 'f') lines.push(renderAddConstraint(table, constraint));
  }
  for (const index of table.indexes) {
    lines.push(renderIndex(index.definition));
  }
  if (lines.length === 0) return null;
  return [setSearchPath(table.ref.schemaName), ...lines].join('\n');
}

function renderForeignKeySection(table: TableDefinition): string | null {
  const lines = table.constraints.filter((c) => c.kind === 'f').map((c) => renderAddConstraint(table, c));
  if (lines.length === 0) return null;
  return [setSearchPath(table.ref.schemaName), ...lines].join('\n');
}

/**
 * Moves the sequence to the highest value already used by its column. An empty table leaves
 * it at min_value with is_called false, so the first insert receives min_value.
 *
 * Postgres only links a sequence to a column of a table in the same schema, so a sequence
 * shared across schemas is anchored but left without an owner.
 */
export function renderSequenceAnchor(sequence: SequenceDefinition): string[] {
  const ref = sequence.reference;
  const sequenceName = qualifiedName(ref.sequenceSchema, ref.sequenceName);
  const owner = qualifiedName(ref.ownerTableSchema, ref.ownerTableName);
  const column = quoteIdent(ref.ownerColumnName);
  const setval =
    `SELECT pg_catalog.setval(${quoteLiteral(sequenceName)}, ` +
    `GREATEST((SELECT MAX(${column}) FROM ${owner}), m.min_value), ` +
    `EXISTS (SELECT 1 FROM ${owner})) ` +
    `FROM pg_catalog.pg_sequences m ` +
    `WHERE m.schemaname = ${quoteLiteral(ref.sequenceSchema)} AND m.sequencename = ${quoteLiteral(ref.sequenceName)};`;
  if (ref.sequenceSchema !== ref.ownerTableSchema) {
    logger.warn('sequence-owner-skipped', { sequence: sequenceName, owner: `${owner}.${column}` });
    return [setval, `-- ${sequenceName} is used by ${owner}.${column} in another schema; left without OWNED BY`];
  }
  return [setval, `ALTER SEQUENCE ${sequenceName} OWNED BY ${owner}.${column};`];
}

export function renderIdentityAnchor(table: TableDefinition, column: ColumnInfo): string {
  const owner = tableName(table);
  const serial = `pg_catalog.pg_get_serial_sequence(${quoteLiteral(owner)}, ${quoteLiteral(column.name)})`;
  const quotedColumn = quoteIdent(column.name);
  return (
    `SELECT pg_catalog.setval(${serial}, ` +
    `GREATEST((SELECT MAX(${quotedColumn}) FROM ${owner}), s.seqmin), ` +
    `EXISTS (SELECT 1 FROM ${owner})) ` +
    `FROM pg_catalog.pg_sequence s WHERE s.seqrelid = ${serial}::regclass;`
  );
}

export function emitPostDataScript(snapshot: SchemaSnapshot): string {
  const sections: string[] = [];
  for (const table of snapshot.tables) {
    const section = renderTableSection(table);
    if (section) sections.push(section);
  }

  const foreignKeys = snapshot.tables.map(renderForeignKeySection).filter((s): s is string => s !== null);
  if (foreignKeys.length > 0) {
    sections.push(['-- foreign keys', ...foreignKeys].join('\n'));
  }

  const anchors = emitSequenceAnchors(snapshot);
  if (anchors) sections.push(anchors);
  return sections.length > 0 ? `${sections.join('\n\n')}\n` : '';
}

/**
 * Re-anchoring block for every default-driven sequence and identity column, wrapped in one
 * transaction so either every sequence moves or none does. Empty when there is nothing to anchor.
 */
export function emitSequenceAnchors(snapshot: SchemaSnapshot): string {
  const anchors: string[] = [];
  for (const sequence of snapshot.sequences) {
    anchors.push(...renderSequenceAnchor(sequence));
  }
  for (const table of snapshot.tables) {
    for (const column of table.columns) {
      if (column.identityKind !== 'none') anchors.push(renderIdentityAnchor(table, column));
    }
  }
  return anchors.length > 0 ? ['BEGIN;', ...anchors, 'COMMIT;'].join('\n') : '';
}

export function emitSchemaScripts(snapshot: SchemaSnapshot): SchemaScripts {
  return { pre: emitPreDataScript(snapshot), post: emitPostDataScript(snapshot) };
}
