import type { DbPort, DbTransactionPort } from '../ports/db.port';
import { quoteIdent } from '../../adapters/db/fqn.utils';
import { CatalogQueryError, ToolError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { collectSequenceReferences } from './sequence-default.util';
import type {
  ColumnInfo,
  ConstraintInfo,
  ConstraintKind,
  IdentityKind,
  IndexInfo,
  SchemaSnapshot,
  SequenceDefinition,
  SequenceOptions,
  TableDefinition,
  TableRef,
} from './types';

const LIST_TABLES_SQL = `
  SELECT table_schema, table_name
  FROM information_schema.tables
  WHERE table_type = 'BASE TABLE'
    AND table_schema NOT IN ('pg_catalog', 'information_schema')
    AND table_schema NOT LIKE 'pg\\_toast%'
    AND table_schema NOT LIKE 'pg\\_temp%'
  ORDER BY table_schema, table_name
`;

const LIST_SCHEMAS_SQL = `
  SELECT nspname AS name
  FROM pg_catalog.pg_namespace
  ORDER BY nspname
`;

const COLUMNS_SQL = `
  SELECT a.attname AS name,
         pg_catalog.format_type(a.atttypid, a.atttypmod) AS formatted_type,
         a.attnotnull AS not_null,
         pg_catalog.pg_get_expr(d.adbin, d.adrelid) AS default_expression,
         a.attidentity::text AS identity,
         a.attgenerated::text AS generated
  FROM pg_catalog.pg_attribute a
  JOIN pg_catalog.pg_class c ON c.oid = a.attrelid
  JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
  LEFT JOIN pg_catalog.pg_attrdef d ON d.adrelid = a.attrelid AND d.adnum = a.attnum
  WHERE n.nspname = $1 AND c.relname = $2
    AND a.attnum > 0
    AND NOT a.attisdropped
  ORDER BY a.attnum
`;

const CONSTRAINTS_SQL = `
  SELECT con.conname AS name,
         con.contype::text AS kind,
         pg_catalog.pg_get_constraintdef(con.oid, true) AS definition
  FROM pg_catalog.pg_constraint con
  JOIN pg_catalog.pg_class c ON c.oid = con.conrelid
  JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
  WHERE n.nspname = $1 AND c.relname = $2
    AND con.contype IN ('p', 'u', 'x', 'c', 'f')
    AND con.conislocal
  ORDER BY CASE con.contype WHEN 'p' THEN 0 WHEN 'u' THEN 1 WHEN 'x' THEN 2 WHEN 'c' THEN 3 ELSE 4 END,
           con.conname
`;

// Indexes backing a primary key, unique or exclusion constraint come back with ADD CONSTRAINT.
const INDEXES_SQL = `
  SELECT ic.relname AS name,
         pg_catalog.pg_get_indexdef(i.indexrelid) AS definition
  FROM pg_catalog.pg_index i
  JOIN pg_catalog.pg_class c ON c.oid = i.indrelid
  JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
  JOIN pg_catalog.pg_class ic ON ic.oid = i.indexrelid
  WHERE n.nspname = $1 AND c.relname = $2
    AND NOT i.indisprimary
    AND NOT EXISTS (
      SELECT 1 FROM pg_catalog.pg_constraint con
      WHERE con.conindid = i.indexrelid
        AND con.conrelid = i.indrelid
        AND con.contype IN ('p', 'u', 'x')
    )
  ORDER BY ic.relname
`;

const SEQUENCE_SQL = `
  SELECT data_type::text AS data_type,
         start_value::text AS start_value,
         min_value::text AS min_value,
         max_value::text AS max_value,
         increment_by::text AS increment_by,
         cycle
  FROM pg_catalog.pg_sequences
  WHERE schemaname = $1 AND sequencename = $2
`;

type TableRow = { table_schema: string; table_name: string };

type ColumnRow = {
  name: string;
  formatted_type: string;
  not_null: boolean;
  default_expression: string | null;
  identity: string;
  generated: string;
};

type ConstraintRow = { name: string; kind: string; definition: string };

type IndexRow = { name: string; definition: string };

type SequenceRow = {
  data_type: string;
  start_value: string;
  min_value: string;
  max_value: string;
  increment_by: string;
  cycle: boolean;
};

const CONSTRAINT_KINDS: readonly ConstraintKind[] = ['p', 'u', 'x', 'c', 'f'];

function isConstraintKind(value: string): value is ConstraintKind {
  return CONSTRAINT_KINDS.some((kind) => kind === value);
}

function toIdentityKind(flag: string): IdentityKind {
  if (flag === 'a') return 'always';
  if (flag === 'd') return 'byDefault';
  return 'none';
}

export function isSystemSchema(schema: string): boolean {
  return (
    schema === 'pg_catalog' ||
    schema === 'information_schema' ||
    schema.startsWith('pg_toast') ||
    schema.startsWith('pg_temp')
  );
}

function describeRef(ref: TableRef): string {
  return `${ref.schemaName}.${ref.tableName}`;
}

/**
 * Reads the source catalog. Every query failure surfaces as CatalogQueryError, which
 * aborts the database's migration.
 */
export class CatalogIntrospector {
  constructor(private readonly db: DbPort) {}

  async listTables(excludeSchemas?: RegExp): Promise<TableRef[]> {
    const rows = await this.guard('listTables', {}, () =>
      this.db.query<TableRow>(LIST_TABLES_SQL, [], { operation: 'listTables' })
    );
    return rows
      .filter((row) => !isSystemSchema(row.table_schema))
      .filter((row) => !excludeSchemas || !excludeSchemas.test(row.table_schema))
      .map((row) => ({ schemaName: row.table_schema, tableName: row.table_name }));
  }

  /** User schemas, optionally only those matching `pattern`. */
  async listSchemas(pattern?: RegExp): Promise<string[]> {
    const rows = await this.guard('listSchemas', {}, () =>
      this.db.query<{ name: string }>(LIST_SCHEMAS_SQL, [], { operation: 'listSchemas' })
    );
    return rows
      .map((row) => row.name)
      .filter((name) => !isSystemSchema(name))
      .filter((name) => !pattern || pattern.test(name));
  }

  async describeTable(ref: TableRef): Promise<TableDefinition> {
    return this.guard('describeTable', { table: describeRef(ref) }, () =>
      this.db.withTransaction(async (tx) => {
        // Unqualified names in rendered expressions then mean "the table's schema".
        await tx.query('SELECT pg_catalog.set_config($1, $2, true)', ['search_path', quoteIdent(ref.schemaName)], {
          operation: 'setSearchPath',
        });
        const columns = await this.readColumns(tx, ref);
        const constraints = await this.readConstraints(tx, ref);
        const indexes = await this.readIndexes(tx, ref);
        return { ref, columns, constraints, indexes };
      })
    );
  }

  async describeSequence(schema: string, name: string): Promise<SequenceOptions | null> {
    const row = await this.guard('describeSequence', { sequence: `${schema}.${name}` }, () =>
      this.db.queryOne<SequenceRow>(SEQUENCE_SQL, [schema, name], { operation: 'describeSequence' })
    );
    if (!row) return null;
    return {
      dataType: row.data_type,
      startValue: row.start_value,
      minValue: row.min_value,
      maxValue: row.max_value,
      incrementBy: row.increment_by,
      cycle: row.cycle,
    };
  }

  async snapshot(excludeSchemas?: RegExp): Promise<SchemaSnapshot> {
    const refs = await this.listTables(excludeSchemas);
    const tables: TableDefinition[] = [];
    for (const ref of refs) {
      tables.push(await this.describeTable(ref));
    }
    const sequences: SequenceDefinition[] = [];
    for (const reference of collectSequenceReferences(tables)) {
      const options = await this.describeSequence(reference.sequenceSchema, reference.sequenceName);
      if (!options) {
        logger.warn('sequence-not-found', { sequence: `${reference.sequenceSchema}.${reference.sequenceName}` });
      }
      sequences.push({ reference, options });
    }
    logger.info('catalog-snapshot', { tables: tables.length, sequences: sequences.length });
    return { tables, sequences };
  }

  private async readColumns(tx: DbTransactionPort, ref: TableRef): Promise<ColumnInfo[]> {
    const rows = await tx.query<ColumnRow>(COLUMNS_SQL, [ref.schemaName, ref.tableName], { operation: 'readColumns' });
    return rows.map((row) => ({
      name: row.name,
      formattedType: row.formatted_type,
      notNull: row.not_null,
      defaultExpression: row.default_expression,
      identityKind: toIdentityKind(row.identity),
      generated: row.generated !== '',
    }));
  }

  private async readConstraints(tx: DbTransactionPort, ref: TableRef): Promise<ConstraintInfo[]> {
    const rows = await tx.query<ConstraintRow>(CONSTRAINTS_SQL, [ref.schemaName, ref.tableName], {
      operation: 'readConstraints',
    });
    const constraints: ConstraintInfo[] = [];
    for (const row of rows) {
      if (isConstraintKind(row.kind)) {
        constraints.push({ name: row.name, kind: row.kind, definition: row.definition });
      }
    }
    return constraints;
  }

  private async readIndexes(tx: DbTransactionPort, ref: TableRef): Promise<IndexInfo[]> {
    return tx.query<IndexRow>(INDEXES_SQL, [ref.schemaName, ref.tableName], { operation: 'readIndexes' });
  }

  private async guard<T>(operation: string, context: Record<string, unknown>, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (err) {
      if (err instanceof ToolError) throw err;
      throw new CatalogQueryError(`Catalog query ${operation} failed: ${errorMessage(err)}`, {
        operation,
        ...context,
        ...(typeof err === 'object' && err !== null && 'code' in err ? { code: err.code } : {}),
      });
    }
  }
}
