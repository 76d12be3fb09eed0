import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { connectionStringFor, DatabaseConfig } from '../config/database.config';
import { ConfigError, DumpToolError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { CommandResult, nodeSpawner, pgCliConnection, runCommand, Spawner } from '../utils/process.util';
import type { DbConnector, DbPort, DbRow } from './ports/db.port';
import { ScriptApplier } from './schema-migration/script-applier';

export interface DbToolDependencies {
  connect?: DbConnector;
  spawner?: Spawner;
  pgDumpPath?: string;
  psqlPath?: string;
}

const RESULT_SET_STATEMENT = /^\s*(select|with|show|values|table|explain)\b/i;

/** Statements that return a result set; anything else prints `OK` when it yields no rows. */
export function returnsRows(sql: string): boolean {
  return RESULT_SET_STATEMENT.test(sql) || /\breturning\b/i.test(sql);
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'NULL';
  if (value instanceof Date) return value.toISOString();
  if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

/** `col=value | col=value` per row, or the rows as indented JSON. */
export function formatQueryRows(rows: DbRow[], asJson: boolean): string[] {
  if (asJson) return [JSON.stringify(rows, null, 2)];
  return rows.map((row) =>
    Object.entries(row)
      .map(([column, value]) => `${column}=${formatValue(value)}`)
      .join(' | ')
  );
}

/**
 * Everyday database chores against the server described by the `DB_*` configuration.
 */
export class DbToolService {
  private readonly connect: DbConnector;

  private readonly spawner: Spawner;

  private readonly pgDumpPath: string;

  private readonly applier: ScriptApplier;

  constructor(private readonly config: DatabaseConfig, deps: DbToolDependencies = {}) {
    this.connect = deps.connect ?? ((connectionString) => createPostgresDbAdapter({ connectionString }));
    this.spawner = deps.spawner ?? nodeSpawner;
    this.pgDumpPath = deps.pgDumpPath ?? 'pg_dump';
    this.applier = new ScriptApplier({ spawner: this.spawner, psqlPath: deps.psqlPath });
  }

  dsnFor(dbName: string): string {
    return connectionStringFor(this.config, dbName);
  }

  async listDatabases(): Promise<string[]> {
    const rows = await this.withDb(this.config.name ?? 'postgres', (db) =>
      db.query<{ datname: string }>('SELECT datname FROM pg_database WHERE datistemplate = false ORDER BY datname', [], {
        operation: 'listDatabases',
      })
    );
    return rows.map((row) => row.datname);
  }

  async listTables(dbName: string, schema?: string): Promise<string[]> {
    const rows = await this.withDb(dbName, (db) =>
      db.query<{ table_schema: string; table_name: string }>(
        `SELECT table_schema, table_name FROM information_schema.tables
         WHERE table_type = 'BASE TABLE'
           AND table_schema NOT IN ('pg_catalog', 'information_schema')
           AND ($1::text IS NULL OR table_schema = $1)
         ORDER BY table_schema, table_name`,
        [schema ?? null],
        { operation: 'listTables' }
      )
    );
    return rows.map((row) => `${row.table_schema}.${row.table_name}`);
  }

  async dump(dbName: string, file: string, structureOnly: boolean): Promise<void> {
    const conn = pgCliConnection(this.dsnFor(dbName));
    const args = ['-d', conn.dsn, '-f', file];
    if (structureOnly) args.push('--schema-only');
    logger.info('dbtool-dump', { database: dbName, file, structureOnly });
    let result: CommandResult;
    try {
      result = await runCommand(this.spawner, this.pgDumpPath, args, { env: conn.env });
    } catch (err) {
      throw new DumpToolError(`pg_dump could not be started: ${errorMessage(err)}`, '', { database: dbName });
    }
    if (result.code !== 0) {
      throw new DumpToolError(`pg_dump exited with code ${result.code ?? 'null'}`, result.stderr.trim(), {
        database: dbName,
        file,
      });
    }
  }

  async importFile(dbName: string, file: string, overwrite: boolean): Promise<void> {
    if (overwrite) await this.reset(dbName);
    logger.info('dbtool-import', { database: dbName, file });
    await this.applier.apply(this.dsnFor(dbName), file);
  }

  /** Drops and recreates the `public` schema. */
  async reset(dbName: string): Promise<void> {
    logger.info('dbtool-reset', { database: dbName });
    await this.withDb(dbName, (db) =>
      db.withTransaction(async (tx) => {
        await tx.query('DROP SCHEMA IF EXISTS public CASCADE', [], { operation: 'dropPublicSchema' });
        await tx.query('CREATE SCHEMA public', [], { operation: 'createPublicSchema' });
      })
    );
  }

  async query(dbName: string, sql: string, asJson: boolean): Promise<string[]> {
    if (!sql.trim()) {
      throw new ConfigError('Empty query');
    }
    const rows = await this.withDb(dbName, (db) => db.query(sql, [], { operation: 'adhocQuery' }));
    if (rows.length === 0 && !returnsRows(sql)) return ['OK'];
    return formatQueryRows(rows, asJson);
  }

  private async withDb<T>(dbName: string, handler: (db: DbPort) => Promise<T>): Promise<T> {
    const db = this.connect(this.dsnFor(dbName));
    await db.connect();
    try {
      return await handler(db);
    } finally {
      await db.disconnect();
    }
  }
}
