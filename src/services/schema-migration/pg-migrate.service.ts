import { promises as fs } from 'fs';
import * as path from 'path';
import type { DbConnector, DbPort } from '../ports/db.port';
import { quoteIdent } from '../../adapters/db/fqn.utils';
import { createPostgresDbAdapter } from '../../adapters/db/postgres.adapter';
import { adminDsn, MigrateOptions, TargetConfig, targetDsnFor } from '../../config/migrate.config';
import { ConfigError, errorMessage } from '../../utils/errors';
import { logger, redactDsn } from '../../utils/logger';
import { getOrCreateCounter } from '../../utils/metrics';
import type { Spawner } from '../../utils/process.util';
import { CatalogIntrospector } from './catalog-introspector';
import { emitPostDataScript, emitPreDataScript, emitSequenceAnchors } from './ddl-emitter';
import { RowCopier } from './row-copier';
import { diagnoseMissingRoles, DumpSection, missingRoleOid, SchemaDumper } from './schema-dump';
import { ScriptApplier } from './script-applier';
import { buildTargetDbName, parseSourceDsn, readDsnLines, SourceInfo, sourceFullName } from './source-dsn';
import type { SchemaSnapshot } from './types';

const databasesMigrated = getOrCreateCounter('infra_pg_migrate_databases_total', 'Databases processed by pg-migrate', [
  'outcome',
]);

export interface PgMigrateDependencies {
  connect?: DbConnector;
  spawner?: Spawner;
  /** Receives the `ok: <source> -> <target>` lines. */
  report?: (line: string) => void;
}

export interface MigrationOutcome {
  source: string;
  target: string;
  schemaSource: 'introspect' | 'pg-dump';
}

const defaultConnector: DbConnector = (connectionString) => createPostgresDbAdapter({ connectionString });

/**
 * Drops (optionally) and creates the target database through the maintenance connection.
 */
export async function ensureDatabase(admin: DbPort, name: string, dropExisting: boolean): Promise<void> {
  if (dropExisting) {
    try {
      await admin.query(
        `SELECT pg_catalog.pg_terminate_backend(pid) FROM pg_catalog.pg_stat_activity
         WHERE datname = $1 AND pid <> pg_catalog.pg_backend_pid()`,
        [name],
        { operation: 'terminateSessions' }
      );
    } catch (err) {
      logger.warn('terminate-sessions-failed', { database: name, error: errorMessage(err) });
    }
    logger.info('database-drop', { database: name });
    await admin.query(`DROP DATABASE IF EXISTS ${quoteIdent(name)}`, [], { operation: 'dropDatabase' });
  }
  const row = await admin.queryOne<{ exists: boolean }>(
    'SELECT EXISTS (SELECT 1 FROM pg_catalog.pg_database WHERE datname = $1) AS exists',
    [name],
    { operation: 'databaseExists' }
  );
  if (row?.exists) {
    logger.debug('database-exists', { database: name });
    return;
  }
  logger.info('database-create', { database: name });
  await admin.query(`CREATE DATABASE ${quoteIdent(name)}`, [], { operation: 'createDatabase' });
}

/**
 * Per source database: ensure target → pre-data → copy rows → post-data. Databases run one
 * after another; the first failure stops the batch and leaves earlier targets in place.
 */
export class PgMigrateService {
  private readonly connect: DbConnector;

  private readonly spawner?: Spawner;

  private readonly report: (line: string) => void;

  private readonly dumper: SchemaDumper;

  private readonly applier: ScriptApplier;

  constructor(
    private readonly options: MigrateOptions,
    private readonly target: TargetConfig,
    deps: PgMigrateDependencies = {}
  ) {
    this.connect = deps.connect ?? defaultConnector;
    this.spawner = deps.spawner;
    this.report = deps.report ?? ((line) => console.log(line));
    this.dumper = new SchemaDumper({ spawner: deps.spawner });
    this.applier = new ScriptApplier({ spawner: deps.spawner });
  }

  async run(): Promise<MigrationOutcome[]> {
    const lines = await readDsnLines(this.options.inputFile);
    if (lines.length === 0) {
      throw new ConfigError(`No DSNs found in ${this.options.inputFile}`);
    }
    await fs.mkdir(this.options.dumpDir, { recursive: true });

    const admin = this.connect(adminDsn(this.target));
    await admin.connect();
    const outcomes: MigrationOutcome[] = [];
    try {
      for (const line of lines) {
        let source: SourceInfo;
        try {
          source = parseSourceDsn(line);
        } catch (err) {
          logger.warn('skip-invalid-dsn', { dsn: redactDsn(line), reason: errorMessage(err) });
          continue;
        }
        try {
          outcomes.push(await this.migrateDatabase(admin, source));
          databasesMigrated.inc({ outcome: 'success' });
        } catch (err) {
          databasesMigrated.inc({ outcome: 'failure' });
          throw err;
        }
      }
    } finally {
      await admin.disconnect();
    }
    return outcomes;
  }

  async migrateDatabase(admin: DbPort, source: SourceInfo): Promise<MigrationOutcome> {
    const targetDb = buildTargetDbName(source, this.options.includeBranch);
    const targetDsn = targetDsnFor(this.target, targetDb);
    logger.info('migrate-database', { source: redactDsn(source.dsn), target: targetDb });

    await ensureDatabase(admin, targetDb, this.options.dropExisting);

    const sourceDb = this.connect(source.dsn);
    await sourceDb.connect();
    try {
      const run = new DatabaseRun(sourceDb, source.dsn, this.options, this.dumper);
      const prePath = path.join(this.options.dumpDir, `${targetDb}.pre.sql`);
      const postPath = path.join(this.options.dumpDir, `${targetDb}.post.sql`);

      await run.writeScript('pre-data', prePath);
      await this.applier.apply(targetDsn, prePath);

      if (this.options.dataStrategy === 'copy') {
        const snapshot = await run.snapshot();
        const copier = new RowCopier({ sourceDsn: source.dsn, targetDsn, spawner: this.spawner });
        await copier.copyTables(snapshot.tables);
      }

      await run.writeScript('post-data', postPath);
      await this.applier.apply(targetDsn, postPath);

      this.report(`ok: ${sourceFullName(source)} -> ${targetDb}`);
      return { source: sourceFullName(source), target: targetDb, schemaSource: run.schemaSource };
    } finally {
      await sourceDb.disconnect();
    }
  }
}

/**
 * Schema state for one source database. Once a dump falls back to introspection, the
 * remaining section is introspected too so pre and post scripts describe the same objects.
 */
class DatabaseRun {
  schemaSource: 'introspect' | 'pg-dump';

  private cached: SchemaSnapshot | null = null;

  private excluded: string[] | null = null;

  private readonly introspector: CatalogIntrospector;

  constructor(
    private readonly sourceDb: DbPort,
    private readonly sourceDsn: string,
    private readonly options: MigrateOptions,
    private readonly dumper: SchemaDumper
  ) {
    this.introspector = new CatalogIntrospector(sourceDb);
    this.schemaSource = options.schemaStrategy === 'introspect' ? 'introspect' : 'pg-dump';
  }

  async snapshot(): Promise<SchemaSnapshot> {
    if (!this.cached) {
      this.cached = await this.introspector.snapshot(this.options.excludeSchemas);
    }
    return this.cached;
  }

  async writeScript(section: DumpSection, file: string): Promise<void> {
    if (this.schemaSource === 'pg-dump' && (await this.dumpSection(section, file))) {
      if (section === 'post-data' && this.options.dataStrategy === 'copy') {
        // Schema-only dumps carry no sequence values.
        const anchors = emitSequenceAnchors(await this.snapshot());
        if (anchors) await fs.appendFile(file, `\n${anchors}\n`, 'utf8');
      }
      return;
    }
    const snapshot = await this.snapshot();
    const script = section === 'pre-data' ? emitPreDataScript(snapshot) : emitPostDataScript(snapshot);
    await fs.writeFile(file, script, 'utf8');
    logger.debug('script-written', { section, file, source: 'introspect' });
  }

  /** Source schemas matching the exclude pattern, read once for both dump sections. */
  private async excludedSchemas(): Promise<string[]> {
    if (!this.options.excludeSchemas) return [];
    if (!this.excluded) {
      this.excluded = await this.introspector.listSchemas(this.options.excludeSchemas);
    }
    return this.excluded;
  }

  /** True when the dump produced the file; false when falling back to introspection. */
  private async dumpSection(section: DumpSection, file: string): Promise<boolean> {
    const result = await this.dumper.dump({
      sourceDsn: this.sourceDsn,
      section,
      outFile: file,
      excludeSchemas: await this.excludedSchemas(),
      allowFallback: this.options.schemaStrategy === 'auto',
    });
    if (result.kind === 'ok') {
      logger.debug('script-written', { section, file, source: 'pg-dump' });
      return true;
    }
    await this.diagnose(result.error.stderr);
    if (result.kind === 'fatal') {
      throw result.error;
    }
    logger.warn('pg-dump-fallback', { section, error: result.error.message, stderr: result.error.stderr });
    this.schemaSource = 'introspect';
    return false;
  }

  private async diagnose(stderr: string): Promise<void> {
    const oid = missingRoleOid(stderr);
    if (!oid) return;
    try {
      await diagnoseMissingRoles(this.sourceDb, oid);
    } catch (err) {
      logger.warn('missing-role-diagnosis-failed', { oid, error: errorMessage(err) });
    }
  }
}
