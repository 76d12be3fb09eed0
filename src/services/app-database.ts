import { createPostgresDbAdapter } from '../adapters/db/postgres.adapter';
import { connectionStringFor, defaultDbName, loadDatabaseConfig } from '../config/database.config';
import type { EnvRecord } from '../config/env.loader';
import { logger } from '../utils/logger';
import { MigrationRunner } from './migration-runner.service';
import type { DbConnector, DbPort } from './ports/db.port';

export interface AppDatabase {
  db: DbPort;
  dbName: string;
}

/**
 * Connects to the tools' own database (`--db` or the configured default) and brings
 * its schema up to date from the migrations directory.
 */
export async function openAppDatabase(
  dbNameOverride: string | undefined,
  env: EnvRecord = process.env,
  connect: DbConnector = (connectionString) => createPostgresDbAdapter({ connectionString })
): Promise<AppDatabase> {
  const config = loadDatabaseConfig(env);
  const dbName = dbNameOverride?.trim() || defaultDbName(config);
  const db = connect(connectionStringFor(config, dbName));
  await db.connect();
  try {
    const applied = await new MigrationRunner(db).applyFromDir(config.migrationsDir);
    if (applied.length > 0) logger.info('migrations-applied', { database: dbName, count: applied.length });
  } catch (err) {
    await db.disconnect();
    throw err;
  }
  return { db, dbName };
}
