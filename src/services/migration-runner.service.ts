import { promises as fs } from 'fs';
import * as path from 'path';
import type { DbPort } from './ports/db.port';
import { logger } from '../utils/logger';

export interface Migration {
  id: string;
  sql: string;
}

const MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS public._migrations (
    id text PRIMARY KEY,
    applied_at timestamptz NOT NULL DEFAULT now()
  )
`;

/** `*.sql` files of `dir` sorted by name; a missing directory yields none. */
export async function readMigrationsFromDir(dir: string): Promise<Migration[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(dir);
  } catch (err) {
    if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
      logger.debug('migrations-dir-missing', { dir });
      return [];
    }
    throw err;
  }
  const files = entries.filter((name) => name.endsWith('.sql')).sort();
  const migrations: Migration[] = [];
  for (const file of files) {
    migrations.push({ id: file, sql: await fs.readFile(path.join(dir, file), 'utf8') });
  }
  return migrations;
}

export class MigrationRunner {
  constructor(private readonly db: DbPort) {}

  /** Applies pending migrations in id order, each in its own transaction. Returns the ids applied. */
  async apply(migrations: Migration[]): Promise<string[]> {
    await this.db.query(MIGRATIONS_TABLE_SQL, [], { operation: 'ensureMigrationsTable' });
    const rows = await this.db.query<{ id: string }>('SELECT id FROM public._migrations', [], {
      operation: 'listMigrations',
    });
    const done = new Set(rows.map((row) => row.id));
    const pending = [...migrations].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0)).filter((m) => !done.has(m.id));

    const applied: string[] = [];
    for (const migration of pending) {
      await this.db.withTransaction(async (tx) => {
        await tx.query(migration.sql, [], { operation: 'applyMigration' });
        await tx.insert('public._migrations', { id: migration.id }, { operation: 'recordMigration' });
      });
      logger.info('migration-applied', { id: migration.id });
      applied.push(migration.id);
    }
    return applied;
  }

  async applyFromDir(dir: string): Promise<string[]> {
    return this.apply(await readMigrationsFromDir(dir));
  }
}
