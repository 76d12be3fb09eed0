import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import { buildPostgresUrl, isPostgresUrl } from './database.config';
import type { EnvRecord } from './env.loader';

export type TargetConfig =
  | { kind: 'url'; url: string }
  | { kind: 'discrete'; host: string; port: number; user: string; password: string; sslMode: string };

const DiscreteTargetSchema = z.object({
  host: z.string().min(1),
  port: z.coerce.number().int().positive(),
  user: z.string().min(1),
  password: z.string(),
  sslMode: z.string().min(1),
});

const DISCRETE_KEYS = ['POSTGRESQL_HOST', 'POSTGRESQL_PORT', 'POSTGRESQL_USER', 'POSTGRESQL_PASSWORD'] as const;

/**
 * Resolves the migration target either from POSTGRESQL_DATABASE_URL or from the discrete
 * POSTGRESQL_HOST/PORT/USER/PASSWORD variables. Every missing variable is named in the error.
 */
export function loadTargetConfig(env: EnvRecord = process.env): TargetConfig {
  const url = env.POSTGRESQL_DATABASE_URL?.trim();
  if (url) {
    if (!isPostgresUrl(url)) {
      throw new ConfigError('POSTGRESQL_DATABASE_URL must be a postgres:// or postgresql:// URL');
    }
    return { kind: 'url', url };
  }
  const missing = DISCRETE_KEYS.filter((key) => env[key] === undefined || env[key] === '');
  if (missing.length > 0) {
    throw new ConfigError(
      `Target database not configured: set POSTGRESQL_DATABASE_URL or ${missing.join(', ')}`,
      { missing }
    );
  }
  const parsed = DiscreteTargetSchema.safeParse({
    host: env.POSTGRESQL_HOST,
    port: env.POSTGRESQL_PORT,
    user: env.POSTGRESQL_USER,
    password: env.POSTGRESQL_PASSWORD,
    sslMode: env.POSTGRESQL_SSLMODE?.trim() || 'disable',
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid target configuration: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return { kind: 'discrete', ...parsed.data };
}

export function targetDsnFor(target: TargetConfig, dbName: string): string {
  if (target.kind === 'url') {
    const url = new URL(target.url);
    url.pathname = `/${encodeURIComponent(dbName)}`;
    return url.toString();
  }
  return buildPostgresUrl({ ...target, dbName });
}

/** Maintenance connection used to create and drop databases. */
export function adminDsn(target: TargetConfig): string {
  return targetDsnFor(target, 'postgres');
}

export type SchemaStrategy = 'introspect' | 'pg-dump' | 'auto';
export type DataStrategy = 'copy' | 'none';

export interface MigrateOptions {
  inputFile: string;
  dumpDir: string;
  schemaStrategy: SchemaStrategy;
  dataStrategy: DataStrategy;
  dropExisting: boolean;
  includeBranch: boolean;
  excludeSchemas?: RegExp;
}

const MigrateOptionsSchema = z.object({
  inputFile: z.string().min(1, '--input is required'),
  dumpDir: z.string().min(1).default('./pg-migrate-dumps'),
  schemaStrategy: z.enum(['introspect', 'pg-dump', 'auto']).default('auto'),
  dataStrategy: z.enum(['copy', 'none']).default('copy'),
  dropExisting: z.boolean().default(false),
  includeBranch: z.boolean().default(true),
  excludeSchemas: z.string().optional(),
});

export type RawMigrateOptions = Partial<Record<keyof z.input<typeof MigrateOptionsSchema>, unknown>>;

export function parseMigrateOptions(raw: RawMigrateOptions): MigrateOptions {
  const parsed = MigrateOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid options: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  const { excludeSchemas, ...rest } = parsed.data;
  let pattern: RegExp | undefined;
  if (excludeSchemas) {
    try {
      pattern = new RegExp(excludeSchemas);
    } catch (err) {
      throw new ConfigError(`Invalid --exclude-schemas pattern: ${err instanceof Error ? err.message : String(err)}`);
    }
  }
  return { ...rest, excludeSchemas: pattern };
}
