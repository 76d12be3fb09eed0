import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import type { EnvRecord } from './env.loader';

const DatabaseConfigSchema = z.object({
  url: z.string().optional(),
  host: z.string().min(1).default('localhost'),
  port: z.coerce.number().int().positive().default(5432),
  name: z.string().optional(),
  user: z.string().optional(),
  password: z.string().optional(),
  sslMode: z.string().min(1).default('disable'),
  migrationsDir: z.string().min(1).default('./migrations'),
});

export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;

function firstNonEmpty(...values: Array<string | undefined>): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) return trimmed;
  }
  return undefined;
}

function parseUrl(value: string): URL | null {
  try {
    return new URL(value);
  } catch {
    return null;
  }
}

export function isPostgresUrl(value: string): boolean {
  const url = parseUrl(value);
  return url !== null && (url.protocol === 'postgres:' || url.protocol === 'postgresql:');
}

export function isXataHttpsUrl(value: string): boolean {
  const url = parseUrl(value);
  return url !== null && url.protocol === 'https:' && url.host.includes('xata.sh');
}

/** Replaces the database path of a postgres URL; null when the URL has no database path. */
export function withDatabaseName(connectionString: string, dbName: string): string | null {
  const url = parseUrl(connectionString);
  if (!url || url.pathname === '' || url.pathname === '/') return null;
  url.pathname = `/${encodeURIComponent(dbName)}`;
  return url.toString();
}

export function buildPostgresUrl(parts: {
  host: string;
  port: number;
  user?: string;
  password?: string;
  dbName: string;
  sslMode: string;
}): string {
  const auth = parts.user
    ? `${encodeURIComponent(parts.user)}${parts.password ? `:${encodeURIComponent(parts.password)}` : ''}@`
    : '';
  return `postgresql://${auth}${parts.host}:${parts.port}/${encodeURIComponent(parts.dbName)}?sslmode=${encodeURIComponent(parts.sslMode)}`;
}

export function loadDatabaseConfig(env: EnvRecord = process.env): DatabaseConfig {
  const url = firstNonEmpty(env.DATABASE_URL);
  if (url && isXataHttpsUrl(url)) {
    throw new ConfigError(
      'DATABASE_URL is a Xata HTTPS endpoint, not a PostgreSQL DSN. Use a postgres:// connection URL.'
    );
  }
  const parsed = DatabaseConfigSchema.safeParse({
    url,
    host: firstNonEmpty(env.DB_HOST),
    port: firstNonEmpty(env.DB_PORT),
    name: firstNonEmpty(env.DB_NAME, env.DB_DATABASE),
    user: firstNonEmpty(env.DB_USER, env.DB_USERNAME),
    password: env.DB_PASSWORD,
    sslMode: firstNonEmpty(env.DB_SSLMODE, env.DB_SSL_MODE),
    migrationsDir: firstNonEmpty(env.DB_MIGRATIONS_DIR, env.MIGRATIONS_DIR),
  });
  if (!parsed.success) {
    throw new ConfigError(`Invalid database configuration: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`);
  }
  return parsed.data;
}

export function defaultDbName(config: DatabaseConfig): string {
  if (config.name) return config.name;
  if (config.url && isPostgresUrl(config.url)) {
    const url = parseUrl(config.url);
    const path = url ? decodeURIComponent(url.pathname.replace(/^\//, '')) : '';
    if (path) return path;
  }
  throw new ConfigError('No default database name found; set DB_NAME or DATABASE_URL');
}

export function connectionStringFor(config: DatabaseConfig, dbName: string): string {
  if (config.url && isPostgresUrl(config.url)) {
    return withDatabaseName(config.url, dbName) ?? config.url;
  }
  return buildPostgresUrl({
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    dbName,
    sslMode: config.sslMode,
  });
}
