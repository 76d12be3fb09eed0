import { Pool, PoolClient, PoolConfig } from 'pg';
import type { DbPort, DbQueryOptions, DbRow, DbTransactionPort } from '../../services/ports/db.port';
import { normalizeTableFqn, quoteIdent } from './fqn.utils';
import { logger, redactDsn } from '../../utils/logger';
import { getOrCreateCounter, getOrCreateHistogram } from '../../utils/metrics';
import { ConnectionError, ToolError } from '../../utils/errors';

const PROVIDER_LABEL = 'postgres';

export interface PostgresAdapterConfig {
  connectionString: string;
  poolMax: number;
  logSql: boolean;
  connectionTimeoutMs: number;
  longQueryWarnMs: number;
}

// prom-client label maps need an index signature, which interfaces do not get implicitly.
type MetricLabels = { provider: string; operation: string };

const attemptsCounter = getOrCreateCounter(
  'infra_db_query_attempts_total',
  'Total database query attempts by provider and operation',
  ['provider', 'operation']
);

const failureCounter = getOrCreateCounter(
  'infra_db_query_failures_total',
  'Total database query failures grouped by provider and error code',
  ['provider', 'code']
);

const durationHistogram = getOrCreateHistogram(
  'infra_db_query_duration_ms',
  'Database query duration in milliseconds',
  [5, 10, 25, 50, 100, 250, 500, 1000, 2000, 5000],
  ['provider', 'operation']
);

const longRunningCounter = getOrCreateCounter(
  'infra_db_query_long_running_total',
  'Total number of database queries exceeding the configured warning threshold',
  ['provider', 'operation']
);

// SQLSTATE classes and socket errors that mean the server could not be reached or refused us.
const CONNECTION_CODES = new Set(['ECONNREFUSED', 'ENOTFOUND', 'ETIMEDOUT', 'ECONNRESET', '28P01', '28000', '3D000']);

function buildConfig(overrides: Partial<PostgresAdapterConfig> & { connectionString: string }): PostgresAdapterConfig {
  return {
    connectionString: overrides.connectionString,
    poolMax: overrides.poolMax ?? 4,
    logSql: overrides.logSql ?? false,
    connectionTimeoutMs: overrides.connectionTimeoutMs ?? 10000,
    longQueryWarnMs: overrides.longQueryWarnMs ?? 500,
  };
}

function inferOperation(sql: string, fallback: string): string {
  const match = sql.trim().split(/\s+/)[0];
  if (!match) {
    return fallback;
  }
  return match.toLowerCase();
}

function preprocessParams(params: unknown[] = []): unknown[] {
  return params.map((value) => {
    if (value === undefined) {
      return null;
    }
    if (value === null || value instanceof Date || Buffer.isBuffer(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      const containsOnlyPrimitives = value.every((item) =>
        item === null || ['string', 'number', 'boolean'].includes(typeof item)
      );
      return containsOnlyPrimitives ? value : JSON.stringify(value);
    }
    if (typeof value === 'object') {
      return JSON.stringify(value);
    }
    return value;
  });
}

export class PostgresAdapterError extends Error {
  readonly code: string;

  constructor(message: string, code: string) {
    super(message);
    this.name = 'PostgresAdapterError';
    this.code = code;
  }
}

export function mapPgError(err: unknown): PostgresAdapterError {
  if (err instanceof PostgresAdapterError) {
    return err;
  }
  const code =
    typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string' ? err.code : 'unknown';
  const message = err instanceof Error ? err.message : 'Unknown Postgres error';
  return new PostgresAdapterError(message, code);
}

interface ExecuteOptions {
  params?: unknown[];
  options?: DbQueryOptions;
  client?: PoolClient;
}

class ScopedTransactionAdapter implements DbTransactionPort {
  constructor(private readonly adapter: PostgresDbAdapter, private readonly client: PoolClient) {}

  query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    return this.adapter.runQuery<T>(sql, { params, options, client: this.client }).then((r) => r.rows);
  }

  async queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.adapter.runQuery<T>(sql, { params, options, client: this.client });
    return result.rows[0] ?? null;
  }

  insert(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<void> {
    return this.adapter.insertInternal(tableFqn, row, options, this.client);
  }

  upsert(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<void> {
    return this.adapter.upsertInternal(tableFqn, keyColumns, row, options, this.client);
  }
}

export class PostgresDbAdapter implements DbPort {
  private readonly pool: Pool;

  private readonly logSql: boolean;

  constructor(private readonly config: PostgresAdapterConfig) {
    const poolConfig: PoolConfig = {
      connectionString: config.connectionString,
      max: config.poolMax,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    };
    this.pool = new Pool(poolConfig);
    this.logSql = config.logSql;
  }

  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      const mapped = mapPgError(error);
      if (CONNECTION_CODES.has(mapped.code) || mapped.code.startsWith('08')) {
        throw new ConnectionError(`Cannot connect to ${redactDsn(this.config.connectionString)}: ${mapped.message}`, {
          code: mapped.code,
        });
      }
      throw mapped;
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new ScopedTransactionAdapter(this, client);
      const result = await handler(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await client.query('ROLLBACK');
      if (error instanceof ToolError) throw error;
      throw mapPgError(error);
    } finally {
      client.release();
    }
  }

  async query<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows;
  }

  async queryOne<T extends DbRow = DbRow>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows[0] ?? null;
  }

  async insert(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<void> {
    await this.insertInternal(tableFqn, row, options);
  }

  async upsert(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<void> {
    await this.upsertInternal(tableFqn, keyColumns, row, options);
  }

  private buildLabels(operation: string | undefined, sql: string): MetricLabels {
    const fallback = operation ?? inferOperation(sql, 'query');
    return { provider: PROVIDER_LABEL, operation: fallback };
  }

  private recordLongQuery(labels: MetricLabels, startTime: number, error?: unknown): void {
    const durationMs = Date.now() - startTime;
    const threshold = this.config.longQueryWarnMs;
    if (durationMs >= threshold) {
      longRunningCounter.inc(labels);
      logger.warn('db-query-long-running', {
        provider: PROVIDER_LABEL,
        operation: labels.operation,
        durationMs,
        thresholdMs: threshold,
        ...(error ? { error: error instanceof Error ? error.message : String(error) } : {}),
      });
    }
  }

  async runQuery<T extends DbRow = DbRow>(
    sql: string,
    { params = [], options, client }: ExecuteOptions
  ): Promise<{ rows: T[] }> {
    const values = preprocessParams(params);
    const labels = this.buildLabels(options?.operation, sql);
    attemptsCounter.inc(labels);
    const stopTimer = durationHistogram.startTimer(labels);
    const startTime = Date.now();
    try {
      if (this.logSql) {
        logger.debug('db-sql', { text: sql, values });
      }
      const result = client ? await client.query<T>(sql, values) : await this.pool.query<T>(sql, values);
      stopTimer();
      this.recordLongQuery(labels, startTime);
      return { rows: result.rows };
    } catch (error) {
      stopTimer();
      const mapped = mapPgError(error);
      failureCounter.inc({ provider: PROVIDER_LABEL, code: mapped.code });
      this.recordLongQuery(labels, startTime, mapped);
      throw mapped;
    }
  }

  async insertInternal(
    tableFqn: string,
    row: Record<string, unknown>,
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<void> {
    const entries = Object.entries(row);
    if (entries.length === 0) {
      throw new Error('insert requires at least one column');
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const columns = entries.map(([column]) => quoteIdent(column));
    const placeholders = entries.map((_, index) => `$${index + 1}`).join(', ');
    const sql = `INSERT INTO ${identifier} (${columns.join(', ')}) VALUES (${placeholders})`;
    const params = entries.map(([, value]) => value);
    await this.runQuery(sql, { params, options: { operation: options?.operation ?? 'insert' }, client });
  }

  async upsertInternal(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<void> {
    if (keyColumns.length === 0) {
      throw new Error('upsert requires at least one key column');
    }
    const entries = Object.entries(row);
    if (entries.length === 0) {
      throw new Error('upsert requires at least one column');
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const columns = entries.map(([column]) => quoteIdent(column));
    const insertPlaceholders = entries.map((_, index) => `$${index + 1}`).join(', ');
    const updateAssignments = entries
      .filter(([column]) => !keyColumns.includes(column))
      .map(([column]) => `${quoteIdent(column)} = EXCLUDED.${quoteIdent(column)}`)
      .join(', ');
    const sqlParts = [
      `INSERT INTO ${identifier} (${columns.join(', ')}) VALUES (${insertPlaceholders})`,
      `ON CONFLICT (${keyColumns.map(quoteIdent).join(', ')})`,
    ];
    if (updateAssignments) {
      sqlParts.push(`DO UPDATE SET ${updateAssignments}`);
    } else {
      sqlParts.push('DO NOTHING');
    }
    const sql = sqlParts.join(' ');
    const params = entries.map(([, value]) => value);
    await this.runQuery(sql, { params, options: { operation: options?.operation ?? 'upsert' }, client });
  }
}

export function createPostgresDbAdapter(
  config: Partial<PostgresAdapterConfig> & { connectionString: string }
): PostgresDbAdapter {
  return new PostgresDbAdapter(buildConfig(config));
}
