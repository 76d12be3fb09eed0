import { once } from 'events';
import { qualifiedName, quoteIdent } from '../../adapters/db/fqn.utils';
import { CopySide, TableCopyError, errorMessage } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { getOrCreateCounter } from '../../utils/metrics';
import { collectOutput, nodeSpawner, pgCliConnection, SpawnedProcess, Spawner } from '../../utils/process.util';
import type { TableDefinition, TableRef } from './types';

const tablesCopied = getOrCreateCounter('infra_pg_migrate_tables_copied_total', 'Tables copied by pg-migrate', ['outcome']);

export interface RowCopierOptions {
  sourceDsn: string;
  targetDsn: string;
  psqlPath?: string;
  spawner?: Spawner;
}

interface ExitStatus {
  code: number | null;
  error?: Error;
  stderr: Buffer[];
}

function psqlArgs(dsn: string, command: string): string[] {
  return ['-X', '-q', '-v', 'ON_ERROR_STOP=1', '-d', dsn, '-c', command];
}

/** Resolves once the process is gone, whether it exited or never started. */
function waitForExit(child: SpawnedProcess): Promise<ExitStatus> {
  const stderr: Buffer[] = [];
  collectOutput(child.stderr, stderr);
  return new Promise<ExitStatus>((resolve) => {
    child.once('error', (error: Error) => resolve({ code: null, error, stderr }));
    child.once('close', (code: number | null) => resolve({ code, stderr }));
  });
}

export function copyableColumns(table: TableDefinition): string[] {
  return table.columns.filter((column) => !column.generated).map((column) => column.name);
}

export function buildCopyStatement(ref: TableRef, columns: string[], direction: 'out' | 'in'): string {
  const target = `${qualifiedName(ref.schemaName, ref.tableName)} (${columns.map(quoteIdent).join(', ')})`;
  return direction === 'out'
    ? `COPY ${target} TO STDOUT WITH (FORMAT binary)`
    : `COPY ${target} FROM STDIN WITH (FORMAT binary)`;
}

/**
 * Streams each table from source to target through two psql processes joined by a pipe.
 * The target starts first so an empty or fast source never writes into a closed pipe.
 */
export class RowCopier {
  private readonly spawner: Spawner;

  private readonly psqlPath: string;

  constructor(private readonly options: RowCopierOptions) {
    this.spawner = options.spawner ?? nodeSpawner;
    this.psqlPath = options.psqlPath ?? 'psql';
  }

  async copyTables(tables: TableDefinition[]): Promise<void> {
    for (const table of tables) {
      await this.copyTable(table);
    }
  }

  async copyTable(table: TableDefinition): Promise<void> {
    const name = `${table.ref.schemaName}.${table.ref.tableName}`;
    const columns = copyableColumns(table);
    if (columns.length === 0) {
      logger.debug('copy-skip-no-columns', { table: name });
      return;
    }
    const startedAt = Date.now();

    const targetConn = pgCliConnection(this.options.targetDsn);
    const target = this.spawner(this.psqlPath, psqlArgs(targetConn.dsn, buildCopyStatement(table.ref, columns, 'in')), {
      stdio: ['pipe', 'ignore', 'pipe'],
      env: targetConn.env,
    });
    const targetExit = waitForExit(target);
    try {
      await once(target, 'spawn');
    } catch (err) {
      tablesCopied.inc({ outcome: 'failure' });
      throw new TableCopyError(`Cannot start target copy for ${name}: ${errorMessage(err)}`, 'target', { table: name });
    }

    const sourceConn = pgCliConnection(this.options.sourceDsn);
    const source = this.spawner(this.psqlPath, psqlArgs(sourceConn.dsn, buildCopyStatement(table.ref, columns, 'out')), {
      stdio: ['ignore', 'pipe', 'pipe'],
      env: sourceConn.env,
    });
    const sourceExit = waitForExit(source);

    // Once the target is gone nothing drains the pipe, so a still-running source would block forever.
    let sourceClosed = false;
    let sourceStopped = false;
    source.once('close', () => {
      sourceClosed = true;
    });
    const stopSource = (reason: string) => {
      if (sourceClosed || sourceStopped) return;
      sourceStopped = true;
      logger.warn('copy-source-stopped', { table: name, reason });
      source.kill();
    };
    target.once('close', (code: number | null) => {
      if (code !== 0) stopSource(`target exited with code ${code ?? 'null'}`);
    });

    const stdin = target.stdin;
    stdin?.on('error', (err: Error) => stopSource(`target stdin: ${err.message}`));
    if (source.stdout && stdin) {
      source.stdout.pipe(stdin);
    } else {
      stdin?.end();
    }
    source.once('error', () => {
      sourceClosed = true;
      stdin?.end();
    });

    const [sourceStatus, targetStatus] = await Promise.all([sourceExit, targetExit]);
    if (sourceStopped) {
      this.assertSucceeded(name, 'target', targetStatus);
    }
    this.assertSucceeded(name, 'source', sourceStatus);
    this.assertSucceeded(name, 'target', targetStatus);
    tablesCopied.inc({ outcome: 'success' });
    logger.info('table-copied', { table: name, columns: columns.length, durationMs: Date.now() - startedAt });
  }

  private assertSucceeded(table: string, side: CopySide, status: ExitStatus): void {
    if (!status.error && status.code === 0) return;
    tablesCopied.inc({ outcome: 'failure' });
    const stderr = Buffer.concat(status.stderr).toString().trim();
    const reason = status.error ? status.error.message : `exit code ${status.code ?? 'null'}`;
    throw new TableCopyError(`Copy of ${table} failed on ${side} (${reason})${stderr ? `: ${stderr}` : ''}`, side, {
      table,
      exitCode: status.code,
      stderr,
    });
  }
}
