import type { DbPort } from '../ports/db.port';
import { DumpToolError, errorMessage } from '../../utils/errors';
import { logger, redactDsn } from '../../utils/logger';
import { nodeSpawner, pgCliConnection, runCommand, Spawner } from '../../utils/process.util';

export type DumpSection = 'pre-data' | 'post-data';

export type DumpResult =
  | { kind: 'ok'; path: string }
  | { kind: 'recoverable'; error: DumpToolError }
  | { kind: 'fatal'; error: DumpToolError };

export interface SchemaDumperOptions {
  pgDumpPath?: string;
  spawner?: Spawner;
}

export interface DumpRequest {
  sourceDsn: string;
  section: DumpSection;
  outFile: string;
  excludeSchemas: string[];
  /** When set, a failed dump is reported as recoverable instead of fatal. */
  allowFallback: boolean;
}

const MISSING_ROLE_OID = /role with OID (\d+) does not exist/;

/** pg_dump pattern matching exactly one schema name. */
export function literalSchemaPattern(schema: string): string {
  return `"${schema.replace(/"/g, '""')}"`;
}

export function pgDumpArgs(request: DumpRequest): string[] {
  return [
    '-d',
    request.sourceDsn,
    '--no-owner',
    '--no-acl',
    '--no-comments',
    '--no-security-labels',
    '--schema-only',
    `--section=${request.section}`,
    ...request.excludeSchemas.map((schema) => `--exclude-schema=${literalSchemaPattern(schema)}`),
    '--file',
    request.outFile,
  ];
}

export function missingRoleOid(stderr: string): string | null {
  const match = MISSING_ROLE_OID.exec(stderr);
  return match ? match[1] : null;
}

export class SchemaDumper {
  private readonly spawner: Spawner;

  private readonly pgDumpPath: string;

  constructor(options: SchemaDumperOptions = {}) {
    this.spawner = options.spawner ?? nodeSpawner;
    this.pgDumpPath = options.pgDumpPath ?? 'pg_dump';
  }

  async dump(request: DumpRequest): Promise<DumpResult> {
    logger.debug('pg-dump-start', { source: redactDsn(request.sourceDsn), section: request.section, file: request.outFile });
    let error: DumpToolError | null = null;
    try {
      const conn = pgCliConnection(request.sourceDsn);
      const result = await runCommand(this.spawner, this.pgDumpPath, pgDumpArgs({ ...request, sourceDsn: conn.dsn }), {
        env: conn.env,
      });
      if (result.code !== 0) {
        error = new DumpToolError(
          `pg_dump ${request.section} exited with code ${result.code ?? 'null'}`,
          result.stderr.trim(),
          { section: request.section, exitCode: result.code }
        );
      }
    } catch (err) {
      error = new DumpToolError(`pg_dump could not be started: ${errorMessage(err)}`, '', { section: request.section });
    }
    if (!error) return { kind: 'ok', path: request.outFile };
    return request.allowFallback ? { kind: 'recoverable', error } : { kind: 'fatal', error };
  }
}

type OwnerProbe = { name: string; sql: string };

const OWNER_PROBES: OwnerProbe[] = [
  {
    name: 'databases',
    sql: `SELECT d.datname AS object, d.datdba::text AS owner_oid
          FROM pg_catalog.pg_database d LEFT JOIN pg_catalog.pg_roles r ON r.oid = d.datdba
          WHERE r.oid IS NULL LIMIT 20`,
  },
  {
    name: 'schemas',
    sql: `SELECT n.nspname AS object, n.nspowner::text AS owner_oid
          FROM pg_catalog.pg_namespace n LEFT JOIN pg_catalog.pg_roles r ON r.oid = n.nspowner
          WHERE r.oid IS NULL LIMIT 20`,
  },
  {
    name: 'relations',
    sql: `SELECT n.nspname || '.' || c.relname || ' (' || c.relkind || ')' AS object, c.relowner::text AS owner_oid
          FROM pg_catalog.pg_class c
          JOIN pg_catalog.pg_namespace n ON n.oid = c.relnamespace
          LEFT JOIN pg_catalog.pg_roles r ON r.oid = c.relowner
          WHERE r.oid IS NULL LIMIT 20`,
  },
  {
    name: 'functions',
    sql: `SELECT n.nspname || '.' || p.proname AS object, p.proowner::text AS owner_oid
          FROM pg_catalog.pg_proc p
          JOIN pg_catalog.pg_namespace n ON n.oid = p.pronamespace
          LEFT JOIN pg_catalog.pg_roles r ON r.oid = p.proowner
          WHERE r.oid IS NULL LIMIT 20`,
  },
  {
    name: 'types',
    sql: `SELECT n.nspname || '.' || t.typname AS object, t.typowner::text AS owner_oid
          FROM pg_catalog.pg_type t
          JOIN pg_catalog.pg_namespace n ON n.oid = t.typnamespace
          LEFT JOIN pg_catalog.pg_roles r ON r.oid = t.typowner
          WHERE r.oid IS NULL LIMIT 20`,
  },
];

type OwnerRow = { object: string; owner_oid: string };

export interface MissingRoleFinding {
  probe: string;
  objects: OwnerRow[];
}

/**
 * Looks for catalog objects owned by roles that no longer exist, the usual cause of
 * pg_dump's "role with OID n does not exist". Findings are logged, never thrown.
 */
export async function diagnoseMissingRoles(db: DbPort, oid: string): Promise<MissingRoleFinding[]> {
  const role = await db.queryOne<{ rolname: string }>('SELECT rolname FROM pg_catalog.pg_roles WHERE oid = $1::oid', [oid], {
    operation: 'probeRole',
  });
  logger.warn('pg-dump-missing-role', { oid, visibleAs: role?.rolname ?? null });
  const findings: MissingRoleFinding[] = [];
  for (const probe of OWNER_PROBES) {
    try {
      const objects = await db.query<OwnerRow>(probe.sql, [], { operation: `probe_${probe.name}` });
      if (objects.length > 0) {
        findings.push({ probe: probe.name, objects });
        logger.warn('missing-role-owner', { probe: probe.name, count: objects.length, sample: objects.slice(0, 5) });
      }
    } catch (err) {
      logger.warn('missing-role-probe-failed', { probe: probe.name, error: errorMessage(err) });
    }
  }
  return findings;
}
