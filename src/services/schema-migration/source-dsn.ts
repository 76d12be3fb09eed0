import { promises as fs } from 'fs';
import { ConfigError } from '../../utils/errors';

export interface SourceInfo {
  dsn: string;
  db: string;
  branch: string | null;
}

export function sourceFullName(source: SourceInfo): string {
  return source.branch ? `${source.db}:${source.branch}` : source.db;
}

/**
 * Accepts postgres:// and postgresql:// URLs whose path names a database, optionally
 * followed by `:branch` as Xata branch URLs do.
 */
export function parseSourceDsn(dsn: string): SourceInfo {
  const trimmed = dsn.trim();
  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    throw new ConfigError('not a valid URL');
  }
  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    throw new ConfigError(`unsupported scheme "${url.protocol.replace(/:$/, '')}"`);
  }
  const rawDb = decodeURIComponent(url.pathname.replace(/^\//, ''));
  if (!rawDb) {
    throw new ConfigError('missing database in URL path');
  }
  const separator = rawDb.indexOf(':');
  if (separator === -1) {
    return { dsn: trimmed, db: rawDb, branch: null };
  }
  return { dsn: trimmed, db: rawDb.slice(0, separator), branch: rawDb.slice(separator + 1) || null };
}

export function sanitizeIdentifier(value: string): string {
  return value
    .trim()
    .replace(/-/g, '_')
    .replace(/\./g, '_')
    .replace(/:/g, '__')
    .replace(/[^a-zA-Z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
}

export function buildTargetDbName(source: Pick<SourceInfo, 'db' | 'branch'>, includeBranch: boolean): string {
  const raw = includeBranch && source.branch?.trim() ? `${source.db}__${source.branch}` : source.db;
  const name = sanitizeIdentifier(raw);
  if (!name) return 'db_xata';
  return /^[0-9]/.test(name) ? `db_${name}` : name;
}

/** Non-empty lines that are not `#` comments. */
export function parseDsnLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '' && !line.startsWith('#'));
}

export async function readDsnLines(file: string): Promise<string[]> {
  return parseDsnLines(await fs.readFile(file, 'utf8'));
}
