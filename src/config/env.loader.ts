import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { logger } from '../utils/logger';

export type EnvRecord = Record<string, string | undefined>;

/**
 * Collects `.env` files from `startDir` upward, stopping at the directory that
 * holds `.git` (inclusive) or at the filesystem root. Closest file first.
 */
export function findEnvFiles(startDir: string): string[] {
  const found: string[] = [];
  let dir = path.resolve(startDir);
  for (;;) {
    const candidate = path.join(dir, '.env');
    if (fs.existsSync(candidate) && fs.statSync(candidate).isFile()) {
      found.push(candidate);
    }
    const gitDir = path.join(dir, '.git');
    if (fs.existsSync(gitDir) && fs.statSync(gitDir).isDirectory()) break;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return found;
}

/**
 * Applies the `.env` files root-first, never overriding a variable already present in
 * `env`; a key set by an outer file is therefore kept over a nested one. Returns the
 * files in the order applied.
 */
export function loadNearestEnv(startDir: string = process.cwd(), env: EnvRecord = process.env): string[] {
  const files = findEnvFiles(startDir).reverse();
  for (const file of files) {
    const parsed = dotenv.parse(fs.readFileSync(file));
    for (const [key, value] of Object.entries(parsed)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
    logger.debug('env-file-applied', { path: file });
  }
  return files;
}
