import { spawn, StdioOptions } from 'child_process';
import { EventEmitter } from 'events';
import type { Readable, Writable } from 'stream';

/** The slice of ChildProcess the tools rely on; tests substitute an EventEmitter with PassThrough streams. */
export interface SpawnedProcess extends EventEmitter {
  stdin: Writable | null;
  stdout: Readable | null;
  stderr: Readable | null;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export interface SpawnRequest {
  stdio: StdioOptions;
  env?: NodeJS.ProcessEnv;
}

export type Spawner = (command: string, args: string[], options: SpawnRequest) => SpawnedProcess;

export const nodeSpawner: Spawner = (command, args, options) => spawn(command, args, options);

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

export interface PgCliConnection {
  /** The connection URL without its password. */
  dsn: string;
  env: NodeJS.ProcessEnv;
}

/**
 * Moves the password of a postgres:// URL into PGPASSWORD so it stays out of the
 * process list. Anything that does not parse as a URL is passed through unchanged.
 */
export function pgCliConnection(dsn: string, baseEnv: NodeJS.ProcessEnv = process.env): PgCliConnection {
  let url: URL;
  try {
    url = new URL(dsn);
  } catch {
    return { dsn, env: baseEnv };
  }
  if (!url.password) return { dsn, env: baseEnv };
  const password = decodeURIComponent(url.password);
  url.password = '';
  return { dsn: url.toString(), env: { ...baseEnv, PGPASSWORD: password } };
}

export function collectOutput(stream: Readable | null, into: Buffer[]): void {
  stream?.on('data', (chunk: Buffer | string) => into.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk)));
}

/**
 * Runs a command to completion and resolves with its exit code and captured output.
 * A non-zero exit resolves; only a failure to start rejects.
 */
export function runCommand(
  spawner: Spawner,
  command: string,
  args: string[],
  options: { env?: NodeJS.ProcessEnv } = {}
): Promise<CommandResult> {
  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawner(command, args, { stdio: ['ignore', 'pipe', 'pipe'], env: options.env });
    const out: Buffer[] = [];
    const err: Buffer[] = [];
    collectOutput(child.stdout, out);
    collectOutput(child.stderr, err);
    child.once('error', (e: Error) => reject(e));
    child.once('close', (code: number | null) => {
      resolve({ code, stdout: Buffer.concat(out).toString(), stderr: Buffer.concat(err).toString() });
    });
  });
}
