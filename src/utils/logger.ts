/*
 * Structured logger with redaction and LOG_LEVEL support.
 * Outputs single-line JSON on stderr so stdout stays free for command output.
 */

type Level = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<Exclude<Level, 'silent'>, number> = {
  debug: 20,
  info: 30,
  warn: 40,
  error: 50,
};

const LEVEL_NAMES: Level[] = ['debug', 'info', 'warn', 'error', 'silent'];

let levelOverride: Level | undefined;

function isLevel(value: string): value is Level {
  return LEVEL_NAMES.some((name) => name === value);
}

/** Pins the level for the rest of the process, e.g. when a script receives `-v`. */
export function setLogLevel(level: Level | undefined): void {
  levelOverride = level;
}

function currentLevel(): Level {
  if (levelOverride) return levelOverride;
  const lvl = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(lvl) ? lvl : 'info';
}

function levelEnabled(lvl: keyof typeof LEVELS): boolean {
  const cur = currentLevel();
  if (cur === 'silent') return false;
  return LEVELS[lvl] >= LEVELS[cur];
}

// Keys to redact in objects
const SENSITIVE_KEYS = new Set([
  'authorization',
  'cookie',
  'set-cookie',
  'password',
  'token',
  'apikey',
  'api_key',
  'x-api-key',
  'secret',
]);

const POSTGRES_URL_PASSWORD = /(postgres(?:ql)?:\/\/[^:/@\s]+):[^@\s]*@/gi;

function isObject(val: unknown): val is Record<string, unknown> {
  return !!val && typeof val === 'object' && !Array.isArray(val);
}

/** Replaces the password of every postgres:// URL in `value` with `***`. */
export function redactDsn(value: string): string {
  return value.replace(POSTGRES_URL_PASSWORD, '$1:***@');
}

export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    if (/^Bearer\s+/i.test(value)) return 'Bearer [REDACTED]';
    return redactDsn(value);
  }
  return value;
}

export function redactObject(input: Record<string, unknown>, allowList: string[] = []): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(input)) {
    const lowered = k.toLowerCase();
    if (SENSITIVE_KEYS.has(lowered) && !allowList.includes(lowered)) {
      out[k] = '[REDACTED]';
      continue;
    }
    if (isObject(v)) out[k] = redactObject(v, allowList);
    else if (Array.isArray(v)) out[k] = v.map((i) => (isObject(i) ? redactObject(i, allowList) : redactValue(i)));
    else out[k] = redactValue(v);
  }
  return out;
}

function serializeError(err: Error): Record<string, unknown> {
  const out: Record<string, unknown> = { name: err.name, message: redactDsn(err.message) };
  if ('code' in err && err.code !== undefined) out.code = err.code;
  return out;
}

function normalizeContext(ctx?: unknown): Record<string, unknown> | undefined {
  if (ctx == null) return undefined;
  if (ctx instanceof Error) return { err: serializeError(ctx) };
  if (isObject(ctx)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(ctx)) {
      out[k] = v instanceof Error ? serializeError(v) : v;
    }
    return out;
  }
  return { value: ctx };
}

function write(level: Exclude<Level, 'silent'>, msg: string, ctx?: unknown) {
  if (!levelEnabled(level)) return;
  const base: Record<string, unknown> = {
    level,
    msg,
    timestamp: new Date().toISOString(),
  };
  const normalized = normalizeContext(ctx);
  const payload = normalized ? { ...base, ...redactObject(normalized) } : base;
  console.error(JSON.stringify(payload));
}

function toContext(args: unknown[]): unknown {
  if (args.length === 0) return undefined;
  if (args.length === 1) return args[0];
  return args;
}

export const logger = {
  debug: (msg: string, ...ctx: unknown[]) => write('debug', msg, toContext(ctx)),
  info: (msg: string, ...ctx: unknown[]) => write('info', msg, toContext(ctx)),
  warn: (msg: string, ...ctx: unknown[]) => write('warn', msg, toContext(ctx)),
  error: (msg: string, ...ctx: unknown[]) => write('error', msg, toContext(ctx)),
};

export type { Level };
