import { ConfigError } from './errors';

/**
 * Minimal argv helpers in the `--flag` / `--key=value` style used by every script.
 */

export function hasFlag(args: string[], ...names: string[]): boolean {
  return names.some((name) => args.includes(name));
}

export function readOption(args: string[], name: string): string | undefined {
  const prefix = `${name}=`;
  const arg = args.find((a) => a.startsWith(prefix));
  return arg === undefined ? undefined : arg.slice(prefix.length);
}

export function positionals(args: string[]): string[] {
  return args.filter((a) => !a.startsWith('-'));
}

const DURATION = /^(\d+(?:\.\d+)?)(ms|s|m)?$/;

/** Parses `500ms`, `3s`, `2m` or a bare number of seconds into milliseconds. */
export function parseDuration(value: string | undefined, fallbackMs: number): number {
  if (!value) return fallbackMs;
  const match = DURATION.exec(value.trim());
  if (!match) {
    throw new ConfigError(`Invalid duration: ${value}`);
  }
  const amount = Number(match[1]);
  switch (match[2]) {
    case 'ms':
      return amount;
    case 'm':
      return amount * 60_000;
    default:
      return amount * 1000;
  }
}
