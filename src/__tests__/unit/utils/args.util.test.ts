import { hasFlag, parseDuration, positionals, readOption } from '../../../utils/args.util';
import { ConfigError } from '../../../utils/errors';

describe('argument helpers', () => {
  const args = ['db', 'dump', 'main', '--structure-only', '--schema=sales', '-v'];

  it('detects flags by any of their names', () => {
    expect(hasFlag(args, '-v', '--verbose')).toBe(true);
    expect(hasFlag(args, '--json')).toBe(false);
  });

  it('reads --key=value options', () => {
    expect(readOption(args, '--schema')).toBe('sales');
    expect(readOption(['--query=SELECT 1 = 1'], '--query')).toBe('SELECT 1 = 1');
    expect(readOption(args, '--missing')).toBeUndefined();
  });

  it('returns the non-flag words in order', () => {
    expect(positionals(args)).toEqual(['db', 'dump', 'main']);
  });
});

describe('parseDuration', () => {
  it('accepts milliseconds, seconds, minutes and bare seconds', () => {
    expect(parseDuration('250ms', 1)).toBe(250);
    expect(parseDuration('3s', 1)).toBe(3000);
    expect(parseDuration('2m', 1)).toBe(120_000);
    expect(parseDuration('1.5', 1)).toBe(1500);
  });

  it('falls back when unset', () => {
    expect(parseDuration(undefined, 45_000)).toBe(45_000);
    expect(parseDuration('', 20)).toBe(20);
  });

  it('rejects anything else as a config error', () => {
    expect(() => parseDuration('soon', 1)).toThrow(ConfigError);
  });
});
