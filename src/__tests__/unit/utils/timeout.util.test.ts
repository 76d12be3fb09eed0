import { withTimeout } from '../../../utils/timeout.util';
import { TimeoutError } from '../../../utils/errors';

describe('withTimeout', () => {
  it('resolves with the operation result when it settles in time', async () => {
    await expect(withTimeout('quick', 1000, Promise.resolve('done'))).resolves.toBe('done');
  });

  it('passes the operation failure through', async () => {
    await expect(withTimeout('failing', 1000, Promise.reject(new Error('nope')))).rejects.toThrow('nope');
  });

  it('rejects with TimeoutError once the deadline passes', async () => {
    const never = new Promise<string>(() => undefined);
    const result = withTimeout('database setup', 10, never);
    await expect(result).rejects.toBeInstanceOf(TimeoutError);
    await expect(result).rejects.toThrow('database setup timed out after 10ms');
  });
});
