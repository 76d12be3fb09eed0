import { TimeoutError } from './errors';

/** Rejects with `TimeoutError` when `operation` has not settled within `ms`. */
export async function withTimeout<T>(label: string, ms: number, operation: Promise<T>): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  try {
    return await Promise.race([
      operation,
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new TimeoutError(`${label} timed out after ${ms}ms`, { timeoutMs: ms })), ms);
      }),
    ]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
