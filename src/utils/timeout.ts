import { ExternalTimeoutError } from '../domain/errors.js';

/**
 * Race a promise against a timer. The timer is cleared either way so a
 * settled call leaves nothing pending on the event loop.
 *
 * @param operation Label used in the timeout error
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new ExternalTimeoutError(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
