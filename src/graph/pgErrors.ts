/**
 * PostgreSQL error classification
 */

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EPIPE', 'EHOSTUNREACH']);

/** SQLSTATE for a foreign key violation */
export const FOREIGN_KEY_VIOLATION = '23503';

export function pgErrorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * True when the failure is about reaching the server rather than the query:
 * socket errors, SQLSTATE class 08 (connection exception), admin shutdown,
 * or the pool giving up on a connection.
 */
export function isConnectionFailure(error: unknown): boolean {
  const code = pgErrorCode(error);
  if (code && (NETWORK_CODES.has(code) || code.startsWith('08') || code.startsWith('57P'))) {
    return true;
  }

  const message = error instanceof Error ? error.message : '';
  return /connection terminated|timeout exceeded when trying to connect|cannot use a pool after calling end/i.test(
    message
  );
}
