// Error codes that mean "the database could not be reached or dropped us",
// as opposed to a statement that ran and failed.
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EHOSTUNREACH',
  'CONNECT_TIMEOUT',
  'CONNECTION_CLOSED',
  'CONNECTION_ENDED',
  'CONNECTION_DESTROYED',
  '08000', // connection_exception
  '08001', // sqlclient_unable_to_establish_sqlconnection
  '08003', // connection_does_not_exist
  '08006', // connection_failure
  '53300', // too_many_connections
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
]);

function readCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  const code = err.code;
  return typeof code === 'string' ? code : undefined;
}

function readCause(err: unknown): unknown {
  if (typeof err !== 'object' || err === null || !('cause' in err)) return undefined;
  return err.cause;
}

/**
 * True when `err` (or anything in its `cause` chain) is a connection-level
 * failure. Statement errors such as unique violations return false.
 */
export function isConnectionFailure(err: unknown): boolean {
  let current: unknown = err;
  for (let depth = 0; current !== undefined && depth < 5; depth++) {
    const code = readCode(current);
    if (code && CONNECTION_ERROR_CODES.has(code)) return true;
    const msg = current instanceof Error ? current.message.toLowerCase() : '';
    if (
      msg.includes('connection refused') ||
      msg.includes('too many clients') ||
      msg.includes('database system is shutting down') ||
      msg.includes('connection terminated')
    ) {
      return true;
    }
    current = readCause(current);
  }
  return false;
}
