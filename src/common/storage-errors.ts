import { CannotExecuteNotConnectedError, ConnectionIsNotSetError, QueryFailedError } from 'typeorm';

const NETWORK_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EHOSTUNREACH']);

// 57P01 admin_shutdown, 57P03 cannot_connect_now, clase 08 = connection exception
const PG_UNAVAILABLE = /^(08...|57P01|57P03)$/;

function errorCode(e: object): string | undefined {
  return 'code' in e && (typeof e.code === 'string' || typeof e.code === 'number') ? String(e.code) : undefined;
}

/**
 * true si el error indica que la base no está alcanzable (no un error de la consulta en sí).
 */
export function isStorageUnavailable(e: unknown): boolean {
  if (e instanceof ConnectionIsNotSetError || e instanceof CannotExecuteNotConnectedError) return true;
  if (e instanceof QueryFailedError) return isStorageUnavailable(e.driverError);
  if (typeof e !== 'object' || e === null) return false;

  const code = errorCode(e);
  if (!code) return false;
  return NETWORK_CODES.has(code) || PG_UNAVAILABLE.test(code);
}
