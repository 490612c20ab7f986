export type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type HttpErrorBody = {
  error: string;
  code?: string;
  details?: unknown;
  retryable?: boolean;
};

export type MappedHttpError = { status: number; body: HttpErrorBody };

export type PgErrorMapping = {
  unique?: (err: PgError) => MappedHttpError | null;
  foreignKey?: (err: PgError) => MappedHttpError | null;
  check?: (err: PgError) => MappedHttpError | null;
  notNull?: (err: PgError) => MappedHttpError | null;
};

const LOCK_NOT_AVAILABLE = '55P03';
const DEADLOCK_DETECTED = '40P01';

export function asPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') {
    return null;
  }
  const code = 'code' in err && typeof err.code === 'string' ? err.code : undefined;
  const constraint = 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : undefined;
  const detail = 'detail' in err && typeof err.detail === 'string' ? err.detail : undefined;
  return { code, constraint, detail };
}

/**
 * True when Postgres gave up waiting for a row lock (lock_timeout) or broke a deadlock.
 * Both leave the transaction aborted and are safe for the caller to retry whole.
 */
export function isLockConflict(err: unknown): boolean {
  const pgErr = asPgError(err);
  return pgErr?.code === LOCK_NOT_AVAILABLE || pgErr?.code === DEADLOCK_DETECTED;
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
  const pgErr = asPgError(err);
  if (pgErr?.code !== '23505') return false;
  return constraint === undefined || pgErr.constraint === constraint;
}

/**
 * Maps Postgres errors to HTTP responses while preserving per-route semantics.
 *
 * This helper intentionally does NOT provide default messages. Callers supply
 * message bodies via the optional mapping callbacks.
 */
export function mapPgErrorToHttp(err: unknown, mapping: PgErrorMapping): MappedHttpError | null {
  const pgErr = asPgError(err);
  if (!pgErr) {
    return null;
  }
  switch (pgErr.code) {
    case '23505':
      return mapping.unique?.(pgErr) ?? null;
    case '23503':
      return mapping.foreignKey?.(pgErr) ?? null;
    case '23514':
      return mapping.check?.(pgErr) ?? null;
    case '23502':
      return mapping.notNull?.(pgErr) ?? null;
    default:
      return null;
  }
}
