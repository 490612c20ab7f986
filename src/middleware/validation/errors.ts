import type { Request, Response, NextFunction } from 'express';
import { isSalesError, type SalesError } from '../../domains/sales';
import { mapPgErrorToHttp, type HttpErrorBody, type MappedHttpError, type PgErrorMapping } from '../../lib/pgErrors';

type AsyncRouteHandler = (req: Request, res: Response, next: NextFunction) => Promise<unknown>;

export type RouteErrorOptions = {
  /** Message used for the 500 body when nothing else matches. */
  fallbackMessage: string;
  pg?: PgErrorMapping;
};

type ErrorBodyExtras = Pick<HttpErrorBody, 'code' | 'retryable'>;

/**
 * Create a standardized error response
 */
export function createErrorResponse(
  status: number,
  message: string,
  details?: unknown,
  extras: ErrorBodyExtras = {}
): MappedHttpError {
  return { status, body: { error: message, ...extras, ...(details !== undefined && { details }) } };
}

export function mapSalesErrorToHttp(error: SalesError): MappedHttpError {
  const source: Record<string, unknown> = error.details ?? {};
  const { message: detailMessage, ...details } = source;
  return createErrorResponse(
    error.status,
    typeof detailMessage === 'string' ? detailMessage : error.code,
    Object.keys(details).length > 0 ? details : undefined,
    { code: error.code, ...(error.retryable && { retryable: true }) }
  );
}

export function mapRouteError(error: unknown, options: RouteErrorOptions): MappedHttpError | null {
  if (isSalesError(error)) {
    return mapSalesErrorToHttp(error);
  }
  if (options.pg) {
    return mapPgErrorToHttp(error, options.pg);
  }
  return null;
}

/**
 * Higher-order function to create async error handling middleware.
 * Domain and Postgres constraint errors become their HTTP responses; anything else
 * is logged and answered with a 500.
 */
export function asyncErrorHandler(handler: AsyncRouteHandler, options: RouteErrorOptions) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      await handler(req, res, next);
    } catch (error) {
      const mapped = mapRouteError(error, options);
      if (mapped) {
        return res.status(mapped.status).json(mapped.body);
      }

      console.error(error);
      const details = error instanceof Error ? error.message : String(error);
      const fallback = createErrorResponse(
        500,
        options.fallbackMessage,
        process.env.NODE_ENV === 'development' ? details : undefined
      );
      return res.status(fallback.status).json(fallback.body);
    }
  };
}
