import type { Request, Response, NextFunction } from 'express';
import { getRequestContext } from '../lib/requestContext';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  userId?: string;
  userAgent?: string;
  ip?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = Date.now();
  const bytesIn = Number(req.headers['content-length'] ?? 0);
  const userId = getRequestContext()?.userId ?? undefined;

  res.on('finish', () => {
    const durationMs = Date.now() - start;
    const bytesOut = Number(res.getHeader('content-length') ?? 0);

    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs,
      bytesIn,
      bytesOut,
      userId,
      userAgent: req.header('user-agent') ?? undefined,
      ip: req.ip,
      timestamp: new Date().toISOString()
    };

    console.log(JSON.stringify(entry));
  });

  next();
}
