import { Router, type Request, type Response } from 'express';
import type { SqlExecutor } from '../lib/sql';

const DB_TIMEOUT_MS = Number(process.env.HEALTH_DB_TIMEOUT_MS || 1500);

/**
 * Runs the readiness query, rejecting with `db timed out after <ms>ms` when the
 * pool does not answer within the budget.
 */
export async function pingDatabase(executor: SqlExecutor, timeoutMs: number): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`db timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    await Promise.race([executor.query('SELECT 1'), expired]);
  } finally {
    clearTimeout(timer);
  }
}

export function createHealthRouter(executor: SqlExecutor, options: { dbTimeoutMs?: number } = {}) {
  const router = Router();
  const dbTimeoutMs = options.dbTimeoutMs ?? DB_TIMEOUT_MS;

  router.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  router.get('/health/ready', async (_req: Request, res: Response) => {
    const start = Date.now();
    try {
      await pingDatabase(executor, dbTimeoutMs);
      return res.json({ status: 'ok', db: { ok: true }, durationMs: Date.now() - start });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return res.status(503).json({ status: 'unavailable', db: { ok: false, error: message }, durationMs: Date.now() - start });
    }
  });

  return router;
}
