import { Router, type Request, type Response } from 'express';
import { monthlyReportQuerySchema } from '../schemas/reports.schema';
import { getDashboardTotals, getMonthlyReport, listTransactions } from '../services/reports.service';
import type { TransactionKind } from '../services/sales/types';
import type { SqlExecutor } from '../lib/sql';
import { asyncErrorHandler } from '../middleware/validation/errors';

export type ReportsRouteDeps = {
  executor: SqlExecutor;
  deferredCategory: string;
};

export function createReportsRouter(deps: ReportsRouteDeps) {
  const router = Router();

  const transactionsHandler = (kind: TransactionKind) =>
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const transactions = await listTransactions(deps.executor, kind, deps.deferredCategory);
        return res.json({ transactions });
      },
      { fallbackMessage: 'Failed to list transactions.' }
    );

  const monthlyReportHandler = (kind: TransactionKind) =>
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = monthlyReportQuerySchema.safeParse(req.query);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid query parameters.', details: parsed.error.flatten() });
        }
        const rows = await getMonthlyReport(deps.executor, kind, parsed.data, deps.deferredCategory);
        return res.json({ rows });
      },
      { fallbackMessage: 'Failed to build monthly report.' }
    );

  router.get('/transactions', transactionsHandler('normal'));
  router.get('/job-orders/transactions', transactionsHandler('job_order'));
  router.get('/monthly-report', monthlyReportHandler('normal'));
  router.get('/monthly-report/job-orders', monthlyReportHandler('job_order'));

  router.get(
    '/dashboard',
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const totals = await getDashboardTotals(deps.executor);
        return res.json(totals);
      },
      { fallbackMessage: 'Failed to load dashboard.' }
    )
  );

  return router;
}
