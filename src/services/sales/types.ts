import type { z } from 'zod';
import type { saleCreateSchema, saleLineSchema } from '../../schemas/sales.schema';
import type { monthlyReportQuerySchema } from '../../schemas/reports.schema';
import type { SalesPolicy } from '../../config/salesPolicy';
import type { SalesStore } from '../../domains/sales';
import type { OrderEventLogger } from '../../observability/orderFinalization.events';

export type SaleCreateInput = z.infer<typeof saleCreateSchema>;
export type SaleLineInput = z.infer<typeof saleLineSchema>;
export type MonthlyReportQuery = z.infer<typeof monthlyReportQuerySchema>;

export type TransactionKind = 'normal' | 'job_order';

export type SalesServiceDeps = {
  store: SalesStore;
  policy: SalesPolicy;
  clock?: () => Date;
  logEvent?: OrderEventLogger;
};
