import { z } from 'zod';

export const monthlyReportQuerySchema = z.object({
  year: z.coerce.number().int().min(2000).max(9999),
  month: z.coerce.number().int().min(1).max(12)
});
