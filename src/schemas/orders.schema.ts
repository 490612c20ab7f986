import { z } from 'zod';

export const receiptAssignSchema = z.object({
  receiptNumber: z.string().trim().min(1).max(64)
});
