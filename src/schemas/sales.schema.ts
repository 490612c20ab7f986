import { z } from 'zod';

const uuid = () => z.string().uuid();

const optionalText = (max: number) =>
  z.preprocess((val) => {
    if (typeof val !== 'string') return val;
    const trimmed = val.trim();
    return trimmed === '' ? null : trimmed;
  }, z.string().max(max).nullable().optional());

export const saleLineSchema = z.object({
  itemId: uuid(),
  quantity: z.number().int().positive()
});

export const saleCreateSchema = z.object({
  userId: uuid(),
  payerName: z.string().trim().min(1).max(255),
  receiptNumber: optionalText(64),
  payerReference: optionalText(64),
  payerProgram: optionalText(128),
  items: z.array(saleLineSchema).min(1)
});
