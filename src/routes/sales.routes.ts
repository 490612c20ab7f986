import { Router, type Request, type Response } from 'express';
import { saleCreateSchema } from '../schemas/sales.schema';
import { createDraftSale, getSale, listCatalog } from '../services/sales.service';
import type { SalesServiceDeps } from '../services/sales/types';
import type { SqlExecutor } from '../lib/sql';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';

export type SalesRouteDeps = SalesServiceDeps & { executor: SqlExecutor };

export function createSalesRouter(deps: SalesRouteDeps) {
  const router = Router();

  router.get(
    '/api/sales/catalog',
    asyncErrorHandler(
      async (_req: Request, res: Response) => {
        const items = await listCatalog(deps.executor);
        return res.json(items);
      },
      { fallbackMessage: 'Failed to list catalog.' }
    )
  );

  router.post(
    '/api/sales',
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = saleCreateSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
        }
        const sale = await createDraftSale(deps, parsed.data);
        return res.status(201).json(sale);
      },
      {
        fallbackMessage: 'Failed to create sale.',
        pg: {
          foreignKey: () => ({ status: 400, body: { error: 'Referenced user or item not found.' } }),
          check: () => ({ status: 400, body: { error: 'Invalid quantity or price.' } })
        }
      }
    )
  );

  router.get(
    '/api/sales/:saleId',
    validateUuidParam('saleId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const sale = await getSale(deps.executor, req.params.saleId);
        return res.json(sale);
      },
      { fallbackMessage: 'Failed to fetch sale.' }
    )
  );

  return router;
}
