import { Router, type Request, type Response } from 'express';
import { receiptAssignSchema } from '../schemas/orders.schema';
import { deleteOrder, finalizeJobOrder, finalizeNormalOrder } from '../services/orderFinalization.service';
import type { SalesServiceDeps } from '../services/sales/types';
import { asyncErrorHandler } from '../middleware/validation/errors';
import { validateUuidParam } from '../middleware/validation/schema';

export function createOrdersRouter(deps: SalesServiceDeps) {
  const router = Router();

  router.post(
    '/orders/:orderId/receipt',
    validateUuidParam('orderId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const parsed = receiptAssignSchema.safeParse(req.body);
        if (!parsed.success) {
          return res.status(400).json({ error: 'Invalid request body.', details: parsed.error.flatten() });
        }
        const order = await finalizeNormalOrder(deps, req.params.orderId, parsed.data.receiptNumber);
        return res.json({ message: 'Receipt updated', order });
      },
      {
        fallbackMessage: 'Failed to assign receipt.',
        pg: {
          check: () => ({ status: 409, body: { error: 'Stock cannot go negative.', code: 'INSUFFICIENT_STOCK' } })
        }
      }
    )
  );

  router.post(
    '/orders/:orderId/job-order-completion',
    validateUuidParam('orderId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const order = await finalizeJobOrder(deps, req.params.orderId);
        return res.json({ message: 'Job order finalized', order });
      },
      {
        fallbackMessage: 'Failed to finalize job order.',
        pg: {
          check: () => ({ status: 409, body: { error: 'Stock cannot go negative.', code: 'INSUFFICIENT_STOCK' } })
        }
      }
    )
  );

  router.delete(
    '/orders/:orderId',
    validateUuidParam('orderId'),
    asyncErrorHandler(
      async (req: Request, res: Response) => {
        const result = await deleteOrder(deps, req.params.orderId);
        return res.json({
          message: 'Order deleted',
          stockRestored: result.stockRestored,
          restoredLineCount: result.restoredLineCount
        });
      },
      { fallbackMessage: 'Failed to delete order.' }
    )
  );

  return router;
}
