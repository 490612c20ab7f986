import {
  SalesError,
  assertSufficientStock,
  duplicateReceipt,
  orderNotFound,
  requiresDeferredPath,
  selectDeferredLines,
  type OrderLineStockRow,
  type OrderSummaryRow,
  type SalesLedgerTx,
  type StockDeduction
} from '../domains/sales';
import { getRequestContext } from '../lib/requestContext';
import { emitOrderEvent, ORDER_EVENT } from '../observability/orderFinalization.events';
import { mapOrderSummary, type OrderSummary } from './sales/mappers';
import type { SalesServiceDeps } from './sales/types';

export type OrderDeletionResult = {
  orderId: string;
  stockRestored: boolean;
  restoredLineCount: number;
};

type FinalizationOutcome = {
  summary: OrderSummaryRow;
  alreadyCompleted: boolean;
  stockDeduction: StockDeduction;
  deductedLineCount: number;
  receiptUpdated: boolean;
};

/**
 * Validates every line against its locked balance before touching any of them,
 * so a shortage aborts the transaction with no partial deduction.
 */
async function deductLines(tx: SalesLedgerTx, lines: OrderLineStockRow[]): Promise<number> {
  assertSufficientStock(
    lines.map((line) => ({
      itemId: line.item_id,
      itemName: line.item_name,
      quantity: line.quantity,
      available: line.stock_quantity
    }))
  );
  for (const line of lines) {
    await tx.adjustItemStock(line.item_id, -line.quantity);
  }
  return lines.length;
}

async function completeDraft(
  tx: SalesLedgerTx,
  orderId: string,
  completedAt: Date,
  stockDeduction: StockDeduction
): Promise<void> {
  const transitioned = await tx.completeDraftOrder(orderId, { completedAt, stockDeduction });
  if (!transitioned) {
    // The order row is locked by this transaction, so the draft state cannot have moved.
    throw new Error('ORDER_FINALIZATION_STATE_DRIFT');
  }
}

function actingUserId(): string | null {
  return getRequestContext()?.userId ?? null;
}

async function loadSummary(tx: SalesLedgerTx, orderId: string): Promise<OrderSummaryRow> {
  const summary = await tx.getOrderSummary(orderId);
  if (!summary) {
    throw orderNotFound(orderId);
  }
  return summary;
}

/**
 * Normal (receipt) completion.
 *
 * Stock is deducted only on the draft -> finalized transition, and only for orders
 * with no deferred-category line; the decision is made from the status read under
 * the order row lock. A finalized order keeps its completion time and only has its
 * receipt replaced.
 */
export async function finalizeNormalOrder(
  deps: SalesServiceDeps,
  orderId: string,
  receiptNumber: string
): Promise<OrderSummary> {
  const now = deps.clock ? deps.clock() : new Date();
  const { deferredCategory } = deps.policy;

  const outcome = await deps.store.withTransaction<FinalizationOutcome>(async (tx) => {
    const holder = await tx.findOrderIdByReceipt(receiptNumber, orderId);
    if (holder) {
      throw duplicateReceipt(receiptNumber, holder);
    }

    const order = await tx.lockOrderForUpdate(orderId);
    if (!order) {
      throw orderNotFound(orderId);
    }
    const alreadyCompleted = order.status === 'finalized';

    const lines = await tx.lockOrderLinesForUpdate(orderId);
    const isDeferredOrder = requiresDeferredPath(lines, deferredCategory);

    let deductedLineCount = 0;
    if (!alreadyCompleted && !isDeferredOrder) {
      deductedLineCount = await deductLines(tx, lines);
    }

    await tx.setReceiptNumber(orderId, receiptNumber);

    let stockDeduction = order.stock_deduction;
    if (!alreadyCompleted) {
      stockDeduction = isDeferredOrder ? 'none' : 'all_lines';
      await completeDraft(tx, orderId, now, stockDeduction);
    }

    const receiptUpdated = order.receipt_number !== receiptNumber;
    if (!alreadyCompleted || receiptUpdated) {
      await tx.recordActivity({
        userId: actingUserId(),
        action: 'finalize',
        entityType: 'order',
        entityId: orderId,
        description: alreadyCompleted
          ? `Replaced receipt on order ${orderId} with ${receiptNumber}.`
          : `Finalized order ${orderId} with receipt ${receiptNumber}.`,
        metadata: { path: 'receipt', receiptNumber, stockDeduction, deductedLineCount },
        occurredAt: now
      });
    }

    return {
      summary: await loadSummary(tx, orderId),
      alreadyCompleted,
      stockDeduction,
      deductedLineCount,
      receiptUpdated
    };
  });

  if (outcome.alreadyCompleted) {
    emitOrderEvent(
      ORDER_EVENT.FINALIZATION_REPEATED,
      { orderId, path: 'receipt', receiptUpdated: outcome.receiptUpdated },
      deps.logEvent
    );
  } else {
    emitOrderEvent(
      ORDER_EVENT.FINALIZED,
      {
        orderId,
        path: 'receipt',
        stockDeduction: outcome.stockDeduction,
        deductedLineCount: outcome.deductedLineCount
      },
      deps.logEvent
    );
  }
  return mapOrderSummary(outcome.summary);
}

/**
 * Job-order completion: timestamp only, no receipt. On the first call the
 * deferred-category lines are deducted; later calls are no-op writes.
 */
export async function finalizeJobOrder(deps: SalesServiceDeps, orderId: string): Promise<OrderSummary> {
  const now = deps.clock ? deps.clock() : new Date();
  const { deferredCategory } = deps.policy;

  const outcome = await deps.store.withTransaction<FinalizationOutcome>(async (tx) => {
    const order = await tx.lockOrderForUpdate(orderId);
    if (!order) {
      throw orderNotFound(orderId);
    }
    const hadCompletionBefore = order.status === 'finalized';

    const deferredLines = selectDeferredLines(await tx.listOrderLines(orderId), deferredCategory);
    if (deferredLines.length === 0) {
      throw new SalesError('ORDER_NOT_DEFERRED', `Order does not contain any '${deferredCategory}' items.`, {
        orderId,
        deferredCategory
      });
    }

    let deductedLineCount = 0;
    if (!hadCompletionBefore) {
      const lockedLines = await tx.lockOrderLinesForUpdate(orderId, { category: deferredCategory });
      deductedLineCount = await deductLines(tx, lockedLines);
      await completeDraft(tx, orderId, now, 'deferred_lines');
      await tx.recordActivity({
        userId: actingUserId(),
        action: 'finalize',
        entityType: 'order',
        entityId: orderId,
        description: `Finalized job order ${orderId}.`,
        metadata: { path: 'job_order', stockDeduction: 'deferred_lines', deductedLineCount },
        occurredAt: now
      });
    }

    return {
      summary: await loadSummary(tx, orderId),
      alreadyCompleted: hadCompletionBefore,
      stockDeduction: hadCompletionBefore ? order.stock_deduction : 'deferred_lines',
      deductedLineCount,
      receiptUpdated: false
    };
  });

  if (outcome.alreadyCompleted) {
    emitOrderEvent(
      ORDER_EVENT.FINALIZATION_REPEATED,
      { orderId, path: 'job_order', receiptUpdated: false },
      deps.logEvent
    );
  } else {
    emitOrderEvent(
      ORDER_EVENT.FINALIZED,
      {
        orderId,
        path: 'job_order',
        stockDeduction: outcome.stockDeduction,
        deductedLineCount: outcome.deductedLineCount
      },
      deps.logEvent
    );
  }
  return mapOrderSummary(outcome.summary);
}

/**
 * Removes an order and its lines in any state. Whether stock that a finalizer
 * already took is credited back depends on the configured delete policy.
 */
export async function deleteOrder(deps: SalesServiceDeps, orderId: string): Promise<OrderDeletionResult> {
  const now = deps.clock ? deps.clock() : new Date();
  const { deferredCategory, deleteStockPolicy } = deps.policy;

  const result = await deps.store.withTransaction(async (tx) => {
    const order = await tx.lockOrderForUpdate(orderId);
    if (!order) {
      throw orderNotFound(orderId);
    }

    let restoredLineCount = 0;
    if (deleteStockPolicy === 'restore' && order.stock_deduction !== 'none') {
      const lines = await tx.lockOrderLinesForUpdate(
        orderId,
        order.stock_deduction === 'deferred_lines' ? { category: deferredCategory } : {}
      );
      for (const line of lines) {
        await tx.adjustItemStock(line.item_id, line.quantity);
      }
      restoredLineCount = lines.length;
    }

    await tx.deleteOrder(orderId);
    await tx.recordActivity({
      userId: actingUserId(),
      action: 'delete',
      entityType: 'order',
      entityId: orderId,
      description: `Deleted order ${orderId} (${order.status}); stock policy ${deleteStockPolicy}, ${restoredLineCount} lines restored.`,
      metadata: { status: order.status, stockDeduction: order.stock_deduction, policy: deleteStockPolicy, restoredLineCount },
      occurredAt: now
    });

    return { wasFinalized: order.status === 'finalized', restoredLineCount };
  });

  emitOrderEvent(
    ORDER_EVENT.DELETED,
    {
      orderId,
      wasFinalized: result.wasFinalized,
      policy: deleteStockPolicy,
      restoredLineCount: result.restoredLineCount
    },
    deps.logEvent
  );
  return {
    orderId,
    stockRestored: result.restoredLineCount > 0,
    restoredLineCount: result.restoredLineCount
  };
}
