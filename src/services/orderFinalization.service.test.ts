import { describe, expect, it, vi } from 'vitest';
import type { OrderDeleteStockPolicy } from '../config/salesPolicy';
import { runWithRequestContext } from '../lib/requestContext';
import { InMemorySalesStore } from '../testing/inMemorySalesStore';
import { deleteOrder, finalizeJobOrder, finalizeNormalOrder } from './orderFinalization.service';
import { createDraftSale } from './sales.service';
import type { SalesServiceDeps } from './sales/types';

function at(second: number) {
  return new Date(Date.UTC(2024, 4, 1, 10, 0, second));
}

function setup(options: { deleteStockPolicy?: OrderDeleteStockPolicy; lockTimeoutMs?: number } = {}) {
  const lockTimeoutMs = options.lockTimeoutMs ?? 200;
  const store = new InMemorySalesStore({ lockTimeoutMs });
  const userId = store.addUser('cashier');
  const coffee = store.addItem({ name: 'Coffee', category: 'Drinks', price: 2, stock: 10 });
  const mug = store.addItem({ name: 'Mug', category: 'Souvenir', price: 8, stock: 5 });
  let tick = 0;
  const logEvent = vi.fn();
  const deps: SalesServiceDeps = {
    store,
    policy: {
      deferredCategory: 'Souvenir',
      deleteStockPolicy: options.deleteStockPolicy ?? 'retain',
      lockTimeoutMs
    },
    clock: () => at(tick++),
    logEvent
  };

  const draft = async (items: Array<{ itemId: string; quantity: number }>) => {
    const sale = await createDraftSale(deps, { userId, payerName: 'Dana', items });
    return sale.saleId;
  };

  return { store, deps, coffee, mug, logEvent, draft };
}

describe('finalizeNormalOrder', () => {
  it('deducts stock once and only replaces the receipt afterwards', async () => {
    const { store, deps, coffee, logEvent, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);

    const first = await finalizeNormalOrder(deps, orderId, 'R-1');
    expect(first).toEqual({
      orderId,
      receiptNumber: 'R-1',
      payerName: 'Dana',
      totalPrice: 8,
      completedAt: at(1),
      status: 'finalized',
      username: 'cashier'
    });
    expect(store.stockOf(coffee)).toBe(6);
    expect(store.orders.get(orderId)?.stock_deduction).toBe('all_lines');

    const second = await finalizeNormalOrder(deps, orderId, 'R-2');
    expect(second.receiptNumber).toBe('R-2');
    expect(second.completedAt).toEqual(at(1));
    expect(store.stockOf(coffee)).toBe(6);

    expect(logEvent).toHaveBeenCalledWith('ORDER_FINALIZED', {
      orderId,
      path: 'receipt',
      stockDeduction: 'all_lines',
      deductedLineCount: 1
    });
    expect(logEvent).toHaveBeenCalledWith('ORDER_FINALIZATION_REPEATED', {
      orderId,
      path: 'receipt',
      receiptUpdated: true
    });
    expect(store.activity.filter((entry) => entry.action === 'finalize')).toHaveLength(2);
  });

  it('deducts once when two finalizers race on the same order', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);

    const results = await Promise.all([
      finalizeNormalOrder(deps, orderId, 'R-1'),
      finalizeNormalOrder(deps, orderId, 'R-1')
    ]);

    expect(results.map((result) => result.status)).toEqual(['finalized', 'finalized']);
    expect(store.stockOf(coffee)).toBe(6);
    expect(store.activity.filter((entry) => entry.action === 'finalize')).toHaveLength(1);
    expect(store.heldLockCount()).toBe(0);
  });

  it('deducts once when finalizers race with different receipts, keeping the later one', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);

    const [first, second] = await Promise.all([
      finalizeNormalOrder(deps, orderId, 'R-1'),
      finalizeNormalOrder(deps, orderId, 'R-2')
    ]);

    expect(first.receiptNumber).toBe('R-1');
    expect(second.receiptNumber).toBe('R-2');
    expect(store.orders.get(orderId)?.receipt_number).toBe('R-2');
    expect(store.stockOf(coffee)).toBe(6);
    expect(
      store.activity.filter((entry) => entry.action === 'finalize').map((entry) => entry.metadata?.deductedLineCount)
    ).toEqual([1, 0]);
  });

  it('never oversells when two orders compete for the same stock', async () => {
    const { store, deps, coffee, draft } = setup();
    const firstOrder = await draft([{ itemId: coffee, quantity: 6 }]);
    const secondOrder = await draft([{ itemId: coffee, quantity: 6 }]);

    const results = await Promise.allSettled([
      finalizeNormalOrder(deps, firstOrder, 'R-1'),
      finalizeNormalOrder(deps, secondOrder, 'R-2')
    ]);

    expect(results).toMatchObject([
      { status: 'fulfilled' },
      { status: 'rejected', reason: { code: 'INSUFFICIENT_STOCK', details: { itemId: coffee } } }
    ]);
    expect(store.stockOf(coffee)).toBe(4);
    expect(store.orders.get(secondOrder)?.status).toBe('draft');
    expect(store.orders.get(secondOrder)?.receipt_number).toBeNull();
  });

  it('deducts nothing when one line of a multi-line order is short', async () => {
    const { store, deps, coffee, draft } = setup();
    const tea = store.addItem({ name: 'Tea', category: 'Drinks', price: 1.5, stock: 5 });
    const orderId = await draft([
      { itemId: coffee, quantity: 4 },
      { itemId: tea, quantity: 3 }
    ]);
    store.setStock(tea, 1);

    await expect(finalizeNormalOrder(deps, orderId, 'R-1')).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      details: { itemId: tea }
    });
    expect(store.stockOf(coffee)).toBe(10);
    expect(store.stockOf(tea)).toBe(1);
    expect(store.orders.get(orderId)?.status).toBe('draft');
    expect(store.orders.get(orderId)?.receipt_number).toBeNull();
  });

  it('refuses a receipt held by another order and leaves that order a draft', async () => {
    const { store, deps, coffee, draft } = setup();
    const first = await draft([{ itemId: coffee, quantity: 1 }]);
    const second = await draft([{ itemId: coffee, quantity: 2 }]);
    await finalizeNormalOrder(deps, first, 'R-9');

    await expect(finalizeNormalOrder(deps, second, 'R-9')).rejects.toMatchObject({
      code: 'DUPLICATE_RECEIPT',
      status: 409,
      details: { receiptNumber: 'R-9', heldByOrderId: first }
    });
    expect(store.orders.get(second)?.status).toBe('draft');
    expect(store.stockOf(coffee)).toBe(9);
  });

  it('reports a missing order', async () => {
    const { deps } = setup();
    await expect(finalizeNormalOrder(deps, 'missing-order', 'R-1')).rejects.toMatchObject({
      code: 'ORDER_NOT_FOUND',
      status: 404
    });
  });

  it('completes a deferred order without deducting stock', async () => {
    const { store, deps, mug, draft } = setup();
    const orderId = await draft([{ itemId: mug, quantity: 2 }]);

    const summary = await finalizeNormalOrder(deps, orderId, 'R-5');
    expect(summary.status).toBe('finalized');
    expect(store.stockOf(mug)).toBe(5);
    expect(store.orders.get(orderId)?.stock_deduction).toBe('none');
  });

  it('rolls back the deduction when a later step fails', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);
    store.failNext('completeDraftOrder');

    await expect(finalizeNormalOrder(deps, orderId, 'R-1')).rejects.toThrow('injected failure in completeDraftOrder');
    expect(store.stockOf(coffee)).toBe(10);
    expect(store.orders.get(orderId)?.status).toBe('draft');
    expect(store.orders.get(orderId)?.receipt_number).toBeNull();
  });

  it('gives up with a retryable error when the order stays locked', async () => {
    const { store, deps, coffee, draft } = setup({ lockTimeoutMs: 30 });
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);

    await store.withTransaction(async (tx) => {
      await tx.lockOrderForUpdate(orderId);
      await expect(finalizeNormalOrder(deps, orderId, 'R-1')).rejects.toMatchObject({
        code: 'LOCK_TIMEOUT',
        retryable: true
      });
    });

    expect(store.stockOf(coffee)).toBe(10);
    expect(store.orders.get(orderId)?.status).toBe('draft');
    expect(store.heldLockCount()).toBe(0);
  });
});

describe('finalizeJobOrder', () => {
  it('deducts the deferred lines on the first call only', async () => {
    const { store, deps, mug, logEvent, draft } = setup();
    const orderId = await draft([{ itemId: mug, quantity: 2 }]);

    const first = await finalizeJobOrder(deps, orderId);
    expect(first.status).toBe('finalized');
    expect(first.receiptNumber).toBeNull();
    expect(first.completedAt).toEqual(at(1));
    expect(store.stockOf(mug)).toBe(3);
    expect(store.orders.get(orderId)?.stock_deduction).toBe('deferred_lines');

    const second = await finalizeJobOrder(deps, orderId);
    expect(second.completedAt).toEqual(at(1));
    expect(store.stockOf(mug)).toBe(3);
    expect(logEvent).toHaveBeenLastCalledWith('ORDER_FINALIZATION_REPEATED', {
      orderId,
      path: 'job_order',
      receiptUpdated: false
    });
  });

  it('refuses when the balance dropped below the order quantity', async () => {
    const { store, deps, mug, draft } = setup();
    const orderId = await draft([{ itemId: mug, quantity: 5 }]);
    store.setStock(mug, 3);

    await expect(finalizeJobOrder(deps, orderId)).rejects.toMatchObject({
      code: 'INSUFFICIENT_STOCK',
      details: { itemId: mug, lines: [{ itemId: mug, itemName: 'Mug', requested: 5, available: 3, shortage: 2 }] }
    });
    expect(store.stockOf(mug)).toBe(3);
    expect(store.orders.get(orderId)?.status).toBe('draft');
  });

  it('refuses an order without deferred lines', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 1 }]);

    await expect(finalizeJobOrder(deps, orderId)).rejects.toMatchObject({
      code: 'ORDER_NOT_DEFERRED',
      status: 409,
      details: { message: "Order does not contain any 'Souvenir' items." }
    });
    expect(store.orders.get(orderId)?.status).toBe('draft');
    expect(store.stockOf(coffee)).toBe(10);
  });

  it('deducts only the deferred lines of a mixed order', async () => {
    const { store, deps, coffee, mug, draft } = setup();
    const orderId = await draft([
      { itemId: coffee, quantity: 2 },
      { itemId: mug, quantity: 1 }
    ]);

    await finalizeJobOrder(deps, orderId);
    expect(store.stockOf(coffee)).toBe(10);
    expect(store.stockOf(mug)).toBe(4);
  });
});

describe('deleteOrder', () => {
  it('keeps deducted stock under the retain policy', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);
    await finalizeNormalOrder(deps, orderId, 'R-1');

    const result = await deleteOrder(deps, orderId);
    expect(result).toEqual({ orderId, stockRestored: false, restoredLineCount: 0 });
    expect(store.orders.has(orderId)).toBe(false);
    expect(store.linesOf(orderId)).toEqual([]);
    expect(store.stockOf(coffee)).toBe(6);
  });

  it('credits back every deducted line under the restore policy', async () => {
    const { store, deps, coffee, logEvent, draft } = setup({ deleteStockPolicy: 'restore' });
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);
    await finalizeNormalOrder(deps, orderId, 'R-1');

    const result = await deleteOrder(deps, orderId);
    expect(result).toEqual({ orderId, stockRestored: true, restoredLineCount: 1 });
    expect(store.stockOf(coffee)).toBe(10);
    expect(logEvent).toHaveBeenLastCalledWith('ORDER_DELETED', {
      orderId,
      wasFinalized: true,
      policy: 'restore',
      restoredLineCount: 1
    });
  });

  it('restores only the deferred lines of a finalized job order', async () => {
    const { store, deps, coffee, mug, draft } = setup({ deleteStockPolicy: 'restore' });
    const orderId = await draft([
      { itemId: coffee, quantity: 2 },
      { itemId: mug, quantity: 1 }
    ]);
    await finalizeJobOrder(deps, orderId);

    const result = await deleteOrder(deps, orderId);
    expect(result.restoredLineCount).toBe(1);
    expect(store.stockOf(coffee)).toBe(10);
    expect(store.stockOf(mug)).toBe(5);
  });

  it('restores nothing for a draft', async () => {
    const { store, deps, coffee, draft } = setup({ deleteStockPolicy: 'restore' });
    const orderId = await draft([{ itemId: coffee, quantity: 4 }]);

    const result = await deleteOrder(deps, orderId);
    expect(result).toEqual({ orderId, stockRestored: false, restoredLineCount: 0 });
    expect(store.stockOf(coffee)).toBe(10);
  });

  it('attributes the deletion to the requesting user', async () => {
    const { store, deps, coffee, draft } = setup();
    const orderId = await draft([{ itemId: coffee, quantity: 1 }]);

    await runWithRequestContext({ requestId: 'req-1', userId: 'manager-1' }, () => deleteOrder(deps, orderId));

    const entry = store.activity.find((candidate) => candidate.action === 'delete');
    expect(entry).toMatchObject({ userId: 'manager-1', entityId: orderId, metadata: { status: 'draft', policy: 'retain' } });
  });

  it('reports a missing order', async () => {
    const { deps } = setup();
    await expect(deleteOrder(deps, 'missing-order')).rejects.toMatchObject({ code: 'ORDER_NOT_FOUND' });
  });
});
