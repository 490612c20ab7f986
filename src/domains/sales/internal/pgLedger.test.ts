import { describe, expect, it } from 'vitest';
import { runWithRequestContext } from '../../../lib/requestContext';
import { FakeSqlExecutor } from '../../../testing/fakeSqlExecutor';
import { SalesError } from '../errors';
import { createPgSalesLedger, createPgSalesStore, RECEIPT_UNIQUE_INDEX } from './pgLedger';

function pgError(code: string, constraint?: string) {
  return Object.assign(new Error('pg failure'), { code, constraint });
}

describe('createPgSalesLedger', () => {
  it('locks distinct items in ascending id order', async () => {
    const executor = new FakeSqlExecutor().returns([
      { id: 'a', name: 'Coffee', category: 'Drinks', price: '2.00', stock_quantity: 10 }
    ]);
    const ledger = createPgSalesLedger(executor);

    const rows = await ledger.lockItemsForUpdate(['c', 'a', 'c', 'b']);

    expect(rows).toHaveLength(1);
    expect(executor.calls).toHaveLength(1);
    expect(executor.calls[0].params).toEqual([['a', 'b', 'c']]);
    expect(executor.calls[0].text).toContain('ORDER BY id ASC FOR UPDATE');
  });

  it('skips the query when there is nothing to lock', async () => {
    const executor = new FakeSqlExecutor();
    expect(await createPgSalesLedger(executor).lockItemsForUpdate([])).toEqual([]);
    expect(executor.calls).toHaveLength(0);
  });

  it('filters locked lines by category when asked', async () => {
    const executor = new FakeSqlExecutor();
    const ledger = createPgSalesLedger(executor);

    await ledger.lockOrderLinesForUpdate('order-1', { category: 'Souvenir' });
    await ledger.lockOrderLinesForUpdate('order-1');

    expect(executor.calls[0].params).toEqual(['order-1', 'Souvenir']);
    expect(executor.calls[0].text).toContain('AND i.category = $2');
    expect(executor.calls[0].text).toContain('FOR UPDATE OF ol, i');
    expect(executor.calls[1].params).toEqual(['order-1']);
    expect(executor.calls[1].text).not.toContain('i.category = $');
  });

  it('returns the new balance after a stock adjustment', async () => {
    const executor = new FakeSqlExecutor().returns([{ stock_quantity: 6 }]);
    const balance = await createPgSalesLedger(executor).adjustItemStock('item-1', -4);

    expect(balance).toBe(6);
    expect(executor.calls[0].params).toEqual(['item-1', -4]);
  });

  it('raises ITEM_NOT_FOUND when the adjusted item is gone', async () => {
    const executor = new FakeSqlExecutor().returns([], 0);
    await expect(createPgSalesLedger(executor).adjustItemStock('item-1', -1)).rejects.toMatchObject({
      code: 'ITEM_NOT_FOUND'
    });
  });

  it('only completes an order that is still a draft', async () => {
    const executor = new FakeSqlExecutor().returns([], 1).returns([], 0);
    const ledger = createPgSalesLedger(executor);
    const completion = { completedAt: new Date('2024-05-01T10:00:00.000Z'), stockDeduction: 'all_lines' as const };

    expect(await ledger.completeDraftOrder('order-1', completion)).toBe(true);
    expect(await ledger.completeDraftOrder('order-1', completion)).toBe(false);
    expect(executor.calls[0].text).toContain("WHERE id = $1 AND status = 'draft'");
    expect(executor.calls[0].params).toEqual(['order-1', completion.completedAt, 'all_lines']);
  });

  it('looks up receipt holders other than the given order', async () => {
    const executor = new FakeSqlExecutor().returns([]).returns([{ id: 'order-2' }]);
    const ledger = createPgSalesLedger(executor);

    expect(await ledger.findOrderIdByReceipt('R-1', 'order-1')).toBeNull();
    expect(await ledger.findOrderIdByReceipt('R-1', 'order-1')).toBe('order-2');
    expect(executor.calls[0].params).toEqual(['R-1', 'order-1']);
  });

  it('writes activity rows tagged with the request id', async () => {
    const executor = new FakeSqlExecutor();
    const occurredAt = new Date('2024-05-01T10:00:00.000Z');

    await runWithRequestContext({ requestId: 'req-1' }, () =>
      createPgSalesLedger(executor).recordActivity({
        userId: null,
        action: 'delete',
        entityType: 'order',
        entityId: 'order-1',
        description: 'Deleted order order-1.',
        occurredAt
      })
    );

    const [call] = executor.calls;
    expect(call.text.startsWith('INSERT INTO activity_logs')).toBe(true);
    expect(call.params.slice(1)).toEqual([
      null,
      'delete',
      'order',
      'order-1',
      'Deleted order order-1.',
      null,
      occurredAt,
      'req-1'
    ]);
  });
});

describe('createPgSalesStore', () => {
  const storeFailingWith = (error: unknown) =>
    createPgSalesStore(async (handler) => handler(new FakeSqlExecutor().fails(error)));

  it('passes the transaction client to the handler', async () => {
    const executor = new FakeSqlExecutor().returns([{ '?column?': 1 }]);
    const store = createPgSalesStore(async (handler) => handler(executor));

    expect(await store.withTransaction((tx) => tx.userExists('user-1'))).toBe(true);
    expect(executor.calls[0].params).toEqual(['user-1']);
  });

  it('turns lock waits and deadlocks into retryable LOCK_TIMEOUT', async () => {
    for (const code of ['55P03', '40P01']) {
      await expect(storeFailingWith(pgError(code)).withTransaction((tx) => tx.lockOrderForUpdate('o'))).rejects.toMatchObject({
        code: 'LOCK_TIMEOUT',
        retryable: true
      });
    }
  });

  it('turns a receipt index violation into DUPLICATE_RECEIPT', async () => {
    const store = storeFailingWith(pgError('23505', RECEIPT_UNIQUE_INDEX));
    const rejection = store.withTransaction((tx) => tx.setReceiptNumber('o', 'R-1'));
    await expect(rejection).rejects.toBeInstanceOf(SalesError);
    await expect(rejection).rejects.toMatchObject({ code: 'DUPLICATE_RECEIPT', status: 409 });
  });

  it('rethrows anything else unchanged', async () => {
    const original = pgError('23503', 'order_lines_item_id_fkey');
    await expect(storeFailingWith(original).withTransaction((tx) => tx.deleteOrder('o'))).rejects.toBe(original);
  });
});
