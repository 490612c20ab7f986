import { v4 as uuidv4 } from 'uuid';
import {
  SalesError,
  assertSufficientStock,
  itemNotFound,
  type ItemStockRow,
  type OrderRow
} from '../domains/sales';
import { roundMoney, toNumber } from '../lib/numbers';
import type { SqlExecutor } from '../lib/sql';
import { emitOrderEvent, ORDER_EVENT } from '../observability/orderFinalization.events';
import { mapCatalogItem, mapOrder, mapSaleLine, type CatalogRow, type SaleLineRow } from './sales/mappers';
import type { SaleCreateInput, SaleLineInput, SalesServiceDeps } from './sales/types';

export type DraftSaleResult = {
  saleId: string;
  totalPrice: number;
  items: SaleLineInput[];
};

function assertSaleLines(items: SaleLineInput[]) {
  if (items.length === 0) {
    throw new SalesError('VALIDATION_FAILED', 'No items provided.');
  }
  const invalid = items.find((line) => !Number.isInteger(line.quantity) || line.quantity <= 0);
  if (invalid) {
    throw new SalesError('VALIDATION_FAILED', 'Quantities must be positive integers.', { itemId: invalid.itemId });
  }
}

/**
 * Creates a draft order: validates every line against the locked item balances
 * and prices the order, but leaves stock untouched until a finalizer commits it.
 */
export async function createDraftSale(deps: SalesServiceDeps, input: SaleCreateInput): Promise<DraftSaleResult> {
  assertSaleLines(input.items);
  const now = deps.clock ? deps.clock() : new Date();
  const orderId = uuidv4();

  const result = await deps.store.withTransaction(async (tx) => {
    if (!(await tx.userExists(input.userId))) {
      throw new SalesError('USER_NOT_FOUND', `Invalid user_id ${input.userId}.`, { userId: input.userId });
    }

    const lockedItems = await tx.lockItemsForUpdate(input.items.map((line) => line.itemId));
    const itemsById = new Map<string, ItemStockRow>(lockedItems.map((item) => [item.id, item]));

    const priced: Array<{ line: SaleLineInput; item: ItemStockRow }> = [];
    for (const line of input.items) {
      const item = itemsById.get(line.itemId);
      if (!item) {
        throw itemNotFound(line.itemId);
      }
      priced.push({ line, item });
    }

    assertSufficientStock(
      priced.map(({ line, item }) => ({
        itemId: item.id,
        itemName: item.name,
        quantity: line.quantity,
        available: item.stock_quantity
      }))
    );

    const totalPrice = roundMoney(
      priced.reduce((sum, { line, item }) => sum + toNumber(item.price) * line.quantity, 0)
    );

    await tx.insertOrder({
      id: orderId,
      userId: input.userId,
      payerName: input.payerName,
      payerReference: input.payerReference ?? null,
      payerProgram: input.payerProgram ?? null,
      totalPrice,
      createdAt: now
    });

    let lineNumber = 0;
    for (const line of input.items) {
      lineNumber += 1;
      await tx.insertOrderLine({
        id: uuidv4(),
        orderId,
        lineNumber,
        itemId: line.itemId,
        quantity: line.quantity
      });
    }

    await tx.recordActivity({
      userId: input.userId,
      action: 'create',
      entityType: 'order',
      entityId: orderId,
      description: `Created draft order ${orderId} for ${input.payerName} (${input.items.length} lines, total ${totalPrice.toFixed(2)}).`,
      metadata: { totalPrice, lineCount: input.items.length },
      occurredAt: now
    });

    return {
      saleId: orderId,
      totalPrice,
      items: input.items.map(({ itemId, quantity }) => ({ itemId, quantity }))
    };
  });

  emitOrderEvent(
    ORDER_EVENT.DRAFT_CREATED,
    { orderId, userId: input.userId, totalPrice: result.totalPrice, lineCount: result.items.length },
    deps.logEvent
  );
  return result;
}

export async function getSale(executor: SqlExecutor, saleId: string) {
  const orderResult = await executor.query<OrderRow>('SELECT * FROM orders WHERE id = $1', [saleId]);
  if (orderResult.rowCount === 0) {
    throw new SalesError('SALE_NOT_FOUND', 'Sale not found.', { saleId });
  }
  const lines = await executor.query<SaleLineRow>(
    `SELECT ol.id, ol.line_number, ol.item_id, i.name, i.price, ol.quantity
       FROM order_lines ol
       JOIN items i ON i.id = ol.item_id
      WHERE ol.order_id = $1
      ORDER BY ol.line_number ASC`,
    [saleId]
  );
  return {
    order: mapOrder(orderResult.rows[0]),
    lines: lines.rows.map(mapSaleLine)
  };
}

export async function listCatalog(executor: SqlExecutor) {
  const { rows } = await executor.query<CatalogRow>(
    `SELECT id, name, price, stock_quantity
       FROM items
      ORDER BY name ASC`
  );
  return rows.map(mapCatalogItem);
}
