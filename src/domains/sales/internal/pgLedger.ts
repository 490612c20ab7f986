import { recordActivityLog } from '../../../lib/audit';
import { isLockConflict, isUniqueViolation } from '../../../lib/pgErrors';
import type { SqlExecutor } from '../../../lib/sql';
import { duplicateReceipt, itemNotFound, lockTimeout } from '../errors';
import type {
  ActivityEntry,
  ItemStockRow,
  NewOrderHeader,
  NewOrderLine,
  OrderCompletion,
  OrderLineStockRow,
  OrderRow,
  OrderSummaryRow,
  SalesLedgerTx,
  SalesStore
} from '../types';

export const RECEIPT_UNIQUE_INDEX = 'idx_orders_receipt_number_unique';

export type TransactionRunner = <T>(handler: (client: SqlExecutor) => Promise<T>) => Promise<T>;

const LINE_STOCK_COLUMNS = `ol.id AS line_id, ol.item_id, i.name AS item_name, i.category, ol.quantity, i.stock_quantity`;

export function createPgSalesLedger(client: SqlExecutor): SalesLedgerTx {
  return {
    async userExists(userId: string) {
      const res = await client.query('SELECT 1 FROM users WHERE id = $1', [userId]);
      return (res.rowCount ?? 0) > 0;
    },

    async lockItemsForUpdate(itemIds: string[]) {
      const uniqueSortedIds = Array.from(new Set(itemIds)).sort((a, b) => a.localeCompare(b));
      if (uniqueSortedIds.length === 0) {
        return [];
      }
      const res = await client.query<ItemStockRow>(
        `SELECT id, name, category, price, stock_quantity
           FROM items
          WHERE id = ANY($1::uuid[])
          ORDER BY id ASC
          FOR UPDATE`,
        [uniqueSortedIds]
      );
      return res.rows;
    },

    async insertOrder(header: NewOrderHeader) {
      const res = await client.query<OrderRow>(
        `INSERT INTO orders (
            id, user_id, payer_name, payer_reference, payer_program, total_price,
            receipt_number, status, completed_at, stock_deduction, created_at, updated_at
         ) VALUES ($1, $2, $3, $4, $5, $6, NULL, 'draft', NULL, 'none', $7, $7)
         RETURNING *`,
        [
          header.id,
          header.userId,
          header.payerName,
          header.payerReference,
          header.payerProgram,
          header.totalPrice,
          header.createdAt
        ]
      );
      return res.rows[0];
    },

    async insertOrderLine(line: NewOrderLine) {
      await client.query(
        `INSERT INTO order_lines (id, order_id, line_number, item_id, quantity)
         VALUES ($1, $2, $3, $4, $5)`,
        [line.id, line.orderId, line.lineNumber, line.itemId, line.quantity]
      );
    },

    async findOrderIdByReceipt(receiptNumber: string, excludeOrderId: string) {
      const res = await client.query<{ id: string }>(
        `SELECT id FROM orders
          WHERE receipt_number = $1
            AND id <> $2
          LIMIT 1`,
        [receiptNumber, excludeOrderId]
      );
      return res.rows[0]?.id ?? null;
    },

    async lockOrderForUpdate(orderId: string) {
      const res = await client.query<OrderRow>('SELECT * FROM orders WHERE id = $1 FOR UPDATE', [orderId]);
      return res.rows[0] ?? null;
    },

    async listOrderLines(orderId: string) {
      const res = await client.query<OrderLineStockRow>(
        `SELECT ${LINE_STOCK_COLUMNS}
           FROM order_lines ol
           JOIN items i ON i.id = ol.item_id
          WHERE ol.order_id = $1
          ORDER BY ol.line_number ASC`,
        [orderId]
      );
      return res.rows;
    },

    async lockOrderLinesForUpdate(orderId: string, options: { category?: string } = {}) {
      const params: unknown[] = [orderId];
      let categoryFilter = '';
      if (options.category !== undefined) {
        params.push(options.category);
        categoryFilter = `AND i.category = $${params.length}`;
      }
      const res = await client.query<OrderLineStockRow>(
        `SELECT ${LINE_STOCK_COLUMNS}
           FROM order_lines ol
           JOIN items i ON i.id = ol.item_id
          WHERE ol.order_id = $1
            ${categoryFilter}
          ORDER BY ol.item_id ASC, ol.line_number ASC
          FOR UPDATE OF ol, i`,
        params
      );
      return res.rows;
    },

    async adjustItemStock(itemId: string, delta: number) {
      const res = await client.query<{ stock_quantity: number }>(
        `UPDATE items
            SET stock_quantity = stock_quantity + $2,
                updated_at = now()
          WHERE id = $1
          RETURNING stock_quantity`,
        [itemId, delta]
      );
      if (res.rowCount === 0) {
        throw itemNotFound(itemId);
      }
      return res.rows[0].stock_quantity;
    },

    async setReceiptNumber(orderId: string, receiptNumber: string) {
      await client.query(
        `UPDATE orders
            SET receipt_number = $2,
                updated_at = now()
          WHERE id = $1`,
        [orderId, receiptNumber]
      );
    },

    async completeDraftOrder(orderId: string, completion: OrderCompletion) {
      const res = await client.query(
        `UPDATE orders
            SET status = 'finalized',
                completed_at = $2,
                stock_deduction = $3,
                updated_at = now()
          WHERE id = $1
            AND status = 'draft'`,
        [orderId, completion.completedAt, completion.stockDeduction]
      );
      return res.rowCount === 1;
    },

    async deleteOrder(orderId: string) {
      await client.query('DELETE FROM orders WHERE id = $1', [orderId]);
    },

    async getOrderSummary(orderId: string) {
      const res = await client.query<OrderSummaryRow>(
        `SELECT o.*, u.username
           FROM orders o
           LEFT JOIN users u ON u.id = o.user_id
          WHERE o.id = $1`,
        [orderId]
      );
      return res.rows[0] ?? null;
    },

    async recordActivity(entry: ActivityEntry) {
      await recordActivityLog(client, entry);
    }
  };
}

function translatePgError(error: unknown): unknown {
  if (isLockConflict(error)) {
    return lockTimeout('orders/items');
  }
  if (isUniqueViolation(error, RECEIPT_UNIQUE_INDEX)) {
    return duplicateReceipt(null, null);
  }
  return error;
}

export function createPgSalesStore(runInTransaction: TransactionRunner): SalesStore {
  return {
    async withTransaction<T>(handler: (tx: SalesLedgerTx) => Promise<T>): Promise<T> {
      try {
        return await runInTransaction((client) => handler(createPgSalesLedger(client)));
      } catch (error) {
        throw translatePgError(error);
      }
    }
  };
}
