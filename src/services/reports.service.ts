import { SalesError } from '../domains/sales';
import { toNumber } from '../lib/numbers';
import type { SqlExecutor } from '../lib/sql';
import type { TransactionKind } from './sales/types';

type TransactionRow = {
  id: string;
  receipt_number: string | null;
  payer_name: string;
  total_price: string | number;
  completed_at: Date | null;
  username: string | null;
};

type MonthlyReportRow = {
  order_id: string;
  receipt_number: string | null;
  payer: string;
  date: Date;
  qty_sold: number;
  unit: string;
  description: string;
  unit_cost: string | number;
  total_cost: string | number;
};

type TopItemRow = {
  item_id: string;
  name: string;
  total_sold: string | number;
};

const DEFERRED_LINE_EXISTS = `EXISTS (
          SELECT 1
            FROM order_lines dl
            JOIN items di ON di.id = dl.item_id
           WHERE dl.order_id = o.id
             AND di.category = $1
        )`;

/**
 * Returns [start, end) for a calendar month, end being the first day of the next month.
 */
export function monthRange(year: number, month: number): { start: string; end: string } {
  if (!Number.isInteger(month) || month < 1 || month > 12) {
    throw new SalesError('VALIDATION_FAILED', 'Month must be 1-12.', { month });
  }
  const pad = (value: number) => String(value).padStart(2, '0');
  const nextYear = month === 12 ? year + 1 : year;
  const nextMonth = month === 12 ? 1 : month + 1;
  return {
    start: `${year}-${pad(month)}-01`,
    end: `${nextYear}-${pad(nextMonth)}-01`
  };
}

export async function listTransactions(executor: SqlExecutor, kind: TransactionKind, deferredCategory: string) {
  const membership = kind === 'job_order' ? DEFERRED_LINE_EXISTS : `NOT ${DEFERRED_LINE_EXISTS}`;
  const { rows } = await executor.query<TransactionRow>(
    `SELECT o.id, o.receipt_number, o.payer_name, o.total_price, o.completed_at, u.username
       FROM orders o
       LEFT JOIN users u ON u.id = o.user_id
      WHERE ${membership}
      ORDER BY o.completed_at DESC NULLS LAST, o.created_at DESC`,
    [deferredCategory]
  );
  return rows.map((row) => ({
    orderId: row.id,
    ...(kind === 'normal' ? { receiptNumber: row.receipt_number } : {}),
    payerName: row.payer_name,
    totalPrice: toNumber(row.total_price),
    completedAt: row.completed_at,
    username: row.username
  }));
}

/**
 * One row per order line completed in the month. Normal reports require a receipt and
 * exclude any order holding a deferred line; job-order reports list only the deferred
 * lines of orders that have one.
 */
export async function getMonthlyReport(
  executor: SqlExecutor,
  kind: TransactionKind,
  period: { year: number; month: number },
  deferredCategory: string
) {
  const { start, end } = monthRange(period.year, period.month);
  const filters =
    kind === 'normal'
      ? `AND o.receipt_number IS NOT NULL
        AND NOT ${DEFERRED_LINE_EXISTS}`
      : `AND ${DEFERRED_LINE_EXISTS}
        AND i.category = $1`;

  const { rows } = await executor.query<MonthlyReportRow>(
    `SELECT o.id AS order_id,
            o.receipt_number,
            o.payer_name AS payer,
            o.completed_at AS date,
            ol.quantity AS qty_sold,
            COALESCE(i.unit, 'pcs') AS unit,
            i.name AS description,
            i.price AS unit_cost,
            (ol.quantity * i.price) AS total_cost
       FROM orders o
       JOIN order_lines ol ON ol.order_id = o.id
       JOIN items i ON i.id = ol.item_id
      WHERE o.completed_at >= $2
        AND o.completed_at < $3
        ${filters}
      ORDER BY o.completed_at ASC, o.id ASC, ol.line_number ASC`,
    [deferredCategory, start, end]
  );

  return rows.map((row) => ({
    orderId: row.order_id,
    ...(kind === 'normal' ? { receiptNumber: row.receipt_number } : {}),
    payer: row.payer,
    date: row.date,
    qtySold: row.qty_sold,
    unit: row.unit,
    description: row.description,
    unitCost: toNumber(row.unit_cost),
    totalCost: toNumber(row.total_cost)
  }));
}

export async function getDashboardTotals(executor: SqlExecutor) {
  const totals = await executor.query<{ total_revenue: string | number; completed_orders: string | number }>(
    `SELECT COALESCE(SUM(total_price), 0) AS total_revenue,
            COUNT(*) AS completed_orders
       FROM orders
      WHERE receipt_number IS NOT NULL`
  );
  const topItems = await executor.query<TopItemRow>(
    `SELECT i.id AS item_id, i.name, SUM(ol.quantity) AS total_sold
       FROM order_lines ol
       JOIN orders o ON o.id = ol.order_id
       JOIN items i ON i.id = ol.item_id
      WHERE o.receipt_number IS NOT NULL
      GROUP BY i.id, i.name
      ORDER BY total_sold DESC, i.name ASC
      LIMIT 5`
  );
  const row = totals.rows[0];
  return {
    totalRevenue: toNumber(row?.total_revenue),
    completedOrders: toNumber(row?.completed_orders),
    topItems: topItems.rows.map((item) => ({
      itemId: item.item_id,
      name: item.name,
      totalSold: toNumber(item.total_sold)
    }))
  };
}
