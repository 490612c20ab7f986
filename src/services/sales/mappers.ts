import { toNumber } from '../../lib/numbers';
import type { OrderRow, OrderSummaryRow } from '../../domains/sales';

export type SaleLineRow = {
  id: string;
  line_number: number;
  item_id: string;
  name: string;
  price: string | number;
  quantity: number;
};

export type CatalogRow = {
  id: string;
  name: string;
  price: string | number;
  stock_quantity: number;
};

export function mapOrder(row: OrderRow) {
  return {
    orderId: row.id,
    userId: row.user_id,
    payerName: row.payer_name,
    payerReference: row.payer_reference,
    payerProgram: row.payer_program,
    totalPrice: toNumber(row.total_price),
    receiptNumber: row.receipt_number,
    status: row.status,
    completedAt: row.completed_at,
    stockDeduction: row.stock_deduction,
    createdAt: row.created_at
  };
}

export function mapOrderSummary(row: OrderSummaryRow) {
  return {
    orderId: row.id,
    receiptNumber: row.receipt_number,
    payerName: row.payer_name,
    totalPrice: toNumber(row.total_price),
    completedAt: row.completed_at,
    status: row.status,
    username: row.username
  };
}

export type OrderSummary = ReturnType<typeof mapOrderSummary>;

export function mapSaleLine(row: SaleLineRow) {
  return {
    lineId: row.id,
    lineNumber: row.line_number,
    itemId: row.item_id,
    name: row.name,
    price: toNumber(row.price),
    quantity: row.quantity
  };
}

export function mapCatalogItem(row: CatalogRow) {
  return {
    itemId: row.id,
    name: row.name,
    price: toNumber(row.price),
    stockQuantity: row.stock_quantity
  };
}
