export type OrderStatus = 'draft' | 'finalized';

/** Which lines the finalizing transaction took out of stock. */
export type StockDeduction = 'none' | 'all_lines' | 'deferred_lines';

export type FinalizationPath = 'receipt' | 'job_order';

export type OrderRow = {
  id: string;
  user_id: string;
  payer_name: string;
  payer_reference: string | null;
  payer_program: string | null;
  total_price: string | number;
  receipt_number: string | null;
  status: OrderStatus;
  completed_at: Date | null;
  stock_deduction: StockDeduction;
  created_at: Date;
  updated_at: Date;
};

export type OrderSummaryRow = OrderRow & {
  username: string | null;
};

export type ItemStockRow = {
  id: string;
  name: string;
  category: string;
  price: string | number;
  stock_quantity: number;
};

export type OrderLineStockRow = {
  line_id: string;
  item_id: string;
  item_name: string;
  category: string;
  quantity: number;
  stock_quantity: number;
};

export type NewOrderHeader = {
  id: string;
  userId: string;
  payerName: string;
  payerReference: string | null;
  payerProgram: string | null;
  totalPrice: number;
  createdAt: Date;
};

export type NewOrderLine = {
  id: string;
  orderId: string;
  lineNumber: number;
  itemId: string;
  quantity: number;
};

export type OrderCompletion = {
  completedAt: Date;
  stockDeduction: StockDeduction;
};

export type ActivityAction = 'create' | 'finalize' | 'delete';

export type ActivityEntry = {
  userId: string | null;
  action: ActivityAction;
  entityType: 'order';
  entityId: string;
  description: string;
  metadata?: Record<string, unknown> | null;
  occurredAt: Date;
};

/**
 * Transaction-scoped handle over the order and item tables.
 *
 * Every `lock*` method takes an exclusive row lock that is held until the
 * surrounding transaction commits or rolls back. Item rows are always locked
 * in ascending id order, and only after the order row when one is involved.
 */
export interface SalesLedgerTx {
  userExists(userId: string): Promise<boolean>;
  lockItemsForUpdate(itemIds: string[]): Promise<ItemStockRow[]>;
  insertOrder(header: NewOrderHeader): Promise<OrderRow>;
  insertOrderLine(line: NewOrderLine): Promise<void>;
  findOrderIdByReceipt(receiptNumber: string, excludeOrderId: string): Promise<string | null>;
  lockOrderForUpdate(orderId: string): Promise<OrderRow | null>;
  listOrderLines(orderId: string): Promise<OrderLineStockRow[]>;
  lockOrderLinesForUpdate(orderId: string, options?: { category?: string }): Promise<OrderLineStockRow[]>;
  /** Applies a signed delta and returns the new balance. */
  adjustItemStock(itemId: string, delta: number): Promise<number>;
  setReceiptNumber(orderId: string, receiptNumber: string): Promise<void>;
  /** Compare-and-set draft -> finalized. Resolves false when the order was not a draft. */
  completeDraftOrder(orderId: string, completion: OrderCompletion): Promise<boolean>;
  deleteOrder(orderId: string): Promise<void>;
  getOrderSummary(orderId: string): Promise<OrderSummaryRow | null>;
  recordActivity(entry: ActivityEntry): Promise<void>;
}

export interface SalesStore {
  withTransaction<T>(handler: (tx: SalesLedgerTx) => Promise<T>): Promise<T>;
}
