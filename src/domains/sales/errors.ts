export type SalesErrorCode =
  | 'VALIDATION_FAILED'
  | 'USER_NOT_FOUND'
  | 'ITEM_NOT_FOUND'
  | 'ORDER_NOT_FOUND'
  | 'SALE_NOT_FOUND'
  | 'DUPLICATE_RECEIPT'
  | 'INSUFFICIENT_STOCK'
  | 'ORDER_NOT_DEFERRED'
  | 'LOCK_TIMEOUT';

export type SalesErrorKind = 'validation' | 'not_found' | 'conflict' | 'invalid_state';

const ERROR_KIND: Record<SalesErrorCode, SalesErrorKind> = {
  VALIDATION_FAILED: 'validation',
  USER_NOT_FOUND: 'validation',
  ITEM_NOT_FOUND: 'not_found',
  ORDER_NOT_FOUND: 'not_found',
  SALE_NOT_FOUND: 'not_found',
  DUPLICATE_RECEIPT: 'conflict',
  INSUFFICIENT_STOCK: 'conflict',
  ORDER_NOT_DEFERRED: 'invalid_state',
  LOCK_TIMEOUT: 'conflict'
};

const KIND_STATUS: Record<SalesErrorKind, number> = {
  validation: 400,
  not_found: 404,
  conflict: 409,
  invalid_state: 409
};

export type StockShortageDetail = {
  itemId: string;
  itemName: string | null;
  requested: number;
  available: number;
  shortage: number;
};

export class SalesError extends Error {
  code: SalesErrorCode;
  kind: SalesErrorKind;
  status: number;
  retryable: boolean;
  details?: Record<string, unknown>;

  constructor(code: SalesErrorCode, message: string, details?: Record<string, unknown>) {
    super(code);
    this.name = 'SalesError';
    this.code = code;
    this.kind = ERROR_KIND[code];
    this.status = KIND_STATUS[this.kind];
    this.retryable = code === 'LOCK_TIMEOUT';
    this.details = { message, ...details };
  }
}

export function isSalesError(error: unknown): error is SalesError {
  return error instanceof SalesError;
}

export function orderNotFound(orderId: string) {
  return new SalesError('ORDER_NOT_FOUND', 'Order not found.', { orderId });
}

export function itemNotFound(itemId: string) {
  return new SalesError('ITEM_NOT_FOUND', `Item ${itemId} not found.`, { itemId });
}

export function duplicateReceipt(receiptNumber: string | null, heldByOrderId: string | null) {
  return new SalesError('DUPLICATE_RECEIPT', 'Receipt number is already assigned to another order.', {
    receiptNumber,
    heldByOrderId
  });
}

export function lockTimeout(resource: string) {
  return new SalesError('LOCK_TIMEOUT', 'Timed out waiting for a row lock; retry the request.', { resource });
}
