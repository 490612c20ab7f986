export {
  createPgSalesLedger,
  createPgSalesStore,
  RECEIPT_UNIQUE_INDEX,
  type TransactionRunner
} from './internal/pgLedger';

export { isDeferredLine, requiresDeferredPath, selectDeferredLines } from './classification';

export { assertSufficientStock, type StockDemandLine } from './stockCheck';

export {
  SalesError,
  duplicateReceipt,
  isSalesError,
  itemNotFound,
  lockTimeout,
  orderNotFound,
  type SalesErrorCode,
  type SalesErrorKind,
  type StockShortageDetail
} from './errors';

export type {
  ActivityAction,
  ActivityEntry,
  FinalizationPath,
  ItemStockRow,
  NewOrderHeader,
  NewOrderLine,
  OrderCompletion,
  OrderLineStockRow,
  OrderRow,
  OrderStatus,
  OrderSummaryRow,
  SalesLedgerTx,
  SalesStore,
  StockDeduction
} from './types';
