import { getRequestContext } from '../lib/requestContext';
import type { FinalizationPath, StockDeduction } from '../domains/sales/types';
import type { OrderDeleteStockPolicy } from '../config/salesPolicy';

export const ORDER_EVENT = {
  DRAFT_CREATED: 'ORDER_DRAFT_CREATED',
  FINALIZED: 'ORDER_FINALIZED',
  FINALIZATION_REPEATED: 'ORDER_FINALIZATION_REPEATED',
  DELETED: 'ORDER_DELETED'
} as const;

export type OrderEventName = (typeof ORDER_EVENT)[keyof typeof ORDER_EVENT];

export type OrderDraftCreatedPayload = {
  orderId: string;
  userId: string;
  totalPrice: number;
  lineCount: number;
};

export type OrderFinalizedPayload = {
  orderId: string;
  path: FinalizationPath;
  stockDeduction: StockDeduction;
  deductedLineCount: number;
};

export type OrderFinalizationRepeatedPayload = {
  orderId: string;
  path: FinalizationPath;
  receiptUpdated: boolean;
};

export type OrderDeletedPayload = {
  orderId: string;
  wasFinalized: boolean;
  policy: OrderDeleteStockPolicy;
  restoredLineCount: number;
};

export type OrderEventPayloadMap = {
  [ORDER_EVENT.DRAFT_CREATED]: OrderDraftCreatedPayload;
  [ORDER_EVENT.FINALIZED]: OrderFinalizedPayload;
  [ORDER_EVENT.FINALIZATION_REPEATED]: OrderFinalizationRepeatedPayload;
  [ORDER_EVENT.DELETED]: OrderDeletedPayload;
};

export type OrderEventLogger = (eventName: string, payload: Record<string, unknown>) => void;

function isObject(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object';
}

function hasString(value: Record<string, unknown>, key: string): boolean {
  return typeof value[key] === 'string' && value[key] !== '';
}

function hasCount(value: Record<string, unknown>, key: string): boolean {
  const candidate = value[key];
  return typeof candidate === 'number' && Number.isInteger(candidate) && candidate >= 0;
}

function isOrderEventPayload<T extends OrderEventName>(event: T, payload: unknown): payload is OrderEventPayloadMap[T] {
  if (!isObject(payload) || !hasString(payload, 'orderId')) return false;
  switch (event) {
    case ORDER_EVENT.DRAFT_CREATED:
      return hasString(payload, 'userId') && typeof payload.totalPrice === 'number' && hasCount(payload, 'lineCount');
    case ORDER_EVENT.FINALIZED:
      return hasString(payload, 'path') && hasString(payload, 'stockDeduction') && hasCount(payload, 'deductedLineCount');
    case ORDER_EVENT.FINALIZATION_REPEATED:
      return hasString(payload, 'path') && typeof payload.receiptUpdated === 'boolean';
    case ORDER_EVENT.DELETED:
      return typeof payload.wasFinalized === 'boolean' && hasString(payload, 'policy') && hasCount(payload, 'restoredLineCount');
    default:
      return false;
  }
}

export const consoleOrderEventLogger: OrderEventLogger = (eventName, payload) => {
  console.log(
    JSON.stringify({
      event: eventName,
      requestId: getRequestContext()?.requestId,
      ...payload,
      timestamp: new Date().toISOString()
    })
  );
};

export function emitOrderEvent<T extends OrderEventName>(
  event: T,
  payload: OrderEventPayloadMap[T],
  logger: OrderEventLogger = consoleOrderEventLogger
): void {
  if (!isOrderEventPayload(event, payload)) {
    logger('ORDER_EVENT_PAYLOAD_INVALID', { event });
  }
  logger(event, payload);
}
