export type OrderDeleteStockPolicy = 'retain' | 'restore';

export type SalesPolicy = {
  deferredCategory: string;
  deleteStockPolicy: OrderDeleteStockPolicy;
  lockTimeoutMs: number;
};

const DEFAULT_DEFERRED_CATEGORY = 'Souvenir';
const DEFAULT_LOCK_TIMEOUT_MS = 5000;

function parseDeleteStockPolicy(value: string | undefined, fallback: OrderDeleteStockPolicy): OrderDeleteStockPolicy {
  const normalized = String(value ?? '').trim().toLowerCase();
  if (normalized === 'retain' || normalized === 'restore') return normalized;
  return fallback;
}

function parsePositiveInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') return fallback;
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function getSalesPolicy(env: NodeJS.ProcessEnv = process.env): SalesPolicy {
  const category = env.DEFERRED_CATEGORY?.trim();
  return {
    deferredCategory: category ? category : DEFAULT_DEFERRED_CATEGORY,
    deleteStockPolicy: parseDeleteStockPolicy(env.ORDER_DELETE_STOCK_POLICY, 'retain'),
    lockTimeoutMs: parsePositiveInteger(env.LOCK_TIMEOUT_MS, DEFAULT_LOCK_TIMEOUT_MS)
  };
}
