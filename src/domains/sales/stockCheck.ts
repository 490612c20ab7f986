import { SalesError, type StockShortageDetail } from './errors';

export type StockDemandLine = {
  itemId: string;
  itemName?: string | null;
  quantity: number;
  available: number;
};

type GroupedDemand = {
  itemId: string;
  itemName: string | null;
  requested: number;
  available: number;
};

function groupDemandByItem(lines: StockDemandLine[]): GroupedDemand[] {
  const grouped = new Map<string, GroupedDemand>();
  for (const line of lines) {
    const existing = grouped.get(line.itemId);
    if (existing) {
      existing.requested += line.quantity;
      continue;
    }
    grouped.set(line.itemId, {
      itemId: line.itemId,
      itemName: line.itemName ?? null,
      requested: line.quantity,
      available: line.available
    });
  }
  return Array.from(grouped.values());
}

/**
 * Throws INSUFFICIENT_STOCK when any item's summed demand exceeds its locked balance.
 * The first short item is named in the message; every shortage is listed in details.
 */
export function assertSufficientStock(lines: StockDemandLine[]): void {
  const shortages: StockShortageDetail[] = [];
  for (const demand of groupDemandByItem(lines)) {
    if (demand.available < demand.requested) {
      shortages.push({
        itemId: demand.itemId,
        itemName: demand.itemName,
        requested: demand.requested,
        available: demand.available,
        shortage: demand.requested - demand.available
      });
    }
  }
  if (shortages.length === 0) return;
  throw new SalesError('INSUFFICIENT_STOCK', `Insufficient stock for item ${shortages[0].itemId}.`, {
    itemId: shortages[0].itemId,
    lines: shortages
  });
}
