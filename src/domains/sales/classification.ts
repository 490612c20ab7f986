type CategorizedLine = {
  category: string;
};

export function isDeferredLine(line: CategorizedLine, deferredCategory: string): boolean {
  return line.category === deferredCategory;
}

/**
 * The routing rule between the two completion paths: an order goes through the
 * job-order path as soon as any of its lines is a deferred-fulfillment item.
 */
export function requiresDeferredPath(lines: CategorizedLine[], deferredCategory: string): boolean {
  return lines.some((line) => isDeferredLine(line, deferredCategory));
}

export function selectDeferredLines<T extends CategorizedLine>(lines: T[], deferredCategory: string): T[] {
  return lines.filter((line) => isDeferredLine(line, deferredCategory));
}
