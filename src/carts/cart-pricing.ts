export interface PricedLine {
  productId: number;
  quantity: number;
}

/**
 * Drops lines with a non-positive quantity and keeps the last line given for
 * each product, in first-seen order.
 */
export function normalizeLines<T extends PricedLine>(lines: T[]): PricedLine[] {
  const byProduct = new Map<number, number>();
  for (const line of lines) {
    byProduct.set(line.productId, line.quantity);
  }
  return [...byProduct]
    .filter(([, quantity]) => quantity > 0)
    .map(([productId, quantity]) => ({ productId, quantity }));
}

/** Σ quantity × unit price, rounded to cents. Unknown products count as free. */
export function totalPrice(lines: PricedLine[], unitPrices: Map<number, number>): number {
  const total = lines.reduce((sum, line) => sum + line.quantity * (unitPrices.get(line.productId) ?? 0), 0);
  return Math.round(total * 100) / 100;
}
