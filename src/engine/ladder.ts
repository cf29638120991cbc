import { PriceLevel } from "./price-level.js";
import type { Side } from "./types.js";

/**
 * One side of the book: price -> level, with the prices kept sorted in
 * the side's priority order (bids descending, asks ascending).
 */
export class PriceLadder {
  readonly side: Side;
  private levelsByPrice = new Map<number, PriceLevel>();
  private prices: number[] = [];

  constructor(side: Side) {
    this.side = side;
  }

  get size(): number {
    return this.prices.length;
  }

  bestPrice(): number | null {
    return this.prices[0] ?? null;
  }

  getLevel(price: number): PriceLevel | null {
    return this.levelsByPrice.get(price) ?? null;
  }

  aggregateQuantity(price: number): number {
    return this.levelsByPrice.get(price)?.totalQty() ?? 0;
  }

  /**
   * Levels in priority order. Walks a copy of the price list, so levels
   * may be removed while iterating; removed levels are skipped.
   */
  *levels(): IterableIterator<PriceLevel> {
    for (const price of [...this.prices]) {
      const level = this.levelsByPrice.get(price);
      if (level) yield level;
    }
  }

  topPrices(n: number): number[] {
    return this.prices.slice(0, n);
  }

  // ── Mutations ────────────────────────────────────────────────

  upsertLevel(price: number): PriceLevel {
    let level = this.levelsByPrice.get(price);
    if (!level) {
      level = new PriceLevel(price);
      this.levelsByPrice.set(price, level);
      this.insertPrice(price);
    }
    return level;
  }

  /** Drop the level if it holds no orders. Returns true when a level was removed. */
  removeLevelIfEmpty(price: number): boolean {
    const level = this.levelsByPrice.get(price);
    if (!level || !level.isEmpty()) return false;
    this.levelsByPrice.delete(price);
    const idx = this.prices.indexOf(price);
    if (idx >= 0) this.prices.splice(idx, 1);
    return true;
  }

  clear(): void {
    this.levelsByPrice.clear();
    this.prices = [];
  }

  // ── Internal ─────────────────────────────────────────────────

  /** Binary search insert keeping the side's priority order. */
  private insertPrice(price: number): void {
    let lo = 0;
    let hi = this.prices.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const current = this.prices[mid] ?? price;
      const before = this.side === "BUY" ? current > price : current < price;
      if (before) {
        lo = mid + 1;
      } else {
        hi = mid;
      }
    }
    this.prices.splice(lo, 0, price);
  }
}
