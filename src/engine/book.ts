import { sweepCrossedLevels } from "./cross-sweep.js";
import { PriceLadder } from "./ladder.js";
import { matchIncoming } from "./matching.js";
import type { OrderHandle } from "./price-level.js";
import { EXTERNAL_ORDER_ID, isNegligible } from "./types.js";
import type {
  AggregateOrder,
  BookLevel,
  CancelResult,
  DepthSnapshot,
  Fill,
  LevelUpdate,
  LevelUpdateRejectReason,
  LevelUpdateResult,
  LocalOrder,
  Order,
  OrderId,
  Side,
  SubmitOrderInput,
  SubmitResult,
} from "./types.js";

interface IndexEntry {
  side: Side;
  price: number;
  handle: OrderHandle;
}

export interface OrderBookOptions {
  symbol: string;
  /** Millisecond clock for order timestamps. */
  clock?: () => number;
}

/** Thrown when a book operation is started from inside another one (e.g. a fill callback). */
export class BookBusyError extends Error {
  constructor(operation: string) {
    super(`Order book is busy; cannot start ${operation} while another operation is running`);
    this.name = "BookBusyError";
  }
}

/**
 * In-memory limit order book for a single instrument.
 *
 * - bids: sorted descending by price (highest first)
 * - asks: sorted ascending by price (lowest first)
 * - Within each price level: FIFO by arrival; the feed's aggregate sits at the head.
 *
 * Local orders are indexed by id; the external aggregate is not. Every
 * public operation runs inside one exclusive section and fully resolves
 * any matching or cross-sweep before returning.
 */
export class OrderBook {
  readonly symbol: string;
  private bids = new PriceLadder("BUY");
  private asks = new PriceLadder("SELL");
  private orderIndex = new Map<OrderId, IndexEntry>();
  private sequenceId: number | null = null;
  private arrivalSeq = 0;
  private busy = false;
  private clock: () => number;

  constructor(options: OrderBookOptions) {
    this.symbol = options.symbol;
    this.clock = options.clock ?? Date.now;
  }

  // ── Queries ──────────────────────────────────────────────────

  bestBid(): number | null {
    return this.bids.bestPrice();
  }

  bestAsk(): number | null {
    return this.asks.bestPrice();
  }

  hasOrder(id: OrderId): boolean {
    return this.orderIndex.has(id);
  }

  /** Copy of a resting local order, or null. */
  getOrder(id: OrderId): LocalOrder | null {
    const order = this.lookup(id);
    return order ? { ...order } : null;
  }

  /** Number of resting local orders. */
  get size(): number {
    return this.orderIndex.size;
  }

  getSequenceId(): number | null {
    return this.sequenceId;
  }

  setSequenceId(seq: number | null): void {
    this.exclusive("setSequenceId", () => {
      this.sequenceId = seq;
    });
  }

  /** Top `levels` price levels per side, aggregated over local orders and the feed aggregate. */
  depth(levels = 5): DepthSnapshot {
    const n = Number.isFinite(levels) ? Math.max(0, Math.floor(levels)) : 0;
    return this.exclusive("depth", (): DepthSnapshot => ({
      asks: this.summarize(this.asks, n).reverse(),
      bids: this.summarize(this.bids, n),
    }));
  }

  // ── Local orders ─────────────────────────────────────────────

  submit(input: SubmitOrderInput): SubmitResult {
    return this.exclusive("submit", (): SubmitResult => {
      if (this.orderIndex.has(input.id)) return { accepted: false, reason: "DUPLICATE_ID" };
      if (!Number.isFinite(input.quantity) || input.quantity <= 0) return { accepted: false, reason: "INVALID_QUANTITY" };
      if (!Number.isFinite(input.price) || input.price <= 0) return { accepted: false, reason: "INVALID_PRICE" };
      if (input.symbol !== this.symbol) return { accepted: false, reason: "SYMBOL_MISMATCH" };

      const order: LocalOrder = {
        origin: "LOCAL",
        id: input.id,
        side: input.side,
        price: input.price,
        remainingQty: input.quantity,
        originalQty: input.quantity,
        filledQty: 0,
        symbol: input.symbol,
        timestamp: this.clock(),
        seq: ++this.arrivalSeq,
      };

      const opposing = order.side === "BUY" ? this.asks : this.bids;
      const fills = matchIncoming(order, opposing, (o) => this.release(o));

      if (isNegligible(order.remainingQty)) {
        return { accepted: true, status: "FILLED", fills, restingQty: 0, order: { ...order } };
      }

      const level = this.ladderFor(order.side).upsertLevel(order.price);
      const handle = level.pushBack(order);
      this.orderIndex.set(order.id, { side: order.side, price: order.price, handle });

      return {
        accepted: true,
        status: fills.length > 0 ? "PARTIAL" : "OPEN",
        fills,
        restingQty: order.remainingQty,
        order: { ...order },
      };
    });
  }

  cancel(id: OrderId): CancelResult {
    return this.exclusive("cancel", (): CancelResult => {
      const entry = this.orderIndex.get(id);
      if (!entry) return { found: false, order: null };

      const ladder = this.ladderFor(entry.side);
      const removed = ladder.getLevel(entry.price)?.remove(entry.handle) ?? null;
      this.orderIndex.delete(id);
      ladder.removeLevelIfEmpty(entry.price);

      return { found: true, order: removed?.origin === "LOCAL" ? { ...removed } : null };
    });
  }

  // ── External feed ────────────────────────────────────────────

  /** Feed snapshot marker: forget everything, including the sequence id. */
  applyExternalReset(): void {
    this.exclusive("applyExternalReset", () => {
      this.bids.clear();
      this.asks.clear();
      this.orderIndex.clear();
      this.sequenceId = null;
    });
  }

  applyExternalLevelUpdate(side: Side, price: number, totalQty: number): LevelUpdateResult {
    return this.exclusive("applyExternalLevelUpdate", (): LevelUpdateResult => {
      const update = { side, price, totalQty };
      const reason = validateLevelUpdate(update);
      if (reason) return { applied: false, reason, update };
      return this.applyLevel(update);
    });
  }

  /**
   * Apply a batch of level updates in order, each followed by its cross-sweep.
   * The whole batch is validated first and rejected without mutation if any
   * update is invalid.
   */
  applyExternalLevelUpdates(updates: readonly LevelUpdate[]): LevelUpdateResult {
    return this.exclusive("applyExternalLevelUpdates", (): LevelUpdateResult => {
      for (const update of updates) {
        const reason = validateLevelUpdate(update);
        if (reason) return { applied: false, reason, update };
      }

      const fills: Fill[] = [];
      let residualCross = false;
      for (const update of updates) {
        const result = this.applyLevel(update);
        if (result.applied) {
          fills.push(...result.fills);
          residualCross = result.residualCross;
        }
      }
      return { applied: true, fills, residualCross };
    });
  }

  // ── Internal ─────────────────────────────────────────────────

  private applyLevel(update: LevelUpdate): LevelUpdateResult {
    const ladder = this.ladderFor(update.side);

    if (isNegligible(update.totalQty)) {
      // Only the aggregate goes; local orders at this price keep resting.
      const level = ladder.getLevel(update.price);
      const head = level?.first() ?? null;
      if (level && head !== null && level.get(head)?.origin === "EXTERNAL") {
        level.remove(head);
        ladder.removeLevelIfEmpty(update.price);
      }
    } else {
      const level = ladder.upsertLevel(update.price);
      const head = level.peekFront();
      if (head?.origin === "EXTERNAL") {
        head.remainingQty = update.totalQty;
        head.originalQty = update.totalQty;
        head.filledQty = 0;
        head.timestamp = this.clock();
      } else {
        level.pushFront(this.aggregate(update));
      }
    }

    const sweep = sweepCrossedLevels(this.bids, this.asks, (o) => this.release(o));
    return { applied: true, fills: sweep.fills, residualCross: sweep.residualCross };
  }

  private aggregate(update: LevelUpdate): AggregateOrder {
    return {
      origin: "EXTERNAL",
      id: EXTERNAL_ORDER_ID,
      side: update.side,
      price: update.price,
      remainingQty: update.totalQty,
      originalQty: update.totalQty,
      filledQty: 0,
      symbol: this.symbol,
      timestamp: this.clock(),
      seq: ++this.arrivalSeq,
    };
  }

  /** Drop the index entry of an order that matching removed from its level. */
  private release(order: Order): void {
    if (order.origin === "LOCAL") {
      this.orderIndex.delete(order.id);
    }
  }

  private lookup(id: OrderId): LocalOrder | null {
    const entry = this.orderIndex.get(id);
    if (!entry) return null;
    const order = this.ladderFor(entry.side).getLevel(entry.price)?.get(entry.handle);
    return order?.origin === "LOCAL" ? order : null;
  }

  private ladderFor(side: Side): PriceLadder {
    return side === "BUY" ? this.bids : this.asks;
  }

  private summarize(ladder: PriceLadder, levels: number): BookLevel[] {
    return ladder.topPrices(levels).map((price) => {
      const level = ladder.getLevel(price);
      return { price, totalQty: level?.totalQty() ?? 0, orderCount: level?.size ?? 0 };
    });
  }

  private exclusive<T>(operation: string, fn: () => T): T {
    if (this.busy) throw new BookBusyError(operation);
    this.busy = true;
    try {
      return fn();
    } finally {
      this.busy = false;
    }
  }
}

export function validateLevelUpdate(update: LevelUpdate): LevelUpdateRejectReason | null {
  if (!Number.isFinite(update.price) || update.price <= 0) return "INVALID_PRICE";
  if (!Number.isFinite(update.totalQty) || update.totalQty < 0) return "INVALID_QUANTITY";
  return null;
}
