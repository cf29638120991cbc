/** Quantities are floating point; anything below QTY_EPSILON counts as fully consumed. */
export const QTY_EPSILON = 1e-10;

export type Side = "BUY" | "SELL";
export type OrderOrigin = "LOCAL" | "EXTERNAL";

/** Fill party used for the feed's aggregate resting size, which has no individual owner. */
export const EXTERNAL_ORDER_ID = "EXTERNAL";

export type OrderId = bigint;
export type FillParty = OrderId | typeof EXTERNAL_ORDER_ID;

interface OrderBase {
  side: Side;
  price: number;
  remainingQty: number;
  originalQty: number;
  filledQty: number;
  symbol: string;
  timestamp: number;
  /** Arrival counter, monotonically increasing per book. */
  seq: number;
}

export interface LocalOrder extends OrderBase {
  origin: "LOCAL";
  id: OrderId;
}

export interface AggregateOrder extends OrderBase {
  origin: "EXTERNAL";
  id: typeof EXTERNAL_ORDER_ID;
}

export type Order = LocalOrder | AggregateOrder;

export interface Fill {
  passiveOrderId: FillParty;
  aggressiveOrderId: FillParty;
  price: number; // execution price = passive order's level price
  quantity: number;
  aggressorSide: Side;
  /** True when produced by the cross-sweep rather than by a submission. */
  virtual: boolean;
}

export interface SubmitOrderInput {
  id: OrderId;
  side: Side;
  price: number;
  quantity: number;
  symbol: string;
}

export type RejectReason =
  | "DUPLICATE_ID"
  | "INVALID_QUANTITY"
  | "INVALID_PRICE"
  | "SYMBOL_MISMATCH";

export type OrderStatus = "FILLED" | "PARTIAL" | "OPEN";

export type SubmitResult =
  | {
      accepted: true;
      status: OrderStatus;
      fills: Fill[];
      /** Quantity left resting on the book (0 when FILLED). */
      restingQty: number;
      order: LocalOrder;
    }
  | { accepted: false; reason: RejectReason };

export interface CancelResult {
  found: boolean;
  order: LocalOrder | null;
}

export interface LevelUpdate {
  side: Side;
  price: number;
  totalQty: number;
}

export type LevelUpdateRejectReason = "INVALID_PRICE" | "INVALID_QUANTITY";

export type LevelUpdateResult =
  | {
      applied: true;
      fills: Fill[];
      /** Book is still crossed, by external aggregates only. */
      residualCross: boolean;
    }
  | { applied: false; reason: LevelUpdateRejectReason; update: LevelUpdate };

export interface BookLevel {
  price: number;
  totalQty: number;
  orderCount: number;
}

export interface DepthSnapshot {
  /** Worst to best, so the best ask sits right above the best bid when printed. */
  asks: BookLevel[];
  /** Best to worst. */
  bids: BookLevel[];
}

export function isNegligible(qty: number): boolean {
  return qty < QTY_EPSILON;
}

/** Standard limit crossing rule: can an order on `side` at `limit` trade against `levelPrice`? */
export function crosses(side: Side, limit: number, levelPrice: number): boolean {
  return side === "BUY" ? limit >= levelPrice : limit <= levelPrice;
}

export function applyFillQty(order: Order, qty: number): void {
  order.remainingQty -= qty;
  order.filledQty += qty;
  if (isNegligible(order.remainingQty)) {
    order.remainingQty = 0;
  }
}
