import type { Fill, FillParty, LocalOrder, Side } from "../engine/types.js";

/** JSON-safe views: bigint order ids travel as decimal strings. */

export interface FillView {
  passiveOrderId: string;
  aggressiveOrderId: string;
  price: number;
  quantity: number;
  aggressorSide: Side;
  virtual: boolean;
}

export interface OrderView {
  id: string;
  side: Side;
  price: number;
  remainingQty: number;
  originalQty: number;
  filledQty: number;
  symbol: string;
  timestamp: number;
}

function partyToString(party: FillParty): string {
  return typeof party === "bigint" ? party.toString() : party;
}

export function serializeFill(fill: Fill): FillView {
  return {
    passiveOrderId: partyToString(fill.passiveOrderId),
    aggressiveOrderId: partyToString(fill.aggressiveOrderId),
    price: fill.price,
    quantity: fill.quantity,
    aggressorSide: fill.aggressorSide,
    virtual: fill.virtual,
  };
}

export function serializeOrder(order: LocalOrder): OrderView {
  return {
    id: order.id.toString(),
    side: order.side,
    price: order.price,
    remainingQty: order.remainingQty,
    originalQty: order.originalQty,
    filledQty: order.filledQty,
    symbol: order.symbol,
    timestamp: order.timestamp,
  };
}
