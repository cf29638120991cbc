import { pino } from "pino";
import { OrderBook } from "../src/engine/book.js";
import { EXTERNAL_ORDER_ID } from "../src/engine/types.js";
import type { AggregateOrder, LocalOrder, Side, SubmitResult } from "../src/engine/types.js";

export const SYMBOL = "TEST";

export const silentLogger = pino({ level: "silent" });

export function newBook(): OrderBook {
  let now = 1_000;
  return new OrderBook({ symbol: SYMBOL, clock: () => now++ });
}

export function submit(book: OrderBook, id: number, side: Side, price: number, quantity: number): SubmitResult {
  return book.submit({ id: BigInt(id), side, price, quantity, symbol: SYMBOL });
}

export function localOrder(id: number, side: Side, price: number, qty: number, seq = id): LocalOrder {
  return {
    origin: "LOCAL",
    id: BigInt(id),
    side,
    price,
    remainingQty: qty,
    originalQty: qty,
    filledQty: 0,
    symbol: SYMBOL,
    timestamp: 0,
    seq,
  };
}

export function aggregateOrder(side: Side, price: number, qty: number, seq = 0): AggregateOrder {
  return {
    origin: "EXTERNAL",
    id: EXTERNAL_ORDER_ID,
    side,
    price,
    remainingQty: qty,
    originalQty: qty,
    filledQty: 0,
    symbol: SYMBOL,
    timestamp: 0,
    seq,
  };
}
