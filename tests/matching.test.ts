import { describe, it, expect, beforeEach } from "vitest";
import type { OrderBook } from "../src/engine/book.js";
import { PriceLadder } from "../src/engine/ladder.js";
import { matchIncoming } from "../src/engine/matching.js";
import type { Order } from "../src/engine/types.js";
import { localOrder, newBook, submit } from "./helpers.js";

describe("matchIncoming", () => {
  it("reports exhausted makers and drops emptied levels", () => {
    const asks = new PriceLadder("SELL");
    asks.upsertLevel(10).pushBack(localOrder(1, "SELL", 10, 2));
    asks.upsertLevel(11).pushBack(localOrder(2, "SELL", 11, 5));

    const exhausted: Order[] = [];
    const taker = localOrder(9, "BUY", 11, 4);
    const fills = matchIncoming(taker, asks, (o) => exhausted.push(o));

    expect(fills.map((f) => [f.passiveOrderId, f.price, f.quantity])).toEqual([
      [1n, 10, 2],
      [2n, 11, 2],
    ]);
    expect(exhausted.map((o) => o.id)).toEqual([1n]);
    expect(asks.topPrices(5)).toEqual([11]);
    expect(asks.aggregateQuantity(11)).toBe(3);
    expect(taker).toMatchObject({ remainingQty: 0, filledQty: 4 });
  });

  it("does nothing when the limit does not cross", () => {
    const bids = new PriceLadder("BUY");
    bids.upsertLevel(10).pushBack(localOrder(1, "BUY", 10, 2));

    const taker = localOrder(9, "SELL", 10.5, 4);
    expect(matchIncoming(taker, bids, () => undefined)).toEqual([]);
    expect(taker.remainingQty).toBe(4);
    expect(bids.aggregateQuantity(10)).toBe(2);
  });
});

describe("OrderBook matching", () => {
  let book: OrderBook;

  beforeEach(() => {
    book = newBook();
  });

  function seedBook() {
    // Asks: 55(10), 58(5), 60(20)
    submit(book, 1, "SELL", 55, 10);
    submit(book, 2, "SELL", 58, 5);
    submit(book, 3, "SELL", 60, 20);
    // Bids: 50(10), 48(5), 45(20)
    submit(book, 4, "BUY", 50, 10);
    submit(book, 5, "BUY", 48, 5);
    submit(book, 6, "BUY", 45, 20);
  }

  // ── Price-time priority ────────────────────────────────────

  it("BUY matches lowest ask first (price priority)", () => {
    seedBook();
    const result = submit(book, 10, "BUY", 60, 5);
    if (!result.accepted) throw new Error("rejected");
    expect(result.fills).toHaveLength(1);
    expect(result.fills[0]).toMatchObject({ passiveOrderId: 1n, price: 55, quantity: 5 });
    expect(result.status).toBe("FILLED");
  });

  it("SELL matches highest bid first (price priority)", () => {
    seedBook();
    const result = submit(book, 10, "SELL", 45, 5);
    if (!result.accepted) throw new Error("rejected");
    expect(result.fills).toHaveLength(1);
    expect(result.fills[0]).toMatchObject({ passiveOrderId: 4n, price: 50, quantity: 5, aggressorSide: "SELL" });
  });

  it("FIFO within same price level", () => {
    submit(book, 1, "SELL", 55, 5);
    submit(book, 2, "SELL", 55, 5);

    const result = submit(book, 3, "BUY", 55, 7);
    if (!result.accepted) throw new Error("rejected");
    expect(result.fills.map((f) => [f.passiveOrderId, f.quantity])).toEqual([
      [1n, 5],
      [2n, 2],
    ]);
    expect(book.hasOrder(1n)).toBe(false);
    expect(book.getOrder(2n)).toMatchObject({ remainingQty: 3, filledQty: 2 });
  });

  // ── Sweeps across levels ───────────────────────────────────

  it("fills across multiple ask levels", () => {
    seedBook();
    const result = submit(book, 10, "BUY", 60, 18);
    if (!result.accepted) throw new Error("rejected");

    expect(result.fills.map((f) => [f.price, f.quantity])).toEqual([
      [55, 10],
      [58, 5],
      [60, 3],
    ]);
    expect(result.status).toBe("FILLED");
    expect(book.depth(5).asks).toEqual([{ price: 60, totalQty: 17, orderCount: 1 }]);
  });

  it("stops at the limit price and rests the remainder", () => {
    seedBook();
    const result = submit(book, 10, "BUY", 57, 50);
    if (!result.accepted) throw new Error("rejected");

    expect(result.fills.map((f) => [f.price, f.quantity])).toEqual([[55, 10]]);
    expect(result.status).toBe("PARTIAL");
    expect(result.restingQty).toBe(40);
    expect(book.bestBid()).toBe(57);
    expect(book.bestAsk()).toBe(58);
  });

  // ── External aggregate as maker ────────────────────────────

  it("trades against the feed aggregate with an EXTERNAL passive party", () => {
    book.applyExternalLevelUpdate("SELL", 55, 10);
    const result = submit(book, 1, "BUY", 55, 4);
    if (!result.accepted) throw new Error("rejected");

    expect(result.fills).toEqual([
      { passiveOrderId: "EXTERNAL", aggressiveOrderId: 1n, price: 55, quantity: 4, aggressorSide: "BUY", virtual: false },
    ]);
    expect(book.depth(5).asks).toEqual([{ price: 55, totalQty: 6, orderCount: 1 }]);
  });

  it("gives the aggregate priority over local orders at the same price", () => {
    book.applyExternalLevelUpdate("BUY", 10, 5);
    submit(book, 1, "BUY", 10, 2);

    const result = submit(book, 2, "SELL", 10, 3);
    if (!result.accepted) throw new Error("rejected");
    expect(result.fills.map((f) => [f.passiveOrderId, f.quantity])).toEqual([["EXTERNAL", 3]]);
    expect(book.depth(5).bids).toEqual([{ price: 10, totalQty: 4, orderCount: 2 }]);
    expect(book.getOrder(1n)?.remainingQty).toBe(2);
  });
});
