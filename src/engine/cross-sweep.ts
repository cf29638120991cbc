import type { PriceLadder } from "./ladder.js";
import type { ExhaustedHandler } from "./matching.js";
import type { PriceLevel } from "./price-level.js";
import { applyFillQty, isNegligible } from "./types.js";
import type { Fill, Order } from "./types.js";

export interface CrossSweepResult {
  fills: Fill[];
  /** Best bid >= best ask after the sweep; only external aggregates are left crossing. */
  residualCross: boolean;
}

/**
 * Resolve a crossed book after an external level change ("virtual matching").
 *
 * Every crossed pair of levels is walked in priority order, bid queue
 * outer and ask queue inner, both in arrival order. Two external
 * aggregates never trade with each other; any pair with a local order on
 * at least one side trades like a normal match.
 */
export function sweepCrossedLevels(bids: PriceLadder, asks: PriceLadder, onExhausted: ExhaustedHandler): CrossSweepResult {
  const fills: Fill[] = [];

  for (const bidLevel of bids.levels()) {
    const bestAsk = asks.bestPrice();
    if (bestAsk === null || bidLevel.price < bestAsk) break;

    for (const askLevel of asks.levels()) {
      if (bidLevel.price < askLevel.price) break;
      matchCrossedLevels(bidLevel, askLevel, fills, onExhausted);
      asks.removeLevelIfEmpty(askLevel.price);
      if (bidLevel.isEmpty()) break;
    }

    bids.removeLevelIfEmpty(bidLevel.price);
  }

  const bestBid = bids.bestPrice();
  const bestAsk = asks.bestPrice();
  return { fills, residualCross: bestBid !== null && bestAsk !== null && bestBid >= bestAsk };
}

function matchCrossedLevels(bidLevel: PriceLevel, askLevel: PriceLevel, fills: Fill[], onExhausted: ExhaustedHandler): void {
  let bidHandle = bidLevel.first();
  while (bidHandle !== null) {
    const nextBid = bidLevel.next(bidHandle);
    const bid = bidLevel.get(bidHandle);

    let askHandle = askLevel.first();
    while (bid && askHandle !== null && !isNegligible(bid.remainingQty)) {
      const nextAsk = askLevel.next(askHandle);
      const ask = askLevel.get(askHandle);

      if (ask && !(bid.origin === "EXTERNAL" && ask.origin === "EXTERNAL")) {
        fills.push(virtualFill(bid, bidLevel.price, ask, askLevel.price, Math.min(bid.remainingQty, ask.remainingQty)));
        if (isNegligible(ask.remainingQty)) {
          askLevel.remove(askHandle);
          onExhausted(ask);
        }
      }
      askHandle = nextAsk;
    }

    if (bid && isNegligible(bid.remainingQty)) {
      bidLevel.remove(bidHandle);
      onExhausted(bid);
    }
    bidHandle = nextBid;
  }
}

/**
 * The resting local order is the passive party and sets the price; the
 * external side is the aggressor. Between two local orders the earlier
 * arrival is passive. The book never rests two crossing local orders
 * (submit matches first), so that case only arises for ladders built
 * directly.
 */
function virtualFill(bid: Order, bidPrice: number, ask: Order, askPrice: number, qty: number): Fill {
  applyFillQty(bid, qty);
  applyFillQty(ask, qty);

  const bidIsPassive =
    bid.origin === "LOCAL" && (ask.origin === "EXTERNAL" || bid.seq < ask.seq);
  const passive = bidIsPassive ? bid : ask;
  const aggressive = bidIsPassive ? ask : bid;

  return {
    passiveOrderId: passive.id,
    aggressiveOrderId: aggressive.id,
    price: bidIsPassive ? bidPrice : askPrice,
    quantity: qty,
    aggressorSide: aggressive.side,
    virtual: true,
  };
}
