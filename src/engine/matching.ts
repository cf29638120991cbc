import type { PriceLadder } from "./ladder.js";
import { applyFillQty, crosses, isNegligible } from "./types.js";
import type { Fill, LocalOrder, Order } from "./types.js";

/** Called for every resting order that a match consumes completely, after it left its level. */
export type ExhaustedHandler = (order: Order) => void;

/**
 * Sweep the opposing ladder with an incoming limit order.
 *
 * Matching rules:
 * - best opposing price first; stop at the first level the limit does not cross
 * - FIFO within a level (no size priority, no pro-rata)
 * - execution price = resting (maker) level price
 *
 * Mutates the incoming order and the ladder in place. Exhausted makers are
 * unlinked from their level and reported through `onExhausted`; emptied
 * levels are dropped. Resting the remainder is the caller's job.
 */
export function matchIncoming(incoming: LocalOrder, opposing: PriceLadder, onExhausted: ExhaustedHandler): Fill[] {
  const fills: Fill[] = [];

  for (const level of opposing.levels()) {
    if (isNegligible(incoming.remainingQty)) break;
    if (!crosses(incoming.side, incoming.price, level.price)) break;

    let handle = level.first();
    while (handle !== null && !isNegligible(incoming.remainingQty)) {
      const next = level.next(handle);
      const maker = level.get(handle);
      if (maker) {
        const fillQty = Math.min(incoming.remainingQty, maker.remainingQty);
        applyFillQty(incoming, fillQty);
        applyFillQty(maker, fillQty);

        fills.push({
          passiveOrderId: maker.id,
          aggressiveOrderId: incoming.id,
          price: level.price,
          quantity: fillQty,
          aggressorSide: incoming.side,
          virtual: false,
        });

        if (isNegligible(maker.remainingQty)) {
          level.remove(handle);
          onExhausted(maker);
        }
      }
      handle = next;
    }

    opposing.removeLevelIfEmpty(level.price);
  }

  return fills;
}
