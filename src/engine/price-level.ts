import type { Order } from "./types.js";

/** Stable reference to an order inside its level. Stays valid until that order is removed. */
export type OrderHandle = number;

const NIL = -1;

interface Slot {
  order: Order | null;
  prev: number;
  next: number;
}

/**
 * FIFO queue of orders resting at one price.
 *
 * Orders live in an arena of slots linked in arrival order. Removing an
 * order frees its slot for reuse without moving any other slot, so the
 * handles held by the book's index never shift.
 */
export class PriceLevel {
  readonly price: number;
  private slots: Slot[] = [];
  private freeSlots: number[] = [];
  private head = NIL;
  private tail = NIL;
  private count = 0;

  constructor(price: number) {
    this.price = price;
  }

  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  // ── Queries ──────────────────────────────────────────────────

  get(handle: OrderHandle): Order | null {
    return this.slots[handle]?.order ?? null;
  }

  first(): OrderHandle | null {
    return this.head === NIL ? null : this.head;
  }

  next(handle: OrderHandle): OrderHandle | null {
    const slot = this.slots[handle];
    if (!slot || slot.next === NIL) return null;
    return slot.next;
  }

  peekFront(): Order | null {
    return this.head === NIL ? null : this.get(this.head);
  }

  /** Orders in priority order. */
  orders(): Order[] {
    const out: Order[] = [];
    for (let h = this.first(); h !== null; h = this.next(h)) {
      const order = this.get(h);
      if (order) out.push(order);
    }
    return out;
  }

  totalQty(): number {
    let sum = 0;
    for (let h = this.first(); h !== null; h = this.next(h)) {
      sum += this.get(h)?.remainingQty ?? 0;
    }
    return sum;
  }

  // ── Mutations ────────────────────────────────────────────────

  pushBack(order: Order): OrderHandle {
    const handle = this.allocate(order);
    const slot = this.slotAt(handle);
    slot.prev = this.tail;
    if (this.tail === NIL) {
      this.head = handle;
    } else {
      this.slotAt(this.tail).next = handle;
    }
    this.tail = handle;
    return handle;
  }

  pushFront(order: Order): OrderHandle {
    const handle = this.allocate(order);
    const slot = this.slotAt(handle);
    slot.next = this.head;
    if (this.head === NIL) {
      this.tail = handle;
    } else {
      this.slotAt(this.head).prev = handle;
    }
    this.head = handle;
    return handle;
  }

  /** Unlink the order behind `handle`. Returns it, or null for a stale handle. */
  remove(handle: OrderHandle): Order | null {
    const slot = this.slots[handle];
    if (!slot || slot.order === null) return null;

    if (slot.prev === NIL) {
      this.head = slot.next;
    } else {
      this.slotAt(slot.prev).next = slot.next;
    }
    if (slot.next === NIL) {
      this.tail = slot.prev;
    } else {
      this.slotAt(slot.next).prev = slot.prev;
    }

    const removed = slot.order;
    slot.order = null;
    slot.prev = NIL;
    slot.next = NIL;
    this.freeSlots.push(handle);
    this.count--;
    return removed;
  }

  // ── Internal ─────────────────────────────────────────────────

  private allocate(order: Order): OrderHandle {
    this.count++;
    const reused = this.freeSlots.pop();
    if (reused !== undefined) {
      const slot = this.slotAt(reused);
      slot.order = order;
      return reused;
    }
    this.slots.push({ order, prev: NIL, next: NIL });
    return this.slots.length - 1;
  }

  private slotAt(handle: OrderHandle): Slot {
    const slot = this.slots[handle];
    if (!slot) throw new RangeError(`No slot for handle ${handle} at price ${this.price}`);
    return slot;
  }
}
