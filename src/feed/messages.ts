/**
 * Order-book channel frames (OKX v5 public `books` channels).
 *
 *   { arg: { channel, instId }, action: "snapshot" | "update",
 *     data: [{ asks, bids, ts, checksum, prevSeqId, seqId }] }
 *
 * Levels arrive as string tuples `[price, size, liquidatedOrders, orderCount]`.
 * A size of "0" removes the level. Frames that do not match are dropped.
 */

import { z } from "zod";
import type { LevelUpdate, Side } from "../engine/types.js";

// Unsigned decimals only: no blanks, hex or exponents.
const numericString = z
  .string()
  .regex(/^\d+(\.\d+)?$/)
  .transform((s) => Number(s))
  .refine((n) => Number.isFinite(n), { message: "not a finite number" });

const levelSchema = z.tuple([numericString, numericString]).rest(z.string());

const bookDataSchema = z.object({
  asks: z.array(levelSchema),
  bids: z.array(levelSchema),
  ts: z.string().optional(),
  checksum: z.number().int().optional(),
  prevSeqId: z.number().int(),
  seqId: z.number().int(),
});

const bookFrameSchema = z.object({
  arg: z.object({ channel: z.string(), instId: z.string() }),
  action: z.enum(["snapshot", "update"]),
  data: z.array(bookDataSchema).length(1),
});

const eventFrameSchema = z.object({
  event: z.enum(["subscribe", "unsubscribe", "error"]),
  arg: z.object({ channel: z.string(), instId: z.string() }).optional(),
  code: z.string().optional(),
  msg: z.string().optional(),
});

export interface BookFrame {
  type: "snapshot" | "update";
  channel: string;
  instId: string;
  seqId: number;
  /** -1 on snapshots. */
  prevSeqId: number;
  ts: number | null;
  updates: LevelUpdate[];
}

export interface EventFrame {
  type: "event";
  event: "subscribe" | "unsubscribe" | "error";
  code: string | null;
  msg: string | null;
}

export interface PongFrame {
  type: "pong";
}

export type FeedFrame = BookFrame | EventFrame | PongFrame;

/** Parse one raw text frame. Returns null for anything malformed or unknown. */
export function parseFeedFrame(raw: string): FeedFrame | null {
  if (raw === "pong") return { type: "pong" };

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const book = bookFrameSchema.safeParse(json);
  if (book.success) {
    const { arg, action, data } = book.data;
    const [payload] = data;
    if (!payload) return null;
    return {
      type: action,
      channel: arg.channel,
      instId: arg.instId,
      seqId: payload.seqId,
      prevSeqId: payload.prevSeqId,
      ts: payload.ts === undefined ? null : Number(payload.ts),
      // Bids before asks, each in the order the exchange listed them.
      updates: [...toUpdates("BUY", payload.bids), ...toUpdates("SELL", payload.asks)],
    };
  }

  const event = eventFrameSchema.safeParse(json);
  if (event.success) {
    return {
      type: "event",
      event: event.data.event,
      code: event.data.code ?? null,
      msg: event.data.msg ?? null,
    };
  }

  return null;
}

function toUpdates(side: Side, levels: [number, number, ...string[]][]): LevelUpdate[] {
  return levels.map(([price, totalQty]) => ({ side, price, totalQty }));
}

export function subscribeRequest(channel: string, instId: string): string {
  return JSON.stringify({ op: "subscribe", args: [{ channel, instId }] });
}

export function unsubscribeRequest(channel: string, instId: string): string {
  return JSON.stringify({ op: "unsubscribe", args: [{ channel, instId }] });
}
