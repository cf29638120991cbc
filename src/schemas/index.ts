import { z } from "zod";

const MAX_ORDER_ID = 2n ** 64n - 1n;

// ── Orders ────────────────────────────────────────────────────

/** Unsigned 64-bit id, as a decimal string or a safe JSON integer. */
export const OrderIdSchema = z
  .union([z.string().regex(/^\d{1,20}$/), z.number().int().nonnegative().max(Number.MAX_SAFE_INTEGER)])
  .transform((v) => BigInt(v))
  .refine((v) => v <= MAX_ORDER_ID, { message: "id must fit in 64 bits" });

export const SubmitOrderSchema = z.object({
  id: OrderIdSchema,
  side: z.enum(["BUY", "SELL"]),
  price: z.number(),
  quantity: z.number(),
});

export const OrderParamsSchema = z.object({
  id: OrderIdSchema,
});

// ── Book ──────────────────────────────────────────────────────

export const DepthQuerySchema = z.object({
  levels: z.coerce.number().int().min(1).max(100).optional(),
});
