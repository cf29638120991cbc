import type { FastifyInstance } from "fastify";
import type { OrderBook } from "../engine/book.js";
import type { RejectReason } from "../engine/types.js";
import { serializeFill, serializeOrder } from "../lib/serialize.js";
import type { Logger } from "../logger.js";
import { OrderParamsSchema, SubmitOrderSchema } from "../schemas/index.js";
import type { WsHub } from "./ws.js";

const REJECT_STATUS: Record<RejectReason, number> = {
  DUPLICATE_ID: 409,
  INVALID_QUANTITY: 400,
  INVALID_PRICE: 400,
  SYMBOL_MISMATCH: 400,
};

export async function orderRoutes(app: FastifyInstance, book: OrderBook, hub: WsHub, depthLevels: number, log: Logger) {
  // ── Submit order ───────────────────────────────────────────

  app.post("/orders", async (request, reply) => {
    const body = SubmitOrderSchema.parse(request.body);
    const result = book.submit({ ...body, symbol: book.symbol });

    if (!result.accepted) {
      log.info({ id: body.id.toString(), reason: result.reason }, "Order rejected");
      return reply.code(REJECT_STATUS[result.reason]).send({ error: "Order rejected", reason: result.reason });
    }

    for (const fill of result.fills) {
      log.info(serializeFill(fill), "Fill");
    }
    hub.broadcastFills(result.fills);
    hub.broadcastBookUpdate(book.depth(depthLevels), book.getSequenceId());

    return reply.code(201).send({
      status: result.status,
      restingQty: result.restingQty,
      order: serializeOrder(result.order),
      fills: result.fills.map(serializeFill),
    });
  });

  // ── Cancel order ───────────────────────────────────────────

  app.delete("/orders/:id", async (request, reply) => {
    const { id } = OrderParamsSchema.parse(request.params);
    const result = book.cancel(id);

    if (!result.found) {
      return reply.code(404).send({ error: "Order not found" });
    }

    hub.broadcastBookUpdate(book.depth(depthLevels), book.getSequenceId());
    return { cancelled: true, order: result.order ? serializeOrder(result.order) : null };
  });

  app.get("/orders/:id", async (request, reply) => {
    const { id } = OrderParamsSchema.parse(request.params);
    const order = book.getOrder(id);
    if (!order) return reply.code(404).send({ error: "Order not found" });
    return serializeOrder(order);
  });
}
