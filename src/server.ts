import { randomUUID } from "node:crypto";
import { fastify } from "fastify";
import fastifyWebsocket from "@fastify/websocket";
import { ZodError } from "zod";

import type { OrderBook } from "./engine/book.js";
import type { FeedClient } from "./feed/client.js";
import type { FeedReconciler } from "./feed/reconciler.js";
import type { Logger } from "./logger.js";
import { bookRoutes } from "./routes/book.js";
import { orderRoutes } from "./routes/orders.js";
import { wsRoutes } from "./routes/ws.js";
import type { WsHub } from "./routes/ws.js";

export interface AppContext {
  book: OrderBook;
  reconciler: FeedReconciler;
  hub: WsHub;
  feed: FeedClient | null;
  depthLevels: number;
  log: Logger;
}

export async function buildServer(ctx: AppContext) {
  const log = ctx.log.child({ component: "api" });
  const app = fastify({
    logger: false, // We use our own pino logger
    genReqId: () => randomUUID(),
  });

  await app.register(fastifyWebsocket);

  // ── Request logging ──────────────────────────────────────────

  app.addHook("onResponse", (request, reply, done) => {
    log.info(
      { method: request.method, url: request.url, statusCode: reply.statusCode, reqId: request.id },
      "request completed",
    );
    done();
  });

  // ── Error handler ────────────────────────────────────────────

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: "Validation error", details: error.issues });
    }
    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.code(error.statusCode).send({ error: error.message });
    }
    log.error({ err: error }, "Unhandled error");
    return reply.code(500).send({ error: "Internal server error" });
  });

  // ── Routes ───────────────────────────────────────────────────

  await app.register(async (instance) => {
    await orderRoutes(instance, ctx.book, ctx.hub, ctx.depthLevels, log);
    await bookRoutes(instance, ctx.book, ctx.reconciler, ctx.feed, ctx.depthLevels);
    await wsRoutes(instance, ctx.hub, ctx.book, ctx.depthLevels, log);
  });

  app.get("/health", async () => ({ status: "ok" }));

  return app;
}
