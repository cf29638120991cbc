import type { FastifyInstance } from "fastify";
import type { OrderBook } from "../engine/book.js";
import type { FeedClient } from "../feed/client.js";
import type { FeedReconciler } from "../feed/reconciler.js";
import { DepthQuerySchema } from "../schemas/index.js";

export async function bookRoutes(
  app: FastifyInstance,
  book: OrderBook,
  reconciler: FeedReconciler,
  feed: FeedClient | null,
  depthLevels: number,
) {
  app.get("/book/depth", async (request) => {
    const { levels } = DepthQuerySchema.parse(request.query);
    return {
      symbol: book.symbol,
      sequenceId: book.getSequenceId(),
      ...book.depth(levels ?? depthLevels),
    };
  });

  app.get("/feed/status", async () => ({
    state: reconciler.syncState,
    sequenceId: reconciler.sequenceId,
    faultCount: reconciler.faultCount,
    connected: feed?.connected ?? false,
  }));
}
