import "dotenv/config";

import { loadConfig } from "./config.js";
import { formatDepth } from "./display/depth-view.js";
import { OrderBook } from "./engine/book.js";
import { FeedClient } from "./feed/client.js";
import { FeedReconciler } from "./feed/reconciler.js";
import { serializeFill } from "./lib/serialize.js";
import { logger } from "./logger.js";
import { WsHub } from "./routes/ws.js";
import { buildServer } from "./server.js";

async function main() {
  const config = loadConfig();
  logger.level = config.LOG_LEVEL;

  // ── Book & feed ──────────────────────────────────────────────

  const book = new OrderBook({ symbol: config.BOOK_SYMBOL });
  const reconciler = new FeedReconciler(book, logger.child({ component: "reconciler" }));
  const hub = new WsHub();

  const feed = config.FEED_ENABLED
    ? new FeedClient({
        url: config.FEED_URL,
        channel: config.FEED_CHANNEL,
        instId: config.feedInstId,
        reconciler,
        log: logger.child({ component: "feed" }),
        reconnectDelayMs: config.FEED_RECONNECT_DELAY_MS,
        pingIntervalMs: config.FEED_PING_INTERVAL_MS,
        maxSequenceFaults: config.FEED_MAX_SEQUENCE_FAULTS,
      })
    : null;

  feed?.onFrame((_frame, result) => {
    if (!result.applied) return;
    for (const fill of result.fills) {
      logger.info(serializeFill(fill), "Virtual fill");
    }
    hub.broadcastFills(result.fills);
    hub.broadcastBookUpdate(book.depth(config.DEPTH_LEVELS), book.getSequenceId());
  });

  // ── Server ───────────────────────────────────────────────────

  const app = await buildServer({ book, reconciler, hub, feed, depthLevels: config.DEPTH_LEVELS, log: logger });
  const address = await app.listen({ port: config.PORT, host: config.HOST });
  logger.info({ symbol: book.symbol, feed: config.FEED_ENABLED }, `Server listening on ${address}`);

  feed?.start();

  const display =
    config.DEPTH_DISPLAY_INTERVAL_MS > 0
      ? setInterval(() => {
          process.stdout.write(formatDepth(book.symbol, book.depth(config.DEPTH_LEVELS), book.getSequenceId()));
        }, config.DEPTH_DISPLAY_INTERVAL_MS)
      : null;

  // ── Shutdown ─────────────────────────────────────────────────

  const shutdown = async () => {
    logger.info("Shutting down...");
    if (display) clearInterval(display);
    feed?.stop();
    await app.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err) => {
      logger.error(err, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  logger.fatal(err, "Failed to start server");
  process.exit(1);
});
