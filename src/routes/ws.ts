import type { FastifyInstance } from "fastify";
import type { WebSocket } from "ws";
import type { OrderBook } from "../engine/book.js";
import type { DepthSnapshot, Fill } from "../engine/types.js";
import { serializeFill } from "../lib/serialize.js";
import type { Logger } from "../logger.js";

const OPEN = 1;

export interface HubSocket {
  readyState: number;
  send(data: string): void;
}

/** Fan-out of fills and depth to downstream WebSocket subscribers. */
export class WsHub {
  private clients = new Set<HubSocket>();

  get clientCount(): number {
    return this.clients.size;
  }

  addClient(socket: HubSocket): void {
    this.clients.add(socket);
  }

  removeClient(socket: HubSocket): void {
    this.clients.delete(socket);
  }

  broadcastFills(fills: readonly Fill[]): void {
    for (const fill of fills) {
      this.broadcast({ type: "fill", data: serializeFill(fill) });
    }
  }

  broadcastBookUpdate(snapshot: DepthSnapshot, sequenceId: number | null): void {
    this.broadcast({ type: "book_snapshot", data: { ...snapshot, sequenceId } });
  }

  private broadcast(message: unknown): void {
    const payload = JSON.stringify(message);
    for (const socket of this.clients) {
      if (socket.readyState === OPEN) {
        socket.send(payload);
      }
    }
  }
}

export async function wsRoutes(app: FastifyInstance, hub: WsHub, book: OrderBook, depthLevels: number, log: Logger) {
  app.get("/ws", { websocket: true }, (socket: WebSocket) => {
    hub.addClient(socket);
    log.debug({ clients: hub.clientCount }, "WS client connected");

    socket.send(JSON.stringify({ type: "book_snapshot", data: { ...book.depth(depthLevels), sequenceId: book.getSequenceId() } }));

    socket.on("close", () => {
      hub.removeClient(socket);
      log.debug({ clients: hub.clientCount }, "WS client disconnected");
    });

    socket.on("error", (err) => {
      log.error({ err }, "WS error");
      hub.removeClient(socket);
    });
  });
}
