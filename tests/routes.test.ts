import { describe, it, expect, beforeEach, afterEach } from "vitest";
import type { FastifyInstance } from "fastify";
import { FeedReconciler } from "../src/feed/reconciler.js";
import { WsHub } from "../src/routes/ws.js";
import type { HubSocket } from "../src/routes/ws.js";
import { buildServer } from "../src/server.js";
import { newBook, silentLogger } from "./helpers.js";

describe("HTTP API", () => {
  let app: FastifyInstance;
  let hub: WsHub;
  let messages: unknown[];

  beforeEach(async () => {
    const book = newBook();
    hub = new WsHub();
    messages = [];
    const subscriber: HubSocket = { readyState: 1, send: (data) => messages.push(JSON.parse(data)) };
    hub.addClient(subscriber);

    app = await buildServer({
      book,
      reconciler: new FeedReconciler(book, silentLogger),
      hub,
      feed: null,
      depthLevels: 5,
      log: silentLogger,
    });
  });

  afterEach(async () => {
    await app.close();
  });

  function postOrder(payload: Record<string, unknown>) {
    return app.inject({ method: "POST", url: "/orders", payload });
  }

  it("rests an order, shows it in depth and cancels it", async () => {
    const created = await postOrder({ id: "5", side: "SELL", price: 12, quantity: 10 });
    expect(created.statusCode).toBe(201);
    expect(created.json()).toMatchObject({
      status: "OPEN",
      restingQty: 10,
      order: { id: "5", side: "SELL", price: 12, remainingQty: 10, symbol: "TEST" },
      fills: [],
    });

    const depth = await app.inject({ method: "GET", url: "/book/depth?levels=3" });
    expect(depth.json()).toEqual({
      symbol: "TEST",
      sequenceId: null,
      asks: [{ price: 12, totalQty: 10, orderCount: 1 }],
      bids: [],
    });

    const fetched = await app.inject({ method: "GET", url: "/orders/5" });
    expect(fetched.json()).toMatchObject({ id: "5", remainingQty: 10 });

    const cancelled = await app.inject({ method: "DELETE", url: "/orders/5" });
    expect(cancelled.statusCode).toBe(200);
    expect(cancelled.json()).toMatchObject({ cancelled: true, order: { id: "5" } });

    const again = await app.inject({ method: "DELETE", url: "/orders/5" });
    expect(again.statusCode).toBe(404);
    expect(again.json()).toEqual({ error: "Order not found" });
  });

  it("returns fills with string ids and broadcasts them", async () => {
    await postOrder({ id: 1, side: "BUY", price: 10, quantity: 100 });
    messages.length = 0;

    const res = await postOrder({ id: 3, side: "SELL", price: 9, quantity: 100 });
    expect(res.statusCode).toBe(201);
    const fill = { passiveOrderId: "1", aggressiveOrderId: "3", price: 10, quantity: 100, aggressorSide: "SELL", virtual: false };
    expect(res.json()).toMatchObject({ status: "FILLED", restingQty: 0, fills: [fill] });

    expect(messages).toEqual([
      { type: "fill", data: fill },
      { type: "book_snapshot", data: { asks: [], bids: [], sequenceId: null } },
    ]);
  });

  it("maps rejections to status codes", async () => {
    await postOrder({ id: "7", side: "BUY", price: 10, quantity: 1 });

    const duplicate = await postOrder({ id: "7", side: "BUY", price: 11, quantity: 1 });
    expect(duplicate.statusCode).toBe(409);
    expect(duplicate.json()).toEqual({ error: "Order rejected", reason: "DUPLICATE_ID" });

    const zeroQty = await postOrder({ id: "8", side: "BUY", price: 10, quantity: 0 });
    expect(zeroQty.statusCode).toBe(400);
    expect(zeroQty.json()).toEqual({ error: "Order rejected", reason: "INVALID_QUANTITY" });
  });

  it("rejects malformed bodies and ids", async () => {
    const badSide = await postOrder({ id: "9", side: "HOLD", price: 10, quantity: 1 });
    expect(badSide.statusCode).toBe(400);
    expect(badSide.json()).toMatchObject({ error: "Validation error" });

    const badId = await app.inject({ method: "DELETE", url: "/orders/abc" });
    expect(badId.statusCode).toBe(400);
  });

  it("reports feed status and health", async () => {
    const status = await app.inject({ method: "GET", url: "/feed/status" });
    expect(status.json()).toEqual({ state: "UNINITIALIZED", sequenceId: null, faultCount: 0, connected: false });

    const health = await app.inject({ method: "GET", url: "/health" });
    expect(health.json()).toEqual({ status: "ok" });
  });
});

describe("WsHub", () => {
  it("only sends to open sockets", () => {
    const hub = new WsHub();
    const open: string[] = [];
    const closed: string[] = [];
    hub.addClient({ readyState: 1, send: (d) => open.push(d) });
    hub.addClient({ readyState: 3, send: (d) => closed.push(d) });

    hub.broadcastBookUpdate({ asks: [], bids: [{ price: 1, totalQty: 2, orderCount: 1 }] }, 9);
    expect(open).toEqual(['{"type":"book_snapshot","data":{"asks":[],"bids":[{"price":1,"totalQty":2,"orderCount":1}],"sequenceId":9}}']);
    expect(closed).toEqual([]);
  });

  it("serialises the external party by name", () => {
    const hub = new WsHub();
    const sent: string[] = [];
    const socket: HubSocket = { readyState: 1, send: (d) => sent.push(d) };
    hub.addClient(socket);

    hub.broadcastFills([
      { passiveOrderId: 4n, aggressiveOrderId: "EXTERNAL", price: 100, quantity: 3, aggressorSide: "SELL", virtual: true },
    ]);
    hub.removeClient(socket);
    hub.broadcastFills([
      { passiveOrderId: 5n, aggressiveOrderId: "EXTERNAL", price: 100, quantity: 1, aggressorSide: "SELL", virtual: true },
    ]);

    expect(sent.map((s) => JSON.parse(s))).toEqual([
      {
        type: "fill",
        data: { passiveOrderId: "4", aggressiveOrderId: "EXTERNAL", price: 100, quantity: 3, aggressorSide: "SELL", virtual: true },
      },
    ]);
  });
});
