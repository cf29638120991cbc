import { connectWebSocket } from "./connection.js";
import type { ConnectFn, FeedConnection } from "./connection.js";
import { parseFeedFrame, subscribeRequest, unsubscribeRequest } from "./messages.js";
import type { BookFrame } from "./messages.js";
import type { FeedReconciler, ReconcileResult } from "./reconciler.js";
import type { Logger } from "../logger.js";

export interface FeedClientOptions {
  url: string;
  channel: string;
  instId: string;
  reconciler: FeedReconciler;
  log: Logger;
  /** Delay before reconnecting after the socket closes. */
  reconnectDelayMs: number;
  /** Keepalive "ping" interval; 0 disables it. */
  pingIntervalMs: number;
  /** Faults since the last snapshot that trigger a resubscribe. */
  maxSequenceFaults: number;
  connect?: ConnectFn;
}

export type FrameListener = (frame: BookFrame, result: ReconcileResult) => void;

/**
 * Transport side of the feed: owns the socket, subscribes to the book
 * channel, routes frames into the reconciler and owns the resync policy.
 *
 * Resync = unsubscribe + subscribe; the exchange answers a fresh
 * subscription with a snapshot.
 */
export class FeedClient {
  private readonly opts: FeedClientOptions;
  private readonly connectFn: ConnectFn;
  private connection: FeedConnection | null = null;
  /** Bumped per socket and on stop; callbacks from an older socket are ignored. */
  private generation = 0;
  private open = false;
  private stopped = true;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private pingTimer: ReturnType<typeof setInterval> | null = null;
  private listeners = new Set<FrameListener>();

  constructor(opts: FeedClientOptions) {
    this.opts = opts;
    this.connectFn = opts.connect ?? connectWebSocket;
  }

  get connected(): boolean {
    return this.open;
  }

  /** Register a listener for applied book frames. Returns an unsubscribe function. */
  onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    this.generation++;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.stopPing();
    this.connection?.close();
    this.connection = null;
    this.open = false;
  }

  // ── Socket events ────────────────────────────────────────────

  private connect(): void {
    const { url, log } = this.opts;
    const generation = ++this.generation;
    const current = () => generation === this.generation;

    log.info({ url }, "Connecting to feed");
    this.connection = this.connectFn(url, {
      onOpen: () => {
        if (current()) this.handleOpen();
      },
      onMessage: (text) => {
        if (current()) this.handleMessage(text);
      },
      onClose: (code, reason) => {
        if (current()) this.handleClose(code, reason);
      },
      onError: (err) => log.error({ err, stale: !current() }, "Feed socket error"),
    });
  }

  private handleOpen(): void {
    const { channel, instId, log } = this.opts;
    this.open = true;
    log.info({ channel, instId }, "Feed connected, subscribing");
    this.connection?.send(subscribeRequest(channel, instId));
    this.startPing();
  }

  private handleMessage(text: string): void {
    const { reconciler, log } = this.opts;
    const frame = parseFeedFrame(text);

    if (!frame) {
      log.warn({ frame: text.slice(0, 200) }, "Dropped malformed feed frame");
      return;
    }

    if (frame.type === "pong") return;

    if (frame.type === "event") {
      if (frame.event === "error") {
        log.error({ code: frame.code, msg: frame.msg }, "Feed error event");
      } else {
        log.info({ event: frame.event }, "Feed subscription event");
      }
      return;
    }

    if (frame.instId !== this.opts.instId) {
      log.debug({ instId: frame.instId }, "Ignoring frame for another instrument");
      return;
    }

    const result =
      frame.type === "snapshot"
        ? reconciler.applySnapshot({ seqId: frame.seqId, updates: frame.updates })
        : reconciler.applyIncremental({ seqId: frame.seqId, prevSeqId: frame.prevSeqId, updates: frame.updates });

    for (const listener of this.listeners) {
      try {
        listener(frame, result);
      } catch (err) {
        log.error({ err }, "Feed frame listener failed");
      }
    }

    if (
      frame.type === "update" &&
      reconciler.faultCount >= this.opts.maxSequenceFaults &&
      reconciler.syncState !== "RESYNCING"
    ) {
      this.resync();
    }
  }

  private handleClose(code: number, reason: string): void {
    this.open = false;
    this.connection = null;
    this.stopPing();
    if (this.stopped) return;

    this.opts.log.warn({ code, reason }, "Feed disconnected");
    // The next subscription starts with a snapshot.
    this.opts.reconciler.markResyncing();
    this.scheduleReconnect();
  }

  // ── Recovery ─────────────────────────────────────────────────

  private resync(): void {
    const { channel, instId, reconciler, log } = this.opts;
    log.warn({ faultCount: reconciler.faultCount }, "Too many sequence faults, requesting fresh snapshot");
    reconciler.markResyncing();
    this.connection?.send(unsubscribeRequest(channel, instId));
    this.connection?.send(subscribeRequest(channel, instId));
  }

  private scheduleReconnect(): void {
    if (this.reconnectTimer) return;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (!this.stopped) this.connect();
    }, this.opts.reconnectDelayMs);
  }

  private startPing(): void {
    this.stopPing();
    if (this.opts.pingIntervalMs <= 0) return;
    this.pingTimer = setInterval(() => {
      if (this.open) this.connection?.send("ping");
    }, this.opts.pingIntervalMs);
    this.pingTimer.unref();
  }

  private stopPing(): void {
    if (this.pingTimer) {
      clearInterval(this.pingTimer);
      this.pingTimer = null;
    }
  }
}
