import WebSocket from "ws";

export interface FeedConnection {
  send(data: string): void;
  close(): void;
}

export interface FeedConnectionHandlers {
  onOpen(): void;
  onMessage(text: string): void;
  onClose(code: number, reason: string): void;
  onError(err: Error): void;
}

export type ConnectFn = (url: string, handlers: FeedConnectionHandlers) => FeedConnection;

/** Open a `ws` socket and translate its events into text-frame callbacks. */
export const connectWebSocket: ConnectFn = (url, handlers) => {
  const socket = new WebSocket(url);

  socket.on("open", () => handlers.onOpen());
  socket.on("message", (data) => handlers.onMessage(rawToString(data)));
  socket.on("close", (code, reason) => handlers.onClose(code, reason.toString("utf8")));
  socket.on("error", (err) => handlers.onError(err));

  return {
    send: (data) => {
      if (socket.readyState === WebSocket.OPEN) socket.send(data);
    },
    close: () => socket.close(),
  };
};

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf8");
  return data.toString("utf8");
}
