import WebSocket from "ws";
import type { Logger } from "pino";

/** Text-frame transport shared by the relay link and the host bridge. */
export interface TextChannel {
  send(text: string): void;
  onMessage(listener: (text: string) => void): void;
  onClose(listener: () => void): void;
  close(): void;
}

export function rawToText(raw: WebSocket.RawData): string {
  if (Buffer.isBuffer(raw)) return raw.toString("utf8");
  if (Array.isArray(raw)) return Buffer.concat(raw).toString("utf8");
  return Buffer.from(raw).toString("utf8");
}

export function socketChannel(socket: WebSocket, logger?: Logger): TextChannel {
  socket.on("error", (err) => {
    logger?.error({ err }, "socket error");
  });
  return {
    send: (text) => {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(text);
      }
    },
    onMessage: (listener) => {
      socket.on("message", (raw) => listener(rawToText(raw)));
    },
    onClose: (listener) => {
      socket.on("close", () => listener());
    },
    close: () => socket.close(),
  };
}
