import path from "path";
import { WebSocketServer } from "ws";
import pino from "pino";
import { socketChannel } from "../common/channel";
import { LockTable } from "./lockTable";
import { RelayService } from "./relayService";

const PORT = parseInt(process.env.DRIVE_LOCK_RELAY_PORT || "8787", 10);
const ROOTS = (process.env.DRIVE_LOCK_ROOTS || "").split(path.delimiter).filter(Boolean);

const log = pino({
  name: "drive-lock-relay",
  level: process.env.LOG_LEVEL || "info",
});

const service = new RelayService(new LockTable(ROOTS), log);
const server = new WebSocketServer({ port: PORT });

server.on("connection", (socket) => {
  service.connect(socketChannel(socket, log));
});

server.on("listening", () => {
  log.info({ roots: ROOTS }, `Drive lock relay listening on ws://localhost:${PORT}`);
});

server.on("error", (err) => {
  log.error({ err }, "relay server error");
  process.exit(1);
});

if (ROOTS.length === 0) {
  log.warn("no drive roots configured; every file will be reported untracked");
}
