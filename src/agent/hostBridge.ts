import { WebSocketServer } from "ws";
import type { Logger } from "pino";
import { socketChannel, TextChannel } from "../common/channel";
import {
  modelerCloseSchema,
  modelerOpenSchema,
  parseEnvelope,
  scriptDocumentSchema,
  toEnvelope,
} from "../common/protocol";
import {
  DialogNotification,
  Envelope,
  HandlerResult,
  HostEventType,
  StatusNotification,
} from "../common/types";
import { NotificationSink, OpenOptions } from "./coordinator";

export const DEFAULT_HOST_PORT = 8788;

export interface DocumentEventHandlers {
  onOpen(filePath: string | null | undefined, options?: OpenOptions): Promise<HandlerResult>;
  onClose(filePath: string | null | undefined): Promise<HandlerResult>;
}

/**
 * Maps one host envelope onto the coordinator. Returns null when the
 * envelope is not a document event or its payload does not parse.
 *
 * Script documents that were never saved carry no path and are ignored.
 */
export async function routeHostEvent(
  envelope: Envelope,
  handlers: DocumentEventHandlers
): Promise<HandlerResult | null> {
  switch (envelope.type) {
    case "modeler/open": {
      const parsed = modelerOpenSchema.safeParse(envelope.payload);
      if (!parsed.success) return null;
      return handlers.onOpen(parsed.data.path, { imported: parsed.data.imported });
    }
    case "modeler/close": {
      const parsed = modelerCloseSchema.safeParse(envelope.payload);
      if (!parsed.success) return null;
      return handlers.onClose(parsed.data.path);
    }
    case "script/added":
    case "script/removed": {
      const parsed = scriptDocumentSchema.safeParse(envelope.payload);
      if (!parsed.success) return null;
      if (parsed.data.filePath === undefined) {
        return { ok: true, action: "skipped" };
      }
      return envelope.type === "script/added"
        ? handlers.onOpen(parsed.data.filePath)
        : handlers.onClose(parsed.data.filePath);
    }
    default:
      return null;
  }
}

function isHostEventType(type: string): type is HostEventType {
  return (
    type === "modeler/open" ||
    type === "modeler/close" ||
    type === "script/added" ||
    type === "script/removed"
  );
}

export interface HostBridgeOptions {
  pluginName: string;
  logger: Logger;
}

/**
 * Local endpoint for the host-side shim. Receives document lifecycle events
 * and sends status lines and dialogs back to every connected shim.
 */
export class HostBridge implements NotificationSink {
  private readonly shims = new Set<TextChannel>();
  private readonly pluginName: string;
  private readonly logger: Logger;
  private server?: WebSocketServer;

  constructor(options: HostBridgeOptions) {
    this.pluginName = options.pluginName;
    this.logger = options.logger;
  }

  get connectionCount(): number {
    return this.shims.size;
  }

  attach(channel: TextChannel, handlers: DocumentEventHandlers): void {
    this.shims.add(channel);
    channel.onClose(() => {
      this.shims.delete(channel);
    });
    channel.onMessage((text) => {
      this.handleMessage(channel, text, handlers).catch((err: unknown) => {
        this.logger.error({ err }, "failed handling host message");
      });
    });
  }

  listen(port: number, handlers: DocumentEventHandlers): Promise<void> {
    const server = new WebSocketServer({ port, host: "127.0.0.1" });
    this.server = server;
    server.on("connection", (socket) => {
      this.logger.info("host shim connected");
      this.attach(socketChannel(socket, this.logger), handlers);
    });
    return new Promise((resolve, reject) => {
      server.once("listening", () => {
        this.logger.info({ port }, "host bridge listening");
        resolve();
      });
      server.once("error", reject);
    });
  }

  status(notification: StatusNotification): void {
    const message = `${this.pluginName}: ${notification.message}`;
    this.logger.info(message);
    this.broadcast(toEnvelope("notify/status", { message }));
  }

  dialog(notification: DialogNotification): void {
    this.logger.warn({ title: notification.title }, notification.message);
    this.broadcast(toEnvelope("notify/dialog", notification));
  }

  close(): Promise<void> {
    this.shims.forEach((shim) => shim.close());
    this.shims.clear();
    const server = this.server;
    if (!server) return Promise.resolve();
    this.server = undefined;
    return new Promise((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    });
  }

  private async handleMessage(channel: TextChannel, text: string, handlers: DocumentEventHandlers) {
    const envelope = parseEnvelope(text);
    if (!envelope || !isHostEventType(envelope.type)) {
      this.logger.warn({ type: envelope?.type }, "unknown host message");
      return;
    }
    const result = await routeHostEvent(envelope, handlers);
    if (!result) {
      this.logger.warn({ type: envelope.type }, "malformed host event");
      return;
    }
    channel.send(JSON.stringify(toEnvelope("event/handled", { eventType: envelope.type, result })));
  }

  private broadcast(envelope: Envelope) {
    if (this.shims.size === 0) {
      this.logger.debug({ type: envelope.type }, "no host shim connected");
      return;
    }
    const text = JSON.stringify(envelope);
    this.shims.forEach((shim) => shim.send(text));
  }
}
