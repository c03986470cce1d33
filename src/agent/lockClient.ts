import WebSocket from "ws";
import { v4 as uuid } from "uuid";
import { z } from "zod";
import type { Logger } from "pino";
import {
  lockInfoSchema,
  parseEnvelope,
  replySchema,
  sessionWelcomeSchema,
  syncRecordSchema,
  toEnvelope,
} from "../common/protocol";
import { socketChannel, TextChannel } from "../common/channel";
import { LockInfo, LockRequestType, SessionWelcome } from "../common/types";

export const DEFAULT_TIMEOUT_MS = 8000;

/**
 * What the coordinator needs from the lock service. Every call is a single
 * attempt; callers decide what a failure means.
 */
export interface RemoteLockClient {
  contains(filePath: string): Promise<boolean>;
  isLockedByOther(filePath: string): Promise<boolean>;
  lockFile(filePath: string): Promise<boolean>;
  unlockFile(filePath: string): Promise<boolean>;
  syncFile(filePath: string, force: boolean): Promise<void>;
  getFileInfo(filePath: string): Promise<LockInfo>;
}

export class LockClientError extends Error {
  constructor(message: string, readonly requestType?: LockRequestType) {
    super(message);
    this.name = "LockClientError";
  }
}

interface PendingRequest {
  type: LockRequestType;
  resolve: (result: unknown) => void;
  reject: (err: LockClientError) => void;
  timer: NodeJS.Timeout;
}

export interface RelayLockClientOptions {
  timeoutMs?: number;
  logger?: Logger;
}

export class RelayLockClient implements RemoteLockClient {
  private readonly pending = new Map<string, PendingRequest>();
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private closed = false;

  constructor(private readonly channel: TextChannel, options: RelayLockClientOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.logger = options.logger;
    channel.onMessage((text) => this.handleMessage(text));
    channel.onClose(() => {
      if (!this.closed) {
        this.logger?.warn({ pending: this.pending.size }, "disconnected from relay");
      }
      this.closed = true;
      this.failAll("relay connection closed");
    });
  }

  hello(owner: string): Promise<SessionWelcome> {
    return this.request("session/hello", { owner }, sessionWelcomeSchema);
  }

  contains(filePath: string): Promise<boolean> {
    return this.request("drive/contains", { path: filePath }, z.boolean());
  }

  isLockedByOther(filePath: string): Promise<boolean> {
    return this.request("lock/query", { path: filePath }, z.boolean());
  }

  lockFile(filePath: string): Promise<boolean> {
    return this.request("lock/acquire", { path: filePath }, z.boolean());
  }

  unlockFile(filePath: string): Promise<boolean> {
    return this.request("lock/release", { path: filePath }, z.boolean());
  }

  async syncFile(filePath: string, force: boolean): Promise<void> {
    await this.request("file/sync", { path: filePath, force }, syncRecordSchema);
  }

  getFileInfo(filePath: string): Promise<LockInfo> {
    return this.request("file/info", { path: filePath }, lockInfoSchema);
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.failAll("lock client closed");
    this.channel.close();
  }

  /**
   * Sends one request and resolves with the reply's result once it matches
   * `schema`. Rejects on an error reply, a malformed reply, a closed channel
   * or after the timeout.
   */
  async request<S extends z.ZodTypeAny>(
    type: LockRequestType,
    payload: unknown,
    schema: S
  ): Promise<z.infer<S>> {
    const result = await this.send(type, payload);
    const parsed = schema.safeParse(result);
    if (!parsed.success) {
      throw new LockClientError(`Malformed reply to ${type}`, type);
    }
    return parsed.data;
  }

  private send(type: LockRequestType, payload: unknown): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new LockClientError("relay connection closed", type));
    }
    const requestId = uuid();
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new LockClientError(`Lock request timed out: ${type}`, type));
      }, this.timeoutMs);
      this.pending.set(requestId, { type, resolve, reject, timer });
      try {
        this.channel.send(JSON.stringify(toEnvelope(type, payload, requestId)));
      } catch (err) {
        clearTimeout(timer);
        this.pending.delete(requestId);
        const reason = err instanceof Error ? err.message : String(err);
        reject(new LockClientError(`Failed sending ${type}: ${reason}`, type));
      }
    });
  }

  private handleMessage(text: string) {
    const envelope = parseEnvelope(text);
    if (!envelope || envelope.type !== "reply" || !envelope.requestId) {
      this.logger?.warn({ text }, "ignoring unexpected relay message");
      return;
    }
    const entry = this.pending.get(envelope.requestId);
    if (!entry) return;
    this.pending.delete(envelope.requestId);
    clearTimeout(entry.timer);

    const reply = replySchema.safeParse(envelope.payload);
    if (!reply.success) {
      entry.reject(new LockClientError(`Malformed reply to ${entry.type}`, entry.type));
    } else if (reply.data.ok) {
      entry.resolve(reply.data.result);
    } else {
      entry.reject(new LockClientError(reply.data.error, entry.type));
    }
  }

  private failAll(reason: string) {
    this.pending.forEach((entry) => {
      clearTimeout(entry.timer);
      entry.reject(new LockClientError(reason, entry.type));
    });
    this.pending.clear();
  }
}

export interface ConnectedLockClient {
  client: RelayLockClient;
  welcome: SessionWelcome;
}

export async function connectRelayLockClient(
  url: string,
  owner: string,
  options: RelayLockClientOptions = {}
): Promise<ConnectedLockClient> {
  const socket = new WebSocket(url);
  await new Promise<void>((resolve, reject) => {
    const onError = (err: Error) => {
      reject(new LockClientError(`Cannot reach lock service at ${url}: ${err.message}`));
    };
    socket.once("error", onError);
    socket.once("open", () => {
      socket.off("error", onError);
      resolve();
    });
  });
  const client = new RelayLockClient(socketChannel(socket, options.logger), options);
  try {
    const welcome = await client.hello(owner);
    return { client, welcome };
  } catch (err) {
    client.close();
    throw err;
  }
}
