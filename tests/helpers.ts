import pino, { Logger } from "pino";
import { TextChannel } from "../src/common/channel";
import { DialogNotification, LockInfo, StatusNotification } from "../src/common/types";
import { NotificationSink } from "../src/agent/coordinator";
import { RemoteLockClient } from "../src/agent/lockClient";

export interface LogLine {
  level: number;
  msg?: string;
  [key: string]: unknown;
}

export function captureLogger(): { logger: Logger; lines: LogLine[] } {
  const lines: LogLine[] = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    }
  );
  return { logger, lines };
}

export const ERROR_LEVEL = 50;
export const WARN_LEVEL = 40;

export class FakeLockClient implements RemoteLockClient {
  readonly calls: string[] = [];
  tracked = true;
  lockedByOther = false;
  lockResult = true;
  unlockResult = true;
  info: LockInfo = { owner: "alice", lockTimestamp: "2024-01-01T00:00:00" };
  failure?: Error;
  unlockGate?: Promise<void>;

  async contains(filePath: string): Promise<boolean> {
    this.record("contains", filePath);
    return this.tracked;
  }

  async isLockedByOther(filePath: string): Promise<boolean> {
    this.record("isLockedByOther", filePath);
    return this.lockedByOther;
  }

  async lockFile(filePath: string): Promise<boolean> {
    this.record("lockFile", filePath);
    return this.lockResult;
  }

  async unlockFile(filePath: string): Promise<boolean> {
    this.record("unlockFile", filePath);
    if (this.unlockGate) await this.unlockGate;
    return this.unlockResult;
  }

  async syncFile(filePath: string, force: boolean): Promise<void> {
    this.record("syncFile", filePath, String(force));
  }

  async getFileInfo(filePath: string): Promise<LockInfo> {
    this.record("getFileInfo", filePath);
    return this.info;
  }

  methods(): string[] {
    return this.calls.map((call) => call.split(" ")[0]);
  }

  private record(method: string, ...args: string[]) {
    this.calls.push([method, ...args].join(" "));
    if (this.failure) throw this.failure;
  }
}

export class RecordingSink implements NotificationSink {
  readonly statuses: string[] = [];
  readonly dialogs: DialogNotification[] = [];

  status(notification: StatusNotification): void {
    this.statuses.push(notification.message);
  }

  dialog(notification: DialogNotification): void {
    this.dialogs.push(notification);
  }
}

/** One end of an in-memory channel pair. Delivery is asynchronous. */
export class MemoryChannel implements TextChannel {
  peer?: MemoryChannel;
  readonly sent: string[] = [];
  private readonly messageListeners: Array<(text: string) => void> = [];
  private readonly closeListeners: Array<() => void> = [];
  private closed = false;

  send(text: string): void {
    if (this.closed) return;
    this.sent.push(text);
    const peer = this.peer;
    if (peer) {
      queueMicrotask(() => peer.deliver(text));
    }
  }

  onMessage(listener: (text: string) => void): void {
    this.messageListeners.push(listener);
  }

  onClose(listener: () => void): void {
    this.closeListeners.push(listener);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.closeListeners.forEach((listener) => listener());
    this.peer?.close();
  }

  /** Resolves with the next frame delivered to this end. */
  nextMessage(): Promise<string> {
    return new Promise((resolve) => {
      let done = false;
      this.onMessage((text) => {
        if (done) return;
        done = true;
        resolve(text);
      });
    });
  }

  private deliver(text: string) {
    if (this.closed) return;
    this.messageListeners.forEach((listener) => listener(text));
  }
}

export function channelPair(): [MemoryChannel, MemoryChannel] {
  const left = new MemoryChannel();
  const right = new MemoryChannel();
  left.peer = right;
  right.peer = left;
  return [left, right];
}

export function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
