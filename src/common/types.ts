export interface Envelope<T extends string = string, P = unknown> {
  type: T;
  payload: P;
  requestId?: string;
}

export type LockRequestType =
  | "session/hello"
  | "drive/contains"
  | "lock/query"
  | "lock/acquire"
  | "lock/release"
  | "file/sync"
  | "file/info";

export interface SessionWelcome {
  sessionId: string;
  roots: string[];
}

export type ReplyPayload =
  | { ok: true; result: unknown }
  | { ok: false; error: string };

export interface LockInfo {
  owner: string;
  lockTimestamp: string; // ISO-8601, as reported by the lock service
}

export interface SyncRecord {
  path: string;
  force: boolean;
  syncedAt: string;
}

export type HostEventType =
  | "modeler/open"
  | "modeler/close"
  | "script/added"
  | "script/removed";

export interface StatusNotification {
  message: string;
}

export interface DialogNotification {
  title: string;
  message: string;
  icon: "stop" | "info";
}

export type HandlerAction =
  | "skipped"
  | "untracked"
  | "conflict"
  | "locking"
  | "unlocking"
  | "released-foreign";

export type HandlerResult =
  | { ok: true; action: HandlerAction }
  | { ok: false; reason: string };
