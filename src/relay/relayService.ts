import { v4 as uuid } from "uuid";
import { z } from "zod";
import type { Logger } from "pino";
import { TextChannel } from "../common/channel";
import {
  parseEnvelope,
  pathPayloadSchema,
  sessionHelloSchema,
  syncPayloadSchema,
  toEnvelope,
} from "../common/protocol";
import { Envelope, ReplyPayload, SessionWelcome } from "../common/types";
import { LockTable } from "./lockTable";

export class RelayRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RelayRequestError";
  }
}

export interface Session {
  id: string;
  owner: string;
}

/**
 * Answers lock requests from agent connections. Each connection introduces
 * itself once with session/hello; its locks are dropped when the last
 * connection of that owner goes away.
 */
export class RelayService {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly table: LockTable, private readonly logger: Logger) {}

  get sessionCount(): number {
    return this.sessions.size;
  }

  connect(channel: TextChannel): void {
    let session: Session | null = null;

    channel.onMessage((text) => {
      const envelope = parseEnvelope(text);
      if (!envelope?.requestId) {
        this.logger.warn("failed to parse envelope");
        return;
      }
      const { reply, introduced } = this.handle(envelope, session);
      if (introduced) {
        if (session) this.disconnect(session);
        session = introduced;
      }
      channel.send(JSON.stringify(toEnvelope("reply", reply, envelope.requestId)));
    });

    channel.onClose(() => {
      if (!session) return;
      this.disconnect(session);
      session = null;
    });
  }

  handle(envelope: Envelope, session: Session | null): { reply: ReplyPayload; introduced?: Session } {
    try {
      if (envelope.type === "session/hello") {
        const introduced = this.introduce(envelope.payload);
        const welcome: SessionWelcome = { sessionId: introduced.id, roots: this.table.driveRoots };
        return { reply: { ok: true, result: welcome }, introduced };
      }
      if (!session) {
        throw new RelayRequestError("session not introduced");
      }
      return { reply: { ok: true, result: this.dispatch(envelope, session) } };
    } catch (err) {
      if (!(err instanceof RelayRequestError)) {
        this.logger.error({ err, type: envelope.type }, "request failed");
      }
      return { reply: { ok: false, error: err instanceof Error ? err.message : String(err) } };
    }
  }

  private introduce(payload: unknown): Session {
    const { owner } = parse(sessionHelloSchema, payload, "session/hello");
    const session: Session = { id: uuid(), owner };
    this.sessions.set(session.id, session);
    this.logger.info({ sessionId: session.id, owner }, "session registered");
    return session;
  }

  private dispatch(envelope: Envelope, session: Session): unknown {
    switch (envelope.type) {
      case "drive/contains": {
        const { path } = parse(pathPayloadSchema, envelope.payload, envelope.type);
        return this.table.contains(path);
      }
      case "lock/query": {
        const { path } = parse(pathPayloadSchema, envelope.payload, envelope.type);
        return this.table.isLockedByOther(path, session.owner);
      }
      case "lock/acquire": {
        const { path } = parse(pathPayloadSchema, envelope.payload, envelope.type);
        if (!this.table.contains(path)) return false;
        const acquired = this.table.acquire(path, session.owner);
        this.logger.info({ path, owner: session.owner, acquired }, "lock acquire");
        return acquired;
      }
      case "lock/release": {
        const { path } = parse(pathPayloadSchema, envelope.payload, envelope.type);
        const released = this.table.release(path, session.owner);
        this.logger.info({ path, owner: session.owner, released }, "lock release");
        return released;
      }
      case "file/sync": {
        const { path, force } = parse(syncPayloadSchema, envelope.payload, envelope.type);
        if (!this.table.contains(path)) {
          throw new RelayRequestError("file is not on a managed drive");
        }
        const record = this.table.sync(path, force);
        this.logger.info({ path, force, owner: session.owner }, "file synced");
        return record;
      }
      case "file/info": {
        const { path } = parse(pathPayloadSchema, envelope.payload, envelope.type);
        const lock = this.table.lockOf(path);
        if (!lock) {
          throw new RelayRequestError("file is not locked");
        }
        return lock;
      }
      default:
        throw new RelayRequestError("unknown request type");
    }
  }

  private disconnect(session: Session) {
    this.sessions.delete(session.id);
    const stillConnected = Array.from(this.sessions.values()).some((s) => s.owner === session.owner);
    if (stillConnected) return;
    const released = this.table.releaseAll(session.owner);
    this.logger.info({ sessionId: session.id, owner: session.owner, released }, "session closed");
  }
}

function parse<S extends z.ZodTypeAny>(schema: S, payload: unknown, type: string): z.infer<S> {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new RelayRequestError(`invalid payload for ${type}`);
  }
  return parsed.data;
}
