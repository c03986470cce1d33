import { z } from "zod";
import { Envelope } from "./types";

export const envelopeSchema = z.object({
  type: z.string().min(1),
  payload: z.unknown(),
  requestId: z.string().optional(),
});

export const replySchema = z.discriminatedUnion("ok", [
  z.object({ ok: z.literal(true), result: z.unknown() }),
  z.object({ ok: z.literal(false), error: z.string() }),
]);

export const sessionHelloSchema = z.object({
  owner: z.string().min(1, "owner is required"),
});

export const sessionWelcomeSchema = z.object({
  sessionId: z.string(),
  roots: z.array(z.string()),
});

export const pathPayloadSchema = z.object({
  path: z.string().min(1, "path is required"),
});

export const syncPayloadSchema = pathPayloadSchema.extend({
  force: z.boolean(),
});

export const lockInfoSchema = z.object({
  owner: z.string(),
  lockTimestamp: z.string(),
});

export const syncRecordSchema = z.object({
  path: z.string(),
  force: z.boolean(),
  syncedAt: z.string(),
});

// Host shim events
export const modelerOpenSchema = z.object({
  path: z.string(),
  imported: z.boolean().default(false),
});

export const modelerCloseSchema = z.object({
  path: z.string().nullable(),
});

export const scriptDocumentSchema = z.object({
  filePath: z.string().optional(),
});

export function toEnvelope(type: string, payload: unknown, requestId?: string): Envelope {
  return requestId === undefined ? { type, payload } : { type, payload, requestId };
}

/**
 * Parses one text frame into an envelope. Returns null for anything that is
 * not JSON or lacks a type.
 */
export function parseEnvelope(text: string): Envelope | null {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return null;
  }
  const parsed = envelopeSchema.safeParse(raw);
  if (!parsed.success) return null;
  const { type, payload, requestId } = parsed.data;
  return toEnvelope(type, payload, requestId);
}
