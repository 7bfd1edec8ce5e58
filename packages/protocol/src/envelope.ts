import { ValidationError } from "@interconnect/errors";
import { z } from "zod";

// ---------------------------------------------------------------------------
// Subsystems
// ---------------------------------------------------------------------------

export const SUBSYSTEMS = ["auth", "pubsub", "rpc", "heartbeat", "peerlist", "error"] as const;
export type Subsystem = (typeof SUBSYSTEMS)[number];

/** Version announced in the welcome frame */
export const PROTOCOL_VERSION = "1.0";

// ---------------------------------------------------------------------------
// Identity
// ---------------------------------------------------------------------------

/**
 * Identities name one agent within a platform instance. `/` is excluded
 * because identities appear as a path segment in `call:` capabilities.
 */
export const IDENTITY_PATTERN = /^[A-Za-z0-9_.:-]{1,128}$/;

export const IdentitySchema = z.string().regex(IDENTITY_PATTERN, "Invalid identity");

export function isValidIdentity(value: string): boolean {
  return IDENTITY_PATTERN.test(value);
}

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

/**
 * The routed message unit.
 *
 * On the wire an envelope is a JSON array of strings:
 * `[sender, recipient, userId, messageId, subsystem, ...args]`.
 * An empty recipient addresses the router itself.
 */
export interface Envelope {
  readonly sender: string;
  readonly recipient: string;
  readonly userId: string;
  readonly messageId: string;
  readonly subsystem: Subsystem;
  readonly args: readonly string[];
}

export const EnvelopeFramesSchema = z
  .tuple([z.string(), z.string(), z.string(), z.string().min(1), z.enum(SUBSYSTEMS)])
  .rest(z.string());

export type EnvelopeDecodeResult =
  | { readonly success: true; readonly envelope: Envelope }
  | { readonly success: false; readonly error: string };

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify([
    envelope.sender,
    envelope.recipient,
    envelope.userId,
    envelope.messageId,
    envelope.subsystem,
    ...envelope.args,
  ]);
}

/**
 * Decode a raw frame without throwing.
 */
export function safeDecodeEnvelope(data: string): EnvelopeDecodeResult {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return { success: false, error: "Frame is not valid JSON" };
  }

  const result = EnvelopeFramesSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at frame ${issue.path.join(".")}` : "";
    return { success: false, error: `Invalid envelope${where}: ${issue?.message ?? "unknown"}` };
  }

  const [sender, recipient, userId, messageId, subsystem, ...args] = result.data;
  return { success: true, envelope: { sender, recipient, userId, messageId, subsystem, args } };
}

/**
 * Decode a raw frame. Throws ROUTING_MALFORMED_ENVELOPE on failure.
 */
export function decodeEnvelope(data: string): Envelope {
  const result = safeDecodeEnvelope(data);
  if (!result.success) {
    throw new ValidationError({ code: "ROUTING_MALFORMED_ENVELOPE", message: result.error });
  }
  return result.envelope;
}

// ---------------------------------------------------------------------------
// Message IDs
// ---------------------------------------------------------------------------

/**
 * Monotonic message id source salted with the sender identity, so ids are
 * unique across the platform without coordination: `drv1.1`, `drv1.2`, ...
 */
export function createMessageIdGenerator(identity: string): () => string {
  let counter = 0;
  return () => `${identity}.${++counter}`;
}

/**
 * Whether a message id has the shape a generator for `identity` produces.
 * Identities may contain dots, so the counter part must be all digits.
 */
export function isIssuedBy(messageId: string, identity: string): boolean {
  const prefix = `${identity}.`;
  return messageId.startsWith(prefix) && /^\d+$/.test(messageId.slice(prefix.length));
}
