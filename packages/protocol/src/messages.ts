import {
  AUTH_REJECTION_REASONS,
  type AuthRejectionReason,
  FAULT_KINDS,
  type FaultKind,
} from "@interconnect/errors";
import { z } from "zod";
import type { Envelope, Subsystem } from "./envelope.js";

// ---------------------------------------------------------------------------
// Message Kinds
// ---------------------------------------------------------------------------

/**
 * Every `subsystem.verb` pair the protocol knows. The verb is the first
 * argument frame of the envelope.
 */
export const MESSAGE_KINDS = [
  "auth.hello",
  "auth.welcome",
  "auth.error",
  "auth.goodbye",
  "pubsub.subscribe",
  "pubsub.unsubscribe",
  "pubsub.publish",
  "pubsub.ack",
  "rpc.call",
  "rpc.reply",
  "rpc.fault",
  "heartbeat.ping",
  "heartbeat.pong",
  "peerlist.list",
  "peerlist.list-with-transport",
  "peerlist.listing",
  "peerlist.listing-with-transport",
  "peerlist.add",
  "peerlist.drop",
  "error.fault",
] as const;
export type MessageKind = (typeof MESSAGE_KINDS)[number];

// ---------------------------------------------------------------------------
// Individual Message Types
// ---------------------------------------------------------------------------

/** Agent proposes an identity and presents its credential */
export interface HelloMessage {
  readonly kind: "auth.hello";
  readonly identity: string;
  readonly credential: string;
  /** EdDSA JWT proving possession of an ed25519 credential */
  readonly proof?: string;
}

/** Router admits the agent */
export interface WelcomeMessage {
  readonly kind: "auth.welcome";
  readonly version: string;
  readonly routerIdentity: string;
  readonly identity: string;
  readonly capabilities: readonly string[];
}

/** Router rejects the handshake; the connection is closed after it */
export interface AuthErrorMessage {
  readonly kind: "auth.error";
  readonly reason: AuthRejectionReason;
  readonly detail: string;
}

/** Agent is disconnecting cleanly */
export interface GoodbyeMessage {
  readonly kind: "auth.goodbye";
}

export interface SubscribeMessage {
  readonly kind: "pubsub.subscribe";
  readonly pattern: string;
}

export interface UnsubscribeMessage {
  readonly kind: "pubsub.unsubscribe";
  readonly pattern: string;
}

/** Published by an agent and delivered unchanged to each subscriber */
export interface PublishMessage {
  readonly kind: "pubsub.publish";
  readonly topic: string;
  readonly payload: string;
}

export interface AckMessage {
  readonly kind: "pubsub.ack";
  readonly verb: "subscribe" | "unsubscribe";
  readonly pattern: string;
}

/** RPC request; the envelope recipient is the callee */
export interface CallMessage {
  readonly kind: "rpc.call";
  readonly method: string;
  /** JSON-encoded argument array, opaque to the router */
  readonly params: string;
  /** Requested timeout in ms */
  readonly timeout?: number;
}

/** RPC result; echoes the call's message id */
export interface ReplyMessage {
  readonly kind: "rpc.reply";
  /** JSON-encoded result, opaque to the router */
  readonly result: string;
}

/** RPC failure; echoes the call's message id */
export interface FaultMessage {
  readonly kind: "rpc.fault";
  readonly fault: FaultKind;
  readonly detail: string;
}

export interface PingMessage {
  readonly kind: "heartbeat.ping";
  readonly timestamp: number;
}

export interface PongMessage {
  readonly kind: "heartbeat.pong";
  readonly timestamp: number;
}

export interface ListPeersMessage {
  readonly kind: "peerlist.list";
}

export interface ListPeersWithTransportMessage {
  readonly kind: "peerlist.list-with-transport";
}

export interface ListingMessage {
  readonly kind: "peerlist.listing";
  readonly identities: readonly string[];
}

export interface PeerInfo {
  readonly identity: string;
  readonly transport: string;
}

export interface ListingWithTransportMessage {
  readonly kind: "peerlist.listing-with-transport";
  readonly peers: readonly PeerInfo[];
}

export interface PeerAddedMessage {
  readonly kind: "peerlist.add";
  readonly identity: string;
}

export interface PeerDroppedMessage {
  readonly kind: "peerlist.drop";
  readonly identity: string;
}

/** Routing error for a non-RPC envelope; echoes the offending message id */
export interface ErrorFaultMessage {
  readonly kind: "error.fault";
  readonly fault: FaultKind;
  readonly detail: string;
  /** Subsystem of the envelope that failed */
  readonly subsystem: string;
}

export type BusMessage =
  | HelloMessage
  | WelcomeMessage
  | AuthErrorMessage
  | GoodbyeMessage
  | SubscribeMessage
  | UnsubscribeMessage
  | PublishMessage
  | AckMessage
  | CallMessage
  | ReplyMessage
  | FaultMessage
  | PingMessage
  | PongMessage
  | ListPeersMessage
  | ListPeersWithTransportMessage
  | ListingMessage
  | ListingWithTransportMessage
  | PeerAddedMessage
  | PeerDroppedMessage
  | ErrorFaultMessage;

export type MessageOf<K extends MessageKind> = Extract<BusMessage, { readonly kind: K }>;

// ---------------------------------------------------------------------------
// Argument Schemas
// ---------------------------------------------------------------------------

const text = z.string();
const token = z.string().min(1);
const timestamp = z
  .string()
  .regex(/^\d+$/, "Expected a decimal timestamp")
  .transform((value) => Number(value));
const timeout = z
  .string()
  .regex(/^\d+$/, "Expected a timeout in milliseconds")
  .transform((value) => Number(value));

function json<T extends z.ZodTypeAny>(schema: T) {
  return z
    .string()
    .transform((value, ctx): unknown => {
      try {
        return JSON.parse(value);
      } catch {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: "Expected a JSON document" });
        return z.NEVER;
      }
    })
    .pipe(schema);
}

const PeerInfoSchema = z.object({ identity: token, transport: token });

type ArgSchemas = {
  readonly [K in MessageKind]: z.ZodType<MessageOf<K>, z.ZodTypeDef, unknown>;
};

/** Schemas over the argument frames that follow the verb */
const ARG_SCHEMAS: ArgSchemas = {
  "auth.hello": z
    .tuple([text, text])
    .rest(token)
    .refine((args) => args.length <= 3, "Expected identity, credential and an optional proof")
    .transform(
      ([identity, credential, proof]): HelloMessage => ({
        kind: "auth.hello",
        identity,
        credential,
        ...(proof !== undefined ? { proof } : {}),
      }),
    ),
  "auth.welcome": z
    .tuple([token, token, token, json(z.array(z.string()))])
    .transform(
      ([version, routerIdentity, identity, capabilities]): WelcomeMessage => ({
        kind: "auth.welcome",
        version,
        routerIdentity,
        identity,
        capabilities,
      }),
    ),
  "auth.error": z
    .tuple([z.enum(AUTH_REJECTION_REASONS), text])
    .transform(([reason, detail]): AuthErrorMessage => ({ kind: "auth.error", reason, detail })),
  "auth.goodbye": z.tuple([]).transform((): GoodbyeMessage => ({ kind: "auth.goodbye" })),
  "pubsub.subscribe": z
    .tuple([token])
    .transform(([pattern]): SubscribeMessage => ({ kind: "pubsub.subscribe", pattern })),
  "pubsub.unsubscribe": z
    .tuple([token])
    .transform(([pattern]): UnsubscribeMessage => ({ kind: "pubsub.unsubscribe", pattern })),
  "pubsub.publish": z
    .tuple([token, text])
    .transform(([topic, payload]): PublishMessage => ({ kind: "pubsub.publish", topic, payload })),
  "pubsub.ack": z
    .tuple([z.enum(["subscribe", "unsubscribe"]), token])
    .transform(([verb, pattern]): AckMessage => ({ kind: "pubsub.ack", verb, pattern })),
  "rpc.call": z
    .tuple([token, text])
    .rest(timeout)
    .refine((args) => args.length <= 3, "Expected method, arguments and an optional timeout")
    .transform(
      ([method, params, timeoutMs]): CallMessage => ({
        kind: "rpc.call",
        method,
        params,
        ...(timeoutMs !== undefined ? { timeout: timeoutMs } : {}),
      }),
    ),
  "rpc.reply": z
    .tuple([text])
    .transform(([result]): ReplyMessage => ({ kind: "rpc.reply", result })),
  "rpc.fault": z
    .tuple([z.enum(FAULT_KINDS), text])
    .transform(([fault, detail]): FaultMessage => ({ kind: "rpc.fault", fault, detail })),
  "heartbeat.ping": z
    .tuple([timestamp])
    .transform(([value]): PingMessage => ({ kind: "heartbeat.ping", timestamp: value })),
  "heartbeat.pong": z
    .tuple([timestamp])
    .transform(([value]): PongMessage => ({ kind: "heartbeat.pong", timestamp: value })),
  "peerlist.list": z.tuple([]).transform((): ListPeersMessage => ({ kind: "peerlist.list" })),
  "peerlist.list-with-transport": z
    .tuple([])
    .transform((): ListPeersWithTransportMessage => ({ kind: "peerlist.list-with-transport" })),
  "peerlist.listing": z
    .array(token)
    .transform((identities): ListingMessage => ({ kind: "peerlist.listing", identities })),
  "peerlist.listing-with-transport": z
    .tuple([json(z.array(PeerInfoSchema))])
    .transform(
      ([peers]): ListingWithTransportMessage => ({
        kind: "peerlist.listing-with-transport",
        peers,
      }),
    ),
  "peerlist.add": z
    .tuple([token])
    .transform(([identity]): PeerAddedMessage => ({ kind: "peerlist.add", identity })),
  "peerlist.drop": z
    .tuple([token])
    .transform(([identity]): PeerDroppedMessage => ({ kind: "peerlist.drop", identity })),
  "error.fault": z
    .tuple([z.enum(FAULT_KINDS), text, text])
    .transform(
      ([fault, detail, subsystem]): ErrorFaultMessage => ({
        kind: "error.fault",
        fault,
        detail,
        subsystem,
      }),
    ),
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export type MessageParseResult =
  | { readonly success: true; readonly message: BusMessage }
  | { readonly success: false; readonly error: string };

export function isMessageKind(value: string): value is MessageKind {
  return MESSAGE_KINDS.some((candidate) => candidate === value);
}

function schemaFor(kind: MessageKind): z.ZodType<BusMessage, z.ZodTypeDef, unknown> {
  return ARG_SCHEMAS[kind];
}

/**
 * Interpret the argument frames of an envelope as a typed message.
 */
export function parseMessage(envelope: Envelope): MessageParseResult {
  const [verb, ...rest] = envelope.args;
  if (verb === undefined) {
    return { success: false, error: `Missing verb for subsystem "${envelope.subsystem}"` };
  }
  const kind = `${envelope.subsystem}.${verb}`;
  if (!isMessageKind(kind)) {
    return { success: false, error: `Unknown verb "${verb}" for subsystem "${envelope.subsystem}"` };
  }
  const result = schemaFor(kind).safeParse(rest);
  if (!result.success) {
    const issue = result.error.issues[0];
    return { success: false, error: `Invalid ${kind} arguments: ${issue?.message ?? "unknown"}` };
  }
  return { success: true, message: result.data };
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function subsystemOf(message: BusMessage): Subsystem {
  const [subsystem] = message.kind.split(".");
  switch (subsystem) {
    case "auth":
    case "pubsub":
    case "rpc":
    case "heartbeat":
    case "peerlist":
      return subsystem;
    default:
      return "error";
  }
}

/**
 * Argument frames for a message, verb first.
 */
export function encodeArgs(message: BusMessage): readonly string[] {
  switch (message.kind) {
    case "auth.hello":
      return message.proof === undefined
        ? ["hello", message.identity, message.credential]
        : ["hello", message.identity, message.credential, message.proof];
    case "auth.welcome":
      return [
        "welcome",
        message.version,
        message.routerIdentity,
        message.identity,
        JSON.stringify(message.capabilities),
      ];
    case "auth.error":
      return ["error", message.reason, message.detail];
    case "auth.goodbye":
      return ["goodbye"];
    case "pubsub.subscribe":
      return ["subscribe", message.pattern];
    case "pubsub.unsubscribe":
      return ["unsubscribe", message.pattern];
    case "pubsub.publish":
      return ["publish", message.topic, message.payload];
    case "pubsub.ack":
      return ["ack", message.verb, message.pattern];
    case "rpc.call":
      return message.timeout === undefined
        ? ["call", message.method, message.params]
        : ["call", message.method, message.params, String(message.timeout)];
    case "rpc.reply":
      return ["reply", message.result];
    case "rpc.fault":
      return ["fault", message.fault, message.detail];
    case "heartbeat.ping":
      return ["ping", String(message.timestamp)];
    case "heartbeat.pong":
      return ["pong", String(message.timestamp)];
    case "peerlist.list":
      return ["list"];
    case "peerlist.list-with-transport":
      return ["list-with-transport"];
    case "peerlist.listing":
      return ["listing", ...message.identities];
    case "peerlist.listing-with-transport":
      return ["listing-with-transport", JSON.stringify(message.peers)];
    case "peerlist.add":
      return ["add", message.identity];
    case "peerlist.drop":
      return ["drop", message.identity];
    case "error.fault":
      return ["fault", message.fault, message.detail, message.subsystem];
  }
}

export interface EnvelopeHeader {
  readonly sender: string;
  readonly recipient: string;
  readonly userId?: string;
  readonly messageId: string;
}

/**
 * Build an envelope carrying a typed message.
 */
export function toEnvelope(header: EnvelopeHeader, message: BusMessage): Envelope {
  return {
    sender: header.sender,
    recipient: header.recipient,
    userId: header.userId ?? "",
    messageId: header.messageId,
    subsystem: subsystemOf(message),
    args: encodeArgs(message),
  };
}
