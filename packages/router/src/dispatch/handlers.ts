import {
  type Envelope,
  isIssuedBy,
  parsePattern,
  parseTopic,
  type Subsystem,
} from "@interconnect/protocol";
import {
  close,
  type DispatchContext,
  fault,
  OK,
  type Outcome,
  type SubsystemHandler,
} from "./context.js";

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** The envelope as forwarded: unchanged apart from the router-owned userId */
function stamp(envelope: Envelope, ctx: DispatchContext): Envelope {
  return { ...envelope, userId: ctx.sender.userId };
}

function unexpected(kind: string): Outcome {
  return fault("malformed", `Unexpected ${kind} from an agent`);
}

// ---------------------------------------------------------------------------
// auth
// ---------------------------------------------------------------------------

const handleAuth: SubsystemHandler = (message) => {
  switch (message.kind) {
    case "auth.goodbye":
      return close("Goodbye");
    case "auth.hello":
      return fault("malformed", "Already authenticated");
    default:
      return unexpected(message.kind);
  }
};

// ---------------------------------------------------------------------------
// pubsub
// ---------------------------------------------------------------------------

const handlePubsub: SubsystemHandler = (message, envelope, ctx) => {
  const { identity } = ctx.sender;
  switch (message.kind) {
    case "pubsub.publish": {
      if (!parseTopic(message.topic)) {
        return fault("malformed", `Invalid topic "${message.topic}"`);
      }
      if (!ctx.gate.authorize(identity, { kind: "publish", topic: message.topic })) {
        return fault("capability-denied", `Not allowed to publish to "${message.topic}"`);
      }
      const forwarded = stamp(envelope, ctx);
      for (const subscriber of ctx.subscriptions.match(message.topic)) {
        ctx.deliver(subscriber, forwarded, true);
      }
      return OK;
    }
    case "pubsub.subscribe": {
      if (!parsePattern(message.pattern)) {
        return fault("malformed", `Invalid topic pattern "${message.pattern}"`);
      }
      if (!ctx.gate.authorize(identity, { kind: "subscribe", pattern: message.pattern })) {
        return fault("capability-denied", `Not allowed to subscribe to "${message.pattern}"`);
      }
      ctx.subscriptions.subscribe(identity, message.pattern);
      ctx.reply(envelope, { kind: "pubsub.ack", verb: "subscribe", pattern: message.pattern });
      return OK;
    }
    case "pubsub.unsubscribe":
      // Removing one's own subscription needs no capability
      ctx.subscriptions.unsubscribe(identity, message.pattern);
      ctx.reply(envelope, { kind: "pubsub.ack", verb: "unsubscribe", pattern: message.pattern });
      return OK;
    default:
      return unexpected(message.kind);
  }
};

// ---------------------------------------------------------------------------
// rpc
// ---------------------------------------------------------------------------

const handleRpc: SubsystemHandler = (message, envelope, ctx) => {
  const { identity } = ctx.sender;
  switch (message.kind) {
    case "rpc.call": {
      const callee = envelope.recipient;
      if (callee === "") {
        return fault("malformed", "Calls must be addressed to an agent");
      }
      // Pending calls are keyed by message id, which must carry the caller's salt
      if (!isIssuedBy(envelope.messageId, identity)) {
        return fault(
          "identity-mismatch",
          `Call id ${envelope.messageId} was not issued by "${identity}"`,
        );
      }
      if (!ctx.gate.authorize(identity, { kind: "call", callee, method: message.method })) {
        return fault("capability-denied", `Not allowed to call "${callee}/${message.method}"`);
      }
      const route = ctx.table.lookup(callee);
      if (!route || ctx.table.isDead(route)) {
        return fault("recipient-unavailable", `No agent named "${callee}" is connected`);
      }
      ctx.calls.open({
        messageId: envelope.messageId,
        caller: identity,
        callee,
        method: message.method,
        timeout: message.timeout,
      });
      ctx.deliver(callee, stamp(envelope, ctx), false);
      return OK;
    }
    case "rpc.reply":
    case "rpc.fault": {
      const pending = ctx.calls.get(envelope.messageId);
      if (!pending) {
        ctx.logger.info(
          `Dropping ${message.kind} ${envelope.messageId} from "${identity}": no pending call`,
        );
        return OK;
      }
      if (pending.callee !== identity) {
        return fault(
          "identity-mismatch",
          `Call ${envelope.messageId} was addressed to "${pending.callee}", not "${identity}"`,
        );
      }
      ctx.calls.settle(envelope.messageId);
      ctx.deliver(pending.caller, stamp(envelope, ctx), false);
      return OK;
    }
    default:
      return unexpected(message.kind);
  }
};

// ---------------------------------------------------------------------------
// heartbeat
// ---------------------------------------------------------------------------

const handleHeartbeat: SubsystemHandler = (message, envelope, ctx) => {
  switch (message.kind) {
    case "heartbeat.ping":
      ctx.reply(envelope, { kind: "heartbeat.pong", timestamp: message.timestamp });
      return OK;
    case "heartbeat.pong":
      // Liveness was refreshed when the frame was accepted
      return OK;
    default:
      return unexpected(message.kind);
  }
};

// ---------------------------------------------------------------------------
// peerlist
// ---------------------------------------------------------------------------

const handlePeerlist: SubsystemHandler = (message, envelope, ctx) => {
  switch (message.kind) {
    case "peerlist.list":
      ctx.reply(envelope, { kind: "peerlist.listing", identities: ctx.table.identities() });
      return OK;
    case "peerlist.list-with-transport": {
      const peers = ctx.table
        .identities()
        .flatMap((identity) => {
          const route = ctx.table.lookup(identity);
          return route ? [{ identity, transport: route.transport }] : [];
        });
      ctx.reply(envelope, { kind: "peerlist.listing-with-transport", peers });
      return OK;
    }
    default:
      return unexpected(message.kind);
  }
};

// ---------------------------------------------------------------------------
// error
// ---------------------------------------------------------------------------

const handleError: SubsystemHandler = (message) => unexpected(message.kind);

// ---------------------------------------------------------------------------
// Dispatch Table
// ---------------------------------------------------------------------------

/**
 * One handler per subsystem. A hello reaching the table comes from an
 * admitted connection; first hellos are handled by the router's handshake.
 */
export const SUBSYSTEM_HANDLERS: Readonly<Record<Subsystem, SubsystemHandler>> = {
  auth: handleAuth,
  pubsub: handlePubsub,
  rpc: handleRpc,
  heartbeat: handleHeartbeat,
  peerlist: handlePeerlist,
  error: handleError,
};
