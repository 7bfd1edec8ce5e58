import { describe, expect, it } from "vitest";
import type { Envelope, Subsystem } from "../envelope.js";
import { type BusMessage, parseMessage, toEnvelope } from "../messages.js";

function envelopeOf(subsystem: Subsystem, args: readonly string[]): Envelope {
  return { sender: "a1", recipient: "", userId: "", messageId: "a1.1", subsystem, args };
}

function parsed(subsystem: Subsystem, args: readonly string[]): BusMessage {
  const result = parseMessage(envelopeOf(subsystem, args));
  if (!result.success) throw new Error(result.error);
  return result.message;
}

describe("parseMessage", () => {
  it("parses hello with and without proof", () => {
    expect(parsed("auth", ["hello", "hist1", "test-secret"])).toEqual({
      kind: "auth.hello",
      identity: "hist1",
      credential: "test-secret",
    });
    expect(parsed("auth", ["hello", "hist1", "pk", "jwt"])).toEqual({
      kind: "auth.hello",
      identity: "hist1",
      credential: "pk",
      proof: "jwt",
    });
  });

  it("parses welcome capabilities from JSON", () => {
    expect(parsed("auth", ["welcome", "1.0", "router", "hist1", '["publish:devices/#"]'])).toEqual({
      kind: "auth.welcome",
      version: "1.0",
      routerIdentity: "router",
      identity: "hist1",
      capabilities: ["publish:devices/#"],
    });
  });

  it("rejects welcome with broken capability JSON", () => {
    const result = parseMessage(envelopeOf("auth", ["welcome", "1.0", "router", "hist1", "[oops"]));
    expect(result.success).toBe(false);
  });

  it("parses auth errors with a known reason only", () => {
    expect(parsed("auth", ["error", "identity-conflict", "drv1 is connected"])).toEqual({
      kind: "auth.error",
      reason: "identity-conflict",
      detail: "drv1 is connected",
    });
    expect(parseMessage(envelopeOf("auth", ["error", "bad-luck", "x"])).success).toBe(false);
  });

  it("parses calls with an optional timeout", () => {
    expect(parsed("rpc", ["call", "set_point", "[42]", "2000"])).toEqual({
      kind: "rpc.call",
      method: "set_point",
      params: "[42]",
      timeout: 2000,
    });
    expect(parsed("rpc", ["call", "set_point", "[42]"])).toEqual({
      kind: "rpc.call",
      method: "set_point",
      params: "[42]",
    });
  });

  it("rejects a non-numeric timeout", () => {
    const result = parseMessage(envelopeOf("rpc", ["call", "set_point", "[]", "soon"]));
    expect(result).toEqual({
      success: false,
      error: "Invalid rpc.call arguments: Expected a timeout in milliseconds",
    });
  });

  it("parses faults with a known kind only", () => {
    expect(parsed("rpc", ["fault", "timeout", "late"])).toEqual({
      kind: "rpc.fault",
      fault: "timeout",
      detail: "late",
    });
    expect(parseMessage(envelopeOf("rpc", ["fault", "exploded", "x"])).success).toBe(false);
  });

  it("parses heartbeat timestamps as numbers", () => {
    expect(parsed("heartbeat", ["ping", "1700000000000"])).toEqual({
      kind: "heartbeat.ping",
      timestamp: 1_700_000_000_000,
    });
  });

  it("parses listings of any length", () => {
    expect(parsed("peerlist", ["listing"])).toEqual({ kind: "peerlist.listing", identities: [] });
    expect(parsed("peerlist", ["listing", "a", "b"])).toEqual({
      kind: "peerlist.listing",
      identities: ["a", "b"],
    });
  });

  it("parses routing errors", () => {
    expect(parsed("error", ["fault", "capability-denied", "publish x", "pubsub"])).toEqual({
      kind: "error.fault",
      fault: "capability-denied",
      detail: "publish x",
      subsystem: "pubsub",
    });
  });

  it("rejects a missing verb", () => {
    expect(parseMessage(envelopeOf("pubsub", []))).toEqual({
      success: false,
      error: 'Missing verb for subsystem "pubsub"',
    });
  });

  it("rejects verbs from another subsystem", () => {
    expect(parseMessage(envelopeOf("pubsub", ["call", "x", "[]"]))).toEqual({
      success: false,
      error: 'Unknown verb "call" for subsystem "pubsub"',
    });
  });

  it("rejects extra arguments", () => {
    expect(parseMessage(envelopeOf("pubsub", ["subscribe", "a/#", "extra"])).success).toBe(false);
  });

  it("rejects an empty topic", () => {
    expect(parseMessage(envelopeOf("pubsub", ["publish", "", "x"])).success).toBe(false);
  });
});

describe("toEnvelope", () => {
  const header = { sender: "router", recipient: "ui1", messageId: "router.7" };

  it("derives the subsystem and argument frames", () => {
    expect(toEnvelope(header, { kind: "pubsub.ack", verb: "subscribe", pattern: "devices/#" })).toEqual(
      {
        sender: "router",
        recipient: "ui1",
        userId: "",
        messageId: "router.7",
        subsystem: "pubsub",
        args: ["ack", "subscribe", "devices/#"],
      },
    );
  });

  it("puts routing errors on the error subsystem", () => {
    const envelope = toEnvelope(header, {
      kind: "error.fault",
      fault: "malformed",
      detail: "bad",
      subsystem: "pubsub",
    });
    expect(envelope.subsystem).toBe("error");
    expect(envelope.args).toEqual(["fault", "malformed", "bad", "pubsub"]);
  });

  it("produces envelopes that parse back to the same message", () => {
    const messages: BusMessage[] = [
      { kind: "auth.hello", identity: "a1", credential: "test-secret", proof: "jwt" },
      { kind: "auth.goodbye" },
      { kind: "rpc.call", method: "m", params: "[]", timeout: 5 },
      { kind: "peerlist.listing-with-transport", peers: [{ identity: "a1", transport: "ws" }] },
    ];
    for (const message of messages) {
      const result = parseMessage(toEnvelope(header, message));
      expect(result).toEqual({ success: true, message });
    }
  });
});
