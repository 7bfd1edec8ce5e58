import {
  type BusMessage,
  type CredentialFile,
  type Envelope,
  toEnvelope,
} from "@interconnect/protocol";
import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import { AuthGate } from "../../auth/auth-gate.js";
import { CredentialStore } from "../../auth/credential-store.js";
import { type Logger, silentLogger } from "../../logger.js";
import { SubscriptionTree } from "../../pubsub/subscription-tree.js";
import { RoutingTable } from "../../routing/routing-table.js";
import { RpcCorrelator } from "../../rpc/rpc-correlator.js";
import type { DispatchContext } from "../context.js";
import { SUBSYSTEM_HANDLERS } from "../handlers.js";

const FILE: CredentialFile = {
  groups: {},
  credentials: {
    "hist-token": {
      identity: "hist1",
      type: "token",
      capabilities: ["subscribe:devices/#", "publish:analysis/#"],
      groups: [],
    },
    "drv-token": {
      identity: "drv1",
      type: "token",
      capabilities: ["publish:devices/building1/#"],
      groups: [],
    },
    "ui-token": {
      type: "token",
      capabilities: ["call:drv1/get_point", "call:ctl1/#"],
      groups: [],
    },
  },
};

interface Harness {
  readonly ctx: DispatchContext;
  readonly deliver: Mock<(identity: string, envelope: Envelope, droppable: boolean) => boolean>;
  readonly reply: Mock<(envelope: Envelope, message: BusMessage) => void>;
}

describe("SUBSYSTEM_HANDLERS", () => {
  let table: RoutingTable;
  let subscriptions: SubscriptionTree;
  let calls: RpcCorrelator;
  let gate: AuthGate;
  let logger: Logger;

  async function admit(credential: string, identity: string): Promise<void> {
    const result = await gate.authenticate(credential, identity);
    if (!result.ok) throw new Error(result.rejection.detail);
    const admitted = gate.admit(result.admission, {
      connectionId: `inproc-${identity}`,
      transport: "inproc",
    });
    if (!admitted.ok) throw new Error(admitted.rejection.detail);
  }

  function harness(identity: string): Harness {
    const deliver = vi.fn((_identity: string, _envelope: Envelope, _droppable: boolean) => true);
    const reply = vi.fn((_envelope: Envelope, _message: BusMessage) => {});
    const ctx: DispatchContext = {
      sender: { identity, userId: identity, connectionId: `inproc-${identity}` },
      gate,
      table,
      subscriptions,
      calls,
      logger,
      deliver,
      reply,
    };
    return { ctx, deliver, reply };
  }

  function dispatch(
    h: Harness,
    message: BusMessage,
    header: { recipient?: string; messageId?: string; userId?: string } = {},
  ) {
    const envelope = toEnvelope(
      {
        sender: h.ctx.sender.identity,
        recipient: header.recipient ?? "",
        userId: header.userId ?? "",
        messageId: header.messageId ?? `${h.ctx.sender.identity}.1`,
      },
      message,
    );
    return { envelope, outcome: SUBSYSTEM_HANDLERS[envelope.subsystem](message, envelope, h.ctx) };
  }

  beforeEach(async () => {
    const store = new CredentialStore(FILE, { logger: silentLogger });
    table = new RoutingTable({ heartbeatInterval: 1_000 });
    subscriptions = new SubscriptionTree();
    calls = new RpcCorrelator({ defaultTimeout: 30_000, maxTimeout: 300_000 });
    gate = new AuthGate(store, table, silentLogger);
    logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    await admit("hist-token", "hist1");
    await admit("drv-token", "drv1");
    await admit("ui-token", "ui1");
  });

  // -------------------------------------------------------------------------
  // auth
  // -------------------------------------------------------------------------

  describe("auth", () => {
    it("closes the connection on goodbye", () => {
      const { outcome } = dispatch(harness("drv1"), { kind: "auth.goodbye" });
      expect(outcome).toEqual({ kind: "close", reason: "Goodbye" });
    });

    it("rejects a second hello", () => {
      const { outcome } = dispatch(harness("drv1"), {
        kind: "auth.hello",
        identity: "drv1",
        credential: "drv-token",
      });
      expect(outcome).toEqual({ kind: "fault", fault: "malformed", detail: "Already authenticated" });
    });

    it("rejects router-only verbs", () => {
      const { outcome } = dispatch(harness("drv1"), {
        kind: "auth.error",
        reason: "malformed",
        detail: "x",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: "Unexpected auth.error from an agent",
      });
    });
  });

  // -------------------------------------------------------------------------
  // pubsub
  // -------------------------------------------------------------------------

  describe("pubsub", () => {
    it("delivers a publish to every matching subscriber as droppable, with the userId stamped", () => {
      subscriptions.subscribe("hist1", "devices/#");
      const h = harness("drv1");
      const { envelope, outcome } = dispatch(
        h,
        { kind: "pubsub.publish", topic: "devices/building1/ahu1", payload: "72.5" },
        { userId: "someone-else" },
      );

      expect(outcome).toEqual({ kind: "ok" });
      expect(h.deliver).toHaveBeenCalledTimes(1);
      expect(h.deliver).toHaveBeenCalledWith("hist1", { ...envelope, userId: "drv1" }, true);
    });

    it("accepts a publish nobody subscribed to", () => {
      const h = harness("drv1");
      const { outcome } = dispatch(h, {
        kind: "pubsub.publish",
        topic: "devices/building1/ahu2",
        payload: "{}",
      });
      expect(outcome).toEqual({ kind: "ok" });
      expect(h.deliver).not.toHaveBeenCalled();
    });

    it("denies a publish outside the sender's capabilities", () => {
      subscriptions.subscribe("hist1", "devices/#");
      const h = harness("drv1");
      const { outcome } = dispatch(h, {
        kind: "pubsub.publish",
        topic: "devices/building2/ahu1",
        payload: "1",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "capability-denied",
        detail: 'Not allowed to publish to "devices/building2/ahu1"',
      });
      expect(h.deliver).not.toHaveBeenCalled();
    });

    it("rejects a topic with an empty segment", () => {
      const { outcome } = dispatch(harness("drv1"), {
        kind: "pubsub.publish",
        topic: "devices//ahu1",
        payload: "1",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: 'Invalid topic "devices//ahu1"',
      });
    });

    it("subscribes and acknowledges", () => {
      const h = harness("hist1");
      const { envelope, outcome } = dispatch(h, {
        kind: "pubsub.subscribe",
        pattern: "devices/building1/#",
      });

      expect(outcome).toEqual({ kind: "ok" });
      expect(subscriptions.patternsOf("hist1").map((s) => s.pattern)).toEqual([
        "devices/building1/#",
      ]);
      expect(h.reply).toHaveBeenCalledWith(envelope, {
        kind: "pubsub.ack",
        verb: "subscribe",
        pattern: "devices/building1/#",
      });
    });

    it("denies a subscription broader than the capability", () => {
      const h = harness("hist1");
      const { outcome } = dispatch(h, { kind: "pubsub.subscribe", pattern: "#" });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "capability-denied",
        detail: 'Not allowed to subscribe to "#"',
      });
      expect(subscriptions.size).toBe(0);
      expect(h.reply).not.toHaveBeenCalled();
    });

    it("rejects an invalid pattern", () => {
      const { outcome } = dispatch(harness("hist1"), {
        kind: "pubsub.subscribe",
        pattern: "devices/#/x",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: 'Invalid topic pattern "devices/#/x"',
      });
    });

    it("unsubscribes without a capability check", () => {
      subscriptions.subscribe("drv1", "alerts/#");
      const h = harness("drv1");
      const { outcome } = dispatch(h, { kind: "pubsub.unsubscribe", pattern: "alerts/#" });

      expect(outcome).toEqual({ kind: "ok" });
      expect(subscriptions.patternsOf("drv1")).toEqual([]);
      expect(h.reply).toHaveBeenCalledTimes(1);
    });
  });

  // -------------------------------------------------------------------------
  // rpc
  // -------------------------------------------------------------------------

  describe("rpc", () => {
    it("forwards an authorized call and tracks it", () => {
      const h = harness("ui1");
      const { envelope, outcome } = dispatch(
        h,
        { kind: "rpc.call", method: "get_point", params: '["ahu1/temp"]' },
        { recipient: "drv1", messageId: "ui1.7" },
      );

      expect(outcome).toEqual({ kind: "ok" });
      expect(h.deliver).toHaveBeenCalledWith("drv1", { ...envelope, userId: "ui1" }, false);
      expect(calls.get("ui1.7")).toMatchObject({ caller: "ui1", callee: "drv1", method: "get_point" });
    });

    it("denies a call to a method the capability does not name", () => {
      const h = harness("ui1");
      const { outcome } = dispatch(
        h,
        { kind: "rpc.call", method: "set_point", params: "[]" },
        { recipient: "drv1" },
      );
      expect(outcome).toEqual({
        kind: "fault",
        fault: "capability-denied",
        detail: 'Not allowed to call "drv1/set_point"',
      });
      expect(calls.size).toBe(0);
    });

    it("faults a call to an agent that is not connected", () => {
      const { outcome } = dispatch(
        harness("ui1"),
        { kind: "rpc.call", method: "reset", params: "[]" },
        { recipient: "ctl1" },
      );
      expect(outcome).toEqual({
        kind: "fault",
        fault: "recipient-unavailable",
        detail: 'No agent named "ctl1" is connected',
      });
    });

    it("rejects a call addressed to the router", () => {
      const { outcome } = dispatch(harness("ui1"), {
        kind: "rpc.call",
        method: "get_point",
        params: "[]",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: "Calls must be addressed to an agent",
      });
    });

    it("routes the reply back to the caller and settles the call", () => {
      dispatch(
        harness("ui1"),
        { kind: "rpc.call", method: "get_point", params: "[]" },
        { recipient: "drv1", messageId: "ui1.7" },
      );

      const callee = harness("drv1");
      const { envelope, outcome } = dispatch(
        callee,
        { kind: "rpc.reply", result: "72.5" },
        { recipient: "ui1", messageId: "ui1.7" },
      );

      expect(outcome).toEqual({ kind: "ok" });
      expect(callee.deliver).toHaveBeenCalledWith("ui1", { ...envelope, userId: "drv1" }, false);
      expect(calls.size).toBe(0);
    });

    it("routes a callee fault back to the caller", () => {
      dispatch(
        harness("ui1"),
        { kind: "rpc.call", method: "get_point", params: "[]" },
        { recipient: "drv1", messageId: "ui1.8" },
      );
      const callee = harness("drv1");
      dispatch(
        callee,
        { kind: "rpc.fault", fault: "application-error", detail: "Point not found" },
        { recipient: "ui1", messageId: "ui1.8" },
      );

      expect(callee.deliver).toHaveBeenCalledTimes(1);
      expect(callee.deliver.mock.calls[0]?.[1]?.args).toEqual([
        "fault",
        "application-error",
        "Point not found",
      ]);
      expect(calls.size).toBe(0);
    });

    it("refuses a reply from an agent the call was not addressed to", () => {
      dispatch(
        harness("ui1"),
        { kind: "rpc.call", method: "get_point", params: "[]" },
        { recipient: "drv1", messageId: "ui1.7" },
      );
      const h = harness("hist1");
      const { outcome } = dispatch(
        h,
        { kind: "rpc.reply", result: "0" },
        { recipient: "ui1", messageId: "ui1.7" },
      );

      expect(outcome).toEqual({
        kind: "fault",
        fault: "identity-mismatch",
        detail: 'Call ui1.7 was addressed to "drv1", not "hist1"',
      });
      expect(h.deliver).not.toHaveBeenCalled();
      expect(calls.size).toBe(1);
    });

    it("drops a reply for a call that is no longer pending", () => {
      const h = harness("drv1");
      const { outcome } = dispatch(
        h,
        { kind: "rpc.reply", result: "1" },
        { recipient: "ui1", messageId: "ui1.99" },
      );

      expect(outcome).toEqual({ kind: "ok" });
      expect(h.deliver).not.toHaveBeenCalled();
      expect(logger.info).toHaveBeenCalledWith(
        'Dropping rpc.reply ui1.99 from "drv1": no pending call',
      );
    });

    it("refuses a call whose id was issued by another identity", () => {
      const h = harness("ui1");
      const { outcome } = dispatch(
        h,
        { kind: "rpc.call", method: "get_point", params: "[]" },
        { recipient: "drv1", messageId: "hist1.4" },
      );

      expect(outcome).toEqual({
        kind: "fault",
        fault: "identity-mismatch",
        detail: 'Call id hist1.4 was not issued by "ui1"',
      });
      expect(h.deliver).not.toHaveBeenCalled();
      expect(calls.size).toBe(0);
    });

    it("throws on a duplicate message id", () => {
      const h = harness("ui1");
      const call: BusMessage = { kind: "rpc.call", method: "get_point", params: "[]" };
      dispatch(h, call, { recipient: "drv1", messageId: "ui1.1" });
      expect(() => dispatch(h, call, { recipient: "drv1", messageId: "ui1.1" })).toThrow(
        "Call ui1.1 is already in flight",
      );
    });
  });

  // -------------------------------------------------------------------------
  // heartbeat and peerlist
  // -------------------------------------------------------------------------

  describe("heartbeat", () => {
    it("answers a ping with a pong carrying the same timestamp", () => {
      const h = harness("drv1");
      const { envelope } = dispatch(h, { kind: "heartbeat.ping", timestamp: 1234 });
      expect(h.reply).toHaveBeenCalledWith(envelope, { kind: "heartbeat.pong", timestamp: 1234 });
    });

    it("accepts a pong silently", () => {
      const h = harness("drv1");
      const { outcome } = dispatch(h, { kind: "heartbeat.pong", timestamp: 1 });
      expect(outcome).toEqual({ kind: "ok" });
      expect(h.reply).not.toHaveBeenCalled();
    });
  });

  describe("peerlist", () => {
    it("lists admitted identities in lexical order", () => {
      const h = harness("ui1");
      const { envelope } = dispatch(h, { kind: "peerlist.list" });
      expect(h.reply).toHaveBeenCalledWith(envelope, {
        kind: "peerlist.listing",
        identities: ["drv1", "hist1", "ui1"],
      });
    });

    it("lists identities with their transports", () => {
      const h = harness("ui1");
      dispatch(h, { kind: "peerlist.list-with-transport" });
      expect(h.reply.mock.calls[0]?.[1]).toEqual({
        kind: "peerlist.listing-with-transport",
        peers: [
          { identity: "drv1", transport: "inproc" },
          { identity: "hist1", transport: "inproc" },
          { identity: "ui1", transport: "inproc" },
        ],
      });
    });

    it("rejects peerlist updates sent by an agent", () => {
      const { outcome } = dispatch(harness("ui1"), { kind: "peerlist.add", identity: "x" });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: "Unexpected peerlist.add from an agent",
      });
    });
  });

  describe("error", () => {
    it("rejects error frames sent by an agent", () => {
      const { outcome } = dispatch(harness("ui1"), {
        kind: "error.fault",
        fault: "malformed",
        detail: "x",
        subsystem: "pubsub",
      });
      expect(outcome).toEqual({
        kind: "fault",
        fault: "malformed",
        detail: "Unexpected error.fault from an agent",
      });
    });
  });
});
