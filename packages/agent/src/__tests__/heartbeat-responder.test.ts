import { describe, expect, it, vi } from "vitest";
import { HeartbeatResponder } from "../heartbeat-responder.js";

describe("HeartbeatResponder", () => {
  it("answers a ping with a pong carrying the same timestamp", () => {
    const sendPong = vi.fn();
    const responder = new HeartbeatResponder(sendPong);

    const handled = responder.handle({ kind: "heartbeat.ping", timestamp: 1_700_000_000_000 }, "router.4");

    expect(handled).toBe(true);
    expect(sendPong).toHaveBeenCalledWith({ kind: "heartbeat.pong", timestamp: 1_700_000_000_000 }, "router.4");
    expect(responder.lastPingAt).toBe(1_700_000_000_000);
  });

  it("ignores everything else", () => {
    const sendPong = vi.fn();
    const responder = new HeartbeatResponder(sendPong);

    expect(responder.handle({ kind: "peerlist.add", identity: "drv1" }, "router.5")).toBe(false);
    expect(responder.handle({ kind: "heartbeat.pong", timestamp: 1 }, "router.6")).toBe(false);
    expect(sendPong).not.toHaveBeenCalled();
    expect(responder.lastPingAt).toBeUndefined();
  });
});
