import {
  type BrokerClient,
  connectionChannel,
  decodeRouterChannelMessage,
  encodeChannelMessage,
  MemoryBrokerBus,
  routerChannel,
} from "@interconnect/broker";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../../logger.js";
import { BrokerTransport } from "../broker-transport.js";

const PREFIX = "test:";

/** Let queued broker deliveries run */
function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("BrokerTransport", () => {
  let bus: MemoryBrokerBus;
  let agent: BrokerClient;
  let transport: BrokerTransport;
  let received: string[];

  async function agentSend(message: Parameters<typeof encodeChannelMessage>[0]): Promise<void> {
    await agent.publish(routerChannel(PREFIX), encodeChannelMessage(message));
    await flush();
  }

  beforeEach(async () => {
    bus = new MemoryBrokerBus();
    agent = bus.createClient();
    received = [];
    await agent.subscribe(connectionChannel(PREFIX, "a1"), (raw) => received.push(raw));
    transport = new BrokerTransport({
      prefix: PREFIX,
      createClient: async () => bus.createClient(),
      maxFrameSize: 64,
      logger: silentLogger,
    });
    await transport.start();
  });

  afterEach(async () => {
    await transport.stop();
  });

  it("subscribes to the router channel on start", () => {
    expect(bus.subscriberCount(routerChannel(PREFIX))).toBe(1);
  });

  it("maps agent open, frame and close messages to transport events", async () => {
    const onConnect = vi.fn();
    const onFrame = vi.fn();
    const onDisconnect = vi.fn();
    transport.onConnect(onConnect);
    transport.onFrame(onFrame);
    transport.onDisconnect(onDisconnect);

    await agentSend({ type: "open", connectionId: "a1" });
    await agentSend({ type: "frame", connectionId: "a1", data: "payload" });
    await agentSend({ type: "close", connectionId: "a1", reason: "bye" });

    expect(onConnect).toHaveBeenCalledWith("broker-a1");
    expect(onFrame).toHaveBeenCalledWith("broker-a1", "payload");
    expect(onDisconnect).toHaveBeenCalledWith("broker-a1", "bye");
  });

  it("ignores frames from connections that never opened", async () => {
    const onFrame = vi.fn();
    transport.onFrame(onFrame);
    await agentSend({ type: "frame", connectionId: "ghost", data: "payload" });
    expect(onFrame).not.toHaveBeenCalled();
  });

  it("rejects oversized frames", async () => {
    const onRejected = vi.fn();
    transport.onRejected(onRejected);
    await agentSend({ type: "open", connectionId: "a1" });
    await agentSend({ type: "frame", connectionId: "a1", data: "x".repeat(65) });
    expect(onRejected).toHaveBeenCalledWith(
      "broker-a1",
      "malformed",
      "Frame of 65 bytes exceeds the 64 byte limit",
    );
  });

  it("publishes outbound frames to the connection channel", async () => {
    await agentSend({ type: "open", connectionId: "a1" });

    expect(transport.send("broker-a1", "one")).toBe(true);
    expect(transport.send("broker-a1", "two")).toBe(true);
    expect(transport.send("broker-a9", "nobody")).toBe(false);
    await flush();

    expect(received.map(decodeRouterChannelMessage)).toEqual([
      { type: "frame", data: "one" },
      { type: "frame", data: "two" },
    ]);
  });

  it("tells the agent when the router closes its connection", async () => {
    const onDisconnect = vi.fn();
    transport.onDisconnect(onDisconnect);
    await agentSend({ type: "open", connectionId: "a1" });

    transport.close("broker-a1", "kicked");
    await flush();

    expect(received.map(decodeRouterChannelMessage)).toEqual([{ type: "close", reason: "kicked" }]);
    expect(onDisconnect).toHaveBeenCalledWith("broker-a1", "kicked");
    expect(transport.canSend("broker-a1")).toBe(false);
  });

  it("drops every connection when the broker is lost, then listens again", async () => {
    const onDisconnect = vi.fn();
    transport.onDisconnect(onDisconnect);
    await agentSend({ type: "open", connectionId: "a1" });
    await agentSend({ type: "open", connectionId: "a2" });

    bus.disconnectAll("network down");
    await flush();

    expect(onDisconnect.mock.calls).toEqual([
      ["broker-a1", "Broker connection lost: network down"],
      ["broker-a2", "Broker connection lost: network down"],
    ]);
    expect(transport.connectionCount).toBe(0);
    expect(bus.subscriberCount(routerChannel(PREFIX))).toBe(1);
  });

  it("treats a reopened channel id as a new connection", async () => {
    const onConnect = vi.fn();
    const onDisconnect = vi.fn();
    transport.onConnect(onConnect);
    transport.onDisconnect(onDisconnect);

    await agentSend({ type: "open", connectionId: "a1" });
    await agentSend({ type: "open", connectionId: "a1" });

    expect(onDisconnect).toHaveBeenCalledWith("broker-a1", "Connection reopened");
    expect(onConnect).toHaveBeenCalledTimes(2);
  });
});
