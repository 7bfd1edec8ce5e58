import { describe, expect, it, vi } from "vitest";
import { MemoryBrokerBus } from "../memory.js";

async function flush(): Promise<void> {
  await new Promise<void>((resolve) => setTimeout(resolve, 0));
}

describe("MemoryBrokerBus", () => {
  it("delivers a publish to every subscriber of the channel", async () => {
    const bus = new MemoryBrokerBus();
    const a = bus.createClient();
    const b = bus.createClient();
    const publisher = bus.createClient();
    const onA = vi.fn();
    const onB = vi.fn();
    await a.subscribe("chan", onA);
    await b.subscribe("chan", onB);

    await publisher.publish("chan", "hello");
    expect(onA).not.toHaveBeenCalled();
    await flush();

    expect(onA).toHaveBeenCalledWith("hello");
    expect(onB).toHaveBeenCalledWith("hello");
  });

  it("preserves publish order", async () => {
    const bus = new MemoryBrokerBus();
    const sub = bus.createClient();
    const pub = bus.createClient();
    const received: string[] = [];
    await sub.subscribe("chan", (message) => received.push(message));

    await pub.publish("chan", "1");
    await pub.publish("chan", "2");
    await pub.publish("chan", "3");
    await flush();

    expect(received).toEqual(["1", "2", "3"]);
  });

  it("stops delivering after unsubscribe", async () => {
    const bus = new MemoryBrokerBus();
    const sub = bus.createClient();
    const handler = vi.fn();
    await sub.subscribe("chan", handler);
    await sub.unsubscribe("chan");

    await bus.createClient().publish("chan", "x");
    await flush();

    expect(handler).not.toHaveBeenCalled();
    expect(bus.subscriberCount("chan")).toBe(0);
  });

  it("notifies disconnect handlers and drops subscriptions", async () => {
    const bus = new MemoryBrokerBus();
    const client = bus.createClient();
    const onDisconnect = vi.fn();
    client.onDisconnect(onDisconnect);
    await client.subscribe("chan", vi.fn());

    bus.disconnectAll("gone");

    expect(onDisconnect).toHaveBeenCalledWith("gone");
    expect(bus.subscriberCount("chan")).toBe(0);
  });

  it("rejects publish after close", async () => {
    const bus = new MemoryBrokerBus();
    const client = bus.createClient();
    await client.close();
    await expect(client.publish("chan", "x")).rejects.toThrow("Broker client is closed");
  });
});
