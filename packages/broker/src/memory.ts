import type { BrokerClient, BrokerDisconnectHandler, BrokerMessageHandler } from "./types.js";

// ---------------------------------------------------------------------------
// MemoryBrokerBus
// ---------------------------------------------------------------------------

/**
 * In-process stand-in for a Redis server.
 *
 * Clients created from one bus see each other's publishes. Delivery is
 * asynchronous (one microtask per subscriber) and ordered per publisher,
 * matching what a broker connection provides.
 */
export class MemoryBrokerBus {
  private readonly clients = new Set<MemoryBrokerClient>();

  createClient(): BrokerClient {
    const client = new MemoryBrokerClient(this);
    this.clients.add(client);
    return client;
  }

  /**
   * Simulate loss of the broker: every client is told its connection dropped
   * and loses its subscriptions.
   */
  disconnectAll(reason = "broker connection lost"): void {
    for (const client of [...this.clients]) {
      client.drop(reason);
    }
  }

  /** Number of clients subscribed to a channel */
  subscriberCount(channel: string): number {
    let count = 0;
    for (const client of this.clients) {
      if (client.isSubscribed(channel)) count++;
    }
    return count;
  }

  /** @internal */
  deliver(channel: string, message: string): number {
    let receivers = 0;
    for (const client of this.clients) {
      if (client.isSubscribed(channel)) {
        receivers++;
        queueMicrotask(() => client.receive(channel, message));
      }
    }
    return receivers;
  }

  /** @internal */
  remove(client: MemoryBrokerClient): void {
    this.clients.delete(client);
  }
}

// ---------------------------------------------------------------------------
// MemoryBrokerClient
// ---------------------------------------------------------------------------

class MemoryBrokerClient implements BrokerClient {
  private readonly handlers = new Map<string, BrokerMessageHandler>();
  private readonly disconnectHandlers = new Set<BrokerDisconnectHandler>();
  private readonly bus: MemoryBrokerBus;
  private closed = false;

  constructor(bus: MemoryBrokerBus) {
    this.bus = bus;
  }

  async publish(channel: string, message: string): Promise<void> {
    if (this.closed) {
      throw new Error("Broker client is closed");
    }
    this.bus.deliver(channel, message);
  }

  async subscribe(channel: string, handler: BrokerMessageHandler): Promise<void> {
    this.handlers.set(channel, handler);
  }

  async unsubscribe(channel: string): Promise<void> {
    this.handlers.delete(channel);
  }

  onDisconnect(handler: BrokerDisconnectHandler): () => void {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    this.closed = true;
    this.handlers.clear();
    this.disconnectHandlers.clear();
    this.bus.remove(this);
  }

  isSubscribed(channel: string): boolean {
    return this.handlers.has(channel);
  }

  receive(channel: string, message: string): void {
    this.handlers.get(channel)?.(message);
  }

  drop(reason: string): void {
    this.handlers.clear();
    for (const handler of [...this.disconnectHandlers]) {
      handler(reason);
    }
  }
}
