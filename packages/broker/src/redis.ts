import type { BrokerClient, BrokerDisconnectHandler, BrokerMessageHandler } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * The part of an ioredis connection the broker client uses.
 * Injectable for testing.
 */
export interface RedisConnectionLike {
  publish(channel: string, message: string): Promise<number>;
  subscribe(...channels: string[]): Promise<unknown>;
  unsubscribe(...channels: string[]): Promise<unknown>;
  on(event: "message", listener: (channel: string, message: string) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
  on(event: "close" | "ready", listener: () => void): unknown;
  quit(): Promise<unknown>;
}

export type RedisConnectionFactory = (
  url: string,
) => RedisConnectionLike | Promise<RedisConnectionLike>;

export interface RedisBrokerClientOptions {
  /** e.g. redis://localhost:6379 */
  readonly url: string;
  /** Max reconnect attempts before ioredis gives up (default: 20) */
  readonly maxRetries?: number;
  readonly onError?: (error: Error) => void;
  readonly createConnection?: RedisConnectionFactory;
}

const DEFAULT_MAX_RETRIES = 20;

// ---------------------------------------------------------------------------
// Factory
// ---------------------------------------------------------------------------

/**
 * Create a broker client over two Redis connections. Pub/sub needs a
 * dedicated subscriber connection, so publishing goes through a second one.
 */
export async function createRedisBrokerClient(
  options: RedisBrokerClientOptions,
): Promise<BrokerClient> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const create =
    options.createConnection ?? ((url: string) => connectRedis(url, maxRetries));
  const publisher = await create(options.url);
  const subscriber = await create(options.url);
  return new RedisBrokerClient(publisher, subscriber, options.onError);
}

async function connectRedis(url: string, maxRetries: number): Promise<RedisConnectionLike> {
  // Dynamic import keeps ioredis out of processes that never use the broker
  const { Redis } = await import("ioredis");
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    retryStrategy: (times: number) => (times > maxRetries ? null : Math.min(times * 50, 2000)),
  });
}

// ---------------------------------------------------------------------------
// RedisBrokerClient
// ---------------------------------------------------------------------------

class RedisBrokerClient implements BrokerClient {
  private readonly handlers = new Map<string, BrokerMessageHandler>();
  private readonly disconnectHandlers = new Set<BrokerDisconnectHandler>();
  private readonly publisher: RedisConnectionLike;
  private readonly subscriber: RedisConnectionLike;
  private readonly reportError: (error: Error) => void;
  private closed = false;
  private dropped = false;

  constructor(
    publisher: RedisConnectionLike,
    subscriber: RedisConnectionLike,
    onError?: (error: Error) => void,
  ) {
    this.publisher = publisher;
    this.subscriber = subscriber;
    this.reportError =
      onError ?? ((error) => console.error("[RedisBrokerClient] Redis error:", error));

    subscriber.on("message", (channel, message) => {
      this.handlers.get(channel)?.(message);
    });
    for (const connection of [publisher, subscriber]) {
      connection.on("error", (error) => this.reportError(error));
      connection.on("close", () => this.handleClose());
      connection.on("ready", () => {
        this.dropped = false;
      });
    }
  }

  async publish(channel: string, message: string): Promise<void> {
    await this.publisher.publish(channel, message);
  }

  async subscribe(channel: string, handler: BrokerMessageHandler): Promise<void> {
    const known = this.handlers.has(channel);
    this.handlers.set(channel, handler);
    if (!known) {
      await this.subscriber.subscribe(channel);
    }
  }

  async unsubscribe(channel: string): Promise<void> {
    if (!this.handlers.delete(channel)) return;
    await this.subscriber.unsubscribe(channel);
  }

  onDisconnect(handler: BrokerDisconnectHandler): () => void {
    this.disconnectHandlers.add(handler);
    return () => {
      this.disconnectHandlers.delete(handler);
    };
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.handlers.clear();
    this.disconnectHandlers.clear();
    await Promise.all([this.publisher.quit(), this.subscriber.quit()]);
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleClose(): void {
    // Both connections usually drop together; report the loss once
    if (this.closed || this.dropped) return;
    this.dropped = true;
    for (const handler of [...this.disconnectHandlers]) {
      handler("broker connection lost");
    }
  }
}
