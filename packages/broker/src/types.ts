// ---------------------------------------------------------------------------
// Broker Client
// ---------------------------------------------------------------------------

export type BrokerMessageHandler = (message: string) => void;
export type BrokerDisconnectHandler = (reason: string) => void;

/**
 * Minimal pub/sub surface the bus needs from a message broker.
 *
 * Messages published by one client on a channel reach every client
 * subscribed to that channel, in publish order. Delivery is at most once.
 */
export interface BrokerClient {
  publish(channel: string, message: string): Promise<void>;
  /** Replaces any handler already registered for the channel. */
  subscribe(channel: string, handler: BrokerMessageHandler): Promise<void>;
  unsubscribe(channel: string): Promise<void>;
  /**
   * Register a handler for loss of the broker connection.
   * Returns a disposer function.
   */
  onDisconnect(handler: BrokerDisconnectHandler): () => void;
  close(): Promise<void>;
}
