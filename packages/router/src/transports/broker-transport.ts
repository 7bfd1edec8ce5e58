import {
  type AgentChannelMessage,
  type BrokerClient,
  connectionChannel,
  decodeAgentChannelMessage,
  encodeChannelMessage,
  type RouterChannelMessage,
  routerChannel,
} from "@interconnect/broker";
import { getErrorMessage } from "@interconnect/errors";
import { createConsoleLogger, type Logger } from "../logger.js";
import { TransportBase } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type BrokerClientFactory = () => Promise<BrokerClient>;

export interface BrokerTransportOptions {
  /** Channel prefix shared with the agents */
  readonly prefix: string;
  readonly createClient: BrokerClientFactory;
  /** Largest accepted frame in bytes (default: 1 MiB) */
  readonly maxFrameSize?: number;
  readonly logger?: Logger;
}

const CONNECTION_PREFIX = "broker-";

// ---------------------------------------------------------------------------
// BrokerTransport
// ---------------------------------------------------------------------------

/**
 * Transport over broker pub/sub.
 *
 * Agents publish open/frame/close messages to the router channel and
 * listen on their own connection channel. Each outbound frame is one
 * publish to exactly one connection channel. Losing the broker is treated
 * as losing every connection made through it.
 *
 * The broker is trusted. Pub/sub carries no publisher identity, so any
 * client allowed to publish on `<prefix>router` can speak for any broker
 * connection. Restrict the prefix with Redis ACLs and run it over TLS.
 */
export class BrokerTransport extends TransportBase {
  readonly name = "broker";
  private client: BrokerClient | undefined;
  private disposeDisconnect: (() => void) | undefined;
  /** Router connection id → agent-chosen channel id */
  private connections: Map<string, string> = new Map();
  private readonly options: BrokerTransportOptions;
  private readonly logger: Logger;

  constructor(options: BrokerTransportOptions) {
    super();
    this.options = options;
    this.logger = options.logger ?? createConsoleLogger("BrokerTransport");
  }

  async start(): Promise<void> {
    const client = await this.options.createClient();
    this.client = client;
    this.disposeDisconnect = client.onDisconnect((reason) => this.handleBrokerLoss(client, reason));
    await this.subscribe(client);
  }

  async stop(): Promise<void> {
    const client = this.client;
    if (!client) return;
    for (const connectionId of [...this.connections.keys()]) {
      this.close(connectionId, "Router shutting down");
    }
    this.disposeDisconnect?.();
    this.disposeDisconnect = undefined;
    this.client = undefined;
    await client.unsubscribe(routerChannel(this.options.prefix));
    await client.close();
  }

  send(connectionId: string, data: string): boolean {
    return this.publish(connectionId, { type: "frame", data });
  }

  /** The broker exposes no per-connection buffer level */
  canSend(connectionId: string): boolean {
    return this.client !== undefined && this.connections.has(connectionId);
  }

  close(connectionId: string, reason: string): void {
    if (!this.publish(connectionId, { type: "close", reason })) return;
    this.connections.delete(connectionId);
    this.events.emit("disconnect", connectionId, reason);
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private async subscribe(client: BrokerClient): Promise<void> {
    await client.subscribe(routerChannel(this.options.prefix), (raw) => this.handleMessage(raw));
  }

  private handleMessage(raw: string): void {
    const message = decodeAgentChannelMessage(raw);
    if (!message) {
      this.logger.debug("Ignoring malformed router channel message");
      return;
    }
    const connectionId = `${CONNECTION_PREFIX}${message.connectionId}`;
    switch (message.type) {
      case "open":
        this.handleOpen(connectionId, message);
        return;
      case "frame":
        if (!this.connections.has(connectionId)) {
          this.logger.debug(`Dropping frame for unknown connection ${connectionId}`);
          return;
        }
        if (this.exceedsFrameSize(connectionId, message.data, this.options.maxFrameSize ?? 1_048_576)) {
          return;
        }
        this.events.emit("frame", connectionId, message.data);
        return;
      case "close":
        if (this.connections.delete(connectionId)) {
          this.events.emit("disconnect", connectionId, message.reason ?? "Closed by agent");
        }
        return;
    }
  }

  private handleOpen(connectionId: string, message: AgentChannelMessage): void {
    // A reused channel id is a new connection; the old one is gone
    if (this.connections.delete(connectionId)) {
      this.events.emit("disconnect", connectionId, "Connection reopened");
    }
    this.connections.set(connectionId, message.connectionId);
    this.events.emit("connect", connectionId);
  }

  private handleBrokerLoss(client: BrokerClient, reason: string): void {
    const lost = [...this.connections.keys()];
    this.connections = new Map();
    this.logger.warn(`Broker connection lost (${reason}), dropping ${lost.length} connection(s)`);
    for (const connectionId of lost) {
      this.events.emit("disconnect", connectionId, `Broker connection lost: ${reason}`);
    }
    if (this.client === client) {
      this.subscribe(client).catch((err: unknown) => {
        this.logger.error(`Failed to resubscribe to the router channel: ${getErrorMessage(err)}`);
      });
    }
  }

  private publish(connectionId: string, message: RouterChannelMessage): boolean {
    const client = this.client;
    const channelId = this.connections.get(connectionId);
    if (!client || channelId === undefined) return false;
    client
      .publish(connectionChannel(this.options.prefix, channelId), encodeChannelMessage(message))
      .catch((err: unknown) => {
        this.logger.error(`Failed to publish to ${connectionId}: ${getErrorMessage(err)}`);
      });
    return true;
  }
}
