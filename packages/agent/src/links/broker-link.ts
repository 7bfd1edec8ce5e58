import { randomUUID } from "node:crypto";
import {
  type BrokerClient,
  connectionChannel,
  decodeRouterChannelMessage,
  encodeChannelMessage,
  routerChannel,
} from "@interconnect/broker";
import { ExternalError, toError } from "@interconnect/errors";
import type { AgentLink } from "@interconnect/protocol";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BrokerLinkOptions {
  /** Channel prefix shared with the router */
  readonly prefix: string;
  /** Creates the client this link owns; it is closed with the link */
  readonly createClient: () => Promise<BrokerClient>;
  /** Channel id for this connection (default: a random UUID) */
  readonly connectionId?: string;
}

// ---------------------------------------------------------------------------
// BrokerLink
// ---------------------------------------------------------------------------

/**
 * Agent link over broker pub/sub. Frames go to the router channel; the
 * router answers on this link's own connection channel.
 */
export class BrokerLink implements AgentLink {
  readonly connectionId: string;
  private client: BrokerClient | undefined;
  private disposeDisconnect: (() => void) | undefined;
  private open = false;
  private readonly options: BrokerLinkOptions;

  private messageHandlers: readonly ((data: string) => void)[] = [];
  private closeHandlers: readonly ((reason: string) => void)[] = [];
  private errorHandlers: readonly ((error: Error) => void)[] = [];

  constructor(options: BrokerLinkOptions) {
    this.options = options;
    this.connectionId = options.connectionId ?? randomUUID();
  }

  async connect(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ExternalError({ code: "TRANSPORT_CONNECT_FAILED", message: "Connect aborted" });
    }
    if (this.client) {
      throw new ExternalError({
        code: "TRANSPORT_CONNECT_FAILED",
        message: "Link was already used; create a new one",
      });
    }

    let client: BrokerClient;
    try {
      client = await this.options.createClient();
    } catch (err) {
      throw new ExternalError({
        code: "TRANSPORT_CONNECT_FAILED",
        message: `Broker connect failed: ${toError(err).message}`,
        cause: err,
      });
    }
    this.client = client;

    await client.subscribe(this.ownChannel(), (raw) => this.handleRouterMessage(raw));
    this.disposeDisconnect = client.onDisconnect((reason) => {
      this.finish(`Broker connection lost: ${reason}`);
    });
    this.open = true;
    await client.publish(
      routerChannel(this.options.prefix),
      encodeChannelMessage({ type: "open", connectionId: this.connectionId }),
    );
  }

  send(data: string): boolean {
    if (!this.open || !this.client) return false;
    this.publish(this.client, { type: "frame", connectionId: this.connectionId, data });
    return true;
  }

  close(reason = "Closed by agent"): void {
    const client = this.client;
    if (!this.open || !client) return;
    this.publish(client, { type: "close", connectionId: this.connectionId, reason });
    this.finish(reason);
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandlers = [...this.messageHandlers, handler];
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandlers = [...this.closeHandlers, handler];
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers = [...this.errorHandlers, handler];
  }

  get isConnected(): boolean {
    return this.open;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private ownChannel(): string {
    return connectionChannel(this.options.prefix, this.connectionId);
  }

  private handleRouterMessage(raw: string): void {
    const message = decodeRouterChannelMessage(raw);
    if (!message || !this.open) return;
    if (message.type === "frame") {
      for (const handler of this.messageHandlers) {
        handler(message.data);
      }
    } else {
      this.finish(message.reason ?? "Closed by router");
    }
  }

  private publish(
    client: BrokerClient,
    message: Parameters<typeof encodeChannelMessage>[0],
  ): void {
    client.publish(routerChannel(this.options.prefix), encodeChannelMessage(message)).catch(
      (err: unknown) => this.emitError(toError(err)),
    );
  }

  /**
   * Release the client once; the publishes already issued complete first
   * because the client orders its operations.
   */
  private finish(reason: string): void {
    if (!this.open) return;
    this.open = false;
    this.disposeDisconnect?.();
    this.disposeDisconnect = undefined;
    const client = this.client;
    if (client) {
      client
        .unsubscribe(this.ownChannel())
        .then(() => client.close())
        .catch((err: unknown) => this.emitError(toError(err)));
    }
    for (const handler of this.closeHandlers) {
      handler(reason);
    }
  }

  private emitError(error: Error): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }
}
