import {
  type AgentLink,
  type BusMessage,
  type Envelope,
  encodeEnvelope,
  type MessageKind,
  type MessageOf,
  parseMessage,
  PROTOCOL_VERSION,
  safeDecodeEnvelope,
  toEnvelope,
} from "@interconnect/protocol";
import type { AgentConfig } from "../types.js";

// ---------------------------------------------------------------------------
// Fake link: records what the agent sends, lets the test play the router
// ---------------------------------------------------------------------------

export interface SentFrame {
  readonly envelope: Envelope;
  readonly message: BusMessage;
}

export class FakeLink implements AgentLink {
  readonly sent: SentFrame[] = [];
  failConnect: Error | undefined;
  /** Called synchronously for every frame the agent sends */
  respond: ((frame: SentFrame, link: FakeLink) => void) | undefined;
  closedWith: string | undefined;

  private open = false;
  private messageHandlers: ((data: string) => void)[] = [];
  private closeHandlers: ((reason: string) => void)[] = [];
  private errorHandlers: ((error: Error) => void)[] = [];

  async connect(): Promise<void> {
    if (this.failConnect) throw this.failConnect;
    this.open = true;
  }

  send(data: string): boolean {
    if (!this.open) return false;
    const decoded = safeDecodeEnvelope(data);
    if (!decoded.success) throw new Error(decoded.error);
    const parsed = parseMessage(decoded.envelope);
    if (!parsed.success) throw new Error(parsed.error);
    const frame = { envelope: decoded.envelope, message: parsed.message };
    this.sent.push(frame);
    this.respond?.(frame, this);
    return true;
  }

  close(reason = "Closed by agent"): void {
    if (!this.open) return;
    this.closedWith = reason;
    this.drop(reason);
  }

  onMessage(handler: (data: string) => void): void {
    this.messageHandlers.push(handler);
  }

  onClose(handler: (reason: string) => void): void {
    this.closeHandlers.push(handler);
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  get isConnected(): boolean {
    return this.open;
  }

  /** Deliver a frame from the router */
  receive(
    message: BusMessage,
    header: { sender?: string; recipient?: string; messageId?: string } = {},
  ): void {
    const envelope = toEnvelope(
      {
        sender: header.sender ?? "router",
        recipient: header.recipient ?? "",
        userId: header.sender ?? "router",
        messageId: header.messageId ?? "router.1",
      },
      message,
    );
    this.receiveRaw(encodeEnvelope(envelope));
  }

  receiveRaw(data: string): void {
    for (const handler of this.messageHandlers) handler(data);
  }

  /** Simulate the connection dropping */
  drop(reason: string): void {
    this.open = false;
    for (const handler of this.closeHandlers) handler(reason);
  }

  emitError(error: Error): void {
    for (const handler of this.errorHandlers) handler(error);
  }

  /** Frames of one kind the agent has sent */
  sentOf<K extends MessageKind>(kind: K): { envelope: Envelope; message: MessageOf<K> }[] {
    const result: { envelope: Envelope; message: MessageOf<K> }[] = [];
    for (const frame of this.sent) {
      const message = frame.message;
      if (isKind(message, kind)) result.push({ envelope: frame.envelope, message });
    }
    return result;
  }
}

function isKind<K extends MessageKind>(message: BusMessage, kind: K): message is MessageOf<K> {
  return message.kind === kind;
}

// ---------------------------------------------------------------------------
// Scripted router behaviour
// ---------------------------------------------------------------------------

export function welcome(identity: string, capabilities: readonly string[] = []): BusMessage {
  return {
    kind: "auth.welcome",
    version: PROTOCOL_VERSION,
    routerIdentity: "router",
    identity,
    capabilities,
  };
}

/**
 * Answer the hello with a welcome and every subscribe with an ack.
 */
export function autoRouter(frame: SentFrame, link: FakeLink): void {
  const { envelope, message } = frame;
  switch (message.kind) {
    case "auth.hello":
      link.receive(welcome(message.identity), { messageId: envelope.messageId });
      return;
    case "pubsub.subscribe":
    case "pubsub.unsubscribe":
      link.receive(
        {
          kind: "pubsub.ack",
          verb: message.kind === "pubsub.subscribe" ? "subscribe" : "unsubscribe",
          pattern: message.pattern,
        },
        { messageId: envelope.messageId },
      );
      return;
    default:
      return;
  }
}

/**
 * Link factory handing out a fresh FakeLink per connection attempt.
 */
export function createLinkFactory(setup: (link: FakeLink) => void = (link) => {
  link.respond = autoRouter;
}): { factory: () => FakeLink; links: FakeLink[] } {
  const links: FakeLink[] = [];
  return {
    links,
    factory: () => {
      const link = new FakeLink();
      setup(link);
      links.push(link);
      return link;
    },
  };
}

export function makeConfig(overrides: Partial<AgentConfig> = {}): AgentConfig {
  return {
    identity: "ag1",
    credential: "test-secret",
    reconnect: { maxRetries: 3, baseDelay: 100, maxDelay: 1_000 },
    ...overrides,
  };
}

/** Let promise chains settle */
export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
