import { ExternalError } from "@interconnect/errors";
import type { AgentLink } from "@interconnect/protocol";
import { createEmitter, type Emitter } from "../utils/emitter.js";
import { TransportBase } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MemoryTransportConfig {
  /** Largest accepted frame in bytes (default: 1 MiB) */
  readonly maxFrameSize?: number;
}

type LinkEvents = {
  message: [data: string];
  close: [reason: string];
  error: [error: Error];
};

interface MemoryConnection {
  readonly link: MemoryLink;
  writable: boolean;
}

// ---------------------------------------------------------------------------
// MemoryTransport
// ---------------------------------------------------------------------------

/**
 * In-process transport for embedded agents and tests.
 *
 * Delivery is synchronous in both directions. The router's inbound queue
 * still processes one frame at a time, so a frame sent from inside a
 * delivery waits for the dispatch in progress.
 */
export class MemoryTransport extends TransportBase {
  readonly name = "inproc";
  private connections: Map<string, MemoryConnection> = new Map();
  private connectionCounter = 0;
  private running = false;
  private readonly maxFrameSize: number;

  constructor(config: MemoryTransportConfig = {}) {
    super();
    this.maxFrameSize = config.maxFrameSize ?? 1_048_576;
  }

  async start(): Promise<void> {
    this.running = true;
  }

  async stop(): Promise<void> {
    this.running = false;
    for (const connectionId of [...this.connections.keys()]) {
      this.close(connectionId, "Router shutting down");
    }
  }

  /**
   * Create an agent-side link. The connection is established by
   * `link.connect()`.
   */
  connect(): AgentLink {
    return new MemoryLink(this);
  }

  send(connectionId: string, data: string): boolean {
    const connection = this.connections.get(connectionId);
    if (!connection) return false;
    connection.link.deliver(data);
    return true;
  }

  canSend(connectionId: string): boolean {
    return this.connections.get(connectionId)?.writable ?? false;
  }

  close(connectionId: string, reason: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    this.connections.delete(connectionId);
    connection.link.closed(reason);
    this.events.emit("disconnect", connectionId, reason);
  }

  /**
   * Simulate a congested connection. While unwritable, the router keeps
   * frames in the connection's outbound queue.
   */
  setWritable(connectionId: string, writable: boolean): void {
    const connection = this.connections.get(connectionId);
    if (connection) connection.writable = writable;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  // -------------------------------------------------------------------------
  // Link side
  // -------------------------------------------------------------------------

  /** @internal */
  open(link: MemoryLink): string | undefined {
    if (!this.running) return undefined;
    const connectionId = `inproc-${++this.connectionCounter}`;
    this.connections.set(connectionId, { link, writable: true });
    this.events.emit("connect", connectionId);
    return connectionId;
  }

  /** @internal */
  receive(connectionId: string, data: string): boolean {
    if (!this.connections.has(connectionId)) return false;
    if (this.exceedsFrameSize(connectionId, data, this.maxFrameSize)) return true;
    this.events.emit("frame", connectionId, data);
    return true;
  }
}

// ---------------------------------------------------------------------------
// MemoryLink
// ---------------------------------------------------------------------------

export class MemoryLink implements AgentLink {
  private connectionId: string | undefined;
  private readonly events: Emitter<LinkEvents> = createEmitter();
  private readonly transport: MemoryTransport;

  constructor(transport: MemoryTransport) {
    this.transport = transport;
  }

  async connect(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ExternalError({ code: "TRANSPORT_CONNECT_FAILED", message: "Connect aborted" });
    }
    if (this.connectionId !== undefined) return;
    const connectionId = this.transport.open(this);
    if (connectionId === undefined) {
      throw new ExternalError({
        code: "TRANSPORT_CONNECT_FAILED",
        message: "In-process transport is not running",
      });
    }
    this.connectionId = connectionId;
  }

  send(data: string): boolean {
    if (this.connectionId === undefined) return false;
    return this.transport.receive(this.connectionId, data);
  }

  close(reason = "Closed by agent"): void {
    if (this.connectionId === undefined) return;
    this.transport.close(this.connectionId, reason);
  }

  onMessage(handler: (data: string) => void): void {
    this.events.on("message", handler);
  }

  onClose(handler: (reason: string) => void): void {
    this.events.on("close", handler);
  }

  onError(handler: (error: Error) => void): void {
    this.events.on("error", handler);
  }

  get isConnected(): boolean {
    return this.connectionId !== undefined;
  }

  deliver(data: string): void {
    this.events.emit("message", data);
  }

  closed(reason: string): void {
    this.connectionId = undefined;
    this.events.emit("close", reason);
  }
}
