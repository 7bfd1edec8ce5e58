import { createConsoleLogger, type Logger } from "../logger.js";
import { FrameRateLimiter } from "../utils/rate-limiter.js";
import { TransportBase } from "./types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WsTransportOptions {
  readonly port: number;
  readonly host?: string | undefined;
  /** Max concurrent connections (default: 1024). 0 = unlimited. */
  readonly maxConnections?: number;
  /** Max frames per second per connection (default: 0). 0 = unlimited. */
  readonly maxFramesPerSecond?: number;
  /** Largest accepted frame in bytes (default: 1 MiB) */
  readonly maxFrameSize?: number;
  /** Socket buffer level above which the connection is not writable (default: 1 MiB) */
  readonly highWaterMark?: number;
  readonly logger?: Logger;
}

/** Payload of a `message` event: a Buffer, or fragments / an ArrayBuffer for other binary types */
export type RawData = Buffer | ArrayBuffer | Buffer[];

export interface WebSocketLike {
  readonly readyState: number;
  readonly bufferedAmount: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: "message", listener: (data: RawData) => void): unknown;
  on(event: "close", listener: (code: number, reason: Buffer) => void): unknown;
  on(event: "error", listener: (error: Error) => void): unknown;
}

export interface WebSocketServerLike {
  on(event: "connection", listener: (socket: WebSocketLike) => void): unknown;
  close(cb?: (err?: Error) => void): void;
}

/**
 * Factory for creating a WebSocket server.
 * Injectable for testing.
 */
export type WsServerFactory = (options: {
  port: number;
  host?: string | undefined;
  maxPayload: number;
}) => WebSocketServerLike;

const WS_OPEN = 1;
/** Close reasons are limited to 123 bytes by the protocol */
const MAX_CLOSE_REASON = 123;

// ---------------------------------------------------------------------------
// WsTransport
// ---------------------------------------------------------------------------

/**
 * WebSocket transport. Each text message is one encoded envelope.
 *
 * Frames over `maxFrameSize` make `ws` close the socket (code 1009).
 * Connection ids are ephemeral; identity is established by the hello.
 */
export class WsTransport extends TransportBase {
  readonly name = "ws";
  private wss: WebSocketServerLike | undefined;
  private connections: Map<string, WebSocketLike> = new Map();
  private connectionCounter = 0;
  private readonly options: WsTransportOptions;
  private readonly factory: WsServerFactory | undefined;
  private readonly rateLimiter: FrameRateLimiter | undefined;
  private readonly logger: Logger;

  constructor(options: WsTransportOptions, factory?: WsServerFactory) {
    super();
    this.options = options;
    this.factory = factory;
    this.logger = options.logger ?? createConsoleLogger("WsTransport");
    const maxFps = options.maxFramesPerSecond ?? 0;
    if (maxFps > 0) {
      this.rateLimiter = new FrameRateLimiter(maxFps);
    }
  }

  async start(): Promise<void> {
    const serverOptions = {
      port: this.options.port,
      host: this.options.host,
      maxPayload: this.options.maxFrameSize ?? 1_048_576,
    };

    if (this.factory) {
      this.wss = this.factory(serverOptions);
    } else {
      const { WebSocketServer } = await import("ws");
      this.wss = new WebSocketServer(serverOptions);
    }

    this.wss.on("connection", (socket) => {
      this.handleConnection(socket);
    });
    this.logger.info(`Listening on port ${this.options.port}`);
  }

  /**
   * Stop the server and close all connections with code 1001.
   */
  async stop(): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const wss = this.wss;
      if (!wss) {
        resolve();
        return;
      }
      for (const ws of this.connections.values()) {
        ws.close(1001, "Router shutting down");
      }

      wss.close((err) => {
        this.wss = undefined;
        this.rateLimiter?.clear();
        if (err) reject(err);
        else resolve();
      });
    });
  }

  send(connectionId: string, data: string): boolean {
    const ws = this.connections.get(connectionId);
    if (!ws || ws.readyState !== WS_OPEN) return false;
    ws.send(data);
    return true;
  }

  canSend(connectionId: string): boolean {
    const ws = this.connections.get(connectionId);
    if (!ws || ws.readyState !== WS_OPEN) return false;
    return ws.bufferedAmount < (this.options.highWaterMark ?? 1_048_576);
  }

  close(connectionId: string, reason: string): void {
    this.connections.get(connectionId)?.close(1000, truncateReason(reason));
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private handleConnection(ws: WebSocketLike): void {
    const maxConns = this.options.maxConnections ?? 1024;
    if (maxConns > 0 && this.connections.size >= maxConns) {
      ws.close(1013, "Maximum connections reached");
      return;
    }

    const connectionId = `ws-${++this.connectionCounter}`;
    this.connections.set(connectionId, ws);
    this.events.emit("connect", connectionId);

    ws.on("message", (data) => {
      if (this.rateLimiter && !this.rateLimiter.allow(connectionId)) {
        this.events.emit("rejected", connectionId, "rate-limited", "Too many frames per second");
        return;
      }
      this.events.emit("frame", connectionId, rawDataToString(data));
    });

    ws.on("error", (error) => {
      this.logger.warn(`Socket error on ${connectionId}: ${error.message}`);
    });

    ws.on("close", (code, reason) => {
      if (!this.connections.delete(connectionId)) return;
      this.rateLimiter?.remove(connectionId);
      const text = reason.toString("utf-8");
      this.events.emit("disconnect", connectionId, text.length > 0 ? text : `Socket closed (${code})`);
    });
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}

function truncateReason(reason: string): string {
  const bytes = Buffer.from(reason, "utf-8");
  return bytes.length <= MAX_CLOSE_REASON ? reason : bytes.subarray(0, MAX_CLOSE_REASON).toString("utf-8");
}
