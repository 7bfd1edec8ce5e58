import { ExternalError, toError } from "@interconnect/errors";
import type { AgentLink } from "@interconnect/protocol";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface WebSocketClientLike {
  readonly readyState: number;
  send(data: string): void;
  close(code?: number, reason?: string): void;
  on(event: string, handler: (...args: unknown[]) => void): void;
}

/**
 * Factory for WebSocket client instances. Injectable for testing.
 */
export type WsClientFactory = (url: string) => WebSocketClientLike;

export interface WsLinkOptions {
  /** Router endpoint, e.g. ws://localhost:8765 */
  readonly url: string;
  readonly factory?: WsClientFactory;
}

const WS_OPEN = 1;

// ---------------------------------------------------------------------------
// WsLink
// ---------------------------------------------------------------------------

/**
 * Agent link over a WebSocket. One text message carries one encoded envelope.
 */
export class WsLink implements AgentLink {
  private ws: WebSocketClientLike | undefined;
  private readonly options: WsLinkOptions;
  private closed = false;

  private messageHandlers: readonly ((data: string) => void)[] = [];
  private closeHandlers: readonly ((reason: string) => void)[] = [];
  private errorHandlers: readonly ((error: Error) => void)[] = [];

  constructor(options: WsLinkOptions) {
    this.options = options;
  }

  /**
   * Resolves when the socket is open. Rejects on error, on a close during
   * the opening handshake, or when the signal aborts.
   */
  async connect(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new ExternalError({ code: "TRANSPORT_CONNECT_FAILED", message: "Connect aborted" });
    }
    if (this.ws) {
      throw new ExternalError({
        code: "TRANSPORT_CONNECT_FAILED",
        message: "Link was already used; create a new one",
      });
    }

    const ws = this.options.factory
      ? this.options.factory(this.options.url)
      : await createDefaultWs(this.options.url);
    this.ws = ws;

    return new Promise<void>((resolve, reject) => {
      let settled = false;

      const settle = (fn: () => void) => {
        if (settled) return;
        settled = true;
        signal?.removeEventListener("abort", onAbort);
        fn();
      };

      const onAbort = () => {
        settle(() => {
          ws.close(1000, "Connect aborted");
          reject(new ExternalError({ code: "TRANSPORT_CONNECT_FAILED", message: "Connect aborted" }));
        });
      };

      signal?.addEventListener("abort", onAbort, { once: true });

      ws.on("open", () => {
        settle(() => {
          this.wire(ws);
          resolve();
        });
      });

      ws.on("error", (err: unknown) => {
        settle(() => {
          reject(
            new ExternalError({
              code: "TRANSPORT_CONNECT_FAILED",
              message: `WebSocket connect failed: ${toError(err).message}`,
              cause: err,
            }),
          );
        });
      });

      ws.on("close", (code: unknown, reason: unknown) => {
        settle(() => {
          reject(
            new ExternalError({
              code: "TRANSPORT_CONNECT_FAILED",
              message: `WebSocket closed during connect: code=${String(code)}, reason=${textOf(reason)}`,
            }),
          );
        });
      });
    });
  }

  send(data: string): boolean {
    if (!this.ws || this.ws.readyState !== WS_OPEN) {
      return false;
    }
    this.ws.send(data);
    return true;
  }

  close(reason = "Closed by agent"): void {
    if (this.ws && !this.closed) {
      this.ws.close(1000, reason);
    }
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
    return !this.closed && this.ws?.readyState === WS_OPEN;
  }

  // -------------------------------------------------------------------------
  // Private
  // -------------------------------------------------------------------------

  private wire(ws: WebSocketClientLike): void {
    ws.on("message", (data: unknown) => {
      const text = textOf(data);
      for (const handler of this.messageHandlers) {
        handler(text);
      }
    });

    ws.on("close", (code: unknown, reason: unknown) => {
      if (this.closed) return;
      this.closed = true;
      const text = textOf(reason) || `Socket closed (${String(code)})`;
      for (const handler of this.closeHandlers) {
        handler(text);
      }
    });

    ws.on("error", (err: unknown) => {
      const error = toError(err);
      for (const handler of this.errorHandlers) {
        handler(error);
      }
    });
  }
}

function textOf(data: unknown): string {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data.filter((part) => Buffer.isBuffer(part))).toString("utf-8");
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString("utf-8");
  return data === undefined ? "" : String(data);
}

async function createDefaultWs(url: string): Promise<WebSocketClientLike> {
  // Dynamic import keeps ws out of agents that only use other links
  const { WebSocket } = await import("ws");
  return new WebSocket(url);
}
