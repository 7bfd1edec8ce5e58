import { ExternalError } from "@interconnect/errors";
import { describe, expect, it, vi } from "vitest";
import { type WebSocketClientLike, WsLink } from "../ws-link.js";

// ---------------------------------------------------------------------------
// Mock WebSocket
// ---------------------------------------------------------------------------

interface MockWs extends WebSocketClientLike {
  readyState: number;
  readonly sent: string[];
  closeArgs: [number | undefined, string | undefined] | undefined;
  simulateOpen(): void;
  simulateMessage(data: unknown): void;
  simulateClose(code: number, reason: unknown): void;
  simulateError(error: Error): void;
}

function createMockWs(): MockWs {
  const listeners = new Map<string, ((...args: unknown[]) => void)[]>();
  const emit = (event: string, ...args: unknown[]) => {
    for (const handler of listeners.get(event) ?? []) handler(...args);
  };

  const ws: MockWs = {
    readyState: 0,
    sent: [],
    closeArgs: undefined,
    send(data: string) {
      ws.sent.push(data);
    },
    close(code?: number, reason?: string) {
      ws.closeArgs = [code, reason];
      ws.readyState = 3;
      emit("close", code ?? 1000, Buffer.from(reason ?? ""));
    },
    on(event: string, handler: (...args: unknown[]) => void) {
      listeners.set(event, [...(listeners.get(event) ?? []), handler]);
    },
    simulateOpen() {
      ws.readyState = 1;
      emit("open");
    },
    simulateMessage(data: unknown) {
      emit("message", data);
    },
    simulateClose(code: number, reason: unknown) {
      ws.readyState = 3;
      emit("close", code, reason);
    },
    simulateError(error: Error) {
      emit("error", error);
    },
  };
  return ws;
}

async function openLink(): Promise<{ link: WsLink; ws: MockWs }> {
  const ws = createMockWs();
  const link = new WsLink({ url: "ws://localhost:8765", factory: () => ws });
  const connecting = link.connect();
  ws.simulateOpen();
  await connecting;
  return { link, ws };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe("WsLink", () => {
  it("connects through the factory with the configured url", async () => {
    const ws = createMockWs();
    const factory = vi.fn(() => ws);
    const link = new WsLink({ url: "ws://localhost:8765", factory });

    const connecting = link.connect();
    ws.simulateOpen();
    await connecting;

    expect(factory).toHaveBeenCalledWith("ws://localhost:8765");
    expect(link.isConnected).toBe(true);
  });

  it("rejects when the socket errors during connect", async () => {
    const ws = createMockWs();
    const link = new WsLink({ url: "ws://localhost:8765", factory: () => ws });

    const connecting = link.connect();
    ws.simulateError(new Error("connect ECONNREFUSED"));

    await expect(connecting).rejects.toBeInstanceOf(ExternalError);
    await expect(connecting).rejects.toThrow("WebSocket connect failed: connect ECONNREFUSED");
  });

  it("rejects when the socket closes during connect", async () => {
    const ws = createMockWs();
    const link = new WsLink({ url: "ws://localhost:8765", factory: () => ws });

    const connecting = link.connect();
    ws.simulateClose(1006, Buffer.from(""));

    await expect(connecting).rejects.toThrow("WebSocket closed during connect: code=1006, reason=");
  });

  it("rejects when the signal aborts", async () => {
    const ws = createMockWs();
    const link = new WsLink({ url: "ws://localhost:8765", factory: () => ws });
    const controller = new AbortController();

    const connecting = link.connect(controller.signal);
    controller.abort();

    await expect(connecting).rejects.toThrow("Connect aborted");
    expect(ws.closeArgs).toEqual([1000, "Connect aborted"]);
  });

  it("refuses to be reused", async () => {
    const { link } = await openLink();

    await expect(link.connect()).rejects.toThrow("Link was already used; create a new one");
  });

  it("sends text only while open", async () => {
    const { link, ws } = await openLink();

    expect(link.send("frame-1")).toBe(true);
    ws.readyState = 2;
    expect(link.send("frame-2")).toBe(false);
    expect(ws.sent).toEqual(["frame-1"]);
  });

  it("delivers string and buffer messages as text", async () => {
    const { link, ws } = await openLink();
    const received: string[] = [];
    link.onMessage((data) => received.push(data));

    ws.simulateMessage("[\"a\"]");
    ws.simulateMessage(Buffer.from("[\"b\"]"));
    ws.simulateMessage([Buffer.from("[\"c"), Buffer.from("\"]")]);

    expect(received).toEqual(['["a"]', '["b"]', '["c"]']);
  });

  it("reports the close reason once", async () => {
    const { link, ws } = await openLink();
    const onClose = vi.fn();
    link.onClose(onClose);

    ws.simulateClose(1001, Buffer.from("Router shutting down"));
    ws.simulateClose(1001, Buffer.from("again"));

    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith("Router shutting down");
    expect(link.isConnected).toBe(false);
  });

  it("falls back to the close code when no reason is given", async () => {
    const { link, ws } = await openLink();
    const onClose = vi.fn();
    link.onClose(onClose);

    ws.simulateClose(1006, Buffer.alloc(0));

    expect(onClose).toHaveBeenCalledWith("Socket closed (1006)");
  });

  it("closes with a normal close code", async () => {
    const { link, ws } = await openLink();
    const onClose = vi.fn();
    link.onClose(onClose);

    link.close("Agent stopping");

    expect(ws.closeArgs).toEqual([1000, "Agent stopping"]);
    expect(onClose).toHaveBeenCalledWith("Agent stopping");
  });

  it("forwards socket errors after connect", async () => {
    const { link, ws } = await openLink();
    const onError = vi.fn();
    link.onError(onError);

    ws.simulateError(new Error("write EPIPE"));

    expect(onError).toHaveBeenCalledWith(new Error("write EPIPE"));
  });
});
