import { describe, expect, it, vi } from "vitest";
import { createEmitter } from "../emitter.js";

type RouteEvents = {
  registered: [identity: string, connectionId: string];
  dropped: [identity: string];
  idle: [];
};

describe("createEmitter", () => {
  it("passes every argument to handlers", () => {
    const emitter = createEmitter<RouteEvents>();
    const handler = vi.fn();
    emitter.on("registered", handler);
    emitter.emit("registered", "drv1", "ws-1");
    expect(handler).toHaveBeenCalledWith("drv1", "ws-1");
  });

  it("supports events without arguments", () => {
    const emitter = createEmitter<RouteEvents>();
    const handler = vi.fn();
    emitter.on("idle", handler);
    emitter.emit("idle");
    expect(handler).toHaveBeenCalledOnce();
  });

  it("calls handlers in registration order", () => {
    const emitter = createEmitter<RouteEvents>();
    const order: string[] = [];
    emitter.on("dropped", () => order.push("first"));
    emitter.on("dropped", () => order.push("second"));
    emitter.emit("dropped", "drv1");
    expect(order).toEqual(["first", "second"]);
  });

  it("disposer removes only its own handler and is idempotent", () => {
    const emitter = createEmitter<RouteEvents>();
    const kept = vi.fn();
    const removed = vi.fn();
    const dispose = emitter.on("dropped", removed);
    emitter.on("dropped", kept);

    dispose();
    dispose();
    emitter.emit("dropped", "drv1");

    expect(removed).not.toHaveBeenCalled();
    expect(kept).toHaveBeenCalledWith("drv1");
    expect(emitter.count("dropped")).toBe(1);
  });

  it("reports a throwing handler and keeps calling the rest", () => {
    const onHandlerError = vi.fn();
    const emitter = createEmitter<RouteEvents>({ onHandlerError });
    const failure = new Error("boom");
    const after = vi.fn();
    emitter.on("dropped", () => {
      throw failure;
    });
    emitter.on("dropped", after);

    expect(() => emitter.emit("dropped", "drv1")).not.toThrow();
    expect(onHandlerError).toHaveBeenCalledWith(failure, "dropped");
    expect(after).toHaveBeenCalledOnce();
  });

  it("iterates over a snapshot of the handlers", () => {
    const emitter = createEmitter<RouteEvents>();
    const late = vi.fn();
    emitter.on("idle", () => {
      emitter.on("idle", late);
    });
    emitter.emit("idle");
    expect(late).not.toHaveBeenCalled();
    emitter.emit("idle");
    expect(late).toHaveBeenCalledOnce();
  });

  it("clears one event or all events", () => {
    const emitter = createEmitter<RouteEvents>();
    emitter.on("idle", vi.fn());
    emitter.on("dropped", vi.fn());

    emitter.clear("idle");
    expect(emitter.count("idle")).toBe(0);
    expect(emitter.count("dropped")).toBe(1);

    emitter.clear();
    expect(emitter.count("dropped")).toBe(0);
  });
});
