import { describe, expect, it } from "vitest";
import {
  connectionChannel,
  decodeAgentChannelMessage,
  decodeRouterChannelMessage,
  encodeChannelMessage,
  routerChannel,
} from "../channels.js";

describe("channel naming", () => {
  it("prefixes the router channel", () => {
    expect(routerChannel("bus:")).toBe("bus:router");
  });

  it("prefixes connection channels with the connection id", () => {
    expect(connectionChannel("bus:", "a1b2")).toBe("bus:conn.a1b2");
  });
});

describe("decodeAgentChannelMessage", () => {
  it("decodes an open message", () => {
    expect(decodeAgentChannelMessage('{"type":"open","connectionId":"c-1"}')).toEqual({
      type: "open",
      connectionId: "c-1",
    });
  });

  it("decodes a frame message", () => {
    const raw = encodeChannelMessage({ type: "frame", connectionId: "c-1", data: "[]" });
    expect(decodeAgentChannelMessage(raw)).toEqual({
      type: "frame",
      connectionId: "c-1",
      data: "[]",
    });
  });

  it("rejects connection ids that are not channel-safe", () => {
    expect(decodeAgentChannelMessage('{"type":"open","connectionId":"a.b"}')).toBeUndefined();
  });

  it("rejects frames without data", () => {
    expect(decodeAgentChannelMessage('{"type":"frame","connectionId":"c-1"}')).toBeUndefined();
  });

  it("rejects invalid JSON", () => {
    expect(decodeAgentChannelMessage("{nope")).toBeUndefined();
  });
});

describe("decodeRouterChannelMessage", () => {
  it("decodes a close with a reason", () => {
    expect(decodeRouterChannelMessage('{"type":"close","reason":"bye"}')).toEqual({
      type: "close",
      reason: "bye",
    });
  });

  it("rejects unknown message types", () => {
    expect(decodeRouterChannelMessage('{"type":"open"}')).toBeUndefined();
  });
});
