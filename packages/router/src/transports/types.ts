import type { FaultKind } from "@interconnect/errors";
import { createEmitter, type Emitter } from "../utils/emitter.js";

// ---------------------------------------------------------------------------
// Transport Contract
// ---------------------------------------------------------------------------

export type ConnectHandler = (connectionId: string) => void;
export type FrameHandler = (connectionId: string, data: string) => void;
export type DisconnectHandler = (connectionId: string, reason: string) => void;
/** A frame the transport refused before it reached the router */
export type RejectedHandler = (connectionId: string, fault: FaultKind, detail: string) => void;

/**
 * Moves raw encoded envelopes between agents and the router.
 *
 * Connection ids are ephemeral and unique per transport; they carry no
 * identity. After `close` (or a remote hangup) the transport emits
 * `disconnect` exactly once for the connection.
 */
export interface Transport {
  readonly name: string;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Returns false when the connection is gone. */
  send(connectionId: string, data: string): boolean;
  /** Whether the connection can take more data without buffering past its high-water mark */
  canSend(connectionId: string): boolean;
  close(connectionId: string, reason: string): void;
  onConnect(handler: ConnectHandler): () => void;
  onFrame(handler: FrameHandler): () => void;
  onDisconnect(handler: DisconnectHandler): () => void;
  onRejected(handler: RejectedHandler): () => void;
}

type TransportEvents = {
  connect: [connectionId: string];
  frame: [connectionId: string, data: string];
  disconnect: [connectionId: string, reason: string];
  rejected: [connectionId: string, fault: FaultKind, detail: string];
};

/**
 * Event plumbing shared by the transport implementations.
 */
export abstract class TransportBase implements Transport {
  abstract readonly name: string;
  protected readonly events: Emitter<TransportEvents> = createEmitter();

  abstract start(): Promise<void>;
  abstract stop(): Promise<void>;
  abstract send(connectionId: string, data: string): boolean;
  abstract canSend(connectionId: string): boolean;
  abstract close(connectionId: string, reason: string): void;

  onConnect(handler: ConnectHandler): () => void {
    return this.events.on("connect", handler);
  }

  onFrame(handler: FrameHandler): () => void {
    return this.events.on("frame", handler);
  }

  onDisconnect(handler: DisconnectHandler): () => void {
    return this.events.on("disconnect", handler);
  }

  onRejected(handler: RejectedHandler): () => void {
    return this.events.on("rejected", handler);
  }

  /**
   * Size check applied to every inbound frame.
   */
  protected exceedsFrameSize(connectionId: string, data: string, maxFrameSize: number): boolean {
    const size = Buffer.byteLength(data, "utf-8");
    if (size <= maxFrameSize) return false;
    this.events.emit(
      "rejected",
      connectionId,
      "malformed",
      `Frame of ${size} bytes exceeds the ${maxFrameSize} byte limit`,
    );
    return true;
  }
}
