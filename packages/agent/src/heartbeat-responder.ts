import type { BusMessage, PongMessage } from "@interconnect/protocol";

// ---------------------------------------------------------------------------
// HeartbeatResponder
// ---------------------------------------------------------------------------

/**
 * Answers router pings before any user dispatch, so a slow topic or method
 * handler never delays a pong.
 */
export class HeartbeatResponder {
  private readonly sendPong: (pong: PongMessage, messageId: string) => void;
  private lastPing: number | undefined;

  constructor(sendPong: (pong: PongMessage, messageId: string) => void) {
    this.sendPong = sendPong;
  }

  /**
   * Returns true if the message was a ping (and has been answered).
   */
  handle(message: BusMessage, messageId: string): boolean {
    if (message.kind !== "heartbeat.ping") {
      return false;
    }
    this.lastPing = message.timestamp;
    this.sendPong({ kind: "heartbeat.pong", timestamp: message.timestamp }, messageId);
    return true;
  }

  /** Router timestamp of the last ping, for diagnostics */
  get lastPingAt(): number | undefined {
    return this.lastPing;
  }
}
