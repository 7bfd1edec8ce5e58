// ---------------------------------------------------------------------------
// Agent Link
// ---------------------------------------------------------------------------

/**
 * Agent-side end of a transport. Carries encoded envelopes as strings.
 *
 * Links are single-use: after close, the agent creates a fresh one through
 * its LinkFactory and performs a new handshake.
 */
export interface AgentLink {
  /** Open the link. Rejects on failure or when the signal aborts. */
  connect(signal?: AbortSignal): Promise<void>;
  /** Returns false when the link is not open. */
  send(data: string): boolean;
  close(reason?: string): void;
  onMessage(handler: (data: string) => void): void;
  onClose(handler: (reason: string) => void): void;
  onError(handler: (error: Error) => void): void;
  readonly isConnected: boolean;
}

export type LinkFactory = () => AgentLink;
