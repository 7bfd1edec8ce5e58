import {
  ExternalError,
  getErrorMessage,
  isConflictError,
  isPermissionError,
  isValidationError,
  type FaultKind,
  faultToError,
  InternalError,
  rejectionToError,
  TimeoutError,
  toError,
} from "@interconnect/errors";
import {
  type AgentLink,
  type BusMessage,
  type CallMessage,
  createMessageIdGenerator,
  type Envelope,
  encodeEnvelope,
  type LinkFactory,
  parseMessage,
  parsePattern,
  parseTopic,
  patternMatches,
  safeDecodeEnvelope,
  type TopicPattern,
  toEnvelope,
  type WelcomeMessage,
} from "@interconnect/protocol";
import { HeartbeatResponder } from "./heartbeat-responder.js";
import { ReconnectStrategy } from "./reconnect.js";
import {
  type AgentConfig,
  type AgentState,
  type CallOptions,
  type ConnectedHandler,
  type DisconnectedHandler,
  type ErrorHandler,
  type MethodHandler,
  type PeerHandler,
  type ReconnectedHandler,
  type ReconnectingHandler,
  type ResolvedAgentConfig,
  resolveAgentConfig,
  type TopicHandler,
} from "./types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Added to a call's timeout before the client gives up on the router */
export const CALL_GRACE_PERIOD = 1_000;

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface BusAgentDeps {
  /** Creates a fresh link for every connection attempt */
  readonly link: LinkFactory;
}

interface PendingRequest {
  resolve(value: unknown): void;
  reject(error: Error): void;
  readonly timer: ReturnType<typeof setTimeout>;
}

interface PendingHandshake {
  resolve(welcome: WelcomeMessage): void;
  reject(error: Error): void;
}

interface TopicSubscription {
  readonly pattern: TopicPattern;
  readonly handlers: Set<TopicHandler>;
}

// ---------------------------------------------------------------------------
// BusAgent
// ---------------------------------------------------------------------------

/**
 * Client side of the interconnect bus.
 *
 * Responsibilities:
 * - link setup and the hello/welcome handshake
 * - heartbeat responses, before any user dispatch
 * - publish/subscribe, with subscriptions restored after a reconnect
 * - outgoing calls correlated by message id, and exported methods
 * - reconnection with exponential backoff and full jitter
 *
 * A rejected handshake is final: the agent does not retry with a credential
 * the router has refused.
 */
export class BusAgent {
  private readonly resolvedConfig: ResolvedAgentConfig;
  private readonly createLink: LinkFactory;
  private readonly reconnectStrategy: ReconnectStrategy;
  private readonly heartbeatResponder: HeartbeatResponder;
  private readonly nextMessageId: () => string;

  private link: AgentLink | undefined;
  private _state: AgentState = "disconnected";
  private _welcome: WelcomeMessage | undefined;
  private stopping = false;
  private handshake: PendingHandshake | undefined;

  private readonly pending = new Map<string, PendingRequest>();
  private readonly subscriptions = new Map<string, TopicSubscription>();
  private readonly methods = new Map<string, MethodHandler>();

  private connectedHandlers: readonly ConnectedHandler[] = [];
  private disconnectedHandlers: readonly DisconnectedHandler[] = [];
  private reconnectingHandlers: readonly ReconnectingHandler[] = [];
  private reconnectedHandlers: readonly ReconnectedHandler[] = [];
  private peerAddedHandlers: readonly PeerHandler[] = [];
  private peerDroppedHandlers: readonly PeerHandler[] = [];
  private errorHandlers: readonly ErrorHandler[] = [];

  constructor(config: AgentConfig, deps: BusAgentDeps) {
    this.resolvedConfig = resolveAgentConfig(config);
    this.createLink = deps.link;
    this.reconnectStrategy = new ReconnectStrategy(this.resolvedConfig.reconnect);
    this.nextMessageId = createMessageIdGenerator(this.resolvedConfig.identity);
    this.heartbeatResponder = new HeartbeatResponder((pong, messageId) => {
      this.sendMessage("", pong, messageId);
    });
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Connect and complete the handshake. Rejects with the router's typed
   * rejection (AUTH_UNKNOWN_CREDENTIAL, AUTH_IDENTITY_CONFLICT,
   * AUTH_MALFORMED_HANDSHAKE) or a transport error.
   */
  async start(): Promise<WelcomeMessage> {
    if (this._state !== "disconnected") {
      throw new InternalError({
        code: "INTERNAL_ERROR",
        message: `Cannot start: agent is in state "${this._state}"`,
      });
    }
    this._state = "connecting";
    try {
      const welcome = await this.connectAndHandshake();
      for (const handler of this.connectedHandlers) {
        handler(welcome);
      }
      return welcome;
    } catch (err) {
      this._state = "disconnected";
      throw err;
    }
  }

  /**
   * Say goodbye and close the link. Pending calls reject with
   * RPC_PEER_UNAVAILABLE.
   */
  async stop(): Promise<void> {
    if (this._state === "disconnected") return;
    this.stopping = true;
    this.reconnectStrategy.cancel();

    const link = this.link;
    if (link && this._state === "connected") {
      this.sendMessage("", { kind: "auth.goodbye" });
    }
    this.link = undefined;
    link?.close("Agent stopping");
    this.settleHandshake((h) =>
      h.reject(
        new ExternalError({
          code: "TRANSPORT_CONNECT_FAILED",
          message: "Agent stopped during handshake",
        }),
      ),
    );

    this.failPending("Agent stopped");
    this._state = "disconnected";
    this._welcome = undefined;
    this.stopping = false;
  }

  // -------------------------------------------------------------------------
  // State
  // -------------------------------------------------------------------------

  get state(): AgentState {
    return this._state;
  }

  get identity(): string {
    return this.resolvedConfig.identity;
  }

  /** Capabilities granted at the last admission */
  get capabilities(): readonly string[] {
    return this._welcome?.capabilities ?? [];
  }

  get routerIdentity(): string | undefined {
    return this._welcome?.routerIdentity;
  }

  get config(): ResolvedAgentConfig {
    return this.resolvedConfig;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  // -------------------------------------------------------------------------
  // Pub/Sub
  // -------------------------------------------------------------------------

  /**
   * Publish a JSON-encoded payload. Not acknowledged: subscribers that are
   * congested may miss it.
   */
  publish(topic: string, payload: unknown): void {
    this.requireConnected();
    this.sendMessage("", { kind: "pubsub.publish", topic, payload: JSON.stringify(payload) });
  }

  /**
   * Subscribe to a pattern (`devices/#`, or an exact topic). Resolves when
   * the router acknowledges; rejects with AUTH_CAPABILITY_DENIED or
   * ROUTING_MALFORMED_ENVELOPE. The subscription is restored after every
   * reconnect.
   */
  async subscribe(pattern: string, handler: TopicHandler): Promise<void> {
    const parsed = parsePattern(pattern);
    if (!parsed) {
      throw faultToError("malformed", `Invalid topic pattern "${pattern}"`);
    }
    const existing = this.subscriptions.get(pattern);
    if (existing) {
      existing.handlers.add(handler);
      return;
    }
    await this.request({ kind: "pubsub.subscribe", pattern });
    const current = this.subscriptions.get(pattern);
    if (current) {
      current.handlers.add(handler);
    } else {
      this.subscriptions.set(pattern, { pattern: parsed, handlers: new Set([handler]) });
    }
  }

  /**
   * Drop every handler for a pattern and tell the router.
   */
  async unsubscribe(pattern: string): Promise<void> {
    if (!this.subscriptions.delete(pattern)) return;
    if (this._state !== "connected") return;
    await this.request({ kind: "pubsub.unsubscribe", pattern });
  }

  // -------------------------------------------------------------------------
  // RPC
  // -------------------------------------------------------------------------

  /**
   * Call a method exported by another agent. Arguments and result travel as
   * JSON. Rejects with the typed error of the fault kind the call ended in.
   */
  async call(
    callee: string,
    method: string,
    args: readonly unknown[] = [],
    options: CallOptions = {},
  ): Promise<unknown> {
    this.requireConnected();
    const message: CallMessage = {
      kind: "rpc.call",
      method,
      params: JSON.stringify(args),
      ...(options.timeout !== undefined ? { timeout: options.timeout } : {}),
    };
    const timeout = options.timeout ?? this.resolvedConfig.defaultCallTimeout;
    return this.track(callee, message, timeout + CALL_GRACE_PERIOD);
  }

  /**
   * Serve a method to other agents. The handler receives the decoded
   * arguments; whatever it returns (or resolves to) is the reply. Returns
   * a disposer.
   */
  export(method: string, handler: MethodHandler): () => void {
    this.methods.set(method, handler);
    return () => {
      if (this.methods.get(method) === handler) {
        this.methods.delete(method);
      }
    };
  }

  // -------------------------------------------------------------------------
  // Peers
  // -------------------------------------------------------------------------

  /** Identities currently connected to the router, sorted */
  async peers(): Promise<readonly string[]> {
    const result = await this.request({ kind: "peerlist.list" });
    return Array.isArray(result) ? result.filter((item) => typeof item === "string") : [];
  }

  // -------------------------------------------------------------------------
  // Event Registration
  // -------------------------------------------------------------------------

  onConnected(handler: ConnectedHandler): void {
    this.connectedHandlers = [...this.connectedHandlers, handler];
  }

  onDisconnected(handler: DisconnectedHandler): void {
    this.disconnectedHandlers = [...this.disconnectedHandlers, handler];
  }

  onReconnecting(handler: ReconnectingHandler): void {
    this.reconnectingHandlers = [...this.reconnectingHandlers, handler];
  }

  onReconnected(handler: ReconnectedHandler): void {
    this.reconnectedHandlers = [...this.reconnectedHandlers, handler];
  }

  onPeerAdded(handler: PeerHandler): void {
    this.peerAddedHandlers = [...this.peerAddedHandlers, handler];
  }

  onPeerDropped(handler: PeerHandler): void {
    this.peerDroppedHandlers = [...this.peerDroppedHandlers, handler];
  }

  onError(handler: ErrorHandler): void {
    this.errorHandlers = [...this.errorHandlers, handler];
  }

  // -------------------------------------------------------------------------
  // Connection
  // -------------------------------------------------------------------------

  private async connectAndHandshake(): Promise<WelcomeMessage> {
    const link = this.createLink();
    this.link = link;
    link.onMessage((data) => {
      if (link === this.link) this.handleFrame(data);
    });
    link.onClose((reason) => {
      if (link === this.link) this.handleClose(reason);
    });
    link.onError((error) => {
      if (link === this.link) this.emitError(error, "link-error");
    });

    await link.connect();
    this.ensureCurrent(link);
    const credential = await this.resolveCredential();
    const { identity, signProof, handshakeTimeout } = this.resolvedConfig;
    const proof = signProof ? await signProof(identity) : undefined;
    this.ensureCurrent(link);

    // Armed before the hello goes out: in-process links answer synchronously
    const welcome = this.waitForWelcome(handshakeTimeout);
    this.sendMessage("", {
      kind: "auth.hello",
      identity,
      credential,
      ...(proof !== undefined ? { proof } : {}),
    });

    let admitted: WelcomeMessage;
    try {
      admitted = await welcome;
    } catch (err) {
      if (link === this.link) {
        this.link = undefined;
        link.close("Handshake failed");
      }
      throw err;
    }
    this.ensureCurrent(link);

    this._welcome = admitted;
    this._state = "connected";
    this.reconnectStrategy.reset();
    this.restoreSubscriptions();
    return admitted;
  }

  /** Throws when the agent moved on from this link (stopped, or the link closed) */
  private ensureCurrent(link: AgentLink): void {
    if (link === this.link) return;
    link.close("Superseded");
    throw new ExternalError({
      code: "TRANSPORT_CONNECT_FAILED",
      message:
        this._state === "disconnected" || this.stopping
          ? "Agent stopped during connect"
          : "Link closed during connect",
    });
  }

  private waitForWelcome(timeout: number): Promise<WelcomeMessage> {
    return new Promise<WelcomeMessage>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.handshake = undefined;
        reject(
          new TimeoutError({
            code: "AUTH_HANDSHAKE_TIMEOUT",
            message: `Handshake timed out after ${timeout}ms`,
          }),
        );
      }, timeout);

      this.handshake = {
        resolve: (welcome) => {
          clearTimeout(timer);
          resolve(welcome);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
    });
  }

  private restoreSubscriptions(): void {
    for (const pattern of this.subscriptions.keys()) {
      this.request({ kind: "pubsub.subscribe", pattern }).catch((err: unknown) => {
        this.subscriptions.delete(pattern);
        this.emitError(toError(err), "resubscribe");
      });
    }
  }

  // -------------------------------------------------------------------------
  // Frame Handling
  // -------------------------------------------------------------------------

  private handleFrame(data: string): void {
    const decoded = safeDecodeEnvelope(data);
    if (!decoded.success) {
      this.emitError(faultToError("malformed", decoded.error), "decode");
      return;
    }
    const envelope = decoded.envelope;
    const parsed = parseMessage(envelope);
    if (!parsed.success) {
      this.emitError(faultToError("malformed", parsed.error), "decode");
      return;
    }
    const message = parsed.message;

    if (this.heartbeatResponder.handle(message, envelope.messageId)) {
      return;
    }

    switch (message.kind) {
      case "auth.welcome":
        this.settleHandshake((h) => h.resolve(message));
        return;
      case "auth.error":
        this.settleHandshake((h) => h.reject(rejectionToError(message.reason, message.detail)));
        return;
      case "pubsub.publish":
        this.dispatchPublish(message.topic, message.payload, envelope.sender);
        return;
      case "pubsub.ack":
        this.resolvePending(envelope.messageId, message.pattern);
        return;
      case "rpc.call":
        void this.serveCall(envelope, message);
        return;
      case "rpc.reply":
        this.resolvePending(envelope.messageId, decodeJson(message.result));
        return;
      case "rpc.fault":
        this.rejectPending(envelope.messageId, message.fault, message.detail);
        return;
      case "peerlist.listing":
        this.resolvePending(envelope.messageId, message.identities);
        return;
      case "peerlist.add":
        for (const handler of this.peerAddedHandlers) handler(message.identity);
        return;
      case "peerlist.drop":
        for (const handler of this.peerDroppedHandlers) handler(message.identity);
        return;
      case "error.fault":
        if (!this.rejectPending(envelope.messageId, message.fault, message.detail)) {
          this.emitError(faultToError(message.fault, message.detail), "router-fault");
        }
        return;
      default:
        // pongs and frames meant for the router
        return;
    }
  }

  private settleHandshake(fn: (handshake: PendingHandshake) => void): void {
    const handshake = this.handshake;
    if (!handshake) return;
    this.handshake = undefined;
    fn(handshake);
  }

  private dispatchPublish(topic: string, payload: string, sender: string): void {
    const segments = parseTopic(topic);
    if (!segments) return;
    const body = decodeJson(payload);
    for (const subscription of this.subscriptions.values()) {
      if (!patternMatches(subscription.pattern, segments)) continue;
      for (const handler of subscription.handlers) {
        try {
          const result = handler(topic, body, sender);
          if (result instanceof Promise) {
            result.catch((err: unknown) => this.emitError(toError(err), "topic-handler"));
          }
        } catch (err) {
          this.emitError(toError(err), "topic-handler");
        }
      }
    }
  }

  private async serveCall(envelope: Envelope, message: CallMessage): Promise<void> {
    const caller = envelope.sender;
    const handler = this.methods.get(message.method);
    if (!handler) {
      this.sendMessage(
        caller,
        { kind: "rpc.fault", fault: "application-error", detail: `method not found: ${message.method}` },
        envelope.messageId,
      );
      return;
    }

    const args = decodeJson(message.params);
    let reply: BusMessage;
    try {
      const result = await handler(Array.isArray(args) ? args : [args], caller);
      reply = { kind: "rpc.reply", result: JSON.stringify(result ?? null) };
    } catch (err) {
      reply = { kind: "rpc.fault", fault: "application-error", detail: getErrorMessage(err) };
    }
    if (this._state === "connected") {
      this.sendMessage(caller, reply, envelope.messageId);
    }
  }

  // -------------------------------------------------------------------------
  // Correlation
  // -------------------------------------------------------------------------

  private request(message: BusMessage): Promise<unknown> {
    this.requireConnected();
    return this.track("", message, this.resolvedConfig.defaultCallTimeout);
  }

  /**
   * Send a message and wait for the frame that echoes its message id.
   * The timer is a backstop for an unreachable router; the router's own
   * deadline normally answers first.
   */
  private track(recipient: string, message: BusMessage, backstop: number): Promise<unknown> {
    const messageId = this.nextMessageId();
    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(messageId);
        reject(
          new TimeoutError({
            code: "RPC_TIMEOUT",
            message: `No answer to ${message.kind} ${messageId} after ${backstop}ms`,
          }),
        );
      }, backstop);
      this.pending.set(messageId, { resolve, reject, timer });
      if (!this.sendMessage(recipient, message, messageId)) {
        this.rejectPending(messageId, "peer-unavailable", "Link to the router is not open");
      }
    });
  }

  private resolvePending(messageId: string, value: unknown): boolean {
    const request = this.pending.get(messageId);
    if (!request) return false;
    this.pending.delete(messageId);
    clearTimeout(request.timer);
    request.resolve(value);
    return true;
  }

  private rejectPending(messageId: string, kind: FaultKind, detail: string): boolean {
    const request = this.pending.get(messageId);
    if (!request) return false;
    this.pending.delete(messageId);
    clearTimeout(request.timer);
    request.reject(faultToError(kind, detail));
    return true;
  }

  private failPending(detail: string): void {
    for (const messageId of [...this.pending.keys()]) {
      this.rejectPending(messageId, "peer-unavailable", detail);
    }
  }

  // -------------------------------------------------------------------------
  // Reconnection
  // -------------------------------------------------------------------------

  private handleClose(reason: string): void {
    this.link = undefined;
    this.settleHandshake((h) =>
      h.reject(
        new ExternalError({
          code: "TRANSPORT_CONNECT_FAILED",
          message: `Link closed during handshake: ${reason}`,
        }),
      ),
    );
    if (this.stopping || this._state !== "connected") {
      return;
    }

    this.failPending(`Link closed: ${reason}`);
    this._welcome = undefined;
    for (const handler of this.disconnectedHandlers) {
      handler(reason);
    }

    this._state = "reconnecting";
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.reconnectStrategy.exhausted) {
      this._state = "disconnected";
      this.emitError(
        new ExternalError({
          code: "TRANSPORT_CONNECT_FAILED",
          message: `Reconnection failed after ${this.reconnectStrategy.attempt} attempts`,
        }),
        "reconnect-exhausted",
      );
      return;
    }

    const delay = this.reconnectStrategy.schedule(() => this.attemptReconnect());
    const attempt = this.reconnectStrategy.attempt;
    for (const handler of this.reconnectingHandlers) {
      handler(attempt, delay);
    }
  }

  private async attemptReconnect(): Promise<void> {
    if (this._state !== "reconnecting") return;
    try {
      const welcome = await this.connectAndHandshake();
      for (const handler of this.reconnectedHandlers) {
        handler(welcome);
      }
    } catch (err) {
      const error = toError(err);
      if (this._state !== "reconnecting") return;
      if (isPermissionError(error) || isValidationError(error) || isConflictError(error)) {
        // The router refused the handshake; retrying cannot succeed
        this._state = "disconnected";
        this.emitError(error, "auth-failure");
        return;
      }
      this.emitError(error, "reconnect-attempt");
      this.scheduleReconnect();
    }
  }

  // -------------------------------------------------------------------------
  // Helpers
  // -------------------------------------------------------------------------

  private sendMessage(recipient: string, message: BusMessage, messageId = this.nextMessageId()): boolean {
    const link = this.link;
    if (!link) return false;
    const envelope = toEnvelope(
      { sender: this.resolvedConfig.identity, recipient, messageId },
      message,
    );
    return link.send(encodeEnvelope(envelope));
  }

  private requireConnected(): void {
    if (this._state !== "connected") {
      throw new ExternalError({
        code: "TRANSPORT_NOT_CONNECTED",
        message: `Agent "${this.resolvedConfig.identity}" is ${this._state}`,
      });
    }
  }

  private async resolveCredential(): Promise<string> {
    const { credential } = this.resolvedConfig;
    return typeof credential === "string" ? credential : credential();
  }

  private emitError(error: Error, context?: string): void {
    if (this.errorHandlers.length === 0) {
      console.error(`[BusAgent] Unhandled error (${context ?? "unknown"}):`, error.message);
      return;
    }
    for (const handler of this.errorHandlers) {
      handler(error, context);
    }
  }
}

function decodeJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}
