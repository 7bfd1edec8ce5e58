import {
  type AuthRejectionReason,
  type FaultKind,
  faultKindOf,
  getErrorMessage,
  isExpectedError,
  toError,
} from "@interconnect/errors";
import {
  type BusMessage,
  createMessageIdGenerator,
  type Envelope,
  encodeEnvelope,
  type HelloMessage,
  PROTOCOL_VERSION,
  parseMessage,
  type RouterConfig,
  safeDecodeEnvelope,
  toEnvelope,
} from "@interconnect/protocol";
import { AuthGate, type AuthResult } from "./auth/auth-gate.js";
import { CredentialStore } from "./auth/credential-store.js";
import { pickHotFields } from "./config-watcher.js";
import { DEFERRED, type DispatchContext, type Outcome } from "./dispatch/context.js";
import { SUBSYSTEM_HANDLERS } from "./dispatch/handlers.js";
import { createConsoleLogger, type Logger } from "./logger.js";
import { type Subscription, SubscriptionTree } from "./pubsub/subscription-tree.js";
import { Outbox } from "./queue/outbox.js";
import { HealthMonitor } from "./routing/health-monitor.js";
import { type Route, RoutingTable } from "./routing/routing-table.js";
import { type PendingCall, RpcCorrelator } from "./rpc/rpc-correlator.js";
import type { Transport } from "./transports/types.js";
import { createEmitter, type Emitter } from "./utils/emitter.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface MessageRouterDeps {
  /** Credential store (default: an empty in-memory store) */
  readonly store?: CredentialStore;
  readonly transports?: readonly Transport[];
  readonly logger?: Logger;
  readonly now?: () => number;
}

type ConnectionState = "pending" | "authenticating" | "admitted" | "closed";

interface Connection {
  readonly id: string;
  readonly transport: Transport;
  readonly openedAt: number;
  state: ConnectionState;
  identity: string | undefined;
  userId: string | undefined;
  /** Frames received while the hello was being verified */
  readonly buffered: string[];
  readonly outbox: Outbox<string>;
}

type RouterEvents = {
  admitted: [identity: string, connectionId: string];
  departed: [identity: string, reason: string];
  fatal: [error: Error];
};

// ---------------------------------------------------------------------------
// MessageRouter
// ---------------------------------------------------------------------------

/**
 * The interconnect router.
 *
 * Every transport event becomes a task on one inbound queue. Tasks run one
 * at a time to completion; a task enqueued while another runs (for example
 * by an in-process agent reacting to a delivery) waits its turn. The only
 * asynchronous step is hello verification, whose completion is enqueued as
 * a task of its own.
 *
 * Outbound frames go through a per-connection {@link Outbox}, flushed after
 * every task and on every sweep while the transport reports the connection
 * writable.
 */
export class MessageRouter {
  private config: RouterConfig;
  private readonly store: CredentialStore;
  private readonly table: RoutingTable;
  private readonly subscriptions: SubscriptionTree;
  private readonly calls: RpcCorrelator;
  private readonly gate: AuthGate;
  private readonly monitor: HealthMonitor;
  private readonly transports: Transport[] = [];
  private readonly connections = new Map<string, Connection>();
  private readonly events: Emitter<RouterEvents> = createEmitter();
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly nextMessageId: () => string;

  private readonly inbound: (() => void)[] = [];
  private draining = false;
  private readonly dirty = new Set<Connection>();
  private sweepTimer: ReturnType<typeof setInterval> | undefined;
  private started = false;
  /** Set by a fatal error; no task runs afterwards */
  private failed = false;

  constructor(config: RouterConfig, deps: MessageRouterDeps = {}) {
    this.config = config;
    this.now = deps.now ?? (() => Date.now());
    const level = () => this.config.logLevel;
    this.logger = deps.logger ?? createConsoleLogger("MessageRouter", level);
    this.store = deps.store ?? new CredentialStore(undefined, { logger: this.logger });
    this.table = new RoutingTable({ heartbeatInterval: config.heartbeatInterval, now: this.now });
    this.subscriptions = new SubscriptionTree(this.now);
    this.calls = new RpcCorrelator(
      { defaultTimeout: config.rpcDefaultTimeout, maxTimeout: config.rpcMaxTimeout },
      this.now,
    );
    this.gate = new AuthGate(
      this.store,
      this.table,
      deps.logger ?? createConsoleLogger("AuthGate", level),
    );
    this.nextMessageId = createMessageIdGenerator(config.identity);

    this.monitor = new HealthMonitor(this.table, (route) => {
      this.enqueue(() => this.ping(route));
    });
    this.monitor.onRouteDead((route) => {
      this.enqueue(() => this.evict(route));
    });

    for (const transport of deps.transports ?? []) {
      this.addTransport(transport);
    }
  }

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  /**
   * Attach a transport. Transports added before `start` are started with it.
   */
  addTransport(transport: Transport): void {
    this.transports.push(transport);
    transport.onConnect((connectionId) => {
      this.enqueue(() => this.handleConnect(transport, connectionId));
    });
    transport.onFrame((connectionId, data) => {
      this.enqueue(() => this.handleFrame(connectionId, data));
    });
    transport.onDisconnect((connectionId, reason) => {
      this.enqueue(() => this.handleDisconnect(connectionId, reason));
    });
    transport.onRejected((connectionId, kind, detail) => {
      this.enqueue(() => this.handleRejected(connectionId, kind, detail));
    });
  }

  async start(): Promise<void> {
    if (this.started || this.failed) return;
    this.started = true;
    for (const transport of this.transports) {
      await transport.start();
    }
    this.monitor.start();
    this.startSweep();
    this.logger.info(
      `Router "${this.config.identity}" started on ${this.transports.map((t) => t.name).join(", ") || "no transports"}`,
    );
  }

  async stop(): Promise<void> {
    if (!this.started) return;
    this.started = false;
    this.monitor.stop();
    this.stopSweep();
    this.enqueue(() => {
      for (const connection of [...this.connections.values()]) {
        this.teardown(connection, "Router shutting down");
      }
    });
    for (const transport of this.transports) {
      await transport.stop();
    }
    this.calls.clear();
    this.subscriptions.clear();
    this.gate.clear();
    this.table.clear();
    this.logger.info("Router stopped");
  }

  // -------------------------------------------------------------------------
  // Administration
  // -------------------------------------------------------------------------

  /**
   * Apply the hot-reloadable fields of a new configuration. Other fields
   * keep their running values.
   */
  applyConfig(next: RouterConfig): void {
    const previous = this.config;
    this.config = { ...previous, ...pickHotFields(next) };

    if (this.config.heartbeatInterval !== previous.heartbeatInterval) {
      this.monitor.setInterval(this.config.heartbeatInterval);
    }
    if (this.config.sweepInterval !== previous.sweepInterval && this.sweepTimer !== undefined) {
      this.stopSweep();
      this.startSweep();
    }
    this.calls.setTimeouts({
      defaultTimeout: this.config.rpcDefaultTimeout,
      maxTimeout: this.config.rpcMaxTimeout,
    });
    if (this.config.outboxCapacity !== previous.outboxCapacity) {
      for (const connection of this.connections.values()) {
        connection.outbox.capacity = this.config.outboxCapacity;
      }
    }
  }

  /**
   * Remove a credential and tear down every live session admitted with it.
   * Returns the identities that were disconnected.
   */
  revoke(credential: string): readonly string[] {
    const identities = this.gate.revoke(credential);
    this.enqueue(() => {
      for (const identity of identities) {
        const connection = this.connectionOf(identity);
        if (connection) this.teardown(connection, "Credential revoked");
      }
    });
    return identities;
  }

  getConfig(): RouterConfig {
    return this.config;
  }

  getCredentialStore(): CredentialStore {
    return this.store;
  }

  /** Sorted identities of admitted connections */
  identities(): readonly string[] {
    return this.table.identities();
  }

  subscriptionsOf(identity: string): readonly Subscription[] {
    return this.subscriptions.patternsOf(identity);
  }

  get pendingCallCount(): number {
    return this.calls.size;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  onAdmitted(handler: (identity: string, connectionId: string) => void): () => void {
    return this.events.on("admitted", handler);
  }

  onDeparted(handler: (identity: string, reason: string) => void): () => void {
    return this.events.on("departed", handler);
  }

  /**
   * Invariant violations and unexpected errors. The router has already
   * closed every connection and is stopping when this fires.
   */
  onFatal(handler: (error: Error) => void): () => void {
    return this.events.on("fatal", handler);
  }

  // -------------------------------------------------------------------------
  // Inbound Queue
  // -------------------------------------------------------------------------

  private enqueue(task: () => void): void {
    if (this.failed) return;
    this.inbound.push(task);
    if (this.draining) return;
    this.draining = true;
    try {
      for (let next = this.inbound.shift(); next; next = this.inbound.shift()) {
        next();
        this.flushDirty();
      }
    } catch (err) {
      this.fail(err);
    } finally {
      this.draining = false;
    }
  }

  // -------------------------------------------------------------------------
  // Transport Events
  // -------------------------------------------------------------------------

  private handleConnect(transport: Transport, connectionId: string): void {
    this.connections.set(connectionId, {
      id: connectionId,
      transport,
      openedAt: this.now(),
      state: "pending",
      identity: undefined,
      userId: undefined,
      buffered: [],
      outbox: new Outbox(this.config.outboxCapacity),
    });
    this.logger.debug(`Connection ${connectionId} opened on ${transport.name}`);
  }

  private handleDisconnect(connectionId: string, reason: string): void {
    const connection = this.connections.get(connectionId);
    if (connection) this.teardown(connection, reason);
  }

  private handleRejected(connectionId: string, kind: FaultKind, detail: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    if (connection.state === "admitted") {
      this.sendError(connection, "", "", kind, detail);
    } else {
      this.rejectHandshake(connection, "", "", "malformed", detail);
    }
  }

  private handleFrame(connectionId: string, data: string): void {
    const connection = this.connections.get(connectionId);
    if (!connection) return;
    switch (connection.state) {
      case "pending":
        this.apply(connection, undefined, this.dispatchHandshake(connection, data));
        return;
      case "authenticating":
        connection.buffered.push(data);
        return;
      case "admitted":
        this.dispatchAdmitted(connection, data);
        return;
      case "closed":
        return;
    }
  }

  // -------------------------------------------------------------------------
  // Handshake
  // -------------------------------------------------------------------------

  private dispatchHandshake(connection: Connection, data: string): Outcome {
    const decoded = safeDecodeEnvelope(data);
    if (!decoded.success) {
      this.rejectHandshake(connection, "", "", "malformed", decoded.error);
      return DEFERRED;
    }
    const envelope = decoded.envelope;
    const parsed = parseMessage(envelope);
    if (!parsed.success || parsed.message.kind !== "auth.hello") {
      this.rejectHandshake(
        connection,
        envelope.sender,
        envelope.messageId,
        "malformed",
        parsed.success ? "Expected auth hello before any other frame" : parsed.error,
      );
      return DEFERRED;
    }
    const hello = parsed.message;
    if (envelope.sender !== "" && envelope.sender !== hello.identity) {
      this.rejectHandshake(
        connection,
        envelope.sender,
        envelope.messageId,
        "malformed",
        `Hello sent by "${envelope.sender}" proposes identity "${hello.identity}"`,
      );
      return DEFERRED;
    }

    connection.state = "authenticating";
    void this.gate.authenticate(hello.credential, hello.identity, hello.proof).then(
      (result) => this.enqueue(() => this.completeHandshake(connection, envelope, hello, result)),
      (err: unknown) => this.fail(err),
    );
    return DEFERRED;
  }

  private completeHandshake(
    connection: Connection,
    envelope: Envelope,
    hello: HelloMessage,
    result: AuthResult,
  ): void {
    if (connection.state !== "authenticating") {
      this.logger.debug(`Handshake for "${hello.identity}" finished after ${connection.id} closed`);
      return;
    }
    if (!result.ok) {
      const { reason, detail } = result.rejection;
      this.rejectHandshake(connection, hello.identity, envelope.messageId, reason, detail);
      return;
    }

    // A dead holder of the identity is cascaded away before the new route registers
    const prior = this.table.lookup(hello.identity);
    if (prior && this.table.isDead(prior)) {
      this.evict(prior);
    }

    const admitted = this.gate.admit(result.admission, {
      connectionId: connection.id,
      transport: connection.transport.name,
    });
    if (!admitted.ok) {
      const { reason, detail } = admitted.rejection;
      this.rejectHandshake(connection, hello.identity, envelope.messageId, reason, detail);
      return;
    }

    const { identity, userId, capabilities } = result.admission;
    connection.state = "admitted";
    connection.identity = identity;
    connection.userId = userId;

    this.enqueueFrame(
      connection,
      this.fromRouter(identity, envelope.messageId, {
        kind: "auth.welcome",
        version: PROTOCOL_VERSION,
        routerIdentity: this.config.identity,
        identity,
        capabilities,
      }),
      false,
    );
    this.broadcast({ kind: "peerlist.add", identity }, connection);
    this.logger.info(`Admitted "${identity}" on ${connection.id}`);
    this.events.emit("admitted", identity, connection.id);

    for (const frame of connection.buffered.splice(0)) {
      if (connection.state !== "admitted") break;
      this.dispatchAdmitted(connection, frame);
      this.flushDirty();
    }
  }

  private rejectHandshake(
    connection: Connection,
    recipient: string,
    messageId: string,
    reason: AuthRejectionReason,
    detail: string,
  ): void {
    this.logger.info(`Rejected handshake on ${connection.id} (${reason}): ${detail}`);
    const envelope = this.fromRouter(recipient, messageId || this.nextMessageId(), {
      kind: "auth.error",
      reason,
      detail,
    });
    // Written directly: the connection is closed right after
    connection.transport.send(connection.id, encodeEnvelope(envelope));
    this.teardown(connection, `Handshake rejected: ${reason}`);
  }

  // -------------------------------------------------------------------------
  // Dispatch
  // -------------------------------------------------------------------------

  private dispatchAdmitted(connection: Connection, data: string): void {
    const { identity, userId } = connection;
    if (identity === undefined || userId === undefined) return;

    const decoded = safeDecodeEnvelope(data);
    if (!decoded.success) {
      this.sendError(connection, "", "", "malformed", decoded.error);
      return;
    }
    const envelope = decoded.envelope;
    this.table.touch(identity);

    if (envelope.sender !== identity) {
      this.apply(connection, envelope, {
        kind: "fault",
        fault: "identity-mismatch",
        detail: `Sender "${envelope.sender}" does not match authenticated identity "${identity}"`,
      });
      return;
    }

    const parsed = parseMessage(envelope);
    if (!parsed.success) {
      this.apply(connection, envelope, { kind: "fault", fault: "malformed", detail: parsed.error });
      return;
    }

    const ctx: DispatchContext = {
      sender: { identity, userId, connectionId: connection.id },
      gate: this.gate,
      table: this.table,
      subscriptions: this.subscriptions,
      calls: this.calls,
      logger: this.logger,
      deliver: (recipient, forwarded, droppable) => this.deliver(recipient, forwarded, droppable),
      reply: (request, message) => {
        this.enqueueFrame(connection, this.fromRouter(identity, request.messageId, message), false);
      },
    };

    let outcome: Outcome;
    try {
      outcome = SUBSYSTEM_HANDLERS[envelope.subsystem](parsed.message, envelope, ctx);
    } catch (err) {
      if (!isExpectedError(err)) throw err;
      outcome = { kind: "fault", fault: faultKindOf(err), detail: getErrorMessage(err) };
    }
    this.apply(connection, envelope, outcome);
  }

  private apply(connection: Connection, envelope: Envelope | undefined, outcome: Outcome): void {
    switch (outcome.kind) {
      case "ok":
      case "deferred":
        return;
      case "close":
        this.teardown(connection, outcome.reason);
        return;
      case "fault": {
        const messageId = envelope?.messageId ?? "";
        const subsystem = envelope?.subsystem ?? "";
        this.logger.debug(
          `Fault ${outcome.fault} for ${connection.identity ?? connection.id}: ${outcome.detail}`,
        );
        if (subsystem === "rpc") {
          this.sendRpcFault(connection, messageId, outcome.fault, outcome.detail);
        } else {
          this.sendError(connection, messageId, subsystem, outcome.fault, outcome.detail);
        }
        return;
      }
    }
  }

  // -------------------------------------------------------------------------
  // Delivery
  // -------------------------------------------------------------------------

  private deliver(identity: string, envelope: Envelope, droppable: boolean): boolean {
    const connection = this.connectionOf(identity);
    if (!connection) return false;
    return this.enqueueFrame(connection, envelope, droppable);
  }

  private enqueueFrame(connection: Connection, envelope: Envelope, droppable: boolean): boolean {
    if (connection.state === "closed") return false;
    if (!connection.outbox.push(encodeEnvelope(envelope), droppable)) {
      this.logger.warn(
        `Outbound queue for "${connection.identity ?? connection.id}" is full, dropped ${envelope.subsystem} ${envelope.messageId}`,
      );
      return false;
    }
    this.dirty.add(connection);
    return true;
  }

  private flushDirty(): void {
    for (const connection of this.dirty) {
      this.flush(connection);
    }
    this.dirty.clear();
  }

  private flush(connection: Connection): void {
    const { outbox, transport } = connection;
    while (!outbox.isEmpty && transport.canSend(connection.id)) {
      const data = outbox.shift();
      if (data === undefined || !transport.send(connection.id, data)) return;
    }
  }

  private broadcast(message: BusMessage, except?: Connection): void {
    for (const connection of this.connections.values()) {
      if (connection === except || connection.state !== "admitted" || !connection.identity) {
        continue;
      }
      const envelope = this.fromRouter(connection.identity, this.nextMessageId(), message);
      this.enqueueFrame(connection, envelope, false);
    }
  }

  private sendError(
    connection: Connection,
    messageId: string,
    subsystem: string,
    kind: FaultKind,
    detail: string,
  ): void {
    const envelope = this.fromRouter(connection.identity ?? "", messageId || this.nextMessageId(), {
      kind: "error.fault",
      fault: kind,
      detail,
      subsystem,
    });
    this.enqueueFrame(connection, envelope, false);
  }

  private sendRpcFault(
    connection: Connection,
    messageId: string,
    kind: FaultKind,
    detail: string,
  ): void {
    const envelope = this.fromRouter(connection.identity ?? "", messageId, {
      kind: "rpc.fault",
      fault: kind,
      detail,
    });
    this.enqueueFrame(connection, envelope, false);
  }

  private fromRouter(recipient: string, messageId: string, message: BusMessage): Envelope {
    return toEnvelope(
      { sender: this.config.identity, recipient, userId: this.config.identity, messageId },
      message,
    );
  }

  private connectionOf(identity: string): Connection | undefined {
    const route = this.table.lookup(identity);
    if (!route) return undefined;
    const connection = this.connections.get(route.connectionId);
    return connection?.state === "admitted" ? connection : undefined;
  }

  // -------------------------------------------------------------------------
  // Teardown
  // -------------------------------------------------------------------------

  /**
   * Remove a connection and everything hanging off its identity, in one
   * step: route, subscriptions, pending calls, session, then a peerlist
   * drop broadcast.
   */
  private teardown(connection: Connection, reason: string): void {
    if (connection.state === "closed") return;
    const identity = connection.state === "admitted" ? connection.identity : undefined;
    connection.state = "closed";
    this.connections.delete(connection.id);
    this.dirty.delete(connection);
    connection.outbox.clear();
    connection.buffered.length = 0;

    if (identity !== undefined) {
      this.cascade(identity, connection.id, reason);
    }
    connection.transport.close(connection.id, reason);
  }

  private cascade(identity: string, connectionId: string, reason: string): void {
    this.table.unregister(identity, connectionId);
    this.subscriptions.removeAll(identity);
    const { asCallee, asCaller } = this.calls.cancelFor(identity);
    for (const call of asCallee) {
      this.failCall(call, "peer-unavailable", `"${identity}" disconnected before replying`);
    }
    if (asCaller.length > 0) {
      this.logger.debug(`Discarded ${asCaller.length} call(s) awaited by "${identity}"`);
    }
    this.gate.release(identity);
    this.broadcast({ kind: "peerlist.drop", identity });
    this.logger.info(`"${identity}" departed: ${reason}`);
    this.events.emit("departed", identity, reason);
  }

  /**
   * Tear down a route that stopped answering heartbeats.
   */
  private evict(route: Route): void {
    const connection = this.connections.get(route.connectionId);
    if (connection) {
      this.teardown(connection, "Heartbeat timeout");
    } else {
      this.cascade(route.identity, route.connectionId, "Heartbeat timeout");
    }
  }

  private failCall(call: PendingCall, kind: FaultKind, detail: string): void {
    const caller = this.connectionOf(call.caller);
    if (caller) this.sendRpcFault(caller, call.messageId, kind, detail);
  }

  // -------------------------------------------------------------------------
  // Sweep
  // -------------------------------------------------------------------------

  private startSweep(): void {
    this.sweepTimer = setInterval(() => {
      this.enqueue(() => this.sweep());
    }, this.config.sweepInterval);
  }

  private stopSweep(): void {
    if (this.sweepTimer !== undefined) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = undefined;
    }
  }

  private sweep(): void {
    const now = this.now();
    for (const call of this.calls.expire()) {
      this.failCall(
        call,
        "timeout",
        `Call to ${call.callee}.${call.method} timed out after ${call.deadline - call.createdAt}ms`,
      );
    }

    const handshakeDeadline = 2 * this.config.heartbeatInterval;
    for (const connection of [...this.connections.values()]) {
      if (connection.state !== "admitted" && now - connection.openedAt > handshakeDeadline) {
        this.teardown(connection, "Handshake timed out");
      }
    }

    for (const connection of this.connections.values()) {
      if (!connection.outbox.isEmpty) this.dirty.add(connection);
    }
  }

  private ping(route: Route): void {
    const connection = this.connections.get(route.connectionId);
    if (connection?.state !== "admitted") return;
    this.enqueueFrame(
      connection,
      this.fromRouter(route.identity, this.nextMessageId(), {
        kind: "heartbeat.ping",
        timestamp: this.now(),
      }),
      false,
    );
  }

  // -------------------------------------------------------------------------
  // Fatal Errors
  // -------------------------------------------------------------------------

  /**
   * Handle an error that leaves routing state untrustworthy: drop queued
   * tasks, close every connection without cascading, then stop.
   */
  private fail(err: unknown): void {
    if (this.failed) return;
    this.failed = true;
    this.inbound.length = 0;
    this.dirty.clear();

    const error = toError(err);
    this.logger.error(`Fatal routing error: ${error.message}`, error);
    for (const connection of [...this.connections.values()]) {
      connection.state = "closed";
      connection.transport.close(connection.id, "Router failed");
    }
    this.connections.clear();
    this.events.emit("fatal", error);

    this.stop().catch((stopErr: unknown) => {
      this.logger.error(`Failed to stop after a fatal error: ${getErrorMessage(stopErr)}`);
    });
  }
}
