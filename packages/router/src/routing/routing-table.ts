import { ConflictError } from "@interconnect/errors";
import { mapDelete, mapSet, mapUpdate } from "../utils/immutable-map.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * A live binding of an identity to a transport connection.
 */
export interface Route {
  readonly identity: string;
  readonly connectionId: string;
  /** Name of the transport that owns the connection ("ws", "inproc", "broker") */
  readonly transport: string;
  readonly registeredAt: number;
  /** Last time any frame arrived from the connection */
  readonly lastSeen: number;
  /** Number of frames accepted from the connection since admission */
  readonly sequence: number;
}

export interface RouteBinding {
  readonly connectionId: string;
  readonly transport: string;
}

export interface RoutingTableOptions {
  /** Heartbeat interval in ms; a route silent for two intervals is dead */
  readonly heartbeatInterval: number;
  readonly now?: () => number;
}

// ---------------------------------------------------------------------------
// RoutingTable
// ---------------------------------------------------------------------------

/**
 * identity → route, with a reverse index connectionId → identity.
 *
 * Both maps are immutable snapshots replaced on every mutation, so a caller
 * iterating `all()` never observes a half-applied change.
 */
export class RoutingTable {
  private routes: ReadonlyMap<string, Route> = new Map();
  private byConnection: ReadonlyMap<string, string> = new Map();
  private interval: number;
  private readonly now: () => number;

  constructor(options: RoutingTableOptions) {
    this.interval = options.heartbeatInterval;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Bind an identity to a connection.
   *
   * Returns the route that was replaced, if the identity was held by a dead
   * connection; the caller cascades that route's state away. Throws
   * ROUTING_IDENTITY_IN_USE when the identity is held by a live connection.
   */
  register(identity: string, binding: RouteBinding): Route | undefined {
    const prior = this.routes.get(identity);
    if (prior && !this.isDead(prior)) {
      throw new ConflictError({
        code: "ROUTING_IDENTITY_IN_USE",
        message: `Identity "${identity}" is held by live connection ${prior.connectionId}`,
        metadata: { identity, connectionId: prior.connectionId },
      });
    }

    const now = this.now();
    const route: Route = {
      identity,
      connectionId: binding.connectionId,
      transport: binding.transport,
      registeredAt: now,
      lastSeen: now,
      sequence: 0,
    };

    let byConnection = this.byConnection;
    if (prior) {
      byConnection = mapDelete(byConnection, prior.connectionId);
    }
    this.byConnection = mapSet(byConnection, binding.connectionId, identity);
    this.routes = mapSet(this.routes, identity, route);
    return prior;
  }

  /**
   * Remove an identity's route. With a connectionId, only removes the route
   * if it still belongs to that connection.
   */
  unregister(identity: string, connectionId?: string): Route | undefined {
    const route = this.routes.get(identity);
    if (!route) return undefined;
    if (connectionId !== undefined && route.connectionId !== connectionId) return undefined;
    this.routes = mapDelete(this.routes, identity);
    this.byConnection = mapDelete(this.byConnection, route.connectionId);
    return route;
  }

  lookup(identity: string): Route | undefined {
    return this.routes.get(identity);
  }

  lookupConnection(connectionId: string): Route | undefined {
    const identity = this.byConnection.get(connectionId);
    return identity === undefined ? undefined : this.routes.get(identity);
  }

  /**
   * Record an inbound frame: refreshes liveness and advances the sequence.
   */
  touch(identity: string): Route | undefined {
    const now = this.now();
    this.routes = mapUpdate(this.routes, identity, (route) => ({
      ...route,
      lastSeen: now,
      sequence: route.sequence + 1,
    }));
    return this.routes.get(identity);
  }

  isDead(route: Route): boolean {
    return this.now() - route.lastSeen > 2 * this.interval;
  }

  findDead(): readonly Route[] {
    return [...this.routes.values()].filter((route) => this.isDead(route));
  }

  /** Admitted identities in lexical order */
  identities(): readonly string[] {
    return [...this.routes.keys()].sort();
  }

  all(): readonly Route[] {
    return [...this.routes.values()];
  }

  get size(): number {
    return this.routes.size;
  }

  get heartbeatInterval(): number {
    return this.interval;
  }

  set heartbeatInterval(value: number) {
    this.interval = value;
  }

  clear(): void {
    this.routes = new Map();
    this.byConnection = new Map();
  }
}
