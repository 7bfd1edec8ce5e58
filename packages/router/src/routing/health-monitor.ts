import { createEmitter, type Emitter } from "../utils/emitter.js";
import type { Route, RoutingTable } from "./routing-table.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type RouteDeadHandler = (route: Route) => void;
export type PingSender = (route: Route) => void;

type HealthMonitorEvents = {
  "route.dead": [route: Route];
};

// ---------------------------------------------------------------------------
// HealthMonitor
// ---------------------------------------------------------------------------

/**
 * One interval sweeps every route:
 * 1. Routes silent for more than two intervals are reported dead.
 * 2. Every other route is pinged.
 *
 * Liveness itself lives in the RoutingTable: any inbound frame, pong
 * included, refreshes a route's `lastSeen`.
 */
export class HealthMonitor {
  private timer: ReturnType<typeof setInterval> | undefined;
  private readonly events: Emitter<HealthMonitorEvents> = createEmitter();
  private readonly table: RoutingTable;
  private readonly sendPing: PingSender;

  constructor(table: RoutingTable, sendPing: PingSender) {
    this.table = table;
    this.sendPing = sendPing;
  }

  start(): void {
    if (this.timer !== undefined) return;
    this.timer = setInterval(() => this.sweep(), this.table.heartbeatInterval);
  }

  stop(): void {
    if (this.timer !== undefined) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Apply a new heartbeat interval; a running sweep is rescheduled.
   */
  setInterval(interval: number): void {
    this.table.heartbeatInterval = interval;
    if (this.timer !== undefined) {
      this.stop();
      this.start();
    }
  }

  onRouteDead(handler: RouteDeadHandler): () => void {
    return this.events.on("route.dead", handler);
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /** Run one sweep immediately */
  sweep(): void {
    for (const route of this.table.all()) {
      if (this.table.isDead(route)) {
        this.events.emit("route.dead", route);
      } else {
        this.sendPing(route);
      }
    }
  }
}
