import type { FaultKind } from "@interconnect/errors";
import type { BusMessage, Envelope } from "@interconnect/protocol";
import type { AuthGate } from "../auth/auth-gate.js";
import type { Logger } from "../logger.js";
import type { SubscriptionTree } from "../pubsub/subscription-tree.js";
import type { RoutingTable } from "../routing/routing-table.js";
import type { RpcCorrelator } from "../rpc/rpc-correlator.js";

// ---------------------------------------------------------------------------
// Outcome
// ---------------------------------------------------------------------------

/**
 * Result of dispatching one frame. The router applies it after the handler
 * returns: a fault is sent to the sender, a close tears the connection down.
 */
export type Outcome =
  | { readonly kind: "ok" }
  | { readonly kind: "fault"; readonly fault: FaultKind; readonly detail: string }
  | { readonly kind: "close"; readonly reason: string }
  | { readonly kind: "deferred" };

export const OK: Outcome = { kind: "ok" };
export const DEFERRED: Outcome = { kind: "deferred" };

export function fault(kind: FaultKind, detail: string): Outcome {
  return { kind: "fault", fault: kind, detail };
}

export function close(reason: string): Outcome {
  return { kind: "close", reason };
}

// ---------------------------------------------------------------------------
// Dispatch Context
// ---------------------------------------------------------------------------

/** The admitted connection a frame arrived on */
export interface SenderInfo {
  readonly identity: string;
  /** Stamped into the userId field of everything the sender routes */
  readonly userId: string;
  readonly connectionId: string;
}

/**
 * Router state a subsystem handler may read and mutate. Handlers run inside
 * the dispatch loop and must not await.
 */
export interface DispatchContext {
  readonly sender: SenderInfo;
  readonly gate: AuthGate;
  readonly table: RoutingTable;
  readonly subscriptions: SubscriptionTree;
  readonly calls: RpcCorrelator;
  readonly logger: Logger;
  /**
   * Queue an envelope on an identity's outbound queue.
   * Returns false when the identity has no route or a droppable envelope
   * was refused by a full queue.
   */
  deliver(identity: string, envelope: Envelope, droppable: boolean): boolean;
  /** Answer the sender from the router, echoing the message id */
  reply(envelope: Envelope, message: BusMessage): void;
}

export type SubsystemHandler = (
  message: BusMessage,
  envelope: Envelope,
  ctx: DispatchContext,
) => Outcome;
