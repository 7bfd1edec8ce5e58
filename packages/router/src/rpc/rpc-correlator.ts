import { ConflictError, InternalError } from "@interconnect/errors";
import { mapDelete, mapSet } from "../utils/immutable-map.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface PendingCall {
  readonly messageId: string;
  readonly caller: string;
  readonly callee: string;
  readonly method: string;
  readonly createdAt: number;
  readonly deadline: number;
}

export interface CallRequest {
  readonly messageId: string;
  readonly caller: string;
  readonly callee: string;
  readonly method: string;
  /** Requested timeout in ms; the default applies when absent */
  readonly timeout?: number | undefined;
}

export interface RpcTimeouts {
  readonly defaultTimeout: number;
  readonly maxTimeout: number;
}

export interface CancelledCalls {
  /** Calls the identity was serving; their callers are owed peer-unavailable */
  readonly asCallee: readonly PendingCall[];
  /** Calls the identity was waiting on; nobody is left to answer */
  readonly asCaller: readonly PendingCall[];
}

/**
 * Effective timeout for a call: the requested value clamped to
 * [1, maxTimeout], or the default when none was requested.
 */
export function clampTimeout(requested: number | undefined, timeouts: RpcTimeouts): number {
  if (requested === undefined) return timeouts.defaultTimeout;
  return Math.min(Math.max(requested, 1), timeouts.maxTimeout);
}

// ---------------------------------------------------------------------------
// RpcCorrelator
// ---------------------------------------------------------------------------

/**
 * Router-side table of in-flight calls keyed by message id.
 *
 * Every entry leaves the table exactly once: through `settle` (reply or
 * fault), `expire` (deadline) or `cancelFor` (a party disconnected).
 * Deadlines are evaluated by the caller's periodic sweep, never by
 * per-call timers.
 */
export class RpcCorrelator {
  private calls: ReadonlyMap<string, PendingCall> = new Map();
  private timeouts: RpcTimeouts;
  private readonly now: () => number;

  constructor(timeouts: RpcTimeouts, now: () => number = () => Date.now()) {
    this.timeouts = timeouts;
    this.now = now;
  }

  /**
   * Track a forwarded call. Throws RPC_DUPLICATE_MESSAGE_ID if a call with
   * the same message id is still in flight.
   */
  open(request: CallRequest): PendingCall {
    if (this.calls.has(request.messageId)) {
      throw new ConflictError({
        code: "RPC_DUPLICATE_MESSAGE_ID",
        message: `Call ${request.messageId} is already in flight`,
        metadata: { messageId: request.messageId },
      });
    }
    const createdAt = this.now();
    const call: PendingCall = {
      messageId: request.messageId,
      caller: request.caller,
      callee: request.callee,
      method: request.method,
      createdAt,
      deadline: createdAt + clampTimeout(request.timeout, this.timeouts),
    };
    this.calls = mapSet(this.calls, call.messageId, call);
    return call;
  }

  get(messageId: string): PendingCall | undefined {
    return this.calls.get(messageId);
  }

  /**
   * Resolve a call with its reply or fault.
   * Look the call up with `get` first: settling a call that is no longer
   * pending means it would resolve twice, which is an invariant violation.
   */
  settle(messageId: string): PendingCall {
    const call = this.calls.get(messageId);
    if (!call) {
      throw new InternalError({
        code: "INTERNAL_INVARIANT_VIOLATION",
        message: `Call ${messageId} resolved more than once`,
        metadata: { messageId },
      });
    }
    this.calls = mapDelete(this.calls, messageId);
    return call;
  }

  /**
   * Remove and return every call whose deadline has passed.
   */
  expire(): readonly PendingCall[] {
    const now = this.now();
    const expired = [...this.calls.values()].filter((call) => call.deadline <= now);
    if (expired.length > 0) {
      this.calls = new Map([...this.calls].filter(([, call]) => call.deadline > now));
    }
    return expired;
  }

  /**
   * Remove every call in which the identity takes part.
   */
  cancelFor(identity: string): CancelledCalls {
    const asCallee: PendingCall[] = [];
    const asCaller: PendingCall[] = [];
    for (const call of this.calls.values()) {
      if (call.callee === identity) {
        asCallee.push(call);
      } else if (call.caller === identity) {
        asCaller.push(call);
      }
    }
    if (asCallee.length > 0 || asCaller.length > 0) {
      this.calls = new Map(
        [...this.calls].filter(([, call]) => call.callee !== identity && call.caller !== identity),
      );
    }
    return { asCallee, asCaller };
  }

  /** Apply new default and maximum timeouts to calls opened from now on */
  setTimeouts(timeouts: RpcTimeouts): void {
    this.timeouts = timeouts;
  }

  get size(): number {
    return this.calls.size;
  }

  clear(): void {
    this.calls = new Map();
  }
}
