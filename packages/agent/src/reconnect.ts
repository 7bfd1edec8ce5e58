import type { ReconnectConfig } from "./types.js";

// ---------------------------------------------------------------------------
// ReconnectStrategy
// ---------------------------------------------------------------------------

/**
 * Exponential backoff with full jitter:
 *   delay = random() * min(maxDelay, baseDelay * 2^attempt)
 *
 * Spreads agents out when a router restarts and every link drops at once.
 */
export class ReconnectStrategy {
  private readonly config: ReconnectConfig;
  private readonly random: () => number;
  private currentAttempt = 0;
  private pendingTimer: ReturnType<typeof setTimeout> | undefined;

  constructor(config: ReconnectConfig, random: () => number = Math.random) {
    this.config = config;
    this.random = random;
  }

  /**
   * Next delay; advances the attempt counter.
   */
  nextDelay(): number {
    const { baseDelay, maxDelay } = this.config;
    const cap = Math.min(maxDelay, baseDelay * 2 ** this.currentAttempt);
    this.currentAttempt += 1;
    return this.random() * cap;
  }

  /** Call once a handshake succeeds. */
  reset(): void {
    this.currentAttempt = 0;
    this.cancel();
  }

  get exhausted(): boolean {
    return this.currentAttempt >= this.config.maxRetries;
  }

  get attempt(): number {
    return this.currentAttempt;
  }

  get isPending(): boolean {
    return this.pendingTimer !== undefined;
  }

  /**
   * Run `fn` after the next backoff delay, replacing any attempt already
   * scheduled. `fn` handles its own failures.
   */
  schedule(fn: () => Promise<void>): number {
    this.cancel();
    const delay = this.nextDelay();
    this.pendingTimer = setTimeout(() => {
      this.pendingTimer = undefined;
      void fn();
    }, delay);
    return delay;
  }

  cancel(): void {
    if (this.pendingTimer !== undefined) {
      clearTimeout(this.pendingTimer);
      this.pendingTimer = undefined;
    }
  }
}
