/**
 * Fixed one-second window frame counter, keyed by connection.
 */
export class FrameRateLimiter {
  private readonly maxPerSecond: number;
  private readonly now: () => number;
  private readonly windows = new Map<string, { readonly count: number; readonly start: number }>();

  constructor(maxPerSecond: number, now: () => number = () => Date.now()) {
    this.maxPerSecond = maxPerSecond;
    this.now = now;
  }

  /**
   * Count a frame. Returns false when the connection is over its allowance
   * for the current window.
   */
  allow(connectionId: string): boolean {
    const now = this.now();
    const window = this.windows.get(connectionId);

    if (!window || now - window.start >= 1000) {
      this.windows.set(connectionId, { count: 1, start: now });
      return true;
    }
    if (window.count >= this.maxPerSecond) {
      return false;
    }
    this.windows.set(connectionId, { count: window.count + 1, start: window.start });
    return true;
  }

  remove(connectionId: string): void {
    this.windows.delete(connectionId);
  }

  clear(): void {
    this.windows.clear();
  }
}
