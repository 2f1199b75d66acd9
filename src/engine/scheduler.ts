import type pino from "pino";

export type TimerCategory = "settle" | "focus" | "submit" | "cooldown" | "dismiss" | "timeout";

interface PendingTimer {
  handle: ReturnType<typeof setTimeout>;
  token: number;
}

/**
 * Delayed callbacks keyed by category, at most one pending per category.
 * Scheduling a category replaces (cancels) its pending callback, so a superseded
 * callback can never run against newer state.
 */
export class TimerRegistry {
  private readonly pending = new Map<TimerCategory, PendingTimer>();
  private nextToken = 1;

  constructor(private readonly logger: pino.Logger) {}

  replace(category: TimerCategory, delayMs: number, fn: () => void): void {
    this.cancel(category);
    const token = this.nextToken++;
    const handle = setTimeout(() => {
      const current = this.pending.get(category);
      if (!current || current.token !== token) return;
      this.pending.delete(category);
      try {
        fn();
      } catch (err) {
        this.logger.error({ err, category }, "Timer callback failed");
      }
    }, delayMs);
    this.pending.set(category, { handle, token });
  }

  cancel(category: TimerCategory): boolean {
    const current = this.pending.get(category);
    if (!current) return false;
    clearTimeout(current.handle);
    this.pending.delete(category);
    return true;
  }

  cancelAll(): void {
    for (const { handle } of this.pending.values()) clearTimeout(handle);
    this.pending.clear();
  }

  isPending(category: TimerCategory): boolean {
    return this.pending.has(category);
  }

  get size(): number {
    return this.pending.size;
  }
}
