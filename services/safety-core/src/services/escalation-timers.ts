/**
 * Acknowledgment timers for crises in NOTIFYING.
 *
 * Each schedule() issues a fresh token for the crisis. The expiry callback
 * receives that token, and the escalation service checks it is still current
 * before acting; a cancelled or superseded timer is therefore a no-op even if
 * its callback was already queued.
 */

export type TimerExpiryHandler = (crisisId: string, token: number) => void;

interface ActiveTimer {
  token: number;
  handle: NodeJS.Timeout;
}

export class EscalationTimers {
  private readonly active = new Map<string, ActiveTimer>();
  private nextToken = 1;

  constructor(
    private readonly timeoutMs: number,
    private readonly onExpire: TimerExpiryHandler
  ) {}

  schedule(crisisId: string): number {
    this.cancel(crisisId);

    const token = this.nextToken++;
    const handle = setTimeout(() => {
      this.onExpire(crisisId, token);
    }, this.timeoutMs);
    // Pending escalations must not keep the process alive on shutdown
    handle.unref();

    this.active.set(crisisId, { token, handle });
    return token;
  }

  cancel(crisisId: string): boolean {
    const timer = this.active.get(crisisId);
    if (!timer) {
      return false;
    }
    clearTimeout(timer.handle);
    this.active.delete(crisisId);
    return true;
  }

  /** True while `token` is the live timer for the crisis. */
  isCurrent(crisisId: string, token: number): boolean {
    return this.active.get(crisisId)?.token === token;
  }

  /** Forget a fired timer once its expiry has been handled. */
  release(crisisId: string, token: number): void {
    if (this.isCurrent(crisisId, token)) {
      this.active.delete(crisisId);
    }
  }

  cancelAll(): void {
    for (const timer of this.active.values()) {
      clearTimeout(timer.handle);
    }
    this.active.clear();
  }

  get size(): number {
    return this.active.size;
  }
}
