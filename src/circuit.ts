export type BreakerState = 'ok' | 'open' | 'half-open';

export type BreakerOptions = {
  threshold?: number;   // consecutive failures before opening
  cooldownMs?: number;
  closeAfter?: number;  // successes needed after cooldown to fully close
  clock?: () => number;
};

export class Breaker {
  private fails = 0;
  private openedUntil = 0;
  private successStreak = 0;
  private tripped = false;
  private lastTransitionTs: number;
  private readonly threshold: number;
  private readonly cooldownMs: number;
  private readonly closeAfter: number;
  private readonly clock: () => number;

  constructor(o: BreakerOptions = {}) {
    this.threshold = Math.max(1, o.threshold ?? 3);
    this.cooldownMs = o.cooldownMs ?? 60_000;
    this.closeAfter = Math.max(1, o.closeAfter ?? 3);
    this.clock = o.clock ?? Date.now;
    this.lastTransitionTs = this.clock();
  }

  allow(): boolean { return this.clock() >= this.openedUntil; }

  // also counts a forced request that got through while open
  success(): void {
    this.fails = 0;
    if (!this.tripped) return;
    this.successStreak++;
    if (this.successStreak >= this.closeAfter) {
      this.tripped = false;
      this.successStreak = 0;
      this.openedUntil = 0;
      this.lastTransitionTs = this.clock();
    }
  }

  fail(): void {
    this.fails += 1;
    // once tripped, any failure re-arms the cooldown
    if (this.fails >= this.threshold || this.tripped) {
      this.openedUntil = this.clock() + this.cooldownMs;
      this.tripped = true;
      this.successStreak = 0;
      this.fails = 0;
      this.lastTransitionTs = this.clock();
    }
  }

  state(): BreakerState {
    if (!this.allow()) return 'open';
    return this.tripped ? 'half-open' : 'ok';
  }

  /** When the breaker next admits requests (0 when closed). */
  retryAt(): number { return this.openedUntil; }

  lastTransitionAt(): number { return this.lastTransitionTs; }
}
