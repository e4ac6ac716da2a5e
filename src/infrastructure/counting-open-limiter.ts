import type { OpenLimiterPort } from '../application/ports/open-limiter.port';

/**
 * Hands out at most `maxOpen` slots at a time. Waiters are served in the
 * order they called `acquire`.
 */
export class CountingOpenLimiter implements OpenLimiterPort {
  private active = 0;
  private readonly waiting: Array<() => void> = [];

  public constructor(private readonly maxOpen: number) {
    if (!Number.isInteger(maxOpen) || maxOpen < 1) {
      throw new RangeError(`Open file limit must be a positive integer, got ${maxOpen}`);
    }
  }

  public get activeCount(): number {
    return this.active;
  }

  public get waitingCount(): number {
    return this.waiting.length;
  }

  public acquire(): Promise<void> {
    if (this.active < this.maxOpen) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.waiting.push(() => resolve());
    });
  }

  public release(): void {
    if (this.active === 0) {
      throw new Error('release() called without a matching acquire()');
    }

    // Hand the slot straight to the next waiter; the active count stays the same
    const next = this.waiting.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}
