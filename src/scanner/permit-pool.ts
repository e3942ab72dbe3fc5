import type { PermitPoolStats } from '../types/scanner.js';

export interface Permit {
  release(): void;
}

/**
 * Bounded pool of permits shared by every connection attempt in a run.
 * Waiters are served in FIFO order.
 */
export class PermitPool {
  private readonly capacity: number;
  private readonly waiters: Array<() => void> = [];
  private inUse = 0;
  private peakInUse = 0;
  private acquired = 0;
  private released = 0;

  constructor(capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Permit pool capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  async acquire(): Promise<Permit> {
    if (this.inUse < this.capacity) {
      this.inUse++;
    } else {
      // A releasing holder hands its slot straight to us
      await new Promise<void>((resolve) => this.waiters.push(resolve));
    }

    this.acquired++;
    this.peakInUse = Math.max(this.peakInUse, this.inUse);

    let held = true;
    return {
      release: () => {
        if (!held) return;
        held = false;
        this.released++;
        const next = this.waiters.shift();
        if (next) {
          next();
        } else {
          this.inUse--;
        }
      },
    };
  }

  /**
   * Run `task` while holding a permit. The permit is released however the
   * task settles.
   */
  async withPermit<T>(task: () => Promise<T>): Promise<T> {
    const permit = await this.acquire();
    try {
      return await task();
    } finally {
      permit.release();
    }
  }

  stats(): PermitPoolStats {
    return {
      capacity: this.capacity,
      inUse: this.inUse,
      peakInUse: this.peakInUse,
      acquired: this.acquired,
      released: this.released,
    };
  }
}
