import { setTimeout as delay } from 'node:timers/promises';
import type { ClockPort, RandomSourcePort } from '@faultline/domain';

/**
 * Seedable pseudo-random number generator (mulberry32).
 * Gives the fault injector a reproducible firing sequence.
 */
export class SeededRng implements RandomSourcePort {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Returns a float in [0, 1). */
  next(): number {
    this.state += 0x6d2b79f5;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 0x100000000;
  }
}

interface PendingCallback {
  atMs: number;
  callback: () => void;
}

/**
 * Virtual-time clock. `sleep` advances time immediately instead of waiting,
 * so a 60-second experiment finishes in a few microtasks.
 */
export class DeterministicClock implements ClockPort {
  private elapsedMs = 0;
  private pending: PendingCallback[] = [];

  constructor(private readonly epochMs: number = Date.UTC(2026, 0, 1)) {}

  now(): Date {
    return new Date(this.epochMs + this.elapsedMs);
  }

  monotonicMs(): number {
    return this.elapsedMs;
  }

  advance(ms: number): void {
    this.elapsedMs += ms;
    const due = this.pending.filter((p) => p.atMs <= this.elapsedMs);
    this.pending = this.pending.filter((p) => p.atMs > this.elapsedMs);
    due.sort((a, b) => a.atMs - b.atMs).forEach((p) => p.callback());
  }

  async sleep(ms: number): Promise<void> {
    this.advance(ms);
    // Yield so other runs sharing the event loop get a turn.
    await Promise.resolve();
  }

  /** Runs `callback` once virtual time reaches `offsetMs` since the clock was created. */
  at(offsetMs: number, callback: () => void): void {
    if (offsetMs <= this.elapsedMs) {
      callback();
      return;
    }
    this.pending.push({ atMs: offsetMs, callback });
  }
}

/** Wall-clock implementation. */
export class SystemClock implements ClockPort {
  now(): Date {
    return new Date();
  }

  monotonicMs(): number {
    return performance.now();
  }

  async sleep(ms: number): Promise<void> {
    await delay(ms);
  }
}
