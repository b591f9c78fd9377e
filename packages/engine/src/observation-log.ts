import type { ClockPort, Observation } from '@faultline/domain';
import { describeFailure } from './errors.js';

const wallClock: Pick<ClockPort, 'now'> = { now: () => new Date() };

/**
 * Append-only log of timestamped observations for a single run.
 *
 * Every mutation and snapshot completes synchronously, so on the event loop
 * concurrent callers never observe a half-applied update.
 */
export class ObservationLog {
  private entries: Observation[] = [];

  constructor(private readonly clock: Pick<ClockPort, 'now'> = wallClock) {}

  get size(): number {
    return this.entries.length;
  }

  record(target: string, event: string, details: Record<string, unknown> = {}): Observation {
    const observation: Observation = {
      timestamp: this.clock.now(),
      target,
      event,
      details: { ...details },
    };
    this.entries.push(observation);
    return observation;
  }

  /** Independent copy of the log, in record order. */
  snapshot(): Observation[] {
    return this.entries.map((entry) => ({ ...entry, details: { ...entry.details } }));
  }

  clear(): void {
    this.entries = [];
  }

  /**
   * Records `start` before `work` and `end` after it, or `error` if it
   * throws. The thrown value is rethrown unchanged.
   *
   * @example
   * ```typescript
   * const rows = await log.scoped('database', () => runQuery(sql), 'query');
   * // records query_start, then query_end or query_error
   * ```
   */
  async scoped<T>(target: string, work: () => T | Promise<T>, eventPrefix = ''): Promise<T> {
    const prefix = eventPrefix ? `${eventPrefix}_` : '';
    this.record(target, `${prefix}start`);
    let value: T;
    try {
      value = await work();
    } catch (err) {
      this.record(target, `${prefix}error`, describeFailure(err));
      throw err;
    }
    this.record(target, `${prefix}end`);
    return value;
  }
}
