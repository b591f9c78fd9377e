export interface ClockPort {
  /** Current UTC instant, used for observation and run timestamps. */
  now(): Date;
  /** Monotonic milliseconds, used for elapsed-time and deadline arithmetic. */
  monotonicMs(): number;
  sleep(ms: number): Promise<void>;
}
