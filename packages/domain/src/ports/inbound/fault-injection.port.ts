import type { FaultSpec } from '../../entities/fault.js';

export interface FaultInjectionPort {
  shouldFire(probability: number): boolean;
  /** Resolves `true` if the fault fired without throwing, `false` if the gate skipped it. */
  inject(spec: FaultSpec): Promise<boolean>;
}
