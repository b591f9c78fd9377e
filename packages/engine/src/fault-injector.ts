import { setTimeout as delay } from 'node:timers/promises';
import type { FaultInjectionPort, FaultSpec, RandomSourcePort } from '@faultline/domain';
import {
  ChaosError,
  ChaosTimeoutError,
  ConfigurationError,
  DataCorruptionError,
  PartialFailureError,
  ResourceExhaustedError,
} from './errors.js';

/** A fault spec with every field its kind needs filled in. */
export type ResolvedFault =
  | { kind: 'latency'; durationMs: number }
  | { kind: 'error'; errorCode: number; message: string }
  | { kind: 'timeout' }
  | { kind: 'partial_failure'; message: string }
  | { kind: 'resource_exhaustion'; message: string }
  | { kind: 'data_corruption'; message: string };

/**
 * Checks the fields `spec.kind` requires and applies message defaults.
 * Throws a ConfigurationError when a required field is missing.
 */
export function resolveFault(spec: FaultSpec): ResolvedFault {
  switch (spec.kind) {
    case 'latency':
      if (spec.durationMs === undefined) {
        throw new ConfigurationError('latency fault requires durationMs');
      }
      return { kind: 'latency', durationMs: spec.durationMs };
    case 'error':
      if (spec.errorCode === undefined) {
        throw new ConfigurationError('error fault requires errorCode');
      }
      return { kind: 'error', errorCode: spec.errorCode, message: spec.errorMessage || 'Injected error' };
    case 'timeout':
      return { kind: 'timeout' };
    case 'partial_failure':
      return { kind: 'partial_failure', message: spec.errorMessage || 'Partial failure' };
    case 'resource_exhaustion':
      return { kind: 'resource_exhaustion', message: spec.errorMessage || 'Resource exhausted' };
    case 'data_corruption':
      return { kind: 'data_corruption', message: spec.errorMessage || 'Data corrupted' };
    default:
      return assertNever(spec.kind);
  }
}

function assertNever(value: never): never {
  throw new ConfigurationError(`unknown fault kind: ${String(value)}`);
}

const mathRandom: RandomSourcePort = { next: () => Math.random() };

export interface FaultInjectorOptions {
  random?: RandomSourcePort;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Decides whether a fault fires and applies it.
 *
 * Latency is awaited; every other kind throws a SimulatedFailure subclass
 * that the injector never catches.
 *
 * @example
 * ```typescript
 * const injector = new FaultInjector({ random: new SeededRng(7) });
 * await injector.inject(createFaultSpec({ kind: 'error', probability: 0.2, errorCode: 503 }));
 * ```
 */
export class FaultInjector implements FaultInjectionPort {
  private readonly random: RandomSourcePort;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(options: FaultInjectorOptions = {}) {
    this.random = options.random ?? mathRandom;
    this.sleep = options.sleep ?? ((ms) => delay(ms));
  }

  shouldFire(probability: number): boolean {
    // The extremes never consult the random source.
    if (probability <= 0) return false;
    if (probability >= 1) return true;
    return this.random.next() < probability;
  }

  async fireLatency(durationMs: number): Promise<void> {
    await this.sleep(durationMs);
  }

  fireError(errorCode: number, message: string): never {
    throw new ChaosError(errorCode, message);
  }

  fireTimeout(): never {
    throw new ChaosTimeoutError();
  }

  firePartialFailure(message = 'Partial failure'): never {
    throw new PartialFailureError(message);
  }

  fireResourceExhaustion(message = 'Resource exhausted'): never {
    throw new ResourceExhaustedError(message);
  }

  fireDataCorruption(message = 'Data corrupted'): never {
    throw new DataCorruptionError(message);
  }

  /**
   * Injects at most one fault for `spec`. Configuration errors are raised
   * before the probability gate, so they surface even at probability 0.
   */
  async inject(spec: FaultSpec): Promise<boolean> {
    const fault = resolveFault(spec);
    if (!this.shouldFire(spec.probability)) return false;

    switch (fault.kind) {
      case 'latency':
        await this.fireLatency(fault.durationMs);
        return true;
      case 'error':
        return this.fireError(fault.errorCode, fault.message);
      case 'timeout':
        return this.fireTimeout();
      case 'partial_failure':
        return this.firePartialFailure(fault.message);
      case 'resource_exhaustion':
        return this.fireResourceExhaustion(fault.message);
      case 'data_corruption':
        return this.fireDataCorruption(fault.message);
    }
  }
}
