import type { FaultKind, FaultSpec } from '@faultline/domain';
import { FaultInjector } from './fault-injector.js';
import { createFaultSpec } from './schemas.js';

export interface WrapOptions {
  /** Injector shared by every call of the wrapped function. */
  injector?: FaultInjector;
}

/**
 * Wraps `fn` so every call first injects each of `specs` in order. A fault
 * that throws propagates to the caller and `fn` does not run.
 */
export function withFaults<A extends unknown[], R>(
  specs: readonly FaultSpec[],
  fn: (...args: A) => R | Promise<R>,
  options: WrapOptions = {},
): (...args: A) => Promise<R> {
  const injector = options.injector ?? new FaultInjector();
  const bound = [...specs];

  return async (...args: A): Promise<R> => {
    for (const spec of bound) {
      await injector.inject(spec);
    }
    return fn(...args);
  };
}

/**
 * Decorator-style form of `withFaults`.
 *
 * @example
 * ```typescript
 * const fetchContext = resilienceTest([
 *   createFaultSpec({ kind: 'latency', probability: 0.5, durationMs: 200 }),
 *   createFaultSpec({ kind: 'error', probability: 0.1, errorCode: 503 }),
 * ])(async (query: string) => search(query));
 * ```
 */
export function resilienceTest(specs: readonly FaultSpec[], options: WrapOptions = {}) {
  const injector = options.injector ?? new FaultInjector();
  return <A extends unknown[], R>(fn: (...args: A) => R | Promise<R>) =>
    withFaults(specs, fn, { injector });
}

export interface ChaosMonkeyOptions extends WrapOptions {
  kind?: FaultKind;
  probability?: number;
  durationMs?: number;
  errorCode?: number;
  errorMessage?: string;
  affectedTargets?: string[];
}

/** Single-fault wrapper that adds 500ms of latency to 10% of calls unless told otherwise. */
export function chaosMonkey(options: ChaosMonkeyOptions = {}) {
  const spec = createFaultSpec({
    kind: options.kind ?? 'latency',
    probability: options.probability ?? 0.1,
    durationMs: options.durationMs ?? 500,
    errorCode: options.errorCode ?? 500,
    errorMessage: options.errorMessage ?? 'Chaos monkey error',
    affectedTargets: options.affectedTargets ?? [],
  });
  return resilienceTest([spec], { injector: options.injector });
}
