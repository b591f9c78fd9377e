import type { FaultKind } from '@faultline/domain';

export type FailureCategory =
  | 'runtime'
  | 'application'
  | 'resource_exhaustion'
  | 'timeout'
  | 'chaos_timeout'
  | 'invalid_value'
  | 'data_corruption';

/** Broad category each category narrows; `null` marks a root. */
const CATEGORY_PARENT: Record<FailureCategory, FailureCategory | null> = {
  runtime: null,
  application: 'runtime',
  resource_exhaustion: 'runtime',
  timeout: null,
  chaos_timeout: 'timeout',
  invalid_value: null,
  data_corruption: 'invalid_value',
};

export function categoryIncludes(broad: FailureCategory, narrow: FailureCategory): boolean {
  let current: FailureCategory | null = narrow;
  while (current !== null) {
    if (current === broad) return true;
    current = CATEGORY_PARENT[current];
  }
  return false;
}

/** Base class of every failure the injector produces on purpose. */
export abstract class SimulatedFailure extends Error {
  abstract readonly kind: FaultKind;
  abstract readonly category: FailureCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export function isSimulatedFailure(err: unknown): err is SimulatedFailure {
  return err instanceof SimulatedFailure;
}

/** True if `err` is a simulated failure whose category is `category` or narrower. */
export function isInCategory(err: unknown, category: FailureCategory): boolean {
  return isSimulatedFailure(err) && categoryIncludes(category, err.category);
}

export class ChaosError extends SimulatedFailure {
  readonly kind = 'error' as const;
  readonly category = 'application' as const;

  constructor(
    readonly errorCode: number,
    message: string,
  ) {
    super(`[${errorCode}] ${message}`);
  }
}

export abstract class TimeoutFailure extends SimulatedFailure {}

export class ChaosTimeoutError extends TimeoutFailure {
  readonly kind = 'timeout' as const;
  readonly category = 'chaos_timeout' as const;

  constructor(message = 'Simulated timeout injected by fault injector.') {
    super(message);
  }
}

export class PartialFailureError extends SimulatedFailure {
  readonly kind = 'partial_failure' as const;
  readonly category = 'runtime' as const;

  constructor(message: string) {
    super(`[partial_failure] ${message}`);
  }
}

export class ResourceExhaustedError extends SimulatedFailure {
  readonly kind = 'resource_exhaustion' as const;
  readonly category = 'resource_exhaustion' as const;

  constructor(message: string) {
    super(`[resource_exhaustion] ${message}`);
  }
}

export abstract class InvalidValueFailure extends SimulatedFailure {}

export class DataCorruptionError extends InvalidValueFailure {
  readonly kind = 'data_corruption' as const;
  readonly category = 'data_corruption' as const;

  constructor(message: string) {
    super(`[data_corruption] ${message}`);
  }
}

// ─── Caller errors ────────────────────────────────────────────────────────────
// `status` is picked up by the HTTP error handler.

/** A fault spec is missing a field its kind requires. Never counted as a fault. */
export class ConfigurationError extends Error {
  readonly status = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ExperimentNotFoundError extends Error {
  readonly status = 404;

  constructor(readonly experimentId: string) {
    super(`experiment not found: ${experimentId}`);
    this.name = 'ExperimentNotFoundError';
  }
}

export class ExperimentAlreadyRunningError extends Error {
  readonly status = 409;

  constructor(readonly experimentId: string) {
    super(`experiment already running: ${experimentId}`);
    this.name = 'ExperimentAlreadyRunningError';
  }
}

/** Details recorded for a failure in an observation. */
export function describeFailure(err: unknown): {
  errorType: string;
  category: FailureCategory | null;
  message: string;
} {
  if (isSimulatedFailure(err)) {
    return { errorType: err.name, category: err.category, message: err.message };
  }
  if (err instanceof Error) {
    return { errorType: err.name, category: null, message: err.message };
  }
  return { errorType: typeof err, category: null, message: String(err) };
}
