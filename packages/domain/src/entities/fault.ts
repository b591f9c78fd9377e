export const FAULT_KINDS = [
  'latency',
  'error',
  'timeout',
  'partial_failure',
  'resource_exhaustion',
  'data_corruption',
] as const;

export type FaultKind = (typeof FAULT_KINDS)[number];

/**
 * Declarative description of one injectable fault.
 *
 * Kind-specific fields are optional here; `durationMs` (latency) and
 * `errorCode` (error) are only checked when the spec is injected.
 */
export interface FaultSpec {
  readonly kind: FaultKind;
  /** Chance in [0, 1] that the fault fires on a single injection. */
  readonly probability: number;
  readonly durationMs?: number;
  readonly errorCode?: number;
  readonly errorMessage?: string;
  readonly affectedTargets: readonly string[];
}

/** Caller-facing shape of a fault spec before defaults are applied. */
export interface FaultSpecInput {
  readonly kind: FaultKind;
  readonly probability?: number;
  readonly durationMs?: number;
  readonly errorCode?: number;
  readonly errorMessage?: string;
  readonly affectedTargets?: readonly string[];
}
