import type { FaultKind, FaultSpec, FaultSpecInput } from './fault.js';
import type { Observation } from './observation.js';

export const RUN_STATUSES = ['pending', 'running', 'completed', 'aborted'] as const;

export type RunStatus = (typeof RUN_STATUSES)[number];

export interface ExperimentDef {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly faultSpecs: readonly FaultSpec[];
  readonly durationSeconds: number;
  readonly defaultTargets: readonly string[];
}

export interface ExperimentDefInput {
  /** Left empty to have an id generated at registration. */
  readonly id?: string;
  readonly name: string;
  readonly description?: string;
  readonly faultSpecs?: readonly FaultSpecInput[];
  readonly durationSeconds?: number;
  readonly defaultTargets?: readonly string[];
}

export type FaultCounts = Partial<Record<FaultKind, number>>;

export interface RunSummary {
  /** Always the sum of `faultsByKind`. */
  readonly totalFaultsFired: number;
  readonly faultsByKind: FaultCounts;
  readonly errorsByKind: FaultCounts;
  readonly durationSeconds: number;
}

export interface RunResult {
  readonly definition: ExperimentDef;
  readonly status: RunStatus;
  readonly startTime: Date;
  readonly endTime?: Date;
  readonly observations: readonly Observation[];
  readonly summary: RunSummary;
}

export interface ExperimentListing {
  readonly definition: ExperimentDef;
  readonly status: RunStatus;
}
