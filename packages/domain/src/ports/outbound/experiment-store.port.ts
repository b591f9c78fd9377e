import type { ExperimentDef, RunResult } from '../../entities/experiment.js';

/**
 * Storage for experiment definitions and the latest result per experiment.
 * Calls are synchronous so a scheduler operation never yields halfway
 * through a read-modify-write.
 */
export interface ExperimentStorePort {
  saveDefinition(def: ExperimentDef): void;
  findDefinition(experimentId: string): ExperimentDef | null;
  listDefinitions(): ExperimentDef[];
  saveResult(experimentId: string, result: RunResult): void;
  findResult(experimentId: string): RunResult | null;
  deleteResult(experimentId: string): void;
}
