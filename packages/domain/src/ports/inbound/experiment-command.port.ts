import type {
  ExperimentDef,
  ExperimentDefInput,
  ExperimentListing,
  RunResult,
  RunStatus,
} from '../../entities/experiment.js';

export interface ExperimentCommandPort {
  schedule(def: ExperimentDefInput): string;
  /** Throws synchronously when the run cannot start. */
  start(experimentId: string): Promise<RunResult>;
  run(experimentId: string): Promise<RunResult>;
  abort(experimentId: string): void;
  getDefinition(experimentId: string): ExperimentDef | null;
  getResult(experimentId: string): RunResult | null;
  getStatus(experimentId: string): RunStatus | null;
  list(): ExperimentListing[];
}
