import type { ExperimentDef, ExperimentStorePort, RunResult } from '@faultline/domain';

/** Process-local store; contents are lost when the process exits. */
export class InMemoryExperimentStore implements ExperimentStorePort {
  private readonly definitions = new Map<string, ExperimentDef>();
  private readonly results = new Map<string, RunResult>();

  saveDefinition(def: ExperimentDef): void {
    this.definitions.set(def.id, def);
  }

  findDefinition(experimentId: string): ExperimentDef | null {
    return this.definitions.get(experimentId) ?? null;
  }

  listDefinitions(): ExperimentDef[] {
    return [...this.definitions.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  saveResult(experimentId: string, result: RunResult): void {
    this.results.set(experimentId, result);
  }

  findResult(experimentId: string): RunResult | null {
    return this.results.get(experimentId) ?? null;
  }

  deleteResult(experimentId: string): void {
    this.results.delete(experimentId);
  }
}
