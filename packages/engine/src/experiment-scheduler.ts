import { randomUUID } from 'node:crypto';
import type {
  ClockPort,
  ExperimentCommandPort,
  ExperimentDef,
  ExperimentDefInput,
  ExperimentListing,
  ExperimentStorePort,
  FaultCounts,
  FaultKind,
  FaultSpec,
  RunResult,
  RunStatus,
} from '@faultline/domain';
import {
  ExperimentAlreadyRunningError,
  ExperimentNotFoundError,
  describeFailure,
  isSimulatedFailure,
} from './errors.js';
import { FaultInjector, resolveFault } from './fault-injector.js';
import { ObservationLog } from './observation-log.js';
import { parseExperimentDef } from './schemas.js';

/** Length of one tick of the run loop. */
const TICK_MS = 1_000;

const WILDCARD_TARGETS: readonly string[] = ['*'];

export interface ExperimentSchedulerDeps {
  store: ExperimentStorePort;
  clock: ClockPort;
  /** Defaults to an injector whose latency sleeps on `clock`. */
  injector?: FaultInjector;
}

interface TickCounters {
  faultsByKind: FaultCounts;
  errorsByKind: FaultCounts;
}

function increment(counts: FaultCounts, kind: FaultKind): void {
  counts[kind] = (counts[kind] ?? 0) + 1;
}

function sumCounts(counts: FaultCounts): number {
  return Object.values(counts).reduce((total, n) => total + (n ?? 0), 0);
}

function copyResult(result: RunResult): RunResult {
  return {
    ...result,
    startTime: new Date(result.startTime.getTime()),
    endTime: result.endTime && new Date(result.endTime.getTime()),
    observations: result.observations.map((o) => ({
      ...o,
      timestamp: new Date(o.timestamp.getTime()),
      details: { ...o.details },
    })),
    summary: {
      ...result.summary,
      faultsByKind: { ...result.summary.faultsByKind },
      errorsByKind: { ...result.summary.errorsByKind },
    },
  };
}

function targetsFor(spec: FaultSpec, def: ExperimentDef): readonly string[] {
  if (spec.affectedTargets.length > 0) return spec.affectedTargets;
  if (def.defaultTargets.length > 0) return def.defaultTargets;
  return WILDCARD_TARGETS;
}

/**
 * Registers experiments and runs them on a one-second tick loop.
 *
 * `run` resolves once the experiment has completed or been aborted. Runs of
 * different ids proceed concurrently, each with its own ObservationLog and
 * abort flag; starting a second run of an id that is already in flight
 * throws ExperimentAlreadyRunningError.
 */
export class ExperimentScheduler implements ExperimentCommandPort {
  private readonly store: ExperimentStorePort;
  private readonly clock: ClockPort;
  private readonly injector: FaultInjector;

  private readonly statuses = new Map<string, RunStatus>();
  private readonly abortFlags = new Set<string>();
  private readonly inFlight = new Set<string>();

  constructor(deps: ExperimentSchedulerDeps) {
    this.store = deps.store;
    this.clock = deps.clock;
    this.injector = deps.injector ?? new FaultInjector({ sleep: (ms) => deps.clock.sleep(ms) });
  }

  schedule(input: ExperimentDefInput): string {
    const parsed = parseExperimentDef(input);
    const experimentId = parsed.id || `exp-${randomUUID()}`;
    if (this.inFlight.has(experimentId)) {
      throw new ExperimentAlreadyRunningError(experimentId);
    }

    this.store.saveDefinition({ ...parsed, id: experimentId });
    this.store.deleteResult(experimentId);
    this.abortFlags.delete(experimentId);
    this.statuses.set(experimentId, 'pending');
    return experimentId;
  }

  /**
   * Checks that `experimentId` can run and starts it. The checks throw
   * synchronously, so a caller that does not await the run still sees them.
   */
  start(experimentId: string): Promise<RunResult> {
    const definition = this.store.findDefinition(experimentId);
    if (!definition) throw new ExperimentNotFoundError(experimentId);
    if (this.inFlight.has(experimentId)) {
      throw new ExperimentAlreadyRunningError(experimentId);
    }
    // Surface configuration errors before any state changes.
    definition.faultSpecs.forEach((spec) => resolveFault(spec));

    this.inFlight.add(experimentId);
    this.statuses.set(experimentId, 'running');
    return this.execute(experimentId, definition).finally(() => {
      this.inFlight.delete(experimentId);
      if (this.statuses.get(experimentId) === 'running') {
        // The loop threw before reaching a terminal state.
        this.statuses.set(experimentId, 'aborted');
      }
    });
  }

  async run(experimentId: string): Promise<RunResult> {
    return this.start(experimentId);
  }

  abort(experimentId: string): void {
    if (!this.store.findDefinition(experimentId)) {
      throw new ExperimentNotFoundError(experimentId);
    }
    this.abortFlags.add(experimentId);
  }

  getDefinition(experimentId: string): ExperimentDef | null {
    return this.store.findDefinition(experimentId);
  }

  /** A copy of the latest result; the stored one is never handed out. */
  getResult(experimentId: string): RunResult | null {
    const result = this.store.findResult(experimentId);
    return result ? copyResult(result) : null;
  }

  getStatus(experimentId: string): RunStatus | null {
    return this.statuses.get(experimentId) ?? null;
  }

  list(): ExperimentListing[] {
    return this.store.listDefinitions().map((definition) => ({
      definition,
      status: this.statuses.get(definition.id) ?? 'pending',
    }));
  }

  private async execute(experimentId: string, definition: ExperimentDef): Promise<RunResult> {
    const log = new ObservationLog(this.clock);
    const startTime = this.clock.now();
    const startMs = this.clock.monotonicMs();
    const deadlineMs = startMs + definition.durationSeconds * TICK_MS;
    const counters: TickCounters = { faultsByKind: {}, errorsByKind: {} };

    log.record('scheduler', 'experiment_started', {
      experimentId,
      name: definition.name,
    });
    console.log(
      `[scheduler] started ${experimentId} (${definition.name}) for ${definition.durationSeconds}s`,
    );

    while (this.clock.monotonicMs() < deadlineMs) {
      if (this.abortFlags.has(experimentId)) break;

      await this.tick(definition, log, counters);

      const elapsedMs = this.clock.monotonicMs() - startMs;
      const nextBoundaryMs = startMs + (Math.floor(elapsedMs / TICK_MS) + 1) * TICK_MS;
      await this.sleepUntil(Math.min(nextBoundaryMs, deadlineMs));
    }

    // The deadline is a tick boundary too, so an abort set during the last
    // second still counts.
    const status: RunStatus = this.abortFlags.has(experimentId) ? 'aborted' : 'completed';
    const endTime = this.clock.now();
    log.record('scheduler', 'experiment_ended', { status });

    const result: RunResult = {
      definition,
      status,
      startTime,
      endTime,
      observations: log.snapshot(),
      summary: {
        totalFaultsFired: sumCounts(counters.faultsByKind),
        faultsByKind: counters.faultsByKind,
        errorsByKind: counters.errorsByKind,
        durationSeconds: (this.clock.monotonicMs() - startMs) / 1_000,
      },
    };
    this.store.saveResult(experimentId, copyResult(result));
    this.statuses.set(experimentId, status);

    console.log(
      `[scheduler] ${experimentId} ${status}: ${result.summary.totalFaultsFired} faults fired in ${result.summary.durationSeconds.toFixed(2)}s`,
    );
    return result;
  }

  /** Timers may wake a little early, so keep sleeping until `targetMs` is reached. */
  private async sleepUntil(targetMs: number): Promise<void> {
    let remainingMs = targetMs - this.clock.monotonicMs();
    while (remainingMs > 0) {
      await this.clock.sleep(remainingMs);
      remainingMs = targetMs - this.clock.monotonicMs();
    }
  }

  private async tick(
    definition: ExperimentDef,
    log: ObservationLog,
    counters: TickCounters,
  ): Promise<void> {
    for (const spec of definition.faultSpecs) {
      for (const target of targetsFor(spec, definition)) {
        try {
          const fired = await this.injector.inject(spec);
          if (!fired) continue;
          increment(counters.faultsByKind, spec.kind);
          log.record(target, `${spec.kind}_injected`, { probability: spec.probability });
        } catch (err) {
          if (!isSimulatedFailure(err)) throw err;
          increment(counters.faultsByKind, spec.kind);
          increment(counters.errorsByKind, spec.kind);
          log.record(target, `${spec.kind}_exception`, {
            kind: spec.kind,
            ...describeFailure(err),
          });
        }
      }
    }
  }
}
