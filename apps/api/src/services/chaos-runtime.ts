import {
  InMemoryExperimentStore,
  SeededRng,
  SystemClock,
} from '@faultline/adapters';
import type { ClockPort, ExperimentStorePort, RandomSourcePort } from '@faultline/domain';
import { ExperimentScheduler, FaultInjector } from '@faultline/engine';

export interface ChaosRuntimeOptions {
  clock?: ClockPort;
  store?: ExperimentStorePort;
  random?: RandomSourcePort;
  seed?: number | null;
}

let _instance: ChaosRuntime | null = null;

/** Process-wide injector and scheduler shared by the HTTP routes. */
export class ChaosRuntime {
  readonly injector: FaultInjector;
  readonly scheduler: ExperimentScheduler;

  private constructor(options: ChaosRuntimeOptions) {
    const clock = options.clock ?? new SystemClock();
    const random =
      options.random ?? (options.seed != null ? new SeededRng(options.seed) : undefined);
    this.injector = new FaultInjector({ random, sleep: (ms) => clock.sleep(ms) });
    this.scheduler = new ExperimentScheduler({
      store: options.store ?? new InMemoryExperimentStore(),
      clock,
      injector: this.injector,
    });
  }

  static getInstance(): ChaosRuntime | null {
    return _instance;
  }

  static init(options: ChaosRuntimeOptions = {}): ChaosRuntime {
    _instance = new ChaosRuntime(options);
    return _instance;
  }

  /** The current runtime, created with defaults on first use. */
  static require(): ChaosRuntime {
    return _instance ?? ChaosRuntime.init();
  }

  /**
   * Starts a run without waiting for it. Start checks throw to the caller;
   * failures during the run are logged.
   */
  startInBackground(experimentId: string): void {
    void this.scheduler.start(experimentId).catch((err) => {
      console.error(`[chaos-runtime] run ${experimentId} failed`, err);
    });
  }
}
