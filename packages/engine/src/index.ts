// ─── Failure taxonomy ─────────────────────────────────────────────────────────
export {
  SimulatedFailure,
  ChaosError,
  TimeoutFailure,
  ChaosTimeoutError,
  PartialFailureError,
  ResourceExhaustedError,
  InvalidValueFailure,
  DataCorruptionError,
  ConfigurationError,
  ExperimentNotFoundError,
  ExperimentAlreadyRunningError,
  categoryIncludes,
  describeFailure,
  isInCategory,
  isSimulatedFailure,
} from './errors.js';
export type { FailureCategory } from './errors.js';

// ─── Schemas ──────────────────────────────────────────────────────────────────
export {
  faultKindSchema,
  faultSpecSchema,
  experimentDefSchema,
  createFaultSpec,
  parseExperimentDef,
} from './schemas.js';

// ─── Engine ───────────────────────────────────────────────────────────────────
export { FaultInjector, resolveFault } from './fault-injector.js';
export type { FaultInjectorOptions, ResolvedFault } from './fault-injector.js';
export { ObservationLog } from './observation-log.js';
export { ExperimentScheduler } from './experiment-scheduler.js';
export type { ExperimentSchedulerDeps } from './experiment-scheduler.js';
export { withFaults, resilienceTest, chaosMonkey } from './wrappers.js';
export type { WrapOptions, ChaosMonkeyOptions } from './wrappers.js';
