// ─── In-memory Store ──────────────────────────────────────────────────────────
export { InMemoryExperimentStore } from './memory/experiment.store.js';

// ─── Definition Files ─────────────────────────────────────────────────────────
export { readExperimentDocument, ExperimentFileError } from './loader/experiment-file.loader.js';

// ─── Clock / RNG ──────────────────────────────────────────────────────────────
export {
  DeterministicClock,
  SeededRng,
  SystemClock,
} from './clock/deterministic-clock.js';
