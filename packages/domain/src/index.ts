// ─── Entities ─────────────────────────────────────────────────────────────────
export * from './entities/fault.js';
export * from './entities/observation.js';
export * from './entities/experiment.js';

// ─── Inbound Ports ────────────────────────────────────────────────────────────
export * from './ports/inbound/fault-injection.port.js';
export * from './ports/inbound/experiment-command.port.js';

// ─── Outbound Ports ───────────────────────────────────────────────────────────
export * from './ports/outbound/clock.port.js';
export * from './ports/outbound/random-source.port.js';
export * from './ports/outbound/experiment-store.port.js';
