/**
 * Plant Supervisor
 *
 * A dual-supervisor control loop that gates an operator's work sessions
 * against a fatigue/risk model. The Human Plant Supervisor classifies
 * fatigue from O-tests and holds the session mode; the Execution Ledger
 * Supervisor grants block contracts and keeps a hash-chained ledger; the
 * Scheduler Gate and Policy Catalog are pure lookups over validated
 * configuration.
 *
 * @license Apache-2.0
 */

// Shared enums, orderings and artifact schemas
export * from './contracts';

export * from './errors';
export { createLogger, silentLogger, type Logger, type LogLevel } from './logger';

// Configuration
export * from './catalog';
export * from './schedule';
export * from './config';

// Supervisors
export * from './hps';
export * from './els';

// Persistence
export * from './ledger';
export * from './checkpoint';

// Control loop
export * from './session';
