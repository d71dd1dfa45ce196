/**
 * Ledger Module
 *
 * Hash-chained session ledger, its audits, and the artifact store.
 *
 * @example
 * ```typescript
 * import { SessionLedger, verifyLedger, auditMonotonicity } from './ledger';
 *
 * const ledger = SessionLedger.open({ storeDir: './store', sessionId: 's-01' });
 * const chain = verifyLedger(ledger.getEvents());
 * const policy = auditMonotonicity(ledger.getEvents());
 * ```
 */

export {
  createLedgerEvent,
  computeEventHash,
  recomputeEventHash,
  verifyEventHash,
  verifyEventLink,
  serializeEvent,
  deserializeEvent,
} from './ledger-entry';
export type { LedgerEventData } from './ledger-entry';

export { acquireLock, isProcessAlive, readLockInfo, releaseLock, withLedgerLock } from './lock';
export type { LockInfo, LockOptions } from './lock';

export { SessionLedger, sessionDir, LEDGER_FILE, LOCK_FILE } from './ledger';
export type { SessionLedgerOptions } from './ledger';

export { verifyLedger, auditMonotonicity, formatVerificationReport } from './verifier';
export type {
  LedgerVerificationResult,
  MonotonicityViolation,
  MonotonicityReport,
} from './verifier';

export { queryLedger, getBlockHistory, countByEventType } from './query';
export type { LedgerQueryOptions, LedgerQueryResult } from './query';

export { ArtifactStore, contentDigest } from './artifact-store';
export type { ArtifactRead, ArtifactStoreOptions, InvalidArtifact } from './artifact-store';
