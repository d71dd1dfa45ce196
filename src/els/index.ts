/**
 * Execution Ledger Supervisor Module
 *
 * Block legality, boundary checks and ledger writes.
 */

export {
  ExecutionLedgerSupervisor,
  type ExecutionLedgerSupervisorOptions,
} from './execution-ledger-supervisor';
export {
  boundaryViolation,
  globToRegExp,
  matchesAnyPath,
  matchesIllegalMove,
  normalizePath,
} from './boundary';
export { DenialReason, BlockProposalZ } from './types';
export type {
  BlockProposal,
  BoundaryAction,
  BoundaryVerdict,
  LegalityDecision,
  TickVerdict,
} from './types';
